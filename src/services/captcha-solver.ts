import { CaptchaServiceError, describeError } from '../types/errors';
import { Result, err, ok } from '../types/result';
import { Clock, systemClock } from '../utils/timing';
import { createLogger } from '../utils/logger';

const logger = createLogger('CaptchaSolver');

export interface CaptchaSolverOptions {
  apiUrl: string;
  attempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  clock?: Clock;
}

export interface CaptchaSolver {
  solve(imageDataUrl: string): Promise<Result<string, CaptchaServiceError>>;
}

export function isValidCaptchaCode(code: string): boolean {
  if (!/^\d{4,8}$/.test(code)) return false;
  // OCR noise tends to come back as a single repeated digit
  return new Set(code).size > 1;
}

export function pickCaptchaCandidate(responseText: string): string | null {
  const digits = /\d+/.exec(responseText.trim());
  return digits ? digits[0] : null;
}

/**
 * Client for the external OCR service that reads the renewal captcha image.
 */
export class CaptchaSolverService implements CaptchaSolver {
  private readonly apiUrl: string;
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly clock: Clock;

  constructor(options: CaptchaSolverOptions) {
    this.apiUrl = options.apiUrl;
    this.attempts = options.attempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.timeoutMs = options.timeoutMs ?? 20000;
    this.clock = options.clock ?? systemClock;
  }

  async solve(imageDataUrl: string): Promise<Result<string, CaptchaServiceError>> {
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        const code = await this.requestCode(imageDataUrl);
        logger.info({ attempt }, `Captcha recognised: ${code}`);
        return ok(code);
      } catch (error) {
        lastError = describeError(error);
        if (attempt < this.attempts) {
          logger.info({ attempt, error: lastError }, 'Captcha recognition failed, retrying');
          await this.clock.sleep(this.retryDelayMs);
        }
      }
    }

    logger.error({ attempts: this.attempts, error: lastError }, 'Captcha recognition failed');
    return err(new CaptchaServiceError(`captcha recognition failed after ${this.attempts} attempts: ${lastError}`));
  }

  private async requestCode(imageDataUrl: string): Promise<string> {
    logger.debug({ apiUrl: this.apiUrl }, 'Sending captcha image to OCR service');

    const response = await fetch(this.apiUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'text/plain'
      },
      body: imageDataUrl,
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      throw new CaptchaServiceError(`OCR service responded with status ${response.status}`);
    }

    const text = await response.text();
    const candidate = pickCaptchaCandidate(text);
    if (!candidate || !isValidCaptchaCode(candidate)) {
      throw new CaptchaServiceError(`OCR service returned an invalid code: ${JSON.stringify(text.trim().slice(0, 40))}`);
    }

    return candidate;
  }
}
