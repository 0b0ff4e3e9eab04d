import { TelegramConfig } from '../types/config';
import { ExternalServiceError, describeError } from '../types/errors';
import { RenewalStatus, RunRecord } from '../types/renewal';
import { Result, err, ok } from '../types/result';
import { createLogger } from '../utils/logger';

const logger = createLogger('Notifier');

const HEADLINES: Record<RenewalStatus, string> = {
  Success: '✅ Renewal succeeded',
  Unexpired: 'ℹ️ Renewal window not open yet',
  NeedVerify: '🔐 Email verification needs attention',
  Unknown: '❓ Renewal result unknown',
  Failed: '❌ Renewal failed'
};

export function formatOutcomeMessage(record: RunRecord): string {
  const lines = [HEADLINES[record.status], `VPS: ${record.resourceId}`];

  switch (record.status) {
    case 'Success':
      lines.push(`New expiry: ${record.newExpiry ?? record.oldExpiry ?? 'unknown'}`);
      break;
    case 'Unexpired':
      lines.push(`Expiry: ${record.oldExpiry ?? 'unknown'}`);
      if (record.message) lines.push(record.message);
      break;
    case 'Unknown':
      lines.push(`Expiry: ${record.oldExpiry ?? 'unknown'}`);
      lines.push(`Details: ${record.message ?? 'none'}`);
      lines.push('Please check the control panel; the next scheduled run will re-check the expiry.');
      break;
    default:
      lines.push(`Expiry: ${record.oldExpiry ?? 'unknown'}`);
      lines.push(`Reason: ${record.message ?? 'unknown error'}`);
  }

  return lines.join('\n');
}

/**
 * Best-effort Telegram delivery. Never throws; a missing configuration means
 * notifications are switched off.
 */
export class TelegramNotifier {
  constructor(private readonly config: TelegramConfig | null) {}

  async notify(message: string): Promise<Result<boolean, ExternalServiceError>> {
    if (!this.config) {
      logger.debug('Telegram is not configured, skipping notification');
      return ok(false);
    }

    try {
      const response = await fetch(`https://api.telegram.org/bot${this.config.botToken}/sendMessage`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          chat_id: this.config.chatId,
          text: message
        }),
        signal: AbortSignal.timeout(15000)
      });

      if (!response.ok) {
        const error = new ExternalServiceError('telegram', `status ${response.status}`);
        logger.error({ status: response.status }, 'Telegram notification rejected');
        return err(error);
      }

      logger.info('Telegram notification sent');
      return ok(true);
    } catch (error) {
      logger.error({ error: describeError(error) }, 'Telegram notification failed');
      return err(new ExternalServiceError('telegram', describeError(error)));
    }
  }
}
