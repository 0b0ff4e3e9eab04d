// Standardized error types and handling
export interface ErrorSummary {
  error: string;
  message: string;
  code: string;
  recoverable: boolean;
  details?: unknown;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly recoverable: boolean;
  public readonly details?: unknown;

  constructor(message: string, code: string, recoverable: boolean = false, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.recoverable = recoverable;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  toSummary(): ErrorSummary {
    return {
      error: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      details: this.details
    };
  }
}

// Specific error classes
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', false, details);
    this.name = 'ConfigurationError';
  }
}

export class MailboxError extends AppError {
  constructor(message: string, details?: unknown) {
    super(`Mailbox error: ${message}`, 'MAILBOX_ERROR', true, details);
    this.name = 'MailboxError';
  }
}

export class CaptchaServiceError extends AppError {
  constructor(message: string) {
    super(message, 'CAPTCHA_SERVICE_ERROR', true);
    this.name = 'CaptchaServiceError';
  }
}

export class BrowserSetupError extends AppError {
  constructor(message: string) {
    super(`Browser setup failed: ${message}`, 'BROWSER_SETUP_ERROR', false);
    this.name = 'BrowserSetupError';
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string) {
    super(`External service error (${service}): ${message}`, 'EXTERNAL_SERVICE_ERROR', true);
    this.name = 'ExternalServiceError';
  }
}

export class StateTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Illegal renewal state transition ${from} -> ${to}`, 'STATE_TRANSITION_ERROR', false, { from, to });
    this.name = 'StateTransitionError';
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT_ERROR', true, { operation, timeoutMs });
    this.name = 'TimeoutError';
  }
}

// Error handler utility
export function handleError(error: unknown): ErrorSummary {
  if (error instanceof AppError) {
    return error.toSummary();
  }

  if (error instanceof Error) {
    return {
      error: error.name || 'Error',
      message: error.message,
      code: 'INTERNAL_ERROR',
      recoverable: false
    };
  }

  return {
    error: 'UnknownError',
    message: typeof error === 'string' ? error : 'An unknown error occurred',
    code: 'UNKNOWN_ERROR',
    recoverable: false
  };
}

export function describeError(error: unknown): string {
  return handleError(error).message;
}
