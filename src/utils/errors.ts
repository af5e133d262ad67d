export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SyncAbortedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncAbortedError';
  }
}

export interface GameDataErrorDetails {
  endpoint: string;
  status?: number;
  retryable: boolean;
}

export class GameDataError extends Error {
  readonly endpoint: string;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, details: GameDataErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GameDataError';
    this.endpoint = details.endpoint;
    this.status = details.status;
    this.retryable = details.retryable;
  }
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    super(`${label} failed after ${attempts} attempt(s): ${describeError(cause)}`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export class PayloadValidationError extends Error {
  readonly issues: string[];

  constructor(label: string, issues: string[]) {
    super(`Invalid ${label}: ${issues.join('; ')}`);
    this.name = 'PayloadValidationError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function serializeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return typeof error === 'string' ? error : JSON.stringify(error, null, 2);
}
