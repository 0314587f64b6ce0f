import { errors } from 'playwright';

/** A driver action (locate, click, fill, ...) failed or timed out. */
export class UIInteractionError extends Error {
  readonly action: string;
  readonly timedOut: boolean;

  constructor(action: string, cause: unknown) {
    super(`${action} ${isTimeoutError(cause) ? 'timed out' : 'failed'}: ${describeError(cause)}`, { cause });
    this.name = 'UIInteractionError';
    this.action = action;
    this.timedOut = isTimeoutError(cause);
  }
}

/** Playwright timeout, bare or wrapped in a UIInteractionError. */
export function isTimeoutError(error: unknown): boolean {
  if (error instanceof errors.TimeoutError) {
    return true;
  }
  return error instanceof UIInteractionError && error.timedOut;
}

/** The answer oracle could not produce a usable answer. */
export class OracleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

