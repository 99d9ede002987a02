export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export type TransientReason = 'timeout' | 'rate-limited' | 'server-error' | 'network';

/**
 * A failure worth retrying. `retryAfterMs` carries the service's own hint when
 * it sent one with a rate-limit response.
 */
export class ClientTransientError extends Error {
  readonly reason: TransientReason;
  readonly retryAfterMs: number | undefined;

  constructor(reason: TransientReason, message: string, options: { retryAfterMs?: number | undefined; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ClientTransientError';
    this.reason = reason;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export type FatalReason = 'authentication' | 'bad-request';

export class ClientFatalError extends Error {
  readonly reason: FatalReason;

  constructor(reason: FatalReason, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ClientFatalError';
    this.reason = reason;
  }
}

export class ParseFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseFailure';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
