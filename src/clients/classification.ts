import type { LlmCache } from '../analysis/llmCache.js';
import { DEFAULT_RETRY_SETTINGS, validateRetrySettings, type RetrySettings } from '../config.js';
import { ClientFatalError, ClientTransientError, describeError } from '../errors.js';
import type { ClassificationRequest, ClientFailureReason } from '../types/index.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

export type TransportOutcome =
  | { kind: 'success'; text: string }
  | { kind: 'failure'; error: ClientTransientError | ClientFatalError };

export interface TransportCallOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

/** One request/response exchange with a classification service. */
export interface ClassificationTransport {
  readonly provider: string;
  readonly model: string;
  send(request: ClassificationRequest, options: TransportCallOptions): Promise<TransportOutcome>;
}

export type ClientOutcome =
  | { ok: true; text: string; attempts: number; cached: boolean }
  | { ok: false; reason: ClientFailureReason; message: string; attempts: number };

export interface ClassificationClientOptions extends Partial<RetrySettings> {
  cache?: LlmCache | undefined;
  logger?: ((message: string) => void) | undefined;
  /** Source of jitter in [0, 1). */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SendOptions {
  /** Run-level cancellation: once aborted no further attempt is started. */
  signal?: AbortSignal | undefined;
}

export class ClassificationClient {
  private readonly settings: RetrySettings;
  private readonly cache: LlmCache | undefined;
  private readonly logger: ((message: string) => void) | undefined;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly transport: ClassificationTransport, options: ClassificationClientOptions = {}) {
    this.settings = {
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_RETRY_SETTINGS.requestTimeoutMs,
      maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_SETTINGS.maxAttempts,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_SETTINGS.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? Math.max(DEFAULT_RETRY_SETTINGS.maxDelayMs, options.baseDelayMs ?? 0),
      maxRetryAfterMs: options.maxRetryAfterMs ?? DEFAULT_RETRY_SETTINGS.maxRetryAfterMs,
    };
    validateRetrySettings(this.settings);
    this.cache = options.cache;
    this.logger = options.logger;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get model(): string {
    return this.transport.model;
  }

  async send(request: ClassificationRequest, options: SendOptions = {}): Promise<ClientOutcome> {
    const cached = await this.lookupCached(request);
    if (cached != null) {
      this.logger?.(`Batch ${request.batchId}: using cached reply`);
      return { ok: true, text: cached, attempts: 0, cached: true };
    }

    let lastError: ClientTransientError | undefined;
    for (let attempt = 1; attempt <= this.settings.maxAttempts; attempt += 1) {
      if (options.signal?.aborted) {
        return { ok: false, reason: 'cancelled', message: 'Run cancelled before the request was sent.', attempts: attempt - 1 };
      }

      const outcome = await this.attempt(request);
      if (outcome.kind === 'success') {
        return { ok: true, text: outcome.text, attempts: attempt, cached: false };
      }

      const { error } = outcome;
      if (error instanceof ClientFatalError) {
        this.logger?.(`Batch ${request.batchId}: fatal ${error.reason} error, not retrying: ${error.message}`);
        return { ok: false, reason: 'fatal-client-error', message: error.message, attempts: attempt };
      }

      lastError = error;
      if (attempt === this.settings.maxAttempts) {
        break;
      }

      const waitMs = this.retryDelay(attempt, error);
      this.logger?.(
        `Batch ${request.batchId}: attempt ${attempt}/${this.settings.maxAttempts} failed (${error.reason}: ${error.message}). Retrying in ${waitMs}ms.`,
      );
      await this.sleep(waitMs);
    }

    const reason = lastError ? transientReason(lastError) : 'transient-error';
    return {
      ok: false,
      reason,
      message: lastError?.message ?? 'Retry budget exhausted.',
      attempts: this.settings.maxAttempts,
    };
  }

  /**
   * Keeps a reply for later runs. Callers store only replies they could use;
   * a cache that cannot be written is logged and otherwise ignored.
   */
  async storeReply(request: ClassificationRequest, text: string): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.store(this.cachePayload(request), text);
    } catch (error) {
      this.logger?.(`Batch ${request.batchId}: could not cache reply: ${describeError(error)}`);
    }
  }

  /** Exponential backoff with equal jitter; rate limits honour the service's retry-after hint. */
  retryDelay(attempt: number, error: ClientTransientError): number {
    const ceiling = Math.min(this.settings.maxDelayMs, this.settings.baseDelayMs * 2 ** (attempt - 1));
    const jittered = Math.round(ceiling / 2 + this.random() * (ceiling / 2));
    if (error.reason !== 'rate-limited') {
      return jittered;
    }
    if (error.retryAfterMs !== undefined) {
      return Math.max(jittered, Math.min(error.retryAfterMs, this.settings.maxRetryAfterMs));
    }
    return jittered * 2;
  }

  private async lookupCached(request: ClassificationRequest): Promise<string | null> {
    if (!this.cache) {
      return null;
    }
    try {
      return await this.cache.lookup(this.cachePayload(request));
    } catch (error) {
      this.logger?.(`Batch ${request.batchId}: cache lookup failed, calling the service: ${describeError(error)}`);
      return null;
    }
  }

  private cachePayload(request: ClassificationRequest) {
    return {
      type: 'classification-batch',
      version: 1,
      provider: this.transport.provider,
      model: this.transport.model,
      instructions: request.instructions,
      prompt: request.prompt,
    } as const;
  }

  private async attempt(request: ClassificationRequest): Promise<TransportOutcome> {
    const controller = new AbortController();
    const timeoutMs = this.settings.requestTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timedOut = new Promise<TransportOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          kind: 'failure',
          error: new ClientTransientError('timeout', `No reply within ${timeoutMs}ms.`),
        });
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.invoke(request, controller.signal), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async invoke(request: ClassificationRequest, signal: AbortSignal): Promise<TransportOutcome> {
    try {
      return await this.transport.send(request, { signal, timeoutMs: this.settings.requestTimeoutMs });
    } catch (error) {
      return {
        kind: 'failure',
        error: new ClientTransientError('network', `Transport threw: ${describeError(error)}`, { cause: error }),
      };
    }
  }
}

function transientReason(error: ClientTransientError): ClientFailureReason {
  switch (error.reason) {
    case 'timeout':
      return 'timeout';
    case 'rate-limited':
      return 'rate-limited';
    default:
      return 'transient-error';
  }
}
