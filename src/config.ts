import { InvalidConfigurationError } from './errors.js';

export const DEFAULT_MODEL = 'gpt-5-nano-2025-08-07';

export interface BatchSettings {
  maxBatchSize: number;
  maxBatchTokens: number;
  maxConcurrency: number;
}

export interface RetrySettings {
  requestTimeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxRetryAfterMs: number;
}

export interface AppConfig extends BatchSettings, RetrySettings {
  apiKey: string | undefined;
  model: string;
}

export const DEFAULT_BATCH_SETTINGS: BatchSettings = {
  maxBatchSize: 20,
  maxBatchTokens: 6000,
  maxConcurrency: 5,
};

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  requestTimeoutMs: 60_000,
  maxAttempts: 4,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  maxRetryAfterMs: 60_000,
};

/** Option values as commander hands them over: strings, or undefined when omitted. */
export interface RawConfigOptions {
  model?: string | undefined;
  timeout?: string | undefined;
  batchSize?: string | undefined;
  batchTokens?: string | undefined;
  attempts?: string | undefined;
  backoff?: string | undefined;
  maxBackoff?: string | undefined;
  concurrency?: string | undefined;
}

type Env = Record<string, string | undefined>;

export function loadConfig(raw: RawConfigOptions, env: Env = process.env): AppConfig {
  const config: AppConfig = {
    apiKey: env.OPENAI_API_KEY?.trim() || undefined,
    model: raw.model?.trim() || env.CLASSIFIER_MODEL?.trim() || DEFAULT_MODEL,
    requestTimeoutMs: parsePositiveInteger(
      raw.timeout ?? env.CLASSIFIER_TIMEOUT_MS,
      DEFAULT_RETRY_SETTINGS.requestTimeoutMs,
      'timeout',
    ),
    maxBatchSize: parsePositiveInteger(
      raw.batchSize ?? env.CLASSIFIER_BATCH_SIZE,
      DEFAULT_BATCH_SETTINGS.maxBatchSize,
      'batch-size',
    ),
    maxBatchTokens: parsePositiveInteger(
      raw.batchTokens ?? env.CLASSIFIER_BATCH_TOKENS,
      DEFAULT_BATCH_SETTINGS.maxBatchTokens,
      'batch-tokens',
    ),
    maxAttempts: parsePositiveInteger(
      raw.attempts ?? env.CLASSIFIER_MAX_ATTEMPTS,
      DEFAULT_RETRY_SETTINGS.maxAttempts,
      'attempts',
    ),
    baseDelayMs: parseNonNegativeInteger(
      raw.backoff ?? env.CLASSIFIER_BACKOFF_MS,
      DEFAULT_RETRY_SETTINGS.baseDelayMs,
      'backoff',
    ),
    maxDelayMs: parseNonNegativeInteger(
      raw.maxBackoff ?? env.CLASSIFIER_MAX_BACKOFF_MS,
      DEFAULT_RETRY_SETTINGS.maxDelayMs,
      'max-backoff',
    ),
    maxRetryAfterMs: DEFAULT_RETRY_SETTINGS.maxRetryAfterMs,
    maxConcurrency: parsePositiveInteger(
      raw.concurrency ?? env.CLASSIFIER_CONCURRENCY,
      DEFAULT_BATCH_SETTINGS.maxConcurrency,
      'concurrency',
    ),
  };

  validateBatchSettings(config);
  validateRetrySettings(config);
  return config;
}

export function validateBatchSettings(settings: BatchSettings): void {
  requirePositiveInteger(settings.maxBatchSize, 'maxBatchSize');
  requirePositiveInteger(settings.maxBatchTokens, 'maxBatchTokens');
  requirePositiveInteger(settings.maxConcurrency, 'maxConcurrency');
}

export function validateRetrySettings(settings: RetrySettings): void {
  requirePositiveInteger(settings.requestTimeoutMs, 'requestTimeoutMs');
  requirePositiveInteger(settings.maxAttempts, 'maxAttempts');
  if (!Number.isFinite(settings.baseDelayMs) || settings.baseDelayMs < 0) {
    throw new InvalidConfigurationError('baseDelayMs must be zero or a positive number.');
  }
  if (!Number.isFinite(settings.maxDelayMs) || settings.maxDelayMs < settings.baseDelayMs) {
    throw new InvalidConfigurationError('maxDelayMs must be at least baseDelayMs.');
  }
  if (!Number.isFinite(settings.maxRetryAfterMs) || settings.maxRetryAfterMs < 0) {
    throw new InvalidConfigurationError('maxRetryAfterMs must be zero or a positive number.');
  }
}

function requirePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigurationError(`${name} must be a positive integer (got ${value}).`);
  }
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidConfigurationError(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}

export function parseNonNegativeInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidConfigurationError(`Option --${flagName} must be zero or a positive number.`);
  }
  return Math.floor(parsed);
}
