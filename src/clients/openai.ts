import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  RateLimitError,
} from 'openai';
import type { Response } from 'openai/resources/responses/responses';
import { verdictListFormat } from '../analysis/schemas.js';
import { ClientFatalError, ClientTransientError, describeError } from '../errors.js';
import type { ClassificationRequest } from '../types/index.js';
import type { ClassificationTransport, TransportCallOptions, TransportOutcome } from './classification.js';

export interface OpenAiTransportOptions {
  model: string;
  maxOutputTokens?: number;
}

/**
 * Sends batches to the OpenAI Responses API with the verdict JSON schema as
 * the text format. The SDK's own retries must be off (`maxRetries: 0`); the
 * classification client owns retry policy.
 */
export class OpenAiTransport implements ClassificationTransport {
  readonly provider = 'openai';
  readonly model: string;
  private readonly maxOutputTokens: number | undefined;

  constructor(private readonly client: OpenAI, options: OpenAiTransportOptions) {
    this.model = options.model;
    this.maxOutputTokens = options.maxOutputTokens;
  }

  async send(request: ClassificationRequest, options: TransportCallOptions): Promise<TransportOutcome> {
    try {
      const response = await this.client.responses.create(
        {
          model: this.model,
          instructions: request.instructions,
          input: request.prompt,
          text: { format: verdictListFormat },
          ...(this.maxOutputTokens !== undefined ? { max_output_tokens: this.maxOutputTokens } : {}),
        },
        { signal: options.signal, timeout: options.timeoutMs, maxRetries: 0 },
      );
      return { kind: 'success', text: collectOutputText(response) };
    } catch (error) {
      return { kind: 'failure', error: mapOpenAiError(error) };
    }
  }
}

export function createOpenAiClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0 });
}

export function collectOutputText(response: Response): string {
  const parts: string[] = [];
  for (const item of response.output) {
    if (item.type !== 'message') {
      continue;
    }
    for (const content of item.content) {
      if (content.type === 'output_text') {
        parts.push(content.text);
      }
    }
  }
  return parts.join('');
}

export function mapOpenAiError(error: unknown): ClientTransientError | ClientFatalError {
  // Timeout is a subclass of the connection error, so it is checked first.
  if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
    return new ClientTransientError('timeout', describeError(error), { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new ClientTransientError('network', describeError(error), { cause: error });
  }
  if (error instanceof RateLimitError) {
    return new ClientTransientError('rate-limited', describeError(error), {
      retryAfterMs: retryAfterFrom(error.headers),
      cause: error,
    });
  }
  if (error instanceof APIError) {
    const status = error.status ?? 0;
    if (status === 401 || status === 403) {
      return new ClientFatalError('authentication', describeError(error), { cause: error });
    }
    if (status === 408 || status === 409 || status >= 500) {
      return new ClientTransientError('server-error', describeError(error), { cause: error });
    }
    return new ClientFatalError('bad-request', describeError(error), { cause: error });
  }
  return new ClientTransientError('network', describeError(error), { cause: error });
}

export function retryAfterFrom(headers: Headers | undefined): number | undefined {
  if (!headers) {
    return undefined;
  }

  const millis = Number.parseFloat(headers.get('retry-after-ms') ?? '');
  if (Number.isFinite(millis) && millis >= 0) {
    return Math.round(millis);
  }

  const raw = headers.get('retry-after');
  if (!raw) {
    return undefined;
  }
  const seconds = Number.parseFloat(raw);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(raw);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - Date.now());
}
