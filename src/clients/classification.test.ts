import { describe, expect, it, vi } from 'vitest';
import { LlmCache } from '../analysis/llmCache.js';
import type { CacheClient } from '../cache/cache.js';
import { MemoryCache } from '../cache/memoryCache.js';
import { ClientFatalError, ClientTransientError, InvalidConfigurationError } from '../errors.js';
import type { ClassificationRequest } from '../types/index.js';
import {
  ClassificationClient,
  type ClassificationClientOptions,
  type ClassificationTransport,
  type TransportOutcome,
} from './classification.js';

const request: ClassificationRequest = {
  batchId: 3,
  instructions: 'Return JSON only.',
  prompt: '<comment id="1">great service</comment>',
  commentIds: ['1'],
};

function scriptedTransport(...outcomes: TransportOutcome[]) {
  const send = vi.fn(async (): Promise<TransportOutcome> => {
    const next = outcomes.shift();
    if (!next) {
      throw new Error('transport called more often than scripted');
    }
    return next;
  });
  const transport: ClassificationTransport = { provider: 'fake', model: 'fake-model', send };
  return { transport, send };
}

const success = (text: string): TransportOutcome => ({ kind: 'success', text });
const transient = (reason: ClientTransientError['reason'], retryAfterMs?: number): TransportOutcome => ({
  kind: 'failure',
  error: new ClientTransientError(reason, `${reason} failure`, { retryAfterMs }),
});
const fatal = (): TransportOutcome => ({
  kind: 'failure',
  error: new ClientFatalError('authentication', 'Incorrect API key provided'),
});

function createClient(transport: ClassificationTransport, options: ClassificationClientOptions = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new ClassificationClient(transport, {
    maxAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 1_000,
    requestTimeoutMs: 1_000,
    random: () => 0.5,
    sleep,
    ...options,
  });
  return { client, sleep };
}

describe('ClassificationClient', () => {
  it('returns the reply of a successful first attempt', async () => {
    const { transport, send } = scriptedTransport(success('{"verdicts":[]}'));
    const { client, sleep } = createClient(transport);

    const outcome = await client.send(request);

    expect(outcome).toEqual({ ok: true, text: '{"verdicts":[]}', attempts: 1, cached: false });
    expect(send).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transient failures with exponential backoff', async () => {
    const { transport, send } = scriptedTransport(transient('server-error'), transient('network'), success('ok'));
    const { client, sleep } = createClient(transport);

    const outcome = await client.send(request);

    expect(outcome).toEqual({ ok: true, text: 'ok', attempts: 3, cached: false });
    expect(send).toHaveBeenCalledTimes(3);
    // ceiling 100 then 200; with random 0.5 the wait is 3/4 of the ceiling
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([75, 150]);
  });

  it('reports timeout when every attempt times out', async () => {
    const { transport, send } = scriptedTransport(transient('timeout'), transient('timeout'), transient('timeout'));
    const { client } = createClient(transport);

    const outcome = await client.send(request);

    expect(outcome).toEqual({ ok: false, reason: 'timeout', message: 'timeout failure', attempts: 3 });
    expect(send).toHaveBeenCalledTimes(3);
  });

  it('stops at once on a fatal failure', async () => {
    const { transport, send } = scriptedTransport(fatal(), success('never'));
    const { client, sleep } = createClient(transport);

    const outcome = await client.send(request);

    expect(outcome).toEqual({
      ok: false,
      reason: 'fatal-client-error',
      message: 'Incorrect API key provided',
      attempts: 1,
    });
    expect(send).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('waits at least the retry-after hint on rate limits', async () => {
    const { transport } = scriptedTransport(transient('rate-limited', 5_000), success('ok'));
    const { client, sleep } = createClient(transport);

    await client.send(request);

    expect(sleep).toHaveBeenCalledWith(5_000);
  });

  it('caps the retry-after hint', async () => {
    const { transport } = scriptedTransport(transient('rate-limited', 600_000), success('ok'));
    const { client, sleep } = createClient(transport, { maxRetryAfterMs: 20_000 });

    await client.send(request);

    expect(sleep).toHaveBeenCalledWith(20_000);
  });

  it('doubles the backoff on rate limits without a hint', async () => {
    const { transport } = scriptedTransport(transient('rate-limited'), success('ok'));
    const { client, sleep } = createClient(transport);

    await client.send(request);

    expect(sleep).toHaveBeenCalledWith(150);
  });

  it('reports rate-limited when the budget runs out on rate limits', async () => {
    const { transport } = scriptedTransport(transient('server-error'), transient('rate-limited'));
    const { client } = createClient(transport, { maxAttempts: 2 });

    const outcome = await client.send(request);

    expect(outcome).toMatchObject({ ok: false, reason: 'rate-limited', attempts: 2 });
  });

  it('caps the exponential delay at maxDelayMs', () => {
    const { transport } = scriptedTransport();
    const { client } = createClient(transport, { baseDelayMs: 400, maxDelayMs: 1_000, random: () => 0 });
    const error = new ClientTransientError('server-error', 'boom');

    expect([1, 2, 3, 4].map((attempt) => client.retryDelay(attempt, error))).toEqual([200, 400, 500, 500]);
  });

  it('treats a thrown transport error as a transient network failure', async () => {
    const send = vi
      .fn<ClassificationTransport['send']>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(success('ok'));
    const { client } = createClient({ provider: 'fake', model: 'fake-model', send });

    const outcome = await client.send(request);

    expect(outcome).toEqual({ ok: true, text: 'ok', attempts: 2, cached: false });
  });

  it('times out an attempt that never answers and aborts its signal', async () => {
    const signals: AbortSignal[] = [];
    const transport: ClassificationTransport = {
      provider: 'fake',
      model: 'fake-model',
      send: (_request, options) => {
        signals.push(options.signal);
        return new Promise<TransportOutcome>(() => {});
      },
    };
    const { client } = createClient(transport, { requestTimeoutMs: 5, maxAttempts: 2 });

    const outcome = await client.send(request);

    expect(outcome).toEqual({ ok: false, reason: 'timeout', message: 'No reply within 5ms.', attempts: 2 });
    expect(signals).toHaveLength(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });

  it('does not start another attempt once the run is cancelled', async () => {
    const controller = new AbortController();
    const { transport, send } = scriptedTransport(transient('server-error'), success('late'));
    const sleep = vi.fn(async () => {
      controller.abort();
    });
    const { client } = createClient(transport, { sleep });

    const outcome = await client.send(request, { signal: controller.signal });

    expect(outcome).toEqual({
      ok: false,
      reason: 'cancelled',
      message: 'Run cancelled before the request was sent.',
      attempts: 1,
    });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('replays a stored reply without calling the transport', async () => {
    const cache = new LlmCache(new MemoryCache());
    await createClient(scriptedTransport().transport, { cache }).client.storeReply(request, '{"verdicts":[]}');

    const second = scriptedTransport();
    const outcome = await createClient(second.transport, { cache }).client.send(request);

    expect(outcome).toEqual({ ok: true, text: '{"verdicts":[]}', attempts: 0, cached: true });
    expect(second.send).not.toHaveBeenCalled();
  });

  it('leaves storing a reply to the caller', async () => {
    const memory = new MemoryCache();
    const { transport } = scriptedTransport(success('{"verdicts":[]}'));

    const outcome = await createClient(transport, { cache: new LlmCache(memory) }).client.send(request);

    expect(outcome).toMatchObject({ ok: true, cached: false });
    expect(memory.size).toBe(0);
  });

  it('logs a cache write that fails instead of throwing', async () => {
    const fullDisk: CacheClient = {
      read: async () => null,
      write: async () => {
        throw new Error('ENOSPC: no space left on device');
      },
    };
    const logger = vi.fn();
    const { client } = createClient(scriptedTransport().transport, { cache: new LlmCache(fullDisk), logger });

    await expect(client.storeReply(request, 'ok')).resolves.toBeUndefined();

    expect(logger).toHaveBeenCalledWith('Batch 3: could not cache reply: ENOSPC: no space left on device');
  });

  it('calls the service when the cache cannot be read', async () => {
    const unreadable: CacheClient = {
      read: async () => {
        throw new Error('EACCES: permission denied');
      },
      write: async () => {},
    };
    const { transport, send } = scriptedTransport(success('ok'));
    const { client } = createClient(transport, { cache: new LlmCache(unreadable) });

    const outcome = await client.send(request);

    expect(outcome).toEqual({ ok: true, text: 'ok', attempts: 1, cached: false });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('rejects invalid retry settings', () => {
    const { transport } = scriptedTransport();

    expect(() => new ClassificationClient(transport, { maxAttempts: 0 })).toThrow(InvalidConfigurationError);
    expect(() => new ClassificationClient(transport, { requestTimeoutMs: -1 })).toThrow(InvalidConfigurationError);
    expect(() => new ClassificationClient(transport, { baseDelayMs: 500, maxDelayMs: 100 })).toThrow(
      InvalidConfigurationError,
    );
  });
});
