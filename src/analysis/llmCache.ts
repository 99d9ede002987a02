import type { CacheClient } from '../cache/cache.js';
import { checksumFrom } from '../utils/hash.js';

/**
 * Keeps raw model replies keyed by a checksum of the request payload. Only
 * complete replies are stored, so a hit always replays a full response.
 */
export class LlmCache {
  constructor(private readonly cache: CacheClient, private readonly namespace: string = 'classification-replies') {}

  async lookup(payload: unknown): Promise<string | null> {
    const cached = await this.cache.read(this.namespace, checksumFrom(payload));
    return cached ? cached.body : null;
  }

  async store(payload: unknown, reply: string): Promise<void> {
    await this.cache.write(this.namespace, {
      checksum: checksumFrom(payload),
      body: reply,
      metadata: {
        payloadType: describePayload(payload),
        length: reply.length,
      },
    });
  }
}

function describePayload(payload: unknown): string | undefined {
  if (!payload || typeof payload !== 'object' || !('type' in payload)) {
    return undefined;
  }
  return typeof payload.type === 'string' ? payload.type : undefined;
}
