import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

interface EnvelopeFile {
  storedAt: string;
  metadata?: Record<string, unknown>;
  body: string;
}

export interface FileCacheOptions {
  baseDir?: string;
  logger?: (message: string) => void;
}

/**
 * Stores each entry as one JSON envelope at `<baseDir>/<namespace>/<checksum>.json`.
 * A corrupt envelope reads as a miss and is overwritten on the next write.
 */
export class FileCache implements CacheClient {
  private readonly baseDir: string;
  private readonly logger: ((message: string) => void) | undefined;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
    this.logger = options.logger;
  }

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    const filePath = this.entryPath(namespace, checksum);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const envelope = parseEnvelope(raw);
    if (!envelope) {
      this.logger?.(`Ignoring unreadable cache entry ${filePath}`);
      return null;
    }

    return {
      checksum,
      body: envelope.body,
      storedAt: envelope.storedAt,
      ...(envelope.metadata ? { metadata: envelope.metadata } : {}),
    };
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const filePath = this.entryPath(namespace, entry.checksum);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const envelope: EnvelopeFile = {
      storedAt: new Date().toISOString(),
      body: entry.body,
      ...(entry.metadata ? { metadata: entry.metadata } : {}),
    };

    // Readers never observe a partial envelope.
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(envelope, null, 2), 'utf8');
    await fs.rename(tempPath, filePath);
  }

  private entryPath(namespace: string, checksum: string): string {
    const safeNamespace = namespace.replace(/[^a-z0-9_-]+/gi, '-');
    return path.join(this.baseDir, safeNamespace, `${checksum}.json`);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function parseEnvelope(raw: string): EnvelopeFile | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const record = new Map<string, unknown>(Object.entries(value));
  const body = record.get('body');
  const storedAt = record.get('storedAt');
  if (typeof body !== 'string' || typeof storedAt !== 'string') {
    return null;
  }
  const metadata = record.get('metadata');
  return {
    body,
    storedAt,
    ...(isPlainRecord(metadata) ? { metadata } : {}),
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
