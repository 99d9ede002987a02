import { createHash } from 'node:crypto';

/** JSON with object keys sorted, so equal payloads hash equally. */
export function canonicalize(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([key, val]) => `${JSON.stringify(key)}:${canonicalize(val)}`).join(',')}}`;
}

export function checksumFrom(value: unknown, algorithm: string = 'sha256'): string {
  return createHash(algorithm).update(canonicalize(value)).digest('hex');
}
