import { InvalidConfigurationError } from '../errors.js';
import type { Batch, CommentRecord } from '../types/index.js';
import { approximateTokenCount } from '../utils/text.js';

/** Rough cost of the `<comment id="…">` wrapper around each comment. */
export const PER_COMMENT_OVERHEAD_TOKENS = 16;

export interface BatchLimits {
  maxBatchSize: number;
  maxBatchTokens?: number | undefined;
}

export function estimateCommentTokens(record: CommentRecord): number {
  return approximateTokenCount(record.text) + approximateTokenCount(record.id) + PER_COMMENT_OVERHEAD_TOKENS;
}

/**
 * Splits records into consecutive batches, closing a batch when either limit
 * would be exceeded. A record that alone exceeds the token budget gets a
 * batch of its own, marked `oversized`.
 */
export function createBatches(records: readonly CommentRecord[], limits: BatchLimits): Batch[] {
  const { maxBatchSize } = limits;
  const maxBatchTokens = limits.maxBatchTokens ?? Number.POSITIVE_INFINITY;
  if (!Number.isInteger(maxBatchSize) || maxBatchSize <= 0) {
    throw new InvalidConfigurationError(`maxBatchSize must be a positive integer (got ${maxBatchSize}).`);
  }
  if (!(maxBatchTokens > 0)) {
    throw new InvalidConfigurationError(`maxBatchTokens must be positive (got ${maxBatchTokens}).`);
  }

  const batches: Batch[] = [];
  let members: CommentRecord[] = [];
  let tokens = 0;

  const flush = (oversized: boolean) => {
    if (members.length === 0) {
      return;
    }
    batches.push({ batchId: batches.length, members, estimatedTokens: tokens, oversized });
    members = [];
    tokens = 0;
  };

  for (const record of records) {
    const cost = estimateCommentTokens(record);
    if (cost > maxBatchTokens) {
      flush(false);
      members = [record];
      tokens = cost;
      flush(true);
      continue;
    }
    if (members.length >= maxBatchSize || tokens + cost > maxBatchTokens) {
      flush(false);
    }
    members.push(record);
    tokens += cost;
  }
  flush(false);

  return batches;
}
