import pLimit from 'p-limit';
import { buildClassificationRequest, type PromptOptions } from '../analysis/prompt.js';
import { parseClassificationResponse } from '../analysis/responseParser.js';
import type { ClassificationClient } from '../clients/classification.js';
import { DEFAULT_BATCH_SETTINGS, validateBatchSettings, type BatchSettings } from '../config.js';
import { describeError, InvalidInputError } from '../errors.js';
import type {
  Batch,
  BatchFailure,
  ClassificationResult,
  CommentRecord,
  GuardLexicon,
  PipelineRun,
  RunState,
} from '../types/index.js';
import { createBatches } from './batcher.js';
import { reconcileBatch, type BatchOutcome } from './reconciler.js';

export interface ClassificationPipelineOptions {
  client: ClassificationClient;
  settings?: Partial<BatchSettings>;
  promptOptions?: PromptOptions;
  applyScoreGuard?: boolean;
  /** Keyword triggers for the score guard; without it only the rating rules apply. */
  guardLexicon?: GuardLexicon | undefined;
  logger?: (message: string) => void;
}

export interface BatchReport {
  batchId: number;
  size: number;
  attempted: boolean;
  failure?: BatchFailure | undefined;
  results: ClassificationResult[];
}

export interface RunOptions {
  /** Stops new batches from starting; batches already in flight finish. */
  signal?: AbortSignal;
  onStateChange?: (state: RunState) => void;
  onBatchComplete?: (report: BatchReport, completed: number, total: number) => void;
}

export class ClassificationPipeline {
  private readonly client: ClassificationClient;
  private readonly settings: BatchSettings;
  private readonly promptOptions: PromptOptions;
  private readonly applyScoreGuard: boolean;
  private readonly guardLexicon: GuardLexicon | undefined;
  private readonly logger: ((message: string) => void) | undefined;

  constructor(options: ClassificationPipelineOptions) {
    this.client = options.client;
    this.settings = { ...DEFAULT_BATCH_SETTINGS, ...options.settings };
    validateBatchSettings(this.settings);
    this.promptOptions = options.promptOptions ?? {};
    this.applyScoreGuard = options.applyScoreGuard ?? true;
    this.guardLexicon = options.guardLexicon;
    this.logger = options.logger;
  }

  async run(records: readonly CommentRecord[], options: RunOptions = {}): Promise<PipelineRun> {
    validateRecords(records);
    options.onStateChange?.('pending');

    const batches = createBatches(records, this.settings);
    options.onStateChange?.('running');
    this.logger?.(
      `Classifying ${records.length} comments in ${batches.length} batches with ${this.client.model} (concurrency ${this.settings.maxConcurrency})...`,
    );

    const limit = pLimit(this.settings.maxConcurrency);
    let completed = 0;
    const reports = await Promise.all(
      batches.map((batch) =>
        limit(async () => {
          const report = await this.processBatch(batch, options.signal);
          completed += 1;
          options.onBatchComplete?.(report, completed, batches.length);
          return report;
        }),
      ),
    );

    const run = assembleRun(records, reports, options.signal?.aborted ?? false);
    options.onStateChange?.(run.state);
    this.logger?.(
      `Run ${run.state}: ${run.totalComments - run.commentsUnresolved}/${run.totalComments} classified, ${run.batchesFailed} batches failed, ${run.batchesSkipped} skipped.`,
    );
    return run;
  }

  private async processBatch(batch: Batch, signal: AbortSignal | undefined): Promise<BatchReport> {
    if (signal?.aborted) {
      return this.report(batch, false, { kind: 'failed', reason: 'cancelled', message: 'Run cancelled before the batch started.' });
    }

    let outcome: BatchOutcome;
    try {
      const request = buildClassificationRequest(batch, this.promptOptions);
      const reply = await this.client.send(request, { signal });
      if (!reply.ok) {
        outcome = { kind: 'failed', reason: reply.reason, message: reply.message };
      } else {
        const parsed = parseClassificationResponse(reply.text, request.commentIds, {
          logger: (message) => this.logger?.(`Batch ${batch.batchId}: ${message}`),
        });
        outcome = { kind: 'parsed', parsed };
        if (!reply.cached && !parsed.failure && parsed.missingIds.length === 0) {
          await this.client.storeReply(request, reply.text);
        }
      }
    } catch (error) {
      this.logger?.(`Batch ${batch.batchId}: unexpected error: ${describeError(error)}`);
      outcome = { kind: 'failed', reason: 'transient-error', message: describeError(error) };
    }

    return this.report(batch, true, outcome);
  }

  private report(batch: Batch, attempted: boolean, outcome: BatchOutcome): BatchReport {
    const results = reconcileBatch(batch, outcome, {
      applyScoreGuard: this.applyScoreGuard,
      guardLexicon: this.guardLexicon,
    });
    const commentIds = batch.members.map((member) => member.id);
    let failure: BatchFailure | undefined;
    if (outcome.kind === 'failed') {
      failure = { batchId: batch.batchId, reason: outcome.reason, message: outcome.message, commentIds };
    } else if (outcome.parsed.failure) {
      failure = { batchId: batch.batchId, reason: 'parse-failure', message: outcome.parsed.failure.message, commentIds };
    } else if (outcome.parsed.missingIds.length > 0) {
      this.logger?.(`Batch ${batch.batchId}: reply omitted ${outcome.parsed.missingIds.length} comment(s).`);
    }

    return { batchId: batch.batchId, size: batch.members.length, attempted, failure, results };
  }
}

function validateRecords(records: readonly CommentRecord[]): void {
  const seen = new Set<string>();
  for (const record of records) {
    if (!record.id) {
      throw new InvalidInputError(`Comment at row ${record.originRow} has an empty id.`);
    }
    if (record.id !== record.id.trim()) {
      throw new InvalidInputError(`Comment id "${record.id}" has leading or trailing whitespace.`);
    }
    if (seen.has(record.id)) {
      throw new InvalidInputError(`Duplicate comment id "${record.id}".`);
    }
    if (!record.text.trim()) {
      throw new InvalidInputError(`Comment "${record.id}" has empty text.`);
    }
    seen.add(record.id);
  }
}

/** Rebuilds the result map in submission order, whatever order batches finished in. */
function assembleRun(records: readonly CommentRecord[], reports: BatchReport[], cancelled: boolean): PipelineRun {
  const byId = new Map<string, ClassificationResult>();
  for (const report of reports) {
    for (const result of report.results) {
      byId.set(result.commentId, result);
    }
  }

  const results = new Map<string, ClassificationResult>();
  let commentsUnresolved = 0;
  let commentsCoerced = 0;
  for (const record of records) {
    const result = byId.get(record.id);
    if (!result) {
      throw new Error(`Internal error: no result for comment "${record.id}".`);
    }
    results.set(record.id, result);
    if (result.status === 'unresolved') {
      commentsUnresolved += 1;
    } else if (result.verdict.coercedFields.length > 0) {
      commentsCoerced += 1;
    }
  }

  const failures = reports.flatMap((report) => (report.failure ? [report.failure] : []));
  const batchesAttempted = reports.filter((report) => report.attempted).length;
  const batchesFailed = reports.filter((report) => report.attempted && report.failure).length;
  const batchesSkipped = reports.length - batchesAttempted;
  const clean = batchesFailed === 0 && commentsUnresolved === 0;

  return {
    state: clean ? 'completed' : 'completed-with-failures',
    totalComments: records.length,
    batchesAttempted,
    batchesFailed,
    batchesSkipped,
    commentsUnresolved,
    commentsCoerced,
    cancelled: cancelled && (batchesSkipped > 0 || failures.some((failure) => failure.reason === 'cancelled')),
    results,
    failures,
  };
}
