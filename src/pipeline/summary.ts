import type { FailureReason, PipelineRun, Sentiment, Urgency } from '../types/index.js';

export interface RunSummary {
  state: PipelineRun['state'];
  total: number;
  classified: number;
  unresolved: number;
  coerced: number;
  bySentiment: Record<Sentiment, number>;
  byUrgency: Record<Urgency, number>;
  byFailureReason: Partial<Record<FailureReason, number>>;
}

export function summarizeRun(run: PipelineRun): RunSummary {
  const bySentiment: Record<Sentiment, number> = { positive: 0, neutral: 0, negative: 0, unresolved: 0 };
  const byUrgency: Record<Urgency, number> = { low: 0, medium: 0, high: 0, unresolved: 0 };
  const byFailureReason: Partial<Record<FailureReason, number>> = {};

  for (const result of run.results.values()) {
    bySentiment[result.verdict.sentiment] += 1;
    byUrgency[result.verdict.urgency] += 1;
    if (result.failureReason) {
      byFailureReason[result.failureReason] = (byFailureReason[result.failureReason] ?? 0) + 1;
    }
  }

  return {
    state: run.state,
    total: run.totalComments,
    classified: run.totalComments - run.commentsUnresolved,
    unresolved: run.commentsUnresolved,
    coerced: run.commentsCoerced,
    bySentiment,
    byUrgency,
    byFailureReason,
  };
}

export function formatRunSummary(run: PipelineRun): string[] {
  const summary = summarizeRun(run);
  const lines = [
    `State: ${summary.state}${run.cancelled ? ' (cancelled)' : ''}`,
    `Comments: ${summary.total} total, ${summary.classified} classified, ${summary.unresolved} unresolved`,
    `Batches: ${run.batchesAttempted} attempted, ${run.batchesFailed} failed, ${run.batchesSkipped} skipped`,
    `Sentiment: positive ${summary.bySentiment.positive}, neutral ${summary.bySentiment.neutral}, negative ${summary.bySentiment.negative}`,
    `Urgency: high ${summary.byUrgency.high}, medium ${summary.byUrgency.medium}, low ${summary.byUrgency.low}`,
  ];
  if (summary.coerced > 0) {
    lines.push(`Out-of-vocabulary values coerced to unresolved: ${summary.coerced} comments`);
  }
  const reasons = Object.entries(summary.byFailureReason);
  if (reasons.length > 0) {
    lines.push(`Unresolved by reason: ${reasons.map(([reason, count]) => `${reason} ${count}`).join(', ')}`);
  }
  return lines;
}
