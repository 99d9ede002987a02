export const SENTIMENTS = ['positive', 'neutral', 'negative'] as const;
export const URGENCIES = ['low', 'medium', 'high'] as const;
export const CATEGORIES = ['logistics', 'quality', 'service', 'price', 'other'] as const;

export type Sentiment = (typeof SENTIMENTS)[number] | 'unresolved';

export type Urgency = (typeof URGENCIES)[number] | 'unresolved';

export type Category = (typeof CATEGORIES)[number] | 'unresolved';

export type VerdictField = 'sentiment' | 'urgency' | 'category';

export interface CommentRecord {
  id: string;
  text: string;
  /** 1-based data row in the source table. */
  originRow: number;
  /** Review score (1-5) when the source table has one. */
  score?: number | undefined;
}

export interface Batch {
  batchId: number;
  members: CommentRecord[];
  estimatedTokens: number;
  oversized: boolean;
}

export interface ClassificationRequest {
  batchId: number;
  instructions: string;
  prompt: string;
  commentIds: string[];
}

export interface ClassificationVerdict {
  commentId: string;
  sentiment: Sentiment;
  urgency: Urgency;
  category: Category;
  suggestedAction: string;
  confidence?: number | undefined;
  coercedFields: VerdictField[];
  adjustments: string[];
}

export type ClientFailureReason = 'timeout' | 'rate-limited' | 'transient-error' | 'fatal-client-error' | 'cancelled';

export type FailureReason = ClientFailureReason | 'parse-failure' | 'missing-from-response';

export type ResultStatus = 'classified' | 'unresolved';

export interface ClassificationResult {
  commentId: string;
  originRow: number;
  status: ResultStatus;
  verdict: ClassificationVerdict;
  failureReason?: FailureReason | undefined;
  detail?: string | undefined;
}

export type RunState = 'pending' | 'running' | 'completed' | 'completed-with-failures';

export interface BatchFailure {
  batchId: number;
  reason: FailureReason;
  message: string;
  commentIds: string[];
}

export interface PipelineRun {
  state: RunState;
  totalComments: number;
  batchesAttempted: number;
  batchesFailed: number;
  batchesSkipped: number;
  commentsUnresolved: number;
  commentsCoerced: number;
  cancelled: boolean;
  results: Map<string, ClassificationResult>;
  failures: BatchFailure[];
}

/** Keyword lists the score guard reads from the comment text. */
export interface GuardLexicon {
  /** Negative comments mentioning one of these are high urgency. */
  urgentTerms: string[];
  /** Like `urgentTerms`, but the customer needs reassurance first. */
  distressTerms: string[];
  /** Praise that, with a rating of 4 or 5, makes the comment positive. */
  praiseTerms: string[];
  urgentAction: string;
  distressAction: string;
  praiseAction: string;
}

export function unresolvedVerdict(commentId: string): ClassificationVerdict {
  return {
    commentId,
    sentiment: 'unresolved',
    urgency: 'unresolved',
    category: 'unresolved',
    suggestedAction: '',
    coercedFields: [],
    adjustments: [],
  };
}
