import type { ParsedBatch } from '../analysis/responseParser.js';
import type {
  Batch,
  ClassificationResult,
  ClassificationVerdict,
  CommentRecord,
  FailureReason,
  GuardLexicon,
} from '../types/index.js';
import { unresolvedVerdict } from '../types/index.js';
import { findTerm } from '../utils/text.js';

export type BatchOutcome =
  | { kind: 'parsed'; parsed: ParsedBatch }
  | { kind: 'failed'; reason: FailureReason; message: string };

export interface ReconcileOptions {
  /** Correct verdicts that contradict the customer's star rating. */
  applyScoreGuard?: boolean;
  guardLexicon?: GuardLexicon | undefined;
}

/** Rating rules only, no keyword triggers. */
export const EMPTY_GUARD_LEXICON: GuardLexicon = {
  urgentTerms: [],
  distressTerms: [],
  praiseTerms: [],
  urgentAction: '',
  distressAction: '',
  praiseAction: '',
};

/** One result per batch member, in member order. Pure. */
export function reconcileBatch(
  batch: Batch,
  outcome: BatchOutcome,
  options: ReconcileOptions = {},
): ClassificationResult[] {
  return batch.members.map((member) => {
    if (outcome.kind === 'failed') {
      return unresolved(member, outcome.reason, outcome.message);
    }

    const { parsed } = outcome;
    if (parsed.failure) {
      return unresolved(member, 'parse-failure', parsed.failure.message);
    }

    const verdict = parsed.verdicts.get(member.id);
    if (!verdict) {
      return unresolved(member, 'missing-from-response', 'The reply had no verdict for this comment.');
    }

    const finalVerdict = options.applyScoreGuard
      ? applyScoreGuard(verdict, member, options.guardLexicon)
      : copyVerdict(verdict);
    return {
      commentId: member.id,
      originRow: member.originRow,
      status: 'classified',
      verdict: finalVerdict,
    } satisfies ClassificationResult;
  });
}

function unresolved(member: CommentRecord, reason: FailureReason, detail: string): ClassificationResult {
  return {
    commentId: member.id,
    originRow: member.originRow,
    status: 'unresolved',
    verdict: unresolvedVerdict(member.id),
    failureReason: reason,
    detail,
  };
}

function copyVerdict(verdict: ClassificationVerdict): ClassificationVerdict {
  return { ...verdict, coercedFields: [...verdict.coercedFields], adjustments: [...verdict.adjustments] };
}

/**
 * Star ratings are ground truth the model sometimes contradicts: ratings of
 * 1-2 are negative, 5 is positive, and a neutral verdict leans toward the
 * rating. A negative verdict is never low urgency, and becomes high urgency
 * when the text names a lost, late or broken order. Praise on a 4-5 star
 * review is positive.
 */
export function applyScoreGuard(
  verdict: ClassificationVerdict,
  member: CommentRecord,
  lexicon: GuardLexicon = EMPTY_GUARD_LEXICON,
): ClassificationVerdict {
  const next = copyVerdict(verdict);
  const { score } = member;
  if (score === undefined || !Number.isFinite(score) || next.sentiment === 'unresolved') {
    return next;
  }

  const rating = Math.trunc(score);
  if (next.sentiment === 'neutral') {
    if (rating <= 3) {
      next.sentiment = 'negative';
      next.adjustments.push(`neutral->negative (score ${rating})`);
      if (next.category !== 'quality') {
        next.adjustments.push(`category ${next.category}->quality (score ${rating})`);
        next.category = 'quality';
      }
    } else {
      next.sentiment = 'positive';
      next.adjustments.push(`neutral->positive (score ${rating})`);
    }
  }

  if (rating <= 2 && next.sentiment !== 'negative') {
    next.adjustments.push(`${next.sentiment}->negative (score ${rating})`);
    next.sentiment = 'negative';
  } else if (rating === 5 && next.sentiment !== 'positive') {
    next.adjustments.push(`${next.sentiment}->positive (score ${rating})`);
    next.sentiment = 'positive';
  }

  if (next.sentiment === 'negative') {
    if (next.urgency === 'low') {
      next.urgency = 'medium';
      next.adjustments.push('urgency low->medium (negative)');
    }

    const distress = findTerm(member.text, lexicon.distressTerms);
    const trigger = distress ?? findTerm(member.text, lexicon.urgentTerms);
    if (trigger !== undefined) {
      if (next.urgency !== 'high') {
        next.adjustments.push(`urgency ${next.urgency}->high (keyword "${trigger}")`);
        next.urgency = 'high';
      }
      setAction(next, distress !== undefined ? lexicon.distressAction : lexicon.urgentAction);
    }
  }

  const praise = rating >= 4 ? findTerm(member.text, lexicon.praiseTerms) : undefined;
  if (praise !== undefined) {
    if (next.sentiment !== 'positive') {
      next.adjustments.push(`${next.sentiment}->positive (praise "${praise}")`);
      next.sentiment = 'positive';
    }
    if (next.category === 'unresolved') {
      next.adjustments.push('category unresolved->other (praise)');
      next.category = 'other';
    }
    setAction(next, lexicon.praiseAction);
  }

  return next;
}

function setAction(verdict: ClassificationVerdict, action: string): void {
  if (action && verdict.suggestedAction !== action) {
    verdict.adjustments.push(`action -> ${action}`);
    verdict.suggestedAction = action;
  }
}
