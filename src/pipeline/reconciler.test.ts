import { describe, expect, it } from 'vitest';
import { parseClassificationResponse } from '../analysis/responseParser.js';
import type { Batch, ClassificationVerdict, CommentRecord, GuardLexicon } from '../types/index.js';
import { applyScoreGuard, reconcileBatch, type BatchOutcome } from './reconciler.js';

const members: CommentRecord[] = [
  { id: 'a', text: 'great service', originRow: 1 },
  { id: 'b', text: 'item broke, refund now', originRow: 2 },
];

const batch: Batch = { batchId: 0, members, estimatedTokens: 0, oversized: false };

function parsedOutcome(reply: unknown): BatchOutcome {
  return {
    kind: 'parsed',
    parsed: parseClassificationResponse(JSON.stringify(reply), ['a', 'b']),
  };
}

function entry(id: string, sentiment: string, urgency: string) {
  return { id, sentiment, urgency, category: 'other', suggested_action: 'Act', confidence: 0.5 };
}

const guardLexicon: GuardLexicon = {
  urgentTerms: ['atraso', 'never arrived', 'broke'],
  distressTerms: ['disappointed'],
  praiseTerms: ['excelente'],
  urgentAction: 'Resolve now',
  distressAction: 'Reassure',
  praiseAction: 'Thank',
};

function rated(score: number | undefined, text = 'fine'): CommentRecord {
  return { id: 'a', text, originRow: 1, score };
}

function verdict(overrides: Partial<ClassificationVerdict>): ClassificationVerdict {
  return {
    commentId: 'a',
    sentiment: 'neutral',
    urgency: 'low',
    category: 'other',
    suggestedAction: 'Act',
    confidence: 0.5,
    coercedFields: [],
    adjustments: [],
    ...overrides,
  };
}

describe('reconcileBatch', () => {
  it('yields one classified result per member, in member order', () => {
    const outcome = parsedOutcome({ verdicts: [entry('b', 'negative', 'high'), entry('a', 'positive', 'low')] });

    const results = reconcileBatch(batch, outcome);

    expect(results.map((result) => [result.commentId, result.originRow, result.status])).toEqual([
      ['a', 1, 'classified'],
      ['b', 2, 'classified'],
    ]);
    expect(results[0]?.verdict.sentiment).toBe('positive');
    expect(results[1]?.verdict.urgency).toBe('high');
  });

  it('marks members without a verdict as missing from the response', () => {
    const results = reconcileBatch(batch, parsedOutcome({ verdicts: [entry('a', 'positive', 'low')] }));

    expect(results[1]).toEqual({
      commentId: 'b',
      originRow: 2,
      status: 'unresolved',
      verdict: {
        commentId: 'b',
        sentiment: 'unresolved',
        urgency: 'unresolved',
        category: 'unresolved',
        suggestedAction: '',
        coercedFields: [],
        adjustments: [],
      },
      failureReason: 'missing-from-response',
      detail: 'The reply had no verdict for this comment.',
    });
  });

  it('marks every member with the reason of a failed batch', () => {
    const results = reconcileBatch(batch, { kind: 'failed', reason: 'timeout', message: 'No reply within 5ms.' });

    expect(results.map((result) => [result.status, result.failureReason, result.detail])).toEqual([
      ['unresolved', 'timeout', 'No reply within 5ms.'],
      ['unresolved', 'timeout', 'No reply within 5ms.'],
    ]);
  });

  it('marks every member as a parse failure when the reply could not be decoded', () => {
    const outcome: BatchOutcome = { kind: 'parsed', parsed: parseClassificationResponse('no idea', ['a', 'b']) };

    const results = reconcileBatch(batch, outcome);

    expect(results.map((result) => result.failureReason)).toEqual(['parse-failure', 'parse-failure']);
  });

  it('gives the same results when applied twice and leaves the parsed verdicts untouched', () => {
    const outcome = parsedOutcome({ verdicts: [entry('a', 'neutral', 'low'), entry('b', 'negative', 'low')] });
    const withScores: Batch = {
      ...batch,
      members: [
        { id: 'a', text: 'fine', originRow: 1, score: 1 },
        { id: 'b', text: 'meh', originRow: 2, score: 2 },
      ],
    };

    const first = reconcileBatch(withScores, outcome, { applyScoreGuard: true });
    const second = reconcileBatch(withScores, outcome, { applyScoreGuard: true });

    expect(second).toEqual(first);
    expect(outcome.kind === 'parsed' ? outcome.parsed.verdicts.get('a')?.adjustments : undefined).toEqual([]);
  });

  it('passes the guard lexicon to the score guard', () => {
    const outcome = parsedOutcome({ verdicts: [entry('a', 'positive', 'low'), entry('b', 'negative', 'low')] });
    const withScores: Batch = {
      ...batch,
      members: [
        { id: 'a', text: 'great service', originRow: 1, score: 5 },
        { id: 'b', text: 'item broke, refund now', originRow: 2, score: 1 },
      ],
    };

    const results = reconcileBatch(withScores, outcome, { applyScoreGuard: true, guardLexicon });

    expect(results[1]?.verdict).toMatchObject({ sentiment: 'negative', urgency: 'high', suggestedAction: 'Resolve now' });
    expect(results[0]?.verdict.adjustments).toEqual([]);
  });
});

describe('applyScoreGuard', () => {
  it('leans a neutral verdict toward a low rating and files it under quality', () => {
    const guarded = applyScoreGuard(verdict({ sentiment: 'neutral', urgency: 'low' }), rated(2));

    expect(guarded.sentiment).toBe('negative');
    expect(guarded.urgency).toBe('medium');
    expect(guarded.category).toBe('quality');
    expect(guarded.adjustments).toEqual([
      'neutral->negative (score 2)',
      'category other->quality (score 2)',
      'urgency low->medium (negative)',
    ]);
  });

  it('leans a neutral verdict toward a high rating', () => {
    const guarded = applyScoreGuard(verdict({ sentiment: 'neutral' }), rated(4));

    expect(guarded.sentiment).toBe('positive');
    expect(guarded.category).toBe('other');
    expect(guarded.adjustments).toEqual(['neutral->positive (score 4)']);
  });

  it('treats a neutral verdict on a 3-star review as negative', () => {
    const guarded = applyScoreGuard(verdict({ sentiment: 'neutral', urgency: 'medium' }), rated(3));

    expect(guarded.sentiment).toBe('negative');
    expect(guarded.adjustments).toEqual(['neutral->negative (score 3)', 'category other->quality (score 3)']);
  });

  it('keeps the category of a neutral verdict already filed under quality', () => {
    const guarded = applyScoreGuard(verdict({ sentiment: 'neutral', urgency: 'medium', category: 'quality' }), rated(3));

    expect(guarded.adjustments).toEqual(['neutral->negative (score 3)']);
  });

  it('overrides a positive verdict on a 1-star review', () => {
    const guarded = applyScoreGuard(verdict({ sentiment: 'positive', urgency: 'low' }), rated(1));

    expect(guarded.sentiment).toBe('negative');
    expect(guarded.category).toBe('other');
    expect(guarded.adjustments).toEqual(['positive->negative (score 1)', 'urgency low->medium (negative)']);
  });

  it('overrides a negative verdict on a 5-star review and keeps its urgency', () => {
    const guarded = applyScoreGuard(verdict({ sentiment: 'negative', urgency: 'high' }), rated(5));

    expect(guarded.sentiment).toBe('positive');
    expect(guarded.urgency).toBe('high');
    expect(guarded.adjustments).toEqual(['negative->positive (score 5)']);
  });

  it('raises a negative low-urgency verdict without a rating conflict', () => {
    const guarded = applyScoreGuard(verdict({ sentiment: 'negative', urgency: 'low' }), rated(3));

    expect(guarded.urgency).toBe('medium');
    expect(guarded.adjustments).toEqual(['urgency low->medium (negative)']);
  });

  it('makes a negative verdict urgent when the text names a trigger word', () => {
    const guarded = applyScoreGuard(
      verdict({ sentiment: 'negative', urgency: 'medium' }),
      rated(2, 'Pedido com ATRASO de duas semanas'),
      guardLexicon,
    );

    expect(guarded.urgency).toBe('high');
    expect(guarded.suggestedAction).toBe('Resolve now');
    expect(guarded.adjustments).toEqual(['urgency medium->high (keyword "atraso")', 'action -> Resolve now']);
  });

  it('prefers the distress action when the text sounds upset', () => {
    const guarded = applyScoreGuard(
      verdict({ sentiment: 'negative', urgency: 'high' }),
      rated(1, 'I am disappointed, it never arrived'),
      guardLexicon,
    );

    expect(guarded.suggestedAction).toBe('Reassure');
    expect(guarded.adjustments).toEqual(['action -> Reassure']);
  });

  it('ignores trigger words inside longer words', () => {
    const guarded = applyScoreGuard(
      verdict({ sentiment: 'negative', urgency: 'medium' }),
      rated(2, 'atrasado mas chegou'),
      guardLexicon,
    );

    expect(guarded.urgency).toBe('medium');
    expect(guarded.adjustments).toEqual([]);
  });

  it('turns praise on a 4-star review positive', () => {
    const guarded = applyScoreGuard(
      verdict({ sentiment: 'negative', urgency: 'low' }),
      rated(4, 'Produto excelente!'),
      guardLexicon,
    );

    expect(guarded).toMatchObject({ sentiment: 'positive', urgency: 'medium', suggestedAction: 'Thank' });
    expect(guarded.adjustments).toEqual([
      'urgency low->medium (negative)',
      'negative->positive (praise "excelente")',
      'action -> Thank',
    ]);
  });

  it('files praise with an unresolved category under other', () => {
    const guarded = applyScoreGuard(
      verdict({ sentiment: 'positive', category: 'unresolved', suggestedAction: '' }),
      rated(5, 'Excelente, chegou antes do prazo'),
      guardLexicon,
    );

    expect(guarded.category).toBe('other');
    expect(guarded.adjustments).toEqual(['category unresolved->other (praise)', 'action -> Thank']);
  });

  it('ignores praise words on a rating below 4', () => {
    const guarded = applyScoreGuard(verdict({ sentiment: 'positive' }), rated(3, 'excelente'), guardLexicon);

    expect(guarded.adjustments).toEqual([]);
    expect(guarded.suggestedAction).toBe('Act');
  });

  it('leaves verdicts alone without a score or with an unresolved sentiment', () => {
    const original = verdict({ sentiment: 'positive' });

    expect(applyScoreGuard(original, rated(undefined, 'excelente'), guardLexicon)).toEqual(original);
    expect(applyScoreGuard(verdict({ sentiment: 'unresolved' }), rated(1)).sentiment).toBe('unresolved');
  });

  it('does not mutate its input', () => {
    const original = verdict({ sentiment: 'neutral' });

    applyScoreGuard(original, rated(1, 'atraso'), guardLexicon);

    expect(original.sentiment).toBe('neutral');
    expect(original.category).toBe('other');
    expect(original.adjustments).toEqual([]);
  });
});
