import type { Batch, ClassificationRequest, CommentRecord } from '../types/index.js';
import { CATEGORIES, SENTIMENTS, URGENCIES } from '../types/index.js';
import { collapseWhitespace, escapeMarkup } from '../utils/text.js';

const DEFAULT_DOMAIN_DESCRIPTION = 'an online marketplace selling physical goods';

export interface PromptOptions {
  domainDescription?: string;
}

export function buildClassificationRequest(batch: Batch, options: PromptOptions = {}): ClassificationRequest {
  const domain = options.domainDescription?.trim() || DEFAULT_DOMAIN_DESCRIPTION;
  const blocks = batch.members.map((member) => renderComment(member)).join('\n');
  const prompt = `Classify each of the ${batch.members.length} customer comments below. Return one verdict per comment id, and no verdicts for ids that are not listed.\n\n${blocks}`;

  return {
    batchId: batch.batchId,
    instructions: buildInstructions(domain),
    prompt,
    commentIds: batch.members.map((member) => member.id),
  };
}

export function renderComment(record: CommentRecord): string {
  const scoreAttr = record.score !== undefined ? ` score="${record.score}"` : '';
  return `<comment id="${escapeMarkup(record.id)}"${scoreAttr}>${escapeMarkup(collapseWhitespace(record.text))}</comment>`;
}

function buildInstructions(domain: string): string {
  return [
    `You triage customer reviews left on ${domain}. Reviews may be written in any language; answer in English.`,
    'Return JSON only, shaped as {"verdicts":[{"id","sentiment","urgency","category","suggested_action","confidence"}]}.',
    `- sentiment: one of ${SENTIMENTS.join(', ')}`,
    `- urgency: one of ${URGENCIES.join(', ')}`,
    `- category: one of ${CATEGORIES.join(', ')}`,
    '- suggested_action: what support should do next, at most five words',
    '- confidence: number between 0 and 1',
    'Rules:',
    '1. A contrast ("but", "however") after praise makes the comment negative ("good, but it arrived late" is negative).',
    '2. Goods that never arrived, got lost, or came broken are high urgency.',
    '3. "Do not recommend" is negative.',
    '4. Plain praise is positive with low urgency; thank the customer.',
    '5. A score attribute is the 1-5 star rating the customer gave; use it as context.',
    'Suggested actions by category: logistics -> "Check tracking", quality -> "Authorize exchange", service -> "Escalate to support", price -> "Offer discount coupon", praise -> "Thank and retain".',
  ].join('\n');
}
