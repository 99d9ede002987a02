import { compileJotSchema, jot, type InferJot } from '../jot.js';
import { CATEGORIES, SENTIMENTS, URGENCIES } from '../types/index.js';

const verdictNode = jot.object({
  id: jot.string({ description: 'Identifier of the comment, copied exactly from its <comment id="..."> tag.' }),
  sentiment: jot.enum(SENTIMENTS, { description: 'Overall sentiment of the customer.' }),
  urgency: jot.enum(URGENCIES, { description: 'How quickly the store should act on the comment.' }),
  category: jot.enum(CATEGORIES, { description: 'Main subject of the comment.' }),
  suggested_action: jot.string({ description: 'Short remediation action, at most five words.' }),
  confidence: jot.number({ description: 'Confidence in the verdict between 0 and 1.', minimum: 0, maximum: 1 }),
});

export const verdictListNode = jot.object({
  verdicts: jot.array(verdictNode, { description: 'Exactly one verdict per supplied comment id.' }),
});

export type VerdictListPayload = InferJot<typeof verdictListNode>;

export const verdictListFormat = compileJotSchema('comment_verdicts', verdictListNode);
