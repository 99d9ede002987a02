import { readFileSync } from 'node:fs';
import { jot, type InferJot } from '../jot.js';
import type { ClassificationRequest } from '../types/index.js';
import { CATEGORIES, SENTIMENTS, URGENCIES } from '../types/index.js';
import { foldText, termPattern, unescapeMarkup } from '../utils/text.js';
import type { ClassificationTransport, TransportOutcome } from './classification.js';

const ruleNode = jot.object({
  name: jot.string(),
  terms: jot.array(jot.string()),
  sentiment: jot.enum(SENTIMENTS),
  urgency: jot.enum(URGENCIES),
  category: jot.enum(CATEGORIES),
  action: jot.string(),
  confidence: jot.number({ minimum: 0, maximum: 1 }),
});

const guardNode = jot.object({
  urgentTerms: jot.array(jot.string()),
  distressTerms: jot.array(jot.string()),
  praiseTerms: jot.array(jot.string()),
  urgentAction: jot.string(),
  distressAction: jot.string(),
  praiseAction: jot.string(),
});

const lexiconNode = jot.object({
  rules: jot.array(ruleNode),
  fallback: ruleNode,
  guard: guardNode,
});

export type Lexicon = InferJot<typeof lexiconNode>;
type LexiconRule = InferJot<typeof ruleNode>;

interface CompiledRule {
  rule: LexiconRule;
  patterns: RegExp[];
}

const DEFAULT_LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

const COMMENT_TAG = /<comment id="([^"]*)"(?: score="([^"]*)")?>([\s\S]*?)<\/comment>/g;

export function loadLexicon(location: URL | string = DEFAULT_LEXICON_URL): Lexicon {
  const raw: unknown = JSON.parse(readFileSync(location, 'utf8'));
  return lexiconNode.parse(raw, 'lexicon');
}

/**
 * Offline stand-in for the language model: keyword rules, first match wins.
 * It reads the tagged comments out of the rendered prompt and answers in the
 * same verdict schema the model is asked for.
 */
export class LexiconTransport implements ClassificationTransport {
  readonly provider = 'lexicon';
  readonly model = 'keyword-rules';
  private readonly rules: CompiledRule[];
  private readonly fallback: LexiconRule;

  constructor(lexicon: Lexicon = loadLexicon()) {
    this.rules = lexicon.rules.map((rule) => ({ rule, patterns: rule.terms.map(termPattern) }));
    this.fallback = lexicon.fallback;
  }

  async send(request: ClassificationRequest): Promise<TransportOutcome> {
    const verdicts = [...request.prompt.matchAll(COMMENT_TAG)].map((match) => {
      const id = unescapeMarkup(match[1] ?? '');
      const rule = this.classify(unescapeMarkup(match[3] ?? ''));
      return {
        id,
        sentiment: rule.sentiment,
        urgency: rule.urgency,
        category: rule.category,
        suggested_action: rule.action,
        confidence: rule.confidence,
      };
    });
    return { kind: 'success', text: JSON.stringify({ verdicts }) };
  }

  classify(text: string): LexiconRule {
    const folded = foldText(text);
    const match = this.rules.find(({ patterns }) => patterns.some((pattern) => pattern.test(folded)));
    return match?.rule ?? this.fallback;
  }
}
