import { describeError, ParseFailure } from '../errors.js';
import type { Category, ClassificationVerdict, Sentiment, Urgency, VerdictField } from '../types/index.js';
import { CATEGORIES, SENTIMENTS, URGENCIES } from '../types/index.js';
import { truncate, unescapeMarkup } from '../utils/text.js';
import { verdictListNode } from './schemas.js';

export type DecodeMode = 'structured' | 'lenient' | 'lines' | 'failed';

export interface ParsedBatch {
  verdicts: Map<string, ClassificationVerdict>;
  missingIds: string[];
  unexpectedIds: string[];
  mode: DecodeMode;
  failure?: ParseFailure | undefined;
}

export interface ParseOptions {
  logger?: (message: string) => void;
}

type RawEntry = Record<string, unknown>;

const SENTIMENT_SYNONYMS: Record<string, Sentiment> = {
  pos: 'positive',
  good: 'positive',
  neg: 'negative',
  bad: 'negative',
  neutro: 'neutral',
  positivo: 'positive',
  negativo: 'negative',
  mixed: 'neutral',
};

const URGENCY_SYNONYMS: Record<string, Urgency> = {
  urgent: 'high',
  critical: 'high',
  alta: 'high',
  med: 'medium',
  moderate: 'medium',
  media: 'medium',
  none: 'low',
  baixa: 'low',
};

const CATEGORY_SYNONYMS: Record<string, Category> = {
  shipping: 'logistics',
  delivery: 'logistics',
  product: 'quality',
  support: 'service',
  'customer service': 'service',
  pricing: 'price',
  misc: 'other',
  miscellaneous: 'other',
};

const ENTRY_KEYS = ['verdicts', 'results', 'classifications'] as const;

const ID_KEYS = ['id', 'comment_id', 'commentId'] as const;
const ACTION_KEYS = ['suggested_action', 'suggestedAction', 'action'] as const;

/**
 * Decodes a model reply into verdicts for the expected ids. Never throws: an
 * undecodable reply comes back with every id missing and `failure` set.
 */
export function parseClassificationResponse(
  raw: string,
  expectedIds: readonly string[],
  options: ParseOptions = {},
): ParsedBatch {
  const decoded = decodeEntries(raw, options.logger);
  if (!decoded) {
    const failure = new ParseFailure(`Could not decode classification reply: ${truncate(raw.trim(), 120)}`);
    options.logger?.(failure.message);
    return {
      verdicts: new Map(),
      missingIds: [...expectedIds],
      unexpectedIds: [],
      mode: 'failed',
      failure,
    };
  }

  const expected = new Set(expectedIds);
  const verdicts = new Map<string, ClassificationVerdict>();
  const unexpected = new Set<string>();

  for (const entry of decoded.entries) {
    const rawId = readId(entry);
    if (rawId === undefined) {
      continue;
    }
    const id = matchExpectedId(rawId, expected);
    if (id === undefined) {
      unexpected.add(rawId);
      continue;
    }
    if (verdicts.has(id)) {
      continue;
    }
    verdicts.set(id, toVerdict(id, entry));
  }

  const unexpectedIds = [...unexpected];
  if (unexpectedIds.length > 0) {
    options.logger?.(`Ignoring verdicts for unknown comment ids: ${unexpectedIds.join(', ')}`);
  }

  return {
    verdicts,
    missingIds: expectedIds.filter((id) => !verdicts.has(id)),
    unexpectedIds,
    mode: decoded.mode,
  };
}

export function normalizeSentiment(value: unknown): Sentiment | undefined {
  return normalizeEnum(value, SENTIMENTS, SENTIMENT_SYNONYMS);
}

export function normalizeUrgency(value: unknown): Urgency | undefined {
  return normalizeEnum(value, URGENCIES, URGENCY_SYNONYMS);
}

export function normalizeCategory(value: unknown): Category | undefined {
  return normalizeEnum(value, CATEGORIES, CATEGORY_SYNONYMS);
}

function normalizeEnum<T extends string>(
  value: unknown,
  allowed: readonly T[],
  synonyms: Record<string, T>,
): T | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const key = value.trim().toLowerCase();
  return allowed.find((candidate) => candidate === key) ?? (Object.hasOwn(synonyms, key) ? synonyms[key] : undefined);
}

function decodeEntries(
  raw: string,
  logger: ((message: string) => void) | undefined,
): { entries: RawEntry[]; mode: DecodeMode } | null {
  const text = stripFences(raw);
  const json = decodeJson(text);

  if (json !== undefined) {
    try {
      const payload = verdictListNode.parse(json);
      return { entries: payload.verdicts, mode: 'structured' };
    } catch (error) {
      logger?.(`Reply does not match the verdict schema (${describeError(error)}), decoding leniently.`);
    }

    const entries = findEntryArray(json);
    if (entries) {
      return { entries, mode: 'lenient' };
    }
  }

  const lineEntries = extractLines(text);
  return lineEntries.length > 0 ? { entries: lineEntries, mode: 'lines' } : null;
}

function stripFences(raw: string): string {
  return raw.replace(/```(?:json)?/gi, '').trim();
}

function decodeJson(text: string): unknown {
  const direct = tryJson(text);
  if (direct !== undefined) {
    return direct;
  }

  const objectSpan = spanBetween(text, '{', '}');
  const arraySpan = spanBetween(text, '[', ']');
  const spans = [objectSpan, arraySpan]
    .filter((span): span is { start: number; text: string } => span !== null)
    .sort((a, b) => a.start - b.start);

  for (const span of spans) {
    const decoded = tryJson(span.text);
    if (decoded !== undefined) {
      return decoded;
    }
  }
  return undefined;
}

function spanBetween(text: string, open: string, close: string): { start: number; text: string } | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return null;
  }
  return { start, text: text.slice(start, end + 1) };
}

function tryJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

function findEntryArray(json: unknown): RawEntry[] | null {
  if (Array.isArray(json)) {
    return json.filter(isEntry);
  }
  if (!isEntry(json)) {
    return null;
  }
  for (const key of ENTRY_KEYS) {
    const candidate = json[key];
    if (Array.isArray(candidate)) {
      return candidate.filter(isEntry);
    }
  }
  return readId(json) !== undefined ? [json] : null;
}

/**
 * Line-by-line recovery for replies that are not JSON as a whole: each line
 * is either a JSON object or `key: value` pairs split by `|`, `,` or `;`.
 */
function extractLines(text: string): RawEntry[] {
  const entries: RawEntry[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim().replace(/,$/, '');
    if (!line) {
      continue;
    }

    if (line.startsWith('{')) {
      const decoded = tryJson(line);
      if (isEntry(decoded) && readId(decoded) !== undefined) {
        entries.push(decoded);
      }
      continue;
    }

    const entry = parseKeyValueLine(line);
    if (readId(entry) !== undefined && ('sentiment' in entry || 'urgency' in entry)) {
      entries.push(entry);
    }
  }
  return entries;
}

function parseKeyValueLine(line: string): RawEntry {
  const entry: RawEntry = {};
  const cleaned = line.replace(/^[-*\d.)\s]+(?=[a-z_"])/i, '');
  for (const part of cleaned.split(/[|,;]/)) {
    const match = part.match(/^\s*"?([a-z_]+)"?\s*[:=]\s*"?([^"]*?)"?\s*$/i);
    if (match?.[1] && match[2] !== undefined) {
      entry[match[1].toLowerCase()] = match[2];
    }
  }
  return entry;
}

function isEntry(value: unknown): value is RawEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readId(entry: RawEntry): string | undefined {
  for (const key of ID_KEYS) {
    const value = entry[key];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

/**
 * Ids travel markup-escaped inside the prompt's `<comment id>` tags, so a reply
 * may echo either the escaped or the plain form.
 */
function matchExpectedId(rawId: string, expected: ReadonlySet<string>): string | undefined {
  return [unescapeMarkup(rawId), rawId].find((candidate) => expected.has(candidate));
}

function readAction(entry: RawEntry): string {
  for (const key of ACTION_KEYS) {
    const value = entry[key];
    if (typeof value === 'string') {
      return value.trim();
    }
  }
  return '';
}

function readConfidence(value: unknown): number | undefined {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number.parseFloat(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return Math.round(Math.max(0, Math.min(1, parsed)) * 100) / 100;
}

function toVerdict(id: string, entry: RawEntry): ClassificationVerdict {
  const coercedFields: VerdictField[] = [];
  const sentiment = normalizeSentiment(entry.sentiment);
  const urgency = normalizeUrgency(entry.urgency);
  const category = normalizeCategory(entry.category);
  if (!sentiment) coercedFields.push('sentiment');
  if (!urgency) coercedFields.push('urgency');
  if (!category) coercedFields.push('category');

  return {
    commentId: id,
    sentiment: sentiment ?? 'unresolved',
    urgency: urgency ?? 'unresolved',
    category: category ?? 'unresolved',
    suggestedAction: readAction(entry),
    confidence: readConfidence(entry.confidence),
    coercedFields,
    adjustments: [],
  };
}
