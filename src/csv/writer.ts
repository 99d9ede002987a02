import { createWriteStream, type WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { ClassificationResult, CommentRecord } from '../types/index.js';

export interface CsvRow {
  comment_id: string;
  origin_row: number;
  status: string;
  sentiment: string;
  urgency: string;
  category: string;
  suggested_action: string;
  confidence: string;
  failure_reason: string;
  adjustments: string;
  comment: string;
}

const HEADER: ReadonlyArray<keyof CsvRow> = [
  'comment_id',
  'origin_row',
  'status',
  'sentiment',
  'urgency',
  'category',
  'suggested_action',
  'confidence',
  'failure_reason',
  'adjustments',
  'comment',
];

export class CsvStreamWriter {
  private rowCount = 0;

  private constructor(private readonly destination: string, private readonly stream: WriteStream) {}

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${HEADER.join(',')}\n`);
    return new CsvStreamWriter(destination, stream);
  }

  async writeRow(row: CsvRow): Promise<void> {
    const line = HEADER.map((key) => csvEscape(String(row[key]))).join(',');
    this.rowCount += 1;
    if (!this.stream.write(`${line}\n`)) {
      await onceDrain(this.stream);
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }

  get rowsWritten(): number {
    return this.rowCount;
  }
}

export function resultToRow(result: ClassificationResult, record: CommentRecord): CsvRow {
  const { verdict } = result;
  return {
    comment_id: result.commentId,
    origin_row: result.originRow,
    status: result.status,
    sentiment: verdict.sentiment,
    urgency: verdict.urgency,
    category: verdict.category,
    suggested_action: verdict.suggestedAction,
    confidence: verdict.confidence !== undefined ? verdict.confidence.toFixed(2) : '',
    failure_reason: result.failureReason ?? '',
    adjustments: verdict.adjustments.join('; '),
    comment: record.text,
  };
}

async function onceDrain(stream: WriteStream): Promise<void> {
  await new Promise<void>((resolve) => stream.once('drain', resolve));
}

export function csvEscape(value: string): string {
  const sanitized = value.replace(/\r?\n/g, ' ');
  const needsQuotes = sanitized.includes(',') || sanitized.includes('"');
  const escaped = sanitized.replace(/"/g, '""');
  return needsQuotes ? `"${escaped}"` : escaped;
}
