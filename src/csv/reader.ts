import { promises as fs } from 'node:fs';
import { parse } from 'csv-parse/sync';
import type { CommentRecord } from '../types/index.js';

export interface CommentColumns {
  idColumn: string;
  textColumn: string;
  scoreColumn?: string | undefined;
}

export interface LoadedComments {
  records: CommentRecord[];
  skippedEmpty: number;
  skippedDuplicate: number;
}

export const DEFAULT_COLUMNS: CommentColumns = {
  idColumn: 'review_id',
  textColumn: 'review_comment_message',
  scoreColumn: 'review_score',
};

export async function readCommentRecords(filePath: string, columns: CommentColumns = DEFAULT_COLUMNS): Promise<LoadedComments> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Input file not found at ${filePath}`);
    }
    throw error;
  }
  return parseCommentRecords(raw, columns);
}

/**
 * Turns CSV rows into comment records. Rows without comment text are not
 * comments and are skipped; a repeated id keeps its first row. Without an id
 * column each row is identified as `row-<n>`.
 */
export function parseCommentRecords(csv: string, columns: CommentColumns = DEFAULT_COLUMNS): LoadedComments {
  const rows: unknown = parse(csv, {
    bom: true,
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  if (!Array.isArray(rows)) {
    throw new Error('CSV parser did not return rows.');
  }

  const records: CommentRecord[] = [];
  const seen = new Set<string>();
  let skippedEmpty = 0;
  let skippedDuplicate = 0;

  rows.forEach((row: unknown, index) => {
    const cells = toCells(row);
    const originRow = index + 1;
    const text = cells.get(normalizeHeader(columns.textColumn)) ?? '';
    if (!text.trim()) {
      skippedEmpty += 1;
      return;
    }

    const id = cells.get(normalizeHeader(columns.idColumn))?.trim() || `row-${originRow}`;
    if (seen.has(id)) {
      skippedDuplicate += 1;
      return;
    }
    seen.add(id);

    records.push({ id, text, originRow, score: parseScore(columns.scoreColumn ? cells.get(normalizeHeader(columns.scoreColumn)) : undefined) });
  });

  return { records, skippedEmpty, skippedDuplicate };
}

function toCells(row: unknown): Map<string, string> {
  const cells = new Map<string, string>();
  if (typeof row !== 'object' || row === null) {
    return cells;
  }
  for (const [key, value] of Object.entries(row)) {
    if (typeof value === 'string') {
      cells.set(normalizeHeader(key), value);
    }
  }
  return cells;
}

function normalizeHeader(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '_');
}

function parseScore(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
