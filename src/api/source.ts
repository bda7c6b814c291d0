import type { Author, Paper } from '../types/paper';
import { isRecord } from './http';

/**
 * A reference as delivered upstream. Identifier and title may be missing;
 * such records are dropped by the expansion engine.
 */
export type PaperRecord = Omit<Paper, 'paperId' | 'title'> & {
  paperId?: string;
  title?: string;
};

export interface PaperSource {
  /** Resolves the best match for `title`; rejects with `NotFoundError` on a miss. */
  search(title: string): Promise<Paper>;
  getReferences(paperId: string): Promise<PaperRecord[]>;
}

export function isPaper(record: PaperRecord): record is Paper {
  return Boolean(record.paperId) && Boolean(record.title);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function optionalInt(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : undefined;
}

function toAuthors(value: unknown): Author[] {
  if (!Array.isArray(value)) return [];
  const authors: Author[] = [];
  for (const entry of value) {
    if (typeof entry === 'string' && entry) {
      authors.push({ name: entry });
    } else if (isRecord(entry) && typeof entry.name === 'string' && entry.name) {
      authors.push({ name: entry.name });
    }
  }
  return authors;
}

/** Coerces one upstream JSON record into a `PaperRecord`, or `null` if it is not an object. */
export function normalizeRecord(value: unknown): PaperRecord | null {
  if (!isRecord(value)) return null;
  return {
    paperId: optionalString(value.paperId),
    title: optionalString(value.title),
    authors: toAuthors(value.authors),
    year: optionalInt(value.year),
    citationCount: optionalInt(value.citationCount) ?? 0,
    referenceCount: optionalInt(value.referenceCount),
    venue: optionalString(value.venue),
    url: optionalString(value.url),
  };
}

export function normalizeRecords(values: unknown[]): PaperRecord[] {
  const records: PaperRecord[] = [];
  for (const value of values) {
    const record = normalizeRecord(value);
    if (record) records.push(record);
  }
  return records;
}
