import type { Author, Paper } from '../types/paper';
import { FetchFailureError, NotFoundError } from './errors';
import { getJson, isRecord } from './http';
import type { PaperRecord, PaperSource } from './source';

export const OPENALEX_API = 'https://api.openalex.org';
const ID_PREFIX = 'https://openalex.org/';
const SEARCH_CANDIDATES = 5;
const BATCH_SIZE = 50;

export interface OpenAlexSourceOptions {
  baseUrl?: string;
  timeoutMs: number;
  /** Contact address for the OpenAlex polite pool. */
  mailto?: string;
}

export function shortWorkId(id: string): string {
  return id.startsWith(ID_PREFIX) ? id.slice(ID_PREFIX.length) : id;
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function int(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : undefined;
}

/** Maps an OpenAlex work object onto the app's paper shape. */
export function formatWork(work: Record<string, unknown>): PaperRecord {
  const authors: Author[] = [];
  if (Array.isArray(work.authorships)) {
    for (const authorship of work.authorships) {
      if (!isRecord(authorship) || !isRecord(authorship.author)) continue;
      const name = str(authorship.author.display_name);
      if (name) authors.push({ name });
    }
  }

  let venue: string | undefined;
  if (isRecord(work.primary_location) && isRecord(work.primary_location.source)) {
    venue = str(work.primary_location.source.display_name);
  }

  const id = str(work.id);
  return {
    paperId: id ? shortWorkId(id) : undefined,
    title: str(work.title) ?? str(work.display_name),
    authors,
    year: int(work.publication_year),
    citationCount: int(work.cited_by_count) ?? 0,
    referenceCount: int(work.referenced_works_count),
    venue,
    url: str(work.doi) ?? id,
  };
}

function resultsOf(body: unknown): Record<string, unknown>[] {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    throw new FetchFailureError('OpenAlex response has no results list');
  }
  return body.results.filter(isRecord);
}

export function createOpenAlexSource({ baseUrl = OPENALEX_API, timeoutMs, mailto }: OpenAlexSourceOptions): PaperSource {
  const withMailto = (params: URLSearchParams) => {
    if (mailto) params.set('mailto', mailto);
    return params.toString();
  };

  async function get(path: string, params: URLSearchParams): Promise<unknown> {
    const res = await getJson(`${baseUrl}${path}?${withMailto(params)}`, timeoutMs);
    if (res.status === 404) throw new NotFoundError();
    if (!res.ok) throw new FetchFailureError(`OpenAlex request failed (HTTP ${res.status})`, { status: res.status });
    return res.body;
  }

  async function search(title: string): Promise<Paper> {
    const works = resultsOf(
      await get('/works', new URLSearchParams({ search: title, per_page: String(SEARCH_CANDIDATES) }))
    );

    // Prefer a match that has references to explore.
    const chosen = works.find((w) => (int(w.referenced_works_count) ?? 0) > 0) ?? works[0];
    if (!chosen) throw new NotFoundError();

    const paper = formatWork(chosen);
    if (!paper.paperId || !paper.title) throw new NotFoundError();
    console.log(`🔎 Found paper: ${paper.title} (ID: ${paper.paperId}, References: ${paper.referenceCount ?? 0})`);
    return { ...paper, paperId: paper.paperId, title: paper.title };
  }

  async function getReferences(paperId: string): Promise<PaperRecord[]> {
    const work = await get(
      `/works/${encodeURIComponent(shortWorkId(paperId))}`,
      new URLSearchParams({ select: 'id,referenced_works' })
    );
    if (!isRecord(work)) throw new FetchFailureError('OpenAlex work response was not an object');

    const referenced = Array.isArray(work.referenced_works)
      ? work.referenced_works.filter((r): r is string => typeof r === 'string').map(shortWorkId)
      : [];
    if (referenced.length === 0) return [];

    const byId = new Map<string, PaperRecord>();
    for (let i = 0; i < referenced.length; i += BATCH_SIZE) {
      const batch = referenced.slice(i, i + BATCH_SIZE);
      const results = resultsOf(
        await get(
          '/works',
          new URLSearchParams({ filter: `openalex_id:${batch.join('|')}`, per_page: String(BATCH_SIZE) })
        )
      );
      for (const result of results) {
        const record = formatWork(result);
        if (record.paperId) byId.set(record.paperId, record);
      }
    }

    // Keep the order of the work's own reference list.
    const records: PaperRecord[] = [];
    for (const id of referenced) {
      const record = byId.get(id);
      if (record) records.push(record);
    }
    console.log(`📚 Fetched details for ${records.length} of ${referenced.length} references`);
    return records;
  }

  return { search, getReferences };
}
