import type { Paper } from '../types/paper';
import { FetchFailureError, NotFoundError } from './errors';
import { getJson, isRecord } from './http';
import { isPaper, normalizeRecord, normalizeRecords, type PaperRecord, type PaperSource } from './source';

export interface ProxySourceOptions {
  /** Base URL of the proxy; empty string means same origin. */
  baseUrl: string;
  timeoutMs: number;
}

function errorField(body: unknown): string | undefined {
  return isRecord(body) && typeof body.error === 'string' ? body.error : undefined;
}

export async function searchPaper(title: string, { baseUrl, timeoutMs }: ProxySourceOptions): Promise<Paper> {
  const res = await getJson(`${baseUrl}/api/search?title=${encodeURIComponent(title)}`, timeoutMs);

  if (res.status === 404) throw new NotFoundError(errorField(res.body));
  if (!res.ok) {
    throw new FetchFailureError(errorField(res.body) ?? `Search failed (HTTP ${res.status})`, {
      status: res.status,
    });
  }

  const record = normalizeRecord(res.body);
  if (!record || !isPaper(record)) {
    throw new FetchFailureError('Search response is missing paperId or title', { status: res.status });
  }
  return record;
}

export async function getReferences(
  paperId: string,
  { baseUrl, timeoutMs }: ProxySourceOptions
): Promise<PaperRecord[]> {
  const res = await getJson(`${baseUrl}/api/citations/${encodeURIComponent(paperId)}`, timeoutMs);

  if (!res.ok) {
    throw new FetchFailureError(errorField(res.body) ?? `Failed to fetch references (HTTP ${res.status})`, {
      status: res.status,
    });
  }
  if (!isRecord(res.body) || !Array.isArray(res.body.citations)) {
    throw new FetchFailureError('References response has no citations list', { status: res.status });
  }

  return normalizeRecords(res.body.citations);
}

export function createProxySource(options: ProxySourceOptions): PaperSource {
  return {
    search: (title) => searchPaper(title, options),
    getReferences: (paperId) => getReferences(paperId, options),
  };
}
