export type PaperSourceKind = 'proxy' | 'openalex';

export interface AppConfig {
  apiBaseUrl: string;
  paperSource: PaperSourceKind;
  requestTimeoutMs: number;
  /** Upper bound on references materialized per expansion; `null` is unlimited. */
  maxReferences: number | null;
  openAlexMailto?: string;
}

const DEFAULT_TIMEOUT_MS = 10_000;

function parsePositiveInt(raw: string | undefined): number | null {
  if (!raw) return null;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : null;
}

export function readConfig(env: Record<string, string | undefined>): AppConfig {
  return {
    apiBaseUrl: (env.VITE_API_URL ?? '').replace(/\/+$/, ''),
    paperSource: env.VITE_PAPER_SOURCE === 'openalex' ? 'openalex' : 'proxy',
    requestTimeoutMs: parsePositiveInt(env.VITE_REQUEST_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS,
    maxReferences: parsePositiveInt(env.VITE_MAX_REFERENCES),
    openAlexMailto: env.VITE_OPENALEX_MAILTO || undefined,
  };
}

export const config: AppConfig = readConfig({
  VITE_API_URL: import.meta.env.VITE_API_URL,
  VITE_PAPER_SOURCE: import.meta.env.VITE_PAPER_SOURCE,
  VITE_REQUEST_TIMEOUT_MS: import.meta.env.VITE_REQUEST_TIMEOUT_MS,
  VITE_MAX_REFERENCES: import.meta.env.VITE_MAX_REFERENCES,
  VITE_OPENALEX_MAILTO: import.meta.env.VITE_OPENALEX_MAILTO,
});
