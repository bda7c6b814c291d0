/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_URL?: string;
  readonly VITE_PAPER_SOURCE?: string;
  readonly VITE_REQUEST_TIMEOUT_MS?: string;
  readonly VITE_MAX_REFERENCES?: string;
  readonly VITE_OPENALEX_MAILTO?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
