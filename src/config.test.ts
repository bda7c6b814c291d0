import { describe, it, expect } from 'vitest';
import { readConfig } from './config';

describe('readConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(readConfig({})).toEqual({
      apiBaseUrl: '',
      paperSource: 'proxy',
      requestTimeoutMs: 10_000,
      maxReferences: null,
      openAlexMailto: undefined,
    });
  });

  it('reads every setting', () => {
    expect(
      readConfig({
        VITE_API_URL: 'http://127.0.0.1:5000/',
        VITE_PAPER_SOURCE: 'openalex',
        VITE_REQUEST_TIMEOUT_MS: '2500',
        VITE_MAX_REFERENCES: '25',
        VITE_OPENALEX_MAILTO: 'dev@example.com',
      })
    ).toEqual({
      apiBaseUrl: 'http://127.0.0.1:5000',
      paperSource: 'openalex',
      requestTimeoutMs: 2500,
      maxReferences: 25,
      openAlexMailto: 'dev@example.com',
    });
  });

  it('treats zero or junk numbers as unset', () => {
    const config = readConfig({ VITE_REQUEST_TIMEOUT_MS: 'soon', VITE_MAX_REFERENCES: '0', VITE_PAPER_SOURCE: 'ftp' });
    expect(config.requestTimeoutMs).toBe(10_000);
    expect(config.maxReferences).toBeNull();
    expect(config.paperSource).toBe('proxy');
  });
});
