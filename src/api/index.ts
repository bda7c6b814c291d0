import type { AppConfig } from '../config';
import { createProxySource } from './client';
import { createOpenAlexSource } from './openalex';
import type { PaperSource } from './source';

export function createPaperSource(config: AppConfig): PaperSource {
  if (config.paperSource === 'openalex') {
    console.log('📡 Paper source: OpenAlex');
    return createOpenAlexSource({ timeoutMs: config.requestTimeoutMs, mailto: config.openAlexMailto });
  }
  console.log('📡 Paper source: proxy at', config.apiBaseUrl || window.location.origin);
  return createProxySource({ baseUrl: config.apiBaseUrl, timeoutMs: config.requestTimeoutMs });
}
