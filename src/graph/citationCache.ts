import type { PaperRecord } from '../api/source';

/**
 * Reference lists keyed by paper id, in the order the source returned them.
 * An empty list means "fetched, no references" and is distinct from a miss.
 */
export class CitationCache {
  private readonly entries = new Map<string, readonly PaperRecord[]>();

  get(paperId: string): readonly PaperRecord[] | undefined {
    return this.entries.get(paperId);
  }

  put(paperId: string, references: readonly PaperRecord[]): void {
    this.entries.set(paperId, [...references]);
  }

  clear(): void {
    this.entries.clear();
  }
}
