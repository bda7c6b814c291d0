import type { NodeKey } from '../types/paper';
import { CitationCache } from './citationCache';
import { GraphModel } from './graphModel';
import { OccurrenceTracker } from './occurrenceTracker';

export interface SessionOptions {
  /** References materialized per expansion; `null` means all of them. */
  maxReferences?: number | null;
}

/** Everything that lives for one search: the graph plus its caches. */
export class Session {
  readonly graph = new GraphModel();
  readonly cache = new CitationCache();
  readonly occurrences = new OccurrenceTracker();
  rootKey: NodeKey | null = null;
  maxReferences: number | null;
  private gen = 0;

  constructor(options: SessionOptions = {}) {
    this.maxReferences = options.maxReferences ?? null;
  }

  /** Bumped by every reset; async work compares it to detect a newer session. */
  get generation(): number {
    return this.gen;
  }

  reset(options: SessionOptions = {}): void {
    this.graph.reset();
    this.cache.clear();
    this.occurrences.clear();
    this.rootKey = null;
    if (options.maxReferences !== undefined) this.maxReferences = options.maxReferences;
    this.gen += 1;
  }
}
