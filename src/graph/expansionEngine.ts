import { NotFoundError, errorMessage } from '../api/errors';
import { isPaper, type PaperRecord, type PaperSource } from '../api/source';
import type { GraphEdge, GraphNode, NodeKey, Paper, StatusMessage, StatusType } from '../types/paper';
import { nodeKey } from './nodeKey';
import { Session } from './session';
import { sortByYear } from './sortReferences';

export interface EngineSnapshot {
  version: number;
  rootKey: NodeKey | null;
  nodes: GraphNode[];
  edges: GraphEdge[];
  status: StatusMessage | null;
  /** Paper shown in the details panel. */
  selected: Paper | null;
  selectedKey: NodeKey | null;
  /** Occurrence count of the selected paper this session. */
  selectedOccurrences: number;
  searching: boolean;
  /** Node keys waiting on a reference fetch. */
  loading: NodeKey[];
}

export interface ExpansionEngineOptions {
  source: PaperSource;
  /** References materialized per expansion; `null` or omitted means all. */
  maxReferences?: number | null;
}

type Listener = () => void;

/**
 * Drives search, expand and collapse over a single `Session`.
 *
 * Every command checks state synchronously before it starts a fetch, and every
 * fetch continuation checks again before it touches the graph: a new search, a
 * collapse of an ancestor or a second click may all happen while a request is
 * in flight, and none of them can be cancelled.
 */
export class ExpansionEngine {
  private readonly source: PaperSource;
  private readonly state: Session;
  private readonly listeners = new Set<Listener>();

  /** Node key -> token of the expansion waiting on its fetch. */
  private readonly pending = new Map<NodeKey, number>();
  /** Paper id -> shared request, so two positions of one paper fetch once. */
  private readonly requests = new Map<string, Promise<readonly PaperRecord[]>>();
  private nextToken = 0;
  private searchSeq = 0;
  private maxReferences: number | null;

  private status: StatusMessage | null = null;
  private statusSeq = 0;
  private selected: Paper | null = null;
  private selectedKey: NodeKey | null = null;
  private searching = false;
  private revision = 0;
  private snapshot: EngineSnapshot;

  constructor({ source, maxReferences = null }: ExpansionEngineOptions) {
    this.source = source;
    this.maxReferences = maxReferences;
    this.state = new Session({ maxReferences });
    this.snapshot = this.buildSnapshot();
  }

  get session(): Session {
    return this.state;
  }

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): EngineSnapshot => this.snapshot;

  /** Takes effect with the next search; the running session keeps its cap. */
  setMaxReferences(limit: number | null): void {
    this.maxReferences = limit !== null && limit > 0 ? limit : null;
  }

  async onSearch(rawTitle: string): Promise<void> {
    const title = rawTitle.trim();
    if (!title) {
      this.setStatus('Please enter a paper title', 'error');
      this.commit();
      return;
    }

    const seq = ++this.searchSeq;
    this.searching = true;
    this.setStatus('Searching for paper...', 'info');
    this.commit();

    let paper: Paper;
    try {
      paper = await this.source.search(title);
    } catch (err) {
      if (seq !== this.searchSeq) return;
      this.searching = false;
      if (err instanceof NotFoundError) {
        this.setStatus(err.message, 'error');
      } else {
        console.error('❌ Search failed:', err);
        this.setStatus(`An error occurred while searching: ${errorMessage(err)}`, 'error');
      }
      this.commit();
      return;
    }
    // A newer search owns the graph now.
    if (seq !== this.searchSeq) return;

    this.reset();
    const { graph, occurrences } = this.state;
    const rootKey = nodeKey({ parentKey: null, paperId: paper.paperId });
    occurrences.recordOccurrence(paper.paperId);
    graph.addNode(rootKey, paper, 0, null, false);
    this.state.rootKey = rootKey;
    this.selected = paper;
    this.selectedKey = rootKey;
    this.searching = false;
    this.setStatus('Paper found! Loading references...', 'success');
    this.commit();

    await this.expand(rootKey);
  }

  async onNodeClick(key: NodeKey): Promise<void> {
    const node = this.state.graph.node(key);
    if (!node) return;

    this.selected = node.paper;
    this.selectedKey = key;

    if (node.expanded) {
      this.collapse(key);
    } else {
      this.commit();
      await this.expand(key);
    }
  }

  async expand(key: NodeKey): Promise<void> {
    const { graph, cache } = this.state;
    const node = graph.node(key);
    if (!node || node.expanded || this.pending.has(key)) return;

    const cached = cache.get(node.paperId);
    if (cached) {
      const count = this.materialize(node, cached);
      if (count > 0) this.setStatus(`Showing ${count} cached references`, 'success');
      this.commit();
      return;
    }

    const generation = this.state.generation;
    const token = ++this.nextToken;
    this.pending.set(key, token);
    this.setStatus(`Loading references for "${node.paper.title}"...`, 'info');
    this.commit();

    let references: readonly PaperRecord[];
    try {
      references = await this.fetchReferences(node.paperId);
    } catch (err) {
      if (!this.release(key, token, generation)) {
        console.warn('⚠️ Reference fetch failed for a node that is no longer waiting on it:', err);
        return;
      }
      console.error('❌ Error loading references:', err);
      this.setStatus(`An error occurred while loading references: ${errorMessage(err)}`, 'error');
      this.commit();
      return;
    }

    if (!this.release(key, token, generation)) return;

    // The node may have been collapsed away while the request was in flight.
    const current = graph.node(key);
    if (!current || current.expanded) {
      this.commit();
      return;
    }

    const count = this.materialize(current, references);
    if (count > 0) this.setStatus(`Loaded ${count} references`, 'success');
    this.commit();
  }

  collapse(key: NodeKey): void {
    const removed = this.teardown(key);
    if (removed === null) return;
    if (removed > 0) this.setStatus(`Collapsed ${removed} references`, 'info');
    this.commit();
  }

  private reset(): void {
    this.state.reset({ maxReferences: this.maxReferences });
    this.pending.clear();
    this.requests.clear();
    this.selected = null;
    this.selectedKey = null;
  }

  private fetchReferences(paperId: string): Promise<readonly PaperRecord[]> {
    const inFlight = this.requests.get(paperId);
    if (inFlight) return inFlight;

    console.log(`📡 Fetching references for ${paperId}`);
    const generation = this.state.generation;
    const request: Promise<readonly PaperRecord[]> = this.source.getReferences(paperId).then(
      (references) => {
        if (this.requests.get(paperId) === request) this.requests.delete(paperId);
        // Cached in source order; sorting happens per expansion.
        if (generation === this.state.generation) this.state.cache.put(paperId, references);
        return references;
      },
      (err: unknown) => {
        if (this.requests.get(paperId) === request) this.requests.delete(paperId);
        throw err;
      }
    );
    this.requests.set(paperId, request);
    return request;
  }

  /** Clears the pending marker if it still belongs to this expansion. */
  private release(key: NodeKey, token: number, generation: number): boolean {
    if (generation !== this.state.generation || this.pending.get(key) !== token) return false;
    this.pending.delete(key);
    return true;
  }

  /** Inserts the children of `parent` and marks it expanded. Returns the child count. */
  private materialize(parent: GraphNode, references: readonly PaperRecord[]): number {
    const { graph, occurrences, maxReferences } = this.state;
    const children: NodeKey[] = [];

    for (const reference of sortByYear(references)) {
      if (maxReferences !== null && children.length >= maxReferences) break;
      if (!isPaper(reference)) {
        console.warn('⚠️ Skipping reference with missing data:', reference);
        continue;
      }
      const key = nodeKey({ parentKey: parent.key, paperId: reference.paperId });
      // Same paper listed twice in one reference list.
      if (graph.has(key)) continue;

      const duplicate = occurrences.recordOccurrence(reference.paperId);
      graph.addNode(key, reference, parent.depth + 1, parent.key, duplicate);
      graph.addEdge(parent.key, key);
      children.push(key);
    }

    graph.setExpanded(parent.key, children);
    if (children.length === 0) {
      this.setStatus('No references found for this paper', 'info');
    }
    return children.length;
  }

  /** Depth-first removal of everything below `key`. Returns null if it was not expanded. */
  private teardown(key: NodeKey): number | null {
    const { graph } = this.state;
    if (!graph.isExpanded(key)) return null;

    const children = [...graph.childrenOf(key)];
    for (const child of children) {
      if (graph.isExpanded(child)) this.teardown(child);
      this.pending.delete(child);
      if (this.selectedKey === child) this.selectedKey = null;
      graph.removeNode(child);
    }
    graph.setCollapsed(key);
    return children.length;
  }

  private setStatus(text: string, type: StatusType): void {
    this.status = { id: ++this.statusSeq, text, type };
  }

  private buildSnapshot(): EngineSnapshot {
    const { graph, occurrences } = this.state;
    return {
      version: this.revision,
      rootKey: this.state.rootKey,
      nodes: graph.nodes(),
      edges: graph.edges(),
      status: this.status,
      selected: this.selected,
      selectedKey: this.selectedKey,
      selectedOccurrences: this.selected ? occurrences.count(this.selected.paperId) : 0,
      searching: this.searching,
      loading: [...this.pending.keys()],
    };
  }

  private commit(): void {
    this.revision += 1;
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) listener();
  }
}
