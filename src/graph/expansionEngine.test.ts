import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExpansionEngine } from './expansionEngine';
import { nodeKey } from './nodeKey';
import { FetchFailureError, NotFoundError } from '../api/errors';
import type { PaperRecord, PaperSource } from '../api/source';
import type { NodeKey, Paper } from '../types/paper';

const paper = (paperId: string, year?: number): Paper => ({
  paperId,
  title: `Paper ${paperId}`,
  authors: [],
  year,
  citationCount: 0,
});

function deferred<T>() {
  const handlers = {
    resolve: (_value: T) => {},
    reject: (_reason: unknown) => {},
  };
  const promise = new Promise<T>((resolve, reject) => {
    handlers.resolve = resolve;
    handlers.reject = reject;
  });
  return { promise, ...handlers };
}

function fakeSource(references: Record<string, PaperRecord[]>, root: Paper = paper('root', 2017)) {
  return {
    search: vi.fn(async (_title: string): Promise<Paper> => root),
    getReferences: vi.fn(async (paperId: string): Promise<PaperRecord[]> => references[paperId] ?? []),
  } satisfies PaperSource;
}

const ROOT = nodeKey({ parentKey: null, paperId: 'root' });
const child = (parentKey: NodeKey, paperId: string) => nodeKey({ parentKey, paperId });

function childPaperIds(engine: ExpansionEngine, key: NodeKey): string[] {
  const { graph } = engine.session;
  return graph.childrenOf(key).map((k) => graph.node(k)?.paperId ?? '?');
}

function fetchesFor(source: ReturnType<typeof fakeSource>, paperId: string): number {
  return source.getReferences.mock.calls.filter(([id]) => id === paperId).length;
}

describe('ExpansionEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  describe('search', () => {
    it('seeds the root at depth 0 and expands it', async () => {
      const source = fakeSource({ root: [paper('A', 2015), paper('B', 2014)] });
      const engine = new ExpansionEngine({ source });

      await engine.onSearch('  Attention Is All You Need  ');

      expect(source.search).toHaveBeenCalledWith('Attention Is All You Need');
      const snapshot = engine.getSnapshot();
      expect(snapshot.rootKey).toBe(ROOT);
      expect(engine.session.graph.node(ROOT)).toMatchObject({ depth: 0, parentKey: null, duplicate: false, expanded: true });
      expect(engine.session.occurrences.count('root')).toBe(1);
      expect(childPaperIds(engine, ROOT)).toEqual(['B', 'A']);
      expect(snapshot.selected?.paperId).toBe('root');
      expect(snapshot.status).toMatchObject({ text: 'Loaded 2 references', type: 'success' });
    });

    it('rejects a blank title without calling the source', async () => {
      const source = fakeSource({});
      const engine = new ExpansionEngine({ source });

      await engine.onSearch('   ');

      expect(source.search).not.toHaveBeenCalled();
      expect(engine.getSnapshot().status).toMatchObject({ text: 'Please enter a paper title', type: 'error' });
    });

    it('reports NotFound and leaves the current graph alone', async () => {
      const source = fakeSource({ root: [paper('A')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('first');

      source.search.mockRejectedValueOnce(new NotFoundError('Paper not found'));
      await engine.onSearch('no such paper');

      const snapshot = engine.getSnapshot();
      expect(snapshot.status).toMatchObject({ text: 'Paper not found', type: 'error' });
      expect(snapshot.rootKey).toBe(ROOT);
      expect(snapshot.nodes).toHaveLength(2);
      expect(snapshot.searching).toBe(false);
    });

    it('reports other search failures as errors', async () => {
      const source = fakeSource({});
      source.search.mockRejectedValueOnce(new FetchFailureError('Request timed out after 10000ms'));
      const engine = new ExpansionEngine({ source });

      await engine.onSearch('anything');

      expect(engine.getSnapshot().status).toMatchObject({
        text: 'An error occurred while searching: Request timed out after 10000ms',
        type: 'error',
      });
      expect(engine.getSnapshot().rootKey).toBeNull();
    });

    it('clears graph, cache and occurrences on a new search', async () => {
      const source = fakeSource({ root: [paper('A')], A: [paper('root')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('first');
      await engine.onNodeClick(child(ROOT, 'A'));
      expect(engine.session.occurrences.count('root')).toBe(2);

      await engine.onSearch('again');

      expect(engine.session.occurrences.count('root')).toBe(1);
      expect(engine.session.occurrences.count('A')).toBe(1);
      expect(engine.session.graph.nodes()).toHaveLength(2);
      expect(source.getReferences).toHaveBeenCalledTimes(3);
    });

    it('ignores a search that resolves after a newer one', async () => {
      const slow = deferred<Paper>();
      const source = fakeSource({ second: [paper('S1')] });
      source.search.mockImplementationOnce(() => slow.promise);
      source.search.mockImplementationOnce(async () => paper('second'));
      const engine = new ExpansionEngine({ source });

      const first = engine.onSearch('first');
      await engine.onSearch('second');
      slow.resolve(paper('first'));
      await first;

      const secondRoot = nodeKey({ parentKey: null, paperId: 'second' });
      expect(engine.getSnapshot().rootKey).toBe(secondRoot);
      expect(childPaperIds(engine, secondRoot)).toEqual(['S1']);
      expect(fetchesFor(source, 'first')).toBe(0);
    });
  });

  describe('expand', () => {
    it('is a no-op on an expanded node', async () => {
      const source = fakeSource({ root: [paper('A'), paper('B')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');
      const before = engine.getSnapshot();

      await engine.expand(ROOT);

      expect(engine.getSnapshot()).toBe(before);
      expect(fetchesFor(source, 'root')).toBe(1);
      expect(engine.session.graph.nodes()).toHaveLength(3);
    });

    it('sorts by year with undated references last in source order', async () => {
      const years = [2015, 2016, undefined, 2014, 2017, undefined, 2015, 2012, 2016, 2010, 2014, 2013];
      const refs = years.map((year, i) => paper(`r${i + 1}`, year));
      const source = fakeSource({ root: refs });
      const engine = new ExpansionEngine({ source });

      await engine.onSearch('Attention Is All You Need');

      expect(childPaperIds(engine, ROOT)).toEqual([
        'r10', 'r8', 'r12', 'r4', 'r11', 'r1', 'r7', 'r2', 'r9', 'r5', 'r3', 'r6',
      ]);
      expect(engine.session.cache.get('root')?.map((r) => r.paperId)).toEqual(refs.map((r) => r.paperId));
    });

    it('drops references without an id or title and keeps the rest', async () => {
      const source = fakeSource({
        root: [
          paper('A', 2001),
          { title: 'No identifier', authors: [], citationCount: 0, year: 2000 },
          { paperId: 'X', authors: [], citationCount: 0, year: 1999 },
          paper('B', 2002),
        ],
      });
      const engine = new ExpansionEngine({ source });

      await engine.onSearch('title');

      expect(childPaperIds(engine, ROOT)).toEqual(['A', 'B']);
      expect(engine.session.graph.nodes()).toHaveLength(3);
      expect(engine.session.graph.edges()).toHaveLength(2);
      expect(engine.session.occurrences.count('X')).toBe(0);
    });

    it('places children one level below their parent', async () => {
      const source = fakeSource({ root: [paper('A')], A: [paper('C')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');

      await engine.onNodeClick(child(ROOT, 'A'));

      const c = engine.session.graph.node(child(child(ROOT, 'A'), 'C'));
      expect(c).toMatchObject({ depth: 2, parentKey: child(ROOT, 'A'), paperId: 'C' });
    });

    it('flags the second position of the same paper as a duplicate', async () => {
      const source = fakeSource({ root: [paper('A', 1), paper('B', 2)], A: [paper('C')], B: [paper('C')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');

      await engine.onNodeClick(child(ROOT, 'A'));
      await engine.onNodeClick(child(ROOT, 'B'));

      const underA = engine.session.graph.node(child(child(ROOT, 'A'), 'C'));
      const underB = engine.session.graph.node(child(child(ROOT, 'B'), 'C'));
      expect(underA?.key).not.toBe(underB?.key);
      expect(underA?.duplicate).toBe(false);
      expect(underB?.duplicate).toBe(true);
      expect(engine.session.occurrences.count('C')).toBe(2);
    });

    it('shares one fetch between two positions of the same paper', async () => {
      const source = fakeSource({ root: [paper('A', 1), paper('B', 2)], A: [paper('C')], B: [paper('C')], C: [paper('D')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');
      await engine.onNodeClick(child(ROOT, 'A'));
      await engine.onNodeClick(child(ROOT, 'B'));

      const gate = deferred<PaperRecord[]>();
      source.getReferences.mockImplementationOnce(() => gate.promise);
      const first = engine.onNodeClick(child(child(ROOT, 'A'), 'C'));
      const second = engine.onNodeClick(child(child(ROOT, 'B'), 'C'));
      gate.resolve([paper('D')]);
      await Promise.all([first, second]);

      expect(fetchesFor(source, 'C')).toBe(1);
      expect(engine.session.graph.isExpanded(child(child(ROOT, 'A'), 'C'))).toBe(true);
      expect(engine.session.graph.isExpanded(child(child(ROOT, 'B'), 'C'))).toBe(true);
    });

    it('ignores a repeated click while the fetch is pending', async () => {
      const source = fakeSource({ root: [paper('A')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');
      const gate = deferred<PaperRecord[]>();
      source.getReferences.mockImplementationOnce(() => gate.promise);

      const first = engine.onNodeClick(child(ROOT, 'A'));
      expect(engine.getSnapshot().loading).toEqual([child(ROOT, 'A')]);
      await engine.onNodeClick(child(ROOT, 'A'));
      gate.resolve([paper('C'), paper('D')]);
      await first;

      expect(fetchesFor(source, 'A')).toBe(1);
      expect(childPaperIds(engine, child(ROOT, 'A'))).toEqual(['C', 'D']);
      expect(engine.getSnapshot().loading).toEqual([]);
    });

    it('caches an empty reference list and never refetches it', async () => {
      const source = fakeSource({ root: [paper('A')], A: [] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');
      const a = child(ROOT, 'A');

      await engine.onNodeClick(a);
      expect(engine.session.graph.isExpanded(a)).toBe(true);
      expect(engine.session.graph.childrenOf(a)).toEqual([]);
      expect(engine.session.cache.get('A')).toEqual([]);
      expect(engine.getSnapshot().status?.text).toBe('No references found for this paper');

      await engine.onNodeClick(a);
      await engine.onNodeClick(a);
      expect(engine.session.graph.isExpanded(a)).toBe(true);
      expect(fetchesFor(source, 'A')).toBe(1);
    });

    it('adds a paper listed twice in one reference list only once', async () => {
      const source = fakeSource({ root: [paper('A'), paper('A'), paper('B')] });
      const engine = new ExpansionEngine({ source });

      await engine.onSearch('title');

      expect(childPaperIds(engine, ROOT)).toEqual(['A', 'B']);
      expect(engine.session.occurrences.count('A')).toBe(1);
    });

    it('caps the number of children per expansion', async () => {
      const source = fakeSource({
        root: [paper('C', 2003), { title: 'broken', authors: [], citationCount: 0, year: 1990 }, paper('A', 2001), paper('B', 2002)],
      });
      const engine = new ExpansionEngine({ source, maxReferences: 2 });

      await engine.onSearch('title');

      expect(childPaperIds(engine, ROOT)).toEqual(['A', 'B']);
      expect(engine.session.cache.get('root')).toHaveLength(4);
    });

    it('applies a new cap only from the next search', async () => {
      const source = fakeSource({ root: [paper('A', 1), paper('B', 2), paper('C', 3)] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');

      engine.setMaxReferences(1);
      await engine.onNodeClick(ROOT);
      await engine.onNodeClick(ROOT);
      expect(childPaperIds(engine, ROOT)).toEqual(['A', 'B', 'C']);

      await engine.onSearch('title');
      expect(childPaperIds(engine, ROOT)).toEqual(['A']);
    });
  });

  describe('collapse', () => {
    async function explored() {
      const source = fakeSource({
        root: [paper('A', 1), paper('B', 2)],
        A: [paper('C', 1), paper('D', 2)],
        C: [paper('E')],
        B: [paper('F')],
      });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');
      await engine.onNodeClick(child(ROOT, 'A'));
      await engine.onNodeClick(child(child(ROOT, 'A'), 'C'));
      await engine.onNodeClick(child(ROOT, 'B'));
      return { source, engine };
    }

    it('removes exactly the subtree below the node', async () => {
      const { engine } = await explored();
      const a = child(ROOT, 'A');
      const b = child(ROOT, 'B');
      const f = child(b, 'F');
      expect(engine.session.graph.nodes()).toHaveLength(7);

      await engine.onNodeClick(a);

      const { graph } = engine.session;
      expect(graph.nodes().map((n) => n.key).sort()).toEqual([ROOT, a, b, f].sort());
      expect(graph.edges().map((e) => [e.source, e.target])).toEqual([
        [ROOT, a],
        [ROOT, b],
        [b, f],
      ]);
      expect(graph.isExpanded(a)).toBe(false);
      expect(graph.isExpanded(b)).toBe(true);
      expect(engine.getSnapshot().status).toMatchObject({ text: 'Collapsed 2 references', type: 'info' });
    });

    it('keeps cache entries and occurrence counts', async () => {
      const { engine } = await explored();

      engine.collapse(ROOT);

      expect(engine.session.graph.nodes()).toHaveLength(1);
      expect(engine.session.cache.get('root')).toBeDefined();
      expect(engine.session.cache.get('A')).toBeDefined();
      expect(engine.session.occurrences.count('E')).toBe(1);
    });

    it('is a no-op on a node that is not expanded', async () => {
      const { engine } = await explored();
      const before = engine.getSnapshot();

      engine.collapse(child(child(ROOT, 'A'), 'D'));
      engine.collapse('not-a-key');

      expect(engine.getSnapshot()).toBe(before);
    });

    it('replays the same children from the cache on re-expand', async () => {
      const { source, engine } = await explored();
      const a = child(ROOT, 'A');
      const original = engine.session.graph.childrenOf(a).map((k) => engine.session.graph.node(k));

      await engine.onNodeClick(a);
      await engine.onNodeClick(a);

      const replayed = engine.session.graph.childrenOf(a).map((k) => engine.session.graph.node(k));
      expect(replayed.map((n) => [n?.paperId, n?.depth])).toEqual(original.map((n) => [n?.paperId, n?.depth]));
      expect(fetchesFor(source, 'A')).toBe(1);
      expect(engine.getSnapshot().status?.text).toBe('Showing 2 cached references');
    });

    it('keeps counting occurrences across collapse and re-expand', async () => {
      const { engine } = await explored();
      const a = child(ROOT, 'A');

      await engine.onNodeClick(a);
      await engine.onNodeClick(a);

      expect(engine.session.occurrences.count('C')).toBe(2);
      expect(engine.session.graph.node(child(a, 'C'))?.duplicate).toBe(true);
    });
  });

  describe('stale fetches', () => {
    it('does not materialize children of a node removed while its fetch was in flight', async () => {
      const source = fakeSource({ root: [paper('A')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');
      const gate = deferred<PaperRecord[]>();
      source.getReferences.mockImplementationOnce(() => gate.promise);
      const a = child(ROOT, 'A');

      const pending = engine.onNodeClick(a);
      await engine.onNodeClick(ROOT);
      gate.resolve([paper('C')]);
      await pending;

      expect(engine.session.graph.nodes()).toHaveLength(1);
      expect(engine.session.cache.get('A')).toEqual([paper('C')]);

      await engine.onNodeClick(ROOT);
      expect(engine.session.graph.isExpanded(a)).toBe(false);
      await engine.onNodeClick(a);
      expect(childPaperIds(engine, a)).toEqual(['C']);
      expect(fetchesFor(source, 'A')).toBe(1);
    });

    it('drops a fetch that resolves after a new search', async () => {
      const source = fakeSource({ root: [paper('A')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');
      const gate = deferred<PaperRecord[]>();
      source.getReferences.mockImplementationOnce(() => gate.promise);

      const pending = engine.onNodeClick(child(ROOT, 'A'));
      source.search.mockResolvedValueOnce(paper('other'));
      await engine.onSearch('other');
      gate.resolve([paper('C')]);
      await pending;

      const otherRoot = nodeKey({ parentKey: null, paperId: 'other' });
      expect(engine.session.graph.nodes().map((n) => n.key)).toEqual([otherRoot]);
      expect(engine.session.cache.get('A')).toBeUndefined();
    });
  });

  describe('fetch failures', () => {
    it('leaves the node unexpanded and succeeds on retry', async () => {
      const refs = [paper('A', 2015), paper('B', 2016)];
      const source = fakeSource({ root: refs });
      source.getReferences.mockRejectedValueOnce(new FetchFailureError('Request timed out after 10000ms'));
      const engine = new ExpansionEngine({ source });

      await engine.onSearch('Attention Is All You Need');

      expect(engine.session.graph.isExpanded(ROOT)).toBe(false);
      expect(engine.session.graph.nodes()).toHaveLength(1);
      expect(engine.session.graph.edges()).toEqual([]);
      expect(engine.session.cache.get('root')).toBeUndefined();
      expect(engine.getSnapshot().status).toMatchObject({
        text: 'An error occurred while loading references: Request timed out after 10000ms',
        type: 'error',
      });
      expect(engine.getSnapshot().loading).toEqual([]);

      await engine.onNodeClick(ROOT);

      expect(childPaperIds(engine, ROOT)).toEqual(['A', 'B']);
      expect(fetchesFor(source, 'root')).toBe(2);
    });
  });

  describe('observation', () => {
    it('notifies subscribers and stops after unsubscribe', async () => {
      const source = fakeSource({ root: [paper('A')] });
      const engine = new ExpansionEngine({ source });
      const listener = vi.fn();
      const unsubscribe = engine.subscribe(listener);

      await engine.onSearch('title');
      const calls = listener.mock.calls.length;
      expect(calls).toBeGreaterThan(0);

      unsubscribe();
      await engine.onNodeClick(ROOT);
      expect(listener).toHaveBeenCalledTimes(calls);
    });

    it('selects the clicked node for the details panel', async () => {
      const source = fakeSource({ root: [paper('A'), paper('B')], A: [paper('B')] });
      const engine = new ExpansionEngine({ source });
      await engine.onSearch('title');
      const a = child(ROOT, 'A');

      await engine.onNodeClick(a);
      await engine.onNodeClick(child(a, 'B'));

      const snapshot = engine.getSnapshot();
      expect(snapshot.selectedKey).toBe(child(a, 'B'));
      expect(snapshot.selected?.title).toBe('Paper B');
      expect(snapshot.selectedOccurrences).toBe(2);
    });
  });
});
