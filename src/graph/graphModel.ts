import type { GraphEdge, GraphNode, NodeKey, Paper } from '../types/paper';

export class GraphModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphModelError';
  }
}

export function edgeId(source: NodeKey, target: NodeKey): string {
  return `e-${source.length}-${source}-${target}`;
}

/**
 * The currently rendered hierarchy. Nodes are graph positions, not papers:
 * one paper can appear under several parents.
 */
export class GraphModel {
  private readonly nodeMap = new Map<NodeKey, GraphNode>();
  private readonly edgeMap = new Map<string, GraphEdge>();
  /** Node key -> ids of the edges it is an endpoint of. */
  private readonly incident = new Map<NodeKey, Set<string>>();
  private readonly children = new Map<NodeKey, NodeKey[]>();

  reset(): void {
    this.nodeMap.clear();
    this.edgeMap.clear();
    this.incident.clear();
    this.children.clear();
  }

  addNode(key: NodeKey, paper: Paper, depth: number, parentKey: NodeKey | null, duplicate = false): GraphNode {
    if (this.nodeMap.has(key)) {
      throw new GraphModelError(`Node ${key} already exists`);
    }
    if (parentKey !== null && !this.nodeMap.has(parentKey)) {
      throw new GraphModelError(`Parent ${parentKey} of ${key} does not exist`);
    }
    const node: GraphNode = {
      key,
      paperId: paper.paperId,
      parentKey,
      depth,
      paper: { ...paper, authors: paper.authors.map((a) => ({ ...a })) },
      expanded: false,
      duplicate,
    };
    this.nodeMap.set(key, node);
    return node;
  }

  addEdge(source: NodeKey, target: NodeKey): GraphEdge {
    if (!this.nodeMap.has(source) || !this.nodeMap.has(target)) {
      throw new GraphModelError(`Edge ${source} -> ${target} has a missing endpoint`);
    }
    const edge: GraphEdge = { id: edgeId(source, target), source, target };
    this.edgeMap.set(edge.id, edge);
    this.link(source, edge.id);
    this.link(target, edge.id);
    return edge;
  }

  /** Removes the node and every edge touching it. Its own children are not removed. */
  removeNode(key: NodeKey): boolean {
    if (!this.nodeMap.delete(key)) return false;
    for (const id of this.incident.get(key) ?? []) {
      const edge = this.edgeMap.get(id);
      if (!edge) continue;
      this.edgeMap.delete(id);
      const other = edge.source === key ? edge.target : edge.source;
      this.incident.get(other)?.delete(id);
    }
    this.incident.delete(key);
    this.children.delete(key);
    return true;
  }

  node(key: NodeKey): GraphNode | undefined {
    return this.nodeMap.get(key);
  }

  has(key: NodeKey): boolean {
    return this.nodeMap.has(key);
  }

  childrenOf(key: NodeKey): readonly NodeKey[] {
    return this.children.get(key) ?? [];
  }

  isExpanded(key: NodeKey): boolean {
    return this.nodeMap.get(key)?.expanded ?? false;
  }

  setExpanded(key: NodeKey, childKeys: readonly NodeKey[]): void {
    const node = this.requireNode(key);
    this.nodeMap.set(key, { ...node, expanded: true });
    this.children.set(key, [...childKeys]);
  }

  setCollapsed(key: NodeKey): void {
    const node = this.requireNode(key);
    this.nodeMap.set(key, { ...node, expanded: false });
    this.children.delete(key);
  }

  nodes(): GraphNode[] {
    return [...this.nodeMap.values()];
  }

  edges(): GraphEdge[] {
    return [...this.edgeMap.values()];
  }

  private link(key: NodeKey, id: string): void {
    const ids = this.incident.get(key);
    if (ids) ids.add(id);
    else this.incident.set(key, new Set([id]));
  }

  private requireNode(key: NodeKey): GraphNode {
    const node = this.nodeMap.get(key);
    if (!node) throw new GraphModelError(`Node ${key} does not exist`);
    return node;
  }
}
