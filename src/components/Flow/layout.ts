import { MarkerType, type Edge, type Node } from '@xyflow/react';
import dagre from 'dagre';
import { TITLE_LABEL_LENGTH, VENUE_LABEL_LENGTH, truncateText } from '../../lib/format';
import type { GraphEdge, GraphNode, NodeKey } from '../../types/paper';

export const NODE_WIDTH = 220;
export const NODE_HEIGHT = 84;
export const SEED_WIDTH = 280;
export const SEED_HEIGHT = 100;

export type PaperNodeData = {
  title: string;
  year?: number;
  venue?: string;
  citationCount: number;
  depth: number;
  duplicate: boolean;
  expanded: boolean;
  loading: boolean;
};

export type PaperFlowNode = Node<PaperNodeData, 'paper' | 'seed'>;

export type CitationEdgeData = {
  depth: number;
};

export type CitationFlowEdge = Edge<CitationEdgeData, 'citation'>;

export interface LayoutOptions {
  selectedKey?: NodeKey | null;
  loading?: readonly NodeKey[];
}

export function edgeColor(depth: number): string {
  if (depth === 1) return '#4ADE80';
  if (depth === 2) return '#38BDF8';
  return '#A78BFA';
}

/**
 * Lays the hierarchy out left to right, one rank per depth. The graph is a
 * tree, so network-simplex ranking keeps every edge one rank long and each
 * node lands in the column of its depth.
 */
export function buildFlowElements(
  graphNodes: readonly GraphNode[],
  graphEdges: readonly GraphEdge[],
  { selectedKey = null, loading = [] }: LayoutOptions = {}
): { nodes: PaperFlowNode[]; edges: CitationFlowEdge[] } {
  if (graphNodes.length === 0) return { nodes: [], edges: [] };

  const widest = new Map<number, number>();
  graphNodes.forEach((n) => widest.set(n.depth, (widest.get(n.depth) ?? 0) + 1));
  const maxPerRank = Math.max(...widest.values(), 1);

  const g = new dagre.graphlib.Graph().setDefaultEdgeLabel(() => ({}));
  g.setGraph({
    rankdir: 'LR',
    ranker: 'network-simplex',
    nodesep: Math.min(30 + maxPerRank * 2, 80),
    ranksep: 160,
    edgesep: 20,
    marginx: 60,
    marginy: 60,
  });

  const sizeOf = (n: GraphNode) =>
    n.depth === 0 ? { width: SEED_WIDTH, height: SEED_HEIGHT } : { width: NODE_WIDTH, height: NODE_HEIGHT };

  graphNodes.forEach((n) => g.setNode(n.key, sizeOf(n)));
  graphEdges.forEach((e) => g.setEdge(e.source, e.target));

  dagre.layout(g);

  const pending = new Set(loading);
  const nodes: PaperFlowNode[] = graphNodes.map((n) => {
    const pos = g.node(n.key);
    const { width, height } = sizeOf(n);
    return {
      id: n.key,
      type: n.depth === 0 ? 'seed' : 'paper',
      position: { x: pos.x - width / 2, y: pos.y - height / 2 },
      selected: n.key === selectedKey,
      data: {
        title: truncateText(n.paper.title, TITLE_LABEL_LENGTH),
        year: n.paper.year,
        venue: n.paper.venue ? truncateText(n.paper.venue, VENUE_LABEL_LENGTH) : undefined,
        citationCount: n.paper.citationCount,
        depth: n.depth,
        duplicate: n.duplicate,
        expanded: n.expanded,
        loading: pending.has(n.key),
      },
    };
  });

  const depthOf = new Map(graphNodes.map((n) => [n.key, n.depth]));
  const edges: CitationFlowEdge[] = graphEdges.map((e) => {
    const depth = depthOf.get(e.target) ?? 1;
    return {
      id: e.id,
      source: e.source,
      target: e.target,
      type: 'citation',
      markerEnd: { type: MarkerType.ArrowClosed, color: edgeColor(depth) },
      data: { depth },
    };
  });

  return { nodes, edges };
}
