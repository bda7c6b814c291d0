export interface Author {
  name: string;
}

export interface Paper {
  paperId: string;
  title: string;
  authors: Author[];
  year?: number;
  citationCount: number;
  referenceCount?: number;
  venue?: string;
  url?: string;
}

/** Graph-position identifier, see `graph/nodeKey`. */
export type NodeKey = string;

export interface GraphNode {
  key: NodeKey;
  paperId: string;
  parentKey: NodeKey | null;
  depth: number;
  /** Snapshot of the paper taken when the node was inserted. */
  paper: Paper;
  expanded: boolean;
  duplicate: boolean;
}

export interface GraphEdge {
  id: string;
  source: NodeKey;
  target: NodeKey;
}

export type StatusType = 'info' | 'success' | 'error';

export interface StatusMessage {
  id: number;
  text: string;
  type: StatusType;
}
