import type { NodeKey } from '../types/paper';

export interface NodeKeyParts {
  parentKey: NodeKey | null;
  paperId: string;
}

/**
 * Encodes a graph position as length-prefixed segments, `<len>:<paperId>`,
 * joined by `/`, one per paper on the path from the root. Reading a segment
 * consumes exactly `len` characters, so ids containing `/` or `:` cannot
 * produce the same key for two different paths.
 */
export function nodeKey({ parentKey, paperId }: NodeKeyParts): NodeKey {
  const segment = `${paperId.length}:${paperId}`;
  return parentKey === null ? segment : `${parentKey}/${segment}`;
}
