import { LengthExceededError } from './errors.ts';

export const MAX_NODE_LENGTH = 254;

// Counted in code points, so a surrogate pair is one character. NTFS counts
// UTF-16 units, so a node of astral characters can pass here at up to twice the
// length NTFS accepts.
export const nodeLength = (node: string): number => Array.from(node).length;

export function truncateNode(node: string, limit = MAX_NODE_LENGTH): string {
  return Array.from(node).slice(0, limit).join('');
}

/**
 * Returns `node` when it fits. Otherwise truncates it when `trim` is set, or
 * fails naming the original node.
 */
export function enforceLength(node: string, source: string, trim: boolean, limit = MAX_NODE_LENGTH): string {
  const length = nodeLength(node);
  if (length <= MAX_NODE_LENGTH) return node;
  if (!trim) {
    throw new LengthExceededError({
      message: `Node '${source}' has more than ${MAX_NODE_LENGTH} characters`,
      node: source,
      length,
    });
  }
  return truncateNode(node, limit);
}
