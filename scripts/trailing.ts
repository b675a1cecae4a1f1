import { wrap } from './reserved-names.ts';

const TRAILING = /[\s.]+$/u;

export const isDotDirectory = (node: string): boolean => node === '.' || node === '..';

/**
 * NTFS drops trailing dots and spaces, so `abc. ` and `abc` would collide.
 * Strips them; a node left empty is wrapped instead (`.` as a file → `_._`).
 */
export function trimTrailing(node: string): string {
  const trimmed = node.replace(TRAILING, '');
  return trimmed === '' ? wrap(node) : trimmed;
}
