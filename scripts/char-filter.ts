/**
 * Characters that are illegal (or unsafe) in a path node on Windows or POSIX:
 * - the reserved set < > : " | ? * \ /
 * - control characters 0x00-0x1F
 * - DEL and the C1/NBSP range 0x7F-0xA0
 */
const FORBIDDEN = new Set(['<', '>', ':', '"', '|', '?', '*', '\\', '/']);

const REPLACEMENT = '_';

export function isForbiddenChar(ch: string): boolean {
  if (FORBIDDEN.has(ch)) return true;
  const code = ch.charCodeAt(0);
  return code < 32 || (code >= 127 && code <= 160);
}

export function replaceForbiddenChars(node: string): string {
  let out = '';
  for (const ch of node) {
    out += isForbiddenChar(ch) ? REPLACEMENT : ch;
  }
  return out;
}
