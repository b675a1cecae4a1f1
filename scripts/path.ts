import { Effect, absurd } from 'effect';
import { isBareDrive, isDriveRoot, isRoot } from './drive-root.ts';
import { UnsupportedPathError, type PathSanitizeError } from './errors.ts';
import { attempt, sanitizeNode } from './sanitize.ts';

export type Flavor = 'posix' | 'windows';

export type WarnSink = (message: string) => void;

export interface PathOptions {
  /** Role of the last node: `true` for a file, `false` for a directory. */
  readonly isFile?: boolean;
  readonly fat?: boolean;
  readonly trim?: boolean;
  /** `true` warns through `console.warn`; a function receives the message instead. */
  readonly warn?: boolean | WarnSink;
  /** Separator style of the result. Defaults to `posix`. */
  readonly flavor?: Flavor;
}

export type NodesOptions = Omit<PathOptions, 'warn'>;

const LONG_UNC_PREFIX = '\\\\?';
const FIRST_NODE_MARKERS = new Set(['', '.', '..']);
const TRAILING_NODES = new Set(['', '.']);

export const separatorOf = (flavor: Flavor): string => (flavor === 'windows' ? '\\' : '/');

/**
 * Sanitizes each node of an already-split path. The first node may be a root
 * or drive; an empty, `.` or `..` first node becomes a marker ending in the
 * separator (`/`, `./`, `../`). Later empty and `.` nodes are dropped.
 * Every node but the last is a directory.
 */
export function sanitizeNodes(nodes: readonly string[], options: NodesOptions = {}): string[] {
  const { isFile, fat, trim, flavor = 'posix' } = options;
  const last = nodes.length - 1;
  const out: string[] = [];
  nodes.forEach((node, i) => {
    const stripped = node.trim();
    if (i === 0 && FIRST_NODE_MARKERS.has(stripped)) {
      out.push(stripped + separatorOf(flavor));
      return;
    }
    if (stripped === '' || stripped === '.') return;
    out.push(
      sanitizeNode(node, {
        isFile: i < last ? false : isFile,
        isRootOrDrive: i === 0 ? undefined : false,
        fat,
        trim,
      }),
    );
  });
  return out;
}

type Head = 'root' | 'drive' | 'current' | 'parent' | 'node';

function classifyHead(head: string): Head {
  if (isRoot(head)) return 'root';
  if (isDriveRoot(head)) return 'drive';
  if (head === './' || head === '.\\') return 'current';
  if (head === '../' || head === '..\\') return 'parent';
  return 'node';
}

function joinByHead(nodes: readonly string[], flavor: Flavor): string {
  const sep = separatorOf(flavor);
  const [head, ...rest] = nodes;
  const tail = rest.join(sep);
  const kind = classifyHead(head);
  switch (kind) {
    case 'root':
      return sep + tail;
    case 'drive': {
      const drive = head.slice(0, 2);
      if (flavor === 'windows') return drive + sep + tail;
      return tail ? `/${drive}/${tail}` : `/${drive}`;
    }
    case 'current':
      return tail || '.';
    case 'parent':
      return tail ? `..${sep}${tail}` : '..';
    case 'node':
      return nodes.join(sep);
    default:
      return absurd(kind);
  }
}

/**
 * Joins sanitized nodes. A drive renders as `C:\x` for windows and `/C:/x` for posix.
 * With `trailing`, a last `..` or drive keeps its separator (`abc/../`, `/C:/`)
 * so a second pass still reads it as a directory.
 */
export function joinNodes(nodes: readonly string[], flavor: Flavor = 'posix', trailing = false): string {
  if (nodes.length === 0) return '.';
  const sep = separatorOf(flavor);
  const joined = joinByHead(nodes, flavor);
  // a lone `..` is a marker on the next pass whatever its role
  if (!trailing || joined.endsWith(sep) || joined === '..') return joined;
  const last = nodes[nodes.length - 1];
  return last === '..' || isDriveRoot(last) ? joined + sep : joined;
}

/**
 * Splits on both `/` and `\` whatever the host. `/C:/x` is read as the drive
 * path `C:\x`, unless the drive is the last node of a file path: a file is
 * never a drive, so `/C:` keeps its root.
 */
export function splitPath(path: string, isFile?: boolean): string[] {
  const bits = path.trim().split(/[\\/]/);
  if (bits.length < 2 || bits[0].trim() !== '' || !isBareDrive(bits[1].trim())) return bits;
  if (isFile === true && bits.length === 2) return bits;
  return bits.slice(1);
}

// `abc/` and `abc/.` both mark the last real node as a directory
const endsInSeparator = (bits: readonly string[]): boolean =>
  bits.length > 1 && TRAILING_NODES.has(bits[bits.length - 1].trim());

function sanitizeQuietly(path: string, options: NodesOptions): string {
  if (path.trimStart().startsWith(LONG_UNC_PREFIX)) {
    throw new UnsupportedPathError({
      message: `Long UNC Windows paths (\\\\? prefix) are not supported (path '${path}')`,
      path,
    });
  }
  const bits = splitPath(path, options.isFile);
  return joinNodes(sanitizeNodes(bits, options), options.flavor, endsInSeparator(bits));
}

const changeMessage = (from: string, to: string): string => `Sanitized path ${from} → ${to}`;

function resolveSink(warn: PathOptions['warn']): WarnSink | undefined {
  if (typeof warn === 'function') return warn;
  return warn ? (message) => console.warn(message) : undefined;
}

/**
 * Sanitizes a whole path for POSIX and Windows/NTFS (and FAT with `fat`).
 * The result depends only on the input and options, never on the host:
 * - `abc\./22` → `abc/22`
 * - `C:\abc\22` → `/C:/abc/22` (posix) or `C:\abc\22` (windows)
 * - `abc\NUL` → `abc/_NUL_`
 *
 * Throws {@link UnsupportedPathError} for `\\?\` paths, plus whatever
 * {@link sanitizeNode} throws.
 */
export function sanitizePath(path: string, options: PathOptions = {}): string {
  const sanitized = sanitizeQuietly(path, options);
  const sink = resolveSink(options.warn);
  if (sink && sanitized !== path) sink(changeMessage(path, sanitized));
  return sanitized;
}

/** Like {@link sanitizePath}; `warn: true` logs through `Effect.logWarning`. */
export const sanitizePathEffect = (
  path: string,
  options: PathOptions = {},
): Effect.Effect<string, PathSanitizeError> =>
  attempt(() => sanitizeQuietly(path, options)).pipe(
    Effect.tap((sanitized) => {
      if (sanitized === path) return Effect.void;
      const { warn } = options;
      if (typeof warn === 'function') return Effect.sync(() => warn(changeMessage(path, sanitized)));
      return warn ? Effect.logWarning(changeMessage(path, sanitized)) : Effect.void;
    }),
  );
