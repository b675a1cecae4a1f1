import { Effect, absurd } from 'effect';
import { replaceForbiddenChars } from './char-filter.ts';
import { detectDriveRoot } from './drive-root.ts';
import { ContradictionError, isPathSanitizeError, type PathSanitizeError } from './errors.ts';
import { keepsDotDirectory, resolveRoles, toHint, type RoleHint } from './hints.ts';
import { MAX_NODE_LENGTH, enforceLength, nodeLength } from './length.ts';
import { guardReservedName, wrap } from './reserved-names.ts';
import { isDotDirectory, trimTrailing } from './trailing.ts';

export interface NodeOptions {
  /** `true` for a file, `false` for a directory, omitted when unknown. */
  readonly isFile?: boolean;
  /** `true` if the node is known to be `/` or a drive such as `C:\`. */
  readonly isRootOrDrive?: boolean;
  /** Also reject the device names FAT reserves. */
  readonly fat?: boolean;
  /** Truncate nodes over the length limit instead of failing. */
  readonly trim?: boolean;
}

// `...` or `. .` mean nothing on either platform; `.` and `..` are directory markers.
function isAmbiguousDots(node: string): boolean {
  const bare = node.replaceAll(' ', '');
  return bare !== '' && /^\.+$/.test(bare) && !isDotDirectory(node);
}

function finishNode(node: string, isFile: RoleHint, fat: boolean): string {
  let bit = node;
  if (isAmbiguousDots(bit)) bit = wrap(bit);
  bit = replaceForbiddenChars(bit);
  bit = guardReservedName(bit, fat);
  if (bit.trim() === '') bit = wrap(bit);
  if (isDotDirectory(bit) && keepsDotDirectory(isFile)) return bit;
  // trimming can expose a reserved stem: `nul.txt.` → `nul.txt`
  return guardReservedName(trimTrailing(bit), fat);
}

/**
 * Sanitizes a single path node so it is legal on POSIX and Windows alike.
 * For example:
 * - `plums;and/or;apples` → `plums;and_or;apples`
 * - `nul.txt` → `_nul_.txt`
 * - `abc. ` → `abc`
 * - `c:` → `C:\` (unless `isRootOrDrive` is `false`, then `c_`)
 *
 * Host-independent: `C:\` comes back as `C:\` on every platform.
 * Throws {@link ContradictionError} for inconsistent hints and
 * {@link LengthExceededError} for over-long nodes without `trim`.
 */
export function sanitizeNode(text: string, options: NodeOptions = {}): string {
  const { fat = false, trim = false } = options;
  const roles = resolveRoles(text, toHint(options.isFile), toHint(options.isRootOrDrive));
  const bit = text.trim();

  switch (roles.isRootOrDrive) {
    case 'denied':
      break;
    case 'unknown':
    case 'asserted': {
      const root = detectDriveRoot(bit);
      if (root !== undefined) return root;
      if (roles.isRootOrDrive === 'asserted') {
        throw new ContradictionError({
          message: `Node '${bit}' is not the root or a drive letter`,
          node: text,
        });
      }
      break;
    }
    default:
      return absurd(roles.isRootOrDrive);
  }

  let out = finishNode(bit, roles.isFile, fat);
  // re-finish after truncation: the cut can leave a trailing dot or expose a stem
  for (let limit = MAX_NODE_LENGTH; nodeLength(out) > MAX_NODE_LENGTH; limit--) {
    out = finishNode(enforceLength(out, text, trim, limit), roles.isFile, fat);
  }
  return out;
}

/** Runs `f`, turning sanitizer errors into typed failures and anything else into a defect. */
export const attempt = <A>(f: () => A): Effect.Effect<A, PathSanitizeError> =>
  Effect.suspend((): Effect.Effect<A, PathSanitizeError> => {
    try {
      return Effect.succeed(f());
    } catch (e) {
      return isPathSanitizeError(e) ? Effect.fail(e) : Effect.die(e);
    }
  });

export const sanitizeNodeEffect = (text: string, options: NodeOptions = {}) =>
  attempt(() => sanitizeNode(text, options));
