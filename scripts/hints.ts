import { absurd } from 'effect';
import { ContradictionError } from './errors.ts';

/**
 * Tri-state role hint. Callers pass `true`, `false` or nothing; internally the
 * three cases are named so every decision over them is an exhaustive switch.
 */
export type RoleHint = 'unknown' | 'asserted' | 'denied';

export interface Roles {
  readonly isFile: RoleHint;
  readonly isRootOrDrive: RoleHint;
}

export function toHint(value: boolean | undefined): RoleHint {
  if (value === undefined) return 'unknown';
  return value ? 'asserted' : 'denied';
}

/**
 * A file is never a root or drive and vice versa, so asserting one denies the
 * other. Asserting both is a caller bug.
 */
export function resolveRoles(node: string, isFile: RoleHint, isRootOrDrive: RoleHint): Roles {
  switch (isFile) {
    case 'asserted':
      switch (isRootOrDrive) {
        case 'asserted':
          throw new ContradictionError({
            message: `Node '${node}' cannot be both a file and a root or drive`,
            node,
          });
        case 'unknown':
        case 'denied':
          return { isFile, isRootOrDrive: 'denied' };
        default:
          return absurd(isRootOrDrive);
      }
    case 'unknown':
      return { isFile: isRootOrDrive === 'asserted' ? 'denied' : 'unknown', isRootOrDrive };
    case 'denied':
      return { isFile, isRootOrDrive };
    default:
      return absurd(isFile);
  }
}

/** `.` and `..` survive as directory markers unless the node is known to be a file. */
export function keepsDotDirectory(isFile: RoleHint): boolean {
  switch (isFile) {
    case 'asserted':
      return false;
    case 'unknown':
    case 'denied':
      return true;
    default:
      return absurd(isFile);
  }
}
