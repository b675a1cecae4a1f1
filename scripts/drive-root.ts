const DRIVE = /^([A-Za-z]):\\?$/;
const BARE_DRIVE = /^[A-Za-z]:$/;
const DRIVE_ROOT = /^[A-Z]:\\$/;

export const isRoot = (node: string): boolean => node === '/' || node === '\\';

/** `C:` (any case), as it appears after a POSIX root in `/C:/Users`. */
export const isBareDrive = (node: string): boolean => BARE_DRIVE.test(node);

/** A normalized drive root such as `C:\`. */
export const isDriveRoot = (node: string): boolean => DRIVE_ROOT.test(node);

/**
 * Recognizes `/`, `\` and drive letters. Drives always get the trailing
 * backslash: `C:\x` is absolute on Windows, `C:x` is relative to the drive's cwd.
 */
export function detectDriveRoot(node: string): string | undefined {
  if (isRoot(node)) return node;
  const m = DRIVE.exec(node);
  if (m === null) return undefined;
  return `${m[1].toUpperCase()}:\\`;
}
