// Windows device names; matched case-insensitively, with or without an extension.
const DEVICE_NAMES: ReadonlySet<string> = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9',
]);

// FAT adds these, and forbids them even with an extension.
const FAT_DEVICE_NAMES: ReadonlySet<string> = new Set([
  ...DEVICE_NAMES,
  '$IDLE$', 'CONFIG$', 'KEYBD$', 'SCREEN$', 'CLOCK$', 'LST',
]);

function reservedNames(fat: boolean): ReadonlySet<string> {
  return fat ? FAT_DEVICE_NAMES : DEVICE_NAMES;
}

export function isReservedName(name: string, fat = false): boolean {
  return reservedNames(fat).has(name.toUpperCase());
}

/**
 * Splits `name` into stem and extension at the last dot.
 * Leading dots never start an extension, so `.bashrc` has none.
 */
export function splitExtension(name: string): [stem: string, ext: string] {
  const dot = name.lastIndexOf('.');
  if (dot <= 0) return [name, ''];
  let lead = 0;
  while (lead < name.length && name[lead] === '.') lead++;
  if (dot < lead) return [name, ''];
  return [name.slice(0, dot), name.slice(dot)];
}

export const wrap = (s: string): string => `_${s}_`;

/**
 * Wraps a reserved device name so it can no longer address the device:
 * `NUL` → `_NUL_`, `nul.txt` → `_nul_.txt`.
 */
export function guardReservedName(node: string, fat = false): string {
  if (isReservedName(node, fat)) return wrap(node);
  const [stem, ext] = splitExtension(node);
  if (ext && isReservedName(stem, fat)) return wrap(stem) + ext;
  return node;
}
