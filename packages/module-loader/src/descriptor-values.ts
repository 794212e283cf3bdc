/**
 * Stepwise Module Loader - Descriptor Value Coercion
 *
 * Descriptor values arrive untyped. These helpers narrow them the same way
 * everywhere: scalars read as strings, booleans are only ever `true` when
 * the value is the boolean `true`, and lists keep only their string items.
 */

/**
 * Read a descriptor value as a string.
 * Strings pass through; numbers and booleans are stringified; anything else
 * (absent, null, lists, maps) reads as the empty string.
 */
export function descriptorString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/** `true` only for the boolean `true`. */
export function descriptorFlag(value: unknown): boolean {
  return value === true;
}

/** A finite number, or `fallback`. */
export function descriptorNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** The string items of a list; anything but a list reads as empty. */
export function descriptorStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}
