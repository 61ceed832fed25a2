/**
 * GUID rendering shared by the binary and JSON decoders.
 */

const GUID_HEX_PATTERN = /^[0-9a-f]{32}$/;

function insertDashes(hex: string): string {
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * Renders four 32-bit words (A, B, C, D) as `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx`.
 */
export function formatGuid(words: readonly [number, number, number, number]): string {
  const hex: string = words.map((word: number) => (word >>> 0).toString(16).padStart(8, '0')).join('');
  return insertDashes(hex);
}

/**
 * Normalizes a GUID written with or without dashes/braces, in any case.
 * @returns the canonical lowercase form, or undefined when the input is not 32 hex digits
 */
export function canonicalizeGuid(value: string): string | undefined {
  const hex: string = value.replace(/[{}-]/g, '').toLowerCase();
  if (!GUID_HEX_PATTERN.test(hex)) {
    return undefined;
  }
  return insertDashes(hex);
}
