/**
 * Parses a non-negative integer flag value; undefined when the flag was not
 * given.
 */
export function parseCount(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`${flag} must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(trimmed, 10);
}
