/**
 * Key ordering shared by store implementations
 */

const NUMERIC_KEY = /^\d+$/;

/**
 * Compare two keys: numeric keys by value, everything else lexically.
 * Numeric keys sort before non-numeric ones.
 */
export function compareKeys(a: string, b: string): number {
  const aNumeric = NUMERIC_KEY.test(a);
  const bNumeric = NUMERIC_KEY.test(b);

  if (aNumeric && bNumeric) {
    const diff = BigInt(a) - BigInt(b);
    if (diff !== 0n) {
      return diff < 0n ? -1 : 1;
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (aNumeric) return -1;
  if (bNumeric) return 1;

  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort keys and take the first page
 */
export function sortKeys(keys: Iterable<string>, descending: boolean, pageSize: number): string[] {
  const sorted = Array.from(keys).sort(compareKeys);
  if (descending) {
    sorted.reverse();
  }
  return sorted.slice(0, Math.max(0, pageSize));
}
