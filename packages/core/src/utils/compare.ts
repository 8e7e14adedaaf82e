/**
 * Value comparison utilities shared by change detection and collection helpers
 */

function bothNaN(a: unknown, b: unknown): boolean {
  return typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b);
}

function isObjectLike(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null;
}

/**
 * Deep value equality.
 *
 * Dates compare by timestamp, arrays element-wise, maps by entry, sets by
 * member, and objects by prototype and own enumerable keys regardless of key
 * order. Map keys match by identity. null and undefined are distinct.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b || bothNaN(a, b)) return true;
  if (a == null || b == null) return false;

  if (a instanceof Date || b instanceof Date) {
    if (!(a instanceof Date && b instanceof Date)) return false;
    const [ta, tb] = [a.getTime(), b.getTime()];
    return ta === tb || bothNaN(ta, tb);
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!(Array.isArray(a) && Array.isArray(b))) return false;
    if (a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map && b instanceof Map) || a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !valuesEqual(value, b.get(key))) return false;
    }
    return true;
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set && b instanceof Set) || a.size !== b.size) return false;
    // Members are matched one-to-one so structurally equal members count once.
    const unmatched: unknown[] = Array.from(b);
    for (const member of a) {
      const index = unmatched.findIndex((candidate) => valuesEqual(member, candidate));
      if (index === -1) return false;
      unmatched.splice(index, 1);
    }
    return true;
  }

  if (isObjectLike(a) && isObjectLike(b)) {
    if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every(
      (key) => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key])
    );
  }

  return false;
}

/**
 * Sort comparator for field values. Absent values sort first.
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a == null || b == null) {
    if (a == null && b == null) return 0;
    return a == null ? -1 : 1;
  }

  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }

  return String(a).localeCompare(String(b));
}

/**
 * Case-insensitive substring match on the string form of a value.
 * Absent and empty values never match.
 */
export function containsText(value: unknown, needle: string): boolean {
  if (value == null) return false;
  const text = String(value);
  return text.length > 0 && text.toLowerCase().includes(needle.toLowerCase());
}
