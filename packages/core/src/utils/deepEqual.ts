/**
 * Narrows a value to a plain string-keyed object (not null, not an array).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural equality over JSON-shaped values: null, booleans, numbers, strings,
 * arrays (ordered) and string-keyed objects (unordered keys).
 *
 * @example
 * ```typescript
 * deepEqual({ roles: ['user'] }, { roles: ['user'] }); // true
 * deepEqual(['a', 'b'], ['b', 'a']); // false
 * ```
 */
export function deepEqual(left: unknown, right: unknown): boolean {
  if (left === right) {
    return true;
  }
  if (Array.isArray(left)) {
    return (
      Array.isArray(right) &&
      left.length === right.length &&
      left.every((item, index) => deepEqual(item, right[index]))
    );
  }
  if (isRecord(left)) {
    if (!isRecord(right)) {
      return false;
    }
    const keys = Object.keys(left);
    return (
      keys.length === Object.keys(right).length &&
      keys.every((key) => Object.hasOwn(right, key) && deepEqual(left[key], right[key]))
    );
  }
  return false;
}
