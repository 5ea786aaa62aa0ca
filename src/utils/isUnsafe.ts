/**
 * Checks whether a value is unusable in arithmetic: not a number, NaN or infinite.
 *
 * @example
 * ```typescript
 * isUnsafe(42) // false
 * isUnsafe(null) // true
 * isUnsafe(NaN) // true
 * ```
 */
export const isUnsafe = (value: unknown): boolean => {
  if (typeof value !== "number") {
    return true;
  }
  if (isNaN(value)) {
    return true;
  }
  if (!isFinite(value)) {
    return true;
  }
  return false;
};

/**
 * Narrows a possibly missing number to a finite number or `null`.
 */
export const toSafe = (value: number | null | undefined): number | null =>
  typeof value === "number" && isFinite(value) ? value : null;

export default isUnsafe;
