/**
 * Math Helper Utilities
 *
 * Arithmetic used by the aggregators. Every helper is total: empty input and
 * zero denominators produce a default instead of NaN or Infinity.
 */

/**
 * Average of an array of numbers, or `defaultValue` when the array is empty
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])   // => 2
 * safeAverage([])          // => 0
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * `part / whole * 100`, or 0 when `whole` is 0
 *
 * @example
 * ```typescript
 * safePercent(3, 4)   // => 75
 * safePercent(3, 0)   // => 0
 * ```
 */
export function safePercent(part: number, whole: number): number {
  if (whole === 0) {
    return 0;
  }
  return (part / whole) * 100;
}

/**
 * Coerce a possibly-missing byte count to a non-negative integer
 *
 * Undefined, null, NaN, Infinity and negative values become 0.
 */
export function toByteCount(value: number | null | undefined): number {
  if (value === null || value === undefined || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.floor(value);
}

/**
 * Difference between two readings of a monotonically increasing counter
 *
 * Returns 0 when the counter went backwards (device reset, wrap-around).
 */
export function counterDelta(current: number, previous: number): number {
  const delta = current - previous;
  return delta > 0 ? delta : 0;
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'] as const;

/**
 * Format a byte count with binary (1024) steps and two decimals
 *
 * @example
 * ```typescript
 * formatBytes(0)          // => '0.00 B'
 * formatBytes(1536)       // => '1.50 KB'
 * formatBytes(1073741824) // => '1.00 GB'
 * ```
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${SIZE_UNITS[unit]}`;
}
