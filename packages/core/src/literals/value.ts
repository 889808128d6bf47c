/**
 * Leaf values and elementwise arithmetic
 *
 * A value is either a scalar or a homogeneous numeric array. Binary
 * operations broadcast a scalar against an array; two arrays must have the
 * same length.
 */

export type Value = number | Float64Array;

export function isArrayValue(value: Value): value is Float64Array {
  return value instanceof Float64Array;
}

/**
 * Apply `fn` to every element of a value
 */
export function mapValue(value: Value, fn: (x: number) => number): Value {
  if (typeof value === 'number') return fn(value);
  return value.map(fn);
}

/**
 * Apply `fn` elementwise to two values, broadcasting scalars
 */
export function zipValues(a: Value, b: Value, fn: (x: number, y: number) => number): Value {
  if (typeof a === 'number' && typeof b === 'number') {
    return fn(a, b);
  }
  if (typeof a === 'number') {
    return mapValue(b, (y) => fn(a, y));
  }
  if (typeof b === 'number') {
    return a.map((x) => fn(x, b));
  }
  if (a.length !== b.length) {
    throw new RangeError(`Shape mismatch: cannot combine arrays of length ${a.length} and ${b.length}`);
  }
  return a.map((x, i) => fn(x, b[i]));
}

/**
 * Narrow a value to a scalar
 */
export function requireScalar(value: Value, what: string): number {
  if (typeof value !== 'number') {
    throw new TypeError(`${what} must be a scalar, got an array of length ${value.length}`);
  }
  return value;
}

/**
 * Render a value for display
 */
export function formatValue(value: Value): string {
  if (typeof value === 'number') return String(value);
  return `[${Array.from(value).join(`, `)}]`;
}
