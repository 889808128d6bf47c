/**
 * Built-in Operator Definitions
 *
 * Arithmetic operators broadcast scalars against arrays. `remainder` follows
 * floored division: the result takes the sign of the divisor.
 */

import type { OperatorDefinition } from './Operator.js';
import type { Value } from './value.js';
import { mapValue, zipValues } from './value.js';

function expectArgs(name: string, args: readonly Value[], count: number): void {
  if (args.length !== count) {
    throw new TypeError(`${name} takes ${count} argument${count === 1 ? `` : `s`}, got ${args.length}`);
  }
}

function binary(
  name: string,
  symbol: string | undefined,
  fn: (x: number, y: number) => number
): OperatorDefinition {
  return {
    name,
    nargs: 2,
    symbol,
    notation: symbol === undefined ? 'call' : 'infix',
    evaluate(args) {
      expectArgs(name, args, 2);
      return zipValues(args[0], args[1], fn);
    },
  };
}

function unary(name: string, fn: (x: number) => number, symbol?: string): OperatorDefinition {
  return {
    name,
    nargs: 1,
    symbol,
    notation: symbol === undefined ? 'call' : 'prefix',
    evaluate(args) {
      expectArgs(name, args, 1);
      return mapValue(args[0], fn);
    },
  };
}

// ============================================================================
// Arithmetic
// ============================================================================

export const add = binary('add', '+', (x, y) => x + y);
export const subtract = binary('subtract', '-', (x, y) => x - y);
export const multiply = binary('multiply', '*', (x, y) => x * y);
export const divide = binary('divide', '/', (x, y) => x / y);
export const power = binary('power', '**', (x, y) => x ** y);
export const remainder = binary('remainder', undefined, (x, y) => x - y * Math.floor(x / y));
export const negative = unary('negative', (x) => -x, '-');

// ============================================================================
// Functions
// ============================================================================

export const abs = unary('abs', Math.abs);
export const sqrt = unary('sqrt', Math.sqrt);
export const exp = unary('exp', Math.exp);
export const log = unary('log', Math.log);
export const sin = unary('sin', Math.sin);
export const cos = unary('cos', Math.cos);
export const tan = unary('tan', Math.tan);
export const maximum = binary('maximum', undefined, Math.max);
export const minimum = binary('minimum', undefined, Math.min);

/**
 * Sum of all elements (a scalar sums to itself)
 */
export const sum: OperatorDefinition = {
  name: 'sum',
  nargs: 1,
  notation: 'call',
  evaluate(args) {
    expectArgs('sum', args, 1);
    const value = args[0];
    if (typeof value === 'number') return value;
    return value.reduce((total, x) => total + x, 0);
  },
};

/**
 * Every built-in definition, keyed by the name used in equation text
 */
export const BUILTIN_OPERATORS: ReadonlyMap<string, OperatorDefinition> = new Map(
  [
    add, subtract, multiply, divide, power, remainder, negative,
    abs, sqrt, exp, log, sin, cos, tan, maximum, minimum, sum,
  ].map((definition) => [definition.name, definition])
);

/**
 * Wrap a plain function of scalars/arrays as an operator definition
 *
 * Functions declared with rest parameters (length 0) accept any number of
 * positional arguments.
 */
export function defineOperator(
  name: string,
  fn: (...args: Value[]) => Value
): OperatorDefinition {
  const nargs = fn.length === 0 ? -1 : fn.length;
  return {
    name,
    nargs,
    notation: 'call',
    evaluate(args) {
      if (nargs >= 0) expectArgs(name, args, nargs);
      return fn(...args);
    },
  };
}
