import type { Clock } from '../clock/clock.js';
import type { Literal } from './types.js';
import type { Value } from './value.js';

/**
 * Value of any literal
 *
 * A generator is updated first, on behalf of `observer` (default: the
 * generator's own clock).
 */
export function evaluate(literal: Literal, observer?: Clock): Value {
  if (literal.kind === 'generator') {
    literal.update(observer);
  }
  return literal.getValue();
}
