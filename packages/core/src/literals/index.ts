/**
 * Literals Module
 *
 * The node model of equation graphs:
 * - Argument: named leaf values
 * - Operator: function application over child literals, with caching
 * - Generator: leaves that synthesize another literal on demand
 * - Built-in operator definitions
 */

export type { LiteralKind, ArgumentNode, Literal, Namespace } from './types.js';

export type { Value } from './value.js';
export { isArrayValue, mapValue, zipValues, requireScalar, formatValue } from './value.js';

export type { ArgumentOptions } from './Argument.js';
export { Argument } from './Argument.js';

export type { OperatorDefinition, OperatorNotation, OperatorOptions } from './Operator.js';
export { Operator } from './Operator.js';

export type { GeneratorOptions, RegenerationPolicy } from './Generator.js';
export { Generator, alwaysRegenerate, regenerateWhenStale } from './Generator.js';

export { evaluate } from './evaluate.js';

export {
  add,
  subtract,
  multiply,
  divide,
  power,
  remainder,
  negative,
  abs,
  sqrt,
  exp,
  log,
  sin,
  cos,
  tan,
  maximum,
  minimum,
  sum,
  BUILTIN_OPERATORS,
  defineOperator,
} from './operators.js';
