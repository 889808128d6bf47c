/**
 * Literal Types
 *
 * Literals are the nodes of an equation graph. The set of node kinds is
 * closed: every literal is an argument (a leaf holding a value), an
 * operator (a function applied to child literals) or a generator (a leaf
 * that synthesizes another literal on demand).
 *
 * Graphs are DAGs: a leaf is commonly shared by many operators, and an
 * operator may itself be shared by several equations.
 */

import type { Clock } from '../clock/clock.js';
import type { Visitor } from '../visitors/visitor.js';
import type { Value } from './value.js';
import type { Operator } from './Operator.js';
import type { Generator } from './Generator.js';

/**
 * Type tag for literal kinds
 */
export type LiteralKind = 'argument' | 'operator' | 'generator';

/**
 * The leaf capability
 *
 * Implemented by plain arguments, parameters, and the proxies and wrappers
 * that stand in for parameters.
 */
export interface ArgumentNode {
  readonly kind: 'argument';
  /** Display name; empty for anonymous values such as numeric literals */
  readonly name: string;
  /** Whether the value is fixed */
  readonly const: boolean;
  readonly clock: Clock;
  /** The equation the value follows, for constrained leaves */
  readonly constraint?: Literal;
  /** The leaf this one is another name for, for aliases */
  readonly target?: ArgumentNode;
  getValue(): Value;
  setValue(value: Value): void;
  identify<R>(visitor: Visitor<R>): R;
}

/**
 * Union of all node kinds
 */
export type Literal = ArgumentNode | Operator | Generator;

/**
 * A name to literal binding table
 */
export type Namespace = Readonly<Record<string, Literal>>;
