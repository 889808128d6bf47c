/**
 * Visitor Framework
 *
 * A visitor is a traversal dispatched per literal kind. Literals identify
 * themselves to a visitor (`literal.identify(visitor)`), and `identify`
 * below does the same dispatch as an exhaustive match over the closed set
 * of kinds, so adding a kind fails to compile until every traversal handles
 * it.
 */

import type { ArgumentNode, Literal } from '../literals/types.js';
import type { Operator } from '../literals/Operator.js';
import type { Generator } from '../literals/Generator.js';

export interface Visitor<R> {
  onArgument(arg: ArgumentNode): R;
  onOperator(op: Operator): R;
  /**
   * Called after the generator has been updated; otherwise handled like a
   * leaf
   */
  onGenerator(gen: Generator): R;
}

/**
 * Visitor whose handlers are unimplemented until overridden
 */
export abstract class BaseVisitor<R> implements Visitor<R> {
  onArgument(_arg: ArgumentNode): R {
    throw new Error(`${this.constructor.name} does not handle arguments`);
  }

  onOperator(_op: Operator): R {
    throw new Error(`${this.constructor.name} does not handle operators`);
  }

  onGenerator(_gen: Generator): R {
    throw new Error(`${this.constructor.name} does not handle generators`);
  }
}

/**
 * Dispatch a literal to the matching visitor handler
 */
export function identify<R>(literal: Literal, visitor: Visitor<R>): R {
  switch (literal.kind) {
    case 'argument':
      return visitor.onArgument(literal);
    case 'operator':
      return visitor.onOperator(literal);
    case 'generator':
      literal.update();
      return visitor.onGenerator(literal);
    default: {
      const unreachable: never = literal;
      throw new Error(`Unknown literal kind: ${String(unreachable)}`);
    }
  }
}
