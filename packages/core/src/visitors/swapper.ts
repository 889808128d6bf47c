/**
 * Swapper - replace one literal with another throughout a graph
 *
 * Replacement happens in place, in the child slots of the operators (and
 * generators) that hold the old literal. Nodes are shared between graphs,
 * so rewriting an operator reachable from the traversal root changes every
 * other graph that holds that same operator. Graphs that reference the old
 * literal directly, through nodes the traversal does not reach, keep it.
 */

import type { ArgumentNode, Literal } from '../literals/types.js';
import type { Operator } from '../literals/Operator.js';
import type { Generator } from '../literals/Generator.js';
import { identify, type Visitor } from './visitor.js';

export class Swapper implements Visitor<void> {
  readonly oldLiteral: Literal;
  readonly newLiteral: Literal;
  /** Number of child slots rewritten */
  replaced: number = 0;
  private readonly visited = new Set<Operator | Generator>();

  constructor(oldLiteral: Literal, newLiteral: Literal) {
    this.oldLiteral = oldLiteral;
    this.newLiteral = newLiteral;
  }

  onArgument(_arg: ArgumentNode): void {}

  onOperator(op: Operator): void {
    if (this.visited.has(op)) return;
    this.visited.add(op);

    const args = [...op.args];
    args.forEach((child, index) => {
      if (child === this.oldLiteral) {
        op.replaceArg(index, this.newLiteral);
        this.replaced++;
      } else {
        identify(child, this);
      }
    });

    for (const [key, child] of [...op.kwargs]) {
      if (child === this.oldLiteral) {
        op.replaceKeyword(key, this.newLiteral);
        this.replaced++;
      } else {
        identify(child, this);
      }
    }
  }

  onGenerator(gen: Generator): void {
    if (this.visited.has(gen)) return;
    this.visited.add(gen);

    const args = [...gen.args];
    args.forEach((child, index) => {
      if (child === this.oldLiteral) {
        gen.replaceArg(index, this.newLiteral);
        this.replaced++;
      } else {
        identify(child, this);
      }
    });

    if (gen.literal === this.oldLiteral) {
      gen.replaceLiteral(this.newLiteral);
      this.replaced++;
    } else if (gen.literal !== undefined) {
      identify(gen.literal, this);
    }
  }
}

/**
 * Swap `oldLiteral` for `newLiteral` in the graph rooted at `root`
 *
 * Rewrites in place and returns `root`, except when `root` is `oldLiteral`
 * itself: nothing can be rewritten then, and the caller must use the
 * returned `newLiteral` as the new root.
 *
 * Every graph sharing a rewritten operator sees the change.
 */
export function swap(root: Literal, oldLiteral: Literal, newLiteral: Literal): Literal {
  if (root === oldLiteral) return newLiteral;
  identify(root, new Swapper(oldLiteral, newLiteral));
  return root;
}
