/**
 * NodeFinder - check whether a literal occurs in a graph
 *
 * The search also passes through a leaf's constraint and the target of an
 * alias, so a parameter is found in any equation whose value depends on it.
 */

import type { ArgumentNode, Literal } from '../literals/types.js';
import type { Operator } from '../literals/Operator.js';
import type { Generator } from '../literals/Generator.js';
import { identify, type Visitor } from './visitor.js';

export class NodeFinder implements Visitor<void> {
  found: boolean = false;
  private readonly target: Literal;
  private readonly visited = new Set<Literal>();

  constructor(target: Literal) {
    this.target = target;
  }

  onArgument(arg: ArgumentNode): void {
    if (arg === this.target) this.found = true;
    if (this.found || this.visited.has(arg)) return;
    this.visited.add(arg);
    if (arg.target !== undefined) {
      identify(arg.target, this);
    }
    if (!this.found && arg.constraint !== undefined) {
      identify(arg.constraint, this);
    }
  }

  onOperator(op: Operator): void {
    if (op === this.target) this.found = true;
    if (this.found || this.visited.has(op)) return;
    this.visited.add(op);
    for (const child of op.children()) {
      identify(child, this);
      if (this.found) return;
    }
  }

  onGenerator(gen: Generator): void {
    if (gen === this.target) this.found = true;
    if (this.found || this.visited.has(gen)) return;
    this.visited.add(gen);
    const reachable = gen.literal === undefined ? gen.args : [...gen.args, gen.literal];
    for (const child of reachable) {
      identify(child, this);
      if (this.found) return;
    }
  }
}

/**
 * Whether `node` is `root` or reachable from it
 */
export function contains(root: Literal, node: Literal): boolean {
  const finder = new NodeFinder(node);
  identify(root, finder);
  return finder.found;
}
