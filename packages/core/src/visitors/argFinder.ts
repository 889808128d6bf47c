/**
 * ArgFinder - collect the leaves of a literal graph
 */

import type { ArgumentNode, Literal } from '../literals/types.js';
import type { Operator } from '../literals/Operator.js';
import type { Generator } from '../literals/Generator.js';
import { identify, type Visitor } from './visitor.js';

export interface ArgFinderOptions {
  /** Include constant arguments (default: true) */
  getConsts?: boolean;
  /** Also search the equations that constrained leaves follow (default: false) */
  followConstraints?: boolean;
  /** Keep only the leaves this accepts; the search still passes through the rest */
  filter?: (arg: ArgumentNode) => boolean;
}

/**
 * Depth-first search for arguments
 *
 * Shared references collapse to one entry. A generator contributes the
 * arguments of its declared dependencies.
 */
export class ArgFinder implements Visitor<void> {
  readonly args = new Set<ArgumentNode>();
  private readonly getConsts: boolean;
  private readonly followConstraints: boolean;
  private readonly filter?: (arg: ArgumentNode) => boolean;
  private readonly visited = new Set<Literal>();

  constructor(options: ArgFinderOptions = {}) {
    this.getConsts = options.getConsts ?? true;
    this.followConstraints = options.followConstraints ?? false;
    this.filter = options.filter;
  }

  onArgument(arg: ArgumentNode): void {
    if (this.visited.has(arg)) return;
    this.visited.add(arg);
    if ((this.getConsts || !arg.const) && (this.filter === undefined || this.filter(arg))) {
      this.args.add(arg);
    }
    if (this.followConstraints && arg.constraint !== undefined) {
      identify(arg.constraint, this);
    }
  }

  onOperator(op: Operator): void {
    if (this.visited.has(op)) return;
    this.visited.add(op);
    for (const child of op.children()) {
      identify(child, this);
    }
  }

  onGenerator(gen: Generator): void {
    if (this.visited.has(gen)) return;
    this.visited.add(gen);
    for (const dependency of gen.args) {
      identify(dependency, this);
    }
  }
}

/**
 * Get the arguments of a literal graph, in depth-first order
 */
export function getArgs(literal: Literal, options?: ArgFinderOptions): Set<ArgumentNode> {
  const finder = new ArgFinder(options);
  identify(literal, finder);
  return finder.args;
}
