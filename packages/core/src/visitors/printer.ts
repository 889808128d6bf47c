/**
 * Printer - render a literal graph as equation text
 *
 * - Named arguments print their name; anonymous ones (and names starting
 *   with `_`) print their value
 * - Infix operators print `left symbol right`, prefix operators `symbol arg`
 * - Everything else prints as `name(arg, ..., kw=val, ...)`
 *
 * Each operator's rendering is parenthesized unless it is already enclosed
 * in a single pair of parentheses.
 */

import type { ArgumentNode, Literal } from '../literals/types.js';
import type { Operator } from '../literals/Operator.js';
import type { Generator } from '../literals/Generator.js';
import { formatValue } from '../literals/value.js';
import { identify, type Visitor } from './visitor.js';

export class Printer implements Visitor<string> {
  private readonly path = new Set<Operator>();

  onArgument(arg: ArgumentNode): string {
    if (!arg.name || arg.name.startsWith('_')) {
      return formatValue(arg.getValue());
    }
    return arg.name;
  }

  onOperator(op: Operator): string {
    if (this.path.has(op)) {
      return `${op.name}(...)`;
    }
    this.path.add(op);
    try {
      return this.render(op);
    } finally {
      this.path.delete(op);
    }
  }

  onGenerator(gen: Generator): string {
    if (gen.name) return gen.name;
    if (gen.literal !== undefined) return identify(gen.literal, this);
    return `generator`;
  }

  private render(op: Operator): string {
    const { symbol, notation } = op.definition;
    const args = op.args;

    if (notation === 'infix' && symbol !== undefined && args.length === 2 && op.kwargs.size === 0) {
      return enclose(`${identify(args[0], this)} ${symbol} ${identify(args[1], this)}`);
    }
    if (notation === 'prefix' && symbol !== undefined && args.length === 1 && op.kwargs.size === 0) {
      return enclose(`${symbol}${identify(args[0], this)}`);
    }

    const parts = args.map((arg) => identify(arg, this));
    for (const [key, child] of op.kwargs) {
      parts.push(`${key}=${identify(child, this)}`);
    }
    return op.name + enclose(parts.join(`, `));
  }
}

/**
 * Wrap in parentheses unless the whole text already is one parenthesized
 * group
 */
function enclose(text: string): string {
  return isEnclosed(text) ? text : `(${text})`;
}

function isEnclosed(text: string): boolean {
  if (!text.startsWith(`(`) || !text.endsWith(`)`)) return false;
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === `(`) depth++;
    else if (text[i] === `)`) depth--;
    if (depth === 0 && i < text.length - 1) return false;
  }
  return true;
}

/**
 * Render a literal graph as text
 */
export function prettyPrint(literal: Literal): string {
  return identify(literal, new Printer());
}
