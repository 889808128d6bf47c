/**
 * Validator - structural checks on a literal graph
 *
 * Detects:
 * - Missing or surplus positional children (per the operator's `nargs`)
 * - Missing required keyword children
 * - Keyword children the operator does not accept
 * - Cycles: an operator reachable from itself through its own children
 */

import type { ArgumentNode, Literal } from '../literals/types.js';
import type { Operator } from '../literals/Operator.js';
import type { Generator } from '../literals/Generator.js';
import { StructuralError } from '../errors.js';
import { prettyPrint } from './printer.js';
import { identify, type Visitor } from './visitor.js';

export interface ValidatorOptions {
  /** Report cycles (default: true) */
  detectCycles?: boolean;
}

export const DEFAULT_VALIDATOR_OPTIONS: Required<ValidatorOptions> = {
  detectCycles: true,
};

export class Validator implements Visitor<void> {
  readonly errors: string[] = [];
  private readonly options: Required<ValidatorOptions>;
  /** Nodes on the current traversal path */
  private readonly path = new Set<Operator | Generator>();
  /** Nodes already checked */
  private readonly done = new Set<Operator | Generator>();

  constructor(options?: ValidatorOptions) {
    this.options = {
      detectCycles: options?.detectCycles ?? DEFAULT_VALIDATOR_OPTIONS.detectCycles,
    };
  }

  onArgument(_arg: ArgumentNode): void {}

  onOperator(op: Operator): void {
    if (!this.enter(op)) return;

    const { nargs } = op.definition;
    const count = op.args.length;
    if (nargs >= 0 && count < nargs) {
      this.errors.push(`Missing arguments for '${op.name}': expected ${nargs}, got ${count}`);
    } else if (nargs >= 0 && count > nargs) {
      this.errors.push(`Too many arguments for '${op.name}': expected ${nargs}, got ${count}`);
    }

    const required = op.definition.requiredKeywords ?? [];
    for (const key of required) {
      if (!op.kwargs.has(key)) {
        this.errors.push(`Missing keyword '${key}' for '${op.name}'`);
      }
    }
    const accepted = new Set([...(op.definition.keywords ?? []), ...required]);
    for (const key of op.kwargs.keys()) {
      if (!accepted.has(key)) {
        this.errors.push(`Unexpected keyword '${key}' for '${op.name}'`);
      }
    }

    for (const child of op.children()) {
      identify(child, this);
    }
    this.leave(op);
  }

  onGenerator(gen: Generator): void {
    if (!this.enter(gen)) return;
    for (const dependency of gen.args) {
      identify(dependency, this);
    }
    if (gen.literal !== undefined) {
      identify(gen.literal, this);
    }
    this.leave(gen);
  }

  private enter(node: Operator | Generator): boolean {
    if (this.path.has(node)) {
      if (this.options.detectCycles) {
        this.errors.push(`Cycle detected: '${node.name}' is reachable from itself`);
      }
      return false;
    }
    if (this.done.has(node)) return false;
    this.path.add(node);
    return true;
  }

  private leave(node: Operator | Generator): void {
    this.path.delete(node);
    this.done.add(node);
  }
}

/**
 * Collect structural errors of a literal graph
 */
export function findErrors(literal: Literal, options?: ValidatorOptions): string[] {
  const validator = new Validator(options);
  identify(literal, validator);
  return validator.errors;
}

/**
 * Validate a literal graph
 *
 * @throws StructuralError listing every problem found
 */
export function validate(literal: Literal, options?: ValidatorOptions): void {
  const errors = findErrors(literal, options);
  if (errors.length > 0) {
    throw new StructuralError(errors, prettyPrint(literal));
  }
}
