/**
 * EquationBuilder - turn equation text into a bound literal graph
 *
 * The builder keeps a registry of named literals and functions. Building
 * parses the text, resolves every identifier against a one-shot namespace
 * and the registry, and only then creates operators, so a failed build
 * never leaves a partial graph behind. The same name always binds to the
 * same literal, which makes repeated names shared leaves of one DAG.
 */

import type { ClockSource } from '../clock/clock.js';
import {
  ConfigurationError,
  ConflictError,
  NameResolutionError,
} from '../errors.js';
import { Argument } from '../literals/Argument.js';
import { Operator, type OperatorDefinition } from '../literals/Operator.js';
import {
  BUILTIN_OPERATORS,
  add,
  subtract,
  multiply,
  divide,
  power,
  remainder,
  negative,
  defineOperator,
} from '../literals/operators.js';
import type { Literal, Namespace } from '../literals/types.js';
import type { Value } from '../literals/value.js';
import { validate } from '../visitors/validator.js';
import { parseEquation, type BinaryOperator, type Expression } from './parser.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const BINARY_DEFINITIONS: Record<BinaryOperator, OperatorDefinition> = {
  '+': add,
  '-': subtract,
  '*': multiply,
  '/': divide,
  '**': power,
  '%': remainder,
};

/**
 * A function usable in equations: a full definition, or a plain function
 * of values
 */
export type FunctionLike = OperatorDefinition | ((...args: Value[]) => Value);

export interface BuildOptions {
  /** Validate the built graph before returning it (default: true) */
  validate?: boolean;
}

export interface EquationBuilderOptions {
  /** Stamp source for the literals the builder creates */
  clockSource?: ClockSource;
}

/**
 * Whether a string can name an argument or function
 */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

export class EquationBuilder {
  private readonly registry = new Map<string, Literal>();
  private readonly functions = new Map<string, OperatorDefinition>(BUILTIN_OPERATORS);
  private readonly clockSource?: ClockSource;

  constructor(options: EquationBuilderOptions = {}) {
    this.clockSource = options.clockSource;
  }

  // ==========================================================================
  // Registry
  // ==========================================================================

  /**
   * Register a literal under a name
   *
   * Re-registering the same literal under the same name is a no-op.
   *
   * @throws ConflictError if the name is bound to a different literal
   */
  registerArgument(name: string, literal: Literal): void {
    if (!isIdentifier(name)) {
      throw new ConfigurationError(`'${name}' is not a valid identifier`);
    }
    const existing = this.registry.get(name);
    if (existing !== undefined && existing !== literal) {
      throw new ConflictError(name);
    }
    this.registry.set(name, literal);
  }

  /**
   * Register a function callable as `name(...)`
   *
   * Later registrations replace earlier ones, including built-ins.
   */
  registerFunction(name: string, fn: FunctionLike): void {
    if (!isIdentifier(name)) {
      throw new ConfigurationError(`'${name}' is not a valid identifier`);
    }
    this.functions.set(name, typeof fn === 'function' ? defineOperator(name, fn) : fn);
  }

  /**
   * Remove a registered argument or function
   */
  deregister(name: string): boolean {
    const removedArgument = this.registry.delete(name);
    const removedFunction = this.functions.delete(name);
    return removedArgument || removedFunction;
  }

  hasArgument(name: string): boolean {
    return this.registry.has(name);
  }

  getArgument(name: string): Literal | undefined {
    return this.registry.get(name);
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }

  /** Names of all registered arguments */
  get argumentNames(): string[] {
    return [...this.registry.keys()];
  }

  // ==========================================================================
  // Building
  // ==========================================================================

  /**
   * Build a literal graph from equation text
   *
   * @param text The equation, e.g. `2*p1 + sin(p2)`
   * @param namespace Extra bindings for this build only; they are not kept
   * @throws ParseError for malformed text
   * @throws ConflictError if the namespace rebinds a registered name to a
   *   different literal
   * @throws NameResolutionError listing every unresolved identifier
   * @throws StructuralError if the graph fails validation
   */
  build(text: string, namespace: Namespace = {}, options: BuildOptions = {}): Literal {
    const expression = parseEquation(text);

    for (const [name, literal] of Object.entries(namespace)) {
      const registered = this.registry.get(name);
      if (registered !== undefined && registered !== literal) {
        throw new ConflictError(
          name,
          `The namespace binds '${name}' to a different object than the registered one`
        );
      }
    }

    const unresolved = new Set<string>();
    this.collectUnresolved(expression, namespace, unresolved);
    if (unresolved.size > 0) {
      throw new NameResolutionError([...unresolved]);
    }

    const root = this.bind(expression, namespace);
    if (options.validate ?? true) {
      validate(root);
    }
    return root;
  }

  private lookup(name: string, namespace: Namespace): Literal | undefined {
    return Object.hasOwn(namespace, name) ? namespace[name] : this.registry.get(name);
  }

  private collectUnresolved(expression: Expression, namespace: Namespace, unresolved: Set<string>): void {
    switch (expression.kind) {
      case 'number':
        return;
      case 'name':
        if (this.lookup(expression.name, namespace) === undefined) {
          unresolved.add(expression.name);
        }
        return;
      case 'unary':
        this.collectUnresolved(expression.operand, namespace, unresolved);
        return;
      case 'binary':
        this.collectUnresolved(expression.left, namespace, unresolved);
        this.collectUnresolved(expression.right, namespace, unresolved);
        return;
      case 'call':
        if (!this.functions.has(expression.callee)) {
          unresolved.add(expression.callee);
        }
        for (const arg of expression.args) {
          this.collectUnresolved(arg, namespace, unresolved);
        }
        for (const [, arg] of expression.kwargs) {
          this.collectUnresolved(arg, namespace, unresolved);
        }
        return;
    }
  }

  private bind(expression: Expression, namespace: Namespace): Literal {
    const clockSource = this.clockSource;
    switch (expression.kind) {
      case 'number':
        return new Argument({ value: expression.value, const: true, clockSource });
      case 'name': {
        const literal = this.lookup(expression.name, namespace);
        if (literal === undefined) {
          throw new NameResolutionError([expression.name]);
        }
        return literal;
      }
      case 'unary':
        return new Operator(negative, {
          args: [this.bind(expression.operand, namespace)],
          clockSource,
        });
      case 'binary':
        return new Operator(BINARY_DEFINITIONS[expression.operator], {
          args: [this.bind(expression.left, namespace), this.bind(expression.right, namespace)],
          clockSource,
        });
      case 'call': {
        const definition = this.functions.get(expression.callee);
        if (definition === undefined) {
          throw new NameResolutionError([expression.callee]);
        }
        const kwargs: Record<string, Literal> = Object.fromEntries(
          expression.kwargs.map(([key, arg]) => [key, this.bind(arg, namespace)])
        );
        return new Operator(definition, {
          name: expression.callee,
          args: expression.args.map((arg) => this.bind(arg, namespace)),
          kwargs,
          clockSource,
        });
      }
    }
  }
}
