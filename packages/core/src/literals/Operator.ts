/**
 * Operator - an interior node applying a function to child literals
 *
 * An operator caches its last result. Its clock depends on the clocks of all
 * of its children, so a change anywhere below makes it stale; a stale
 * operator recomputes on the next read, otherwise the cached value is
 * returned without touching the children.
 */

import { Clock, type ClockSource } from '../clock/clock.js';
import { EvaluationError } from '../errors.js';
import type { Visitor } from '../visitors/visitor.js';
import type { Literal } from './types.js';
import type { Value } from './value.js';

// ============================================================================
// Operator Definitions
// ============================================================================

/**
 * How an operator is written in equation text
 */
export type OperatorNotation = 'infix' | 'prefix' | 'call';

/**
 * A pure evaluation function plus the shape of its inputs
 */
export interface OperatorDefinition {
  /** Function name, e.g. `add` or `sin` */
  readonly name: string;
  /** Number of positional arguments, or -1 for any number */
  readonly nargs: number;
  /** Keyword arguments the function accepts */
  readonly keywords?: readonly string[];
  /** Keyword arguments the function cannot do without */
  readonly requiredKeywords?: readonly string[];
  /** Operator symbol for infix and prefix notation */
  readonly symbol?: string;
  /** Rendering (default: call) */
  readonly notation?: OperatorNotation;
  /**
   * Compute the result
   *
   * Checking argument count and shapes is this function's job; it should
   * throw when they do not fit.
   */
  evaluate(args: readonly Value[], kwargs: Readonly<Record<string, Value>>): Value;
}

export interface OperatorOptions {
  /** Display name (default: the definition's name) */
  name?: string;
  /** Positional children */
  args?: readonly Literal[];
  /** Keyword children */
  kwargs?: Readonly<Record<string, Literal>>;
  /** Stamp source for the clock (default: the global source) */
  clockSource?: ClockSource;
}

// ============================================================================
// Operator
// ============================================================================

export class Operator {
  readonly kind = 'operator' as const;
  readonly clock: Clock;
  readonly definition: OperatorDefinition;
  name: string;
  private readonly _args: Literal[] = [];
  private readonly _kwargs = new Map<string, Literal>();
  private _cache: { value: Value } | undefined;

  constructor(definition: OperatorDefinition, options: OperatorOptions = {}) {
    this.definition = definition;
    this.clock = new Clock(options.clockSource);
    this.name = options.name ?? definition.name;
    for (const arg of options.args ?? []) {
      this.addLiteral(arg);
    }
    for (const [key, literal] of Object.entries(options.kwargs ?? {})) {
      this.setKeyword(key, literal);
    }
  }

  /** Positional children in order */
  get args(): readonly Literal[] {
    return this._args;
  }

  /** Keyword children in insertion order */
  get kwargs(): ReadonlyMap<string, Literal> {
    return this._kwargs;
  }

  /**
   * All children, positional first
   */
  children(): Literal[] {
    return [...this._args, ...this._kwargs.values()];
  }

  /**
   * Append a positional child
   */
  addLiteral(literal: Literal): void {
    this._args.push(literal);
    this.attach(literal);
  }

  /**
   * Bind a keyword child, replacing any previous binding of that keyword
   */
  setKeyword(key: string, literal: Literal): void {
    const previous = this._kwargs.get(key);
    this._kwargs.set(key, literal);
    if (previous !== undefined) this.detach(previous);
    this.attach(literal);
  }

  /**
   * Replace the positional child at `index`
   */
  replaceArg(index: number, literal: Literal): void {
    if (index < 0 || index >= this._args.length) {
      throw new RangeError(`Operator '${this.name}' has no positional child ${index}`);
    }
    const previous = this._args[index];
    this._args[index] = literal;
    this.detach(previous);
    this.attach(literal);
  }

  /**
   * Replace an existing keyword child
   */
  replaceKeyword(key: string, literal: Literal): void {
    if (!this._kwargs.has(key)) {
      throw new RangeError(`Operator '${this.name}' has no keyword child '${key}'`);
    }
    this.setKeyword(key, literal);
  }

  get value(): Value {
    return this.getValue();
  }

  /**
   * Evaluate, recomputing only when a child changed since the last run
   */
  getValue(): Value {
    if (this._cache !== undefined && !this.clock.isStale()) {
      return this._cache.value;
    }

    const args = this._args.map((child) => this.evaluateChild(child));
    // own keys only: `__proto__` is an ordinary keyword here
    const kwargs: Record<string, Value> = Object.fromEntries(
      [...this._kwargs].map(([key, child]) => [key, this.evaluateChild(child)])
    );

    let value: Value;
    try {
      value = this.definition.evaluate(args, kwargs);
    } catch (error) {
      throw new EvaluationError(this.name, error);
    }

    this._cache = { value };
    this.clock.click();
    return value;
  }

  identify<R>(visitor: Visitor<R>): R {
    return visitor.onOperator(this);
  }

  toString(): string {
    return `Operator(${this.name})`;
  }

  private evaluateChild(child: Literal): Value {
    if (child.kind === 'generator') {
      child.update(this.clock);
    }
    return child.getValue();
  }

  private attach(literal: Literal): void {
    this.clock.addSubject(literal.clock);
    this.clock.invalidate();
  }

  private detach(literal: Literal): void {
    if (!this.children().includes(literal)) {
      this.clock.removeSubject(literal.clock);
    }
  }
}
