/**
 * Generator - a leaf that synthesizes another literal
 *
 * Some quantities are awkward to express with arguments and operators alone.
 * A generator owns a literal (`literal`) that it creates or refreshes in
 * `generate`, and lists auxiliary literals (`args`) it depends on. The
 * auxiliary literals take part in change propagation and argument
 * discovery, but they are never evaluated through the generator.
 *
 * When regeneration is warranted is not decided here. Each generator carries
 * a RegenerationPolicy; the default lets every update reach `generate`, and
 * subclasses decide inside `generate` whether to act.
 */

import { Clock, type ClockSource } from '../clock/clock.js';
import { EvaluationError } from '../errors.js';
import type { Visitor } from '../visitors/visitor.js';
import type { Literal } from './types.js';
import type { Value } from './value.js';

/**
 * Decides whether `generate` runs for a given observer
 */
export type RegenerationPolicy = (generator: Generator, observer: Clock) => boolean;

/**
 * Pass every update through to `generate`
 */
export const alwaysRegenerate: RegenerationPolicy = () => true;

/**
 * Regenerate only when the observer has not seen the generator's latest
 * change
 */
export const regenerateWhenStale: RegenerationPolicy = (generator, observer) =>
  !observer.hasObserved(generator.clock);

export interface GeneratorOptions {
  name?: string;
  policy?: RegenerationPolicy;
  clockSource?: ClockSource;
}

export abstract class Generator {
  readonly kind = 'generator' as const;
  readonly clock: Clock;
  name: string;
  policy: RegenerationPolicy;
  private _literal: Literal | undefined;
  private readonly _args: Literal[] = [];

  constructor(options: GeneratorOptions = {}) {
    this.clock = new Clock(options.clockSource);
    this.name = options.name ?? ``;
    this.policy = options.policy ?? alwaysRegenerate;
  }

  /** The generated literal, once there is one */
  get literal(): Literal | undefined {
    return this._literal;
  }

  /** Auxiliary dependencies */
  get args(): readonly Literal[] {
    return this._args;
  }

  /**
   * Declare a dependency on another literal
   */
  addLiteral(literal: Literal): void {
    this._args.push(literal);
    this.clock.addSubject(literal.clock);
  }

  /**
   * Replace an auxiliary dependency (used by graph rewriting)
   */
  replaceArg(index: number, literal: Literal): void {
    if (index < 0 || index >= this._args.length) {
      throw new RangeError(`Generator '${this.name}' has no dependency ${index}`);
    }
    const previous = this._args[index];
    this._args[index] = literal;
    if (!this._args.includes(previous) && previous !== this._literal) {
      this.clock.removeSubject(previous.clock);
    }
    this.clock.addSubject(literal.clock);
    this.clock.invalidate();
  }

  /**
   * Install the generated literal
   */
  protected setLiteral(literal: Literal): void {
    if (literal === this._literal) return;
    const previous = this._literal;
    this._literal = literal;
    if (previous !== undefined && !this._args.includes(previous)) {
      this.clock.removeSubject(previous.clock);
    }
    this.clock.addSubject(literal.clock);
    this.clock.click();
  }

  /**
   * Swap the generated literal from outside (graph rewriting)
   */
  replaceLiteral(literal: Literal): void {
    this.setLiteral(literal);
  }

  /**
   * Run the regeneration policy and, if it agrees, `generate`
   */
  update(observer: Clock = this.clock): void {
    if (this.policy(this, observer)) {
      this.generate(observer);
    }
  }

  /**
   * Create or refresh `literal`
   *
   * @param observer The clock of whoever is about to consume the literal.
   *   Subclasses may compare it with their own inputs to skip work.
   */
  abstract generate(observer: Clock): void;

  /**
   * Value of the generated literal
   */
  getValue(): Value {
    const literal = this._literal;
    if (literal === undefined) {
      throw new EvaluationError(this.name || `generator`, new Error(`nothing has been generated`));
    }
    return literal.getValue();
  }

  get value(): Value {
    return this.getValue();
  }

  /**
   * Identify to a visitor, updating first
   */
  identify<R>(visitor: Visitor<R>): R {
    this.update();
    return visitor.onGenerator(this);
  }

  toString(): string {
    return this.name ? `Generator(${this.name})` : `Generator`;
  }
}
