/**
 * Parameter - a bounded leaf that can be held constant or constrained
 *
 * A constrained parameter takes its value from an equation: reading it
 * re-evaluates the equation (cheaply, through the operator caches) and
 * stores the result, and writing it directly is rejected until the
 * constraint is removed again.
 */

import {
  Argument,
  ConstraintConflictError,
  contains,
  evaluate,
  prettyPrint,
  type ClockSource,
  type Literal,
  type Value,
} from "@paramfit/core";
import { parseBounds, parseParameterName } from "./schemas.js";

export type Bounds = readonly [lower: number, upper: number];

export interface ParameterOptions {
  /** Hold the value fixed (default: false) */
  const?: boolean;
  /** Bounds an optimizer may respect (default: unbounded) */
  bounds?: Bounds;
  clockSource?: ClockSource;
}

export class Parameter extends Argument {
  private _bounds: Bounds = [-Infinity, Infinity];
  private _constraint: Literal | undefined;

  /**
   * @param name Empty, or a valid identifier
   * @param value Initial value (default: 0)
   */
  constructor(name: string, value: Value = 0, options: ParameterOptions = {}) {
    super({
      name: parseParameterName(name),
      value,
      const: options.const,
      clockSource: options.clockSource,
    });
    if (options.bounds !== undefined) {
      this.setBounds(...options.bounds);
    }
  }

  // ==========================================================================
  // Bounds
  // ==========================================================================

  get bounds(): Bounds {
    return this._bounds;
  }

  setBounds(lower: number = -Infinity, upper: number = Infinity): void {
    this._bounds = parseBounds(lower, upper);
  }

  // ==========================================================================
  // Constraint
  // ==========================================================================

  /** The equation this parameter follows, if any */
  get constraint(): Literal | undefined {
    return this._constraint;
  }

  get constrained(): boolean {
    return this._constraint !== undefined;
  }

  /**
   * Make the value follow an equation
   *
   * The equation is evaluated once right away; if that fails the parameter
   * is left unconstrained and the error is rethrown.
   *
   * @throws ConstraintConflictError if the parameter is constant, already
   *   constrained, or part of the equation
   */
  constrain(eq: Literal): void {
    if (this.const) {
      throw new ConstraintConflictError(`The parameter '${this.name}' is constant`);
    }
    if (this._constraint !== undefined) {
      throw new ConstraintConflictError(`The parameter '${this.name}' is already constrained`);
    }
    if (contains(eq, this)) {
      throw new ConstraintConflictError(
        `The parameter '${this.name}' cannot follow '${prettyPrint(eq)}', which depends on it`
      );
    }

    this._constraint = eq;
    this.clock.addSubject(eq.clock);
    try {
      this.storeValue(evaluate(eq, this.clock));
    } catch (error) {
      this._constraint = undefined;
      this.clock.removeSubject(eq.clock);
      throw error;
    }
  }

  /**
   * Keep the last constrained value and accept direct writes again
   */
  unconstrain(): void {
    const eq = this._constraint;
    if (eq === undefined) return;
    const value = evaluate(eq, this.clock);
    this._constraint = undefined;
    this.clock.removeSubject(eq.clock);
    this.storeValue(value);
  }

  // ==========================================================================
  // Value
  // ==========================================================================

  getValue(): Value {
    const eq = this._constraint;
    if (eq !== undefined) {
      this.storeValue(evaluate(eq, this.clock));
    }
    return super.getValue();
  }

  /**
   * @throws ConstraintConflictError while constrained
   * @throws ReadOnlyValueError while constant
   */
  setValue(value: Value): void {
    this.assertUnconstrained();
    super.setValue(value);
  }

  /**
   * Hold the value fixed, or release it
   *
   * @param value Optional new value, applied before the flag changes
   */
  setConst(flag: boolean = true, value?: Value): void {
    if (value !== undefined) {
      this.assertUnconstrained();
      this.storeValue(value);
    }
    this.setConstFlag(flag);
  }

  toString(): string {
    return `Parameter(${this.name})`;
  }

  private assertUnconstrained(): void {
    if (this._constraint !== undefined) {
      throw new ConstraintConflictError(
        `The parameter '${this.name}' is constrained; unconstrain it before setting its value`
      );
    }
  }
}
