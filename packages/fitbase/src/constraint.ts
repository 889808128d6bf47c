/**
 * Constraints
 *
 * A Constraint records that a parameter follows an equation. It is owned
 * by exactly one organizer, which creates it with `constrain` and destroys
 * it with `unconstrain`.
 */

import type { Literal, Value } from "@paramfit/core";
import type { Parameter } from "./Parameter.js";

export class Constraint {
  readonly par: Parameter;
  readonly eq: Literal;
  private _active = false;

  constructor(par: Parameter, eq: Literal) {
    this.par = par;
    this.eq = eq;
  }

  get active(): boolean {
    return this._active;
  }

  /**
   * Bind the parameter to the equation
   *
   * @throws ConstraintConflictError if the parameter cannot be constrained
   */
  apply(): void {
    if (this._active) return;
    this.par.constrain(this.eq);
    this._active = true;
  }

  /**
   * Bring the parameter's stored value up to date with the equation
   */
  update(): Value {
    return this.par.getValue();
  }

  /**
   * Release the parameter, keeping its last value
   */
  unconstrain(): void {
    if (!this._active) return;
    this.par.unconstrain();
    this._active = false;
  }
}

/**
 * Constrain a parameter to an equation
 */
export function constrain(par: Parameter, eq: Literal): Constraint {
  const constraint = new Constraint(par, eq);
  constraint.apply();
  return constraint;
}
