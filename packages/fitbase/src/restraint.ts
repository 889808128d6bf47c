/**
 * Restraints
 *
 * A restraint is a soft bound on the value of an equation. Its penalty is
 * zero inside [lb, ub] and grows linearly outside, scaled by 1/sigma:
 *
 *   penalty = max(0, lb - v, v - ub) / sigma
 *
 * Bounds and sigma are numbers or literals. Literals are read each time the
 * penalty is computed, so a bound can track another parameter.
 */

import {
  EvaluationError,
  RestraintDomainError,
  evaluate,
  prettyPrint,
  requireScalar,
  type Literal,
} from "@paramfit/core";
import { parseRestraintOptions, type RestraintBound, type RestraintOptions } from "./schemas.js";

export type { RestraintBound, RestraintOptions } from "./schemas.js";
export { DEFAULT_RESTRAINT_OPTIONS } from "./schemas.js";

export class Restraint {
  readonly eq: Literal;
  readonly lb: RestraintBound;
  readonly ub: RestraintBound;
  readonly sigma: RestraintBound;

  /**
   * @throws RestraintDomainError for a zero or non-finite sigma, or bounds
   *   that are neither numbers nor literals
   */
  constructor(eq: Literal, options: RestraintOptions = {}) {
    const { lb, ub, sigma } = parseRestraintOptions(options);
    this.eq = eq;
    this.lb = lb;
    this.ub = ub;
    this.sigma = sigma;
  }

  /**
   * Penalty for the equation's current value
   *
   * @throws EvaluationError if the equation or a literal bound does not
   *   evaluate to a scalar, or a literal sigma evaluates to zero
   */
  penalty(): number {
    const v = scalarOf(this.eq, `The restrained value`);
    const lb = boundValue(this.lb, `The lower bound`);
    const ub = boundValue(this.ub, `The upper bound`);
    const sigma = boundValue(this.sigma, `sigma`);
    if (sigma === 0) {
      throw new EvaluationError(formatBound(this.sigma), new RestraintDomainError(`sigma must be non-zero`));
    }
    return Math.max(0, lb - v, v - ub) / sigma;
  }

  toString(): string {
    const lb = formatBound(this.lb);
    const ub = formatBound(this.ub);
    return `Restraint(${lb} <= ${prettyPrint(this.eq)} <= ${ub}, sigma=${formatBound(this.sigma)})`;
  }
}

function scalarOf(literal: Literal, what: string): number {
  const value = evaluate(literal);
  try {
    return requireScalar(value, what);
  } catch (error) {
    throw new EvaluationError(prettyPrint(literal), error);
  }
}

function boundValue(bound: RestraintBound, what: string): number {
  return typeof bound === "number" ? bound : scalarOf(bound, what);
}

function formatBound(bound: RestraintBound): string {
  return typeof bound === "number" ? String(bound) : prettyPrint(bound);
}

/**
 * Restrain an equation between bounds
 *
 * @param ub Upper bound (default: `lb`, pinning the value)
 * @param sigma Scale of the penalty (default: 1)
 */
export function restrain(
  eq: Literal,
  lb: RestraintBound,
  ub: RestraintBound = lb,
  sigma: RestraintBound = 1
): Restraint {
  return new Restraint(eq, { lb, ub, sigma });
}

/**
 * Sum of the penalties of a set of restraints
 */
export function totalPenalty(restraints: Iterable<Restraint>): number {
  let total = 0;
  for (const restraint of restraints) {
    total += restraint.penalty();
  }
  return total;
}
