/**
 * Tests for constraints
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Argument, ConstraintConflictError, Operator, multiply, resetClocks } from "@paramfit/core";
import { Constraint, constrain } from "./constraint.js";
import { Parameter } from "./Parameter.js";

describe("Constraint", () => {
  let p: Parameter;
  let q: Parameter;
  let eq: Operator;

  beforeEach(() => {
    resetClocks();
    p = new Parameter("p");
    q = new Parameter("q", 10);
    eq = new Operator(multiply, { args: [new Argument({ value: 2, const: true }), q] });
  });

  it("should bind a parameter to an equation", () => {
    const constraint = constrain(p, eq);
    expect(constraint.active).toBe(true);
    expect(constraint.par).toBe(p);
    expect(constraint.eq).toBe(eq);
    expect(p.constraint).toBe(eq);
    expect(p.getValue()).toBe(20);
  });

  it("should update the parameter from the equation", () => {
    const constraint = constrain(p, eq);
    q.setValue(3);
    expect(constraint.update()).toBe(6);
    expect(p.getValue()).toBe(6);
  });

  it("should release the parameter on unconstrain", () => {
    const constraint = constrain(p, eq);
    constraint.unconstrain();
    expect(constraint.active).toBe(false);
    expect(p.constrained).toBe(false);
    expect(p.getValue()).toBe(20);

    constraint.unconstrain();
    expect(p.getValue()).toBe(20);
  });

  it("should stay inactive when the parameter cannot be constrained", () => {
    constrain(p, eq);
    const second = new Constraint(p, eq);
    expect(() => second.apply()).toThrow(ConstraintConflictError);
    expect(second.active).toBe(false);
  });
});
