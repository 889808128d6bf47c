/**
 * Tests for arguments and cached operators
 */

import { describe, it, expect, beforeEach } from "vitest";
import { resetClocks } from "../clock/clock.js";
import { EvaluationError, ReadOnlyValueError } from "../errors.js";
import { Argument } from "./Argument.js";
import { Operator, type OperatorDefinition } from "./Operator.js";
import { add, multiply, negative, remainder, sum } from "./operators.js";
import type { Value } from "./value.js";
import { zipValues } from "./value.js";

/** An add definition that counts its evaluations */
function countingAdd(): { definition: OperatorDefinition; count: () => number } {
  let calls = 0;
  return {
    definition: {
      name: "countingAdd",
      nargs: 2,
      evaluate(args: readonly Value[]) {
        calls++;
        return zipValues(args[0], args[1], (x, y) => x + y);
      },
    },
    count: () => calls,
  };
}

describe("Argument", () => {
  beforeEach(() => {
    resetClocks();
  });

  it("should default to an anonymous zero", () => {
    const arg = new Argument();
    expect(arg.name).toBe("");
    expect(arg.getValue()).toBe(0);
    expect(arg.const).toBe(false);
  });

  it("should click its clock when the value changes", () => {
    const arg = new Argument({ name: "p", value: 1 });
    const before = arg.clock.state;
    arg.setValue(2);
    expect(arg.clock.state).toBeGreaterThan(before);
    expect(arg.value).toBe(2);
  });

  it("should not click when the same value is set", () => {
    const arg = new Argument({ name: "p", value: 1 });
    const before = arg.clock.state;
    arg.value = 1;
    expect(arg.clock.state).toBe(before);
  });

  it("should reject changes to a constant", () => {
    const arg = new Argument({ name: "c", value: 3, const: true });
    expect(() => arg.setValue(4)).toThrow(ReadOnlyValueError);
    expect(() => arg.setValue(4)).toThrow("The argument 'c' is constant");
    expect(arg.getValue()).toBe(3);
  });
});

describe("Operator", () => {
  beforeEach(() => {
    resetClocks();
  });

  it("should evaluate once and serve the cache afterwards", () => {
    const p1 = new Argument({ name: "p1", value: 1 });
    const p2 = new Argument({ name: "p2", value: 2 });
    const { definition, count } = countingAdd();
    const op = new Operator(definition, { args: [p1, p2] });

    expect(op.getValue()).toBe(3);
    expect(op.getValue()).toBe(3);
    expect(count()).toBe(1);
  });

  it("should recompute after a leaf changes", () => {
    const p1 = new Argument({ name: "p1", value: 1 });
    const p2 = new Argument({ name: "p2", value: 2 });
    const { definition, count } = countingAdd();
    const op = new Operator(definition, { args: [p1, p2] });

    op.getValue();
    p2.setValue(10);
    expect(op.getValue()).toBe(11);
    expect(count()).toBe(2);

    p1.setValue(1);
    expect(op.getValue()).toBe(11);
    expect(count()).toBe(2);
  });

  it("should only recompute the branch that changed", () => {
    const p1 = new Argument({ name: "p1", value: 1 });
    const p2 = new Argument({ name: "p2", value: 2 });
    const p3 = new Argument({ name: "p3", value: 4 });
    const inner = countingAdd();
    const outer = countingAdd();
    const sumOp = new Operator(inner.definition, { args: [p1, p2] });
    const root = new Operator(outer.definition, { args: [sumOp, p3] });

    expect(root.getValue()).toBe(7);
    p3.setValue(5);
    expect(root.getValue()).toBe(8);
    expect(inner.count()).toBe(1);
    expect(outer.count()).toBe(2);

    p1.setValue(2);
    expect(root.getValue()).toBe(9);
    expect(inner.count()).toBe(2);
    expect(outer.count()).toBe(3);
  });

  it("should become stale when a child is replaced", () => {
    const a = new Argument({ name: "a", value: 1 });
    const b = new Argument({ name: "b", value: 2 });
    const c = new Argument({ name: "c", value: 5 });
    const op = new Operator(add, { args: [a, b] });
    expect(op.getValue()).toBe(3);

    op.replaceArg(1, c);
    expect(op.getValue()).toBe(6);
    expect(op.clock.subjects.has(b.clock)).toBe(false);

    b.setValue(100);
    expect(op.clock.isStale()).toBe(false);
  });

  it("should keep a shared child subscribed when one slot is replaced", () => {
    const a = new Argument({ name: "a", value: 3 });
    const b = new Argument({ name: "b", value: 1 });
    const op = new Operator(multiply, { args: [a, a] });
    op.replaceArg(0, b);
    expect(op.clock.subjects.has(a.clock)).toBe(true);
    expect(op.getValue()).toBe(3);
  });

  it("should reject replacing a child that does not exist", () => {
    const op = new Operator(negative, { args: [new Argument()] });
    expect(() => op.replaceArg(1, new Argument())).toThrow(RangeError);
    expect(() => op.replaceKeyword("k", new Argument())).toThrow(
      "Operator 'negative' has no keyword child 'k'"
    );
  });

  it("should pass keyword children to the definition", () => {
    const scaled: OperatorDefinition = {
      name: "scaled",
      nargs: 1,
      keywords: ["factor"],
      evaluate(args, kwargs) {
        return zipValues(args[0], kwargs.factor ?? 1, (x, y) => x * y);
      },
    };
    const x = new Argument({ name: "x", value: 2 });
    const factor = new Argument({ name: "f", value: 3 });
    const op = new Operator(scaled, { args: [x], kwargs: { factor } });
    expect(op.getValue()).toBe(6);

    factor.setValue(4);
    expect(op.getValue()).toBe(8);
  });

  it("should wrap failures in an EvaluationError", () => {
    const failing: OperatorDefinition = {
      name: "failing",
      nargs: 0,
      evaluate() {
        throw new Error("boom");
      },
    };
    const op = new Operator(failing);
    expect(() => op.getValue()).toThrow(EvaluationError);
    expect(() => op.getValue()).toThrow("Evaluation of 'failing' failed: boom");
  });

  it("should report the innermost failing node", () => {
    const a = new Argument({ value: new Float64Array([1, 2]) });
    const b = new Argument({ value: new Float64Array([1, 2, 3]) });
    const inner = new Operator(add, { args: [a, b] });
    const outer = new Operator(negative, { args: [inner] });

    expect(() => outer.getValue()).toThrow(
      "Evaluation of 'add' failed: Shape mismatch: cannot combine arrays of length 2 and 3"
    );
  });
});

describe("built-in operators", () => {
  it("should broadcast scalars against arrays", () => {
    const values = new Argument({ value: new Float64Array([1, 2]) });
    const offset = new Argument({ value: 3 });
    const op = new Operator(add, { args: [values, offset] });
    expect(op.getValue()).toEqual(new Float64Array([4, 5]));
  });

  it("should take the divisor's sign for remainder", () => {
    expect(remainder.evaluate([-7, 3], {})).toBe(2);
    expect(remainder.evaluate([7, -3], {})).toBe(-2);
    expect(remainder.evaluate([7, 3], {})).toBe(1);
  });

  it("should sum array elements", () => {
    expect(sum.evaluate([new Float64Array([1, 2, 3])], {})).toBe(6);
    expect(sum.evaluate([4], {})).toBe(4);
  });

  it("should check the argument count", () => {
    expect(() => add.evaluate([1], {})).toThrow("add takes 2 arguments, got 1");
  });
});
