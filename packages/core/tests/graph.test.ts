/**
 * Cross-module tests: equations built from text, evaluated, inspected and
 * rewritten
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  Argument,
  EquationBuilder,
  Operator,
  add,
  getArgs,
  multiply,
  negative,
  prettyPrint,
  resetClocks,
  subtract,
  swap,
} from "../src/index.js";

describe("equation graphs", () => {
  beforeEach(() => {
    resetClocks();
  });

  it("should evaluate, re-evaluate and report the leaves of a built equation", () => {
    const builder = new EquationBuilder();
    const p1 = new Argument({ name: "p1", value: 1 });
    const p2 = new Argument({ name: "p2", value: 2 });
    builder.registerArgument("p1", p1);
    builder.registerArgument("p2", p2);

    const eq = builder.build("p1 + p2");
    expect(eq.getValue()).toBe(3);

    p2.setValue(10);
    expect(eq.getValue()).toBe(11);
    expect(eq.clock.geq(p2.clock)).toBe(true);
    expect(getArgs(eq)).toEqual(new Set([p1, p2]));
  });

  it("should print a built equation back as equivalent text", () => {
    const builder = new EquationBuilder();
    for (const name of ["a", "b", "c"]) {
      builder.registerArgument(name, new Argument({ name, value: 1 }));
    }
    expect(prettyPrint(builder.build("-(a + b) * c ** 2"))).toBe("((-(a + b)) * (c ** 2))");
  });

  describe("swapping a shared operator", () => {
    const x = new Argument({ name: "x", value: 2 });
    const y = new Argument({ name: "y", value: 3 });
    const z = new Argument({ name: "z", value: 1 });
    const w = new Argument({ name: "w", value: 1 });
    const two = new Argument({ value: 2, const: true });

    it("should rewrite the shared parent for every graph holding it", () => {
      const a = new Operator(multiply, { args: [x, y] });
      const parent = new Operator(add, { args: [a, z] });
      const t1 = new Operator(negative, { args: [parent] });
      const t2 = new Operator(multiply, { args: [parent, two] });
      const t3 = new Operator(subtract, { args: [a, w] });
      expect(t1.getValue()).toBe(-7);
      expect(t2.getValue()).toBe(14);
      expect(t3.getValue()).toBe(5);

      const b = new Argument({ name: "b", value: 100 });
      expect(swap(t1, a, b)).toBe(t1);

      expect(t1.getValue()).toBe(-101);
      expect(t2.getValue()).toBe(202);
      expect(prettyPrint(t2)).toBe("((b + z) * 2)");

      expect(t3.getValue()).toBe(5);
      expect(prettyPrint(t3)).toBe("((x * y) - w)");
      expect(a.args).toEqual([x, y]);
      expect(a.getValue()).toBe(6);
    });
  });
});
