/**
 * Tests for generators
 */

import { describe, it, expect, beforeEach } from "vitest";
import { resetClocks } from "../clock/clock.js";
import { EvaluationError } from "../errors.js";
import { Argument } from "./Argument.js";
import { Generator, regenerateWhenStale, type GeneratorOptions } from "./Generator.js";
import { Operator } from "./Operator.js";
import { add } from "./operators.js";
import { evaluate } from "./evaluate.js";
import { requireScalar } from "./value.js";

/** Generates a constant holding twice its source */
class Doubler extends Generator {
  generations = 0;
  private readonly source: Argument;

  constructor(source: Argument, options?: GeneratorOptions) {
    super(options);
    this.source = source;
    this.addLiteral(source);
  }

  generate(): void {
    this.generations++;
    const value = requireScalar(this.source.getValue(), "source");
    this.setLiteral(new Argument({ value: value * 2, const: true }));
  }
}

describe("Generator", () => {
  beforeEach(() => {
    resetClocks();
  });

  it("should fail to evaluate before anything is generated", () => {
    const gen = new Doubler(new Argument({ value: 1 }), { name: "twice" });
    expect(() => gen.getValue()).toThrow(EvaluationError);
    expect(() => gen.getValue()).toThrow("Evaluation of 'twice' failed: nothing has been generated");
  });

  it("should generate on evaluate", () => {
    const gen = new Doubler(new Argument({ value: 4 }));
    expect(evaluate(gen)).toBe(8);
    expect(gen.generations).toBe(1);
  });

  it("should be updated by the operator that consumes it", () => {
    const source = new Argument({ name: "s", value: 3 });
    const one = new Argument({ value: 1, const: true });
    const gen = new Doubler(source);
    const op = new Operator(add, { args: [gen, one] });

    expect(op.getValue()).toBe(7);
    source.setValue(5);
    expect(op.getValue()).toBe(11);
  });

  it("should skip regeneration for an up-to-date observer", () => {
    const source = new Argument({ name: "s", value: 3 });
    const gen = new Doubler(source, { policy: regenerateWhenStale });
    const op = new Operator(add, { args: [gen, new Argument({ value: 0 })] });

    op.getValue();
    expect(gen.generations).toBe(1);

    gen.update(op.clock);
    expect(gen.generations).toBe(1);

    source.setValue(4);
    expect(op.getValue()).toBe(8);
    expect(gen.generations).toBe(2);
  });

  it("should regenerate on every update by default", () => {
    const gen = new Doubler(new Argument({ value: 1 }));
    gen.update();
    gen.update();
    expect(gen.generations).toBe(2);
  });
});
