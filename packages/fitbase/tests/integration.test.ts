/**
 * End-to-end tests: organizers, builders and the evaluation engine together
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Operator, getArgs, prettyPrint, resetClocks, type OperatorDefinition, type Value } from "@paramfit/core";
import { Organizer, ParameterProxy } from "../src/index.js";

describe("fitting workflow", () => {
  beforeEach(() => {
    resetClocks();
  });

  it("should build and re-evaluate equations over organizer parameters", () => {
    const m = new Organizer("model");
    const p1 = m.newParameter("p1", 1);
    const p2 = m.newParameter("p2", 2);

    const eq = m.builder.build("p1+p2");
    expect(eq.getValue()).toBe(3);

    p2.setValue(10);
    expect(eq.getValue()).toBe(11);
    expect(getArgs(eq)).toEqual(new Set([p1, p2]));
  });

  it("should recompute only what an optimizer step touched", () => {
    let calls = 0;
    const gaussian: OperatorDefinition = {
      name: "gaussian",
      nargs: 1,
      keywords: ["width"],
      requiredKeywords: ["width"],
      evaluate(args, kwargs): Value {
        calls++;
        const x = args[0];
        const width = kwargs.width;
        if (typeof x !== "number" || typeof width !== "number") {
          throw new TypeError("gaussian takes scalars");
        }
        return Math.exp(-(x * x) / (2 * width * width));
      },
    };

    const m = new Organizer("model");
    m.registerFunction("gaussian", gaussian);
    const x = m.newParameter("x", 0);
    const width = m.newParameter("width", 1);
    const scale = m.newParameter("scale", 2);

    const model = m.builder.build("scale * gaussian(x, width=width)");
    expect(prettyPrint(model)).toBe("(scale * gaussian(x, width=width))");
    expect(model.getValue()).toBe(2);
    expect(calls).toBe(1);

    scale.setValue(3);
    expect(model.getValue()).toBe(3);
    expect(calls).toBe(1);

    x.setValue(1);
    width.setValue(1);
    expect(model.getValue()).toBeCloseTo(3 * Math.exp(-0.5));
    expect(calls).toBe(2);
  });

  it("should hand an optimizer the free parameters and the restraint penalty", () => {
    const recipe = new Organizer("recipe");
    const phase = new Organizer("phase");
    recipe.addOrganizer(phase);

    const a = phase.newParameter("a", 4);
    const b = phase.newParameter("b", 4);
    const c = phase.newParameter("c", 6);
    phase.constrain(b, "a");
    phase.restrain("c", { lb: 0, ub: 5, sigma: 0.5 });
    const lattice = recipe.addParameter(new ParameterProxy("lat", a));

    const free = recipe.getFreeParameters();
    expect(free).toEqual([a, c]);
    expect(recipe.getPenalty()).toBe(2);

    lattice.setValue(7);
    c.setValue(5);
    expect(b.getValue()).toBe(7);
    expect(recipe.getPenalty()).toBe(0);
    expect(recipe.clock.geq(a.clock)).toBe(true);
  });

  it("should keep constrained values current inside larger equations", () => {
    const m = new Organizer("model");
    const q = m.newParameter("q", 1);
    const p = m.newParameter("p", 0);
    m.constrain(p, "2*q");

    const total = m.builder.build("p + q");
    expect(total.getValue()).toBe(3);

    q.setValue(10);
    expect(total.getValue()).toBe(30);
    expect(total).toBeInstanceOf(Operator);
  });
});
