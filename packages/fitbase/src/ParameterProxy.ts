/**
 * ParameterProxy - another name for an existing Parameter
 *
 * A proxy owns no value and no clock: every read and write goes to the
 * target, and operators built over the proxy observe the target's clock.
 * Two proxies with different names may share one target.
 */

import type { ArgumentNode, Clock, Literal, Value, Visitor } from "@paramfit/core";
import type { Bounds, Parameter } from "./Parameter.js";
import { parseIdentifier } from "./schemas.js";

export class ParameterProxy implements ArgumentNode {
  readonly kind = "argument" as const;
  readonly name: string;
  readonly target: Parameter;

  constructor(name: string, target: Parameter) {
    this.name = parseIdentifier(name, "proxy");
    this.target = target;
  }

  get clock(): Clock {
    return this.target.clock;
  }

  get const(): boolean {
    return this.target.const;
  }

  get value(): Value {
    return this.target.getValue();
  }

  set value(value: Value) {
    this.target.setValue(value);
  }

  getValue(): Value {
    return this.target.getValue();
  }

  setValue(value: Value): void {
    this.target.setValue(value);
  }

  get bounds(): Bounds {
    return this.target.bounds;
  }

  setBounds(lower?: number, upper?: number): void {
    this.target.setBounds(lower, upper);
  }

  get constraint(): Literal | undefined {
    return this.target.constraint;
  }

  get constrained(): boolean {
    return this.target.constrained;
  }

  identify<R>(visitor: Visitor<R>): R {
    return visitor.onArgument(this);
  }

  toString(): string {
    return `ParameterProxy(${this.name})`;
  }
}
