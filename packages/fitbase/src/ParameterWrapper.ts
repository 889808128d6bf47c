/**
 * ParameterWrapper - a Parameter whose value lives in another object
 *
 * The value is read and written through accessor functions, or through an
 * attribute of the wrapped object. Constrained values are written through
 * to the object as they are computed.
 */

import { ConfigurationError, type Value } from "@paramfit/core";
import { Parameter, type ParameterOptions } from "./Parameter.js";

export interface ParameterWrapperOptions<T extends object> extends ParameterOptions {
  /** Reads the value; receives `attr` when one is given */
  getter?: (obj: T, attr?: string) => Value;
  /** Writes the value; receives `attr` when one is given */
  setter?: (obj: T, value: Value, attr?: string) => void;
  /** Attribute of `obj` holding the value */
  attr?: string;
}

interface Access<T> {
  read(obj: T): Value;
  write(obj: T, value: Value): void;
}

function isValue(value: unknown): value is Value {
  return typeof value === "number" || value instanceof Float64Array;
}

function resolveAccess<T extends object>(options: ParameterWrapperOptions<T>): Access<T> {
  const { getter, setter, attr } = options;
  if ((getter === undefined) !== (setter === undefined)) {
    throw new ConfigurationError(`Specify both getter and setter, or neither`);
  }
  if (getter !== undefined && setter !== undefined) {
    return {
      read: (obj) => getter(obj, attr),
      write: (obj, value) => setter(obj, value, attr),
    };
  }
  if (attr === undefined) {
    throw new ConfigurationError(`Specify a getter and setter, or an attribute`);
  }
  return {
    read(obj) {
      const value: unknown = Reflect.get(obj, attr);
      if (!isValue(value)) {
        throw new TypeError(`Attribute '${attr}' does not hold a numeric value`);
      }
      return value;
    },
    write(obj, value) {
      if (!Reflect.set(obj, attr, value)) {
        throw new TypeError(`Attribute '${attr}' cannot be written`);
      }
    },
  };
}

export class ParameterWrapper<T extends object> extends Parameter {
  readonly obj: T;
  readonly attr: string | undefined;
  private readonly access: Access<T>;
  private lastSeen: Value;

  /**
   * @throws ConfigurationError when exactly one of getter and setter is
   *   given, or neither is given and there is no attribute
   */
  constructor(name: string, obj: T, options: ParameterWrapperOptions<T>) {
    const access = resolveAccess(options);
    const initial = access.read(obj);
    super(name, initial, options);
    this.obj = obj;
    this.attr = options.attr;
    this.access = access;
    this.lastSeen = initial;
  }

  /**
   * Pick up a change made to the wrapped object behind the wrapper's back
   *
   * @returns whether the value changed
   */
  refresh(): boolean {
    const current = this.access.read(this.obj);
    if (current === this.lastSeen) return false;
    this.lastSeen = current;
    this.notify();
    return true;
  }

  protected readValue(): Value {
    return this.access.read(this.obj);
  }

  protected writeValue(value: Value): void {
    this.access.write(this.obj, value);
    this.lastSeen = value;
  }
}
