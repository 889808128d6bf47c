/**
 * Argument - a named leaf holding a value
 *
 * Changing the value clicks the clock, which marks every operator that
 * (transitively) depends on this argument as stale. Constant arguments
 * reject changes.
 */

import { Clock, type ClockSource } from '../clock/clock.js';
import { ReadOnlyValueError } from '../errors.js';
import type { Visitor } from '../visitors/visitor.js';
import type { ArgumentNode } from './types.js';
import type { Value } from './value.js';

export interface ArgumentOptions {
  /** Display name (default: anonymous) */
  name?: string;
  /** Initial value (default: 0) */
  value?: Value;
  /** Whether the value is fixed (default: false) */
  const?: boolean;
  /** Stamp source for the clock (default: the global source) */
  clockSource?: ClockSource;
}

export class Argument implements ArgumentNode {
  readonly kind = 'argument' as const;
  readonly clock: Clock;
  name: string;
  private _const: boolean;
  private _value: Value;

  constructor(options: ArgumentOptions = {}) {
    this.clock = new Clock(options.clockSource);
    this.name = options.name ?? ``;
    this._const = options.const ?? false;
    this._value = options.value ?? 0;
    this.clock.click();
  }

  get const(): boolean {
    return this._const;
  }

  protected setConstFlag(flag: boolean): void {
    this._const = flag;
  }

  get value(): Value {
    return this.getValue();
  }

  set value(value: Value) {
    this.setValue(value);
  }

  getValue(): Value {
    return this.readValue();
  }

  /**
   * Replace the value
   *
   * Setting the identical value (or the same array object) is a no-op; call
   * `notify()` after mutating an array in place.
   */
  setValue(value: Value): void {
    if (this._const) {
      throw new ReadOnlyValueError(`The argument '${this.name}' is constant`);
    }
    this.storeValue(value);
  }

  /**
   * Announce a change that did not go through `setValue`
   */
  notify(): void {
    this.clock.click();
  }

  identify<R>(visitor: Visitor<R>): R {
    return visitor.onArgument(this);
  }

  toString(): string {
    return this.name ? `Argument(${this.name})` : `Argument(${String(this._value)})`;
  }

  /**
   * Store a value, clicking only when it differs from the current one
   */
  protected storeValue(value: Value): void {
    if (value === this.readValue()) return;
    this.writeValue(value);
    this.clock.click();
  }

  protected readValue(): Value {
    return this._value;
  }

  protected writeValue(value: Value): void {
    this._value = value;
  }
}
