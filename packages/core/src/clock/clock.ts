/**
 * Logical Clock
 *
 * Every node in an equation graph owns a Clock. A clock carries two stamps:
 *
 * - `state`: the stamp of its own last `click()`
 * - `horizon`: the newest stamp it has seen, either its own or one produced
 *   by a clock it depends on (a "subject")
 *
 * Stamps come from a ClockSource and only ever increase. When a clock
 * clicks, the new stamp is pushed to every observer (and their observers),
 * so `horizon` is always current and staleness checks never walk the graph.
 *
 * A node whose `state` is behind its `horizon` has a subject that changed
 * after the node last synchronized, i.e. its cached value is stale.
 */

// ============================================================================
// ClockSource
// ============================================================================

/**
 * Monotonic stamp counter shared by a set of clocks
 *
 * One source normally serves a whole fitting session. Tests and independent
 * sessions can create their own, or reset the global one between runs.
 */
export class ClockSource {
  private _count: number = 0;

  /**
   * Issue a stamp greater than any previously issued one
   */
  next(): number {
    return ++this._count;
  }

  /**
   * The last stamp issued
   */
  get current(): number {
    return this._count;
  }

  /**
   * Restart the counter
   *
   * Only valid between sessions: clocks created before the reset still hold
   * stamps from the previous sequence.
   */
  reset(): void {
    this._count = 0;
  }
}

const globalSource = new ClockSource();

/**
 * Get the source used by clocks created without an explicit one
 */
export function getGlobalClockSource(): ClockSource {
  return globalSource;
}

/**
 * Reset the global stamp counter
 *
 * This is primarily for use in tests to ensure isolation between test cases.
 */
export function resetClocks(): void {
  globalSource.reset();
}

// ============================================================================
// Clock
// ============================================================================

export class Clock {
  private _state: number = 0;
  private _horizon: number = 0;
  private readonly _subjects = new Set<Clock>();
  private readonly _observers = new Set<Clock>();
  readonly source: ClockSource;

  constructor(source: ClockSource = globalSource) {
    this.source = source;
  }

  /** Stamp of the last click */
  get state(): number {
    return this._state;
  }

  /** Newest stamp seen from this clock or any of its subjects */
  get horizon(): number {
    return this._horizon;
  }

  /** Clocks this clock depends on */
  get subjects(): ReadonlySet<Clock> {
    return this._subjects;
  }

  /**
   * Advance to a fresh stamp and notify observers
   *
   * After a click the clock has observed everything its subjects produced.
   */
  click(): void {
    const stamp = this.source.next();
    this._state = stamp;
    this.propagate(stamp);
  }

  /**
   * Record a change without synchronizing
   *
   * Moves the horizon forward while leaving `state` behind, so the owner is
   * stale until it next clicks. Used when the set of subjects changes.
   */
  invalidate(): void {
    this.propagate(this.source.next());
  }

  /**
   * Depend on another clock
   *
   * This clock is stale relative to `other` until it next clicks, if `other`
   * produced anything after this clock's last click.
   */
  addSubject(other: Clock): void {
    if (other === this || this._subjects.has(other)) return;
    this._subjects.add(other);
    other._observers.add(this);
    if (other._horizon > this._horizon) {
      this.propagate(other._horizon);
    }
  }

  /**
   * Stop depending on another clock
   */
  removeSubject(other: Clock): void {
    if (!this._subjects.delete(other)) return;
    other._observers.delete(this);
  }

  /**
   * Whether a subject changed after the last click
   */
  isStale(): boolean {
    return this._state < this._horizon;
  }

  /**
   * Whether this clock's last click happened after everything `other` has
   * produced
   */
  hasObserved(other: Clock): boolean {
    return this._state >= other._horizon;
  }

  /**
   * Whether this clock has seen everything `other` has produced so far
   */
  geq(other: Clock): boolean {
    return this._horizon >= other._horizon;
  }

  /**
   * Whether this clock has seen something newer than anything `other` has
   * produced
   */
  gt(other: Clock): boolean {
    return this._horizon > other._horizon;
  }

  private propagate(stamp: number): void {
    if (stamp <= this._horizon) return;
    this._horizon = stamp;
    for (const observer of this._observers) {
      observer.propagate(stamp);
    }
  }
}
