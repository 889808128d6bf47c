/**
 * Tests for logical clocks
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Clock, ClockSource, getGlobalClockSource, resetClocks } from "./clock.js";

describe("Clock", () => {
  let source: ClockSource;

  beforeEach(() => {
    source = new ClockSource();
  });

  it("should start at zero and advance on click", () => {
    const clock = new Clock(source);
    expect(clock.state).toBe(0);
    expect(clock.horizon).toBe(0);

    clock.click();
    expect(clock.state).toBe(1);
    expect(clock.horizon).toBe(1);
    expect(clock.isStale()).toBe(false);
  });

  it("should mark an observer stale when a subject clicks", () => {
    const subject = new Clock(source);
    const observer = new Clock(source);
    subject.click();

    observer.addSubject(subject);
    expect(observer.horizon).toBe(1);
    expect(observer.isStale()).toBe(true);

    observer.click();
    expect(observer.isStale()).toBe(false);
    expect(observer.hasObserved(subject)).toBe(true);

    subject.click();
    expect(observer.horizon).toBe(3);
    expect(observer.isStale()).toBe(true);
    expect(observer.hasObserved(subject)).toBe(false);
  });

  it("should propagate through several levels", () => {
    const leaf = new Clock(source);
    const middle = new Clock(source);
    const root = new Clock(source);
    middle.addSubject(leaf);
    root.addSubject(middle);

    leaf.click();
    expect(middle.horizon).toBe(1);
    expect(root.horizon).toBe(1);
    expect(root.geq(leaf)).toBe(true);
    expect(root.gt(leaf)).toBe(false);
  });

  it("should stop propagating after removeSubject", () => {
    const subject = new Clock(source);
    const observer = new Clock(source);
    observer.addSubject(subject);
    subject.click();
    observer.click();

    observer.removeSubject(subject);
    subject.click();
    expect(observer.horizon).toBe(2);
    expect(observer.isStale()).toBe(false);
    expect(observer.subjects.size).toBe(0);
  });

  it("should ignore itself and duplicates as subjects", () => {
    const clock = new Clock(source);
    const other = new Clock(source);
    clock.addSubject(clock);
    clock.addSubject(other);
    clock.addSubject(other);
    expect(clock.subjects.size).toBe(1);
  });

  it("should terminate propagation around a cycle", () => {
    const a = new Clock(source);
    const b = new Clock(source);
    a.addSubject(b);
    b.addSubject(a);

    a.click();
    expect(a.horizon).toBe(1);
    expect(b.horizon).toBe(1);
  });

  it("should make a clock stale on invalidate without changing its state", () => {
    const clock = new Clock(source);
    clock.click();
    clock.invalidate();
    expect(clock.state).toBe(1);
    expect(clock.horizon).toBe(2);
    expect(clock.isStale()).toBe(true);
  });

  it("should compare horizons with geq and gt", () => {
    const a = new Clock(source);
    const b = new Clock(source);
    a.click();
    b.click();
    expect(b.gt(a)).toBe(true);
    expect(a.gt(b)).toBe(false);
    expect(a.geq(b)).toBe(false);
    expect(b.geq(b)).toBe(true);
  });
});

describe("ClockSource", () => {
  it("should issue increasing stamps", () => {
    const source = new ClockSource();
    expect(source.next()).toBe(1);
    expect(source.next()).toBe(2);
    expect(source.current).toBe(2);
  });

  it("should reset the global source", () => {
    const global = getGlobalClockSource();
    global.next();
    resetClocks();
    expect(global.current).toBe(0);
  });

  it("should serve clocks created without a source", () => {
    resetClocks();
    const clock = new Clock();
    clock.click();
    expect(clock.source).toBe(getGlobalClockSource());
    expect(clock.state).toBe(1);
  });
});
