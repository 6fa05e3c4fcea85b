import { TickScheduler } from "./tick-scheduler";
import { MAX_TICK_PROGRESS, MAX_SPEED, MIN_SPEED } from "../constants";

describe("TickScheduler", () => {
  // Minimal mock: just counts how many times step() was called
  let stepCount: number;
  const stepFn = () => { stepCount++; };

  beforeEach(() => {
    stepCount = 0;
  });

  it("uses a quarter-second threshold and speed 1 by default", () => {
    const scheduler = new TickScheduler(stepFn);
    expect(scheduler.threshold).toBe(MAX_TICK_PROGRESS);
    expect(scheduler.threshold).toBe(0.25);
    expect(scheduler.speed).toBe(1);
    expect(scheduler.paused).toBe(false);
  });

  it("accumulates progress without stepping below the threshold", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    expect(scheduler.advance(0.1)).toBe(false);
    expect(scheduler.progress).toBeCloseTo(0.1);
    expect(stepCount).toBe(0);
  });

  it("fires one step on the frame after crossing the threshold and discards the excess", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    scheduler.advance(0.3);
    expect(stepCount).toBe(0);
    expect(scheduler.progress).toBeCloseTo(0.3);

    expect(scheduler.advance(0.016)).toBe(true);
    expect(stepCount).toBe(1);
    expect(scheduler.progress).toBe(0);
  });

  it("never fires more than one step per frame, even for a long delta", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    scheduler.advance(10);
    scheduler.advance(10);
    expect(stepCount).toBe(1);
    expect(scheduler.progress).toBe(0);
    scheduler.advance(0);
    expect(stepCount).toBe(1);
  });

  it("steps every other frame once progress stays saturated", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    for (let i = 0; i < 10; i++) scheduler.advance(1);
    expect(stepCount).toBe(5);
  });

  it("scales accumulation by speed", () => {
    const scheduler = new TickScheduler(stepFn, 0.25, 3);
    scheduler.advance(0.1);
    expect(scheduler.progress).toBeCloseTo(0.3);
    scheduler.advance(0.1);
    expect(stepCount).toBe(1);
  });

  it("does not accumulate while paused", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    scheduler.togglePause();
    for (let i = 0; i < 20; i++) scheduler.advance(0.1);
    expect(scheduler.progress).toBe(0);
    expect(stepCount).toBe(0);
  });

  it("still fires a step that was due before pausing, then holds", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    scheduler.advance(0.3);
    scheduler.togglePause();
    scheduler.advance(0.1);
    expect(stepCount).toBe(1);
    for (let i = 0; i < 10; i++) scheduler.advance(0.1);
    expect(stepCount).toBe(1);
    expect(scheduler.progress).toBe(0);
  });

  it("resumes accumulating after unpausing", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    scheduler.togglePause();
    scheduler.advance(0.2);
    scheduler.togglePause();
    expect(scheduler.paused).toBe(false);
    scheduler.advance(0.2);
    expect(scheduler.progress).toBeCloseTo(0.2);
  });

  it("ignores negative and non-finite deltas", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    scheduler.advance(-1);
    scheduler.advance(Number.NaN);
    scheduler.advance(Number.POSITIVE_INFINITY);
    expect(scheduler.progress).toBe(0);
  });

  it("clamps speed to [MIN_SPEED, MAX_SPEED]", () => {
    const scheduler = new TickScheduler(stepFn);
    scheduler.decreaseSpeed();
    expect(scheduler.speed).toBe(MIN_SPEED);
    for (let i = 0; i < 10; i++) scheduler.increaseSpeed();
    expect(scheduler.speed).toBe(MAX_SPEED);
    scheduler.decreaseSpeed();
    expect(scheduler.speed).toBe(4);
    scheduler.setSpeed(99);
    expect(scheduler.speed).toBe(5);
    scheduler.setSpeed(0);
    expect(scheduler.speed).toBe(1);
  });

  it("reports whether the last frame fired a step", () => {
    const scheduler = new TickScheduler(stepFn, 0.25);
    scheduler.advance(1);
    expect(scheduler.lastStepFired).toBe(false);
    scheduler.advance(0);
    expect(scheduler.lastStepFired).toBe(true);
    expect(scheduler.stepTimeMs).toBeGreaterThanOrEqual(0);
  });

  it("rejects a non-positive threshold", () => {
    expect(() => new TickScheduler(stepFn, 0)).toThrow(RangeError);
  });

  it("rejects a non-finite starting speed", () => {
    expect(() => new TickScheduler(stepFn, 0.25, NaN)).toThrow(RangeError);
    expect(() => new TickScheduler(stepFn, 0.25, Infinity)).toThrow(RangeError);
  });

  it("ignores a non-finite speed and keeps stepping", () => {
    const scheduler = new TickScheduler(stepFn, 0.25, 2);
    scheduler.setSpeed(NaN);
    scheduler.setSpeed(-Infinity);
    expect(scheduler.speed).toBe(2);
    scheduler.advance(0.125);
    expect(scheduler.progress).toBeCloseTo(0.25);
    expect(scheduler.advance(0.01)).toBe(true);
    expect(stepCount).toBe(1);
  });
});
