import { DEFAULT_SPEED, MAX_SPEED, MAX_TICK_PROGRESS, MIN_SPEED } from "../constants";

function clampSpeed(speed: number): number {
  return Math.max(MIN_SPEED, Math.min(MAX_SPEED, Math.round(speed)));
}

/**
 * Paces generation steps against wall-clock time, independent of frame rate.
 *
 * Progress accumulates at `speed` per second while unpaused. Once it reaches
 * the threshold, the next frame fires exactly one step and resets progress
 * to zero; any excess is discarded rather than carried over.
 */
export class TickScheduler {
  readonly threshold: number;
  paused = false;

  /** EMA-smoothed time spent in the step callback, in ms. */
  stepTimeMs = 0;

  /** True if the most recent advance() fired a step. */
  lastStepFired = false;

  private _progress = 0;
  private _speed: number;
  private readonly stepFn: () => void;

  /** EMA smoothing factor for stepTimeMs. */
  private readonly emaAlpha = 0.1;

  constructor(stepFn: () => void, threshold = MAX_TICK_PROGRESS, speed = DEFAULT_SPEED) {
    if (!(threshold > 0)) {
      throw new RangeError(`Tick threshold must be positive, got ${threshold}`);
    }
    if (!Number.isFinite(speed)) {
      throw new RangeError(`Tick speed must be a finite number, got ${speed}`);
    }
    this.stepFn = stepFn;
    this.threshold = threshold;
    this._speed = clampSpeed(speed);
  }

  get progress(): number {
    return this._progress;
  }

  get speed(): number {
    return this._speed;
  }

  /**
   * Called once per frame.
   *
   * The due check runs before new time is added, so a step that was already
   * due fires even while paused, and at most one step fires per call.
   *
   * @param deltaSeconds seconds since the previous frame
   * @returns whether a step fired
   */
  advance(deltaSeconds: number): boolean {
    this.lastStepFired = false;

    if (this._progress >= this.threshold) {
      this._progress = 0;
      const t0 = performance.now();
      this.stepFn();
      const rawStepTimeMs = performance.now() - t0;
      this.stepTimeMs = this.emaAlpha * rawStepTimeMs + (1 - this.emaAlpha) * this.stepTimeMs;
      this.lastStepFired = true;
      return true;
    }

    if (!this.paused && Number.isFinite(deltaSeconds) && deltaSeconds > 0) {
      this._progress += this._speed * deltaSeconds;
    }
    return false;
  }

  togglePause(): void {
    this.paused = !this.paused;
  }

  increaseSpeed(): void {
    this._speed = clampSpeed(this._speed + 1);
  }

  decreaseSpeed(): void {
    this._speed = clampSpeed(this._speed - 1);
  }

  /** Non-finite values are ignored. */
  setSpeed(speed: number): void {
    if (!Number.isFinite(speed)) return;
    this._speed = clampSpeed(speed);
  }
}
