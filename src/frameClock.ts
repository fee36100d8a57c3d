import { MovingAverage } from "./movingAverage";

/** Cancels a scheduled repeating callback. Calling it more than once is harmless. */
export type LoopHandle = {
  cancel(): void;
};

/**
 * Scheduling primitives the clock runs on. The browser host wraps
 * `performance.now`, `requestAnimationFrame` and `setInterval`; tests pass a
 * manual host.
 */
export type FrameClockHost = {
  now(): number;
  /** Calls `tick` once per display frame until cancelled. */
  onAnimationFrame(tick: (now: number) => void): LoopHandle;
  /** Calls `tick` every `intervalMs` until cancelled. */
  onInterval(tick: () => void, intervalMs: number): LoopHandle;
};

/** `now` and `dt` are in milliseconds. The first call of a run gets `dt = 0`. */
export type FrameCallback = (now: number, dt: number, smoothedDt: number) => void;

export const browserHost: FrameClockHost = {
  now: () => performance.now(),
  onAnimationFrame(tick) {
    let id = requestAnimationFrame(function loop(now) {
      id = requestAnimationFrame(loop);
      tick(now);
    });
    return { cancel: () => cancelAnimationFrame(id) };
  },
  onInterval(tick, intervalMs) {
    const id = window.setInterval(tick, intervalMs);
    return { cancel: () => window.clearInterval(id) };
  },
};

/**
 * Drives a repeating frame callback and keeps timing statistics for it.
 *
 * Time spent stopped is excluded from `totalElapsedTime`, so a paused
 * preview resumes where it left off.
 */
export class FrameClock {
  private _startTime = 0;
  private _stopTime = 0;
  private _totalElapsedTime = 0;
  private _timePerFrame = 0;
  private _smoothedTimePerFrame = 0;
  private _frameCount = 0;
  private handle: LoopHandle | null = null;

  constructor(private readonly host: FrameClockHost = browserHost) {}

  /**
   * Starts calling `callback` repeatedly, stopping any previous run first.
   *
   * @param intervalMs  Fixed period. When omitted the display refresh drives the loop.
   * @param smoothingWindow  Number of frames averaged into `smoothedTimePerFrame`.
   * @returns The start timestamp.
   */
  start(callback: FrameCallback, intervalMs?: number, smoothingWindow = 60): number {
    const average = new MovingAverage(smoothingWindow);

    this.stop();

    const startTime = this.host.now();
    this._startTime = startTime;
    this._stopTime = startTime;
    let prevTime = startTime;

    const tick = (now: number) => {
      this._timePerFrame = now - prevTime;
      prevTime = now;
      this._smoothedTimePerFrame = average.push(this._timePerFrame);
      callback(now, this._timePerFrame, this._smoothedTimePerFrame);
      this._frameCount++;
    };

    callback(startTime, 0, 0);
    this._frameCount++;

    this.handle =
      intervalMs === undefined
        ? this.host.onAnimationFrame(tick)
        : this.host.onInterval(() => tick(this.host.now()), intervalMs);

    return startTime;
  }

  stop(): void {
    if (this.handle === null) return;
    this.handle.cancel();
    this.handle = null;
    this._timePerFrame = 0;
    this._smoothedTimePerFrame = 0;
    this._stopTime = this.host.now();
    this._totalElapsedTime += this._stopTime - this._startTime;
  }

  /** Zeroes accumulated time and frame count without touching the loop. */
  reset(): void {
    const now = this.host.now();
    this._startTime = now;
    this._stopTime = now;
    this._totalElapsedTime = 0;
    this._frameCount = 0;
  }

  get isStopped(): boolean {
    return this.handle === null;
  }

  get startTime(): number {
    return this._startTime;
  }

  get elapsedFromStart(): number {
    return (this.isStopped ? this._stopTime : this.host.now()) - this._startTime;
  }

  get totalElapsedTime(): number {
    return this._totalElapsedTime + (this.isStopped ? 0 : this.host.now() - this._startTime);
  }

  get timePerFrame(): number {
    return this._timePerFrame;
  }

  get smoothedTimePerFrame(): number {
    return this._smoothedTimePerFrame;
  }

  get fps(): number {
    return this.isStopped || this._timePerFrame === 0 ? 0 : 1000 / this._timePerFrame;
  }

  get smoothedFps(): number {
    return this.isStopped || this._smoothedTimePerFrame === 0
      ? 0
      : 1000 / this._smoothedTimePerFrame;
  }

  get frameCount(): number {
    return this._frameCount;
  }
}
