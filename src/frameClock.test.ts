import { beforeEach, describe, expect, it, vi } from "vitest";
import { FrameClock } from "./frameClock";
import { ManualHost } from "./test/manualHost";

describe("FrameClock", () => {
  let host: ManualHost;
  let clock: FrameClock;

  beforeEach(() => {
    host = new ManualHost();
    host.time = 100;
    clock = new FrameClock(host);
  });

  it("calls back immediately with a zero delta, then once per display frame", () => {
    const cb = vi.fn();
    expect(clock.start(cb)).toBe(100);
    expect(cb).toHaveBeenCalledWith(100, 0, 0);
    expect(clock.frameCount).toBe(1);
    expect(host.frameLoops).toBe(1);

    host.frame(16);
    expect(cb).toHaveBeenLastCalledWith(116, 16, 16);
    host.frame(20);
    expect(cb).toHaveBeenLastCalledWith(136, 20, 18);

    expect(clock.frameCount).toBe(3);
    expect(clock.fps).toBe(50);
    expect(clock.smoothedFps).toBeCloseTo(1000 / 18);
  });

  it("uses a fixed interval when one is given", () => {
    const cb = vi.fn();
    clock.start(cb, 50);
    expect(host.frameLoops).toBe(0);
    expect(host.intervals).toEqual([50]);

    host.fireInterval(50);
    expect(cb).toHaveBeenLastCalledWith(150, 50, 50);
  });

  it("stops idempotently and reports zero rates while stopped", () => {
    clock.start(() => {});
    host.frame(16);
    host.frame(20);
    clock.stop();
    clock.stop();

    expect(clock.isStopped).toBe(true);
    expect(host.frameLoops).toBe(0);
    expect(clock.fps).toBe(0);
    expect(clock.smoothedFps).toBe(0);
    expect(clock.timePerFrame).toBe(0);
    expect(clock.totalElapsedTime).toBe(36);
    expect(clock.elapsedFromStart).toBe(36);

    host.time += 1000;
    expect(clock.totalElapsedTime).toBe(36);
  });

  it("excludes stopped time when restarted", () => {
    clock.start(() => {});
    host.frame(16);
    clock.stop();
    host.time += 500;

    clock.start(() => {});
    host.frame(10);

    expect(clock.totalElapsedTime).toBe(26);
    expect(clock.elapsedFromStart).toBe(10);
    expect(clock.frameCount).toBe(4);
  });

  it("replaces a running loop on restart", () => {
    const first = vi.fn();
    clock.start(first);
    clock.start(() => {});
    host.frame();
    expect(host.frameLoops).toBe(1);
    expect(first).toHaveBeenCalledTimes(1);
  });

  it("zeroes time and frame count on reset without stopping", () => {
    clock.start(() => {});
    host.frame(16);
    clock.reset();

    expect(clock.totalElapsedTime).toBe(0);
    expect(clock.frameCount).toBe(0);
    expect(clock.isStopped).toBe(false);

    host.frame(16);
    expect(clock.totalElapsedTime).toBe(16);
    expect(clock.frameCount).toBe(1);
  });

  it("rejects an invalid smoothing window before touching a running loop", () => {
    clock.start(() => {});
    expect(() => clock.start(() => {}, undefined, 0)).toThrow(RangeError);
    expect(clock.isStopped).toBe(false);
    expect(host.frameLoops).toBe(1);
  });
});
