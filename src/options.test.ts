import { describe, expect, it } from "vitest";
import { readOptionsFromQuery, resolvePreviewOptions } from "./options";

describe("resolvePreviewOptions", () => {
  it("fills defaults", () => {
    expect(resolvePreviewOptions()).toEqual({
      pollIntervalMs: 1000,
      renderIntervalMs: undefined,
      smoothingWindow: 60,
      measureFrametime: true,
      frametimeWindow: 60,
      backBuffer: false,
      uniformNames: {},
      maxDpr: 3,
      powerPreference: "high-performance",
      contentScriptUrl: "js/content.js",
    });
  });

  it("keeps explicit values, including falsy ones", () => {
    const opts = resolvePreviewOptions({ measureFrametime: false, renderIntervalMs: 33 });
    expect(opts.measureFrametime).toBe(false);
    expect(opts.renderIntervalMs).toBe(33);
  });
});

describe("readOptionsFromQuery", () => {
  it("returns nothing for an empty query", () => {
    expect(readOptionsFromQuery("")).toEqual({});
  });

  it("reads numeric settings", () => {
    expect(readOptionsFromQuery("?interval=16&poll=250&smoothing=30.7&dpr=1.5")).toEqual({
      renderIntervalMs: 16,
      pollIntervalMs: 250,
      smoothingWindow: 30,
      maxDpr: 1.5,
    });
  });

  it("drops malformed and non-positive numbers", () => {
    expect(readOptionsFromQuery("?interval=abc&poll=0&smoothing=-4&dpr=")).toEqual({});
  });

  it("reads flags, treating a bare key as on", () => {
    expect(readOptionsFromQuery("?backBuffer&measure=off")).toEqual({
      backBuffer: true,
      measureFrametime: false,
    });
    expect(readOptionsFromQuery("?backBuffer=maybe")).toEqual({});
  });

  it("maps u.<key> to uniform names and ignores unknown keys", () => {
    expect(readOptionsFromQuery("?u.time=iTime&u.resolution=%20iResolution&u.color=c&u.mouse=")).toEqual({
      uniformNames: { time: "iTime", resolution: "iResolution" },
    });
  });
});
