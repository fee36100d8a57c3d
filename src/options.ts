import type { UniformNames } from "./renderer";

export type PreviewOptions = {
  /** How often the editor-generated script is reloaded. */
  pollIntervalMs?: number;
  /** Fixed render period. Display refresh when omitted. */
  renderIntervalMs?: number;
  /** Frames averaged into the smoothed frame rate. */
  smoothingWindow?: number;
  measureFrametime?: boolean;
  /** Frames averaged into the GPU frametime. */
  frametimeWindow?: number;
  /** Feed the previous frame to GLSL shaders. */
  backBuffer?: boolean;
  uniformNames?: Partial<UniformNames>;
  /** Clamp on device pixel ratio to avoid huge render targets. */
  maxDpr?: number;
  powerPreference?: GPUPowerPreference;
  contentScriptUrl?: string;
};

export type ResolvedPreviewOptions = Required<Omit<PreviewOptions, "renderIntervalMs">> & {
  renderIntervalMs: number | undefined;
};

export function resolvePreviewOptions(opts: PreviewOptions = {}): ResolvedPreviewOptions {
  return {
    pollIntervalMs: opts.pollIntervalMs ?? 1000,
    renderIntervalMs: opts.renderIntervalMs,
    smoothingWindow: opts.smoothingWindow ?? 60,
    measureFrametime: opts.measureFrametime ?? true,
    frametimeWindow: opts.frametimeWindow ?? 60,
    backBuffer: opts.backBuffer ?? false,
    uniformNames: opts.uniformNames ?? {},
    maxDpr: opts.maxDpr ?? 3,
    powerPreference: opts.powerPreference ?? "high-performance",
    contentScriptUrl: opts.contentScriptUrl ?? "js/content.js",
  };
}

const UNIFORM_KEYS: readonly (keyof UniformNames)[] = [
  "time",
  "mouse",
  "resolution",
  "frameCount",
  "backBuffer",
];

function isUniformKey(key: string): key is keyof UniformNames {
  return UNIFORM_KEYS.some((k) => k === key);
}

function positiveNumber(value: string | null): number | undefined {
  if (value === null || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function flag(value: string | null): boolean | undefined {
  if (value === null) return undefined;
  const v = value.trim().toLowerCase();
  if (v === "" || v === "1" || v === "true" || v === "on") return true;
  if (v === "0" || v === "false" || v === "off") return false;
  return undefined;
}

/**
 * Reads overrides from the page query string, e.g.
 * `?interval=16&backBuffer&u.time=iTime&u.resolution=iResolution`.
 * Unrecognized or malformed values are left out.
 */
export function readOptionsFromQuery(search: string): PreviewOptions {
  const params = new URLSearchParams(search);
  const opts: PreviewOptions = {};

  const interval = positiveNumber(params.get("interval"));
  if (interval !== undefined) opts.renderIntervalMs = interval;

  const poll = positiveNumber(params.get("poll"));
  if (poll !== undefined) opts.pollIntervalMs = poll;

  const smoothing = positiveNumber(params.get("smoothing"));
  if (smoothing !== undefined) opts.smoothingWindow = Math.max(1, Math.floor(smoothing));

  const dpr = positiveNumber(params.get("dpr"));
  if (dpr !== undefined) opts.maxDpr = dpr;

  const backBuffer = flag(params.get("backBuffer"));
  if (backBuffer !== undefined) opts.backBuffer = backBuffer;

  const measure = flag(params.get("measure"));
  if (measure !== undefined) opts.measureFrametime = measure;

  const uniformNames: Partial<UniformNames> = {};
  for (const [key, value] of params) {
    if (!key.startsWith("u.")) continue;
    const name = key.slice(2);
    if (isUniformKey(name) && value.trim() !== "") {
      uniformNames[name] = value.trim();
    }
  }
  if (Object.keys(uniformNames).length > 0) opts.uniformNames = uniformNames;

  return opts;
}
