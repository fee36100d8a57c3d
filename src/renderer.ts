/**
 * Shader-side identifiers of the per-frame inputs.
 *
 * The raster renderer looks its uniforms up by these names. The WebGPU
 * renderer binds a single uniform struct whose layout is fixed
 * (resolution, mouse, time, frameCount); there the names only label the
 * struct fields of the default vertex shader.
 */
export type UniformNames = {
  time: string;
  mouse: string;
  resolution: string;
  frameCount: string;
  /** Previous frame's output. Raster renderer with back-buffer mode only. */
  backBuffer: string;
};

export const DEFAULT_UNIFORM_NAMES: Readonly<UniformNames> = {
  time: "u_time",
  mouse: "u_mouse",
  resolution: "u_resolution",
  frameCount: "u_frameCount",
  backBuffer: "u_backBuffer",
};

export function resolveUniformNames(overrides?: Partial<UniformNames>): UniformNames {
  return { ...DEFAULT_UNIFORM_NAMES, ...overrides };
}

/**
 * A full-screen quad renderer for fragment-shader-only programs.
 *
 * `render` is valid once `build` has succeeded; before that it draws nothing.
 * A failed `build` leaves the previous program in place but clears `hasBuilt`.
 */
export type QuadRenderer = {
  /**
   * Compiles and links a program. Throws `ShaderBuildError` carrying the
   * driver's diagnostic text. The WebGPU renderer resolves asynchronously.
   */
  build(
    fragmentSource: string,
    vertexSource?: string,
    uniformNames?: Partial<UniformNames>,
  ): void | Promise<void>;

  /** Must be called before every `render`; values are not retained between frames. */
  setUniforms(
    time: number,
    mouseX: number,
    mouseY: number,
    width: number,
    height: number,
    frameCount: number,
  ): void;

  render(width: number, height: number): void;

  /** Returns whether GPU timing is available. Unsupported is not an error. */
  enableMeasureFrametime(windowSize?: number): boolean;
  disableMeasureFrametime(): void;

  readonly hasBuilt: boolean;
  /** Smoothed GPU time per frame in nanoseconds, or -1 when unmeasured. */
  readonly frametime: number;

  readonly vertexShaderSource: string | null;
  readonly fragmentShaderSource: string | null;
  readonly translatedVertexShaderSource: string | null;
  readonly translatedFragmentShaderSource: string | null;

  dispose(): void;
};
