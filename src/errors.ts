/** No usable graphics context on this page. Not recoverable for the tab. */
export class GpuUnavailableError extends Error {
  override name = "GpuUnavailableError";
}

export type BuildStage = "vertex" | "fragment" | "link" | "pipeline";

/**
 * Shader compilation or linking failed. `message` is the driver's diagnostic
 * text, unmodified.
 */
export class ShaderBuildError extends Error {
  override name = "ShaderBuildError";

  constructor(
    message: string,
    readonly stage: BuildStage,
  ) {
    super(message);
  }
}
