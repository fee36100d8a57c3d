import { GlslQuadRenderer, type GlslQuadRendererOptions } from "./glslQuadRenderer";
import { WgslQuadRenderer, type WgslQuadRendererOptions } from "./wgslQuadRenderer";

export { GlslQuadRenderer } from "./glslQuadRenderer";
export { WgslQuadRenderer } from "./wgslQuadRenderer";

/** The renderer chosen for a tab. Decided once, never swapped. */
export type ActiveRenderer =
  | { kind: "glsl"; renderer: GlslQuadRenderer }
  | { kind: "wgsl"; renderer: WgslQuadRenderer };

export type RendererKind = ActiveRenderer["kind"];

export type CreateRendererOptions = GlslQuadRendererOptions & WgslQuadRendererOptions;

export type RendererFactory = (
  kind: RendererKind,
  canvas: HTMLCanvasElement,
  opts: CreateRendererOptions,
) => Promise<ActiveRenderer>;

/** `wgsl` selects WebGPU; every other file type is rendered as GLSL. */
export function rendererKindFor(fileType: string): RendererKind {
  return fileType.trim().toLowerCase() === "wgsl" ? "wgsl" : "glsl";
}

export const createRenderer: RendererFactory = async (kind, canvas, opts) => {
  switch (kind) {
    case "wgsl":
      return { kind, renderer: await WgslQuadRenderer.create(canvas, opts) };
    case "glsl":
      return { kind, renderer: new GlslQuadRenderer(canvas, opts) };
  }
};
