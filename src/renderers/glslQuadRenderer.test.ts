import { describe, expect, it } from "vitest";
import { GpuUnavailableError, ShaderBuildError } from "../errors";
import { createFakeCanvas, createFakeGl } from "../test/fakeGl";
import {
  GlslQuadRenderer,
  VERTEX_SOURCE_100ES,
  VERTEX_SOURCE_300ES,
  defaultGlslVertexSource,
} from "./glslQuadRenderer";

const FRAG = [
  "precision mediump float;",
  "uniform float u_time;",
  "uniform vec2 u_resolution;",
  "void main() { gl_FragColor = vec4(gl_FragCoord.xy / u_resolution, sin(u_time), 1.0); }",
].join("\n");

const FRAG_300 = [
  "#version 300 es",
  "precision mediump float;",
  "out vec4 color;",
  "void main() { color = vec4(1.0); }",
].join("\n");

function setup(opts: Parameters<typeof createFakeGl>[0] = {}, backBuffer = false) {
  const fake = createFakeGl(opts);
  const canvas = createFakeCanvas({ webgl2: fake.gl });
  const renderer = new GlslQuadRenderer(canvas, { backBuffer });
  return { ...fake, renderer };
}

describe("defaultGlslVertexSource", () => {
  it("uses GLSL ES 1.00 unless the fragment shader declares 300 es", () => {
    expect(defaultGlslVertexSource(FRAG)).toBe(VERTEX_SOURCE_100ES);
    expect(defaultGlslVertexSource(FRAG_300)).toBe(VERTEX_SOURCE_300ES);
    expect(defaultGlslVertexSource("  # version 300 es\nvoid main() {}")).toBe(VERTEX_SOURCE_300ES);
  });

  it("ignores a version directive that is not on the first line", () => {
    expect(defaultGlslVertexSource("// note\n#version 300 es\n")).toBe(VERTEX_SOURCE_100ES);
  });
});

describe("GlslQuadRenderer", () => {
  it("prefers WebGL 2 and falls back to WebGL 1", () => {
    const fake = createFakeGl();
    expect(new GlslQuadRenderer(createFakeCanvas({ webgl2: fake.gl })).context.version).toBe(2);
    expect(new GlslQuadRenderer(createFakeCanvas({ webgl: fake.gl })).context.version).toBe(1);
  });

  it("throws GpuUnavailableError without any WebGL context", () => {
    expect(() => new GlslQuadRenderer(createFakeCanvas({}))).toThrow(GpuUnavailableError);
  });

  it("draws nothing before the first build", () => {
    const { gl, renderer } = setup();
    renderer.setUniforms(0, 0, 0, 64, 64, 0);
    renderer.render(64, 64);
    expect(renderer.hasBuilt).toBe(false);
    expect(gl.drawElements).not.toHaveBeenCalled();
  });

  it("builds and draws the quad as two indexed triangles", () => {
    const { gl, renderer, uniforms } = setup();
    renderer.build(FRAG);

    expect(renderer.hasBuilt).toBe(true);
    expect(renderer.vertexShaderSource).toBe(VERTEX_SOURCE_100ES);
    expect(renderer.fragmentShaderSource).toBe(FRAG);
    expect(gl.bindAttribLocation).toHaveBeenCalledWith(expect.anything(), 0, "position");

    renderer.setUniforms(1.5, 0.25, 0.75, 640, 480, 7);
    renderer.render(640, 480);

    expect(uniforms.get("u_time")).toEqual([1.5]);
    expect(uniforms.get("u_resolution")).toEqual([640, 480]);
    expect(uniforms.has("u_mouse")).toBe(false);
    expect(gl.viewport).toHaveBeenCalledWith(0, 0, 640, 480);
    expect(gl.drawElements).toHaveBeenCalledWith(gl.TRIANGLES, 6, gl.UNSIGNED_SHORT, 0);
  });

  it("reports the driver log and keeps the last good program on failure", () => {
    const { gl, renderer, state } = setup();
    renderer.build(FRAG);
    const good = state.program;

    let caught: unknown;
    try {
      renderer.build(`${FRAG}\nvec5 broken;`);
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof ShaderBuildError)) throw new Error("expected a ShaderBuildError");
    expect(caught.stage).toBe("fragment");
    expect(caught.message).toBe("ERROR: 0:1: 'vec5' : undeclared identifier\n");
    expect(renderer.hasBuilt).toBe(false);
    expect(state.program).toBe(good);
    expect(gl.deleteProgram).not.toHaveBeenCalled();
    expect(renderer.fragmentShaderSource).toBe(FRAG);

    renderer.render(64, 64);
    expect(gl.drawElements).toHaveBeenCalledTimes(1);
  });

  it("replaces and deletes the previous program on a successful rebuild", () => {
    const { gl, renderer, state } = setup();
    renderer.build(FRAG);
    const first = state.program;
    renderer.build(FRAG_300);

    expect(gl.deleteProgram).toHaveBeenCalledWith(first);
    expect(state.program).not.toBe(first);
    expect(renderer.vertexShaderSource).toBe(VERTEX_SOURCE_300ES);
  });

  it("looks uniforms up under remapped names", () => {
    const { gl, renderer, uniforms } = setup();
    const frag =
      "precision mediump float;\nuniform float iTime;\nuniform vec2 iResolution;\nvoid main() {}";
    renderer.build(frag, undefined, { time: "iTime", resolution: "iResolution" });

    renderer.setUniforms(2, 0, 0, 100, 50, 3);
    expect(uniforms.get("iTime")).toEqual([2]);
    expect(uniforms.get("iResolution")).toEqual([100, 50]);

    renderer.setUniforms(3.5, 0, 0, 100, 50, 4);
    expect(uniforms.get("iTime")).toEqual([3.5]);
    expect(gl.uniform1f).toHaveBeenCalledWith({ name: "iTime" }, 2);
    expect(gl.uniform1f).toHaveBeenCalledWith({ name: "iTime" }, 3.5);
    expect(uniforms.has("u_time")).toBe(false);
  });

  it("reallocates the back-buffer texture only when the size changes", () => {
    const frag = `${FRAG}\nuniform sampler2D u_backBuffer;`;
    const { gl, renderer, uniforms } = setup({}, true);
    renderer.build(frag);

    renderer.setUniforms(0, 0, 0, 64, 32, 0);
    expect(uniforms.get("u_backBuffer")).toEqual([0]);

    renderer.render(64, 32);
    renderer.render(64, 32);
    expect(gl.texImage2D).toHaveBeenCalledTimes(1);
    expect(gl.texImage2D).toHaveBeenCalledWith(
      gl.TEXTURE_2D, 0, gl.RGBA, 64, 32, 0, gl.RGBA, gl.UNSIGNED_BYTE, null,
    );

    renderer.render(128, 32);
    expect(gl.texImage2D).toHaveBeenCalledTimes(2);
    expect(gl.createTexture).toHaveBeenCalledTimes(1);
    expect(gl.copyTexSubImage2D).toHaveBeenLastCalledWith(gl.TEXTURE_2D, 0, 0, 0, 0, 0, 128, 32);
  });

  it("exposes translated sources only with WEBGL_debug_shaders", () => {
    const plain = setup();
    plain.renderer.build(FRAG);
    expect(plain.renderer.translatedFragmentShaderSource).toBeNull();

    const debug = setup({ debugShaders: true });
    expect(debug.renderer.translatedVertexShaderSource).toBeNull();
    debug.renderer.build(FRAG);
    expect(debug.renderer.translatedFragmentShaderSource).toBe(`// translated\n${FRAG}`);
    expect(debug.renderer.translatedVertexShaderSource).toBe(
      `// translated\n${VERTEX_SOURCE_100ES}`,
    );
  });

  it("wraps draws in timer queries when measurement is available", () => {
    const without = setup();
    expect(without.renderer.enableMeasureFrametime()).toBe(false);
    expect(without.renderer.frametime).toBe(-1);

    const { gl, renderer } = setup({ timerQuery: true });
    expect(renderer.enableMeasureFrametime(10)).toBe(true);
    renderer.build(FRAG);
    renderer.render(64, 64);

    expect(gl.beginQuery).toHaveBeenCalledTimes(1);
    expect(gl.endQuery).toHaveBeenCalledTimes(1);
    expect(renderer.frametime).toBe(-1);

    renderer.disableMeasureFrametime();
    expect(gl.deleteQuery).toHaveBeenCalledTimes(1);
  });
});
