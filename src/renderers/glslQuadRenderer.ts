import { GpuUnavailableError, ShaderBuildError, type BuildStage } from "../errors";
import { resolveUniformNames, type QuadRenderer, type UniformNames } from "../renderer";
import { WebGLFrameTimer } from "./webglFrameTimer";

export type GlContext =
  | { version: 2; gl: WebGL2RenderingContext }
  | { version: 1; gl: WebGLRenderingContext };

export type GlslQuadRendererOptions = {
  /** Feed the previous frame back to the shader as a texture. */
  backBuffer?: boolean;
};

type UniformLocations = Record<keyof UniformNames, WebGLUniformLocation | null>;

type LinkedProgram = {
  program: WebGLProgram;
  vertexShader: WebGLShader;
  fragmentShader: WebGLShader;
};

type BuiltProgram = LinkedProgram & {
  locations: UniformLocations;
};

type BackBuffer = {
  texture: WebGLTexture;
  width: number;
  height: number;
};

// Full-screen quad in clip space, two triangles.
const QUAD_VERTICES = new Float32Array([
  -1.0, 1.0, 0.0,
  1.0, 1.0, 0.0,
  -1.0, -1.0, 0.0,
  1.0, -1.0, 0.0,
]);
const QUAD_INDICES = new Uint16Array([0, 2, 1, 1, 2, 3]);

const POSITION_LOCATION = 0;
const BACK_BUFFER_UNIT = 0;

export const VERTEX_SOURCE_100ES =
  "attribute vec3 position;\nvoid main(void)\n{\n  gl_Position = vec4(position, 1.0);\n}\n";

export const VERTEX_SOURCE_300ES =
  "#version 300 es\nin vec3 position;\nvoid main(void)\n{\n  gl_Position = vec4(position, 1.0);\n}\n";

/** Picks the default vertex shader matching the fragment shader's GLSL ES version. */
export function defaultGlslVertexSource(fragmentSource: string): string {
  return /^\s*#\s*version\s+300\s+es/.test(fragmentSource)
    ? VERTEX_SOURCE_300ES
    : VERTEX_SOURCE_100ES;
}

function acquireContext(canvas: HTMLCanvasElement): GlContext {
  const gl2 = canvas.getContext("webgl2");
  if (gl2) return { version: 2, gl: gl2 };
  const gl = canvas.getContext("webgl");
  if (gl) return { version: 1, gl };
  throw new GpuUnavailableError("WebGL 2.0 or WebGL is not supported.");
}

/**
 * GLSL renderer on WebGL 2, falling back to WebGL 1.
 */
export class GlslQuadRenderer implements QuadRenderer {
  readonly context: GlContext;

  private readonly gl: WebGLRenderingContext;
  private readonly vertexBuffer: WebGLBuffer;
  private readonly indexBuffer: WebGLBuffer;
  private readonly useBackBuffer: boolean;
  private built: BuiltProgram | null = null;
  private backBuffer: BackBuffer | null = null;
  private timer: WebGLFrameTimer | null = null;
  private _hasBuilt = false;
  private vsSource: string | null = null;
  private fsSource: string | null = null;

  constructor(canvas: HTMLCanvasElement, options: GlslQuadRendererOptions = {}) {
    this.context = acquireContext(canvas);
    const gl = this.context.gl;
    this.gl = gl;
    this.useBackBuffer = options.backBuffer ?? false;

    this.vertexBuffer = this.createBuffer(gl.ARRAY_BUFFER, QUAD_VERTICES);
    this.indexBuffer = this.createBuffer(gl.ELEMENT_ARRAY_BUFFER, QUAD_INDICES);

    // The quad never changes, so attribute and index bindings are set once.
    gl.bindBuffer(gl.ARRAY_BUFFER, this.vertexBuffer);
    gl.enableVertexAttribArray(POSITION_LOCATION);
    gl.vertexAttribPointer(POSITION_LOCATION, 3, gl.FLOAT, false, 0, 0);
    gl.bindBuffer(gl.ELEMENT_ARRAY_BUFFER, this.indexBuffer);

    gl.clearColor(0.0, 0.0, 0.0, 1.0);
  }

  build(fragmentSource: string, vertexSource?: string, uniformNames?: Partial<UniformNames>): void {
    const gl = this.gl;
    const names = resolveUniformNames(uniformNames);
    const vsSource = vertexSource ?? defaultGlslVertexSource(fragmentSource);

    this._hasBuilt = false;

    const linked = this.createProgram(vsSource, fragmentSource);
    const { program } = linked;
    const next: BuiltProgram = {
      ...linked,
      locations: {
        time: gl.getUniformLocation(program, names.time),
        mouse: gl.getUniformLocation(program, names.mouse),
        resolution: gl.getUniformLocation(program, names.resolution),
        frameCount: gl.getUniformLocation(program, names.frameCount),
        backBuffer: gl.getUniformLocation(program, names.backBuffer),
      },
    };

    if (this.built) {
      this.deleteProgram(this.built);
    }
    this.built = next;
    gl.useProgram(next.program);

    this.vsSource = vsSource;
    this.fsSource = fragmentSource;
    this._hasBuilt = true;
  }

  setUniforms(
    time: number,
    mouseX: number,
    mouseY: number,
    width: number,
    height: number,
    frameCount: number,
  ): void {
    if (!this.built) return;
    const gl = this.gl;
    const { locations } = this.built;
    gl.uniform1f(locations.time, time);
    gl.uniform2f(locations.mouse, mouseX, mouseY);
    gl.uniform2f(locations.resolution, width, height);
    gl.uniform1f(locations.frameCount, frameCount);
    if (this.useBackBuffer) {
      gl.uniform1i(locations.backBuffer, BACK_BUFFER_UNIT);
    }
  }

  render(width: number, height: number): void {
    if (!this.built) return;
    const gl = this.gl;

    gl.viewport(0, 0, width, height);
    gl.clear(gl.COLOR_BUFFER_BIT);

    if (this.useBackBuffer) {
      const backBuffer = this.ensureBackBuffer(width, height);
      gl.activeTexture(gl.TEXTURE0 + BACK_BUFFER_UNIT);
      gl.bindTexture(gl.TEXTURE_2D, backBuffer.texture);
    }

    this.timer?.begin();
    gl.drawElements(gl.TRIANGLES, QUAD_INDICES.length, gl.UNSIGNED_SHORT, 0);
    this.timer?.end();

    if (this.useBackBuffer) {
      gl.copyTexSubImage2D(gl.TEXTURE_2D, 0, 0, 0, 0, 0, width, height);
    }

    gl.flush();
  }

  enableMeasureFrametime(windowSize = 60): boolean {
    this.timer?.dispose();
    this.timer = WebGLFrameTimer.create(this.context, windowSize);
    return this.timer !== null;
  }

  disableMeasureFrametime(): void {
    this.timer?.dispose();
    this.timer = null;
  }

  get hasBuilt(): boolean {
    return this._hasBuilt;
  }

  get frametime(): number {
    return this.timer?.frametime ?? -1;
  }

  get vertexShaderSource(): string | null {
    return this.vsSource;
  }

  get fragmentShaderSource(): string | null {
    return this.fsSource;
  }

  /** Driver-translated source, when WEBGL_debug_shaders is exposed. */
  get translatedVertexShaderSource(): string | null {
    return this.translatedSource(this.built?.vertexShader);
  }

  get translatedFragmentShaderSource(): string | null {
    return this.translatedSource(this.built?.fragmentShader);
  }

  dispose(): void {
    const gl = this.gl;
    this.disableMeasureFrametime();
    if (this.built) {
      this.deleteProgram(this.built);
      this.built = null;
    }
    if (this.backBuffer) {
      gl.deleteTexture(this.backBuffer.texture);
      this.backBuffer = null;
    }
    gl.deleteBuffer(this.vertexBuffer);
    gl.deleteBuffer(this.indexBuffer);
    this._hasBuilt = false;
  }

  private translatedSource(shader: WebGLShader | undefined): string | null {
    if (!shader) return null;
    const ext = this.gl.getExtension("WEBGL_debug_shaders");
    return ext ? ext.getTranslatedShaderSource(shader) : null;
  }

  private createBuffer(target: number, data: Float32Array | Uint16Array): WebGLBuffer {
    const gl = this.gl;
    const buffer = gl.createBuffer();
    if (!buffer) throw new GpuUnavailableError("Failed to create buffer.");
    gl.bindBuffer(target, buffer);
    gl.bufferData(target, data, gl.STATIC_DRAW);
    return buffer;
  }

  private compileShader(source: string, type: number, stage: BuildStage): WebGLShader {
    const gl = this.gl;
    const shader = gl.createShader(type);
    if (!shader) throw new ShaderBuildError("Failed to create shader.", stage);
    gl.shaderSource(shader, source);
    gl.compileShader(shader);
    if (gl.getShaderParameter(shader, gl.COMPILE_STATUS) !== true) {
      const log = gl.getShaderInfoLog(shader) || "Unknown shader error";
      gl.deleteShader(shader);
      throw new ShaderBuildError(log, stage);
    }
    return shader;
  }

  /** Compiles and links without touching the active program. */
  private createProgram(vsSource: string, fsSource: string): LinkedProgram {
    const gl = this.gl;
    const vertexShader = this.compileShader(vsSource, gl.VERTEX_SHADER, "vertex");
    let fragmentShader: WebGLShader;
    try {
      fragmentShader = this.compileShader(fsSource, gl.FRAGMENT_SHADER, "fragment");
    } catch (error) {
      gl.deleteShader(vertexShader);
      throw error;
    }

    const program = gl.createProgram();
    if (!program) {
      gl.deleteShader(vertexShader);
      gl.deleteShader(fragmentShader);
      throw new ShaderBuildError("Failed to create program.", "link");
    }
    gl.attachShader(program, vertexShader);
    gl.attachShader(program, fragmentShader);
    gl.bindAttribLocation(program, POSITION_LOCATION, "position");
    gl.linkProgram(program);

    if (gl.getProgramParameter(program, gl.LINK_STATUS) !== true) {
      const log = gl.getProgramInfoLog(program) || "Unknown link error";
      gl.deleteProgram(program);
      gl.deleteShader(vertexShader);
      gl.deleteShader(fragmentShader);
      throw new ShaderBuildError(log, "link");
    }

    return { program, vertexShader, fragmentShader };
  }

  private deleteProgram(built: LinkedProgram): void {
    const gl = this.gl;
    gl.deleteProgram(built.program);
    gl.deleteShader(built.vertexShader);
    gl.deleteShader(built.fragmentShader);
  }

  /** Allocates the feedback texture, reallocating its storage on resize. */
  private ensureBackBuffer(width: number, height: number): BackBuffer {
    const gl = this.gl;
    if (this.backBuffer && this.backBuffer.width === width && this.backBuffer.height === height) {
      return this.backBuffer;
    }

    let texture = this.backBuffer?.texture ?? null;
    if (!texture) {
      texture = gl.createTexture();
      if (!texture) throw new GpuUnavailableError("Failed to create back-buffer texture.");
    }
    gl.bindTexture(gl.TEXTURE_2D, texture);
    gl.texImage2D(gl.TEXTURE_2D, 0, gl.RGBA, width, height, 0, gl.RGBA, gl.UNSIGNED_BYTE, null);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.LINEAR);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.LINEAR);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE);

    this.backBuffer = { texture, width, height };
    return this.backBuffer;
  }
}
