import { GpuUnavailableError, ShaderBuildError } from "../errors";
import { resolveUniformNames, type QuadRenderer, type UniformNames } from "../renderer";
import { WebGPUFrameTimer } from "./webgpuFrameTimer";

export type WgslQuadRendererOptions = {
  powerPreference?: GPUPowerPreference;
};

// Full-screen quad in clip space, two triangles.
const QUAD_VERTICES = new Float32Array([
  -1.0, 1.0, 0.0, 1.0,
  1.0, 1.0, 0.0, 1.0,
  -1.0, -1.0, 0.0, 1.0,
  1.0, -1.0, 0.0, 1.0,
]);
const QUAD_INDICES = new Uint16Array([0, 2, 1, 1, 2, 3]);

// resolution (vec2f), mouse (vec2f), time (f32), frameCount (f32)
const UNIFORM_FLOATS = 6;
// 32 bytes is the smallest uniform binding the struct rounds up to.
const UNIFORM_BUFFER_BYTES = 8 * Float32Array.BYTES_PER_ELEMENT;

/**
 * Default vertex stage. It declares the uniform struct at group(0)
 * binding(0) so the auto layout always has a bind group to fill, and passes
 * `fragCoord` in pixels to location(0).
 */
export function defaultWgslVertexSource(names: UniformNames): string {
  return /* wgsl */ `struct VertexOutput {
  @builtin(position) position: vec4f,
  @location(0) fragCoord: vec2f,
}

struct Uniforms {
  ${names.resolution}: vec2f,
  ${names.mouse}: vec2f,
  ${names.time}: f32,
  ${names.frameCount}: f32,
}

@group(0) @binding(0) var<uniform> uniforms: Uniforms;

@vertex
fn main(@location(0) position: vec4f) -> VertexOutput {
  var output: VertexOutput;
  output.position = position;
  output.fragCoord = (position.xy * vec2f(0.5, 0.5) + vec2f(0.5, 0.5)) * uniforms.${names.resolution};
  return output;
}
`;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function assertCompiled(module: GPUShaderModule, stage: "vertex" | "fragment"): Promise<void> {
  const info = await module.getCompilationInfo();
  const errors = info.messages.filter((message) => message.type === "error");
  if (errors.length > 0) {
    throw new ShaderBuildError(
      errors.map((m) => `${m.lineNum}:${m.linePos}: ${m.message}`).join("\n"),
      stage,
    );
  }
}

/**
 * WGSL renderer on WebGPU. Construct it through `create`, which negotiates
 * the adapter and device.
 */
export class WgslQuadRenderer implements QuadRenderer {
  private readonly context: GPUCanvasContext;
  private readonly vertexBuffer: GPUBuffer;
  private readonly indexBuffer: GPUBuffer;
  private readonly uniformBuffer: GPUBuffer;
  private readonly uniformData = new Float32Array(UNIFORM_FLOATS);
  private pipeline: GPURenderPipeline | null = null;
  private bindGroup: GPUBindGroup | null = null;
  private timer: WebGPUFrameTimer | null = null;
  private _hasBuilt = false;
  private vsSource: string | null = null;
  private fsSource: string | null = null;

  constructor(
    canvas: HTMLCanvasElement,
    private readonly device: GPUDevice,
    private readonly presentationFormat: GPUTextureFormat,
  ) {
    const context = canvas.getContext("webgpu");
    if (!context) {
      throw new GpuUnavailableError("WebGPU is not supported: Failed to get webgpu context.");
    }
    context.configure({
      device,
      format: presentationFormat,
      alphaMode: "premultiplied",
    });
    this.context = context;

    this.vertexBuffer = device.createBuffer({
      size: QUAD_VERTICES.byteLength,
      usage: GPUBufferUsage.VERTEX,
      mappedAtCreation: true,
    });
    new Float32Array(this.vertexBuffer.getMappedRange()).set(QUAD_VERTICES);
    this.vertexBuffer.unmap();

    this.indexBuffer = device.createBuffer({
      size: QUAD_INDICES.byteLength,
      usage: GPUBufferUsage.INDEX,
      mappedAtCreation: true,
    });
    new Uint16Array(this.indexBuffer.getMappedRange()).set(QUAD_INDICES);
    this.indexBuffer.unmap();

    this.uniformBuffer = device.createBuffer({
      size: UNIFORM_BUFFER_BYTES,
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    });
  }

  static async create(
    canvas: HTMLCanvasElement,
    opts: WgslQuadRendererOptions = {},
  ): Promise<WgslQuadRenderer> {
    if (typeof navigator === "undefined" || !("gpu" in navigator)) {
      throw new GpuUnavailableError("WebGPU not supported in this browser (navigator.gpu missing).");
    }

    const adapter = await navigator.gpu.requestAdapter({
      powerPreference: opts.powerPreference ?? "high-performance",
    });
    if (!adapter) throw new GpuUnavailableError("No WebGPU adapter available.");

    const requiredFeatures: GPUFeatureName[] = adapter.features.has("timestamp-query")
      ? ["timestamp-query"]
      : [];
    const device = await adapter.requestDevice({ requiredFeatures });

    return new WgslQuadRenderer(canvas, device, navigator.gpu.getPreferredCanvasFormat());
  }

  async build(
    fragmentSource: string,
    vertexSource?: string,
    uniformNames?: Partial<UniformNames>,
  ): Promise<void> {
    const device = this.device;
    const vsSource = vertexSource ?? defaultWgslVertexSource(resolveUniformNames(uniformNames));

    this._hasBuilt = false;

    const vertexModule = device.createShaderModule({ label: "vertex", code: vsSource });
    const fragmentModule = device.createShaderModule({ label: "fragment", code: fragmentSource });
    await assertCompiled(vertexModule, "vertex");
    await assertCompiled(fragmentModule, "fragment");

    let pipeline: GPURenderPipeline;
    try {
      pipeline = await device.createRenderPipelineAsync({
        layout: "auto",
        vertex: {
          module: vertexModule,
          entryPoint: "main",
          buffers: [
            {
              arrayStride: 4 * Float32Array.BYTES_PER_ELEMENT,
              attributes: [{ shaderLocation: 0, offset: 0, format: "float32x4" }],
            },
          ],
        },
        fragment: {
          module: fragmentModule,
          entryPoint: "main",
          targets: [{ format: this.presentationFormat }],
        },
        primitive: { topology: "triangle-list" },
      });
    } catch (error) {
      throw new ShaderBuildError(messageOf(error), "pipeline");
    }

    const bindGroup = await this.createUniformBindGroup(pipeline);

    this.pipeline = pipeline;
    this.bindGroup = bindGroup;
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
    const data = this.uniformData;
    data[0] = width;
    data[1] = height;
    data[2] = mouseX;
    data[3] = mouseY;
    data[4] = time;
    data[5] = frameCount;
    this.device.queue.writeBuffer(this.uniformBuffer, 0, data);
  }

  render(width: number, height: number): void {
    if (!this.pipeline) return;

    const encoder = this.device.createCommandEncoder();
    const view = this.context.getCurrentTexture().createView();

    const pass = encoder.beginRenderPass({
      colorAttachments: [
        {
          view,
          clearValue: { r: 0, g: 0, b: 0, a: 1 },
          loadOp: "clear",
          storeOp: "store",
        },
      ],
      timestampWrites: this.timer?.timestampWrites,
    });

    pass.setViewport(0, 0, width, height, 0, 1);
    pass.setPipeline(this.pipeline);
    if (this.bindGroup) {
      pass.setBindGroup(0, this.bindGroup);
    }
    pass.setVertexBuffer(0, this.vertexBuffer);
    pass.setIndexBuffer(this.indexBuffer, "uint16");
    pass.drawIndexed(QUAD_INDICES.length);
    pass.end();

    this.timer?.resolve(encoder);
    this.device.queue.submit([encoder.finish()]);
    this.timer?.collect();
  }

  enableMeasureFrametime(windowSize = 60): boolean {
    this.timer?.dispose();
    this.timer = WebGPUFrameTimer.create(this.device, windowSize);
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

  // WebGPU exposes no translated source.
  get translatedVertexShaderSource(): string | null {
    return null;
  }

  get translatedFragmentShaderSource(): string | null {
    return null;
  }

  dispose(): void {
    this.disableMeasureFrametime();
    this.pipeline = null;
    this.bindGroup = null;
    this._hasBuilt = false;
    this.vertexBuffer.destroy();
    this.indexBuffer.destroy();
    this.uniformBuffer.destroy();
    this.context.unconfigure();
  }

  /**
   * Binds the uniform buffer at group(0) binding(0). A custom vertex and
   * fragment pair that declares no such binding gets no bind group.
   */
  private async createUniformBindGroup(pipeline: GPURenderPipeline): Promise<GPUBindGroup | null> {
    this.device.pushErrorScope("validation");
    const bindGroup = this.device.createBindGroup({
      layout: pipeline.getBindGroupLayout(0),
      entries: [{ binding: 0, resource: { buffer: this.uniformBuffer } }],
    });
    const error = await this.device.popErrorScope();
    return error ? null : bindGroup;
  }
}
