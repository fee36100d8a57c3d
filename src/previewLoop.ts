import type { ContentSource } from "./contentSource";
import { GpuUnavailableError, ShaderBuildError } from "./errors";
import { browserHost, FrameClock, type FrameClockHost, type LoopHandle } from "./frameClock";
import { consoleBuildLog, type BuildLog } from "./log";
import { resolvePreviewOptions, type PreviewOptions, type ResolvedPreviewOptions } from "./options";
import type { PreviewView, Unsub } from "./previewView";
import type { QuadRenderer } from "./renderer";
import {
  createRenderer,
  rendererKindFor,
  type ActiveRenderer,
  type RendererFactory,
  type RendererKind,
} from "./renderers";

export type PreviewPhase = "idle" | "active";

export type PreviewState = {
  phase: PreviewPhase;
  kind: RendererKind | null;
  paused: boolean;
  frametimeSupported: boolean;
  error: string | null;
};

/** Live numbers for the control pane; mutated in place every frame. */
export type PreviewStats = {
  fps: number;
  smoothedFps: number;
  frames: number;
  /** Seconds fed to the time uniform. */
  time: number;
  /** Smoothed GPU milliseconds per frame, -1 when unmeasured. */
  frametimeMs: number;
};

export type PreviewLoopDeps = {
  view: PreviewView;
  source: ContentSource;
  createRenderer?: RendererFactory;
  host?: FrameClockHost;
  log?: BuildLog;
};

/**
 * Polls the editor-generated script, rebuilds the shader when the file
 * changes and keeps rendering in between.
 *
 * The loop starts idle. The first poll that yields content picks the
 * renderer for the file type; that choice holds for the life of the page.
 */
export class PreviewLoop {
  readonly stats: PreviewStats = {
    fps: 0,
    smoothedFps: 0,
    frames: 0,
    time: 0,
    frametimeMs: -1,
  };

  private readonly options: ResolvedPreviewOptions;
  private readonly view: PreviewView;
  private readonly source: ContentSource;
  private readonly createRenderer: RendererFactory;
  private readonly host: FrameClockHost;
  private readonly log: BuildLog;
  private readonly clock: FrameClock;
  private readonly listeners = new Set<(state: PreviewState) => void>();

  private active: ActiveRenderer | null = null;
  private fileName: string | null = null;
  private lastModified: string | null = null;
  private mouseX = 0;
  private mouseY = 0;
  private paused = false;
  private polling = false;
  private frametimeSupported = false;
  private lastError: string | null = null;
  private pollHandle: LoopHandle | null = null;
  private starting: Promise<void> | null = null;
  private disposed = false;

  constructor(deps: PreviewLoopDeps, opts: PreviewOptions = {}) {
    this.options = resolvePreviewOptions(opts);
    this.view = deps.view;
    this.source = deps.source;
    this.createRenderer = deps.createRenderer ?? createRenderer;
    this.host = deps.host ?? browserHost;
    this.log = deps.log ?? consoleBuildLog;
    this.clock = new FrameClock(this.host);
  }

  get state(): PreviewState {
    return {
      phase: this.active ? "active" : "idle",
      kind: this.active?.kind ?? null,
      paused: this.paused,
      frametimeSupported: this.frametimeSupported,
      error: this.lastError,
    };
  }

  get isRendering(): boolean {
    return !this.clock.isStopped;
  }

  /**
   * Runs the first poll, then keeps polling. Rejects when no graphics
   * context can be created; build errors only show up in the view.
   * Repeated calls share the first call's promise.
   */
  start(): Promise<void> {
    if (!this.starting) {
      this.starting = this.firstPoll();
    }
    return this.starting;
  }

  private async firstPoll(): Promise<void> {
    try {
      await this.poll();
    } catch (error) {
      this.handlePollError(error);
      if (error instanceof GpuUnavailableError) throw error;
    }
    if (this.disposed) return;
    this.pollHandle = this.host.onInterval(() => {
      this.poll().catch((error: unknown) => this.handlePollError(error));
    }, this.options.pollIntervalMs);
  }

  /**
   * One polling step. Skips everything when the file name and last-modified
   * stamp are unchanged, or while a previous poll is still running.
   */
  async poll(): Promise<void> {
    if (this.polling || this.disposed) return;
    this.polling = true;
    try {
      const snapshot = await this.source.refresh();
      if (this.disposed) return;
      const fileName = snapshot.getFileName?.() ?? null;
      const lastModified = snapshot.getLastModified?.() ?? null;

      const unchanged =
        fileName !== null &&
        lastModified !== null &&
        fileName === this.fileName &&
        lastModified === this.lastModified;
      if (unchanged) return;

      this.fileName = fileName;
      this.lastModified = lastModified;
      this.view.showFileInfo(fileName ?? "", lastModified ?? "");

      if (!snapshot.getContent || !snapshot.getFileType) return;
      await this.rebuild(snapshot.getContent(), snapshot.getFileType());
    } finally {
      this.polling = false;
    }
  }

  /** Explicit user pause. A rebuild while paused renders a single frame. */
  pause(): void {
    if (this.paused) return;
    this.paused = true;
    this.clock.stop();
    this.updateStats();
    this.emit();
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    if (this.active?.renderer.hasBuilt) {
      this.startClock();
    }
    this.emit();
  }

  togglePause(): void {
    if (this.paused) {
      this.resume();
    } else {
      this.pause();
    }
  }

  /** Restarts the time uniform from zero. */
  resetTime(): void {
    this.clock.reset();
    if (this.clock.isStopped && this.active?.renderer.hasBuilt) {
      this.renderFrame();
    }
  }

  /** Normalized pointer offset, origin top-left. */
  setMouse(x: number, y: number): void {
    this.mouseX = x;
    this.mouseY = y;
  }

  onStateChange(listener: (state: PreviewState) => void): Unsub {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Final. Work still in flight finishes without effect. */
  dispose(): void {
    this.disposed = true;
    this.pollHandle?.cancel();
    this.pollHandle = null;
    this.clock.stop();
    this.active?.renderer.dispose();
    this.active = null;
    this.listeners.clear();
  }

  private async rebuild(fragmentSource: string, fileType: string): Promise<void> {
    this.clock.stop();

    const active = this.active ?? (await this.activate(rendererKindFor(fileType)));
    if (!active) return;
    const renderer: QuadRenderer = active.renderer;

    const began = this.host.now();
    try {
      await renderer.build(fragmentSource, undefined, this.options.uniformNames);
    } catch (error) {
      if (this.disposed) return;
      if (!(error instanceof ShaderBuildError)) throw error;
      this.log(
        "error",
        `Rebuild failed (${this.fileName ?? "unknown file"}): ${error.message}`,
        this.host.now() - began,
      );
      this.lastError = error.message;
      this.view.setCanvasVisible(false);
      this.view.showDiagnostics(error.message);
      this.updateStats();
      this.emit();
      return;
    }
    if (this.disposed) return;
    this.log("info", `Rebuild done (${this.fileName ?? "unknown file"})`, this.host.now() - began);

    this.lastError = null;
    this.view.setCanvasVisible(true);
    this.view.showDiagnostics("");
    this.clock.reset();
    if (this.paused) {
      this.renderFrame();
    } else {
      this.startClock();
    }
    this.emit();
  }

  /** Returns null when the loop was disposed while the renderer was created. */
  private async activate(kind: RendererKind): Promise<ActiveRenderer | null> {
    const active = await this.createRenderer(kind, this.view.canvas, {
      backBuffer: this.options.backBuffer,
      powerPreference: this.options.powerPreference,
    });
    if (this.disposed) {
      active.renderer.dispose();
      return null;
    }
    this.frametimeSupported =
      this.options.measureFrametime &&
      active.renderer.enableMeasureFrametime(this.options.frametimeWindow);
    this.active = active;
    this.emit();
    return active;
  }

  private startClock(): void {
    this.clock.start(
      () => this.renderFrame(),
      this.options.renderIntervalMs,
      this.options.smoothingWindow,
    );
  }

  private renderFrame(): void {
    const active = this.active;
    if (!active || this.view.hidden) return;

    const { width, height } = this.view.resize();
    const renderer: QuadRenderer = active.renderer;
    renderer.setUniforms(
      this.clock.totalElapsedTime / 1000,
      this.mouseX,
      this.mouseY,
      width,
      height,
      this.clock.frameCount,
    );
    renderer.render(width, height);
    this.updateStats();
  }

  private updateStats(): void {
    const stats = this.stats;
    stats.fps = this.clock.fps;
    stats.smoothedFps = this.clock.smoothedFps;
    stats.frames = this.clock.frameCount;
    stats.time = this.clock.totalElapsedTime / 1000;
    const frametime = this.active?.renderer.frametime ?? -1;
    stats.frametimeMs = frametime < 0 ? -1 : frametime / 1e6;
  }

  private handlePollError(error: unknown): void {
    if (error instanceof GpuUnavailableError) {
      this.pollHandle?.cancel();
      this.pollHandle = null;
      this.lastError = error.message;
      this.view.setCanvasVisible(false);
      this.view.showDiagnostics(error.message);
      console.error("[preview]", error);
      this.emit();
      return;
    }
    console.warn("[preview] Poll failed:", error);
  }

  private emit(): void {
    const state = this.state;
    for (const listener of this.listeners) {
      listener(state);
    }
  }
}
