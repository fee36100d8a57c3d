import { MovingAverage } from "../movingAverage";
import type { GlContext } from "./glslQuadRenderer";

// Neither timer-query extension is declared in lib.dom.
type TimerQueryWebGL2Ext = {
  TIME_ELAPSED_EXT: number;
  GPU_DISJOINT_EXT: number;
};

type TimerQueryWebGL1Ext = TimerQueryWebGL2Ext & {
  QUERY_RESULT_AVAILABLE_EXT: number;
  QUERY_RESULT_EXT: number;
  createQueryEXT(): WebGLQuery | null;
  deleteQueryEXT(query: WebGLQuery): void;
  beginQueryEXT(target: number, query: WebGLQuery): void;
  endQueryEXT(target: number): void;
  getQueryObjectEXT(query: WebGLQuery, pname: number): unknown;
};

type QueryBackend = {
  create(): WebGLQuery | null;
  begin(query: WebGLQuery): void;
  end(): void;
  isAvailable(query: WebGLQuery): boolean;
  /** Elapsed GPU time in nanoseconds. */
  result(query: WebGLQuery): number;
  disjoint(): boolean;
  remove(query: WebGLQuery): void;
};

function webgl2Backend(gl: WebGL2RenderingContext): QueryBackend | null {
  const ext: TimerQueryWebGL2Ext | null = gl.getExtension("EXT_disjoint_timer_query_webgl2");
  if (!ext) return null;
  return {
    create: () => gl.createQuery(),
    begin: (query) => gl.beginQuery(ext.TIME_ELAPSED_EXT, query),
    end: () => gl.endQuery(ext.TIME_ELAPSED_EXT),
    isAvailable: (query) => gl.getQueryParameter(query, gl.QUERY_RESULT_AVAILABLE) === true,
    result: (query) => Number(gl.getQueryParameter(query, gl.QUERY_RESULT)),
    disjoint: () => gl.getParameter(ext.GPU_DISJOINT_EXT) === true,
    remove: (query) => gl.deleteQuery(query),
  };
}

function webgl1Backend(gl: WebGLRenderingContext): QueryBackend | null {
  const ext: TimerQueryWebGL1Ext | null = gl.getExtension("EXT_disjoint_timer_query");
  if (!ext) return null;
  return {
    create: () => ext.createQueryEXT(),
    begin: (query) => ext.beginQueryEXT(ext.TIME_ELAPSED_EXT, query),
    end: () => ext.endQueryEXT(ext.TIME_ELAPSED_EXT),
    isAvailable: (query) => ext.getQueryObjectEXT(query, ext.QUERY_RESULT_AVAILABLE_EXT) === true,
    result: (query) => Number(ext.getQueryObjectEXT(query, ext.QUERY_RESULT_EXT)),
    disjoint: () => gl.getParameter(ext.GPU_DISJOINT_EXT) === true,
    remove: (query) => ext.deleteQueryEXT(query),
  };
}

/**
 * Measures GPU time of the commands between `begin` and `end` with the
 * disjoint timer-query extensions. Results arrive a few frames late; each
 * `end` collects whatever has become available.
 */
export class WebGLFrameTimer {
  private readonly free: WebGLQuery[] = [];
  private readonly pending: WebGLQuery[] = [];
  private active: WebGLQuery | null = null;
  private readonly average: MovingAverage;

  private constructor(
    private readonly backend: QueryBackend,
    windowSize: number,
  ) {
    this.average = new MovingAverage(windowSize);
  }

  /** Returns null when the context offers no timer queries. */
  static create(context: GlContext, windowSize = 60): WebGLFrameTimer | null {
    const backend =
      context.version === 2 ? webgl2Backend(context.gl) : webgl1Backend(context.gl);
    return backend ? new WebGLFrameTimer(backend, windowSize) : null;
  }

  /** Smoothed nanoseconds per frame, or -1 before the first result. */
  get frametime(): number {
    return this.average.count === 0 ? -1 : this.average.value;
  }

  begin(): void {
    if (this.active) return;
    const query = this.free.pop() ?? this.backend.create();
    if (!query) return;
    this.backend.begin(query);
    this.active = query;
  }

  end(): void {
    if (!this.active) return;
    this.backend.end();
    this.pending.push(this.active);
    this.active = null;
    this.collect();
  }

  dispose(): void {
    if (this.active) {
      this.backend.end();
      this.pending.push(this.active);
      this.active = null;
    }
    for (const query of [...this.pending, ...this.free]) {
      this.backend.remove(query);
    }
    this.pending.length = 0;
    this.free.length = 0;
  }

  private collect(): void {
    // A disjoint event invalidates every result currently in flight.
    const disjoint = this.backend.disjoint();
    while (this.pending.length > 0) {
      const query = this.pending[0];
      if (!this.backend.isAvailable(query)) break;
      this.pending.shift();
      if (!disjoint) {
        this.average.push(this.backend.result(query));
      }
      this.free.push(query);
    }
  }
}
