import { MovingAverage } from "../movingAverage";

const TIMESTAMP_BYTES = 2 * BigUint64Array.BYTES_PER_ELEMENT;

/**
 * Measures render-pass GPU time with timestamp queries.
 *
 * Each frame resolves its two timestamps into a readback buffer taken from a
 * free list; the buffer goes back to the list once its mapping resolves.
 */
export class WebGPUFrameTimer {
  private readonly querySet: GPUQuerySet;
  private readonly resolveBuffer: GPUBuffer;
  private readonly free: GPUBuffer[] = [];
  private readonly average: MovingAverage;
  private pending: GPUBuffer | null = null;
  private disposed = false;

  private constructor(
    private readonly device: GPUDevice,
    windowSize: number,
  ) {
    this.average = new MovingAverage(windowSize);
    this.querySet = device.createQuerySet({ type: "timestamp", count: 2 });
    this.resolveBuffer = device.createBuffer({
      size: TIMESTAMP_BYTES,
      usage: GPUBufferUsage.QUERY_RESOLVE | GPUBufferUsage.COPY_SRC,
    });
  }

  /** Returns null unless the device was created with `timestamp-query`. */
  static create(device: GPUDevice, windowSize = 60): WebGPUFrameTimer | null {
    if (!device.features.has("timestamp-query")) return null;
    return new WebGPUFrameTimer(device, windowSize);
  }

  /** Smoothed nanoseconds per frame, or -1 before the first result. */
  get frametime(): number {
    return this.average.count === 0 ? -1 : this.average.value;
  }

  get timestampWrites(): GPURenderPassDescriptor["timestampWrites"] {
    return {
      querySet: this.querySet,
      beginningOfPassWriteIndex: 0,
      endOfPassWriteIndex: 1,
    };
  }

  /** Records the resolve and copy commands after the timed pass has ended. */
  resolve(encoder: GPUCommandEncoder): void {
    const readback =
      this.free.pop() ??
      this.device.createBuffer({
        size: TIMESTAMP_BYTES,
        usage: GPUBufferUsage.COPY_DST | GPUBufferUsage.MAP_READ,
      });
    encoder.resolveQuerySet(this.querySet, 0, 2, this.resolveBuffer, 0);
    encoder.copyBufferToBuffer(this.resolveBuffer, 0, readback, 0, TIMESTAMP_BYTES);
    this.pending = readback;
  }

  /** Starts reading back the frame resolved last. Call after submitting it. */
  collect(): void {
    const readback = this.pending;
    if (!readback) return;
    this.pending = null;
    this.read(readback).catch((error: unknown) => {
      readback.destroy();
      console.warn("[preview] Frametime readback failed:", error);
    });
  }

  dispose(): void {
    this.disposed = true;
    this.pending?.destroy();
    this.pending = null;
    for (const buffer of this.free) {
      buffer.destroy();
    }
    this.free.length = 0;
    this.querySet.destroy();
    this.resolveBuffer.destroy();
  }

  private async read(readback: GPUBuffer): Promise<void> {
    await readback.mapAsync(GPUMapMode.READ);
    const [begin, end] = new BigUint64Array(readback.getMappedRange());
    readback.unmap();

    if (this.disposed) {
      readback.destroy();
      return;
    }
    if (end > begin) {
      this.average.push(Number(end - begin));
    }
    this.free.push(readback);
  }
}
