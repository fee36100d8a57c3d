/**
 * Fixed-capacity ring buffer that keeps a running sum of its samples.
 *
 * Once full, each push overwrites the oldest sample, so `value` is always the
 * mean of the last `min(count, capacity)` samples.
 */
export class MovingAverage {
  readonly capacity: number;

  private readonly samples: Float64Array;
  private index = 0;
  private filled = 0;
  private sum = 0;

  constructor(capacity = 60) {
    const size = Math.floor(capacity);
    if (!(size >= 1)) {
      throw new RangeError(`Moving average window must be >= 1 (got ${capacity}).`);
    }
    this.capacity = size;
    this.samples = new Float64Array(size);
  }

  get count(): number {
    return this.filled;
  }

  get value(): number {
    return this.filled === 0 ? 0 : this.sum / this.filled;
  }

  /** Adds a sample and returns the updated average. */
  push(sample: number): number {
    if (this.filled < this.capacity) {
      this.filled++;
    } else {
      this.sum -= this.samples[this.index];
    }
    this.samples[this.index] = sample;
    this.sum += sample;
    this.index = (this.index + 1) % this.capacity;
    return this.value;
  }

  clear(): void {
    this.samples.fill(0);
    this.index = 0;
    this.filled = 0;
    this.sum = 0;
  }
}
