/**
 * Fixed-size rolling window of latency samples
 */
export class LatencyWindow {
  private samples: number[] = [];

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Latency window size must be a positive integer, got ${size}`);
    }
  }

  add(sample: number): void {
    this.samples.push(sample);
    if (this.samples.length > this.size) {
      this.samples.shift();
    }
  }

  average(): number | null {
    if (this.samples.length === 0) {
      return null;
    }
    return this.samples.reduce((sum, sample) => sum + sample, 0) / this.samples.length;
  }

  clear(): void {
    this.samples = [];
  }

  values(): number[] {
    return [...this.samples];
  }

  get length(): number {
    return this.samples.length;
  }
}
