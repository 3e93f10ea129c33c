/**
 * Fixed-capacity rolling window over timestamped samples.
 *
 * Appending past capacity overwrites the oldest sample. Statistics are derived
 * on demand from whatever the window currently holds, oldest first.
 */

export type WindowStats = {
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
};

export type RingWindowOptions<T> = {
  capacity: number;
  timestampOf: (sample: T) => number;
};

const EMPTY_STATS: WindowStats = { count: 0, sum: 0, min: 0, max: 0, mean: 0 };

export class RingWindow<T> {
  private readonly buffer: Array<T | undefined>;
  private readonly timestampOf: (sample: T) => number;
  private head = 0;
  private length = 0;
  private pushed = 0;
  private evicted = 0;

  readonly capacity: number;

  constructor(options: RingWindowOptions<T>) {
    this.capacity = Math.max(1, Math.floor(options.capacity));
    this.buffer = new Array<T | undefined>(this.capacity).fill(undefined);
    this.timestampOf = options.timestampOf;
  }

  push(sample: T) {
    this.buffer[this.head] = sample;
    this.head = (this.head + 1) % this.capacity;
    this.pushed += 1;

    if (this.length < this.capacity) {
      this.length += 1;
    } else {
      this.evicted += 1;
    }
  }

  get size() {
    return this.length;
  }

  get totalPushed() {
    return this.pushed;
  }

  get totalEvicted() {
    return this.evicted;
  }

  isFull() {
    return this.length === this.capacity;
  }

  /** Samples oldest first. */
  toArray(): T[] {
    const start = this.length < this.capacity ? 0 : this.head;
    const entries: T[] = [];
    for (let offset = 0; offset < this.length; offset += 1) {
      const sample = this.buffer[(start + offset) % this.capacity];
      if (sample !== undefined) {
        entries.push(sample);
      }
    }
    return entries;
  }

  /** The newest `count` samples, oldest first. */
  latest(count: number): T[] {
    const entries = this.toArray();
    const limit = Math.max(0, Math.floor(count));
    return limit >= entries.length ? entries : entries.slice(entries.length - limit);
  }

  first(): T | null {
    if (this.length === 0) {
      return null;
    }
    const start = this.length < this.capacity ? 0 : this.head;
    return this.buffer[start] ?? null;
  }

  last(): T | null {
    if (this.length === 0) {
      return null;
    }
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity] ?? null;
  }

  /** Milliseconds between the oldest and newest sample. */
  spanMs(): number {
    const oldest = this.first();
    const newest = this.last();
    if (oldest === null || newest === null) {
      return 0;
    }
    return Math.max(0, this.timestampOf(newest) - this.timestampOf(oldest));
  }

  stats(select: (sample: T) => number): WindowStats {
    let count = 0;
    let sum = 0;
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;

    for (const sample of this.toArray()) {
      const value = select(sample);
      if (!Number.isFinite(value)) {
        continue;
      }
      count += 1;
      sum += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    if (count === 0) {
      return { ...EMPTY_STATS };
    }

    return { count, sum, min, max, mean: sum / count };
  }

  /**
   * Growth of a cumulative value per second across the window:
   * (newest - oldest) / span. Zero when the window spans no time.
   */
  ratePerSecond(select: (sample: T) => number): number {
    const oldest = this.first();
    const newest = this.last();
    const spanMs = this.spanMs();
    if (oldest === null || newest === null || spanMs === 0) {
      return 0;
    }
    return (select(newest) - select(oldest)) / (spanMs / 1000);
  }

  /** Samples per second arriving across the window. */
  frequency(): number {
    const spanMs = this.spanMs();
    if (this.length < 2 || spanMs === 0) {
      return 0;
    }
    return (this.length - 1) / (spanMs / 1000);
  }

  clear() {
    this.buffer.fill(undefined);
    this.head = 0;
    this.length = 0;
    this.pushed = 0;
    this.evicted = 0;
  }
}
