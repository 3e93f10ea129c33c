import { RingWindow } from '../timeseries/ringWindow.js';
import type { AggregateStats, ProducerReport, ProducerReportInput } from '../types.js';

export const DEFAULT_STALE_THRESHOLD_MS = 30_000;
export const DEFAULT_HARD_EXPIRY_MS = 60 * 60 * 1000;
export const DEFAULT_MAX_ENTRIES = 10_000;
const DEFAULT_ACTIVITY_WINDOW = 1_000;

export interface LiveRegistryOptions {
  /** Entries older than this are left out of snapshots. */
  staleThresholdMs?: number;
  /** Entries older than this are removed from memory. */
  hardExpiryMs?: number;
  maxEntries?: number;
  activityWindow?: number;
  clock?: () => number;
}

export type RegistryActivity = {
  reportsPerSecond: number;
  samples: number;
  windowSeconds: number;
};

type RegistryEntry = {
  report: Readonly<ProducerReport>;
  lastSeenMs: number;
};

/**
 * Latest report per producer, with liveness derived from arrival time.
 *
 * Every method runs synchronously on the event loop, so each call observes and
 * leaves the map in a consistent state. The map is kept in arrival order: a
 * re-report moves its producer to the tail, which lets eviction walk from the
 * head and stop at the first entry that is still within the hard horizon.
 */
export class LiveRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly arrivals: RingWindow<number>;
  private readonly clock: () => number;

  readonly staleThresholdMs: number;
  readonly hardExpiryMs: number;
  readonly maxEntries: number;

  constructor(options: LiveRegistryOptions = {}) {
    this.staleThresholdMs = positiveOr(options.staleThresholdMs, DEFAULT_STALE_THRESHOLD_MS);
    this.hardExpiryMs = Math.max(
      positiveOr(options.hardExpiryMs, DEFAULT_HARD_EXPIRY_MS),
      this.staleThresholdMs
    );
    this.maxEntries = Math.floor(positiveOr(options.maxEntries, DEFAULT_MAX_ENTRIES));
    this.clock = options.clock ?? Date.now;
    this.arrivals = new RingWindow<number>({
      capacity: positiveOr(options.activityWindow, DEFAULT_ACTIVITY_WINDOW),
      timestampOf: at => at
    });
  }

  update(input: ProducerReportInput): ProducerReport {
    const now = this.clock();
    const report: ProducerReport = Object.freeze({
      ...input,
      extras: input.extras ? Object.freeze({ ...input.extras }) : undefined,
      receivedAt: now / 1000
    });

    this.entries.delete(report.producerId);
    this.entries.set(report.producerId, { report, lastSeenMs: now });
    this.arrivals.push(now);
    this.evict(now);
    return report;
  }

  snapshot(): ProducerReport[] {
    const now = this.clock();
    const active: ProducerReport[] = [];
    for (const entry of this.entries.values()) {
      if (now - entry.lastSeenMs < this.staleThresholdMs) {
        active.push(entry.report);
      }
    }
    return active;
  }

  stats(): AggregateStats {
    return computeAggregateStats(this.snapshot());
  }

  get(producerId: string): ProducerReport | null {
    return this.entries.get(producerId)?.report ?? null;
  }

  get size() {
    return this.entries.size;
  }

  activity(): RegistryActivity {
    const now = this.clock();
    const newest = this.arrivals.last();
    const idle = newest === null || now - newest >= this.staleThresholdMs;
    return {
      reportsPerSecond: idle ? 0 : this.arrivals.frequency(),
      samples: this.arrivals.size,
      windowSeconds: this.arrivals.spanMs() / 1000
    };
  }

  /** Removes entries past the hard horizon or over capacity; returns how many. */
  prune(): number {
    return this.evict(this.clock());
  }

  clear() {
    this.entries.clear();
    this.arrivals.clear();
  }

  private evict(now: number): number {
    let removed = 0;
    for (const [producerId, entry] of this.entries) {
      const expired = now - entry.lastSeenMs >= this.hardExpiryMs;
      const overCapacity = this.entries.size > this.maxEntries;
      if (!expired && !overCapacity) {
        break;
      }
      this.entries.delete(producerId);
      removed += 1;
    }
    return removed;
  }
}

export function computeAggregateStats(instances: readonly ProducerReport[]): AggregateStats {
  if (instances.length === 0) {
    return { instanceCount: 0, totalRate: 0, totalUnits: 0, totalDevices: 0, avgRate: 0 };
  }

  let totalRate = 0;
  let totalUnits = 0;
  let totalDevices = 0;
  for (const instance of instances) {
    totalRate += instance.recentRate;
    totalUnits += instance.totalUnits;
    if (instance.deviceAvailable) {
      totalDevices += instance.deviceCount;
    }
  }

  return {
    instanceCount: instances.length,
    totalRate,
    totalUnits,
    totalDevices,
    avgRate: totalRate / instances.length
  };
}

function positiveOr(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}
