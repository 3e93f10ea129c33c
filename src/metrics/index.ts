import { performance } from 'node:perf_hooks';

type CounterMap = Record<string, number>;

type LatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type LatencyStats = LatencyState & {
  averageMs: number;
};

type LastError = {
  message: string;
  producerId: string | null;
  at: string;
};

type RetentionRunContext = {
  deleted: number;
  durationMs: number;
  backend: string;
};

type IngestSnapshot = {
  accepted: number;
  rejected: number;
  rejectedByField: CounterMap;
  lastAcceptedAt: string | null;
};

type PersistenceSnapshot = {
  writes: number;
  failures: number;
  lastFailure: LastError | null;
};

type RetentionSnapshot = {
  runs: number;
  failures: number;
  deletedRecords: number;
  lastRunAt: string | null;
  lastDeleted: number | null;
  lastBackend: string | null;
  lastError: string | null;
};

type StreamSnapshot = {
  clients: number;
  broadcasts: number;
};

type MetricsSnapshot = {
  createdAt: string;
  ingest: IngestSnapshot;
  persistence: PersistenceSnapshot;
  retention: RetentionSnapshot;
  stream: StreamSnapshot;
  latencies: Record<string, LatencyStats>;
};

class MetricsRegistry {
  private accepted = 0;
  private rejected = 0;
  private readonly rejectedByField = new Map<string, number>();
  private lastAcceptedAt: number | null = null;
  private persistenceWrites = 0;
  private persistenceFailures = 0;
  private lastPersistenceFailure: LastError | null = null;
  private retentionRuns = 0;
  private retentionFailures = 0;
  private retentionDeleted = 0;
  private lastRetentionRunAt: number | null = null;
  private lastRetentionDeleted: number | null = null;
  private lastRetentionBackend: string | null = null;
  private lastRetentionError: string | null = null;
  private streamClients = 0;
  private streamBroadcasts = 0;
  private readonly latencyStats = new Map<string, LatencyState>();

  reset() {
    this.accepted = 0;
    this.rejected = 0;
    this.rejectedByField.clear();
    this.lastAcceptedAt = null;
    this.persistenceWrites = 0;
    this.persistenceFailures = 0;
    this.lastPersistenceFailure = null;
    this.retentionRuns = 0;
    this.retentionFailures = 0;
    this.retentionDeleted = 0;
    this.lastRetentionRunAt = null;
    this.lastRetentionDeleted = null;
    this.lastRetentionBackend = null;
    this.lastRetentionError = null;
    this.streamClients = 0;
    this.streamBroadcasts = 0;
    this.latencyStats.clear();
  }

  recordReportAccepted() {
    this.accepted += 1;
    this.lastAcceptedAt = Date.now();
  }

  recordReportRejected(field: string) {
    this.rejected += 1;
    this.rejectedByField.set(field, (this.rejectedByField.get(field) ?? 0) + 1);
  }

  recordPersistenceWrite() {
    this.persistenceWrites += 1;
  }

  recordPersistenceFailure(error: unknown, producerId?: string) {
    this.persistenceFailures += 1;
    this.lastPersistenceFailure = {
      message: error instanceof Error ? error.message : String(error),
      producerId: producerId ?? null,
      at: new Date().toISOString()
    };
  }

  recordRetentionRun(context: RetentionRunContext) {
    this.retentionRuns += 1;
    this.retentionDeleted += context.deleted;
    this.lastRetentionRunAt = Date.now();
    this.lastRetentionDeleted = context.deleted;
    this.lastRetentionBackend = context.backend;
    this.lastRetentionError = null;
    this.observeLatency('retention.sweep', context.durationMs);
  }

  recordRetentionFailure(error: unknown) {
    this.retentionFailures += 1;
    this.lastRetentionRunAt = Date.now();
    this.lastRetentionError = error instanceof Error ? error.message : String(error);
  }

  setStreamClients(count: number) {
    this.streamClients = Math.max(0, count);
  }

  recordBroadcast() {
    this.streamBroadcasts += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }

    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  snapshot(): MetricsSnapshot {
    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencyStats) {
      latencies[metric] = {
        ...stats,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    return {
      createdAt: new Date().toISOString(),
      ingest: {
        accepted: this.accepted,
        rejected: this.rejected,
        rejectedByField: Object.fromEntries(this.rejectedByField),
        lastAcceptedAt: toIso(this.lastAcceptedAt)
      },
      persistence: {
        writes: this.persistenceWrites,
        failures: this.persistenceFailures,
        lastFailure: this.lastPersistenceFailure ? { ...this.lastPersistenceFailure } : null
      },
      retention: {
        runs: this.retentionRuns,
        failures: this.retentionFailures,
        deletedRecords: this.retentionDeleted,
        lastRunAt: toIso(this.lastRetentionRunAt),
        lastDeleted: this.lastRetentionDeleted,
        lastBackend: this.lastRetentionBackend,
        lastError: this.lastRetentionError
      },
      stream: {
        clients: this.streamClients,
        broadcasts: this.streamBroadcasts
      },
      latencies
    };
  }
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

export type { MetricsSnapshot, LatencyStats, RetentionRunContext };
export { MetricsRegistry };
