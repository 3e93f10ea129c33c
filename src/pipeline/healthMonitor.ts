import type { PipelineConfig, PipelineThresholdConfig } from '../config/index.js';
import { ValidationError } from '../errors.js';
import loggerModule, { type Logger } from '../logger.js';
import { RingWindow } from '../timeseries/ringWindow.js';
import type { AlertRecord } from '../types.js';
import {
  DEFAULT_PIPELINE_THRESHOLDS,
  evaluateBufferThresholds,
  evaluateRemoteStoreThresholds,
  evaluateWorkerThresholds,
  type ThresholdBreach
} from './thresholds.js';

export type RemoteStoreMetrics = {
  writesPerSecond: number;
  latencyMs: number;
  errorRate: number;
  shardStats: Record<string, number>;
};

export type BufferMetrics = {
  queueDepth: number;
  lagSeconds: number;
};

export type WorkerMetrics = {
  poolSize: number;
  utilization: number;
  batchEfficiency: number;
};

export type PipelineMetrics = {
  remoteStore: RemoteStoreMetrics;
  buffer: BufferMetrics;
  workers: WorkerMetrics;
  retryRate: number;
};

export type PipelineCounters = {
  totalWrites: number;
  failedWrites: number;
  totalRetries: number;
  totalBatches: number;
  messagesBuffered: number;
  messagesProcessed: number;
};

export type PipelineMetricsSnapshot = {
  timestamp: number;
  metrics: PipelineMetrics;
  counters: PipelineCounters;
};

export type PipelineHistorySummary = {
  avgWritesPerSecond: number;
  totalMessagesProcessed: number;
  successRate: number;
  timeSpanSeconds: number;
};

export type PipelineMetricsView = {
  metrics: PipelineMetrics;
  counters: PipelineCounters;
  alerts: AlertRecord[];
  history: PipelineHistorySummary | null;
};

export type RemoteStoreUpdate = {
  writesPerSecond: number;
  latencyMs: number;
  errorRate: number;
  shardStats?: Record<string, number>;
};

export type BufferUpdate = BufferMetrics & { messagesBuffered: number };

export type BatchRecord = {
  size: number;
  success?: boolean;
  retries?: number;
};

export type PipelineUpdate = {
  remoteStore?: RemoteStoreUpdate;
  buffer?: BufferUpdate;
  workers?: WorkerMetrics;
  batch?: BatchRecord;
};

export interface PipelineHealthMonitorOptions {
  thresholds?: PipelineThresholdConfig;
  historySize?: number;
  alertHistorySize?: number;
  nominalBatchSize?: number;
  snapshotIntervalMs?: number;
  logger?: Logger;
  clock?: () => number;
}

const RECENT_ALERT_COUNT = 10;
const DEFAULT_HISTORY_SIZE = 300;
const DEFAULT_ALERT_HISTORY_SIZE = 100;
const DEFAULT_NOMINAL_BATCH_SIZE = 5000;
const DEFAULT_SNAPSHOT_INTERVAL_MS = 5000;

export class PipelineHealthMonitor {
  private readonly thresholds: PipelineThresholdConfig;
  private readonly nominalBatchSize: number;
  private readonly snapshotIntervalMs: number;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly history: RingWindow<PipelineMetricsSnapshot>;
  private readonly alerts: RingWindow<AlertRecord>;
  private metrics: PipelineMetrics = createEmptyMetrics();
  private counters: PipelineCounters = createEmptyCounters();
  private timer: NodeJS.Timeout | null = null;

  constructor(options: PipelineHealthMonitorOptions = {}) {
    this.thresholds = options.thresholds ?? DEFAULT_PIPELINE_THRESHOLDS;
    this.nominalBatchSize = options.nominalBatchSize ?? DEFAULT_NOMINAL_BATCH_SIZE;
    this.snapshotIntervalMs = options.snapshotIntervalMs ?? DEFAULT_SNAPSHOT_INTERVAL_MS;
    this.logger = options.logger ?? loggerModule;
    this.clock = options.clock ?? Date.now;
    this.history = new RingWindow<PipelineMetricsSnapshot>({
      capacity: options.historySize ?? DEFAULT_HISTORY_SIZE,
      timestampOf: snapshot => snapshot.timestamp
    });
    this.alerts = new RingWindow<AlertRecord>({
      capacity: options.alertHistorySize ?? DEFAULT_ALERT_HISTORY_SIZE,
      timestampOf: alert => Date.parse(alert.timestamp)
    });
  }

  static fromConfig(config: PipelineConfig, options: Pick<PipelineHealthMonitorOptions, 'logger' | 'clock'> = {}) {
    return new PipelineHealthMonitor({
      ...options,
      thresholds: config.thresholds,
      historySize: config.historySize,
      alertHistorySize: config.alertHistorySize,
      nominalBatchSize: config.nominalBatchSize,
      snapshotIntervalMs: config.snapshotIntervalSeconds * 1000
    });
  }

  start() {
    if (this.timer) {
      return;
    }
    this.captureSnapshot();
    this.timer = setInterval(() => {
      this.captureSnapshot();
    }, this.snapshotIntervalMs);
    this.timer.unref?.();
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning() {
    return this.timer !== null;
  }

  updateRemoteStoreMetrics(update: RemoteStoreUpdate) {
    this.metrics = {
      ...this.metrics,
      remoteStore: {
        writesPerSecond: update.writesPerSecond,
        latencyMs: update.latencyMs,
        errorRate: update.errorRate,
        shardStats: { ...(update.shardStats ?? {}) }
      }
    };
    this.counters.totalWrites += Math.trunc(update.writesPerSecond);
    this.raise(evaluateRemoteStoreThresholds(update, this.thresholds));
  }

  updateBufferMetrics(update: BufferUpdate) {
    this.metrics = {
      ...this.metrics,
      buffer: { queueDepth: update.queueDepth, lagSeconds: update.lagSeconds }
    };
    this.counters.messagesBuffered += update.messagesBuffered;
    this.raise(evaluateBufferThresholds(update, this.thresholds));
  }

  updateWorkerMetrics(update: WorkerMetrics) {
    this.metrics = { ...this.metrics, workers: { ...update } };
    this.raise(evaluateWorkerThresholds(update, this.thresholds));
  }

  recordBatch(batch: BatchRecord) {
    const retries = batch.retries ?? 0;
    this.counters.totalBatches += 1;
    this.counters.messagesProcessed += batch.size;
    if (batch.success === false) {
      this.counters.failedWrites += batch.size;
    }
    if (retries > 0) {
      this.counters.totalRetries += retries;
      this.metrics = {
        ...this.metrics,
        retryRate: this.counters.totalRetries / Math.max(1, this.counters.totalBatches)
      };
    }
  }

  /** Applies every category present in a pushed payload. */
  applyUpdate(payload: unknown) {
    const update = parsePipelineUpdate(payload);
    if (update.remoteStore) {
      this.updateRemoteStoreMetrics(update.remoteStore);
    }
    if (update.buffer) {
      this.updateBufferMetrics(update.buffer);
    }
    if (update.workers) {
      this.updateWorkerMetrics(update.workers);
    }
    if (update.batch) {
      this.recordBatch(update.batch);
    }
    return update;
  }

  captureSnapshot(): PipelineMetricsSnapshot {
    if (this.counters.totalBatches > 0) {
      this.metrics = {
        ...this.metrics,
        workers: {
          ...this.metrics.workers,
          batchEfficiency:
            this.counters.messagesProcessed / (this.counters.totalBatches * this.nominalBatchSize)
        }
      };
    }

    const snapshot: PipelineMetricsSnapshot = Object.freeze({
      timestamp: this.clock(),
      metrics: cloneMetrics(this.metrics),
      counters: { ...this.counters }
    });
    this.history.push(snapshot);
    return snapshot;
  }

  getMetrics(): PipelineMetricsView {
    return {
      metrics: cloneMetrics(this.metrics),
      counters: { ...this.counters },
      alerts: this.alerts.latest(RECENT_ALERT_COUNT),
      history: this.summarizeHistory()
    };
  }

  getAlerts(): AlertRecord[] {
    return this.alerts.toArray();
  }

  getHistory(): PipelineMetricsSnapshot[] {
    return this.history.toArray();
  }

  private summarizeHistory(): PipelineHistorySummary | null {
    if (this.history.size === 0) {
      return null;
    }

    return {
      avgWritesPerSecond: this.history.ratePerSecond(snapshot => snapshot.counters.totalWrites),
      totalMessagesProcessed: this.counters.messagesProcessed,
      successRate: 1 - this.counters.failedWrites / Math.max(1, this.counters.messagesProcessed),
      timeSpanSeconds: this.history.spanMs() / 1000
    };
  }

  private raise(breaches: ThresholdBreach[]) {
    for (const breach of breaches) {
      const alert: AlertRecord = Object.freeze({
        timestamp: new Date(this.clock()).toISOString(),
        severity: breach.severity,
        message: breach.message
      });
      this.alerts.push(alert);
      this.logger.warn(
        { severity: breach.severity, metric: breach.triggeredBy, threshold: breach.threshold, actual: breach.actual },
        `Pipeline alert [${breach.severity}]: ${breach.message}`
      );
    }
  }
}

function createEmptyMetrics(): PipelineMetrics {
  return {
    remoteStore: { writesPerSecond: 0, latencyMs: 0, errorRate: 0, shardStats: {} },
    buffer: { queueDepth: 0, lagSeconds: 0 },
    workers: { poolSize: 0, utilization: 0, batchEfficiency: 0 },
    retryRate: 0
  };
}

function createEmptyCounters(): PipelineCounters {
  return {
    totalWrites: 0,
    failedWrites: 0,
    totalRetries: 0,
    totalBatches: 0,
    messagesBuffered: 0,
    messagesProcessed: 0
  };
}

function cloneMetrics(metrics: PipelineMetrics): PipelineMetrics {
  return {
    remoteStore: { ...metrics.remoteStore, shardStats: { ...metrics.remoteStore.shardStats } },
    buffer: { ...metrics.buffer },
    workers: { ...metrics.workers },
    retryRate: metrics.retryRate
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a pushed payload. Each category may be sent under its own name or the
 * snake_case alias used by existing pipeline workers; missing numeric fields
 * read as zero.
 */
export function parsePipelineUpdate(payload: unknown): PipelineUpdate {
  if (!isRecord(payload)) {
    throw new ValidationError('body', 'Pipeline update must be a JSON object');
  }

  const update: PipelineUpdate = {};

  const remoteStore = pickCategory(payload, 'remoteStore', 'bigtable');
  if (remoteStore) {
    const reader = createFieldReader(remoteStore.name, remoteStore.value);
    update.remoteStore = {
      writesPerSecond: reader.number('writesPerSecond', 'writes_per_second'),
      latencyMs: reader.number('latencyMs', 'latency_ms'),
      errorRate: reader.number('errorRate', 'error_rate'),
      shardStats: reader.counts('shardStats', 'shard_stats')
    };
  }

  const buffer = pickCategory(payload, 'buffer');
  if (buffer) {
    const reader = createFieldReader(buffer.name, buffer.value);
    update.buffer = {
      queueDepth: reader.number('queueDepth', 'queue_depth'),
      lagSeconds: reader.number('lagSeconds', 'lag_seconds'),
      messagesBuffered: reader.number('messagesBuffered', 'messages_buffered')
    };
  }

  const workers = pickCategory(payload, 'workers');
  if (workers) {
    const reader = createFieldReader(workers.name, workers.value);
    update.workers = {
      poolSize: reader.number('poolSize', 'pool_size'),
      utilization: reader.number('utilization'),
      batchEfficiency: reader.number('batchEfficiency', 'batch_efficiency')
    };
  }

  const batch = pickCategory(payload, 'batch');
  if (batch) {
    const reader = createFieldReader(batch.name, batch.value);
    update.batch = {
      size: reader.number('size'),
      success: reader.boolean('success', true),
      retries: reader.number('retries')
    };
  }

  return update;
}

function pickCategory(payload: Record<string, unknown>, ...names: string[]) {
  for (const name of names) {
    if (!(name in payload)) {
      continue;
    }
    const value = payload[name];
    if (!isRecord(value)) {
      throw new ValidationError(name, `Invalid field: ${name}`);
    }
    return { name, value };
  }
  return null;
}

function createFieldReader(category: string, source: Record<string, unknown>) {
  const lookup = (names: string[]) => {
    for (const name of names) {
      if (source[name] !== undefined) {
        return { name, value: source[name] };
      }
    }
    return null;
  };

  return {
    number(...names: string[]) {
      const found = lookup(names);
      if (!found) {
        return 0;
      }
      if (typeof found.value !== 'number' || !Number.isFinite(found.value) || found.value < 0) {
        throw new ValidationError(`${category}.${found.name}`, `Invalid field: ${category}.${found.name}`);
      }
      return found.value;
    },
    boolean(name: string, fallback: boolean) {
      const found = lookup([name]);
      if (!found) {
        return fallback;
      }
      if (typeof found.value !== 'boolean') {
        throw new ValidationError(`${category}.${name}`, `Invalid field: ${category}.${name}`);
      }
      return found.value;
    },
    counts(...names: string[]) {
      const found = lookup(names);
      const counts: Record<string, number> = {};
      if (!found) {
        return counts;
      }
      if (!isRecord(found.value)) {
        throw new ValidationError(`${category}.${found.name}`, `Invalid field: ${category}.${found.name}`);
      }
      for (const [shard, count] of Object.entries(found.value)) {
        if (typeof count === 'number' && Number.isFinite(count)) {
          counts[shard] = count;
        }
      }
      return counts;
    }
  };
}
