import { performance } from 'node:perf_hooks';
import { describeError, SweepError } from '../errors.js';
import loggerModule from '../logger.js';
import { MetricsRegistry } from '../metrics/index.js';
import type { PersistenceBackend } from '../storage/types.js';

type RetentionLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'error'>;

export interface RetentionTaskOptions {
  backend: PersistenceBackend;
  enabled?: boolean;
  retentionDays: number;
  intervalMs: number;
  logger?: RetentionLogger;
  metrics?: MetricsRegistry;
}

type NormalizedOptions = {
  backend: PersistenceBackend;
  enabled: boolean;
  retentionDays: number;
  intervalMs: number;
};

export type RetentionRunResult = {
  skipped: boolean;
  reason?: 'disabled';
  backend: string;
  retentionDays: number;
  deleted: number;
  durationMs: number;
};

export class RetentionTask {
  private readonly options: NormalizedOptions;
  private readonly logger: RetentionLogger;
  private readonly metrics: MetricsRegistry | null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;

  constructor(options: RetentionTaskOptions) {
    this.options = normalizeOptions(options);
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? null;
  }

  start() {
    if (this.timer || !this.options.enabled) {
      return;
    }

    this.stopped = false;
    this.scheduleNext(0);
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isScheduled() {
    return this.timer !== null;
  }

  /** Runs one sweep now. A failed sweep is logged and reported as null. */
  async runOnce(): Promise<RetentionRunResult | null> {
    if (this.running) {
      return null;
    }

    this.running = true;
    try {
      return await executeRetentionRun(this.options, this.logger, this.metrics);
    } catch (error) {
      this.logger.error({ err: error }, 'Retention task failed');
      return null;
    } finally {
      this.running = false;
    }
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().finally(() => {
        this.scheduleNext(this.options.intervalMs);
      });
    }, delayMs);
    this.timer.unref?.();
  }
}

export function startRetentionTask(options: RetentionTaskOptions): RetentionTask {
  const task = new RetentionTask(options);
  task.start();
  return task;
}

export async function runRetentionOnce(options: RetentionTaskOptions): Promise<RetentionRunResult> {
  const normalized = normalizeOptions(options);
  const logger = options.logger ?? loggerModule;
  return executeRetentionRun(normalized, logger, options.metrics ?? null);
}

function normalizeOptions(options: RetentionTaskOptions): NormalizedOptions {
  const retentionDays =
    Number.isFinite(options.retentionDays) && options.retentionDays >= 0 ? options.retentionDays : 0;

  return {
    backend: options.backend,
    enabled: options.enabled ?? true,
    retentionDays,
    intervalMs: Math.max(1000, Math.floor(options.intervalMs))
  };
}

async function executeRetentionRun(
  options: NormalizedOptions,
  logger: RetentionLogger,
  metrics: MetricsRegistry | null
): Promise<RetentionRunResult> {
  const backend = options.backend.kind;

  if (!options.enabled) {
    logger.info({ backend }, 'Retention disabled; skipping sweep');
    return {
      skipped: true,
      reason: 'disabled',
      backend,
      retentionDays: options.retentionDays,
      deleted: 0,
      durationMs: 0
    };
  }

  const startedAt = performance.now();
  let deleted: number;
  try {
    deleted = await options.backend.cleanup(options.retentionDays);
  } catch (error) {
    const sweepError = new SweepError(
      options.retentionDays,
      `Retention sweep on ${backend} failed: ${describeError(error)}`,
      { cause: error }
    );
    metrics?.recordRetentionFailure(sweepError);
    throw sweepError;
  }
  const durationMs = performance.now() - startedAt;

  metrics?.recordRetentionRun({ deleted, durationMs, backend });
  logger.info(
    { backend, retentionDays: options.retentionDays, deleted, durationMs },
    deleted > 0 ? 'Retention sweep removed expired reports' : 'Retention sweep found nothing to remove'
  );

  return {
    skipped: false,
    backend,
    retentionDays: options.retentionDays,
    deleted,
    durationMs
  };
}
