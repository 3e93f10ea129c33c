import { afterEach, describe, expect, it, vi } from 'vitest';
import { SweepError } from '../src/errors.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { SqliteBackend } from '../src/storage/sqliteStore.js';
import { DegradedBackend } from '../src/storage/degradedStore.js';
import { DAY_MS, type PersistenceBackend } from '../src/storage/types.js';
import { RetentionTask, runRetentionOnce, startRetentionTask } from '../src/tasks/retention.js';
import { createTestLogger, sampleReport } from './helpers/fixtures.js';

function createSweepBackend(cleanup: PersistenceBackend['cleanup']): PersistenceBackend {
  const inner = new DegradedBackend('unused');
  return {
    kind: 'sqlite',
    capabilities: { storedInstances: false, windowedSummary: true },
    write: () => inner.write(),
    queryHistory: () => inner.queryHistory(),
    queryInstances: () => inner.queryInstances(),
    querySummary: hours => inner.querySummary(hours),
    cleanup,
    close: () => inner.close()
  };
}

describe('RetentionTask', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('sweeps on start and again after each interval', async () => {
    vi.useFakeTimers();
    const cleanup = vi.fn(async () => 3);
    const logger = createTestLogger();
    const metrics = new MetricsRegistry();
    const task = startRetentionTask({
      backend: createSweepBackend(cleanup),
      retentionDays: 7,
      intervalMs: 60_000,
      logger,
      metrics
    });

    expect(task.isScheduled()).toBe(true);
    await vi.advanceTimersByTimeAsync(0);
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(cleanup).toHaveBeenCalledWith(7);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(cleanup).toHaveBeenCalledTimes(2);

    const snapshot = metrics.snapshot().retention;
    expect(snapshot.runs).toBe(2);
    expect(snapshot.deletedRecords).toBe(6);
    expect(snapshot.lastBackend).toBe('sqlite');
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ backend: 'sqlite', retentionDays: 7, deleted: 3 }),
      'Retention sweep removed expired reports'
    );

    task.stop();
    expect(task.isScheduled()).toBe(false);
    await vi.advanceTimersByTimeAsync(120_000);
    expect(cleanup).toHaveBeenCalledTimes(2);
  });

  it('logs a failed sweep and keeps the schedule', async () => {
    vi.useFakeTimers();
    const cleanup = vi
      .fn<(arg: number) => Promise<number>>()
      .mockRejectedValueOnce(new Error('disk gone'))
      .mockResolvedValue(0);
    const logger = createTestLogger();
    const metrics = new MetricsRegistry();
    const task = new RetentionTask({
      backend: createSweepBackend(cleanup),
      retentionDays: 2,
      intervalMs: 5_000,
      logger,
      metrics
    });

    task.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(logger.error).toHaveBeenCalledTimes(1);
    const [details, message] = logger.error.mock.calls[0] ?? [];
    expect(message).toBe('Retention task failed');
    expect(details.err).toBeInstanceOf(SweepError);
    expect(details.err.message).toBe('Retention sweep on sqlite failed: disk gone');
    expect(metrics.snapshot().retention.failures).toBe(1);
    expect(metrics.snapshot().retention.lastError).toBe('Retention sweep on sqlite failed: disk gone');

    await vi.advanceTimersByTimeAsync(5_000);
    expect(cleanup).toHaveBeenCalledTimes(2);
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ deleted: 0 }),
      'Retention sweep found nothing to remove'
    );
    expect(metrics.snapshot().retention.lastError).toBeNull();
    task.stop();
  });

  it('does not schedule anything when disabled', async () => {
    vi.useFakeTimers();
    const cleanup = vi.fn(async () => 0);
    const task = new RetentionTask({
      backend: createSweepBackend(cleanup),
      enabled: false,
      retentionDays: 7,
      intervalMs: 1_000,
      logger: createTestLogger()
    });

    task.start();
    expect(task.isScheduled()).toBe(false);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(cleanup).not.toHaveBeenCalled();

    expect(await task.runOnce()).toEqual({
      skipped: true,
      reason: 'disabled',
      backend: 'sqlite',
      retentionDays: 7,
      deleted: 0,
      durationMs: 0
    });
  });
});

describe('runRetentionOnce', () => {
  it('removes expired reports from the row-store', async () => {
    const start = Date.UTC(2024, 0, 10, 12, 0, 0);
    let now = start;
    const backend = new SqliteBackend({ path: ':memory:', clock: () => now });
    await backend.write(sampleReport({ recentRate: 1 }));
    await backend.write(sampleReport({ recentRate: 2 }));
    now += 3 * DAY_MS;
    await backend.write(sampleReport({ recentRate: 3 }));

    const result = await runRetentionOnce({
      backend,
      retentionDays: 2,
      intervalMs: 60_000,
      logger: createTestLogger()
    });

    expect(result).toMatchObject({ skipped: false, backend: 'sqlite', retentionDays: 2, deleted: 2 });
    expect((await backend.queryHistory('p1', 24)).map(record => record.recentRate)).toEqual([3]);
    await backend.close();
  });

  it('rethrows sweep failures with the retention horizon', async () => {
    const backend = createSweepBackend(async () => {
      throw new Error('locked');
    });

    const failure = runRetentionOnce({ backend, retentionDays: 5, intervalMs: 60_000, logger: createTestLogger() });

    await expect(failure).rejects.toBeInstanceOf(SweepError);
    await expect(failure).rejects.toMatchObject({ retentionDays: 5, message: 'Retention sweep on sqlite failed: locked' });
  });
});
