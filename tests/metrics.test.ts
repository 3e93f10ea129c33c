import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';

describe('MetricsCounters', () => {
  it('counts accepted and rejected reports by field', () => {
    const registry = new MetricsRegistry();
    registry.recordReportAccepted();
    registry.recordReportRejected('gpu_count');
    registry.recordReportRejected('gpu_count');
    registry.recordReportRejected('instance_id');

    const snapshot = registry.snapshot();
    expect(snapshot.ingest.accepted).toBe(1);
    expect(snapshot.ingest.rejected).toBe(3);
    expect(snapshot.ingest.rejectedByField).toEqual({ gpu_count: 2, instance_id: 1 });
    expect(snapshot.ingest.lastAcceptedAt).not.toBeNull();
  });

  it('remembers the last persistence failure', () => {
    const registry = new MetricsRegistry();
    registry.recordPersistenceWrite();
    registry.recordPersistenceFailure(new Error('disk full'), 'p1');
    registry.recordPersistenceFailure('timeout');

    expect(registry.snapshot().persistence).toMatchObject({
      writes: 1,
      failures: 2,
      lastFailure: { message: 'timeout', producerId: null }
    });
  });

  it('tracks retention runs and clears the last error after a success', () => {
    const registry = new MetricsRegistry();
    registry.recordRetentionFailure(new Error('locked'));
    expect(registry.snapshot().retention.lastError).toBe('locked');

    registry.recordRetentionRun({ deleted: 4, durationMs: 12, backend: 'sqlite' });
    registry.recordRetentionRun({ deleted: 1, durationMs: 8, backend: 'bigtable' });

    const snapshot = registry.snapshot();
    expect(snapshot.retention).toMatchObject({
      runs: 2,
      failures: 1,
      deletedRecords: 5,
      lastDeleted: 1,
      lastBackend: 'bigtable',
      lastError: null
    });
    expect(snapshot.latencies['retention.sweep']).toEqual({
      count: 2,
      totalMs: 20,
      minMs: 8,
      maxMs: 12,
      averageMs: 10
    });
  });

  it('tracks stream clients and broadcasts', () => {
    const registry = new MetricsRegistry();
    registry.setStreamClients(3);
    registry.setStreamClients(-1);
    registry.recordBroadcast();

    expect(registry.snapshot().stream).toEqual({ clients: 0, broadcasts: 1 });
  });
});

describe('MetricsLatency', () => {
  it('times work even when it fails', async () => {
    const registry = new MetricsRegistry();

    expect(await registry.time('persistence.write', async () => 'ok')).toBe('ok');
    await expect(
      registry.time('persistence.write', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(registry.snapshot().latencies['persistence.write']?.count).toBe(2);
  });

  it('ignores non-finite durations and resets', () => {
    const registry = new MetricsRegistry();
    registry.observeLatency('query', Number.NaN);
    expect(registry.snapshot().latencies).toEqual({});

    registry.observeLatency('query', 5);
    registry.recordReportAccepted();
    registry.reset();

    const snapshot = registry.snapshot();
    expect(snapshot.latencies).toEqual({});
    expect(snapshot.ingest.accepted).toBe(0);
  });
});
