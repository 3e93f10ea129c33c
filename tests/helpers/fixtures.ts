import { vi } from 'vitest';
import type { AppConfig } from '../../src/config/index.js';
import type { Logger } from '../../src/logger.js';
import type { ProducerReport, ProducerReportInput } from '../../src/types.js';

export function createTestConfig(): AppConfig {
  return {
    app: { name: 'FleetTelemetryTest' },
    logging: { level: 'silent' },
    server: { host: '127.0.0.1', port: 0 },
    storage: {
      backend: 'sqlite',
      sqlite: { path: ':memory:' },
      bigtable: { projectId: 'test-project', instanceId: 'test-instance', tableId: 'test-table' }
    },
    registry: { staleThresholdSeconds: 30, hardExpirySeconds: 3600, maxEntries: 10000 },
    retention: { enabled: true, retentionDays: 7, intervalSeconds: 3600 },
    pipeline: {
      snapshotIntervalSeconds: 5,
      historySize: 300,
      alertHistorySize: 100,
      nominalBatchSize: 5000,
      thresholds: {
        writeLatencyMs: 100,
        errorRate: 0.01,
        queueDepth: 50000,
        bufferLagSeconds: 10,
        workerUtilization: 0.9
      }
    }
  };
}

export function createTestLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  } satisfies Logger;
}

export function sampleInput(overrides: Partial<ProducerReportInput> = {}): ProducerReportInput {
  return {
    producerId: 'p1',
    totalUnits: 1000,
    lifetimeRate: 50,
    recentRate: 100,
    reportTimestamp: '2024-01-01T00:00:00Z',
    deviceCount: 2,
    deviceAvailable: true,
    originAddress: '10.0.0.1',
    ...overrides
  };
}

export function sampleReport(overrides: Partial<ProducerReport> = {}): ProducerReport {
  return { ...sampleInput(), receivedAt: 1_700_000_000, ...overrides };
}

export function samplePayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    instance_id: 'p1',
    total_hashes: 1000,
    overall_hashrate: 50,
    recent_hashrate: 100,
    timestamp: '2024-01-01T00:00:00Z',
    gpu_count: 2,
    gpu_available: true,
    ...overrides
  };
}
