import { PersistenceError } from '../errors.js';
import type { HistorySummary, StoredInstance, StoredReport } from '../types.js';
import { normalizeHours, type BackendCapabilities, type PersistenceBackend } from './types.js';

/** Stands in when the configured store could not be opened. */
export class DegradedBackend implements PersistenceBackend {
  readonly kind = 'degraded' as const;
  readonly capabilities: BackendCapabilities = { storedInstances: false, windowedSummary: false };

  constructor(readonly reason: string) {}

  async write(): Promise<StoredReport> {
    throw new PersistenceError('degraded', `Persistence unavailable: ${this.reason}`);
  }

  async queryHistory(): Promise<StoredReport[]> {
    return [];
  }

  async queryInstances(): Promise<StoredInstance[]> {
    return [];
  }

  async querySummary(hours: number): Promise<HistorySummary> {
    return {
      uniqueProducers: 0,
      totalUnits: 0,
      avgRate: 0,
      peakRate: 0,
      sampleCount: 0,
      windowHours: normalizeHours(hours),
      basis: 'window'
    };
  }

  async cleanup(): Promise<number> {
    return 0;
  }

  async close() {}
}
