import type { HistorySummary, ProducerReport, StoredInstance, StoredReport } from '../types.js';

export const HISTORY_ROW_LIMIT = 1000;

export type BackendKind = 'sqlite' | 'bigtable' | 'degraded';

export type BackendCapabilities = {
  /** Whether queryInstances() reads real data rather than returning nothing. */
  storedInstances: boolean;
  /** Whether querySummary() aggregates over the requested window. */
  windowedSummary: boolean;
};

/**
 * Durable history of producer reports.
 *
 * Ordering of queryHistory() results is backend specific: callers may rely on
 * every matching record (up to the row limit) being present exactly once, and
 * nothing more.
 */
export interface PersistenceBackend {
  readonly kind: BackendKind;
  readonly capabilities: BackendCapabilities;
  write(report: ProducerReport): Promise<StoredReport>;
  queryHistory(producerId: string, hours: number): Promise<StoredReport[]>;
  queryInstances(): Promise<StoredInstance[]>;
  querySummary(hours: number): Promise<HistorySummary>;
  cleanup(retentionDays: number): Promise<number>;
  close(): Promise<void>;
}

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export function normalizeHours(hours: number): number {
  return Number.isFinite(hours) && hours > 0 ? hours : 0;
}

export function normalizeRetentionDays(days: number): number {
  return Number.isFinite(days) && days > 0 ? days : 0;
}
