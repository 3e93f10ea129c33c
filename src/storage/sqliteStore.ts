import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { PersistenceError } from '../errors.js';
import type { DeviceExtras, HistorySummary, ProducerReport, StoredInstance, StoredReport } from '../types.js';
import {
  DAY_MS,
  HISTORY_ROW_LIMIT,
  HOUR_MS,
  normalizeHours,
  normalizeRetentionDays,
  type BackendCapabilities,
  type PersistenceBackend
} from './types.js';

export interface SqliteBackendOptions {
  path: string;
  clock?: () => number;
}

type ReportRow = {
  producerId: string;
  totalUnits: number;
  lifetimeRate: number;
  recentRate: number;
  deviceCount: number;
  deviceAvailable: number;
  originAddress: string;
  reportTimestamp: string;
  recordedAt: number;
  deviceRate: number | null;
  temperature: number | null;
  deviceName: string | null;
  power: number | null;
  efficiency: number | null;
};

type SummaryRow = {
  uniqueProducers: number | null;
  totalUnits: number | null;
  avgRate: number | null;
  peakRate: number | null;
  sampleCount: number | null;
};

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS producer_reports (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    producer_id TEXT NOT NULL,
    total_units INTEGER NOT NULL,
    lifetime_rate REAL NOT NULL,
    recent_rate REAL NOT NULL,
    device_count INTEGER NOT NULL,
    device_available INTEGER NOT NULL,
    origin_address TEXT NOT NULL,
    report_timestamp TEXT NOT NULL,
    recorded_at INTEGER NOT NULL,
    device_rate REAL,
    temperature REAL,
    device_name TEXT,
    power REAL,
    efficiency REAL
  );

  CREATE INDEX IF NOT EXISTS idx_reports_producer_recorded
    ON producer_reports (producer_id, recorded_at DESC);

  CREATE INDEX IF NOT EXISTS idx_reports_recorded
    ON producer_reports (recorded_at);
`;

const REPORT_COLUMNS = `
  producer_id AS producerId,
  total_units AS totalUnits,
  lifetime_rate AS lifetimeRate,
  recent_rate AS recentRate,
  device_count AS deviceCount,
  device_available AS deviceAvailable,
  origin_address AS originAddress,
  report_timestamp AS reportTimestamp,
  recorded_at AS recordedAt,
  device_rate AS deviceRate,
  temperature,
  device_name AS deviceName,
  power,
  efficiency
`;

/**
 * Embedded row-store. Every report becomes one row; reads and the retention
 * sweep are single statements against the recorded_at index.
 */
export class SqliteBackend implements PersistenceBackend {
  readonly kind = 'sqlite' as const;
  readonly capabilities: BackendCapabilities = { storedInstances: false, windowedSummary: true };

  private readonly db: Database.Database;
  private readonly clock: () => number;
  private readonly insertStatement: Database.Statement;
  private readonly historyStatement: Database.Statement;
  private readonly summaryStatement: Database.Statement;
  private readonly deleteOlderThanStatement: Database.Statement;

  readonly databasePath: string;

  constructor(options: SqliteBackendOptions) {
    this.clock = options.clock ?? Date.now;
    this.databasePath = options.path === ':memory:' ? options.path : path.resolve(options.path);

    try {
      if (this.databasePath !== ':memory:') {
        fs.mkdirSync(path.dirname(this.databasePath), { recursive: true });
      }
      this.db = new Database(this.databasePath);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);

      this.insertStatement = this.db.prepare(`
        INSERT INTO producer_reports (
          producer_id, total_units, lifetime_rate, recent_rate, device_count, device_available,
          origin_address, report_timestamp, recorded_at, device_rate, temperature, device_name,
          power, efficiency
        ) VALUES (
          @producerId, @totalUnits, @lifetimeRate, @recentRate, @deviceCount, @deviceAvailable,
          @originAddress, @reportTimestamp, @recordedAt, @deviceRate, @temperature, @deviceName,
          @power, @efficiency
        )
      `);

      this.historyStatement = this.db.prepare(`
        SELECT ${REPORT_COLUMNS}
        FROM producer_reports
        WHERE producer_id = @producerId AND recorded_at > @cutoff
        ORDER BY recorded_at DESC, id DESC
        LIMIT @limit
      `);

      this.summaryStatement = this.db.prepare(`
        SELECT
          COUNT(DISTINCT producer_id) AS uniqueProducers,
          SUM(total_units) AS totalUnits,
          AVG(recent_rate) AS avgRate,
          MAX(recent_rate) AS peakRate,
          COUNT(*) AS sampleCount
        FROM producer_reports
        WHERE recorded_at > @cutoff
      `);

      this.deleteOlderThanStatement = this.db.prepare(
        'DELETE FROM producer_reports WHERE recorded_at <= @cutoff'
      );
    } catch (error) {
      throw new PersistenceError('sqlite', `Failed to open database at ${this.databasePath}`, {
        cause: error
      });
    }
  }

  async write(report: ProducerReport): Promise<StoredReport> {
    const stored: StoredReport = {
      producerId: report.producerId,
      totalUnits: report.totalUnits,
      lifetimeRate: report.lifetimeRate,
      recentRate: report.recentRate,
      reportTimestamp: report.reportTimestamp,
      deviceCount: report.deviceCount,
      deviceAvailable: report.deviceAvailable,
      originAddress: report.originAddress,
      extras: report.extras ? { ...report.extras } : undefined,
      recordedAt: this.clock()
    };

    try {
      this.insertStatement.run({
        producerId: stored.producerId,
        totalUnits: stored.totalUnits,
        lifetimeRate: stored.lifetimeRate,
        recentRate: stored.recentRate,
        deviceCount: stored.deviceCount,
        deviceAvailable: stored.deviceAvailable ? 1 : 0,
        originAddress: stored.originAddress,
        reportTimestamp: stored.reportTimestamp,
        recordedAt: stored.recordedAt,
        deviceRate: stored.extras?.deviceRate ?? null,
        temperature: stored.extras?.temperature ?? null,
        deviceName: stored.extras?.deviceName ?? null,
        power: stored.extras?.power ?? null,
        efficiency: stored.extras?.efficiency ?? null
      });
    } catch (error) {
      throw new PersistenceError('sqlite', `Failed to store report for ${report.producerId}`, {
        cause: error
      });
    }

    return stored;
  }

  async queryHistory(producerId: string, hours: number): Promise<StoredReport[]> {
    const cutoff = this.clock() - normalizeHours(hours) * HOUR_MS;
    try {
      const rows = this.historyStatement.all({
        producerId,
        cutoff,
        limit: HISTORY_ROW_LIMIT
      }) as ReportRow[];
      return rows.map(mapReportRow);
    } catch (error) {
      throw new PersistenceError('sqlite', `Failed to read history for ${producerId}`, { cause: error });
    }
  }

  /** The row-store keeps no per-producer view; the live registry serves that. */
  async queryInstances(): Promise<StoredInstance[]> {
    return [];
  }

  async querySummary(hours: number): Promise<HistorySummary> {
    const windowHours = normalizeHours(hours);
    const cutoff = this.clock() - windowHours * HOUR_MS;
    let row: SummaryRow | undefined;
    try {
      row = this.summaryStatement.get({ cutoff }) as SummaryRow | undefined;
    } catch (error) {
      throw new PersistenceError('sqlite', 'Failed to summarize history', { cause: error });
    }

    return {
      uniqueProducers: row?.uniqueProducers ?? 0,
      totalUnits: row?.totalUnits ?? 0,
      avgRate: row?.avgRate ?? 0,
      peakRate: row?.peakRate ?? 0,
      sampleCount: row?.sampleCount ?? 0,
      windowHours,
      basis: 'window'
    };
  }

  async cleanup(retentionDays: number): Promise<number> {
    const cutoff = this.clock() - normalizeRetentionDays(retentionDays) * DAY_MS;
    try {
      const result = this.deleteOlderThanStatement.run({ cutoff });
      return Math.max(0, result.changes);
    } catch (error) {
      throw new PersistenceError('sqlite', 'Failed to delete expired reports', { cause: error });
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function mapReportRow(row: ReportRow): StoredReport {
  const extras: DeviceExtras = {};
  if (row.deviceRate !== null) {
    extras.deviceRate = row.deviceRate;
  }
  if (row.temperature !== null) {
    extras.temperature = row.temperature;
  }
  if (row.deviceName !== null) {
    extras.deviceName = row.deviceName;
  }
  if (row.power !== null) {
    extras.power = row.power;
  }
  if (row.efficiency !== null) {
    extras.efficiency = row.efficiency;
  }

  return {
    producerId: row.producerId,
    totalUnits: row.totalUnits,
    lifetimeRate: row.lifetimeRate,
    recentRate: row.recentRate,
    reportTimestamp: row.reportTimestamp,
    deviceCount: row.deviceCount,
    deviceAvailable: row.deviceAvailable === 1,
    originAddress: row.originAddress,
    extras: Object.keys(extras).length > 0 ? extras : undefined,
    recordedAt: row.recordedAt
  };
}
