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
import type { WideColumnCell, WideColumnMutation, WideColumnRow, WideColumnTable } from './wideColumn.js';

export const COLUMN_FAMILIES = ['instance', 'metrics', 'device'] as const;

const KEY_SEPARATOR = '#';
const SEQUENCE_MODULUS = 1_000_000;

export interface BigtableBackendOptions {
  table: WideColumnTable;
  clock?: () => number;
}

export type ParsedRowKey = {
  producerId: string;
  recordedAt: number;
  sequence: number;
};

export function buildRowKey(producerId: string, recordedAt: number, sequence: number): string {
  const padded = String(sequence % SEQUENCE_MODULUS).padStart(6, '0');
  return [producerId, new Date(recordedAt).toISOString(), padded].join(KEY_SEPARATOR);
}

export function parseRowKey(key: string): ParsedRowKey | null {
  const parts = key.split(KEY_SEPARATOR);
  if (parts.length !== 3) {
    return null;
  }
  const [producerId, iso, sequence] = parts;
  const recordedAt = Date.parse(iso);
  const parsedSequence = Number.parseInt(sequence, 10);
  if (!producerId || Number.isNaN(recordedAt) || Number.isNaN(parsedSequence)) {
    return null;
  }
  return { producerId, recordedAt, sequence: parsedSequence };
}

/**
 * Wide-column history store. One row per report; the producer id leads the
 * row key so a prefix scan returns one producer's records in time order.
 */
export class BigtableBackend implements PersistenceBackend {
  readonly kind = 'bigtable' as const;
  readonly capabilities: BackendCapabilities = { storedInstances: true, windowedSummary: false };

  private readonly table: WideColumnTable;
  private readonly clock: () => number;
  private sequence = 0;

  constructor(options: BigtableBackendOptions) {
    this.table = options.table;
    this.clock = options.clock ?? Date.now;
  }

  async initialize() {
    await this.table.ensure(COLUMN_FAMILIES);
  }

  async write(report: ProducerReport): Promise<StoredReport> {
    if (report.producerId.includes(KEY_SEPARATOR)) {
      throw new PersistenceError('bigtable', `Producer id must not contain "${KEY_SEPARATOR}": ${report.producerId}`);
    }

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

    this.sequence = (this.sequence + 1) % SEQUENCE_MODULUS;
    const key = buildRowKey(stored.producerId, stored.recordedAt, this.sequence);

    try {
      await this.table.insert(key, toMutation(stored));
    } catch (error) {
      throw new PersistenceError('bigtable', `Failed to store report for ${report.producerId}`, { cause: error });
    }
    return stored;
  }

  async queryHistory(producerId: string, hours: number): Promise<StoredReport[]> {
    const cutoff = this.clock() - normalizeHours(hours) * HOUR_MS;
    const rows = await this.read(`${producerId}${KEY_SEPARATOR}`, `Failed to read history for ${producerId}`);

    const records: StoredReport[] = [];
    for (const row of rows) {
      const parsed = parseRowKey(row.key);
      if (!parsed || parsed.producerId !== producerId || parsed.recordedAt <= cutoff) {
        continue;
      }
      records.push(fromRow(parsed, row));
    }

    records.sort((a, b) => a.recordedAt - b.recordedAt);
    return records.length > HISTORY_ROW_LIMIT ? records.slice(records.length - HISTORY_ROW_LIMIT) : records;
  }

  async queryInstances(): Promise<StoredInstance[]> {
    const rows = await this.read(undefined, 'Failed to read stored instances');
    const merged = new Map<string, Map<string, WideColumnCell>>();

    // Rows arrive in key order, so on equal cell timestamps the later row wins.
    for (const row of rows) {
      const parsed = parseRowKey(row.key);
      if (!parsed) {
        continue;
      }
      const fields = merged.get(parsed.producerId) ?? new Map<string, WideColumnCell>();
      for (const [family, columns] of Object.entries(row.families)) {
        for (const [qualifier, cell] of Object.entries(columns)) {
          const column = `${family}:${qualifier}`;
          const current = fields.get(column);
          if (!current || cell.timestamp >= current.timestamp) {
            fields.set(column, cell);
          }
        }
      }
      merged.set(parsed.producerId, fields);
    }

    return Array.from(merged, ([producerId, fields]) => toInstance(producerId, fields));
  }

  async querySummary(hours: number): Promise<HistorySummary> {
    const instances = await this.queryInstances();
    let totalUnits = 0;
    let totalRate = 0;
    let peakRate = 0;
    for (const instance of instances) {
      totalUnits += instance.totalUnits;
      totalRate += instance.recentRate;
      peakRate = Math.max(peakRate, instance.recentRate);
    }

    return {
      uniqueProducers: instances.length,
      totalUnits,
      avgRate: instances.length > 0 ? totalRate / instances.length : 0,
      peakRate,
      sampleCount: instances.length,
      windowHours: normalizeHours(hours),
      basis: 'current-snapshot'
    };
  }

  async cleanup(retentionDays: number): Promise<number> {
    const cutoff = this.clock() - normalizeRetentionDays(retentionDays) * DAY_MS;
    const rows = await this.read(undefined, 'Failed to scan for expired reports');
    const expired = rows
      .filter(row => {
        const parsed = parseRowKey(row.key);
        return parsed !== null && parsed.recordedAt <= cutoff;
      })
      .map(row => row.key);

    if (expired.length === 0) {
      return 0;
    }

    try {
      return await this.table.deleteRows(expired);
    } catch (error) {
      throw new PersistenceError('bigtable', 'Failed to delete expired reports', { cause: error });
    }
  }

  async close() {
    await this.table.close();
  }

  private async read(prefix: string | undefined, message: string) {
    try {
      return await this.table.readRows(prefix);
    } catch (error) {
      throw new PersistenceError('bigtable', message, { cause: error });
    }
  }
}

function toMutation(record: StoredReport): WideColumnMutation {
  const device: Record<string, string> = {
    device_count: String(record.deviceCount),
    device_available: String(record.deviceAvailable)
  };
  const extras = record.extras ?? {};
  if (extras.deviceRate !== undefined) {
    device.device_rate = String(extras.deviceRate);
  }
  if (extras.temperature !== undefined) {
    device.temperature = String(extras.temperature);
  }
  if (extras.deviceName !== undefined) {
    device.device_name = extras.deviceName;
  }
  if (extras.power !== undefined) {
    device.power = String(extras.power);
  }
  if (extras.efficiency !== undefined) {
    device.efficiency = String(extras.efficiency);
  }

  return {
    instance: {
      producer_id: record.producerId,
      origin_address: record.originAddress,
      report_timestamp: record.reportTimestamp,
      recorded_at: String(record.recordedAt)
    },
    metrics: {
      total_units: String(record.totalUnits),
      lifetime_rate: String(record.lifetimeRate),
      recent_rate: String(record.recentRate)
    },
    device
  };
}

function fromRow(key: ParsedRowKey, row: WideColumnRow): StoredReport {
  const instance = row.families.instance ?? {};
  const metrics = row.families.metrics ?? {};
  const device = row.families.device ?? {};
  const extras = readExtras(column => device[column]?.value);

  return {
    producerId: key.producerId,
    totalUnits: toNumber(metrics.total_units?.value),
    lifetimeRate: toNumber(metrics.lifetime_rate?.value),
    recentRate: toNumber(metrics.recent_rate?.value),
    reportTimestamp: instance.report_timestamp?.value ?? '',
    deviceCount: toNumber(device.device_count?.value),
    deviceAvailable: device.device_available?.value === 'true',
    originAddress: instance.origin_address?.value ?? '',
    extras: Object.keys(extras).length > 0 ? extras : undefined,
    recordedAt: key.recordedAt
  };
}

function toInstance(producerId: string, fields: Map<string, WideColumnCell>): StoredInstance {
  const value = (column: string) => fields.get(column)?.value;
  const recordedAt = value('instance:recorded_at');

  return {
    producerId,
    lastSeen: recordedAt === undefined ? null : new Date(toNumber(recordedAt)).toISOString(),
    totalUnits: toNumber(value('metrics:total_units')),
    lifetimeRate: toNumber(value('metrics:lifetime_rate')),
    recentRate: toNumber(value('metrics:recent_rate')),
    deviceCount: toNumber(value('device:device_count')),
    deviceAvailable: value('device:device_available') === 'true',
    extras: readExtras(column => value(`device:${column}`))
  };
}

function readExtras(lookup: (column: string) => string | undefined): DeviceExtras {
  const extras: DeviceExtras = {};
  const deviceRate = lookup('device_rate');
  if (deviceRate !== undefined) {
    extras.deviceRate = toNumber(deviceRate);
  }
  const temperature = lookup('temperature');
  if (temperature !== undefined) {
    extras.temperature = toNumber(temperature);
  }
  const deviceName = lookup('device_name');
  if (deviceName !== undefined) {
    extras.deviceName = deviceName;
  }
  const power = lookup('power');
  if (power !== undefined) {
    extras.power = toNumber(power);
  }
  const efficiency = lookup('efficiency');
  if (efficiency !== undefined) {
    extras.efficiency = toNumber(efficiency);
  }
  return extras;
}

function toNumber(value: string | undefined): number {
  if (value === undefined) {
    return 0;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}
