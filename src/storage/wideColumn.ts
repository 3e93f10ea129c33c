import { Bigtable, type Table } from '@google-cloud/bigtable';
import type { BigtableStorageConfig } from '../config/index.js';

export type WideColumnCell = {
  value: string;
  /** Cell write time in microseconds. */
  timestamp: number;
};

export type WideColumnRow = {
  key: string;
  families: Record<string, Record<string, WideColumnCell>>;
};

export type WideColumnMutation = Record<string, Record<string, string>>;

/**
 * The slice of a wide-column table the persistence layer needs. Rows come back
 * in ascending key order, with the newest cell per column.
 */
export interface WideColumnTable {
  readonly name: string;
  ensure(families: readonly string[]): Promise<void>;
  insert(key: string, data: WideColumnMutation): Promise<void>;
  readRows(prefix?: string): Promise<WideColumnRow[]>;
  deleteRows(keys: readonly string[]): Promise<number>;
  close(): Promise<void>;
}

export type WideColumnTableFactory = (config: BigtableStorageConfig) => WideColumnTable;

const DELETE_BATCH_SIZE = 500;

class BigtableTable implements WideColumnTable {
  readonly name: string;

  private readonly client: Bigtable;
  private readonly table: Table;

  constructor(config: BigtableStorageConfig) {
    this.name = config.tableId;
    this.client = new Bigtable({ projectId: config.projectId });
    this.table = this.client.instance(config.instanceId).table(config.tableId);
  }

  async ensure(families: readonly string[]) {
    const [exists] = await this.table.exists();
    if (!exists) {
      await this.table.create({ families: [...families] });
      return;
    }

    const [existing] = await this.table.getFamilies();
    const present = new Set(existing.map(family => family.id));
    for (const family of families) {
      if (!present.has(family)) {
        await this.table.createFamily(family);
      }
    }
  }

  async insert(key: string, data: WideColumnMutation) {
    await this.table.insert({ key, data });
  }

  async readRows(prefix?: string): Promise<WideColumnRow[]> {
    const [rows] = await this.table.getRows(prefix ? { prefix } : {});
    return rows
      .map(row => ({ key: String(row.id), families: readFamilies(row.data) }))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  async deleteRows(keys: readonly string[]) {
    let deleted = 0;
    for (let offset = 0; offset < keys.length; offset += DELETE_BATCH_SIZE) {
      const batch = keys.slice(offset, offset + DELETE_BATCH_SIZE);
      await this.table.mutate(batch.map(key => ({ key, method: 'delete' })));
      deleted += batch.length;
    }
    return deleted;
  }

  async close() {
    await this.client.close();
  }
}

export const createBigtableTable: WideColumnTableFactory = config => new BigtableTable(config);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFamilies(data: unknown): WideColumnRow['families'] {
  const families: WideColumnRow['families'] = {};
  if (!isRecord(data)) {
    return families;
  }

  for (const [family, columns] of Object.entries(data)) {
    if (!isRecord(columns)) {
      continue;
    }
    const cells: Record<string, WideColumnCell> = {};
    for (const [qualifier, versions] of Object.entries(columns)) {
      // newest version first
      const cell = Array.isArray(versions) ? readCell(versions[0]) : null;
      if (cell) {
        cells[qualifier] = cell;
      }
    }
    families[family] = cells;
  }
  return families;
}

function readCell(candidate: unknown): WideColumnCell | null {
  if (!isRecord(candidate)) {
    return null;
  }
  const raw = candidate.value;
  const value = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw === undefined || raw === null ? null : String(raw);
  if (value === null) {
    return null;
  }
  const timestamp = Number(candidate.timestamp ?? 0);
  return { value, timestamp: Number.isFinite(timestamp) ? timestamp : 0 };
}
