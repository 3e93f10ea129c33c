import type {
  WideColumnCell,
  WideColumnMutation,
  WideColumnRow,
  WideColumnTable
} from '../../src/storage/wideColumn.js';

type Operation = 'ensure' | 'insert' | 'read' | 'delete';

export class MemoryWideColumnTable implements WideColumnTable {
  readonly name = 'memory';
  readonly rows = new Map<string, WideColumnRow>();
  readonly families = new Set<string>();
  readonly failing = new Set<Operation>();
  closed = false;
  private tick = 0;

  async ensure(families: readonly string[]) {
    this.check('ensure');
    for (const family of families) {
      this.families.add(family);
    }
  }

  async insert(key: string, data: WideColumnMutation) {
    this.check('insert');
    this.tick += 1;
    const row = this.rows.get(key) ?? { key, families: {} };
    for (const [family, columns] of Object.entries(data)) {
      if (!this.families.has(family)) {
        throw new Error(`Unknown column family: ${family}`);
      }
      const cells: Record<string, WideColumnCell> = { ...(row.families[family] ?? {}) };
      for (const [qualifier, value] of Object.entries(columns)) {
        cells[qualifier] = { value, timestamp: this.tick };
      }
      row.families[family] = cells;
    }
    this.rows.set(key, row);
  }

  /** Writes a row with explicit cell timestamps. */
  put(key: string, data: Record<string, Record<string, WideColumnCell>>) {
    this.rows.set(key, { key, families: data });
  }

  async readRows(prefix?: string) {
    this.check('read');
    return Array.from(this.rows.values())
      .filter(row => !prefix || row.key.startsWith(prefix))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  async deleteRows(keys: readonly string[]) {
    this.check('delete');
    let deleted = 0;
    for (const key of keys) {
      if (this.rows.delete(key)) {
        deleted += 1;
      }
    }
    return deleted;
  }

  async close() {
    this.closed = true;
  }

  private check(operation: Operation) {
    if (this.failing.has(operation)) {
      throw new Error(`${operation} unavailable`);
    }
  }
}
