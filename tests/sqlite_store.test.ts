import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistenceError } from '../src/errors.js';
import { SqliteBackend } from '../src/storage/sqliteStore.js';
import { DAY_MS, HOUR_MS } from '../src/storage/types.js';
import { sampleReport } from './helpers/fixtures.js';

describe('SqliteBackend', () => {
  const start = Date.UTC(2024, 0, 10, 12, 0, 0);
  let tempDir: string;
  let now: number;
  let backend: SqliteBackend;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fleet-sqlite-'));
    now = start;
    backend = new SqliteBackend({ path: path.join(tempDir, 'nested', 'telemetry.db'), clock: () => now });
  });

  afterEach(async () => {
    await backend.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates the database directory and stores the server receive time', async () => {
    const stored = await backend.write(sampleReport({ extras: { temperature: 61.5, deviceName: 'unit-a' } }));

    expect(fs.existsSync(path.join(tempDir, 'nested', 'telemetry.db'))).toBe(true);
    expect(stored.recordedAt).toBe(start);

    const history = await backend.queryHistory('p1', 24);
    expect(history).toEqual([
      {
        producerId: 'p1',
        totalUnits: 1000,
        lifetimeRate: 50,
        recentRate: 100,
        reportTimestamp: '2024-01-01T00:00:00Z',
        deviceCount: 2,
        deviceAvailable: true,
        originAddress: '10.0.0.1',
        extras: { temperature: 61.5, deviceName: 'unit-a' },
        recordedAt: start
      }
    ]);
  });

  it('returns history newest first within the requested window', async () => {
    await backend.write(sampleReport({ recentRate: 1 }));
    now += 2 * HOUR_MS;
    await backend.write(sampleReport({ recentRate: 2 }));
    now += HOUR_MS;
    await backend.write(sampleReport({ recentRate: 3 }));
    await backend.write(sampleReport({ producerId: 'other', recentRate: 99 }));

    const lastTwoHours = await backend.queryHistory('p1', 2.5);
    expect(lastTwoHours.map(record => record.recentRate)).toEqual([3, 2]);

    const all = await backend.queryHistory('p1', 24);
    expect(all.map(record => record.recentRate)).toEqual([3, 2, 1]);
  });

  it('caps history at the newest thousand rows', async () => {
    const memory = new SqliteBackend({ path: ':memory:', clock: () => now });
    for (let index = 0; index < 1005; index += 1) {
      now = start + index;
      await memory.write(sampleReport({ totalUnits: index }));
    }

    const history = await memory.queryHistory('p1', 1);
    expect(history).toHaveLength(1000);
    expect(history[0]?.totalUnits).toBe(1004);
    expect(history[999]?.totalUnits).toBe(5);
    await memory.close();
  });

  it('summarizes the trailing window with a single aggregate', async () => {
    await backend.write(sampleReport({ producerId: 'a', recentRate: 100, totalUnits: 10 }));
    await backend.write(sampleReport({ producerId: 'a', recentRate: 300, totalUnits: 20 }));
    await backend.write(sampleReport({ producerId: 'b', recentRate: 200, totalUnits: 30 }));

    expect(await backend.querySummary(24)).toEqual({
      uniqueProducers: 2,
      totalUnits: 60,
      avgRate: 200,
      peakRate: 300,
      sampleCount: 3,
      windowHours: 24,
      basis: 'window'
    });
  });

  it('reports an empty summary when nothing falls inside the window', async () => {
    await backend.write(sampleReport());
    now += 25 * HOUR_MS;

    expect(await backend.querySummary(24)).toEqual({
      uniqueProducers: 0,
      totalUnits: 0,
      avgRate: 0,
      peakRate: 0,
      sampleCount: 0,
      windowHours: 24,
      basis: 'window'
    });
  });

  it('does not keep a per-producer view', async () => {
    await backend.write(sampleReport());

    expect(backend.capabilities.storedInstances).toBe(false);
    expect(await backend.queryInstances()).toEqual([]);
  });

  it('deletes records at or beyond the retention horizon', async () => {
    await backend.write(sampleReport({ recentRate: 1 }));
    now += DAY_MS;
    await backend.write(sampleReport({ recentRate: 2 }));
    now += DAY_MS;

    expect(await backend.cleanup(365)).toBe(0);
    expect(await backend.cleanup(2)).toBe(1);
    expect(await backend.cleanup(2)).toBe(0);

    const remaining = await backend.queryHistory('p1', 72);
    expect(remaining.map(record => record.recentRate)).toEqual([2]);

    expect(await backend.cleanup(0)).toBe(1);
    expect(await backend.queryHistory('p1', 72)).toEqual([]);
  });

  it('rejects writes after the database is closed', async () => {
    await backend.close();

    await expect(backend.write(sampleReport())).rejects.toBeInstanceOf(PersistenceError);
  });
});
