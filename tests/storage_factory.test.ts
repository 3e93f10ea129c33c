import { describe, expect, it, vi } from 'vitest';
import { BackendUnavailableError, PersistenceError } from '../src/errors.js';
import { createPersistenceBackend, DegradedBackend, type PersistenceBackend } from '../src/storage/index.js';
import { createTestConfig, createTestLogger, sampleReport } from './helpers/fixtures.js';
import { MemoryWideColumnTable } from './helpers/memoryWideColumnTable.js';

describe('createPersistenceBackend', () => {
  it('opens the row-store by default', async () => {
    const logger = createTestLogger();
    const backend = await createPersistenceBackend(createTestConfig().storage, { logger });

    expect(backend.kind).toBe('sqlite');
    expect(backend.capabilities).toEqual({ storedInstances: false, windowedSummary: true });
    expect(logger.info).toHaveBeenCalledWith({ backend: 'sqlite' }, 'Persistence backend ready');
    await backend.close();
  });

  it('opens the wide-column store through the table factory', async () => {
    const table = new MemoryWideColumnTable();
    const config = createTestConfig();
    config.storage.backend = 'bigtable';

    const backend = await createPersistenceBackend(config.storage, {
      logger: createTestLogger(),
      tableFactory: () => table
    });

    expect(backend.kind).toBe('bigtable');
    expect(table.families.size).toBe(3);
  });

  it('falls back to the degraded backend when initialisation fails', async () => {
    const table = new MemoryWideColumnTable();
    table.failing.add('ensure');
    const logger = createTestLogger();
    const config = createTestConfig();
    config.storage.backend = 'bigtable';

    const backend = await createPersistenceBackend(config.storage, { logger, tableFactory: () => table });

    expect(backend).toBeInstanceOf(DegradedBackend);
    expect(logger.error).toHaveBeenCalledTimes(1);
    const [details] = logger.error.mock.calls[0] ?? [];
    expect(details.err).toBeInstanceOf(BackendUnavailableError);
    expect(details.err.message).toBe('Failed to initialise bigtable backend: ensure unavailable');
  });

  it('runs degraded when the wide-column coordinates are blank', async () => {
    const tableFactory = vi.fn(() => new MemoryWideColumnTable());
    const logger = createTestLogger();
    const config = createTestConfig();
    config.storage.backend = 'bigtable';
    config.storage.bigtable = { projectId: '', instanceId: ' ', tableId: 'test-table' };

    const backend = await createPersistenceBackend(config.storage, { logger, tableFactory });

    expect(backend.kind).toBe('degraded');
    expect(tableFactory).not.toHaveBeenCalled();
    const [details] = logger.error.mock.calls[0] ?? [];
    expect(details.err.message).toBe(
      'Failed to initialise bigtable backend: storage.bigtable.projectId and instanceId must be set'
    );
  });
});

describe('DegradedBackend', () => {
  it('serves empty reads and rejects writes', async () => {
    const backend = new DegradedBackend('offline');

    await expect(backend.write()).rejects.toBeInstanceOf(PersistenceError);
    await expect(backend.write()).rejects.toThrow('Persistence unavailable: offline');
    expect(await backend.queryHistory()).toEqual([]);
    expect(await backend.queryInstances()).toEqual([]);
    expect(await backend.cleanup()).toBe(0);
    expect((await backend.querySummary(24)).sampleCount).toBe(0);
  });

  it('keeps the contract shape for callers holding the interface', async () => {
    const backend: PersistenceBackend = new DegradedBackend('offline');

    await expect(backend.write(sampleReport())).rejects.toBeInstanceOf(PersistenceError);
    expect(await backend.queryHistory('p1', 24)).toEqual([]);
  });
});
