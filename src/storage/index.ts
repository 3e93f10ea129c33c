import type { StorageConfig } from '../config/index.js';
import { BackendUnavailableError, describeError } from '../errors.js';
import loggerModule, { type Logger } from '../logger.js';
import { BigtableBackend } from './bigtableStore.js';
import { DegradedBackend } from './degradedStore.js';
import { SqliteBackend } from './sqliteStore.js';
import type { PersistenceBackend } from './types.js';
import { createBigtableTable, type WideColumnTableFactory } from './wideColumn.js';

export interface CreateBackendOptions {
  logger?: Logger;
  clock?: () => number;
  tableFactory?: WideColumnTableFactory;
}

export async function createPersistenceBackend(
  config: StorageConfig,
  options: CreateBackendOptions = {}
): Promise<PersistenceBackend> {
  const logger = options.logger ?? loggerModule;

  try {
    const backend = await openBackend(config, options);
    logger.info({ backend: backend.kind }, 'Persistence backend ready');
    return backend;
  } catch (error) {
    const unavailable = new BackendUnavailableError(
      config.backend,
      `Failed to initialise ${config.backend} backend: ${describeError(error)}`,
      { cause: error }
    );
    logger.error({ err: unavailable }, 'Persistence disabled; running without history');
    return new DegradedBackend(unavailable.message);
  }
}

async function openBackend(config: StorageConfig, options: CreateBackendOptions): Promise<PersistenceBackend> {
  if (config.backend === 'bigtable') {
    if (!config.bigtable) {
      throw new Error('storage.bigtable is not configured');
    }
    if (!config.bigtable.projectId.trim() || !config.bigtable.instanceId.trim()) {
      throw new Error('storage.bigtable.projectId and instanceId must be set');
    }
    const factory = options.tableFactory ?? createBigtableTable;
    const backend = new BigtableBackend({ table: factory(config.bigtable), clock: options.clock });
    await backend.initialize();
    return backend;
  }

  return new SqliteBackend({ path: config.sqlite.path, clock: options.clock });
}

export type { BackendCapabilities, BackendKind, PersistenceBackend } from './types.js';
export { BigtableBackend, DegradedBackend, SqliteBackend };
