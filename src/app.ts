import { fileURLToPath } from 'node:url';
import { loadAppConfig, type AppConfig } from './config/index.js';
import { IngestService } from './ingest/service.js';
import logger, { type Logger } from './logger.js';
import { MetricsRegistry } from './metrics/index.js';
import { PipelineHealthMonitor } from './pipeline/healthMonitor.js';
import { LiveRegistry } from './registry/liveRegistry.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { createPersistenceBackend } from './storage/index.js';
import type { PersistenceBackend } from './storage/types.js';
import type { WideColumnTableFactory } from './storage/wideColumn.js';
import { RetentionTask } from './tasks/retention.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  registry: LiveRegistry;
  backend: PersistenceBackend;
  monitor: PipelineHealthMonitor;
  ingest: IngestService;
}

export interface CreateAppContextOptions {
  config?: AppConfig;
  logger?: Logger;
  clock?: () => number;
  backend?: PersistenceBackend;
  tableFactory?: WideColumnTableFactory;
}

export async function createAppContext(options: CreateAppContextOptions = {}): Promise<AppContext> {
  const config = options.config ?? loadAppConfig();
  const log = options.logger ?? logger;
  const metrics = new MetricsRegistry();

  const registry = new LiveRegistry({
    staleThresholdMs: config.registry.staleThresholdSeconds * 1000,
    hardExpiryMs: config.registry.hardExpirySeconds * 1000,
    maxEntries: config.registry.maxEntries,
    clock: options.clock
  });

  const backend =
    options.backend ??
    (await createPersistenceBackend(config.storage, {
      logger: log,
      clock: options.clock,
      tableFactory: options.tableFactory
    }));

  const monitor = PipelineHealthMonitor.fromConfig(config.pipeline, { logger: log, clock: options.clock });
  const ingest = new IngestService({ registry, backend, metrics, logger: log });

  return { config, logger: log, metrics, registry, backend, monitor, ingest };
}

export class ShutdownHooks {
  private readonly hooks: RegisteredHook[] = [];

  register(name: string, hook: ShutdownHook) {
    const existingIndex = this.hooks.findIndex(entry => entry.name === name);
    const entry: RegisteredHook = { name, hook };
    if (existingIndex >= 0) {
      this.hooks[existingIndex] = entry;
    } else {
      this.hooks.push(entry);
    }

    return () => {
      const index = this.hooks.findIndex(item => item.name === name);
      if (index >= 0) {
        this.hooks.splice(index, 1);
      }
    };
  }

  /** Runs hooks in reverse registration order; one failing hook does not stop the rest. */
  async run(context: ShutdownHookContext) {
    const results: Array<{ name: string; status: 'ok' | 'error'; error?: unknown }> = [];
    for (const entry of [...this.hooks].reverse()) {
      try {
        await entry.hook(context);
        results.push({ name: entry.name, status: 'ok' });
      } catch (error) {
        results.push({ name: entry.name, status: 'error', error });
      }
    }
    return results;
  }
}

export interface AppRuntime {
  context: AppContext;
  http: HttpServerRuntime;
  retention: RetentionTask;
  hooks: ShutdownHooks;
  stop: (context?: ShutdownHookContext) => Promise<void>;
}

export interface BootstrapOptions extends CreateAppContextOptions {
  port?: number;
  host?: string;
  handleSignals?: boolean;
}

export async function bootstrap(options: BootstrapOptions = {}): Promise<AppRuntime> {
  const context = await createAppContext(options);
  const { config } = context;
  const log = context.logger;

  log.info({ backend: context.backend.kind }, `${config.app.name} bootstrap starting`);

  let http: HttpServerRuntime;
  try {
    http = await startHttpServer({ context, port: options.port, host: options.host });
  } catch (error) {
    await context.backend.close().catch(closeError => {
      log.error({ err: closeError }, 'Failed to close persistence after startup failure');
    });
    throw error;
  }

  const retention = new RetentionTask({
    backend: context.backend,
    enabled: config.retention.enabled,
    retentionDays: config.retention.retentionDays,
    intervalMs: config.retention.intervalSeconds * 1000,
    logger: log,
    metrics: context.metrics
  });
  retention.start();
  context.monitor.start();

  const hooks = new ShutdownHooks();
  hooks.register('persistence', () => context.backend.close());
  hooks.register('http', () => http.close());
  hooks.register('background-tasks', () => {
    retention.stop();
    context.monitor.stop();
  });

  let stopping: Promise<void> | null = null;
  const stop = (shutdown: ShutdownHookContext = { reason: 'stop' }) => {
    if (!stopping) {
      stopping = (async () => {
        log.info({ reason: shutdown.reason, signal: shutdown.signal }, 'Shutting down');
        const results = await hooks.run(shutdown);
        for (const result of results) {
          if (result.status === 'error') {
            log.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
          }
        }
        detachSignals();
      })();
    }
    return stopping;
  };

  const onSignal = (signal: NodeJS.Signals) => {
    void stop({ reason: 'signal', signal });
  };

  const detachSignals = () => {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
  };

  if (options.handleSignals ?? true) {
    process.once('SIGTERM', onSignal);
    process.once('SIGINT', onSignal);
  }

  log.info({ port: http.port }, 'Bootstrap completed');
  return { context, http, retention, hooks, stop };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap().catch(error => {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  });
}
