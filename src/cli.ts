import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { bootstrap, type AppRuntime } from './app.js';
import { loadAppConfig, loadConfigFromFile, type AppConfig } from './config/index.js';
import logger from './logger.js';
import { MetricsRegistry } from './metrics/index.js';
import { createPersistenceBackend } from './storage/index.js';
import type { WideColumnTableFactory } from './storage/wideColumn.js';
import { runRetentionOnce } from './tasks/retention.js';

export type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  bootstrap?: typeof bootstrap;
  loadConfig?: () => AppConfig;
  tableFactory?: WideColumnTableFactory;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'Fleet telemetry CLI',
  '',
  'Usage:',
  '  fleet-telemetry serve [--port n] [--host h]  Start the ingest server and background tasks',
  '  fleet-telemetry retention run [options]      Run one retention sweep with current config',
  '  fleet-telemetry help                         Show this help message'
];

const SERVE_USAGE = [
  'Fleet telemetry serve command',
  '',
  'Usage:',
  '  fleet-telemetry serve [--port n] [--host h]',
  '',
  'Options:',
  '  -p, --port <port>  Override server.port',
  '  -H, --host <host>  Override server.host',
  '  -h, --help         Show this help message'
].join('\n');

const RETENTION_USAGE = [
  'Fleet telemetry retention commands',
  '',
  'Usage:',
  '  fleet-telemetry retention run [--config path] [--days n]  Run retention once with current config',
  '',
  'Options:',
  '  -c, --config <path>   Use an alternate configuration file',
  '  -d, --days <days>     Override retention.retentionDays for this run',
  '  -h, --help            Show this help message'
].join('\n');

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  dependencies: CliDependencies = {}
): Promise<number> {
  const command = argv[0] ?? 'help';

  switch (command) {
    case 'serve':
    case 'start': {
      return runServe(argv.slice(1), io, dependencies);
    }
    case 'retention': {
      return runRetentionCommand(argv.slice(1), io, dependencies);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

type ServeArgs = {
  port?: number;
  host?: string;
  help?: boolean;
  errors: string[];
};

function parseServeArgs(args: string[]): ServeArgs {
  const result: ServeArgs = { errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }
    if (token === '--port' || token === '-p') {
      const value = Number(args[index + 1]);
      if (!Number.isInteger(value) || value < 0 || value > 65535) {
        result.errors.push('Invalid value for --port');
      } else {
        result.port = value;
      }
      index += 1;
      continue;
    }
    if (token === '--host' || token === '-H') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --host');
      } else {
        result.host = value;
        index += 1;
      }
      continue;
    }
    result.errors.push(`Unknown option: ${token}`);
  }
  return result;
}

async function runServe(args: string[], io: CliIo, dependencies: CliDependencies): Promise<number> {
  const parsed = parseServeArgs(args);
  if (parsed.help) {
    io.stdout.write(`${SERVE_USAGE}\n`);
    return 0;
  }

  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  const start = dependencies.bootstrap ?? bootstrap;
  let runtime: AppRuntime;
  try {
    runtime = await start({
      config: dependencies.loadConfig?.(),
      tableFactory: dependencies.tableFactory,
      port: parsed.port,
      host: parsed.host
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Failed to start server: ${message}\n`);
    return 1;
  }

  io.stdout.write(`Listening on port ${runtime.http.port} (backend: ${runtime.context.backend.kind})\n`);

  await new Promise<void>(resolve => {
    runtime.http.server.once('close', () => resolve());
  });
  return 0;
}

async function runRetentionCommand(args: string[], io: CliIo, dependencies: CliDependencies): Promise<number> {
  if (args.length === 0) {
    return runRetentionRun(args, io, dependencies);
  }

  const [first, ...rest] = args;
  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${RETENTION_USAGE}\n`);
    return 0;
  }

  if (first === 'run') {
    return runRetentionRun(rest, io, dependencies);
  }

  if (first.startsWith('-')) {
    return runRetentionRun(args, io, dependencies);
  }

  io.stderr.write(`Unknown retention subcommand: ${first}\n`);
  return 1;
}

type RetentionCliArgs = {
  configPath?: string;
  days?: number;
  help?: boolean;
  errors: string[];
};

function parseRetentionRunArgs(args: string[]): RetentionCliArgs {
  const result: RetentionCliArgs = { errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }
    if (token === '--config' || token === '-c') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --config');
      } else {
        result.configPath = value;
        index += 1;
      }
      continue;
    }
    if (token === '--days' || token === '-d') {
      const value = Number(args[index + 1]);
      if (!Number.isFinite(value) || value < 0) {
        result.errors.push('Invalid value for --days');
      } else {
        result.days = value;
      }
      index += 1;
      continue;
    }
    result.errors.push(`Unknown option: ${token}`);
  }
  return result;
}

async function runRetentionRun(args: string[], io: CliIo, dependencies: CliDependencies): Promise<number> {
  const parsed = parseRetentionRunArgs(args);
  if (parsed.help) {
    io.stdout.write(`${RETENTION_USAGE}\n`);
    return 0;
  }

  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  let config: AppConfig;
  try {
    if (parsed.configPath) {
      config = loadConfigFromFile(parsed.configPath);
    } else {
      config = dependencies.loadConfig ? dependencies.loadConfig() : loadAppConfig();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Failed to load configuration: ${message}\n`);
    logger.error({ err: error }, 'Retention CLI failed to load configuration');
    return 1;
  }

  const backend = await createPersistenceBackend(config.storage, {
    logger,
    tableFactory: dependencies.tableFactory
  });

  try {
    if (backend.kind === 'degraded') {
      io.stderr.write(`Retention task failed: ${config.storage.backend} backend is unavailable\n`);
      return 1;
    }

    const result = await runRetentionOnce({
      backend,
      enabled: true,
      retentionDays: parsed.days ?? config.retention.retentionDays,
      intervalMs: config.retention.intervalSeconds * 1000,
      logger,
      metrics: new MetricsRegistry()
    });

    io.stdout.write(
      `Retention task completed: backend=${result.backend}, retentionDays=${result.retentionDays}, ` +
        `deleted=${result.deleted}\n`
    );
    return 0;
  } catch (error) {
    logger.error({ err: error }, 'Retention CLI execution failed');
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Retention task failed: ${message}\n`);
    return 1;
  } finally {
    await backend.close();
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Fleet telemetry CLI failed');
      process.exit(1);
    }
  );
}
