import fs from 'node:fs';
import path from 'node:path';
import config, { type IConfig } from 'config';

export type StorageBackendKind = 'sqlite' | 'bigtable';

export type AppInfoConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type ServerConfig = {
  host: string;
  port: number;
};

export type SqliteStorageConfig = {
  path: string;
};

export type BigtableStorageConfig = {
  projectId: string;
  instanceId: string;
  tableId: string;
};

export type StorageConfig = {
  backend: StorageBackendKind;
  sqlite: SqliteStorageConfig;
  bigtable?: BigtableStorageConfig;
};

export type RegistryConfig = {
  staleThresholdSeconds: number;
  hardExpirySeconds: number;
  maxEntries: number;
};

export type RetentionConfig = {
  enabled?: boolean;
  retentionDays: number;
  intervalSeconds: number;
};

export type PipelineThresholdConfig = {
  writeLatencyMs: number;
  errorRate: number;
  queueDepth: number;
  bufferLagSeconds: number;
  workerUtilization: number;
};

export type PipelineConfig = {
  snapshotIntervalSeconds: number;
  historySize: number;
  alertHistorySize: number;
  nominalBatchSize: number;
  thresholds: PipelineThresholdConfig;
};

export type AppConfig = {
  app: AppInfoConfig;
  logging: LoggingConfig;
  server: ServerConfig;
  storage: StorageConfig;
  registry: RegistryConfig;
  retention: RetentionConfig;
  pipeline: PipelineConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  enum?: string[];
  minimum?: number;
  maximum?: number;
};

const positiveNumber: JsonSchema = { type: 'number', minimum: 0 };

const appConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'server', 'storage', 'registry', 'retention', 'pipeline'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    server: {
      type: 'object',
      required: ['host', 'port'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 }
      }
    },
    storage: {
      type: 'object',
      required: ['backend', 'sqlite'],
      additionalProperties: false,
      properties: {
        backend: { type: 'string', enum: ['sqlite', 'bigtable'] },
        sqlite: {
          type: 'object',
          required: ['path'],
          additionalProperties: false,
          properties: {
            path: { type: 'string' }
          }
        },
        bigtable: {
          type: 'object',
          required: ['projectId', 'instanceId', 'tableId'],
          additionalProperties: false,
          properties: {
            projectId: { type: 'string' },
            instanceId: { type: 'string' },
            tableId: { type: 'string' }
          }
        }
      }
    },
    registry: {
      type: 'object',
      required: ['staleThresholdSeconds', 'hardExpirySeconds', 'maxEntries'],
      additionalProperties: false,
      properties: {
        staleThresholdSeconds: { type: 'number', minimum: 1 },
        hardExpirySeconds: { type: 'number', minimum: 1 },
        maxEntries: { type: 'number', minimum: 1 }
      }
    },
    retention: {
      type: 'object',
      required: ['retentionDays', 'intervalSeconds'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        retentionDays: positiveNumber,
        intervalSeconds: { type: 'number', minimum: 1 }
      }
    },
    pipeline: {
      type: 'object',
      required: ['snapshotIntervalSeconds', 'historySize', 'alertHistorySize', 'nominalBatchSize', 'thresholds'],
      additionalProperties: false,
      properties: {
        snapshotIntervalSeconds: { type: 'number', minimum: 1 },
        historySize: { type: 'number', minimum: 1 },
        alertHistorySize: { type: 'number', minimum: 1 },
        nominalBatchSize: { type: 'number', minimum: 1 },
        thresholds: {
          type: 'object',
          required: ['writeLatencyMs', 'errorRate', 'queueDepth', 'bufferLagSeconds', 'workerUtilization'],
          additionalProperties: false,
          properties: {
            writeLatencyMs: positiveNumber,
            errorRate: { type: 'number', minimum: 0, maximum: 1 },
            queueDepth: positiveNumber,
            bufferLagSeconds: positiveNumber,
            workerUtilization: { type: 'number', minimum: 0, maximum: 1 }
          }
        }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const errors: string[] = [];

  switch (schema.type) {
    case 'object': {
      if (!isRecord(value)) {
        return [`${pathLabel} must be an object`];
      }

      for (const key of schema.required ?? []) {
        if (!(key in value)) {
          errors.push(`${pathLabel}.${key} is required`);
        }
      }

      const properties = schema.properties ?? {};
      if (schema.additionalProperties === false) {
        for (const key of Object.keys(value)) {
          if (!(key in properties)) {
            errors.push(`${pathLabel}.${key} is not allowed`);
          }
        }
      }

      for (const [key, childSchema] of Object.entries(properties)) {
        if (key in value) {
          errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
        }
      }
      return errors;
    }

    case 'number': {
      if (typeof value !== 'number' || Number.isNaN(value)) {
        return [`${pathLabel} must be a number`];
      }
      if (schema.minimum !== undefined && value < schema.minimum) {
        errors.push(`${pathLabel} must be >= ${schema.minimum}`);
      }
      if (schema.maximum !== undefined && value > schema.maximum) {
        errors.push(`${pathLabel} must be <= ${schema.maximum}`);
      }
      return errors;
    }

    case 'string': {
      if (typeof value !== 'string') {
        return [`${pathLabel} must be a string`];
      }
      if (schema.enum && !schema.enum.includes(value)) {
        errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
      }
      return errors;
    }

    case 'boolean':
      return typeof value === 'boolean' ? [] : [`${pathLabel} must be a boolean`];
  }
}

function validateLogicalConfig(candidate: AppConfig) {
  if (candidate.registry.hardExpirySeconds <= candidate.registry.staleThresholdSeconds) {
    throw new Error('config.registry.hardExpirySeconds must be greater than staleThresholdSeconds');
  }
}

export function validateConfig(candidate: unknown): asserts candidate is AppConfig {
  const errors = validateAgainstSchema(appConfigSchema, candidate, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(candidate as AppConfig);
}

export function parseConfig(contents: string): AppConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): AppConfig {
  const resolved = path.resolve(filePath);
  const contents = fs.readFileSync(resolved, 'utf8');
  return parseConfig(contents);
}

export function loadAppConfig(source: IConfig = config): AppConfig {
  const loaded: unknown = source.util.toObject(source);
  validateConfig(loaded);
  return loaded;
}
