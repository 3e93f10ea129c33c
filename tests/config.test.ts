import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadAppConfig, loadConfigFromFile, parseConfig, validateConfig } from '../src/config/index.js';
import { createTestConfig } from './helpers/fixtures.js';

describe('ConfigValidation', () => {
  it('accepts a complete configuration', () => {
    expect(() => validateConfig(createTestConfig())).not.toThrow();
  });

  it('loads the layered defaults for the test environment', () => {
    const config = loadAppConfig();

    expect(config.app.name).toBe('FleetTelemetry');
    expect(config.storage.backend).toBe('sqlite');
    expect(config.storage.sqlite.path).toBe(':memory:');
    expect(config.registry.staleThresholdSeconds).toBe(30);
    expect(config.pipeline.thresholds.writeLatencyMs).toBe(100);
  });

  it('reports schema violations with their paths', () => {
    const config = createTestConfig();
    const candidate = {
      ...config,
      server: { ...config.server, port: 70000 },
      storage: { ...config.storage, backend: 'mongo' },
      logging: { level: 'info', format: 'pretty' }
    };

    expect(() => validateConfig(candidate)).toThrowError(
      'config.logging.format is not allowed; config.server.port must be <= 65535; ' +
        'config.storage.backend must be one of sqlite, bigtable'
    );
  });

  it('reports values of the wrong type', () => {
    const config = createTestConfig();
    const candidate = {
      ...config,
      app: 'fleet',
      retention: { ...config.retention, enabled: 'yes' }
    };

    expect(() => validateConfig(candidate)).toThrowError(
      'config.app must be an object; config.retention.enabled must be a boolean'
    );
  });

  it('requires the hard expiry to outlast the stale threshold', () => {
    const config = createTestConfig();
    config.registry.hardExpirySeconds = 30;

    expect(() => validateConfig(config)).toThrowError(
      'config.registry.hardExpirySeconds must be greater than staleThresholdSeconds'
    );
  });

  it('leaves blank wide-column coordinates to the storage factory', () => {
    const config = createTestConfig();
    config.storage.backend = 'bigtable';
    config.storage.bigtable = { projectId: '', instanceId: '', tableId: 'test-table' };

    expect(() => validateConfig(config)).not.toThrow();
  });

  it('names missing sections', () => {
    const { pipeline: _pipeline, ...rest } = createTestConfig();

    expect(() => validateConfig(rest)).toThrowError('config.pipeline is required');
  });
});

describe('ConfigFiles', () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) {
      fs.rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('reads and validates a configuration file', () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fleet-config-'));
    const filePath = path.join(tempDir, 'config.json');
    const config = createTestConfig();
    config.retention.retentionDays = 14;
    fs.writeFileSync(filePath, JSON.stringify(config));

    expect(loadConfigFromFile(filePath)).toEqual(config);
  });

  it('wraps JSON syntax errors', () => {
    expect(() => parseConfig('{"app":')).toThrowError(/^Failed to parse configuration: /);
  });
});
