/**
 * Configuration Loader Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadConfig, clearConfigCache, parseEnvFile, toSchedulerSettings } from '../loader.js';
import { configSchema, defaultWorkerCount } from '../schema.js';

function clearCadenceEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('CADENCE_')) {
      delete process.env[key];
    }
  }
}

describe('loadConfig', () => {
  beforeEach(() => {
    clearConfigCache();
    clearCadenceEnv();
  });

  afterEach(() => {
    clearConfigCache();
    clearCadenceEnv();
  });

  it('should load config with defaults', () => {
    const config = loadConfig({ loadEnvFile: false });

    expect(config.CADENCE_LOG_LEVEL).toBe('info');
    expect(config.CADENCE_LOG_STRUCTURED).toBe(false);
    expect(config.CADENCE_DOCUMENT_ANALYSIS_TIMEOUT_MS).toBe(30000);
    expect(config.CADENCE_DIAGNOSTIC_WORKERS).toBe(defaultWorkerCount());
  });

  it('should validate and normalize types', () => {
    process.env.CADENCE_DIAGNOSTIC_WORKERS = '6';
    process.env.CADENCE_DOCUMENT_ANALYSIS_TIMEOUT_MS = '1500';
    process.env.CADENCE_LOG_STRUCTURED = 'true';

    const config = loadConfig({ loadEnvFile: false });

    expect(config.CADENCE_DIAGNOSTIC_WORKERS).toBe(6);
    expect(typeof config.CADENCE_DIAGNOSTIC_WORKERS).toBe('number');
    expect(config.CADENCE_DOCUMENT_ANALYSIS_TIMEOUT_MS).toBe(1500);
    expect(config.CADENCE_LOG_STRUCTURED).toBe(true);
  });

  it('should read "false" flags as false', () => {
    process.env.CADENCE_LOG_STRUCTURED = 'false';

    expect(loadConfig({ loadEnvFile: false }).CADENCE_LOG_STRUCTURED).toBe(false);
  });

  it('should fail on invalid values', () => {
    process.env.CADENCE_DIAGNOSTIC_WORKERS = '0';

    expect(() => loadConfig({ loadEnvFile: false })).toThrow(/CADENCE_DIAGNOSTIC_WORKERS/);
  });

  it('should let overrides win over the environment', () => {
    process.env.CADENCE_LOG_LEVEL = 'warn';

    const config = loadConfig({ loadEnvFile: false, overrides: { CADENCE_LOG_LEVEL: 'debug' } });

    expect(config.CADENCE_LOG_LEVEL).toBe('debug');
  });

  it('should cache config between calls', () => {
    const first = loadConfig({ loadEnvFile: false });
    process.env.CADENCE_LOG_LEVEL = 'error';

    expect(loadConfig({ loadEnvFile: false })).toBe(first);
  });

  describe('with a .env file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'cadence-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should load values from the file', () => {
      const envFilePath = join(dir, '.env');
      writeFileSync(envFilePath, 'CADENCE_DIAGNOSTIC_WORKERS=3\nCADENCE_LOG_LEVEL="warn"\n');

      const config = loadConfig({ envFilePath });

      expect(config.CADENCE_DIAGNOSTIC_WORKERS).toBe(3);
      expect(config.CADENCE_LOG_LEVEL).toBe('warn');
    });

    it('should prefer process.env over the file', () => {
      const envFilePath = join(dir, '.env');
      writeFileSync(envFilePath, 'CADENCE_DIAGNOSTIC_WORKERS=3\n');
      process.env.CADENCE_DIAGNOSTIC_WORKERS = '5';

      expect(loadConfig({ envFilePath }).CADENCE_DIAGNOSTIC_WORKERS).toBe(5);
    });
  });
});

describe('parseEnvFile', () => {
  it('should skip comments and blank lines', () => {
    const parsed = parseEnvFile('# comment\n\nA=1\nB = two \nC=\'three\'\n');

    expect(parsed).toEqual({ A: '1', B: 'two', C: 'three' });
  });
});

describe('toSchedulerSettings', () => {
  it('should map config keys onto scheduler settings', () => {
    const config = configSchema.parse({
      CADENCE_DIAGNOSTIC_WORKERS: '2',
      CADENCE_DOCUMENT_ANALYSIS_TIMEOUT_MS: '250',
      CADENCE_LOG_LEVEL: 'debug',
      CADENCE_LOG_STRUCTURED: '1',
    });

    expect(toSchedulerSettings(config)).toEqual({
      workerCount: 2,
      documentAnalysisTimeoutMs: 250,
      logLevel: 'debug',
      structuredLogs: true,
    });
  });
});

describe('defaultWorkerCount', () => {
  it('should use three quarters of the cores and never drop below one', () => {
    expect(defaultWorkerCount(8)).toBe(6);
    expect(defaultWorkerCount(1)).toBe(1);
  });
});
