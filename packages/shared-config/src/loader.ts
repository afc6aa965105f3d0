/**
 * Configuration Loader
 *
 * Loads and validates configuration from environment variables.
 * Supports .env files outside production.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { configSchema, type ConfigSchema } from './schema.js';

export type Config = ConfigSchema;

export interface ConfigOptions {
  /**
   * Whether to load .env files (default: true outside production)
   */
  loadEnvFile?: boolean;

  /**
   * Path to .env file (default: searches the working directory)
   */
  envFilePath?: string;

  /**
   * Extra values layered over the environment, mostly for embedders and tests
   */
  overrides?: Record<string, string>;
}

/**
 * Settings consumed by the diagnostics scheduler
 */
export interface SchedulerSettings {
  workerCount: number;
  documentAnalysisTimeoutMs: number;
  logLevel: Config['CADENCE_LOG_LEVEL'];
  structuredLogs: boolean;
}

let cachedConfig: Config | null = null;

/**
 * Parse .env file content into key-value pairs
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = trimmed.match(/^([^#=]+)=(.*)$/);
    if (match && match[1] && match[2] !== undefined) {
      const key = match[1].trim();
      let value = match[2].trim();

      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }

      result[key] = value;
    }
  }

  return result;
}

/**
 * Find .env file in the working directory
 */
function findEnvFile(startPath: string = process.cwd()): string | null {
  const searchPaths = [
    resolve(startPath, '.env'),
    resolve(startPath, '.env.local'),
    resolve(startPath, '.env.development'),
  ];

  for (const path of searchPaths) {
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}

/**
 * Load environment variables from .env file (never in production)
 */
function loadEnvFile(filePath?: string): Record<string, string> {
  const nodeEnv = process.env.NODE_ENV || 'development';

  if (nodeEnv === 'production') {
    return {};
  }

  const envPath = filePath || findEnvFile();
  if (!envPath) {
    return {};
  }

  try {
    return parseEnvFile(readFileSync(envPath, 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new Error(`Failed to load .env file at ${envPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Merge environment variables (process.env takes precedence over .env file)
 */
function mergeEnvVars(envFileVars: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = { ...envFileVars };

  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Load and validate configuration
 */
export function loadConfig(options: ConfigOptions = {}): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const isProduction = (process.env.NODE_ENV || 'development') === 'production';
  const { loadEnvFile: shouldLoadEnvFile = !isProduction, envFilePath, overrides = {} } = options;

  const envFileVars = shouldLoadEnvFile ? loadEnvFile(envFilePath) : {};
  const envVars = { ...mergeEnvVars(envFileVars), ...overrides };

  const parseResult = configSchema.safeParse(envVars);

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map((err) => {
        const path = err.path.join('.');
        return `  • ${path || 'root'}: ${err.message}`;
      })
      .join('\n');

    throw new Error(`Invalid configuration:\n${errors}`);
  }

  cachedConfig = parseResult.data;

  return cachedConfig;
}

/**
 * Clear cached configuration (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Map validated configuration onto scheduler settings
 */
export function toSchedulerSettings(config: Config = loadConfig()): SchedulerSettings {
  return {
    workerCount: config.CADENCE_DIAGNOSTIC_WORKERS,
    documentAnalysisTimeoutMs: config.CADENCE_DOCUMENT_ANALYSIS_TIMEOUT_MS,
    logLevel: config.CADENCE_LOG_LEVEL,
    structuredLogs: config.CADENCE_LOG_STRUCTURED,
  };
}
