/**
 * Centralized Configuration System
 *
 * Single source of truth for environment variables and configuration.
 * Provides type-safe, validated configuration with:
 * - Schema validation via Zod
 * - Type normalization (numbers, booleans)
 * - .env support outside production
 */

export {
  loadConfig,
  clearConfigCache,
  parseEnvFile,
  toSchedulerSettings,
  type Config,
  type ConfigOptions,
  type SchedulerSettings,
} from './loader.js';
export { configSchema, defaultWorkerCount, type ConfigSchema } from './schema.js';
