/**
 * Configuration Schema
 *
 * Defines all environment variables with validation, types, and defaults.
 */

import os from 'node:os';
import { z } from 'zod';

/**
 * Boolean flags arrive as strings; `z.coerce.boolean()` would read "false" as true.
 */
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Three quarters of the available cores, never fewer than one worker
 */
export function defaultWorkerCount(cpuCount: number = os.cpus().length): number {
  return Math.max(1, Math.floor(cpuCount * 0.75));
}

/**
 * Complete configuration schema for all Cadence components
 */
export const configSchema = z.object({
  // ============================================================================
  // Runtime
  // ============================================================================
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ============================================================================
  // Logging
  // ============================================================================
  CADENCE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CADENCE_LOG_STRUCTURED: booleanFlag.default('false'),

  // ============================================================================
  // Diagnostics scheduling
  // ============================================================================
  CADENCE_DIAGNOSTIC_WORKERS: z.coerce.number().int().min(1).max(256).default(defaultWorkerCount()),
  CADENCE_DOCUMENT_ANALYSIS_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
});

export type ConfigSchema = z.infer<typeof configSchema>;
