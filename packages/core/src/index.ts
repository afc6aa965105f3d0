/**
 * @cadence/core - Diagnostics scheduling engine
 *
 * Keeps per-document diagnostics current while a workspace changes:
 * 1. Change Listener - turns workspace events into queued work
 * 2. Work Queue + Worker Pool - foreground edits ahead of background sweeps
 * 3. Result Cache - latest snapshot per document, served by the query APIs
 */

export * from './utils/index.js';
export * from './workspace/index.js';
export * from './diagnostics/index.js';
