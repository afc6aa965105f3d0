/**
 * Diagnostics Scheduling Module
 */

export * from './types.js';
export { AnalyzerWorkQueue, type AnalyzerWorkQueueOptions } from './work-queue.js';
export { DiagnosticResultCache, type ResultCacheStats } from './result-cache.js';
export { DocumentAnalyzer, type DocumentAnalyzerOptions } from './document-analyzer.js';
export { DiagnosticEventForwarder, type DiagnosticEvents } from './event-forwarder.js';
export { BackgroundProgressReporter, progressInterval } from './progress-reporter.js';
export { DiagnosticWorkerPool, type DiagnosticWorkerPoolOptions, type WorkerPoolStats } from './worker-pool.js';
export { WorkspaceChangeListener, type DiagnosticScheduler } from './change-listener.js';
export {
  DiagnosticWorker,
  diagnosticWorkerOptionsSchema,
  type DiagnosticWorkerOptions,
  type DiagnosticWorkerStats,
  type FromConfigOptions,
} from './diagnostic-worker.js';
