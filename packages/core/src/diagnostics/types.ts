/**
 * Diagnostics Scheduling Types
 *
 * Contracts between the work queue, the worker pool, progress reporting and
 * the external analyzer engine.
 */

import type { AnalyzerWorkType, Diagnostic, DocumentId } from '@cadence/shared-types';
import type { DiagnosticAnalyzer, WorkspaceDocument, WorkspaceProject } from '../workspace/types.js';

// ============================================================================
// External collaborators
// ============================================================================

/**
 * Computes diagnostics for one document. Implementations should observe
 * `signal`; the scheduler abandons calls that ignore it once it fires.
 */
export interface AnalyzerEngine {
  analyze(
    project: WorkspaceProject,
    analyzers: readonly DiagnosticAnalyzer[],
    compilation: unknown,
    document: WorkspaceDocument,
    signal: AbortSignal
  ): Promise<readonly Diagnostic[]>;
}

/**
 * Contributes analyzers that apply to every project (built-in rule packs)
 */
export interface AnalyzerProvider {
  readonly name: string;
  getAnalyzers(): readonly DiagnosticAnalyzer[];
}

// ============================================================================
// Queue
// ============================================================================

/**
 * Progress of one batch, captured when an item is taken or completed
 */
export interface BatchProgress {
  batchId: number;
  workType: AnalyzerWorkType;
  documentCount: number;
  projectCount: number;
  /** Items of the batch handed to a worker so far */
  dequeued: number;
  /** Items of the batch not yet acknowledged */
  remaining: number;
}

/**
 * A unit of "analyze this document" as seen by a worker
 */
export interface QueueItem {
  readonly documentId: DocumentId;
  readonly workType: AnalyzerWorkType;
  /** Aborts when the item is superseded while running or its caller gives up */
  readonly signal: AbortSignal;
  /** Every batch this item counts towards, as of the moment it was taken */
  readonly batches: readonly BatchProgress[];
}

export interface PutWorkOptions {
  /** Caller-scoped cancellation; aborting it cancels the item */
  signal?: AbortSignal;
  /** Distinct projects behind the batch, for progress reports */
  projectCount?: number;
}

export interface WorkQueueStats {
  pendingForeground: number;
  pendingBackground: number;
  inFlight: number;
  waitingWorkers: number;
  enqueued: number;
  superseded: number;
  promoted: number;
  completed: number;
}
