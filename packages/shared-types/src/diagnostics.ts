/**
 * Diagnostic Types
 *
 * Contract between the analyzer engine, the result cache and every
 * consumer of cached diagnostics.
 *
 * @module diagnostics
 */

import type { DocumentId, ProjectId } from './workspace.js';

// ============================================================================
// Diagnostic
// ============================================================================

export const DIAGNOSTIC_SEVERITIES = ['error', 'warning', 'info', 'hidden'] as const;
export type DiagnosticSeverity = (typeof DIAGNOSTIC_SEVERITIES)[number];

export interface DiagnosticPosition {
  /** 0-based line */
  line: number;
  /** 0-based column */
  column: number;
}

export interface DiagnosticSpan {
  start: DiagnosticPosition;
  end: DiagnosticPosition;
}

/**
 * A single finding reported by an analyzer.
 *
 * The scheduler treats this as opaque apart from `isSuppressed`.
 */
export interface Diagnostic {
  /** Analyzer rule code, e.g. `R017` */
  id: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: DiagnosticSpan;
  /** Suppressed findings are dropped before they reach the cache */
  isSuppressed?: boolean;
}

// ============================================================================
// Snapshots
// ============================================================================

/**
 * Latest diagnostics computed for one document.
 */
export interface DocumentDiagnostics {
  documentId: DocumentId;
  documentPath: string;
  projectId: ProjectId;
  projectName: string;
  diagnostics: readonly Diagnostic[];
}

/**
 * Per-document notification pushed after every cache update.
 */
export interface DiagnosticMessage {
  filePath: string;
  diagnostics: readonly Diagnostic[];
}

// ============================================================================
// Scheduling
// ============================================================================

export const ANALYZER_WORK_TYPES = ['foreground', 'background'] as const;

/**
 * Foreground work is latency sensitive (edits, interactive queries);
 * background work is a best-effort sweep.
 */
export type AnalyzerWorkType = (typeof ANALYZER_WORK_TYPES)[number];

export const BACKGROUND_DIAGNOSTIC_STATUSES = ['started', 'progress', 'finished'] as const;
export type BackgroundDiagnosticStatus = (typeof BACKGROUND_DIAGNOSTIC_STATUSES)[number];

export interface BackgroundDiagnosticStatusReport {
  status: BackgroundDiagnosticStatus;
  numberProjects: number;
  numberFiles: number;
  numberFilesRemaining: number;
}
