/**
 * Document Analyzer
 *
 * Runs the analyzer engine for one document under a per-document deadline
 * linked to the caller's signal. An analyzer bug can hang a document
 * forever, so a call that outlives the deadline is abandoned.
 *
 * Failures come back classified:
 * - AnalysisCancelledError: the caller's signal fired
 * - AnalysisTimeoutError: the per-document deadline fired
 * - AnalysisFailedError: the engine (or compilation) threw
 */

import type { Diagnostic } from '@cadence/shared-types';
import { getLogger, type Logger } from '../utils/logger.js';
import { AnalysisCancelledError, AnalysisFailedError, AnalysisTimeoutError } from '../utils/errors.js';
import { raceWithSignal, withDeadline } from '../utils/cancellation.js';
import type { DiagnosticAnalyzer, WorkspaceDocument, WorkspaceProject } from '../workspace/types.js';
import type { AnalyzerEngine, AnalyzerProvider } from './types.js';

const COMPONENT = 'DocumentAnalyzer';

export interface DocumentAnalyzerOptions {
  engine: AnalyzerEngine;
  documentAnalysisTimeoutMs: number;
  providers?: readonly AnalyzerProvider[];
  logger?: Logger;
}

export class DocumentAnalyzer {
  private readonly engine: AnalyzerEngine;
  private readonly providers: readonly AnalyzerProvider[];
  private readonly logger: Logger;
  readonly documentAnalysisTimeoutMs: number;

  constructor(options: DocumentAnalyzerOptions) {
    this.engine = options.engine;
    this.providers = options.providers ?? [];
    this.documentAnalysisTimeoutMs = options.documentAnalysisTimeoutMs;
    this.logger = options.logger ?? getLogger('document-analyzer');
  }

  /**
   * Provider analyzers followed by the project's own references, restricted
   * to the project's language; the first analyzer with a given id wins.
   */
  getAnalyzersForProject(project: WorkspaceProject): DiagnosticAnalyzer[] {
    const seen = new Set<string>();
    const analyzers: DiagnosticAnalyzer[] = [];

    const candidates = [
      ...this.providers.flatMap((provider) => provider.getAnalyzers()),
      ...project.analyzerReferences,
    ];

    for (const analyzer of candidates) {
      if (seen.has(analyzer.id)) continue;
      if (analyzer.languages && !analyzer.languages.includes(project.language)) continue;
      seen.add(analyzer.id);
      analyzers.push(analyzer);
    }

    return analyzers;
  }

  /**
   * Unsuppressed diagnostics for `document`, or a classified error
   */
  async analyze(
    project: WorkspaceProject,
    document: WorkspaceDocument,
    signal: AbortSignal
  ): Promise<Diagnostic[]> {
    if (signal.aborted) {
      throw this.cancelled(document, signal.reason);
    }

    const analyzers = this.getAnalyzersForProject(project);
    const deadline = withDeadline(this.documentAnalysisTimeoutMs, signal);
    const startedAt = Date.now();

    try {
      const work = this.runEngine(project, analyzers, document, deadline.signal);
      const diagnostics = await raceWithSignal(work, deadline.signal, (error) => {
        this.logger.debug('Abandoned analysis settled with an error', {
          documentId: document.id,
          error: error instanceof Error ? error.message : String(error),
        });
      });
      return diagnostics.filter((diagnostic) => !diagnostic.isSuppressed);
    } catch (error) {
      if (signal.aborted) {
        throw this.cancelled(document, signal.reason);
      }

      if (deadline.signal.aborted) {
        const elapsed = Date.now() - startedAt;
        throw new AnalysisTimeoutError(
          `Analysis of ${document.name} timed out after ${this.documentAnalysisTimeoutMs}ms`,
          {
            component: COMPONENT,
            operation: 'analyze',
            documentId: document.id,
            timeoutMs: this.documentAnalysisTimeoutMs,
            elapsed,
          }
        );
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new AnalysisFailedError(`Analysis of ${document.name} failed: ${message}`, {
        component: COMPONENT,
        operation: 'analyze',
        documentId: document.id,
        analyzers: analyzers.map((analyzer) => analyzer.id),
        cause: error,
      });
    } finally {
      deadline.dispose();
    }
  }

  private async runEngine(
    project: WorkspaceProject,
    analyzers: readonly DiagnosticAnalyzer[],
    document: WorkspaceDocument,
    signal: AbortSignal
  ): Promise<readonly Diagnostic[]> {
    const compilation = await project.getCompilation(signal);
    return this.engine.analyze(project, analyzers, compilation, document, signal);
  }

  private cancelled(document: WorkspaceDocument, reason: unknown): AnalysisCancelledError {
    return new AnalysisCancelledError(`Analysis of ${document.name} cancelled`, {
      component: COMPONENT,
      operation: 'analyze',
      documentId: document.id,
      reason,
    });
  }
}
