/**
 * Diagnostic Worker Pool
 *
 * A fixed number of identical async loops sharing one work queue. Each loop
 * takes an item, analyzes the document, publishes the snapshot and
 * acknowledges the item. A single document's failure never ends a loop.
 */

import type { Diagnostic } from '@cadence/shared-types';
import { getLogger, type Logger } from '../utils/logger.js';
import { AnalysisCancelledError, AnalysisTimeoutError } from '../utils/errors.js';
import type { Workspace, WorkspaceDocument, WorkspaceProject } from '../workspace/types.js';
import type { DocumentAnalyzer } from './document-analyzer.js';
import type { DiagnosticEventForwarder } from './event-forwarder.js';
import type { BackgroundProgressReporter } from './progress-reporter.js';
import type { DiagnosticResultCache } from './result-cache.js';
import type { QueueItem } from './types.js';
import type { AnalyzerWorkQueue } from './work-queue.js';

export interface DiagnosticWorkerPoolOptions {
  workerCount: number;
  workspace: Workspace;
  queue: AnalyzerWorkQueue;
  analyzer: DocumentAnalyzer;
  cache: DiagnosticResultCache;
  forwarder: DiagnosticEventForwarder;
  progress: BackgroundProgressReporter;
  logger?: Logger;
}

export interface WorkerPoolStats {
  workerCount: number;
  running: boolean;
  completed: number;
  failed: number;
  cancelled: number;
  timedOut: number;
  skipped: number;
}

type Outcome = 'completed' | 'failed' | 'cancelled' | 'timedOut' | 'skipped';

export class DiagnosticWorkerPool {
  private readonly options: DiagnosticWorkerPoolOptions;
  private readonly logger: Logger;
  private loops: Promise<void>[] = [];
  private stats = { completed: 0, failed: 0, cancelled: 0, timedOut: 0, skipped: 0 };

  constructor(options: DiagnosticWorkerPoolOptions) {
    this.options = options;
    this.logger = options.logger ?? getLogger('worker-pool');
  }

  get isRunning(): boolean {
    return this.loops.length > 0;
  }

  /**
   * Start the worker loops; a second call is a no-op
   */
  start(): void {
    if (this.isRunning) return;

    for (let index = 0; index < this.options.workerCount; index++) {
      this.loops.push(this.runWorker(index));
    }
    this.logger.debug('Worker pool started', { workerCount: this.options.workerCount });
  }

  /**
   * Close the queue, let every worker finish its current item, and wait
   * for all loops to exit
   */
  async stop(): Promise<void> {
    this.options.queue.close();
    const loops = this.loops;
    this.loops = [];
    await Promise.all(loops);
    if (loops.length > 0) {
      this.logger.debug('Worker pool stopped', { ...this.stats });
    }
  }

  getStats(): WorkerPoolStats {
    return {
      workerCount: this.options.workerCount,
      running: this.isRunning,
      ...this.stats,
    };
  }

  private async runWorker(index: number): Promise<void> {
    const { queue } = this.options;

    for (;;) {
      const item = await queue.takeWork();
      if (!item) break;
      await this.processItem(item);
    }

    this.logger.debug('Worker exited', { worker: index });
  }

  private async processItem(item: QueueItem): Promise<void> {
    const { queue, progress } = this.options;

    try {
      progress.onTaken(item);
      const outcome = await this.analyzeItem(item);
      this.stats[outcome]++;
    } catch (error) {
      this.stats.failed++;
      this.logger.error('Unexpected failure while processing document', error, {
        documentId: item.documentId,
      });
    } finally {
      const batches = queue.workComplete(item);
      try {
        progress.onCompleted(batches);
      } catch (error) {
        this.logger.error('Progress reporting failed', error, { documentId: item.documentId });
      }
    }
  }

  private async analyzeItem(item: QueueItem): Promise<Outcome> {
    const snapshot = this.options.workspace.currentSnapshot;
    const document = snapshot.getDocument(item.documentId);
    const project = document ? snapshot.getProject(document.projectId) : undefined;

    if (!document || !project) {
      this.logger.debug('Skipping document that is no longer in the workspace', {
        documentId: item.documentId,
      });
      return 'skipped';
    }

    try {
      const diagnostics = await this.options.analyzer.analyze(project, document, item.signal);
      this.publish(project, document, diagnostics);
      return 'completed';
    } catch (error) {
      if (error instanceof AnalysisCancelledError) {
        this.logger.info('Analysis cancelled', {
          documentId: document.id,
          filePath: document.filePath,
        });
        return 'cancelled';
      }

      this.logger.error('Analysis produced no diagnostics', error, {
        documentId: document.id,
        filePath: document.filePath,
      });
      this.publish(project, document, []);
      return error instanceof AnalysisTimeoutError ? 'timedOut' : 'failed';
    }
  }

  private publish(project: WorkspaceProject, document: WorkspaceDocument, diagnostics: Diagnostic[]): void {
    // Removed while it was being analyzed
    if (!this.options.workspace.currentSnapshot.getDocument(document.id)) {
      this.logger.debug('Dropping diagnostics of a removed document', { documentId: document.id });
      return;
    }

    this.options.cache.set({
      documentId: document.id,
      documentPath: document.filePath,
      projectId: project.id,
      projectName: project.name,
      diagnostics,
    });
    this.options.forwarder.forward({ filePath: document.filePath, diagnostics });
  }
}
