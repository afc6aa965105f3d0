/**
 * Diagnostic Worker
 *
 * Entry point of the scheduler. Owns the work queue, the result cache, the
 * worker pool, the change listener and the outbound event forwarder, and
 * exposes the query APIs clients call.
 *
 * @example
 * ```ts
 * const worker = new DiagnosticWorker(workspace, engine, {
 *   workerCount: 4,
 *   documentAnalysisTimeoutMs: 30_000,
 * });
 * worker.events.on('diagnostics', ({ filePath, diagnostics }) => publish(filePath, diagnostics));
 * worker.start();
 *
 * const [snapshot] = await worker.getDiagnostics(['/repo/src/notes.md']);
 * ```
 */

import { z } from 'zod';
import { toSchedulerSettings, type Config } from '@cadence/shared-config';
import type {
  AnalyzerWorkType,
  Diagnostic,
  DocumentDiagnostics,
  DocumentId,
  ProjectId,
} from '@cadence/shared-types';
import { configureLogger, getLogger, type Logger } from '../utils/logger.js';
import { AnalysisFailedError, AnalysisTimeoutError, ResourceNotFoundError } from '../utils/errors.js';
import { withDeadline } from '../utils/cancellation.js';
import { parseOrThrow } from '../utils/validation.js';
import type { Workspace, WorkspaceProject } from '../workspace/types.js';
import { WorkspaceChangeListener, type DiagnosticScheduler } from './change-listener.js';
import { DocumentAnalyzer } from './document-analyzer.js';
import { DiagnosticEventForwarder } from './event-forwarder.js';
import { BackgroundProgressReporter } from './progress-reporter.js';
import { DiagnosticResultCache } from './result-cache.js';
import type { AnalyzerEngine, AnalyzerProvider, WorkQueueStats } from './types.js';
import { DiagnosticWorkerPool, type WorkerPoolStats } from './worker-pool.js';
import { AnalyzerWorkQueue } from './work-queue.js';

const COMPONENT = 'DiagnosticWorker';

/** Foreground waits in `getDiagnostics` give up after this many analysis timeouts */
const FOREGROUND_WAIT_FACTOR = 3;

export const diagnosticWorkerOptionsSchema = z.object({
  workerCount: z.number().int().min(1).max(256),
  documentAnalysisTimeoutMs: z.number().int().min(1),
});

export interface DiagnosticWorkerOptions extends z.infer<typeof diagnosticWorkerOptionsSchema> {
  providers?: readonly AnalyzerProvider[];
  logger?: Logger;
}

export interface FromConfigOptions {
  providers?: readonly AnalyzerProvider[];
  /** Parsed configuration; `loadConfig()` when omitted */
  config?: Config;
}

export interface DiagnosticWorkerStats {
  queue: WorkQueueStats;
  pool: WorkerPoolStats;
  cache: ReturnType<DiagnosticResultCache['getStats']>;
}

export class DiagnosticWorker implements DiagnosticScheduler {
  /** Per-document diagnostics and background status reports */
  readonly events: DiagnosticEventForwarder;

  private readonly workspace: Workspace;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly queue: AnalyzerWorkQueue;
  private readonly cache = new DiagnosticResultCache();
  private readonly analyzer: DocumentAnalyzer;
  private readonly pool: DiagnosticWorkerPool;
  private readonly listener: WorkspaceChangeListener;
  private started = false;

  constructor(workspace: Workspace, engine: AnalyzerEngine, options: DiagnosticWorkerOptions) {
    const { workerCount, documentAnalysisTimeoutMs } = parseOrThrow(
      diagnosticWorkerOptionsSchema,
      { workerCount: options.workerCount, documentAnalysisTimeoutMs: options.documentAnalysisTimeoutMs },
      { component: COMPONENT, operation: 'constructor' }
    );

    const logger = options.logger ?? getLogger();
    this.workspace = workspace;
    this.logger = logger.child('diagnostic-worker');
    this.timeoutMs = documentAnalysisTimeoutMs;

    this.events = new DiagnosticEventForwarder(logger.child('event-forwarder'));
    this.queue = new AnalyzerWorkQueue({ logger: logger.child('work-queue') });
    this.analyzer = new DocumentAnalyzer({
      engine,
      providers: options.providers,
      documentAnalysisTimeoutMs,
      logger: logger.child('document-analyzer'),
    });
    this.pool = new DiagnosticWorkerPool({
      workerCount,
      workspace,
      queue: this.queue,
      analyzer: this.analyzer,
      cache: this.cache,
      forwarder: this.events,
      progress: new BackgroundProgressReporter(this.events),
      logger: logger.child('worker-pool'),
    });
    this.listener = new WorkspaceChangeListener(workspace, this, logger.child('change-listener'));
  }

  /**
   * Build a worker from environment configuration, configuring the default
   * logger along the way
   */
  static fromConfig(workspace: Workspace, engine: AnalyzerEngine, options: FromConfigOptions = {}): DiagnosticWorker {
    const settings = toSchedulerSettings(options.config);
    configureLogger({ level: settings.logLevel, enableStructured: settings.structuredLogs });

    return new DiagnosticWorker(workspace, engine, {
      workerCount: settings.workerCount,
      documentAnalysisTimeoutMs: settings.documentAnalysisTimeoutMs,
      providers: options.providers,
    });
  }

  /**
   * Subscribe to the workspace and start the workers. When the workspace is
   * already initialized, every document is queued for a background sweep.
   */
  start(): void {
    if (this.started) return;
    if (this.queue.isClosed) {
      this.logger.warn('A stopped diagnostic worker cannot be restarted');
      return;
    }
    this.started = true;

    this.listener.start();
    this.pool.start();

    if (this.workspace.isInitialized) {
      this.queueDocumentsForDiagnostics();
    }
  }

  /**
   * Unsubscribe, drop pending work, and wait for running analyses to finish
   */
  async stop(): Promise<void> {
    this.listener.stop();
    await this.pool.stop();
    this.started = false;
  }

  onWorkspaceInitialized(): void {
    const documentIds = this.queueDocumentsForDiagnostics();
    this.logger.info('Workspace initialized, queued documents for background analysis', {
      documents: documentIds.length,
    });
  }

  /**
   * Diagnostics for the given files. Pending background work for them is
   * promoted and the call waits for foreground work to drain, bounded by a
   * multiple of the per-document timeout. Paths the workspace does not know
   * are dropped; documents without a snapshot yet are omitted.
   */
  async getDiagnostics(documentPaths: readonly string[]): Promise<DocumentDiagnostics[]> {
    const documentIds = new Set<DocumentId>();
    for (const documentPath of documentPaths) {
      const documentId = this.workspace.getDocumentId(documentPath);
      if (documentId) {
        documentIds.add(documentId);
      }
    }

    for (const documentId of documentIds) {
      this.queue.tryPromote(documentId);
    }

    const deadline = withDeadline(this.timeoutMs * FOREGROUND_WAIT_FACTOR);
    try {
      await this.queue.waitForegroundWorkComplete(deadline.signal);
    } finally {
      deadline.dispose();
    }

    return this.cache.getMany(documentIds);
  }

  /**
   * Cached snapshots of every document currently in the workspace. Resolves
   * without waiting for pending work or promoting it.
   */
  async getAllDiagnostics(): Promise<DocumentDiagnostics[]> {
    const { projects } = this.workspace.currentSnapshot;
    return this.cache.getMany(projects.flatMap((project) => project.documentIds));
  }

  /**
   * Queue every document of the given projects (all projects when omitted)
   * as background work and return their ids
   */
  queueDocumentsForDiagnostics(projectIds?: readonly ProjectId[]): DocumentId[] {
    const snapshot = this.workspace.currentSnapshot;
    const projects: readonly WorkspaceProject[] = projectIds
      ? projectIds.flatMap((projectId) => snapshot.getProject(projectId) ?? [])
      : snapshot.projects;

    const documentIds = projects.flatMap((project) => project.documentIds);
    this.queueForAnalysis(documentIds, 'background');
    return documentIds;
  }

  queueForAnalysis(documentIds: readonly DocumentId[], workType: AnalyzerWorkType): void {
    const snapshot = this.workspace.currentSnapshot;
    const projectIds = new Set<ProjectId>();
    for (const documentId of documentIds) {
      const document = snapshot.getDocument(documentId);
      if (document) {
        projectIds.add(document.projectId);
      }
    }

    this.queue.putWork(documentIds, workType, { projectCount: projectIds.size });
  }

  forgetDocument(documentId: DocumentId): boolean {
    return this.cache.delete(documentId);
  }

  forgetProject(projectId: ProjectId): DocumentId[] {
    return this.cache.deleteProject(projectId);
  }

  forgetAll(): void {
    this.cache.clear();
  }

  /**
   * Fresh diagnostics for one document, computed directly without touching
   * the queue or the cache. An analyzer failure or timeout is logged and
   * yields no diagnostics; cancellation by `signal` rejects.
   */
  async analyzeDocument(documentId: DocumentId, signal?: AbortSignal): Promise<Diagnostic[]> {
    const snapshot = this.workspace.currentSnapshot;
    const document = snapshot.getDocument(documentId);
    const project = document ? snapshot.getProject(document.projectId) : undefined;

    if (!document || !project) {
      throw new ResourceNotFoundError(`Document ${documentId} is not in the workspace`, {
        component: COMPONENT,
        operation: 'analyzeDocument',
        resourceType: 'document',
        resourceId: documentId,
      });
    }

    try {
      return await this.analyzer.analyze(project, document, signal ?? new AbortController().signal);
    } catch (error) {
      if (error instanceof AnalysisFailedError || error instanceof AnalysisTimeoutError) {
        this.logger.error('Direct analysis produced no diagnostics', error, {
          documentId: document.id,
          filePath: document.filePath,
        });
        return [];
      }
      throw error;
    }
  }

  /**
   * Queue a project's documents as foreground work, wait for the
   * foreground to drain, and return every cached diagnostic in the
   * workspace (not only the project's)
   */
  async analyzeProjects(projectId: ProjectId, signal?: AbortSignal): Promise<Diagnostic[]> {
    const project = this.workspace.currentSnapshot.getProject(projectId);
    if (!project) {
      throw new ResourceNotFoundError(`Project ${projectId} is not in the workspace`, {
        component: COMPONENT,
        operation: 'analyzeProjects',
        resourceType: 'project',
        resourceId: projectId,
      });
    }

    this.queueForAnalysis(project.documentIds, 'foreground');
    await this.queue.waitForegroundWorkComplete(signal);

    return this.cache.values().flatMap((snapshot) => snapshot.diagnostics);
  }

  getStats(): DiagnosticWorkerStats {
    return {
      queue: this.queue.getStats(),
      pool: this.pool.getStats(),
      cache: this.cache.getStats(),
    };
  }
}
