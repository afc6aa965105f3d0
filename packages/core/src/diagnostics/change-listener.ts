/**
 * Workspace Change Listener
 *
 * Maps workspace notifications onto scheduling actions. Edits to a single
 * document are interactive and go to the foreground; anything that can
 * invalidate a whole project or solution becomes a background sweep.
 */

import type { AnalyzerWorkType, DocumentId, ProjectId, WorkspaceChangeEvent } from '@cadence/shared-types';
import { getLogger, type Logger } from '../utils/logger.js';
import type { Disposable, Workspace } from '../workspace/types.js';

/**
 * Scheduling surface the listener drives
 */
export interface DiagnosticScheduler {
  queueForAnalysis(documentIds: readonly DocumentId[], workType: AnalyzerWorkType): void;
  queueDocumentsForDiagnostics(projectIds?: readonly ProjectId[]): DocumentId[];
  forgetDocument(documentId: DocumentId): boolean;
  forgetProject(projectId: ProjectId): DocumentId[];
  forgetAll(): void;
  onWorkspaceInitialized(): void;
}

export class WorkspaceChangeListener {
  private subscriptions: Disposable[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly workspace: Workspace,
    private readonly scheduler: DiagnosticScheduler,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger('change-listener');
  }

  get isListening(): boolean {
    return this.subscriptions.length > 0;
  }

  start(): void {
    if (this.isListening) return;

    this.subscriptions = [
      this.workspace.onDidChange((event) => this.handleChange(event)),
      this.workspace.onDidInitialize((isInitialized) => {
        if (isInitialized) {
          this.scheduler.onWorkspaceInitialized();
        }
      }),
    ];
  }

  stop(): void {
    for (const subscription of this.subscriptions.splice(0)) {
      subscription.dispose();
    }
  }

  handleChange(event: WorkspaceChangeEvent): void {
    switch (event.kind) {
      case 'documentAdded':
      case 'documentChanged':
      case 'documentReloaded':
      case 'documentInfoChanged':
        if (event.documentId) {
          this.scheduler.queueForAnalysis([event.documentId], 'foreground');
        }
        break;

      case 'documentRemoved':
        if (event.documentId && !this.scheduler.forgetDocument(event.documentId)) {
          this.logger.debug('Removed document had no cached diagnostics', {
            documentId: event.documentId,
          });
        }
        break;

      case 'analyzerConfigDocumentChanged':
      case 'projectAdded':
      case 'projectChanged':
      case 'projectReloaded':
        this.queueProject(event);
        break;

      case 'projectRemoved':
        if (event.projectId) {
          const removed = this.scheduler.forgetProject(event.projectId);
          this.logger.debug('Dropped diagnostics of removed project', {
            projectId: event.projectId,
            documents: removed.length,
          });
        }
        break;

      case 'solutionAdded':
      case 'solutionChanged':
      case 'solutionReloaded':
        this.scheduler.queueDocumentsForDiagnostics();
        break;

      case 'solutionCleared':
      case 'solutionRemoved':
        this.scheduler.forgetAll();
        break;
    }
  }

  private queueProject(event: WorkspaceChangeEvent): void {
    const project = event.projectId ? this.workspace.currentSnapshot.getProject(event.projectId) : undefined;
    if (!project) {
      this.logger.debug('Ignoring change of an unknown project', {
        kind: event.kind,
        projectId: event.projectId,
      });
      return;
    }
    this.scheduler.queueForAnalysis(project.documentIds, 'background');
  }
}
