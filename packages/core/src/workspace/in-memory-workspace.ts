/**
 * In-Memory Workspace
 *
 * A self-contained `Workspace` whose mutation methods raise the same change
 * notifications a language server workspace would. Every mutation publishes
 * a fresh immutable snapshot, so readers holding an older snapshot keep a
 * consistent view.
 */

import { EventEmitter } from 'node:events';
import path from 'node:path';
import type { DocumentId, ProjectId, WorkspaceChangeEvent, WorkspaceChangeKind } from '@cadence/shared-types';
import { ResourceNotFoundError } from '../utils/errors.js';
import type {
  DiagnosticAnalyzer,
  Disposable,
  Workspace,
  WorkspaceDocument,
  WorkspaceProject,
  WorkspaceSnapshot,
} from './types.js';

export interface ProjectInit {
  id: ProjectId;
  name: string;
  language?: string;
  analyzerReferences?: readonly DiagnosticAnalyzer[];
  /** Value returned by `getCompilation()`; defaults to `{ projectId }` */
  compilation?: unknown;
}

export interface DocumentInit {
  id: DocumentId;
  projectId: ProjectId;
  filePath: string;
  name?: string;
}

interface ProjectState {
  id: ProjectId;
  name: string;
  language: string;
  analyzerReferences: readonly DiagnosticAnalyzer[];
  compilation: unknown;
  documentIds: DocumentId[];
}

const COMPONENT = 'InMemoryWorkspace';

function normalizePath(filePath: string): string {
  return path.resolve(filePath);
}

class FrozenProject implements WorkspaceProject {
  readonly id: ProjectId;
  readonly name: string;
  readonly language: string;
  readonly documentIds: readonly DocumentId[];
  readonly analyzerReferences: readonly DiagnosticAnalyzer[];
  private readonly compilation: unknown;

  constructor(state: ProjectState) {
    this.id = state.id;
    this.name = state.name;
    this.language = state.language;
    this.documentIds = [...state.documentIds];
    this.analyzerReferences = [...state.analyzerReferences];
    this.compilation = state.compilation;
  }

  async getCompilation(): Promise<unknown> {
    return this.compilation;
  }
}

class FrozenSnapshot implements WorkspaceSnapshot {
  readonly projects: readonly WorkspaceProject[];
  private readonly projectIndex: ReadonlyMap<ProjectId, WorkspaceProject>;
  private readonly documentIndex: ReadonlyMap<DocumentId, WorkspaceDocument>;

  constructor(projects: Iterable<ProjectState>, documents: ReadonlyMap<DocumentId, WorkspaceDocument>) {
    const frozen = [...projects].map((state) => new FrozenProject(state));
    this.projects = frozen;
    this.projectIndex = new Map(frozen.map((project) => [project.id, project]));
    this.documentIndex = new Map(documents);
  }

  getProject(projectId: ProjectId): WorkspaceProject | undefined {
    return this.projectIndex.get(projectId);
  }

  getDocument(documentId: DocumentId): WorkspaceDocument | undefined {
    return this.documentIndex.get(documentId);
  }
}

export class InMemoryWorkspace implements Workspace {
  private readonly events = new EventEmitter();
  private readonly projects = new Map<ProjectId, ProjectState>();
  private readonly documents = new Map<DocumentId, WorkspaceDocument>();
  private readonly pathIndex = new Map<string, DocumentId>();
  private snapshot: WorkspaceSnapshot = new FrozenSnapshot([], new Map());
  private initialized = false;

  get currentSnapshot(): WorkspaceSnapshot {
    return this.snapshot;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  getDocumentId(filePath: string): DocumentId | undefined {
    return this.pathIndex.get(normalizePath(filePath));
  }

  onDidChange(listener: (event: WorkspaceChangeEvent) => void): Disposable {
    this.events.on('change', listener);
    return { dispose: () => this.events.off('change', listener) };
  }

  onDidInitialize(listener: (isInitialized: boolean) => void): Disposable {
    this.events.on('initialized', listener);
    return { dispose: () => this.events.off('initialized', listener) };
  }

  /**
   * Number of subscribed change listeners (for leak checks)
   */
  get listenerCount(): number {
    return this.events.listenerCount('change') + this.events.listenerCount('initialized');
  }

  // ==========================================================================
  // Solution lifecycle
  // ==========================================================================

  /**
   * Mark the initial load complete and notify subscribers
   */
  markInitialized(): void {
    this.initialized = true;
    this.events.emit('initialized', true);
  }

  /**
   * Load a batch of projects and documents at once (`solutionAdded`)
   */
  loadSolution(projects: ProjectInit[], documents: DocumentInit[]): void {
    for (const project of projects) this.insertProject(project);
    for (const document of documents) this.insertDocument(document);
    this.publish({ kind: 'solutionAdded' });
  }

  reloadSolution(): void {
    this.publish({ kind: 'solutionReloaded' });
  }

  changeSolution(): void {
    this.publish({ kind: 'solutionChanged' });
  }

  /**
   * Drop every project and document (`solutionCleared`)
   */
  clearSolution(): void {
    this.projects.clear();
    this.documents.clear();
    this.pathIndex.clear();
    this.publish({ kind: 'solutionCleared' });
  }

  // ==========================================================================
  // Projects
  // ==========================================================================

  addProject(init: ProjectInit): void {
    this.insertProject(init);
    this.publish({ kind: 'projectAdded', projectId: init.id });
  }

  changeProject(projectId: ProjectId, patch: Partial<Omit<ProjectInit, 'id'>> = {}): void {
    const project = this.requireProject(projectId, 'changeProject');
    if (patch.name !== undefined) project.name = patch.name;
    if (patch.language !== undefined) project.language = patch.language;
    if (patch.analyzerReferences !== undefined) project.analyzerReferences = patch.analyzerReferences;
    if ('compilation' in patch) project.compilation = patch.compilation;
    this.publish({ kind: 'projectChanged', projectId });
  }

  reloadProject(projectId: ProjectId): void {
    this.requireProject(projectId, 'reloadProject');
    this.publish({ kind: 'projectReloaded', projectId });
  }

  removeProject(projectId: ProjectId): void {
    const project = this.requireProject(projectId, 'removeProject');
    for (const documentId of project.documentIds) {
      this.dropDocument(documentId);
    }
    this.projects.delete(projectId);
    this.publish({ kind: 'projectRemoved', projectId });
  }

  /**
   * Signal that an analyzer configuration file (rule settings) of a project changed
   */
  changeAnalyzerConfig(projectId: ProjectId, configDocumentId: DocumentId): void {
    this.requireProject(projectId, 'changeAnalyzerConfig');
    this.publish({ kind: 'analyzerConfigDocumentChanged', projectId, documentId: configDocumentId });
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  addDocument(init: DocumentInit): void {
    this.insertDocument(init);
    this.publish({ kind: 'documentAdded', projectId: init.projectId, documentId: init.id });
  }

  changeDocument(documentId: DocumentId): void {
    this.touchDocument(documentId, 'documentChanged');
  }

  reloadDocument(documentId: DocumentId): void {
    this.touchDocument(documentId, 'documentReloaded');
  }

  /**
   * Rename or move a document
   */
  changeDocumentInfo(documentId: DocumentId, info: { filePath?: string; name?: string }): void {
    const document = this.requireDocument(documentId, 'changeDocumentInfo');
    const filePath = info.filePath ?? document.filePath;
    this.pathIndex.delete(normalizePath(document.filePath));
    this.pathIndex.set(normalizePath(filePath), documentId);
    this.documents.set(documentId, {
      ...document,
      filePath,
      name: info.name ?? (info.filePath !== undefined ? path.basename(filePath) : document.name),
    });
    this.publish({ kind: 'documentInfoChanged', projectId: document.projectId, documentId });
  }

  removeDocument(documentId: DocumentId): void {
    const document = this.requireDocument(documentId, 'removeDocument');
    this.dropDocument(documentId);
    this.publish({ kind: 'documentRemoved', projectId: document.projectId, documentId });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private touchDocument(documentId: DocumentId, kind: WorkspaceChangeKind): void {
    const document = this.requireDocument(documentId, kind);
    this.publish({ kind, projectId: document.projectId, documentId });
  }

  private insertProject(init: ProjectInit): void {
    this.projects.set(init.id, {
      id: init.id,
      name: init.name,
      language: init.language ?? 'plaintext',
      analyzerReferences: init.analyzerReferences ?? [],
      compilation: 'compilation' in init ? init.compilation : { projectId: init.id },
      documentIds: this.projects.get(init.id)?.documentIds ?? [],
    });
  }

  private insertDocument(init: DocumentInit): void {
    const project = this.requireProject(init.projectId, 'addDocument');
    if (!project.documentIds.includes(init.id)) {
      project.documentIds.push(init.id);
    }
    this.documents.set(init.id, {
      id: init.id,
      projectId: init.projectId,
      filePath: init.filePath,
      name: init.name ?? path.basename(init.filePath),
    });
    this.pathIndex.set(normalizePath(init.filePath), init.id);
  }

  private dropDocument(documentId: DocumentId): void {
    const document = this.documents.get(documentId);
    if (!document) return;

    this.documents.delete(documentId);
    this.pathIndex.delete(normalizePath(document.filePath));
    const project = this.projects.get(document.projectId);
    if (project) {
      project.documentIds = project.documentIds.filter((id) => id !== documentId);
    }
  }

  private requireProject(projectId: ProjectId, operation: string): ProjectState {
    const project = this.projects.get(projectId);
    if (!project) {
      throw new ResourceNotFoundError(`Unknown project ${projectId}`, {
        component: COMPONENT,
        operation,
        resourceType: 'project',
        resourceId: projectId,
      });
    }
    return project;
  }

  private requireDocument(documentId: DocumentId, operation: string): WorkspaceDocument {
    const document = this.documents.get(documentId);
    if (!document) {
      throw new ResourceNotFoundError(`Unknown document ${documentId}`, {
        component: COMPONENT,
        operation,
        resourceType: 'document',
        resourceId: documentId,
      });
    }
    return document;
  }

  private publish(event: WorkspaceChangeEvent): void {
    this.snapshot = new FrozenSnapshot(this.projects.values(), this.documents);
    this.events.emit('change', event);
  }
}
