/**
 * Workspace Boundary Types
 *
 * The scheduler reads projects and documents through these interfaces and
 * never mutates them. Any document model (language server, build graph,
 * file watcher) can sit behind `Workspace`.
 */

import type { DocumentId, ProjectId, WorkspaceChangeEvent } from '@cadence/shared-types';

export interface Disposable {
  dispose(): void;
}

/**
 * Opaque handle on an analyzer plugin
 */
export interface DiagnosticAnalyzer {
  id: string;
  /** Languages the analyzer applies to; all languages when absent */
  languages?: readonly string[];
}

export interface WorkspaceDocument {
  readonly id: DocumentId;
  readonly projectId: ProjectId;
  readonly filePath: string;
  readonly name: string;
}

export interface WorkspaceProject {
  readonly id: ProjectId;
  readonly name: string;
  readonly language: string;
  readonly documentIds: readonly DocumentId[];
  /** Analyzers the project itself references */
  readonly analyzerReferences: readonly DiagnosticAnalyzer[];
  /** Compiled context handed to the analyzer engine; opaque to the scheduler */
  getCompilation(signal?: AbortSignal): Promise<unknown>;
}

/**
 * Immutable view of the workspace at one point in time
 */
export interface WorkspaceSnapshot {
  readonly projects: readonly WorkspaceProject[];
  getProject(projectId: ProjectId): WorkspaceProject | undefined;
  getDocument(documentId: DocumentId): WorkspaceDocument | undefined;
}

export interface Workspace {
  readonly currentSnapshot: WorkspaceSnapshot;
  readonly isInitialized: boolean;
  /** Resolve a file path to the document that owns it */
  getDocumentId(filePath: string): DocumentId | undefined;
  onDidChange(listener: (event: WorkspaceChangeEvent) => void): Disposable;
  onDidInitialize(listener: (isInitialized: boolean) => void): Disposable;
}
