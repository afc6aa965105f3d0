/**
 * Workspace Identity Types
 *
 * @module workspace
 */

/** Stable key of a source document; survives edits, dies with removal */
export type DocumentId = string;

/** Key of a group of documents sharing compilation context */
export type ProjectId = string;

/**
 * Kinds of workspace change notifications.
 */
export const WORKSPACE_CHANGE_KINDS = [
  'documentAdded',
  'documentChanged',
  'documentReloaded',
  'documentInfoChanged',
  'documentRemoved',
  'analyzerConfigDocumentChanged',
  'projectAdded',
  'projectChanged',
  'projectReloaded',
  'projectRemoved',
  'solutionAdded',
  'solutionChanged',
  'solutionReloaded',
  'solutionCleared',
  'solutionRemoved',
] as const;

export type WorkspaceChangeKind = (typeof WORKSPACE_CHANGE_KINDS)[number];

export interface WorkspaceChangeEvent {
  kind: WorkspaceChangeKind;
  /** Owning project, when the change is project or document scoped */
  projectId?: ProjectId;
  /** Affected document, when the change is document scoped */
  documentId?: DocumentId;
}
