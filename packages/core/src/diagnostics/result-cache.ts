/**
 * Diagnostic Result Cache
 *
 * Latest diagnostic snapshot per document. Workers overwrite entries
 * wholesale; removal events delete them. No expiry: an entry lives as long
 * as its document does.
 */

import type { DocumentDiagnostics, DocumentId, ProjectId } from '@cadence/shared-types';

export interface ResultCacheStats {
  size: number;
  hits: number;
  misses: number;
  writes: number;
  removals: number;
}

export class DiagnosticResultCache {
  private readonly entries = new Map<DocumentId, DocumentDiagnostics>();
  private stats = { hits: 0, misses: 0, writes: 0, removals: 0 };

  get(documentId: DocumentId): DocumentDiagnostics | undefined {
    const entry = this.entries.get(documentId);
    if (entry) {
      this.stats.hits++;
    } else {
      this.stats.misses++;
    }
    return entry;
  }

  has(documentId: DocumentId): boolean {
    return this.entries.has(documentId);
  }

  /**
   * Replace the snapshot for `snapshot.documentId`
   */
  set(snapshot: DocumentDiagnostics): void {
    this.entries.set(snapshot.documentId, snapshot);
    this.stats.writes++;
  }

  /**
   * Returns false when there was nothing to delete
   */
  delete(documentId: DocumentId): boolean {
    const removed = this.entries.delete(documentId);
    if (removed) {
      this.stats.removals++;
    }
    return removed;
  }

  /**
   * Drop every snapshot that belongs to a project
   */
  deleteProject(projectId: ProjectId): DocumentId[] {
    const removed: DocumentId[] = [];
    for (const [documentId, snapshot] of this.entries) {
      if (snapshot.projectId === projectId) {
        removed.push(documentId);
      }
    }
    for (const documentId of removed) {
      this.delete(documentId);
    }
    return removed;
  }

  /**
   * Snapshots for the given ids, in order; ids without a snapshot are omitted
   */
  getMany(documentIds: Iterable<DocumentId>): DocumentDiagnostics[] {
    const result: DocumentDiagnostics[] = [];
    for (const documentId of documentIds) {
      const entry = this.get(documentId);
      if (entry) {
        result.push(entry);
      }
    }
    return result;
  }

  values(): DocumentDiagnostics[] {
    return [...this.entries.values()];
  }

  clear(): void {
    this.stats.removals += this.entries.size;
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): ResultCacheStats {
    return { size: this.entries.size, ...this.stats };
  }
}
