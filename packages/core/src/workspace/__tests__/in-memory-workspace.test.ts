/**
 * Tests for InMemoryWorkspace
 */

import { describe, it, expect, vi } from 'vitest';
import type { WorkspaceChangeEvent } from '@cadence/shared-types';
import { InMemoryWorkspace } from '../in-memory-workspace.js';
import { ResourceNotFoundError } from '../../utils/errors.js';

function createWorkspace(): InMemoryWorkspace {
  const workspace = new InMemoryWorkspace();
  workspace.loadSolution(
    [{ id: 'p1', name: 'App' }],
    [
      { id: 'd1', projectId: 'p1', filePath: '/repo/app/notes.txt' },
      { id: 'd2', projectId: 'p1', filePath: '/repo/app/Util.txt' },
    ]
  );
  return workspace;
}

describe('InMemoryWorkspace', () => {
  it('should resolve normalized paths to document ids', () => {
    const workspace = createWorkspace();

    expect(workspace.getDocumentId('/repo/app/../app/notes.txt')).toBe('d1');
    expect(workspace.getDocumentId('/repo/other.txt')).toBeUndefined();
    expect(workspace.currentSnapshot.getDocument('d1')?.name).toBe('notes.txt');
  });

  it('should default a project language to plaintext', () => {
    const workspace = createWorkspace();
    workspace.addProject({ id: 'p2', name: 'Docs', language: 'markdown' });

    expect(workspace.currentSnapshot.getProject('p1')?.language).toBe('plaintext');
    expect(workspace.currentSnapshot.getProject('p2')?.language).toBe('markdown');
  });

  it('should publish a new snapshot on every change and leave old ones intact', () => {
    const workspace = createWorkspace();
    const before = workspace.currentSnapshot;

    workspace.removeDocument('d2');

    expect(before.getProject('p1')?.documentIds).toEqual(['d1', 'd2']);
    expect(workspace.currentSnapshot.getProject('p1')?.documentIds).toEqual(['d1']);
    expect(workspace.getDocumentId('/repo/app/Util.txt')).toBeUndefined();
  });

  it('should raise change events with the affected ids', () => {
    const workspace = createWorkspace();
    const events: WorkspaceChangeEvent[] = [];
    const subscription = workspace.onDidChange((event) => events.push(event));

    workspace.changeDocument('d1');
    workspace.changeDocumentInfo('d2', { filePath: '/repo/app/Helpers.txt' });
    workspace.removeProject('p1');
    subscription.dispose();
    workspace.clearSolution();

    expect(events).toEqual([
      { kind: 'documentChanged', projectId: 'p1', documentId: 'd1' },
      { kind: 'documentInfoChanged', projectId: 'p1', documentId: 'd2' },
      { kind: 'projectRemoved', projectId: 'p1' },
    ]);
  });

  it('should move the path index when a document is renamed', () => {
    const workspace = createWorkspace();

    workspace.changeDocumentInfo('d2', { filePath: '/repo/app/Helpers.txt' });

    expect(workspace.getDocumentId('/repo/app/Helpers.txt')).toBe('d2');
    expect(workspace.getDocumentId('/repo/app/Util.txt')).toBeUndefined();
    expect(workspace.currentSnapshot.getDocument('d2')?.name).toBe('Helpers.txt');
  });

  it('should notify initialization once marked', () => {
    const workspace = createWorkspace();
    const listener = vi.fn();
    workspace.onDidInitialize(listener);

    workspace.markInitialized();

    expect(workspace.isInitialized).toBe(true);
    expect(listener).toHaveBeenCalledWith(true);
  });

  it('should reject unknown ids', () => {
    const workspace = createWorkspace();

    expect(() => workspace.changeDocument('missing')).toThrow(ResourceNotFoundError);
    expect(() => workspace.reloadProject('missing')).toThrow(ResourceNotFoundError);
  });

  it('should return the configured compilation', async () => {
    const workspace = new InMemoryWorkspace();
    workspace.addProject({ id: 'p1', name: 'App', compilation: 'compiled' });

    await expect(workspace.currentSnapshot.getProject('p1')?.getCompilation()).resolves.toBe('compiled');
  });
});
