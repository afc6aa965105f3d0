/**
 * Tests for DiagnosticResultCache
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { DocumentDiagnostics } from '@cadence/shared-types';
import { DiagnosticResultCache } from '../result-cache.js';

function snapshot(documentId: string, projectId: string, message = 'finding'): DocumentDiagnostics {
  return {
    documentId,
    documentPath: `/repo/${documentId}`,
    projectId,
    projectName: `${projectId}-project`,
    diagnostics: [{ id: 'R001', severity: 'warning', message }],
  };
}

describe('DiagnosticResultCache', () => {
  let cache: DiagnosticResultCache;

  beforeEach(() => {
    cache = new DiagnosticResultCache();
  });

  it('should overwrite the previous snapshot of a document', () => {
    cache.set(snapshot('a', 'p1', 'first'));
    cache.set(snapshot('a', 'p1', 'second'));

    expect(cache.size).toBe(1);
    expect(cache.get('a')?.diagnostics[0]?.message).toBe('second');
  });

  it('should report whether a delete removed anything', () => {
    cache.set(snapshot('a', 'p1'));

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    expect(cache.has('a')).toBe(false);
  });

  it('should omit ids without a snapshot from getMany', () => {
    cache.set(snapshot('a', 'p1'));
    cache.set(snapshot('c', 'p1'));

    const ids = cache.getMany(['c', 'b', 'a']).map((entry) => entry.documentId);
    expect(ids).toEqual(['c', 'a']);
  });

  it('should drop every snapshot of a project', () => {
    cache.set(snapshot('a', 'p1'));
    cache.set(snapshot('b', 'p2'));
    cache.set(snapshot('c', 'p1'));

    expect(cache.deleteProject('p1')).toEqual(['a', 'c']);
    expect(cache.values().map((entry) => entry.documentId)).toEqual(['b']);
  });

  it('should track hits, misses, writes and removals', () => {
    cache.set(snapshot('a', 'p1'));
    cache.set(snapshot('b', 'p1'));
    cache.get('a');
    cache.get('missing');
    cache.delete('a');
    cache.clear();

    expect(cache.getStats()).toEqual({ size: 0, hits: 1, misses: 1, writes: 2, removals: 2 });
  });
});
