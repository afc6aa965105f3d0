/**
 * Tests for BackgroundProgressReporter
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { BackgroundDiagnosticStatusReport } from '@cadence/shared-types';
import { BackgroundProgressReporter, progressInterval } from '../progress-reporter.js';
import { DiagnosticEventForwarder } from '../event-forwarder.js';
import { AnalyzerWorkQueue } from '../work-queue.js';
import { captureLogs } from './fixtures/workspace.js';

describe('progressInterval', () => {
  it('should report at least every 10 documents', () => {
    expect(progressInterval(3)).toBe(10);
    expect(progressInterval(1000)).toBe(10);
  });

  it('should report every percent of large batches', () => {
    expect(progressInterval(2500)).toBe(25);
  });
});

describe('BackgroundProgressReporter', () => {
  let queue: AnalyzerWorkQueue;
  let reporter: BackgroundProgressReporter;
  let reports: BackgroundDiagnosticStatusReport[];

  beforeEach(() => {
    const { logger } = captureLogs();
    const forwarder = new DiagnosticEventForwarder(logger);
    reports = [];
    forwarder.on('backgroundStatus', (report) => reports.push(report));
    queue = new AnalyzerWorkQueue({ logger });
    reporter = new BackgroundProgressReporter(forwarder);
  });

  async function drain(): Promise<void> {
    while (queue.getStats().pendingForeground + queue.getStats().pendingBackground > 0) {
      const item = await queue.takeWork();
      if (!item) return;
      reporter.onTaken(item);
      reporter.onCompleted(queue.workComplete(item));
    }
  }

  it('should report started once and finished once for a small batch', async () => {
    queue.putWork(['a', 'b', 'c'], 'background', { projectCount: 1 });
    await drain();

    expect(reports).toEqual([
      { status: 'started', numberProjects: 1, numberFiles: 3, numberFilesRemaining: 3 },
      { status: 'progress', numberProjects: 1, numberFiles: 3, numberFilesRemaining: 0 },
      { status: 'finished', numberProjects: 1, numberFiles: 3, numberFilesRemaining: 0 },
    ]);
  });

  it('should report progress every 10 documents with remaining decreasing', async () => {
    const ids = Array.from({ length: 25 }, (_, index) => `doc-${index}`);
    queue.putWork(ids, 'background', { projectCount: 2 });
    await drain();

    expect(reports.map((report) => report.status)).toEqual(['started', 'progress', 'progress', 'progress', 'finished']);
    expect(reports.map((report) => report.numberFilesRemaining)).toEqual([25, 15, 5, 0, 0]);
  });

  it('should not report foreground batches', async () => {
    queue.putWork(['a', 'b'], 'foreground');
    await drain();

    expect(reports).toEqual([]);
  });

  it('should keep reporting a batch whose items were promoted', async () => {
    queue.putWork(['a', 'b'], 'background', { projectCount: 1 });
    queue.tryPromote('b');
    await drain();

    expect(reports.map((report) => report.status)).toEqual(['started', 'progress', 'finished']);
  });
});
