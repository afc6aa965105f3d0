/**
 * Background Progress Reporter
 *
 * Turns batch counters into started / progress / finished reports. Only
 * batches enqueued as background work are reported; a batch keeps its class
 * even when some of its items are promoted, so every background batch gets
 * exactly one started and one finished report.
 */

import type { BackgroundDiagnosticStatus } from '@cadence/shared-types';
import type { DiagnosticEventForwarder } from './event-forwarder.js';
import type { BatchProgress, QueueItem } from './types.js';

/**
 * Report every percent, or every 10th document for batches under 1000
 */
export function progressInterval(documentCount: number): number {
  return Math.max(10, Math.floor(documentCount / 100));
}

export class BackgroundProgressReporter {
  constructor(private readonly forwarder: DiagnosticEventForwarder) {}

  /**
   * Called right after a worker takes an item
   */
  onTaken(item: QueueItem): void {
    for (const batch of item.batches) {
      if (batch.workType === 'background' && batch.dequeued === 1) {
        this.report('started', batch);
      }
    }
  }

  /**
   * Called with the batch progress returned by `workComplete`
   */
  onCompleted(batches: readonly BatchProgress[]): void {
    for (const batch of batches) {
      if (batch.workType !== 'background') continue;

      const done = batch.documentCount - batch.remaining;
      if (done % progressInterval(batch.documentCount) === 0 || batch.remaining === 0) {
        this.report('progress', batch);
      }
      if (batch.remaining === 0) {
        this.report('finished', batch);
      }
    }
  }

  private report(status: BackgroundDiagnosticStatus, batch: BatchProgress): void {
    this.forwarder.backgroundDiagnosticsStatus({
      status,
      numberProjects: batch.projectCount,
      numberFiles: batch.documentCount,
      numberFilesRemaining: batch.remaining,
    });
  }
}
