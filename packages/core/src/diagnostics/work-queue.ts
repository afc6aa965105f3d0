/**
 * Analyzer Work Queue
 *
 * Two-class queue of "analyze this document" items shared by every worker.
 *
 * - At most one pending item per document; re-enqueueing merges into it.
 * - Pending foreground items are always handed out before background ones,
 *   FIFO within a class.
 * - A document that is being analyzed is never handed to a second worker;
 *   new work for it waits until the running item is acknowledged, and the
 *   running item's signal is aborted because its result is already stale.
 */

import type { AnalyzerWorkType, DocumentId } from '@cadence/shared-types';
import { getLogger, type Logger } from '../utils/logger.js';
import { AnalysisCancelledError } from '../utils/errors.js';
import type { BatchProgress, PutWorkOptions, QueueItem, WorkQueueStats } from './types.js';

const COMPONENT = 'AnalyzerWorkQueue';

interface WorkBatch {
  readonly id: number;
  readonly workType: AnalyzerWorkType;
  readonly documentCount: number;
  readonly projectCount: number;
  dequeued: number;
  remaining: number;
}

function captureBatch(batch: WorkBatch): BatchProgress {
  return {
    batchId: batch.id,
    workType: batch.workType,
    documentCount: batch.documentCount,
    projectCount: batch.projectCount,
    dequeued: batch.dequeued,
    remaining: batch.remaining,
  };
}

class WorkItem implements QueueItem {
  workType: AnalyzerWorkType;
  batches: readonly BatchProgress[] = [];
  readonly batchRefs: WorkBatch[];
  private controller = new AbortController();
  private detachCaller: (() => void) | null = null;

  constructor(
    readonly documentId: DocumentId,
    workType: AnalyzerWorkType,
    batch: WorkBatch,
    callerSignal: AbortSignal | undefined
  ) {
    this.workType = workType;
    this.batchRefs = [batch];
    this.attachCaller(callerSignal);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Replace the cancellation source while the item is still pending;
   * the latest enqueue decides which caller owns it.
   */
  resetSignal(callerSignal: AbortSignal | undefined): void {
    this.release();
    this.controller = new AbortController();
    this.attachCaller(callerSignal);
  }

  abort(reason: unknown): void {
    this.controller.abort(reason);
  }

  release(): void {
    this.detachCaller?.();
    this.detachCaller = null;
  }

  private attachCaller(callerSignal: AbortSignal | undefined): void {
    if (!callerSignal) return;
    const controller = this.controller;
    if (callerSignal.aborted) {
      controller.abort(callerSignal.reason);
      return;
    }
    const onAbort = (): void => controller.abort(callerSignal.reason);
    callerSignal.addEventListener('abort', onAbort, { once: true });
    this.detachCaller = () => callerSignal.removeEventListener('abort', onAbort);
  }
}

export interface AnalyzerWorkQueueOptions {
  logger?: Logger;
}

export class AnalyzerWorkQueue {
  private readonly logger: Logger;
  private readonly foreground = new Map<DocumentId, WorkItem>();
  private readonly background = new Map<DocumentId, WorkItem>();
  private readonly inFlight = new Map<DocumentId, WorkItem>();
  private readonly takers: Array<(item: QueueItem | null) => void> = [];
  private readonly foregroundWaiters = new Set<() => void>();
  private batchSequence = 0;
  private closed = false;
  private counters = { enqueued: 0, superseded: 0, promoted: 0, completed: 0 };

  constructor(options: AnalyzerWorkQueueOptions = {}) {
    this.logger = options.logger ?? getLogger('work-queue');
  }

  /**
   * Enqueue one item per distinct document as a single batch. Never blocks.
   */
  putWork(documentIds: readonly DocumentId[], workType: AnalyzerWorkType, options: PutWorkOptions = {}): void {
    if (this.closed) {
      this.logger.debug('Ignoring work queued after close', { count: documentIds.length, workType });
      return;
    }

    const unique = [...new Set(documentIds)];
    if (unique.length === 0) {
      return;
    }

    const batch: WorkBatch = {
      id: ++this.batchSequence,
      workType,
      documentCount: unique.length,
      projectCount: options.projectCount ?? 0,
      dequeued: 0,
      remaining: unique.length,
    };

    for (const documentId of unique) {
      this.inFlight.get(documentId)?.abort(
        new AnalysisCancelledError(`Analysis of ${documentId} superseded by newer work`, {
          component: COMPONENT,
          operation: 'putWork',
          documentId,
        })
      );

      const existing = this.foreground.get(documentId) ?? this.background.get(documentId);
      if (existing) {
        existing.batchRefs.push(batch);
        existing.resetSignal(options.signal);
        if (workType === 'foreground') {
          this.moveToForeground(existing);
        }
        this.counters.superseded++;
        continue;
      }

      const item = new WorkItem(documentId, workType, batch, options.signal);
      this.lane(workType).set(documentId, item);
      this.counters.enqueued++;
    }

    this.logger.debug('Queued documents for analysis', {
      batchId: batch.id,
      workType,
      documentCount: batch.documentCount,
    });

    this.dispatch();
  }

  /**
   * Upgrade a pending background item to foreground. Returns false when
   * there is nothing to promote.
   */
  tryPromote(documentId: DocumentId): boolean {
    const item = this.background.get(documentId);
    if (!item) {
      return false;
    }
    this.moveToForeground(item);
    this.counters.promoted++;
    return true;
  }

  /**
   * Next item to analyze. Suspends while nothing is eligible; resolves
   * `null` once the queue is closed.
   */
  takeWork(): Promise<QueueItem | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    const next = this.nextEligible();
    if (next) {
      return Promise.resolve(this.begin(next));
    }

    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  /**
   * Acknowledge a taken item, whatever the outcome of its analysis.
   * Returns the progress of every batch it counted towards.
   */
  workComplete(item: QueueItem): BatchProgress[] {
    const active = this.inFlight.get(item.documentId);
    if (!active || active !== item) {
      this.logger.warn('Ignoring acknowledgement of an item that is not in flight', {
        documentId: item.documentId,
      });
      return [];
    }

    this.inFlight.delete(active.documentId);
    active.release();
    this.counters.completed++;

    const progress = active.batchRefs.map((batch) => {
      batch.remaining--;
      return captureBatch(batch);
    });

    this.dispatch();
    this.notifyForegroundWaiters();

    return progress;
  }

  /**
   * Resolve once no foreground item is pending or running, when `signal`
   * aborts, or when the queue closes. Never rejects.
   */
  waitForegroundWorkComplete(signal?: AbortSignal): Promise<void> {
    if (this.closed || signal?.aborted || !this.hasForegroundWork()) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const finish = (): void => {
        this.foregroundWaiters.delete(finish);
        signal?.removeEventListener('abort', finish);
        resolve();
      };
      this.foregroundWaiters.add(finish);
      signal?.addEventListener('abort', finish, { once: true });
    });
  }

  /**
   * Stop handing out work: waiting workers receive `null`, pending items
   * are dropped, running items may still be acknowledged.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const dropped = this.foreground.size + this.background.size;
    for (const item of [...this.foreground.values(), ...this.background.values()]) {
      item.release();
    }
    this.foreground.clear();
    this.background.clear();

    for (const taker of this.takers.splice(0)) {
      taker(null);
    }
    for (const waiter of [...this.foregroundWaiters]) {
      waiter();
    }

    this.logger.debug('Work queue closed', { dropped, inFlight: this.inFlight.size });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  isPending(documentId: DocumentId): boolean {
    return this.foreground.has(documentId) || this.background.has(documentId);
  }

  isInFlight(documentId: DocumentId): boolean {
    return this.inFlight.has(documentId);
  }

  /**
   * Class of the pending item for a document, if any
   */
  pendingWorkType(documentId: DocumentId): AnalyzerWorkType | undefined {
    if (this.foreground.has(documentId)) return 'foreground';
    if (this.background.has(documentId)) return 'background';
    return undefined;
  }

  getStats(): WorkQueueStats {
    return {
      pendingForeground: this.foreground.size,
      pendingBackground: this.background.size,
      inFlight: this.inFlight.size,
      waitingWorkers: this.takers.length,
      ...this.counters,
    };
  }

  private lane(workType: AnalyzerWorkType): Map<DocumentId, WorkItem> {
    return workType === 'foreground' ? this.foreground : this.background;
  }

  private moveToForeground(item: WorkItem): void {
    if (item.workType === 'foreground') return;
    this.background.delete(item.documentId);
    item.workType = 'foreground';
    this.foreground.set(item.documentId, item);
  }

  private nextEligible(): WorkItem | undefined {
    for (const lane of [this.foreground, this.background]) {
      for (const item of lane.values()) {
        if (!this.inFlight.has(item.documentId)) {
          return item;
        }
      }
    }
    return undefined;
  }

  private begin(item: WorkItem): QueueItem {
    this.lane(item.workType).delete(item.documentId);
    this.inFlight.set(item.documentId, item);
    item.batches = item.batchRefs.map((batch) => {
      batch.dequeued++;
      return captureBatch(batch);
    });
    return item;
  }

  private dispatch(): void {
    while (this.takers.length > 0) {
      const next = this.nextEligible();
      if (!next) return;
      const taker = this.takers.shift();
      taker?.(this.begin(next));
    }
  }

  private hasForegroundWork(): boolean {
    if (this.foreground.size > 0) return true;
    for (const item of this.inFlight.values()) {
      if (item.workType === 'foreground') return true;
    }
    return false;
  }

  private notifyForegroundWaiters(): void {
    if (this.foregroundWaiters.size === 0 || this.hasForegroundWork()) {
      return;
    }
    for (const waiter of [...this.foregroundWaiters]) {
      waiter();
    }
  }
}
