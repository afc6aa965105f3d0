/**
 * Cancellation Utilities
 *
 * AbortSignal plumbing shared by the queue, the workers and the query APIs.
 */

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detach from the source signals and clear any timer */
  dispose(): void;
}

/**
 * Abort reason used when a deadline passes
 */
export class DeadlineExceeded extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceeded';
  }
}

/**
 * Combine signals with a logical OR: the result aborts as soon as any source does
 */
export function linkSignals(...sources: Array<AbortSignal | undefined>): LinkedSignal {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];

  for (const source of sources) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = (): void => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    detachers.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const detach of detachers) detach();
      detachers.length = 0;
    },
  };
}

/**
 * Signal that aborts with `DeadlineExceeded` after `timeoutMs`, optionally linked to a parent
 */
export function withDeadline(timeoutMs: number, parent?: AbortSignal): LinkedSignal {
  const deadline = new AbortController();
  const timer = setTimeout(() => deadline.abort(new DeadlineExceeded(timeoutMs)), timeoutMs);
  const linked = linkSignals(parent, deadline.signal);

  return {
    signal: linked.signal,
    dispose: () => {
      clearTimeout(timer);
      linked.dispose();
    },
  };
}

/**
 * Settle with `work`, or reject with the signal's reason once it aborts.
 *
 * The work promise is abandoned, not stopped; callers pass the same signal
 * into the work so cooperative code can stop early. A late rejection of
 * abandoned work goes to `onAbandonedError`.
 */
export function raceWithSignal<T>(
  work: Promise<T>,
  signal: AbortSignal,
  onAbandonedError: (error: unknown) => void
): Promise<T> {
  const abandon = (): void => {
    void work.then(undefined, onAbandonedError);
  };

  if (signal.aborted) {
    abandon();
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      abandon();
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
