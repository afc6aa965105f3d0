/**
 * Tests for cancellation utilities
 */

import { describe, it, expect, vi } from 'vitest';
import { DeadlineExceeded, linkSignals, raceWithSignal, withDeadline } from '../cancellation.js';

describe('linkSignals', () => {
  it('should abort when any source aborts, with its reason', () => {
    const first = new AbortController();
    const second = new AbortController();
    const linked = linkSignals(first.signal, undefined, second.signal);

    second.abort('second');

    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe('second');
  });

  it('should start aborted when a source already is', () => {
    const source = new AbortController();
    source.abort('early');

    expect(linkSignals(source.signal).signal.reason).toBe('early');
  });

  it('should stop following sources once disposed', () => {
    const source = new AbortController();
    const linked = linkSignals(source.signal);

    linked.dispose();
    source.abort();

    expect(linked.signal.aborted).toBe(false);
  });
});

describe('withDeadline', () => {
  it('should abort with DeadlineExceeded after the timeout', async () => {
    const deadline = withDeadline(10);

    await vi.waitFor(() => expect(deadline.signal.aborted).toBe(true));
    expect(deadline.signal.reason).toBeInstanceOf(DeadlineExceeded);
    expect(deadline.signal.reason).toMatchObject({ timeoutMs: 10 });
  });

  it('should follow its parent', () => {
    const parent = new AbortController();
    const deadline = withDeadline(10_000, parent.signal);

    parent.abort('parent');
    deadline.dispose();

    expect(deadline.signal.reason).toBe('parent');
  });
});

describe('raceWithSignal', () => {
  it('should settle with the work when it finishes first', async () => {
    const controller = new AbortController();
    await expect(raceWithSignal(Promise.resolve(42), controller.signal, vi.fn())).resolves.toBe(42);
  });

  it('should reject with the abort reason and report late failures of abandoned work', async () => {
    const controller = new AbortController();
    const onAbandonedError = vi.fn();
    let fail: (error: Error) => void = () => undefined;
    const work = new Promise<number>((_, reject) => {
      fail = reject;
    });

    const race = raceWithSignal(work, controller.signal, onAbandonedError);
    controller.abort('stop');
    await expect(race).rejects.toBe('stop');

    const late = new Error('late');
    fail(late);
    await vi.waitFor(() => expect(onAbandonedError).toHaveBeenCalledWith(late));
  });
});
