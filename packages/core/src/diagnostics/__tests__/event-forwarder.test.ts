/**
 * Tests for DiagnosticEventForwarder
 */

import { describe, it, expect, vi } from 'vitest';
import { DiagnosticEventForwarder } from '../event-forwarder.js';
import { captureLogs } from './fixtures/workspace.js';

const message = { filePath: '/repo/p1/a.txt', diagnostics: [] };

describe('DiagnosticEventForwarder', () => {
  it('should keep delivering after a subscriber throws', () => {
    const { logger, entries } = captureLogs();
    const forwarder = new DiagnosticEventForwarder(logger);
    const after = vi.fn();

    forwarder.on('diagnostics', () => {
      throw new Error('subscriber bug');
    });
    forwarder.on('diagnostics', after);

    expect(() => forwarder.forward(message)).not.toThrow();
    expect(after).toHaveBeenCalledWith(message);
    expect(entries.filter((entry) => entry.level === 'error').map((entry) => entry.error?.message)).toEqual([
      'subscriber bug',
    ]);
  });

  it('should call once listeners a single time', () => {
    const forwarder = new DiagnosticEventForwarder(captureLogs().logger);
    const listener = vi.fn();

    forwarder.once('diagnostics', listener);
    forwarder.forward(message);
    forwarder.forward(message);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should stop delivering after off', () => {
    const forwarder = new DiagnosticEventForwarder(captureLogs().logger);
    const listener = vi.fn();

    forwarder.on('backgroundStatus', listener);
    forwarder.off('backgroundStatus', listener);
    forwarder.backgroundDiagnosticsStatus({ status: 'started', numberProjects: 1, numberFiles: 1, numberFilesRemaining: 1 });

    expect(listener).not.toHaveBeenCalled();
  });
});
