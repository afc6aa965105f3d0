/**
 * Diagnostic Event Forwarder
 *
 * Outbound side of the scheduler: per-document diagnostics after every
 * cache update, and background sweep status. Transports subscribe here.
 * A throwing subscriber is logged and never reaches the worker that emitted.
 */

import { EventEmitter } from 'node:events';
import type { BackgroundDiagnosticStatusReport, DiagnosticMessage } from '@cadence/shared-types';
import { getLogger, type Logger } from '../utils/logger.js';

export interface DiagnosticEvents {
  diagnostics: [message: DiagnosticMessage];
  backgroundStatus: [report: BackgroundDiagnosticStatusReport];
}

type EventName = keyof DiagnosticEvents;

export class DiagnosticEventForwarder {
  private readonly emitter = new EventEmitter();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger('event-forwarder');
  }

  on<K extends EventName>(event: K, listener: (...args: DiagnosticEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends EventName>(event: K, listener: (...args: DiagnosticEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  once<K extends EventName>(event: K, listener: (...args: DiagnosticEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  forward(message: DiagnosticMessage): void {
    this.emit('diagnostics', message);
  }

  backgroundDiagnosticsStatus(report: BackgroundDiagnosticStatusReport): void {
    this.emit('backgroundStatus', report);
  }

  private emit<K extends EventName>(event: K, ...args: DiagnosticEvents[K]): void {
    for (const listener of this.emitter.rawListeners(event)) {
      try {
        listener(...args);
      } catch (error) {
        this.logger.error(`Subscriber of '${event}' threw`, error);
      }
    }
  }
}
