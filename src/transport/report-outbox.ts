/**
 * Latest-only pending slot per report type in front of the transport.
 * A newer report replaces the one waiting in its slot; at most one send per
 * type is in flight. Unsent reports wait for the next flush.
 */

import { EventEmitter } from 'events';
import { LivenessSignal, OutageReport, SpeedTestResult } from '../types';
import { Transport } from './http-transport';
import { Logger } from '../utils/logger';
import { errorMessage } from '../error-handling';

export type OutboxEntry =
  | { kind: 'liveness'; report: LivenessSignal }
  | { kind: 'outage'; report: OutageReport }
  | { kind: 'speed_test'; report: SpeedTestResult };

export type ReportKind = OutboxEntry['kind'];

const REPORT_KINDS: readonly ReportKind[] = ['liveness', 'outage', 'speed_test'];

export class ReportOutbox extends EventEmitter {
  private logger = new Logger('ReportOutbox');
  private pending = new Map<ReportKind, OutboxEntry>();
  private inFlight = new Set<ReportKind>();
  private stopped = false;

  constructor(private transport: Transport) {
    super();
  }

  /**
   * Queue a report, replacing any pending one of the same kind, and try to
   * send it immediately. Resolves true if it was delivered by this call.
   */
  offer(entry: OutboxEntry): Promise<boolean> {
    if (this.stopped) {
      return Promise.resolve(false);
    }
    if (this.pending.has(entry.kind)) {
      this.logger.debug(`Replacing pending ${entry.kind} report`);
    }
    this.pending.set(entry.kind, entry);
    return this.flushKind(entry.kind);
  }

  /**
   * Retry every pending slot that has no send in flight
   */
  async flush(): Promise<void> {
    await Promise.all(REPORT_KINDS.map(kind => this.flushKind(kind)));
  }

  hasPending(kind: ReportKind): boolean {
    return this.pending.has(kind);
  }

  getPending(kind: ReportKind): OutboxEntry | undefined {
    return this.pending.get(kind);
  }

  isInFlight(kind: ReportKind): boolean {
    return this.inFlight.has(kind);
  }

  /**
   * Drop pending reports; sends already in flight are abandoned
   */
  stop(): void {
    this.stopped = true;
    if (this.pending.size > 0) {
      this.logger.info(`Discarding ${this.pending.size} pending report(s) on shutdown`);
    }
    this.pending.clear();
  }

  private async flushKind(kind: ReportKind): Promise<boolean> {
    const entry = this.pending.get(kind);
    if (!entry || this.inFlight.has(kind) || this.stopped) {
      return false;
    }

    this.inFlight.add(kind);
    let delivered = false;
    try {
      delivered = await this.send(entry);
    } catch (error) {
      this.logger.warn(`Transport threw while sending ${kind} report: ${errorMessage(error)}`);
    } finally {
      this.inFlight.delete(kind);
    }

    if (delivered) {
      // A replacement offered while this send was in flight stays pending
      if (this.pending.get(kind) === entry) {
        this.pending.delete(kind);
      }
      this.emit('delivered', entry);
    } else if (!this.stopped) {
      this.logger.debug(`${kind} report kept for retry on next flush`);
    }
    return delivered;
  }

  private send(entry: OutboxEntry): Promise<boolean> {
    switch (entry.kind) {
      case 'liveness':
        return this.transport.sendLivenessSignal(entry.report);
      case 'outage':
        return this.transport.sendOutageReport(entry.report);
      case 'speed_test':
        return this.transport.sendSpeedTestResult(entry.report);
    }
  }
}
