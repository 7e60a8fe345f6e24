/**
 * Remote liveness state machine
 *
 * Decides from the heartbeat stream whether the local side is reachable.
 * Every mutating method is synchronous and returns the raw events it produced,
 * in order, for the incident aggregator.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import {
  IncidentCause,
  LivenessMode,
  LivenessRecord,
  LivenessSignal,
  LivenessStatus,
  OutageAmendedEvent,
  OutageDetectedEvent,
  OutageReport,
  OutageResolvedEvent,
  RawEvent,
  RemoteTrackerConfig
} from '../types';
import { Clock, systemClock, secondsBetween } from '../utils/clock';
import { Logger } from '../utils/logger';
import { classifyCause } from './cause-classifier';

export type LivenessTrackerConfig = Pick<
  RemoteTrackerConfig,
  'heartbeat_timeout_seconds' | 'startup_grace_seconds' | 'max_clock_skew_seconds'
>;

export interface LivenessTrackerOptions {
  clock?: Clock;
  generateId?: () => string;
}

export type SignalDisposition = 'accepted' | 'duplicate' | 'clock_skew';

export interface SignalOutcome {
  disposition: SignalDisposition;
  events: RawEvent[];
}

export type ReportDisposition = 'amended' | 'held' | 'standalone' | 'duplicate' | 'clock_skew';

export interface ReportOutcome {
  disposition: ReportDisposition;
  events: RawEvent[];
}

export interface LivenessModeChange {
  previous_mode: LivenessMode;
  new_mode: LivenessMode;
  timestamp: Date;
}

/**
 * The most recently closed remote-observed outage
 */
interface ClosedOutageWindow {
  resolved_event_id: string;
  started_at: Date;
  ended_at: Date;
  cause: IncidentCause;
  reports: OutageReport[];
}

const MAX_REMEMBERED_REPORTS = 100;

function reportKey(report: OutageReport): string {
  return `${report.started_at.getTime()}:${report.ended_at.getTime()}:${report.outage_boot_id}`;
}

export class LivenessTracker extends EventEmitter {
  private logger = new Logger('LivenessTracker');
  private clock: Clock;
  private generateId: () => string;
  private readonly startedAt: Date;
  private record: LivenessRecord;
  private lastClosedOutage: ClosedOutageWindow | null = null;
  private heldReports: OutageReport[] = [];
  private seenReports: string[] = [];

  constructor(private config: LivenessTrackerConfig, options: LivenessTrackerOptions = {}) {
    super();
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? randomUUID;
    this.startedAt = this.clock.now();
    this.record = {
      last_sent_at: null,
      last_boot_id: null,
      last_received_at: null,
      mode: 'STARTUP_GRACE',
      outage_started_at: null,
      boot_id_before_outage: null,
      grace_expires_at: new Date(this.startedAt.getTime() + config.startup_grace_seconds * 1000)
    };
  }

  /**
   * Apply an inbound liveness signal. Signals not newer than the last one
   * recorded leave the record untouched. `sent_at` orders signals only.
   */
  receiveSignal(signal: LivenessSignal, now: Date = this.clock.now()): SignalOutcome {
    const skewSeconds = secondsBetween(now, signal.sent_at);
    if (skewSeconds > this.config.max_clock_skew_seconds) {
      this.logger.warn(`Discarding liveness signal sent ${skewSeconds.toFixed(0)}s in the future (boot ${signal.boot_id})`);
      return { disposition: 'clock_skew', events: [] };
    }

    if (this.record.last_sent_at && signal.sent_at.getTime() <= this.record.last_sent_at.getTime()) {
      this.logger.debug(`Ignoring liveness signal not newer than ${this.record.last_sent_at.toISOString()}`);
      return { disposition: 'duplicate', events: [] };
    }

    const events: RawEvent[] = [];
    this.leaveGraceIfExpired(now);

    if (this.record.mode === 'OUTAGE') {
      events.push(...this.resolveOutage(signal.boot_id, now));
    }

    if (this.record.last_boot_id && this.record.last_boot_id !== signal.boot_id) {
      this.logger.info(`Local host boot identifier changed: ${this.record.last_boot_id} -> ${signal.boot_id}`);
    }

    this.record.last_sent_at = signal.sent_at;
    this.record.last_boot_id = signal.boot_id;
    this.record.last_received_at = now;

    return { disposition: 'accepted', events };
  }

  /**
   * Periodic timeout check against the receive time of the last signal, so
   * only the remote clock is involved. Outage start is the staleness
   * reference plus the timeout, independent of how late the check runs.
   */
  checkStaleness(now: Date = this.clock.now()): RawEvent[] {
    if (!this.leaveGraceIfExpired(now) || this.record.mode === 'OUTAGE') {
      return [];
    }

    const reference = this.record.last_received_at ?? this.startedAt;
    const timeoutMs = this.config.heartbeat_timeout_seconds * 1000;
    if (now.getTime() - reference.getTime() <= timeoutMs) {
      return [];
    }

    const outageStart = new Date(reference.getTime() + timeoutMs);
    this.record.outage_started_at = outageStart;
    this.record.boot_id_before_outage = this.record.last_boot_id;
    this.setMode('OUTAGE', now);

    this.logger.warn(`Heartbeat timeout: no signal since ${reference.toISOString()}, outage started at ${outageStart.toISOString()}`);

    const event: OutageDetectedEvent = {
      id: this.generateId(),
      type: 'outage-detected',
      timestamp: now,
      source: 'remote',
      started_at: outageStart
    };
    return [event];
  }

  /**
   * Merge a local outage report into the remote-observed outage it overlaps,
   * or record it as a local-only outage
   */
  receiveOutageReport(report: OutageReport, now: Date = this.clock.now()): ReportOutcome {
    const skewSeconds = secondsBetween(now, report.ended_at);
    if (skewSeconds > this.config.max_clock_skew_seconds || report.ended_at.getTime() < report.started_at.getTime()) {
      this.logger.warn(`Discarding outage report with inconsistent timestamps (${report.started_at.toISOString()} - ${report.ended_at.toISOString()})`);
      return { disposition: 'clock_skew', events: [] };
    }

    const key = reportKey(report);
    if (this.seenReports.includes(key)) {
      this.logger.debug(`Ignoring duplicate outage report ${key}`);
      return { disposition: 'duplicate', events: [] };
    }
    this.rememberReport(key);

    const toleranceMs = this.config.heartbeat_timeout_seconds * 1000;

    if (this.record.mode === 'OUTAGE' && this.record.outage_started_at
      && report.ended_at.getTime() >= this.record.outage_started_at.getTime() - toleranceMs) {
      this.logger.info('Outage report arrived while outage is still open, holding until it resolves');
      this.heldReports.push(report);
      return { disposition: 'held', events: [] };
    }

    const window = this.lastClosedOutage;
    if (window && this.overlaps(report, window.started_at, window.ended_at, toleranceMs)) {
      window.reports.push(report);
      return { disposition: 'amended', events: [this.amendmentFor(window, now)] };
    }

    const event: OutageResolvedEvent = {
      id: this.generateId(),
      type: 'outage-resolved',
      timestamp: now,
      source: 'local',
      started_at: report.started_at,
      ended_at: report.ended_at,
      downtime_seconds: report.duration_seconds,
      cause: report.outage_boot_id === report.report_boot_id ? 'ISP_ISSUE' : 'POWER_CUT',
      affected_targets: [...report.affected_targets]
    };
    this.logger.info(`Local-only outage of ${report.duration_seconds}s reported (${report.started_at.toISOString()})`);
    return { disposition: 'standalone', events: [event] };
  }

  isInGrace(now: Date = this.clock.now()): boolean {
    return now.getTime() < this.record.grace_expires_at.getTime();
  }

  getMode(): LivenessMode {
    return this.record.mode;
  }

  /**
   * Read-only view; never changes the record
   */
  getStatus(now: Date = this.clock.now()): LivenessStatus {
    const lastReceived = this.record.last_received_at;
    const outageStart = this.record.outage_started_at;

    return {
      mode: this.record.mode,
      is_online: this.record.mode !== 'OUTAGE',
      last_heartbeat_time: lastReceived,
      last_heartbeat_age_seconds: lastReceived ? Math.max(0, secondsBetween(lastReceived, now)) : null,
      last_boot_id: this.record.last_boot_id,
      outage_start_time: outageStart,
      current_outage_duration_seconds: outageStart ? Math.max(0, secondsBetween(outageStart, now)) : null,
      grace_expires_at: this.record.grace_expires_at
    };
  }

  getRecord(): LivenessRecord {
    return { ...this.record };
  }

  private resolveOutage(bootIdAfter: string, now: Date): RawEvent[] {
    const startedAt = this.record.outage_started_at ?? now;
    const downtime = Math.max(0, secondsBetween(startedAt, now));
    const cause = classifyCause(this.record.boot_id_before_outage, bootIdAfter);

    const resolved: OutageResolvedEvent = {
      id: this.generateId(),
      type: 'outage-resolved',
      timestamp: now,
      source: 'remote',
      started_at: startedAt,
      ended_at: now,
      downtime_seconds: downtime,
      cause,
      affected_targets: []
    };

    this.logger.info(`Heartbeat resumed after ${downtime.toFixed(0)}s outage, cause ${cause}`);

    this.record.outage_started_at = null;
    this.record.boot_id_before_outage = null;
    this.setMode('ONLINE', now);

    const window: ClosedOutageWindow = {
      resolved_event_id: resolved.id,
      started_at: startedAt,
      ended_at: now,
      cause,
      reports: []
    };
    this.lastClosedOutage = window;

    const events: RawEvent[] = [resolved];
    const held = this.heldReports;
    this.heldReports = [];
    if (held.length > 0) {
      window.reports.push(...held);
      events.push(this.amendmentFor(window, now));
    }
    return events;
  }

  /**
   * Amendment carrying the summed local-side figures of every report matched
   * to the window so far
   */
  private amendmentFor(window: ClosedOutageWindow, now: Date): OutageAmendedEvent {
    const downtime = window.reports.reduce((sum, report) => sum + report.duration_seconds, 0);
    const targets = new Set<string>();
    window.reports.forEach(report => report.affected_targets.forEach(target => targets.add(target)));

    const rebooted = window.reports.some(report => report.outage_boot_id !== report.report_boot_id);
    const cause: IncidentCause = rebooted ? 'POWER_CUT' : window.cause !== 'UNKNOWN' ? window.cause : 'ISP_ISSUE';

    this.logger.info(`Outage report matched outage resolved at ${window.ended_at.toISOString()}: local downtime ${downtime}s`);

    return {
      id: this.generateId(),
      type: 'outage-amended',
      timestamp: now,
      source: 'local',
      amends_event_id: window.resolved_event_id,
      downtime_seconds: downtime,
      cause,
      affected_targets: Array.from(targets).sort()
    };
  }

  private overlaps(report: OutageReport, start: Date, end: Date, toleranceMs: number): boolean {
    return report.started_at.getTime() <= end.getTime() + toleranceMs
      && report.ended_at.getTime() >= start.getTime() - toleranceMs;
  }

  /**
   * Leaves STARTUP_GRACE once it has expired. Returns false while still in grace.
   */
  private leaveGraceIfExpired(now: Date): boolean {
    if (this.record.mode !== 'STARTUP_GRACE') {
      return true;
    }
    if (this.isInGrace(now)) {
      return false;
    }
    this.logger.info('Startup grace period expired, evaluating heartbeats normally');
    this.setMode('ONLINE', now);
    return true;
  }

  private rememberReport(key: string): void {
    this.seenReports.push(key);
    if (this.seenReports.length > MAX_REMEMBERED_REPORTS) {
      this.seenReports.shift();
    }
  }

  private setMode(mode: LivenessMode, now: Date): void {
    const previous = this.record.mode;
    if (previous === mode) {
      return;
    }
    this.record.mode = mode;
    const change: LivenessModeChange = { previous_mode: previous, new_mode: mode, timestamp: now };
    this.emit('modeChange', change);
  }
}
