/**
 * Remote tracker orchestration
 *
 * Decodes inbound messages, feeds the liveness tracker and the incident
 * aggregator, and turns their output into notifications, persistence writes
 * and live updates.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import {
  Incident,
  LivenessStatus,
  RawEvent,
  RemoteTrackerConfig,
  SpeedTestEvent,
  SpeedTestResult
} from '../types';
import { Logger } from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { ErrorHandler, ErrorCategory, HealthSummary, MalformedMessageError } from '../error-handling';
import { decodeLivenessSignal, decodeOutageReport, decodeSpeedTestResult } from '../protocol/message-codec';
import { MonitoringScheduler, TaskErrorEvent } from '../monitoring/scheduler';
import { Notifier, NotificationKind } from '../alerts/ntfy-notifier';
import { IncidentSink } from '../storage/data-store';
import { LivenessTracker, LivenessModeChange, ReportOutcome, SignalOutcome } from './liveness-tracker';
import { AggregatorEffect, AggregatorEffectType, IncidentAggregator } from './incident-aggregator';

export const LIVENESS_CHECK_TASK = 'liveness-check';
export const MAINTENANCE_TASK = 'maintenance';

const MAINTENANCE_INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface RemoteTrackerDependencies {
  notifier: Notifier;
  store?: IncidentSink | null;
  errorHandler?: ErrorHandler;
  clock?: Clock;
  scheduler?: MonitoringScheduler;
  generateId?: () => string;
}

export interface RemoteStatus {
  liveness: LivenessStatus;
  in_grace: boolean;
  open_incidents: Incident[];
  last_speed_test: SpeedTestResult | null;
}

export type SpeedTestDisposition = 'accepted' | 'duplicate' | 'clock_skew';

export type RemoteUpdate =
  | { type: 'status'; data: RemoteStatus }
  | { type: 'incident'; change: AggregatorEffectType; data: Incident };

export class RemoteTracker extends EventEmitter {
  private logger = new Logger('RemoteTracker');
  private liveness: LivenessTracker;
  private aggregator: IncidentAggregator;
  private scheduler: MonitoringScheduler;
  private errorHandler: ErrorHandler;
  private clock: Clock;
  private generateId: () => string;
  private store: IncidentSink | null;
  private lastSpeedTest: SpeedTestResult | null = null;
  private isRunning = false;

  constructor(private config: RemoteTrackerConfig, private deps: RemoteTrackerDependencies) {
    super();
    this.clock = deps.clock ?? systemClock;
    this.generateId = deps.generateId ?? randomUUID;
    this.errorHandler = deps.errorHandler ?? new ErrorHandler();
    this.scheduler = deps.scheduler ?? new MonitoringScheduler();
    this.store = deps.store ?? null;
    this.liveness = new LivenessTracker(config, { clock: this.clock, generateId: this.generateId });
    this.aggregator = new IncidentAggregator({
      mergeWindowMinutes: config.merge_window_minutes,
      generateId: this.generateId
    });

    this.setupEventHandlers();
    this.registerTasks();
  }

  start(): void {
    if (this.isRunning) {
      this.logger.warn('RemoteTracker is already running');
      return;
    }

    this.isRunning = true;
    this.logger.info(
      `Starting remote tracker: heartbeat timeout ${this.config.heartbeat_timeout_seconds}s, ` +
      `startup grace ${this.config.startup_grace_seconds}s, merge window ${this.config.merge_window_minutes}min`
    );
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    this.scheduler.stop();
    this.logger.info('Remote tracker stopped');
  }

  /**
   * @throws MalformedMessageError when the payload is not a liveness signal
   */
  receiveHeartbeat(payload: unknown): SignalOutcome {
    const signal = this.decode(() => decodeLivenessSignal(payload));
    const now = this.clock.now();
    const outcome = this.liveness.receiveSignal(signal, now);

    if (outcome.disposition === 'clock_skew') {
      this.reportClockAnomaly('liveness signal', signal.sent_at, now);
    }

    this.process(outcome.events);
    this.publishStatus();
    return outcome;
  }

  /**
   * @throws MalformedMessageError when the payload is not an outage report
   */
  receiveOutageReport(payload: unknown): ReportOutcome {
    const report = this.decode(() => decodeOutageReport(payload));
    const now = this.clock.now();
    const outcome = this.liveness.receiveOutageReport(report, now);

    if (outcome.disposition === 'clock_skew') {
      this.reportClockAnomaly('outage report', report.ended_at, now);
    }
    this.logger.info(`Outage report (${report.duration_seconds}s from ${report.started_at.toISOString()}): ${outcome.disposition}`);

    this.process(outcome.events);
    return outcome;
  }

  /**
   * @throws MalformedMessageError when the payload is not a speed test result
   */
  receiveSpeedTestResult(payload: unknown): SpeedTestDisposition {
    const result = this.decode(() => decodeSpeedTestResult(payload));
    const now = this.clock.now();

    if ((result.timestamp.getTime() - now.getTime()) / 1000 > this.config.max_clock_skew_seconds) {
      this.reportClockAnomaly('speed test result', result.timestamp, now);
      return 'clock_skew';
    }
    if (this.lastSpeedTest && result.timestamp.getTime() <= this.lastSpeedTest.timestamp.getTime()) {
      return 'duplicate';
    }

    this.lastSpeedTest = result;
    this.logger.info(
      `Speed test (${result.trigger}): ${result.download_mbps} Mbps down, ` +
      `${result.upload_mbps ?? 'n/a'} Mbps up, ${result.passed ? 'passed' : 'FAILED'}`
    );

    const event: SpeedTestEvent = {
      id: this.generateId(),
      type: 'speed-test-result',
      timestamp: now,
      source: 'local',
      result
    };
    this.process([event]);
    return 'accepted';
  }

  /**
   * Periodic staleness check and incident finalisation
   */
  checkNow(): void {
    const now = this.clock.now();
    this.process(this.liveness.checkStaleness(now));
    this.handleEffects(this.aggregator.finalizeExpired(now));
  }

  getStatus(): RemoteStatus {
    const now = this.clock.now();
    return {
      liveness: this.liveness.getStatus(now),
      in_grace: this.liveness.isInGrace(now),
      open_incidents: this.aggregator.getOpenIncidents(),
      last_speed_test: this.lastSpeedTest
    };
  }

  /**
   * Open incidents followed by finalised ones from the store, newest first
   */
  async getRecentIncidents(limit: number = 50): Promise<Incident[]> {
    const open = this.aggregator.getOpenIncidents();
    const stored = this.store
      ? await this.errorHandler.executeWithRetry(() => this.getStoredIncidents(limit), {
        category: ErrorCategory.PERSISTENCE,
        component: 'DataStore',
        description: 'Load recent incidents'
      })
      : null;

    return [...open, ...(stored ?? [])]
      .sort((a, b) => b.started_at.getTime() - a.started_at.getTime())
      .slice(0, limit);
  }

  getSchedulerStatus(): ReturnType<MonitoringScheduler['getStatus']> {
    return this.scheduler.getStatus();
  }

  getHealth(): HealthSummary {
    return this.errorHandler.getHealthSummary();
  }

  /**
   * Record a request body that could not be parsed at all
   */
  recordMalformedPayload(path: string, reason: string): void {
    this.errorHandler.handleError(new MalformedMessageError(path, [reason]));
  }

  /**
   * Daily: drop history past retention and recovered errors older than a day
   */
  async runMaintenance(): Promise<void> {
    if (this.store) {
      await this.store.cleanupOldData(this.clock.now());
    }
    this.errorHandler.clearOldErrors();
  }

  private getStoredIncidents(limit: number): Promise<Incident[]> {
    if (!this.store) {
      return Promise.resolve([]);
    }
    return this.store.getRecentIncidents(limit);
  }

  private registerTasks(): void {
    this.scheduler.addTask({
      id: LIVENESS_CHECK_TASK,
      interval: this.config.check_interval_seconds * 1000,
      run: async () => this.checkNow()
    });

    this.scheduler.addTask({
      id: MAINTENANCE_TASK,
      interval: MAINTENANCE_INTERVAL_MS,
      timeout: 60000,
      runImmediately: true,
      run: () => this.runMaintenance()
    });
  }

  private setupEventHandlers(): void {
    this.liveness.on('modeChange', (change: LivenessModeChange) => {
      this.logger.info(`Liveness mode changed: ${change.previous_mode} -> ${change.new_mode}`);
      this.emit('modeChange', change);
    });

    this.scheduler.on('task:error', (event: TaskErrorEvent) => {
      this.errorHandler.handleError(event.error, {
        component: 'RemoteTracker',
        category: ErrorCategory.TEMPORARY_FAILURE,
        details: { task: event.taskId }
      });
    });
  }

  private decode<T>(decoder: () => T): T {
    try {
      return decoder();
    } catch (error) {
      if (error instanceof MalformedMessageError) {
        this.errorHandler.handleError(error);
      }
      throw error;
    }
  }

  private process(events: RawEvent[]): void {
    for (const event of events) {
      this.persistRawEvent(event);
      this.handleEffects(this.aggregator.apply(event));
    }
  }

  private handleEffects(effects: AggregatorEffect[]): void {
    // An incident opened and resolved by the same event only warrants the restore notice
    const resolvedIds = new Set(
      effects.filter(effect => effect.type === 'incident-resolved').map(effect => effect.incident.id)
    );

    for (const effect of effects) {
      const incident = effect.incident;
      this.emitUpdate({ type: 'incident', change: effect.type, data: incident });

      switch (effect.type) {
        case 'incident-opened':
        case 'incident-reopened':
          if (!resolvedIds.has(incident.id)) {
            this.notify('DOWN', incident);
          }
          break;
        case 'incident-resolved':
          this.notify('RESTORED', incident);
          break;
        case 'incident-finalized':
          this.persistIncident(incident);
          break;
        case 'incident-updated':
          break;
      }
    }

    if (effects.length > 0) {
      this.publishStatus();
    }
  }

  private notify(kind: NotificationKind, incident: Incident): void {
    if (kind === 'DOWN' && this.liveness.isInGrace(this.clock.now())) {
      this.logger.info(`Suppressing DOWN notification for incident ${incident.id} during startup grace`);
      return;
    }

    const context = {
      incident_kind: incident.kind,
      cause: incident.cause,
      started_at: incident.started_at,
      downtime_seconds: incident.downtime_seconds,
      ...(incident.retest_result && { download_mbps: incident.retest_result.download_mbps })
    };

    void this.errorHandler.executeWithRetry(() => this.deps.notifier.notify(kind, context), {
      category: ErrorCategory.NOTIFICATION,
      component: 'Notifier',
      description: `${kind} notification for incident ${incident.id}`
    });
  }

  private persistRawEvent(event: RawEvent): void {
    const store = this.store;
    if (!store) {
      return;
    }
    void this.errorHandler.executeWithRetry(() => store.recordRawEvent(event), {
      category: ErrorCategory.PERSISTENCE,
      component: 'DataStore',
      description: `Store raw event ${event.id}`
    });
  }

  private persistIncident(incident: Incident): void {
    const store = this.store;
    if (!store) {
      return;
    }
    void this.errorHandler.executeWithRetry(() => store.recordIncident(incident), {
      category: ErrorCategory.PERSISTENCE,
      component: 'DataStore',
      description: `Store incident ${incident.id}`
    });
  }

  private reportClockAnomaly(messageType: string, sentAt: Date, receivedAt: Date): void {
    this.errorHandler.handleError(`Discarded ${messageType} timestamped ${sentAt.toISOString()} (received ${receivedAt.toISOString()})`, {
      component: 'RemoteTracker',
      category: ErrorCategory.CLOCK_ANOMALY
    });
  }

  private publishStatus(): void {
    this.emitUpdate({ type: 'status', data: this.getStatus() });
  }

  private emitUpdate(update: RemoteUpdate): void {
    this.emit('update', update);
  }
}
