/**
 * Local monitor orchestration
 *
 * Drives the probe, heartbeat and speed-test tasks, feeds probe cycles into the
 * ConnectivityMonitor and turns its transitions into event-log entries,
 * outbound reports and speed-test requests.
 */

import { EventEmitter } from 'events';
import { LocalMonitorConfig, ProbeResult, ProbeTarget, SpeedTestResult, SpeedTestTrigger, OutageReport, LivenessSignal } from '../types';
import { Logger } from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { HostIdentity } from '../utils/host-identity';
import { withTimeout } from '../utils/timeout';
import { formatDuration } from '../utils/format';
import { ErrorHandler, ErrorCategory, HealthSummary, errorMessage } from '../error-handling';
import { ConnectivityMonitor, ConnectivitySnapshot, DegradedEvent, OutageStartEvent } from './connectivity-monitor';
import { resolveOnlinePolicy } from './connectivity-policy';
import { MonitoringScheduler, TaskErrorEvent } from './scheduler';
import { Prober } from './ping-prober';
import { Transport } from '../transport/http-transport';
import { ReportOutbox, ReportKind } from '../transport/report-outbox';
import { SpeedTestRunner } from '../speedtest/speed-test-runner';
import { EventLog, LocalEventType } from '../storage/event-log';

export const PROBE_TASK = 'probe-cycle';
export const HEARTBEAT_TASK = 'heartbeat';
export const SPEED_TEST_TASK = 'speed-test';
export const MAINTENANCE_TASK = 'maintenance';

const MAINTENANCE_INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface LocalMonitorDependencies {
  prober: Prober;
  transport: Transport;
  speedTestRunner: SpeedTestRunner;
  identity: HostIdentity;
  eventLog?: Pick<EventLog, 'log'>;
  errorHandler?: ErrorHandler;
  clock?: Clock;
  scheduler?: MonitoringScheduler;
}

export interface LocalMonitorStatus {
  connectivity: ConnectivitySnapshot;
  slow_speed_mode: boolean;
  speed_test_running: boolean;
  last_speed_test: SpeedTestResult | null;
  pending_reports: ReportKind[];
  boot_id: string;
}

export class LocalMonitor extends EventEmitter {
  private logger = new Logger('LocalMonitor');
  private connectivity: ConnectivityMonitor;
  private outbox: ReportOutbox;
  private scheduler: MonitoringScheduler;
  private errorHandler: ErrorHandler;
  private clock: Clock;
  private slowSpeedMode = false;
  private lastSpeedTest: SpeedTestResult | null = null;
  private runningSpeedTest: Promise<SpeedTestResult | null> | null = null;
  private isRunning = false;

  constructor(private config: LocalMonitorConfig, private deps: LocalMonitorDependencies) {
    super();
    this.clock = deps.clock ?? systemClock;
    this.errorHandler = deps.errorHandler ?? new ErrorHandler();
    this.scheduler = deps.scheduler ?? new MonitoringScheduler();
    this.outbox = new ReportOutbox(deps.transport);
    this.connectivity = new ConnectivityMonitor({
      latency: config.latency,
      identity: deps.identity,
      onlinePolicy: resolveOnlinePolicy(config.online_policy)
    });

    this.setupEventHandlers();
    this.registerTasks();
  }

  start(): void {
    if (this.isRunning) {
      this.logger.warn('LocalMonitor is already running');
      return;
    }

    this.isRunning = true;
    const targets = this.enabledTargets().map(target => `${target.name} (${target.address})`).join(', ');
    this.logger.info(`Starting local monitor: targets ${targets}, reporting to ${this.config.remote_url}`);
    this.recordEvent('monitor_start', {
      boot_id: this.deps.identity.bootId(),
      targets: this.enabledTargets().map(target => target.address)
    });
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    this.scheduler.stop();
    this.outbox.stop();
    this.logger.info('Local monitor stopped');
    await this.deps.eventLog?.log('monitor_stop', {}, this.clock.now());
  }

  /**
   * Probe every enabled target concurrently and apply the cycle
   */
  async runProbeCycle(): Promise<void> {
    const startedAt = this.clock.now();
    const monotonicMs = this.clock.monotonic();
    const results = await Promise.all(this.enabledTargets().map(target => this.probeTarget(target)));

    const outcome = this.connectivity.processCycle({ started_at: startedAt, monotonic_ms: monotonicMs, results });
    this.logger.debug(
      `Probe cycle: ${results.filter(result => result.success).length}/${results.length} reachable, ` +
      `latency ${outcome.latency_ms ?? 'n/a'}ms, mode ${outcome.mode}`
    );
    this.emit('cycle', outcome);
  }

  /**
   * Send a liveness signal and retry any pending reports
   */
  async sendHeartbeat(): Promise<void> {
    const signal: LivenessSignal = {
      sent_at: this.clock.now(),
      boot_id: this.deps.identity.bootId(),
      uptime_seconds: this.deps.identity.uptimeSeconds(),
      source: 'local-monitor'
    };

    await Promise.all([
      this.outbox.offer({ kind: 'liveness', report: signal }),
      this.outbox.flush()
    ]);
  }

  /**
   * Run a speed test unless one is already running, in which case the
   * running test's result is returned
   */
  runSpeedTest(trigger: SpeedTestTrigger): Promise<SpeedTestResult | null> {
    if (this.runningSpeedTest) {
      this.logger.info(`Speed test already running, ignoring ${trigger} request`);
      return this.runningSpeedTest;
    }

    const run = this.executeSpeedTest(trigger).finally(() => {
      this.runningSpeedTest = null;
    });
    this.runningSpeedTest = run;
    return run;
  }

  getStatus(): LocalMonitorStatus {
    const pendingKinds: ReportKind[] = ['liveness', 'outage', 'speed_test'];
    return {
      connectivity: this.connectivity.getSnapshot(),
      slow_speed_mode: this.slowSpeedMode,
      speed_test_running: this.runningSpeedTest !== null,
      last_speed_test: this.lastSpeedTest,
      pending_reports: pendingKinds.filter(kind => this.outbox.hasPending(kind)),
      boot_id: this.deps.identity.bootId()
    };
  }

  isSlowSpeedMode(): boolean {
    return this.slowSpeedMode;
  }

  getSchedulerStatus(): ReturnType<MonitoringScheduler['getStatus']> {
    return this.scheduler.getStatus();
  }

  getHealth(): HealthSummary {
    return this.errorHandler.getHealthSummary();
  }

  private registerTasks(): void {
    const probeBudgetMs = (this.config.probe_timeout_seconds * this.config.probe_count + 10) * 1000;

    this.scheduler.addTask({
      id: PROBE_TASK,
      interval: this.config.probe_interval_seconds * 1000,
      timeout: probeBudgetMs + 1000,
      runImmediately: true,
      run: () => this.runProbeCycle()
    });

    this.scheduler.addTask({
      id: HEARTBEAT_TASK,
      interval: this.config.heartbeat_interval_seconds * 1000,
      timeout: this.config.transport_timeout_seconds * 1000 + 1000,
      runImmediately: true,
      run: () => this.sendHeartbeat()
    });

    this.scheduler.addTask({
      id: SPEED_TEST_TASK,
      interval: this.config.speed_test.scheduled_interval_seconds * 1000,
      timeout: this.config.speed_test.timeout_seconds * 3 * 1000,
      run: async () => {
        await this.runSpeedTest(this.slowSpeedMode ? 'slow_speed_retest' : 'scheduled');
      }
    });

    this.scheduler.addTask({
      id: MAINTENANCE_TASK,
      interval: MAINTENANCE_INTERVAL_MS,
      timeout: 60000,
      run: async () => {
        this.errorHandler.clearOldErrors();
      }
    });
  }

  private setupEventHandlers(): void {
    this.connectivity.on('outage:start', (event: OutageStartEvent) => {
      this.recordEvent('outage_start', { failed_targets: event.failed_targets }, event.started_at);
      this.emit('outage:start', event);
    });

    this.connectivity.on('outage:end', (report: OutageReport) => {
      this.logger.info(`Outage lasted ${formatDuration(report.duration_seconds)}`);
      this.recordEvent('outage_end', {
        started_at: report.started_at.toISOString(),
        duration_seconds: report.duration_seconds,
        affected_targets: report.affected_targets,
        outage_boot_id: report.outage_boot_id,
        report_boot_id: report.report_boot_id
      }, report.ended_at);

      void this.outbox.offer({ kind: 'outage', report });
      this.emit('outage:end', report);
      void this.runSpeedTest('post_outage');
    });

    this.connectivity.on('degraded', (event: DegradedEvent) => {
      this.recordEvent('high_latency', {
        average_latency_ms: Math.round(event.average_latency_ms * 10) / 10,
        threshold_ms: event.threshold_ms
      }, event.timestamp);
      this.enterSlowSpeedMode('high latency');
      void this.runSpeedTest('high_latency');
    });

    this.connectivity.on('recovered', (event: { timestamp: Date }) => {
      this.recordEvent('latency_recovered', {}, event.timestamp);
    });

    this.connectivity.on('modeChange', event => this.emit('modeChange', event));

    this.scheduler.on('task:error', (event: TaskErrorEvent) => {
      this.errorHandler.handleError(event.error, {
        component: 'LocalMonitor',
        category: ErrorCategory.TEMPORARY_FAILURE,
        details: { task: event.taskId }
      });
    });
  }

  private async probeTarget(target: ProbeTarget): Promise<ProbeResult> {
    const budgetMs = (this.config.probe_timeout_seconds * this.config.probe_count + 10) * 1000;
    try {
      return await withTimeout(this.deps.prober.probe(target), budgetMs, `Probe ${target.name}`, 'LocalMonitor');
    } catch (error) {
      // Probe failures drive state; they are not system errors
      this.logger.debug(`Probe ${target.name} failed: ${errorMessage(error)}`);
      return {
        timestamp: this.clock.now(),
        target_name: target.name,
        target_address: target.address,
        success: false,
        latency_ms: null,
        error_message: errorMessage(error)
      };
    }
  }

  private async executeSpeedTest(trigger: SpeedTestTrigger): Promise<SpeedTestResult | null> {
    let result: SpeedTestResult | null;
    try {
      result = await this.deps.speedTestRunner.run(trigger);
    } catch (error) {
      this.errorHandler.handleError(error, { component: 'SpeedTestRunner', category: ErrorCategory.TRANSPORT });
      result = null;
    }

    if (!result) {
      this.logger.warn(`Speed test (${trigger}) produced no result`);
      return null;
    }

    this.lastSpeedTest = result;
    this.recordEvent(result.passed ? 'speed_test' : 'speed_test_failed', {
      trigger: result.trigger,
      download_mbps: result.download_mbps,
      upload_mbps: result.upload_mbps,
      latency_ms: result.latency_ms
    }, result.timestamp);

    void this.outbox.offer({ kind: 'speed_test', report: result });

    if (!result.passed) {
      this.enterSlowSpeedMode(`speed test below threshold (${result.download_mbps} Mbps)`);
    } else if (this.slowSpeedMode && this.connectivity.getMode() !== 'DEGRADED') {
      this.exitSlowSpeedMode();
    }

    this.emit('speedtest', result);
    return result;
  }

  private enterSlowSpeedMode(reason: string): void {
    if (this.slowSpeedMode) {
      return;
    }

    this.slowSpeedMode = true;
    this.logger.warn(`Entering slow-speed mode: ${reason}`);
    this.scheduler.updateInterval(SPEED_TEST_TASK, this.config.speed_test.slow_mode_interval_seconds * 1000);
    this.recordEvent('slow_speed_start', { reason });
    this.emit('slowSpeed', true);
  }

  private exitSlowSpeedMode(): void {
    this.slowSpeedMode = false;
    this.logger.info('Speed recovered, leaving slow-speed mode');
    this.scheduler.updateInterval(SPEED_TEST_TASK, this.config.speed_test.scheduled_interval_seconds * 1000);
    this.recordEvent('slow_speed_end', {});
    this.emit('slowSpeed', false);
  }

  private enabledTargets(): ProbeTarget[] {
    return this.config.probe_targets.filter(target => target.enabled);
  }

  private recordEvent(eventType: LocalEventType, details: Record<string, unknown>, timestamp: Date = this.clock.now()): void {
    void this.deps.eventLog?.log(eventType, details, timestamp);
  }
}
