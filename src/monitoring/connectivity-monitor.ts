/**
 * Local connectivity state machine
 *
 * Turns probe cycles into ONLINE / DEGRADED / OUTAGE transitions. Owns the
 * connectivity state exclusively; other components see snapshots and events.
 */

import { EventEmitter } from 'events';
import { ConnectivityMode, LatencyConfig, OutageReport, ProbeCycle } from '../types';
import { Logger } from '../utils/logger';
import { HostIdentity } from '../utils/host-identity';
import { OnlinePolicy, anyTargetReachable, bestLatency } from './connectivity-policy';
import { LatencyWindow } from './latency-window';

export interface ConnectivityMonitorOptions {
  latency: LatencyConfig;
  identity: HostIdentity;
  onlinePolicy?: OnlinePolicy;
  source?: string;
}

export interface ModeChangeEvent {
  previous_mode: ConnectivityMode;
  new_mode: ConnectivityMode;
  timestamp: Date;
}

export interface OutageStartEvent {
  started_at: Date;
  failed_targets: string[];
}

export interface DegradedEvent {
  timestamp: Date;
  average_latency_ms: number;
  threshold_ms: number;
}

export interface CycleOutcome {
  online: boolean;
  latency_ms: number | null;
  previous_mode: ConnectivityMode;
  mode: ConnectivityMode;
}

export interface ConnectivitySnapshot {
  mode: ConnectivityMode;
  outage_started_at: Date | null;
  affected_targets: string[];
  latency_samples: number[];
  average_latency_ms: number | null;
  healthy_cycles: number;
  last_cycle_at: Date | null;
  last_cycle_latency_ms: number | null;
}

export class ConnectivityMonitor extends EventEmitter {
  private logger = new Logger('ConnectivityMonitor');
  private mode: ConnectivityMode = 'ONLINE';
  private outageStartedAt: Date | null = null;
  private outageStartedMonotonic = 0;
  private outageBootId: string | null = null;
  private affectedTargets = new Set<string>();
  private latencyWindow: LatencyWindow;
  private healthyCycles = 0;
  private lastCycleAt: Date | null = null;
  private lastCycleLatency: number | null = null;
  private readonly latency: LatencyConfig;
  private readonly identity: HostIdentity;
  private readonly onlinePolicy: OnlinePolicy;
  private readonly source: string;

  constructor(options: ConnectivityMonitorOptions) {
    super();
    this.latency = options.latency;
    this.identity = options.identity;
    this.onlinePolicy = options.onlinePolicy ?? anyTargetReachable;
    this.source = options.source ?? 'local-monitor';
    this.latencyWindow = new LatencyWindow(options.latency.window_size);
  }

  /**
   * Apply one fully-evaluated probe cycle
   */
  processCycle(cycle: ProbeCycle): CycleOutcome {
    const previousMode = this.mode;
    const online = this.onlinePolicy(cycle.results);
    const latency = online ? bestLatency(cycle.results) : null;

    this.lastCycleAt = cycle.started_at;
    this.lastCycleLatency = latency;

    if (!online) {
      this.recordFailedCycle(cycle);
    } else {
      if (this.mode === 'OUTAGE') {
        this.endOutage(cycle);
      }
      this.evaluateLatency(latency, cycle.started_at);
    }

    const outcome: CycleOutcome = {
      online,
      latency_ms: latency,
      previous_mode: previousMode,
      mode: this.mode
    };
    this.emit('cycle', outcome);
    return outcome;
  }

  getMode(): ConnectivityMode {
    return this.mode;
  }

  getSnapshot(): ConnectivitySnapshot {
    return {
      mode: this.mode,
      outage_started_at: this.outageStartedAt,
      affected_targets: Array.from(this.affectedTargets).sort(),
      latency_samples: this.latencyWindow.values(),
      average_latency_ms: this.latencyWindow.average(),
      healthy_cycles: this.healthyCycles,
      last_cycle_at: this.lastCycleAt,
      last_cycle_latency_ms: this.lastCycleLatency
    };
  }

  private recordFailedCycle(cycle: ProbeCycle): void {
    const failedTargets = cycle.results.filter(result => !result.success).map(result => result.target_name);
    failedTargets.forEach(target => this.affectedTargets.add(target));

    if (this.mode === 'OUTAGE') {
      return;
    }

    this.outageStartedAt = cycle.started_at;
    this.outageStartedMonotonic = cycle.monotonic_ms;
    this.outageBootId = this.identity.bootId();
    this.healthyCycles = 0;
    this.latencyWindow.clear();

    this.logger.warn(`OUTAGE DETECTED at ${cycle.started_at.toISOString()} (${failedTargets.length} target(s) unreachable)`);
    this.setMode('OUTAGE', cycle.started_at);

    const event: OutageStartEvent = { started_at: cycle.started_at, failed_targets: failedTargets };
    this.emit('outage:start', event);
  }

  private endOutage(cycle: ProbeCycle): void {
    const startedAt = this.outageStartedAt ?? cycle.started_at;
    let durationMs = cycle.monotonic_ms - this.outageStartedMonotonic;
    if (durationMs < 0) {
      this.logger.warn(`Monotonic clock went backwards by ${-durationMs}ms, clamping outage duration to zero`);
      durationMs = 0;
    }

    const report: OutageReport = {
      started_at: startedAt,
      ended_at: cycle.started_at,
      duration_seconds: durationMs / 1000,
      affected_targets: Array.from(this.affectedTargets).sort(),
      outage_boot_id: this.outageBootId ?? this.identity.bootId(),
      report_boot_id: this.identity.bootId(),
      source: this.source
    };

    this.outageStartedAt = null;
    this.outageStartedMonotonic = 0;
    this.outageBootId = null;
    this.affectedTargets.clear();

    this.logger.info(`OUTAGE ENDED at ${cycle.started_at.toISOString()} (duration: ${(report.duration_seconds / 60).toFixed(1)} minutes)`);
    this.setMode('ONLINE', cycle.started_at);
    this.emit('outage:end', report);
  }

  private evaluateLatency(latency: number | null, timestamp: Date): void {
    if (latency === null) {
      return;
    }

    this.latencyWindow.add(latency);
    const threshold = this.latency.threshold_ms;

    if (this.mode === 'ONLINE') {
      const average = this.latencyWindow.average();
      if (average !== null && average > threshold) {
        this.healthyCycles = 0;
        this.logger.warn(`High latency: ${average.toFixed(1)}ms average exceeds ${threshold}ms`);
        this.setMode('DEGRADED', timestamp);

        const event: DegradedEvent = { timestamp, average_latency_ms: average, threshold_ms: threshold };
        this.emit('degraded', event);
      }
      return;
    }

    if (this.mode === 'DEGRADED') {
      this.healthyCycles = latency <= threshold ? this.healthyCycles + 1 : 0;

      if (this.healthyCycles >= this.latency.recovery_cycles) {
        this.latencyWindow.clear();
        this.healthyCycles = 0;
        this.logger.info(`Latency recovered below ${threshold}ms for ${this.latency.recovery_cycles} consecutive cycles`);
        this.setMode('ONLINE', timestamp);
        this.emit('recovered', { timestamp });
      }
    }
  }

  private setMode(newMode: ConnectivityMode, timestamp: Date): void {
    const previousMode = this.mode;
    if (previousMode === newMode) {
      return;
    }

    this.mode = newMode;
    const event: ModeChangeEvent = { previous_mode: previousMode, new_mode: newMode, timestamp };
    this.emit('modeChange', event);
    this.logger.info(`Connectivity mode change: ${previousMode} -> ${newMode}`);
  }
}
