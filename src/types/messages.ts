/**
 * Messages produced by the local monitor and consumed by the remote tracker
 */

export interface ProbeResult {
  timestamp: Date;
  target_name: string;
  target_address: string;
  success: boolean;
  latency_ms: number | null;
  error_message?: string;
}

export interface ProbeCycle {
  started_at: Date;
  monotonic_ms: number;
  results: ProbeResult[];
}

export type ConnectivityMode = 'ONLINE' | 'DEGRADED' | 'OUTAGE';

export interface LivenessSignal {
  readonly sent_at: Date;
  readonly boot_id: string;
  readonly uptime_seconds: number;
  readonly source: string;
}

export interface OutageReport {
  readonly started_at: Date;
  readonly ended_at: Date;
  readonly duration_seconds: number;
  readonly affected_targets: readonly string[];
  readonly outage_boot_id: string;
  readonly report_boot_id: string;
  readonly source: string;
}

export type SpeedTestTrigger = 'scheduled' | 'high_latency' | 'slow_speed_retest' | 'post_outage' | 'manual';

export const SPEED_TEST_TRIGGERS: readonly SpeedTestTrigger[] = [
  'scheduled',
  'high_latency',
  'slow_speed_retest',
  'post_outage',
  'manual'
];

export interface SpeedTestResult {
  readonly timestamp: Date;
  readonly download_mbps: number;
  readonly upload_mbps: number | null;
  readonly latency_ms: number | null;
  readonly passed: boolean;
  readonly trigger: SpeedTestTrigger;
  readonly duration_seconds: number;
  readonly bytes_transferred: number;
}
