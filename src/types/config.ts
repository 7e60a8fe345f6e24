/**
 * Configuration interfaces for both monitor roles
 */

export interface ProbeTarget {
  name: string;
  address: string;
  enabled: boolean;
}

export type OnlinePolicyName = 'any' | 'all';

export interface LatencyConfig {
  threshold_ms: number;
  window_size: number;
  recovery_cycles: number;
}

export interface SpeedTestConfig {
  min_download_mbps: number;
  min_upload_mbps: number | null;
  scheduled_interval_seconds: number;
  slow_mode_interval_seconds: number;
  upload_bytes: number;
  timeout_seconds: number;
}

export interface LocalMonitorConfig {
  probe_targets: ProbeTarget[];
  probe_interval_seconds: number;
  probe_timeout_seconds: number;
  probe_count: number;
  online_policy: OnlinePolicyName;
  heartbeat_interval_seconds: number;
  remote_url: string;
  transport_timeout_seconds: number;
  latency: LatencyConfig;
  speed_test: SpeedTestConfig;
  log_directory: string;
  log_retention_days: number;
  http_port: number;
}

export interface NtfyConfig {
  server_url: string;
  topic: string;
  timeout_ms: number;
}

export interface RemoteTrackerConfig {
  listen_host: string;
  listen_port: number;
  heartbeat_timeout_seconds: number;
  check_interval_seconds: number;
  startup_grace_seconds: number;
  max_clock_skew_seconds: number;
  merge_window_minutes: number;
  ntfy: NtfyConfig;
  data_directory: string;
  data_retention_days: number;
  speedtest_payload_bytes: number;
}
