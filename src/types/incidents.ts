/**
 * Raw events, incidents and remote-side liveness state
 */

import { SpeedTestResult } from './messages';

export type LivenessMode = 'STARTUP_GRACE' | 'ONLINE' | 'OUTAGE';

export type IncidentCause = 'POWER_CUT' | 'ISP_ISSUE' | 'UNKNOWN';

export type IncidentKind = 'OUTAGE' | 'SLOW_SPEED';

export type EventSource = 'remote' | 'local';

interface RawEventBase {
  id: string;
  timestamp: Date;
  source: EventSource;
}

export interface OutageDetectedEvent extends RawEventBase {
  type: 'outage-detected';
  started_at: Date;
}

export interface OutageResolvedEvent extends RawEventBase {
  type: 'outage-resolved';
  started_at: Date;
  ended_at: Date;
  downtime_seconds: number;
  cause: IncidentCause;
  affected_targets: string[];
}

/**
 * Authoritative local-side figures for an outage the remote side already resolved
 */
export interface OutageAmendedEvent extends RawEventBase {
  type: 'outage-amended';
  amends_event_id: string;
  downtime_seconds: number;
  cause: IncidentCause;
  affected_targets: string[];
}

export interface SpeedTestEvent extends RawEventBase {
  type: 'speed-test-result';
  result: SpeedTestResult;
}

export type RawEvent = OutageDetectedEvent | OutageResolvedEvent | OutageAmendedEvent | SpeedTestEvent;

export interface RawEventRef {
  event_id: string;
  type: RawEvent['type'];
  timestamp: Date;
  downtime_seconds: number;
  amends_event_id?: string;
}

export interface Incident {
  id: string;
  kind: IncidentKind;
  cause: IncidentCause;
  started_at: Date;
  ended_at: Date | null;
  downtime_seconds: number;
  raw_events: RawEventRef[];
  retest_result: SpeedTestResult | null;
  resolved_at: Date | null;
  final: boolean;
}

export interface LivenessRecord {
  last_sent_at: Date | null;
  last_boot_id: string | null;
  last_received_at: Date | null;
  mode: LivenessMode;
  outage_started_at: Date | null;
  boot_id_before_outage: string | null;
  grace_expires_at: Date;
}

export interface LivenessStatus {
  mode: LivenessMode;
  is_online: boolean;
  last_heartbeat_time: Date | null;
  last_heartbeat_age_seconds: number | null;
  last_boot_id: string | null;
  outage_start_time: Date | null;
  current_outage_duration_seconds: number | null;
  grace_expires_at: Date;
}
