/**
 * JSON wire format for messages exchanged between the local monitor and the
 * remote tracker. Timestamps travel as ISO-8601 strings.
 */

import { LivenessSignal, OutageReport, SpeedTestResult, SPEED_TEST_TRIGGERS } from '../types';
import { MalformedMessageError } from '../error-handling';
import { FieldReader, formatIssues } from '../utils/validation';
import { Logger } from '../utils/logger';

const logger = new Logger('MessageCodec');

export interface LivenessSignalPayload {
  sent_at: string;
  boot_id: string;
  uptime_seconds: number;
  source: string;
}

export interface OutageReportPayload {
  started_at: string;
  ended_at: string;
  duration_seconds: number;
  affected_targets: string[];
  outage_boot_id: string;
  report_boot_id: string;
  source: string;
}

export interface SpeedTestResultPayload {
  timestamp: string;
  download_mbps: number;
  upload_mbps: number | null;
  latency_ms: number | null;
  passed: boolean;
  trigger: SpeedTestResult['trigger'];
  duration_seconds: number;
  bytes_transferred: number;
}

export function encodeLivenessSignal(signal: LivenessSignal): LivenessSignalPayload {
  return {
    sent_at: signal.sent_at.toISOString(),
    boot_id: signal.boot_id,
    uptime_seconds: signal.uptime_seconds,
    source: signal.source
  };
}

export function encodeOutageReport(report: OutageReport): OutageReportPayload {
  return {
    started_at: report.started_at.toISOString(),
    ended_at: report.ended_at.toISOString(),
    duration_seconds: report.duration_seconds,
    affected_targets: [...report.affected_targets],
    outage_boot_id: report.outage_boot_id,
    report_boot_id: report.report_boot_id,
    source: report.source
  };
}

export function encodeSpeedTestResult(result: SpeedTestResult): SpeedTestResultPayload {
  return {
    timestamp: result.timestamp.toISOString(),
    download_mbps: result.download_mbps,
    upload_mbps: result.upload_mbps,
    latency_ms: result.latency_ms,
    passed: result.passed,
    trigger: result.trigger,
    duration_seconds: result.duration_seconds,
    bytes_transferred: result.bytes_transferred
  };
}

/**
 * @throws MalformedMessageError listing every invalid field
 */
export function decodeLivenessSignal(payload: unknown): LivenessSignal {
  const reader = FieldReader.from(payload);
  const signal: LivenessSignal = {
    sent_at: reader.date('sent_at'),
    boot_id: reader.string('boot_id'),
    uptime_seconds: clampNonNegative(reader.number('uptime_seconds'), 'uptime_seconds'),
    source: reader.string('source', 'local-monitor')
  };

  assertValid('liveness signal', reader);
  return signal;
}

/**
 * @throws MalformedMessageError listing every invalid field
 */
export function decodeOutageReport(payload: unknown): OutageReport {
  const reader = FieldReader.from(payload);
  const startedAt = reader.date('started_at');
  const endedAt = reader.date('ended_at');
  const outageBootId = reader.string('outage_boot_id');

  const report: OutageReport = {
    started_at: startedAt,
    ended_at: endedAt,
    duration_seconds: clampNonNegative(reader.number('duration_seconds'), 'duration_seconds'),
    affected_targets: reader.stringArray('affected_targets', []),
    outage_boot_id: outageBootId,
    report_boot_id: reader.string('report_boot_id', outageBootId || undefined),
    source: reader.string('source', 'local-monitor')
  };

  assertValid('outage report', reader);
  return report;
}

/**
 * @throws MalformedMessageError listing every invalid field
 */
export function decodeSpeedTestResult(payload: unknown): SpeedTestResult {
  const reader = FieldReader.from(payload);
  const result: SpeedTestResult = {
    timestamp: reader.date('timestamp'),
    download_mbps: reader.number('download_mbps', { min: 0 }),
    upload_mbps: reader.nullableNumber('upload_mbps', { min: 0 }),
    latency_ms: reader.nullableNumber('latency_ms', { min: 0 }),
    passed: reader.boolean('passed'),
    trigger: reader.oneOf('trigger', SPEED_TEST_TRIGGERS),
    duration_seconds: clampNonNegative(reader.number('duration_seconds', {}, 0), 'duration_seconds'),
    bytes_transferred: reader.number('bytes_transferred', { min: 0 }, 0)
  };

  assertValid('speed test result', reader);
  return result;
}

function clampNonNegative(value: number, field: string): number {
  if (value < 0) {
    logger.warn(`Negative ${field} (${value}) clamped to zero`);
    return 0;
  }
  return value;
}

function assertValid(messageType: string, reader: FieldReader): void {
  if (!reader.valid) {
    throw new MalformedMessageError(messageType, formatIssues(reader.issues));
  }
}
