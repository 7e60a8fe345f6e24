/**
 * Configuration of the local monitor
 */

import { LocalMonitorConfig, ProbeTarget } from '../types';
import { FieldReader, isRecord } from '../utils/validation';
import { ConfigManager, EnvBinding } from './config-manager';

export const DEFAULT_LOCAL_CONFIG_PATH = './config/local.json';

const LOCAL_ENV_BINDINGS: readonly EnvBinding[] = [
  { variable: 'PROBE_TARGETS', path: ['probe_targets'], type: 'list' },
  { variable: 'PROBE_INTERVAL', path: ['probe_interval_seconds'], type: 'number' },
  { variable: 'PROBE_TIMEOUT', path: ['probe_timeout_seconds'], type: 'number' },
  { variable: 'HEARTBEAT_INTERVAL', path: ['heartbeat_interval_seconds'], type: 'number' },
  { variable: 'REMOTE_URL', path: ['remote_url'], type: 'string' },
  { variable: 'LOG_DIRECTORY', path: ['log_directory'], type: 'string' },
  { variable: 'LOG_RETENTION_DAYS', path: ['log_retention_days'], type: 'number' },
  { variable: 'HIGH_LATENCY_THRESHOLD', path: ['latency', 'threshold_ms'], type: 'number' },
  { variable: 'SLOW_SPEED_THRESHOLD', path: ['speed_test', 'min_download_mbps'], type: 'number' },
  { variable: 'SCHEDULED_SPEED_TEST_INTERVAL', path: ['speed_test', 'scheduled_interval_seconds'], type: 'number' },
  { variable: 'HTTP_PORT', path: ['http_port'], type: 'number' }
];

/**
 * Targets may be written as a bare address or as `{ name, address, enabled }`
 */
function readProbeTargets(reader: FieldReader, fallback: ProbeTarget[]): ProbeTarget[] {
  if (!reader.has('probe_targets')) {
    return fallback;
  }

  const targets: ProbeTarget[] = [];
  reader.array('probe_targets').forEach((item, index) => {
    const field = `probe_targets[${index}]`;
    if (typeof item === 'string') {
      if (item.trim() === '') {
        reader.fail(field, 'must be a non-empty address', item);
        return;
      }
      targets.push({ name: item.trim(), address: item.trim(), enabled: true });
      return;
    }
    if (!isRecord(item)) {
      reader.fail(field, 'must be an address or a target object', item);
      return;
    }

    const target = FieldReader.from(item, reader.path(field), reader.issues);
    const address = target.string('address');
    targets.push({
      name: target.string('name', address),
      address,
      enabled: target.boolean('enabled', true)
    });
  });

  if (!targets.some(target => target.enabled)) {
    reader.fail('probe_targets', 'must contain at least one enabled target');
  }
  return targets;
}

export class LocalConfigManager extends ConfigManager<LocalMonitorConfig> {
  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    super(DEFAULT_LOCAL_CONFIG_PATH, configPath, env);
  }

  override getDefaultConfig(): LocalMonitorConfig {
    return {
      probe_targets: [
        { name: 'cloudflare', address: '1.1.1.1', enabled: true },
        { name: 'google', address: '8.8.8.8', enabled: true }
      ],
      probe_interval_seconds: 30,
      probe_timeout_seconds: 5,
      probe_count: 3,
      online_policy: 'any',
      heartbeat_interval_seconds: 60,
      remote_url: 'http://127.0.0.1:5000',
      transport_timeout_seconds: 10,
      latency: {
        threshold_ms: 200,
        window_size: 5,
        recovery_cycles: 3
      },
      speed_test: {
        min_download_mbps: 50,
        min_upload_mbps: null,
        scheduled_interval_seconds: 3600,
        slow_mode_interval_seconds: 300,
        upload_bytes: 5 * 1024 * 1024,
        timeout_seconds: 60
      },
      log_directory: './logs',
      log_retention_days: 365,
      http_port: 8080
    };
  }

  protected override envBindings(): readonly EnvBinding[] {
    return LOCAL_ENV_BINDINGS;
  }

  protected override parse(reader: FieldReader): LocalMonitorConfig {
    const defaults = this.getDefaultConfig();

    const remoteUrl = reader.string('remote_url', defaults.remote_url);
    if (!/^https?:\/\/\S+$/.test(remoteUrl)) {
      reader.fail('remote_url', 'must be an http(s) URL', remoteUrl);
    }

    const latency = reader.object('latency');
    const speedTest = reader.object('speed_test');

    return {
      probe_targets: readProbeTargets(reader, defaults.probe_targets),
      probe_interval_seconds: reader.number('probe_interval_seconds', { min: 1, max: 3600 }, defaults.probe_interval_seconds),
      probe_timeout_seconds: reader.number('probe_timeout_seconds', { min: 1, max: 60 }, defaults.probe_timeout_seconds),
      probe_count: reader.number('probe_count', { min: 1, max: 10, integer: true }, defaults.probe_count),
      online_policy: reader.oneOf('online_policy', ['any', 'all'], defaults.online_policy),
      heartbeat_interval_seconds: reader.number('heartbeat_interval_seconds', { min: 5, max: 3600 }, defaults.heartbeat_interval_seconds),
      remote_url: remoteUrl.replace(/\/+$/, ''),
      transport_timeout_seconds: reader.number('transport_timeout_seconds', { min: 1, max: 120 }, defaults.transport_timeout_seconds),
      latency: {
        threshold_ms: latency.number('threshold_ms', { min: 1 }, defaults.latency.threshold_ms),
        window_size: latency.number('window_size', { min: 1, max: 100, integer: true }, defaults.latency.window_size),
        recovery_cycles: latency.number('recovery_cycles', { min: 1, max: 100, integer: true }, defaults.latency.recovery_cycles)
      },
      speed_test: {
        min_download_mbps: speedTest.number('min_download_mbps', { min: 0 }, defaults.speed_test.min_download_mbps),
        min_upload_mbps: speedTest.nullableNumber('min_upload_mbps', { min: 0 }),
        scheduled_interval_seconds: speedTest.number('scheduled_interval_seconds', { min: 60 }, defaults.speed_test.scheduled_interval_seconds),
        slow_mode_interval_seconds: speedTest.number('slow_mode_interval_seconds', { min: 30 }, defaults.speed_test.slow_mode_interval_seconds),
        upload_bytes: speedTest.number('upload_bytes', { min: 0, integer: true }, defaults.speed_test.upload_bytes),
        timeout_seconds: speedTest.number('timeout_seconds', { min: 5, max: 600 }, defaults.speed_test.timeout_seconds)
      },
      log_directory: reader.string('log_directory', defaults.log_directory),
      log_retention_days: reader.number('log_retention_days', { min: 1, integer: true }, defaults.log_retention_days),
      http_port: reader.number('http_port', { min: 0, max: 65535, integer: true }, defaults.http_port)
    };
  }
}
