/**
 * Configuration of the remote tracker
 */

import { RemoteTrackerConfig } from '../types';
import { FieldReader } from '../utils/validation';
import { ConfigManager, EnvBinding } from './config-manager';

export const DEFAULT_REMOTE_CONFIG_PATH = './config/remote.json';

const REMOTE_ENV_BINDINGS: readonly EnvBinding[] = [
  { variable: 'LISTEN_HOST', path: ['listen_host'], type: 'string' },
  { variable: 'LISTEN_PORT', path: ['listen_port'], type: 'number' },
  { variable: 'HEARTBEAT_TIMEOUT', path: ['heartbeat_timeout_seconds'], type: 'number' },
  { variable: 'CHECK_INTERVAL', path: ['check_interval_seconds'], type: 'number' },
  { variable: 'STARTUP_GRACE', path: ['startup_grace_seconds'], type: 'number' },
  { variable: 'NTFY_SERVER_URL', path: ['ntfy', 'server_url'], type: 'string' },
  { variable: 'NTFY_TOPIC', path: ['ntfy', 'topic'], type: 'string' },
  { variable: 'DATA_DIRECTORY', path: ['data_directory'], type: 'string' },
  { variable: 'MERGE_WINDOW_MINUTES', path: ['merge_window_minutes'], type: 'number' }
];

export class RemoteConfigManager extends ConfigManager<RemoteTrackerConfig> {
  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    super(DEFAULT_REMOTE_CONFIG_PATH, configPath, env);
  }

  override getDefaultConfig(): RemoteTrackerConfig {
    return {
      listen_host: '0.0.0.0',
      listen_port: 5000,
      heartbeat_timeout_seconds: 180,
      check_interval_seconds: 30,
      startup_grace_seconds: 120,
      max_clock_skew_seconds: 300,
      merge_window_minutes: 30,
      ntfy: {
        server_url: 'https://ntfy.sh',
        topic: '',
        timeout_ms: 10000
      },
      data_directory: './data',
      data_retention_days: 365,
      speedtest_payload_bytes: 10 * 1024 * 1024
    };
  }

  protected override envBindings(): readonly EnvBinding[] {
    return REMOTE_ENV_BINDINGS;
  }

  protected override parse(reader: FieldReader): RemoteTrackerConfig {
    const defaults = this.getDefaultConfig();
    const ntfy = reader.object('ntfy');

    const heartbeatTimeout = reader.number('heartbeat_timeout_seconds', { min: 10 }, defaults.heartbeat_timeout_seconds);
    const checkInterval = reader.number('check_interval_seconds', { min: 1 }, defaults.check_interval_seconds);
    if (checkInterval >= heartbeatTimeout) {
      reader.fail('check_interval_seconds', 'must be shorter than heartbeat_timeout_seconds', checkInterval);
    }

    const serverUrl = ntfy.string('server_url', defaults.ntfy.server_url);
    if (!/^https?:\/\/\S+$/.test(serverUrl)) {
      ntfy.fail('server_url', 'must be an http(s) URL', serverUrl);
    }

    return {
      listen_host: reader.string('listen_host', defaults.listen_host),
      listen_port: reader.number('listen_port', { min: 0, max: 65535, integer: true }, defaults.listen_port),
      heartbeat_timeout_seconds: heartbeatTimeout,
      check_interval_seconds: checkInterval,
      startup_grace_seconds: reader.number('startup_grace_seconds', { min: 0 }, defaults.startup_grace_seconds),
      max_clock_skew_seconds: reader.number('max_clock_skew_seconds', { min: 0 }, defaults.max_clock_skew_seconds),
      merge_window_minutes: reader.number('merge_window_minutes', { min: 0 }, defaults.merge_window_minutes),
      ntfy: {
        server_url: serverUrl,
        topic: ntfy.string('topic', defaults.ntfy.topic, true).trim(),
        timeout_ms: ntfy.number('timeout_ms', { min: 100, max: 120000 }, defaults.ntfy.timeout_ms)
      },
      data_directory: reader.string('data_directory', defaults.data_directory),
      data_retention_days: reader.number('data_retention_days', { min: 1, integer: true }, defaults.data_retention_days),
      speedtest_payload_bytes: reader.number('speedtest_payload_bytes', { min: 1024, integer: true }, defaults.speedtest_payload_bytes)
    };
  }
}
