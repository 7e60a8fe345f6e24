/**
 * Tests for the local status API
 */

import axios from 'axios';
import { LocalAPIServer } from './local-api-server';
import { LocalMonitor } from './local-monitor';
import { Logger, LocalMonitorConfig, SpeedTestResult, SpeedTestTrigger } from '../types';

const mockLogger: Logger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn()
};

const config: LocalMonitorConfig = {
  probe_targets: [{ name: 'primary', address: '192.0.2.1', enabled: true }],
  probe_interval_seconds: 30,
  probe_timeout_seconds: 5,
  probe_count: 3,
  online_policy: 'any',
  heartbeat_interval_seconds: 60,
  remote_url: 'http://remote.test',
  transport_timeout_seconds: 10,
  latency: { threshold_ms: 200, window_size: 5, recovery_cycles: 3 },
  speed_test: {
    min_download_mbps: 50,
    min_upload_mbps: null,
    scheduled_interval_seconds: 3600,
    slow_mode_interval_seconds: 300,
    upload_bytes: 0,
    timeout_seconds: 60
  },
  log_directory: './logs',
  log_retention_days: 365,
  http_port: 0
};

describe('LocalAPIServer', () => {
  let server: LocalAPIServer;
  let run: jest.Mock<Promise<SpeedTestResult | null>, [SpeedTestTrigger]>;
  let baseUrl: string;

  beforeEach(async () => {
    run = jest.fn<Promise<SpeedTestResult | null>, [SpeedTestTrigger]>();
    const monitor = new LocalMonitor(config, {
      prober: { probe: jest.fn() },
      transport: {
        sendLivenessSignal: jest.fn().mockResolvedValue(true),
        sendOutageReport: jest.fn().mockResolvedValue(true),
        sendSpeedTestResult: jest.fn().mockResolvedValue(true)
      },
      speedTestRunner: { run },
      identity: { bootId: () => 'boot-a', uptimeSeconds: () => 10 }
    });

    server = new LocalAPIServer(monitor, mockLogger, { port: 0, host: '127.0.0.1' });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  it('should report health', async () => {
    const response = await axios.get(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(response.data.success).toBe(true);
    expect(response.data.data.role).toBe('local');
    expect(response.data.data.status).toBe('healthy');
    expect(response.data.data.active_errors).toBe(0);
  });

  it('should answer 400 for a body that is not valid JSON', async () => {
    const response = await axios.post(`${baseUrl}/api/speedtest`, Buffer.from('{"trigger":'), {
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true
    });

    expect(response.status).toBe(400);
    expect(response.data.error).toBe('Malformed JSON body');
    expect(run).not.toHaveBeenCalled();
  });

  it('should return the connectivity snapshot', async () => {
    const response = await axios.get(`${baseUrl}/api/status`);

    expect(response.data.data.connectivity.mode).toBe('ONLINE');
    expect(response.data.data.slow_speed_mode).toBe(false);
    expect(response.data.data.boot_id).toBe('boot-a');
  });

  it('should run a manual speed test', async () => {
    run.mockResolvedValueOnce({
      timestamp: new Date('2024-07-01T12:00:00.000Z'),
      download_mbps: 80,
      upload_mbps: null,
      latency_ms: 15,
      passed: true,
      trigger: 'manual',
      duration_seconds: 3,
      bytes_transferred: 1000
    });

    const response = await axios.post(`${baseUrl}/api/speedtest`);

    expect(run).toHaveBeenCalledWith('manual');
    expect(response.data.data).toEqual({
      timestamp: '2024-07-01T12:00:00.000Z',
      download_mbps: 80,
      upload_mbps: null,
      latency_ms: 15,
      passed: true,
      trigger: 'manual',
      duration_seconds: 3,
      bytes_transferred: 1000
    });
  });

  it('should answer 502 when the speed test fails', async () => {
    run.mockResolvedValueOnce(null);

    const response = await axios.post(`${baseUrl}/api/speedtest`, undefined, { validateStatus: () => true });

    expect(response.status).toBe(502);
    expect(response.data).toEqual(expect.objectContaining({ success: false, error: 'Speed test could not be completed' }));
  });

  it('should answer 404 for unknown endpoints', async () => {
    const response = await axios.get(`${baseUrl}/api/unknown`, { validateStatus: () => true });
    expect(response.status).toBe(404);
  });
});
