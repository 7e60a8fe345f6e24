/**
 * Tests for the remote receiver and status API
 */

import axios from 'axios';
import { WebSocket } from 'ws';
import { RemoteAPIServer } from './api-server';
import { RemoteTracker } from './remote-tracker';
import { Logger, RemoteTrackerConfig } from '../types';
import { Clock } from '../utils/clock';
import { ErrorCategory } from '../error-handling';

const mockLogger: Logger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn()
};

const config: RemoteTrackerConfig = {
  listen_host: '127.0.0.1',
  listen_port: 0,
  heartbeat_timeout_seconds: 180,
  check_interval_seconds: 30,
  startup_grace_seconds: 120,
  max_clock_skew_seconds: 300,
  merge_window_minutes: 30,
  ntfy: { server_url: 'https://ntfy.test', topic: '', timeout_ms: 1000 },
  data_directory: './data',
  data_retention_days: 365,
  speedtest_payload_bytes: 2048
};

const START = new Date('2024-06-01T00:00:00.000Z');

function nextMessage(ws: WebSocket): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    ws.once('message', data => {
      const parsed: unknown = JSON.parse(data.toString());
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        resolve({ ...parsed });
      } else {
        reject(new Error('unexpected message'));
      }
    });
  });
}

describe('RemoteAPIServer', () => {
  let clock: { current: Date } & Clock;
  let tracker: RemoteTracker;
  let server: RemoteAPIServer;
  let baseUrl: string;

  beforeEach(async () => {
    clock = {
      current: START,
      now() {
        return this.current;
      },
      monotonic() {
        return this.current.getTime();
      }
    };
    tracker = new RemoteTracker(config, { notifier: { notify: jest.fn().mockResolvedValue(false) }, clock });
    server = new RemoteAPIServer(tracker, mockLogger, { port: 0, host: '127.0.0.1', speedtestPayloadBytes: 2048 });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('receiver', () => {
    it('should accept a heartbeat', async () => {
      const response = await axios.post(`${baseUrl}/heartbeat`, {
        sent_at: START.toISOString(),
        boot_id: 'boot-a',
        uptime_seconds: 50
      });

      expect(response.status).toBe(200);
      expect(response.data.data).toEqual({ disposition: 'accepted' });
      expect(tracker.getStatus().liveness.last_boot_id).toBe('boot-a');
    });

    it('should report a replayed heartbeat as duplicate', async () => {
      const body = { sent_at: START.toISOString(), boot_id: 'boot-a', uptime_seconds: 50 };
      await axios.post(`${baseUrl}/heartbeat`, body);

      const response = await axios.post(`${baseUrl}/heartbeat`, body);

      expect(response.data.data).toEqual({ disposition: 'duplicate' });
    });

    it('should answer 400 with field errors for a malformed heartbeat', async () => {
      const response = await axios.post(`${baseUrl}/heartbeat`, { boot_id: '' }, { validateStatus: () => true });

      expect(response.status).toBe(400);
      expect(response.data.success).toBe(false);
      expect(response.data.details).toEqual(expect.arrayContaining(['boot_id: must be a non-empty string']));
      expect(tracker.getStatus().liveness.last_heartbeat_time).toBeNull();
    });

    it('should answer 400 for a body that is not valid JSON', async () => {
      const response = await axios.post(`${baseUrl}/heartbeat`, Buffer.from('{"sent_at":'), {
        headers: { 'Content-Type': 'application/json' },
        validateStatus: () => true
      });

      expect(response.status).toBe(400);
      expect(response.data.success).toBe(false);
      expect(response.data.error).toBe('Malformed JSON body');
      expect(tracker.getHealth().errors_by_category).toEqual({ [ErrorCategory.MALFORMED_MESSAGE]: 1 });
    });

    it('should accept an outage report', async () => {
      const response = await axios.post(`${baseUrl}/outage`, {
        started_at: '2024-05-31T23:50:00.000Z',
        ended_at: '2024-05-31T23:51:00.000Z',
        duration_seconds: 60,
        affected_targets: ['primary'],
        outage_boot_id: 'boot-a',
        report_boot_id: 'boot-a'
      });

      expect(response.data.data).toEqual({ disposition: 'standalone' });
    });

    it('should accept a speed test result', async () => {
      const response = await axios.post(`${baseUrl}/speedtest-result`, {
        timestamp: START.toISOString(),
        download_mbps: 80,
        upload_mbps: null,
        latency_ms: 20,
        passed: true,
        trigger: 'scheduled',
        duration_seconds: 4,
        bytes_transferred: 1000
      });

      expect(response.data.data).toEqual({ disposition: 'accepted' });
    });
  });

  describe('status', () => {
    it('should report health', async () => {
      const response = await axios.get(`${baseUrl}/health`);

      expect(response.data.data).toEqual(expect.objectContaining({
        status: 'healthy',
        role: 'remote',
        components: [],
        active_errors: 0,
        errors_by_category: {}
      }));
    });

    it('should count rejected messages in the health report', async () => {
      await axios.post(`${baseUrl}/heartbeat`, { boot_id: '' }, { validateStatus: () => true });

      const response = await axios.get(`${baseUrl}/health`);

      expect(response.data.data.status).toBe('healthy');
      expect(response.data.data.active_errors).toBe(1);
      expect(response.data.data.errors_by_category).toEqual({ [ErrorCategory.MALFORMED_MESSAGE]: 1 });
    });

    it('should report liveness status', async () => {
      const response = await axios.get(`${baseUrl}/status`);

      expect(response.data.data.liveness.mode).toBe('STARTUP_GRACE');
      expect(response.data.data.in_grace).toBe(true);
      expect(response.data.data.open_incidents).toEqual([]);
    });

    it('should list incidents', async () => {
      clock.current = new Date(START.getTime() + 200000);
      tracker.checkNow();

      const response = await axios.get(`${baseUrl}/incidents?limit=5`);

      expect(response.data.data).toHaveLength(1);
      expect(response.data.data[0].kind).toBe('OUTAGE');
      expect(response.data.data[0].started_at).toBe('2024-06-01T00:03:00.000Z');
    });

    it('should reject an invalid limit', async () => {
      const response = await axios.get(`${baseUrl}/incidents?limit=zero`, { validateStatus: () => true });

      expect(response.status).toBe(400);
    });
  });

  describe('speed test endpoints', () => {
    it('should serve the download payload', async () => {
      const response = await axios.get(`${baseUrl}/speedtest`, { responseType: 'arraybuffer' });

      expect(response.headers['content-type']).toBe('application/octet-stream');
      expect(response.data.byteLength).toBe(2048);
    });

    it('should count uploaded bytes', async () => {
      const response = await axios.post(`${baseUrl}/speedtest/upload`, Buffer.alloc(4096), {
        headers: { 'Content-Type': 'application/octet-stream' }
      });

      expect(response.data.data).toEqual({ bytes_received: 4096 });
    });
  });

  describe('websocket', () => {
    it('should confirm the connection and push incident updates', async () => {
      const ws = new WebSocket(`ws://127.0.0.1:${server.getPort()}`);
      const connected = await nextMessage(ws);
      expect(connected.type).toBe('connected');

      const update = nextMessage(ws);
      clock.current = new Date(START.getTime() + 200000);
      tracker.checkNow();

      const message = await update;
      expect(message.type).toBe('incident');
      expect(message.change).toBe('incident-opened');
      ws.close();
    });
  });

  it('should answer 404 for unknown endpoints', async () => {
    const response = await axios.get(`${baseUrl}/unknown`, { validateStatus: () => true });

    expect(response.status).toBe(404);
  });
});
