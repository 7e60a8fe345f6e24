import { Readable } from 'stream';
import { HttpSpeedTestRunner, SpeedTestClient, meetsThresholds, toMbps } from './speed-test-runner';
import { SpeedTestConfig } from '../types';

describe('meetsThresholds', () => {
  it('should pass on download alone when no upload minimum is set', () => {
    expect(meetsThresholds(50, null, { min_download_mbps: 50, min_upload_mbps: null })).toBe(true);
    expect(meetsThresholds(49.9, 100, { min_download_mbps: 50, min_upload_mbps: null })).toBe(false);
  });

  it('should require the upload minimum when one is set', () => {
    const thresholds = { min_download_mbps: 50, min_upload_mbps: 10 };
    expect(meetsThresholds(80, 12, thresholds)).toBe(true);
    expect(meetsThresholds(80, 9, thresholds)).toBe(false);
    expect(meetsThresholds(80, null, thresholds)).toBe(false);
  });
});

describe('toMbps', () => {
  it('should convert bytes over seconds to megabits per second', () => {
    expect(toMbps(12_500_000, 2)).toBe(50);
    expect(toMbps(1000, 0)).toBe(0);
  });
});

describe('HttpSpeedTestRunner', () => {
  const config: SpeedTestConfig = {
    min_download_mbps: 0,
    min_upload_mbps: null,
    scheduled_interval_seconds: 3600,
    slow_mode_interval_seconds: 300,
    upload_bytes: 1024,
    timeout_seconds: 30
  };

  function fakeClient(downloadFails = false): { client: SpeedTestClient; get: jest.Mock; post: jest.Mock } {
    const get: jest.Mock = jest.fn((url: string) => {
      if (url === '/health') {
        return Promise.resolve({ status: 200, data: { success: true } });
      }
      if (downloadFails) {
        return Promise.reject(new Error('socket hang up'));
      }
      return Promise.resolve({ status: 200, data: Readable.from([Buffer.alloc(2000), Buffer.alloc(3000)]) });
    });
    const post: jest.Mock = jest.fn().mockResolvedValue({ status: 200, data: {} });
    return { client: { get, post }, get, post };
  }

  it('should measure download and upload against the remote host', async () => {
    const { client, post } = fakeClient();
    const runner = new HttpSpeedTestRunner('http://remote.test', config, client);

    const result = await runner.run('manual');

    expect(result).not.toBeNull();
    expect(result?.trigger).toBe('manual');
    expect(result?.bytes_transferred).toBe(6024);
    expect(result?.passed).toBe(true);
    expect(post).toHaveBeenCalledWith('/speedtest/upload', Buffer.alloc(1024), expect.objectContaining({
      headers: { 'Content-Type': 'application/octet-stream' }
    }));
  });

  it('should skip the upload when no upload size is configured', async () => {
    const { client, post } = fakeClient();
    const runner = new HttpSpeedTestRunner('http://remote.test', { ...config, upload_bytes: 0 }, client);

    const result = await runner.run('scheduled');

    expect(result?.upload_mbps).toBeNull();
    expect(result?.bytes_transferred).toBe(5000);
    expect(post).not.toHaveBeenCalled();
  });

  it('should resolve null when the download fails', async () => {
    const { client } = fakeClient(true);
    const runner = new HttpSpeedTestRunner('http://remote.test', config, client);

    await expect(runner.run('scheduled')).resolves.toBeNull();
  });
});
