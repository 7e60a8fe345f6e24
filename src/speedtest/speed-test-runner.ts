/**
 * Throughput test against the remote tracker's speed-test endpoints
 */

import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { performance } from 'perf_hooks';
import { SpeedTestConfig, SpeedTestResult, SpeedTestTrigger } from '../types';
import { Logger } from '../utils/logger';
import { errorMessage } from '../error-handling';

export interface SpeedTestRunner {
  /**
   * Resolves null when the test could not be completed
   */
  run(trigger: SpeedTestTrigger): Promise<SpeedTestResult | null>;
}

export type SpeedTestClient = Pick<AxiosInstance, 'get' | 'post'>;

export type SpeedThresholds = Pick<SpeedTestConfig, 'min_download_mbps' | 'min_upload_mbps'>;

/**
 * Passed iff download meets its minimum and upload meets its minimum when one is set
 */
export function meetsThresholds(downloadMbps: number, uploadMbps: number | null, thresholds: SpeedThresholds): boolean {
  if (downloadMbps < thresholds.min_download_mbps) {
    return false;
  }
  if (thresholds.min_upload_mbps === null) {
    return true;
  }
  return uploadMbps !== null && uploadMbps >= thresholds.min_upload_mbps;
}

export function toMbps(bytes: number, seconds: number): number {
  if (seconds <= 0) {
    return 0;
  }
  return Math.round(((bytes * 8) / seconds / 1_000_000) * 100) / 100;
}

export class HttpSpeedTestRunner implements SpeedTestRunner {
  private logger = new Logger('SpeedTestRunner');
  private client: SpeedTestClient;

  constructor(private remoteUrl: string, private config: SpeedTestConfig, client?: SpeedTestClient) {
    this.client = client ?? axios.create({
      baseURL: remoteUrl.replace(/\/+$/, ''),
      timeout: config.timeout_seconds * 1000
    });
  }

  async run(trigger: SpeedTestTrigger): Promise<SpeedTestResult | null> {
    this.logger.info(`Running speed test (trigger: ${trigger}) against ${this.remoteUrl}`);
    const startedAt = new Date();
    const start = performance.now();

    try {
      const latency = await this.measureLatency();
      const download = await this.measureDownload();
      const upload = this.config.upload_bytes > 0 ? await this.measureUpload() : null;

      const downloadMbps = toMbps(download.bytes, download.seconds);
      const uploadMbps = upload ? toMbps(upload.bytes, upload.seconds) : null;

      const result: SpeedTestResult = {
        timestamp: startedAt,
        download_mbps: downloadMbps,
        upload_mbps: uploadMbps,
        latency_ms: latency,
        passed: meetsThresholds(downloadMbps, uploadMbps, this.config),
        trigger,
        duration_seconds: Math.round(performance.now() - start) / 1000,
        bytes_transferred: download.bytes + (upload?.bytes ?? 0)
      };

      this.logger.info(
        `Speed test ${result.passed ? 'passed' : 'FAILED'}: ${downloadMbps} Mbps down` +
        `${uploadMbps !== null ? `, ${uploadMbps} Mbps up` : ''}` +
        `${latency !== null ? `, ${latency.toFixed(1)}ms` : ''}`
      );
      return result;
    } catch (error) {
      this.logger.error(`Speed test failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private async measureLatency(): Promise<number | null> {
    const start = performance.now();
    try {
      await this.client.get('/health');
      return Math.round((performance.now() - start) * 10) / 10;
    } catch (error) {
      this.logger.warn(`Latency measurement failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private async measureDownload(): Promise<{ bytes: number; seconds: number }> {
    const start = performance.now();
    const response = await this.client.get<Readable>('/speedtest', { responseType: 'stream' });

    let bytes = 0;
    for await (const chunk of response.data) {
      bytes += Buffer.isBuffer(chunk) ? chunk.length : Buffer.byteLength(String(chunk));
    }

    return { bytes, seconds: (performance.now() - start) / 1000 };
  }

  private async measureUpload(): Promise<{ bytes: number; seconds: number }> {
    const payload = Buffer.alloc(this.config.upload_bytes);
    const start = performance.now();

    await this.client.post('/speedtest/upload', payload, {
      headers: { 'Content-Type': 'application/octet-stream' },
      maxBodyLength: Infinity
    });

    return { bytes: payload.length, seconds: (performance.now() - start) / 1000 };
  }
}
