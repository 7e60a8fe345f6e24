/**
 * HTTP transport from the local monitor to the remote tracker
 */

import axios, { AxiosInstance } from 'axios';
import { LivenessSignal, OutageReport, SpeedTestResult } from '../types';
import { encodeLivenessSignal, encodeOutageReport, encodeSpeedTestResult } from '../protocol/message-codec';
import { Logger } from '../utils/logger';
import { errorMessage } from '../error-handling';

export interface Transport {
  sendLivenessSignal(signal: LivenessSignal): Promise<boolean>;
  sendOutageReport(report: OutageReport): Promise<boolean>;
  sendSpeedTestResult(result: SpeedTestResult): Promise<boolean>;
}

export type HttpClient = Pick<AxiosInstance, 'post'>;

export class HttpTransport implements Transport {
  private logger = new Logger('HttpTransport');
  private client: HttpClient;

  constructor(remoteUrl: string, timeoutMs: number, client?: HttpClient) {
    this.client = client ?? axios.create({
      baseURL: remoteUrl.replace(/\/+$/, ''),
      headers: {
        'Content-Type': 'application/json'
      },
      timeout: timeoutMs
    });
  }

  sendLivenessSignal(signal: LivenessSignal): Promise<boolean> {
    return this.post('/heartbeat', encodeLivenessSignal(signal), 'liveness signal');
  }

  sendOutageReport(report: OutageReport): Promise<boolean> {
    return this.post('/outage', encodeOutageReport(report), 'outage report');
  }

  sendSpeedTestResult(result: SpeedTestResult): Promise<boolean> {
    return this.post('/speedtest-result', encodeSpeedTestResult(result), 'speed test result');
  }

  /**
   * Resolves true on a 2xx response, false on any failure
   */
  private async post(path: string, body: object, description: string): Promise<boolean> {
    try {
      const response = await this.client.post(path, body);
      const acknowledged = response.status >= 200 && response.status < 300;
      if (acknowledged) {
        this.logger.debug(`Sent ${description} to ${path}`);
      } else {
        this.logger.warn(`Remote rejected ${description}: HTTP ${response.status}`);
      }
      return acknowledged;
    } catch (error) {
      this.logger.warn(`Failed to send ${description}: ${errorMessage(error)}`);
      return false;
    }
  }
}
