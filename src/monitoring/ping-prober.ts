/**
 * ICMP reachability probe using the system ping command
 */

import { spawn, ChildProcess } from 'child_process';
import { ProbeResult, ProbeTarget } from '../types';
import { Logger } from '../utils/logger';
import { errorMessage } from '../error-handling';

export interface Prober {
  /**
   * Probe one target. Resolves with a failed result when the target is
   * unreachable; never rejects for network reasons.
   */
  probe(target: ProbeTarget): Promise<ProbeResult>;
}

export interface PingProberOptions {
  count?: number;
  timeoutSeconds?: number;
  platform?: NodeJS.Platform;
}

export interface PingMetrics {
  latency_ms: number | null;
  packet_loss_percent: number;
}

/**
 * Extract average round-trip time and packet loss from ping output
 */
export function parsePingOutput(output: string, platform: NodeJS.Platform = process.platform): PingMetrics {
  if (platform === 'win32') {
    const lossMatch = output.match(/\((\d+)% loss\)/);
    const timeMatch = output.match(/Average = (\d+)ms/);
    return {
      latency_ms: timeMatch?.[1] ? parseInt(timeMatch[1], 10) : null,
      packet_loss_percent: lossMatch?.[1] ? parseInt(lossMatch[1], 10) : 100
    };
  }

  // Statistics line variants:
  // - rtt min/avg/max/mdev = 3.319/3.393/3.500/0.070 ms (GNU)
  // - round-trip min/avg/max = 14.307/14.451/14.743 ms (BusyBox)
  // - round-trip min/avg/max/stddev = 14.307/14.451/14.743/0.123 ms (macOS)
  const lossMatch = output.match(/([\d.]+)% packet loss/);
  const statsMatch = output.match(/(?:rtt |round-trip |)min\/avg\/max(?:\/(?:mdev|stddev))? = [\d.]+\/([\d.]+)\/[\d.]+/);

  return {
    latency_ms: statsMatch?.[1] ? parseFloat(statsMatch[1]) : null,
    packet_loss_percent: lossMatch?.[1] ? parseFloat(lossMatch[1]) : 100
  };
}

export function buildPingArgs(address: string, count: number, timeoutSeconds: number, platform: NodeJS.Platform): string[] {
  if (platform === 'win32') {
    return ['-n', String(count), '-w', String(timeoutSeconds * 1000), address];
  }
  if (platform === 'darwin') {
    return ['-c', String(count), '-t', String(timeoutSeconds * count), address];
  }
  return ['-c', String(count), '-W', String(timeoutSeconds), address];
}

export class PingProber implements Prober {
  private logger = new Logger('PingProber');
  private count: number;
  private timeoutSeconds: number;
  private platform: NodeJS.Platform;

  constructor(options: PingProberOptions = {}) {
    this.count = options.count ?? 3;
    this.timeoutSeconds = options.timeoutSeconds ?? 5;
    this.platform = options.platform ?? process.platform;
  }

  probe(target: ProbeTarget): Promise<ProbeResult> {
    const args = buildPingArgs(target.address, this.count, this.timeoutSeconds, this.platform);
    const overallTimeoutMs = (this.count * this.timeoutSeconds + 5) * 1000;

    return new Promise(resolve => {
      const timestamp = new Date();
      const fail = (message: string): ProbeResult => ({
        timestamp,
        target_name: target.name,
        target_address: target.address,
        success: false,
        latency_ms: null,
        error_message: message
      });

      let pingProcess: ChildProcess;
      try {
        pingProcess = spawn('ping', args);
      } catch (spawnError) {
        this.logger.error(`Failed to spawn ping for ${target.name}: ${errorMessage(spawnError)}`);
        resolve(fail(`Failed to spawn ping: ${errorMessage(spawnError)}`));
        return;
      }

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: ProbeResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        resolve(result);
      };

      const timeout = setTimeout(() => {
        if (!pingProcess.killed) {
          pingProcess.kill('SIGTERM');
          setTimeout(() => {
            if (pingProcess.exitCode === null && pingProcess.signalCode === null) {
              pingProcess.kill('SIGKILL');
            }
          }, 2000).unref();
        }
        finish(fail(`Ping timed out after ${overallTimeoutMs / 1000} seconds`));
      }, overallTimeoutMs);

      pingProcess.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      pingProcess.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      pingProcess.on('error', error => {
        finish(fail(`Ping process error: ${error.message}`));
      });

      pingProcess.on('close', code => {
        const metrics = parsePingOutput(stdout, this.platform);
        const success = code === 0 && metrics.packet_loss_percent < 100;

        if (!success) {
          finish(fail(stderr.trim() || (metrics.packet_loss_percent === 100 ? 'All packets lost' : `ping exited with code ${code}`)));
          return;
        }

        this.logger.debug(`Ping ${target.name}: ${metrics.latency_ms ?? 'n/a'}ms, ${metrics.packet_loss_percent}% loss`);
        finish({
          timestamp,
          target_name: target.name,
          target_address: target.address,
          success: true,
          latency_ms: metrics.latency_ms
        });
      });
    });
  }
}
