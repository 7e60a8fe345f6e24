/**
 * Local monitor application: wires the prober, transport, speed-test runner,
 * event log and status API around the LocalMonitor
 */

import { LocalMonitorConfig } from '../types';
import { Logger } from '../utils/logger';
import { SystemHostIdentity } from '../utils/host-identity';
import { LocalConfigManager } from '../config/local-config-manager';
import { LocalMonitor, LocalMonitorStatus } from '../monitoring/local-monitor';
import { LocalAPIServer } from '../monitoring/local-api-server';
import { PingProber } from '../monitoring/ping-prober';
import { HttpTransport } from '../transport/http-transport';
import { HttpSpeedTestRunner } from '../speedtest/speed-test-runner';
import { EventLog } from '../storage/event-log';
import { ErrorHandler } from '../error-handling';

export class LocalMonitorApp {
  private logger: Logger;
  private configManager: LocalConfigManager;
  private errorHandler: ErrorHandler;
  private config: LocalMonitorConfig | null = null;
  private monitor: LocalMonitor | null = null;
  private apiServer: LocalAPIServer | null = null;
  private isRunning = false;
  private isInitialized = false;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.logger = new Logger('LocalMonitorApp');
    this.configManager = new LocalConfigManager(configPath, env);
    this.errorHandler = new ErrorHandler();
  }

  /**
   * Initialize all components
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      this.logger.warn('App is already initialized');
      return;
    }

    this.logger.info('Initializing local monitor...');

    try {
      const config = await this.configManager.loadConfig();
      this.config = config;

      this.monitor = new LocalMonitor(config, {
        prober: new PingProber({
          count: config.probe_count,
          timeoutSeconds: config.probe_timeout_seconds
        }),
        transport: new HttpTransport(config.remote_url, config.transport_timeout_seconds * 1000),
        speedTestRunner: new HttpSpeedTestRunner(config.remote_url, config.speed_test),
        identity: new SystemHostIdentity(),
        eventLog: new EventLog(config.log_directory, config.log_retention_days),
        errorHandler: this.errorHandler
      });

      this.apiServer = new LocalAPIServer(this.monitor, new Logger('LocalAPIServer'), {
        port: config.http_port,
        host: '0.0.0.0'
      });

      this.isInitialized = true;
      this.logger.info('Local monitor initialization completed successfully');
    } catch (error) {
      this.logger.error('Failed to initialize local monitor:', error);
      throw error;
    }
  }

  async start(): Promise<void> {
    if (!this.isInitialized || !this.monitor || !this.apiServer) {
      throw new Error('App must be initialized before starting');
    }

    if (this.isRunning) {
      this.logger.warn('App is already running');
      return;
    }

    await this.apiServer.start();
    this.monitor.start();

    this.isRunning = true;
    this.logger.info('Local monitor started successfully');
  }

  /**
   * Stop monitoring and the status API gracefully
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      this.logger.warn('App is not running');
      return;
    }

    this.logger.info('Stopping local monitor...');

    if (this.monitor) {
      await this.monitor.stop();
    }
    if (this.apiServer) {
      await this.apiServer.stop();
    }

    this.isRunning = false;
    this.logger.info('Local monitor stopped successfully');
  }

  getConfig(): LocalMonitorConfig | null {
    return this.config;
  }

  getStatus(): { running: boolean; initialized: boolean; monitor: LocalMonitorStatus | null } {
    return {
      running: this.isRunning,
      initialized: this.isInitialized,
      monitor: this.monitor ? this.monitor.getStatus() : null
    };
  }
}
