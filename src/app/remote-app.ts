/**
 * Remote tracker application: wires the notifier, SQLite store and receiver
 * API around the RemoteTracker
 */

import { RemoteTrackerConfig } from '../types';
import { Logger } from '../utils/logger';
import { RemoteConfigManager } from '../config/remote-config-manager';
import { RemoteTracker, RemoteStatus } from '../remote/remote-tracker';
import { RemoteAPIServer } from '../remote/api-server';
import { NtfyNotifier } from '../alerts/ntfy-notifier';
import { DataStore } from '../storage/data-store';
import { ErrorHandler, ErrorCategory } from '../error-handling';

export class RemoteTrackerApp {
  private logger: Logger;
  private configManager: RemoteConfigManager;
  private errorHandler: ErrorHandler;
  private config: RemoteTrackerConfig | null = null;
  private dataStore: DataStore | null = null;
  private tracker: RemoteTracker | null = null;
  private apiServer: RemoteAPIServer | null = null;
  private isRunning = false;
  private isInitialized = false;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.logger = new Logger('RemoteTrackerApp');
    this.configManager = new RemoteConfigManager(configPath, env);
    this.errorHandler = new ErrorHandler();
  }

  /**
   * Initialize all components. A store that cannot be opened leaves the
   * tracker running without persistence.
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      this.logger.warn('App is already initialized');
      return;
    }

    this.logger.info('Initializing remote tracker...');

    try {
      const config = await this.configManager.loadConfig();
      this.config = config;

      this.dataStore = await this.openDataStore(config);

      if (config.ntfy.topic === '') {
        this.logger.warn('No ntfy topic configured, notifications are disabled');
      }

      this.tracker = new RemoteTracker(config, {
        notifier: new NtfyNotifier(config.ntfy),
        store: this.dataStore,
        errorHandler: this.errorHandler
      });

      this.apiServer = new RemoteAPIServer(this.tracker, new Logger('RemoteAPIServer'), {
        port: config.listen_port,
        host: config.listen_host,
        speedtestPayloadBytes: config.speedtest_payload_bytes
      });

      this.isInitialized = true;
      this.logger.info('Remote tracker initialization completed successfully');
    } catch (error) {
      this.logger.error('Failed to initialize remote tracker:', error);
      throw error;
    }
  }

  async start(): Promise<void> {
    if (!this.isInitialized || !this.tracker || !this.apiServer) {
      throw new Error('App must be initialized before starting');
    }

    if (this.isRunning) {
      this.logger.warn('App is already running');
      return;
    }

    await this.apiServer.start();
    this.tracker.start();

    this.isRunning = true;
    this.logger.info('Remote tracker started successfully');
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      this.logger.warn('App is not running');
      return;
    }

    this.logger.info('Stopping remote tracker...');

    if (this.apiServer) {
      await this.apiServer.stop();
    }
    if (this.tracker) {
      await this.tracker.stop();
    }
    if (this.dataStore) {
      await this.dataStore.close();
    }

    this.isRunning = false;
    this.logger.info('Remote tracker stopped successfully');
  }

  getPort(): number | null {
    return this.apiServer ? this.apiServer.getPort() : null;
  }

  getStatus(): { running: boolean; initialized: boolean; persistence: boolean; tracker: RemoteStatus | null } {
    return {
      running: this.isRunning,
      initialized: this.isInitialized,
      persistence: this.dataStore !== null,
      tracker: this.tracker ? this.tracker.getStatus() : null
    };
  }

  private async openDataStore(config: RemoteTrackerConfig): Promise<DataStore | null> {
    const store = new DataStore(new Logger('DataStore'), config.data_directory, config.data_retention_days);
    try {
      await store.initialize();
      return store;
    } catch (error) {
      this.errorHandler.handleError(error, {
        component: 'DataStore',
        category: ErrorCategory.PERSISTENCE,
        details: { path: store.getPath() }
      });
      this.logger.warn('Continuing without incident persistence');
      return null;
    }
  }
}
