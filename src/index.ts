#!/usr/bin/env node
/**
 * Main entry point for uplink-watch
 *
 * MONITOR_ROLE=local (default) runs the home-side connectivity monitor,
 * MONITOR_ROLE=remote runs the off-site liveness tracker.
 */

import { LocalMonitorApp } from './app/local-app';
import { RemoteTrackerApp } from './app/remote-app';
import { Logger } from './utils/logger';

type MonitorRole = 'local' | 'remote';

const logger = new Logger('Main');
let app: LocalMonitorApp | RemoteTrackerApp | null = null;
let shuttingDown = false;

function resolveRole(value: string | undefined): MonitorRole {
  const role = (value ?? 'local').trim().toLowerCase();
  if (role === 'local' || role === 'remote') {
    return role;
  }
  throw new Error(`Unknown MONITOR_ROLE "${value}", expected "local" or "remote"`);
}

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    if (app) {
      await app.stop();
      app = null;
    }

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  try {
    const role = resolveRole(process.env.MONITOR_ROLE);
    logger.info(`Starting uplink-watch (${role})...`);
    logger.info(`Node version: ${process.version}`);
    logger.info(`Platform: ${process.platform}`);

    const instance = role === 'remote' ? new RemoteTrackerApp() : new LocalMonitorApp();
    app = instance;
    await instance.initialize();
    await instance.start();

    // Set up signal handlers for graceful shutdown
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught exception:', error);
      void gracefulShutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled promise rejection:', reason);
      void gracefulShutdown('unhandledRejection');
    });

    logger.info('uplink-watch started successfully');
  } catch (error) {
    logger.error('Failed to start uplink-watch:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unhandled error in main:', error);
  process.exit(1);
});
