/**
 * Main types export file for uplink-watch
 */

// Configuration types
export * from './config';

// Message types
export * from './messages';

// Incident types
export * from './incidents';

// API types
export * from './api';

// Common utility types
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

