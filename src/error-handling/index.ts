/**
 * Error handling module exports
 */

export {
  MonitoringError,
  MalformedMessageError,
  ErrorCategory,
  ErrorSeverity,
  errorMessage
} from './error-types';
export type { MonitorError, RetryStrategy, SystemHealth, ComponentHealth } from './error-types';
export { ErrorHandler } from './error-handler';
export type { ErrorHandlerOptions, ErrorContext, RetryOptions, HealthSummary } from './error-handler';
