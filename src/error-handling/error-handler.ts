/**
 * Error handler for monitoring operations: records, classifies and logs
 * failures, and retries persistence and notification calls on a bounded schedule
 */

import { Logger } from '../utils/logger';
import {
  MonitorError,
  ErrorCategory,
  ErrorSeverity,
  RetryStrategy,
  SystemHealth,
  ComponentHealth,
  MonitoringError,
  errorMessage
} from './error-types';

export interface ErrorHandlerOptions {
  strategies?: Partial<Record<ErrorCategory, Partial<RetryStrategy>>>;
  maxStoredErrors?: number;
}

export interface ErrorContext {
  component?: string;
  target?: string;
  category?: ErrorCategory;
  details?: Record<string, unknown>;
}

export interface HealthSummary {
  status: SystemHealth['overall_status'];
  components: ComponentHealth[];
  active_errors: number;
  recovered_errors: number;
  errors_by_category: Partial<Record<ErrorCategory, number>>;
}

export interface RetryOptions {
  category: ErrorCategory;
  component: string;
  description: string;
}

const DEFAULT_STRATEGIES: Record<ErrorCategory, RetryStrategy> = {
  [ErrorCategory.TRANSPORT]: { max_retries: 0, retry_delay_ms: 0, backoff_multiplier: 1, max_delay_ms: 0 },
  [ErrorCategory.MALFORMED_MESSAGE]: { max_retries: 0, retry_delay_ms: 0, backoff_multiplier: 1, max_delay_ms: 0 },
  [ErrorCategory.CLOCK_ANOMALY]: { max_retries: 0, retry_delay_ms: 0, backoff_multiplier: 1, max_delay_ms: 0 },
  [ErrorCategory.CONFIGURATION]: { max_retries: 0, retry_delay_ms: 0, backoff_multiplier: 1, max_delay_ms: 0 },
  // Persistence - short retries, the database is local
  [ErrorCategory.PERSISTENCE]: { max_retries: 3, retry_delay_ms: 500, backoff_multiplier: 2, max_delay_ms: 5000 },
  // Notifications - longer delays, the service is remote
  [ErrorCategory.NOTIFICATION]: { max_retries: 4, retry_delay_ms: 2000, backoff_multiplier: 2, max_delay_ms: 30000 },
  [ErrorCategory.TEMPORARY_FAILURE]: { max_retries: 3, retry_delay_ms: 500, backoff_multiplier: 1.5, max_delay_ms: 5000 }
};

export class ErrorHandler {
  private logger: Logger;
  private errors: Map<string, MonitorError> = new Map();
  private strategies: Map<ErrorCategory, RetryStrategy> = new Map();
  private componentHealth: Map<string, ComponentHealth> = new Map();
  private maxStoredErrors: number;
  private errorSequence = 0;

  constructor(options: ErrorHandlerOptions = {}) {
    this.logger = new Logger('ErrorHandler');
    this.maxStoredErrors = options.maxStoredErrors ?? 500;

    for (const category of Object.values(ErrorCategory)) {
      this.strategies.set(category, {
        ...DEFAULT_STRATEGIES[category],
        ...(options.strategies?.[category] ?? {})
      });
    }
  }

  /**
   * Record and log an error. Never throws.
   */
  handleError(error: unknown, context: ErrorContext = {}): MonitorError {
    let monitorError: MonitorError;

    if (error instanceof MonitoringError) {
      monitorError = { ...error.toJSON(), id: this.generateErrorId() };
    } else {
      const message = errorMessage(error);
      const category = context.category ?? this.categorizeError(message);
      monitorError = {
        id: this.generateErrorId(),
        timestamp: new Date(),
        category,
        severity: this.assessSeverity(category, message),
        component: context.component ?? 'unknown',
        message,
        retry_count: 0,
        max_retries: this.getStrategy(category).max_retries,
        recovered: false,
        ...(context.target !== undefined && { target: context.target }),
        ...(context.details !== undefined && { details: context.details }),
        ...(error instanceof Error && error.stack !== undefined && { stack_trace: error.stack })
      };
    }

    this.storeError(monitorError);
    this.logError(monitorError);
    this.updateComponentHealth(monitorError);

    return monitorError;
  }

  /**
   * Run an operation, retrying with exponential backoff per the category's
   * strategy. Resolves to null once retries are exhausted.
   */
  async executeWithRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T | null> {
    const strategy = this.getStrategy(options.category);
    let attempt = 0;

    for (;;) {
      try {
        const result = await operation();
        if (attempt > 0) {
          this.logger.info(`${options.description} succeeded after ${attempt} retr${attempt === 1 ? 'y' : 'ies'}`);
        }
        this.recordSuccess(options.component);
        return result;
      } catch (error) {
        if (attempt >= strategy.max_retries) {
          const failure = new MonitoringError(
            `${options.description} failed after ${attempt + 1} attempt(s): ${errorMessage(error)}`,
            options.category,
            ErrorSeverity.HIGH,
            options.component,
            undefined,
            { attempts: attempt + 1 }
          );
          this.handleError(failure);
          return null;
        }

        const delay = Math.min(
          strategy.retry_delay_ms * Math.pow(strategy.backoff_multiplier, attempt),
          strategy.max_delay_ms
        );
        attempt++;
        this.logger.warn(`${options.description} failed (attempt ${attempt}/${strategy.max_retries + 1}), retrying in ${delay}ms: ${errorMessage(error)}`);
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  /**
   * Mark a component as healthy again
   */
  recordSuccess(component: string): void {
    const health = this.componentHealth.get(component);
    if (health && health.status !== 'healthy') {
      this.logger.info(`Component ${component} recovered after ${health.consecutive_failures} failure(s)`);
      for (const error of this.errors.values()) {
        if (error.component === component) {
          error.recovered = true;
        }
      }
    }

    this.componentHealth.set(component, {
      component,
      status: 'healthy',
      last_success: new Date(),
      consecutive_failures: 0
    });
  }

  getStrategy(category: ErrorCategory): RetryStrategy {
    return this.strategies.get(category) ?? DEFAULT_STRATEGIES[category];
  }

  /**
   * Get current system health status
   */
  getSystemHealth(): SystemHealth {
    const activeErrors = Array.from(this.errors.values()).filter(error => !error.recovered);
    const componentHealthArray = Array.from(this.componentHealth.values()).map(health => ({ ...health }));

    let overallStatus: SystemHealth['overall_status'] = 'healthy';

    const criticalErrors = activeErrors.filter(e => e.severity === ErrorSeverity.CRITICAL);
    const failedComponents = componentHealthArray.filter(c => c.status === 'failed');

    if (criticalErrors.length > 0 || (componentHealthArray.length > 0 && failedComponents.length > componentHealthArray.length * 0.5)) {
      overallStatus = 'critical';
    } else if (activeErrors.some(e => e.severity !== ErrorSeverity.LOW) || failedComponents.length > 0) {
      overallStatus = 'degraded';
    }

    return {
      overall_status: overallStatus,
      component_health: componentHealthArray,
      active_errors: activeErrors,
      last_health_check: new Date()
    };
  }

  /**
   * Compact view of system health and error counts for health endpoints
   */
  getHealthSummary(): HealthSummary {
    const health = this.getSystemHealth();
    const stats = this.getErrorStatistics();
    return {
      status: health.overall_status,
      components: health.component_health,
      active_errors: stats.active_errors,
      recovered_errors: stats.recovered_errors,
      errors_by_category: stats.errors_by_category
    };
  }

  /**
   * Get error statistics
   */
  getErrorStatistics(): {
    total_errors: number;
    active_errors: number;
    recovered_errors: number;
    errors_by_category: Partial<Record<ErrorCategory, number>>;
    errors_by_severity: Partial<Record<ErrorSeverity, number>>;
  } {
    const allErrors = Array.from(this.errors.values());
    const errorsByCategory: Partial<Record<ErrorCategory, number>> = {};
    const errorsBySeverity: Partial<Record<ErrorSeverity, number>> = {};

    allErrors.forEach(error => {
      errorsByCategory[error.category] = (errorsByCategory[error.category] ?? 0) + 1;
      errorsBySeverity[error.severity] = (errorsBySeverity[error.severity] ?? 0) + 1;
    });

    return {
      total_errors: allErrors.length,
      active_errors: allErrors.filter(e => !e.recovered).length,
      recovered_errors: allErrors.filter(e => e.recovered).length,
      errors_by_category: errorsByCategory,
      errors_by_severity: errorsBySeverity
    };
  }

  /**
   * Clear old recovered errors (cleanup)
   */
  clearOldErrors(maxAge: number = 24 * 60 * 60 * 1000): number {
    const cutoffTime = new Date(Date.now() - maxAge);
    let clearedCount = 0;

    for (const [id, error] of this.errors) {
      if (error.recovered && error.timestamp < cutoffTime) {
        this.errors.delete(id);
        clearedCount++;
      }
    }

    if (clearedCount > 0) {
      this.logger.info(`Cleared ${clearedCount} old recovered errors`);
    }
    return clearedCount;
  }

  private storeError(error: MonitorError): void {
    this.errors.set(error.id, error);

    // Map preserves insertion order, so the first key is the oldest
    while (this.errors.size > this.maxStoredErrors) {
      const oldest = this.errors.keys().next();
      if (oldest.done) {
        break;
      }
      this.errors.delete(oldest.value);
    }
  }

  /**
   * Categorize error based on its message
   */
  private categorizeError(message: string): ErrorCategory {
    const lower = message.toLowerCase();

    if (lower.includes('sqlite') || lower.includes('database')) {
      return ErrorCategory.PERSISTENCE;
    }
    if (lower.includes('notification') || lower.includes('ntfy')) {
      return ErrorCategory.NOTIFICATION;
    }
    if (lower.includes('econnrefused') || lower.includes('enotfound') || lower.includes('socket')) {
      return ErrorCategory.TRANSPORT;
    }
    if (lower.includes('config') || lower.includes('validation')) {
      return ErrorCategory.CONFIGURATION;
    }

    return ErrorCategory.TEMPORARY_FAILURE;
  }

  private assessSeverity(category: ErrorCategory, message: string): ErrorSeverity {
    if (message.toLowerCase().includes('fatal')) {
      return ErrorSeverity.CRITICAL;
    }

    switch (category) {
      case ErrorCategory.PERSISTENCE:
      case ErrorCategory.CONFIGURATION:
        return ErrorSeverity.HIGH;
      case ErrorCategory.NOTIFICATION:
        return ErrorSeverity.MEDIUM;
      default:
        return ErrorSeverity.LOW;
    }
  }

  /**
   * Log error with appropriate level
   */
  private logError(error: MonitorError): void {
    const logMessage = `[${error.category}] ${error.component}: ${error.message}`;

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        this.logger.error(`CRITICAL ERROR - ${logMessage}`, error.details ?? {});
        break;
      case ErrorSeverity.HIGH:
        this.logger.error(`HIGH SEVERITY - ${logMessage}`, error.details ?? {});
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(`MEDIUM SEVERITY - ${logMessage}`, error.details ?? {});
        break;
      case ErrorSeverity.LOW:
        this.logger.info(`LOW SEVERITY - ${logMessage}`, error.details ?? {});
        break;
    }
  }

  private updateComponentHealth(error: MonitorError): void {
    const health = this.componentHealth.get(error.component) ?? {
      component: error.component,
      status: 'healthy',
      last_success: new Date(0),
      consecutive_failures: 0
    };

    health.consecutive_failures++;

    if (error.severity === ErrorSeverity.CRITICAL || health.consecutive_failures > 5) {
      health.status = 'failed';
    } else if (error.severity === ErrorSeverity.HIGH || health.consecutive_failures > 2) {
      health.status = 'degraded';
    }

    this.componentHealth.set(error.component, health);
  }

  private generateErrorId(): string {
    this.errorSequence++;
    return `error-${Date.now()}-${this.errorSequence}`;
  }
}
