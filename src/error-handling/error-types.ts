/**
 * Error types and classifications for monitoring failures
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  TRANSPORT = 'transport',
  MALFORMED_MESSAGE = 'malformed_message',
  CLOCK_ANOMALY = 'clock_anomaly',
  PERSISTENCE = 'persistence',
  NOTIFICATION = 'notification',
  CONFIGURATION = 'configuration',
  TEMPORARY_FAILURE = 'temporary_failure'
}

export interface MonitorError {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  component: string;
  target?: string;
  message: string;
  details?: Record<string, unknown>;
  stack_trace?: string;
  retry_count: number;
  max_retries: number;
  recovered: boolean;
}

export interface RetryStrategy {
  max_retries: number;
  retry_delay_ms: number;
  backoff_multiplier: number;
  max_delay_ms: number;
}

export interface SystemHealth {
  overall_status: 'healthy' | 'degraded' | 'critical';
  component_health: ComponentHealth[];
  active_errors: MonitorError[];
  last_health_check: Date;
}

export interface ComponentHealth {
  component: string;
  status: 'healthy' | 'degraded' | 'failed';
  last_success: Date;
  consecutive_failures: number;
}

export class MonitoringError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly component: string;
  public readonly target?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    component: string,
    target?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MonitoringError';
    this.category = category;
    this.severity = severity;
    this.component = component;
    if (target !== undefined) {
      this.target = target;
    }
    if (details !== undefined) {
      this.details = details;
    }
    this.timestamp = new Date();

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MonitoringError);
    }
  }

  toJSON(): MonitorError {
    return {
      id: this.generateId(),
      timestamp: this.timestamp,
      category: this.category,
      severity: this.severity,
      component: this.component,
      ...(this.target !== undefined && { target: this.target }),
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
      ...(this.stack !== undefined && { stack_trace: this.stack }),
      retry_count: 0,
      max_retries: 0,
      recovered: false
    };
  }

  private generateId(): string {
    return `${this.component}-${this.category}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }
}

/**
 * Raised when an inbound message fails validation
 */
export class MalformedMessageError extends MonitoringError {
  public readonly fieldErrors: string[];

  constructor(messageType: string, fieldErrors: string[]) {
    super(
      `Malformed ${messageType}: ${fieldErrors.join('; ')}`,
      ErrorCategory.MALFORMED_MESSAGE,
      ErrorSeverity.LOW,
      'MessageCodec',
      undefined,
      { messageType, fieldErrors }
    );
    this.name = 'MalformedMessageError';
    this.fieldErrors = fieldErrors;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
