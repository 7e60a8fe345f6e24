import { MonitoringError, ErrorCategory, ErrorSeverity } from '../error-handling';

/**
 * Reject if the promise has not settled within timeoutMs. The underlying
 * operation is abandoned, not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string, component: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new MonitoringError(
        `${operation} timed out after ${timeoutMs}ms`,
        ErrorCategory.TEMPORARY_FAILURE,
        ErrorSeverity.LOW,
        component,
        undefined,
        { timeout_ms: timeoutMs }
      ));
    }, timeoutMs);

    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
