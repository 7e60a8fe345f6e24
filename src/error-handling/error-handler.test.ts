/**
 * Tests for ErrorHandler
 */

import { ErrorHandler, ErrorCategory, ErrorSeverity, MalformedMessageError } from './index';

describe('ErrorHandler', () => {
  let errorHandler: ErrorHandler;

  beforeEach(() => {
    errorHandler = new ErrorHandler({
      strategies: {
        [ErrorCategory.PERSISTENCE]: { retry_delay_ms: 0, max_retries: 2 }
      }
    });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('handleError', () => {
    it('should categorize plain errors from their message', () => {
      const recorded = errorHandler.handleError(new Error('SQLITE_BUSY: database is locked'), { component: 'DataStore' });

      expect(recorded.category).toBe(ErrorCategory.PERSISTENCE);
      expect(recorded.severity).toBe(ErrorSeverity.HIGH);
      expect(recorded.component).toBe('DataStore');
      expect(recorded.max_retries).toBe(2);
      expect(recorded.stack_trace).toBeDefined();
    });

    it('should prefer the category given in the context', () => {
      const recorded = errorHandler.handleError('Discarded liveness signal', {
        component: 'RemoteTracker',
        category: ErrorCategory.CLOCK_ANOMALY
      });

      expect(recorded.category).toBe(ErrorCategory.CLOCK_ANOMALY);
      expect(recorded.severity).toBe(ErrorSeverity.LOW);
    });

    it('should keep the classification of a MonitoringError', () => {
      const recorded = errorHandler.handleError(new MalformedMessageError('heartbeat', ['boot_id: must be a non-empty string']));

      expect(recorded.category).toBe(ErrorCategory.MALFORMED_MESSAGE);
      expect(recorded.severity).toBe(ErrorSeverity.LOW);
      expect(recorded.component).toBe('MessageCodec');
      expect(recorded.message).toBe('Malformed heartbeat: boot_id: must be a non-empty string');
      expect(recorded.id).toMatch(/^error-/);
    });

    it('should report critical health for fatal failures', () => {
      const recorded = errorHandler.handleError(new Error('fatal: cannot bind port'), { component: 'RemoteAPIServer' });

      expect(recorded.severity).toBe(ErrorSeverity.CRITICAL);
      expect(errorHandler.getSystemHealth().overall_status).toBe('critical');
    });

    it('should degrade a component after repeated failures', () => {
      for (let i = 0; i < 3; i++) {
        errorHandler.handleError(new Error('probe timeout'), { component: 'Prober' });
      }

      const health = errorHandler.getSystemHealth().component_health.find(entry => entry.component === 'Prober');
      expect(health).toEqual(expect.objectContaining({ status: 'degraded', consecutive_failures: 3 }));
    });

    it('should bound the number of stored errors', () => {
      errorHandler = new ErrorHandler({ maxStoredErrors: 2 });

      errorHandler.handleError('first');
      errorHandler.handleError('second');
      errorHandler.handleError('third');

      expect(errorHandler.getErrorStatistics().total_errors).toBe(2);
    });
  });

  describe('executeWithRetry', () => {
    const options = { category: ErrorCategory.PERSISTENCE, component: 'DataStore', description: 'Store incident inc-1' };

    it('should return the result once a retry succeeds', async () => {
      const operation = jest.fn<Promise<string>, []>()
        .mockRejectedValueOnce(new Error('busy'))
        .mockResolvedValueOnce('ok');

      const result = await errorHandler.executeWithRetry(operation, options);

      expect(result).toBe('ok');
      expect(operation).toHaveBeenCalledTimes(2);
      expect(errorHandler.getErrorStatistics().total_errors).toBe(0);
    });

    it('should return null and record one error once retries are exhausted', async () => {
      const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('disk full'));

      const result = await errorHandler.executeWithRetry(operation, options);

      expect(result).toBeNull();
      expect(operation).toHaveBeenCalledTimes(3);

      const health = errorHandler.getSystemHealth();
      expect(health.active_errors.map(error => error.message)).toEqual([
        'Store incident inc-1 failed after 3 attempt(s): disk full'
      ]);
      expect(errorHandler.getErrorStatistics().errors_by_category[ErrorCategory.PERSISTENCE]).toBe(1);
    });

    it('should not retry categories without a retry budget', async () => {
      const operation = jest.fn<Promise<void>, []>().mockRejectedValue(new Error('connection refused'));

      const result = await errorHandler.executeWithRetry(operation, {
        category: ErrorCategory.TRANSPORT,
        component: 'Transport',
        description: 'Send heartbeat'
      });

      expect(result).toBeNull();
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('getHealthSummary', () => {
    it('should summarise status, components and error counts', () => {
      errorHandler.handleError(new MalformedMessageError('heartbeat', ['sent_at: must be an ISO timestamp']));
      errorHandler.handleError(new Error('database is locked'), { component: 'DataStore' });
      errorHandler.recordSuccess('DataStore');

      const summary = errorHandler.getHealthSummary();

      expect(summary.status).toBe('healthy');
      expect(summary.active_errors).toBe(1);
      expect(summary.recovered_errors).toBe(1);
      expect(summary.errors_by_category).toEqual({
        [ErrorCategory.MALFORMED_MESSAGE]: 1,
        [ErrorCategory.PERSISTENCE]: 1
      });
      expect(summary.components.map(component => component.component).sort()).toEqual(['DataStore', 'MessageCodec']);
    });
  });

  describe('recovery', () => {
    it('should mark errors recovered when the component succeeds again', () => {
      errorHandler.handleError(new Error('database is locked'), { component: 'DataStore' });
      expect(errorHandler.getSystemHealth().overall_status).toBe('degraded');

      errorHandler.recordSuccess('DataStore');

      const stats = errorHandler.getErrorStatistics();
      expect(stats.recovered_errors).toBe(1);
      expect(stats.active_errors).toBe(0);
      expect(errorHandler.getSystemHealth().overall_status).toBe('healthy');
    });

    it('should clear recovered errors older than the given age', () => {
      jest.useFakeTimers({ now: new Date('2024-06-01T00:00:00Z') });
      errorHandler.handleError(new Error('database is locked'), { component: 'DataStore' });
      errorHandler.recordSuccess('DataStore');

      jest.setSystemTime(new Date('2024-06-02T01:00:00Z'));

      expect(errorHandler.clearOldErrors()).toBe(1);
      expect(errorHandler.getErrorStatistics().total_errors).toBe(0);
    });
  });
});
