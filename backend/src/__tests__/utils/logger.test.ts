import {
  startLatencyTracking,
  endLatencyTracking,
  getLatencyStats,
  logApiRequest,
  logApiResponse,
  logAppEvent,
  logError,
  logger,
} from '../../utils/logger';

describe('Logger', () => {
  describe('Latency Tracking', () => {
    it('should track latency for an operation', () => {
      const metrics = startLatencyTracking('test_operation', { sessionId: 'test' });
      expect(metrics.operation).toBe('test_operation');
      expect(metrics.startTime).toBeDefined();

      const duration = endLatencyTracking(metrics);
      expect(duration).toBeGreaterThanOrEqual(0);
      expect(metrics.endTime).toBeDefined();
      expect(metrics.duration).toBe(duration);
    });

    it('should calculate latency statistics', () => {
      for (let i = 0; i < 5; i++) {
        endLatencyTracking(startLatencyTracking('stats_test'));
      }

      const stats = getLatencyStats('stats_test');
      expect(stats.count).toBe(5);
      expect(stats.avgMs).toBeGreaterThanOrEqual(0);
      expect(stats.minMs).toBeLessThanOrEqual(stats.maxMs);
      expect(stats.p50Ms).toBeLessThanOrEqual(stats.p95Ms);
    });

    it('should return empty stats for unknown operation', () => {
      expect(getLatencyStats('nonexistent_operation')).toEqual({
        count: 0, avgMs: 0, minMs: 0, maxMs: 0, p50Ms: 0, p95Ms: 0,
      });
    });
  });

  describe('Log Functions', () => {
    it('should not write to the console during tests', () => {
      expect(logger.transports.every((t) => t.silent === true)).toBe(true);
    });

    it('should tag entries with the service name', () => {
      expect(logger.defaultMeta).toEqual({ service: 'symptom-intake' });
    });

    it('should log API traffic without error', () => {
      expect(() => {
        logApiRequest({ method: 'GET', path: '/api/symptoms', ip: '127.0.0.1' });
        logApiResponse({ method: 'GET', path: '/api/symptoms', statusCode: 200, duration: 3 });
        logApiResponse({ method: 'GET', path: '/api/assessments/x', statusCode: 404, duration: 1 });
      }).not.toThrow();
    });

    it('should log app events and errors without error', () => {
      expect(() => {
        logAppEvent('Knowledge base loaded', { conditions: 12 });
        logError('Startup failed', new Error('boom'), { phase: 'test' });
      }).not.toThrow();
    });
  });
});
