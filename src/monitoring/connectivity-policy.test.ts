import { anyTargetReachable, allTargetsReachable, resolveOnlinePolicy, bestLatency } from './connectivity-policy';
import { LatencyWindow } from './latency-window';
import { ProbeResult } from '../types';

function result(success: boolean, latency: number | null = success ? 10 : null): ProbeResult {
  return {
    timestamp: new Date('2024-01-01T00:00:00Z'),
    target_name: 'target',
    target_address: '192.0.2.1',
    success,
    latency_ms: latency
  };
}

describe('online policies', () => {
  it('any policy needs one success', () => {
    expect(anyTargetReachable([result(false), result(true)])).toBe(true);
    expect(anyTargetReachable([result(false), result(false)])).toBe(false);
    expect(anyTargetReachable([])).toBe(false);
  });

  it('all policy needs every target', () => {
    expect(allTargetsReachable([result(true), result(true)])).toBe(true);
    expect(allTargetsReachable([result(true), result(false)])).toBe(false);
    expect(allTargetsReachable([])).toBe(false);
  });

  it('should resolve policies by name', () => {
    expect(resolveOnlinePolicy('any')).toBe(anyTargetReachable);
    expect(resolveOnlinePolicy('all')).toBe(allTargetsReachable);
  });

  it('should pick the lowest latency of successful probes', () => {
    expect(bestLatency([result(true, 40), result(true, 25), result(false)])).toBe(25);
    expect(bestLatency([result(true, null), result(false)])).toBeNull();
  });
});

describe('LatencyWindow', () => {
  it('should keep only the most recent samples', () => {
    const window = new LatencyWindow(3);
    [10, 20, 30, 40].forEach(sample => window.add(sample));

    expect(window.values()).toEqual([20, 30, 40]);
    expect(window.average()).toBe(30);
    expect(window.length).toBe(3);
  });

  it('should report no average when empty', () => {
    const window = new LatencyWindow(2);
    window.add(5);
    window.clear();
    expect(window.average()).toBeNull();
  });

  it('should reject a non-positive size', () => {
    expect(() => new LatencyWindow(0)).toThrow(RangeError);
  });
});
