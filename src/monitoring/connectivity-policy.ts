/**
 * Policies deciding whether a probe cycle counts as online
 */

import { OnlinePolicyName, ProbeResult } from '../types';

export type OnlinePolicy = (results: readonly ProbeResult[]) => boolean;

/**
 * Online if at least one target answered, whichever it was
 */
export const anyTargetReachable: OnlinePolicy = results => results.some(result => result.success);

/**
 * Online only if every target answered
 */
export const allTargetsReachable: OnlinePolicy = results =>
  results.length > 0 && results.every(result => result.success);

const POLICIES: Record<OnlinePolicyName, OnlinePolicy> = {
  any: anyTargetReachable,
  all: allTargetsReachable
};

export function resolveOnlinePolicy(name: OnlinePolicyName): OnlinePolicy {
  return POLICIES[name];
}

/**
 * Lowest latency among the targets that answered
 */
export function bestLatency(results: readonly ProbeResult[]): number | null {
  let best: number | null = null;
  for (const result of results) {
    if (result.success && result.latency_ms !== null && (best === null || result.latency_ms < best)) {
      best = result.latency_ms;
    }
  }
  return best;
}
