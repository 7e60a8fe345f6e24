import { IncidentCause } from '../types';

/**
 * Outage cause from the boot identifiers on either side of the gap: a changed
 * identifier means the local host restarted, so power was lost.
 */
export function classifyCause(bootIdBefore: string | null, bootIdAfter: string | null): IncidentCause {
  if (!bootIdBefore || !bootIdAfter) {
    return 'UNKNOWN';
  }
  return bootIdBefore === bootIdAfter ? 'ISP_ISSUE' : 'POWER_CUT';
}

/**
 * The newer cause wins unless it is UNKNOWN
 */
export function mergeCause(current: IncidentCause, incoming: IncidentCause): IncidentCause {
  return incoming === 'UNKNOWN' ? current : incoming;
}
