/**
 * Incident aggregation
 *
 * Folds raw events into human-facing incidents. A function of the events
 * alone: the only notion of time is the timestamps they carry, or the time
 * passed to finalizeExpired.
 */

import { randomUUID } from 'crypto';
import {
  Incident,
  IncidentKind,
  OutageAmendedEvent,
  OutageDetectedEvent,
  OutageResolvedEvent,
  RawEvent,
  RawEventRef,
  SpeedTestEvent
} from '../types';
import { Logger } from '../utils/logger';
import { mergeCause } from './cause-classifier';

export type AggregatorEffectType =
  | 'incident-opened'
  | 'incident-updated'
  | 'incident-reopened'
  | 'incident-resolved'
  | 'incident-finalized';

export interface AggregatorEffect {
  type: AggregatorEffectType;
  incident: Incident;
}

export interface IncidentAggregatorOptions {
  mergeWindowMinutes?: number;
  generateId?: () => string;
}

function copyIncident(incident: Incident): Incident {
  return {
    ...incident,
    raw_events: incident.raw_events.map(ref => ({ ...ref }))
  };
}

export class IncidentAggregator {
  private logger = new Logger('IncidentAggregator');
  private readonly mergeWindowMs: number;
  private generateId: () => string;
  private incidents: Incident[] = [];
  private lastObservation = new Map<string, Date>();

  constructor(options: IncidentAggregatorOptions = {}) {
    this.mergeWindowMs = (options.mergeWindowMinutes ?? 30) * 60 * 1000;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Apply one raw event. Incidents that have aged out relative to the
   * event's timestamp are finalised first.
   */
  apply(event: RawEvent): AggregatorEffect[] {
    const effects = this.finalizeExpired(event.timestamp);

    switch (event.type) {
      case 'outage-detected':
        effects.push(...this.applyDetected(event));
        break;
      case 'outage-resolved':
        effects.push(...this.applyResolved(event));
        break;
      case 'outage-amended':
        effects.push(...this.applyAmended(event));
        break;
      case 'speed-test-result':
        effects.push(...this.applySpeedTest(event));
        break;
    }

    return effects;
  }

  /**
   * Finalise closed incidents whose end lies more than one merge window before now
   */
  finalizeExpired(now: Date): AggregatorEffect[] {
    const effects: AggregatorEffect[] = [];

    this.incidents = this.incidents.filter(incident => {
      if (incident.ended_at === null || now.getTime() - incident.ended_at.getTime() <= this.mergeWindowMs) {
        return true;
      }
      incident.final = true;
      this.lastObservation.delete(incident.id);
      this.logger.info(`Incident ${incident.id} (${incident.kind}, ${incident.cause}) finalised with ${incident.downtime_seconds}s downtime`);
      effects.push({ type: 'incident-finalized', incident: copyIncident(incident) });
      return false;
    });

    return effects;
  }

  getOpenIncidents(): Incident[] {
    return this.incidents.map(copyIncident);
  }

  private applyDetected(event: OutageDetectedEvent): AggregatorEffect[] {
    const ref = this.refFor(event, 0);
    const incident = this.findJoinable('OUTAGE', event.started_at);

    if (!incident) {
      return [this.open('OUTAGE', event.started_at, ref)];
    }

    incident.raw_events.push(ref);
    if (incident.ended_at === null) {
      return [this.effect('incident-updated', incident)];
    }

    incident.ended_at = null;
    incident.resolved_at = null;
    this.logger.info(`Incident ${incident.id} re-opened by outage starting ${event.started_at.toISOString()}`);
    return [this.effect('incident-reopened', incident)];
  }

  private applyResolved(event: OutageResolvedEvent): AggregatorEffect[] {
    const ref = this.refFor(event, event.downtime_seconds);
    const incident = this.findJoinable('OUTAGE', event.started_at);

    if (!incident) {
      const opened = this.open('OUTAGE', event.started_at, ref);
      const created = this.find(opened.incident.id);
      if (!created) {
        return [opened];
      }
      created.cause = event.cause;
      created.downtime_seconds = event.downtime_seconds;
      created.ended_at = event.ended_at;
      created.resolved_at = event.timestamp;
      return [this.effect('incident-opened', created), this.effect('incident-resolved', created)];
    }

    const wasOpen = incident.ended_at === null;
    incident.raw_events.push(ref);
    incident.downtime_seconds += event.downtime_seconds;
    incident.cause = mergeCause(incident.cause, event.cause);
    if (event.started_at.getTime() < incident.started_at.getTime()) {
      incident.started_at = event.started_at;
    }

    // A local-only report never closes an outage the remote side still observes
    if (wasOpen && event.source === 'local') {
      return [this.effect('incident-updated', incident)];
    }

    if (incident.ended_at === null || event.ended_at.getTime() > incident.ended_at.getTime()) {
      incident.ended_at = event.ended_at;
    }
    incident.resolved_at = event.timestamp;

    return [this.effect(wasOpen ? 'incident-resolved' : 'incident-updated', incident)];
  }

  private applyAmended(event: OutageAmendedEvent): AggregatorEffect[] {
    const incident = this.incidents.find(candidate =>
      candidate.raw_events.some(ref => ref.event_id === event.amends_event_id)
    );
    if (!incident) {
      this.logger.warn(`Amendment ${event.id} refers to unknown or final event ${event.amends_event_id}, ignoring`);
      return [];
    }

    // The amendment replaces the amended event's contribution and any earlier amendment of it
    for (const ref of incident.raw_events) {
      if (ref.event_id === event.amends_event_id || ref.amends_event_id === event.amends_event_id) {
        incident.downtime_seconds -= ref.downtime_seconds;
        ref.downtime_seconds = 0;
      }
    }

    incident.raw_events.push({ ...this.refFor(event, event.downtime_seconds), amends_event_id: event.amends_event_id });
    incident.downtime_seconds += event.downtime_seconds;
    incident.cause = mergeCause(incident.cause, event.cause);

    return [this.effect('incident-updated', incident)];
  }

  private applySpeedTest(event: SpeedTestEvent): AggregatorEffect[] {
    const result = event.result;
    const observedAt = result.timestamp;
    const incident = this.findJoinable('SLOW_SPEED', observedAt);

    if (result.passed) {
      if (!incident || incident.ended_at !== null) {
        return [];
      }

      const contribution = this.sinceLastObservation(incident, observedAt);
      incident.raw_events.push(this.refFor(event, contribution));
      incident.downtime_seconds += contribution;
      incident.retest_result = result;
      incident.ended_at = observedAt;
      incident.resolved_at = event.timestamp;
      this.lastObservation.set(incident.id, observedAt);
      this.logger.info(`Slow-speed incident ${incident.id} resolved by passing retest (${result.download_mbps} Mbps)`);
      return [this.effect('incident-resolved', incident)];
    }

    if (!incident) {
      const opened = this.open('SLOW_SPEED', observedAt, this.refFor(event, 0));
      const created = this.find(opened.incident.id);
      if (created) {
        created.cause = 'ISP_ISSUE';
        created.retest_result = result;
        this.lastObservation.set(created.id, observedAt);
        return [this.effect('incident-opened', created)];
      }
      return [opened];
    }

    if (incident.ended_at !== null) {
      incident.ended_at = null;
      incident.resolved_at = null;
      incident.raw_events.push(this.refFor(event, 0));
      incident.retest_result = result;
      this.lastObservation.set(incident.id, observedAt);
      return [this.effect('incident-reopened', incident)];
    }

    const contribution = this.sinceLastObservation(incident, observedAt);
    incident.raw_events.push(this.refFor(event, contribution));
    incident.downtime_seconds += contribution;
    incident.retest_result = result;
    this.lastObservation.set(incident.id, observedAt);
    return [this.effect('incident-updated', incident)];
  }

  /**
   * Most recent non-final incident of the kind that is still open or ended
   * within the merge window of the given start
   */
  private findJoinable(kind: IncidentKind, start: Date): Incident | null {
    let latest: Incident | null = null;
    for (const incident of this.incidents) {
      if (incident.kind === kind && (!latest || incident.started_at.getTime() >= latest.started_at.getTime())) {
        latest = incident;
      }
    }

    if (!latest) {
      return null;
    }
    if (latest.ended_at === null || start.getTime() - latest.ended_at.getTime() <= this.mergeWindowMs) {
      return latest;
    }
    return null;
  }

  private open(kind: IncidentKind, startedAt: Date, ref: RawEventRef): AggregatorEffect {
    const incident: Incident = {
      id: this.generateId(),
      kind,
      cause: 'UNKNOWN',
      started_at: startedAt,
      ended_at: null,
      downtime_seconds: ref.downtime_seconds,
      raw_events: [ref],
      retest_result: null,
      resolved_at: null,
      final: false
    };
    this.incidents.push(incident);
    this.logger.info(`Incident ${incident.id} (${kind}) opened at ${startedAt.toISOString()}`);
    return this.effect('incident-opened', incident);
  }

  private find(id: string): Incident | undefined {
    return this.incidents.find(incident => incident.id === id);
  }

  private sinceLastObservation(incident: Incident, observedAt: Date): number {
    const previous = this.lastObservation.get(incident.id) ?? incident.started_at;
    return Math.max(0, (observedAt.getTime() - previous.getTime()) / 1000);
  }

  private refFor(event: RawEvent, downtime: number): RawEventRef {
    return {
      event_id: event.id,
      type: event.type,
      timestamp: event.timestamp,
      downtime_seconds: downtime
    };
  }

  private effect(type: AggregatorEffectType, incident: Incident): AggregatorEffect {
    return { type, incident: copyIncident(incident) };
  }
}
