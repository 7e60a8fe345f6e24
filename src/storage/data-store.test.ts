/**
 * Tests for DataStore class
 */

import { DataStore } from './data-store';
import { Incident, Logger, OutageResolvedEvent, SpeedTestEvent } from '../types';
import fs from 'fs';
import os from 'os';
import path from 'path';

// Mock logger for testing
const mockLogger: Logger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn()
};

function incident(id: string, startedAt: string, overrides: Partial<Incident> = {}): Incident {
  const started = new Date(startedAt);
  return {
    id,
    kind: 'OUTAGE',
    cause: 'ISP_ISSUE',
    started_at: started,
    ended_at: new Date(started.getTime() + 120000),
    downtime_seconds: 120,
    raw_events: [
      { event_id: `${id}-d`, type: 'outage-detected', timestamp: started, downtime_seconds: 0 },
      { event_id: `${id}-r`, type: 'outage-resolved', timestamp: new Date(started.getTime() + 120000), downtime_seconds: 120 }
    ],
    retest_result: null,
    resolved_at: new Date(started.getTime() + 120000),
    final: true,
    ...overrides
  };
}

describe('DataStore', () => {
  let dataStore: DataStore;
  let testDataDir: string;

  beforeEach(async () => {
    testDataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uplink-watch-db-'));
    dataStore = new DataStore(mockLogger, testDataDir, 30);
    await dataStore.initialize();
  });

  afterEach(async () => {
    await dataStore.close();
    fs.rmSync(testDataDir, { recursive: true, force: true });
  });

  describe('Database Initialization', () => {
    it('should create the database file with empty tables', async () => {
      expect(fs.existsSync(path.join(testDataDir, 'uplink_watch.db'))).toBe(true);
      expect(await dataStore.getStats()).toEqual({ raw_event_count: 0, incident_count: 0 });
      expect(mockLogger.info).toHaveBeenCalledWith('Database initialized successfully');
    });
  });

  describe('Raw events', () => {
    const resolved: OutageResolvedEvent = {
      id: 'event-1',
      type: 'outage-resolved',
      timestamp: new Date('2024-06-01T10:02:00.000Z'),
      source: 'remote',
      started_at: new Date('2024-06-01T10:00:00.000Z'),
      ended_at: new Date('2024-06-01T10:02:00.000Z'),
      downtime_seconds: 120,
      cause: 'ISP_ISSUE',
      affected_targets: []
    };

    it('should append raw events once per id', async () => {
      await dataStore.recordRawEvent(resolved);
      await dataStore.recordRawEvent(resolved);

      expect((await dataStore.getStats()).raw_event_count).toBe(1);
    });

    it('should store speed test events', async () => {
      const event: SpeedTestEvent = {
        id: 'event-2',
        type: 'speed-test-result',
        timestamp: new Date('2024-06-01T11:00:00.000Z'),
        source: 'local',
        result: {
          timestamp: new Date('2024-06-01T11:00:00.000Z'),
          download_mbps: 20,
          upload_mbps: 5,
          latency_ms: 30,
          passed: false,
          trigger: 'scheduled',
          duration_seconds: 6,
          bytes_transferred: 1000
        }
      };

      await dataStore.recordRawEvent(event);

      expect((await dataStore.getStats()).raw_event_count).toBe(1);
    });
  });

  describe('Incidents', () => {
    it('should round-trip a finalised incident with its raw event references', async () => {
      const stored = incident('incident-1', '2024-06-01T10:00:00.000Z');

      await dataStore.recordIncident(stored);

      expect(await dataStore.getRecentIncidents()).toEqual([stored]);
    });

    it('should keep amendment references and retest results', async () => {
      const stored = incident('incident-1', '2024-06-01T10:00:00.000Z', {
        kind: 'SLOW_SPEED',
        raw_events: [
          {
            event_id: 'amend-1',
            type: 'outage-amended',
            timestamp: new Date('2024-06-01T10:03:00.000Z'),
            downtime_seconds: 150,
            amends_event_id: 'incident-1-r'
          }
        ],
        retest_result: {
          timestamp: new Date('2024-06-01T10:02:00.000Z'),
          download_mbps: 95.5,
          upload_mbps: null,
          latency_ms: 12,
          passed: true,
          trigger: 'slow_speed_retest',
          duration_seconds: 4,
          bytes_transferred: 5000
        }
      });

      await dataStore.recordIncident(stored);

      const [loaded] = await dataStore.getRecentIncidents();
      expect(loaded.raw_events).toEqual(stored.raw_events);
      expect(loaded.retest_result).toEqual(stored.retest_result);
      expect(loaded.kind).toBe('SLOW_SPEED');
    });

    it('should return the newest incidents first and honour the limit', async () => {
      await dataStore.recordIncident(incident('incident-1', '2024-06-01T10:00:00.000Z'));
      await dataStore.recordIncident(incident('incident-2', '2024-06-02T10:00:00.000Z'));
      await dataStore.recordIncident(incident('incident-3', '2024-06-03T10:00:00.000Z'));

      const recent = await dataStore.getRecentIncidents(2);

      expect(recent.map(item => item.id)).toEqual(['incident-3', 'incident-2']);
    });
  });

  describe('Data Cleanup', () => {
    it('should delete rows older than the retention period', async () => {
      await dataStore.recordIncident(incident('old', '2024-01-01T00:00:00.000Z'));
      await dataStore.recordIncident(incident('recent', '2024-06-01T00:00:00.000Z'));

      const deleted = await dataStore.cleanupOldData(new Date('2024-06-10T00:00:00.000Z'));

      expect(deleted).toBe(1);
      expect((await dataStore.getRecentIncidents()).map(item => item.id)).toEqual(['recent']);
    });
  });

  it('should reject writes before initialisation', async () => {
    const closed = new DataStore(mockLogger, testDataDir);

    await expect(closed.recordRawEvent({
      id: 'event-1',
      type: 'outage-detected',
      timestamp: new Date(),
      source: 'remote',
      started_at: new Date()
    })).rejects.toThrow('Database not initialized');
  });
});
