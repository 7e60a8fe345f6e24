/**
 * Data storage for raw events and finalised incidents
 * Provides append-only history with SQLite backend
 */

import sqlite3 from 'sqlite3';
import { Database } from 'sqlite3';
import { promises as fs } from 'fs';
import path from 'path';
import { Incident, IncidentCause, IncidentKind, Logger, RawEvent, RawEventRef } from '../types';
import { decodeSpeedTestResult, encodeSpeedTestResult } from '../protocol/message-codec';

export const DATABASE_FILE = 'uplink_watch.db';

/**
 * Persistence seen by the remote tracker
 */
export interface IncidentSink {
  recordRawEvent(event: RawEvent): Promise<void>;
  recordIncident(incident: Incident): Promise<void>;
  getRecentIncidents(limit?: number): Promise<Incident[]>;
  cleanupOldData(now?: Date): Promise<number>;
}

interface IncidentRow {
  id: string;
  kind: string;
  cause: string;
  started_at: number;
  ended_at: number | null;
  downtime_seconds: number;
  resolved_at: number | null;
  retest_result: string | null;
}

interface IncidentEventRow {
  incident_id: string;
  event_id: string;
  event_type: string;
  timestamp: number;
  downtime_seconds: number;
  amends_event_id: string | null;
}

interface CountRow {
  count: number;
}

const INCIDENT_KINDS: readonly IncidentKind[] = ['OUTAGE', 'SLOW_SPEED'];
const INCIDENT_CAUSES: readonly IncidentCause[] = ['POWER_CUT', 'ISP_ISSUE', 'UNKNOWN'];
const RAW_EVENT_TYPES: readonly RawEventRef['type'][] = [
  'outage-detected',
  'outage-resolved',
  'outage-amended',
  'speed-test-result'
];

function pick<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  return allowed.find(candidate => candidate === value) ?? fallback;
}

function toDate(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}

export class DataStore implements IncidentSink {
  private db: Database | null = null;
  private dbPath: string;

  constructor(
    private logger: Logger,
    private dataDir: string = './data',
    private retentionDays: number = 365
  ) {
    this.dbPath = path.join(dataDir, DATABASE_FILE);
  }

  getPath(): string {
    return this.dbPath;
  }

  /**
   * Initialize the database connection and create tables
   */
  async initialize(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });

    await new Promise<void>((resolve, reject) => {
      const db = new sqlite3.Database(this.dbPath, (err) => {
        if (err) {
          this.logger.error('Failed to open database:', err.message);
          reject(err);
          return;
        }
        this.db = db;
        resolve();
      });
    });

    this.logger.info('Connected to SQLite database');
    await this.createTables();
    this.logger.info('Database initialized successfully');
  }

  private async createTables(): Promise<void> {
    const statements = [
      `CREATE TABLE IF NOT EXISTS raw_events (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        source TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        payload TEXT NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS incidents (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        cause TEXT NOT NULL,
        started_at INTEGER NOT NULL,
        ended_at INTEGER,
        downtime_seconds REAL NOT NULL,
        resolved_at INTEGER,
        retest_result TEXT,
        finalized_at INTEGER DEFAULT (strftime('%s', 'now') * 1000)
      )`,
      `CREATE TABLE IF NOT EXISTS incident_events (
        incident_id TEXT NOT NULL,
        event_id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        downtime_seconds REAL NOT NULL,
        amends_event_id TEXT,
        PRIMARY KEY (incident_id, event_id)
      )`,
      'CREATE INDEX IF NOT EXISTS idx_raw_events_timestamp ON raw_events(timestamp)',
      'CREATE INDEX IF NOT EXISTS idx_incidents_started_at ON incidents(started_at)'
    ];

    for (const sql of statements) {
      await this.run(sql);
    }
  }

  /**
   * Append a raw event. Re-recording the same event id is a no-op.
   */
  async recordRawEvent(event: RawEvent): Promise<void> {
    const payload = event.type === 'speed-test-result'
      ? { ...event, result: encodeSpeedTestResult(event.result) }
      : event;

    await this.run(
      'INSERT OR IGNORE INTO raw_events (id, type, source, timestamp, payload) VALUES (?, ?, ?, ?, ?)',
      [event.id, event.type, event.source, event.timestamp.getTime(), JSON.stringify(payload)]
    );
  }

  /**
   * Store a finalised incident together with its raw event references
   */
  async recordIncident(incident: Incident): Promise<void> {
    await this.run(
      `INSERT OR REPLACE INTO incidents (
        id, kind, cause, started_at, ended_at, downtime_seconds, resolved_at, retest_result
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        incident.id,
        incident.kind,
        incident.cause,
        incident.started_at.getTime(),
        incident.ended_at ? incident.ended_at.getTime() : null,
        incident.downtime_seconds,
        incident.resolved_at ? incident.resolved_at.getTime() : null,
        incident.retest_result ? JSON.stringify(encodeSpeedTestResult(incident.retest_result)) : null
      ]
    );

    for (const ref of incident.raw_events) {
      await this.run(
        `INSERT OR REPLACE INTO incident_events (
          incident_id, event_id, event_type, timestamp, downtime_seconds, amends_event_id
        ) VALUES (?, ?, ?, ?, ?, ?)`,
        [incident.id, ref.event_id, ref.type, ref.timestamp.getTime(), ref.downtime_seconds, ref.amends_event_id ?? null]
      );
    }

    this.logger.debug(`Stored incident ${incident.id} with ${incident.raw_events.length} raw event(s)`);
  }

  /**
   * Most recent finalised incidents, newest first
   */
  async getRecentIncidents(limit: number = 50): Promise<Incident[]> {
    const rows = await this.all<IncidentRow>(
      `SELECT id, kind, cause, started_at, ended_at, downtime_seconds, resolved_at, retest_result
       FROM incidents
       ORDER BY started_at DESC
       LIMIT ?`,
      [limit]
    );
    if (rows.length === 0) {
      return [];
    }

    const placeholders = rows.map(() => '?').join(', ');
    const eventRows = await this.all<IncidentEventRow>(
      `SELECT incident_id, event_id, event_type, timestamp, downtime_seconds, amends_event_id
       FROM incident_events
       WHERE incident_id IN (${placeholders})
       ORDER BY timestamp ASC, rowid ASC`,
      rows.map(row => row.id)
    );

    return rows.map(row => this.toIncident(row, eventRows.filter(event => event.incident_id === row.id)));
  }

  /**
   * Delete rows older than the retention period. Returns the number of deleted incidents and events.
   */
  async cleanupOldData(now: Date = new Date()): Promise<number> {
    const cutoff = now.getTime() - this.retentionDays * 24 * 60 * 60 * 1000;

    const events = await this.run('DELETE FROM raw_events WHERE timestamp < ?', [cutoff]);
    await this.run(
      'DELETE FROM incident_events WHERE incident_id IN (SELECT id FROM incidents WHERE started_at < ?)',
      [cutoff]
    );
    const incidents = await this.run('DELETE FROM incidents WHERE started_at < ?', [cutoff]);

    const deleted = events + incidents;
    if (deleted > 0) {
      this.logger.info(`Cleaned up ${deleted} rows older than ${this.retentionDays} days`);
    }
    return deleted;
  }

  async getStats(): Promise<{ raw_event_count: number; incident_count: number }> {
    const [events] = await this.all<CountRow>('SELECT COUNT(*) AS count FROM raw_events');
    const [incidents] = await this.all<CountRow>('SELECT COUNT(*) AS count FROM incidents');

    return {
      raw_event_count: events?.count ?? 0,
      incident_count: incidents?.count ?? 0
    };
  }

  /**
   * Close the database connection
   */
  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close((err) => {
        if (err) {
          this.logger.error('Failed to close database:', err.message);
          reject(err);
          return;
        }

        this.logger.info('Database connection closed');
        this.db = null;
        resolve();
      });
    });
  }

  private toIncident(row: IncidentRow, events: IncidentEventRow[]): Incident {
    return {
      id: row.id,
      kind: pick(row.kind, INCIDENT_KINDS, 'OUTAGE'),
      cause: pick(row.cause, INCIDENT_CAUSES, 'UNKNOWN'),
      started_at: new Date(row.started_at),
      ended_at: toDate(row.ended_at),
      downtime_seconds: row.downtime_seconds,
      raw_events: events.map(event => ({
        event_id: event.event_id,
        type: pick(event.event_type, RAW_EVENT_TYPES, 'outage-detected'),
        timestamp: new Date(event.timestamp),
        downtime_seconds: event.downtime_seconds,
        ...(event.amends_event_id !== null && { amends_event_id: event.amends_event_id })
      })),
      retest_result: row.retest_result ? decodeSpeedTestResult(JSON.parse(row.retest_result)) : null,
      resolved_at: toDate(row.resolved_at),
      final: true
    };
  }

  /**
   * Resolves to the number of changed rows
   */
  private run(sql: string, params: unknown[] = []): Promise<number> {
    return new Promise((resolve, reject) => {
      if (!this.db) {
        reject(new Error('Database not initialized'));
        return;
      }

      this.db.run(sql, params, function (err) {
        if (err) {
          reject(err);
          return;
        }
        resolve(this.changes);
      });
    });
  }

  private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      if (!this.db) {
        reject(new Error('Database not initialized'));
        return;
      }

      this.db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(rows);
      });
    });
  }
}
