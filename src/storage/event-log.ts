/**
 * Daily CSV event log kept by the local monitor
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../utils/logger';
import { formatLocalDate, formatLocalDateTime } from '../utils/format';
import { errorMessage } from '../error-handling';

export const EVENT_LOG_HEADER = 'timestamp,datetime,event_type,details';

export type LocalEventType =
  | 'monitor_start'
  | 'monitor_stop'
  | 'outage_start'
  | 'outage_end'
  | 'high_latency'
  | 'latency_recovered'
  | 'speed_test'
  | 'speed_test_failed'
  | 'slow_speed_start'
  | 'slow_speed_end';

const LOG_FILE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})\.csv$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatEventRow(eventType: LocalEventType, details: Record<string, unknown>, timestamp: Date): string {
  return [
    (timestamp.getTime() / 1000).toFixed(3),
    formatLocalDateTime(timestamp),
    eventType,
    escapeCsvField(JSON.stringify(details))
  ].join(',');
}

export class EventLog {
  private logger = new Logger('EventLog');
  private writeQueue: Promise<void> = Promise.resolve();
  private lastCleanupDate: string | null = null;

  constructor(private directory: string, private retentionDays: number) {}

  /**
   * Append one event to the file for the event's local date. Write failures
   * are logged and never propagate.
   */
  log(eventType: LocalEventType, details: Record<string, unknown> = {}, timestamp: Date = new Date()): Promise<void> {
    this.writeQueue = this.writeQueue.then(() => this.append(eventType, details, timestamp));
    return this.writeQueue;
  }

  filePathFor(date: Date): string {
    return path.join(this.directory, `${formatLocalDate(date)}.csv`);
  }

  /**
   * Delete daily files older than the retention period
   */
  async cleanup(now: Date = new Date()): Promise<number> {
    const cutoff = startOfLocalDay(now).getTime() - this.retentionDays * DAY_MS;
    let removed = 0;

    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      this.logger.warn(`Cannot list event log directory ${this.directory}: ${errorMessage(error)}`);
      return 0;
    }

    for (const entry of entries) {
      const match = LOG_FILE_PATTERN.exec(entry);
      if (!match) {
        continue;
      }

      const fileDate = new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
      if (fileDate.getTime() < cutoff) {
        try {
          await fs.unlink(path.join(this.directory, entry));
          removed++;
        } catch (error) {
          this.logger.warn(`Failed to delete old event log ${entry}: ${errorMessage(error)}`);
        }
      }
    }

    if (removed > 0) {
      this.logger.info(`Removed ${removed} event log file(s) older than ${this.retentionDays} days`);
    }
    return removed;
  }

  private async append(eventType: LocalEventType, details: Record<string, unknown>, timestamp: Date): Promise<void> {
    const filePath = this.filePathFor(timestamp);

    try {
      await fs.mkdir(this.directory, { recursive: true });

      let content = formatEventRow(eventType, details, timestamp) + '\n';
      if (!(await this.fileExists(filePath))) {
        content = EVENT_LOG_HEADER + '\n' + content;
      }
      await fs.appendFile(filePath, content, 'utf-8');
    } catch (error) {
      this.logger.error(`Failed to write event log ${filePath}: ${errorMessage(error)}`);
      return;
    }

    const today = formatLocalDate(timestamp);
    if (this.lastCleanupDate !== today) {
      this.lastCleanupDate = today;
      await this.cleanup(timestamp);
    }
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}

function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}
