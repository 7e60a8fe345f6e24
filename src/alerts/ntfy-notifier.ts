/**
 * ntfy push notifications
 */

import axios, { AxiosInstance } from 'axios';
import { IncidentCause, IncidentKind, NtfyConfig } from '../types';
import { Logger } from '../utils/logger';
import { formatDuration } from '../utils/format';

export type NotificationKind = 'DOWN' | 'RESTORED';

export interface NotificationContext {
  incident_kind: IncidentKind;
  cause: IncidentCause;
  started_at: Date;
  downtime_seconds: number;
  download_mbps?: number;
}

export interface Notifier {
  /**
   * Resolves false when notifications are disabled; rejects when delivery failed
   */
  notify(kind: NotificationKind, context: NotificationContext): Promise<boolean>;
}

export interface NtfyMessage {
  title: string;
  body: string;
  priority: 'default' | 'high';
  tags: string[];
}

export type NtfyClient = Pick<AxiosInstance, 'post'>;

const CAUSE_LABELS: Record<IncidentCause, string> = {
  POWER_CUT: 'power cut',
  ISP_ISSUE: 'ISP issue',
  UNKNOWN: 'unknown cause'
};

export function formatNotification(kind: NotificationKind, context: NotificationContext): NtfyMessage {
  if (kind === 'DOWN') {
    if (context.incident_kind === 'SLOW_SPEED') {
      const speed = context.download_mbps !== undefined ? ` (${context.download_mbps.toFixed(1)} Mbps)` : '';
      return {
        title: 'Home Network SLOW',
        body: `Speed test below threshold${speed}`,
        priority: 'high',
        tags: ['warning', 'speedboat']
      };
    }
    return {
      title: 'Home Network DOWN',
      body: `No heartbeat received from local monitor since ${context.started_at.toISOString()}`,
      priority: 'high',
      tags: ['warning', 'house']
    };
  }

  const what = context.incident_kind === 'SLOW_SPEED' ? 'Speed' : 'Connection';
  return {
    title: 'Home Network RESTORED',
    body: `${what} restored after ${formatDuration(context.downtime_seconds)} (${CAUSE_LABELS[context.cause]})`,
    priority: 'default',
    tags: ['white_check_mark', 'house']
  };
}

export class NtfyNotifier implements Notifier {
  private logger = new Logger('NtfyNotifier');
  private client: NtfyClient;

  constructor(private config: NtfyConfig, client?: NtfyClient) {
    this.client = client ?? axios.create({ timeout: config.timeout_ms });
    if (!this.isEnabled()) {
      this.logger.warn('No ntfy topic configured, notifications are disabled');
    }
  }

  isEnabled(): boolean {
    return this.config.topic.trim().length > 0;
  }

  async notify(kind: NotificationKind, context: NotificationContext): Promise<boolean> {
    if (!this.isEnabled()) {
      this.logger.debug(`Skipping ${kind} notification, no topic configured`);
      return false;
    }

    const message = formatNotification(kind, context);
    const url = `${this.config.server_url.replace(/\/+$/, '')}/${encodeURIComponent(this.config.topic)}`;

    await this.client.post(url, message.body, {
      headers: {
        'Title': message.title,
        'Priority': message.priority,
        'Tags': message.tags.join(','),
        'Content-Type': 'text/plain; charset=utf-8'
      }
    });

    this.logger.info(`Notification sent: ${message.title}`);
    return true;
  }
}
