/**
 * Boot identifier of the local host. The identifier changes only when the
 * host restarts, which lets the remote side tell a power cut from an ISP
 * outage.
 */

import * as fs from 'fs';
import * as os from 'os';
import { Logger } from './logger';

const LINUX_BOOT_ID_PATH = '/proc/sys/kernel/random/boot_id';

export interface HostIdentity {
  bootId(): string;
  uptimeSeconds(): number;
}

export class SystemHostIdentity implements HostIdentity {
  private logger = new Logger('HostIdentity');
  private cachedBootId: string | null = null;

  constructor(private bootIdPath: string = LINUX_BOOT_ID_PATH) {}

  bootId(): string {
    if (this.cachedBootId === null) {
      this.cachedBootId = this.readBootId();
      this.logger.info(`Boot identifier: ${this.cachedBootId}`);
    }
    return this.cachedBootId;
  }

  uptimeSeconds(): number {
    return Math.floor(os.uptime());
  }

  private readBootId(): string {
    try {
      const value = fs.readFileSync(this.bootIdPath, 'utf-8').trim();
      if (value.length > 0) {
        return value;
      }
    } catch {
      this.logger.debug(`${this.bootIdPath} not readable, deriving boot identifier from uptime`);
    }

    // Boot time rounded to the minute absorbs jitter between reads of uptime
    const bootTimeMs = Date.now() - os.uptime() * 1000;
    const bootMinute = Math.round(bootTimeMs / 60000);
    return `${os.hostname()}-${bootMinute}`;
  }
}
