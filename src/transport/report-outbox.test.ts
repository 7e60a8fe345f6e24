/**
 * Tests for ReportOutbox and HttpTransport
 */

import { ReportOutbox } from './report-outbox';
import { HttpTransport, HttpClient, Transport } from './http-transport';
import { LivenessSignal, OutageReport, SpeedTestResult } from '../types';

function signal(seconds: number): LivenessSignal {
  return {
    sent_at: new Date(Date.parse('2024-06-01T00:00:00Z') + seconds * 1000),
    boot_id: 'boot-a',
    uptime_seconds: seconds,
    source: 'local-monitor'
  };
}

const outage: OutageReport = {
  started_at: new Date('2024-06-01T00:00:00Z'),
  ended_at: new Date('2024-06-01T00:01:00Z'),
  duration_seconds: 60,
  affected_targets: ['cloudflare'],
  outage_boot_id: 'boot-a',
  report_boot_id: 'boot-a',
  source: 'local-monitor'
};

/**
 * Transport whose sends stay pending until settled by the test
 */
class ControlledTransport implements Transport {
  sentSignals: LivenessSignal[] = [];
  sentOutages: OutageReport[] = [];
  sentResults: SpeedTestResult[] = [];
  private resolvers: Array<(ack: boolean) => void> = [];

  sendLivenessSignal(value: LivenessSignal): Promise<boolean> {
    this.sentSignals.push(value);
    return this.defer();
  }

  sendOutageReport(value: OutageReport): Promise<boolean> {
    this.sentOutages.push(value);
    return this.defer();
  }

  sendSpeedTestResult(value: SpeedTestResult): Promise<boolean> {
    this.sentResults.push(value);
    return this.defer();
  }

  settleNext(ack: boolean): void {
    const resolve = this.resolvers.shift();
    if (!resolve) {
      throw new Error('no send in flight');
    }
    resolve(ack);
  }

  get inFlight(): number {
    return this.resolvers.length;
  }

  private defer(): Promise<boolean> {
    return new Promise(resolve => this.resolvers.push(resolve));
  }
}

describe('ReportOutbox', () => {
  let transport: ControlledTransport;
  let outbox: ReportOutbox;

  beforeEach(() => {
    transport = new ControlledTransport();
    outbox = new ReportOutbox(transport);
  });

  it('should clear the slot after an acknowledged send', async () => {
    const delivery = outbox.offer({ kind: 'liveness', report: signal(0) });
    transport.settleNext(true);

    await expect(delivery).resolves.toBe(true);
    expect(outbox.hasPending('liveness')).toBe(false);
  });

  it('should keep a failed report for the next flush', async () => {
    const delivery = outbox.offer({ kind: 'outage', report: outage });
    transport.settleNext(false);
    await expect(delivery).resolves.toBe(false);
    expect(outbox.hasPending('outage')).toBe(true);

    const flushed = outbox.flush();
    transport.settleNext(true);
    await flushed;

    expect(transport.sentOutages).toEqual([outage, outage]);
    expect(outbox.hasPending('outage')).toBe(false);
  });

  it('should keep one send in flight per type', async () => {
    const first = outbox.offer({ kind: 'liveness', report: signal(0) });
    const second = outbox.offer({ kind: 'liveness', report: signal(60) });

    await expect(second).resolves.toBe(false);
    expect(transport.inFlight).toBe(1);

    transport.settleNext(true);
    await first;

    // The newer signal replaced the slot while the first was in flight
    expect(outbox.getPending('liveness')).toEqual({ kind: 'liveness', report: signal(60) });
  });

  it('should send only the latest pending report after a flap', async () => {
    const first = outbox.offer({ kind: 'liveness', report: signal(0) });
    transport.settleNext(false);
    await first;

    const second = outbox.offer({ kind: 'liveness', report: signal(60) });
    transport.settleNext(true);
    await second;

    expect(transport.sentSignals).toEqual([signal(0), signal(60)]);
    expect(outbox.hasPending('liveness')).toBe(false);
  });

  it('should not let one type block another', async () => {
    const liveness = outbox.offer({ kind: 'liveness', report: signal(0) });
    const report = outbox.offer({ kind: 'outage', report: outage });

    expect(transport.inFlight).toBe(2);
    transport.settleNext(true);
    transport.settleNext(true);

    await expect(Promise.all([liveness, report])).resolves.toEqual([true, true]);
  });

  it('should drop pending reports on stop', async () => {
    const delivery = outbox.offer({ kind: 'outage', report: outage });
    transport.settleNext(false);
    await delivery;

    outbox.stop();

    expect(outbox.hasPending('outage')).toBe(false);
    await expect(outbox.offer({ kind: 'liveness', report: signal(5) })).resolves.toBe(false);
    expect(transport.sentSignals).toEqual([]);
  });
});

describe('HttpTransport', () => {
  it('should post encoded payloads to the remote endpoints', async () => {
    const post = jest.fn().mockResolvedValue({ status: 200 });
    const client: HttpClient = { post };
    const transport = new HttpTransport('http://remote.test', 1000, client);

    await expect(transport.sendLivenessSignal(signal(0))).resolves.toBe(true);
    await expect(transport.sendOutageReport(outage)).resolves.toBe(true);

    expect(post).toHaveBeenNthCalledWith(1, '/heartbeat', {
      sent_at: '2024-06-01T00:00:00.000Z',
      boot_id: 'boot-a',
      uptime_seconds: 0,
      source: 'local-monitor'
    });
    expect(post).toHaveBeenNthCalledWith(2, '/outage', expect.objectContaining({
      started_at: '2024-06-01T00:00:00.000Z',
      duration_seconds: 60
    }));
  });

  it('should resolve false instead of throwing on network errors', async () => {
    const client: HttpClient = { post: jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED')) };
    const transport = new HttpTransport('http://remote.test', 1000, client);

    await expect(transport.sendLivenessSignal(signal(0))).resolves.toBe(false);
  });
});
