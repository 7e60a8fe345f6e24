/**
 * Tests for application wiring of both roles
 */

import axios from 'axios';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { LocalMonitorApp } from './local-app';
import { RemoteTrackerApp } from './remote-app';

function settle(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 50));
}

describe('RemoteTrackerApp', () => {
  let testDir: string;
  let configPath: string;
  let app: RemoteTrackerApp;

  function writeConfig(config: Record<string, unknown>): void {
    fs.writeFileSync(configPath, JSON.stringify(config));
  }

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uplink-watch-remote-'));
    configPath = path.join(testDir, 'remote.json');
    app = new RemoteTrackerApp(configPath, {});
  });

  afterEach(async () => {
    if (app.getStatus().running) {
      await app.stop();
    }
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should receive heartbeats and persist to the configured directory', async () => {
    writeConfig({ listen_host: '127.0.0.1', listen_port: 0, data_directory: path.join(testDir, 'data') });
    await app.initialize();
    await app.start();
    await settle();

    const response = await axios.post(`http://127.0.0.1:${app.getPort()}/heartbeat`, {
      sent_at: new Date().toISOString(),
      boot_id: 'boot-a',
      uptime_seconds: 10
    });

    expect(response.data.data).toEqual({ disposition: 'accepted' });
    expect(app.getStatus()).toEqual(expect.objectContaining({ running: true, initialized: true, persistence: true }));
    expect(fs.existsSync(path.join(testDir, 'data', 'uplink_watch.db'))).toBe(true);
  });

  it('should run without persistence when the store cannot be opened', async () => {
    const blocked = path.join(testDir, 'blocked');
    fs.writeFileSync(blocked, 'not a directory');
    writeConfig({ listen_host: '127.0.0.1', listen_port: 0, data_directory: blocked });

    await app.initialize();

    expect(app.getStatus().persistence).toBe(false);
    expect(app.getStatus().tracker?.liveness.mode).toBe('STARTUP_GRACE');
  });

  it('should refuse to start before initialization', async () => {
    await expect(app.start()).rejects.toThrow('App must be initialized before starting');
  });
});

describe('LocalMonitorApp', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uplink-watch-local-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should create a default configuration and wire the monitor', async () => {
    const configPath = path.join(testDir, 'config', 'local.json');
    const app = new LocalMonitorApp(configPath, { HTTP_PORT: '0' });

    await app.initialize();

    expect(fs.existsSync(configPath)).toBe(true);
    expect(app.getConfig()?.http_port).toBe(0);
    expect(app.getStatus()).toEqual(expect.objectContaining({ running: false, initialized: true }));
    expect(app.getStatus().monitor?.connectivity.mode).toBe('ONLINE');
  });
});
