import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  WatchError,
  fixedClock,
  type AddressSnapshot,
  type IAddressProber,
  type INotifier,
} from '@ipwatch/core';
import { createApp, runCommand, type App } from '../src/app.js';
import type { CliArgs } from '../src/args.js';
import { parseConfig } from '../src/config.js';
import { Logger } from '../src/logger.js';

const WEBHOOK_URL = 'https://discord.com/api/webhooks/123456789/test-token';
const NO_ARGS: CliArgs = { verbose: false, help: false };

class FakeProber implements IAddressProber {
  publicIp = '203.0.113.9';
  failing = false;

  async probe(): Promise<AddressSnapshot> {
    if (this.failing) {
      throw new WatchError({ code: 'PROBE_FAILED', message: 'All public IP services failed' });
    }
    return { local: '192.168.1.10', public: this.publicIp, observedAt: new Date() };
  }
}

class FakeNotifier implements INotifier {
  readonly messages: string[] = [];
  reachable = true;

  async deliver(text: string): Promise<boolean> {
    this.messages.push(text);
    return true;
  }

  async testConnection(): Promise<boolean> {
    return this.reachable;
  }
}

describe('runCommand', () => {
  let dir: string;
  let prober: FakeProber;
  let notifier: FakeNotifier;
  let clock: ReturnType<typeof fixedClock>;
  let app: App;
  let output: string[];

  const run = (command: Parameters<typeof runCommand>[0], args: CliArgs = NO_ARGS) =>
    runCommand(command, args, app, (text) => output.push(text));

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ipwatch-app-'));
    prober = new FakeProber();
    notifier = new FakeNotifier();
    clock = fixedClock('2026-03-01T09:00:00.000Z');
    output = [];
    const config = parseConfig({
      discord: { webhookUrl: WEBHOOK_URL, retryDelayMs: 0 },
      probe: { retryDelayMs: 0 },
      history: { filePath: 'history.json' },
    });
    app = createApp(config, new Logger({ level: 'error', stream: { write: () => true } }), {
      prober,
      notifier,
      clock,
      cwd: dir,
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('manual: notifies and records', async () => {
    expect(await run('manual')).toBe(0);

    expect(notifier.messages).toEqual(['Minecraft Server IP: 203.0.113.9:25565']);
    const lines = (output[0] ?? '').split('\n');
    expect(lines).toContain('Public IP: 203.0.113.9');
    expect(lines).toContain('Local IP: 192.168.1.10');
    expect(lines).toContain('Recorded: yes');

    const saved: unknown = JSON.parse(readFileSync(join(dir, 'history.json'), 'utf-8'));
    expect(saved).toMatchObject({ current: { publicIp: '203.0.113.9' } });
  });

  it('manual: exits 1 when probing fails', async () => {
    prober.failing = true;

    expect(await run('manual')).toBe(1);

    expect(output[0]?.split('\n').at(-1)).toBe('Status: FAILED');
    expect(notifier.messages).toEqual([]);
    expect(existsSync(join(dir, 'history.json'))).toBe(false);
  });

  it('test: neither notifies nor records, and checks the webhook', async () => {
    expect(await run('test')).toBe(0);
    expect(output[1]).toBe('Webhook: reachable');
    expect(notifier.messages).toEqual([]);
    expect(existsSync(join(dir, 'history.json'))).toBe(false);

    notifier.reachable = false;
    expect(await run('test')).toBe(1);
    expect(output[3]).toBe('Webhook: unreachable');
  });

  it('status: shows the summary and recent changes', async () => {
    await run('manual');
    clock.set('2026-03-02T09:00:00.000Z');
    prober.publicIp = '198.51.100.7';
    await run('manual');
    output = [];

    expect(await run('status')).toBe(0);

    const lines = (output[0] ?? '').split('\n');
    expect(lines).toContain('Current public IP: 198.51.100.7');
    expect(lines).toContain('- Total checks: 2');
    expect(lines.slice(lines.indexOf('### IP Changes (last 7 days)'))).toEqual([
      '### IP Changes (last 7 days)',
      '- 2026-03-02T09:00:00.000Z 203.0.113.9 -> 198.51.100.7 (manual)',
      '- 2026-03-01T09:00:00.000Z - -> 203.0.113.9 (manual)',
    ]);
  });

  it('check: prints the configuration with the token masked', async () => {
    expect(await run('check')).toBe(0);

    const printed: unknown = JSON.parse(output[0] ?? '');
    expect(printed).toMatchObject({
      discord: { webhookUrl: 'https://discord.com/api/webhooks/123456789/***' },
      history: { filePath: 'history.json', keepDays: 30 },
    });
  });

  it('cleanup: uses --days or the configured retention', async () => {
    await run('manual');

    expect(await run('cleanup')).toBe(0);
    expect(await run('cleanup', { ...NO_ARGS, days: 0 })).toBe(0);

    expect(output.slice(1)).toEqual([
      'Removed 0 event(s) older than 30 day(s)',
      'Removed 0 event(s) older than 0 day(s)',
    ]);
  });

  it('export: writes the history where asked', async () => {
    await run('manual');
    const target = join(dir, 'backup', 'history-export.json');

    expect(await run('export', { ...NO_ARGS, out: target })).toBe(0);

    expect(output[1]).toBe(`History exported to ${target}`);
    const exported: unknown = JSON.parse(readFileSync(target, 'utf-8'));
    expect(exported).toMatchObject({ current: { publicIp: '203.0.113.9' } });
  });
});
