import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigError,
  configFromEnv,
  expandEnvVars,
  loadConfig,
  parseConfig,
  redactConfig,
} from '../src/config.js';

const WEBHOOK_URL = 'https://discord.com/api/webhooks/123456789/test-token';

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('parseConfig', () => {
  it('fills in defaults around the webhook URL', () => {
    const config = parseConfig({ discord: { webhookUrl: WEBHOOK_URL } });

    expect(config.discord).toEqual({
      webhookUrl: WEBHOOK_URL,
      messageTemplate: 'Minecraft Server IP: {ip}:25565',
      retryAttempts: 3,
      retryDelayMs: 5000,
      timeoutMs: 10000,
    });
    expect(config.probe.services).toHaveLength(4);
    expect(config.probe.timeoutMs).toBe(10000);
    expect(config.history).toEqual({
      filePath: 'data/ip_history.json',
      keepDays: 30,
      maxRecords: 1000,
      autoCleanup: true,
      backupOnCorruption: true,
    });
    expect(config.schedule.time).toBe('09:00');
    expect(config.logging.level).toBe('info');
  });

  it('requires a webhook URL', () => {
    expect(configErrorOf(() => parseConfig({})).message).toBe(
      'Invalid configuration:\n- discord.webhookUrl: DISCORD_WEBHOOK_URL is not set'
    );
  });

  it('rejects URLs that are not Discord webhooks', () => {
    const err = configErrorOf(() => parseConfig({ discord: { webhookUrl: 'https://example.com/hook' } }));

    expect(err.message).toBe(
      'Invalid configuration:\n- discord.webhookUrl: Expected https://discord.com/api/webhooks/<id>/<token>'
    );
  });

  it('rejects a malformed schedule time', () => {
    const err = configErrorOf(() =>
      parseConfig({ discord: { webhookUrl: WEBHOOK_URL }, schedule: { time: '24:00' } })
    );

    expect(err.message).toBe('Invalid configuration:\n- schedule.time: Expected HH:MM (00:00-23:59)');
  });

  it('rejects unknown template placeholders', () => {
    const err = configErrorOf(() =>
      parseConfig({ discord: { webhookUrl: WEBHOOK_URL, messageTemplate: 'Join {ip}:{port}' } })
    );

    expect(err.message).toBe('Invalid configuration:\n- discord.messageTemplate: Unknown placeholder(s): {port}');
  });

  it('rejects unknown sections', () => {
    expect(() => parseConfig({ discord: { webhookUrl: WEBHOOK_URL }, slack: {} })).toThrow(ConfigError);
  });
});

describe('configFromEnv', () => {
  it('maps and converts environment variables', () => {
    expect(
      configFromEnv({
        DISCORD_WEBHOOK_URL: WEBHOOK_URL,
        DISCORD_RETRY_DELAY: '2.5',
        DISCORD_USERNAME: '',
        IP_SERVICES: 'https://a.test, https://b.test,',
        CHECK_LOCAL_IP: 'off',
        IP_HISTORY_KEEP_DAYS: '14',
        SCHEDULE_TIME: ' 07:30 ',
        LOG_LEVEL: 'WARNING',
        UNRELATED: 'x',
      })
    ).toEqual({
      discord: { webhookUrl: WEBHOOK_URL, retryDelayMs: 2500 },
      probe: { services: ['https://a.test', 'https://b.test'], checkLocalIp: false },
      history: { keepDays: 14 },
      schedule: { time: '07:30' },
      logging: { level: 'warn' },
    });
  });

  it('passes unconvertible values through for validation to report', () => {
    expect(configFromEnv({ IP_HISTORY_KEEP_DAYS: 'soon', CHECK_PUBLIC_IP: 'maybe' })).toEqual({
      history: { keepDays: 'soon' },
      probe: { checkPublicIp: 'maybe' },
    });
  });
});

describe('expandEnvVars', () => {
  it('expands variables and defaults in nested values', () => {
    const env = { HOST: 'example.test' };

    expect(expandEnvVars({ a: '${HOST}:${PORT:-8080}', b: ['${HOST}'], c: 5 }, { env })).toEqual({
      a: 'example.test:8080',
      b: ['example.test'],
      c: 5,
    });
  });

  it('fails on missing variables unless allowed', () => {
    expect(() => expandEnvVars('${NOPE}', { env: {} })).toThrow('Missing required environment variable: NOPE');
    expect(expandEnvVars('${NOPE}', { env: {}, allowMissing: true })).toBe('${NOPE}');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ipwatch-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('layers the config file, the dotenv file and the environment', async () => {
    writeFileSync(
      join(dir, '.env'),
      `DISCORD_WEBHOOK_URL=${WEBHOOK_URL}\nSCHEDULE_TIME=06:00\nIP_HISTORY_KEEP_DAYS=10\n`
    );
    writeFileSync(
      join(dir, 'ipwatch.json'),
      '\uFEFF' +
        JSON.stringify({
          history: { keepDays: 5, maxRecords: 50 },
          discord: { username: '${BOT_NAME:-watcher}' },
        })
    );

    const config = await loadConfig({
      cwd: dir,
      configPath: 'ipwatch.json',
      env: { SCHEDULE_TIME: '08:15' },
    });

    expect(config.discord.webhookUrl).toBe(WEBHOOK_URL);
    expect(config.discord.username).toBe('watcher');
    expect(config.schedule.time).toBe('08:15');
    expect(config.history.keepDays).toBe(10);
    expect(config.history.maxRecords).toBe(50);
  });

  it('ignores a missing default .env but not an explicit one', async () => {
    const config = await loadConfig({ cwd: dir, env: { DISCORD_WEBHOOK_URL: WEBHOOK_URL } });
    expect(config.discord.webhookUrl).toBe(WEBHOOK_URL);

    await expect(
      loadConfig({ cwd: dir, envFile: 'missing.env', env: { DISCORD_WEBHOOK_URL: WEBHOOK_URL } })
    ).rejects.toThrow(/^Failed to read env file /);
  });

  it('reports invalid JSON', async () => {
    writeFileSync(join(dir, 'broken.json'), '{ "discord": ');

    await expect(loadConfig({ cwd: dir, configPath: 'broken.json', env: {} })).rejects.toThrow(
      /is not valid JSON/
    );
  });
});

describe('redactConfig', () => {
  it('masks the webhook token only', () => {
    const config = parseConfig({ discord: { webhookUrl: WEBHOOK_URL } });
    const redacted = redactConfig(config);

    expect(redacted.discord.webhookUrl).toBe('https://discord.com/api/webhooks/123456789/***');
    expect(redacted.history).toEqual(config.history);
    expect(config.discord.webhookUrl).toBe(WEBHOOK_URL);
  });
});
