import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { timeOfDaySchema } from '@ipwatch/core';
import { DEFAULT_MESSAGE_TEMPLATE, findUnknownPlaceholders } from '@ipwatch/watch-core';
import { DEFAULT_IP_SERVICES } from '@ipwatch/probe';
import { isDiscordWebhookUrl, maskWebhookUrl } from '@ipwatch/notifier-discord';

export type Env = Record<string, string | undefined>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: Env;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const seconds = (n: number) => n * 1000;

const retryAttempts = z.number().int().min(1).max(10);
const delayMs = z.number().int().min(0).max(seconds(300));
const timeoutMs = z.number().int().min(1).max(seconds(300));

export const discordSchema = z
  .object({
    webhookUrl: z
      .string({ required_error: 'DISCORD_WEBHOOK_URL is not set' })
      .trim()
      .min(1, 'DISCORD_WEBHOOK_URL is not set')
      .refine(isDiscordWebhookUrl, 'Expected https://discord.com/api/webhooks/<id>/<token>'),
    messageTemplate: z
      .string()
      .min(1)
      .default(DEFAULT_MESSAGE_TEMPLATE)
      .superRefine((template, ctx) => {
        const unknown = findUnknownPlaceholders(template);
        if (unknown.length > 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown placeholder(s): ${unknown.map((n) => `{${n}}`).join(', ')}`,
          });
        }
      }),
    username: z.string().min(1).max(80).optional(),
    retryAttempts: retryAttempts.default(3),
    retryDelayMs: delayMs.default(seconds(5)),
    timeoutMs: timeoutMs.default(seconds(10)),
  })
  .strict();

export const probeSchema = z
  .object({
    services: z.array(z.string().url()).min(1).default([...DEFAULT_IP_SERVICES]),
    timeoutMs: timeoutMs.default(seconds(10)),
    retryAttempts: retryAttempts.default(3),
    retryDelayMs: delayMs.default(seconds(5)),
    checkLocalIp: z.boolean().default(true),
    checkPublicIp: z.boolean().default(true),
  })
  .strict();

export const historySchema = z
  .object({
    filePath: z.string().min(1).default('data/ip_history.json'),
    keepDays: z.number().int().min(0).default(30),
    maxRecords: z.number().int().min(1).default(1000),
    autoCleanup: z.boolean().default(true),
    backupOnCorruption: z.boolean().default(true),
  })
  .strict();

export const scheduleSchema = z
  .object({
    time: timeOfDaySchema.default('09:00'),
  })
  .strict();

export const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    format: z.enum(['text', 'json']).default('text'),
    file: z.string().min(1).optional(),
    maxFileBytes: z.number().int().min(1024).default(10 * 1024 * 1024),
    maxFiles: z.number().int().min(1).max(100).default(7),
  })
  .strict();

export const configSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    discord: z.preprocess((value) => value ?? {}, discordSchema),
    probe: probeSchema.default({}),
    history: historySchema.default({}),
    schedule: scheduleSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .strict();

export type AppConfig = z.infer<typeof configSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid configuration:\n${issues}`;
}

type EnvKind = 'string' | 'int' | 'seconds' | 'bool' | 'list' | 'level';

/** Environment variable → config path */
const ENV_MAPPING: ReadonlyArray<[string, [string, string], EnvKind]> = [
  ['DISCORD_WEBHOOK_URL', ['discord', 'webhookUrl'], 'string'],
  ['DISCORD_MESSAGE_TEMPLATE', ['discord', 'messageTemplate'], 'string'],
  ['DISCORD_USERNAME', ['discord', 'username'], 'string'],
  ['DISCORD_RETRY_ATTEMPTS', ['discord', 'retryAttempts'], 'int'],
  ['DISCORD_RETRY_DELAY', ['discord', 'retryDelayMs'], 'seconds'],
  ['DISCORD_TIMEOUT', ['discord', 'timeoutMs'], 'seconds'],
  ['IP_SERVICES', ['probe', 'services'], 'list'],
  ['IP_CHECK_TIMEOUT', ['probe', 'timeoutMs'], 'seconds'],
  ['IP_RETRY_ATTEMPTS', ['probe', 'retryAttempts'], 'int'],
  ['IP_RETRY_DELAY', ['probe', 'retryDelayMs'], 'seconds'],
  ['CHECK_LOCAL_IP', ['probe', 'checkLocalIp'], 'bool'],
  ['CHECK_PUBLIC_IP', ['probe', 'checkPublicIp'], 'bool'],
  ['IP_HISTORY_FILE', ['history', 'filePath'], 'string'],
  ['IP_HISTORY_KEEP_DAYS', ['history', 'keepDays'], 'int'],
  ['IP_HISTORY_MAX_RECORDS', ['history', 'maxRecords'], 'int'],
  ['IP_HISTORY_AUTO_CLEANUP', ['history', 'autoCleanup'], 'bool'],
  ['IP_HISTORY_BACKUP_ON_CORRUPTION', ['history', 'backupOnCorruption'], 'bool'],
  ['SCHEDULE_TIME', ['schedule', 'time'], 'string'],
  ['LOG_LEVEL', ['logging', 'level'], 'level'],
  ['LOG_FORMAT', ['logging', 'format'], 'string'],
  ['LOG_FILE', ['logging', 'file'], 'string'],
];

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on', 'enabled']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off', 'disabled']);
const LEVEL_ALIASES: Record<string, string> = { warning: 'warn', critical: 'error' };

/**
 * Convert an env string to the type the schema expects. Values that do not
 * convert are passed through as strings so validation reports them.
 */
function convertEnvValue(raw: string, kind: EnvKind): unknown {
  const value = raw.trim();
  switch (kind) {
    case 'string':
      return value;
    case 'int': {
      const n = Number(value);
      return Number.isInteger(n) ? n : value;
    }
    case 'seconds': {
      const n = Number(value);
      return Number.isFinite(n) ? Math.round(seconds(n)) : value;
    }
    case 'bool': {
      const lower = value.toLowerCase();
      if (TRUE_WORDS.has(lower)) return true;
      if (FALSE_WORDS.has(lower)) return false;
      return value;
    }
    case 'level': {
      const lower = value.toLowerCase();
      return LEVEL_ALIASES[lower] ?? lower;
    }
    case 'list':
      return value
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unhandled env kind: ${String(exhaustive)}`);
    }
  }
}

/**
 * Nested config fragment built from the environment. Empty values are ignored.
 */
export function configFromEnv(env: Env): Record<string, Record<string, unknown>> {
  const out: Record<string, Record<string, unknown>> = {};
  for (const [name, [section, key], kind] of ENV_MAPPING) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const target = out[section] ?? {};
    target[key] = convertEnvValue(raw, kind);
    out[section] = target;
  }
  return out;
}

function mergeSections(base: unknown, overrides: Record<string, Record<string, unknown>>): unknown {
  if (!isPlainObject(base)) return overrides;
  const out: Record<string, unknown> = { ...base };
  for (const [section, values] of Object.entries(overrides)) {
    const current = out[section];
    out[section] = isPlainObject(current) ? { ...current, ...values } : values;
  }
  return out;
}

/**
 * Validate a raw config object (file content merged with env overrides)
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export type LoadConfigOptions = {
  /** Optional JSON config file */
  configPath?: string;
  /** dotenv file; a missing default file is ignored (default: '.env') */
  envFile?: string;
  /** Base environment (default: process.env) */
  env?: Env;
  cwd?: string;
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readEnvFile(path: string, required: boolean): Promise<Env> {
  try {
    return dotenv.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    if (!required && isNotFound(err)) return {};
    throw new ConfigError(
      `Failed to read env file ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

async function readConfigFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read config file ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');
  try {
    return JSON.parse(sanitized);
  } catch (err) {
    throw new ConfigError(
      `Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Resolve configuration from (lowest to highest precedence) defaults, the
 * JSON config file, the dotenv file and the process environment.
 *
 * @throws ConfigError with every validation issue listed
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const cwd = options.cwd ?? process.cwd();
  const baseEnv = options.env ?? process.env;

  const envFilePath = resolve(cwd, options.envFile ?? '.env');
  const fileEnv = await readEnvFile(envFilePath, options.envFile !== undefined);
  // Variables already set in the environment win over the dotenv file.
  const env: Env = { ...fileEnv, ...baseEnv };

  let raw: unknown = {};
  if (options.configPath) {
    raw = expandEnvVars(await readConfigFile(resolve(cwd, options.configPath)), { env });
  }

  return parseConfig(mergeSections(raw, configFromEnv(env)));
}

/**
 * Copy safe to print: the webhook token is masked.
 */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    discord: { ...config.discord, webhookUrl: maskWebhookUrl(config.discord.webhookUrl) },
  };
}
