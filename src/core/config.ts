/**
 * Runtime configuration
 *
 * Resolution order (later wins): built-in defaults, the JSON settings file
 * (`{ "Values": { ... } }`, path from SETTINGS_FILE), then environment
 * variables. `.env` is loaded by the entry point through dotenv.
 */

import { readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Config');

export const DEFAULT_SETTINGS_FILE = 'local.settings.json';

const SETTING_KEYS = [
  'GITHUB_SECRET',
  'IRC_HOST',
  'IRC_PORT',
  'IRC_NICKNAME',
  'IRC_CHANNELS',
  'IRC_MESSAGE_TYPE',
  'MAX_COMMITS_PER_EVENT',
  'PING_ANNOUNCE_RUNTIME',
  'WEBHOOK_HOST',
  'WEBHOOK_PORT',
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

export const DEFAULT_SETTINGS: Readonly<Record<SettingKey, string>> = {
  GITHUB_SECRET: '',
  IRC_HOST: 'localhost',
  IRC_PORT: '6667',
  IRC_NICKNAME: 'Hookbot',
  IRC_CHANNELS: '#notifications',
  IRC_MESSAGE_TYPE: 'notice',
  MAX_COMMITS_PER_EVENT: '3',
  PING_ANNOUNCE_RUNTIME: 'false',
  WEBHOOK_HOST: '0.0.0.0',
  WEBHOOK_PORT: '8000',
};

const booleanSetting = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const portSetting = z.coerce.number().int().min(1).max(65535);

const settingsSchema = z.object({
  GITHUB_SECRET: z.string(),
  IRC_HOST: z.string().min(1),
  IRC_PORT: portSetting,
  IRC_NICKNAME: z
    .string()
    .min(1)
    .regex(/^\S+$/, 'must not contain whitespace'),
  IRC_CHANNELS: z
    .string()
    .transform((value) => value.split(/\s+/).filter(Boolean))
    .pipe(z.array(z.string()).min(1, 'at least one channel is required')),
  IRC_MESSAGE_TYPE: z.enum(['notice', 'privmsg']),
  MAX_COMMITS_PER_EVENT: z.coerce.number().int().min(0),
  PING_ANNOUNCE_RUNTIME: booleanSetting,
  WEBHOOK_HOST: z.string().min(1),
  WEBHOOK_PORT: portSetting,
});

export type MessageType = 'notice' | 'privmsg';

export interface IrcConfig {
  host: string;
  port: number;
  nickname: string;
  channels: string[];
  messageType: MessageType;
}

export interface WebhookConfig {
  host: string;
  port: number;
  /** Empty string means signature verification is disabled */
  secret: string;
}

export interface AppConfig {
  irc: IrcConfig;
  webhook: WebhookConfig;
  maxCommitsPerEvent: number;
  announceRuntime: boolean;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  settingsFile?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the `Values` section of a settings file. A missing file is not an error.
 */
export async function readSettingsFile(path: string): Promise<Partial<Record<SettingKey, string>>> {
  if (!existsSync(path)) {
    logger.debug(`Settings file ${path} not found, using defaults`);
    return {};
  }

  const data = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new Error(`Settings file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const values = isRecord(parsed) ? parsed.Values : undefined;
  if (!isRecord(values)) {
    throw new Error(`Settings file ${path} has no "Values" object`);
  }

  const result: Partial<Record<SettingKey, string>> = {};
  for (const key of SETTING_KEYS) {
    const value = values[key];
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[key] = String(value);
    }
  }
  return result;
}

function collectEnv(env: NodeJS.ProcessEnv): Partial<Record<SettingKey, string>> {
  const result: Partial<Record<SettingKey, string>> = {};
  for (const key of SETTING_KEYS) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Validate merged raw settings into an AppConfig.
 */
export function parseSettings(raw: Partial<Record<SettingKey, string>>): AppConfig {
  const result = settingsSchema.safeParse({ ...DEFAULT_SETTINGS, ...raw });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const settings = result.data;
  return {
    irc: {
      host: settings.IRC_HOST,
      port: settings.IRC_PORT,
      nickname: settings.IRC_NICKNAME,
      channels: settings.IRC_CHANNELS,
      messageType: settings.IRC_MESSAGE_TYPE,
    },
    webhook: {
      host: settings.WEBHOOK_HOST,
      port: settings.WEBHOOK_PORT,
      secret: settings.GITHUB_SECRET,
    },
    maxCommitsPerEvent: settings.MAX_COMMITS_PER_EVENT,
    announceRuntime: settings.PING_ANNOUNCE_RUNTIME,
  };
}

export async function loadConfig(options?: LoadConfigOptions): Promise<AppConfig> {
  const env = options?.env ?? process.env;
  const settingsFile = options?.settingsFile ?? env.SETTINGS_FILE ?? DEFAULT_SETTINGS_FILE;

  const fromFile = await readSettingsFile(settingsFile);
  const config = parseSettings({ ...fromFile, ...collectEnv(env) });

  logger.debug(
    `Loaded config: irc=${config.irc.host}:${config.irc.port} nick=${config.irc.nickname} ` +
    `channels=${config.irc.channels.join(',')} secret=${config.webhook.secret ? 'set' : 'unset'}`
  );
  return config;
}

/**
 * Write the default settings file, for the `dump-config` mode.
 */
export async function dumpDefaultSettings(path: string): Promise<void> {
  const body = JSON.stringify({ IsEncrypted: false, Values: DEFAULT_SETTINGS }, null, 2);
  await writeFile(path, `${body}\n`, 'utf-8');
  logger.info(`Wrote default settings to ${path}`);
}

/**
 * Caches the loaded configuration for the life of the process. Concurrent
 * callers share one load; reset() forces the next get() to load again.
 */
export class ConfigStore {
  private cached: AppConfig | null = null;
  private loading: Promise<AppConfig> | null = null;
  private loader: () => Promise<AppConfig>;

  constructor(loader: () => Promise<AppConfig> = () => loadConfig()) {
    this.loader = loader;
  }

  get(): Promise<AppConfig> {
    if (this.cached) {
      return Promise.resolve(this.cached);
    }
    if (!this.loading) {
      const attempt: Promise<AppConfig> = this.loader()
        .then((config) => {
          if (this.loading === attempt) {
            this.cached = config;
          }
          return config;
        })
        .finally(() => {
          if (this.loading === attempt) {
            this.loading = null;
          }
        });
      this.loading = attempt;
    }
    return this.loading;
  }

  reset(): void {
    this.cached = null;
    this.loading = null;
  }
}
