import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, errorMessage } from './errors';
import { isLogLevel } from './logger';
import type { ClientConfig } from './types';

dotenv.config();

export const VERSION = '1.1.0';

export const DEFAULT_WELCOME_TEXT = `Welcome to coaxchat!
Type /help for a list of commands.`;

export const DEFAULT_HELP_TEXT = `coaxchat commands:
  /quit [message] - Disconnect from the server with optional message.
  /msg <nickname> <message> - Send a private message to the specified user.
  /join <channel> - Join the specified channel.
  /part [message] - Leave the current channel.
  /nick <nickname> - Change your nickname.
  /names - Shows a list of users in the channel.
  /list - List the channels on the server.
  /topic [new topic] - Set a new topic for the current channel or request the topic.
  /away [message] - Set an away message.
  /me <action> - Perform an action.
  /whois <nickname> - Retrieves information about the specified user.
  /slap <nickname> - Slap a user around a bit with some coax.
  /lid [nickname] - Sound the LID alarm.
  /help - Display this help message.`;

export interface LoadedConfig {
  config: ClientConfig;
  source: 'config.json' | 'environment';
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): LoadedConfig {
  // config.json first, environment variables override single fields
  const configPath = path.join(cwd, 'config.json');
  let file: Record<string, unknown> = {};
  let source: LoadedConfig['source'] = 'environment';

  if (fs.existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`config.json is not valid JSON: ${errorMessage(error)}`);
    }
    if (!isRecord(parsed)) {
      throw new ConfigError('config.json must contain a JSON object');
    }
    file = parsed;
    source = 'config.json';
  }

  const server = section(file, 'server');
  const retry = section(file, 'retry');
  const filter = section(file, 'filter');
  const log = section(file, 'log');

  const channel = pickString(env.IRC_CHANNEL, file.channel, '#Testing');
  if (channel && !isValidChannelName(channel)) {
    throw new ConfigError(`Invalid default channel "${channel}"`);
  }

  const level = pickString(env.LOG_LEVEL, log.level, 'info');
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid log level "${level}"`);
  }

  const config: ClientConfig = {
    server: {
      host: pickString(env.IRC_HOST, server.host, 'localhost'),
      port: pickNumber('server.port', env.IRC_PORT, server.port, 6667, 1, 65535),
      password: pickString(env.IRC_PASSWORD, server.password, '') || undefined,
      hide: pickBoolean(env.IRC_HIDE_SERVER, server.hide, true),
      connectTimeoutMs: pickNumber('server.connectTimeoutMs', env.IRC_CONNECT_TIMEOUT_MS, server.connectTimeoutMs, 15000, 1),
    },
    channel: channel || undefined,
    retry: {
      maxRetries: pickNumber('retry.maxRetries', env.IRC_MAX_RETRIES, retry.maxRetries, 3, 1),
      delayMs: pickNumber('retry.delayMs', env.IRC_RETRY_DELAY_MS, retry.delayMs, 5000, 0),
    },
    keepaliveIntervalMs: pickNumber('keepaliveIntervalMs', env.IRC_KEEPALIVE_MS, file.keepaliveIntervalMs, 30000, 1000),
    maxNickRetries: pickNumber('maxNickRetries', env.IRC_MAX_NICK_RETRIES, file.maxNickRetries, 10, 1),
    filter: {
      enabled: pickBoolean(env.BAD_WORDS_FILTER, filter.enabled, false),
      wordListPath: path.resolve(cwd, pickString(env.BAD_WORDS_FILE, filter.wordListPath, 'bad_words.txt')),
    },
    asciiOnly: pickBoolean(env.ASCII_ONLY, file.asciiOnly, true),
    log: {
      file: path.resolve(cwd, pickString(env.LOG_FILE, log.file, 'coaxchat.log')),
      level,
      append: pickBoolean(env.LOG_APPEND, log.append, false),
    },
    helpText: pickString(undefined, file.helpText, DEFAULT_HELP_TEXT),
    welcomeText: pickString(undefined, file.welcomeText, DEFAULT_WELCOME_TEXT),
  };

  return { config, source };
}

/** Channel names start with `#` and hold no whitespace or commas. */
export function isValidChannelName(name: string): boolean {
  return /^#[^\s,]+$/.test(name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(file: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = file[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`config.json "${key}" must be an object`);
  }
  return value;
}

function pickString(envValue: string | undefined, fileValue: unknown, fallback: string): string {
  if (envValue !== undefined) return envValue.trim();
  if (typeof fileValue === 'string') return fileValue;
  if (fileValue === null) return '';
  return fallback;
}

function pickNumber(
  name: string,
  envValue: string | undefined,
  fileValue: unknown,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  let value = fallback;
  if (envValue !== undefined && envValue.trim() !== '') {
    value = Number(envValue);
  } else if (fileValue !== undefined) {
    value = typeof fileValue === 'number' ? fileValue : NaN;
  }

  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`Invalid value for ${name}: expected an integer between ${min} and ${max}`);
  }
  return value;
}

function pickBoolean(envValue: string | undefined, fileValue: unknown, fallback: boolean): boolean {
  if (envValue !== undefined && envValue.trim() !== '') {
    return envValue.trim().toLowerCase() === 'true';
  }
  if (typeof fileValue === 'boolean') return fileValue;
  return fallback;
}
