// Core types for the chat client

import type { UsageError } from './errors';

export interface MessageSource {
  nick: string;
  user?: string;
  host?: string;
}

export interface IrcMessage {
  readonly source?: MessageSource;
  // Upper-cased word or 3-digit numeric
  readonly command: string;
  readonly params: readonly string[];
}

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'terminating';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ClientConfig {
  server: {
    host: string;
    port: number;
    password?: string;
    hide: boolean; // Keep the server address off the air
    connectTimeoutMs: number;
  };
  channel?: string; // Joined automatically after registration
  retry: {
    maxRetries: number;
    delayMs: number;
  };
  keepaliveIntervalMs: number;
  maxNickRetries: number;
  filter: {
    enabled: boolean;
    wordListPath: string;
  };
  asciiOnly: boolean;
  log: {
    file: string;
    level: LogLevel;
    append: boolean;
  };
  helpText: string;
  welcomeText: string;
}

/** Where rendered lines for the operator go. */
export interface OutputSink {
  write(line: string): void;
}

/**
 * What the command interpreter asks the session to do with one typed line.
 * Channel actions carry no channel: the session uses whichever channel is
 * current when it performs them.
 */
export type Action =
  | { type: 'sendMessage'; target: string; text: string }
  | { type: 'say'; text: string }
  | { type: 'emote'; text: string }
  | { type: 'join'; channel: string }
  | { type: 'part'; message: string }
  | { type: 'quit'; message: string }
  | { type: 'nick'; nickname: string }
  | { type: 'list' }
  | { type: 'topic'; text?: string }
  | { type: 'away'; message: string }
  | { type: 'whois'; nickname: string }
  | { type: 'names' }
  | { type: 'printHelp' }
  | { type: 'printUsage'; error: UsageError }
  | { type: 'printError'; error: UsageError }
  | { type: 'linkDown' };
