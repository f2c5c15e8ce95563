import * as net from 'net';
import type { Duplex } from 'stream';
import { ConnectError, EncodingError, ParseError, ReceiveError, SendError, errorMessage } from './errors';
import { parse, serialize } from './irc-message';
import type { Logger } from './logger';
import type { IrcMessage } from './types';

// Longest unterminated input kept before it is thrown away
const MAX_BUFFERED_CHARS = 8192;

export interface ConnectOptions {
  host: string;
  port: number;
  nick: string;
  password?: string;
  username: string;
  realname: string;
  timeoutMs: number;
}

export interface RetryPolicy {
  maxRetries: number;
  delayMs: number;
}

export type SocketFactory = (host: string, port: number, timeoutMs: number) => Promise<Duplex>;

export type ReceiveResult =
  | { kind: 'message'; message: IrcMessage }
  | { kind: 'end' }
  | { kind: 'timeout' };

export interface ConnectionDeps {
  logger: Logger;
  socketFactory?: SocketFactory;
  now?: () => number;
}

export const tcpSocketFactory: SocketFactory = (host, port, timeoutMs) =>
  new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    socket.setTimeout(timeoutMs);

    const fail = (error: Error) => {
      socket.destroy();
      reject(error);
    };
    socket.once('timeout', () => fail(new Error(`Connection timed out after ${timeoutMs}ms`)));
    socket.once('error', fail);
    socket.once('connect', () => {
      socket.setTimeout(0);
      socket.removeAllListeners('timeout');
      socket.removeListener('error', fail);
      resolve(socket);
    });
  });

/**
 * One stream connection to the server: line framing, registration, keepalive
 * and an orderly QUIT. Reads are pulled by the session with a bounded wait.
 */
export class IrcConnection {
  private socket: Duplex;
  private logger: Logger;
  private now: () => number;
  private buffer = '';
  private lines: string[] = [];
  private waiter?: () => void;
  private ended = false;
  private closed = false;
  private failure?: Error;
  private lastSendAt: number;
  private keepaliveMs?: number;
  private keepaliveToken: string;

  constructor(socket: Duplex, host: string, deps: ConnectionDeps) {
    this.socket = socket;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
    this.lastSendAt = this.now();
    this.keepaliveToken = host;

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string | Buffer) => {
      this.onData(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    });
    socket.on('end', () => this.onEnd());
    socket.on('close', () => this.onEnd());
    socket.on('error', (error: Error) => {
      this.logger.error('irc', 'Socket error', error);
      this.failure = error;
      this.wake();
    });
  }

  /** Open the transport and send PASS/NICK/USER. */
  static async connect(options: ConnectOptions, deps: ConnectionDeps): Promise<IrcConnection> {
    const factory = deps.socketFactory ?? tcpSocketFactory;
    const socket = await factory(options.host, options.port, options.timeoutMs);
    const connection = new IrcConnection(socket, options.host, deps);
    deps.logger.info('irc', `TCP connection established to ${options.host}:${options.port}, registering`);

    if (options.password) {
      connection.send('PASS', options.password);
    }
    connection.send('NICK', options.nick);
    connection.send('USER', options.username, '0', '*', options.realname);
    return connection;
  }

  get isConnected(): boolean {
    return !this.closed && !this.ended && !this.failure && this.socket.writable;
  }

  send(command: string, ...params: string[]): void {
    this.sendRaw(serialize(command, params));
  }

  /** Write one already-serialized line; CRLF is appended here. */
  sendRaw(line: string): void {
    if (!this.isConnected) {
      throw new SendError('Not connected to the server');
    }
    if (/[\r\n]/.test(line)) {
      throw new EncodingError('Line contains a line break', line);
    }

    this.socket.write(`${line}\r\n`);
    this.lastSendAt = this.now();
    this.logger.debug('irc', `>> ${line.startsWith('PASS ') ? 'PASS ****' : line}`);
  }

  /**
   * Next parsed message, waiting at most `timeoutMs`. Malformed lines are
   * logged and skipped. Throws ReceiveError once the socket has failed.
   */
  async receive(timeoutMs: number): Promise<ReceiveResult> {
    let waited = false;

    for (;;) {
      const line = this.lines.shift();
      if (line !== undefined) {
        if (line.trim().length === 0) continue;
        try {
          const message = parse(line);
          this.logger.debug('irc', `<< ${line}`);
          return { kind: 'message', message };
        } catch (error) {
          if (!(error instanceof ParseError)) throw error;
          this.logger.warn('irc', `Dropped malformed line: ${error.message}`, line);
          continue;
        }
      }

      if (this.failure) {
        throw new ReceiveError(this.failure.message);
      }
      if (this.ended || this.closed) {
        return { kind: 'end' };
      }
      if (waited) {
        return { kind: 'timeout' };
      }

      waited = true;
      await this.waitForData(timeoutMs);
    }
  }

  /** Turn on the idle probe; called once registration completes. */
  startKeepalive(intervalMs: number, token?: string): void {
    this.keepaliveMs = intervalMs;
    if (token) this.keepaliveToken = token;
  }

  /** Send a PING when keepalive is on and nothing was sent for a full interval. */
  checkKeepalive(): boolean {
    if (this.keepaliveMs === undefined || !this.isConnected) return false;
    if (this.now() - this.lastSendAt < this.keepaliveMs) return false;

    this.send('PING', this.keepaliveToken);
    return true;
  }

  /** Send QUIT and close the transport. Later calls do nothing. */
  disconnect(reason: string): void {
    if (this.closed) return;

    if (this.isConnected) {
      let line = 'QUIT';
      try {
        line = serialize('QUIT', [reason]);
      } catch (error) {
        this.logger.warn('irc', 'Quit message could not be encoded, sending bare QUIT', errorMessage(error));
      }
      this.socket.write(`${line}\r\n`);
      this.logger.debug('irc', `>> ${line}`);
    }

    this.closed = true;
    this.keepaliveMs = undefined;
    this.socket.end();
    setTimeout(() => this.socket.destroy(), 1000).unref();
    this.logger.info('irc', `Disconnected (${reason})`);
    this.wake();
  }

  private onData(chunk: string): void {
    this.buffer += chunk;

    const parts = this.buffer.split('\n');
    this.buffer = parts.pop() ?? '';
    for (const part of parts) {
      this.lines.push(part.replace(/\r$/, ''));
    }

    if (this.buffer.length > MAX_BUFFERED_CHARS) {
      this.logger.warn('irc', `Discarded ${this.buffer.length} characters without a line terminator`);
      this.buffer = '';
    }
    if (this.lines.length > 0) this.wake();
  }

  private onEnd(): void {
    if (this.ended) return;
    this.ended = true;
    if (!this.closed) this.logger.info('irc', 'Connection closed by peer');
    this.wake();
  }

  private waitForData(timeoutMs: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve();
      }, timeoutMs);

      this.waiter = () => {
        clearTimeout(timer);
        this.waiter = undefined;
        resolve();
      };
    });
  }

  private wake(): void {
    this.waiter?.();
  }
}

/**
 * Connect with a fixed delay between attempts. `onAttemptFailed` hears about
 * every failure; after the last one a ConnectError with `exhausted` is thrown.
 */
export async function connectWithRetry(
  options: ConnectOptions,
  policy: RetryPolicy,
  deps: ConnectionDeps & {
    sleep?: (ms: number) => Promise<void>;
    onAttemptFailed?: (attempt: number, error: Error, willRetry: boolean) => void;
  },
): Promise<{ connection: IrcConnection; attempts: number }> {
  const sleep = deps.sleep ?? ((ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms)));
  let lastError: Error = new Error('No connection attempt made');

  for (let attempt = 1; attempt <= policy.maxRetries; attempt++) {
    try {
      deps.logger.info('irc', `Connecting to ${options.host}:${options.port} (attempt ${attempt}/${policy.maxRetries})`);
      const connection = await IrcConnection.connect(options, deps);
      return { connection, attempts: attempt };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const willRetry = attempt < policy.maxRetries;
      deps.logger.error('irc', `Error connecting to server (attempt ${attempt})`, lastError);
      deps.onAttemptFailed?.(attempt, lastError, willRetry);

      if (willRetry) {
        deps.logger.info('irc', `Retrying in ${policy.delayMs}ms`);
        await sleep(policy.delayMs);
      }
    }
  }

  deps.logger.error('irc', 'Maximum retries reached');
  throw new ConnectError(`Unable to connect: ${lastError.message}`, policy.maxRetries, true);
}
