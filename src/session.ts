import { ActionQueue } from './action-queue';
import { ClientState, sameName } from './client-state';
import { DEFAULT_QUIT_MESSAGE, NOT_IN_CHANNEL } from './command-interpreter';
import { IrcConnection, type SocketFactory, connectWithRetry } from './connection';
import type { ContentFilter } from './content-filter';
import { ConnectError, EncodingError, ReceiveError, SendError, errorMessage } from './errors';
import { type DispatchContext, EventDispatcher } from './event-dispatcher';
import type { InputReader } from './input-reader';
import type { Logger } from './logger';
import type { Action, ClientConfig, OutputSink } from './types';

/** Longest the loop waits on the network before looking at queued input. */
export const POLL_INTERVAL_MS = 200;

/** How long shutdown waits for the input reader to finish. */
export const INPUT_JOIN_TIMEOUT_MS = 5000;

export type SessionPhase = 'idle' | 'connecting' | 'connected' | 'terminating' | 'closed';

const TRANSITIONS: Record<SessionPhase, SessionPhase[]> = {
  idle: ['connecting'],
  connecting: ['connected', 'terminating', 'closed'],
  connected: ['terminating'],
  terminating: ['closed'],
  closed: [],
};

export interface SessionDeps {
  out: OutputSink;
  logger: Logger;
  input?: InputReader;
  filter?: ContentFilter;
  socketFactory?: SocketFactory;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
}

/** Registration username: the callsign without its SSID (`N0CALL-7` -> `N0CALL`). */
export function baseCallsign(identity: string): string {
  const match = /^[A-Za-z0-9]+/.exec(identity);
  return match ? match[0] : identity;
}

/**
 * Runs one session: connect with retries, then a single loop that drains
 * operator actions and dispatches server messages, then an orderly shutdown.
 * Only this loop sends on the connection or changes the client state.
 */
export class Session {
  readonly state: ClientState;
  readonly queue: ActionQueue;
  private config: ClientConfig;
  private deps: SessionDeps;
  private dispatcher: EventDispatcher;
  private connection?: IrcConnection;
  private phase: SessionPhase = 'idle';
  private exitCode = 0;

  constructor(config: ClientConfig, identity: string, deps: SessionDeps) {
    this.config = config;
    this.deps = deps;
    this.state = new ClientState(identity);
    this.queue = new ActionQueue(64, deps.logger);
    this.dispatcher = new EventDispatcher({ random: deps.random });
  }

  get currentPhase(): SessionPhase {
    return this.phase;
  }

  /** Ask the loop to quit; safe to call from signal handlers. */
  requestStop(message: string = DEFAULT_QUIT_MESSAGE): void {
    this.queue.push({ type: 'quit', message }, 'signal');
  }

  /** Run until quit or disconnect. Resolves with the process exit code. */
  async run(): Promise<number> {
    this.transition('connecting');
    this.state.setStatus('connecting');

    const connection = await this.connect();
    if (!connection) {
      this.state.setStatus('disconnected');
      this.transition('closed');
      return 1;
    }
    this.connection = connection;

    this.deps.input?.start(this.state, this.queue, () => {
      this.deps.logger.info('input', 'Input ended');
      this.queue.push({ type: 'linkDown' }, 'end of input');
    });

    try {
      await this.loop(connection);
    } catch (error) {
      this.deps.logger.error('session', 'Unexpected error', error);
      this.print(`** Unexpected error has occurred: ${errorMessage(error)}`);
      this.exitCode = 1;
    } finally {
      await this.shutdown();
    }
    return this.exitCode;
  }

  private async connect(): Promise<IrcConnection | undefined> {
    const { server, retry } = this.config;
    const where = `${server.host}:${server.port}`;
    const username = baseCallsign(this.state.baseNickname);

    this.print(server.hide ? 'Connecting to server...' : `** Connecting to ${where}`);

    try {
      const { connection } = await connectWithRetry(
        {
          host: server.host,
          port: server.port,
          nick: this.state.nickname,
          password: server.password,
          username,
          realname: username,
          timeoutMs: server.connectTimeoutMs,
        },
        retry,
        {
          logger: this.deps.logger,
          socketFactory: this.deps.socketFactory,
          sleep: this.deps.sleep,
          now: this.deps.now,
          onAttemptFailed: (_attempt, error, willRetry) => {
            this.print(server.hide ? '** Error connecting to server.' : `** Error connecting to server: ${error.message}`);
            if (willRetry) {
              this.print(`** Retrying in ${Math.round(retry.delayMs / 1000)} seconds...`);
            }
          },
        },
      );
      return connection;
    } catch (error) {
      if (!(error instanceof ConnectError)) throw error;
      this.print(server.hide ? 'Unable to connect to server.' : `Unable to connect to ${where}`);
      this.print('Please try again later, exiting.');
      return undefined;
    }
  }

  private async loop(connection: IrcConnection): Promise<void> {
    const ctx: DispatchContext = {
      state: this.state,
      out: this.deps.out,
      link: connection,
      logger: this.deps.logger,
      config: this.config,
    };

    while (this.state.isRunning) {
      try {
        this.drainActions(connection);
        if (!this.state.isRunning) break;

        const result = await connection.receive(POLL_INTERVAL_MS);
        if (result.kind === 'end') {
          this.deps.logger.warn('session', 'Server closed the connection');
          this.print('** Disconnected.');
          this.state.setStatus('terminating');
          break;
        }
        if (result.kind === 'message') {
          this.dispatcher.dispatch(result.message, ctx);
          if (this.phase === 'connecting' && this.state.status === 'connected') {
            this.transition('connected');
          }
        }

        connection.checkKeepalive();
      } catch (error) {
        if (error instanceof ReceiveError || error instanceof SendError) {
          this.deps.logger.error('session', 'Lost connection to the server', error);
          this.print('** Lost connection to the server.');
        } else if (error instanceof ConnectError) {
          this.deps.logger.error('session', 'Registration failed', error);
          this.print(`** ${error.message}`);
        } else {
          throw error;
        }
        this.exitCode = 1;
        this.state.setStatus('terminating');
      }
    }
  }

  private drainActions(connection: IrcConnection): void {
    for (const { action, line } of this.queue.drain()) {
      if (!this.state.isRunning) return;

      try {
        this.perform(action, connection);
      } catch (error) {
        if (error instanceof SendError) throw error;
        if (error instanceof EncodingError) {
          this.print(`** Not sent: ${error.message}`);
        }
        this.deps.logger.error('input', `Could not perform ${action.type}`, `${errorMessage(error)} (${line})`);
      }
    }
  }

  /**
   * Carry out one operator action. Channel actions use the channel current
   * at this point, not when the line was typed. Outbound text passes the
   * content filter.
   */
  private perform(action: Action, link: IrcConnection): void {
    const clean = (text: string) => (this.deps.filter ? this.deps.filter.apply(text) : text);
    const channel = this.state.currentChannel;

    switch (action.type) {
      case 'sendMessage':
        link.send('PRIVMSG', action.target, clean(action.text));
        return;
      case 'join': {
        // A JOIN still in flight is the channel being left
        const leaving = this.state.pendingChannel ?? channel;
        if (leaving && !sameName(leaving, action.channel)) {
          link.send('PART', leaving, `Switching to ${action.channel}`);
        }
        link.send('JOIN', action.channel);
        this.state.expectJoin(action.channel);
        return;
      }
      case 'nick':
        link.send('NICK', action.nickname);
        return;
      case 'list':
        link.send('LIST');
        return;
      case 'away':
        link.send('AWAY', clean(action.message));
        return;
      case 'whois':
        link.send('WHOIS', action.nickname);
        return;
      case 'quit':
        this.terminate(clean(action.message));
        return;
      case 'printHelp':
        for (const line of this.config.helpText.split('\n')) this.print(line);
        return;
      case 'printUsage':
        this.print(action.error.message);
        return;
      case 'printError':
        this.print(`** ${action.error.message}`);
        return;
      case 'linkDown':
        this.deps.logger.warn('session', 'Link-level disconnect');
        this.terminate(DEFAULT_QUIT_MESSAGE);
        return;
    }

    if (!channel) {
      this.print(`** ${NOT_IN_CHANNEL}`);
      return;
    }

    switch (action.type) {
      case 'say':
        link.send('PRIVMSG', channel, clean(action.text));
        break;
      case 'emote':
        link.send('PRIVMSG', channel, `\x01ACTION ${clean(action.text)}\x01`);
        break;
      case 'part':
        link.send('PART', channel, clean(action.message));
        this.state.leaveChannel(channel);
        this.print(`** Left ${channel}`);
        break;
      case 'topic':
        if (action.text) {
          link.send('TOPIC', channel, clean(action.text));
        } else {
          link.send('TOPIC', channel);
        }
        break;
      case 'names':
        link.send('NAMES', channel);
        break;
    }
  }

  private terminate(reason: string): void {
    if (this.phase === 'terminating' || this.phase === 'closed') return;

    this.deps.logger.info('session', `Terminating: ${reason}`);
    this.state.setStatus('terminating');
    this.transition('terminating');
    this.connection?.disconnect(reason);
  }

  private async shutdown(): Promise<void> {
    this.terminate(DEFAULT_QUIT_MESSAGE);

    if (this.deps.input) {
      const joined = await this.deps.input.stop(INPUT_JOIN_TIMEOUT_MS);
      if (!joined) {
        this.deps.logger.warn('session', `Input reader did not stop within ${INPUT_JOIN_TIMEOUT_MS}ms`);
      }
    }

    this.state.setStatus('disconnected');
    this.transition('closed');
  }

  private transition(next: SessionPhase): void {
    if (!TRANSITIONS[this.phase].includes(next)) {
      throw new Error(`Invalid session transition ${this.phase} -> ${next}`);
    }
    this.deps.logger.info('session', `${this.phase} -> ${next}`);
    this.phase = next;
  }

  private print(line: string): void {
    this.deps.out.write(line);
  }
}
