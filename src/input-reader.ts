import * as readline from 'readline';
import type { Readable } from 'stream';
import type { ActionQueue } from './action-queue';
import type { ClientState } from './client-state';
import { interpret } from './command-interpreter';
import type { Logger } from './logger';

/**
 * Reads operator lines from the terminal. Lines that arrive before `start`
 * are held, so nothing typed while connecting is lost. Once started, each
 * line is interpreted and queued; the reader never touches the connection.
 */
export class InputReader {
  private rl: readline.Interface;
  private logger: Logger;
  private pending: string[] = [];
  private consumer?: (line: string) => void;
  private waiter?: (line: string | undefined) => void;
  private isClosed = false;
  private closed: Promise<void>;
  private onEnd?: () => void;

  constructor(input: Readable, logger: Logger) {
    this.logger = logger;
    this.rl = readline.createInterface({ input, terminal: false });

    this.closed = new Promise(resolve => {
      this.rl.on('close', () => {
        this.isClosed = true;
        this.takeWaiter()?.(undefined);
        resolve();
        this.onEnd?.();
      });
    });

    this.rl.on('line', line => {
      const waiter = this.takeWaiter();
      if (waiter) {
        waiter(line);
      } else if (this.consumer) {
        this.consumer(line);
      } else {
        this.pending.push(line);
      }
    });
  }

  /** Next raw line, or undefined once input has ended. */
  readLine(): Promise<string | undefined> {
    const line = this.pending.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.isClosed) return Promise.resolve(undefined);

    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  /**
   * Start feeding the queue. `onEnd` runs when the input stream ends
   * (Ctrl-D, or the packet switch hanging up).
   */
  start(state: Pick<ClientState, 'currentChannel'>, queue: ActionQueue, onEnd: () => void): void {
    this.consumer = line => this.handleLine(line, state, queue);
    this.onEnd = onEnd;

    for (const line of this.pending.splice(0)) {
      this.handleLine(line, state, queue);
    }
    if (this.isClosed) onEnd();
  }

  /** Close the terminal side and wait for it, at most `timeoutMs`. */
  async stop(timeoutMs: number): Promise<boolean> {
    this.onEnd = undefined;
    this.rl.close();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const joined = await Promise.race([this.closed.then(() => true), timedOut]);
    clearTimeout(timer);
    return joined;
  }

  private takeWaiter(): ((line: string | undefined) => void) | undefined {
    const waiter = this.waiter;
    this.waiter = undefined;
    return waiter;
  }

  private handleLine(line: string, state: Pick<ClientState, 'currentChannel'>, queue: ActionQueue): void {
    try {
      this.logger.info('input', `>>> ${line}`);
      if (line.trim().length === 0) return;
      queue.push(interpret(line, state), line);
    } catch (error) {
      this.logger.error('input', 'Ignoring unexpected error while handling input', error);
    }
  }
}
