import type { Logger } from './logger';
import type { Action } from './types';

export interface QueuedAction {
  action: Action;
  line: string;
}

/**
 * Hand-off point between the input reader and the session loop. The reader
 * only pushes; the loop drains and performs the actions.
 */
export class ActionQueue {
  private queue: QueuedAction[] = [];
  private capacity: number;
  private logger?: Logger;

  constructor(capacity: number = 64, logger?: Logger) {
    this.capacity = capacity;
    this.logger = logger;
  }

  /** Returns false when the queue is full and the action was dropped. */
  push(action: Action, line: string = ''): boolean {
    if (this.queue.length >= this.capacity) {
      this.logger?.warn('input', `Action queue full, dropped ${action.type}`, line);
      return false;
    }

    this.queue.push({ action, line });
    return true;
  }

  /** Take everything queued so far, oldest first. */
  drain(): QueuedAction[] {
    const items = this.queue;
    this.queue = [];
    return items;
  }

  get size(): number {
    return this.queue.length;
  }
}
