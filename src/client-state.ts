import type { ConnectionStatus } from './types';

/**
 * Mutable session state. Owned by the session; only the dispatcher and the
 * session's action executor change it, both from the session loop.
 */
export class ClientState {
  private _nickname: string;
  private _channel?: string;
  private _pendingChannel?: string;
  private _status: ConnectionStatus = 'disconnected';
  private nickAttempts = 0;

  // Identity the nickname was derived from, used for collision suffixes
  readonly baseNickname: string;

  constructor(nickname: string) {
    this._nickname = nickname;
    this.baseNickname = nickname;
  }

  get nickname(): string {
    return this._nickname;
  }

  get currentChannel(): string | undefined {
    return this._channel;
  }

  /** A channel a JOIN was sent for that the server has not confirmed yet. */
  get pendingChannel(): string | undefined {
    return this._pendingChannel;
  }

  get status(): ConnectionStatus {
    return this._status;
  }

  get isRunning(): boolean {
    return this._status === 'connecting' || this._status === 'connected';
  }

  setStatus(status: ConnectionStatus): void {
    this._status = status;
    if (status !== 'connected') {
      this._channel = undefined;
      this._pendingChannel = undefined;
    }
  }

  setNickname(nickname: string): void {
    this._nickname = nickname;
  }

  /** Record another collision retry and return how many have been made. */
  countNickAttempt(): number {
    this.nickAttempts += 1;
    return this.nickAttempts;
  }

  /** Note a JOIN on its way to the server. */
  expectJoin(channel: string): void {
    this._pendingChannel = channel;
  }

  /** Joining replaces whatever channel was current. Ignored unless connected. */
  joinChannel(channel: string): boolean {
    if (this._status !== 'connected') return false;
    this._channel = channel;
    if (this._pendingChannel !== undefined && sameName(this._pendingChannel, channel)) {
      this._pendingChannel = undefined;
    }
    return true;
  }

  /** Clear the channel; with a name, only when it is the current one. */
  leaveChannel(channel?: string): boolean {
    if (this._channel === undefined) return false;
    if (channel !== undefined && !sameName(channel, this._channel)) return false;
    this._channel = undefined;
    return true;
  }

  isSelf(nick: string | undefined): boolean {
    return nick !== undefined && sameName(nick, this._nickname);
  }
}

/** IRC nick and channel names compare case-insensitively. */
export function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
