import type { ClientState } from './client-state';
import { ConnectError, ProtocolError, SendError } from './errors';
import type { Logger } from './logger';
import type { ClientConfig, IrcMessage, OutputSink } from './types';
import { sanitizeForTerminal } from './unicode-sanitizer';

/** Topics in a channel listing are cut to this many characters. */
export const LIST_TOPIC_MAX = 60;

/** What handlers may send back to the server. */
export interface Link {
  send(command: string, ...params: string[]): void;
  startKeepalive(intervalMs: number, token?: string): void;
}

export interface DispatchContext {
  state: ClientState;
  out: OutputSink;
  link: Link;
  logger: Logger;
  config: Pick<ClientConfig, 'channel' | 'keepaliveIntervalMs' | 'maxNickRetries' | 'asciiOnly' | 'server'>;
}

export interface HandlerContext extends DispatchContext {
  // NAMES replies collected per channel until the end-of-names numeric
  pendingNames: Map<string, string[]>;
  random: () => number;
}

export type EventHandler = (message: IrcMessage, ctx: HandlerContext) => void;

/**
 * Routes parsed messages to handlers by command word or numeric.
 * Unknown commands are logged, never shown to the operator.
 */
export class EventDispatcher {
  private handlers: Map<string, EventHandler> = new Map();
  private pendingNames: Map<string, string[]> = new Map();
  private random: () => number;

  constructor(options: { random?: () => number } = {}) {
    this.random = options.random ?? Math.random;
    for (const [command, handler] of Object.entries(DEFAULT_HANDLERS)) {
      this.register(command, handler);
    }
  }

  register(command: string, handler: EventHandler): void {
    this.handlers.set(command.toUpperCase(), handler);
  }

  /**
   * Run the handler for one message. Faults caused by the remote side are
   * logged and dropped; ConnectError and SendError reach the caller.
   */
  dispatch(message: IrcMessage, ctx: DispatchContext): void {
    const handler = this.handlers.get(message.command);
    if (!handler) {
      const error = new ProtocolError('Unhandled command', message.command);
      ctx.logger.info('irc', `${error.message} ${message.command}`, message.params.join(' '));
      return;
    }

    try {
      handler(message, { ...ctx, pendingNames: this.pendingNames, random: this.random });
    } catch (error) {
      if (error instanceof ConnectError || error instanceof SendError) {
        throw error;
      }
      ctx.logger.error('irc', `Handler for ${message.command} failed`, error);
    }
  }
}

function print(ctx: HandlerContext, line: string): void {
  ctx.out.write(sanitizeForTerminal(line, ctx.config.asciiOnly));
}

function param(message: IrcMessage, index: number): string {
  const value = message.params[index];
  if (value === undefined) {
    throw new ProtocolError(`Missing parameter ${index}`, message.command);
  }
  return value;
}

function lastParam(message: IrcMessage): string {
  return param(message, message.params.length - 1);
}

function sourceNick(message: IrcMessage): string {
  if (!message.source) {
    throw new ProtocolError('Missing source', message.command);
  }
  return message.source.nick;
}

function reason(text: string | undefined): string {
  return text ? ` (${text})` : '';
}

function isChannel(target: string): boolean {
  return target.startsWith('#') || target.startsWith('&');
}

/** Split a `\x01COMMAND body\x01` payload; undefined for plain text. */
function parseCtcp(text: string): { command: string; body: string } | undefined {
  if (!text.startsWith('\x01')) return undefined;
  const inner = text.slice(1).replace(/\x01$/, '');
  const space = inner.indexOf(' ');
  return space === -1
    ? { command: inner.toUpperCase(), body: '' }
    : { command: inner.slice(0, space).toUpperCase(), body: inner.slice(space + 1) };
}

function nextNickname(base: string, previous: string, random: () => number): string {
  const suffix = Math.floor(random() * 1000);
  const candidate = `${base}_${suffix}`;
  return candidate === previous ? `${base}_${(suffix + 1) % 1000}` : candidate;
}

const onWelcome: EventHandler = (message, ctx) => {
  const server = message.source?.nick;
  const confirmed = message.params[0];

  ctx.state.setStatus('connected');
  if (confirmed && confirmed !== '*') ctx.state.setNickname(confirmed);
  ctx.logger.info('irc', `Registered as ${ctx.state.nickname}`, server);

  print(ctx, server && !ctx.config.server.hide ? `** Connected to ${server}` : '** Connected.');
  ctx.link.startKeepalive(ctx.config.keepaliveIntervalMs, server);

  if (ctx.config.channel) {
    ctx.link.send('JOIN', ctx.config.channel);
    ctx.state.expectJoin(ctx.config.channel);
  }
};

const onNicknameInUse: EventHandler = (message, ctx) => {
  const attempted = message.params[1] ?? ctx.state.nickname;

  // Once registered, a taken nick is only reported
  if (ctx.state.status === 'connected') {
    print(ctx, `** Nickname ${attempted} is already in use.`);
    return;
  }

  const attempt = ctx.state.countNickAttempt();
  if (attempt > ctx.config.maxNickRetries) {
    throw new ConnectError(`Nickname ${ctx.state.baseNickname} still in use after ${ctx.config.maxNickRetries} retries`, attempt - 1, true);
  }

  const candidate = nextNickname(ctx.state.baseNickname, attempted, ctx.random);
  ctx.logger.warn('irc', `Nickname ${attempted} in use, trying ${candidate} (retry ${attempt})`);
  ctx.state.setNickname(candidate);
  ctx.link.send('NICK', candidate);
};

const onJoin: EventHandler = (message, ctx) => {
  const nick = sourceNick(message);
  const channel = param(message, 0);

  if (ctx.state.isSelf(nick)) {
    ctx.state.joinChannel(channel);
    ctx.logger.info('irc', `Joined ${channel}`);
    print(ctx, `** Joined ${channel}`);
    ctx.link.send('TOPIC', channel);
  } else {
    print(ctx, `* ${nick} has joined ${channel}`);
  }
};

const onPart: EventHandler = (message, ctx) => {
  const nick = sourceNick(message);
  const channel = param(message, 0);

  if (ctx.state.isSelf(nick)) {
    // The part command already cleared the channel and said so
    if (ctx.state.leaveChannel(channel)) {
      print(ctx, `** Left ${channel}`);
    }
    return;
  }
  print(ctx, `* ${nick} has left ${channel}${reason(message.params[1])}`);
};

const onQuit: EventHandler = (message, ctx) => {
  const nick = sourceNick(message);
  if (ctx.state.isSelf(nick)) {
    ctx.state.leaveChannel();
    return;
  }
  print(ctx, `* ${nick} has quit${reason(message.params[0])}`);
};

const onKick: EventHandler = (message, ctx) => {
  const by = sourceNick(message);
  const channel = param(message, 0);
  const victim = param(message, 1);

  if (ctx.state.isSelf(victim)) {
    ctx.state.leaveChannel(channel);
  }
  print(ctx, `* ${victim} was kicked from ${channel} by ${by}${reason(message.params[2])}`);
};

const onNick: EventHandler = (message, ctx) => {
  const from = sourceNick(message);
  const to = param(message, 0);

  if (ctx.state.isSelf(from)) {
    ctx.state.setNickname(to);
    print(ctx, `** You are now known as ${to}`);
  } else {
    print(ctx, `* ${from} is now known as ${to}`);
  }
};

const onPrivmsg: EventHandler = (message, ctx) => {
  const nick = sourceNick(message);
  const target = param(message, 0);
  const text = param(message, 1);

  const ctcp = parseCtcp(text);
  if (ctcp) {
    if (ctcp.command === 'ACTION') {
      print(ctx, `* ${nick} ${ctcp.body}`);
    } else {
      ctx.logger.info('irc', `Ignored CTCP ${ctcp.command} from ${nick}`);
    }
    return;
  }

  print(ctx, isChannel(target) ? `<${nick}> ${text}` : `** ${nick}: ${text}`);
};

const onNotice: EventHandler = (message, ctx) => {
  const text = lastParam(message);
  if (parseCtcp(text)) {
    ctx.logger.info('irc', 'Ignored CTCP reply', text);
    return;
  }

  // A prefix without user or host is the server's own name
  const source = message.source;
  const fromUser = source !== undefined && (source.user !== undefined || source.host !== undefined);
  const from = source && (fromUser || !ctx.config.server.hide) ? source.nick : 'SERVER';
  print(ctx, `-${from}- ${text}`);
};

const onTopic: EventHandler = (message, ctx) => {
  print(ctx, `* ${sourceNick(message)} changed the topic to: ${param(message, 1)}`);
};

const onNoTopic: EventHandler = (message, ctx) => {
  print(ctx, `** ${param(message, 1)}: No topic is set.`);
};

const onCurrentTopic: EventHandler = (message, ctx) => {
  print(ctx, `** ${param(message, 1)}: ${param(message, 2)}`);
};

const onNamesReply: EventHandler = (message, ctx) => {
  // "<me> <symbol> <channel> :names", some servers leave out the symbol
  const channel = param(message, message.params.length - 2).toLowerCase();
  const names = lastParam(message).split(' ').filter(name => name.length > 0);

  const pending = ctx.pendingNames.get(channel) ?? [];
  pending.push(...names);
  ctx.pendingNames.set(channel, pending);
};

const onEndOfNames: EventHandler = (message, ctx) => {
  const channel = param(message, 1);
  const names = ctx.pendingNames.get(channel.toLowerCase()) ?? [];
  ctx.pendingNames.delete(channel.toLowerCase());
  print(ctx, `Users in ${channel}: ${names.join(', ')}`);
};

const onWhoisUser: EventHandler = (message, ctx) => {
  const nick = param(message, 1);
  const username = param(message, 2);
  const hostname = param(message, 3);
  const server = param(message, 4);
  const realname = param(message, 5);

  print(ctx, `** WHOIS for ${nick}`);
  print(ctx, `   ${username}@${hostname}`);
  // Not every server fills this in
  if (!/^[ *]*$/.test(server)) {
    print(ctx, `   Server: ${server}`);
  }
  print(ctx, `   Name: ${realname}`);
};

const onNoSuchNick: EventHandler = (message, ctx) => {
  print(ctx, `** No such nick: ${param(message, 1)}`);
};

const onListReply: EventHandler = (message, ctx) => {
  const channel = message.params[1] ?? '';
  const users = message.params[2] ?? '';
  let topic = message.params[3] ?? '';

  if (topic.length > LIST_TOPIC_MAX) {
    topic = topic.slice(0, LIST_TOPIC_MAX - 3) + '...';
  }
  print(ctx, `${channel} [${users}] ${topic}`);
};

const onMotdStart: EventHandler = (_message, ctx) => {
  print(ctx, '** Message of the Day');
};

const onMotd: EventHandler = (message, ctx) => {
  print(ctx, lastParam(message));
};

const onServerText: EventHandler = (message, ctx) => {
  print(ctx, `** ${lastParam(message)}`);
};

const onNotOperator: EventHandler = (message, ctx) => {
  print(ctx, `** You don't have permission to do that on ${param(message, 1)}.`);
};

const onPing: EventHandler = (message, ctx) => {
  ctx.link.send('PONG', message.params[0] ?? '');
};

const onPong: EventHandler = (message, ctx) => {
  ctx.logger.debug('irc', 'Keepalive answered', message.params.join(' '));
};

const onError: EventHandler = (message, ctx) => {
  ctx.logger.error('irc', 'Server closed the link', message.params.join(' '));
  ctx.state.setStatus('terminating');
  print(ctx, '** Disconnected.');
};

/** The routing table. Add a command here, or `register` one at run time. */
export const DEFAULT_HANDLERS: Record<string, EventHandler> = {
  '001': onWelcome,
  '305': onServerText, // no longer away
  '306': onServerText, // now away
  '311': onWhoisUser,
  '322': onListReply,
  '331': onNoTopic,
  '332': onCurrentTopic,
  '353': onNamesReply,
  '366': onEndOfNames,
  '372': onMotd,
  '375': onMotdStart,
  '401': onNoSuchNick,
  '433': onNicknameInUse,
  '482': onNotOperator,
  JOIN: onJoin,
  PART: onPart,
  QUIT: onQuit,
  KICK: onKick,
  NICK: onNick,
  PRIVMSG: onPrivmsg,
  NOTICE: onNotice,
  TOPIC: onTopic,
  PING: onPing,
  PONG: onPong,
  ERROR: onError,
};
