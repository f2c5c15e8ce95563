import type { ClientState } from './client-state';
import { isValidChannelName } from './config';
import { UsageError } from './errors';
import type { Action } from './types';

export const COMMAND_MARKER = '/';

// What a packet switch injects when the RF link drops, e.g. "*** Disconnected from Stream 10"
export const LINK_DOWN_PREFIX = '*** Disconnected from';

export const DEFAULT_QUIT_MESSAGE = '73';
export const DEFAULT_PART_MESSAGE = 'Leaving';
export const DEFAULT_AWAY_MESSAGE = 'AFK';

export const NOT_IN_CHANNEL = 'You are not currently in any channel.';

export const USAGE: Record<string, string> = {
  msg: '/msg <nickname> <message> - Sends a private message to the specified user.',
  join: '/join <channel> - Joins the specified channel.',
  nick: '/nick <nickname> - Changes your nickname.',
  me: '/me <action> - Performs an action.',
  whois: '/whois <nickname> - Retrieves information about the specified user.',
  slap: '/slap <nickname> - Slaps a user around a bit with some coax.',
};

export interface PendingCommand {
  name: string;
  args: string;
}

type ChannelView = Pick<ClientState, 'currentChannel'>;
type CommandHandler = (args: string, state: ChannelView) => Action;

/**
 * Split `/name rest of line` at the first space. The name is lower-cased,
 * the rest is passed on untouched.
 */
export function parseCommand(line: string): PendingCommand | undefined {
  if (!line.startsWith(COMMAND_MARKER)) return undefined;

  const space = line.indexOf(' ');
  const name = (space === -1 ? line.slice(1) : line.slice(1, space)).toLowerCase();
  const args = space === -1 ? '' : line.slice(space + 1);
  return { name, args };
}

function usage(command: string): Action {
  return { type: 'printUsage', error: new UsageError(`Usage: ${USAGE[command]}`, command) };
}

function failure(message: string, command?: string): Action {
  return { type: 'printError', error: new UsageError(message, command) };
}

/** Build the action when a channel is joined, or explain that there is none. */
function inChannel(state: ChannelView, command: string, build: () => Action, message = NOT_IN_CHANNEL): Action {
  return state.currentChannel ? build() : failure(message, command);
}

const COMMANDS: Record<string, CommandHandler> = {
  quit: args => ({ type: 'quit', message: args || DEFAULT_QUIT_MESSAGE }),

  msg: args => {
    const space = args.indexOf(' ');
    const nickname = space === -1 ? args : args.slice(0, space);
    const text = space === -1 ? '' : args.slice(space + 1);
    if (!nickname || !text.trim()) return usage('msg');
    return { type: 'sendMessage', target: nickname, text };
  },

  join: args => {
    if (!args) return usage('join');
    if (!isValidChannelName(args)) return failure('Invalid channel name.', 'join');
    return { type: 'join', channel: args };
  },

  part: (args, state) => inChannel(state, 'part', () => ({ type: 'part', message: args || DEFAULT_PART_MESSAGE })),

  nick: args => (args ? { type: 'nick', nickname: args } : usage('nick')),

  list: () => ({ type: 'list' }),

  topic: (args, state) => inChannel(state, 'topic', () => ({ type: 'topic', text: args || undefined })),

  away: args => ({ type: 'away', message: args || DEFAULT_AWAY_MESSAGE }),

  me: (args, state) => inChannel(state, 'me', () => (args ? { type: 'emote', text: args } : usage('me'))),

  whois: args => (args ? { type: 'whois', nickname: args } : usage('whois')),

  names: (_args, state) => inChannel(state, 'names', () => ({ type: 'names' })),

  slap: (args, state) =>
    inChannel(state, 'slap', () =>
      args ? { type: 'emote', text: `slaps ${args} around a bit with some coax.` } : usage('slap'),
    ),

  lid: (args, state) =>
    inChannel(
      state,
      'lid',
      () => ({
        type: 'emote',
        text: args ? `presses the LID alarm while looking at ${args}.` : 'may possibly be a LID.',
      }),
      `${NOT_IN_CHANNEL} Are you the LID?`,
    ),

  help: () => ({ type: 'printHelp' }),
};

/** Turn one typed line into the action the session should perform. */
export function interpret(line: string, state: ChannelView): Action {
  const text = line.trim();

  if (text.startsWith(LINK_DOWN_PREFIX)) {
    return { type: 'linkDown' };
  }

  const command = parseCommand(text);
  if (!command) {
    if (!text) return failure('Nothing to send.');
    return inChannel(state, 'say', () => ({ type: 'say', text }));
  }

  if (!Object.hasOwn(COMMANDS, command.name)) {
    return failure('Unknown command.', command.name);
  }
  return COMMANDS[command.name](command.args, state);
}
