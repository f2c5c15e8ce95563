import { EncodingError, ParseError } from './errors';
import type { IrcMessage, MessageSource } from './types';

/** Longest line the protocol allows, CRLF included. */
export const MAX_LINE_BYTES = 512;

/** Parameters after which the remainder of the line is the trailing one. */
export const MAX_PARAMS = 15;

const COMMAND_PATTERN = /^(?:[A-Za-z]+|\d{3})$/;

/**
 * Parse one protocol line (terminator already stripped) into a message.
 * Message tags, if a server sends them, are skipped.
 */
export function parse(line: string): IrcMessage {
  let rest = line.replace(/[\r\n]+$/, '');

  if (rest.trim().length === 0) {
    throw new ParseError('Empty line', line);
  }

  if (rest.startsWith('@')) {
    const space = rest.indexOf(' ');
    rest = space === -1 ? '' : rest.slice(space + 1);
  }

  let source: MessageSource | undefined;
  rest = rest.replace(/^ +/, '');
  if (rest.startsWith(':')) {
    const space = rest.indexOf(' ');
    if (space === -1) {
      throw new ParseError('Missing command after prefix', line);
    }
    source = parseSource(rest.slice(1, space));
    rest = rest.slice(space + 1);
  }

  rest = rest.replace(/^ +/, '');
  const commandEnd = rest.indexOf(' ');
  const command = commandEnd === -1 ? rest : rest.slice(0, commandEnd);
  rest = commandEnd === -1 ? '' : rest.slice(commandEnd + 1);

  if (!command) {
    throw new ParseError('Missing command', line);
  }
  if (!COMMAND_PATTERN.test(command)) {
    throw new ParseError(`Invalid command token "${command}"`, line);
  }

  const params: string[] = [];
  while (rest.length > 0) {
    rest = rest.replace(/^ +/, '');
    if (rest.length === 0) break;

    if (rest.startsWith(':')) {
      params.push(rest.slice(1));
      break;
    }
    if (params.length === MAX_PARAMS - 1) {
      params.push(rest);
      break;
    }

    const space = rest.indexOf(' ');
    if (space === -1) {
      params.push(rest);
      break;
    }
    params.push(rest.slice(0, space));
    rest = rest.slice(space + 1);
  }

  return {
    source,
    command: command.toUpperCase(),
    params,
  };
}

/** Split `nick!user@host` (any part after the nick optional). */
export function parseSource(prefix: string): MessageSource {
  const at = prefix.indexOf('@');
  const host = at === -1 ? undefined : prefix.slice(at + 1);
  const beforeHost = at === -1 ? prefix : prefix.slice(0, at);

  const bang = beforeHost.indexOf('!');
  const user = bang === -1 ? undefined : beforeHost.slice(bang + 1);
  const nick = bang === -1 ? beforeHost : beforeHost.slice(0, bang);

  return { nick, user, host };
}

/**
 * Build a wire line (without CRLF) from a command and its parameters.
 * The last parameter gets a `:` when it holds a space, is empty or starts with one.
 */
export function serialize(command: string, params: readonly string[] = []): string {
  if (!COMMAND_PATTERN.test(command)) {
    throw new EncodingError(`Invalid command token "${command}"`, command);
  }
  if (params.length > MAX_PARAMS) {
    throw new EncodingError(`More than ${MAX_PARAMS} parameters`, command);
  }

  const parts = [command];
  params.forEach((param, index) => {
    if (/[\r\n\0]/.test(param)) {
      throw new EncodingError('Parameter contains a line break or NUL', param);
    }

    const isLast = index === params.length - 1;
    if (isLast) {
      parts.push(param.length === 0 || param.includes(' ') || param.startsWith(':') ? `:${param}` : param);
      return;
    }

    if (param.length === 0 || param.includes(' ') || param.startsWith(':')) {
      throw new EncodingError(`Middle parameter "${param}" cannot be encoded`, param);
    }
    parts.push(param);
  });

  const line = parts.join(' ');
  if (Buffer.byteLength(line, 'utf8') + 2 > MAX_LINE_BYTES) {
    throw new EncodingError(`Line exceeds ${MAX_LINE_BYTES} bytes`, line);
  }
  return line;
}
