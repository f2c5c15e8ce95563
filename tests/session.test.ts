import { PassThrough } from 'stream';
import { describe, expect, it, vi } from 'vitest';
import { ContentFilter } from '../src/content-filter';
import { InputReader } from '../src/input-reader';
import { Session, baseCallsign } from '../src/session';
import type { ClientConfig } from '../src/types';
import { FakeSocket, createLogger, createOutput } from './helpers/fake-socket';

function testConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return {
    server: { host: 'irc.test', port: 6667, hide: false, connectTimeoutMs: 1000 },
    channel: '#Testing',
    retry: { maxRetries: 3, delayMs: 5000 },
    keepaliveIntervalMs: 30_000,
    maxNickRetries: 10,
    filter: { enabled: false, wordListPath: 'bad_words.txt' },
    asciiOnly: true,
    log: { file: 'coaxchat.log', level: 'debug', append: false },
    helpText: 'coaxchat commands:\n  /help - Display this help message.',
    welcomeText: 'Welcome to coaxchat!',
    ...overrides,
  };
}

/**
 * A small scripted server: registers the client, echoes joins and parts and
 * keeps the channels the client is really in.
 */
function scriptedServer(nick = 'N0CALL', joined: Set<string> = new Set()): FakeSocket {
  return new FakeSocket((line, socket) => {
    const [command, target] = line.split(' ');
    if (command === 'USER') {
      socket.serverSays(`:irc.test 001 ${nick} :Welcome to the test network`);
    } else if (command === 'JOIN') {
      joined.add(target);
      socket.serverSays(
        `:${nick}!${nick}@10.0.0.1 JOIN ${target}`,
        `:irc.test 353 ${nick} = ${target} :${nick} alice`,
        `:irc.test 353 ${nick} = ${target} :bob`,
        `:irc.test 366 ${nick} ${target} :End of /NAMES list.`,
      );
    } else if (command === 'PART') {
      joined.delete(target);
      socket.serverSays(`:${nick}!${nick}@10.0.0.1 ${line}`);
    } else if (command === 'TOPIC') {
      socket.serverSays(`:irc.test 331 ${nick} ${target} :No topic is set`);
    }
  });
}

function createSession(socket: FakeSocket, config: ClientConfig = testConfig(), extra: { input?: InputReader; filter?: ContentFilter } = {}) {
  const out = createOutput();
  const logger = createLogger();
  const session = new Session(config, 'N0CALL', {
    out,
    logger,
    socketFactory: async () => socket,
    sleep: async () => undefined,
    ...extra,
  });
  return { session, out, logger };
}

describe('baseCallsign', () => {
  it('drops the SSID', () => {
    expect(baseCallsign('N0CALL-7')).toBe('N0CALL');
    expect(baseCallsign('N0CALL')).toBe('N0CALL');
  });
});

describe('Session', () => {
  it('joins the default channel after registration and prints its users once', async () => {
    const socket = scriptedServer();
    const { session, out } = createSession(socket);

    const running = session.run();
    await vi.waitFor(() => expect(out.lines).toContain('Users in #Testing: N0CALL, alice, bob'));
    expect(session.state.currentChannel).toBe('#Testing');
    expect(session.currentPhase).toBe('connected');

    session.requestStop('73');
    await expect(running).resolves.toBe(0);

    expect(out.lines[0]).toBe('** Connecting to irc.test:6667');
    expect(out.lines).toContain('** Connected to irc.test');
    expect(out.lines).toContain('** Joined #Testing');
    expect(out.lines.filter(line => line.startsWith('Users in'))).toHaveLength(1);
    expect(socket.written).toEqual(['NICK N0CALL', 'USER N0CALL 0 * N0CALL', 'JOIN #Testing', 'TOPIC #Testing', 'QUIT 73']);
    expect(session.currentPhase).toBe('closed');
  });

  it('parts the old channel exactly once when switching', async () => {
    const socket = scriptedServer();
    const input = new PassThrough();
    const logger = createLogger();
    const reader = new InputReader(input, logger);
    const { session } = createSession(socket, testConfig({ channel: undefined }), { input: reader });

    const running = session.run();
    await vi.waitFor(() => expect(session.state.status).toBe('connected'));

    input.write('/join #test\n');
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#test'));
    input.write('/join #other\n');
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#other'));

    expect(socket.written.filter(line => /^(JOIN|PART) /.test(line))).toEqual([
      'JOIN #test',
      'PART #test :Switching to #other',
      'JOIN #other',
    ]);

    // End of input behaves like the link going down
    input.end();
    await expect(running).resolves.toBe(0);
    expect(socket.written.at(-1)).toBe('QUIT 73');
  });

  it('parts a join still in flight when several joins arrive in one read', async () => {
    const joined = new Set<string>();
    const socket = scriptedServer('N0CALL', joined);
    const input = new PassThrough();
    const reader = new InputReader(input, createLogger());
    const { session } = createSession(socket, testConfig(), { input: reader });

    const running = session.run();
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#Testing'));

    input.write('/join #a\n/join #b\n');
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#b'));

    expect([...joined]).toEqual(['#b']);
    expect(socket.written.filter(line => /^(JOIN|PART) /.test(line))).toEqual([
      'JOIN #Testing',
      'PART #Testing :Switching to #a',
      'JOIN #a',
      'PART #a :Switching to #b',
      'JOIN #b',
    ]);

    session.requestStop();
    await expect(running).resolves.toBe(0);
  });

  it('sends channel text to the channel current when it is performed', async () => {
    const socket = scriptedServer();
    const { session, out } = createSession(socket);

    const running = session.run();
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#Testing'));

    session.queue.push({ type: 'part', message: 'Leaving' });
    session.queue.push({ type: 'say', text: 'anyone?' });
    await vi.waitFor(() => expect(out.lines).toContain('** You are not currently in any channel.'));
    session.requestStop();
    await expect(running).resolves.toBe(0);

    expect(out.lines).toContain('** Left #Testing');
    expect(socket.written.some(line => line.startsWith('PRIVMSG'))).toBe(false);
  });

  it('filters outbound chat text', async () => {
    const socket = scriptedServer();
    const { session } = createSession(socket, testConfig(), { filter: new ContentFilter(['darn']) });

    const running = session.run();
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#Testing'));

    session.queue.push({ type: 'say', text: 'darn it' });
    session.requestStop('darn 73');
    await expect(running).resolves.toBe(0);

    expect(socket.written.slice(-2)).toEqual(['PRIVMSG #Testing :!!! it', 'QUIT :!!! 73']);
  });

  it('prints help and usage without touching the connection', async () => {
    const socket = scriptedServer();
    const { session, out } = createSession(socket, testConfig({ channel: undefined }));

    const running = session.run();
    await vi.waitFor(() => expect(session.state.status).toBe('connected'));
    const sent = socket.written.length;

    session.queue.push({ type: 'printHelp' });
    await vi.waitFor(() => expect(out.lines).toContain('  /help - Display this help message.'));
    session.requestStop();
    await expect(running).resolves.toBe(0);

    expect(out.lines).toContain('coaxchat commands:');
    expect(socket.written.slice(sent)).toEqual(['QUIT 73']);
  });

  it('reports the server hanging up', async () => {
    const socket = scriptedServer();
    const { session, out } = createSession(socket);

    const running = session.run();
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#Testing'));
    socket.hangUp();

    await expect(running).resolves.toBe(0);
    expect(out.lines.at(-1)).toBe('** Disconnected.');
    expect(session.currentPhase).toBe('closed');
  });

  it('exits with an error when the connection fails mid-session', async () => {
    const socket = scriptedServer();
    const { session, out } = createSession(socket);

    const running = session.run();
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#Testing'));
    socket.emit('error', new Error('link reset'));

    await expect(running).resolves.toBe(1);
    expect(out.lines.at(-1)).toBe('** Lost connection to the server.');
    expect(socket.written.some(line => line.startsWith('QUIT'))).toBe(false);
    expect(session.currentPhase).toBe('closed');
  });

  it('refuses an over-long line and keeps running', async () => {
    const socket = scriptedServer();
    const { session, out } = createSession(socket);

    const running = session.run();
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#Testing'));

    session.queue.push({ type: 'say', text: 'x'.repeat(600) });
    session.queue.push({ type: 'say', text: 'still here' });
    await vi.waitFor(() => expect(socket.written).toContain('PRIVMSG #Testing :still here'));

    expect(out.lines).toContain('** Not sent: Line exceeds 512 bytes');
    expect(session.currentPhase).toBe('connected');

    session.requestStop();
    await expect(running).resolves.toBe(0);
  });

  it('quits when the packet switch reports the link down', async () => {
    const socket = scriptedServer();
    const input = new PassThrough();
    const reader = new InputReader(input, createLogger());
    const { session } = createSession(socket, testConfig(), { input: reader });

    const running = session.run();
    await vi.waitFor(() => expect(session.state.currentChannel).toBe('#Testing'));
    input.write('*** Disconnected from Stream 10\n');

    await expect(running).resolves.toBe(0);
    expect(socket.written.at(-1)).toBe('QUIT 73');
    expect(session.currentPhase).toBe('closed');
  });

  it('exits with an error after the last connection attempt', async () => {
    const out = createOutput();
    const sleep = vi.fn().mockResolvedValue(undefined);
    const session = new Session(testConfig(), 'N0CALL', {
      out,
      logger: createLogger(),
      socketFactory: () => Promise.reject(new Error('refused')),
      sleep,
    });

    await expect(session.run()).resolves.toBe(1);

    expect(out.lines).toEqual([
      '** Connecting to irc.test:6667',
      '** Error connecting to server: refused',
      '** Retrying in 5 seconds...',
      '** Error connecting to server: refused',
      '** Retrying in 5 seconds...',
      '** Error connecting to server: refused',
      'Unable to connect to irc.test:6667',
      'Please try again later, exiting.',
    ]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(session.currentPhase).toBe('closed');
  });

  it('keeps the server address off the air when hidden', async () => {
    const out = createOutput();
    const config = testConfig({
      server: { host: 'irc.test', port: 6667, hide: true, connectTimeoutMs: 1000 },
      retry: { maxRetries: 1, delayMs: 0 },
    });
    const session = new Session(config, 'N0CALL', {
      out,
      logger: createLogger(),
      socketFactory: () => Promise.reject(new Error('refused')),
    });

    await expect(session.run()).resolves.toBe(1);
    expect(out.lines).toEqual([
      'Connecting to server...',
      '** Error connecting to server.',
      'Unable to connect to server.',
      'Please try again later, exiting.',
    ]);
  });

  it('gives up when every nickname is taken', async () => {
    const socket = new FakeSocket((line, server) => {
      const [command, nick] = line.split(' ');
      if (command === 'NICK') {
        server.serverSays(`:irc.test 433 * ${nick} :Nickname is already in use`);
      }
    });
    const { session, out } = createSession(socket, testConfig({ maxNickRetries: 2 }));

    await expect(session.run()).resolves.toBe(1);

    expect(out.lines.at(-1)).toBe('** Nickname N0CALL still in use after 2 retries');
    expect(socket.written.filter(line => line.startsWith('NICK'))).toHaveLength(3);
    expect(socket.written.at(-1)).toBe('QUIT 73');
  });
});
