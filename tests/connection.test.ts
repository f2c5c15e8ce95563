import { describe, expect, it, vi } from 'vitest';
import { ConnectError, ReceiveError, SendError } from '../src/errors';
import { type ConnectOptions, IrcConnection, connectWithRetry } from '../src/connection';
import { FakeSocket, createLogger } from './helpers/fake-socket';

const options: ConnectOptions = {
  host: 'irc.test',
  port: 6667,
  nick: 'N0CALL-7',
  username: 'N0CALL',
  realname: 'N0CALL',
  timeoutMs: 1000,
};

async function open(socket: FakeSocket, extra: Partial<ConnectOptions> = {}, now?: () => number) {
  return IrcConnection.connect({ ...options, ...extra }, {
    logger: createLogger(),
    socketFactory: async () => socket,
    now,
  });
}

describe('IrcConnection', () => {
  it('registers with NICK and USER', async () => {
    const socket = new FakeSocket();
    await open(socket);
    expect(socket.written).toEqual(['NICK N0CALL-7', 'USER N0CALL 0 * N0CALL']);
  });

  it('sends PASS first when a password is configured', async () => {
    const socket = new FakeSocket();
    await open(socket, { password: 'test-secret' });
    expect(socket.written[0]).toBe('PASS test-secret');
    expect(socket.written[1]).toBe('NICK N0CALL-7');
  });

  it('frames partial chunks into messages', async () => {
    const socket = new FakeSocket();
    const connection = await open(socket);

    socket.push(':alice!a@h PRIVMSG #radio :hel');
    socket.push('lo\r\nPING :irc.test\n');

    const first = await connection.receive(50);
    expect(first).toEqual({
      kind: 'message',
      message: { source: { nick: 'alice', user: 'a', host: 'h' }, command: 'PRIVMSG', params: ['#radio', 'hello'] },
    });
    const second = await connection.receive(50);
    expect(second.kind === 'message' && second.message.command).toBe('PING');
  });

  it('skips malformed lines and keeps reading', async () => {
    const socket = new FakeSocket();
    const logger = createLogger();
    const connection = await IrcConnection.connect(options, { logger, socketFactory: async () => socket });

    socket.serverSays(':irc.test', 'PING :again');
    const result = await connection.receive(50);

    expect(result.kind === 'message' && result.message.params).toEqual(['again']);
    expect(logger.entries().some(entry => entry.level === 'warn' && entry.detail === ':irc.test')).toBe(true);
  });

  it('times out when nothing arrives', async () => {
    const connection = await open(new FakeSocket());
    await expect(connection.receive(20)).resolves.toEqual({ kind: 'timeout' });
  });

  it('reports end of stream when the server hangs up', async () => {
    const socket = new FakeSocket();
    const connection = await open(socket);
    socket.hangUp();

    await expect(connection.receive(500)).resolves.toEqual({ kind: 'end' });
    expect(connection.isConnected).toBe(false);
    expect(() => connection.send('PRIVMSG', '#radio', 'anyone?')).toThrow(SendError);
  });

  it('turns socket errors into ReceiveError', async () => {
    const socket = new FakeSocket();
    const connection = await open(socket);
    socket.emit('error', new Error('link reset'));

    await expect(connection.receive(50)).rejects.toBeInstanceOf(ReceiveError);
  });

  it('sends QUIT once and ignores a second disconnect', async () => {
    const socket = new FakeSocket();
    const connection = await open(socket);

    connection.disconnect('73');
    connection.disconnect('again');

    expect(socket.written.filter(line => line.startsWith('QUIT'))).toEqual(['QUIT 73']);
    expect(connection.isConnected).toBe(false);
    expect(() => connection.sendRaw('PING x')).toThrow(SendError);
    await expect(connection.receive(10)).resolves.toEqual({ kind: 'end' });
  });

  it('pings only after a full idle interval', async () => {
    let clock = 1_000;
    const socket = new FakeSocket();
    const connection = await open(socket, {}, () => clock);

    expect(connection.checkKeepalive()).toBe(false);

    connection.startKeepalive(30_000, 'irc.test');
    clock += 29_999;
    expect(connection.checkKeepalive()).toBe(false);

    clock += 1;
    expect(connection.checkKeepalive()).toBe(true);
    expect(socket.written.at(-1)).toBe('PING irc.test');

    // Other traffic resets the idle timer
    clock += 20_000;
    connection.send('PRIVMSG', '#radio', 'still here');
    clock += 20_000;
    expect(connection.checkKeepalive()).toBe(false);
  });
});

describe('connectWithRetry', () => {
  it('succeeds on the third attempt without counting as exhausted', async () => {
    const socket = new FakeSocket();
    const factory = vi
      .fn()
      .mockRejectedValueOnce(new Error('refused'))
      .mockRejectedValueOnce(new Error('refused'))
      .mockResolvedValueOnce(socket);
    const sleep = vi.fn().mockResolvedValue(undefined);
    const failures: [number, boolean][] = [];

    const { connection, attempts } = await connectWithRetry(options, { maxRetries: 3, delayMs: 5000 }, {
      logger: createLogger(),
      socketFactory: factory,
      sleep,
      onAttemptFailed: (attempt, _error, willRetry) => failures.push([attempt, willRetry]),
    });

    expect(attempts).toBe(3);
    expect(connection.isConnected).toBe(true);
    expect(failures).toEqual([[1, true], [2, true]]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it('gives up after the last attempt', async () => {
    const factory = vi.fn().mockRejectedValue(new Error('refused'));
    const sleep = vi.fn().mockResolvedValue(undefined);
    const failures: boolean[] = [];

    const attempt = connectWithRetry(options, { maxRetries: 3, delayMs: 10 }, {
      logger: createLogger(),
      socketFactory: factory,
      sleep,
      onAttemptFailed: (_attempt, _error, willRetry) => failures.push(willRetry),
    });

    await expect(attempt).rejects.toMatchObject({ name: 'ConnectError', attempts: 3, exhausted: true });
    await expect(attempt).rejects.toBeInstanceOf(ConnectError);
    expect(factory).toHaveBeenCalledTimes(3);
    expect(failures).toEqual([true, true, false]);
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});
