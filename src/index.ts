#!/usr/bin/env node
import { DEFAULT_QUIT_MESSAGE } from './command-interpreter';
import { VERSION, loadConfig } from './config';
import { ContentFilter } from './content-filter';
import { ConfigError, errorMessage } from './errors';
import { InputReader } from './input-reader';
import { Logger } from './logger';
import { Session } from './session';
import type { OutputSink } from './types';

const out: OutputSink = {
  write: line => console.log(line),
};

async function main(): Promise<number> {
  const { config, source } = loadConfig();
  const logger = new Logger({ file: config.log.file, level: config.log.level, append: config.log.append });
  logger.info('config', `Configuration loaded from ${source}`);

  // The packet switch passes the callsign as the first line on stdin
  const input = new InputReader(process.stdin, logger);
  const identity = ((await input.readLine()) ?? '').trim();
  if (!identity) {
    logger.error('config', 'Packet switch did not pass a callsign, exiting');
    await input.stop(0);
    throw new ConfigError('Callsign not passed, check your APPLICATION line. Exiting!');
  }

  logger.setIdentity(identity);
  logger.info('session', `Starting client for ${identity}`);

  const filter = config.filter.enabled ? ContentFilter.fromFile(config.filter.wordListPath, logger) : undefined;

  out.write(`coaxchat v${VERSION}`);
  out.write(config.welcomeText);

  const session = new Session(config, identity, { out, logger, input, filter });

  process.on('SIGINT', () => session.requestStop(DEFAULT_QUIT_MESSAGE));
  process.on('SIGTERM', () => session.requestStop(DEFAULT_QUIT_MESSAGE));

  const exitCode = await session.run();
  out.write('Exiting coaxchat, 73.');
  return exitCode;
}

main()
  .then(exitCode => process.exit(exitCode))
  .catch(error => {
    if (error instanceof ConfigError) {
      out.write(error.message);
    } else {
      out.write(`Failed to start client: ${errorMessage(error)}`);
    }
    process.exit(1);
  });
