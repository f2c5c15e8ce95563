// Error taxonomy for the client. Remote-originated failures (ParseError,
// ProtocolError) are logged and dropped; local ones end the session.

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConnectError extends Error {
  readonly attempts: number;
  readonly exhausted: boolean;

  constructor(message: string, attempts: number, exhausted: boolean) {
    super(message);
    this.name = 'ConnectError';
    this.attempts = attempts;
    this.exhausted = exhausted;
  }
}

export class SendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SendError';
  }
}

export class ReceiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReceiveError';
  }
}

export class ParseError extends Error {
  readonly line: string;

  constructor(message: string, line: string) {
    super(message);
    this.name = 'ParseError';
    this.line = line;
  }
}

export class EncodingError extends Error {
  readonly line: string;

  constructor(message: string, line: string) {
    super(message);
    this.name = 'EncodingError';
    this.line = line;
  }
}

export class UsageError extends Error {
  readonly command?: string;

  constructor(message: string, command?: string) {
    super(message);
    this.name = 'UsageError';
    this.command = command;
  }
}

export class ProtocolError extends Error {
  readonly command: string;

  constructor(message: string, command: string) {
    super(message);
    this.name = 'ProtocolError';
    this.command = command;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
