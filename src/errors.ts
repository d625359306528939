/**
 * Error types for cmdsock
 *
 * Every failure surfaced by the binding, the connection and the generator is a
 * BindingError subclass carrying a machine-readable code and a context record.
 * Nothing here retries: commands may have side effects on the daemon.
 */

export type BindingErrorCode =
  | 'VALIDATION'             // call shape matches no candidate pattern (never sent)
  | 'CONNECTION'             // connect/write/read/close failure
  | 'COMMAND'                // daemon reported an error for the returned frame
  | 'PROTOCOL_USAGE'         // send() while streamed output is unread
  | 'PARSE'                  // malformed file listing, descriptor dump or payload
  | 'UNKNOWN_ARGUMENT_TYPE'  // argument bitmask has no single known kind
  | 'DUPLICATE_COMMAND'      // two descriptors share the full command path
  | 'INVALID_COMMAND_NAME'   // a command word sanitizes to nothing
  | 'ENTRY_NOT_FOUND';       // file mirror has no entry with that name

export class BindingError extends Error {
  readonly code: BindingErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: BindingErrorCode,
    context: Record<string, unknown> = {},
    options: { cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BindingError';
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Client-side argument shape mismatch. Raised before anything is written.
 */
export class ValidationError extends BindingError {
  readonly command: string;
  readonly argument: string;
  readonly expected: string;

  constructor(command: string, argument: string, expected: string, detail?: string) {
    const suffix = detail ? ` (${detail})` : '';
    super(
      `invalid arguments for "${command}": ${argument} expected ${expected}${suffix}`,
      'VALIDATION',
      { command, argument, expected },
    );
    this.name = 'ValidationError';
    this.command = command;
    this.argument = argument;
    this.expected = expected;
  }
}

export class ConnectionError extends BindingError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'CONNECTION', context, { cause });
    this.name = 'ConnectionError';
  }
}

export class CommandError extends BindingError {
  readonly command: string;
  readonly host: string | undefined;

  constructor(command: string, message: string, host?: string) {
    super(message, 'COMMAND', { command, host });
    this.name = 'CommandError';
    this.command = command;
    this.host = host;
  }
}

export class ProtocolUsageError extends BindingError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PROTOCOL_USAGE', context);
    this.name = 'ProtocolUsageError';
  }
}

export class ParseError extends BindingError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'PARSE', context, { cause });
    this.name = 'ParseError';
  }
}

export class UnknownArgumentTypeError extends BindingError {
  readonly bitmask: number;

  constructor(bitmask: number) {
    super(`unknown argument type: ${bitmask}`, 'UNKNOWN_ARGUMENT_TYPE', { bitmask });
    this.name = 'UnknownArgumentTypeError';
    this.bitmask = bitmask;
  }
}

export class DuplicateCommandError extends BindingError {
  constructor(path: readonly string[], sharedPrefix: string) {
    super(
      `duplicate command "${sharedPrefix}" at ${path.join('.')}`,
      'DUPLICATE_COMMAND',
      { path: [...path], sharedPrefix },
    );
    this.name = 'DuplicateCommandError';
  }
}

export class InvalidCommandNameError extends BindingError {
  constructor(word: string, sharedPrefix: string) {
    super(
      `command word "${word}" in "${sharedPrefix}" has no alphabetic characters`,
      'INVALID_COMMAND_NAME',
      { word, sharedPrefix },
    );
    this.name = 'InvalidCommandNameError';
  }
}

export class EntryNotFoundError extends BindingError {
  constructor(name: string, directory: string) {
    super(`no entry "${name}" in ${directory}`, 'ENTRY_NOT_FOUND', { name, directory });
    this.name = 'EntryNotFoundError';
  }
}
