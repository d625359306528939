/**
 * Daemon tool handlers
 *
 * Plain async functions over a DaemonSession, so they can be called without
 * MCP. mcp-server.ts registers them as tools.
 */

import { z } from 'zod';
import { ConnectionError } from '../errors.js';
import { FileNamespace } from '../files/file-namespace.js';
import { findCommand, listCommands, type CommandTree } from '../grammar/tree.js';
import { formatPattern, invokeCommand } from '../binding/invoke.js';
import { Connection, type ConnectionOptions } from '../transport/connection.js';
import { formatFrame, type ResponseFrame } from '../transport/frames.js';

/**
 * One lazily opened connection plus the grammar it is driven by.
 * A transport failure drops the connection; the next call opens a new one.
 *
 * MCP runs tool handlers concurrently while the daemon takes one request at a
 * time, so use() runs its actions one after another.
 */
export class DaemonSession {
  private connection: Connection | null = null;
  private connecting: Promise<Connection> | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly tree: CommandTree,
    private readonly socketPath: string,
    private readonly options: ConnectionOptions = {},
  ) {}

  get connected(): boolean {
    return this.connection !== null;
  }

  async ensureConnected(): Promise<Connection> {
    if (this.connection) {
      return this.connection;
    }
    if (!this.connecting) {
      this.connecting = Connection.connect(this.socketPath, this.options)
        .then((connection) => {
          this.connection = connection;
          return connection;
        })
        .finally(() => {
          this.connecting = null;
        });
    }
    return this.connecting;
  }

  /**
   * Run `action` on the connection once earlier actions have settled,
   * dropping the connection if the transport failed.
   */
  use<T>(action: (connection: Connection) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runOnConnection(action));
    // Only ordering is chained here; each caller gets its own outcome from run
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runOnConnection<T>(action: (connection: Connection) => Promise<T>): Promise<T> {
    const connection = await this.ensureConnected();
    try {
      return await action(connection);
    } catch (error) {
      if (error instanceof ConnectionError) {
        console.error(`[cmdsock-mcp] dropping connection to ${this.socketPath}: ${error.message}`);
        await this.close();
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    await connection?.close();
  }
}

// Input schemas

export const listCommandsInputSchema = z.object({
  prefix: z.string().optional().describe('Only commands starting with this, e.g. "vm"'),
});

export const runCommandInputSchema = z.object({
  command: z.string().describe('Full command name as listed by list_commands, e.g. "vm info"'),
  args: z
    .array(z.union([z.string(), z.array(z.string())]))
    .default([])
    .describe('Arguments in pattern order; pass a list argument as an array'),
  stream: z
    .boolean()
    .default(false)
    .describe('Queue every frame for drain_stream instead of returning the first'),
});

export const listFilesInputSchema = z.object({
  dir: z.string().default('/').describe('Directory in the daemon file store'),
});

function describeFrame(frame: ResponseFrame): string {
  const text = frame.error ? `Error: ${frame.error}` : formatFrame(frame) || '(no output)';
  return frame.host ? `[${frame.host}]\n${text}` : text;
}

export async function handleListCommands(
  session: DaemonSession,
  rawInput: z.input<typeof listCommandsInputSchema>,
): Promise<string> {
  const { prefix } = listCommandsInputSchema.parse(rawInput);
  const commands = listCommands(session.tree).filter((command) => !prefix || command.name.startsWith(prefix));

  if (commands.length === 0) {
    return prefix ? `No commands start with "${prefix}".` : 'No commands.';
  }

  return commands
    .map((command) => {
      const summary = command.descriptor.help_short.trim();
      const usages = command.candidates.length > 0
        ? command.candidates.map((candidate) => [command.name, formatPattern(candidate)].filter(Boolean).join(' '))
        : [command.name];
      return [`${command.name}${summary ? ` - ${summary}` : ''}`, ...usages.map((usage) => `  ${usage}`)].join('\n');
    })
    .join('\n');
}

export async function handleRunCommand(
  session: DaemonSession,
  rawInput: z.input<typeof runCommandInputSchema>,
): Promise<string> {
  const input = runCommandInputSchema.parse(rawInput);
  const command = findCommand(session.tree, input.command);
  if (!command) {
    throw new Error(`Unknown command "${input.command}". Use list_commands to see what the daemon accepts.`);
  }

  return session.use(async (connection) => {
    const frame = await invokeCommand(connection, command.name, command.candidates, input.args, {
      stream: input.stream,
    });

    const queued = connection.streamingOutstanding
      ? `\n\n(${connection.pendingFrames} more frame(s) queued; call drain_stream)`
      : '';
    if (!frame) {
      return `${input.stream ? 'Streaming.' : '(no frames)'}${queued}`;
    }
    return `${describeFrame(frame)}${queued}`;
  });
}

export async function handleDrainStream(session: DaemonSession): Promise<string> {
  if (!session.connected) {
    return 'No stream outstanding.';
  }
  return session.use(async (connection) => {
    const frames = await connection.collectStream();
    return frames.length > 0 ? frames.map(describeFrame).join('\n\n') : 'No stream outstanding.';
  });
}

export async function handleListFiles(
  session: DaemonSession,
  rawInput: z.input<typeof listFilesInputSchema>,
): Promise<string> {
  const { dir } = listFilesInputSchema.parse(rawInput);
  return session.use(async (connection) => {
    const files = await FileNamespace.open(connection, dir);
    return JSON.stringify(files.toJSON(), null, 2);
  });
}
