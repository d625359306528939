/**
 * Daemon connection over a Unix-domain stream socket.
 *
 * One request in flight at a time:
 *
 *   send("echo", ["hello", "there"])
 *     → {"Command":"echo","Args":["hello","there"]}
 *     ← [{"Response":"hello there","Error":""}]
 *
 * Responses carry no length prefix; see FrameAccumulator. When a request
 * yields several frames (or the daemon signals More), the first frame is
 * returned and the rest are queued until drainStream() consumes them. Sending
 * again before that is a ProtocolUsageError.
 */

import * as net from 'node:net';
import {
  CommandError,
  ConnectionError,
  ProtocolUsageError,
} from '../errors.js';
import { FrameAccumulator } from './frame-accumulator.js';
import {
  decodeResponse,
  encodeRequest,
  type DecodedResponse,
  type ResponseFrame,
} from './frames.js';
import { TransportTraceLogger, type TraceOptions } from './trace-logger.js';

export const DEFAULT_TIMEOUT_MS = 60_000;

export type ConnectionStatus = 'disconnected' | 'connected' | 'awaiting-drain' | 'closed';

export interface ConnectionOptions {
  /** Socket idle timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Raw IO tracing (default: off) */
  trace?: TraceOptions;
}

export interface SendOptions {
  /**
   * Queue every frame instead of returning the first one. The call resolves
   * to undefined and the frames are read with drainStream().
   */
  stream?: boolean;
}

/**
 * Anything that can carry a command to the daemon. Connection implements it;
 * bindings and the file mirror only depend on this.
 */
export interface CommandSender {
  send(command: string, args?: readonly string[], options?: SendOptions): Promise<ResponseFrame | undefined>;
}

export class Connection implements CommandSender {
  private socket: net.Socket | null = null;
  private readonly accumulator = new FrameAccumulator();
  private pending: ResponseFrame[] = [];
  private streaming = false;
  /** Daemon promised further documents for the streamed request */
  private continuation = false;
  private lastCommand = '';
  /** A request or drain is waiting on the socket */
  private inFlight = false;
  private state: ConnectionStatus = 'disconnected';

  // Socket events land here; receive() waits on wake()
  private waiter: (() => void) | null = null;
  private failure: ConnectionError | null = null;
  private peerClosed = false;

  private readonly timeoutMs: number;
  private readonly traceOptions: TraceOptions;
  private trace: TransportTraceLogger;

  private constructor(readonly path: string, options: ConnectionOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.traceOptions = options.trace ?? { enabled: false };
    this.trace = new TransportTraceLogger(`socket-${path}`, this.traceOptions);
  }

  /**
   * Open a session with the daemon listening at `path`.
   * @throws ConnectionError when the socket cannot be opened
   */
  static async connect(path: string, options: ConnectionOptions = {}): Promise<Connection> {
    const connection = new Connection(path, options);
    await connection.open();
    return connection;
  }

  get status(): ConnectionStatus {
    return this.state;
  }

  /** A previous request produced frames that have not been drained */
  get streamingOutstanding(): boolean {
    return this.streaming;
  }

  /** Number of queued frames */
  get pendingFrames(): number {
    return this.pending.length;
  }

  get timeout(): number {
    return this.timeoutMs;
  }

  /**
   * Send one command and wait for its response document.
   *
   * @returns The first frame, or undefined when streaming or when the daemon
   *   returned no frames
   * @throws ProtocolUsageError if streamed output from the last request is
   *   unread, or another request is still waiting for its response
   * @throws CommandError if the returned frame carries an error
   * @throws ConnectionError on any transport failure
   */
  async send(
    command: string,
    args: readonly string[] = [],
    options: SendOptions = {},
  ): Promise<ResponseFrame | undefined> {
    if (this.state === 'closed') {
      throw new ConnectionError('connection is closed', { path: this.path, command });
    }
    if (this.inFlight) {
      throw new ProtocolUsageError(
        `"${this.lastCommand}" is still waiting for its response: cannot send "${command}"`,
        { command, previous: this.lastCommand },
      );
    }
    if (this.streaming) {
      if (this.pending.length > 0 || this.continuation) {
        throw new ProtocolUsageError(
          `unread streamed output from "${this.lastCommand}": call drainStream() before sending "${command}"`,
          { pending: this.pending.length, command, previous: this.lastCommand },
        );
      }
      this.finishStream();
    }

    const socket = this.requireSocket(command);
    this.lastCommand = command;
    const { frames, more } = await this.exclusive(async () => {
      await this.write(socket, encodeRequest(command, args), command);
      return this.receive();
    });

    if (options.stream) {
      this.beginStream(frames, more);
      return undefined;
    }

    const [first, ...rest] = frames;
    if (rest.length > 0 || more) {
      this.beginStream(rest, more);
    }

    if (first && first.error) {
      throw new CommandError(command, first.error, first.host);
    }
    return first;
  }

  /**
   * Yield queued frames in order, dequeuing each one. When the daemon signalled
   * More, further documents are read once the queue is empty. Frames are
   * yielded as received; their error fields are the caller's to inspect.
   *
   * Calling this with nothing queued yields nothing.
   */
  async *drainStream(): AsyncGenerator<ResponseFrame, void, undefined> {
    for (;;) {
      const frame = this.pending.shift();
      if (frame) {
        yield frame;
        continue;
      }
      if (!this.continuation) {
        break;
      }
      if (this.inFlight) {
        throw new ProtocolUsageError(`stream from "${this.lastCommand}" is already being drained`, {
          previous: this.lastCommand,
        });
      }
      const next = await this.exclusive(() => this.receive());
      this.pending.push(...next.frames);
      this.continuation = next.more;
    }

    if (this.streaming) {
      this.finishStream();
    }
  }

  /**
   * Drain the stream into an array.
   */
  async collectStream(): Promise<ResponseFrame[]> {
    const frames: ResponseFrame[] = [];
    for await (const frame of this.drainStream()) {
      frames.push(frame);
    }
    return frames;
  }

  /**
   * Close the socket and connect again with the original path and timeout.
   * Undrained frames are discarded.
   *
   * @returns The number of frames that were discarded
   */
  async reconnect(): Promise<number> {
    const discarded = this.pending.length;
    if (discarded > 0 || this.continuation) {
      console.error(
        `[cmdsock] reconnect discarded ${discarded} undrained frame(s) from "${this.lastCommand}"`,
      );
    }

    this.teardown('connection replaced by reconnect');
    this.trace = new TransportTraceLogger(`socket-${this.path}`, this.traceOptions);
    await this.open();
    return discarded;
  }

  async close(): Promise<void> {
    this.teardown('connection closed');
    this.state = 'closed';
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private open(): Promise<void> {
    this.failure = null;
    this.peerClosed = false;
    this.trace.logInfo(`connecting to ${this.path}`);

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ path: this.path });
      socket.setTimeout(this.timeoutMs);

      const onConnectError = (err: Error): void => {
        socket.destroy();
        this.trace.logError(err);
        reject(new ConnectionError(`failed to connect to ${this.path}: ${err.message}`, { path: this.path }, err));
      };
      const onConnectTimeout = (): void => {
        onConnectError(new Error(`timed out after ${this.timeoutMs}ms`));
      };

      socket.once('error', onConnectError);
      socket.once('timeout', onConnectTimeout);

      socket.once('connect', () => {
        socket.off('error', onConnectError);
        socket.off('timeout', onConnectTimeout);
        // Idle between requests is fine; the timeout is re-armed per request
        socket.setTimeout(0);
        this.attach(socket);
        this.state = 'connected';
        this.trace.logInfo('connected');
        resolve();
      });
    });
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;

    socket.on('data', (chunk: Buffer) => {
      this.trace.logReceive(chunk);
      this.accumulator.push(chunk);
      this.wake();
    });

    socket.on('timeout', () => {
      this.fail(new ConnectionError(`socket timed out after ${this.timeoutMs}ms`, { path: this.path }));
      socket.destroy();
    });

    socket.on('error', (err: Error) => {
      this.trace.logError(err);
      this.fail(new ConnectionError(`socket error: ${err.message}`, { path: this.path }, err));
    });

    socket.on('close', () => {
      this.peerClosed = true;
      this.trace.logInfo('socket closed');
      this.wake();
    });
  }

  private async exclusive<T>(action: () => Promise<T>): Promise<T> {
    this.inFlight = true;
    try {
      return await action();
    } finally {
      this.inFlight = false;
    }
  }

  private requireSocket(command: string): net.Socket {
    if (!this.socket || this.socket.destroyed || this.peerClosed) {
      throw new ConnectionError('not connected', { path: this.path, command });
    }
    return this.socket;
  }

  private async write(socket: net.Socket, payload: Buffer, command: string): Promise<void> {
    const before = socket.bytesWritten;
    this.trace.logSend(payload);

    await new Promise<void>((resolve, reject) => {
      socket.write(payload, (err) => {
        if (err) {
          reject(new ConnectionError('failed to write message', { path: this.path, command }, err));
        } else {
          resolve();
        }
      });
    });

    if (socket.bytesWritten - before < payload.length) {
      throw new ConnectionError('failed to write message', {
        path: this.path,
        command,
        written: socket.bytesWritten - before,
        expected: payload.length,
      });
    }
  }

  /**
   * Wait until the accumulated bytes parse as one document.
   */
  private async receive(): Promise<DecodedResponse> {
    this.socket?.setTimeout(this.timeoutMs);
    try {
      for (;;) {
        const attempt = this.accumulator.tryParse();
        if (attempt.complete) {
          return decodeResponse(attempt.value);
        }
        if (this.failure) {
          throw this.failure;
        }
        if (this.peerClosed) {
          throw new ConnectionError('expected response, socket closed', {
            path: this.path,
            command: this.lastCommand,
          });
        }
        await new Promise<void>((resolve) => {
          this.waiter = resolve;
        });
      }
    } finally {
      this.socket?.setTimeout(0);
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  private fail(error: ConnectionError): void {
    if (!this.failure) {
      this.failure = error;
    }
    this.wake();
  }

  private beginStream(frames: ResponseFrame[], more: boolean): void {
    this.pending.push(...frames);
    this.continuation = more;
    this.streaming = true;
    this.state = 'awaiting-drain';
  }

  private finishStream(): void {
    this.streaming = false;
    this.continuation = false;
    if (this.state === 'awaiting-drain') {
      this.state = 'connected';
    }
  }

  private teardown(reason: string): void {
    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.removeAllListeners();
      // Late errors from a discarded socket have no reader left
      socket.on('error', (err: Error) => this.trace.logError(err));
      socket.destroy();
    }

    // Fails a receive() still waiting on the old socket
    this.fail(new ConnectionError(reason, { path: this.path }));

    this.accumulator.reset();
    this.pending = [];
    this.streaming = false;
    this.continuation = false;
    this.inFlight = false;
    this.state = 'disconnected';
    this.trace.close();
  }
}
