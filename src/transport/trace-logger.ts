import { createWriteStream, mkdirSync, WriteStream } from 'node:fs';
import { join } from 'node:path';
import { randomUUID, createHash } from 'node:crypto';

export interface TraceOptions {
  enabled: boolean;
  /** Directory for trace files (default: ./logs) */
  dir?: string;
}

type Direction = 'SEND' | 'RECV';

/** Hex dumps of large responses are cut here */
const HEX_PREVIEW_BYTES = 64;

/**
 * Records raw socket IO of one connection when CMDSOCK_TRACE is set. Each
 * connect or reconnect gets its own file.
 */
export class TransportTraceLogger {
  private stream: WriteStream | null = null;
  private readonly totals: Record<Direction, number> = { SEND: 0, RECV: 0 };
  readonly filePath: string | undefined;

  constructor(private readonly context: string, options: TraceOptions) {
    if (!options.enabled) {
      return;
    }

    const dir = options.dir ?? join(process.cwd(), 'logs');
    mkdirSync(dir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const id = randomUUID().split('-')[0];
    const safeContext = context.replace(/[^A-Za-z0-9_-]/g, '_');
    this.filePath = join(dir, `cmdsock-trace-${safeContext}-${timestamp}-${id}.log`);
    this.stream = createWriteStream(this.filePath, { flags: 'a' });
    this.stream.write(`# Trace start ${new Date().toISOString()} (${context})\n`);
  }

  get enabled(): boolean {
    return this.stream !== null;
  }

  logSend(data: Buffer): void {
    this.logBytes('SEND', data);
  }

  logReceive(data: Buffer): void {
    this.logBytes('RECV', data);
  }

  logInfo(message: string): void {
    this.line('INFO', message);
  }

  logError(error: unknown): void {
    const msg = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    this.line('ERROR', msg);
  }

  close(): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(
      `# Trace end ${new Date().toISOString()} (sent=${this.totals.SEND}, received=${this.totals.RECV})\n`,
    );
    this.stream.end();
    this.stream = null;
  }

  private logBytes(direction: Direction, buffer: Buffer): void {
    if (!this.stream) {
      return;
    }
    this.totals[direction] += buffer.length;

    const text = JSON.stringify(buffer.toString('utf8'));
    const sha1 = createHash('sha1').update(buffer).digest('hex').slice(0, 8);
    const hex = buffer.subarray(0, HEX_PREVIEW_BYTES).toString('hex');
    const more = buffer.length > HEX_PREVIEW_BYTES ? '...' : '';
    this.line(direction, `${text} (bytes=${buffer.length}, sha1=${sha1}, hex=${hex}${more})`);
  }

  private line(type: Direction | 'INFO' | 'ERROR', text: string): void {
    this.stream?.write(`[${new Date().toISOString()}] [${this.context}] ${type}: ${text}\n`);
  }
}
