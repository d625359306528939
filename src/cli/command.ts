#!/usr/bin/env node
/**
 * Send one raw command to the daemon and print every frame it returns
 * Usage: npm run command -- <command> [args...]
 * Example: npm run command -- "vm info"
 */

import { parseArgs } from 'node:util';
import { config } from '../config.js';
import { BindingError } from '../errors.js';
import { Connection } from '../transport/connection.js';
import { formatFrame } from '../transport/frames.js';

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      socket: { type: 'string', short: 's', default: config.daemon.socketPath },
      timeout: { type: 'string', short: 't', default: String(config.timeouts.idle) },
    },
    allowPositionals: true,
  });

  const [command, ...args] = positionals;
  if (!command) {
    console.error('Usage: npm run command -- <command> [args...] [--socket path] [--timeout ms]');
    console.error('Example: npm run command -- echo hello there');
    process.exit(1);
  }

  const connection = await Connection.connect(values.socket, {
    timeoutMs: Number.parseInt(values.timeout, 10),
    trace: config.trace,
  });

  let failed = false;
  try {
    // Stream so that errors on any frame are printed rather than thrown
    await connection.send(command, args, { stream: true });
    for await (const frame of connection.drainStream()) {
      if (frame.error) {
        failed = true;
        console.error(`Error${frame.host ? ` (${frame.host})` : ''}: ${frame.error}`);
      } else {
        console.log(formatFrame(frame) || '(no output)');
      }
    }
  } finally {
    await connection.close();
  }

  if (failed) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof BindingError ? error.message : String(error));
  process.exit(1);
});
