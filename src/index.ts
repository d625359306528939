#!/usr/bin/env node
/**
 * cmdsock MCP server entry point (stdio)
 *
 * Exposes the daemon's commands as MCP tools. The grammar comes from a dump
 * file or from the daemon binary itself.
 *
 * @example
 * ```bash
 * minimega -cli > grammar.json
 * cmdsock-mcp --grammar grammar.json --socket /tmp/minimega/minimega
 * ```
 */

import { parseArgs } from 'node:util';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from './config.js';
import { dumpFromDaemon, readDescriptorFile } from './grammar/descriptors.js';
import { buildCommandTree } from './grammar/tree.js';
import type { CommandDescriptor } from './grammar/types.js';
import { DaemonSession } from './service/daemon-tools.js';
import { createServer } from './service/mcp-server.js';

const { values } = parseArgs({
  options: {
    grammar: { type: 'string', short: 'g', default: config.grammar.path },
    daemon: { type: 'string', short: 'd', default: config.grammar.daemonBinary },
    socket: { type: 'string', short: 's', default: config.daemon.socketPath },
    help: { type: 'boolean' },
  },
  allowPositionals: false,
});

function showHelp(): void {
  console.log(`
cmdsock-mcp - MCP server for a command-socket daemon

Usage:
  cmdsock-mcp [options]

Options:
  -g, --grammar <file>    Grammar dump (default: CMDSOCK_GRAMMAR)
  -d, --daemon <binary>   Ask the daemon binary for its grammar instead
  -s, --socket <path>     Daemon socket (default: ${config.daemon.socketPath})
  --help                  Show this help
`);
}

async function loadDescriptors(): Promise<CommandDescriptor[]> {
  if (values.grammar) {
    return readDescriptorFile(values.grammar);
  }
  if (values.daemon) {
    return dumpFromDaemon(values.daemon);
  }
  throw new Error('no grammar: pass --grammar or --daemon (or set CMDSOCK_GRAMMAR / CMDSOCK_DAEMON_BIN)');
}

async function main(): Promise<void> {
  if (values.help) {
    showHelp();
    process.exit(0);
  }

  const tree = buildCommandTree(await loadDescriptors(), {
    internalPrefix: config.generator.internalPrefix,
    denylist: config.generator.denylist,
  });
  const session = new DaemonSession(tree, values.socket, {
    timeoutMs: config.timeouts.idle,
    trace: config.trace,
  });

  const server = createServer(session);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[cmdsock-mcp] serving daemon at ${values.socket}`);

  process.on('SIGINT', () => {
    console.error('\n[cmdsock-mcp] shutting down...');
    session
      .close()
      .then(() => server.close())
      .catch((error: unknown) => console.error('[cmdsock-mcp] shutdown failed:', error))
      .finally(() => process.exit(0));
  });
}

main().catch((error: unknown) => {
  console.error('[cmdsock-mcp] Fatal error:', error);
  process.exit(1);
});
