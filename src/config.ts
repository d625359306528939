/**
 * Central configuration for cmdsock
 *
 * Loads environment variables from .env file (if present) and provides
 * typed defaults for all configurable values.
 *
 * Usage:
 *   import { config } from './config.js';
 *   const conn = await Connection.connect(config.daemon.socketPath, {
 *     timeoutMs: config.timeouts.idle,
 *   });
 *
 * The grammar builder and the renderer take explicit options; only the CLIs
 * and the MCP server map this object onto them.
 */
import { config as loadDotenv } from 'dotenv';
import { resolveSocketPath } from './daemon/daemon-paths.js';
import { DEFAULT_DENYLIST } from './grammar/tree.js';

// Load .env file (no-op if doesn't exist, quiet suppresses promotional message)
loadDotenv({ quiet: true });

export const config = Object.freeze({
  daemon: {
    /** Unix socket the daemon listens on */
    socketPath: resolveSocketPath(process.env),
  },

  // Timeout defaults (milliseconds)
  timeouts: {
    /** Socket idle timeout; a stalled read fails instead of hanging */
    idle: parseInt(process.env.CMDSOCK_TIMEOUT_MS ?? '60000', 10),
  },

  generator: {
    /** Version of the generated binding's API surface */
    apiVersion: '2.0.0',
    /** Module specifier the rendered binding imports its runtime from */
    runtimeModule: process.env.CMDSOCK_RUNTIME_MODULE || 'cmdsock',
    /** Prefix marking interface-local commands */
    internalPrefix: '.',
    /** Commands never bound */
    denylist: DEFAULT_DENYLIST,
  },

  grammar: {
    /** Descriptor dump used by the MCP server (output of `<daemon> -cli`) */
    path: process.env.CMDSOCK_GRAMMAR || undefined,
    /** Daemon binary to ask for its grammar when no dump is configured */
    daemonBinary: process.env.CMDSOCK_DAEMON_BIN || undefined,
  },

  trace: {
    enabled: Boolean(process.env.CMDSOCK_TRACE),
    dir: process.env.CMDSOCK_TRACE_DIR || undefined,
  },
});

export type Config = typeof config;
