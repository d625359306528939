/**
 * Socket path resolution for the daemon
 *
 * The daemon listens on "<base>/minimega", with base defaulting to
 * "<os.tmpdir()>/minimega". CMDSOCK_SOCKET overrides the full path,
 * CMDSOCK_BASE only the base directory.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';

export const SOCKET_NAME = 'minimega';

export const DEFAULT_BASE = join(tmpdir(), 'minimega');

export function socketPathForBase(base: string): string {
  return join(base, SOCKET_NAME);
}

export function resolveSocketPath(env: NodeJS.ProcessEnv): string {
  if (env.CMDSOCK_SOCKET) {
    return env.CMDSOCK_SOCKET;
  }
  return socketPathForBase(env.CMDSOCK_BASE || DEFAULT_BASE);
}
