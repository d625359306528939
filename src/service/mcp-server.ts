import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { BindingError } from '../errors.js';
import {
  handleDrainStream,
  handleListCommands,
  handleListFiles,
  handleRunCommand,
  listCommandsInputSchema,
  listFilesInputSchema,
  runCommandInputSchema,
  type DaemonSession,
} from './daemon-tools.js';

const DEBUG = process.env.CMDSOCK_DEBUG === '1';

/**
 * Helper to create a success response.
 */
function successResponse(text: string) {
  return {
    content: [{ type: 'text' as const, text }],
  };
}

/**
 * Helper to create an error response.
 * In debug mode, includes the error code and context.
 */
function errorResponse(action: string, error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  let text = message;
  if (DEBUG) {
    text = error instanceof BindingError
      ? `${action}: [${error.code}] ${message} ${JSON.stringify(error.context)}`
      : `${action}: ${message}`;
  }
  return {
    content: [{ type: 'text' as const, text }],
    isError: true,
  };
}

export function createServer(session: DaemonSession, version = '0.1.0'): McpServer {
  const server = new McpServer({
    name: 'cmdsock',
    version,
  });

  server.registerTool(
    'list_commands',
    {
      description: 'List daemon commands with their argument patterns. Literal words are typed as is, <x> is required, [x] optional, <a,b> a choice, <x>... a list.',
      inputSchema: listCommandsInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async (args) => {
      try {
        return successResponse(await handleListCommands(session, args));
      } catch (error) {
        return errorResponse('list_commands', error);
      }
    },
  );

  server.registerTool(
    'run_command',
    {
      description: 'Run one daemon command. Arguments are checked against the command patterns before anything is sent. If more frames follow, call drain_stream before the next command.',
      inputSchema: runCommandInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: false,
        openWorldHint: true,
      },
    },
    async (args) => {
      try {
        return successResponse(await handleRunCommand(session, args));
      } catch (error) {
        return errorResponse('run_command', error);
      }
    },
  );

  server.registerTool(
    'drain_stream',
    {
      description: 'Read every frame still queued from the last command (streamed output, per-host responses).',
      inputSchema: {},
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: true,
      },
    },
    async () => {
      try {
        return successResponse(await handleDrainStream(session));
      } catch (error) {
        return errorResponse('drain_stream', error);
      }
    },
  );

  server.registerTool(
    'list_files',
    {
      description: 'List the daemon file store as nested JSON: files map to their size, directories to their contents.',
      inputSchema: listFilesInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async (args) => {
      try {
        return successResponse(await handleListFiles(session, args));
      } catch (error) {
        return errorResponse('list_files', error);
      }
    },
  );

  return server;
}
