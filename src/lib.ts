/**
 * cmdsock Public API
 *
 * Runtime for generated bindings, plus the pieces to bind a grammar at run
 * time.
 *
 * @example
 * ```typescript
 * import { Connection, bindCommands, buildCommandTree, readDescriptorFile, config } from 'cmdsock';
 *
 * const tree = buildCommandTree(await readDescriptorFile('grammar.json'));
 * const conn = await Connection.connect(config.daemon.socketPath);
 * const mm = bindCommands(tree, conn);
 * const frame = await mm.echo(['hello', 'there']);
 * await conn.close();
 * ```
 */

// =============================================================================
// Connection
// =============================================================================

export { Connection, DEFAULT_TIMEOUT_MS } from './transport/connection.js';
export type {
  CommandSender,
  ConnectionOptions,
  ConnectionStatus,
  SendOptions,
} from './transport/connection.js';
export { decodeResponse, encodeRequest, formatFrame } from './transport/frames.js';
export type { DecodedResponse, JsonValue, ResponseFrame } from './transport/frames.js';
export { FrameAccumulator, firstValueEnd } from './transport/frame-accumulator.js';
export type { TraceOptions } from './transport/trace-logger.js';

// =============================================================================
// Grammar
// =============================================================================

export { classifyType, classifyItem, isOptional } from './grammar/classify.js';
export {
  buildCommandTree,
  findCommand,
  findNode,
  listCommands,
  sanitizeWord,
  DEFAULT_DENYLIST,
} from './grammar/tree.js';
export type {
  CommandNode,
  CommandTree,
  InteriorNode,
  LeafCommand,
  LeafNode,
  TreeBuildOptions,
} from './grammar/tree.js';
export {
  daemonVersion,
  dumpFromDaemon,
  parseDescriptors,
  readDescriptorFile,
  readDescriptorStream,
} from './grammar/descriptors.js';
export type {
  ArgumentKind,
  ArgumentSpec,
  CandidatePattern,
  CommandDescriptor,
  PatternItem,
} from './grammar/types.js';

// =============================================================================
// Bindings (generated code imports from here)
// =============================================================================

export { formatPattern, invokeCommand, matchInvocation } from './binding/invoke.js';
export type {
  ArgumentValue,
  CommandArgument,
  InvokeOptions,
  KeywordArguments,
  Scalar,
} from './binding/invoke.js';
export { bindCommands, isBoundCommand, lookupCommand, withSubcommands } from './binding/bind.js';
export type { BoundCommand, BoundNamespace, CommandFunction } from './binding/bind.js';
export { renderBinding } from './binding/render.js';
export type { RenderOptions } from './binding/render.js';

// =============================================================================
// Files
// =============================================================================

export { FileNamespace, parseListingLine } from './files/file-namespace.js';
export type { FileEntry, FileTree, ListingLine } from './files/file-namespace.js';

// =============================================================================
// Errors & configuration
// =============================================================================

export * from './errors.js';
export { config } from './config.js';
export type { Config } from './config.js';
export { resolveSocketPath, socketPathForBase } from './daemon/daemon-paths.js';
