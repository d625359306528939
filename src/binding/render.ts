/**
 * Binding Renderer
 *
 * Walks a command tree and emits TypeScript source for a typed client: one
 * callable per command, nested objects per namespace, and `withSubcommands`
 * where a namespace prefix is itself a command. Candidate patterns are emitted
 * as constants; the callables validate against them through the runtime's
 * `invokeCommand` before anything is sent.
 */

import type { CommandNode, CommandTree, LeafCommand } from '../grammar/tree.js';
import { formatPattern } from './invoke.js';

export interface RenderOptions {
  /** Version of the binding API, stamped into the output */
  apiVersion: string;
  /** Module the binding imports its runtime from, e.g. "cmdsock" */
  runtimeModule: string;
  /** Daemon version the grammar was dumped from */
  daemonVersion?: string;
  /** Omitted from the header when not given, keeping output reproducible */
  generatedAt?: Date;
}

const INDENT = '  ';

function literal(value: string): string {
  return JSON.stringify(value);
}

function constantName(command: LeafCommand): string {
  return `candidates_${command.path.join('_')}`;
}

function commentLines(text: string): string[] {
  return text
    .replace(/\*\//g, '*\\/')
    .split('\n')
    .map((line) => line.trimEnd());
}

/**
 * Doc comment for one callable: short help, long help, then usage lines.
 */
function renderDoc(command: LeafCommand, indent: string): string[] {
  const { help_short: short, help_long: long } = command.descriptor;
  const body: string[] = [];

  if (short.trim()) {
    body.push(...commentLines(short.trim()));
  }
  if (long.trim() && long.trim() !== short.trim()) {
    if (body.length > 0) body.push('');
    body.push(...commentLines(long.trim()));
  }

  if (body.length > 0) body.push('');
  body.push('Usage:');
  for (const candidate of command.candidates) {
    const usage = [command.name, formatPattern(candidate)].filter(Boolean).join(' ');
    body.push(`  ${usage.replace(/\*\//g, '*\\/')}`);
  }

  return [
    `${indent}/**`,
    ...body.map((line) => (line ? `${indent} * ${line}` : `${indent} *`)),
    `${indent} */`,
  ];
}

function renderCall(command: LeafCommand): string {
  return (
    `(...args: CommandArgument[]) => ` +
    `invokeCommand(sender, ${literal(command.name)}, ${constantName(command)}, args, options)`
  );
}

function renderNode(node: CommandNode, depth: number): string[] {
  const indent = INDENT.repeat(depth);
  const lines: string[] = [];

  if (node.command) {
    lines.push(...renderDoc(node.command, indent));
  }

  if (node.kind === 'leaf') {
    lines.push(`${indent}${node.id}: ${renderCall(node.command)},`);
    return lines;
  }

  const children = renderChildren(node.children, depth + 1);

  if (node.command) {
    lines.push(`${indent}${node.id}: withSubcommands(${renderCall(node.command)}, {`);
    lines.push(...children);
    lines.push(`${indent}}),`);
  } else {
    lines.push(`${indent}${node.id}: {`);
    lines.push(...children);
    lines.push(`${indent}},`);
  }
  return lines;
}

function renderChildren(siblings: Map<string, CommandNode>, depth: number): string[] {
  const lines: string[] = [];
  for (const node of siblings.values()) {
    lines.push(...renderNode(node, depth));
  }
  return lines;
}

function collectCommands(siblings: Map<string, CommandNode>, into: LeafCommand[]): LeafCommand[] {
  for (const node of siblings.values()) {
    if (node.command) into.push(node.command);
    if (node.kind === 'interior') collectCommands(node.children, into);
  }
  return into;
}

/** An interior node that is also a command needs withSubcommands */
function hasCallableNamespace(siblings: Map<string, CommandNode>): boolean {
  for (const node of siblings.values()) {
    if (node.kind === 'interior' && (node.command || hasCallableNamespace(node.children))) {
      return true;
    }
  }
  return false;
}

function renderCandidates(command: LeafCommand): string[] {
  const lines = [`// ${command.name}`, `const ${constantName(command)}: readonly CandidatePattern[] = [`];
  for (const candidate of command.candidates) {
    lines.push(`${INDENT}${JSON.stringify(candidate)},`);
  }
  lines.push('];');
  return lines;
}

function renderHeader(tree: CommandTree, options: RenderOptions): string[] {
  const commandCount = collectCommands(tree.root, []).length;
  const daemonVersion = options.daemonVersion ?? 'unknown';
  const header = [
    '/**',
    ' * Daemon command bindings',
    ' *',
    ` * Generated by cmdsock-gen (binding API ${options.apiVersion}) from the grammar`,
    ` * of daemon version ${daemonVersion}: ${commandCount} commands.`,
  ];
  if (options.generatedAt) {
    header.push(` * Generated at ${options.generatedAt.toISOString()}.`);
  }
  header.push(
    ' *',
    ' * Regenerate from the daemon grammar instead of editing this file.',
    ' *',
    ' * @example',
    ' * ```typescript',
    ' * const connection = await Connection.connect(socketPath);',
    ' * const client = createClient(connection);',
    ' * const frame = await client.echo(["hello", "there"]);',
    ' * ```',
    ' */',
  );
  return header;
}

/**
 * Render the binding module source.
 */
export function renderBinding(tree: CommandTree, options: RenderOptions): string {
  const commands = collectCommands(tree.root, []);
  const usesNamespaces = hasCallableNamespace(tree.root);

  const runtimeImports = ['invokeCommand'];
  if (usesNamespaces) runtimeImports.push('withSubcommands');
  runtimeImports.push('type CandidatePattern', 'type CommandArgument', 'type CommandSender', 'type InvokeOptions');

  const lines: string[] = [
    ...renderHeader(tree, options),
    '',
    'import {',
    ...runtimeImports.map((name) => `${INDENT}${name},`),
    `} from ${literal(options.runtimeModule)};`,
    '',
    `export const API_VERSION = ${literal(options.apiVersion)};`,
    `export const DAEMON_VERSION = ${literal(options.daemonVersion ?? 'unknown')};`,
    '',
  ];

  for (const command of commands) {
    lines.push(...renderCandidates(command), '');
  }

  lines.push(
    '/**',
    ' * Build the client for a connection (or any other CommandSender).',
    ' *',
    ' * @param options - `stream: true` leaves every frame queued for drainStream()',
    ' */',
    'export function createClient(sender: CommandSender, options: InvokeOptions = {}) {',
    `${INDENT}return {`,
    ...renderChildren(tree.root, 2),
    `${INDENT}};`,
    '}',
    '',
    'export type Client = ReturnType<typeof createClient>;',
    '',
  );

  return lines.join('\n');
}
