/**
 * Run-time binding: the callable surface built straight from a command tree,
 * without generating source first.
 *
 *   const mm = bindCommands(tree, connection);
 *   await mm.vm.info();
 *   await mm.vm.config.qemuoverride('add', 'foo', 'bar');
 *
 * Same contract as the rendered binding: every call is validated against the
 * command's candidate patterns before it reaches the sender.
 */

import type { CommandNode, CommandTree } from '../grammar/tree.js';
import type { CommandSender } from '../transport/connection.js';
import type { ResponseFrame } from '../transport/frames.js';
import { invokeCommand, type CommandArgument, type InvokeOptions } from './invoke.js';

export interface BoundNamespace {
  readonly [name: string]: BoundCommand | BoundNamespace;
}

export type CommandFunction = (...args: CommandArgument[]) => Promise<ResponseFrame | undefined>;

/** A command that may also hold subcommands */
export type BoundCommand = CommandFunction & BoundNamespace;

/**
 * Attach children to a callable. Children may shadow function properties
 * such as `name` or `length`.
 */
export function withSubcommands<F extends CommandFunction, C extends object>(fn: F, children: C): F & C {
  for (const key of Object.keys(children)) {
    if (Object.prototype.hasOwnProperty.call(fn, key)) {
      Object.defineProperty(fn, key, {
        value: undefined,
        writable: true,
        enumerable: true,
        configurable: true,
      });
    }
  }
  return Object.assign(fn, children);
}

function bindChildren(
  siblings: Map<string, CommandNode>,
  sender: CommandSender,
  options: InvokeOptions,
): Record<string, BoundCommand | BoundNamespace> {
  const bound: Record<string, BoundCommand | BoundNamespace> = {};

  for (const [id, node] of siblings) {
    const children: BoundNamespace =
      node.kind === 'interior' ? bindChildren(node.children, sender, options) : {};

    const command = node.command;
    if (!command) {
      bound[id] = children;
      continue;
    }

    const call: CommandFunction = (...args) =>
      invokeCommand(sender, command.name, command.candidates, args, options);
    bound[id] = withSubcommands(call, children);
  }

  return bound;
}

/**
 * Build the callable surface for every command in the tree.
 *
 * @param options - `stream: true` queues all frames of every call for drainStream()
 */
export function bindCommands(
  tree: CommandTree,
  sender: CommandSender,
  options: InvokeOptions = {},
): BoundNamespace {
  return bindChildren(tree.root, sender, options);
}

/**
 * Narrow a bound entry to something callable.
 */
export function isBoundCommand(entry: unknown): entry is BoundCommand {
  return typeof entry === 'function';
}

/**
 * Follow sanitized identifiers down a bound surface: ["vm", "info"] → mm.vm.info
 */
export function lookupCommand(namespace: BoundNamespace, path: readonly string[]): BoundCommand | undefined {
  let entry: BoundCommand | BoundNamespace | undefined = namespace;
  for (const id of path) {
    if (entry === undefined) {
      return undefined;
    }
    entry = entry[id];
  }
  return isBoundCommand(entry) ? entry : undefined;
}
