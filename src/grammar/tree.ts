/**
 * Command Tree Builder
 *
 * Turns the daemon's flat descriptor list into a tree keyed by sanitized
 * command words:
 *
 *   "vm info", "vm launch", "vm kill"
 *     → vm (interior) → { info, launch, kill } (leaves)
 *
 * A node is decided once, at build time: an interior node holds children and
 * may also carry its own command (when the prefix itself is invocable); a leaf
 * holds only a command.
 */

import { DuplicateCommandError, InvalidCommandNameError } from '../errors.js';
import { classifyItem } from './classify.js';
import type { CandidatePattern, CommandDescriptor } from './types.js';

export interface LeafCommand {
  /** Full command as the daemon spells it, e.g. "vm config qemu-override" */
  name: string;
  /** Sanitized identifiers from the root to this command */
  path: string[];
  descriptor: CommandDescriptor;
  /** Classified patterns with the shared-prefix slots stripped */
  candidates: CandidatePattern[];
}

export interface InteriorNode {
  kind: 'interior';
  id: string;
  children: Map<string, CommandNode>;
  /** Present when the namespace prefix is itself a command */
  command?: LeafCommand;
}

export interface LeafNode {
  kind: 'leaf';
  id: string;
  command: LeafCommand;
}

export type CommandNode = InteriorNode | LeafNode;

export interface CommandTree {
  root: Map<string, CommandNode>;
  /** Prefixes skipped as interface-local or denylisted */
  skipped: string[];
}

export interface TreeBuildOptions {
  /** Prefixes starting with this marker are interface-local (default ".") */
  internalPrefix?: string;
  /** Exact shared prefixes never bound */
  denylist?: readonly string[];
}

export const DEFAULT_DENYLIST: readonly string[] = ['help', 'namespace', 'clear namespace'];

/**
 * Keep alphabetic characters only: "qemu-override" → "qemuoverride".
 */
export function sanitizeWord(word: string): string {
  return word.replace(/[^A-Za-z]/g, '');
}

export function splitPrefix(sharedPrefix: string): string[] {
  return sharedPrefix.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Classify every pattern after dropping the slots the prefix already encodes.
 */
export function buildCandidates(descriptor: CommandDescriptor): CandidatePattern[] {
  const prefixLength = splitPrefix(descriptor.shared_prefix).length;

  return descriptor.parsed_patterns.map((pattern) =>
    pattern.slice(prefixLength).map((item, index) => classifyItem(item, index)),
  );
}

export function buildCommandTree(
  descriptors: readonly CommandDescriptor[],
  options: TreeBuildOptions = {},
): CommandTree {
  const internalPrefix = options.internalPrefix ?? '.';
  const denylist = new Set(options.denylist ?? DEFAULT_DENYLIST);
  const tree: CommandTree = { root: new Map(), skipped: [] };

  for (const descriptor of descriptors) {
    const prefix = descriptor.shared_prefix;

    if ((internalPrefix && prefix.startsWith(internalPrefix)) || denylist.has(prefix)) {
      tree.skipped.push(prefix);
      continue;
    }

    const words = splitPrefix(prefix);
    const path = words.map((word) => {
      const id = sanitizeWord(word);
      if (!id) {
        throw new InvalidCommandNameError(word, prefix);
      }
      return id;
    });

    if (path.length === 0) {
      throw new InvalidCommandNameError(prefix, prefix);
    }

    insert(tree.root, path, 0, {
      name: prefix,
      path,
      descriptor,
      candidates: buildCandidates(descriptor),
    });
  }

  return tree;
}

function insert(
  siblings: Map<string, CommandNode>,
  path: readonly string[],
  depth: number,
  command: LeafCommand,
): void {
  const id = path[depth];
  if (id === undefined) {
    return;
  }
  const isLast = depth === path.length - 1;
  const existing = siblings.get(id);

  if (!existing) {
    if (isLast) {
      siblings.set(id, { kind: 'leaf', id, command });
      return;
    }
    const interior: InteriorNode = { kind: 'interior', id, children: new Map() };
    siblings.set(id, interior);
    insert(interior.children, path, depth + 1, command);
    return;
  }

  if (isLast) {
    if (existing.kind === 'leaf' || existing.command) {
      throw new DuplicateCommandError(path, command.name);
    }
    existing.command = command;
    return;
  }

  // A leaf that gains descendants becomes an invocable namespace
  const interior: InteriorNode =
    existing.kind === 'interior'
      ? existing
      : { kind: 'interior', id, children: new Map(), command: existing.command };
  siblings.set(id, interior);
  insert(interior.children, path, depth + 1, command);
}

/**
 * Look up a node by sanitized path.
 */
export function findNode(tree: CommandTree, path: readonly string[]): CommandNode | undefined {
  let siblings = tree.root;
  let node: CommandNode | undefined;

  for (const id of path) {
    node = siblings.get(id);
    if (!node) {
      return undefined;
    }
    if (node.kind === 'leaf') {
      siblings = new Map();
    } else {
      siblings = node.children;
    }
  }

  return node;
}

/**
 * Find the command the daemon spells `name` ("vm info", "vm config qemu-override").
 */
export function findCommand(tree: CommandTree, name: string): LeafCommand | undefined {
  const node = findNode(tree, splitPrefix(name).map(sanitizeWord));
  const command = node?.command;
  return command && command.name === name ? command : undefined;
}

/**
 * All commands in the tree, depth-first, siblings in insertion order.
 */
export function listCommands(tree: CommandTree): LeafCommand[] {
  const commands: LeafCommand[] = [];

  const visit = (siblings: Map<string, CommandNode>): void => {
    for (const node of siblings.values()) {
      if (node.command) {
        commands.push(node.command);
      }
      if (node.kind === 'interior') {
        visit(node.children);
      }
    }
  };

  visit(tree.root);
  return commands;
}
