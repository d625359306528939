/**
 * Read-only mirror of the daemon's file store.
 *
 * `file list <dir>` answers with one entry per line:
 *
 *   <dir> images   0
 *   notes.txt      42
 *
 * Files map to their size; directories map to a nested FileNamespace, listed
 * eagerly. Entries change only through list() and delete().
 */

import { posix } from 'node:path';
import { EntryNotFoundError, ParseError } from '../errors.js';
import type { CommandSender } from '../transport/connection.js';
import type { ResponseFrame } from '../transport/frames.js';

const LISTING_LINE = /^(?:(<dir>) )?\s*(\S.*?)\s+(\d+)$/;

export type FileEntry = number | FileNamespace;

/** Plain nested view, as returned by toJSON() */
export interface FileTree {
  [name: string]: number | FileTree;
}

export interface ListingLine {
  name: string;
  size: number;
  directory: boolean;
}

/**
 * Parse one listing line.
 * @returns undefined when the line does not have the listing shape
 */
export function parseListingLine(line: string): ListingLine | undefined {
  const match = LISTING_LINE.exec(line);
  if (!match) {
    return undefined;
  }
  const [, marker, name, size] = match;
  if (name === undefined || size === undefined) {
    return undefined;
  }
  return { name, size: Number(size), directory: marker !== undefined };
}

export class FileNamespace {
  private entries = new Map<string, FileEntry>();

  constructor(
    private readonly sender: CommandSender,
    readonly cwd: string = '/',
  ) {}

  /**
   * Mirror `cwd` and everything below it.
   */
  static async open(sender: CommandSender, cwd = '/'): Promise<FileNamespace> {
    const files = new FileNamespace(sender, cwd);
    await files.list();
    return files;
  }

  /**
   * Refresh the mirror from the daemon.
   *
   * @returns Entry names in listing order
   * @throws ParseError if any line of any listed directory is malformed; the
   *   previous mirror is left in place
   */
  async list(): Promise<string[]> {
    const frame = await this.sender.send('file', ['list', this.cwd]);
    const text = frame?.response ?? '';
    if (typeof text !== 'string') {
      throw new ParseError(`failure parsing file listing in ${this.cwd}`, {
        directory: this.cwd,
        reason: 'listing is not text',
      });
    }

    const next = new Map<string, FileEntry>();
    for (const line of text.split(/\r?\n/)) {
      if (line.trim() === '') continue;

      const entry = parseListingLine(line);
      if (!entry) {
        throw new ParseError(`failure parsing file listing in ${this.cwd}`, {
          directory: this.cwd,
          line,
        });
      }

      if (entry.directory) {
        next.set(entry.name, await FileNamespace.open(this.sender, this.pathOf(entry.name)));
      } else {
        next.set(entry.name, entry.size);
      }
    }

    this.entries = next;
    return this.keys();
  }

  /** Size of a file, or the mirror of a subdirectory */
  get(name: string): FileEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Delete a file or, recursively, a directory. The remote delete goes first;
   * if it fails the mirror keeps the entry.
   *
   * @throws EntryNotFoundError if the mirror has no such entry
   */
  async delete(name: string): Promise<void> {
    if (!this.entries.has(name)) {
      throw new EntryNotFoundError(name, this.cwd);
    }
    await this.sender.send('file', ['delete', this.pathOf(name)]);
    this.entries.delete(name);
  }

  /**
   * Ask the daemon to fetch `name` into its file store. The mirror is not
   * updated; call list() once the transfer has finished.
   */
  async fetch(name: string): Promise<ResponseFrame | undefined> {
    return this.sender.send('file', ['get', this.pathOf(name)]);
  }

  /** Transfers in progress */
  async status(): Promise<ResponseFrame | undefined> {
    return this.sender.send('file', ['status']);
  }

  toJSON(): FileTree {
    const tree: FileTree = {};
    for (const [name, entry] of this.entries) {
      tree[name] = typeof entry === 'number' ? entry : entry.toJSON();
    }
    return tree;
  }

  private pathOf(name: string): string {
    return posix.join(this.cwd, name);
  }
}
