/**
 * Descriptor loading
 *
 * The grammar dump comes from a file, from stdin, or straight from the daemon
 * binary (`<daemon> -cli`). All sources go through the same zod validation.
 */

import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { ParseError } from '../errors.js';
import { descriptorListSchema, type CommandDescriptor } from './types.js';

const execFileAsync = promisify(execFile);

/** Daemon grammar dumps run to a few hundred kilobytes */
const MAX_DUMP_BYTES = 64 * 1024 * 1024;

/**
 * Parse and validate a JSON grammar dump.
 * @param source - Where the text came from, for error messages
 */
export function parseDescriptors(text: string, source = 'input'): CommandDescriptor[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ParseError(`descriptor dump from ${source} is not valid JSON`, { source }, error);
  }

  const result = descriptorListSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue';
    throw new ParseError(`invalid descriptor dump from ${source}: ${where}`, { source }, result.error);
  }

  return result.data;
}

export async function readDescriptorFile(path: string): Promise<CommandDescriptor[]> {
  const text = await readFile(path, 'utf-8');
  return parseDescriptors(text, path);
}

export async function readDescriptorStream(
  stream: AsyncIterable<Buffer | string>,
  source = 'stdin',
): Promise<CommandDescriptor[]> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return parseDescriptors(Buffer.concat(chunks).toString('utf-8'), source);
}

/**
 * Ask the daemon binary for its grammar.
 */
export async function dumpFromDaemon(binary: string): Promise<CommandDescriptor[]> {
  const { stdout } = await execFileAsync(binary, ['-cli'], {
    encoding: 'utf-8',
    maxBuffer: MAX_DUMP_BYTES,
  });
  return parseDescriptors(stdout, `${binary} -cli`);
}

/**
 * Daemon version string: the second word of `<daemon> --version`
 * ("minimega 2.9 ..." → "2.9"), or "unknown".
 */
export async function daemonVersion(binary: string): Promise<string> {
  const { stdout } = await execFileAsync(binary, ['--version'], { encoding: 'utf-8' });
  return parseVersionLine(stdout);
}

export function parseVersionLine(line: string): string {
  return line.trim().split(/\s+/)[1] ?? 'unknown';
}
