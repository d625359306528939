/**
 * Call-time contract of a bound command.
 *
 * A call is matched against each candidate pattern in turn. The first match
 * produces the stringified argument list that goes on the wire; when none
 * matches, the ValidationError from the candidate that got furthest is thrown
 * and nothing is sent.
 */

import { ValidationError } from '../errors.js';
import type { ArgumentSpec, CandidatePattern } from '../grammar/types.js';
import type { CommandSender, SendOptions } from '../transport/connection.js';
import type { ResponseFrame } from '../transport/frames.js';

export type Scalar = string | number | boolean;

export type ArgumentValue = Scalar | readonly Scalar[];

/** Named arguments, keyed by the pattern's slot names */
export interface KeywordArguments {
  readonly [name: string]: ArgumentValue | undefined;
}

export type CommandArgument = ArgumentValue | KeywordArguments;

function isKeywordArguments(value: CommandArgument): value is KeywordArguments {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render a candidate the way the daemon's help text spells patterns:
 * literal, <name>, [name], <a,b>, <name>..., (name)
 */
export function formatPattern(candidate: CandidatePattern): string {
  return candidate.map(formatSlot).join(' ');
}

function formatSlot(spec: ArgumentSpec): string {
  const [open, close] = spec.optional ? ['[', ']'] : ['<', '>'];

  switch (spec.kind) {
    case 'literal':
      return spec.literal ?? spec.name;
    case 'choice':
      return `${open}${(spec.choices ?? []).join(',')}${close}`;
    case 'list':
      return `${open}${spec.name}${close}...`;
    case 'subcommand':
      return `(${spec.name})`;
    default:
      return `${open}${spec.name}${close}`;
  }
}

function describeExpected(spec: ArgumentSpec): string {
  switch (spec.kind) {
    case 'literal':
      return `literal "${spec.literal ?? spec.name}"`;
    case 'choice':
      return `choice of [${(spec.choices ?? []).join(', ')}]`;
    case 'list':
      return 'list';
    case 'subcommand':
      return 'subcommand';
    default:
      return 'string';
  }
}

type MatchResult =
  | { ok: true; tokens: string[] }
  | { ok: false; error: ValidationError; progress: number };

/**
 * Bind the call to one candidate.
 */
function matchCandidate(
  command: string,
  candidate: CandidatePattern,
  positional: readonly ArgumentValue[],
  keywords: KeywordArguments,
): MatchResult {
  const tokens: string[] = [];
  const usedKeywords = new Set<string>();
  let next = 0;

  const fail = (argument: string, expected: string, detail: string | undefined, progress: number): MatchResult => ({
    ok: false,
    error: new ValidationError(command, argument, expected, detail),
    progress,
  });

  for (const [slotIndex, spec] of candidate.entries()) {
    let value: ArgumentValue | undefined;
    let label: string;

    const keyword = spec.kind !== 'literal' && Object.hasOwn(keywords, spec.name) ? keywords[spec.name] : undefined;
    if (keyword !== undefined) {
      value = keyword;
      usedKeywords.add(spec.name);
      label = `"${spec.name}"`;
    } else if (next < positional.length) {
      value = positional[next];
      label = `argument ${next + 1} ("${spec.name}")`;
      next++;
    } else {
      label = `"${spec.name}"`;
    }

    if (value === undefined) {
      if (spec.optional) {
        continue;
      }
      return fail(label, describeExpected(spec), 'missing', slotIndex + 1);
    }

    const expected = describeExpected(spec);

    switch (spec.kind) {
      case 'literal': {
        if (typeof value !== 'string' || value !== spec.literal) {
          return fail(label, expected, `got ${JSON.stringify(value)}`, slotIndex + 1);
        }
        tokens.push(value);
        break;
      }
      case 'string': {
        if (Array.isArray(value)) {
          return fail(label, expected, 'got a list', slotIndex + 1);
        }
        tokens.push(String(value));
        break;
      }
      case 'choice': {
        const text = Array.isArray(value) ? undefined : String(value);
        if (text === undefined || !(spec.choices ?? []).includes(text)) {
          return fail(label, expected, `got ${JSON.stringify(value)}`, slotIndex + 1);
        }
        tokens.push(text);
        break;
      }
      case 'list': {
        if (!Array.isArray(value)) {
          return fail(label, expected, `got ${JSON.stringify(value)}`, slotIndex + 1);
        }
        if (value.length === 0 && !spec.optional) {
          return fail(label, expected, 'list is empty', slotIndex + 1);
        }
        for (const item of value) {
          tokens.push(String(item));
        }
        break;
      }
      case 'subcommand': {
        // Rest of the line is a command of its own
        if (Array.isArray(value)) {
          if (value.length === 0) {
            return fail(label, expected, 'command is empty', slotIndex + 1);
          }
          for (const item of value) {
            tokens.push(String(item));
          }
        } else {
          tokens.push(String(value));
        }
        break;
      }
    }
  }

  if (next < positional.length) {
    return fail(
      `argument ${next + 1}`,
      'no more arguments',
      `got ${JSON.stringify(positional[next])}`,
      candidate.length,
    );
  }

  for (const name of Object.keys(keywords)) {
    if (keywords[name] !== undefined && !usedKeywords.has(name)) {
      return fail(`"${name}"`, 'a known argument name', 'unknown keyword', candidate.length);
    }
  }

  return { ok: true, tokens };
}

/**
 * Validate a call against the candidate patterns.
 *
 * @param args - Positional values, optionally followed by one keyword object
 * @returns The argument tokens to send
 * @throws ValidationError when no candidate accepts the call
 */
export function matchInvocation(
  command: string,
  candidates: readonly CandidatePattern[],
  args: readonly CommandArgument[],
): string[] {
  const positional: ArgumentValue[] = [];
  let keywords: KeywordArguments = {};

  for (const [index, arg] of args.entries()) {
    if (isKeywordArguments(arg)) {
      if (index !== args.length - 1) {
        throw new ValidationError(command, `argument ${index + 1}`, 'a value', 'keyword object must come last');
      }
      keywords = arg;
    } else {
      positional.push(arg);
    }
  }

  let best: { error: ValidationError; progress: number } | undefined;

  for (const candidate of candidates) {
    const result = matchCandidate(command, candidate, positional, keywords);
    if (result.ok) {
      return result.tokens;
    }
    if (!best || result.progress > best.progress) {
      best = { error: result.error, progress: result.progress };
    }
  }

  if (best) {
    throw best.error;
  }
  // No candidate patterns at all: only a bare call is acceptable
  if (positional.length > 0 || Object.keys(keywords).length > 0) {
    throw new ValidationError(command, 'argument 1', 'no arguments');
  }
  return [];
}

export type InvokeOptions = SendOptions;

/**
 * Validate, then forward the command to the daemon and return its result
 * unmodified.
 */
export async function invokeCommand(
  sender: CommandSender,
  command: string,
  candidates: readonly CandidatePattern[],
  args: readonly CommandArgument[],
  options: InvokeOptions = {},
): Promise<ResponseFrame | undefined> {
  const tokens = matchInvocation(command, candidates, args);
  return sender.send(command, tokens, options);
}
