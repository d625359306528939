/**
 * Argument type classification
 *
 * Bit 0 of a pattern item's type marks it optional; bits 1-5 each name one
 * base kind. Exactly one kind bit must be set.
 */

import { UnknownArgumentTypeError } from '../errors.js';
import type { ArgumentKind, ArgumentSpec, PatternItem } from './types.js';

export const OPTIONAL_BIT = 1 << 0;

/** Declared scan order; the order of the daemon's own item types */
export const KIND_BITS: ReadonlyArray<readonly [ArgumentKind, number]> = [
  ['literal', 1 << 1],
  ['subcommand', 1 << 2],
  ['string', 1 << 3],
  ['choice', 1 << 4],
  ['list', 1 << 5],
];

const KNOWN_KIND_MASK = KIND_BITS.reduce((mask, [, bit]) => mask | bit, 0);

export function isOptional(bitmask: number): boolean {
  return (bitmask & OPTIONAL_BIT) !== 0;
}

/**
 * Map a bitmask to its base kind.
 * @throws UnknownArgumentTypeError when zero, several, or unknown kind bits are set
 */
export function classifyType(bitmask: number): ArgumentKind {
  const kindBits = bitmask & ~OPTIONAL_BIT;

  if (kindBits === 0 || (kindBits & ~KNOWN_KIND_MASK) !== 0) {
    throw new UnknownArgumentTypeError(bitmask);
  }

  // More than one bit set
  if ((kindBits & (kindBits - 1)) !== 0) {
    throw new UnknownArgumentTypeError(bitmask);
  }

  for (const [kind, bit] of KIND_BITS) {
    if (kindBits & bit) {
      return kind;
    }
  }

  throw new UnknownArgumentTypeError(bitmask);
}

/**
 * Classify one pattern item into an argument slot.
 */
export function classifyItem(item: PatternItem, position: number): ArgumentSpec {
  const kind = classifyType(item.type);
  const optional = isOptional(item.type);

  switch (kind) {
    case 'literal': {
      const text = item.text ?? item.key ?? '';
      return { kind, optional, name: text, literal: text };
    }
    case 'choice':
      return {
        kind,
        optional,
        name: item.key || `arg${position}`,
        choices: [...(item.options ?? [])],
      };
    default:
      return { kind, optional, name: item.key || `arg${position}` };
  }
}
