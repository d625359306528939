/**
 * Argument type classification
 */

import { classifyItem, classifyType, isOptional, KIND_BITS } from '../../../src/grammar/classify.js';
import { UnknownArgumentTypeError } from '../../../src/errors.js';
import { CHOICE, LIST, LITERAL, OPTIONAL, STRING, SUBCOMMAND } from '../helpers/grammar.js';

describe('classifyType', () => {
  it.each([
    [LITERAL, 'literal'],
    [SUBCOMMAND, 'subcommand'],
    [STRING, 'string'],
    [CHOICE, 'choice'],
    [LIST, 'list'],
  ])('maps kind bit %i to %s with and without the optional bit', (bit, kind) => {
    expect(classifyType(bit)).toBe(kind);
    expect(classifyType(bit | OPTIONAL)).toBe(kind);
  });

  it('scans kinds in declared order', () => {
    expect(KIND_BITS.map(([kind]) => kind)).toEqual(['literal', 'subcommand', 'string', 'choice', 'list']);
  });

  it('rejects a bitmask with no kind bit', () => {
    expect(() => classifyType(0)).toThrow(UnknownArgumentTypeError);
    expect(() => classifyType(OPTIONAL)).toThrow('unknown argument type: 1');
  });

  it('rejects a bitmask with several kind bits', () => {
    expect(() => classifyType(STRING | LIST)).toThrow(UnknownArgumentTypeError);
    expect(() => classifyType(LITERAL | CHOICE | OPTIONAL)).toThrow(UnknownArgumentTypeError);
  });

  it('rejects bits beyond the known kinds', () => {
    const error = (() => {
      try {
        classifyType(1 << 6);
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(UnknownArgumentTypeError);
    expect(error).toMatchObject({ code: 'UNKNOWN_ARGUMENT_TYPE', bitmask: 64 });
  });
});

describe('isOptional', () => {
  it('reads bit 0 only', () => {
    expect(isOptional(STRING | OPTIONAL)).toBe(true);
    expect(isOptional(STRING)).toBe(false);
  });
});

describe('classifyItem', () => {
  it('uses the literal text as name and required value', () => {
    expect(classifyItem({ type: LITERAL, text: 'add' }, 0)).toEqual({
      kind: 'literal',
      optional: false,
      name: 'add',
      literal: 'add',
    });
  });

  it('copies choices and names unnamed slots by position', () => {
    expect(classifyItem({ type: CHOICE | OPTIONAL, options: ['true', 'false'] }, 2)).toEqual({
      kind: 'choice',
      optional: true,
      name: 'arg2',
      choices: ['true', 'false'],
    });
  });

  it('keeps the key as the slot name', () => {
    expect(classifyItem({ type: LIST, key: 'vms' }, 0)).toEqual({ kind: 'list', optional: false, name: 'vms' });
  });
});
