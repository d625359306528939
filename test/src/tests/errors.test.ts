import {
  BindingError,
  CommandError,
  ConnectionError,
  EntryNotFoundError,
  ValidationError,
} from '../../../src/errors.js';

describe('BindingError', () => {
  it('serializes code and context', () => {
    const error = new ValidationError('vm launch', '"name"', 'string', 'missing');

    expect(error).toBeInstanceOf(BindingError);
    expect(error.toJSON()).toEqual({
      name: 'ValidationError',
      message: 'invalid arguments for "vm launch": "name" expected string (missing)',
      code: 'VALIDATION',
      context: { command: 'vm launch', argument: '"name"', expected: 'string' },
    });
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new ConnectionError('failed to connect to /tmp/x: ECONNREFUSED', { path: '/tmp/x' }, cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe('CONNECTION');
  });

  it('carries the daemon host of a failed frame', () => {
    expect(new CommandError('vm kill', 'no such vm', 'node3')).toMatchObject({
      code: 'COMMAND',
      context: { command: 'vm kill', host: 'node3' },
    });
    expect(new EntryNotFoundError('x.iso', '/img').message).toBe('no entry "x.iso" in /img');
  });
});
