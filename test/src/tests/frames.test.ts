/**
 * Response decoding and whole-buffer framing
 */

import { ParseError } from '../../../src/errors.js';
import { FrameAccumulator, firstValueEnd } from '../../../src/transport/frame-accumulator.js';
import { decodeResponse, encodeRequest, formatFrame } from '../../../src/transport/frames.js';

describe('FrameAccumulator', () => {
  it('waits until the whole buffer parses', () => {
    const accumulator = new FrameAccumulator();

    accumulator.push(Buffer.from('[{"Response":'));
    expect(accumulator.tryParse()).toEqual({ complete: false });
    accumulator.push(Buffer.from('"ok","Error":""}]'));

    expect(accumulator.tryParse()).toEqual({
      complete: true,
      value: [{ Response: 'ok', Error: '' }],
      bytes: 30,
    });
    expect(accumulator.size).toBe(0);
  });

  it('reports nothing for an empty buffer', () => {
    expect(new FrameAccumulator().tryParse()).toEqual({ complete: false });
  });

  it('decodes only complete bytes', () => {
    const accumulator = new FrameAccumulator();
    const bytes = Buffer.from('"ü"', 'utf-8');

    accumulator.push(bytes.subarray(0, 2));
    expect(accumulator.tryParse()).toEqual({ complete: false });
    accumulator.push(bytes.subarray(2));

    expect(accumulator.tryParse()).toMatchObject({ complete: true, value: 'ü' });
  });

  it('splits documents that arrive back to back', () => {
    const accumulator = new FrameAccumulator();

    accumulator.push(Buffer.from('{"Resp":[],"More":true}\n{"Resp":[{"Response":"a}]"'));

    expect(accumulator.tryParse()).toEqual({ complete: true, value: { Resp: [], More: true }, bytes: 23 });
    expect(accumulator.size).toBe(27);
    expect(accumulator.tryParse()).toEqual({ complete: false });

    accumulator.push(Buffer.from(',"Error":""}],"More":false}'));
    expect(accumulator.tryParse()).toEqual({
      complete: true,
      value: { Resp: [{ Response: 'a}]', Error: '' }], More: false },
      bytes: 54,
    });
    expect(accumulator.size).toBe(0);
  });
});

describe('firstValueEnd', () => {
  it('finds the close of the first top-level value', () => {
    expect(firstValueEnd(Buffer.from('  [1,[2]] [3]'))).toBe(9);
    expect(firstValueEnd(Buffer.from('{"a":"\\"}"}{}'))).toBe(11);
    expect(firstValueEnd(Buffer.from('[{"a":1}'))).toBeUndefined();
    expect(firstValueEnd(Buffer.from('"text"'))).toBeUndefined();
  });
});

describe('decodeResponse', () => {
  it('reads a bare frame array', () => {
    expect(decodeResponse([{ Response: 'hi', Error: '' }])).toEqual({
      frames: [{ response: 'hi', error: '' }],
      more: false,
    });
  });

  it('reads the envelope and its continuation flag', () => {
    expect(decodeResponse({ Resp: [{ Response: { vms: 2 }, Error: null }], Rendered: 'vms: 2', More: true })).toEqual({
      frames: [{ response: { vms: 2 }, error: '' }],
      more: true,
    });
    expect(decodeResponse({ Resp: null })).toEqual({ frames: [], more: false });
  });

  it('rejects documents that are not responses', () => {
    expect(() => decodeResponse({ Command: 'echo' })).toThrow(ParseError);
    expect(() => decodeResponse([{ Error: 42 }])).toThrow('malformed response frames');
  });
});

describe('encodeRequest', () => {
  it('writes compact JSON', () => {
    expect(encodeRequest('vm info', ['summary']).toString('utf-8')).toBe('{"Command":"vm info","Args":["summary"]}');
  });
});

describe('formatFrame', () => {
  it('aligns tabular output under its header', () => {
    expect(
      formatFrame({
        response: '',
        error: '',
        header: ['name', 'state'],
        tabular: [['vm1', 'RUNNING'], ['database', 'PAUSED']],
      }),
    ).toBe(['name     | state', 'vm1      | RUNNING', 'database | PAUSED'].join('\n'));
  });

  it('prints text as is and anything else as JSON', () => {
    expect(formatFrame({ response: 'hello', error: '' })).toBe('hello');
    expect(formatFrame({ response: { a: 1 }, error: '' })).toBe('{\n  "a": 1\n}');
  });
});
