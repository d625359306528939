/**
 * MCP tool handlers against an in-process daemon stand-in
 */

import { ValidationError } from '../../../src/errors.js';
import { buildCommandTree } from '../../../src/grammar/tree.js';
import {
  DaemonSession,
  handleDrainStream,
  handleListCommands,
  handleListFiles,
  handleRunCommand,
} from '../../../src/service/daemon-tools.js';
import { choice, descriptor, list } from '../helpers/grammar.js';
import { echoHandler, frames, StubDaemon } from '../helpers/stub-daemon.js';

const tree = buildCommandTree([
  descriptor('echo', [[list('args', true)]], { short: 'display input text' }),
  descriptor('vm info', [[], [choice(['summary'], true)]], { short: 'print VM information' }),
  descriptor('file', [[]]),
]);

describe('daemon tools', () => {
  let daemon: StubDaemon;
  let session: DaemonSession;

  beforeEach(async () => {
    daemon = await StubDaemon.start((request) => {
      if (request.Command === 'vm info') {
        return frames({ Response: 'vm1 running', Host: 'node1' }, { Response: 'vm2 paused', Host: 'node2' });
      }
      if (request.Command === 'file') {
        return frames({ Response: request.Args[1] === '/' ? 'a.iso   10\n<dir> img   0' : 'b.img   20' });
      }
      return echoHandler(request);
    });
    session = new DaemonSession(tree, daemon.path, { timeoutMs: 2000 });
  });

  afterEach(async () => {
    await session.close();
    await daemon.stop();
  });

  it('lists commands with their usage', async () => {
    expect(await handleListCommands(session, { prefix: 'vm' })).toBe(
      ['vm info - print VM information', '  vm info', '  vm info [summary]'].join('\n'),
    );
    expect(await handleListCommands(session, { prefix: 'nope' })).toBe('No commands start with "nope".');
    expect(session.connected).toBe(false);
  });

  it('runs a command and returns its frame', async () => {
    expect(await handleRunCommand(session, { command: 'echo', args: [['hello', 'there']] })).toBe('hello there');
    expect(daemon.requests).toEqual([{ Command: 'echo', Args: ['hello', 'there'] }]);
  });

  it('points at drain_stream when frames are queued', async () => {
    expect(await handleRunCommand(session, { command: 'vm info' })).toBe(
      '[node1]\nvm1 running\n\n(1 more frame(s) queued; call drain_stream)',
    );
    expect(await handleDrainStream(session)).toBe('[node2]\nvm2 paused');
    expect(await handleDrainStream(session)).toBe('No stream outstanding.');
  });

  it('queues everything when asked to stream', async () => {
    expect(await handleRunCommand(session, { command: 'vm info', args: ['summary'], stream: true })).toBe(
      'Streaming.\n\n(2 more frame(s) queued; call drain_stream)',
    );
    expect(await handleDrainStream(session)).toBe('[node1]\nvm1 running\n\n[node2]\nvm2 paused');
  });

  it('validates before sending', async () => {
    await expect(handleRunCommand(session, { command: 'vm info', args: ['bogus'] })).rejects.toThrow(ValidationError);
    await expect(handleRunCommand(session, { command: 'vm kill' })).rejects.toThrow('Unknown command "vm kill"');
    expect(daemon.requests).toEqual([]);
  });

  it('lists the file store as JSON', async () => {
    expect(JSON.parse(await handleListFiles(session, {}))).toEqual({ 'a.iso': 10, img: { 'b.img': 20 } });
  });

  it('opens a new connection after the daemon hangs up', async () => {
    daemon.handler = () => null;
    const errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(handleRunCommand(session, { command: 'echo' })).rejects.toThrow('expected response, socket closed');
    expect(session.connected).toBe(false);
    errorLog.mockRestore();

    daemon.handler = echoHandler;
    expect(await handleRunCommand(session, { command: 'echo', args: [['back']] })).toBe('back');
    expect(daemon.connections).toBe(2);
  });

  it('shares one connection between concurrent calls', async () => {
    const results = await Promise.all([
      handleRunCommand(session, { command: 'echo', args: [['one']] }),
      handleRunCommand(session, { command: 'echo', args: [['two']] }),
    ]);

    expect(results).toEqual(['one', 'two']);
    expect(daemon.connections).toBe(1);
    expect(daemon.requests.map((request) => request.Args)).toEqual([['one'], ['two']]);
  });

  it('runs concurrent calls one at a time on an open connection', async () => {
    await handleRunCommand(session, { command: 'echo', args: [['warm']] });
    daemon.handler = (request) => ['[{"Response":"', request.Args.join(' '), '","Error":""}]'];

    const results = await Promise.all([
      handleRunCommand(session, { command: 'echo', args: [['first']] }),
      handleRunCommand(session, { command: 'echo', args: [['second']] }),
      handleRunCommand(session, { command: 'echo', args: [['third']] }),
    ]);

    expect(results).toEqual(['first', 'second', 'third']);
    expect(daemon.connections).toBe(1);
  });
});
