/**
 * Rendered binding source
 */

import * as ts from 'typescript';
import { lookupCommand, type BoundNamespace } from '../../../src/binding/bind.js';
import { renderBinding } from '../../../src/binding/render.js';
import { ValidationError } from '../../../src/errors.js';
import { buildCommandTree } from '../../../src/grammar/tree.js';
import type { CommandDescriptor } from '../../../src/grammar/types.js';
import * as runtime from '../../../src/lib.js';
import type { CommandSender, SendOptions } from '../../../src/transport/connection.js';
import type { ResponseFrame } from '../../../src/transport/frames.js';
import { choice, descriptor, list, str } from '../helpers/grammar.js';

const options = { apiVersion: '2.0.0', runtimeModule: 'cmdsock', daemonVersion: '2.9' };

function render(...descriptors: CommandDescriptor[]): string[] {
  return renderBinding(buildCommandTree(descriptors), options).split('\n');
}

describe('renderBinding', () => {
  it('emits candidates, docs and a callable per leaf', () => {
    const lines = render(descriptor('echo', [[list('args', true)]], { short: 'display input text' }));

    expect(lines).toContain('const candidates_echo: readonly CandidatePattern[] = [');
    expect(lines).toContain('  [{"kind":"list","optional":true,"name":"args"}],');

    const start = lines.indexOf('  return {');
    expect(lines.slice(start, start + 10)).toEqual([
      '  return {',
      '    /**',
      '     * display input text',
      '     *',
      '     * Usage:',
      '     *   echo [args]...',
      '     */',
      '    echo: (...args: CommandArgument[]) => invokeCommand(sender, "echo", candidates_echo, args, options),',
      '  };',
      '}',
    ]);
  });

  it('nests namespaces and wraps invocable ones in withSubcommands', () => {
    const lines = render(
      descriptor('vm info'),
      descriptor('mesh'),
      descriptor('mesh degree', [[str('degree', true)]]),
    );

    expect(lines).toContain('  withSubcommands,');
    expect(lines).toContain('    vm: {');
    expect(lines).toContain(
      '      info: (...args: CommandArgument[]) => invokeCommand(sender, "vm info", candidates_vm_info, args, options),',
    );
    expect(lines).toContain(
      '    mesh: withSubcommands((...args: CommandArgument[]) => invokeCommand(sender, "mesh", candidates_mesh, args, options), {',
    );
    expect(lines).toContain(
      '      degree: (...args: CommandArgument[]) => invokeCommand(sender, "mesh degree", candidates_mesh_degree, args, options),',
    );
    expect(lines).toContain('    }),');
  });

  it('imports withSubcommands only when needed', () => {
    const lines = render(descriptor('vm info'), descriptor('vm kill', [[str('target')]]));

    expect(lines).not.toContain('  withSubcommands,');
    expect(lines.slice(lines.indexOf('import {'), lines.indexOf('import {') + 7)).toEqual([
      'import {',
      '  invokeCommand,',
      '  type CandidatePattern,',
      '  type CommandArgument,',
      '  type CommandSender,',
      '  type InvokeOptions,',
      '} from "cmdsock";',
    ]);
  });

  it('stamps versions and leaves the date out unless given', () => {
    const tree = buildCommandTree([descriptor('echo')]);
    const lines = renderBinding(tree, options).split('\n');

    expect(lines).toContain(' * Generated by cmdsock-gen (binding API 2.0.0) from the grammar');
    expect(lines).toContain(' * of daemon version 2.9: 1 commands.');
    expect(lines).toContain('export const DAEMON_VERSION = "2.9";');
    expect(lines.some((line) => line.startsWith(' * Generated at'))).toBe(false);

    const dated = renderBinding(tree, { ...options, generatedAt: new Date('2024-05-01T12:00:00Z') });
    expect(dated.split('\n')).toContain(' * Generated at 2024-05-01T12:00:00.000Z.');
  });

  it('escapes comment terminators in help text', () => {
    const lines = render(descriptor('vm info', [[]], { short: 'list VMs', long: 'matches /tmp/*/disk */' }));

    expect(lines).toContain('     * matches /tmp/*\\/disk *\\/');
  });
});

type ClientFactory = (sender: CommandSender, options?: SendOptions) => unknown;

function isClientFactory(value: unknown): value is ClientFactory {
  return typeof value === 'function';
}

function isNamespace(value: unknown): value is BoundNamespace {
  return typeof value === 'object' && value !== null;
}

/** Compile rendered source and evaluate it against the library runtime */
function loadBinding(source: string): ClientFactory {
  const { outputText } = ts.transpileModule(source, {
    compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2022 },
  });
  const moduleExports: Record<string, unknown> = {};
  const requireRuntime = (name: string): unknown => {
    if (name !== 'cmdsock') {
      throw new Error(`unexpected import ${name}`);
    }
    return runtime;
  };
  new Function('require', 'exports', outputText)(requireRuntime, moduleExports);

  const createClient = moduleExports['createClient'];
  if (!isClientFactory(createClient)) {
    throw new Error('rendered module has no createClient');
  }
  return createClient;
}

describe('rendered binding at run time', () => {
  const sent: Array<{ command: string; args: readonly string[]; options: SendOptions | undefined }> = [];
  const sender: CommandSender = {
    async send(command, args = [], sendOptions): Promise<ResponseFrame> {
      sent.push({ command, args, options: sendOptions });
      return { response: args.join(' '), error: '' };
    },
  };

  const createClient = loadBinding(
    renderBinding(
      buildCommandTree([
        descriptor('vm launch', [[choice(['kvm', 'container'], false, 'type'), str('name')]]),
        descriptor('mesh'),
        descriptor('mesh degree', [[str('degree', true)]]),
      ]),
      options,
    ),
  );

  beforeEach(() => {
    sent.length = 0;
  });

  it('validates and forwards calls', async () => {
    const client = createClient(sender);
    if (!isNamespace(client)) {
      throw new Error('client is not an object');
    }

    expect(await lookupCommand(client, ['vm', 'launch'])?.('kvm', { name: 'vm1' })).toEqual({
      response: 'kvm vm1',
      error: '',
    });
    await lookupCommand(client, ['mesh'])?.();
    await lookupCommand(client, ['mesh', 'degree'])?.('3');

    expect(sent).toEqual([
      { command: 'vm launch', args: ['kvm', 'vm1'], options: {} },
      { command: 'mesh', args: [], options: {} },
      { command: 'mesh degree', args: ['3'], options: {} },
    ]);
  });

  it('rejects bad arguments before sending', async () => {
    const client = createClient(sender, { stream: true });
    if (!isNamespace(client)) {
      throw new Error('client is not an object');
    }

    await expect(lookupCommand(client, ['vm', 'launch'])?.('qemu', 'vm1')).rejects.toThrow(ValidationError);
    expect(sent).toEqual([]);
  });
});
