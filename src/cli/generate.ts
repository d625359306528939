#!/usr/bin/env node
/**
 * Generate a typed client binding from the daemon's command grammar
 *
 * Usage: npm run generate -- [grammar.json] [options]
 * Example: minimega -cli | npm run generate -- --out src/minimega.ts
 */

import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { config } from '../config.js';
import { BindingError } from '../errors.js';
import {
  daemonVersion,
  dumpFromDaemon,
  readDescriptorFile,
  readDescriptorStream,
} from '../grammar/descriptors.js';
import { buildCommandTree } from '../grammar/tree.js';
import type { CommandDescriptor } from '../grammar/types.js';
import { renderBinding } from '../binding/render.js';

function showHelp(): void {
  console.log(`
cmdsock-gen - render a TypeScript client from a daemon grammar dump

Usage:
  cmdsock-gen [grammar.json] [options]

Reads the JSON dump from the file argument, from the daemon binary with
--daemon, or from stdin.

Options:
  -o, --out <file>            Write the binding here instead of stdout
  -d, --daemon <binary>       Run "<binary> -cli" and "<binary> --version"
  --daemon-version <version>  Version to stamp when reading a dump
  --runtime <module>          Module the binding imports (default: ${config.generator.runtimeModule})
  --help                      Show this help
`);
}

interface GrammarSource {
  descriptors: CommandDescriptor[];
  version: string | undefined;
}

async function loadGrammar(file: string | undefined, binary: string | undefined): Promise<GrammarSource> {
  if (file) {
    return { descriptors: await readDescriptorFile(file), version: undefined };
  }
  if (binary) {
    const [descriptors, version] = await Promise.all([dumpFromDaemon(binary), daemonVersion(binary)]);
    return { descriptors, version };
  }
  return { descriptors: await readDescriptorStream(process.stdin), version: undefined };
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      out: { type: 'string', short: 'o' },
      daemon: { type: 'string', short: 'd' },
      'daemon-version': { type: 'string' },
      runtime: { type: 'string' },
      help: { type: 'boolean' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    showHelp();
    return;
  }
  if (positionals.length > 1) {
    console.error('Usage: cmdsock-gen [grammar.json] [--out file] [--daemon binary]');
    process.exit(1);
  }

  const binary = values.daemon ?? (positionals[0] ? undefined : config.grammar.daemonBinary);
  const grammar = await loadGrammar(positionals[0], binary);

  const tree = buildCommandTree(grammar.descriptors, {
    internalPrefix: config.generator.internalPrefix,
    denylist: config.generator.denylist,
  });
  if (tree.skipped.length > 0) {
    console.error(`[cmdsock-gen] skipped ${tree.skipped.length} command(s): ${tree.skipped.join(', ')}`);
  }

  const source = renderBinding(tree, {
    apiVersion: config.generator.apiVersion,
    runtimeModule: values.runtime ?? config.generator.runtimeModule,
    daemonVersion: values['daemon-version'] ?? grammar.version,
    generatedAt: new Date(),
  });

  if (values.out) {
    await writeFile(values.out, source, 'utf-8');
    console.error(`[cmdsock-gen] wrote ${grammar.descriptors.length - tree.skipped.length} command(s) to ${values.out}`);
  } else {
    process.stdout.write(source);
  }
}

main().catch((error: unknown) => {
  if (error instanceof BindingError) {
    console.error(`[cmdsock-gen] ${error.name}: ${error.message}`);
  } else {
    console.error('[cmdsock-gen] Fatal error:', error);
  }
  process.exit(1);
});
