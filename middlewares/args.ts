import { readFileSync } from 'fs';

import type { Command } from 'commander';

import { resource } from '../lib/pathutil.js';

export interface Options {
  release: boolean;
  clean: boolean;
  deploy: boolean;
  run: boolean;
  gdbserver: boolean;
}

export type Flags = Options;

export class InvalidOptionError extends Error {
  constructor(public readonly token: string) {
    super(`Invalid option: ${token}`);
    this.name = 'InvalidOptionError';
  }
}

function version() {
  const pkg: unknown = JSON.parse(readFileSync(resource('package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string')
    return pkg.version;
  return '0.0.0';
}

export default function useDeployArgs(program: Command) {
  return program
    .version(version())
    .option('-r, --release', 'build in release mode')
    .option('-c, --clean', 'remove local build output before building')
    .option('-d, --deploy', 'copy the build to the device, killing any running gdbserver first')
    .option('-g, --gdbserver', 'deploy, then start gdbserver on the device')
    .option('-u, --run', 'run the deployed binary on the device');
}

/**
 * Every spelling the program accepts, one token each
 */
function spellings(program: Command) {
  const known = new Set(['-h', '--help']);
  for (const option of program.options) {
    if (option.short) known.add(option.short);
    if (option.long) known.add(option.long);
  }
  return known;
}

/**
 * Parses argv into deploy flags.
 * @throws InvalidOptionError on the first token that is not a known flag
 */
export function parseFlags(program: Command, argv: readonly string[], from: 'node' | 'user' = 'node'): Flags {
  const known = spellings(program);
  const tokens = from === 'node' ? argv.slice(2) : argv;

  // checked before commander sees them: it would split `-rd` and swallow `--`
  const invalid = tokens.find(token => !known.has(token));
  if (invalid !== undefined)
    throw new InvalidOptionError(invalid);

  program.parse([...argv], { from });

  const opts = program.opts<Partial<Options>>();
  return {
    release: opts.release === true,
    clean: opts.clean === true,
    deploy: opts.deploy === true,
    run: opts.run === true,
    gdbserver: opts.gdbserver === true,
  };
}
