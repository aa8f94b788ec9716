import { Command } from 'commander';
import { describe, expect, it } from 'vitest';

import useDeployArgs, { type Flags, InvalidOptionError, parseFlags } from './args.js';

const parse = (...argv: string[]) =>
  parseFlags(useDeployArgs(new Command('inky-deploy')), argv, 'user');

const invalidToken = (...argv: string[]) => {
  try {
    parse(...argv);
  } catch (err) {
    if (err instanceof InvalidOptionError) return err.token;
    throw err;
  }
  return undefined;
};

describe('parseFlags', () => {
  it('defaults every flag to false', () => {
    expect(parse()).toEqual({
      release: false,
      clean: false,
      deploy: false,
      run: false,
      gdbserver: false,
    });
  });

  const spellings: Array<[string, string, keyof Flags]> = [
    ['-r', '--release', 'release'],
    ['-c', '--clean', 'clean'],
    ['-d', '--deploy', 'deploy'],
    ['-u', '--run', 'run'],
    ['-g', '--gdbserver', 'gdbserver'],
  ];

  it.each(spellings)('treats %s and %s the same', (short, long, key) => {
    const a = parse(short);
    const b = parse(long);

    expect(a).toEqual(b);
    expect(a[key]).toBe(true);
  });

  it('ignores repeated flags and their order', () => {
    expect(parse('-r', '--release', '-d', '-r')).toEqual(parse('-d', '-r'));
  });

  it('rejects bundled short flags as a single token', () => {
    expect(invalidToken('-rd')).toBe('-rd');
    expect(invalidToken('-rx')).toBe('-rx');
  });

  it('treats the end-of-options marker as an invalid token', () => {
    expect(invalidToken('-d', '--')).toBe('--');
    expect(invalidToken('--', '-r')).toBe('--');
  });

  it('checks raw process argv after node and the script', () => {
    const program = useDeployArgs(new Command('inky-deploy'));
    expect(() => parseFlags(program, ['node', 'inky-deploy', '-g', '--bogus'])).toThrow(
      'Invalid option: --bogus'
    );
    expect(parseFlags(useDeployArgs(new Command('inky-deploy')), ['node', 'inky-deploy', '-g'])).toEqual({
      release: false,
      clean: false,
      deploy: false,
      run: false,
      gdbserver: true,
    });
  });

  it('rejects an unknown long option', () => {
    expect(() => parse('--bogus')).toThrow('Invalid option: --bogus');
  });

  it('names the first offending token', () => {
    expect(invalidToken('-d', '--bogus', '-r')).toBe('--bogus');
    expect(invalidToken('-r', 'foo', '--bogus')).toBe('foo');
    expect(invalidToken('-x')).toBe('-x');
  });

  it('does not accept values on boolean flags', () => {
    expect(invalidToken('--release=yes')).toBe('--release=yes');
  });
});
