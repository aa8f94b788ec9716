import cp from 'child_process';
import { promises as fsp } from 'fs';
import path from 'path';

import { BINARY, BUILD_DIR, TARGET } from '../lib/config.js';

export interface Toolchain {
  clean(): Promise<void>;
  build(release: boolean): Promise<number>;
  artifact(release: boolean): string;
}

export function buildArgs(target: string, release: boolean) {
  const args = ['build', `--target=${target}`];
  if (release) args.push('--release');
  return args;
}

/**
 * `cross` wrapper for the fixed ARM target
 */
export class Cross implements Toolchain {
  constructor(
    private cwd: string,
    private target = TARGET,
    private binary = BINARY) {
  }

  clean() {
    return fsp.rm(path.join(this.cwd, BUILD_DIR), { recursive: true, force: true });
  }

  build(release: boolean) {
    return new Promise<number>((resolve, reject) => {
      cp.spawn('cross', buildArgs(this.target, release), { cwd: this.cwd, stdio: 'inherit' })
        .on('error', (err) => reject(new Error(`Unable to run cross: ${err.message}`)))
        .on('exit', (code) => resolve(code ?? 1));
    });
  }

  artifact(release: boolean) {
    const profile = release ? 'release' : 'debug';
    return path.join(this.cwd, BUILD_DIR, this.target, profile, this.binary);
  }
}
