#!/usr/bin/env node
import colors from 'ansi-colors';
import * as progress from 'cli-progress';
import { Command } from 'commander';

import { loadConfig } from '../lib/config.js';
import useDeployArgs, { type Flags, InvalidOptionError, parseFlags } from '../middlewares/args.js';
import { Cross } from '../modules/cross.js';
import { DeployError, execute } from '../modules/deploy.js';
import type { UploadDelegate } from '../modules/scp.js';
import { SSHHost, connect } from '../modules/ssh.js';

function humanFileSize(size: number) {
  const i = size == 0 ? 0 : Math.floor(Math.log(size) / Math.log(1024));
  const unit = ['B', 'kB', 'MB', 'GB', 'TB'][i];
  if (!unit) throw new Error('Out of range');
  const val = (size / Math.pow(1024, i)).toFixed(2);
  return `${val} ${unit}`;
}

class Delegate implements UploadDelegate {
  bar: progress.SingleBar;
  size: string = 'N/A';

  constructor() {
    this.bar = new progress.SingleBar({
      format: 'Upload |' + colors.green('{bar}') + '| {percentage}% || {filename} {sent}/{totalSize}',
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true
    });
  }

  onReady(size: number, filename: string): void {
    this.size = humanFileSize(size);
    this.bar.start(size, 0, {
      filename,
      sent: 'N/A',
      totalSize: this.size,
    });
  }

  onProgress(sent: number): void {
    this.bar.update(sent, {
      sent: humanFileSize(sent),
      totalSize: this.size
    });
  }

  onEnd() {
    this.bar.stop();
  }
}

async function main() {
  const program = useDeployArgs(new Command('inky-deploy'));

  let flags: Flags;
  try {
    flags = parseFlags(program, process.argv);
  } catch (err) {
    if (err instanceof InvalidOptionError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  const workdir = process.cwd();
  return execute(flags, {
    toolchain: new Cross(workdir),
    workdir,
    connect: async () => new SSHHost(await connect(loadConfig(process.env))),
    delegate: process.stdout.isTTY ? new Delegate() : undefined,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(colors.red(`error: ${message}`));
    process.exitCode = err instanceof DeployError ? err.code : 1;
  });
