import path from 'path';

import colors from 'ansi-colors';

import { BINARY, DEPLOY_DIR, GDB_PORT } from '../lib/config.js';
import type { Flags } from '../middlewares/args.js';
import type { Toolchain } from './cross.js';
import { kill, launch, running } from './gdbserver.js';
import type { UploadDelegate } from './scp.js';
import type { RemoteHost } from './ssh.js';
import { stage } from './staging.js';

export class DeployError extends Error {
  constructor(message: string, public readonly code: number) {
    super(message);
    this.name = 'DeployError';
  }
}

export interface DeployContext {
  toolchain: Toolchain;
  /** directory holding the local staging directory */
  workdir: string;
  connect(): Promise<RemoteHost>;
  delegate?: UploadDelegate;
}

function reason(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

async function deploy(remote: RemoteHost, ctx: DeployContext, release: boolean) {
  const pids = await running(remote);
  if (pids.length) {
    console.log(`Killing gdb server process: ${pids.join(' ')}`);
    await kill(remote, pids);
  }

  const dir = path.join(ctx.workdir, DEPLOY_DIR);
  await stage(dir, ctx.toolchain.artifact(release));

  console.info(colors.cyan(`uploading ${DEPLOY_DIR} to ~/${DEPLOY_DIR}`));
  await remote.push(dir, '.', ctx.delegate);
}

/**
 * clean, build, deploy, debug, run; each gated by its flag
 * @returns the process exit code
 */
export async function execute(flags: Flags, ctx: DeployContext) {
  if (flags.clean) {
    try {
      await ctx.toolchain.clean();
    } catch (err) {
      console.warn(colors.yellow(`warning: failed to clean build output: ${reason(err)}`));
    }
  }

  const code = await ctx.toolchain.build(flags.release);
  if (code !== 0)
    throw new DeployError(`cross build failed with exit code ${code}`, code);

  const shouldDeploy = flags.deploy || flags.gdbserver;
  if (!shouldDeploy && !flags.run)
    return 0;

  const remote = await ctx.connect();
  const program = `${DEPLOY_DIR}/${BINARY}`;

  try {
    if (shouldDeploy)
      await deploy(remote, ctx, flags.release);

    if (flags.gdbserver) {
      await launch(remote, program, GDB_PORT);
      console.info(colors.green(`gdbserver started on localhost:${GDB_PORT}`));
    }

    if (flags.run)
      return await remote.interactive(program);

    return 0;
  } finally {
    remote.end();
  }
}
