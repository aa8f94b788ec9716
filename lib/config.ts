import { z } from 'zod';

export const DEPLOY_DIR = 'inky-gotchi-deploy';
export const GDB_PORT = 1234;
export const TARGET = 'arm-unknown-linux-gnueabi';
export const BINARY = 'inky-gotchi';
export const BUILD_DIR = 'target';

const EnvSchema = z.object({
  DEPLOY_HOST: z.string().default('pizw'),
  SSH_PORT: z.coerce.number().int().min(1).max(65535).default(22),
  SSH_USERNAME: z.string().default('pi'),
  SSH_PRIVATE_KEY: z.string().optional(),
  SSH_PASSPHRASE: z.string().optional(),
  SSH_PASSWORD: z.string().optional(),
  SSH_AUTH_SOCK: z.string().optional(),
});

export type Auth =
  | { type: 'key'; path: string; passphrase?: string }
  | { type: 'password'; password: string }
  | { type: 'agent'; socket: string };

export interface SSHConfig {
  host: string;
  port: number;
  username: string;
  auth: Auth;
}

/**
 * Reads the SSH connection settings from the environment.
 * Empty variables are treated as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv): SSHConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

  const result = EnvSchema.safeParse(defined);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = issue ? issue.path.join('.') : 'environment';
    throw new Error(`Invalid ${name}: ${issue ? issue.message : 'unknown error'}`);
  }

  const vars = result.data;

  let auth: Auth;
  if (vars.SSH_PRIVATE_KEY) {
    auth = { type: 'key', path: vars.SSH_PRIVATE_KEY, passphrase: vars.SSH_PASSPHRASE };
  } else if (vars.SSH_PASSWORD) {
    auth = { type: 'password', password: vars.SSH_PASSWORD };
  } else if (vars.SSH_AUTH_SOCK) {
    auth = { type: 'agent', socket: vars.SSH_AUTH_SOCK };
  } else {
    throw new Error('No SSH credentials. Set SSH_PRIVATE_KEY or SSH_PASSWORD, or start ssh-agent (SSH_AUTH_SOCK)');
  }

  return {
    host: vars.DEPLOY_HOST,
    port: vars.SSH_PORT,
    username: vars.SSH_USERNAME,
    auth,
  };
}
