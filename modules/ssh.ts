import { readFile } from 'fs/promises';
import type { Duplex, Readable, Writable } from 'stream';

import { Client, type ConnectConfig, type ExecOptions } from 'ssh2';

import type { SSHConfig } from '../lib/config.js';
import { Push, type UploadDelegate } from './scp.js';

export interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RemoteHost {
  exec(command: string): Promise<ExecResult>;
  interactive(command: string): Promise<number>;
  push(local: string, remote: string, delegate?: UploadDelegate): Promise<void>;
  end(): void;
}

/**
 * The parts of an ssh2 exec channel used here
 */
export interface RemoteChannel extends Duplex {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  setWindow(rows: number, cols: number, height: number, width: number): void;
}

/**
 * The parts of an ssh2 `Client` used here
 */
export interface Session {
  exec(command: string, options: ExecOptions, callback: (err: Error | undefined, channel: RemoteChannel) => void): void;
  end(): void;
}

export interface Terminal {
  stdin: Readable & { isTTY?: boolean; setRawMode?(mode: boolean): unknown };
  stdout: Writable & { isTTY?: boolean; rows?: number; columns?: number };
  stderr: Writable;
}

export async function connect(ssh: SSHConfig) {
  const config: ConnectConfig = {
    host: ssh.host,
    port: ssh.port,
    username: ssh.username,
  };

  const { auth } = ssh;
  if (auth.type === 'key') {
    config.privateKey = await readFile(auth.path);
    if (auth.passphrase)
      config.passphrase = auth.passphrase;
  } else if (auth.type === 'password') {
    config.password = auth.password;
  } else {
    config.agent = auth.socket;
  }

  const client = new Client();
  return new Promise<Client>((resolve, reject) => {
    client
      .on('ready', () => resolve(client))
      .on('error', reject)
      .connect(config);
  });
}

function open(session: Session, command: string, options: ExecOptions = {}) {
  return new Promise<RemoteChannel>((resolve, reject) => {
    session.exec(command, options, (err, stream) => {
      if (err) reject(err);
      else resolve(stream);
    });
  });
}

/**
 * Exit status of a channel; a command killed by a signal counts as 1
 */
function status(stream: RemoteChannel) {
  return new Promise<number>((resolve, reject) => {
    let code = 1;
    stream
      .on('exit', (exitCode: number | null) => {
        if (typeof exitCode === 'number') code = exitCode;
      })
      .on('error', reject)
      .on('close', () => resolve(code));
  });
}

export class SSHHost implements RemoteHost {
  constructor(private session: Session, private terminal: Terminal = process) {}

  async exec(command: string): Promise<ExecResult> {
    const stream = await open(this.session, command);
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    stream.on('data', (chunk: Buffer) => { stdout.push(chunk) });
    stream.stderr.on('data', (chunk: Buffer) => { stderr.push(chunk) });

    const code = await status(stream);
    return {
      code,
      stdout: Buffer.concat(stdout).toString(),
      stderr: Buffer.concat(stderr).toString(),
    };
  }

  async interactive(command: string) {
    const { stdin, stdout, stderr } = this.terminal;
    const isTTY = stdout.isTTY === true;

    const pty = isTTY ? {
      term: process.env.TERM || 'vt100',
      rows: stdout.rows ?? 24,
      cols: stdout.columns ?? 80,
    } : false;

    const stream = await open(this.session, command, { pty });

    if (isTTY && stdin.setRawMode) {
      stdin.setRawMode(true);
    }

    stream.pipe(stdout);
    stream.stderr.pipe(stderr);
    stdin.pipe(stream);

    const onResize = () => {
      stream.setWindow(stdout.rows ?? 24, stdout.columns ?? 80, 0, 0);
    };

    if (isTTY) {
      stdout.on('resize', onResize);
    }

    try {
      return await status(stream);
    } finally {
      if (isTTY) {
        stdout.removeListener('resize', onResize);
        if (stdin.setRawMode) stdin.setRawMode(false);
      }

      stream.unpipe();
      stream.stderr.unpipe();
      stdin.unpipe(stream);
      stdin.pause();
    }
  }

  push(local: string, remote: string, delegate?: UploadDelegate) {
    const exec = (command: string) => open(this.session, command);
    return new Push(exec, local, remote, delegate).execute();
  }

  end() {
    this.session.end();
  }
}
