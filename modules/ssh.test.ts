import { Duplex, PassThrough } from 'stream';

import type { ExecOptions } from 'ssh2';
import { describe, expect, it } from 'vitest';

import { type RemoteChannel, type Session, SSHHost } from './ssh.js';

class FakeChannel extends Duplex implements RemoteChannel {
  readonly stdin = this;
  readonly stdout = this;
  readonly stderr = new PassThrough();
  readonly received: Buffer[] = [];

  _read() {}

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.received.push(chunk);
    callback();
  }

  setWindow() {}

  /** ends the remote command the way ssh2 reports it: exit, then close */
  finish(code: number | null, signal?: string) {
    setImmediate(() => {
      this.emit('exit', code, signal);
      this.emit('close');
    });
  }
}

type Script = (channel: FakeChannel) => void;

class FakeSession implements Session {
  readonly commands: string[] = [];
  readonly options: ExecOptions[] = [];
  readonly channels: FakeChannel[] = [];
  ended = false;

  constructor(private script: Script) {}

  exec(command: string, options: ExecOptions, callback: (err: Error | undefined, channel: RemoteChannel) => void) {
    this.commands.push(command);
    this.options.push(options);
    const channel = new FakeChannel();
    this.channels.push(channel);
    callback(undefined, channel);
    setImmediate(() => this.script(channel));
  }

  end() {
    this.ended = true;
  }
}

const terminal = () => ({
  stdin: new PassThrough(),
  stdout: new PassThrough(),
  stderr: new PassThrough(),
});

const collect = (stream: PassThrough) => {
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString();
};

describe('SSHHost.exec', () => {
  it('keeps stdout and stderr apart and reports the exit code', async () => {
    const session = new FakeSession((channel) => {
      channel.push('812 790\n');
      channel.stderr.write('pidof: warning\n');
      channel.finish(3);
    });

    const result = await new SSHHost(session, terminal()).exec('pidof gdbserver');

    expect(session.commands).toEqual(['pidof gdbserver']);
    expect(result).toEqual({ code: 3, stdout: '812 790\n', stderr: 'pidof: warning\n' });
  });

  it('reports a signal-killed command as exit code 1', async () => {
    const session = new FakeSession((channel) => channel.finish(null, 'KILL'));

    const result = await new SSHHost(session, terminal()).exec('sleep 100');

    expect(result.code).toBe(1);
  });

  it('reports a clean exit as 0', async () => {
    const session = new FakeSession((channel) => channel.finish(0));

    expect((await new SSHHost(session, terminal()).exec('true')).code).toBe(0);
  });
});

describe('SSHHost.interactive', () => {
  it('wires the terminal to the remote program and returns its status', async () => {
    const term = terminal();
    const output = collect(term.stdout);
    const errors = collect(term.stderr);

    const session = new FakeSession((ch) => {
      term.stdin.write('q\n');
      ch.push('inky> ');
      ch.stderr.write('low battery\n');
      ch.finish(3);
    });

    const code = await new SSHHost(session, term).interactive('inky-gotchi-deploy/inky-gotchi');
    await new Promise((resolve) => setImmediate(resolve));

    expect(code).toBe(3);
    expect(session.commands).toEqual(['inky-gotchi-deploy/inky-gotchi']);
    expect(session.options).toEqual([{ pty: false }]);
    expect(output()).toBe('inky> ');
    expect(errors()).toBe('low battery\n');
    expect(Buffer.concat(session.channels[0]?.received ?? []).toString()).toBe('q\n');
  });

  it('detaches local stdin once the program exits', async () => {
    const term = terminal();
    const session = new FakeSession((ch) => ch.finish(null, 'KILL'));

    expect(await new SSHHost(session, term).interactive('inky-gotchi-deploy/inky-gotchi')).toBe(1);

    term.stdin.write('late\n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(term.stdin.isPaused()).toBe(true);
    expect(session.channels[0]?.received).toEqual([]);
  });
});

describe('SSHHost.end', () => {
  it('closes the session', () => {
    const session = new FakeSession(() => {});
    new SSHHost(session, terminal()).end();
    expect(session.ended).toBe(true);
  });
});
