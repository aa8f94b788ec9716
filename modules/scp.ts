import { once } from 'events';
import { type Stats, createReadStream, promises as fsp } from 'fs';
import path from 'path';
import type { Readable, Writable } from 'stream';

export interface SinkChannel {
  stdin: Writable;
  stdout: Readable;
  stderr?: Readable;
}

export type Exec = (command: string) => Promise<SinkChannel>;

export interface UploadDelegate {
  onReady(size: number, filename: string): void;
  onProgress(sent: number): void;
  onEnd(): void;
}

export function quote(name: string) {
  return `'${name.replace(/'/g, `'\\''`)}'`;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * Reads the sink's status replies: a single 0 byte, or 1/2 followed by a message line
 */
class Acknowledger {
  #buffer = Buffer.alloc(0);
  #waiters: Waiter[] = [];
  #ended = false;

  constructor(input: Readable) {
    input
      .on('data', (chunk: Buffer) => {
        this.#buffer = Buffer.concat([this.#buffer, chunk]);
        this.#drain();
      })
      .on('end', () => {
        this.#ended = true;
        this.#drain();
      })
      .on('error', (err: Error) => {
        for (const waiter of this.#waiters.splice(0))
          waiter.reject(err);
      });
  }

  next() {
    return new Promise<void>((resolve, reject) => {
      this.#waiters.push({ resolve, reject });
      this.#drain();
    });
  }

  #drain() {
    while (this.#waiters.length && this.#buffer.length) {
      const status = this.#buffer[0];
      let message = '';

      if (status === 0) {
        this.#buffer = this.#buffer.subarray(1);
      } else {
        const eol = this.#buffer.indexOf(0x0A, 1);
        if (eol === -1) break;
        message = this.#buffer.toString('utf8', 1, eol);
        this.#buffer = this.#buffer.subarray(eol + 1);
      }

      const waiter = this.#waiters.shift();
      if (!waiter) break;

      if (status === 0) waiter.resolve();
      else waiter.reject(new Error(message || `scp responded with status ${status}`));
    }

    if (this.#ended && this.#waiters.length) {
      // a status byte whose message line never completed
      const rest = this.#buffer.length && this.#buffer[0] !== 0
        ? this.#buffer.toString('utf8', 1).trim()
        : '';
      this.#buffer = Buffer.alloc(0);
      for (const waiter of this.#waiters.splice(0))
        waiter.reject(new Error(rest || 'scp closed the connection'));
    }
  }
}

/**
 * Recursive upload, driving a remote `scp -t` sink
 */
export class Push {
  #exec: Exec;
  #local: string;
  #remote: string;
  #delegate: UploadDelegate | undefined;

  constructor(exec: Exec, local: string, remote: string, delegate?: UploadDelegate) {
    this.#exec = exec;
    this.#local = local;
    this.#remote = remote;
    this.#delegate = delegate;
  }

  async execute() {
    const channel = await this.#exec(`scp -r -t ${quote(this.#remote)}`);
    const acks = new Acknowledger(channel.stdout);
    const { stdin, stderr } = channel;

    stderr?.pipe(process.stderr, { end: false });

    const send = async (data: Buffer | string) => {
      if (!stdin.write(data)) await once(stdin, 'drain');
    };

    const command = async (line: Buffer | string) => {
      await send(line);
      await acks.next();
    };

    const header = async (stat: Stats, basename: string) => {
      const k = 1000;
      const mtime = stat.mtime.getTime();
      const atime = stat.atime.getTime();
      await command(`T${Math.floor(mtime / k)} ${(mtime % k) * k} ${Math.floor(atime / k)} ${(atime % k) * k}\n`);

      const mode = (stat.mode & 0o777).toString(8).padStart(4, '0');
      const kind = stat.isDirectory() ? 'D' : 'C';
      const size = stat.isDirectory() ? 0 : stat.size;
      await command(`${kind}${mode} ${size} ${basename}\n`);
    };

    const visit = async (item: string) => {
      const basename = path.basename(item);
      if (basename.includes('\n'))
        throw new Error(`Unsupported file name: ${JSON.stringify(basename)}`);

      const stat = await fsp.stat(item);
      if (stat.isDirectory()) {
        await header(stat, basename);
        const files = (await fsp.readdir(item)).sort();
        for (const file of files) {
          await visit(path.join(item, file));
        }
        await command('E\n');
      } else if (stat.isFile()) {
        await header(stat, basename);

        const delegate = this.#delegate;
        delegate?.onReady(stat.size, basename);
        let sent = 0;
        for await (const chunk of createReadStream(item)) {
          if (!Buffer.isBuffer(chunk)) continue;
          await send(chunk);
          sent += chunk.length;
          delegate?.onProgress(sent);
        }
        await command(Buffer.from([0]));
        delegate?.onEnd();
      }
    };

    try {
      // sink announces readiness with a single 0
      await acks.next();
      await visit(this.#local);
    } finally {
      stdin.end();
      stderr?.unpipe(process.stderr);
    }
  }
}
