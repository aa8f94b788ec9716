import path from 'path';

import type { ExecResult, RemoteHost } from './ssh.js';

export interface FakeRemoteOptions {
  /** shared log, so remote calls can be ordered against local ones */
  events?: string[];
  replies?: Record<string, Partial<ExecResult>>;
  runCode?: number;
  onPush?(local: string, remote: string): Promise<void> | void;
}

/**
 * In-memory RemoteHost recording every call as a line in `events`
 */
export class FakeRemote implements RemoteHost {
  readonly events: string[];

  constructor(private options: FakeRemoteOptions = {}) {
    this.events = options.events ?? [];
  }

  async exec(command: string): Promise<ExecResult> {
    this.events.push(`exec ${command}`);
    const reply = this.options.replies?.[command] ?? {};
    return {
      code: reply.code ?? 0,
      stdout: reply.stdout ?? '',
      stderr: reply.stderr ?? '',
    };
  }

  async interactive(command: string) {
    this.events.push(`run ${command}`);
    return this.options.runCode ?? 0;
  }

  async push(local: string, remote: string) {
    this.events.push(`push ${path.basename(local)} -> ${remote}`);
    await this.options.onPush?.(local, remote);
  }

  end() {
    this.events.push('end');
  }
}
