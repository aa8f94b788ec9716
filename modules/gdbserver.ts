import { quote } from './scp.js';
import type { RemoteHost } from './ssh.js';

/**
 * pids of gdbserver processes on the device
 */
export async function running(remote: RemoteHost) {
  // pidof exits 1 with no output when nothing matches
  const { stdout } = await remote.exec('pidof gdbserver');
  return stdout
    .split(/\s+/)
    .filter(token => /^\d+$/.test(token))
    .map(token => parseInt(token, 10));
}

export async function kill(remote: RemoteHost, pids: readonly number[]) {
  const { code, stderr } = await remote.exec(`kill -9 ${pids.join(' ')}`);
  if (code !== 0)
    throw new Error(`Unable to kill gdbserver (${pids.join(' ')}): ${stderr.trim() || `exit code ${code}`}`);
}

export async function launch(remote: RemoteHost, program: string, port: number) {
  const cmd = `nohup gdbserver localhost:${port} ${quote(program)} </dev/null >/dev/null 2>&1 &`;
  const { code, stderr } = await remote.exec(cmd);
  if (code !== 0)
    throw new Error(`Unable to start gdbserver: ${stderr.trim() || `exit code ${code}`}`);
}
