import { promises as fsp } from 'fs';
import path from 'path';

/**
 * Recreates `dir` empty and copies `artifact` into it.
 * @returns path of the staged copy
 */
export async function stage(dir: string, artifact: string) {
  await fsp.rm(dir, { recursive: true, force: true });
  await fsp.mkdir(dir);

  const dest = path.join(dir, path.basename(artifact));
  await fsp.copyFile(artifact, dest);
  return dest;
}
