import { fileURLToPath } from 'url';
import { dirname, basename, join } from 'path';

const __root = findRoot();

function findRoot() {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  const parent = dirname(__dirname);

  return basename(parent) === 'dist' ? dirname(parent) : parent;
}

/**
 * locate a file shipped with the package
 * @param components path components
 * @returns the full path
 */
export function resource(...components: string[]) {
  return join(__root, ...components);
}
