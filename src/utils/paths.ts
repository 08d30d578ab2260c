import { existsSync } from 'node:fs';
import { dirname, join, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);

let cachedRoot: string | undefined;

/**
 * Directory holding package.json. Works from both `src/` and the compiled
 * `dist/src/` tree, so data files are found without copying them on build.
 */
export function projectRoot(): string {
  if (cachedRoot) {
    return cachedRoot;
  }
  let current = dirname(__filename);
  while (!existsSync(join(current, 'package.json'))) {
    const parent = dirname(current);
    if (parent === current) {
      throw new Error(`package.json not found above ${dirname(__filename)}`);
    }
    current = parent;
  }
  cachedRoot = current;
  return current;
}

export function resolveFromRoot(path: string): string {
  return isAbsolute(path) ? path : join(projectRoot(), path);
}
