import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { tryFnSync } from './try-fn.js';
import { ConfigError } from '../errors.js';

let cachedRoot: string | null = null;

/**
 * Package root: the nearest ancestor of this module holding a package.json.
 * Resolves the same from src/ (tests) and dist/src/ (built CLI).
 */
export function packageRoot(): string {
  if (cachedRoot) return cachedRoot;

  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) {
      cachedRoot = dir;
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new ConfigError('Unable to locate package root from module path', { path: fileURLToPath(import.meta.url) });
    }
    dir = parent;
  }
}

export function dataFilePath(name: string): string {
  return join(packageRoot(), 'data', name);
}

export function readJsonFile(path: string): unknown {
  const [ok, err, parsed] = tryFnSync((): unknown => JSON.parse(readFileSync(path, 'utf8')));
  if (!ok) {
    throw new ConfigError(`Unable to read JSON file ${path}: ${err.message}`, { original: err, path });
  }
  return parsed;
}
