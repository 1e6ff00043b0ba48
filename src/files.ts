import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Names never copied into a wheel.
 */
export const EXCLUDE = new Set([
  '__pycache__',
  '.git',
  '.DS_Store',
]);

const EXCLUDE_EXT = ['.pyc', '.pyo'];

function excluded(name: string, extraExclude: ReadonlySet<string>): boolean {
  return EXCLUDE.has(name) || extraExclude.has(name) || EXCLUDE_EXT.some(ext => name.endsWith(ext));
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Regular files under `dirPath`, as forward-slash paths relative to it.
 * Directory entries are visited in code-point order, depth first, so the
 * result is the same on every host.
 */
export async function walkFiles(
  dirPath: string,
  extraExclude: ReadonlySet<string> = new Set(),
  prefix = '',
): Promise<string[]> {
  const results: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });
  entries.sort((a, b) => byName(a.name, b.name));

  for (const entry of entries) {
    if (excluded(entry.name, extraExclude)) continue;
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      results.push(...(await walkFiles(join(dirPath, entry.name), extraExclude, rel)));
    } else if (entry.isFile()) {
      results.push(rel);
    }
  }
  return results;
}
