import { createReadStream, createWriteStream } from 'node:fs';
import { chmod, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';
import { ExtractionError, errorMessage } from './errors.js';
import { entries as tarEntries } from './tar.js';
import { readZip } from './zip.js';

/** Archive container kinds release tooling publishes. */
export type ArchiveFormat = 'tar.gz' | 'zip';

/** Path component after the last separator. */
export function memberBaseName(name: string): string {
  const trimmed = name.replace(/\/+$/, '');
  return trimmed.slice(trimmed.lastIndexOf('/') + 1);
}

function gunzipFile(archivePath: string): Readable {
  const file = createReadStream(archivePath);
  const gunzip = file.pipe(createGunzip());
  file.on('error', err => gunzip.destroy(err));
  gunzip.on('close', () => file.destroy());
  return gunzip;
}

/** Writes the first matching member to `dest`; false when none matches. */
type Finder = (archivePath: string, baseName: string, dest: string) => Promise<boolean>;

// First match in the container's native order wins.
const finders: Record<ArchiveFormat, Finder> = {
  'tar.gz': async (archivePath, baseName, dest) => {
    for await (const entry of tarEntries(gunzipFile(archivePath))) {
      if (entry.type === 'file' && memberBaseName(entry.name) === baseName) {
        await pipeline(entry.body(), createWriteStream(dest));
        return true;
      }
    }
    return false;
  },
  zip: async (archivePath, baseName, dest) => {
    // Only the match is inflated
    let matched = false;
    const files = readZip(await readFile(archivePath), (file) => {
      if (matched || memberBaseName(file.name) !== baseName) return false;
      matched = true;
      return true;
    });
    for (const data of files.values()) {
      await writeFile(dest, data);
      return true;
    }
    return false;
  },
};

/**
 * Extract the first member whose base name equals `baseName` into
 * `destDir/baseName` and mark it executable.
 */
export async function extractMember(
  archivePath: string,
  format: ArchiveFormat,
  baseName: string,
  destDir: string,
): Promise<string> {
  await mkdir(destDir, { recursive: true });
  const dest = join(destDir, baseName);

  let found: boolean;
  try {
    found = await finders[format](archivePath, baseName, dest);
  } catch (err) {
    throw new ExtractionError(`Cannot read ${format} archive ${archivePath}: ${errorMessage(err)}`, archivePath);
  }
  if (!found) {
    throw new ExtractionError(`${baseName} not found in ${archivePath}`, archivePath);
  }

  const { mode } = await stat(dest);
  await chmod(dest, mode | 0o111);
  return dest;
}
