import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseConfig, type PackageConfig } from '../src/config.js';

export const INIT_PY = [
  '"""tool: native binary wrapper."""',
  '',
  '__version__ = "0.0.0"  # set at wheel build time',
  '',
  'def find_binary():',
  '    return "tool"',
  '',
].join('\n');

export const MAIN_PY = 'def main():\n    pass\n';

/**
 * Lay out a package source tree and config under `root`.
 */
export async function makePackage(root: string, overrides: Record<string, unknown> = {}): Promise<PackageConfig> {
  const sourceDir = join(root, 'python', 'tool');
  await mkdir(join(sourceDir, '__pycache__'), { recursive: true });
  await writeFile(join(sourceDir, '__init__.py'), INIT_PY);
  await writeFile(join(sourceDir, '_main.py'), MAIN_PY);
  await writeFile(join(sourceDir, '__pycache__', '_main.cpython-312.pyc'), 'cached');

  return parseConfig(
    {
      name: 'tool',
      repo: 'example-org/tool',
      summary: 'A tool',
      author: 'Example Maintainers',
      authorEmail: 'maintainers@example.com',
      license: 'MIT',
      classifiers: ['Environment :: Console'],
      ...overrides,
    },
    root,
    {},
  );
}

const BLOCK = 512;

function tarHeader(name: string, size: number, mode: number, typeflag: string): Buffer {
  const h = Buffer.alloc(BLOCK);
  h.write(name, 0, 100);
  h.write(`${mode.toString(8).padStart(7, '0')}\0`, 100);
  h.write('0000000\0', 108);
  h.write('0000000\0', 116);
  h.write(`${size.toString(8).padStart(11, '0')}\0`, 124);
  h.write('00000000000\0', 136);
  h.write(typeflag, 156);
  h.write('ustar\x0000', 257);
  h.fill(0x20, 148, 156);
  let sum = 0;
  for (const b of h) sum += b;
  h.write(`${sum.toString(8).padStart(6, '0')}\0 `, 148);
  return h;
}

function padded(data: Buffer): Buffer[] {
  const remainder = data.length % BLOCK;
  return remainder > 0 ? [data, Buffer.alloc(BLOCK - remainder)] : [data];
}

export interface TarFixtureEntry {
  name: string;
  data?: Buffer;
  mode?: number;
  /** '0' regular file (default), '5' directory */
  type?: '0' | '5';
}

/**
 * Uncompressed tar for fixtures. Names over 100 bytes get a GNU long-name record.
 */
export function packTar(files: TarFixtureEntry[]): Buffer {
  const blocks: Buffer[] = [];
  for (const file of files) {
    const data = file.data ?? Buffer.alloc(0);
    const nameBytes = Buffer.from(file.name);
    if (nameBytes.length > 100) {
      const longName = Buffer.concat([nameBytes, Buffer.alloc(1)]);
      blocks.push(tarHeader('././@LongLink', longName.length, 0o644, 'L'), ...padded(longName));
    }
    blocks.push(tarHeader(file.name.slice(0, 100), data.length, file.mode ?? 0o644, file.type ?? '0'), ...padded(data));
  }
  blocks.push(Buffer.alloc(BLOCK * 2));
  return Buffer.concat(blocks);
}

/** Feed a buffer through in fixed-size pieces. */
export async function* chunked(data: Buffer, size: number): AsyncGenerator<Buffer> {
  for (let i = 0; i < data.length; i += size) yield data.subarray(i, i + size);
}

export interface CentralEntry {
  name: string;
  /** High byte of "version made by" */
  os: number;
  /** Unix mode from the external attributes */
  mode: number;
  /** DOS time in the low half, DOS date in the high half */
  dosDateTime: number;
}

/**
 * Central directory fields the unzip API does not report.
 */
export function centralDirectory(zip: Uint8Array): CentralEntry[] {
  const buf = Buffer.from(zip.buffer, zip.byteOffset, zip.byteLength);
  const eocd = buf.lastIndexOf(Buffer.from([0x50, 0x4b, 0x05, 0x06]));
  const count = buf.readUInt16LE(eocd + 10);
  let p = buf.readUInt32LE(eocd + 16);
  const result: CentralEntry[] = [];
  for (let i = 0; i < count; i++) {
    const nameLen = buf.readUInt16LE(p + 28);
    const extraLen = buf.readUInt16LE(p + 30);
    const commentLen = buf.readUInt16LE(p + 32);
    result.push({
      name: buf.toString('utf8', p + 46, p + 46 + nameLen),
      os: buf[p + 5],
      mode: buf.readUInt32LE(p + 38) >>> 16,
      dosDateTime: buf.readUInt32LE(p + 12),
    });
    p += 46 + nameLen + extraLen + commentLen;
  }
  return result;
}
