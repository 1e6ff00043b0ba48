/**
 * Zip containers through fflate. Wheels are written with unix modes and a
 * fixed timestamp so identical trees give identical bytes.
 */

import { unzipSync, zipSync, type DeflateOptions, type UnzipFileInfo, type Zippable } from 'fflate';

const S_IFREG = 0o100000;
const OS_UNIX = 3;

export interface ZipMember {
  /** Forward-slash path inside the archive */
  name: string;
  data: Uint8Array;
  /** Permission bits, default 0o644 */
  mode?: number;
}

export interface WriteZipOptions {
  /** Timestamp stamped on every entry; 1980-01-01 00:00:00 when absent */
  mtime?: Date;
  level?: DeflateOptions['level'];
}

/**
 * fflate encodes the DOS timestamp from local wall-clock fields, so carry
 * the UTC fields over to keep the bytes independent of the host timezone.
 * DOS dates only cover 1980 to 2099.
 */
export function zipTimestamp(date: Date): Date {
  const year = date.getUTCFullYear();
  if (year < 1980) return new Date(1980, 0, 1);
  if (year > 2099) return new Date(2099, 11, 31, 23, 59, 58);
  return new Date(
    year,
    date.getUTCMonth(),
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  );
}

/**
 * Build a zip in memory. Entries keep the order of `members`: names are
 * paths, never bare array indices, so object key order is insertion order.
 */
export function writeZip(members: ZipMember[], opts: WriteZipOptions = {}): Uint8Array {
  const mtime = zipTimestamp(opts.mtime ?? new Date(Date.UTC(1980, 0, 1)));
  const files: Zippable = {};

  for (const member of members) {
    if (member.name.includes('\\')) throw new Error(`Zip entry name must use forward slashes: ${member.name}`);
    if (member.name in files) throw new Error(`Duplicate zip entry: ${member.name}`);
    const mode = S_IFREG | ((member.mode ?? 0o644) & 0o7777);
    files[member.name] = [member.data, { mtime, os: OS_UNIX, attrs: mode << 16 }];
  }

  return zipSync(files, { level: opts.level ?? 6 });
}

export type ZipFileInfo = UnzipFileInfo;

export function isDirectory(file: ZipFileInfo): boolean {
  return file.name.endsWith('/');
}

/**
 * Entries in central directory order, without decompressing anything.
 */
export function listZip(zip: Uint8Array): ZipFileInfo[] {
  const files: ZipFileInfo[] = [];
  unzipSync(zip, {
    filter: (file) => {
      files.push(file);
      return false;
    },
  });
  return files;
}

/**
 * Decompress the regular files accepted by `filter` (all by default).
 * `filter` sees entries in central directory order.
 */
export function readZip(zip: Uint8Array, filter: (file: ZipFileInfo) => boolean = () => true): Map<string, Uint8Array> {
  const unzipped = unzipSync(zip, { filter: file => !isDirectory(file) && filter(file) });
  return new Map(Object.entries(unzipped));
}
