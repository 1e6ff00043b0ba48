/**
 * Artifact acquisition: fetch a release archive and extract the binary, or
 * pick up a prebuilt binary from a local directory.
 */

import { chmod, copyFile, constants, mkdir, stat, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { AcquisitionError, errorMessage } from './errors.js';
import { extractMember } from './extract.js';
import { targetLabel, type TargetDescriptor } from './targets.js';

export interface AcquiredBinary {
  target: TargetDescriptor;
  path: string;
}

export interface AcquireOptions {
  /** Package name used in release archive and directory names */
  name: string;
  version: string;
  /** `<org>/<repo>` */
  repo: string;
  /** Release host base URL */
  host: string;
  /** Per-target scratch directory; everything acquired lands here */
  scratchDir: string;
  /** Local mode when set */
  binariesDir?: string;
  log?: (line: string) => void;
}

export function releaseArchiveName(name: string, version: string, target: TargetDescriptor): string {
  return `${name}_${version}_${target.os}_${target.arch}.${target.archive}`;
}

export function releaseUrl(opts: { host: string; repo: string; name: string; version: string }, target: TargetDescriptor): string {
  const { host, repo, name, version } = opts;
  return `${host}/${repo}/releases/download/v${version}/${releaseArchiveName(name, version, target)}`;
}

/** Candidate locations, in search order, for a binary in a local directory. */
export function localCandidates(binariesDir: string, name: string, target: TargetDescriptor): string[] {
  const dirName = `${name}_${target.os}_${target.arch}`;
  return [
    join(binariesDir, dirName, target.binaryName),
    join(binariesDir, `${dirName}_v1`, target.binaryName),
    join(binariesDir, target.binaryName),
  ];
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Download a release archive to `destPath`. Not retried.
 */
export async function downloadArchive(url: string, destPath: string): Promise<string> {
  let res: Response;
  try {
    res = await fetch(url);
  } catch (err) {
    throw new AcquisitionError(`Download failed for ${url}: ${errorMessage(err)}`, { url, cause: err });
  }
  if (!res.ok) {
    throw new AcquisitionError(`Download failed for ${url}: HTTP ${res.status}`, { url, status: res.status });
  }
  const data = Buffer.from(await res.arrayBuffer());
  await writeFile(destPath, data);
  return destPath;
}

/**
 * Copy the first existing candidate into `destDir`, keeping mode and
 * timestamps, and add owner-execute.
 */
export async function copyLocalBinary(
  binariesDir: string,
  name: string,
  target: TargetDescriptor,
  destDir: string,
): Promise<string> {
  const candidates = localCandidates(binariesDir, name, target);
  for (const src of candidates) {
    if (!(await isFile(src))) continue;

    const dest = join(destDir, target.binaryName);
    await copyFile(src, dest, constants.COPYFILE_FICLONE);
    const s = await stat(src);
    await utimes(dest, s.atime, s.mtime);
    await chmod(dest, s.mode | 0o100);
    return dest;
  }

  throw new AcquisitionError(
    `Binary not found for ${targetLabel(target)}. Searched:\n${candidates.map(p => `  ${p}`).join('\n')}`,
    { searched: candidates },
  );
}

/**
 * Resolve the native binary for one target.
 */
export async function acquire(target: TargetDescriptor, opts: AcquireOptions): Promise<AcquiredBinary> {
  const log = opts.log ?? console.log;
  const binDir = join(opts.scratchDir, 'bin');
  await mkdir(binDir, { recursive: true });

  if (opts.binariesDir) {
    const path = await copyLocalBinary(opts.binariesDir, opts.name, target, binDir);
    log(`  Copied local binary: ${path}`);
    return { target, path };
  }

  const url = releaseUrl(opts, target);
  log(`  Downloading: ${url}`);
  const archivePath = await downloadArchive(
    url,
    join(opts.scratchDir, releaseArchiveName(opts.name, opts.version, target)),
  );
  const path = await extractMember(archivePath, target.archive, target.binaryName, binDir);
  return { target, path };
}
