import type { ArchiveFormat } from './extract.js';
import { ConfigError } from './errors.js';

export interface TargetDescriptor {
  readonly os: string;
  readonly arch: string;
  readonly archive: ArchiveFormat;
  readonly binaryName: string;
  /** Wheel platform tag, e.g. `win_amd64`. */
  readonly platformTag: string;
}

interface PlatformRow {
  os: string;
  arch: string;
  archive: ArchiveFormat;
  exe: boolean;
  platformTag: string;
}

/**
 * Release archive targets mapped to wheel platform tags, in build order.
 */
export const PLATFORMS: readonly PlatformRow[] = [
  { os: 'linux', arch: 'amd64', archive: 'tar.gz', exe: false, platformTag: 'manylinux_2_17_x86_64.manylinux2014_x86_64' },
  { os: 'linux', arch: 'arm64', archive: 'tar.gz', exe: false, platformTag: 'manylinux_2_17_aarch64.manylinux2014_aarch64' },
  { os: 'darwin', arch: 'amd64', archive: 'tar.gz', exe: false, platformTag: 'macosx_10_12_x86_64' },
  { os: 'darwin', arch: 'arm64', archive: 'tar.gz', exe: false, platformTag: 'macosx_11_0_arm64' },
  { os: 'windows', arch: 'amd64', archive: 'zip', exe: true, platformTag: 'win_amd64' },
];

export function targetLabel(target: { os: string; arch: string }): string {
  return `${target.os}/${target.arch}`;
}

/**
 * Resolve the target list for a binary, optionally filtered by `os-arch`
 * tokens. An empty result is an error.
 */
export function resolveTargets(binary: string, platforms?: readonly string[]): TargetDescriptor[] {
  const all = PLATFORMS.map(row =>
    Object.freeze({
      os: row.os,
      arch: row.arch,
      archive: row.archive,
      binaryName: row.exe ? `${binary}.exe` : binary,
      platformTag: row.platformTag,
    }),
  );
  if (!platforms || platforms.length === 0) return all;

  const requested = new Set(platforms.map(p => p.replace(/-/g, '/')));
  const matched = all.filter(t => requested.has(targetLabel(t)));
  if (matched.length === 0) {
    throw new ConfigError(`No matching platforms found for: ${platforms.join(', ')}`);
  }
  return matched;
}
