/**
 * Wheel assembly.
 *
 * A wheel is staged as a directory tree in scratch space, certified by a
 * RECORD manifest, then zipped and moved into the output directory in one
 * step. The stages run in a fixed order; RECORD is always the last one
 * because it hashes the final bytes of everything else.
 */

import { chmod, copyFile, mkdir, mkdtemp, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { recordDigest } from './checksum.js';
import type { PackageConfig } from './config.js';
import { AssemblyError, errorMessage, type AssemblyStage } from './errors.js';
import { walkFiles } from './files.js';
import { recordPath, renderRecord, type RecordEntry } from './record.js';
import { writeZip, type ZipMember } from './zip.js';

/** Python tag and ABI tag: the binary does not link against CPython. */
export const PYTHON_TAG = 'py3';
export const ABI_TAG = 'none';

export function wheelTag(platformTag: string): string {
  return `${PYTHON_TAG}-${ABI_TAG}-${platformTag}`;
}

export function wheelName(name: string, version: string, platformTag: string): string {
  return `${name}-${version}-${wheelTag(platformTag)}.whl`;
}

export function distInfoName(name: string, version: string): string {
  return `${name}-${version}.dist-info`;
}

const VERSION_LINE = /__version__\s*=\s*"[^"]*".*/g;

/**
 * Replace every `__version__ = "..."` assignment line; other bytes are
 * passed through.
 */
export function rewriteVersion(content: string, version: string): string {
  return content.replace(VERSION_LINE, () => `__version__ = "${version}"`);
}

export function renderMetadata(config: PackageConfig, version: string): string {
  const lines = [
    'Metadata-Version: 2.1',
    `Name: ${config.name}`,
    `Version: ${version}`,
    `Summary: ${config.summary}`,
    `Home-page: ${config.homePage}`,
    `Author: ${config.author}`,
    `Author-email: ${config.authorEmail}`,
    `License: ${config.license}`,
    `Requires-Python: ${config.requiresPython}`,
    ...config.classifiers.map(c => `Classifier: ${c}`),
  ];
  return lines.join('\n') + '\n';
}

export function renderWheelFile(config: PackageConfig, platformTag: string): string {
  return [
    'Wheel-Version: 1.0',
    `Generator: ${config.generator}`,
    'Root-Is-Purelib: false',
    `Tag: ${wheelTag(platformTag)}`,
  ].join('\n') + '\n';
}

export function renderEntryPoints(config: PackageConfig): string {
  return `[console_scripts]\n${config.command} = ${config.name}.${config.entryPoint}\n`;
}

export function renderTopLevel(config: PackageConfig): string {
  return `${config.name}\n`;
}

export interface AssembleOptions {
  config: PackageConfig;
  version: string;
  platformTag: string;
  binaryPath: string;
  binaryName: string;
  outputDir: string;
  /** Staging and the unfinished zip live here */
  scratchDir: string;
  dryRun?: boolean;
  log?: (line: string) => void;
}

export interface AssembledWheel {
  path: string;
  name: string;
  dryRun: boolean;
  binarySize: number;
}

interface StageContext {
  opts: AssembleOptions;
  root: string;
  pkgDir: string;
  distInfo: string;
  distInfoDir: string;
}

interface Stage {
  name: AssemblyStage;
  run(ctx: StageContext): Promise<void>;
}

const sourcesStage: Stage = {
  name: 'sources',
  async run({ opts, pkgDir }) {
    const files = await walkFiles(opts.config.sourceDir);
    for (const rel of files) {
      const dest = join(pkgDir, rel);
      await mkdir(dirname(dest), { recursive: true });
      await copyFile(join(opts.config.sourceDir, rel), dest);
    }
  },
};

const versionStage: Stage = {
  name: 'version',
  async run({ opts, pkgDir }) {
    const versionFile = join(pkgDir, opts.config.versionFile);
    let content: string;
    try {
      content = await readFile(versionFile, 'utf-8');
    } catch (err) {
      throw new AssemblyError(
        `Version file ${opts.config.versionFile} not found in ${opts.config.sourceDir}`,
        'version',
        err,
      );
    }
    await writeFile(versionFile, rewriteVersion(content, opts.version));
  },
};

const binaryStage: Stage = {
  name: 'binary',
  async run({ opts, pkgDir }) {
    const dest = join(pkgDir, opts.binaryName);
    await copyFile(opts.binaryPath, dest);
    const { mode } = await stat(dest);
    await chmod(dest, mode | 0o111);
  },
};

const metadataStage: Stage = {
  name: 'metadata',
  async run({ opts, distInfoDir }) {
    const { config, version, platformTag } = opts;
    await mkdir(distInfoDir);
    await writeFile(join(distInfoDir, 'METADATA'), renderMetadata(config, version));
    await writeFile(join(distInfoDir, 'WHEEL'), renderWheelFile(config, platformTag));
    await writeFile(join(distInfoDir, 'entry_points.txt'), renderEntryPoints(config));
    await writeFile(join(distInfoDir, 'top_level.txt'), renderTopLevel(config));
  },
};

const recordStage: Stage = {
  name: 'record',
  async run({ root, distInfo }) {
    const self = recordPath(distInfo);
    const files = (await walkFiles(root)).filter(p => p !== self);
    const entries: RecordEntry[] = [];
    for (const rel of files) {
      const full = join(root, rel);
      const s = await stat(full);
      entries.push({ path: rel, digest: await recordDigest(full), size: s.size });
    }
    await writeFile(join(root, self), renderRecord(entries, self));
  },
};

/** Content stages, in order. */
const CONTENT_STAGES: readonly Stage[] = [sourcesStage, versionStage, binaryStage, metadataStage];

/** RECORD certifies the final bytes, so it always runs after every content stage. */
export const STAGES: readonly Stage[] = [...CONTENT_STAGES, recordStage];

async function runStage(stage: Stage, ctx: StageContext): Promise<void> {
  try {
    await stage.run(ctx);
  } catch (err) {
    if (err instanceof AssemblyError) throw err;
    throw new AssemblyError(`Assembly failed at ${stage.name}: ${errorMessage(err)}`, stage.name, err);
  }
}

/**
 * Zip the staged tree. Paths are sorted so the archive layout does not
 * depend on the host filesystem.
 */
export async function zipTree(root: string, outputPath: string, mtime?: Date): Promise<string[]> {
  const files = await walkFiles(root);
  const members: ZipMember[] = [];
  for (const rel of files) {
    const full = join(root, rel);
    const { mode } = await stat(full);
    members.push({ name: rel, data: await readFile(full), mode });
  }
  await writeFile(outputPath, writeZip(members, { mtime }));
  return files;
}

/** Move a finished file into place without leaving a partial copy behind. */
async function moveInto(src: string, dest: string): Promise<void> {
  try {
    await rename(src, dest);
    return;
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
  }
  const partial = `${dest}.partial`;
  try {
    await copyFile(src, partial);
    await rename(partial, dest);
  } catch (err) {
    await rm(partial, { force: true });
    throw err;
  }
}

async function createStage(opts: AssembleOptions): Promise<StageContext> {
  const { config, version } = opts;
  try {
    const root = await mkdtemp(join(opts.scratchDir, 'stage-'));
    const distInfo = distInfoName(config.name, version);
    const pkgDir = join(root, config.name);
    await mkdir(pkgDir);
    return { opts, root, pkgDir, distInfo, distInfoDir: join(root, distInfo) };
  } catch (err) {
    throw new AssemblyError(`Cannot create staging directory: ${errorMessage(err)}`, 'stage', err);
  }
}

function formatBytes(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Build one platform wheel. In dry-run mode only the name is computed and
 * nothing is written.
 */
export async function assembleWheel(opts: AssembleOptions): Promise<AssembledWheel> {
  const log = opts.log ?? console.log;
  const { config, version, platformTag, outputDir } = opts;
  const name = wheelName(config.name, version, platformTag);
  const path = join(outputDir, name);

  if (opts.dryRun) {
    const { size } = await stat(opts.binaryPath);
    log(`  [DRY-RUN] Would create: ${name}`);
    log(`             Binary: ${opts.binaryPath} (${formatBytes(size)} bytes)`);
    return { path, name, dryRun: true, binarySize: size };
  }

  const ctx = await createStage(opts);
  for (const stage of STAGES) {
    await runStage(stage, ctx);
  }

  log(`  Building: ${name}`);
  try {
    const scratchZip = join(opts.scratchDir, name);
    await zipTree(ctx.root, scratchZip, config.sourceDate);
    await mkdir(outputDir, { recursive: true });
    await moveInto(scratchZip, path);
  } catch (err) {
    throw new AssemblyError(`Cannot write ${name}: ${errorMessage(err)}`, 'zip', err);
  }

  const size = await stat(path).then(s => s.size, () => 0);
  if (size === 0) throw new AssemblyError(`Wheel ${path} is missing or empty`, 'zip');

  log(`  Created:  ${basename(path)} (${(size / (1024 * 1024)).toFixed(1)} MB)`);
  const { size: binarySize } = await stat(opts.binaryPath);
  return { path, name, dryRun: false, binarySize };
}
