import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { acquire } from './acquire.js';
import { sha256File } from './checksum.js';
import { checkVersion, type PackageConfig } from './config.js';
import { TargetBuildError } from './errors.js';
import { withScratchDir } from './scratch.js';
import { resolveTargets, targetLabel, type TargetDescriptor } from './targets.js';
import { assembleWheel, type AssembledWheel } from './wheel.js';

/** Size of the placeholder binary used in dry runs. */
const PLACEHOLDER_SIZE = 100;

export interface BuildOptions {
  config: PackageConfig;
  version: string;
  dryRun?: boolean;
  /** Local mode: look for prebuilt binaries here instead of downloading */
  binariesDir?: string;
  /** Defaults to the config's output directory */
  outputDir?: string;
  /** `os-arch` tokens; all targets when empty */
  platforms?: string[];
  log?: (line: string) => void;
}

export interface BuiltWheel extends AssembledWheel {
  target: TargetDescriptor;
  /** Hex SHA-256 of the wheel file, absent in dry runs */
  sha256?: string;
}

export interface BuildSummary {
  version: string;
  outputDir: string;
  dryRun: boolean;
  wheels: BuiltWheel[];
}

/**
 * Build wheels for every selected target, one after another. The first
 * failing target stops the run.
 */
export async function buildWheels(opts: BuildOptions): Promise<BuildSummary> {
  const { config } = opts;
  const version = checkVersion(opts.version);
  const log = opts.log ?? console.log;
  const dryRun = opts.dryRun ?? false;
  const outputDir = opts.outputDir ?? config.outputDir;

  // Resolve before touching anything so a bad filter fails fast
  const targets = resolveTargets(config.binary, opts.platforms);

  if (!dryRun) await mkdir(outputDir, { recursive: true });

  log(`\n📦 Building ${config.name} v${version} wheels\n`);
  log(`   Source:  ${config.sourceDir}`);
  log(`   Output:  ${outputDir}`);
  log(`   Targets: ${targets.length} platforms\n`);

  const wheels = await withScratchDir(`${config.name}-wheels-`, async (scratch) => {
    const built: BuiltWheel[] = [];
    for (const target of targets) {
      const label = targetLabel(target);
      log(`▸ ${label} → ${target.platformTag}`);
      const targetDir = join(scratch, `${target.os}_${target.arch}`);
      await mkdir(targetDir);

      try {
        built.push(await buildTarget(target, targetDir, { ...opts, dryRun, outputDir, log }));
      } catch (err) {
        throw new TargetBuildError(label, err);
      }
      log('');
    }
    return built;
  });

  if (dryRun) {
    log('✓ Dry run complete. No files were created.\n');
  } else {
    log('✓ All wheels built successfully!\n');
    for (const w of wheels) log(`  ${w.sha256}  ${w.name}`);
    log('\nUpload to PyPI with:');
    log(`  twine upload ${outputDir}/*.whl\n`);
  }

  return { version, outputDir, dryRun, wheels };
}

async function buildTarget(
  target: TargetDescriptor,
  targetDir: string,
  opts: BuildOptions & { dryRun: boolean; outputDir: string; log: (line: string) => void },
): Promise<BuiltWheel> {
  const { config, version, dryRun, outputDir, log } = opts;

  let binaryPath: string;
  if (dryRun) {
    binaryPath = join(targetDir, target.binaryName);
    await writeFile(binaryPath, Buffer.alloc(PLACEHOLDER_SIZE, 0));
  } else {
    const acquired = await acquire(target, {
      name: config.name,
      version,
      repo: config.repo,
      host: config.host,
      scratchDir: targetDir,
      binariesDir: opts.binariesDir,
      log,
    });
    binaryPath = acquired.path;
  }

  const wheel = await assembleWheel({
    config,
    version,
    platformTag: target.platformTag,
    binaryPath,
    binaryName: target.binaryName,
    outputDir,
    scratchDir: targetDir,
    dryRun,
    log,
  });

  if (wheel.dryRun) return { ...wheel, target };
  return { ...wheel, target, sha256: await sha256File(wheel.path) };
}
