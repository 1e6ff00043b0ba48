#!/usr/bin/env node
/**
 * wheelwright — platform wheels for prebuilt native binaries
 *
 *   wheelwright [build] --version <v> [--dry-run] [--binaries-dir <dir>]
 *                       [--output-dir <dir>] [--platforms <os-arch>...] [--config <file>]
 *   wheelwright verify <wheel.whl>...
 */

import { resolve } from 'node:path';
import { parseBuildArgs } from './args.js';
import { buildWheels } from './build.js';
import { CONFIG_FILE, loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { verifyWheel } from './verify.js';

const USAGE = `wheelwright — platform wheels for prebuilt native binaries

Build:
  wheelwright [build] --version <v> [options]

    --version <v>          Release version (required)
    --dry-run              Show what would be built without writing anything
    --binaries-dir <dir>   Use prebuilt binaries from a local directory
    --output-dir <dir>     Where wheels go (default: dist/ next to the config)
    --platforms <p>...     Only these targets, e.g. linux-amd64 darwin-arm64
    --config <file>        Package config (default: ./${CONFIG_FILE})

Verify:
  wheelwright verify <wheel.whl>...`;

async function build(args: string[]): Promise<void> {
  const parsed = parseBuildArgs(args);
  const config = await loadConfig(resolve(parsed.config ?? CONFIG_FILE));

  await buildWheels({
    config,
    version: parsed.version,
    dryRun: parsed.dryRun,
    binariesDir: parsed.binariesDir && resolve(parsed.binariesDir),
    outputDir: parsed.outputDir && resolve(parsed.outputDir),
    platforms: parsed.platforms,
  });
}

async function verify(args: string[]): Promise<void> {
  if (args.length === 0) {
    console.error('Usage: wheelwright verify <wheel.whl>...');
    process.exit(1);
  }

  for (const wheelPath of args) {
    console.log(`🔍 Verifying ${wheelPath}...`);
    const report = await verifyWheel(wheelPath);
    console.log(`✓ ${report.entries.length - 1} files match ${report.record}`);
  }
}

// ── Main ─────────────────────────────────────────────────────

const argv = process.argv.slice(2);

if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
  console.log(USAGE);
  process.exit(argv.length === 0 ? 1 : 0);
}

const commands: Record<string, (args: string[]) => Promise<void>> = { build, verify };

const [first, ...rest] = argv;
const run = commands[first] ? commands[first](rest) : build(argv);

run.catch((err: unknown) => {
  console.error(`✗ Error: ${errorMessage(err)}`);
  process.exit(1);
});
