import { checkVersion } from './config.js';
import { ConfigError } from './errors.js';

export interface BuildArgs {
  version: string;
  dryRun: boolean;
  binariesDir?: string;
  outputDir?: string;
  platforms?: string[];
  config?: string;
}

export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) throw new ConfigError(`${flag} requires a value`);
  return value;
}

/**
 * Values following `flag` up to the next `--option`. Commas also separate.
 */
export function getListFlag(args: string[], flag: string): string[] | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0) return undefined;
  const values: string[] = [];
  for (let i = idx + 1; i < args.length && !args[i].startsWith('--'); i++) {
    values.push(...args[i].split(',').filter(Boolean));
  }
  return values;
}

const BUILD_FLAGS = new Set(['--version', '--dry-run', '--binaries-dir', '--output-dir', '--platforms', '--config']);

export function parseBuildArgs(args: string[]): BuildArgs {
  for (const arg of args) {
    if (arg.startsWith('--') && !BUILD_FLAGS.has(arg)) throw new ConfigError(`Unknown option: ${arg}`);
  }

  const version = getFlag(args, '--version');
  if (!version) throw new ConfigError('--version is required');

  return {
    version: checkVersion(version),
    dryRun: args.includes('--dry-run'),
    binariesDir: getFlag(args, '--binaries-dir'),
    outputDir: getFlag(args, '--output-dir'),
    platforms: getListFlag(args, '--platforms'),
    config: getFlag(args, '--config'),
  };
}
