import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ConfigError, errorMessage } from './errors.js';

export const CONFIG_FILE = 'wheelwright.json';

/**
 * Identity of the package being wheeled (wheelwright.json).
 */
export interface PackageConfig {
  /** Distribution and import package name */
  name: string;
  /** Base name of the native binary (without `.exe`) */
  binary: string;
  /** `<org>/<repo>` on the release host */
  repo: string;
  /** Release host, e.g. https://github.com */
  host: string;
  summary: string;
  homePage: string;
  author: string;
  authorEmail: string;
  license: string;
  requiresPython: string;
  classifiers: string[];
  /** Console script name */
  command: string;
  /** `<module>:<function>` inside the package */
  entryPoint: string;
  /** Absolute path of the embedded package sources */
  sourceDir: string;
  /** File in the package holding `__version__` */
  versionFile: string;
  /** `Generator:` value in the WHEEL file */
  generator: string;
  /** Default output directory (absolute) */
  outputDir: string;
  /** Timestamp stamped on wheel entries */
  sourceDate?: Date;
}

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(raw: Raw, key: string, fallback?: string): string {
  const value = raw[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`Config field "${key}" must be a non-empty string`);
  }
  return value;
}

function strList(raw: Raw, key: string): string[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`Config field "${key}" must be an array of strings`);
  }
  return value;
}

/**
 * A release version ends up in the wheel file name and the `.dist-info`
 * directory, so it must be a single path component.
 */
export function checkVersion(version: string): string {
  if (version === '' || /[\s/\\]/.test(version) || version.includes('..')) {
    throw new ConfigError(`Invalid version "${version}": no whitespace, path separators or ".." allowed`);
  }
  return version;
}

/**
 * Parse `SOURCE_DATE_EPOCH` (seconds since the epoch).
 */
export function parseSourceDateEpoch(value: string | undefined): Date | undefined {
  if (value === undefined || value === '') return undefined;
  if (!/^\d+$/.test(value)) throw new ConfigError(`SOURCE_DATE_EPOCH must be an integer, got "${value}"`);
  return new Date(Number(value) * 1000);
}

/**
 * Validate a parsed config object. Relative paths resolve against `baseDir`.
 */
export function parseConfig(raw: unknown, baseDir: string, env: NodeJS.ProcessEnv = process.env): PackageConfig {
  if (!isRecord(raw)) throw new ConfigError('Config must be a JSON object');

  const name = str(raw, 'name');
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
    throw new ConfigError(`Package name "${name}" must be a valid Python identifier`);
  }
  const repo = str(raw, 'repo');
  if (!/^[^/\s]+\/[^/\s]+$/.test(repo)) {
    throw new ConfigError(`Config field "repo" must look like <org>/<repo>, got "${repo}"`);
  }
  const host = str(raw, 'host', 'https://github.com').replace(/\/+$/, '');
  const entryPoint = str(raw, 'entryPoint', '_main:main');
  if (!/^[\w.]+:\w+$/.test(entryPoint)) {
    throw new ConfigError(`Config field "entryPoint" must look like <module>:<function>, got "${entryPoint}"`);
  }

  return {
    name,
    binary: str(raw, 'binary', name),
    repo,
    host,
    summary: str(raw, 'summary'),
    homePage: str(raw, 'homePage', `${host}/${repo}`),
    author: str(raw, 'author'),
    authorEmail: str(raw, 'authorEmail'),
    license: str(raw, 'license'),
    requiresPython: str(raw, 'requiresPython', '>=3.8'),
    classifiers: strList(raw, 'classifiers'),
    command: str(raw, 'command', name),
    entryPoint,
    sourceDir: resolve(baseDir, str(raw, 'sourceDir', `python/${name}`)),
    versionFile: str(raw, 'versionFile', '__init__.py'),
    generator: str(raw, 'generator', 'wheelwright'),
    outputDir: resolve(baseDir, str(raw, 'outputDir', 'dist')),
    sourceDate: parseSourceDateEpoch(env.SOURCE_DATE_EPOCH),
  };
}

/**
 * Read and validate wheelwright.json.
 */
export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<PackageConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config ${configPath}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${errorMessage(err)}`);
  }
  return parseConfig(raw, dirname(resolve(configPath)), env);
}
