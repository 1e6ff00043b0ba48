/**
 * Error taxonomy. Every error is fatal to the run; callers never catch and continue.
 */

export class ConfigError extends Error {
  override name = 'ConfigError';
}

/** Remote fetch failed, or no local binary was found. */
export class AcquisitionError extends Error {
  override name = 'AcquisitionError';
  readonly url?: string;
  readonly status?: number;
  readonly searched: string[];

  constructor(message: string, opts: { url?: string; status?: number; searched?: string[]; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.url = opts.url;
    this.status = opts.status;
    this.searched = opts.searched ?? [];
  }
}

/** The sought member is absent from an archive, or the archive cannot be read. */
export class ExtractionError extends Error {
  override name = 'ExtractionError';
  readonly archivePath: string;

  constructor(message: string, archivePath: string) {
    super(message);
    this.archivePath = archivePath;
  }
}

export type AssemblyStage = 'stage' | 'sources' | 'version' | 'binary' | 'metadata' | 'record' | 'zip' | 'verify';

export class AssemblyError extends Error {
  override name = 'AssemblyError';
  readonly stage: AssemblyStage;

  constructor(message: string, stage: AssemblyStage, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.stage = stage;
  }
}

/** Wraps a failure with the label of the target that was being built. */
export class TargetBuildError extends Error {
  override name = 'TargetBuildError';
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super(`${target}: ${errorMessage(cause)}`, { cause });
    this.target = target;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
