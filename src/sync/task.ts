import { statSync } from 'fs';
import { sep } from 'path';
import type { SyncTaskConfig } from '../config/index.js';
import { ErrorCode, PreconditionError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function hasTrailingSeparator(path: string): boolean {
  return path.endsWith('/') || path.endsWith(sep);
}

/**
 * One source/target pair to mirror. The source is given without a trailing
 * separator, so rsync recreates the source directory inside the target.
 */
export class SyncTask {
  readonly name: string;
  readonly sourceDir: string;
  readonly targetDir: string;

  constructor(config: SyncTaskConfig) {
    if (hasTrailingSeparator(config.source)) {
      throw new PreconditionError(
        ErrorCode.PRECONDITION_TRAILING_SEPARATOR,
        `Source has trailing separator: ${config.source}`,
        { taskName: config.name, path: config.source }
      );
    }
    if (!isDirectory(config.source)) {
      throw new PreconditionError(
        ErrorCode.PRECONDITION_SOURCE_NOT_DIRECTORY,
        `Source is no directory: ${config.source}`,
        { taskName: config.name, path: config.source }
      );
    }
    if (!isDirectory(config.target)) {
      throw new PreconditionError(
        ErrorCode.PRECONDITION_TARGET_NOT_DIRECTORY,
        `Target is no directory: ${config.target}`,
        { taskName: config.name, path: config.target }
      );
    }

    this.name = config.name;
    this.sourceDir = config.source;
    this.targetDir = config.target;
  }

  /**
   * rsync arguments: the configured flags, then source and target
   */
  commandArgs(flags: readonly string[], dryRun = false): string[] {
    return [...flags, ...(dryRun ? ['--dry-run'] : []), this.sourceDir, this.targetDir];
  }
}

/**
 * Validate and build every task up front; the first invalid task throws
 * PreconditionError before anything has been mirrored.
 */
export function createSyncTasks(configs: readonly SyncTaskConfig[], logger: Logger): SyncTask[] {
  return configs.map((config) => {
    logger.info(`Setting up task '${config.name}'.`);
    return new SyncTask(config);
  });
}
