import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { ErrorCode, StructuredError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { CommandRunner } from '../utils/process.js';
import { fileTimestamp, formatDuration } from '../utils/time.js';
import type { SyncTask } from './task.js';

export type SyncTaskStatus = 'succeeded' | 'failed' | 'launch-failed';

export interface SyncTaskResult {
  name: string;
  status: SyncTaskStatus;
  /** File holding rsync's stdout/stderr and the summary lines */
  logPath: string;
  exitCode?: number;
  durationMs?: number;
}

export interface SyncRunSummary {
  results: SyncTaskResult[];
  durationMs: number;
  succeeded: number;
  failed: number;
  launchFailed: number;
}

export interface SyncRunnerOptions {
  /** rsync executable */
  command: string;
  /** Flags placed before source and target */
  args: readonly string[];
  /** Directory for the per-task capture files */
  logDir: string;
  runner: CommandRunner;
  logger: Logger;
  dryRun?: boolean;
  clock?: () => number;
  now?: () => Date;
}

/**
 * Mirrors each task in turn. A task's exit status never stops the run;
 * a task whose rsync cannot be launched is skipped.
 */
export class SyncRunner {
  private readonly options: SyncRunnerOptions;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly now: () => Date;

  constructor(options: SyncRunnerOptions) {
    this.options = options;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.now = options.now ?? (() => new Date());
  }

  async runAll(tasks: readonly SyncTask[]): Promise<SyncRunSummary> {
    const startTime = this.clock();
    if (!existsSync(this.options.logDir)) {
      mkdirSync(this.options.logDir, { recursive: true });
    }

    this.logger.info('Running tasks.', { count: tasks.length });
    const results: SyncTaskResult[] = [];
    for (const task of tasks) {
      results.push(await this.runTask(task));
    }

    const durationMs = this.clock() - startTime;
    const summary: SyncRunSummary = {
      results,
      durationMs,
      succeeded: results.filter((r) => r.status === 'succeeded').length,
      failed: results.filter((r) => r.status === 'failed').length,
      launchFailed: results.filter((r) => r.status === 'launch-failed').length,
    };

    this.logger.info('Task iteration done.', {
      succeeded: summary.succeeded,
      failed: summary.failed,
      launchFailed: summary.launchFailed,
    });
    this.logger.info(`Sync runtime (walltime): ${formatDuration(durationMs)}`);
    return summary;
  }

  async runTask(task: SyncTask): Promise<SyncTaskResult> {
    this.logger.info(`Starting task '${task.name}'.`);
    const logPath = this.captureFilePath(task.name);
    const args = task.commandArgs(this.options.args, this.options.dryRun);

    this.logger.info(`Capturing rsync stdout/stderr in '${logPath}'.`);
    this.logger.info('Running rsync.', { command: this.options.command, args });

    const startTime = this.clock();
    let exitCode: number;
    try {
      const result = await this.options.runner.run(this.options.command, args, { outputFile: logPath });
      exitCode = result.exitCode;
    } catch (error) {
      if (error instanceof StructuredError && error.code === ErrorCode.PROCESS_LAUNCH_FAILED) {
        this.logger.error(`Could not launch rsync for task '${task.name}', skipping it.`);
        this.logger.structuredError(error);
        return { name: task.name, status: 'launch-failed', logPath };
      }
      throw error;
    }
    const durationMs = this.clock() - startTime;

    if (exitCode === 0) {
      this.logger.info('rsync returncode is 0.');
    } else {
      this.logger.error(`rsync returncode not 0: ${exitCode}`, { task: task.name });
    }
    this.logger.info(`rsync runtime (walltime): ${formatDuration(durationMs)}`);

    appendFileSync(
      logPath,
      `\nwrapper info: rsync exitcode: ${exitCode}\n` +
      `wrapper info: rsync runtime (walltime): ${formatDuration(durationMs)}\n`
    );

    this.logger.info(`Task '${task.name}' finished.`);
    return {
      name: task.name,
      status: exitCode === 0 ? 'succeeded' : 'failed',
      logPath,
      exitCode,
      durationMs,
    };
  }

  /**
   * rsync_stdouterr_<name>_<YYYYMMDD-HHMMSS>.log, suffixed when that name is taken
   */
  private captureFilePath(taskName: string): string {
    const base = `rsync_stdouterr_${taskName}_${fileTimestamp(this.now())}`;
    let candidate = join(this.options.logDir, `${base}.log`);
    for (let n = 1; existsSync(candidate); n++) {
      candidate = join(this.options.logDir, `${base}-${n}.log`);
    }
    return candidate;
  }
}
