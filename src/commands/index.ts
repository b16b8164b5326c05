import { loadConfig, type Config } from '../config/index.js';
import { PingProbe } from '../monitor/probe.js';
import {
  CommandShutdownAction,
  DryRunShutdownAction,
  ShutdownDecisionLoop,
  exitCodeForOutcome,
} from '../monitor/shutdown-loop.js';
import { SyncRunner } from '../sync/runner.js';
import { createSyncTasks, type SyncTask } from '../sync/task.js';
import { StructuredError, wrapError } from '../utils/errors.js';
import { Logger, createLoggingContext, type ConsoleSink, type LoggingContext } from '../utils/logger.js';
import { ChildProcessRunner, type CommandRunner } from '../utils/process.js';
import { formatDuration } from '../utils/time.js';

export const CHECK_LOG_FILE = 'conditional-shutdown.log';
export const SYNC_LOG_FILE = 'sync-tasks.log';

export interface CommandOptions {
  configPath?: string;
  verbose?: boolean;
  dryRun?: boolean;
  /** Overrides for tests; default to real child processes and process.env */
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  console?: ConsoleSink;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
}

/**
 * Load configuration, open the run's log file, run the job and close the
 * log again. Returns the process exit status.
 */
async function withLoggingContext(
  options: CommandOptions,
  fileName: string,
  job: (config: Config, logging: LoggingContext) => Promise<number>
): Promise<number> {
  const bootstrap = new Logger({ level: 'info', console: options.console });

  let config: Config;
  try {
    config = loadConfig({ configPath: options.configPath, env: options.env, logger: bootstrap });
  } catch (error) {
    bootstrap.structuredError(wrapError(error));
    return 1;
  }

  const logging = createLoggingContext({
    ...config.logging,
    level: options.verbose ? 'debug' : config.logging.level,
    fileName,
    console: options.console,
  });

  try {
    return await job(config, logging);
  } catch (error) {
    const structured = wrapError(error);
    logging.logger.structuredError(structured);
    return 1;
  } finally {
    logging.close();
  }
}

/**
 * Conditional shutdown: power off once no target has answered for the
 * configured offline period.
 */
export function runCheck(options: CommandOptions = {}): Promise<number> {
  return withLoggingContext(options, CHECK_LOG_FILE, async (config, { logger }) => {
    const runner = options.runner ?? new ChildProcessRunner();
    const monitor = config.monitor;

    const shutdown = options.dryRun
      ? new DryRunShutdownAction(monitor.shutdown, logger.child('shutdown'))
      : new CommandShutdownAction(monitor.shutdown, runner, logger.child('shutdown'));

    const loop = new ShutdownDecisionLoop({
      targets: monitor.targets,
      requiredOfflineSeconds: monitor.requiredOfflineSeconds,
      pollingIntervalSeconds: monitor.pollingIntervalSeconds,
      probe: new PingProbe(monitor.probe, runner, logger.child('probe')),
      shutdown,
      logger,
      clock: options.clock,
      sleep: options.sleep,
    });

    logger.info('Pinging hosts...', { targets: monitor.targets });
    const outcome = await loop.run();
    logger.info(`Exit program (${outcome.state}).`, { rounds: outcome.rounds });
    return exitCodeForOutcome(outcome);
  });
}

/**
 * Backup synchronization: run rsync once per configured task, in order.
 */
export function runSync(options: CommandOptions = {}): Promise<number> {
  return withLoggingContext(options, SYNC_LOG_FILE, async (config, { logger }) => {
    const clock = options.clock ?? Date.now;
    const startTime = clock();
    logger.info('Program launch.');

    let tasks: SyncTask[];
    try {
      tasks = createSyncTasks(config.sync.tasks, logger);
    } catch (error) {
      if (error instanceof StructuredError) {
        logger.structuredError(error);
        return 1;
      }
      throw error;
    }

    const syncRunner = new SyncRunner({
      command: config.sync.command,
      args: config.sync.args,
      logDir: config.sync.logDir,
      runner: options.runner ?? new ChildProcessRunner(),
      logger: logger.child('rsync'),
      dryRun: options.dryRun,
      clock,
    });

    await syncRunner.runAll(tasks);
    logger.info(`Program runtime (walltime): ${formatDuration(clock() - startTime)}`);
    logger.info('Program termination.');
    return 0;
  });
}
