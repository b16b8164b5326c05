import { validateTiming } from '../config/schema.js';
import { ConfigError, ErrorCode, StructuredError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { CommandRunner, CommandSpec } from '../utils/process.js';
import { sleep as defaultSleep } from '../utils/time.js';
import { anyAlive, type LivenessResult, type ReachabilityProbe } from './probe.js';

export type LoopState = 'checking' | 'waiting' | 'aborted' | 'committed' | 'faulted';

export interface ShutdownActionResult {
  exitCode: number;
  dryRun: boolean;
}

/**
 * What happens once shutdown is committed
 */
export interface ShutdownAction {
  invoke(): Promise<ShutdownActionResult>;
}

/**
 * Runs the configured power-off command. Its exit status is logged and
 * reported, nothing more.
 */
export class CommandShutdownAction implements ShutdownAction {
  private readonly spec: CommandSpec;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(spec: CommandSpec, runner: CommandRunner, logger: Logger) {
    this.spec = spec;
    this.runner = runner;
    this.logger = logger;
  }

  async invoke(): Promise<ShutdownActionResult> {
    const commandLine = [this.spec.command, ...this.spec.args].join(' ');
    this.logger.info(`Invoking '${commandLine}'`);
    const result = await this.runner.run(this.spec.command, this.spec.args);
    if (result.stderr) {
      this.logger.debug(`Shutdown stderr:\n${result.stderr.trimEnd()}`);
    }
    this.logger.info(`'${commandLine}' returncode: ${result.exitCode}`);
    return { exitCode: result.exitCode, dryRun: false };
  }
}

/**
 * Stand-in for --dry-run: logs the command it would have run
 */
export class DryRunShutdownAction implements ShutdownAction {
  private readonly spec: CommandSpec;
  private readonly logger: Logger;

  constructor(spec: CommandSpec, logger: Logger) {
    this.spec = spec;
    this.logger = logger;
  }

  async invoke(): Promise<ShutdownActionResult> {
    const commandLine = [this.spec.command, ...this.spec.args].join(' ');
    this.logger.warn(`Dry run: not invoking '${commandLine}'`);
    return { exitCode: 0, dryRun: true };
  }
}

interface OutcomeBase {
  /** Number of probe rounds performed */
  rounds: number;
  elapsedMs: number;
}

export type ShutdownOutcome =
  | (OutcomeBase & { state: 'aborted'; respondingTarget: string })
  | (OutcomeBase & { state: 'committed'; shutdown: ShutdownActionResult })
  | (OutcomeBase & { state: 'faulted'; error: StructuredError });

export interface ShutdownDecisionLoopOptions {
  targets: readonly string[];
  requiredOfflineSeconds: number;
  pollingIntervalSeconds: number;
  probe: ReachabilityProbe;
  shutdown: ShutdownAction;
  logger: Logger;
  /** Milliseconds since epoch; injectable for tests */
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Shuts the machine down only after every target has been unreachable for
 * requiredOfflineSeconds, sampled every pollingIntervalSeconds. One responding
 * target at any round aborts. The first round runs immediately.
 */
export class ShutdownDecisionLoop {
  private readonly targets: readonly string[];
  private readonly requiredOfflineMs: number;
  private readonly pollingIntervalMs: number;
  private readonly probe: ReachabilityProbe;
  private readonly shutdown: ShutdownAction;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private state: LoopState = 'checking';

  constructor(options: ShutdownDecisionLoopOptions) {
    if (options.targets.length === 0) {
      throw new ConfigError(ErrorCode.CONFIG_VALIDATION_FAILED, 'No targets configured to probe', {
        field: 'monitor.targets',
        value: [],
      });
    }

    const timing = validateTiming(options.requiredOfflineSeconds, options.pollingIntervalSeconds);
    if (!timing.valid) {
      throw new ConfigError(ErrorCode.CONFIG_TIMING_INVALID, timing.error ?? 'Invalid polling interval', {
        field: 'monitor.pollingIntervalSeconds',
        value: options.pollingIntervalSeconds,
        context: { requiredOfflineSeconds: options.requiredOfflineSeconds },
      });
    }

    this.targets = [...options.targets];
    this.requiredOfflineMs = options.requiredOfflineSeconds * 1000;
    this.pollingIntervalMs = options.pollingIntervalSeconds * 1000;
    this.probe = options.probe;
    this.shutdown = options.shutdown;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  getState(): LoopState {
    return this.state;
  }

  async run(): Promise<ShutdownOutcome> {
    const startTime = this.clock();
    let rounds = 0;
    const elapsed = () => this.clock() - startTime;

    try {
      this.state = 'checking';
      rounds++;
      let round = await this.checkRound(rounds);
      if (round.alive) {
        return this.abort(round.respondingTarget, rounds, elapsed());
      }

      const deadline = this.clock() + this.requiredOfflineMs;
      if (this.requiredOfflineMs > 0) {
        this.logger.info(
          `None of the hosts is reachable. Shutdown unless one responds within ${this.requiredOfflineMs / 1000}s.`,
          { deadline: new Date(deadline).toISOString() }
        );
      }

      while (this.clock() < deadline) {
        this.state = 'waiting';
        await this.sleep(this.pollingIntervalMs);

        this.state = 'checking';
        rounds++;
        round = await this.checkRound(rounds);
        if (round.alive) {
          return this.abort(round.respondingTarget, rounds, elapsed());
        }

        const remainingMs = deadline - this.clock();
        if (remainingMs > 0) {
          this.logger.info(`Still no host reachable, ${Math.ceil(remainingMs / 1000)}s until shutdown.`);
        }
      }

      this.state = 'committed';
      this.logger.info('None of the listed hosts seems to be up. Invoke shutdown.', { rounds });
      const shutdown = await this.shutdown.invoke();
      return { state: 'committed', rounds, elapsedMs: elapsed(), shutdown };
    } catch (error) {
      if (error instanceof StructuredError && error.code === ErrorCode.PROCESS_LAUNCH_FAILED) {
        this.state = 'faulted';
        this.logger.structuredError(error);
        return { state: 'faulted', rounds, elapsedMs: elapsed(), error };
      }
      throw error;
    }
  }

  private async checkRound(round: number): Promise<LivenessResult> {
    this.logger.debug(`Probe round ${round}`, { targets: this.targets.length });
    return anyAlive(this.targets, this.probe);
  }

  private abort(respondingTarget: string, rounds: number, elapsedMs: number): ShutdownOutcome {
    this.state = 'aborted';
    this.logger.info(`Host '${respondingTarget}' is reachable, shutdown aborted.`, { rounds });
    return { state: 'aborted', rounds, elapsedMs, respondingTarget };
  }
}

/**
 * Process exit status for a loop outcome
 */
export function exitCodeForOutcome(outcome: ShutdownOutcome): number {
  return outcome.state === 'faulted' ? 1 : 0;
}
