import type { Logger } from '../utils/logger.js';
import type { CommandRunner, CommandSpec } from '../utils/process.js';

export interface ProbeResult {
  target: string;
  /** true iff the probe command exited with status 0 */
  alive: boolean;
  exitCode: number;
  durationMs: number;
}

/**
 * A single reachability test against one target
 */
export interface ReachabilityProbe {
  probe(target: string): Promise<ProbeResult>;
}

/**
 * Probes a host with an ICMP echo command (ping by default). The command is
 * expected to exit on the first reply and to give up on its own after a
 * bounded time; its exit status is the only thing consulted.
 */
export class PingProbe implements ReachabilityProbe {
  private readonly spec: CommandSpec;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(spec: CommandSpec, runner: CommandRunner, logger: Logger) {
    this.spec = spec;
    this.runner = runner;
    this.logger = logger;
  }

  async probe(target: string): Promise<ProbeResult> {
    this.logger.info(`Pinging host '${target}'...`);
    const args = [...this.spec.args, target];
    this.logger.debug('Running probe command', { command: this.spec.command, args });

    // ProcessLaunchError propagates: a missing probe tool is not a dead host
    const result = await this.runner.run(this.spec.command, args);

    if (result.stdout) {
      this.logger.debug(`Probe stdout:\n${result.stdout.trimEnd()}`);
    }
    if (result.stderr) {
      this.logger.debug(`Probe stderr:\n${result.stderr.trimEnd()}`);
    }

    const alive = result.exitCode === 0;
    if (alive) {
      this.logger.info(`Ping returned with code 0, host '${target}' is up.`);
    } else {
      this.logger.info(`Ping returned with code ${result.exitCode}, host '${target}' is down.`);
    }

    return { target, alive, exitCode: result.exitCode, durationMs: result.durationMs };
  }
}

/**
 * Outcome of one round; results hold the targets actually probed, in order
 */
export type LivenessResult =
  | { alive: true; respondingTarget: string; results: ProbeResult[] }
  | { alive: false; results: ProbeResult[] };

/**
 * Probe targets in order and stop at the first one that is alive
 */
export async function anyAlive(targets: readonly string[], probe: ReachabilityProbe): Promise<LivenessResult> {
  const results: ProbeResult[] = [];
  for (const target of targets) {
    const result = await probe.probe(target);
    results.push(result);
    if (result.alive) {
      return { alive: true, respondingTarget: target, results };
    }
  }
  return { alive: false, results };
}
