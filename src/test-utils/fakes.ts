/**
 * In-process stand-ins shared by the test suites.
 */

import { writeFileSync } from 'fs';
import { Logger, type ConsoleSink } from '../utils/logger.js';
import type { CommandResult, CommandRunner, RunCommandOptions } from '../utils/process.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunCommandOptions;
}

/** Exit code to report, output to write, or an error to reject with */
export type FakeResponse =
  | number
  | { exitCode: number; stdout?: string; stderr?: string; output?: string }
  | Error;

/**
 * CommandRunner that answers from a handler instead of spawning processes.
 * When a call carries outputFile, the response's output is written there.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handler: (call: RecordedCall) => FakeResponse;

  constructor(handler: (call: RecordedCall) => FakeResponse) {
    this.handler = handler;
  }

  async run(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args, options };
    this.calls.push(call);

    const response = this.handler(call);
    if (response instanceof Error) {
      throw response;
    }

    const normalized = typeof response === 'number' ? { exitCode: response } : response;
    if (options.outputFile) {
      writeFileSync(options.outputFile, normalized.output ?? '');
    }

    return {
      exitCode: normalized.exitCode,
      signal: null,
      stdout: normalized.stdout ?? '',
      stderr: normalized.stderr ?? '',
      durationMs: 0,
    };
  }
}

export interface CapturedConsole {
  sink: ConsoleSink;
  lines: string[];
}

export function captureConsole(): CapturedConsole {
  const lines: string[] = [];
  const push = (line: string) => {
    lines.push(line);
  };
  return { sink: { log: push, warn: push, error: push }, lines };
}

/**
 * JSON-format logger writing to a captured console
 */
export function createTestLogger(): { logger: Logger; lines: string[] } {
  const captured = captureConsole();
  const logger = new Logger({ level: 'debug', format: 'json', console: captured.sink });
  return { logger, lines: captured.lines };
}

/**
 * Manual clock whose sleep() advances time instantly
 */
export class FakeClock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(start = 1_700_000_000_000) {
    this.current = start;
  }

  now = (): number => this.current;

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.current += ms;
  };

  advance(ms: number): void {
    this.current += ms;
  }
}
