import { spawn, type StdioOptions } from 'child_process';
import { closeSync, existsSync, openSync, unlinkSync } from 'fs';
import { constants } from 'os';
import { ProcessLaunchError } from './errors.js';

/**
 * An external program and its fixed leading arguments
 */
export interface CommandSpec {
  command: string;
  args: string[];
}

export interface RunCommandOptions {
  /** Redirect stdout and stderr into this file (truncated first) instead of capturing them; removed again if the command cannot be launched */
  outputFile?: string;
  cwd?: string;
}

export interface CommandResult {
  /** Exit status; a process killed by a signal reports 128 + signal number, or 1 if unknown */
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Seam for launching external commands, so callers can be tested without them
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunCommandOptions): Promise<CommandResult>;
}

export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) {
    const number: number | undefined = constants.signals[signal];
    return number !== undefined ? 128 + number : 1;
  }
  return 1;
}

/**
 * Runs commands as child processes and waits for each to exit.
 * A command that cannot be started rejects with ProcessLaunchError.
 */
export class ChildProcessRunner implements CommandRunner {
  run(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const startTime = Date.now();
      let outputFd: number | null = null;
      let settled = false;

      const releaseOutput = () => {
        if (outputFd !== null) {
          closeSync(outputFd);
          outputFd = null;
        }
      };

      let stdio: StdioOptions = ['ignore', 'pipe', 'pipe'];
      if (options.outputFile) {
        outputFd = openSync(options.outputFile, 'w');
        stdio = ['ignore', outputFd, outputFd];
      }

      const child = spawn(command, args, { cwd: options.cwd, stdio });

      let stdout = '';
      let stderr = '';
      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        releaseOutput();
        // No process started, so the redirect target is dropped
        if (options.outputFile && existsSync(options.outputFile)) {
          unlinkSync(options.outputFile);
        }
        reject(new ProcessLaunchError(command, args, { cause: error }));
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        releaseOutput();
        resolve({
          exitCode: exitCodeFor(code, signal),
          signal,
          stdout,
          stderr,
          durationMs: Date.now() - startTime,
        });
      });
    });
  }
}
