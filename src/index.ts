#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, writeFileSync } from 'fs';
import { runCheck, runSync, CHECK_LOG_FILE, SYNC_LOG_FILE } from './commands/index.js';
import { createExampleConfig, getConfigHelp, CONFIG_FILE_NAMES } from './config/index.js';

const program = new Command();

function formatExamples(examples: string[]): string {
  return '\n\nExamples:\n' + examples.map(ex => `  $ ${ex}`).join('\n');
}

program
  .name('nas-sentinel')
  .description(
    'Host-reachability shutdown guard and rsync backup runner.\n\n' +
    'Meant to be run from cron on a storage box:\n' +
    '  check  powers the machine off once none of the monitored hosts has\n' +
    '         answered a ping for the configured offline period\n' +
    '  sync   mirrors each configured directory with rsync, one after another'
  )
  .version('1.0.0');

program
  .command('check')
  .description(
    'Probe the monitored hosts and shut down if none stays reachable.\n\n' +
    'The first probe round runs immediately. If every host is down, rounds\n' +
    'repeat every pollingIntervalSeconds until requiredOfflineSeconds have\n' +
    'passed; a single answering host at any round aborts the shutdown.\n' +
    `Log file: <logging.dir>/${CHECK_LOG_FILE}` +
    formatExamples([
      'nas-sentinel check',
      'nas-sentinel check --dry-run  # Log instead of shutting down',
      'nas-sentinel check -c /etc/nas-sentinel.json',
    ]) +
    '\n\nExit Codes:\n' +
    '  0  A host responded, or shutdown was invoked\n' +
    '  1  Invalid configuration, or ping/shutdown could not be launched'
  )
  .option('-c, --config <path>', 'Path to configuration file (JSON format)')
  .option('-v, --verbose', 'Enable verbose/debug logging output')
  .option('--dry-run', 'Run the checks but do not invoke the shutdown command')
  .action(async (options: { config?: string; verbose?: boolean; dryRun?: boolean }) => {
    process.exitCode = await runCheck({
      configPath: options.config,
      verbose: options.verbose,
      dryRun: options.dryRun,
    });
  });

program
  .command('sync')
  .description(
    'Run rsync for every configured task, strictly in order.\n\n' +
    'Each run writes rsync\'s output to its own file in sync.logDir. A failing\n' +
    'task is logged and the remaining tasks still run.\n' +
    `Log file: <logging.dir>/${SYNC_LOG_FILE}` +
    formatExamples([
      'nas-sentinel sync',
      'nas-sentinel sync --dry-run  # Pass --dry-run to rsync',
    ]) +
    '\n\nExit Codes:\n' +
    '  0  All tasks were attempted (check the log for failed tasks)\n' +
    '  1  Invalid configuration or task paths; nothing was synced'
  )
  .option('-c, --config <path>', 'Path to configuration file (JSON format)')
  .option('-v, --verbose', 'Enable verbose/debug logging output')
  .option('--dry-run', 'Pass --dry-run to rsync')
  .action(async (options: { config?: string; verbose?: boolean; dryRun?: boolean }) => {
    process.exitCode = await runSync({
      configPath: options.config,
      verbose: options.verbose,
      dryRun: options.dryRun,
    });
  });

program
  .command('init')
  .description('Write an example configuration file to edit')
  .option('-o, --output <path>', 'Output path', CONFIG_FILE_NAMES[0])
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: { output: string; force?: boolean }) => {
    if (existsSync(options.output) && !options.force) {
      console.error(chalk.red(`${options.output} already exists. Use --force to overwrite.`));
      process.exitCode = 1;
      return;
    }
    writeFileSync(options.output, JSON.stringify(createExampleConfig(), null, 2) + '\n');
    console.log(`${chalk.green('✓')} Wrote ${options.output}`);
  });

program
  .command('help-config')
  .description('Show documentation for every configuration option')
  .action(() => {
    console.log(getConfigHelp());
  });

await program.parseAsync();
