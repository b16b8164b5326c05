import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { config as loadEnv } from 'dotenv';
import type { ZodError, ZodIssue } from 'zod';
import { ConfigSchema, defaultConfig, type Config } from './schema.js';
import { Logger } from '../utils/logger.js';
import { ConfigError, ErrorCode } from '../utils/errors.js';

/**
 * Configuration file names searched in the working directory, in order
 */
export const CONFIG_FILE_NAMES = ['./nas-sentinel.config.json', './.nas-sentinel.json'];

/**
 * Configuration field metadata for help and validation suggestions
 */
const configFieldHelp: Record<string, { description: string; envVar?: string; example: string }> = {
  'monitor.targets': {
    description: 'Hosts probed in order; shutdown is aborted as soon as one responds',
    envVar: 'MONITOR_TARGETS',
    example: 'nas-peer,192.168.1.5',
  },
  'monitor.requiredOfflineSeconds': {
    description: 'How long every target must stay unreachable before shutdown (0 = check once)',
    envVar: 'REQUIRED_OFFLINE_SECONDS',
    example: '600',
  },
  'monitor.pollingIntervalSeconds': {
    description: 'Pause between probe rounds; must be less than half of requiredOfflineSeconds',
    envVar: 'POLLING_INTERVAL_SECONDS',
    example: '60',
  },
  'monitor.probe': {
    description: 'Probe command and flags; the target is appended as the last argument',
    example: '{ "command": "ping", "args": ["-c", "1", "-w", "5"] }',
  },
  'monitor.shutdown': {
    description: 'Command run once when shutdown is committed',
    envVar: 'SHUTDOWN_COMMAND',
    example: '{ "command": "/sbin/shutdown", "args": ["-P", "now"] }',
  },
  'sync.command': {
    description: 'Path of the rsync executable',
    envVar: 'RSYNC_COMMAND',
    example: '/usr/local/bin/rsync',
  },
  'sync.args': {
    description: 'rsync flags placed before the source and target directories',
    example: '["--archive", "--verbose", "--hard-links", "--delete", "--fuzzy", "--stats"]',
  },
  'sync.logDir': {
    description: 'Directory receiving one rsync output file per task and run',
    envVar: 'SYNC_LOG_DIR',
    example: './logs/rsync',
  },
  'sync.tasks': {
    description: 'Ordered list of { name, source, target }; source without trailing slash',
    example: '[{ "name": "home", "source": "/data/home", "target": "/backup" }]',
  },
  'logging.level': {
    description: 'Minimum log level to output (debug, info, warn, error)',
    envVar: 'LOG_LEVEL',
    example: 'info',
  },
  'logging.format': {
    description: 'Log output format: pretty (colored text) or json (structured)',
    envVar: 'LOG_FORMAT',
    example: 'pretty',
  },
  'logging.dir': {
    description: 'Directory for the rotated log files',
    envVar: 'LOG_DIR',
    example: './logs',
  },
  'logging.maxFileSizeBytes': {
    description: 'Size at which the log file is rotated',
    envVar: 'LOG_MAX_FILE_SIZE_BYTES',
    example: '512000',
  },
  'logging.maxFiles': {
    description: 'Number of rotated log files to keep',
    envVar: 'LOG_MAX_FILES',
    example: '30',
  },
};

function getValidationSuggestion(issue: ZodIssue): string {
  const path = issue.path.join('.');
  const help = configFieldHelp[path] ?? configFieldHelp[issue.path.slice(0, 2).join('.')];
  if (!help) return '';

  let suggestion = `\n    Description: ${help.description}`;
  if (help.envVar) {
    suggestion += `\n    Environment variable: ${help.envVar}`;
  }
  suggestion += `\n    Example: ${help.example}`;
  return suggestion;
}

/**
 * One human-readable line (plus hints) per validation issue
 */
export function formatValidationIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}${getValidationSuggestion(issue)}`;
  });
}

function createConfigValidationError(error: ZodError, configPath?: string): ConfigError {
  const issues = formatValidationIssues(error);
  const firstPath = error.issues[0]?.path.join('.');
  return new ConfigError(
    ErrorCode.CONFIG_VALIDATION_FAILED,
    `Configuration validation failed with ${issues.length} issue(s):\n  ${issues.join('\n  ')}`,
    {
      field: firstPath || undefined,
      context: { configPath, issueCount: issues.length },
    }
  );
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge source into target; nested objects merge, everything else is replaced
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function readConfigFile(fullPath: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Failed to parse config file ${fullPath}: ${cause.message}`,
      {
        context: { configPath: fullPath },
        recoveryActions: [
          { description: 'Verify your config file is valid JSON', automatic: false },
          { description: 'Run "nas-sentinel init" to create a new configuration file', automatic: false },
        ],
        cause,
      }
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Config file ${fullPath} must contain a JSON object`,
      { context: { configPath: fullPath } }
    );
  }
  return parsed;
}

function parseNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * Overrides taken from environment variables; only variables that are set count
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const monitor: PlainObject = {};
  const sync: PlainObject = {};
  const logging: PlainObject = {};

  if (env.MONITOR_TARGETS !== undefined) {
    monitor.targets = env.MONITOR_TARGETS.split(',').map((t) => t.trim()).filter((t) => t.length > 0);
  }
  if (env.REQUIRED_OFFLINE_SECONDS !== undefined) {
    monitor.requiredOfflineSeconds = parseNumber(env.REQUIRED_OFFLINE_SECONDS);
  }
  if (env.POLLING_INTERVAL_SECONDS !== undefined) {
    monitor.pollingIntervalSeconds = parseNumber(env.POLLING_INTERVAL_SECONDS);
  }
  if (env.SHUTDOWN_COMMAND !== undefined) {
    monitor.shutdown = { command: env.SHUTDOWN_COMMAND };
  }

  if (env.RSYNC_COMMAND !== undefined) {
    sync.command = env.RSYNC_COMMAND;
  }
  if (env.SYNC_LOG_DIR !== undefined) {
    sync.logDir = env.SYNC_LOG_DIR;
  }

  if (env.LOG_LEVEL !== undefined) {
    logging.level = env.LOG_LEVEL;
  }
  if (env.LOG_FORMAT !== undefined) {
    logging.format = env.LOG_FORMAT;
  }
  if (env.LOG_DIR !== undefined) {
    logging.dir = env.LOG_DIR;
  }
  if (env.LOG_MAX_FILE_SIZE_BYTES !== undefined) {
    logging.maxFileSizeBytes = parseNumber(env.LOG_MAX_FILE_SIZE_BYTES);
  }
  if (env.LOG_MAX_FILES !== undefined) {
    logging.maxFiles = parseNumber(env.LOG_MAX_FILES);
  }

  return { monitor, sync, logging };
}

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Explicit configuration file; must exist when given */
  configPath?: string;
  /** Environment to read overrides from (default: process.env after loading .env) */
  env?: NodeJS.ProcessEnv;
  /** Bootstrap logger used before the run's logging context exists */
  logger?: Logger;
}

/**
 * Load configuration: defaults < config file < environment variables
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const logger = options.logger ?? new Logger({ level: 'info' });
  let env = options.env;
  if (!env) {
    loadEnv();
    env = process.env;
  }

  if (options.configPath && !existsSync(resolve(options.configPath))) {
    throw new ConfigError(
      ErrorCode.CONFIG_FILE_NOT_FOUND,
      `Config file not found: ${resolve(options.configPath)}`,
      { context: { configPath: options.configPath } }
    );
  }

  const possiblePaths = options.configPath ? [options.configPath] : CONFIG_FILE_NAMES;
  let fileConfig: PlainObject = {};
  let configLoadPath: string | undefined;

  for (const path of possiblePaths) {
    const fullPath = resolve(path);
    if (existsSync(fullPath)) {
      fileConfig = readConfigFile(fullPath);
      configLoadPath = fullPath;
      logger.debug(`Loaded config from ${fullPath}`);
      break;
    }
  }

  const mergedConfig = deepMerge(deepMerge(defaultConfig, fileConfig), configFromEnv(env));

  const result = ConfigSchema.safeParse(mergedConfig);
  if (!result.success) {
    throw createConfigValidationError(result.error, configLoadPath);
  }

  return result.data;
}

/**
 * Example configuration written by "nas-sentinel init"
 */
export function createExampleConfig(): Config {
  return {
    ...defaultConfig,
    monitor: {
      ...defaultConfig.monitor,
      targets: ['nas-peer', '192.168.1.5'],
    },
    sync: {
      ...defaultConfig.sync,
      tasks: [
        { name: 'home', source: '/mnt/data/home', target: '/mnt/backup/synctargets' },
        { name: 'photos', source: '/mnt/data/photos', target: '/mnt/backup/synctargets' },
      ],
    },
  };
}

/**
 * Human-readable documentation of every configuration field
 */
export function getConfigHelp(): string {
  const lines: string[] = [
    'Configuration',
    '',
    `Files searched (first found wins): ${CONFIG_FILE_NAMES.join(', ')}`,
    'Precedence: defaults < config file < environment variables (.env is loaded)',
    '',
  ];

  for (const [field, help] of Object.entries(configFieldHelp)) {
    lines.push(`  ${field}`);
    lines.push(`    ${help.description}`);
    if (help.envVar) {
      lines.push(`    Environment variable: ${help.envVar}`);
    }
    lines.push(`    Example: ${help.example}`);
    lines.push('');
  }

  return lines.join('\n');
}

export type { Config, SyncTaskConfig } from './schema.js';
export { validateTiming } from './schema.js';
