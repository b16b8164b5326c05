import chalk from 'chalk';
import {
  closeSync,
  existsSync,
  fstatSync,
  mkdirSync,
  openSync,
  renameSync,
  unlinkSync,
  writeSync,
} from 'fs';
import { dirname, join } from 'path';
import { StructuredError, formatError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'pretty' | 'json';

export type LogMeta = Record<string, unknown>;

/**
 * Where console output goes; defaults to the global console
 */
export interface ConsoleSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

/**
 * Structured JSON log entry schema for consistent logging
 */
export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  meta?: LogMeta;
  error?: {
    code: string;
    message: string;
    severity: string;
    cause?: string;
    context?: Record<string, unknown>;
    recoveryActions?: Array<{ description: string; automatic: boolean }>;
  };
}

/**
 * Configuration for the size-rotated log file
 */
export interface RotatingFileWriterConfig {
  /** Path of the active log file */
  filePath: string;
  /** Size in bytes at which the active file is rotated */
  maxFileSizeBytes: number;
  /** Number of rotated backups to keep (<file>.1 is the newest) */
  maxFiles: number;
}

/**
 * Append-only log file that rotates by size. Holds its file descriptor
 * between open() and close().
 */
export class RotatingFileWriter {
  private readonly config: RotatingFileWriterConfig;
  private fd: number | null = null;
  private size = 0;

  constructor(config: RotatingFileWriterConfig) {
    this.config = config;
  }

  get filePath(): string {
    return this.config.filePath;
  }

  isOpen(): boolean {
    return this.fd !== null;
  }

  open(): void {
    if (this.fd !== null) return;
    const dir = dirname(this.config.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    this.fd = openSync(this.config.filePath, 'a');
    this.size = fstatSync(this.fd).size;
  }

  write(text: string): void {
    if (this.fd === null) return;

    if (this.size >= this.config.maxFileSizeBytes) {
      this.rotate();
    }

    const buffer = Buffer.from(text, 'utf-8');
    writeSync(this.requireFd(), buffer);
    this.size += buffer.length;
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }

  /**
   * Backup paths that currently exist, newest first
   */
  getBackupFiles(): string[] {
    const files: string[] = [];
    for (let i = 1; i <= this.config.maxFiles; i++) {
      const path = `${this.config.filePath}.${i}`;
      if (existsSync(path)) {
        files.push(path);
      }
    }
    return files;
  }

  private requireFd(): number {
    if (this.fd === null) {
      throw new Error(`Log file ${this.config.filePath} is not open`);
    }
    return this.fd;
  }

  private rotate(): void {
    this.close();

    const base = this.config.filePath;
    const oldestFile = `${base}.${this.config.maxFiles}`;
    if (existsSync(oldestFile)) {
      unlinkSync(oldestFile);
    }

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      const current = `${base}.${i}`;
      if (existsSync(current)) {
        renameSync(current, `${base}.${i + 1}`);
      }
    }

    if (existsSync(base)) {
      renameSync(base, `${base}.1`);
    }

    this.fd = openSync(base, 'a');
    this.size = 0;
  }
}

export interface LoggerOptions {
  level: LogLevel;
  prefix?: string;
  format?: LogFormat;
  console?: ConsoleSink;
  file?: RotatingFileWriter;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const levelIcons: Record<LogLevel, string> = {
  debug: '🔍',
  info: '📋',
  warn: '⚠️',
  error: '❌',
};

export class Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;
  private readonly format: LogFormat;
  private readonly sink: ConsoleSink;
  private readonly file?: RotatingFileWriter;

  constructor(options: LoggerOptions = { level: 'info' }) {
    this.level = options.level;
    this.prefix = options.prefix ?? '';
    this.format = options.format ?? 'pretty';
    this.sink = options.console ?? console;
    this.file = options.file;
  }

  /**
   * Logger for a single component, sharing this logger's console and file
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix,
      format: this.format,
      console: this.sink,
      file: this.file,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  private createLogEntry(level: LogLevel, message: string, timestamp: string, meta?: LogMeta): StructuredLogEntry {
    const entry: StructuredLogEntry = { timestamp, level, message };

    if (this.prefix) {
      entry.component = this.prefix;
    }

    if (meta && Object.keys(meta).length > 0) {
      entry.meta = meta;
    }

    return entry;
  }

  /**
   * Format a log entry as pretty output for terminal
   */
  private formatPretty(level: LogLevel, message: string, timestamp: string, meta?: LogMeta): string {
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    let formatted = `${chalk.gray(timestamp)} ${levelIcons[level]} ${levelColors[level](level.toUpperCase().padEnd(5))} ${prefix}${message}`;

    if (meta && Object.keys(meta).length > 0) {
      formatted += ` ${chalk.gray(JSON.stringify(meta))}`;
    }

    return formatted;
  }

  /**
   * Plain "<timestamp> - <LEVEL> - <message>" line for the log file
   */
  private formatFileLine(level: LogLevel, message: string, timestamp: string, meta?: LogMeta): string {
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    let line = `${timestamp} - ${level.toUpperCase()} - ${prefix}${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }
    return line;
  }

  private writeFile(level: LogLevel, message: string, timestamp: string, meta?: LogMeta): void {
    if (!this.file) return;
    if (this.format === 'json') {
      this.file.write(JSON.stringify(this.createLogEntry(level, message, timestamp, meta)) + '\n');
    } else {
      this.file.write(this.formatFileLine(level, message, timestamp, meta) + '\n');
    }
  }

  private writeConsole(level: LogLevel, line: string): void {
    if (level === 'error') {
      this.sink.error(line);
    } else if (level === 'warn') {
      this.sink.warn(line);
    } else {
      this.sink.log(line);
    }
  }

  private writeLog(level: LogLevel, message: string, meta?: LogMeta): void {
    const timestamp = new Date().toISOString();
    if (this.format === 'json') {
      this.writeConsole(level, JSON.stringify(this.createLogEntry(level, message, timestamp, meta)));
    } else {
      this.writeConsole(level, this.formatPretty(level, message, timestamp, meta));
    }
    this.writeFile(level, message, timestamp, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog('debug')) {
      this.writeLog('debug', message, meta);
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog('info')) {
      this.writeLog('info', message, meta);
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog('warn')) {
      this.writeLog('warn', message, meta);
    }
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog('error')) {
      this.writeLog('error', message, meta);
    }
  }

  /**
   * Log a structured error with its context and recovery suggestions
   */
  structuredError(error: StructuredError): void {
    if (!this.shouldLog('error')) return;

    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      const entry = this.createLogEntry('error', error.message, timestamp);
      entry.error = {
        code: error.code,
        message: error.message,
        severity: error.severity,
        context: error.context,
      };
      if (error.recoveryActions.length > 0) {
        entry.error.recoveryActions = error.recoveryActions;
      }
      if (error.cause) {
        entry.error.cause = error.cause.message;
      }
      const line = JSON.stringify(entry);
      this.sink.error(line);
      this.file?.write(line + '\n');
      return;
    }

    const [headline, ...details] = formatError(error).split('\n');
    this.sink.error(this.formatPretty('error', chalk.bold(headline), timestamp));
    for (const line of details) {
      this.sink.error(chalk.gray(line));
    }

    if (this.file) {
      this.file.write(this.formatFileLine('error', headline, timestamp) + '\n');
      for (const line of details) {
        this.file.write(`${line}\n`);
      }
    }
  }
}

/**
 * Settings needed to build the logging context of one run
 */
export interface LoggingContextOptions {
  level: LogLevel;
  format: LogFormat;
  dir: string;
  fileName: string;
  maxFileSizeBytes: number;
  maxFiles: number;
  console?: ConsoleSink;
}

/**
 * Logger plus the file it writes to; created once per run and closed on exit
 */
export interface LoggingContext {
  logger: Logger;
  file: RotatingFileWriter;
  close(): void;
}

export function createLoggingContext(options: LoggingContextOptions): LoggingContext {
  const file = new RotatingFileWriter({
    filePath: join(options.dir, options.fileName),
    maxFileSizeBytes: options.maxFileSizeBytes,
    maxFiles: options.maxFiles,
  });
  file.open();

  const logger = new Logger({
    level: options.level,
    format: options.format,
    console: options.console,
    file,
  });

  return {
    logger,
    file,
    close: () => file.close(),
  };
}
