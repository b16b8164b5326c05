/**
 * Structured error handling system with error codes, severity levels, and recovery suggestions.
 */

/**
 * Error severity levels
 */
export type ErrorSeverity = 'critical' | 'error' | 'warning';

/**
 * Error codes for all known error types
 */
export enum ErrorCode {
  // Configuration errors
  CONFIG_FILE_NOT_FOUND = 'CONFIG_FILE_NOT_FOUND',
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_FAILED = 'CONFIG_VALIDATION_FAILED',
  CONFIG_TIMING_INVALID = 'CONFIG_TIMING_INVALID',

  // Sync task preconditions
  PRECONDITION_SOURCE_NOT_DIRECTORY = 'PRECONDITION_SOURCE_NOT_DIRECTORY',
  PRECONDITION_TARGET_NOT_DIRECTORY = 'PRECONDITION_TARGET_NOT_DIRECTORY',
  PRECONDITION_TRAILING_SEPARATOR = 'PRECONDITION_TRAILING_SEPARATOR',

  // External commands
  PROCESS_LAUNCH_FAILED = 'PROCESS_LAUNCH_FAILED',

  // General errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Recovery action that can be taken for an error
 */
export interface RecoveryAction {
  description: string;
  automatic: boolean;
}

/**
 * Context information for debugging
 */
export interface ErrorContext {
  operation?: string;
  component?: string;
  timestamp?: string;
  [key: string]: unknown;
}

interface StructuredErrorOptions {
  severity?: ErrorSeverity;
  recoveryActions?: RecoveryAction[];
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base structured error class
 */
export class StructuredError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly recoveryActions: RecoveryAction[];
  public readonly context: ErrorContext;
  public readonly cause?: Error;
  public readonly timestamp: string;

  constructor(code: ErrorCode, message: string, options: StructuredErrorOptions = {}) {
    super(message);
    this.name = 'StructuredError';
    this.code = code;
    this.severity = options.severity ?? 'error';
    this.recoveryActions = options.recoveryActions ?? [];
    this.context = {
      ...options.context,
      timestamp: new Date().toISOString(),
    };
    this.cause = options.cause;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StructuredError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      recoveryActions: this.recoveryActions.map((a) => ({
        description: a.description,
        automatic: a.automatic,
      })),
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  getRecoverySuggestions(): string[] {
    return this.recoveryActions.map((a) => a.description);
  }
}

/**
 * Configuration-specific error
 */
export class ConfigError extends StructuredError {
  constructor(
    code: ErrorCode,
    message: string,
    options: {
      field?: string;
      value?: unknown;
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    const recoveryActions = options.recoveryActions ?? getConfigRecoveryActions(options.field);
    super(code, message, {
      severity: 'critical',
      recoveryActions,
      context: {
        ...options.context,
        field: options.field,
        invalidValue: options.value,
      },
      cause: options.cause,
    });
    this.name = 'ConfigError';
  }
}

function getConfigRecoveryActions(field?: string): RecoveryAction[] {
  const actions: RecoveryAction[] = [
    {
      description: 'Run "nas-sentinel help-config" for configuration documentation',
      automatic: false,
    },
    {
      description: 'Run "nas-sentinel init" to create an example configuration file',
      automatic: false,
    },
  ];

  if (field) {
    actions.push({
      description: `Check the value of "${field}" in your configuration`,
      automatic: false,
    });
  }

  return actions;
}

/**
 * A sync task whose paths cannot be mirrored safely
 */
export class PreconditionError extends StructuredError {
  constructor(
    code: ErrorCode,
    message: string,
    options: {
      taskName: string;
      path: string;
      context?: ErrorContext;
    }
  ) {
    super(code, message, {
      severity: 'critical',
      recoveryActions: getPreconditionRecoveryActions(code),
      context: {
        ...options.context,
        taskName: options.taskName,
        path: options.path,
      },
    });
    this.name = 'PreconditionError';
  }
}

function getPreconditionRecoveryActions(code: ErrorCode): RecoveryAction[] {
  switch (code) {
    case ErrorCode.PRECONDITION_SOURCE_NOT_DIRECTORY:
    case ErrorCode.PRECONDITION_TARGET_NOT_DIRECTORY:
      return [
        { description: 'Check that the disk holding the path is mounted', automatic: false },
        { description: 'Fix the path in the "sync.tasks" configuration', automatic: false },
      ];
    case ErrorCode.PRECONDITION_TRAILING_SEPARATOR:
      return [
        {
          description: 'Remove the trailing separator so the source directory is created inside the target',
          automatic: false,
        },
      ];
    default:
      return [];
  }
}

/**
 * An external command that could not be started at all
 */
export class ProcessLaunchError extends StructuredError {
  public readonly command: string;

  constructor(
    command: string,
    args: string[],
    options: { cause?: Error; context?: ErrorContext } = {}
  ) {
    const reason = options.cause?.message ?? 'unknown reason';
    super(ErrorCode.PROCESS_LAUNCH_FAILED, `Failed to launch "${command}": ${reason}`, {
      severity: 'critical',
      recoveryActions: [
        { description: `Verify that "${command}" is installed and on PATH`, automatic: false },
        { description: 'Check the permissions of the executable', automatic: false },
      ],
      context: {
        ...options.context,
        command,
        args,
        errno: getErrno(options.cause),
      },
      cause: options.cause,
    });
    this.name = 'ProcessLaunchError';
    this.command = command;
  }
}

function getErrno(error: Error | undefined): string | undefined {
  if (error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Wrap an error as a StructuredError if it isn't already
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = ErrorCode.UNKNOWN_ERROR,
  context?: ErrorContext
): StructuredError {
  if (error instanceof StructuredError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new StructuredError(defaultCode, message, {
    context,
    cause,
  });
}

/**
 * Format a StructuredError for display
 */
export function formatError(error: StructuredError): string {
  const lines: string[] = [];

  lines.push(`[${error.code}] ${error.message}`);
  lines.push(`  Severity: ${error.severity}`);

  if (error.recoveryActions.length > 0) {
    lines.push('  Recovery suggestions:');
    for (const action of error.recoveryActions) {
      const prefix = action.automatic ? '(auto)' : '(manual)';
      lines.push(`    ${prefix} ${action.description}`);
    }
  }

  const contextEntries = Object.entries(error.context).filter(
    ([key, value]) => value !== undefined && key !== 'timestamp'
  );
  if (contextEntries.length > 0) {
    lines.push('  Context:');
    for (const [key, value] of contextEntries) {
      lines.push(`    ${key}: ${JSON.stringify(value)}`);
    }
  }

  return lines.join('\n');
}
