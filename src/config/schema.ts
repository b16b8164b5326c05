import { z } from 'zod';

/**
 * Whether a polling cadence can produce at least two polls before a shutdown
 * is committed. A required offline time of 0 means a single immediate check.
 */
export function validateTiming(
  requiredOfflineSeconds: number,
  pollingIntervalSeconds: number
): { valid: boolean; error?: string } {
  if (!Number.isFinite(requiredOfflineSeconds) || requiredOfflineSeconds < 0) {
    return {
      valid: false,
      error: `requiredOfflineSeconds (${requiredOfflineSeconds}) must be a non-negative number`,
    };
  }
  if (!Number.isFinite(pollingIntervalSeconds) || pollingIntervalSeconds <= 0) {
    return {
      valid: false,
      error: `pollingIntervalSeconds (${pollingIntervalSeconds}) must be a positive number`,
    };
  }
  if (requiredOfflineSeconds === 0) {
    return { valid: true };
  }
  if (requiredOfflineSeconds <= 2 * pollingIntervalSeconds) {
    return {
      valid: false,
      error:
        `pollingIntervalSeconds (${pollingIntervalSeconds}) must be less than half of ` +
        `requiredOfflineSeconds (${requiredOfflineSeconds})`,
    };
  }
  return { valid: true };
}

/** A host name or IP address handed to the probe command as one argument */
const targetSchema = z.string()
  .min(1, 'Target cannot be empty')
  .refine((val) => !/\s/.test(val), 'Target cannot contain whitespace')
  .refine((val) => !val.startsWith('-'), 'Target cannot start with "-"');

const commandSchema = z.object({
  command: z.string().min(1, 'Command is required'),
  args: z.array(z.string()),
});

const taskNameSchema = z.string()
  .min(1, 'Task name is required')
  .regex(/^[A-Za-z0-9._-]+$/, 'Task name may only contain letters, digits, ".", "_" and "-"');

const syncTaskSchema = z.object({
  name: taskNameSchema,
  source: z.string().min(1, 'Source directory is required'),
  target: z.string().min(1, 'Target directory is required'),
});

/**
 * The timing rule between the two durations is enforced by ShutdownDecisionLoop
 */
export const MonitorSchema = z.object({
  targets: z.array(targetSchema),
  requiredOfflineSeconds: z.number().int().min(0),
  pollingIntervalSeconds: z.number().int().positive(),
  probe: commandSchema,
  shutdown: commandSchema,
});

export const SyncSchema = z.object({
  command: z.string().min(1, 'rsync command is required'),
  args: z.array(z.string()),
  logDir: z.string().min(1),
  tasks: z.array(syncTaskSchema),
}).superRefine((sync, ctx) => {
  const seen = new Set<string>();
  sync.tasks.forEach((task, index) => {
    if (seen.has(task.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tasks', index, 'name'],
        message: `Duplicate task name "${task.name}"`,
      });
    }
    seen.add(task.name);
  });
});

export const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
  format: z.enum(['pretty', 'json']),
  dir: z.string().min(1),
  maxFileSizeBytes: z.number().int().positive(),
  maxFiles: z.number().int().min(1).max(1000),
});

export const ConfigSchema = z.object({
  monitor: MonitorSchema,
  sync: SyncSchema,
  logging: LoggingSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type SyncTaskConfig = z.infer<typeof syncTaskSchema>;

/**
 * ping flags for "exit on the first reply, give up after 5 seconds"
 */
export function defaultProbeArgs(platform: NodeJS.Platform = process.platform): string[] {
  return platform === 'linux' ? ['-c', '1', '-w', '5'] : ['-o', '-t', '5'];
}

export function defaultShutdownArgs(platform: NodeJS.Platform = process.platform): string[] {
  return platform === 'linux' ? ['-P', 'now'] : ['-p', 'now'];
}

export const DEFAULT_RSYNC_ARGS = [
  '--archive',
  '--verbose',
  '--hard-links',
  '--delete',
  '--fuzzy',
  '--stats',
];

export const defaultConfig: Config = {
  monitor: {
    targets: [],
    requiredOfflineSeconds: 600,
    pollingIntervalSeconds: 60,
    probe: { command: 'ping', args: defaultProbeArgs() },
    shutdown: { command: '/sbin/shutdown', args: defaultShutdownArgs() },
  },
  sync: {
    command: 'rsync',
    args: DEFAULT_RSYNC_ARGS,
    logDir: './logs/rsync',
    tasks: [],
  },
  logging: {
    level: 'debug',
    format: 'pretty',
    dir: './logs',
    maxFileSizeBytes: 500 * 1024,
    maxFiles: 30,
  },
};
