import { z } from 'zod';

import { BACKUP_VERSION, LOCAL_ADDRESS, MIN_EXPIRE_TIMER_MS } from './archive/constants';
import { ConfigError } from './archive/errors';
import { formatIssues } from './util/common';

export const LogLevelEnum = z.enum(['debug', 'info', 'warn', 'error']);

export const BackupOptionsSchema = z.object({
  minExpireTimerMs: z.number().int().nonnegative().default(MIN_EXPIRE_TIMER_MS),
  /** `report` turns interactions and chat items no archiver handles into recorded errors. */
  unmatchedPolicy: z.enum(['skip', 'report']).default('skip'),
  /** `partial` keeps partially restored chat items instead of reporting them as failures. */
  partialRestorePolicy: z.enum(['failure', 'partial']).default('failure'),
  backupVersion: z.number().int().positive().default(BACKUP_VERSION),
  /** Address the local store uses for messages and reactions from the device owner. */
  localAddress: z.string().min(1).default(LOCAL_ADDRESS),
  logLevel: LogLevelEnum.default('info'),
});

export type BackupOptions = z.infer<typeof BackupOptionsSchema>;
export type BackupOptionsInput = z.input<typeof BackupOptionsSchema>;

export function resolveBackupOptions(input: BackupOptionsInput | Record<string, unknown> = {}): BackupOptions {
  const parsed = BackupOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`invalid backup options: ${formatIssues(parsed.error.issues)}`, parsed.error);
  }
  return parsed.data;
}

export function loadBackupOptionsFromEnv(env: Record<string, string | undefined> = process.env): BackupOptions {
  const input: Record<string, unknown> = {};
  const strict = env.CHAT_BACKUP_STRICT?.trim().toLowerCase();
  if (strict) {
    input.unmatchedPolicy = strict === '1' || strict === 'true' ? 'report' : 'skip';
  }
  const partialRestore = env.CHAT_BACKUP_PARTIAL_RESTORE?.trim();
  if (partialRestore) {
    input.partialRestorePolicy = partialRestore;
  }
  const minExpire = env.CHAT_BACKUP_MIN_EXPIRE_TIMER_MS?.trim();
  if (minExpire) {
    input.minExpireTimerMs = Number(minExpire);
  }
  const logLevel = env.CHAT_BACKUP_LOG_LEVEL?.trim();
  if (logLevel) {
    input.logLevel = logLevel;
  }
  return resolveBackupOptions(input);
}
