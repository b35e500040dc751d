/** Messages that would expire sooner than this after the backup is taken are left out. */
export const MIN_EXPIRE_TIMER_MS = 24 * 60 * 60 * 1000;

export const SELF_RECIPIENT_ID = 1;

/** Address the local store uses for the device owner. */
export const LOCAL_ADDRESS = 'local';

export const FIRST_CHAT_ID = 1;

export const BACKUP_VERSION = 1;

export const MANIFEST_SCHEMA_VERSION = 1;
