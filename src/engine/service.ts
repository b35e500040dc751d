import { ChatArchiver } from './archive/chat-archiver';
import { type ChatItemArchiveEvent, type ChatItemArchiveTally, ChatItemArchiver } from './archive/chat-item-archiver';
import { MANIFEST_SCHEMA_VERSION } from './archive/constants';
import { BackupContextBuilder, type ChatRestoringContext } from './archive/context';
import {
  type ArchiveFrameError,
  BackupError,
  FrameFormatError,
  type RestoreErrorKind,
  describeArchiveError,
  describeArchiveKind,
  describeRestoreError,
  errorMessage,
} from './archive/errors';
import { type ArchiveMultiFrameResult, type RestoreFrameResult, archiveResultErrors, foldArchiveResults } from './archive/results';
import { FRAMES_PATH, MANIFEST_PATH, detectBackup, readManifest } from './backup/format';
import { JsonLinesFrameOutputStream, emptyFrameCounts, readFrames } from './backup/frame-stream';
import { type ArchiveEntries, readZipBlob, writeJsonEntry, writeZipBlob } from './backup/zip';
import { type BackupOptions, type BackupOptionsInput, resolveBackupOptions } from './config';
import type { ChatId, DateProvider, FrameCounts, InspectResult, Manifest, ProgressEvent } from './ir/types';
import { ConsoleLogger, type Logger } from './logger';
import type { BackupDatabase, WriteTransaction } from './storage/database';
import { SqlInteractionStore } from './storage/interaction-store';
import { SqlReactionStore } from './storage/reaction-store';
import { SqlThreadStore } from './storage/thread-store';
import { dedupeStrings, toIso } from './util/common';
import { sha256Hex } from './util/hash';

export type ProgressReporter = (event: ProgressEvent) => void;

export interface BackupRunOptions {
  options?: BackupOptionsInput;
  dateProvider?: DateProvider;
  logger?: Logger;
  onProgress?: ProgressReporter;
}

export interface ExportOptions extends BackupRunOptions {
  onItem?: (event: ChatItemArchiveEvent) => void;
}

export interface ExportResult {
  blob: Blob;
  manifest: Manifest;
  /** Recipient, chat and chat item errors folded together. */
  result: ArchiveMultiFrameResult;
  tally: ChatItemArchiveTally;
  frames: FrameCounts;
}

export interface ChatRestoreFailure {
  chatId: ChatId;
  errors: RestoreErrorKind[];
}

export interface ImportResult {
  manifest: Manifest;
  frames: FrameCounts;
  restoredChatItems: number;
  chatFailures: ChatRestoreFailure[];
  /** Every chat item frame that did not restore cleanly, in frame order. */
  chatItemResults: Array<Exclude<RestoreFrameResult, { type: 'success' }>>;
}

interface RunContext {
  options: BackupOptions;
  dateProvider: DateProvider;
  logger: Logger;
}

export async function exportBackup(database: BackupDatabase, run: ExportOptions = {}): Promise<ExportResult> {
  const { options, dateProvider, logger } = prepareRun(run, 'export');
  const threadStore = new SqlThreadStore();
  const interactionStore = new SqlInteractionStore();
  const chatArchiver = new ChatArchiver(threadStore);
  const chatItemArchiver = ChatItemArchiver.create({
    dateProvider,
    interactionStore,
    reactionStore: new SqlReactionStore(),
    threadStore,
    options,
    logger,
  });

  const startedAt = dateProvider();
  const stream = new JsonLinesFrameOutputStream();

  report(run.onProgress, 'read', 5, 'Reading threads');
  const errors = database.read((tx) => {
    const infoError = stream.writeFrame(() => ({
      type: 'backupInfo',
      backupInfo: { version: options.backupVersion, backupTimeMs: startedAt.getTime() },
    }));
    if (infoError) {
      throw new BackupError(`backup info frame not written: ${describeArchiveKind(infoError)}`, 'BACKUP_INFO');
    }

    const threads = threadStore.listThreads(tx);
    const builder = new BackupContextBuilder(options.localAddress);

    report(run.onProgress, 'recipients', 15, 'Writing recipients');
    const recipients = chatArchiver.archiveRecipients(threads, stream, builder);
    if (recipients.type === 'completeFailure') throw recipients.error;

    report(run.onProgress, 'chats', 25, `Writing ${threads.length} chats`);
    const chats = chatArchiver.archiveChats(threads, stream, builder);
    if (chats.type === 'completeFailure') throw chats.error;

    report(run.onProgress, 'chat-items', 35, 'Writing chat items');
    const chatItems = chatItemArchiver.archiveInteractions(stream, builder.buildArchivingContext(), tx, run.onItem);
    if (chatItems.type === 'completeFailure') throw chatItems.error;

    return [...archiveResultErrors(recipients), ...archiveResultErrors(chats), ...archiveResultErrors(chatItems)];
  });

  report(run.onProgress, 'package', 80, 'Packaging backup');
  const frameCounts = stream.frameCounts;
  const frameCount = stream.frameCount;
  const framesBytes = stream.finish();
  const manifest: Manifest = {
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    backupVersion: options.backupVersion,
    createdAt: toIso(startedAt),
    frameCount,
    framesSha256: sha256Hex(framesBytes),
    warnings: warningsFor(errors),
  };

  const entries: ArchiveEntries = new Map();
  entries.set(FRAMES_PATH, framesBytes);
  writeJsonEntry(entries, MANIFEST_PATH, manifest);
  const blob = await writeZipBlob(entries);

  logger.info('backup exported', { frames: frameCount, errors: errors.length });
  report(run.onProgress, 'done', 100, 'Export complete');
  return {
    blob,
    manifest,
    result: foldArchiveResults(undefined, errors),
    tally: chatItemArchiver.tally,
    frames: frameCounts,
  };
}

/**
 * Restores a backup into `database`. Each chat and chat item is restored
 * in its own write transaction, so one bad record leaves the rest intact.
 */
export async function importBackup(blob: Blob, database: BackupDatabase, run: BackupRunOptions = {}): Promise<ImportResult> {
  const { options, dateProvider, logger } = prepareRun(run, 'import');
  const threadStore = new SqlThreadStore();
  const chatArchiver = new ChatArchiver(threadStore);
  const chatItemArchiver = ChatItemArchiver.create({
    dateProvider,
    interactionStore: new SqlInteractionStore(),
    reactionStore: new SqlReactionStore(),
    threadStore,
    options,
    logger,
  });

  report(run.onProgress, 'read', 5, 'Reading backup zip');
  const entries = await readZipBlob(blob);
  const { manifest, framesBytes } = openBackup(entries);

  const frames = emptyFrameCounts();
  const builder = new BackupContextBuilder(options.localAddress);
  let context: ChatRestoringContext | null = null;
  const chatFailures: ChatRestoreFailure[] = [];
  const chatItemResults: ImportResult['chatItemResults'] = [];
  let restoredChatItems = 0;
  let seen = 0;

  report(run.onProgress, 'restore', 20, `Restoring ${manifest.frameCount} frames`);
  for (const { line, frame } of readFrames(framesBytes)) {
    if (seen === 0 && frame.type !== 'backupInfo') {
      throw new FrameFormatError(`line ${line}: backup must start with a backupInfo frame`);
    }
    seen += 1;
    frames[frame.type] += 1;

    switch (frame.type) {
      case 'backupInfo':
        if (seen !== 1) {
          throw new FrameFormatError(`line ${line}: unexpected backupInfo frame`);
        }
        if (frame.backupInfo.version > options.backupVersion) {
          throw new FrameFormatError(`unsupported backup version ${frame.backupInfo.version}`);
        }
        break;
      case 'recipient':
        chatArchiver.restoreRecipient(frame.recipient, builder);
        context = null;
        break;
      case 'chat': {
        const record = frame.chat;
        const errors = restoreInTransaction(database, (tx) => chatArchiver.restoreChat(record, builder, tx), (message): RestoreErrorKind[] => [
          { type: 'databaseInsertionFailed', message },
        ]);
        if (errors.length > 0) {
          chatFailures.push({ chatId: record.id, errors });
          logger.warn('chat restored with errors', { chatId: record.id, errors: errors.map(describeRestoreError) });
        }
        context = null;
        break;
      }
      case 'chatItem': {
        const chatItem = frame.chatItem;
        const restoringContext: ChatRestoringContext = context ?? builder.buildRestoringContext();
        context = restoringContext;
        const result = restoreInTransaction(
          database,
          (tx) => chatItemArchiver.restore(chatItem, restoringContext, tx),
          (message): RestoreFrameResult => ({
            type: 'failure',
            id: chatItem.dateSent,
            errors: [{ type: 'databaseInsertionFailed', message }],
          }),
        );
        if (result.type === 'success') {
          restoredChatItems += 1;
        } else {
          if (result.type === 'partialRestore') restoredChatItems += 1;
          chatItemResults.push(result);
        }
        break;
      }
    }
  }

  if (seen !== manifest.frameCount) {
    throw new FrameFormatError(`manifest lists ${manifest.frameCount} frames but backup has ${seen}`);
  }

  logger.info('backup imported', {
    frames: seen,
    restoredChatItems,
    chatItemFailures: chatItemResults.length,
    chatFailures: chatFailures.length,
  });
  report(run.onProgress, 'done', 100, 'Import complete');
  return { manifest, frames, restoredChatItems, chatFailures, chatItemResults };
}

export async function inspectBackup(blob: Blob, onProgress?: ProgressReporter): Promise<InspectResult> {
  report(onProgress, 'read', 5, 'Reading backup zip');
  const entries = await readZipBlob(blob);

  report(onProgress, 'detect', 20, 'Detecting backup layout');
  const detected = detectBackup(entries);
  const frames = emptyFrameCounts();
  if (!detected.valid) {
    return { valid: false, hints: detected.hints, frames, errors: ['not a chat backup'] };
  }

  const errors: string[] = [];
  let manifest: Manifest | undefined;
  try {
    const opened = openBackup(entries);
    manifest = opened.manifest;

    report(onProgress, 'frames', 50, 'Counting frames');
    let total = 0;
    for (const { frame } of readFrames(opened.framesBytes)) {
      frames[frame.type] += 1;
      total += 1;
    }
    if (total !== manifest.frameCount) {
      errors.push(`manifest lists ${manifest.frameCount} frames but backup has ${total}`);
    }
  } catch (error) {
    errors.push(errorMessage(error));
  }

  report(onProgress, 'done', 100, 'Inspection complete');
  return { valid: errors.length === 0, hints: detected.hints, manifest, frames, errors: dedupeStrings(errors) };
}

function openBackup(entries: ArchiveEntries): { manifest: Manifest; framesBytes: Uint8Array } {
  const detected = detectBackup(entries);
  if (!detected.valid) {
    throw new FrameFormatError(`not a chat backup (found: ${detected.hints.join(', ') || 'nothing'})`);
  }
  const manifest = readManifest(entries);
  const framesBytes = entries.get(FRAMES_PATH) ?? new Uint8Array();
  const digest = sha256Hex(framesBytes);
  if (digest !== manifest.framesSha256) {
    throw new FrameFormatError(`${FRAMES_PATH} checksum mismatch`);
  }
  return { manifest, framesBytes };
}

function restoreInTransaction<T>(
  database: BackupDatabase,
  block: (tx: WriteTransaction) => T,
  onStorageError: (message: string) => T,
): T {
  try {
    return database.write(block);
  } catch (error) {
    return onStorageError(errorMessage(error));
  }
}

function prepareRun(run: BackupRunOptions, operation: string): RunContext {
  const options = resolveBackupOptions(run.options);
  const logger = (run.logger ?? new ConsoleLogger(options.logLevel)).child({ operation });
  return { options, dateProvider: run.dateProvider ?? (() => new Date()), logger };
}

function warningsFor(errors: ArchiveFrameError[]): string[] {
  return dedupeStrings(errors.map(describeArchiveError));
}

function report(onProgress: ProgressReporter | undefined, stage: string, progress: number, message?: string): void {
  if (!onProgress) {
    return;
  }
  onProgress({ stage, progress, message });
}
