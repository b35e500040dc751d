import type { ChatId, ChatRecord, RecipientId, RecipientRecord, Thread } from '../ir/types';
import type { FrameOutputStream } from '../backup/frame-stream';
import type { WriteTransaction } from '../storage/database';
import type { ThreadStore } from '../storage/thread-store';
import { newId } from '../util/id';
import { FIRST_CHAT_ID } from './constants';
import type { BackupContextBuilder } from './context';
import { type ArchiveFrameError, BackupError, type RestoreErrorKind, archiveError, describeArchiveKind, errorMessage } from './errors';
import { type ArchiveMultiFrameResult, foldArchiveResults } from './results';

/**
 * Recipient and chat frames. Every id handed out here is registered on the
 * context builder so chat items written afterwards can refer to it.
 */
export class ChatArchiver {
  constructor(private readonly threadStore: ThreadStore) {}

  archiveRecipients(threads: readonly Thread[], stream: FrameOutputStream, builder: BackupContextBuilder): ArchiveMultiFrameResult {
    const selfId = builder.buildRecipientArchivingContext().selfRecipientId;
    const selfError = stream.writeFrame(() => ({
      type: 'recipient',
      recipient: { id: selfId, destination: { type: 'self' } },
    }));
    if (selfError) {
      return {
        type: 'completeFailure',
        error: new BackupError(`self recipient frame not written: ${describeArchiveKind(selfError)}`, 'SELF_RECIPIENT'),
      };
    }

    const errors: ArchiveFrameError[] = [];
    let nextId: RecipientId = selfId + 1;
    for (const address of contactAddresses(threads, builder.selfAddress)) {
      const id = nextId;
      const record: RecipientRecord = { id, destination: { type: 'contact', address } };
      const writeError = stream.writeFrame(() => ({ type: 'recipient', recipient: record }));
      if (writeError) {
        errors.push(archiveError({ type: 'recipient', address }, writeError));
        continue;
      }
      builder.addRecipient(id, { type: 'contact', address });
      nextId += 1;
    }
    return foldArchiveResults(undefined, errors);
  }

  /** A thread whose frame cannot be written stays unmapped; its messages then fail individually. */
  archiveChats(threads: readonly Thread[], stream: FrameOutputStream, builder: BackupContextBuilder): ArchiveMultiFrameResult {
    const recipients = builder.buildRecipientArchivingContext();
    const errors: ArchiveFrameError[] = [];
    let nextId: ChatId = FIRST_CHAT_ID;

    for (const thread of threads) {
      const objectId = { type: 'thread', threadUniqueId: thread.uniqueId } as const;
      const recipientIds: RecipientId[] = [];
      for (const address of thread.participantAddresses) {
        const id = recipients.recipientId(address);
        if (id === undefined) {
          errors.push(archiveError(objectId, { type: 'referencedIdMissing', reference: { type: 'recipient', address } }));
          continue;
        }
        if (!recipientIds.includes(id)) recipientIds.push(id);
      }

      const record: ChatRecord = { id: nextId, title: thread.title, recipientIds, createdAt: thread.createdAt };
      const writeError = stream.writeFrame(() => ({ type: 'chat', chat: record }));
      if (writeError) {
        errors.push(archiveError(objectId, writeError));
        continue;
      }
      builder.addChat(thread.uniqueId, record.id);
      nextId += 1;
    }
    return foldArchiveResults(undefined, errors);
  }

  restoreRecipient(record: RecipientRecord, builder: BackupContextBuilder): void {
    builder.addRecipient(
      record.id,
      record.destination.type === 'self' ? { type: 'self' } : { type: 'contact', address: record.destination.address },
    );
  }

  /**
   * Creates a thread for the chat and maps it. Unknown recipients are
   * reported but do not stop the thread from being created.
   */
  restoreChat(record: ChatRecord, builder: BackupContextBuilder, tx: WriteTransaction): RestoreErrorKind[] {
    const recipients = builder.buildRestoringContext().recipients;
    const errors: RestoreErrorKind[] = [];
    const participantAddresses: string[] = [];
    for (const recipientId of record.recipientIds) {
      const recipient = recipients.recipient(recipientId);
      if (!recipient) {
        errors.push({ type: 'identifierNotFound', identifier: { type: 'recipient', recipientId } });
        continue;
      }
      if (recipient.type === 'contact' && !participantAddresses.includes(recipient.address)) {
        participantAddresses.push(recipient.address);
      }
    }

    const thread: Thread = {
      uniqueId: newId(),
      title: record.title,
      participantAddresses,
      createdAt: record.createdAt,
    };
    try {
      this.threadStore.insert(thread, tx);
    } catch (error) {
      errors.push({ type: 'databaseInsertionFailed', message: errorMessage(error) });
      return errors;
    }
    builder.addChat(thread.uniqueId, record.id);
    return errors;
  }
}

function contactAddresses(threads: readonly Thread[], selfAddress: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const thread of threads) {
    for (const address of thread.participantAddresses) {
      if (address === selfAddress || seen.has(address)) continue;
      seen.add(address);
      out.push(address);
    }
  }
  return out;
}
