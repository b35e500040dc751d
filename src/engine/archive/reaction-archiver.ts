import type { BackupReaction, Message } from '../ir/types';
import type { ReadTransaction, WriteTransaction } from '../storage/database';
import type { ReactionStore } from '../storage/reaction-store';
import type { RecipientArchivingContext, RecipientRestoringContext } from './context';
import { type ArchiveFrameError, type RestoreErrorKind, archiveError, chatItemObjectId, errorMessage } from './errors';

export interface ArchivedReactions {
  reactions: BackupReaction[];
  errors: ArchiveFrameError[];
}

export class ReactionArchiver {
  constructor(private readonly reactionStore: ReactionStore) {}

  archiveReactions(message: Message, context: RecipientArchivingContext, tx: ReadTransaction): ArchivedReactions {
    const reactions: BackupReaction[] = [];
    const errors: ArchiveFrameError[] = [];

    for (const reaction of this.reactionStore.fetchReactions(message.uniqueId, tx)) {
      const authorId = context.recipientId(reaction.reactorAddress);
      if (authorId === undefined) {
        errors.push(
          archiveError(chatItemObjectId(message), {
            type: 'referencedIdMissing',
            reference: { type: 'recipient', address: reaction.reactorAddress },
          }),
        );
        continue;
      }
      reactions.push({
        authorId,
        emoji: reaction.emoji,
        sentTimestamp: reaction.sentAt,
        sortOrder: reaction.sortOrder,
      });
    }

    return { reactions, errors };
  }

  /** Inserts what it can; every reaction left out is reported. */
  restoreReactions(
    reactions: BackupReaction[],
    messageUniqueId: string,
    context: RecipientRestoringContext,
    tx: WriteTransaction,
  ): RestoreErrorKind[] {
    const errors: RestoreErrorKind[] = [];
    for (const reaction of reactions) {
      const address = context.address(reaction.authorId);
      if (address === undefined) {
        errors.push({ type: 'identifierNotFound', identifier: { type: 'recipient', recipientId: reaction.authorId } });
        continue;
      }
      try {
        this.reactionStore.insert(
          {
            messageUniqueId,
            reactorAddress: address,
            emoji: reaction.emoji,
            sentAt: reaction.sentTimestamp,
            sortOrder: reaction.sortOrder,
          },
          tx,
        );
      } catch (error) {
        errors.push({ type: 'databaseInsertionFailed', message: errorMessage(error) });
      }
    }
    return errors;
  }
}
