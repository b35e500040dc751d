import type { ChatItem, ChatUpdate, InfoMessage, Interaction, Thread } from '../ir/types';
import type { ReadTransaction, WriteTransaction } from '../storage/database';
import type { InteractionStore } from '../storage/interaction-store';
import { newId } from '../util/id';
import type { ChatArchivingContext, ChatRestoringContext } from './context';
import { BackupError, archiveError, chatItemObjectId, errorMessage } from './errors';
import type { InteractionArchiver } from './interaction-archiver';
import type { ArchiveInteractionResult, RestoreInteractionResult } from './results';

/** Info messages that describe a change to the chat itself. */
export class ChatUpdateArchiver implements InteractionArchiver {
  readonly name = 'chat-update';

  constructor(private readonly interactionStore: InteractionStore) {}

  canArchive(interaction: Interaction): interaction is InfoMessage {
    return interaction.kind === 'info';
  }

  canRestore(chatItem: ChatItem): boolean {
    return chatItem.item.type === 'chatUpdate';
  }

  archive(interaction: Interaction, context: ChatArchivingContext, _tx: ReadTransaction): ArchiveInteractionResult {
    if (!this.canArchive(interaction)) {
      return {
        type: 'completeFailure',
        error: new BackupError(`${this.name} cannot archive ${interaction.kind} interactions`, 'DISPATCH_ERROR'),
      };
    }

    const update = toChatUpdate(interaction);
    if (!update) {
      return { type: 'notYetImplemented' };
    }

    let author = context.recipients.selfRecipientId;
    if (interaction.authorAddress !== undefined) {
      const id = context.recipients.recipientId(interaction.authorAddress);
      if (id === undefined) {
        return {
          type: 'messageFailure',
          errors: [
            archiveError(chatItemObjectId(interaction), {
              type: 'referencedIdMissing',
              reference: { type: 'recipient', address: interaction.authorAddress },
            }),
          ],
        };
      }
      author = id;
    }

    return {
      type: 'success',
      details: {
        author,
        directional: { type: 'directionless' },
        isSealedSender: false,
        isSms: false,
        payload: { type: 'chatUpdate', update },
        revisions: [],
      },
    };
  }

  restore(chatItem: ChatItem, thread: Thread, context: ChatRestoringContext, tx: WriteTransaction): RestoreInteractionResult {
    if (chatItem.item.type !== 'chatUpdate') {
      return { type: 'messageFailure', errors: [{ type: 'invalidChatItem', message: 'expected a chat update' }] };
    }
    const recipient = context.recipients.recipient(chatItem.authorId);
    if (!recipient) {
      return {
        type: 'messageFailure',
        errors: [{ type: 'identifierNotFound', identifier: { type: 'recipient', recipientId: chatItem.authorId } }],
      };
    }

    const message: InfoMessage = {
      kind: 'info',
      uniqueId: newId(),
      threadUniqueId: thread.uniqueId,
      timestamp: chatItem.dateSent,
      authorAddress: recipient.type === 'contact' ? recipient.address : undefined,
      ...fromChatUpdate(chatItem.item.update),
    };
    try {
      this.interactionStore.insert(message, tx);
    } catch (error) {
      return { type: 'messageFailure', errors: [{ type: 'databaseInsertionFailed', message: errorMessage(error) }] };
    }
    return { type: 'success', details: { interactionUniqueId: message.uniqueId } };
  }
}

function toChatUpdate(message: InfoMessage): ChatUpdate | null {
  switch (message.infoType) {
    case 'expirationTimerChange':
      return { type: 'expirationTimerChange', expiresInMs: (message.expiresInSeconds ?? 0) * 1000 };
    case 'groupUpdate':
      return { type: 'groupChange', description: message.description ?? '' };
    case 'profileChange':
      return { type: 'profileChange', previousName: message.previousName ?? '', newName: message.newName ?? '' };
    case 'identityChange':
      return { type: 'simpleUpdate', updateType: 'identityUpdate' };
    case 'sessionSwitchover':
      return { type: 'simpleUpdate', updateType: 'sessionSwitchover' };
    case 'paymentsActivated':
      return null;
  }
}

type InfoFields = Pick<InfoMessage, 'infoType' | 'expiresInSeconds' | 'description' | 'previousName' | 'newName'>;

function fromChatUpdate(update: ChatUpdate): InfoFields {
  switch (update.type) {
    case 'expirationTimerChange':
      return { infoType: 'expirationTimerChange', expiresInSeconds: Math.floor(update.expiresInMs / 1000) };
    case 'groupChange':
      return { infoType: 'groupUpdate', description: update.description };
    case 'profileChange':
      return { infoType: 'profileChange', previousName: update.previousName, newName: update.newName };
    case 'simpleUpdate':
      return { infoType: update.updateType === 'identityUpdate' ? 'identityChange' : 'sessionSwitchover' };
  }
}
