import type { Attachment, BackupReaction, ChatItemPayload, FilePointer, Message, MessageContents } from '../ir/types';
import type { ReadTransaction, WriteTransaction } from '../storage/database';
import { newId } from '../util/id';
import type { RecipientArchivingContext, RecipientRestoringContext } from './context';
import { type ArchiveFrameError, type RestoreErrorKind, archiveError, chatItemObjectId } from './errors';
import type { ReactionArchiver } from './reaction-archiver';

export type ArchiveContentsResult =
  | { type: 'success'; payload: ChatItemPayload }
  | { type: 'partialFailure'; payload: ChatItemPayload; errors: ArchiveFrameError[] }
  | { type: 'notYetImplemented' }
  | { type: 'messageFailure'; errors: ArchiveFrameError[] };

type PayloadBuilder = (reactions: BackupReaction[]) => ChatItemPayload;

export class MessageContentsArchiver {
  constructor(private readonly reactionArchiver: ReactionArchiver) {}

  archiveMessageContents(message: Message, context: RecipientArchivingContext, tx: ReadTransaction): ArchiveContentsResult {
    const { contents } = message;
    if (contents.wasRemotelyDeleted) {
      return { type: 'success', payload: { type: 'remoteDeleted' } };
    }
    // TODO: archive view-once and payment messages once the backup format has records for them.
    if (contents.isViewOnce || contents.paymentNote !== undefined) {
      return { type: 'notYetImplemented' };
    }

    const build = selectPayload(contents);
    if (!build) {
      return { type: 'messageFailure', errors: [archiveError(chatItemObjectId(message), { type: 'emptyMessage' })] };
    }

    const { reactions, errors } = this.reactionArchiver.archiveReactions(message, context, tx);
    const payload = build(reactions);
    if (errors.length > 0) {
      return { type: 'partialFailure', payload, errors };
    }
    return { type: 'success', payload };
  }

  /** Local message contents for a message payload; `null` for chat updates. */
  restoreContents(payload: ChatItemPayload): MessageContents | null {
    const base: MessageContents = {
      attachments: [],
      isVoiceMessage: false,
      isViewOnce: false,
      wasRemotelyDeleted: false,
    };
    switch (payload.type) {
      case 'remoteDeleted':
        return { ...base, wasRemotelyDeleted: true };
      case 'standard':
        return {
          ...base,
          body: payload.message.text?.body,
          attachments: payload.message.attachments.map(toAttachment),
        };
      case 'contact':
        return {
          ...base,
          contactShare: {
            name: payload.message.contact.name,
            phoneNumbers: [...payload.message.contact.phoneNumbers],
          },
        };
      case 'voice':
        return { ...base, attachments: [toAttachment(payload.message.audio)], isVoiceMessage: true };
      case 'sticker': {
        const { sticker } = payload.message;
        return {
          ...base,
          sticker: {
            packId: sticker.packId,
            stickerId: sticker.stickerId,
            emoji: sticker.emoji,
            attachment: toAttachment(sticker.data),
          },
        };
      }
      case 'chatUpdate':
        return null;
    }
  }

  restoreReactions(
    payload: ChatItemPayload,
    messageUniqueId: string,
    context: RecipientRestoringContext,
    tx: WriteTransaction,
  ): RestoreErrorKind[] {
    const reactions = reactionsOf(payload);
    if (reactions.length === 0) return [];
    return this.reactionArchiver.restoreReactions(reactions, messageUniqueId, context, tx);
  }
}

function selectPayload(contents: MessageContents): PayloadBuilder | null {
  const { contactShare, sticker, attachments } = contents;
  if (contactShare) {
    return (reactions) => ({
      type: 'contact',
      message: {
        contact: { name: contactShare.name, phoneNumbers: [...contactShare.phoneNumbers] },
        reactions,
      },
    });
  }
  if (sticker) {
    return (reactions) => ({
      type: 'sticker',
      message: {
        sticker: {
          packId: sticker.packId,
          stickerId: sticker.stickerId,
          emoji: sticker.emoji,
          data: toFilePointer(sticker.attachment),
        },
        reactions,
      },
    });
  }
  const [first] = attachments;
  if (contents.isVoiceMessage && attachments.length === 1 && first.contentType.startsWith('audio/')) {
    return (reactions) => ({ type: 'voice', message: { audio: toFilePointer(first), reactions } });
  }

  const body = contents.body?.trim() ? contents.body : undefined;
  if (body === undefined && attachments.length === 0) {
    return null;
  }
  return (reactions) => ({
    type: 'standard',
    message: {
      text: body === undefined ? undefined : { body },
      attachments: attachments.map(toFilePointer),
      reactions,
    },
  });
}

function reactionsOf(payload: ChatItemPayload): BackupReaction[] {
  switch (payload.type) {
    case 'standard':
    case 'contact':
    case 'voice':
    case 'sticker':
      return payload.message.reactions;
    case 'remoteDeleted':
    case 'chatUpdate':
      return [];
  }
}

function toFilePointer(attachment: Attachment): FilePointer {
  return {
    contentType: attachment.contentType,
    fileName: attachment.fileName,
    size: attachment.size,
    caption: attachment.caption,
    localId: attachment.id,
  };
}

function toAttachment(pointer: FilePointer): Attachment {
  return {
    id: pointer.localId ?? newId(),
    contentType: pointer.contentType,
    fileName: pointer.fileName,
    size: pointer.size,
    caption: pointer.caption,
  };
}
