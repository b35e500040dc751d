import type {
  ArchivedRevision,
  ChatItem,
  ChatItemRevision,
  DeliveryStatus,
  DirectionalDetails,
  IncomingMessage,
  Interaction,
  Message,
  MessageContents,
  OutgoingMessage,
  RecipientId,
  Thread,
} from '../ir/types';
import type { ReadTransaction, WriteTransaction } from '../storage/database';
import type { InteractionStore } from '../storage/interaction-store';
import { newId } from '../util/id';
import type { MessageContentsArchiver } from './contents-archiver';
import type {
  ChatArchivingContext,
  ChatRestoringContext,
  RecipientArchivingContext,
  RecipientRestoringContext,
} from './context';
import {
  type ArchiveFrameError,
  BackupError,
  type RestoreErrorKind,
  archiveError,
  chatItemObjectId,
  errorMessage,
  toBackupError,
} from './errors';
import type { InteractionArchiver } from './interaction-archiver';
import type { ArchiveInteractionResult, RestoreInteractionResult } from './results';

type RevisionOutcome =
  | { type: 'archived'; details: Omit<ArchivedRevision, 'dateSent'>; errors: ArchiveFrameError[] }
  | { type: 'terminal'; result: ArchiveInteractionResult };

type AuthorResult = { type: 'found'; id: RecipientId } | { type: 'missing'; error: ArchiveFrameError };

interface Directional {
  directional: DirectionalDetails;
  errors: ArchiveFrameError[];
}

/** Fields every restored message gets regardless of direction. */
export interface RestoredMessageBase {
  uniqueId: string;
  threadUniqueId: string;
  timestamp: number;
  contents: MessageContents;
  expireStartedAt: number;
  expiresInSeconds: number;
  editState: Message['editState'];
  latestRevisionId?: string;
}

type BuiltMessage<M> = { type: 'built'; message: M; errors: RestoreErrorKind[] } | { type: 'failed'; errors: RestoreErrorKind[] };

/**
 * Shared archive and restore flow for incoming and outgoing messages:
 * edit revisions, contents, expiration and reactions. Subclasses supply
 * the author and direction specific parts.
 */
export abstract class MessageArchiver<M extends Message> implements InteractionArchiver {
  abstract readonly name: string;

  constructor(
    protected readonly contentsArchiver: MessageContentsArchiver,
    protected readonly interactionStore: InteractionStore,
  ) {}

  abstract canArchive(interaction: Interaction): interaction is M;
  abstract canRestore(chatItem: ChatItem): boolean;

  protected abstract resolveAuthor(message: M, context: RecipientArchivingContext): AuthorResult;
  protected abstract archiveDirectional(message: M, context: RecipientArchivingContext): Directional;
  protected abstract isSealedSender(message: M): boolean;
  protected abstract buildMessage(
    chatItem: ChatItemRevision,
    base: RestoredMessageBase,
    context: RecipientRestoringContext,
  ): BuiltMessage<M>;

  archive(interaction: Interaction, context: ChatArchivingContext, tx: ReadTransaction): ArchiveInteractionResult {
    if (!this.canArchive(interaction)) {
      return {
        type: 'completeFailure',
        error: new BackupError(`${this.name} cannot archive ${interaction.kind} interactions`, 'DISPATCH_ERROR'),
      };
    }
    if (interaction.editState === 'pastRevision') {
      return { type: 'isPastRevision' };
    }

    const head = this.archiveRevision(interaction, context.recipients, tx);
    if (head.type === 'terminal') {
      return head.result;
    }

    const errors = [...head.errors];
    const revisions: ArchivedRevision[] = [];
    if (interaction.editState === 'latestRevision') {
      let pastRevisions: Message[];
      try {
        pastRevisions = this.interactionStore.fetchPastRevisions(interaction.uniqueId, tx);
      } catch (error) {
        return { type: 'completeFailure', error: toBackupError(error) };
      }
      for (const revision of pastRevisions) {
        if (!this.canArchive(revision)) continue;
        const outcome = this.archiveRevision(revision, context.recipients, tx);
        if (outcome.type === 'terminal') {
          if (outcome.result.type === 'messageFailure') errors.push(...outcome.result.errors);
          continue;
        }
        errors.push(...outcome.errors);
        revisions.push({ ...outcome.details, dateSent: revision.timestamp });
      }
    }

    const details = { ...head.details, revisions };
    if (errors.length > 0) {
      return { type: 'partialFailure', details, errors };
    }
    return { type: 'success', details };
  }

  restore(chatItem: ChatItem, thread: Thread, context: ChatRestoringContext, tx: WriteTransaction): RestoreInteractionResult {
    const head = this.restoreRevision(chatItem, thread, context.recipients, {
      editState: chatItem.revisions.length > 0 ? 'latestRevision' : 'none',
    });
    if (head.type === 'failed') {
      return { type: 'messageFailure', errors: head.errors };
    }

    const message = head.message;
    try {
      this.interactionStore.insert(message, tx);
    } catch (error) {
      return { type: 'messageFailure', errors: [{ type: 'databaseInsertionFailed', message: errorMessage(error) }] };
    }

    const errors = [...head.errors];
    for (const revision of chatItem.revisions) {
      const built = this.restoreRevision(revision, thread, context.recipients, {
        editState: 'pastRevision',
        latestRevisionId: message.uniqueId,
      });
      errors.push(...built.errors);
      if (built.type === 'failed') continue;
      try {
        this.interactionStore.insert(built.message, tx);
      } catch (error) {
        errors.push({ type: 'databaseInsertionFailed', message: errorMessage(error) });
      }
    }

    errors.push(...this.contentsArchiver.restoreReactions(chatItem.item, message.uniqueId, context.recipients, tx));

    const details = { interactionUniqueId: message.uniqueId };
    if (errors.length > 0) {
      return { type: 'partialRestore', details, errors };
    }
    return { type: 'success', details };
  }

  private archiveRevision(message: M, context: RecipientArchivingContext, tx: ReadTransaction): RevisionOutcome {
    const author = this.resolveAuthor(message, context);
    if (author.type === 'missing') {
      return { type: 'terminal', result: { type: 'messageFailure', errors: [author.error] } };
    }

    const contents = this.contentsArchiver.archiveMessageContents(message, context, tx);
    switch (contents.type) {
      case 'notYetImplemented':
        return { type: 'terminal', result: { type: 'notYetImplemented' } };
      case 'messageFailure':
        return { type: 'terminal', result: { type: 'messageFailure', errors: contents.errors } };
      case 'success':
      case 'partialFailure':
        break;
    }

    const directional = this.archiveDirectional(message, context);
    const contentErrors = contents.type === 'partialFailure' ? contents.errors : [];
    return {
      type: 'archived',
      details: {
        author: author.id,
        directional: directional.directional,
        expireStartDate: message.expireStartedAt > 0 ? message.expireStartedAt : undefined,
        expiresInMs: message.expiresInSeconds > 0 ? message.expiresInSeconds * 1000 : undefined,
        isSealedSender: this.isSealedSender(message),
        isSms: false,
        payload: contents.payload,
      },
      errors: [...contentErrors, ...directional.errors],
    };
  }

  private restoreRevision(
    chatItem: ChatItemRevision,
    thread: Thread,
    context: RecipientRestoringContext,
    edit: Pick<RestoredMessageBase, 'editState' | 'latestRevisionId'>,
  ): BuiltMessage<M> {
    const contents = this.contentsArchiver.restoreContents(chatItem.item);
    if (!contents) {
      return { type: 'failed', errors: [{ type: 'invalidChatItem', message: `${this.name} cannot restore chat updates` }] };
    }
    return this.buildMessage(
      chatItem,
      {
        uniqueId: newId(),
        threadUniqueId: thread.uniqueId,
        timestamp: chatItem.dateSent,
        contents,
        expireStartedAt: chatItem.expireStartDate ?? 0,
        expiresInSeconds: Math.floor((chatItem.expiresInMs ?? 0) / 1000),
        ...edit,
      },
      context,
    );
  }
}

export class IncomingMessageArchiver extends MessageArchiver<IncomingMessage> {
  readonly name = 'incoming-message';

  canArchive(interaction: Interaction): interaction is IncomingMessage {
    return interaction.kind === 'incoming';
  }

  canRestore(chatItem: ChatItem): boolean {
    return chatItem.directional.type === 'incoming' && chatItem.item.type !== 'chatUpdate';
  }

  protected resolveAuthor(message: IncomingMessage, context: RecipientArchivingContext): AuthorResult {
    const id = context.recipientId(message.authorAddress);
    if (id === undefined) {
      return {
        type: 'missing',
        error: archiveError(chatItemObjectId(message), {
          type: 'referencedIdMissing',
          reference: { type: 'recipient', address: message.authorAddress },
        }),
      };
    }
    return { type: 'found', id };
  }

  protected archiveDirectional(message: IncomingMessage): Directional {
    return {
      directional: { type: 'incoming', dateReceived: message.receivedAt, read: message.wasRead },
      errors: [],
    };
  }

  protected isSealedSender(message: IncomingMessage): boolean {
    return message.wasReceivedByUD;
  }

  protected buildMessage(
    chatItem: ChatItemRevision,
    base: RestoredMessageBase,
    context: RecipientRestoringContext,
  ): BuiltMessage<IncomingMessage> {
    const authorAddress = context.address(chatItem.authorId);
    if (authorAddress === undefined) {
      return { type: 'failed', errors: [{ type: 'identifierNotFound', identifier: { type: 'recipient', recipientId: chatItem.authorId } }] };
    }
    const received = chatItem.directional.type === 'incoming' ? chatItem.directional : undefined;
    return {
      type: 'built',
      message: {
        ...base,
        kind: 'incoming',
        authorAddress,
        receivedAt: received?.dateReceived ?? chatItem.dateSent,
        wasRead: received?.read ?? false,
        wasReceivedByUD: chatItem.sealedSender,
      },
      errors: [],
    };
  }
}

export class OutgoingMessageArchiver extends MessageArchiver<OutgoingMessage> {
  readonly name = 'outgoing-message';

  canArchive(interaction: Interaction): interaction is OutgoingMessage {
    return interaction.kind === 'outgoing';
  }

  canRestore(chatItem: ChatItem): boolean {
    return chatItem.directional.type === 'outgoing' && chatItem.item.type !== 'chatUpdate';
  }

  protected resolveAuthor(_message: OutgoingMessage, context: RecipientArchivingContext): AuthorResult {
    return { type: 'found', id: context.selfRecipientId };
  }

  protected archiveDirectional(message: OutgoingMessage, context: RecipientArchivingContext): Directional {
    const errors: ArchiveFrameError[] = [];
    const sendStatus: Array<{ recipientId: RecipientId; status: DeliveryStatus }> = [];
    const addresses = Object.keys(message.recipientStates).sort();
    for (const address of addresses) {
      const recipientId = context.recipientId(address);
      if (recipientId === undefined) {
        errors.push(
          archiveError(chatItemObjectId(message), {
            type: 'referencedIdMissing',
            reference: { type: 'recipient', address },
          }),
        );
        continue;
      }
      sendStatus.push({ recipientId, status: message.recipientStates[address] });
    }
    return { directional: { type: 'outgoing', sendStatus }, errors };
  }

  protected isSealedSender(): boolean {
    return false;
  }

  protected buildMessage(
    chatItem: ChatItemRevision,
    base: RestoredMessageBase,
    context: RecipientRestoringContext,
  ): BuiltMessage<OutgoingMessage> {
    const errors: RestoreErrorKind[] = [];
    const recipientStates: Record<string, DeliveryStatus> = {};
    const sendStatus = chatItem.directional.type === 'outgoing' ? chatItem.directional.sendStatus : [];
    for (const entry of sendStatus) {
      const address = context.address(entry.recipientId);
      if (address === undefined) {
        errors.push({ type: 'identifierNotFound', identifier: { type: 'recipient', recipientId: entry.recipientId } });
        continue;
      }
      recipientStates[address] = entry.status;
    }
    return {
      type: 'built',
      message: { ...base, kind: 'outgoing', recipientStates },
      errors,
    };
  }
}
