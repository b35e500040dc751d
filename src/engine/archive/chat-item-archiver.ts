import type {
  ArchivedRevision,
  BackupFrame,
  ChatId,
  ChatItem,
  ChatItemRevision,
  DateProvider,
  Interaction,
  InteractionArchiveDetails,
  Thread,
} from '../ir/types';
import type { BackupOptions } from '../config';
import type { FrameOutputStream } from '../backup/frame-stream';
import { NullLogger, type Logger } from '../logger';
import type { ReadTransaction, WriteTransaction } from '../storage/database';
import type { InteractionStore } from '../storage/interaction-store';
import type { ReactionStore } from '../storage/reaction-store';
import type { ThreadStore } from '../storage/thread-store';
import { MIN_EXPIRE_TIMER_MS } from './constants';
import type { ChatArchivingContext, ChatRestoringContext } from './context';
import {
  type ArchiveFrameError,
  type BackupError,
  archiveError,
  chatItemObjectId,
  describeArchiveError,
  describeRestoreError,
  errorMessage,
  toBackupError,
} from './errors';
import {
  type InteractionArchiver,
  defaultInteractionArchivers,
  findArchiver,
  findRestorer,
} from './interaction-archiver';
import { type ArchiveMultiFrameResult, type RestoreFrameResult, foldArchiveResults } from './results';

export type ArchiveSkipReason = 'unsupported' | 'pastRevision' | 'notYetImplemented' | 'expiresSoon';

/** What happened to one enumerated interaction. Exactly one event per interaction. */
export type ChatItemArchiveEvent =
  | { outcome: 'written'; interaction: Interaction; errors: ArchiveFrameError[] }
  | { outcome: 'skipped'; interaction: Interaction; reason: ArchiveSkipReason }
  | { outcome: 'failed'; interaction: Interaction; errors: ArchiveFrameError[] }
  | { outcome: 'halted'; interaction: Interaction; error: BackupError };

export interface ChatItemArchiveTally {
  enumerated: number;
  written: number;
  skipped: number;
  failed: number;
}

export type ChatItemPolicy = Pick<BackupOptions, 'minExpireTimerMs' | 'unmatchedPolicy' | 'partialRestorePolicy'>;

export interface ChatItemArchiverDeps {
  dateProvider: DateProvider;
  interactionStore: InteractionStore;
  threadStore: ThreadStore;
  /** Dispatch table, highest priority first. */
  archivers: readonly InteractionArchiver[];
  options?: Partial<ChatItemPolicy>;
  logger?: Logger;
}

type ItemOutcome =
  | { type: 'written'; errors: ArchiveFrameError[] }
  | { type: 'skipped'; reason: ArchiveSkipReason }
  | { type: 'failed'; errors: ArchiveFrameError[] }
  | { type: 'halted'; error: BackupError };

const DEFAULT_POLICY: ChatItemPolicy = {
  minExpireTimerMs: MIN_EXPIRE_TIMER_MS,
  unmatchedPolicy: 'skip',
  partialRestorePolicy: 'failure',
};

/**
 * Turns every interaction in the store into chat item frames and back.
 * Per-item problems are collected; only a failure that leaves the backup
 * unusable stops the run.
 */
export class ChatItemArchiver {
  private readonly dateProvider: DateProvider;
  private readonly interactionStore: InteractionStore;
  private readonly threadStore: ThreadStore;
  private readonly archivers: readonly InteractionArchiver[];
  private readonly policy: ChatItemPolicy;
  private readonly logger: Logger;
  private lastTally: ChatItemArchiveTally = emptyTally();

  constructor(deps: ChatItemArchiverDeps) {
    this.dateProvider = deps.dateProvider;
    this.interactionStore = deps.interactionStore;
    this.threadStore = deps.threadStore;
    this.archivers = deps.archivers;
    this.policy = { ...DEFAULT_POLICY, ...deps.options };
    this.logger = (deps.logger ?? new NullLogger()).child({ component: 'chat-item-archiver' });
  }

  static create(
    deps: Omit<ChatItemArchiverDeps, 'archivers'> & { reactionStore: ReactionStore },
  ): ChatItemArchiver {
    return new ChatItemArchiver({
      ...deps,
      archivers: defaultInteractionArchivers({
        interactionStore: deps.interactionStore,
        reactionStore: deps.reactionStore,
      }),
    });
  }

  /** Counts from the most recent `archiveInteractions` run. */
  get tally(): ChatItemArchiveTally {
    return { ...this.lastTally };
  }

  archiveInteractions(
    stream: FrameOutputStream,
    context: ChatArchivingContext,
    tx: ReadTransaction,
    onItem?: (event: ChatItemArchiveEvent) => void,
  ): ArchiveMultiFrameResult {
    const tally = emptyTally();
    this.lastTally = tally;
    const partialErrors: ArchiveFrameError[] = [];
    let completeFailure: BackupError | undefined;

    const iterator = this.interactionStore.iterateAll(tx)[Symbol.iterator]();
    try {
      for (;;) {
        let next: IteratorResult<Interaction>;
        try {
          next = iterator.next();
        } catch (error) {
          const fault = toBackupError(error, 'interaction enumeration failed');
          this.logger.error('interaction enumeration failed', { error: fault.message, enumerated: tally.enumerated });
          return { type: 'completeFailure', error: fault };
        }
        if (next.done) break;

        const interaction = next.value;
        tally.enumerated += 1;
        const outcome = this.archiveInteraction(interaction, stream, context, tx);
        switch (outcome.type) {
          case 'written':
            tally.written += 1;
            partialErrors.push(...outcome.errors);
            onItem?.({ outcome: 'written', interaction, errors: outcome.errors });
            break;
          case 'skipped':
            tally.skipped += 1;
            onItem?.({ outcome: 'skipped', interaction, reason: outcome.reason });
            break;
          case 'failed':
            tally.failed += 1;
            partialErrors.push(...outcome.errors);
            onItem?.({ outcome: 'failed', interaction, errors: outcome.errors });
            break;
          case 'halted':
            completeFailure = outcome.error;
            onItem?.({ outcome: 'halted', interaction, error: outcome.error });
            break;
        }
        if (completeFailure) break;
      }
    } finally {
      iterator.return?.();
    }

    if (completeFailure) {
      this.logger.error('chat item archiving halted', { error: completeFailure.message, code: completeFailure.code, ...tally });
    } else {
      this.logger.info('chat items archived', { ...tally, errors: partialErrors.length });
    }
    return foldArchiveResults(completeFailure, partialErrors);
  }

  restore(chatItem: ChatItem, context: ChatRestoringContext, tx: WriteTransaction): RestoreFrameResult {
    const id = chatItem.dateSent;

    const archiver = findRestorer(this.archivers, chatItem);
    if (!archiver) {
      if (this.policy.unmatchedPolicy === 'report') {
        return { type: 'failure', id, errors: [{ type: 'unsupportedChatItem' }] };
      }
      this.logger.debug('no archiver for chat item; skipped', { id });
      return { type: 'success' };
    }

    const threadUniqueId = context.threadUniqueId(chatItem.chatId);
    if (threadUniqueId === undefined) {
      return { type: 'failure', id, errors: [{ type: 'identifierNotFound', identifier: { type: 'chat', chatId: chatItem.chatId } }] };
    }

    let thread: Thread | undefined;
    try {
      thread = this.threadStore.fetchThread(threadUniqueId, tx);
    } catch (error) {
      return { type: 'failure', id, errors: [{ type: 'databaseReadFailed', message: errorMessage(error) }] };
    }
    if (!thread) {
      return {
        type: 'failure',
        id,
        errors: [{ type: 'referencedDatabaseObjectNotFound', object: { type: 'thread', threadUniqueId } }],
      };
    }

    const result = archiver.restore(chatItem, thread, context, tx);
    switch (result.type) {
      case 'success':
        return { type: 'success' };
      case 'partialRestore':
        this.logger.warn('chat item partially restored', {
          id,
          archiver: archiver.name,
          errors: result.errors.map(describeRestoreError),
        });
        if (this.policy.partialRestorePolicy === 'partial') {
          return {
            type: 'partialRestore',
            id,
            errors: result.errors,
            restoredInteractionId: result.details.interactionUniqueId,
          };
        }
        return { type: 'failure', id, errors: result.errors };
      case 'messageFailure':
        return { type: 'failure', id, errors: result.errors };
    }
  }

  private archiveInteraction(
    interaction: Interaction,
    stream: FrameOutputStream,
    context: ChatArchivingContext,
    tx: ReadTransaction,
  ): ItemOutcome {
    const objectId = chatItemObjectId(interaction);
    const chatId = context.chatId(interaction.threadUniqueId);
    if (chatId === undefined) {
      return this.failed([
        archiveError(objectId, {
          type: 'referencedIdMissing',
          reference: { type: 'thread', threadUniqueId: interaction.threadUniqueId },
        }),
      ]);
    }

    const archiver = findArchiver(this.archivers, interaction);
    if (!archiver) {
      if (this.policy.unmatchedPolicy === 'report') {
        return this.failed([archiveError(objectId, { type: 'unsupportedInteraction', kind: interaction.kind })]);
      }
      return { type: 'skipped', reason: 'unsupported' };
    }

    const result = archiver.archive(interaction, context, tx);
    if (result.type === 'completeFailure') {
      return { type: 'halted', error: result.error };
    }
    if (result.type === 'isPastRevision') {
      return { type: 'skipped', reason: 'pastRevision' };
    }
    if (result.type === 'notYetImplemented') {
      return { type: 'skipped', reason: 'notYetImplemented' };
    }
    if (result.type === 'messageFailure') {
      return this.failed(result.errors);
    }

    const details = result.details;
    const errors: ArchiveFrameError[] = result.type === 'partialFailure' ? [...result.errors] : [];
    // Partial errors belong to the unwritten frame and are dropped with it.
    if (this.expiresTooSoon(details)) {
      return { type: 'skipped', reason: 'expiresSoon' };
    }

    const writeError = stream.writeFrame(() => chatItemFrame(chatId, interaction.timestamp, details));
    if (writeError) {
      errors.push(archiveError(objectId, writeError));
      return this.failed(errors);
    }
    return { type: 'written', errors };
  }

  private expiresTooSoon(details: InteractionArchiveDetails): boolean {
    if (details.expireStartDate === undefined || details.expiresInMs === undefined) {
      return false;
    }
    const minExpireTime = this.dateProvider().getTime() + this.policy.minExpireTimerMs;
    return details.expireStartDate + details.expiresInMs < minExpireTime;
  }

  private failed(errors: ArchiveFrameError[]): ItemOutcome {
    for (const error of errors) {
      this.logger.warn('chat item not archived', { error: describeArchiveError(error) });
    }
    return { type: 'failed', errors };
  }
}

function emptyTally(): ChatItemArchiveTally {
  return { enumerated: 0, written: 0, skipped: 0, failed: 0 };
}

function chatItemFrame(chatId: ChatId, dateSent: number, details: InteractionArchiveDetails): BackupFrame {
  const chatItem: ChatItem = {
    ...revisionRecord(chatId, { ...details, dateSent }),
    revisions: details.revisions.map((revision) => revisionRecord(chatId, revision)),
  };
  const frame: BackupFrame = { type: 'chatItem', chatItem: Object.freeze(chatItem) };
  return Object.freeze(frame);
}

function revisionRecord(chatId: ChatId, revision: ArchivedRevision): ChatItemRevision {
  return {
    chatId,
    authorId: revision.author,
    dateSent: revision.dateSent,
    sealedSender: revision.isSealedSender,
    sms: revision.isSms,
    expireStartDate: revision.expireStartDate,
    expiresInMs: revision.expiresInMs,
    directional: revision.directional,
    item: revision.payload,
  };
}
