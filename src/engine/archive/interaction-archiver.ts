import type { ChatItem, Interaction, Thread } from '../ir/types';
import type { ReadTransaction, WriteTransaction } from '../storage/database';
import type { InteractionStore } from '../storage/interaction-store';
import type { ReactionStore } from '../storage/reaction-store';
import { ChatUpdateArchiver } from './chat-update-archiver';
import { MessageContentsArchiver } from './contents-archiver';
import type { ChatArchivingContext, ChatRestoringContext } from './context';
import { IncomingMessageArchiver, OutgoingMessageArchiver } from './message-archiver';
import { ReactionArchiver } from './reaction-archiver';
import type { ArchiveInteractionResult, RestoreInteractionResult } from './results';

/**
 * One message category's converter. The predicates are pure and must not
 * overlap with any other archiver's predicates for the same input.
 */
export interface InteractionArchiver {
  readonly name: string;
  canArchive(interaction: Interaction): boolean;
  canRestore(chatItem: ChatItem): boolean;
  archive(interaction: Interaction, context: ChatArchivingContext, tx: ReadTransaction): ArchiveInteractionResult;
  restore(chatItem: ChatItem, thread: Thread, context: ChatRestoringContext, tx: WriteTransaction): RestoreInteractionResult;
}

export interface InteractionArchiverDeps {
  interactionStore: InteractionStore;
  reactionStore: ReactionStore;
}

/** The dispatch table, highest priority first. */
export function defaultInteractionArchivers(deps: InteractionArchiverDeps): InteractionArchiver[] {
  const reactionArchiver = new ReactionArchiver(deps.reactionStore);
  const contentsArchiver = new MessageContentsArchiver(reactionArchiver);
  return [
    new IncomingMessageArchiver(contentsArchiver, deps.interactionStore),
    new OutgoingMessageArchiver(contentsArchiver, deps.interactionStore),
    new ChatUpdateArchiver(deps.interactionStore),
  ];
}

export function findArchiver(archivers: readonly InteractionArchiver[], interaction: Interaction): InteractionArchiver | undefined {
  return archivers.find((archiver) => archiver.canArchive(interaction));
}

export function findRestorer(archivers: readonly InteractionArchiver[], chatItem: ChatItem): InteractionArchiver | undefined {
  return archivers.find((archiver) => archiver.canRestore(chatItem));
}
