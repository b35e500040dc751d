import type { FrameOutputStream } from '../../src/engine/backup/frame-stream';
import type { ArchiveErrorKind } from '../../src/engine/archive/errors';
import { StorageError } from '../../src/engine/archive/errors';
import type {
  BackupFrame,
  CallInteraction,
  ChatItem,
  IncomingMessage,
  InfoMessage,
  Interaction,
  Message,
  MessageContents,
  OutgoingMessage,
  Reaction,
  Thread,
} from '../../src/engine/ir/types';
import { isMessage } from '../../src/engine/ir/types';
import type { LogLevel, LogSink } from '../../src/engine/logger';
import { ConsoleLogger } from '../../src/engine/logger';
import { asRecord } from '../../src/engine/util/common';
import type { InteractionStore } from '../../src/engine/storage/interaction-store';
import type { ReactionStore } from '../../src/engine/storage/reaction-store';
import type { ThreadStore } from '../../src/engine/storage/thread-store';

export const NOW = new Date('2026-03-01T00:00:00.000Z');
export const DAY_MS = 24 * 60 * 60 * 1000;

export function contents(overrides: Partial<MessageContents> = {}): MessageContents {
  return {
    body: 'hello',
    attachments: [],
    isVoiceMessage: false,
    isViewOnce: false,
    wasRemotelyDeleted: false,
    ...overrides,
  };
}

export function incoming(overrides: Partial<IncomingMessage> = {}): IncomingMessage {
  return {
    kind: 'incoming',
    uniqueId: 'msg-in',
    threadUniqueId: 'thread-1',
    timestamp: 1000,
    contents: contents(),
    expireStartedAt: 0,
    expiresInSeconds: 0,
    editState: 'none',
    authorAddress: 'alice',
    receivedAt: 1001,
    wasRead: true,
    wasReceivedByUD: false,
    ...overrides,
  };
}

export function outgoing(overrides: Partial<OutgoingMessage> = {}): OutgoingMessage {
  return {
    kind: 'outgoing',
    uniqueId: 'msg-out',
    threadUniqueId: 'thread-1',
    timestamp: 2000,
    contents: contents({ body: 'hi back' }),
    expireStartedAt: 0,
    expiresInSeconds: 0,
    editState: 'none',
    recipientStates: { alice: 'delivered' },
    ...overrides,
  };
}

export function info(overrides: Partial<InfoMessage> = {}): InfoMessage {
  return {
    kind: 'info',
    uniqueId: 'msg-info',
    threadUniqueId: 'thread-1',
    timestamp: 3000,
    infoType: 'groupUpdate',
    description: 'renamed the group',
    ...overrides,
  };
}

export function call(overrides: Partial<CallInteraction> = {}): CallInteraction {
  return {
    kind: 'call',
    uniqueId: 'call-1',
    threadUniqueId: 'thread-1',
    timestamp: 4000,
    callType: 'audio',
    isOutgoing: false,
    durationMs: 0,
    ...overrides,
  };
}

export function chatItem(overrides: Partial<ChatItem> = {}): ChatItem {
  return {
    chatId: 1,
    authorId: 2,
    dateSent: 1000,
    sealedSender: false,
    sms: false,
    directional: { type: 'incoming', dateReceived: 1001, read: true },
    item: { type: 'standard', message: { text: { body: 'hello' }, attachments: [], reactions: [] } },
    revisions: [],
    ...overrides,
  };
}

export function thread(overrides: Partial<Thread> = {}): Thread {
  return {
    uniqueId: 'thread-1',
    title: 'Friends',
    participantAddresses: ['alice'],
    createdAt: 100,
    ...overrides,
  };
}

export class MemoryInteractionStore implements InteractionStore {
  readonly inserted: Interaction[] = [];
  /** Throws a `StorageError` when enumeration reaches this index. */
  failAtIndex?: number;

  constructor(public interactions: Interaction[] = []) {}

  *iterateAll(): Iterable<Interaction> {
    for (let index = 0; index < this.interactions.length; index += 1) {
      if (this.failAtIndex === index) {
        throw new StorageError(`row ${index} unreadable`);
      }
      yield this.interactions[index];
    }
  }

  fetchPastRevisions(latestRevisionId: string): Message[] {
    return this.interactions
      .filter(isMessage)
      .filter((item) => item.editState === 'pastRevision' && item.latestRevisionId === latestRevisionId);
  }

  insert(interaction: Interaction): void {
    this.inserted.push(interaction);
  }
}

export class MemoryThreadStore implements ThreadStore {
  fetchCount = 0;
  readonly inserted: Thread[] = [];

  constructor(public threads: Thread[] = []) {}

  fetchThread(uniqueId: string): Thread | undefined {
    this.fetchCount += 1;
    return [...this.threads, ...this.inserted].find((item) => item.uniqueId === uniqueId);
  }

  listThreads(): Thread[] {
    return [...this.threads];
  }

  insert(item: Thread): void {
    this.inserted.push(item);
  }
}

export class MemoryReactionStore implements ReactionStore {
  readonly inserted: Reaction[] = [];

  constructor(public reactions: Reaction[] = []) {}

  fetchReactions(messageUniqueId: string): Reaction[] {
    return this.reactions.filter((item) => item.messageUniqueId === messageUniqueId);
  }

  insert(reaction: Reaction): void {
    this.inserted.push(reaction);
  }
}

export class RecordingFrameStream implements FrameOutputStream {
  readonly frames: BackupFrame[] = [];

  constructor(private readonly failWith?: (frame: BackupFrame) => ArchiveErrorKind | null) {}

  writeFrame(build: () => BackupFrame): ArchiveErrorKind | null {
    const frame = build();
    const error = this.failWith?.(frame) ?? null;
    if (error) return error;
    this.frames.push(frame);
    return null;
  }
}

export interface CapturedLog {
  level: LogLevel;
  entry: Record<string, unknown>;
}

export function captureLogger(level: LogLevel = 'debug'): { logger: ConsoleLogger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const sink: LogSink = (lineLevel, line) => {
    const parsed: unknown = JSON.parse(line);
    lines.push({ level: lineLevel, entry: asRecord(parsed) });
  };
  return { logger: new ConsoleLogger(level, {}, sink, () => NOW), lines };
}
