import type { ChatId, RecipientId, ThreadUniqueId } from '../ir/types';
import { LOCAL_ADDRESS, SELF_RECIPIENT_ID } from './constants';

export type RecipientAddress = { type: 'self' } | { type: 'contact'; address: string };

export class RecipientArchivingContext {
  constructor(
    private readonly ids: ReadonlyMap<string, RecipientId>,
    readonly selfRecipientId: RecipientId = SELF_RECIPIENT_ID,
    readonly selfAddress: string = LOCAL_ADDRESS,
  ) {}

  recipientId(address: string): RecipientId | undefined {
    if (address === this.selfAddress) return this.selfRecipientId;
    return this.ids.get(address);
  }
}

export class RecipientRestoringContext {
  constructor(
    private readonly addresses: ReadonlyMap<RecipientId, RecipientAddress>,
    readonly selfAddress: string = LOCAL_ADDRESS,
  ) {}

  recipient(id: RecipientId): RecipientAddress | undefined {
    return this.addresses.get(id);
  }

  /** Local store address for `id`; the local user maps to `selfAddress`. */
  address(id: RecipientId): string | undefined {
    const recipient = this.addresses.get(id);
    if (!recipient) return undefined;
    return recipient.type === 'self' ? this.selfAddress : recipient.address;
  }
}

export class ChatArchivingContext {
  constructor(
    private readonly chatIds: ReadonlyMap<ThreadUniqueId, ChatId>,
    readonly recipients: RecipientArchivingContext,
  ) {}

  chatId(threadUniqueId: ThreadUniqueId): ChatId | undefined {
    return this.chatIds.get(threadUniqueId);
  }
}

export class ChatRestoringContext {
  constructor(
    private readonly threadIds: ReadonlyMap<ChatId, ThreadUniqueId>,
    readonly recipients: RecipientRestoringContext,
  ) {}

  threadUniqueId(chatId: ChatId): ThreadUniqueId | undefined {
    return this.threadIds.get(chatId);
  }
}

/**
 * Collects id mappings while recipient and chat frames are produced or
 * consumed; `build*` freezes them into the read-only contexts above.
 */
export class BackupContextBuilder {
  private readonly recipientIds = new Map<string, RecipientId>();
  private readonly recipientAddresses = new Map<RecipientId, RecipientAddress>();
  private readonly chatIds = new Map<ThreadUniqueId, ChatId>();
  private readonly threadIds = new Map<ChatId, ThreadUniqueId>();

  constructor(
    readonly selfAddress: string = LOCAL_ADDRESS,
    private selfRecipientId: RecipientId = SELF_RECIPIENT_ID,
  ) {
    this.recipientAddresses.set(selfRecipientId, { type: 'self' });
  }

  addRecipient(id: RecipientId, recipient: RecipientAddress): void {
    if (recipient.type === 'self' && id !== this.selfRecipientId) {
      this.recipientAddresses.delete(this.selfRecipientId);
      this.selfRecipientId = id;
    }
    this.recipientAddresses.set(id, recipient);
    if (recipient.type === 'contact') {
      this.recipientIds.set(recipient.address, id);
    }
  }

  addChat(threadUniqueId: ThreadUniqueId, chatId: ChatId): void {
    this.chatIds.set(threadUniqueId, chatId);
    this.threadIds.set(chatId, threadUniqueId);
  }

  buildRecipientArchivingContext(): RecipientArchivingContext {
    return new RecipientArchivingContext(new Map(this.recipientIds), this.selfRecipientId, this.selfAddress);
  }

  buildArchivingContext(): ChatArchivingContext {
    return new ChatArchivingContext(new Map(this.chatIds), this.buildRecipientArchivingContext());
  }

  buildRestoringContext(): ChatRestoringContext {
    return new ChatRestoringContext(
      new Map(this.threadIds),
      new RecipientRestoringContext(new Map(this.recipientAddresses), this.selfAddress),
    );
  }
}
