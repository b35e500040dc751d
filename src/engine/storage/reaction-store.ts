import { StorageError, errorMessage } from '../archive/errors';
import type { Reaction } from '../ir/types';
import { asNumber, asString } from '../util/common';
import type { ReadTransaction, WriteTransaction } from './database';

export interface ReactionStore {
  fetchReactions(messageUniqueId: string, tx: ReadTransaction): Reaction[];
  insert(reaction: Reaction, tx: WriteTransaction): void;
}

export class SqlReactionStore implements ReactionStore {
  fetchReactions(messageUniqueId: string, tx: ReadTransaction): Reaction[] {
    const out: Reaction[] = [];
    const stmt = tx.db.prepare(
      'SELECT message_unique_id, reactor_address, emoji, sent_at, sort_order FROM reactions WHERE message_unique_id = ? ORDER BY sort_order ASC, id ASC',
    );
    try {
      stmt.bind([messageUniqueId]);
      while (stmt.step()) {
        const row = stmt.get();
        out.push({
          messageUniqueId: asString(row[0]),
          reactorAddress: asString(row[1]),
          emoji: asString(row[2]),
          sentAt: asNumber(row[3]),
          sortOrder: asNumber(row[4]),
        });
      }
    } finally {
      stmt.free();
    }
    return out;
  }

  insert(reaction: Reaction, tx: WriteTransaction): void {
    try {
      tx.db.run(
        'INSERT INTO reactions (message_unique_id, reactor_address, emoji, sent_at, sort_order) VALUES (?, ?, ?, ?, ?)',
        [reaction.messageUniqueId, reaction.reactorAddress, reaction.emoji, reaction.sentAt, reaction.sortOrder],
      );
    } catch (error) {
      throw new StorageError(`insert reaction on ${reaction.messageUniqueId}: ${errorMessage(error)}`, error);
    }
  }
}
