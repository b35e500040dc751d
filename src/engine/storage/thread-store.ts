import type { SqlValue } from 'sql.js';

import { StorageError, errorMessage } from '../archive/errors';
import type { Thread, ThreadUniqueId } from '../ir/types';
import { asArray, asNumber, asString } from '../util/common';
import type { ReadTransaction, WriteTransaction } from './database';

export interface ThreadStore {
  fetchThread(uniqueId: ThreadUniqueId, tx: ReadTransaction): Thread | undefined;
  listThreads(tx: ReadTransaction): Thread[];
  insert(thread: Thread, tx: WriteTransaction): void;
}

export class SqlThreadStore implements ThreadStore {
  fetchThread(uniqueId: ThreadUniqueId, tx: ReadTransaction): Thread | undefined {
    const stmt = tx.db.prepare('SELECT unique_id, title, participants, created_at FROM threads WHERE unique_id = ?');
    try {
      stmt.bind([uniqueId]);
      if (!stmt.step()) return undefined;
      return rowToThread(stmt.get());
    } finally {
      stmt.free();
    }
  }

  listThreads(tx: ReadTransaction): Thread[] {
    const out: Thread[] = [];
    const rows = tx.db.exec('SELECT unique_id, title, participants, created_at FROM threads ORDER BY created_at ASC, unique_id ASC');
    for (const result of rows) {
      for (const row of result.values) {
        out.push(rowToThread(row));
      }
    }
    return out;
  }

  insert(thread: Thread, tx: WriteTransaction): void {
    try {
      tx.db.run('INSERT INTO threads (unique_id, title, participants, created_at) VALUES (?, ?, ?, ?)', [
        thread.uniqueId,
        thread.title ?? null,
        JSON.stringify(thread.participantAddresses),
        thread.createdAt,
      ]);
    } catch (error) {
      throw new StorageError(`insert thread ${thread.uniqueId}: ${errorMessage(error)}`, error);
    }
  }
}

function rowToThread(row: SqlValue[]): Thread {
  const uniqueId = asString(row[0]);
  let participants: unknown;
  try {
    participants = JSON.parse(asString(row[2], '[]'));
  } catch (error) {
    throw new StorageError(`thread ${uniqueId} has malformed participants`, error);
  }
  const title = row[1] === null ? undefined : asString(row[1]);
  return {
    uniqueId,
    title,
    participantAddresses: asArray(participants).filter((item): item is string => typeof item === 'string'),
    createdAt: asNumber(row[3]),
  };
}
