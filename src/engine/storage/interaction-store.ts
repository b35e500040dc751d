import type { SqlValue } from 'sql.js';

import { StorageError, errorMessage } from '../archive/errors';
import { InteractionSchema } from '../ir/schema';
import { isMessage, type Interaction, type Message } from '../ir/types';
import { asNumber, asString, formatIssues } from '../util/common';
import type { ReadTransaction, WriteTransaction } from './database';

export interface InteractionStore {
  /** Every interaction in insertion order. Throws a `StorageError` when a row cannot be read. */
  iterateAll(tx: ReadTransaction): Iterable<Interaction>;
  fetchPastRevisions(latestRevisionId: string, tx: ReadTransaction): Message[];
  insert(interaction: Interaction, tx: WriteTransaction): void;
}

export class SqlInteractionStore implements InteractionStore {
  *iterateAll(tx: ReadTransaction): Iterable<Interaction> {
    const stmt = prepare(tx, 'SELECT row_id, record FROM interactions ORDER BY row_id ASC');
    try {
      while (stmt.step()) {
        const row = stmt.get();
        yield decodeInteraction(row[0], row[1]);
      }
    } finally {
      stmt.free();
    }
  }

  fetchPastRevisions(latestRevisionId: string, tx: ReadTransaction): Message[] {
    const out: Message[] = [];
    const stmt = prepare(
      tx,
      'SELECT row_id, record FROM interactions WHERE latest_revision_id = ? AND unique_id != ? ORDER BY timestamp ASC, row_id ASC',
    );
    try {
      stmt.bind([latestRevisionId, latestRevisionId]);
      while (stmt.step()) {
        const row = stmt.get();
        const interaction = decodeInteraction(row[0], row[1]);
        if (isMessage(interaction)) out.push(interaction);
      }
    } finally {
      stmt.free();
    }
    return out;
  }

  insert(interaction: Interaction, tx: WriteTransaction): void {
    const latestRevisionId = isMessage(interaction) ? interaction.latestRevisionId ?? null : null;
    try {
      tx.db.run(
        'INSERT INTO interactions (unique_id, thread_unique_id, kind, timestamp, latest_revision_id, record) VALUES (?, ?, ?, ?, ?, ?)',
        [
          interaction.uniqueId,
          interaction.threadUniqueId,
          interaction.kind,
          interaction.timestamp,
          latestRevisionId,
          JSON.stringify(interaction),
        ],
      );
    } catch (error) {
      throw new StorageError(`insert interaction ${interaction.uniqueId}: ${errorMessage(error)}`, error);
    }
  }
}

function prepare(tx: ReadTransaction, sql: string): ReturnType<ReadTransaction['db']['prepare']> {
  try {
    return tx.db.prepare(sql);
  } catch (error) {
    throw new StorageError(`interaction query failed: ${errorMessage(error)}`, error);
  }
}

function decodeInteraction(rowIdValue: SqlValue, recordValue: SqlValue): Interaction {
  const rowId = asNumber(rowIdValue);
  let raw: unknown;
  try {
    raw = JSON.parse(asString(recordValue));
  } catch (error) {
    throw new StorageError(`interaction row ${rowId} is not valid JSON`, error);
  }
  const parsed = InteractionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageError(`interaction row ${rowId} is invalid: ${formatIssues(parsed.error.issues)}`, parsed.error);
  }
  return parsed.data;
}
