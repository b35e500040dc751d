import { isAbsolute } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from '../../src/engine/archive/errors';
import { BackupDatabase, resolveWasmPath } from '../../src/engine/storage/database';
import { SqlInteractionStore } from '../../src/engine/storage/interaction-store';
import { SqlReactionStore } from '../../src/engine/storage/reaction-store';
import { SqlThreadStore } from '../../src/engine/storage/thread-store';
import { call, contents, incoming, outgoing, thread } from '../helpers/fixtures';

let database: BackupDatabase;

beforeEach(async () => {
  database = await BackupDatabase.open();
});

afterEach(() => {
  database.close();
});

describe('sql stores', () => {
  it('iterates interactions in insertion order', () => {
    const store = new SqlInteractionStore();
    database.write((tx) => {
      store.insert(outgoing({ timestamp: 9 }), tx);
      store.insert(incoming({ timestamp: 1 }), tx);
      store.insert(call(), tx);
    });

    const kinds = database.read((tx) => [...store.iterateAll(tx)].map((item) => item.kind));
    expect(kinds).toEqual(['outgoing', 'incoming', 'call']);
  });

  it('round-trips an interaction record through the store', () => {
    const store = new SqlInteractionStore();
    const message = incoming({ contents: contents({ attachments: [{ id: 'a', contentType: 'image/png', size: 1 }] }) });
    database.write((tx) => store.insert(message, tx));

    const [stored] = database.read((tx) => [...store.iterateAll(tx)]);
    expect(stored).toEqual(message);
  });

  it('fetches only the past revisions of a message, oldest first', () => {
    const store = new SqlInteractionStore();
    database.write((tx) => {
      store.insert(incoming({ uniqueId: 'latest', editState: 'latestRevision', timestamp: 30 }), tx);
      store.insert(incoming({ uniqueId: 'v2', editState: 'pastRevision', latestRevisionId: 'latest', timestamp: 20 }), tx);
      store.insert(incoming({ uniqueId: 'v1', editState: 'pastRevision', latestRevisionId: 'latest', timestamp: 10 }), tx);
      store.insert(incoming({ uniqueId: 'other', editState: 'pastRevision', latestRevisionId: 'elsewhere', timestamp: 5 }), tx);
    });

    const ids = database.read((tx) => store.fetchPastRevisions('latest', tx).map((item) => item.uniqueId));
    expect(ids).toEqual(['v1', 'v2']);
  });

  it('throws a StorageError for an unreadable row', () => {
    const store = new SqlInteractionStore();
    database.write((tx) => {
      tx.db.run(
        "INSERT INTO interactions (unique_id, thread_unique_id, kind, timestamp, latest_revision_id, record) VALUES ('x', 't', 'incoming', 1, NULL, '{broken')",
      );
    });

    expect(() => database.read((tx) => [...store.iterateAll(tx)])).toThrow(StorageError);
    expect(() => database.read((tx) => [...store.iterateAll(tx)])).toThrow('interaction row 1 is not valid JSON');
  });

  it('lists threads by creation time and looks them up by id', () => {
    const store = new SqlThreadStore();
    database.write((tx) => {
      store.insert(thread({ uniqueId: 'late', createdAt: 50, title: undefined }), tx);
      store.insert(thread({ uniqueId: 'early', createdAt: 10, participantAddresses: ['alice', 'bob'] }), tx);
    });

    database.read((tx) => {
      expect(store.listThreads(tx).map((item) => item.uniqueId)).toEqual(['early', 'late']);
      expect(store.fetchThread('early', tx)).toEqual(
        thread({ uniqueId: 'early', createdAt: 10, participantAddresses: ['alice', 'bob'] }),
      );
      expect(store.fetchThread('late', tx)?.title).toBeUndefined();
      expect(store.fetchThread('missing', tx)).toBeUndefined();
    });
  });

  it('returns reactions in sort order', () => {
    const store = new SqlReactionStore();
    database.write((tx) => {
      store.insert({ messageUniqueId: 'm', reactorAddress: 'bob', emoji: 'b', sentAt: 2, sortOrder: 1 }, tx);
      store.insert({ messageUniqueId: 'm', reactorAddress: 'alice', emoji: 'a', sentAt: 1, sortOrder: 0 }, tx);
      store.insert({ messageUniqueId: 'n', reactorAddress: 'alice', emoji: 'c', sentAt: 3, sortOrder: 0 }, tx);
    });

    const emojis = database.read((tx) => store.fetchReactions('m', tx).map((item) => item.emoji));
    expect(emojis).toEqual(['a', 'b']);
  });
});

describe('BackupDatabase transactions', () => {
  it('rolls back a write that throws', () => {
    const store = new SqlThreadStore();
    expect(() =>
      database.write((tx) => {
        store.insert(thread(), tx);
        throw new Error('abort');
      }),
    ).toThrow('abort');

    expect(database.read((tx) => store.listThreads(tx))).toEqual([]);
  });

  it('rejects nested transactions', () => {
    expect(() => database.read(() => database.write(() => undefined))).toThrow('nested write transaction');
  });

  it('locates the sql.js wasm binary beside the installed package', () => {
    const wasm = resolveWasmPath('sql-wasm.wasm');
    expect(isAbsolute(wasm)).toBe(true);
    expect(wasm).toMatch(/sql\.js\/dist\/sql-wasm\.wasm$/);
  });

  it('reopens from exported bytes', async () => {
    const store = new SqlThreadStore();
    database.write((tx) => store.insert(thread(), tx));

    const reopened = await BackupDatabase.open(database.export());
    try {
      expect(reopened.read((tx) => store.listThreads(tx))).toEqual([thread()]);
    } finally {
      reopened.close();
    }
  });
});
