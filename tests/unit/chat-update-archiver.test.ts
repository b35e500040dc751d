import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ChatUpdateArchiver } from '../../src/engine/archive/chat-update-archiver';
import { BackupContextBuilder } from '../../src/engine/archive/context';
import { BackupDatabase } from '../../src/engine/storage/database';
import { MemoryInteractionStore, chatItem, incoming, info, thread } from '../helpers/fixtures';

let database: BackupDatabase;

beforeAll(async () => {
  database = await BackupDatabase.open();
});

afterAll(() => {
  database.close();
});

function contexts() {
  const builder = new BackupContextBuilder();
  builder.addRecipient(2, { type: 'contact', address: 'alice' });
  builder.addChat('thread-1', 1);
  return { archiving: builder.buildArchivingContext(), restoring: builder.buildRestoringContext() };
}

describe('ChatUpdateArchiver', () => {
  it('only claims info messages and chat update items', () => {
    const archiver = new ChatUpdateArchiver(new MemoryInteractionStore());
    expect(archiver.canArchive(info())).toBe(true);
    expect(archiver.canArchive(incoming())).toBe(false);
    expect(archiver.canRestore(chatItem())).toBe(false);
    expect(
      archiver.canRestore(chatItem({ item: { type: 'chatUpdate', update: { type: 'simpleUpdate', updateType: 'identityUpdate' } } })),
    ).toBe(true);
  });

  it('converts the expiration timer from seconds to milliseconds', () => {
    const archiver = new ChatUpdateArchiver(new MemoryInteractionStore());
    const result = database.read((tx) =>
      archiver.archive(info({ infoType: 'expirationTimerChange', expiresInSeconds: 30, authorAddress: 'alice' }), contexts().archiving, tx),
    );
    expect(result).toEqual({
      type: 'success',
      details: {
        author: 2,
        directional: { type: 'directionless' },
        isSealedSender: false,
        isSms: false,
        payload: { type: 'chatUpdate', update: { type: 'expirationTimerChange', expiresInMs: 30_000 } },
        revisions: [],
      },
    });
  });

  it('leaves payment activations for later and fails unknown authors', () => {
    const archiver = new ChatUpdateArchiver(new MemoryInteractionStore());
    database.read((tx) => {
      expect(archiver.archive(info({ infoType: 'paymentsActivated' }), contexts().archiving, tx)).toEqual({
        type: 'notYetImplemented',
      });
      expect(archiver.archive(info({ authorAddress: 'zed' }), contexts().archiving, tx)).toEqual({
        type: 'messageFailure',
        errors: [
          {
            objectId: { type: 'chatItem', id: 3000 },
            error: { type: 'referencedIdMissing', reference: { type: 'recipient', address: 'zed' } },
          },
        ],
      });
    });
  });

  it('restores a profile change as an info message', () => {
    const store = new MemoryInteractionStore();
    const archiver = new ChatUpdateArchiver(store);
    const item = chatItem({
      dateSent: 3000,
      directional: { type: 'directionless' },
      item: { type: 'chatUpdate', update: { type: 'profileChange', previousName: 'Al', newName: 'Alice' } },
    });

    const result = database.write((tx) => archiver.restore(item, thread(), contexts().restoring, tx));

    expect(result.type).toBe('success');
    expect(store.inserted).toHaveLength(1);
    expect(store.inserted[0]).toMatchObject({
      kind: 'info',
      threadUniqueId: 'thread-1',
      timestamp: 3000,
      authorAddress: 'alice',
      infoType: 'profileChange',
      previousName: 'Al',
      newName: 'Alice',
    });
  });
});
