import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FrameFormatError } from '../../src/engine/archive/errors';
import { FRAMES_PATH } from '../../src/engine/backup/format';
import { readZipBlob, writeZipBlob } from '../../src/engine/backup/zip';
import type { ProgressEvent } from '../../src/engine/ir/types';
import { exportBackup, importBackup, inspectBackup } from '../../src/engine/service';
import { BackupDatabase } from '../../src/engine/storage/database';
import { SqlInteractionStore } from '../../src/engine/storage/interaction-store';
import { SqlReactionStore } from '../../src/engine/storage/reaction-store';
import { SqlThreadStore } from '../../src/engine/storage/thread-store';
import { NOW, call, captureLogger, incoming, info, outgoing, thread } from '../helpers/fixtures';

let source: BackupDatabase;
let target: BackupDatabase;

beforeEach(async () => {
  source = await BackupDatabase.open();
  target = await BackupDatabase.open();
  seed(source);
});

afterEach(() => {
  source.close();
  target.close();
});

function seed(database: BackupDatabase): void {
  const threads = new SqlThreadStore();
  const interactions = new SqlInteractionStore();
  const reactions = new SqlReactionStore();
  database.write((tx) => {
    threads.insert(thread({ uniqueId: 'thread-1', title: 'Friends', participantAddresses: ['alice'], createdAt: 100 }), tx);
    threads.insert(thread({ uniqueId: 'thread-2', title: 'Work', participantAddresses: ['bob'], createdAt: 200 }), tx);

    interactions.insert(incoming(), tx);
    interactions.insert(outgoing(), tx);
    interactions.insert(info({ threadUniqueId: 'thread-2', authorAddress: 'bob' }), tx);
    interactions.insert(call(), tx);
    interactions.insert(
      incoming({
        uniqueId: 'expiring',
        threadUniqueId: 'thread-2',
        authorAddress: 'bob',
        timestamp: 5000,
        expireStartedAt: NOW.getTime() - 1000,
        expiresInSeconds: 60,
      }),
      tx,
    );
    interactions.insert(incoming({ uniqueId: 'stray', threadUniqueId: 'thread-x', timestamp: 6000 }), tx);

    reactions.insert({ messageUniqueId: 'msg-in', reactorAddress: 'local', emoji: '+1', sentAt: 1500, sortOrder: 0 }, tx);
  });
}

const run = () => ({ dateProvider: () => NOW, logger: captureLogger('error').logger });

describe('backup export and import', () => {
  it('exports every archivable item and reports the rest', async () => {
    const progress: ProgressEvent[] = [];
    const outcomes: string[] = [];
    const exported = await exportBackup(source, {
      ...run(),
      onProgress: (event) => progress.push(event),
      onItem: (event) => outcomes.push(`${event.interaction.uniqueId}:${event.outcome}`),
    });

    expect(exported.frames).toEqual({ backupInfo: 1, recipient: 3, chat: 2, chatItem: 3 });
    expect(exported.manifest).toMatchObject({
      schemaVersion: 1,
      backupVersion: 1,
      createdAt: NOW.toISOString(),
      frameCount: 9,
      warnings: ['chat-item:6000: referenced thread missing (thread-x)'],
    });
    expect(exported.result).toEqual({
      type: 'partialSuccess',
      errors: [
        {
          objectId: { type: 'chatItem', id: 6000 },
          error: { type: 'referencedIdMissing', reference: { type: 'thread', threadUniqueId: 'thread-x' } },
        },
      ],
    });
    expect(exported.tally).toEqual({ enumerated: 6, written: 3, skipped: 2, failed: 1 });
    expect(outcomes).toEqual([
      'msg-in:written',
      'msg-out:written',
      'msg-info:written',
      'call-1:skipped',
      'expiring:skipped',
      'stray:failed',
    ]);
    expect(progress.map((event) => event.stage)).toEqual(['read', 'recipients', 'chats', 'chat-items', 'package', 'done']);
  });

  it('restores threads, messages and reactions into an empty store', async () => {
    const exported = await exportBackup(source, run());
    const imported = await importBackup(exported.blob, target, run());

    expect(imported.frames).toEqual({ backupInfo: 1, recipient: 3, chat: 2, chatItem: 3 });
    expect(imported.restoredChatItems).toBe(3);
    expect(imported.chatItemResults).toEqual([]);
    expect(imported.chatFailures).toEqual([]);

    const threads = target.read((tx) => new SqlThreadStore().listThreads(tx));
    expect(threads.map((item) => [item.title, item.participantAddresses])).toEqual([
      ['Friends', ['alice']],
      ['Work', ['bob']],
    ]);

    const interactions = target.read((tx) => [...new SqlInteractionStore().iterateAll(tx)]);
    expect(interactions.map((item) => item.kind)).toEqual(['incoming', 'outgoing', 'info']);
    const [restoredIncoming, restoredOutgoing, restoredInfo] = interactions;
    expect(restoredIncoming).toMatchObject({ authorAddress: 'alice', threadUniqueId: threads[0].uniqueId, timestamp: 1000 });
    expect(restoredOutgoing).toMatchObject({ recipientStates: { alice: 'delivered' }, timestamp: 2000 });
    expect(restoredInfo).toMatchObject({
      infoType: 'groupUpdate',
      authorAddress: 'bob',
      description: 'renamed the group',
      threadUniqueId: threads[1].uniqueId,
    });

    const reactions = target.read((tx) => new SqlReactionStore().fetchReactions(restoredIncoming.uniqueId, tx));
    expect(reactions).toEqual([
      { messageUniqueId: restoredIncoming.uniqueId, reactorAddress: 'local', emoji: '+1', sentAt: 1500, sortOrder: 0 },
    ]);
  });

  it('produces the same frames when the restored store is exported again', async () => {
    const first = await exportBackup(source, run());
    await importBackup(first.blob, target, run());
    const second = await exportBackup(target, run());

    expect(second.result).toEqual({ type: 'success' });
    expect(second.manifest.framesSha256).toBe(first.manifest.framesSha256);
  });

  it('rejects a backup whose frames do not match the manifest checksum', async () => {
    const exported = await exportBackup(source, run());
    const entries = await readZipBlob(exported.blob);
    entries.set(FRAMES_PATH, new TextEncoder().encode('{}\n'));
    const tampered = await writeZipBlob(entries);

    await expect(importBackup(tampered, target, run())).rejects.toThrow(FrameFormatError);
    const inspected = await inspectBackup(tampered);
    expect(inspected.valid).toBe(false);
    expect(inspected.errors).toEqual(['frames.jsonl checksum mismatch']);
  });
});

describe('inspectBackup', () => {
  it('summarizes a valid backup', async () => {
    const exported = await exportBackup(source, run());
    const inspected = await inspectBackup(exported.blob);

    expect(inspected).toMatchObject({
      valid: true,
      hints: ['manifest.json', 'frames.jsonl'],
      frames: { backupInfo: 1, recipient: 3, chat: 2, chatItem: 3 },
      errors: [],
    });
    expect(inspected.manifest?.framesSha256).toBe(exported.manifest.framesSha256);
  });

  it('flags an archive that is not a chat backup', async () => {
    const entries = new Map<string, Uint8Array>([['notes.txt', new TextEncoder().encode('hello')]]);
    const inspected = await inspectBackup(await writeZipBlob(entries));

    expect(inspected).toEqual({
      valid: false,
      hints: [],
      frames: { backupInfo: 0, recipient: 0, chat: 0, chatItem: 0 },
      errors: ['not a chat backup'],
    });
  });
});
