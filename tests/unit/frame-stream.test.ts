import { describe, expect, it } from 'vitest';
import { FrameFormatError } from '../../src/engine/archive/errors';
import { JsonLinesFrameOutputStream, readFrames } from '../../src/engine/backup/frame-stream';
import type { BackupFrame } from '../../src/engine/ir/types';

const info: BackupFrame = { type: 'backupInfo', backupInfo: { version: 1, backupTimeMs: 5 } };
const self: BackupFrame = { type: 'recipient', recipient: { id: 1, destination: { type: 'self' } } };

describe('JsonLinesFrameOutputStream', () => {
  it('writes canonical JSON lines and counts frames by type', () => {
    const stream = new JsonLinesFrameOutputStream();
    expect(stream.writeFrame(() => info)).toBeNull();
    expect(stream.writeFrame(() => self)).toBeNull();

    expect(stream.frameCount).toBe(2);
    expect(stream.frameCounts).toEqual({ backupInfo: 1, recipient: 1, chat: 0, chatItem: 0 });
    expect(new TextDecoder().decode(stream.finish())).toBe(
      '{"backupInfo":{"backupTimeMs":5,"version":1},"type":"backupInfo"}\n' +
        '{"recipient":{"destination":{"type":"self"},"id":1},"type":"recipient"}\n',
    );
  });

  it('reports a builder that throws', () => {
    const stream = new JsonLinesFrameOutputStream();
    const error = stream.writeFrame(() => {
      throw new Error('no author');
    });
    expect(error).toEqual({ type: 'frameBuildFailed', message: 'no author' });
    expect(stream.frameCount).toBe(0);
  });

  it('rejects a frame that does not validate', () => {
    const stream = new JsonLinesFrameOutputStream();
    const error = stream.writeFrame(() => ({ type: 'chat', chat: { id: 0, recipientIds: [], createdAt: 1 } }));
    expect(error?.type).toBe('frameBuildFailed');
    expect(stream.frameCount).toBe(0);
  });

  it('refuses writes after finish', () => {
    const stream = new JsonLinesFrameOutputStream();
    stream.finish();
    expect(stream.writeFrame(() => info)).toEqual({ type: 'streamClosed' });
  });
});

describe('readFrames', () => {
  it('reads frames back with their line numbers and skips blank lines', () => {
    const stream = new JsonLinesFrameOutputStream();
    stream.writeFrame(() => info);
    stream.writeFrame(() => self);
    const text = new TextDecoder().decode(stream.finish()).replace('\n', '\n\n');

    const frames = [...readFrames(new TextEncoder().encode(text))];
    expect(frames.map((item) => item.line)).toEqual([1, 3]);
    expect(frames.map((item) => item.frame)).toEqual([info, self]);
  });

  it('throws FrameFormatError with the offending line', () => {
    const bytes = new TextEncoder().encode('{"type":"backupInfo","backupInfo":{"version":1,"backupTimeMs":0}}\nnot json\n');
    expect(() => [...readFrames(bytes)]).toThrow(FrameFormatError);
    expect(() => [...readFrames(bytes)]).toThrow('frame on line 2 is not valid JSON');
  });
});
