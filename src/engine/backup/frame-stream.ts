import { type ArchiveErrorKind, FrameFormatError, errorMessage } from '../archive/errors';
import { BackupFrameSchema } from '../ir/schema';
import type { BackupFrame, FrameCounts } from '../ir/types';
import { canonicalJson } from '../util/canonical_json';
import { formatIssues } from '../util/common';

export interface FrameOutputStream {
  /**
   * Builds one frame and appends it. Failures come back as the returned
   * error; nothing is thrown past this call.
   */
  writeFrame(build: () => BackupFrame): ArchiveErrorKind | null;
}

export function emptyFrameCounts(): FrameCounts {
  return { backupInfo: 0, recipient: 0, chat: 0, chatItem: 0 };
}

/** Frames as canonical JSON, one per line. */
export class JsonLinesFrameOutputStream implements FrameOutputStream {
  private readonly lines: string[] = [];
  private readonly counts = emptyFrameCounts();
  private closed = false;

  writeFrame(build: () => BackupFrame): ArchiveErrorKind | null {
    if (this.closed) {
      return { type: 'streamClosed' };
    }

    let built: BackupFrame;
    try {
      built = build();
    } catch (error) {
      return { type: 'frameBuildFailed', message: errorMessage(error) };
    }

    const checked = BackupFrameSchema.safeParse(built);
    if (!checked.success) {
      return { type: 'frameBuildFailed', message: formatIssues(checked.error.issues) };
    }

    let line: string;
    try {
      line = canonicalJson(checked.data);
    } catch (error) {
      return { type: 'frameSerializationFailed', message: errorMessage(error) };
    }

    this.lines.push(line);
    this.counts[checked.data.type] += 1;
    return null;
  }

  get frameCount(): number {
    return this.lines.length;
  }

  get frameCounts(): FrameCounts {
    return { ...this.counts };
  }

  /** Closes the stream; later writes report `streamClosed`. */
  finish(): Uint8Array {
    this.closed = true;
    const text = this.lines.length > 0 ? `${this.lines.join('\n')}\n` : '';
    return new TextEncoder().encode(text);
  }
}

export interface ReadFrame {
  line: number;
  frame: BackupFrame;
}

/** Reads frames back in order; an unreadable line throws `FrameFormatError`. */
export function* readFrames(bytes: Uint8Array): Generator<ReadFrame> {
  const text = new TextDecoder().decode(bytes);
  const lines = text.split('\n');
  for (let index = 0; index < lines.length; index += 1) {
    const raw = lines[index].trim();
    if (!raw) continue;
    const line = index + 1;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new FrameFormatError(`frame on line ${line} is not valid JSON`, error);
    }

    const parsed = BackupFrameSchema.safeParse(value);
    if (!parsed.success) {
      throw new FrameFormatError(`frame on line ${line} is invalid: ${formatIssues(parsed.error.issues)}`, parsed.error);
    }
    yield { line, frame: parsed.data };
  }
}
