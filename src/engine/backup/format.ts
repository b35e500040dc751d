import { FrameFormatError } from '../archive/errors';
import { ManifestSchema } from '../ir/schema';
import type { Manifest } from '../ir/types';
import { formatIssues } from '../util/common';
import { type ArchiveEntries, readJsonEntry } from './zip';

export const MANIFEST_PATH = 'manifest.json';
export const FRAMES_PATH = 'frames.jsonl';

export interface DetectResult {
  valid: boolean;
  hints: string[];
}

export function detectBackup(entries: ArchiveEntries): DetectResult {
  const hints: string[] = [];
  const hasManifest = entries.has(MANIFEST_PATH);
  const hasFrames = entries.has(FRAMES_PATH);

  if (hasManifest) hints.push(MANIFEST_PATH);
  if (hasFrames) hints.push(FRAMES_PATH);

  return { valid: hasManifest && hasFrames, hints };
}

export function readManifest(entries: ArchiveEntries): Manifest {
  const raw = readJsonEntry(entries, MANIFEST_PATH);
  if (raw === null) {
    throw new FrameFormatError(`${MANIFEST_PATH} missing or malformed`);
  }
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FrameFormatError(`invalid manifest: ${formatIssues(parsed.error.issues)}`, parsed.error);
  }
  return parsed.data;
}
