import { BlobReader, BlobWriter, Uint8ArrayReader, Uint8ArrayWriter, ZipReader, ZipWriter, configure } from '@zip.js/zip.js';

import { canonicalJson } from '../util/canonical_json';

configure({ useWebWorkers: false });

export type ArchiveEntries = Map<string, Uint8Array>;

export async function readZipBlob(input: Blob): Promise<ArchiveEntries> {
  const out: ArchiveEntries = new Map();
  const reader = new ZipReader(new BlobReader(input));
  try {
    const entries = await reader.getEntries();
    for (const entry of entries) {
      if (!entry.filename || entry.directory) continue;
      const data = await entry.getData?.(new Uint8ArrayWriter());
      if (!data) continue;
      out.set(entry.filename, data);
    }
  } finally {
    await reader.close();
  }
  return out;
}

export async function writeZipBlob(entries: ArchiveEntries): Promise<Blob> {
  const writer = new ZipWriter(new BlobWriter('application/zip'), {
    extendedTimestamp: false,
    keepOrder: true,
  });
  const names = [...entries.keys()].sort();
  for (const name of names) {
    await writer.add(name, new Uint8ArrayReader(entries.get(name) ?? new Uint8Array()));
  }
  return writer.close();
}

export function readTextEntry(entries: ArchiveEntries, path: string): string | null {
  const raw = entries.get(path);
  if (!raw) return null;
  return new TextDecoder().decode(raw);
}

export function readJsonEntry(entries: ArchiveEntries, path: string): unknown {
  const text = readTextEntry(entries, path);
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function writeJsonEntry(entries: ArchiveEntries, path: string, value: unknown): void {
  entries.set(path, new TextEncoder().encode(canonicalJson(value, true)));
}
