#!/usr/bin/env -S npx tsx

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { loadBackupOptionsFromEnv } from '../src/engine/config';
import { errorMessage } from '../src/engine/archive/errors';
import { ConsoleLogger } from '../src/engine/logger';
import { exportBackup, importBackup, inspectBackup } from '../src/engine/service';
import { BackupDatabase } from '../src/engine/storage/database';

type Command = 'export' | 'import' | 'inspect';

interface CliArgs {
  command: Command;
  input?: string;
  output?: string;
  db?: string;
  strict: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  if (command !== 'export' && command !== 'import' && command !== 'inspect') {
    throw new Error('usage: chat_backup <export|import|inspect> [--db <path>] [--input <path>] [--output <path>] [--strict]');
  }

  const args = new Map<string, string>();
  let strict = false;
  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (token === '--strict') {
      strict = true;
      continue;
    }
    if (!token.startsWith('--')) {
      throw new Error(`unknown argument: ${token}`);
    }
    const key = token.slice(2);
    const value = rest[i + 1];
    if (!value || value.startsWith('--')) {
      throw new Error(`missing value for --${key}`);
    }
    args.set(key, value);
    i += 1;
  }

  const parsed: CliArgs = {
    command,
    input: args.get('input'),
    output: args.get('output'),
    db: args.get('db'),
    strict,
  };
  if (command === 'export' && (!parsed.db || !parsed.output)) {
    throw new Error('export needs --db <path> and --output <path>');
  }
  if (command === 'import' && (!parsed.input || !parsed.db)) {
    throw new Error('import needs --input <path> and --db <path>');
  }
  if (command === 'inspect' && !parsed.input) {
    throw new Error('missing required flag: --input <path>');
  }
  return parsed;
}

async function readBlob(file: string): Promise<Blob> {
  const bytes = await readFile(file);
  return new Blob([bytes], { type: 'application/zip' });
}

async function writeBytes(file: string, bytes: Uint8Array): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, bytes);
}

async function readOptionalFile(file: string): Promise<Uint8Array | undefined> {
  try {
    return await readFile(file);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const envOptions = loadBackupOptionsFromEnv();
  const options = args.strict ? { ...envOptions, unmatchedPolicy: 'report' as const } : envOptions;
  const logger = new ConsoleLogger(options.logLevel, { cli: 'chat_backup' });

  switch (args.command) {
    case 'export': {
      const dbPath = args.db ?? '';
      const outputPath = args.output ?? '';
      const database = await BackupDatabase.open(await readFile(dbPath));
      try {
        const result = await exportBackup(database, { options, logger });
        await writeBytes(outputPath, new Uint8Array(await result.blob.arrayBuffer()));
        print({ output: outputPath, result: result.result.type, frames: result.frames, warnings: result.manifest.warnings.length });
      } finally {
        database.close();
      }
      return;
    }
    case 'import': {
      const inputPath = args.input ?? '';
      const dbPath = args.db ?? '';
      const database = await BackupDatabase.open(await readOptionalFile(dbPath));
      try {
        const result = await importBackup(await readBlob(inputPath), database, { options, logger });
        await writeBytes(dbPath, database.export());
        print({
          db: dbPath,
          frames: result.frames,
          restoredChatItems: result.restoredChatItems,
          chatItemFailures: result.chatItemResults.length,
          chatFailures: result.chatFailures.length,
        });
      } finally {
        database.close();
      }
      return;
    }
    case 'inspect': {
      print(await inspectBackup(await readBlob(args.input ?? '')));
      return;
    }
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`chat_backup failed: ${errorMessage(error)}\n`);
  process.exit(1);
});
