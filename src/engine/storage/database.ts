import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';

import { StorageError, errorMessage } from '../archive/errors';
import { STORE_SCHEMA_SQL } from './schema';

let sqlPromise: Promise<SqlJsStatic> | null = null;

// The wasm binary ships beside the package entry point (sql.js/dist).
export function resolveWasmPath(file: string): string {
  const entry = createRequire(import.meta.url).resolve('sql.js');
  return join(dirname(entry), file);
}

export async function getSqlJs(): Promise<SqlJsStatic> {
  if (!sqlPromise) {
    sqlPromise = initSqlJs({
      locateFile: (file) => (file.endsWith('.wasm') ? resolveWasmPath(file) : file),
    });
  }
  return sqlPromise;
}

export interface ReadTransaction {
  readonly db: Database;
  readonly mode: 'read' | 'write';
}

export interface WriteTransaction extends ReadTransaction {
  readonly mode: 'write';
}

/**
 * Owner of the sql.js connection. Transactions are scoped around a
 * synchronous callback; archivers only ever receive the transaction handle.
 */
export class BackupDatabase {
  private inTransaction = false;

  private constructor(private readonly db: Database) {}

  static async open(bytes?: Uint8Array): Promise<BackupDatabase> {
    const SQL = await getSqlJs();
    const db = bytes && bytes.length > 0 ? new SQL.Database(bytes) : new SQL.Database();
    for (const sql of STORE_SCHEMA_SQL) {
      db.run(sql);
    }
    return new BackupDatabase(db);
  }

  read<T>(block: (tx: ReadTransaction) => T): T {
    return this.transact('read', () => block({ db: this.db, mode: 'read' }));
  }

  write<T>(block: (tx: WriteTransaction) => T): T {
    return this.transact('write', () => block({ db: this.db, mode: 'write' }));
  }

  export(): Uint8Array {
    if (this.inTransaction) {
      throw new StorageError('cannot export while a transaction is open');
    }
    return this.db.export();
  }

  close(): void {
    this.db.close();
  }

  private transact<T>(mode: ReadTransaction['mode'], run: () => T): T {
    if (this.inTransaction) {
      throw new StorageError(`nested ${mode} transaction`);
    }
    this.execute(mode === 'write' ? 'BEGIN IMMEDIATE' : 'BEGIN DEFERRED');
    this.inTransaction = true;
    try {
      let result: T;
      try {
        result = run();
      } catch (error) {
        this.execute('ROLLBACK');
        throw error;
      }
      this.execute('COMMIT');
      return result;
    } finally {
      this.inTransaction = false;
    }
  }

  private execute(statement: string): void {
    try {
      this.db.run(statement);
    } catch (error) {
      throw new StorageError(`${statement} failed: ${errorMessage(error)}`, error);
    }
  }
}
