import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { errorMessage } from '../../src/domain/errors.js';
import { initSchema } from '../../src/db/sqliteGateway.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_DB_PATH = path.join(__dirname, '../data/ledger.db');

/** Raised when the integrity check reports damaged pages */
class DamagedDatabaseError extends Error {}

function connect(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  try {
    // Enable WAL mode for better performance
    db.pragma('journal_mode = WAL');
    initSchema(db);
    const check: unknown = db.pragma('quick_check', { simple: true });
    if (check !== 'ok') throw new DamagedDatabaseError(`quick_check: ${String(check)}`);
    return db;
  } catch (error) {
    db.close();
    throw error;
  }
}

function isUnreadable(error: unknown): boolean {
  if (error instanceof DamagedDatabaseError) return true;
  if (!(error instanceof Database.SqliteError)) return false;
  return error.code === 'SQLITE_NOTADB' || error.code.startsWith('SQLITE_CORRUPT');
}

function moveAside(from: string, to: string): void {
  if (fs.existsSync(from)) fs.renameSync(from, to);
}

/**
 * Open (or create) the ledger database with its schema in place. A file SQLite
 * cannot read, or one with damaged pages, is kept as `<file>.corrupt` and
 * replaced by a fresh database.
 */
export function openDatabase(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  try {
    return connect(dbPath);
  } catch (error) {
    if (dbPath === ':memory:' || !isUnreadable(error)) throw error;

    const backup = `${dbPath}.corrupt`;
    fs.renameSync(dbPath, backup);
    for (const suffix of ['-wal', '-shm']) {
      moveAside(`${dbPath}${suffix}`, `${backup}${suffix}`);
    }
    console.warn(`[SQLite] ${dbPath} is unreadable (${errorMessage(error)}); moved it to ${backup} and starting fresh`);
    return connect(dbPath);
  }
}
