import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = Database.Database;

export const IN_MEMORY = ':memory:';

/**
 * Open (or create) the expense database and make sure the schema exists.
 * Pass `:memory:` for a throwaway database.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  if (dbPath !== IN_MEMORY) {
    // Enable WAL mode for better performance
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS expenses (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      name TEXT NOT NULL,
      amount REAL NOT NULL,
      category TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  // Dashboard and list both read newest first
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_expenses_created_at ON expenses(created_at)
  `);

  return db;
}

// Helper function to generate cuid-like IDs
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}
