/**
 * Expense repository over better-sqlite3, plus the retry wrapper every
 * route goes through.
 */
import { generateId, type Db } from './db.js';
import type { ExpenseRecord } from '../../src/domain/types.js';

export type Expense = ExpenseRecord & { amount: number };

export interface NewExpense {
  description: string;
  name: string;
  amount: number;
  category: string;
  created_at: string;
}

export type ExpenseUpdate = Omit<NewExpense, 'created_at'>;

export interface ExpenseRepository {
  /** Newest first */
  list(): Expense[];
  get(id: string): Expense | null;
  create(input: NewExpense): Expense;
  /** null when no expense has this id */
  update(id: string, input: ExpenseUpdate): Expense | null;
  /** Returns the deleted row, or null when no expense has this id */
  remove(id: string): Expense | null;
}

export function createSqliteExpenseRepository(db: Db): ExpenseRepository {
  const selectAll = db.prepare<[], Expense>(`
    SELECT id, description, name, amount, category, created_at
    FROM expenses
    ORDER BY created_at DESC, rowid DESC
  `);
  const selectOne = db.prepare<[string], Expense>(
    'SELECT id, description, name, amount, category, created_at FROM expenses WHERE id = ?',
  );
  const insert = db.prepare<[string, string, string, number, string, string]>(`
    INSERT INTO expenses (id, description, name, amount, category, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const updateStmt = db.prepare<[string, string, number, string, string]>(`
    UPDATE expenses SET description = ?, name = ?, amount = ?, category = ?
    WHERE id = ?
  `);
  const deleteStmt = db.prepare<[string]>('DELETE FROM expenses WHERE id = ?');

  const get = (id: string): Expense | null => selectOne.get(id) ?? null;

  return {
    list: () => selectAll.all(),

    get,

    create(input) {
      const id = generateId();
      insert.run(id, input.description, input.name, input.amount, input.category, input.created_at);
      const created = get(id);
      if (!created) throw new Error(`Expense ${id} missing after insert`);
      return created;
    },

    update(id, input) {
      const result = updateStmt.run(input.description, input.name, input.amount, input.category, id);
      return result.changes > 0 ? get(id) : null;
    },

    remove(id) {
      const existing = get(id);
      if (!existing) return null;
      deleteStmt.run(id);
      return existing;
    },
  };
}

export interface RetryOptions {
  attempts: number;
  label: string;
}

/**
 * Run a synchronous operation up to `attempts` times, logging each failure.
 * The last error is rethrown.
 */
export function withRetry<T>(operation: () => T, { attempts, label }: RetryOptions): T {
  let lastError: unknown = new Error(`${label} was not attempted`);
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return operation();
    } catch (error) {
      lastError = error;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`${label} failed (attempt ${attempt}/${attempts}): ${message}`);
    }
  }
  throw lastError;
}

/** Same repository, every call wrapped in {@link withRetry} */
export function createRetryingRepository(repo: ExpenseRepository, attempts: number): ExpenseRepository {
  const retry = <T>(label: string, operation: () => T): T => withRetry(operation, { attempts, label });
  return {
    list: () => retry('List expenses', () => repo.list()),
    get: (id) => retry('Get expense', () => repo.get(id)),
    create: (input) => retry('Create expense', () => repo.create(input)),
    update: (id, input) => retry('Update expense', () => repo.update(id, input)),
    remove: (id) => retry('Delete expense', () => repo.remove(id)),
  };
}
