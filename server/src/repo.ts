/**
 * Repository layer: every SQL statement the API runs.
 *
 * Amounts cross this boundary as exact decimals and are stored as integer
 * cents, so SUM() in SQLite stays exact. Every query is scoped by user.
 */
import { amountToString, fromCents, toCents, type Amount } from '../../src/domain/amount.js';
import { fromIsoDate, toIsoDate, type CalendarDate } from '../../src/domain/date.js';
import type { Month } from '../../src/domain/month.js';
import type { Budget, CategoryTotal, Expense, Income } from '../../src/domain/types.js';
import type { Db } from './db.js';

export interface User {
  id: number;
  name: string;
  email: string;
  createdAt: string;
}

export interface UserWithPassword extends User {
  passwordHash: string;
}

export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;           // inclusive
}

export interface IncomeInput {
  amount: Amount;
  source: string;
  date: CalendarDate;
  note: string | null;
}

export interface ExpenseInput {
  amount: Amount;
  category: string;
  date: CalendarDate;
  note: string | null;
}

export interface ListOptions {
  limit: number;
  range?: DateRange;
}

export type DeleteOutcome = 'deleted' | 'not_found' | 'forbidden';

export type UpdateOutcome<T> =
  | { status: 'updated'; record: T }
  | { status: 'not_found' }
  | { status: 'forbidden' };

// --- Row shapes ---

interface UserRow {
  id: number;
  name: string;
  email: string;
  password_hash: string;
  created_at: string;
}

interface LedgerRow {
  id: number;
  user_id: number;
  amount_cents: number;
  label: string;
  date: string;
  note: string | null;
}

interface BudgetRow {
  id: number;
  user_id: number;
  month: string;
  amount_cents: number;
}

interface SessionRow {
  user_id: number;
  expires_at: number;
}

type LedgerTable = 'incomes' | 'expenses';

const LABEL_COLUMN: Record<LedgerTable, string> = {
  incomes: 'source',
  expenses: 'category',
};

// Bounds used when a query is not limited to a month
const ALL_TIME: [string, string] = ['0001-01-01', '9999-12-31'];

function rangeParams(range?: DateRange): [string, string] {
  return range ? [toIsoDate(range.start), toIsoDate(range.end)] : ALL_TIME;
}

function toUser(row: UserRow): User {
  return { id: row.id, name: row.name, email: row.email, createdAt: row.created_at };
}

function toIncome(row: LedgerRow): Income {
  return {
    id: row.id,
    userId: row.user_id,
    amount: fromCents(row.amount_cents),
    source: row.label,
    date: fromIsoDate(row.date),
    note: row.note,
  };
}

function toExpense(row: LedgerRow): Expense {
  return {
    id: row.id,
    userId: row.user_id,
    amount: fromCents(row.amount_cents),
    category: row.label,
    date: fromIsoDate(row.date),
    note: row.note,
  };
}

function toBudget(row: BudgetRow): Budget {
  return { id: row.id, userId: row.user_id, month: row.month, amount: fromCents(row.amount_cents) };
}

function csvField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export type Repository = ReturnType<typeof createRepository>;

export function createRepository(db: Db) {
  // --- Ledger tables (incomes / expenses share a shape) ---

  function selectLedger(table: LedgerTable): string {
    return `SELECT id, user_id, amount_cents, ${LABEL_COLUMN[table]} AS label, date, note FROM ${table}`;
  }

  function insertLedger(table: LedgerTable, userId: number, amount: Amount, label: string, date: CalendarDate, note: string | null): LedgerRow {
    const result = db.prepare<[number, number, string, string, string | null]>(`
      INSERT INTO ${table} (user_id, amount_cents, ${LABEL_COLUMN[table]}, date, note)
      VALUES (?, ?, ?, ?, ?)
    `).run(userId, toCents(amount), label, toIsoDate(date), note);

    const row = findLedger(table, Number(result.lastInsertRowid));
    if (!row) throw new Error(`Inserted row missing from ${table}`);
    return row;
  }

  function findLedger(table: LedgerTable, id: number): LedgerRow | undefined {
    return db.prepare<[number], LedgerRow>(`${selectLedger(table)} WHERE id = ?`).get(id);
  }

  function listLedger(table: LedgerTable, userId: number, options: ListOptions): LedgerRow[] {
    return db.prepare<[number, string, string, number], LedgerRow>(`
      ${selectLedger(table)}
      WHERE user_id = ? AND date BETWEEN ? AND ?
      ORDER BY date DESC, id DESC
      LIMIT ?
    `).all(userId, ...rangeParams(options.range), options.limit);
  }

  function updateLedger(
    table: LedgerTable,
    userId: number,
    id: number,
    amount: Amount,
    label: string,
    date: CalendarDate,
    note: string | null,
  ): UpdateOutcome<LedgerRow> {
    const existing = findLedger(table, id);
    if (!existing) return { status: 'not_found' };
    if (existing.user_id !== userId) return { status: 'forbidden' };

    db.prepare<[number, string, string, string | null, number]>(`
      UPDATE ${table} SET amount_cents = ?, ${LABEL_COLUMN[table]} = ?, date = ?, note = ?
      WHERE id = ?
    `).run(toCents(amount), label, toIsoDate(date), note, id);

    const updated = findLedger(table, id);
    if (!updated) return { status: 'not_found' };
    return { status: 'updated', record: updated };
  }

  function deleteLedger(table: LedgerTable, userId: number, id: number): DeleteOutcome {
    const existing = findLedger(table, id);
    if (!existing) return 'not_found';
    if (existing.user_id !== userId) return 'forbidden';
    db.prepare<[number]>(`DELETE FROM ${table} WHERE id = ?`).run(id);
    return 'deleted';
  }

  function sumLedger(table: LedgerTable, userId: number, range?: DateRange): Amount {
    const row = db.prepare<[number, string, string], { total: number }>(`
      SELECT COALESCE(SUM(amount_cents), 0) AS total
      FROM ${table}
      WHERE user_id = ? AND date BETWEEN ? AND ?
    `).get(userId, ...rangeParams(range));
    return fromCents(row?.total ?? 0);
  }

  function mapUpdate<T>(outcome: UpdateOutcome<LedgerRow>, map: (row: LedgerRow) => T): UpdateOutcome<T> {
    return outcome.status === 'updated' ? { status: 'updated', record: map(outcome.record) } : outcome;
  }

  return {
    // --- Users ---

    createUser(name: string, email: string, passwordHash: string): User {
      const result = db.prepare<[string, string, string]>(
        'INSERT INTO users (name, email, password_hash) VALUES (?, ?, ?)',
      ).run(name, email, passwordHash);
      const row = db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?')
        .get(Number(result.lastInsertRowid));
      if (!row) throw new Error('Inserted user missing');
      return toUser(row);
    },

    findUserByEmail(email: string): UserWithPassword | undefined {
      const row = db.prepare<[string], UserRow>('SELECT * FROM users WHERE email = ?').get(email);
      return row ? { ...toUser(row), passwordHash: row.password_hash } : undefined;
    },

    findUserById(id: number): User | undefined {
      const row = db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
      return row ? toUser(row) : undefined;
    },

    // --- Sessions ---

    createSession(token: string, userId: number, expiresAt: number): void {
      db.prepare<[string, number, number]>(
        'INSERT INTO sessions (token, user_id, expires_at) VALUES (?, ?, ?)',
      ).run(token, userId, expiresAt);
    },

    /** User id behind a token that has not expired at `now` (ms) */
    findSessionUserId(token: string, now: number): number | undefined {
      const row = db.prepare<[string], SessionRow>(
        'SELECT user_id, expires_at FROM sessions WHERE token = ?',
      ).get(token);
      if (!row || row.expires_at <= now) return undefined;
      return row.user_id;
    },

    deleteSession(token: string): void {
      db.prepare<[string]>('DELETE FROM sessions WHERE token = ?').run(token);
    },

    purgeExpiredSessions(now: number): number {
      return db.prepare<[number]>('DELETE FROM sessions WHERE expires_at <= ?').run(now).changes;
    },

    // --- Incomes ---

    addIncome(userId: number, input: IncomeInput): Income {
      return toIncome(insertLedger('incomes', userId, input.amount, input.source, input.date, input.note));
    },

    listIncomes(userId: number, options: ListOptions): Income[] {
      return listLedger('incomes', userId, options).map(toIncome);
    },

    updateIncome(userId: number, id: number, input: IncomeInput): UpdateOutcome<Income> {
      return mapUpdate(
        updateLedger('incomes', userId, id, input.amount, input.source, input.date, input.note),
        toIncome,
      );
    },

    deleteIncome(userId: number, id: number): DeleteOutcome {
      return deleteLedger('incomes', userId, id);
    },

    sumIncome(userId: number, range?: DateRange): Amount {
      return sumLedger('incomes', userId, range);
    },

    // --- Expenses ---

    addExpense(userId: number, input: ExpenseInput): Expense {
      return toExpense(insertLedger('expenses', userId, input.amount, input.category, input.date, input.note));
    },

    listExpenses(userId: number, options: ListOptions): Expense[] {
      return listLedger('expenses', userId, options).map(toExpense);
    },

    updateExpense(userId: number, id: number, input: ExpenseInput): UpdateOutcome<Expense> {
      return mapUpdate(
        updateLedger('expenses', userId, id, input.amount, input.category, input.date, input.note),
        toExpense,
      );
    },

    deleteExpense(userId: number, id: number): DeleteOutcome {
      return deleteLedger('expenses', userId, id);
    },

    sumExpense(userId: number, range?: DateRange): Amount {
      return sumLedger('expenses', userId, range);
    },

    /** Spending per stored category value, largest first */
    expenseByCategory(userId: number, range?: DateRange): CategoryTotal[] {
      const rows = db.prepare<[number, string, string], { category: string; total: number }>(`
        SELECT category, SUM(amount_cents) AS total
        FROM expenses
        WHERE user_id = ? AND date BETWEEN ? AND ?
        GROUP BY category
        ORDER BY total DESC, category ASC
      `).all(userId, ...rangeParams(range));
      return rows.map((r) => ({ category: r.category, amount: fromCents(r.total) }));
    },

    // --- Budgets ---

    setBudget(userId: number, month: Month, amount: Amount): Budget {
      db.prepare<[number, string, number]>(`
        INSERT INTO budgets (user_id, month, amount_cents)
        VALUES (?, ?, ?)
        ON CONFLICT(user_id, month) DO UPDATE SET amount_cents = excluded.amount_cents
      `).run(userId, month, toCents(amount));

      const row = db.prepare<[number, string], BudgetRow>(
        'SELECT * FROM budgets WHERE user_id = ? AND month = ?',
      ).get(userId, month);
      if (!row) throw new Error(`Budget for ${month} missing after upsert`);
      return toBudget(row);
    },

    getBudget(userId: number, month: Month): Budget | undefined {
      const row = db.prepare<[number, string], BudgetRow>(
        'SELECT * FROM budgets WHERE user_id = ? AND month = ?',
      ).get(userId, month);
      return row ? toBudget(row) : undefined;
    },

    listBudgets(userId: number): Budget[] {
      return db.prepare<[number], BudgetRow>(
        'SELECT * FROM budgets WHERE user_id = ? ORDER BY month DESC',
      ).all(userId).map(toBudget);
    },

    // --- Export ---

    /**
     * Incomes and expenses as CSV, oldest first.
     * Columns: type,date,amount,category_or_source,note
     */
    exportTransactionsCsv(userId: number): string {
      const incomes = db.prepare<[number], LedgerRow>(
        `${selectLedger('incomes')} WHERE user_id = ? ORDER BY date ASC, id ASC`,
      ).all(userId);
      const expenses = db.prepare<[number], LedgerRow>(
        `${selectLedger('expenses')} WHERE user_id = ? ORDER BY date ASC, id ASC`,
      ).all(userId);

      const items = [
        ...incomes.map((row) => ({ type: 'income', row })),
        ...expenses.map((row) => ({ type: 'expense', row })),
      ];
      // Array.prototype.sort is stable: same date + type keeps id order
      items.sort((a, b) => a.row.date.localeCompare(b.row.date) || a.type.localeCompare(b.type));

      const lines = ['type,date,amount,category_or_source,note'];
      for (const { type, row } of items) {
        const amount = amountToString(fromCents(row.amount_cents));
        lines.push(`${type},${row.date},${amount},${csvField(row.label)},${csvField(row.note ?? '')}`);
      }
      return `${lines.join('\n')}\n`;
    },
  };
}
