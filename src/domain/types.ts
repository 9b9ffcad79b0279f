/**
 * Domain types for the ledger.
 * Plain data shared by the API and the computations.
 */
import type { Amount } from './amount.js';
import type { CalendarDate } from './date.js';
import type { Month } from './month.js';

export type { Month };

/** Money received */
export interface Income {
  id: number;
  userId: number;
  amount: Amount;              // >= 0
  source: string;              // "Income" when not given
  date: CalendarDate;
  note: string | null;
}

/** Money spent */
export interface Expense {
  id: number;
  userId: number;
  amount: Amount;              // >= 0
  category: string;
  date: CalendarDate;
  note: string | null;
}

/** One spending limit per user per month */
export interface Budget {
  id: number;
  userId: number;
  month: Month;                // YYYY-MM
  amount: Amount;              // >= 0
}

export interface Totals {
  income: Amount;
  expense: Amount;
  balance: Amount;             // can be negative
}

export interface CategoryTotal {
  category: string;
  amount: Amount;
}

export interface BudgetStatus {
  month: Month;
  budgeted: Amount;
  spent: Amount;
  remaining: Amount;           // can be negative (overspent)
}

/** Shown for expenses saved without a category */
export const UNCATEGORIZED = 'Uncategorized';

/** Used when an income is saved without a source */
export const DEFAULT_INCOME_SOURCE = 'Income';
