/**
 * Pure domain computations.
 * No DB, no IO: only data in, data out.
 */
import { ZERO_AMOUNT, type Amount } from './amount.js';
import type { CalendarDate } from './date.js';
import { monthOf, normalizeMonth, type Month } from './month.js';
import {
  UNCATEGORIZED,
  type Budget,
  type BudgetStatus,
  type CategoryTotal,
  type Expense,
  type Income,
  type Totals,
} from './types.js';

/** Filter records to a single month ('YYYY-MM' or 'YYYY/MM') */
export function forMonth<T extends { date: CalendarDate }>(records: T[], month: Month): T[] {
  const wanted = normalizeMonth(month);
  return records.filter((r) => monthOf(r.date) === wanted);
}

export function sumAmounts(records: { amount: Amount }[]): Amount {
  return records.reduce((sum, r) => sum.plus(r.amount), ZERO_AMOUNT);
}

/** Income, expense and what is left (balance can go negative) */
export function totalsOf(income: Amount, expense: Amount): Totals {
  return { income, expense, balance: income.minus(expense) };
}

/** Totals over loaded records */
export function totals(incomes: Income[], expenses: Expense[]): Totals {
  return totalsOf(sumAmounts(incomes), sumAmounts(expenses));
}

/**
 * Merge per-category sums into a breakdown, largest first.
 * Blank categories are folded into "Uncategorized"; ties sort by name.
 */
export function categoryBreakdown(groups: CategoryTotal[]): CategoryTotal[] {
  const map = new Map<string, Amount>();
  for (const g of groups) {
    const category = g.category.trim() || UNCATEGORIZED;
    map.set(category, (map.get(category) ?? ZERO_AMOUNT).plus(g.amount));
  }
  return Array.from(map.entries())
    .map(([category, amount]) => ({ category, amount }))
    .sort((a, b) => b.amount.comparedTo(a.amount) || a.category.localeCompare(b.category));
}

/**
 * How much of a month's budget is left.
 * remaining = budgeted − spent
 */
export function budgetStatus(budget: Budget, spent: Amount): BudgetStatus {
  return {
    month: budget.month,
    budgeted: budget.amount,
    spent,
    remaining: budget.amount.minus(spent),
  };
}
