/**
 * JSON shapes sent to clients. Amounts travel as two-decimal strings,
 * with a display string formatted for the configured currency.
 */
import { amountToString, formatAmount, type Amount } from '../../src/domain/amount.js';
import { toIsoDate } from '../../src/domain/date.js';
import type { Budget, BudgetStatus, CategoryTotal, Expense, Income, Totals } from '../../src/domain/types.js';
import type { User } from './repo.js';

export interface Money {
  value: string;
  display: string;
}

export function money(amount: Amount, currency: string): Money {
  return { value: amountToString(amount), display: formatAmount(amount, currency) };
}

export function serializeUser(user: User) {
  return { id: user.id, name: user.name, email: user.email, created_at: user.createdAt };
}

export function serializeIncome(income: Income) {
  return {
    id: income.id,
    user_id: income.userId,
    amount: amountToString(income.amount),
    source: income.source,
    date: toIsoDate(income.date),
    note: income.note,
  };
}

export function serializeExpense(expense: Expense) {
  return {
    id: expense.id,
    user_id: expense.userId,
    amount: amountToString(expense.amount),
    category: expense.category,
    date: toIsoDate(expense.date),
    note: expense.note,
  };
}

export function serializeBudget(budget: Budget) {
  return {
    id: budget.id,
    user_id: budget.userId,
    month: budget.month,
    amount: amountToString(budget.amount),
  };
}

export function serializeTotals(totals: Totals, currency: string) {
  return {
    income: money(totals.income, currency),
    expense: money(totals.expense, currency),
    balance: money(totals.balance, currency),
  };
}

export function serializeCategories(categories: CategoryTotal[], currency: string) {
  return categories.map((c) => ({ category: c.category, amount: money(c.amount, currency) }));
}

export function serializeBudgetStatus(status: BudgetStatus, currency: string) {
  return {
    month: status.month,
    budgeted: money(status.budgeted, currency),
    spent: money(status.spent, currency),
    remaining: money(status.remaining, currency),
  };
}
