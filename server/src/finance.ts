/**
 * Finance service: dashboards and reports built from repository sums.
 * Route handlers stay focused on HTTP; the arithmetic lives in the domain.
 */
import type { Amount } from '../../src/domain/amount.js';
import { budgetStatus, categoryBreakdown, totalsOf } from '../../src/domain/computations.js';
import { currentMonth, lastNMonths, monthRange, type Month } from '../../src/domain/month.js';
import type { BudgetStatus, CategoryTotal, Expense, Income, Totals } from '../../src/domain/types.js';
import type { Repository } from './repo.js';

export interface Dashboard {
  month: Month;
  totals: Totals;
  recentIncomes: Income[];
  recentExpenses: Expense[];
  categories: CategoryTotal[];
  budget: BudgetStatus | null;
}

export interface Report {
  month: Month | null;         // null = all time
  totals: Totals;
  categories: CategoryTotal[];
  budget: BudgetStatus | null;
}

export interface MonthTotals extends Totals {
  month: Month;
}

export interface FinanceOptions {
  now: () => Date;
  recentLimit?: number;
}

export function createFinanceService(repo: Repository, options: FinanceOptions) {
  const recentLimit = options.recentLimit ?? 5;

  function spentIn(userId: number, month: Month): Amount {
    return repo.sumExpense(userId, monthRange(month));
  }

  function monthBudgetStatus(userId: number, month: Month): BudgetStatus | null {
    const budget = repo.getBudget(userId, month);
    return budget ? budgetStatus(budget, spentIn(userId, month)) : null;
  }

  return {
    monthBudgetStatus,

    /** All-time totals, latest entries, spending by category, this month's budget */
    dashboard(userId: number): Dashboard {
      const month = currentMonth(options.now());
      return {
        month,
        totals: totalsOf(repo.sumIncome(userId), repo.sumExpense(userId)),
        recentIncomes: repo.listIncomes(userId, { limit: recentLimit }),
        recentExpenses: repo.listExpenses(userId, { limit: recentLimit }),
        categories: categoryBreakdown(repo.expenseByCategory(userId)),
        budget: monthBudgetStatus(userId, month),
      };
    },

    /** Totals and category breakdown for one month, or all time */
    report(userId: number, month: Month | null): Report {
      const range = month ? monthRange(month) : undefined;
      return {
        month,
        totals: totalsOf(repo.sumIncome(userId, range), repo.sumExpense(userId, range)),
        categories: categoryBreakdown(repo.expenseByCategory(userId, range)),
        budget: month ? monthBudgetStatus(userId, month) : null,
      };
    },

    /** Income and expense per month for the last `count` months, oldest first */
    trend(userId: number, count: number): MonthTotals[] {
      return lastNMonths(count, options.now()).map((month) => {
        const range = monthRange(month);
        return { month, ...totalsOf(repo.sumIncome(userId, range), repo.sumExpense(userId, range)) };
      });
    },

    summary(userId: number): { income: Amount; expense: Amount } {
      return { income: repo.sumIncome(userId), expense: repo.sumExpense(userId) };
    },
  };
}

export type FinanceService = ReturnType<typeof createFinanceService>;
