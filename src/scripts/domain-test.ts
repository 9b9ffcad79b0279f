import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';
import { amountToString } from '../domain/amount.js';
import { budgetStatus, categoryBreakdown, forMonth, sumAmounts, totals, totalsOf } from '../domain/computations.js';
import { calendarDate } from '../domain/date.js';
import { ParseError } from '../domain/errors.js';
import type { Budget, CategoryTotal, Expense, Income } from '../domain/types.js';

// --- Test data factories ---

function group(category: string, amount: string): CategoryTotal {
  return { category, amount: new Decimal(amount) };
}

function makeBudget(overrides: Partial<Budget> = {}): Budget {
  return {
    id: 1,
    userId: 1,
    month: '2025-01',
    amount: new Decimal('500.00'),
    ...overrides,
  };
}

function makeIncome(id: number, amount: string, year: number, month: number, day: number): Income {
  return { id, userId: 1, amount: new Decimal(amount), source: 'Salary', date: calendarDate(year, month, day), note: null };
}

function makeExpense(id: number, amount: string, year: number, month: number, day: number): Expense {
  return { id, userId: 1, amount: new Decimal(amount), category: 'Food', date: calendarDate(year, month, day), note: null };
}

function flat(groups: CategoryTotal[]): [string, string][] {
  return groups.map((g) => [g.category, amountToString(g.amount)]);
}

describe('totalsOf', () => {
  it('balance = income − expense', () => {
    const t = totalsOf(new Decimal('3000.10'), new Decimal('1200.25'));
    expect(amountToString(t.balance)).toBe('1799.85');
  });

  it('balance can go negative', () => {
    const t = totalsOf(new Decimal('100'), new Decimal('250.5'));
    expect(amountToString(t.balance)).toBe('-150.50');
  });

  it('stays exact where floats would drift', () => {
    const t = totalsOf(new Decimal('0.3'), new Decimal('0.1'));
    expect(t.balance.equals(new Decimal('0.2'))).toBe(true);
  });
});

describe('forMonth', () => {
  const expenses = [
    makeExpense(1, '10', 2025, 1, 31),
    makeExpense(2, '20', 2025, 2, 1),
    makeExpense(3, '30', 2025, 2, 28),
    makeExpense(4, '40', 2024, 2, 10),
  ];

  it('keeps records from that month only', () => {
    expect(forMonth(expenses, '2025-02').map((e) => e.id)).toEqual([2, 3]);
  });

  it('accepts the slash form', () => {
    expect(forMonth(expenses, '2025/1').map((e) => e.id)).toEqual([1]);
  });

  it('empty when nothing matches', () => {
    expect(forMonth(expenses, '2023-06')).toEqual([]);
  });

  it('rejects malformed months', () => {
    expect(() => forMonth(expenses, '2025-13')).toThrow(ParseError);
  });
});

describe('totals', () => {
  it('sums loaded records exactly', () => {
    const incomes = [makeIncome(1, '0.10', 2025, 2, 1), makeIncome(2, '0.20', 2025, 2, 2)];
    const expenses = [makeExpense(1, '0.05', 2025, 2, 3)];
    const t = totals(incomes, expenses);
    expect([t.income, t.expense, t.balance].map(amountToString)).toEqual(['0.30', '0.05', '0.25']);
  });

  it('empty lists give zero', () => {
    const t = totals([], []);
    expect(amountToString(t.balance)).toBe('0.00');
    expect(amountToString(sumAmounts([]))).toBe('0.00');
  });

  it('combines with forMonth for a monthly report', () => {
    const incomes = [makeIncome(1, '1000', 2025, 1, 15), makeIncome(2, '1200', 2025, 2, 15)];
    const expenses = [makeExpense(1, '300', 2025, 2, 3), makeExpense(2, '50', 2025, 1, 3)];
    const t = totals(forMonth(incomes, '2025-02'), forMonth(expenses, '2025-02'));
    expect(amountToString(t.balance)).toBe('900.00');
  });
});

describe('categoryBreakdown', () => {
  it('sorts by amount, largest first', () => {
    const result = categoryBreakdown([
      group('Food', '80.00'),
      group('Transport', '120.50'),
      group('Rent', '900.00'),
    ]);
    expect(flat(result)).toEqual([
      ['Rent', '900.00'],
      ['Transport', '120.50'],
      ['Food', '80.00'],
    ]);
  });

  it('folds blank categories into Uncategorized', () => {
    const result = categoryBreakdown([
      group('', '10.00'),
      group('   ', '5.25'),
      group('Food', '3.00'),
    ]);
    expect(flat(result)).toEqual([
      ['Uncategorized', '15.25'],
      ['Food', '3.00'],
    ]);
  });

  it('merges categories that differ only by surrounding spaces', () => {
    const result = categoryBreakdown([group('Food', '1.10'), group(' Food ', '2.20')]);
    expect(flat(result)).toEqual([['Food', '3.30']]);
  });

  it('breaks ties by name', () => {
    const result = categoryBreakdown([group('b', '5'), group('a', '5')]);
    expect(result.map((g) => g.category)).toEqual(['a', 'b']);
  });

  it('empty input gives an empty breakdown', () => {
    expect(categoryBreakdown([])).toEqual([]);
  });
});

describe('budgetStatus', () => {
  it('remaining = budgeted − spent', () => {
    const status = budgetStatus(makeBudget(), new Decimal('120.75'));
    expect(status.month).toBe('2025-01');
    expect(amountToString(status.budgeted)).toBe('500.00');
    expect(amountToString(status.spent)).toBe('120.75');
    expect(amountToString(status.remaining)).toBe('379.25');
  });

  it('overspent budgets go negative', () => {
    const status = budgetStatus(makeBudget({ amount: new Decimal('50') }), new Decimal('80'));
    expect(amountToString(status.remaining)).toBe('-30.00');
  });
});
