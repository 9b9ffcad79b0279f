import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { amountToString, parseAmount } from '../../src/domain/amount.js';
import { calendarDate } from '../../src/domain/date.js';
import { ParseError } from '../../src/domain/errors.js';
import { monthRange } from '../../src/domain/month.js';
import { hashPassword, verifyPassword } from '../src/auth.js';
import { openDatabase, type Db } from '../src/db.js';
import { createRepository, type Repository } from '../src/repo.js';

let db: Db;
let repo: Repository;
let userId: number;

beforeEach(() => {
  db = openDatabase(':memory:');
  repo = createRepository(db);
  userId = repo.createUser('Test User', 'test@example.com', 'unused').id;
});

afterEach(() => {
  db.close();
});

function expense(category: string, amount: string, day: number, month = 2) {
  return repo.addExpense(userId, {
    amount: parseAmount(amount),
    category,
    date: calendarDate(2024, month, day),
    note: null,
  });
}

describe('sessions', () => {
  it('expire at their deadline and can be purged', () => {
    repo.createSession('token-a', userId, 1_000);
    repo.createSession('token-b', userId, 5_000);

    expect(repo.findSessionUserId('token-a', 999)).toBe(userId);
    expect(repo.findSessionUserId('token-a', 1_000)).toBeUndefined();
    expect(repo.purgeExpiredSessions(1_000)).toBe(1);
    expect(repo.findSessionUserId('token-a', 0)).toBeUndefined();
    expect(repo.findSessionUserId('token-b', 1_000)).toBe(userId);

    repo.deleteSession('token-b');
    expect(repo.findSessionUserId('token-b', 0)).toBeUndefined();
  });
});

describe('sums and groups', () => {
  it('adds cents exactly', () => {
    for (const amount of ['0.10', '0.20', '0.30']) {
      repo.addIncome(userId, { amount: parseAmount(amount), source: 'Tips', date: calendarDate(2024, 2, 1), note: null });
    }
    expect(amountToString(repo.sumIncome(userId))).toBe('0.60');
    expect(amountToString(repo.sumExpense(userId))).toBe('0.00');
  });

  it('limits sums and groups to a date range', () => {
    expense('Rent', '800', 31, 1);
    expense('Food', '12.50', 1);
    expense('Food', '20', 29);
    expense('Travel', '20', 10);

    const feb = monthRange('2024-02');
    expect(amountToString(repo.sumExpense(userId, feb))).toBe('52.50');
    expect(repo.expenseByCategory(userId, feb).map((c) => [c.category, amountToString(c.amount)])).toEqual([
      ['Food', '32.50'],
      ['Travel', '20.00'],
    ]);
  });

  it('refuses amounts that do not fit integer cents', () => {
    expect(() => expense('Food', '90071992547409.93', 1)).toThrow(ParseError);
    expect(repo.listExpenses(userId, { limit: 10 })).toEqual([]);
  });

  it('keeps other users out', () => {
    const otherId = repo.createUser('Other', 'other@example.com', 'unused').id;
    expense('Food', '10', 1);
    expect(amountToString(repo.sumExpense(otherId))).toBe('0.00');
    expect(repo.listExpenses(otherId, { limit: 10 })).toEqual([]);
    expect(repo.deleteExpense(otherId, 1)).toBe('forbidden');
  });
});

describe('budgets', () => {
  it('one budget per month, replaced on save', () => {
    repo.setBudget(userId, '2024-02', parseAmount('300'));
    repo.setBudget(userId, '2024-02', parseAmount('350.5'));
    repo.setBudget(userId, '2024-03', parseAmount('100'));

    expect(repo.listBudgets(userId).map((b) => [b.month, amountToString(b.amount)])).toEqual([
      ['2024-03', '100.00'],
      ['2024-02', '350.50'],
    ]);
    expect(repo.getBudget(userId, '2024-04')).toBeUndefined();
  });
});

describe('passwords', () => {
  it('verifies against the stored hash', () => {
    const stored = hashPassword('test-secret');
    expect(stored).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
    expect(verifyPassword('test-secret', stored)).toBe(true);
    expect(verifyPassword('wrong', stored)).toBe(false);
    expect(verifyPassword('test-secret', 'plain')).toBe(false);
  });
});
