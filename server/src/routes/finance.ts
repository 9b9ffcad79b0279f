import { Router, type Response } from 'express';
import { z } from 'zod';
import { MAX_AMOUNT, formatAmount, parseAmount, type Amount } from '../../../src/domain/amount.js';
import { parseDate, today, type CalendarDate } from '../../../src/domain/date.js';
import { currentMonth, monthRange, normalizeMonth } from '../../../src/domain/month.js';
import { DEFAULT_INCOME_SOURCE } from '../../../src/domain/types.js';
import type { FinanceService } from '../finance.js';
import { HttpError, currentUserId, idParam, parseWith } from '../http.js';
import type { DeleteOutcome, Repository, UpdateOutcome } from '../repo.js';
import {
  money,
  serializeBudget,
  serializeBudgetStatus,
  serializeCategories,
  serializeExpense,
  serializeIncome,
  serializeTotals,
} from '../serialize.js';

const noteSchema = z.string().trim().max(255).nullish();

// amount and date stay raw: the domain parsers decide what they mean
const incomeBodySchema = z.object({
  amount: z.unknown(),
  source: z.string().trim().max(120).optional(),
  date: z.unknown(),
  note: noteSchema,
});

const expenseBodySchema = z.object({
  amount: z.unknown(),
  category: z.string({ required_error: 'Category is required.' })
    .trim()
    .min(1, 'Category is required.')
    .max(50),
  date: z.unknown(),
  note: noteSchema,
});

const budgetBodySchema = z.object({
  month: z.string({ required_error: 'Month is required.' }).trim().min(1, 'Month is required.'),
  amount: z.unknown(),
});

const listQuerySchema = z.object({
  month: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

const monthQuerySchema = z.object({
  month: z.string().trim().min(1).optional(),
});

const trendQuerySchema = z.object({
  months: z.coerce.number().int().min(1).max(36).default(6),
});

export interface FinanceRouterDeps {
  repo: Repository;
  finance: FinanceService;
  now: () => Date;
  pageSize: number;
  currency: string;
}

function nonNegativeAmount(raw: unknown): Amount {
  const amount = parseAmount(raw);
  if (amount.isNegative()) {
    throw new HttpError(400, 'Amount must be non-negative.');
  }
  if (amount.greaterThan(MAX_AMOUNT)) {
    throw new HttpError(400, `Amount must not exceed ${formatAmount(MAX_AMOUNT)}.`);
  }
  return amount;
}

function entryDate(raw: unknown, now: Date): CalendarDate {
  if (raw === undefined || raw === null) return today(now);
  if (typeof raw === 'string' && raw.trim() === '') return today(now);
  return parseDate(raw);
}

function cleanNote(note: string | null | undefined): string | null {
  return note ? note : null;
}

function sendDeleteOutcome(res: Response, outcome: DeleteOutcome): void {
  if (outcome === 'not_found') throw new HttpError(404, 'Not found');
  if (outcome === 'forbidden') throw new HttpError(403, 'not authorized');
  res.json({ deleted: true });
}

function updatedRecord<T>(outcome: UpdateOutcome<T>): T {
  if (outcome.status === 'not_found') throw new HttpError(404, 'Not found');
  if (outcome.status === 'forbidden') throw new HttpError(403, 'not authorized');
  return outcome.record;
}

export function financeRouter(deps: FinanceRouterDeps): Router {
  const { repo, finance, now, pageSize, currency } = deps;
  const router = Router();

  function listOptions(query: unknown) {
    const q = parseWith(listQuerySchema, query);
    return {
      limit: q.limit ?? pageSize,
      range: q.month ? monthRange(normalizeMonth(q.month)) : undefined,
    };
  }

  function incomeInput(body: unknown) {
    const b = parseWith(incomeBodySchema, body);
    return {
      amount: nonNegativeAmount(b.amount),
      source: b.source || DEFAULT_INCOME_SOURCE,
      date: entryDate(b.date, now()),
      note: cleanNote(b.note),
    };
  }

  function expenseInput(body: unknown) {
    const b = parseWith(expenseBodySchema, body);
    return {
      amount: nonNegativeAmount(b.amount),
      category: b.category,
      date: entryDate(b.date, now()),
      note: cleanNote(b.note),
    };
  }

  // --- Dashboard ---

  // GET /finance/dashboard
  router.get('/dashboard', (_req, res) => {
    const d = finance.dashboard(currentUserId(res));
    res.json({
      month: d.month,
      ...serializeTotals(d.totals, currency),
      incomes: d.recentIncomes.map(serializeIncome),
      expenses: d.recentExpenses.map(serializeExpense),
      categories: serializeCategories(d.categories, currency),
      budget: d.budget ? serializeBudgetStatus(d.budget, currency) : null,
    });
  });

  // --- Incomes ---

  // POST /finance/income
  router.post('/income', (req, res) => {
    const income = repo.addIncome(currentUserId(res), incomeInput(req.body));
    res.status(201).json({ status: 'ok', income: serializeIncome(income) });
  });

  // GET /finance/income?month=YYYY-MM&limit=N
  router.get('/income', (req, res) => {
    const items = repo.listIncomes(currentUserId(res), listOptions(req.query));
    res.json(items.map(serializeIncome));
  });

  // PUT /finance/income/:id
  router.put('/income/:id', (req, res) => {
    const outcome = repo.updateIncome(currentUserId(res), idParam(req), incomeInput(req.body));
    res.json({ status: 'ok', income: serializeIncome(updatedRecord(outcome)) });
  });

  // DELETE /finance/income/:id
  router.delete('/income/:id', (req, res) => {
    sendDeleteOutcome(res, repo.deleteIncome(currentUserId(res), idParam(req)));
  });

  // --- Expenses ---

  // POST /finance/expense
  router.post('/expense', (req, res) => {
    const expense = repo.addExpense(currentUserId(res), expenseInput(req.body));
    res.status(201).json({ status: 'ok', expense: serializeExpense(expense) });
  });

  // GET /finance/expense?month=YYYY-MM&limit=N
  router.get('/expense', (req, res) => {
    const items = repo.listExpenses(currentUserId(res), listOptions(req.query));
    res.json(items.map(serializeExpense));
  });

  // PUT /finance/expense/:id
  router.put('/expense/:id', (req, res) => {
    const outcome = repo.updateExpense(currentUserId(res), idParam(req), expenseInput(req.body));
    res.json({ status: 'ok', expense: serializeExpense(updatedRecord(outcome)) });
  });

  // DELETE /finance/expense/:id
  router.delete('/expense/:id', (req, res) => {
    sendDeleteOutcome(res, repo.deleteExpense(currentUserId(res), idParam(req)));
  });

  // --- Budgets ---

  // GET /finance/budget?month=YYYY-MM (defaults to the current month)
  router.get('/budget', (req, res) => {
    const q = parseWith(monthQuerySchema, req.query);
    const userId = currentUserId(res);
    const month = q.month ? normalizeMonth(q.month) : currentMonth(now());
    const budget = repo.getBudget(userId, month);
    const status = finance.monthBudgetStatus(userId, month);
    res.json({
      month,
      budget: budget ? serializeBudget(budget) : null,
      status: status ? serializeBudgetStatus(status, currency) : null,
    });
  });

  // GET /finance/budgets - Every budget, newest month first
  router.get('/budgets', (_req, res) => {
    res.json(repo.listBudgets(currentUserId(res)).map(serializeBudget));
  });

  // POST /finance/budget - Create or replace the budget for a month
  router.post('/budget', (req, res) => {
    const b = parseWith(budgetBodySchema, req.body);
    const month = normalizeMonth(b.month);
    const budget = repo.setBudget(currentUserId(res), month, nonNegativeAmount(b.amount));
    res.json({ status: 'ok', budget: serializeBudget(budget) });
  });

  // --- Summary, reports, export ---

  // GET /finance/summary - All-time income and expense, for charts
  router.get('/summary', (_req, res) => {
    const s = finance.summary(currentUserId(res));
    res.json({ income: money(s.income, currency), expense: money(s.expense, currency) });
  });

  // GET /finance/reports?month=YYYY-MM (all time when omitted)
  router.get('/reports', (req, res) => {
    const q = parseWith(monthQuerySchema, req.query);
    const month = q.month ? normalizeMonth(q.month) : null;
    const r = finance.report(currentUserId(res), month);
    res.json({
      month: r.month,
      summary: serializeTotals(r.totals, currency),
      categories: serializeCategories(r.categories, currency),
      budget: r.budget ? serializeBudgetStatus(r.budget, currency) : null,
    });
  });

  // GET /finance/trend?months=N - Per-month totals, oldest first
  router.get('/trend', (req, res) => {
    const q = parseWith(trendQuerySchema, req.query);
    const rows = finance.trend(currentUserId(res), q.months);
    res.json(rows.map((r) => ({ month: r.month, ...serializeTotals(r, currency) })));
  });

  // GET /finance/export.csv
  router.get('/export.csv', (_req, res) => {
    const csv = repo.exportTransactionsCsv(currentUserId(res));
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', 'attachment; filename="transactions.csv"');
    res.send(csv);
  });

  return router;
}
