/**
 * API smoke tests.
 * Each test starts the app on an ephemeral port against an in-memory database.
 */
import { once } from 'events';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { openDatabase, type Db } from '../src/db.js';
import { createRepository } from '../src/repo.js';

// Tuesday 20 Feb 2024, local time
const clock = new Date(2024, 1, 20, 12);

const sessionSchema = z.object({ token: z.string() });
const idSchema = z.object({ id: z.number() });

interface ApiResponse {
  status: number;
  body: unknown;
}

let db: Db;
let server: Server;
let apiBase: string;

async function fetchJson(path: string, options: { method?: string; token?: string; body?: unknown } = {}): Promise<ApiResponse> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (options.token) headers.Authorization = `Bearer ${options.token}`;
  const response = await fetch(`${apiBase}${path}`, {
    method: options.method ?? 'GET',
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  });
  return { status: response.status, body: await response.json() };
}

async function register(name: string, email: string): Promise<string> {
  const result = await fetchJson('/auth/register', {
    method: 'POST',
    body: { name, email, password: 'test-secret' },
  });
  expect(result.status).toBe(201);
  return sessionSchema.parse(result.body).token;
}

async function post(path: string, token: string, body: unknown): Promise<ApiResponse> {
  return fetchJson(path, { method: 'POST', token, body });
}

beforeEach(async () => {
  db = openDatabase(':memory:');
  const config = loadConfig({ DATABASE_PATH: ':memory:', LOG_REQUESTS: 'false' });
  const app = createApp({ config, repo: createRepository(db), now: () => clock });

  server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  apiBase = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  db.close();
});

describe('health and errors', () => {
  it('GET /health returns ok:true', async () => {
    expect(await fetchJson('/health')).toEqual({ status: 200, body: { ok: true } });
  });

  it('unknown routes are 404', async () => {
    expect(await fetchJson('/nope')).toEqual({ status: 404, body: { error: 'Not found' } });
  });

  it('malformed JSON is a 400', async () => {
    const response = await fetch(`${apiBase}/auth/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"email":',
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Malformed JSON body' });
  });
});

describe('auth', () => {
  it('registers, normalizes the email and starts a session', async () => {
    const result = await fetchJson('/auth/register', {
      method: 'POST',
      body: { name: ' Test User ', email: ' Test@Example.com ', password: 'test-secret', confirm_password: 'test-secret' },
    });
    expect(result.status).toBe(201);
    expect(result.body).toMatchObject({
      user: { id: 1, name: 'Test User', email: 'test@example.com' },
      expires_at: new Date(clock.getTime() + 86_400_000).toISOString(),
    });
    expect(sessionSchema.parse(result.body).token).toMatch(/^[0-9a-f]{64}$/);
  });

  it('rejects duplicates, mismatched confirmation and blank fields', async () => {
    await register('Test User', 'test@example.com');

    expect(await fetchJson('/auth/register', {
      method: 'POST',
      body: { name: 'Other', email: 'TEST@example.com', password: 'test-secret' },
    })).toEqual({ status: 409, body: { error: 'A user with this email already exists.' } });

    expect(await fetchJson('/auth/register', {
      method: 'POST',
      body: { name: 'Other', email: 'other@example.com', password: 'test-secret', confirm_password: 'different' },
    })).toEqual({ status: 400, body: { error: 'Passwords do not match.' } });

    expect(await fetchJson('/auth/register', {
      method: 'POST',
      body: { name: '  ', email: 'other@example.com', password: 'test-secret' },
    })).toEqual({ status: 400, body: { error: 'Name, email and password are required.' } });
  });

  it('logs in with the right password only', async () => {
    await register('Test User', 'test@example.com');

    const bad = await fetchJson('/auth/login', {
      method: 'POST',
      body: { email: 'test@example.com', password: 'wrong' },
    });
    expect(bad).toEqual({ status: 401, body: { error: 'Invalid email or password.' } });

    const good = await fetchJson('/auth/login', {
      method: 'POST',
      body: { email: 'TEST@example.com', password: 'test-secret' },
    });
    expect(good.status).toBe(200);
    const me = await fetchJson('/auth/me', { token: sessionSchema.parse(good.body).token });
    expect(me.body).toMatchObject({ id: 1, email: 'test@example.com' });
  });

  it('logout ends the session', async () => {
    const token = await register('Test User', 'test@example.com');
    expect((await fetchJson('/auth/me', { token })).status).toBe(200);

    await fetchJson('/auth/logout', { method: 'POST', token });
    expect(await fetchJson('/auth/me', { token })).toEqual({
      status: 401,
      body: { status: 'error', error: 'Authentication required.' },
    });
  });

  it('finance routes need a token', async () => {
    expect((await fetchJson('/finance/dashboard')).status).toBe(401);
    expect((await fetchJson('/finance/dashboard', { token: 'not-a-session' })).status).toBe(401);
  });
});

describe('incomes and expenses', () => {
  let token: string;

  beforeEach(async () => {
    token = await register('Test User', 'test@example.com');
  });

  it('POST /finance/income parses amount and date text', async () => {
    const result = await post('/finance/income', token, { amount: '$1,234.56', date: '15/02/2024' });
    expect(result).toEqual({
      status: 201,
      body: {
        status: 'ok',
        income: { id: 1, user_id: 1, amount: '1234.56', source: 'Income', date: '2024-02-15', note: null },
      },
    });
  });

  it('defaults the date to today', async () => {
    const result = await post('/finance/expense', token, { amount: 20, category: 'Food ', note: 'Lunch' });
    expect(result.body).toEqual({
      status: 'ok',
      expense: { id: 1, user_id: 1, amount: '20.00', category: 'Food', date: '2024-02-20', note: 'Lunch' },
    });
  });

  it('treats a blank date as today', async () => {
    const result = await post('/finance/income', token, { amount: '10', date: '   ' });
    expect(result.status).toBe(201);
    expect(result.body).toMatchObject({ income: { date: '2024-02-20' } });
  });

  it('caps amounts at 9,999,999,999.99', async () => {
    expect(await post('/finance/expense', token, { amount: '10000000000', category: 'Big' })).toEqual({
      status: 400,
      body: { error: 'Amount must not exceed 9,999,999,999.99.' },
    });
    expect(await post('/finance/budget', token, { month: '2024-02', amount: '90071992547409.93' })).toEqual({
      status: 400,
      body: { error: 'Amount must not exceed 9,999,999,999.99.' },
    });
    const largest = await post('/finance/income', token, { amount: '9,999,999,999.99', date: '2024-02-01' });
    expect(largest.status).toBe(201);
    expect(largest.body).toMatchObject({ income: { amount: '9999999999.99' } });
  });

  it('rejects bad input with 400', async () => {
    expect(await post('/finance/expense', token, { amount: '12.5' })).toEqual({
      status: 400,
      body: { error: 'category: Category is required.' },
    });
    expect(await post('/finance/expense', token, { amount: '(5)', category: 'Food' })).toEqual({
      status: 400,
      body: { error: 'Amount must be non-negative.' },
    });
    expect(await post('/finance/expense', token, { amount: '5', category: 'Food', date: 'not-a-date' })).toEqual({
      status: 400,
      body: { error: "unrecognized date format: 'not-a-date'" },
    });
    expect((await post('/finance/income', token, { amount: 'abc' })).status).toBe(400);
    expect((await post('/finance/income', token, {})).status).toBe(400);
  });

  it('lists newest first, filtered by month and limit', async () => {
    await post('/finance/expense', token, { amount: '800', category: 'Rent', date: '2024-01-31' });
    await post('/finance/expense', token, { amount: '12.50', category: 'Food', date: '2024-02-01' });
    await post('/finance/expense', token, { amount: '20', category: 'Food', date: '2024-02-20' });

    const feb = await fetchJson('/finance/expense?month=2024-02', { token });
    expect(z.array(z.object({ date: z.string() })).parse(feb.body).map((e) => e.date))
      .toEqual(['2024-02-20', '2024-02-01']);

    const limited = await fetchJson('/finance/expense?limit=1', { token });
    expect(z.array(idSchema).parse(limited.body).map((e) => e.id)).toEqual([3]);

    expect((await fetchJson('/finance/expense?month=2024-13', { token })).status).toBe(400);
  });

  it('PUT replaces an entry', async () => {
    await post('/finance/income', token, { amount: '100', date: '2024-02-01' });
    const result = await fetchJson('/finance/income/1', {
      method: 'PUT',
      token,
      body: { amount: '2,000', source: 'Salary', date: '2024-02-01', note: 'Feb' },
    });
    expect(result).toEqual({
      status: 200,
      body: {
        status: 'ok',
        income: { id: 1, user_id: 1, amount: '2000.00', source: 'Salary', date: '2024-02-01', note: 'Feb' },
      },
    });
  });

  it('only the owner may change or delete an entry', async () => {
    const other = await register('Other User', 'other@example.com');
    const created = await post('/finance/expense', other, { amount: '5', category: 'Misc', date: '2024-02-02' });
    const { id } = z.object({ expense: idSchema }).parse(created.body).expense;

    expect(await fetchJson(`/finance/expense/${id}`, {
      method: 'PUT',
      token,
      body: { amount: '1', category: 'Mine' },
    })).toEqual({ status: 403, body: { error: 'not authorized' } });
    expect(await fetchJson(`/finance/expense/${id}`, { method: 'DELETE', token }))
      .toEqual({ status: 403, body: { error: 'not authorized' } });
    expect(await fetchJson('/finance/expense/999', { method: 'DELETE', token }))
      .toEqual({ status: 404, body: { error: 'Not found' } });
    expect((await fetchJson('/finance/expense/abc', { method: 'DELETE', token })).status).toBe(400);

    expect(await fetchJson(`/finance/expense/${id}`, { method: 'DELETE', token: other }))
      .toEqual({ status: 200, body: { deleted: true } });
    expect((await fetchJson('/finance/expense', { token: other })).body).toEqual([]);
  });
});

describe('dashboard, budgets and reports', () => {
  let token: string;

  beforeEach(async () => {
    token = await register('Test User', 'test@example.com');
    await post('/finance/income', token, { amount: '$1,234.56', date: '2024-02-15' });
    await post('/finance/expense', token, { amount: '800', category: 'Rent', date: '2024-01-31' });
    await post('/finance/expense', token, { amount: '12.50', category: 'Food', date: '2024-02-01' });
    await post('/finance/expense', token, { amount: '20', category: 'Food', date: '2024-02-20' });
  });

  it('POST /finance/budget upserts by month', async () => {
    expect(await post('/finance/budget', token, { month: '2024/2', amount: '400' })).toEqual({
      status: 200,
      body: { status: 'ok', budget: { id: 1, user_id: 1, month: '2024-02', amount: '400.00' } },
    });
    const replaced = await post('/finance/budget', token, { month: '2024-02', amount: '500' });
    expect(replaced.body).toEqual({ status: 'ok', budget: { id: 1, user_id: 1, month: '2024-02', amount: '500.00' } });

    expect(await post('/finance/budget', token, { amount: '500' })).toEqual({
      status: 400,
      body: { error: 'month: Month is required.' },
    });
  });

  it('GET /finance/budget reports spending against the current month', async () => {
    await post('/finance/budget', token, { month: '2024-02', amount: '500' });
    await post('/finance/budget', token, { month: '2024-03', amount: '450' });

    expect((await fetchJson('/finance/budget', { token })).body).toEqual({
      month: '2024-02',
      budget: { id: 1, user_id: 1, month: '2024-02', amount: '500.00' },
      status: {
        month: '2024-02',
        budgeted: { value: '500.00', display: '500.00' },
        spent: { value: '32.50', display: '32.50' },
        remaining: { value: '467.50', display: '467.50' },
      },
    });
    expect((await fetchJson('/finance/budget?month=2024-01', { token })).body)
      .toEqual({ month: '2024-01', budget: null, status: null });

    const all = await fetchJson('/finance/budgets', { token });
    expect(z.array(z.object({ month: z.string() })).parse(all.body).map((b) => b.month))
      .toEqual(['2024-03', '2024-02']);
  });

  it('GET /finance/dashboard', async () => {
    const result = await fetchJson('/finance/dashboard', { token });
    expect(result.body).toMatchObject({
      month: '2024-02',
      income: { value: '1234.56', display: '1,234.56' },
      expense: { value: '832.50', display: '832.50' },
      balance: { value: '402.06', display: '402.06' },
      categories: [
        { category: 'Rent', amount: { value: '800.00', display: '800.00' } },
        { category: 'Food', amount: { value: '32.50', display: '32.50' } },
      ],
      budget: null,
    });
    const recent = z.object({ expenses: z.array(z.object({ date: z.string() })) }).parse(result.body);
    expect(recent.expenses.map((e) => e.date)).toEqual(['2024-02-20', '2024-02-01', '2024-01-31']);
  });

  it('GET /finance/summary is all time', async () => {
    expect((await fetchJson('/finance/summary', { token })).body).toEqual({
      income: { value: '1234.56', display: '1,234.56' },
      expense: { value: '832.50', display: '832.50' },
    });
  });

  it('GET /finance/reports for one month', async () => {
    expect((await fetchJson('/finance/reports?month=2024-01', { token })).body).toEqual({
      month: '2024-01',
      summary: {
        income: { value: '0.00', display: '0.00' },
        expense: { value: '800.00', display: '800.00' },
        balance: { value: '-800.00', display: '-800.00' },
      },
      categories: [{ category: 'Rent', amount: { value: '800.00', display: '800.00' } }],
      budget: null,
    });
    expect((await fetchJson('/finance/reports?month=2024-13', { token })).status).toBe(400);
  });

  it('GET /finance/reports without a month is all time', async () => {
    const result = await fetchJson('/finance/reports', { token });
    expect(result.body).toMatchObject({ month: null, summary: { balance: { value: '402.06' } } });
  });

  it('GET /finance/trend lists the last months oldest first', async () => {
    expect((await fetchJson('/finance/trend?months=3', { token })).body).toEqual([
      {
        month: '2023-12',
        income: { value: '0.00', display: '0.00' },
        expense: { value: '0.00', display: '0.00' },
        balance: { value: '0.00', display: '0.00' },
      },
      {
        month: '2024-01',
        income: { value: '0.00', display: '0.00' },
        expense: { value: '800.00', display: '800.00' },
        balance: { value: '-800.00', display: '-800.00' },
      },
      {
        month: '2024-02',
        income: { value: '1234.56', display: '1,234.56' },
        expense: { value: '32.50', display: '32.50' },
        balance: { value: '1202.06', display: '1,202.06' },
      },
    ]);
    expect((await fetchJson('/finance/trend?months=0', { token })).status).toBe(400);
  });
});

describe('CSV export', () => {
  it('GET /finance/export.csv lists every entry oldest first', async () => {
    const token = await register('Test User', 'test@example.com');
    await post('/finance/income', token, { amount: '1234.56', date: '2024-02-15' });
    await post('/finance/expense', token, { amount: '12.5', category: 'Food', date: '2024-02-15', note: 'Lunch "team"' });
    await post('/finance/expense', token, { amount: '800', category: 'Rent', date: '2024-01-31' });

    const response = await fetch(`${apiBase}/finance/export.csv`, {
      headers: { Authorization: `Bearer ${token}` },
    });
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/csv');
    expect(response.headers.get('content-disposition')).toBe('attachment; filename="transactions.csv"');
    expect(await response.text()).toBe([
      'type,date,amount,category_or_source,note',
      'expense,2024-01-31,800.00,"Rent",""',
      'expense,2024-02-15,12.50,"Food","Lunch ""team"""',
      'income,2024-02-15,1234.56,"Income",""',
      '',
    ].join('\n'));
  });
});
