/**
 * HTTP surface: authentication, the response envelope and error mapping,
 * driven through Fastify's inject.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { cleanAllData } from './setup';
import { createCustomer, createItem, resetCounters } from './helpers/factory';
import { buildServer } from '../server/app';
import { NotificationService } from '../server/services/notification.service';
import type { MessageGateway } from '../server/services/messaging/gateway';
import type { SendResult } from '../shared/types';

const rejectingGateway = (channel: 'sms' | 'whatsapp'): MessageGateway => ({
  channel,
  send: async (): Promise<SendResult> => ({ success: false, error: 'Rejected by network' }),
});

let server: FastifyInstance;
let token: string;

beforeAll(async () => {
  server = await buildServer({
    notificationService: new NotificationService({ sms: rejectingGateway('sms'), whatsapp: rejectingGateway('whatsapp') }),
  });
  await server.ready();
});

afterAll(async () => {
  await server.close();
});

beforeEach(async () => {
  await cleanAllData();
  resetCounters();

  const registered = await server.inject({
    method: 'POST',
    url: '/api/auth/register',
    payload: { username: 'clerk', password: 'test-secret', full_name: 'Neema Joseph' },
  });
  expect(registered.statusCode).toBe(201);

  const login = await server.inject({
    method: 'POST',
    url: '/api/auth/login',
    payload: { username: 'clerk', password: 'test-secret' },
  });
  token = login.json<{ data: { token: string } }>().data.token;
});

function authed(method: 'GET' | 'POST' | 'PATCH' | 'DELETE', url: string, payload?: object) {
  return server.inject({ method, url, payload, headers: { authorization: `Bearer ${token}` } });
}

describe('Auth', () => {
  it('returns the signed-in user without the password hash', async () => {
    const res = await authed('GET', '/api/auth/me');
    expect(res.statusCode).toBe(200);
    const body = res.json<{ success: boolean; data: Record<string, unknown> }>();
    expect(body.success).toBe(true);
    expect(body.data.username).toBe('clerk');
    expect(body.data.full_name).toBe('Neema Joseph');
    expect(body.data).not.toHaveProperty('password_hash');
  });

  it('rejects a taken username and a wrong password', async () => {
    const again = await server.inject({
      method: 'POST',
      url: '/api/auth/register',
      payload: { username: 'clerk', password: 'test-secret' },
    });
    expect(again.statusCode).toBe(409);
    expect(again.json()).toEqual({ success: false, error: 'Username "clerk" is already taken', type: 'ConflictError' });

    const wrong = await server.inject({
      method: 'POST',
      url: '/api/auth/login',
      payload: { username: 'clerk', password: 'not-the-password' },
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toEqual({ success: false, error: 'Invalid username or password', type: 'UnauthorizedError' });
  });

  it('guards routes behind a bearer token', async () => {
    const missing = await server.inject({ method: 'GET', url: '/api/sales' });
    expect(missing.statusCode).toBe(401);
    expect(missing.json()).toEqual({ success: false, error: 'Authentication required' });

    const forged = await server.inject({
      method: 'GET',
      url: '/api/sales',
      headers: { authorization: 'Bearer not-a-token' },
    });
    expect(forged.statusCode).toBe(401);
    expect(forged.json()).toEqual({ success: false, error: 'Invalid or expired token' });
  });
});

describe('Errors', () => {
  it('answers schema failures with the issues', async () => {
    const res = await authed('POST', '/api/sales', { lines: [] });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      success: false,
      error: 'Validation failed',
      type: 'ValidationError',
      details: [{ path: 'lines', message: 'A sale needs at least one line item' }],
    });
  });

  it('rejects a due date that is not on the calendar', async () => {
    const customer = await createCustomer({ name: 'Asha' });
    const pen = await createItem({ name: 'Blue Pen' });
    const res = await authed('POST', '/api/debts', {
      customer_id: customer.id,
      item_id: pen.id,
      due_date: '2026-02-31',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      success: false,
      error: 'Validation failed',
      type: 'ValidationError',
      details: [{ path: 'due_date', message: 'Expected a date in YYYY-MM-DD format' }],
    });

    const list = await authed('GET', '/api/debts');
    expect(list.json<{ data: unknown[] }>().data).toEqual([]);
  });

  it('answers a stock shortfall with 409 and the counts', async () => {
    const glue = await createItem({ name: 'Glue Stick', stock_quantity: 3 });
    const res = await authed('POST', '/api/sales', { lines: [{ type: 'retail', item_id: glue.id, quantity: 5 }] });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      success: false,
      error: 'Insufficient stock for Glue Stick. Available: 3, Requested: 5',
      type: 'InsufficientStockError',
      details: { itemName: 'Glue Stick', itemKind: 'retail', available: 3, requested: 5 },
    });
  });

  it('names the missing resource', async () => {
    const res = await authed('GET', '/api/sales/999999');
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      success: false,
      error: 'Sale not found',
      type: 'NotFoundError',
      details: { resourceType: 'sale', resourceId: 999999 },
    });
  });

  it('rejects malformed JSON', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/sales',
      payload: '{"lines": [',
      headers: { authorization: `Bearer ${token}`, 'content-type': 'application/json' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ success: false, error: 'Request body is not valid JSON', type: 'ValidationError' });
  });

  it('answers unknown routes with 404', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/nowhere' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ success: false, error: 'Route GET /api/nowhere not found' });
  });
});

describe('Sales over HTTP', () => {
  it('creates a sale and reads it back', async () => {
    const pen = await createItem({ name: 'Blue Pen', unit_price: 500, cost_price: 300, stock_quantity: 10 });
    const created = await authed('POST', '/api/sales', {
      lines: [{ type: 'retail', item_id: pen.id, quantity: 3 }],
    });
    expect(created.statusCode).toBe(201);
    const saleId = created.json<{ data: { id: number } }>().data.id;

    const fetched = await authed('GET', `/api/sales/${saleId}`);
    const sale = fetched.json<{ data: { total_amount: number; profit: number; products: string } }>().data;
    expect(sale.total_amount).toBe(1500);
    expect(sale.profit).toBe(600);
    expect(sale.products).toBe('Blue Pen (3)');
  });
});

describe('Reminders over HTTP', () => {
  it('answers a failed send with 502', async () => {
    const customer = await createCustomer({ name: 'Asha' });
    const pen = await createItem({ name: 'Blue Pen' });
    const debt = await authed('POST', '/api/debts', {
      customer_id: customer.id,
      item_id: pen.id,
      due_date: '2099-12-31',
    });
    expect(debt.statusCode).toBe(201);
    const debtId = debt.json<{ data: { id: number } }>().data.id;

    const res = await authed('POST', `/api/notifications/debts/${debtId}/sms`);
    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      success: false,
      error: 'Rejected by network',
      data: { success: false, error: 'Rejected by network' },
    });
  });
});

describe('Exports over HTTP', () => {
  it('sends the sales CSV as an attachment', async () => {
    const res = await authed('GET', '/api/reports/sales.csv');
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toMatch(/^attachment; filename="sales-\d{4}-\d{2}-\d{2}\.csv"$/);
    expect(res.body.split('\n')[0]).toBe('Sale ID,Date,Customer,Amount,Profit,Payment Method,Status,Created By');
  });
});

describe('Health', () => {
  it('reports the database connection', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/health/db' });
    expect(res.json()).toEqual({ status: 'ok', database: 'connected' });
  });
});
