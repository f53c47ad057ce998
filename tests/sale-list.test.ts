/**
 * Sales list filters, totals and the per-day summary.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { cleanAllData } from './setup';
import { createUser, createItem, createSale, retail, resetCounters, TestUser } from './helpers/factory';
import { listSales, getSalesChart } from '../server/services/sale-list.service';
import { expenditureService } from '../server/services/expenditure.service';
import type { Item } from '../shared/types';

let user: TestUser;
let pen: Item;
let notebook: Item;

// 09:00 UTC is midday in the business time zone
const MARCH_2 = new Date('2026-03-02T09:00:00Z');
const MARCH_3 = new Date('2026-03-03T09:00:00Z');

beforeAll(async () => {
  await cleanAllData();
  resetCounters();
  user = await createUser({ username: 'clerk', full_name: 'Neema Joseph' });
  pen = await createItem({ name: 'Blue Pen', unit_price: 2500, cost_price: 1500, stock_quantity: 100 });
  notebook = await createItem({ name: 'Notebook', unit_price: 3000, cost_price: 2000, stock_quantity: 100 });

  // 2 March: three paid sales, one unpaid walk-in, one expenditure
  await createSale(user.actor, [retail(pen.id, 4)], { sale_date: MARCH_2 });
  await createSale(user.actor, [retail(pen.id, 2)], { sale_date: MARCH_2 });
  await createSale(user.actor, [retail(notebook.id, 1)], { sale_date: MARCH_2 });
  await createSale(user.actor, [retail(pen.id, 1)], { sale_date: MARCH_2, is_paid: false });
  await expenditureService.createExpenditure(
    { category: 'rent', description: 'Shop rent', amount: 3000, expense_date: new Date('2026-03-02T10:00:00Z') },
    user.actor
  );

  // 3 March: one paid sale
  await createSale(user.actor, [retail(notebook.id, 2)], { sale_date: MARCH_3 });
});

describe('Sales list', () => {
  it('defaults to paid sales and nets the day expenditures from revenue', async () => {
    const result = await listSales({ start_date: '2026-03-02', end_date: '2026-03-02' });

    expect(result.total).toBe(3);
    expect(result.total_amount).toBe(18000);
    expect(result.overall_profit).toBe(7000);
    expect(result.total_expenditure).toBe(3000);
    expect(result.daily_summary).toEqual([
      {
        date: '2026-03-02',
        revenue: 15000,
        cost: 11000,
        expenditure: 3000,
        profit: 4000,
        count: 3,
        products_sold: [],
        product_quantity: 0,
      },
    ]);
    expect(result.summary_totals).toEqual({ sold: 15000, profit: 4000, product_quantity: 0 });
  });

  it('counts only matching lines under a product filter', async () => {
    const result = await listSales({ start_date: '2026-03-02', end_date: '2026-03-02', product: 'pen' });

    expect(result.total).toBe(2);
    expect(result.total_amount).toBe(15000);
    expect(result.overall_profit).toBe(6000);
    expect(result.daily_summary).toEqual([
      {
        date: '2026-03-02',
        revenue: 15000,
        cost: 9000,
        expenditure: 3000,
        profit: 6000,
        count: 2,
        products_sold: ['Blue Pen'],
        product_quantity: 6,
      },
    ]);
    expect(result.summary_totals).toEqual({ sold: 15000, profit: 6000, product_quantity: 6 });
  });

  it('filters by payment status', async () => {
    const unpaid = await listSales({ payment_status: 'unpaid' });
    expect(unpaid.total).toBe(1);
    expect(unpaid.data[0].products).toBe('Blue Pen (1)');

    const all = await listSales({ payment_status: 'all' });
    expect(all.total).toBe(5);
  });

  it('lists newest first with display fields and pages in memory', async () => {
    const result = await listSales({ page: 1, limit: 2 });

    expect(result.total).toBe(4);
    expect(result.totalPages).toBe(2);
    expect(result.data).toHaveLength(2);
    expect(result.data[0].products).toBe('Notebook (2)');
    expect(result.data[0].created_by_display).toBe('Neema Joseph');
    expect(result.data[0].customer_name).toBeNull();
    expect(result.data[0].item_count).toBe(1);
    expect(result.data[0].profit).toBe(2000);
  });

  it('caps the unfiltered summary at the latest two days', async () => {
    const result = await listSales({});
    expect(result.daily_summary.map((d) => d.date)).toEqual(['2026-03-03', '2026-03-02']);
  });
});

describe('Sales chart', () => {
  it('totals paid sales per local day, oldest first', async () => {
    const chart = await getSalesChart({ start_date: '2026-03-01', end_date: '2026-03-05' });
    expect(chart).toEqual({ labels: ['2026-03-02', '2026-03-03'], data: [18000, 6000] });
  });
});
