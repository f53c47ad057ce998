/**
 * Sales and expenditure exports: CSV rows as written and PDF output.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData } from './setup';
import { createUser, createCustomer, createItem, createSale, retail, resetCounters, TestUser } from './helpers/factory';
import { expenditureService } from '../server/services/expenditure.service';
import {
  exportStamp,
  getExpenditureExportRows,
  getSalesExportRows,
  renderExpendituresCsv,
  renderExpendituresPdf,
  renderSalesCsv,
  renderSalesPdf,
} from '../server/services/report.service';
import type { SaleDetail } from '../shared/types';

let user: TestUser;
let paidSale: SaleDetail;
let walkInSale: SaleDetail;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  user = await createUser({ username: 'clerk', full_name: 'Neema Joseph' });
  const customer = await createCustomer({ name: 'Amina Stationers' });
  const pen = await createItem({ name: 'Blue Pen', unit_price: 2500, cost_price: 1500 });
  const notebook = await createItem({ name: 'Notebook', unit_price: 3000, cost_price: 2000 });

  paidSale = await createSale(user.actor, [retail(pen.id, 4)], {
    customer_id: customer.id,
    sale_date: new Date('2026-03-02T09:00:00Z'),
  });
  walkInSale = await createSale(user.actor, [retail(notebook.id, 1)], {
    is_paid: false,
    sale_date: new Date('2026-03-03T09:00:00Z'),
  });
});

describe('Sales export', () => {
  it('writes every payment state, newest first', async () => {
    const rows = await getSalesExportRows({});
    const csv = await renderSalesCsv(rows);

    expect(csv.split('\n')).toEqual([
      'Sale ID,Date,Customer,Amount,Profit,Payment Method,Status,Created By',
      `${walkInSale.id},2026-03-03 12:00,Walk-in,"3,000","1,000",Cash,Unpaid,Neema Joseph`,
      `${paidSale.id},2026-03-02 12:00,Amina Stationers,"10,000","4,000",Cash,Paid,Neema Joseph`,
    ]);
    expect(rows[1].products).toBe('Blue Pen (4)');
  });

  it('honours the date and payment filters', async () => {
    const rows = await getSalesExportRows({ start_date: '2026-03-02', end_date: '2026-03-03', payment_status: 'paid' });
    expect(rows.map((r) => r.id)).toEqual([paidSale.id]);
  });

  it('renders a PDF document', async () => {
    const pdf = await renderSalesPdf(await getSalesExportRows({}));
    expect(pdf.subarray(0, 4).toString('latin1')).toBe('%PDF');
  });
});

describe('Expenditure export', () => {
  beforeEach(async () => {
    await expenditureService.createExpenditure(
      { category: 'rent', description: 'Shop rent', amount: 3000, expense_date: new Date('2026-03-02T10:00:00Z') },
      user.actor
    );
    await expenditureService.createExpenditure(
      {
        category: 'utilities',
        description: 'Power, March',
        amount: 45000.5,
        expense_date: new Date('2026-03-04T05:30:00Z'),
      },
      user.actor
    );
  });

  it('writes amounts with two decimals and the creator username', async () => {
    const rows = await getExpenditureExportRows({});
    const csv = await renderExpendituresCsv(rows);
    const [header, first, second] = csv.split('\n');

    expect(header).toBe('ID,Category,Description,Date,Amount,Created By');
    expect(first).toBe(`${rows[0].id},Utilities,"Power, March",2026-03-04 08:30,45000.50,clerk`);
    expect(second).toBe(`${rows[1].id},Rent,Shop rent,2026-03-02 13:00,3000.00,clerk`);
  });

  it('filters by category', async () => {
    const rows = await getExpenditureExportRows({ category: 'rent' });
    expect(rows.map((r) => r.description)).toEqual(['Shop rent']);
  });

  it('renders a PDF document', async () => {
    const pdf = await renderExpendituresPdf(await getExpenditureExportRows({}));
    expect(pdf.subarray(0, 4).toString('latin1')).toBe('%PDF');
  });
});

describe('exportStamp', () => {
  it('uses the local calendar date', () => {
    expect(exportStamp(new Date('2026-03-02T22:30:00Z'))).toBe('2026-03-03');
  });
});
