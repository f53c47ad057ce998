/**
 * Debt payments: each one writes a payment row and a payment-record sale
 * in the same transaction; deleting that sale reverses the payment.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import {
  createUser, createCustomer, createItem, createSale, retail, resetCounters, TestUser,
} from './helpers/factory';
import { assertDebtState, assertItemStock, getDebtsForSale } from './helpers/assertions';
import { debtService } from '../server/services/debt.service';
import { saleService } from '../server/services/sale.service';
import { ValidationError } from '../server/utils/errors';
import type { DebtRow, PaymentRow } from '../server/database/rows';
import type { Customer, Item, SaleDetail } from '../shared/types';

let user: TestUser;
let customer: Customer;
let pen: Item;
let sale: SaleDetail;
let debt: DebtRow;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  user = await createUser();
  customer = await createCustomer({ name: 'Amina Stationers' });
  pen = await createItem({ name: 'Blue Pen', unit_price: 2500, cost_price: 1500, stock_quantity: 100 });
  sale = await createSale(user.actor, [retail(pen.id, 4)], { customer_id: customer.id, is_paid: false });
  [debt] = await getDebtsForSale(sale.id);
});

async function countRows(table: string): Promise<number> {
  const row = await getTestDb()(table).count('id as total').first();
  return Number(row?.total);
}

describe('Recording a payment', () => {
  it('moves the debt and writes a payment-record sale', async () => {
    const result = await debtService.recordPayment(debt.id, { amount: 4000, notes: 'First instalment' }, user.actor);

    expect(result.debt.paid_amount).toBe(4000);
    expect(result.debt.remaining_amount).toBe(6000);
    expect(result.debt.status).toBe('partial');

    expect(result.sale.origin).toEqual({ kind: 'payment_record', debtId: debt.id });
    expect(result.sale.total_amount).toBe(4000);
    expect(result.sale.is_paid).toBe(true);
    expect(result.sale.customer_id).toBe(customer.id);
    expect(result.sale.notes).toBe(
      `Payment for Debt #${debt.id}: Blue Pen (Qty: 4) - Total: TZS 10,000 - Auto-created from sale #${sale.id}` +
        ' | First instalment'
    );

    expect(result.payment.sale_id).toBe(result.sale.id);
    expect(result.payment.amount).toBe(4000);
    expect(result.payment.payment_method).toBe('cash');
  });

  it('marks the debt paid when the remainder is settled', async () => {
    await debtService.recordPayment(debt.id, { amount: 4000 }, user.actor);
    const result = await debtService.recordPayment(debt.id, { amount: 6000, payment_method: 'bank_transfer' }, user.actor);

    expect(result.debt.status).toBe('paid');
    expect(result.debt.remaining_amount).toBe(0);

    const detail = await debtService.getDebtWithPayments(debt.id);
    expect(detail.payments.map((p) => p.amount)).toEqual([6000, 4000]);
  });

  it('refuses more than the remaining amount and writes nothing', async () => {
    await debtService.recordPayment(debt.id, { amount: 4000 }, user.actor);

    await expect(debtService.recordPayment(debt.id, { amount: 6000.01 }, user.actor)).rejects.toThrow(
      'Payment amount cannot exceed the remaining debt amount of TZS 6,000'
    );

    await assertDebtState(debt.id, { amount: 10000, paid_amount: 4000, status: 'partial' });
    expect(await countRows('payments')).toBe(1);
    expect(await countRows('sales')).toBe(2);
  });

  it('refuses a zero payment', async () => {
    await expect(debtService.recordPayment(debt.id, { amount: 0 }, user.actor)).rejects.toThrow(ValidationError);
  });

  it('leaves the original sale total alone', async () => {
    await debtService.recordPayment(debt.id, { amount: 2500 }, user.actor);

    const original = await saleService.getSaleWithDetails(sale.id);
    expect(original.total_amount).toBe(10000);
    expect(original.is_paid).toBe(false);
  });
});

describe('Payment-record sales', () => {
  it('cannot take line items or change customer or paid state', async () => {
    const { sale: record } = await debtService.recordPayment(debt.id, { amount: 4000 }, user.actor);
    const other = await createCustomer({ name: 'Other Shop' });

    await expect(saleService.addLineItem(record.id, retail(pen.id, 1), user.actor)).rejects.toThrow(
      'Payment records cannot have line items'
    );
    await expect(saleService.updateSale(record.id, { customer_id: other.id }, user.actor)).rejects.toThrow(
      'The customer of a payment record cannot be changed'
    );
    await expect(saleService.updateSale(record.id, { is_paid: false }, user.actor)).rejects.toThrow(
      'A payment record is always paid'
    );
  });

  it('describes the products of the sale the debt came from', async () => {
    const { sale: record } = await debtService.recordPayment(debt.id, { amount: 4000 }, user.actor);

    const detail = await saleService.getSaleWithDetails(record.id);
    expect(detail.lines).toHaveLength(0);
    expect(detail.products).toBe('Blue Pen (4)');
  });

  it('reverses the payment and returns the debt item when deleted', async () => {
    const { sale: record, payment } = await debtService.recordPayment(debt.id, { amount: 4000 }, user.actor);
    await assertItemStock(pen.id, 96);

    const result = await saleService.deleteSale(record.id, user.actor);

    expect(result).toEqual({ deleted: 1, restored: ['Blue Pen (+4 units)'] });
    await assertDebtState(debt.id, { amount: 10000, paid_amount: 0, status: 'pending' });
    await assertItemStock(pen.id, 100);

    const kept: PaymentRow | undefined = await getTestDb()('payments').where({ id: payment.id }).first();
    expect(kept?.sale_id).toBeNull();
  });
});

describe('Manual debts', () => {
  it('takes the item from stock and prices it at the item price', async () => {
    const created = await debtService.createDebt(
      { customer_id: customer.id, item_id: pen.id, quantity: 2, due_date: '2099-12-31', description: 'Taken on credit' },
      user.actor
    );

    expect(created.origin).toBe('manual');
    expect(created.amount).toBe(5000);
    expect(created.status).toBe('pending');
    expect(created.display_status).toBe('pending');
    expect(created.customer.name).toBe('Amina Stationers');
    expect(created.item.name).toBe('Blue Pen');
    await assertItemStock(pen.id, 94);
  });

  it('refuses a quantity beyond stock', async () => {
    await expect(
      debtService.createDebt({ customer_id: customer.id, item_id: pen.id, quantity: 97, due_date: '2099-12-31' }, user.actor)
    ).rejects.toThrow('Insufficient stock for Blue Pen. Available: 96, Requested: 97');
  });

  it('lists overdue debts by computed status', async () => {
    const late = await debtService.createDebt(
      { customer_id: customer.id, item_id: pen.id, amount: 1200, due_date: '2000-01-01' },
      user.actor
    );
    expect(late.display_status).toBe('overdue');
    expect(late.is_overdue).toBe(true);

    const overdue = await debtService.listDebts({ status: 'overdue' });
    expect(overdue.data.map((d) => d.id)).toEqual([late.id]);
    expect(overdue.totals).toEqual({ total_amount: 1200, total_paid: 0, total_remaining: 1200 });

    const pending = await debtService.listDebts({ status: 'pending' });
    expect(pending.total).toBe(2);
  });

  it('searches by customer name or description', async () => {
    const other = await createCustomer({ name: 'Baraka Books' });
    await debtService.createDebt(
      { customer_id: other.id, item_id: pen.id, due_date: '2099-12-31', description: 'School order' },
      user.actor
    );

    const byName = await debtService.listDebts({ search: 'baraka' });
    expect(byName.data.map((d) => d.customer.name)).toEqual(['Baraka Books']);

    const byDescription = await debtService.listDebts({ search: 'school' });
    expect(byDescription.total).toBe(1);

    const scoped = await debtService.listDebts({ customer_id: customer.id, search: 'Baraka' });
    expect(scoped.total).toBe(0);
  });
});
