/**
 * A sale's debt follows the sale: unpaid with a customer means an open
 * debt for the sale total; paid closes it; no customer drops it.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import {
  createUser, createCustomer, createItem, createProduct, createSale, retail, wholesale, resetCounters, TestUser,
} from './helpers/factory';
import { assertDebtState, getDebtsForSale } from './helpers/assertions';
import { saleService } from '../server/services/sale.service';
import { debtService } from '../server/services/debt.service';
import { realignAutoDebtDueDates, dueDateForSale } from '../server/services/debt-sync.service';
import type { ItemRow } from '../server/database/rows';
import type { Customer, Item } from '../shared/types';
import { MISC_DEBT_SKU } from '../shared/constants';

let user: TestUser;
let customer: Customer;
let pen: Item;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  user = await createUser();
  customer = await createCustomer({ name: 'Amina Stationers' });
  pen = await createItem({ name: 'Blue Pen', unit_price: 2500, cost_price: 1500, stock_quantity: 100 });
});

async function unpaidSale(quantity = 4, saleDate?: Date) {
  return createSale(user.actor, [retail(pen.id, quantity)], {
    customer_id: customer.id,
    is_paid: false,
    payment_method: 'credit',
    sale_date: saleDate,
  });
}

describe('Auto debt creation', () => {
  it('opens a debt for an unpaid sale with a customer', async () => {
    const sale = await unpaidSale();
    const debts = await getDebtsForSale(sale.id);

    expect(debts).toHaveLength(1);
    const [debt] = debts;
    expect(debt.origin).toBe('auto');
    expect(debt.customer_id).toBe(customer.id);
    expect(debt.item_id).toBe(pen.id);
    expect(debt.quantity).toBe(4);
    expect(debt.description).toBe(`Auto-created from sale #${sale.id}`);
    await assertDebtState(debt.id, { amount: 10000, paid_amount: 0, status: 'pending' });
  });

  it('dates the debt seven local days after the sale', async () => {
    // 22:30 UTC on 2 March is already 3 March in Dar es Salaam
    const sale = await unpaidSale(1, new Date('2026-03-02T22:30:00Z'));
    const [debt] = await getDebtsForSale(sale.id);

    expect(debt.due_date).toBe('2026-03-10');
  });

  it('opens no debt for a walk-in or a paid sale', async () => {
    const walkIn = await createSale(user.actor, [retail(pen.id, 1)], { is_paid: false });
    const paid = await createSale(user.actor, [retail(pen.id, 1)], { customer_id: customer.id });

    expect(await getDebtsForSale(walkIn.id)).toHaveLength(0);
    expect(await getDebtsForSale(paid.id)).toHaveLength(0);
  });

  it('points a wholesale-first sale at the linked item in units', async () => {
    const carton = await createProduct({
      name: 'Pen Carton',
      selling_price: 24000,
      units_per_carton: 48,
      cartons_in_stock: 5,
      create_linked_item: true,
    });
    const sale = await createSale(user.actor, [wholesale(carton.id, 2)], {
      customer_id: customer.id,
      is_paid: false,
    });

    const [debt] = await getDebtsForSale(sale.id);
    expect(debt.item_id).toBe(carton.item_id);
    expect(debt.quantity).toBe(96);
  });

  it('falls back to the miscellaneous item without a linked item', async () => {
    const carton = await createProduct({ name: 'Envelope Box', selling_price: 15000, cartons_in_stock: 5 });
    const sale = await createSale(user.actor, [wholesale(carton.id, 1)], {
      customer_id: customer.id,
      is_paid: false,
    });

    const [debt] = await getDebtsForSale(sale.id);
    const item: ItemRow | undefined = await getTestDb()('items').where({ id: debt.item_id }).first();
    expect(item?.sku).toBe(MISC_DEBT_SKU);
    expect(debt.quantity).toBe(1);
  });
});

describe('Keeping the debt in step', () => {
  it('closes the debt when the sale is marked paid', async () => {
    const sale = await unpaidSale();
    const [debt] = await getDebtsForSale(sale.id);

    await saleService.updateSale(sale.id, { is_paid: true }, user.actor);

    await assertDebtState(debt.id, { amount: 10000, paid_amount: 10000, status: 'paid' });
  });

  it('drops the auto debt when the customer is removed', async () => {
    const sale = await unpaidSale();

    await saleService.updateSale(sale.id, { customer_id: null }, user.actor);

    expect(await getDebtsForSale(sale.id)).toHaveLength(0);
  });

  it('follows the sale total as lines change', async () => {
    const sale = await unpaidSale();
    const [debt] = await getDebtsForSale(sale.id);
    const ruler = await createItem({ name: 'Ruler', unit_price: 500 });

    await saleService.addLineItem(sale.id, retail(ruler.id, 1), user.actor);
    await assertDebtState(debt.id, { amount: 10500, paid_amount: 0, status: 'pending' });

    await saleService.updateLineItem(sale.id, sale.lines[0].id, { quantity: 2 }, user.actor);
    await assertDebtState(debt.id, { amount: 5500, paid_amount: 0, status: 'pending' });
  });

  it('keeps recorded payments when the sale is saved again', async () => {
    const sale = await unpaidSale();
    const [debt] = await getDebtsForSale(sale.id);
    await debtService.recordPayment(debt.id, { amount: 4000 }, user.actor);

    await saleService.updateSale(sale.id, { notes: 'Collected at the shop' }, user.actor);
    await saleService.updateSale(sale.id, { notes: 'Collected at the shop' }, user.actor);

    await assertDebtState(debt.id, { amount: 10000, paid_amount: 4000, status: 'partial' });
  });
});

describe('Realigning due dates', () => {
  it('rewrites drifted due dates of auto debts only', async () => {
    const sale = await unpaidSale(1, new Date('2026-03-02T22:30:00Z'));
    const [autoDebt] = await getDebtsForSale(sale.id);
    const manual = await debtService.createDebt(
      { customer_id: customer.id, item_id: pen.id, due_date: '2026-04-01' },
      user.actor
    );
    await getTestDb()('debts').whereIn('id', [autoDebt.id, manual.id]).update({ due_date: '2026-03-09' });

    const result = await realignAutoDebtDueDates();

    expect(result).toEqual({ processed: 1, updated: 1 });
    const [realigned] = await getDebtsForSale(sale.id);
    expect(realigned.due_date).toBe(dueDateForSale(new Date('2026-03-02T22:30:00Z')));
    expect(realigned.due_date).toBe('2026-03-10');
    const untouched = await debtService.getDebtWithPayments(manual.id);
    expect(untouched.due_date).toBe('2026-03-09');
  });
});
