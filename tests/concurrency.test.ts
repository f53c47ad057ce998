/**
 * Concurrent line-item changes on one sale must serialize: stock is taken
 * once per accepted change and never goes negative.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData } from './setup';
import { createUser, createItem, createSale, retail, resetCounters, TestUser } from './helpers/factory';
import { assertItemStock, assertSaleTotalMatchesLines } from './helpers/assertions';
import { saleService } from '../server/services/sale.service';
import { InsufficientStockError } from '../server/utils/errors';

let user: TestUser;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  user = await createUser();
});

describe('Concurrent line additions', () => {
  it('applies both additions when stock allows', async () => {
    const pen = await createItem({ name: 'Blue Pen', unit_price: 500, stock_quantity: 10 });
    const sale = await createSale(user.actor, [retail(pen.id, 1)]);

    const results = await Promise.allSettled([
      saleService.addLineItem(sale.id, retail(pen.id, 2), user.actor),
      saleService.addLineItem(sale.id, retail(pen.id, 2), user.actor),
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'fulfilled']);
    await assertItemStock(pen.id, 5);
    const detail = await saleService.getSaleWithDetails(sale.id);
    expect(detail.lines).toHaveLength(1);
    expect(detail.lines[0].quantity).toBe(5);
    expect(detail.total_amount).toBe(2500);
  });

  it('lets exactly one through when stock covers only one', async () => {
    const pen = await createItem({ name: 'Blue Pen', unit_price: 500, stock_quantity: 6 });
    const sale = await createSale(user.actor, [retail(pen.id, 1)]);

    const results = await Promise.allSettled([
      saleService.addLineItem(sale.id, retail(pen.id, 3), user.actor),
      saleService.addLineItem(sale.id, retail(pen.id, 3), user.actor),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(InsufficientStockError);

    await assertItemStock(pen.id, 2);
    await assertSaleTotalMatchesLines(sale.id);
    const detail = await saleService.getSaleWithDetails(sale.id);
    expect(detail.lines[0].quantity).toBe(4);
    expect(detail.total_amount).toBe(2000);
  });

  it('keeps stock consistent across sales racing for one item', async () => {
    const pen = await createItem({ name: 'Blue Pen', unit_price: 500, stock_quantity: 10 });

    const results = await Promise.allSettled(
      Array.from({ length: 4 }, () => createSale(user.actor, [retail(pen.id, 3)]))
    );

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(3);
    await assertItemStock(pen.id, 1);
  });
});
