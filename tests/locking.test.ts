/**
 * Row locks: the lock reads compile to FOR UPDATE on Postgres, and every
 * line item change takes the sale row lock before any stock moves. SQLite
 * drops the clause, so the order is observed through the lock helpers.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import knex from 'knex';
import type { Db } from '../server/database/connection';
import type { LockedTable } from '../server/database/locks';
import type { SaleLineTarget } from '../shared/types';
import { cleanAllData } from './setup';
import { createUser, createItem, createSale, retail, resetCounters, TestUser } from './helpers/factory';
import { assertItemStock } from './helpers/assertions';
import { rowLockQuery, rowsLockQuery } from '../server/database/locks';
import { saleService } from '../server/services/sale.service';

const { events } = vi.hoisted(() => {
  const events: string[] = [];
  return { events };
});

vi.mock('../server/database/locks', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../server/database/locks')>();
  return {
    ...actual,
    lockRow: (db: Db, table: LockedTable, id: number) => {
      events.push(`lock ${table}`);
      return actual.lockRow(db, table, id);
    },
    lockRows: (db: Db, table: LockedTable, ids: number[]) => {
      events.push(`lock ${table}`);
      return actual.lockRows(db, table, ids);
    },
  };
});

vi.mock('../server/services/stock.service', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../server/services/stock.service')>();
  return {
    ...actual,
    takeStock: (db: Db, target: SaleLineTarget, quantity: number) => {
      events.push('take stock');
      return actual.takeStock(db, target, quantity);
    },
    returnStock: (db: Db, target: SaleLineTarget, quantity: number) => {
      events.push('return stock');
      return actual.returnStock(db, target, quantity);
    },
    returnStockForSales: (db: Db, saleIds: number[]) => {
      events.push('return stock');
      return actual.returnStockForSales(db, saleIds);
    },
  };
});

describe('Lock queries', () => {
  const pg = knex({ client: 'pg' });

  it('reads a single row for update', () => {
    const { sql, bindings } = rowLockQuery(pg, 'sales', 7).toSQL();
    expect(sql).toBe('select * from "sales" where "id" = ? limit ? for update');
    expect(bindings).toEqual([7, 1]);
  });

  it('reads a batch of rows for update', () => {
    const { sql, bindings } = rowsLockQuery(pg, 'sales', [3, 4]).toSQL();
    expect(sql).toBe('select * from "sales" where "id" in (?, ?) for update');
    expect(bindings).toEqual([3, 4]);
  });
});

describe('Sale row lock ordering', () => {
  let user: TestUser;

  beforeEach(async () => {
    await cleanAllData();
    resetCounters();
    user = await createUser();
  });

  async function penSale() {
    const pen = await createItem({ name: 'Blue Pen', unit_price: 500, stock_quantity: 10 });
    const sale = await createSale(user.actor, [retail(pen.id, 3)]);
    events.length = 0;
    return { pen, sale };
  }

  it('locks the sale before taking stock for an added line', async () => {
    const { pen, sale } = await penSale();

    await saleService.addLineItem(sale.id, retail(pen.id, 2), user.actor);

    expect(events).toEqual(['lock sales', 'take stock', 'lock items']);
    await assertItemStock(pen.id, 5);
  });

  it('locks the sale before taking stock for a raised quantity', async () => {
    const { pen, sale } = await penSale();

    await saleService.updateLineItem(sale.id, sale.lines[0].id, { quantity: 4 }, user.actor);

    expect(events).toEqual(['lock sales', 'take stock', 'lock items']);
    await assertItemStock(pen.id, 6);
  });

  it('locks the sale before returning stock for a lowered quantity', async () => {
    const { pen, sale } = await penSale();

    await saleService.updateLineItem(sale.id, sale.lines[0].id, { quantity: 1 }, user.actor);

    expect(events).toEqual(['lock sales', 'return stock', 'lock items']);
    await assertItemStock(pen.id, 9);
  });

  it('locks the sale before returning stock for a removed line', async () => {
    const { pen, sale } = await penSale();

    await saleService.removeLineItem(sale.id, sale.lines[0].id, user.actor);

    expect(events).toEqual(['lock sales', 'return stock', 'lock items']);
    await assertItemStock(pen.id, 10);
  });

  it('locks the sales before returning stock on delete', async () => {
    const { pen, sale } = await penSale();

    await saleService.deleteSales([sale.id], user.actor);

    expect(events).toEqual(['lock sales', 'return stock', 'lock items']);
    await assertItemStock(pen.id, 10);
  });
});
