// =============================================================
// File: server/services/debt-sync.service.ts
// Description: Keeps the debt linked to a sale in step with the
//              sale's customer, total and paid flag.
//
//   no customer / total <= 0  -> drop the sale's auto debts
//   paid                      -> payment records: untouched
//                                otherwise: debt fully paid
//   unpaid with customer      -> create or refresh the debt
//
// Re-running for an unchanged sale never touches paid_amount.
// =============================================================

import { getDb, Db } from '../database/connection';
import { env } from '../config/env';
import type { DebtRow, ProductRow, SaleLineRow, SaleRow } from '../database/rows';
import { computeDebtStatus, mapSale } from './mappers';
import { itemService } from './item.service';
import { NotFoundError } from '../utils/errors';
import { addDays, toLocalDateString } from '../utils/formatters';
import { parseNum } from '../utils/numbers';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('debt-sync');

export type DebtSyncOutcome =
  | { action: 'none' }
  | { action: 'removed'; debtIds: number[] }
  | { action: 'marked_paid'; debtId: number }
  | { action: 'created'; debtId: number }
  | { action: 'updated'; debtId: number };

export function autoDebtDescription(saleId: number): string {
  return `Auto-created from sale #${saleId}`;
}

/** Due date for a sale's debt: local calendar date of the sale + DEBT_DUE_DAYS */
export function dueDateForSale(saleDate: Date): string {
  return addDays(toLocalDateString(saleDate), env.DEBT_DUE_DAYS);
}

/** Item and quantity a sale's debt points at: the first line, else the sentinel */
async function debtItemForSale(db: Db, saleId: number): Promise<{ itemId: number; quantity: number }> {
  const firstLine: SaleLineRow | undefined = await db('sale_line_items')
    .where({ sale_id: saleId })
    .orderBy('id', 'asc')
    .first();

  if (firstLine) {
    if (firstLine.line_type === 'retail' && firstLine.item_id !== null) {
      return { itemId: firstLine.item_id, quantity: firstLine.quantity };
    }
    if (firstLine.product_id !== null) {
      const product: ProductRow | undefined = await db('products').where({ id: firstLine.product_id }).first();
      if (product && product.item_id !== null) {
        return { itemId: product.item_id, quantity: firstLine.quantity * product.units_per_carton };
      }
    }
  }

  const misc = await itemService.getOrCreateMiscDebtItem(db);
  return { itemId: misc.id, quantity: 1 };
}

export async function syncDebtForSale(db: Db, saleId: number): Promise<DebtSyncOutcome> {
  const row: SaleRow | undefined = await db('sales').where({ id: saleId }).first();
  if (!row) throw new NotFoundError('Sale not found', 'sale', saleId);
  const sale = mapSale(row);

  if (sale.customer_id === null || sale.total_amount <= 0) {
    const autoDebts: Pick<DebtRow, 'id'>[] = await db('debts')
      .where({ sale_id: sale.id, origin: 'auto' })
      .select('id');
    if (autoDebts.length === 0) return { action: 'none' };

    const debtIds = autoDebts.map((d) => d.id);
    await db('debts').whereIn('id', debtIds).del();
    log.info({ saleId: sale.id, debtIds }, 'Auto debt removed');
    return { action: 'removed', debtIds };
  }

  const linked: DebtRow | undefined = await db('debts').where({ sale_id: sale.id }).orderBy('id', 'asc').first();

  if (sale.is_paid) {
    // Payment records move their debt through the payment workflow
    if (sale.origin.kind === 'payment_record' || !linked) return { action: 'none' };

    await db('debts')
      .where({ id: linked.id })
      .update({ paid_amount: linked.amount, status: 'paid', updated_at: new Date() });
    return { action: 'marked_paid', debtId: linked.id };
  }

  if (!linked) {
    const { itemId, quantity } = await debtItemForSale(db, sale.id);
    const now = new Date();
    const [created]: DebtRow[] = await db('debts')
      .insert({
        customer_id: sale.customer_id,
        sale_id: sale.id,
        item_id: itemId,
        quantity,
        amount: sale.total_amount,
        paid_amount: 0,
        due_date: dueDateForSale(sale.sale_date),
        status: 'pending',
        origin: 'auto',
        description: autoDebtDescription(sale.id),
        created_by: sale.created_by,
        created_at: now,
        updated_at: now,
      })
      .returning('*');
    log.info({ saleId: sale.id, debtId: created.id, amount: sale.total_amount }, 'Auto debt created');
    return { action: 'created', debtId: created.id };
  }

  const changes: Partial<DebtRow> & { updated_at: Date } = {
    customer_id: sale.customer_id,
    amount: sale.total_amount,
    status: computeDebtStatus(sale.total_amount, parseNum(linked.paid_amount)),
    updated_at: new Date(),
  };
  if (linked.origin === 'auto') {
    changes.due_date = dueDateForSale(sale.sale_date);
  }
  await db('debts').where({ id: linked.id }).update(changes);
  return { action: 'updated', debtId: linked.id };
}

/**
 * Realign every auto debt's due date with its sale's local date.
 */
export async function realignAutoDebtDueDates(): Promise<{ processed: number; updated: number }> {
  const db = getDb();
  let processed = 0;
  let updated = 0;

  await db.transaction(async (trx) => {
    const debts: DebtRow[] = await trx('debts').where({ origin: 'auto' }).whereNotNull('sale_id');
    for (const debt of debts) {
      processed += 1;
      const sale: SaleRow | undefined = await trx('sales').where({ id: debt.sale_id }).first();
      if (!sale) continue;

      const expected = dueDateForSale(mapSale(sale).sale_date);
      if (expected !== debt.due_date) {
        await trx('debts').where({ id: debt.id }).update({ due_date: expected, updated_at: new Date() });
        updated += 1;
      }
    }
  });

  log.info({ processed, updated }, 'Auto debt due dates realigned');
  return { processed, updated };
}
