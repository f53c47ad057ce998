import type { Db } from '../database/connection';
import type { DebtRow, ItemRow, SaleRow } from '../database/rows';
import type { Sale } from '../../shared/types';
import { mapSale } from './mappers';
import { parseNum, round2 } from '../utils/numbers';

interface CostedLineRow {
  sale_id: number;
  quantity: number;
  cost_price: number | string;
}

/**
 * Cost of goods per sale: quantity × item cost over retail lines.
 * Wholesale lines carry no cost here.
 */
async function retailCostBySale(db: Db, saleIds: number[]): Promise<Map<number, number>> {
  const costs = new Map<number, number>();
  if (saleIds.length === 0) return costs;

  const rows: CostedLineRow[] = await db('sale_line_items')
    .join('items', 'items.id', 'sale_line_items.item_id')
    .whereIn('sale_line_items.sale_id', saleIds)
    .where('sale_line_items.line_type', 'retail')
    .select('sale_line_items.sale_id', 'sale_line_items.quantity', 'items.cost_price');

  for (const row of rows) {
    costs.set(row.sale_id, (costs.get(row.sale_id) ?? 0) + row.quantity * parseNum(row.cost_price));
  }
  return costs;
}

/**
 * Profit of a payment record: the originating sale's profit (or, for a
 * debt without a sale, amount − item cost × quantity) scaled by
 * payment / debt amount. Once the debt is gone (its sale lost the
 * customer) the whole payment counts as profit.
 */
async function paymentRecordProfit(db: Db, sale: Sale, debtId: number): Promise<number> {
  const debt: DebtRow | undefined = await db('debts').where({ id: debtId }).first();
  if (!debt) return sale.total_amount;

  const debtAmount = parseNum(debt.amount);
  if (debtAmount <= 0) return 0;
  const ratio = sale.total_amount / debtAmount;

  if (debt.sale_id !== null && debt.sale_id !== sale.id) {
    const original: SaleRow | undefined = await db('sales').where({ id: debt.sale_id }).first();
    if (original) {
      const originalProfit = await computeSaleProfit(db, mapSale(original));
      return round2(originalProfit * ratio);
    }
  }

  const item: ItemRow | undefined = await db('items').where({ id: debt.item_id }).first();
  if (item) {
    const originalProfit = debtAmount - parseNum(item.cost_price) * debt.quantity;
    return round2(originalProfit * ratio);
  }
  return 0;
}

export async function computeSaleProfit(db: Db, sale: Sale): Promise<number> {
  if (sale.origin.kind === 'payment_record') {
    return paymentRecordProfit(db, sale, sale.origin.debtId);
  }
  const costs = await retailCostBySale(db, [sale.id]);
  return round2(sale.total_amount - (costs.get(sale.id) ?? 0));
}

/** Profit for many sales at once, keyed by sale id */
export async function computeProfits(db: Db, sales: Sale[]): Promise<Map<number, number>> {
  const profits = new Map<number, number>();

  const normal = sales.filter((s) => s.origin.kind === 'normal');
  const costs = await retailCostBySale(db, normal.map((s) => s.id));
  for (const sale of normal) {
    profits.set(sale.id, round2(sale.total_amount - (costs.get(sale.id) ?? 0)));
  }

  for (const sale of sales) {
    if (sale.origin.kind === 'payment_record') {
      profits.set(sale.id, await paymentRecordProfit(db, sale, sale.origin.debtId));
    }
  }
  return profits;
}
