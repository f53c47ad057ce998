// =============================================================
// File: server/services/sale-details.ts
// Description: Batched lookups that decorate sales for display:
//              named line items, the products description and
//              the creator shown for each sale.
// =============================================================

import type { Db } from '../database/connection';
import type { DebtRow, ItemRow, ProductRow, SaleLineRow, UserRow } from '../database/rows';
import type { Sale, SaleLineDetail } from '../../shared/types';
import { mapSaleLine } from './mappers';
import { parseNum } from '../utils/numbers';

export interface LineInfo extends SaleLineDetail {
  /** quantity × item cost for retail lines, 0 for wholesale */
  cost: number;
}

/** Line items of the given sales with their item/product names, keyed by sale id */
export async function loadLines(db: Db, saleIds: number[]): Promise<Map<number, LineInfo[]>> {
  const bySale = new Map<number, LineInfo[]>();
  if (saleIds.length === 0) return bySale;

  const rows: SaleLineRow[] = await db('sale_line_items').whereIn('sale_id', saleIds).orderBy('id', 'asc');
  const itemIds = rows.flatMap((r) => (r.item_id === null ? [] : [r.item_id]));
  const productIds = rows.flatMap((r) => (r.product_id === null ? [] : [r.product_id]));

  const items: ItemRow[] = itemIds.length ? await db('items').whereIn('id', itemIds) : [];
  const products: ProductRow[] = productIds.length ? await db('products').whereIn('id', productIds) : [];
  const itemById = new Map(items.map((i) => [i.id, i]));
  const productById = new Map(products.map((p) => [p.id, p]));

  for (const row of rows) {
    const line = mapSaleLine(row);
    let info: LineInfo;
    if (line.target.kind === 'retail') {
      const item = itemById.get(line.target.itemId);
      info = {
        ...line,
        name: item?.name ?? 'Unknown item',
        sku: item?.sku ?? '',
        cost: item ? line.quantity * parseNum(item.cost_price) : 0,
      };
    } else {
      const product = productById.get(line.target.productId);
      info = { ...line, name: product?.name ?? 'Unknown product', sku: product?.sku ?? '', cost: 0 };
    }

    const list = bySale.get(row.sale_id);
    if (list) {
      list.push(info);
    } else {
      bySale.set(row.sale_id, [info]);
    }
  }
  return bySale;
}

function describeLines(lines: { name: string; quantity: number }[]): string {
  return lines.map((l) => `${l.name} (${l.quantity})`).join(', ');
}

async function loadDebts(db: Db, sales: Sale[]): Promise<Map<number, DebtRow>> {
  const debtIds = sales.flatMap((s) => (s.origin.kind === 'payment_record' ? [s.origin.debtId] : []));
  if (debtIds.length === 0) return new Map();
  const debts: DebtRow[] = await db('debts').whereIn('id', debtIds);
  return new Map(debts.map((d) => [d.id, d]));
}

/**
 * Products description per sale. A payment record describes the sale its
 * debt came from, or the debt's own item when that sale is gone.
 */
export async function describeProducts(
  db: Db,
  sales: Sale[],
  linesBySale?: Map<number, LineInfo[]>
): Promise<Map<number, string | null>> {
  const lines = linesBySale ?? (await loadLines(db, sales.map((s) => s.id)));
  const debts = await loadDebts(db, sales);

  const originIds = [...debts.values()].flatMap((d) => (d.sale_id === null ? [] : [d.sale_id]));
  const originLines = await loadLines(db, originIds);
  const debtItemIds = [...debts.values()].map((d) => d.item_id);
  const debtItems: ItemRow[] = debtItemIds.length ? await db('items').whereIn('id', debtItemIds) : [];
  const itemNames = new Map(debtItems.map((i) => [i.id, i.name]));

  const result = new Map<number, string | null>();
  for (const sale of sales) {
    const own = lines.get(sale.id);
    if (own && own.length > 0) {
      result.set(sale.id, describeLines(own));
      continue;
    }

    let description: string | null = null;
    if (sale.origin.kind === 'payment_record') {
      const debt = debts.get(sale.origin.debtId);
      if (debt) {
        const origin = debt.sale_id === null ? undefined : originLines.get(debt.sale_id);
        const itemName = itemNames.get(debt.item_id);
        if (origin && origin.length > 0) {
          description = describeLines(origin);
        } else if (itemName) {
          description = describeLines([{ name: itemName, quantity: debt.quantity }]);
        }
      }
    }
    result.set(sale.id, description);
  }
  return result;
}

function displayName(user: Pick<UserRow, 'full_name' | 'username'>): string {
  return user.full_name?.trim() || user.username;
}

/**
 * Who to show as a sale's creator. Payment records without a creator
 * fall back to whoever created the sale the debt came from.
 */
export async function creatorNames(db: Db, sales: Sale[]): Promise<Map<number, string | null>> {
  const debts = await loadDebts(db, sales);
  const originSaleIds = [...debts.values()].flatMap((d) => (d.sale_id === null ? [] : [d.sale_id]));
  const originCreators: { id: number; created_by: number | null }[] = originSaleIds.length
    ? await db('sales').whereIn('id', originSaleIds).select('id', 'created_by')
    : [];
  const originCreatorBySale = new Map(originCreators.map((s) => [s.id, s.created_by]));

  const userIds = new Set<number>();
  for (const sale of sales) if (sale.created_by !== null) userIds.add(sale.created_by);
  for (const creator of originCreators) if (creator.created_by !== null) userIds.add(creator.created_by);

  const users: UserRow[] = userIds.size ? await db('users').whereIn('id', [...userIds]) : [];
  const nameById = new Map(users.map((u) => [u.id, displayName(u)]));

  const result = new Map<number, string | null>();
  for (const sale of sales) {
    let name = sale.created_by === null ? undefined : nameById.get(sale.created_by);
    if (!name && sale.origin.kind === 'payment_record') {
      const debt = debts.get(sale.origin.debtId);
      const originCreator = debt && debt.sale_id !== null ? originCreatorBySale.get(debt.sale_id) : undefined;
      name = originCreator === undefined || originCreator === null ? undefined : nameById.get(originCreator);
    }
    result.set(sale.id, name ?? null);
  }
  return result;
}
