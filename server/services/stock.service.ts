// =============================================================
// File: server/services/stock.service.ts
// Description: Stock movements driven by sale line items and
//              debts. Every function runs on the caller's
//              transaction; rows are locked while checked.
// =============================================================

import type { Db } from '../database/connection';
import { lockRow } from '../database/locks';
import type { ItemRow, ProductRow, SaleLineRow } from '../database/rows';
import type { SaleLineTarget } from '../../shared/types';
import { InsufficientStockError, NotFoundError } from '../utils/errors';
import { lineTargetOf } from './mappers';

export interface StockMovement {
  name: string;
  target: SaleLineTarget;
  quantity: number;
}

async function lockItem(db: Db, itemId: number): Promise<ItemRow> {
  const item = await lockRow<ItemRow>(db, 'items', itemId);
  if (!item) throw new NotFoundError('Item not found', 'item', itemId);
  return item;
}

async function lockProduct(db: Db, productId: number): Promise<ProductRow> {
  const product = await lockRow<ProductRow>(db, 'products', productId);
  if (!product) throw new NotFoundError('Product not found', 'product', productId);
  return product;
}

/** Set the linked item's units to cartons × units per carton */
export async function syncLinkedItemStock(db: Db, productId: number): Promise<void> {
  const product: ProductRow | undefined = await db('products').where({ id: productId }).first();
  if (!product || product.item_id === null) return;
  await db('items')
    .where({ id: product.item_id })
    .update({
      stock_quantity: product.cartons_in_stock * product.units_per_carton,
      updated_at: new Date(),
    });
}

/**
 * Check and decrement. Throws InsufficientStockError, leaving stock as it
 * was, when `quantity` exceeds what is on hand.
 */
export async function takeStock(db: Db, target: SaleLineTarget, quantity: number): Promise<StockMovement> {
  if (target.kind === 'retail') {
    const item = await lockItem(db, target.itemId);
    if (quantity > item.stock_quantity) {
      throw new InsufficientStockError(item.name, 'retail', item.stock_quantity, quantity);
    }
    await db('items')
      .where({ id: item.id })
      .update({ stock_quantity: item.stock_quantity - quantity, updated_at: new Date() });
    return { name: item.name, target, quantity };
  }

  const product = await lockProduct(db, target.productId);
  if (quantity > product.cartons_in_stock) {
    throw new InsufficientStockError(product.name, 'wholesale', product.cartons_in_stock, quantity);
  }
  await db('products')
    .where({ id: product.id })
    .update({ cartons_in_stock: product.cartons_in_stock - quantity, updated_at: new Date() });
  await syncLinkedItemStock(db, product.id);
  return { name: product.name, target, quantity };
}

export async function returnStock(db: Db, target: SaleLineTarget, quantity: number): Promise<StockMovement> {
  if (target.kind === 'retail') {
    const item = await lockItem(db, target.itemId);
    await db('items')
      .where({ id: item.id })
      .update({ stock_quantity: item.stock_quantity + quantity, updated_at: new Date() });
    return { name: item.name, target, quantity };
  }

  const product = await lockProduct(db, target.productId);
  await db('products')
    .where({ id: product.id })
    .update({ cartons_in_stock: product.cartons_in_stock + quantity, updated_at: new Date() });
  await syncLinkedItemStock(db, product.id);
  return { name: product.name, target, quantity };
}

export function describeRestore(movement: StockMovement): string {
  const unit = movement.target.kind === 'wholesale' ? 'cartons' : 'units';
  return `${movement.name} (+${movement.quantity} ${unit})`;
}

/**
 * Pre-delete sweep: restore stock for every line item of the given sales,
 * one update per item/product. Must run before the sales are deleted, since
 * the cascade removes the line items without touching stock.
 */
export async function returnStockForSales(db: Db, saleIds: number[]): Promise<StockMovement[]> {
  if (saleIds.length === 0) return [];

  const lines: SaleLineRow[] = await db('sale_line_items').whereIn('sale_id', saleIds).orderBy('id', 'asc');

  const totals = new Map<string, { target: SaleLineTarget; quantity: number }>();
  for (const line of lines) {
    const target = lineTargetOf(line);
    const key = target.kind === 'retail' ? `retail:${target.itemId}` : `wholesale:${target.productId}`;
    const entry = totals.get(key);
    if (entry) {
      entry.quantity += line.quantity;
    } else {
      totals.set(key, { target, quantity: line.quantity });
    }
  }

  const movements: StockMovement[] = [];
  for (const { target, quantity } of totals.values()) {
    movements.push(await returnStock(db, target, quantity));
  }
  return movements;
}
