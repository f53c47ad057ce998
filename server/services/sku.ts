// SKU format: CAT-NAM-YY-SEQ, e.g. PEN-BLU-26-003
//   CAT  first three alphanumerics of the category name (GEN without one)
//   NAM  first three alphanumerics of the item/product name
//   YY   two-digit year, business time zone
//   SEQ  rows created in the same table today + 1
// A numeric suffix (-1, -2, ...) is appended until the SKU is unused.

import type { Db } from '../database/connection';
import { localDateRange, toLocalDateString } from '../utils/formatters';
import { parseIntSafe } from '../utils/numbers';

export type SkuTable = 'items' | 'products';

function abbreviate(value: string): string {
  return value.replace(/[^A-Za-z0-9]/g, '').slice(0, 3).toUpperCase();
}

export function skuBase(categoryName: string | null, name: string, sequence: number, now: Date): string {
  const categoryAbbr = categoryName ? abbreviate(categoryName) || 'GEN' : 'GEN';
  const nameAbbr = abbreviate(name) || 'ITM';
  const year = toLocalDateString(now).slice(2, 4);
  return `${categoryAbbr}-${nameAbbr}-${year}-${String(sequence).padStart(3, '0')}`;
}

export async function isSkuTaken(db: Db, table: SkuTable, sku: string, excludeId?: number): Promise<boolean> {
  const query = db(table).where({ sku });
  if (excludeId !== undefined) query.whereNot({ id: excludeId });
  const row: { id: number } | undefined = await query.first('id');
  return row !== undefined;
}

export async function generateSku(
  db: Db,
  table: SkuTable,
  input: { categoryId: number | null; name: string },
  now: Date = new Date()
): Promise<string> {
  let categoryName: string | null = null;
  if (input.categoryId !== null) {
    const category: { name: string } | undefined = await db('categories')
      .where({ id: input.categoryId })
      .first('name');
    categoryName = category?.name ?? null;
  }

  const today = toLocalDateString(now);
  const { start, end } = localDateRange(today, today);
  const countRow: { total: number | string } | undefined = await db(table)
    .where('created_at', '>=', start)
    .andWhere('created_at', '<', end)
    .count<{ total: number | string }[]>('id as total')
    .first();

  const base = skuBase(categoryName, input.name, parseIntSafe(countRow?.total) + 1, now);

  let sku = base;
  let counter = 1;
  while (await isSkuTaken(db, table, sku)) {
    sku = `${base}-${counter}`;
    counter += 1;
  }
  return sku;
}
