/**
 * Categories, items and products: SKUs, restocking, linked items and
 * the guards around deleting stock records.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import { createUser, createCustomer, createItem, createProduct, createSale, retail, resetCounters } from './helpers/factory';
import { assertItemStock, assertLinkedItemMirrors } from './helpers/assertions';
import { categoryService } from '../server/services/category.service';
import { itemService } from '../server/services/item.service';
import { productService } from '../server/services/product.service';
import { debtService } from '../server/services/debt.service';
import { generateSku, skuBase } from '../server/services/sku';
import { ConflictError, ValidationError } from '../server/utils/errors';
import { MISC_DEBT_SKU } from '../shared/constants';
import defaultCategories from '../server/database/seeds/default-categories.json';

const MARCH_2 = new Date('2026-03-02T09:00:00Z');

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
});

describe('SKU generation', () => {
  it('builds category, name, year and sequence parts', () => {
    expect(skuBase('Pens', 'Blue Pen', 3, MARCH_2)).toBe('PEN-BLU-26-003');
    expect(skuBase('Erasers & Correctors', 'A4 Paper', 12, MARCH_2)).toBe('ERA-A4P-26-012');
    expect(skuBase(null, 'Ruler', 1, MARCH_2)).toBe('GEN-RUL-26-001');
  });

  it('appends a suffix until the SKU is free', async () => {
    const pens = await categoryService.createCategory({ name: 'Pens' });
    await createItem({ name: 'Blue Pen', sku: 'PEN-BLU-26-001' });
    await createItem({ name: 'Blue Pen Fine', sku: 'PEN-BLU-26-001-1' });

    // Both items were created today, not on 2 March, so the day count is zero
    const sku = await generateSku(getTestDb(), 'items', { categoryId: pens.id, name: 'Blue Pen' }, MARCH_2);
    expect(sku).toBe('PEN-BLU-26-001-2');
  });

  it('refuses a duplicate SKU', async () => {
    await createItem({ name: 'Blue Pen', sku: 'PEN-1' });
    await expect(createItem({ name: 'Other Pen', sku: 'PEN-1' })).rejects.toThrow(
      'An item with SKU "PEN-1" already exists'
    );
  });

  it('keeps the SKU when an update clears it', async () => {
    const item = await createItem({ name: 'Blue Pen', sku: 'PEN-1' });
    const updated = await itemService.updateItem(item.id, { sku: null, unit_price: 600 });
    expect(updated.sku).toBe('PEN-1');
    expect(updated.unit_price).toBe(600);
  });
});

describe('Categories', () => {
  it('seeds the default categories once', async () => {
    const first = await categoryService.ensureDefaultCategories();
    expect(first.created).toHaveLength(defaultCategories.length);
    expect(first.existing).toHaveLength(0);

    const second = await categoryService.ensureDefaultCategories();
    expect(second.created).toHaveLength(0);
    expect(second.existing).toHaveLength(defaultCategories.length);
  });

  it('refuses a duplicate name', async () => {
    await categoryService.createCategory({ name: 'Pens' });
    await expect(categoryService.createCategory({ name: ' Pens ' })).rejects.toThrow(ValidationError);
  });
});

describe('Items', () => {
  it('restocks by whole units', async () => {
    const item = await createItem({ stock_quantity: 4 });
    const restocked = await itemService.restockItem(item.id, 6);
    expect(restocked.stock_quantity).toBe(10);
    await expect(itemService.restockItem(item.id, 0)).rejects.toThrow(ValidationError);
  });

  it('lists low stock without the miscellaneous item', async () => {
    await itemService.getOrCreateMiscDebtItem();
    const low = await createItem({ name: 'Stapler', stock_quantity: 3, minimum_stock: 5 });
    await createItem({ name: 'Glue', stock_quantity: 50, minimum_stock: 5 });

    const items = await itemService.listLowStockItems();
    expect(items.map((i) => i.id)).toEqual([low.id]);
    expect(items[0].is_low_stock).toBe(true);
  });

  it('refuses to delete an item still referenced', async () => {
    const { actor } = await createUser();
    const pen = await createItem({ name: 'Blue Pen' });
    const customer = await createCustomer();
    await createSale(actor, [retail(pen.id, 1)]);
    await debtService.createDebt({ customer_id: customer.id, item_id: pen.id, due_date: '2099-12-31' }, actor);

    await expect(itemService.deleteItem(pen.id)).rejects.toThrow(
      'Cannot delete Blue Pen: it is referenced by 1 debt(s) and 1 sale line(s)'
    );
    await expect(itemService.deleteItem(pen.id)).rejects.toThrow(ConflictError);

    const spare = await createItem({ name: 'Spare' });
    await itemService.deleteItem(spare.id);
    const gone = await getTestDb()('items').where({ id: spare.id }).first();
    expect(gone).toBeUndefined();
  });

  it('reuses the miscellaneous item', async () => {
    const first = await itemService.getOrCreateMiscDebtItem();
    const second = await itemService.getOrCreateMiscDebtItem();
    expect(second.id).toBe(first.id);
    expect(first.sku).toBe(MISC_DEBT_SKU);
  });
});

describe('Products', () => {
  it('mirrors cartons into the linked item on restock and pack size changes', async () => {
    const product = await createProduct({ units_per_carton: 24, cartons_in_stock: 2, create_linked_item: true });
    if (product.item_id === null) throw new Error('linked item missing');
    await assertItemStock(product.item_id, 48);

    await productService.restockCartons(product.id, 3);
    await assertItemStock(product.item_id, 120);

    await productService.updateProduct(product.id, { units_per_carton: 10 });
    await assertItemStock(product.item_id, 50);
    await assertLinkedItemMirrors(product.id);
  });

  it('creates a linked item once', async () => {
    const product = await createProduct({ name: 'Marker Box', selling_price: 18000, supplier_price: 15000 });
    expect(product.item_id).toBeNull();

    const detail = await productService.createLinkedItem(product.id);
    expect(detail.linked_item?.name).toBe('Marker Box');
    expect(detail.linked_item?.unit_price).toBe(18000);
    expect(detail.linked_item?.cost_price).toBe(15000);

    await expect(productService.createLinkedItem(product.id)).rejects.toThrow(
      'Marker Box already has a linked item'
    );
  });

  it('derives margins and reports stock value at selling price', async () => {
    const product = await createProduct({ supplier_price: 20000, selling_price: 25000, cartons_in_stock: 4 });
    expect(product.profit_per_carton).toBe(5000);
    expect(product.profit_margin).toBe(25);
    expect(product.stock_value).toBe(100000);
    expect(product.total_units_in_stock).toBe(192);

    const list = await productService.listProducts({});
    expect(list.stats).toEqual({ total_products: 1, low_stock_products: 0, total_stock_value: 100000 });
  });
});
