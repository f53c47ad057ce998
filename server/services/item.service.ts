import { BaseService, ListOptions, definedOnly } from './base.service';
import type { Db } from '../database/connection';
import { lockRow } from '../database/locks';
import type { CategoryRow, ItemRow } from '../database/rows';
import type { Item, PaginatedResult } from '../../shared/types';
import { MISC_DEBT_NAME, MISC_DEBT_SKU } from '../../shared/constants';
import { mapItem } from './mappers';
import { generateSku, isSkuTaken } from './sku';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { parseIntSafe } from '../utils/numbers';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('items');

export interface ItemInput {
  name: string;
  description?: string | null;
  category_id?: number | null;
  sku?: string | null;
  unit_price: number;
  cost_price: number;
  stock_quantity?: number;
  minimum_stock?: number;
  supplier?: string | null;
  is_active?: boolean;
}

export interface ItemListOptions extends ListOptions {
  category_id?: number;
  low_stock?: boolean;
  include_inactive?: boolean;
}

class ItemService extends BaseService {
  constructor() {
    super('items');
  }

  async createItem(input: ItemInput, db: Db = this.db): Promise<Item> {
    const requestedSku = input.sku?.trim();
    const sku = requestedSku
      ? requestedSku
      : await generateSku(db, 'items', { categoryId: input.category_id ?? null, name: input.name });

    if (await isSkuTaken(db, 'items', sku)) {
      throw new ValidationError(`An item with SKU "${sku}" already exists`, { sku });
    }

    const now = new Date();
    const [row]: ItemRow[] = await db('items')
      .insert({
        ...definedOnly(input),
        sku,
        stock_quantity: input.stock_quantity ?? 0,
        is_active: input.is_active ?? true,
        created_at: now,
        updated_at: now,
      })
      .returning('*');

    log.info({ itemId: row.id, sku: row.sku }, 'Item created');
    return mapItem(row);
  }

  async updateItem(id: number, patch: Partial<ItemInput>): Promise<Item> {
    await this.getItem(id);

    const changes = definedOnly(patch);
    // SKU is kept unless a new one is given
    if (patch.sku === null) delete changes.sku;
    if (typeof patch.sku === 'string') {
      const sku = patch.sku.trim();
      if (!sku) throw new ValidationError('SKU cannot be empty');
      if (await isSkuTaken(this.db, 'items', sku, id)) {
        throw new ValidationError(`An item with SKU "${sku}" already exists`, { sku });
      }
      changes.sku = sku;
    }
    if (Object.keys(changes).length === 0) return this.getItem(id);

    const [row]: ItemRow[] = await this.table()
      .where({ id })
      .update({ ...changes, updated_at: new Date() })
      .returning('*');
    return mapItem(row);
  }

  async getItem(id: number, db: Db = this.db): Promise<Item> {
    const row: ItemRow | undefined = await db('items').where({ id }).first();
    if (!row) throw new NotFoundError('Item not found', 'item', id);
    return mapItem(row);
  }

  async listItems(options: ItemListOptions): Promise<PaginatedResult<Item>> {
    const query = this.table();
    if (!options.include_inactive) query.where('items.is_active', true);
    if (options.category_id !== undefined) query.where('items.category_id', options.category_id);
    if (options.low_stock) {
      query.whereRaw('items.stock_quantity <= items.minimum_stock').whereNot('items.sku', MISC_DEBT_SKU);
    }
    this.applySearch(query, options.search, ['items.name', 'items.sku', 'items.description']);
    return this.paginate(query, { sortBy: 'items.name', sortOrder: 'asc', ...options }, mapItem);
  }

  async listLowStockItems(db: Db = this.db): Promise<Item[]> {
    const rows: ItemRow[] = await db('items')
      .where('is_active', true)
      .whereNot('sku', MISC_DEBT_SKU)
      .whereRaw('stock_quantity <= minimum_stock')
      .orderBy('stock_quantity', 'asc');
    return rows.map(mapItem);
  }

  async restockItem(id: number, quantity: number): Promise<Item> {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new ValidationError('Restock quantity must be a positive whole number');
    }
    return await this.db.transaction(async (trx) => {
      const item = await lockRow<ItemRow>(trx, 'items', id);
      if (!item) throw new NotFoundError('Item not found', 'item', id);

      const [row]: ItemRow[] = await trx('items')
        .where({ id })
        .update({ stock_quantity: item.stock_quantity + quantity, updated_at: new Date() })
        .returning('*');
      log.info({ itemId: id, quantity, stock: row.stock_quantity }, 'Item restocked');
      return mapItem(row);
    });
  }

  /** Items referenced by debts or sale lines cannot be deleted */
  async deleteItem(id: number): Promise<void> {
    await this.db.transaction(async (trx) => {
      const item: ItemRow | undefined = await trx('items').where({ id }).first();
      if (!item) throw new NotFoundError('Item not found', 'item', id);

      const debtCount: { total: number | string } | undefined = await trx('debts')
        .where({ item_id: id })
        .count<{ total: number | string }[]>('id as total')
        .first();
      const lineCount: { total: number | string } | undefined = await trx('sale_line_items')
        .where({ item_id: id })
        .count<{ total: number | string }[]>('id as total')
        .first();

      const debts = parseIntSafe(debtCount?.total);
      const lines = parseIntSafe(lineCount?.total);
      if (debts > 0 || lines > 0) {
        throw new ConflictError(
          `Cannot delete ${item.name}: it is referenced by ${debts} debt(s) and ${lines} sale line(s)`
        );
      }

      await trx('items').where({ id }).del();
      log.info({ itemId: id }, 'Item deleted');
    });
  }

  /**
   * The sentinel item a debt points at when its sale has no usable line.
   */
  async getOrCreateMiscDebtItem(db: Db = this.db): Promise<ItemRow> {
    const existing: ItemRow | undefined = await db('items').where({ sku: MISC_DEBT_SKU }).first();
    if (existing) return existing;

    const firstCategory: CategoryRow | undefined = await db('categories').orderBy('id', 'asc').first();
    const now = new Date();
    const [row]: ItemRow[] = await db('items')
      .insert({
        name: MISC_DEBT_NAME,
        description: 'Placeholder item for debts without specific items',
        category_id: firstCategory?.id ?? null,
        sku: MISC_DEBT_SKU,
        unit_price: 0.01,
        cost_price: 0.01,
        stock_quantity: 0,
        minimum_stock: 0,
        is_active: true,
        created_at: now,
        updated_at: now,
      })
      .returning('*');
    return row;
  }
}

export const itemService = new ItemService();
