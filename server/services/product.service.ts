import { BaseService, ListOptions, definedOnly } from './base.service';
import type { Db } from '../database/connection';
import { lockRow } from '../database/locks';
import type { ItemRow, ProductRow, SaleLineRow, SaleRow, SupplierRow } from '../database/rows';
import type { Item, PaginatedResult, Product, Sale, UnitType } from '../../shared/types';
import { mapItem, mapProduct, mapSale } from './mappers';
import { generateSku, isSkuTaken } from './sku';
import { syncLinkedItemStock } from './stock.service';
import { NotFoundError, ValidationError } from '../utils/errors';
import { round2 } from '../utils/numbers';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('products');

export interface ProductInput {
  name: string;
  description?: string | null;
  category_id?: number | null;
  supplier_id?: number | null;
  sku?: string | null;
  supplier_price: number;
  selling_price: number;
  units_per_carton: number;
  carton_weight?: number | null;
  unit_type?: UnitType;
  cartons_in_stock?: number;
  minimum_cartons?: number;
  notes?: string | null;
  is_active?: boolean;
  /** Also create the mirrored retail item */
  create_linked_item?: boolean;
}

export interface ProductListOptions extends ListOptions {
  category_id?: number;
  supplier_id?: number;
}

export interface ProductDetail extends Product {
  linked_item: Item | null;
  recent_sales: Sale[];
}

export interface ProductListResult extends PaginatedResult<Product> {
  stats: {
    total_products: number;
    low_stock_products: number;
    total_stock_value: number;
  };
}

class ProductService extends BaseService {
  constructor() {
    super('products');
  }

  private async findRow(db: Db, id: number): Promise<ProductRow> {
    const row: ProductRow | undefined = await db('products').where({ id }).first();
    if (!row) throw new NotFoundError('Product not found', 'product', id);
    return row;
  }

  async createProduct(input: ProductInput): Promise<Product> {
    const { create_linked_item, ...fields } = input;

    return await this.db.transaction(async (trx) => {
      const requestedSku = fields.sku?.trim();
      const sku = requestedSku
        ? requestedSku
        : await generateSku(trx, 'products', { categoryId: fields.category_id ?? null, name: fields.name });
      if (await isSkuTaken(trx, 'products', sku)) {
        throw new ValidationError(`A product with SKU "${sku}" already exists`, { sku });
      }

      const now = new Date();
      const [row]: ProductRow[] = await trx('products')
        .insert({
          ...definedOnly(fields),
          sku,
          unit_type: fields.unit_type ?? 'carton',
          cartons_in_stock: fields.cartons_in_stock ?? 0,
          is_active: fields.is_active ?? true,
          created_at: now,
          updated_at: now,
        })
        .returning('*');

      log.info({ productId: row.id, sku: row.sku }, 'Product created');

      if (create_linked_item) {
        return mapProduct(await this.linkNewItem(trx, row));
      }
      return mapProduct(row);
    });
  }

  async updateProduct(id: number, patch: Partial<Omit<ProductInput, 'create_linked_item'>>): Promise<Product> {
    return await this.db.transaction(async (trx) => {
      await this.findRow(trx, id);

      const changes = definedOnly(patch);
      if (patch.sku === null) delete changes.sku;
      if (typeof patch.sku === 'string') {
        const sku = patch.sku.trim();
        if (!sku) throw new ValidationError('SKU cannot be empty');
        if (await isSkuTaken(trx, 'products', sku, id)) {
          throw new ValidationError(`A product with SKU "${sku}" already exists`, { sku });
        }
        changes.sku = sku;
      }
      if (Object.keys(changes).length > 0) {
        await trx('products').where({ id }).update({ ...changes, updated_at: new Date() });
      }

      await syncLinkedItemStock(trx, id);
      return mapProduct(await this.findRow(trx, id));
    });
  }

  async getProduct(id: number): Promise<ProductDetail> {
    const row = await this.findRow(this.db, id);

    let linkedItem: Item | null = null;
    if (row.item_id !== null) {
      const item: ItemRow | undefined = await this.db('items').where({ id: row.item_id }).first();
      linkedItem = item ? mapItem(item) : null;
    }

    const lines: Pick<SaleLineRow, 'sale_id'>[] = await this.db('sale_line_items')
      .where({ product_id: id })
      .select('sale_id');
    const sales: SaleRow[] = lines.length
      ? await this.db('sales')
          .whereIn('id', lines.map((l) => l.sale_id))
          .orderBy('sale_date', 'desc')
          .limit(10)
      : [];

    return { ...mapProduct(row), linked_item: linkedItem, recent_sales: sales.map(mapSale) };
  }

  async listProducts(options: ProductListOptions): Promise<ProductListResult> {
    const query = this.table().where('products.is_active', true);
    if (options.category_id !== undefined) query.where('products.category_id', options.category_id);
    if (options.supplier_id !== undefined) query.where('products.supplier_id', options.supplier_id);
    this.applySearch(query, options.search, ['products.name', 'products.sku', 'products.description']);

    const page = await this.paginate(query, { sortBy: 'products.name', sortOrder: 'asc', ...options }, mapProduct);

    const all: ProductRow[] = await this.db('products').where('is_active', true);
    const products = all.map(mapProduct);
    const stats = {
      total_products: products.length,
      low_stock_products: products.filter((p) => p.is_low_stock).length,
      total_stock_value: round2(products.reduce((sum, p) => sum + p.stock_value, 0)),
    };

    return { ...page, stats };
  }

  async listLowStockProducts(db: Db = this.db): Promise<Product[]> {
    const rows: ProductRow[] = await db('products')
      .where('is_active', true)
      .whereRaw('cartons_in_stock <= minimum_cartons')
      .orderBy('cartons_in_stock', 'asc');
    return rows.map(mapProduct);
  }

  async restockCartons(id: number, cartons: number): Promise<Product> {
    if (!Number.isInteger(cartons) || cartons < 1) {
      throw new ValidationError('Restock cartons must be a positive whole number');
    }
    return await this.db.transaction(async (trx) => {
      const row = await lockRow<ProductRow>(trx, 'products', id);
      if (!row) throw new NotFoundError('Product not found', 'product', id);

      await trx('products')
        .where({ id })
        .update({ cartons_in_stock: row.cartons_in_stock + cartons, updated_at: new Date() });
      await syncLinkedItemStock(trx, id);

      log.info({ productId: id, cartons }, 'Product restocked');
      return mapProduct(await this.findRow(trx, id));
    });
  }

  /** Create the mirrored item for a product that has none */
  async createLinkedItem(id: number): Promise<ProductDetail> {
    await this.db.transaction(async (trx) => {
      const row = await this.findRow(trx, id);
      if (row.item_id !== null) {
        throw new ValidationError(`${row.name} already has a linked item`);
      }
      await this.linkNewItem(trx, row);
    });
    return this.getProduct(id);
  }

  private async linkNewItem(trx: Db, product: ProductRow): Promise<ProductRow> {
    let supplierName: string | null = null;
    if (product.supplier_id !== null) {
      const supplier: SupplierRow | undefined = await trx('suppliers').where({ id: product.supplier_id }).first();
      supplierName = supplier?.name ?? null;
    }

    const sku = (await isSkuTaken(trx, 'items', product.sku))
      ? await generateSku(trx, 'items', { categoryId: product.category_id, name: product.name })
      : product.sku;

    const now = new Date();
    const [item]: ItemRow[] = await trx('items')
      .insert({
        name: product.name,
        description: product.description,
        category_id: product.category_id,
        sku,
        unit_price: product.selling_price,
        cost_price: product.supplier_price,
        stock_quantity: product.cartons_in_stock * product.units_per_carton,
        minimum_stock: product.minimum_cartons * product.units_per_carton,
        supplier: supplierName,
        is_active: product.is_active,
        created_at: now,
        updated_at: now,
      })
      .returning('*');

    const [updated]: ProductRow[] = await trx('products')
      .where({ id: product.id })
      .update({ item_id: item.id, updated_at: now })
      .returning('*');

    log.info({ productId: product.id, itemId: item.id }, 'Linked item created');
    return updated;
  }
}

export const productService = new ProductService();
