// =============================================================
// File: server/services/sale.service.ts
// Description: The sale aggregate. Every line item change runs in
//              one transaction with the sale row locked:
//              lock sale -> check/take stock -> write line ->
//              recompute total -> sync the sale's debt.
// =============================================================

import { BaseService } from './base.service';
import type { Db } from '../database/connection';
import { lockRow, lockRows } from '../database/locks';
import type { CustomerRow, SaleLineRow, SaleRow, UserRow } from '../database/rows';
import type {
  ActorContext,
  PaymentMethod,
  Sale,
  SaleDetail,
  SaleLine,
  SaleLineDetail,
  SaleLineTarget,
} from '../../shared/types';
import { lineTargetColumns, lineTargetOf, mapCustomer, mapSale, mapSaleLine } from './mappers';
import { describeRestore, returnStock, returnStockForSales, takeStock } from './stock.service';
import { syncDebtForSale } from './debt-sync.service';
import { debtService } from './debt.service';
import { computeSaleProfit } from './sale-profit.service';
import { describeProducts, loadLines } from './sale-details';
import { NotFoundError, ValidationError } from '../utils/errors';
import { parseNum, round2 } from '../utils/numbers';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('sales');

export interface SaleLineInput {
  target: SaleLineTarget;
  quantity: number;
  /** Defaults to the item's unit price or the product's carton price */
  unit_price?: number;
}

export interface CreateSaleInput {
  customer_id?: number | null;
  payment_method?: PaymentMethod;
  is_paid?: boolean;
  notes?: string | null;
  sale_date?: Date;
  lines: SaleLineInput[];
}

export interface UpdateSaleInput {
  customer_id?: number | null;
  payment_method?: PaymentMethod;
  is_paid?: boolean;
  notes?: string | null;
}

export interface LineItemPatch {
  quantity?: number;
  unit_price?: number;
}

export interface LineMutationResult {
  sale: Sale;
  line: SaleLine | null;
  merged: boolean;
}

export interface DeleteSalesResult {
  deleted: number;
  restored: string[];
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError('Quantity must be a positive whole number', { quantity });
  }
}

function assertUnitPrice(price: number): void {
  if (!(price >= 0)) {
    throw new ValidationError('Unit price cannot be negative', { unit_price: price });
  }
}

async function catalogPrice(db: Db, target: SaleLineTarget): Promise<number> {
  const row: { price: number | string } | undefined =
    target.kind === 'retail'
      ? await db('items').where({ id: target.itemId }).select('unit_price as price').first()
      : await db('products').where({ id: target.productId }).select('selling_price as price').first();
  if (!row) {
    throw target.kind === 'retail'
      ? new NotFoundError('Item not found', 'item', target.itemId)
      : new NotFoundError('Product not found', 'product', target.productId);
  }
  return parseNum(row.price);
}

/**
 * Set the stored total to the sum of the sale's line totals. Touches only
 * that column; payment records keep the amount they were created with.
 */
export async function recomputeSaleTotal(db: Db, saleId: number): Promise<number> {
  await db('sales')
    .where({ id: saleId, kind: 'normal' })
    .update({
      total_amount: db.raw('(SELECT COALESCE(SUM(total_price), 0) FROM sale_line_items WHERE sale_id = ?)', [
        saleId,
      ]),
    });
  const row: Pick<SaleRow, 'total_amount'> | undefined = await db('sales')
    .where({ id: saleId })
    .select('total_amount')
    .first();
  return round2(parseNum(row?.total_amount));
}

class SaleService extends BaseService {
  constructor() {
    super('sales');
  }

  private async lockSale(trx: Db, id: number): Promise<SaleRow> {
    const row = await lockRow<SaleRow>(trx, 'sales', id);
    if (!row) throw new NotFoundError('Sale not found', 'sale', id);
    return row;
  }

  private assertHasLines(sale: Sale): void {
    if (sale.origin.kind === 'payment_record') {
      throw new ValidationError('Payment records cannot have line items');
    }
  }

  private async assertCustomer(db: Db, customerId: number | null | undefined): Promise<void> {
    if (customerId === null || customerId === undefined) return;
    const customer: CustomerRow | undefined = await db('customers').where({ id: customerId }).first();
    if (!customer) throw new NotFoundError('Customer not found', 'customer', customerId);
  }

  /**
   * Add a line, merging into the sale's existing line for the same item
   * or product. A merge only checks stock for the added quantity and
   * takes the newest unit price.
   */
  private async applyLine(trx: Db, saleId: number, input: SaleLineInput): Promise<{ line: SaleLineRow; merged: boolean }> {
    assertQuantity(input.quantity);
    const unitPrice = input.unit_price ?? (await catalogPrice(trx, input.target));
    assertUnitPrice(unitPrice);

    const existing: SaleLineRow | undefined = await trx('sale_line_items')
      .where(
        input.target.kind === 'retail'
          ? { sale_id: saleId, item_id: input.target.itemId }
          : { sale_id: saleId, product_id: input.target.productId }
      )
      .first();

    await takeStock(trx, input.target, input.quantity);

    if (existing) {
      const quantity = existing.quantity + input.quantity;
      const [line]: SaleLineRow[] = await trx('sale_line_items')
        .where({ id: existing.id })
        .update({ quantity, unit_price: unitPrice, total_price: round2(quantity * unitPrice) })
        .returning('*');
      return { line, merged: true };
    }

    const [line]: SaleLineRow[] = await trx('sale_line_items')
      .insert({
        sale_id: saleId,
        ...lineTargetColumns(input.target),
        quantity: input.quantity,
        unit_price: unitPrice,
        total_price: round2(input.quantity * unitPrice),
      })
      .returning('*');
    return { line, merged: false };
  }

  /** Recompute the total, bring the debt in line and return the fresh sale */
  private async settle(trx: Db, saleId: number): Promise<Sale> {
    await recomputeSaleTotal(trx, saleId);
    await syncDebtForSale(trx, saleId);
    const row: SaleRow | undefined = await trx('sales').where({ id: saleId }).first();
    if (!row) throw new NotFoundError('Sale not found', 'sale', saleId);
    return mapSale(row);
  }

  async createSale(input: CreateSaleInput, actor: ActorContext): Promise<SaleDetail> {
    if (input.lines.length === 0) {
      throw new ValidationError('A sale needs at least one line item');
    }

    return await this.db.transaction(async (trx) => {
      await this.assertCustomer(trx, input.customer_id);

      const [row]: SaleRow[] = await trx('sales')
        .insert({
          kind: 'normal',
          payment_debt_id: null,
          customer_id: input.customer_id ?? null,
          sale_date: input.sale_date ?? new Date(),
          total_amount: 0,
          payment_method: input.payment_method ?? 'cash',
          is_paid: input.is_paid ?? true,
          notes: input.notes ?? null,
          created_by: actor.userId,
        })
        .returning('*');

      for (const line of input.lines) {
        await this.applyLine(trx, row.id, line);
      }
      const sale = await this.settle(trx, row.id);

      log.info(
        { saleId: sale.id, total: sale.total_amount, lines: input.lines.length, actor: actor.username },
        'Sale created'
      );
      return this.buildDetail(trx, sale);
    });
  }

  async addLineItem(saleId: number, input: SaleLineInput, actor: ActorContext): Promise<LineMutationResult> {
    return await this.db.transaction(async (trx) => {
      const sale = mapSale(await this.lockSale(trx, saleId));
      this.assertHasLines(sale);

      const { line, merged } = await this.applyLine(trx, saleId, input);
      const updated = await this.settle(trx, saleId);

      log.info({ saleId, lineId: line.id, merged, quantity: input.quantity, actor: actor.username }, 'Line item added');
      return { sale: updated, line: mapSaleLine(line), merged };
    });
  }

  async updateLineItem(
    saleId: number,
    lineId: number,
    patch: LineItemPatch,
    actor: ActorContext
  ): Promise<LineMutationResult> {
    return await this.db.transaction(async (trx) => {
      await this.lockSale(trx, saleId);
      const existing: SaleLineRow | undefined = await trx('sale_line_items').where({ id: lineId, sale_id: saleId }).first();
      if (!existing) throw new NotFoundError('Line item not found', 'sale_line_item', lineId);

      const target = lineTargetOf(existing);
      const quantity = patch.quantity ?? existing.quantity;
      const unitPrice = patch.unit_price ?? parseNum(existing.unit_price);
      assertQuantity(quantity);
      assertUnitPrice(unitPrice);

      const delta = quantity - existing.quantity;
      if (delta > 0) {
        await takeStock(trx, target, delta);
      } else if (delta < 0) {
        await returnStock(trx, target, -delta);
      }

      const [line]: SaleLineRow[] = await trx('sale_line_items')
        .where({ id: lineId })
        .update({ quantity, unit_price: unitPrice, total_price: round2(quantity * unitPrice) })
        .returning('*');
      const sale = await this.settle(trx, saleId);

      log.info({ saleId, lineId, delta, actor: actor.username }, 'Line item updated');
      return { sale, line: mapSaleLine(line), merged: false };
    });
  }

  async removeLineItem(saleId: number, lineId: number, actor: ActorContext): Promise<LineMutationResult> {
    return await this.db.transaction(async (trx) => {
      await this.lockSale(trx, saleId);
      const existing: SaleLineRow | undefined = await trx('sale_line_items').where({ id: lineId, sale_id: saleId }).first();
      if (!existing) throw new NotFoundError('Line item not found', 'sale_line_item', lineId);

      await returnStock(trx, lineTargetOf(existing), existing.quantity);
      await trx('sale_line_items').where({ id: lineId }).del();
      const sale = await this.settle(trx, saleId);

      log.info({ saleId, lineId, quantity: existing.quantity, actor: actor.username }, 'Line item removed');
      return { sale, line: null, merged: false };
    });
  }

  async updateSale(id: number, patch: UpdateSaleInput, actor: ActorContext): Promise<SaleDetail> {
    return await this.db.transaction(async (trx) => {
      const sale = mapSale(await this.lockSale(trx, id));

      if (sale.origin.kind === 'payment_record') {
        if (patch.customer_id !== undefined && patch.customer_id !== sale.customer_id) {
          throw new ValidationError('The customer of a payment record cannot be changed');
        }
        if (patch.is_paid !== undefined && patch.is_paid !== sale.is_paid) {
          throw new ValidationError('A payment record is always paid');
        }
      }
      await this.assertCustomer(trx, patch.customer_id);

      const changes: Record<string, unknown> = {};
      if (patch.customer_id !== undefined) changes.customer_id = patch.customer_id;
      if (patch.payment_method !== undefined) changes.payment_method = patch.payment_method;
      if (patch.is_paid !== undefined) changes.is_paid = patch.is_paid;
      if (patch.notes !== undefined) changes.notes = patch.notes;
      if (Object.keys(changes).length > 0) {
        await trx('sales').where({ id }).update(changes);
      }

      const outcome = await syncDebtForSale(trx, id);
      const row: SaleRow | undefined = await trx('sales').where({ id }).first();
      if (!row) throw new NotFoundError('Sale not found', 'sale', id);

      log.info({ saleId: id, debt: outcome.action, actor: actor.username }, 'Sale updated');
      return this.buildDetail(trx, mapSale(row));
    });
  }

  async deleteSale(id: number, actor: ActorContext): Promise<DeleteSalesResult> {
    const exists: Pick<SaleRow, 'id'> | undefined = await this.table().where({ id }).select('id').first();
    if (!exists) throw new NotFoundError('Sale not found', 'sale', id);
    return this.deleteSales([id], actor);
  }

  /**
   * Delete sales and put their stock back. Line items go with the sale by
   * cascade, so stock is restored by a sweep over them first; payment
   * records also hand their amount back to the debt.
   */
  async deleteSales(ids: number[], actor: ActorContext): Promise<DeleteSalesResult> {
    const uniqueIds = [...new Set(ids)];
    if (uniqueIds.length === 0) return { deleted: 0, restored: [] };

    return await this.db.transaction(async (trx) => {
      const rows = await lockRows<SaleRow>(trx, 'sales', uniqueIds);
      if (rows.length === 0) return { deleted: 0, restored: [] };
      const sales = rows.map(mapSale);

      const movements = await returnStockForSales(trx, sales.map((s) => s.id));
      const restored = movements.map(describeRestore);

      for (const sale of sales) {
        const note = await debtService.reversePaymentRecord(trx, sale);
        if (note) restored.push(note);
      }

      const deleted = await trx('sales').whereIn('id', sales.map((s) => s.id)).del();

      log.info({ saleIds: sales.map((s) => s.id), deleted, restored, actor: actor.username }, 'Sales deleted');
      return { deleted, restored };
    });
  }

  async getSaleWithDetails(id: number): Promise<SaleDetail> {
    const row: SaleRow | undefined = await this.table().where({ id }).first();
    if (!row) throw new NotFoundError('Sale not found', 'sale', id);
    return this.buildDetail(this.db, mapSale(row));
  }

  private async buildDetail(db: Db, sale: Sale): Promise<SaleDetail> {
    const customer: CustomerRow | undefined =
      sale.customer_id === null ? undefined : await db('customers').where({ id: sale.customer_id }).first();
    const creator: Pick<UserRow, 'username'> | undefined =
      sale.created_by === null ? undefined : await db('users').where({ id: sale.created_by }).select('username').first();

    const linesBySale = await loadLines(db, [sale.id]);
    const lines: SaleLineDetail[] = (linesBySale.get(sale.id) ?? []).map((l) => ({
      id: l.id,
      sale_id: l.sale_id,
      target: l.target,
      quantity: l.quantity,
      unit_price: l.unit_price,
      total_price: l.total_price,
      name: l.name,
      sku: l.sku,
    }));
    const products = await describeProducts(db, [sale], linesBySale);

    return {
      ...sale,
      customer: customer ? mapCustomer(customer) : null,
      created_by_username: creator?.username ?? null,
      lines,
      profit: await computeSaleProfit(db, sale),
      products: products.get(sale.id) ?? null,
    };
  }
}

export const saleService = new SaleService();
