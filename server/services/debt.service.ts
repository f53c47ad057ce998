import { BaseService, ListOptions } from './base.service';
import type { Db } from '../database/connection';
import { lockRow } from '../database/locks';
import type { CustomerRow, DebtRow, ItemRow, PaymentRow, SaleRow } from '../database/rows';
import type {
  ActorContext,
  Debt,
  DebtDetail,
  DebtDisplayStatus,
  DebtWithRelations,
  PaginatedResult,
  Payment,
  PaymentMethod,
  Sale,
} from '../../shared/types';
import { computeDebtStatus, mapCustomer, mapDebt, mapItem, mapPayment, mapSale } from './mappers';
import { describeRestore, returnStock, takeStock } from './stock.service';
import { NotFoundError, ValidationError } from '../utils/errors';
import { formatCurrency, todayLocal } from '../utils/formatters';
import { parseNum, round2 } from '../utils/numbers';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('debts');

export interface CreateDebtInput {
  customer_id: number;
  item_id: number;
  quantity?: number;
  /** Defaults to item unit price × quantity */
  amount?: number;
  due_date: string;
  description?: string | null;
}

export interface RecordPaymentInput {
  amount: number;
  payment_method?: PaymentMethod;
  notes?: string | null;
}

export interface DebtListOptions extends ListOptions {
  status?: DebtDisplayStatus;
  customer_id?: number;
  overdue?: boolean;
}

export interface DebtListResult extends PaginatedResult<DebtWithRelations> {
  totals: {
    total_amount: number;
    total_paid: number;
    total_remaining: number;
  };
}

export interface PaymentResult {
  payment: Payment;
  debt: Debt;
  sale: Sale;
}

class DebtService extends BaseService {
  constructor() {
    super('debts');
  }

  private async withRelations(db: Db, rows: DebtRow[]): Promise<DebtWithRelations[]> {
    if (rows.length === 0) return [];
    const customers: CustomerRow[] = await db('customers').whereIn('id', [...new Set(rows.map((r) => r.customer_id))]);
    const items: ItemRow[] = await db('items').whereIn('id', [...new Set(rows.map((r) => r.item_id))]);
    const customerById = new Map(customers.map((c) => [c.id, mapCustomer(c)]));
    const itemById = new Map(items.map((i) => [i.id, mapItem(i)]));

    const today = todayLocal();
    return rows.map((row) => {
      const customer = customerById.get(row.customer_id);
      const item = itemById.get(row.item_id);
      if (!customer || !item) throw new Error(`Debt ${row.id} references a missing customer or item`);
      return { ...mapDebt(row, today), customer, item };
    });
  }

  /**
   * Manual debt: stock of the item leaves the shelf on credit.
   */
  async createDebt(input: CreateDebtInput, actor: ActorContext): Promise<DebtWithRelations> {
    const quantity = input.quantity ?? 1;
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new ValidationError('Quantity must be a positive whole number');
    }

    return await this.db.transaction(async (trx) => {
      const customer: CustomerRow | undefined = await trx('customers').where({ id: input.customer_id }).first();
      if (!customer) throw new NotFoundError('Customer not found', 'customer', input.customer_id);
      const item: ItemRow | undefined = await trx('items').where({ id: input.item_id }).first();
      if (!item) throw new NotFoundError('Item not found', 'item', input.item_id);

      const amount = input.amount ?? round2(parseNum(item.unit_price) * quantity);
      if (amount <= 0) throw new ValidationError('Debt amount must be greater than zero');

      await takeStock(trx, { kind: 'retail', itemId: item.id }, quantity);

      const now = new Date();
      const [row]: DebtRow[] = await trx('debts')
        .insert({
          customer_id: customer.id,
          sale_id: null,
          item_id: item.id,
          quantity,
          amount,
          paid_amount: 0,
          due_date: input.due_date,
          status: 'pending',
          origin: 'manual',
          description: input.description ?? null,
          created_by: actor.userId,
          created_at: now,
          updated_at: now,
        })
        .returning('*');

      log.info({ debtId: row.id, customerId: customer.id, amount, actor: actor.username }, 'Manual debt created');
      const [withRelations] = await this.withRelations(trx, [row]);
      return withRelations;
    });
  }

  async getDebtWithPayments(id: number): Promise<DebtDetail> {
    const row: DebtRow | undefined = await this.table().where({ id }).first();
    if (!row) throw new NotFoundError('Debt not found', 'debt', id);

    const [debt] = await this.withRelations(this.db, [row]);
    const payments: PaymentRow[] = await this.db('payments')
      .where({ debt_id: id })
      .orderBy('payment_date', 'desc')
      .orderBy('id', 'desc');
    return { ...debt, payments: payments.map(mapPayment) };
  }

  async listDebts(options: DebtListOptions): Promise<DebtListResult> {
    const today = todayLocal();
    const query = this.table().join('customers', 'customers.id', 'debts.customer_id');

    if (options.customer_id !== undefined) query.where('debts.customer_id', options.customer_id);

    if (options.status === 'overdue' || options.overdue) {
      query.whereIn('debts.status', ['pending', 'partial']).where('debts.due_date', '<', today);
    } else if (options.status) {
      query.where('debts.status', options.status);
    }

    // With a customer chosen, search narrows by description only
    if (options.customer_id !== undefined) {
      this.applySearch(query, options.search, ['debts.description']);
    } else {
      this.applySearch(query, options.search, ['customers.name', 'debts.description']);
    }

    const sums: { total_amount: number | string | null; total_paid: number | string | null } | undefined =
      await query.clone().sum({ total_amount: 'debts.amount', total_paid: 'debts.paid_amount' }).first();
    const totalAmount = round2(parseNum(sums?.total_amount));
    const totalPaid = round2(parseNum(sums?.total_paid));

    const page = await this.paginate<DebtRow, DebtRow>(
      query,
      { sortBy: 'debts.due_date', sortOrder: 'asc', ...options },
      (row) => row
    );
    const data = await this.withRelations(this.db, page.data);

    return {
      ...page,
      data,
      totals: {
        total_amount: totalAmount,
        total_paid: totalPaid,
        total_remaining: round2(totalAmount - totalPaid),
      },
    };
  }

  /**
   * Append a payment and, in the same transaction, move the debt's paid
   * amount and status and write the payment-record sale.
   */
  async recordPayment(debtId: number, input: RecordPaymentInput, actor: ActorContext): Promise<PaymentResult> {
    if (!(input.amount > 0)) throw new ValidationError('Payment amount must be greater than zero');

    return await this.db.transaction(async (trx) => {
      const debt = await lockRow<DebtRow>(trx, 'debts', debtId);
      if (!debt) throw new NotFoundError('Debt not found', 'debt', debtId);

      const amount = parseNum(debt.amount);
      const paidBefore = parseNum(debt.paid_amount);
      const remaining = round2(amount - paidBefore);
      if (input.amount > remaining) {
        throw new ValidationError(
          `Payment amount cannot exceed the remaining debt amount of ${formatCurrency(remaining)}`,
          { remaining }
        );
      }

      const paymentMethod = input.payment_method ?? 'cash';
      const now = new Date();

      const paidAfter = round2(paidBefore + input.amount);
      const [updatedDebt]: DebtRow[] = await trx('debts')
        .where({ id: debtId })
        .update({ paid_amount: paidAfter, status: computeDebtStatus(amount, paidAfter), updated_at: now })
        .returning('*');

      const item: ItemRow | undefined = await trx('items').where({ id: debt.item_id }).first();
      const [saleRow]: SaleRow[] = await trx('sales')
        .insert({
          kind: 'payment_record',
          payment_debt_id: debtId,
          customer_id: debt.customer_id,
          sale_date: now,
          total_amount: input.amount,
          payment_method: paymentMethod,
          is_paid: true,
          notes: paymentSaleNotes(debt, item?.name ?? 'Unknown item', input.notes ?? null),
          created_by: actor.userId,
        })
        .returning('*');

      const [paymentRow]: PaymentRow[] = await trx('payments')
        .insert({
          debt_id: debtId,
          sale_id: saleRow.id,
          amount: input.amount,
          payment_method: paymentMethod,
          notes: input.notes ?? null,
          payment_date: now,
          created_by: actor.userId,
        })
        .returning('*');

      log.info(
        { debtId, paymentId: paymentRow.id, saleId: saleRow.id, amount: input.amount, actor: actor.username },
        'Payment recorded'
      );

      return { payment: mapPayment(paymentRow), debt: mapDebt(updatedDebt), sale: mapSale(saleRow) };
    });
  }

  /**
   * Undo a payment record being deleted: the debt item's stock comes back
   * by the debt quantity and the paid amount drops by the sale total.
   */
  async reversePaymentRecord(db: Db, sale: Sale): Promise<string | null> {
    if (sale.origin.kind !== 'payment_record') return null;

    const debt = await lockRow<DebtRow>(db, 'debts', sale.origin.debtId);
    if (!debt) return null;

    const movement = await returnStock(db, { kind: 'retail', itemId: debt.item_id }, debt.quantity);

    const amount = parseNum(debt.amount);
    const paidAfter = Math.max(0, round2(parseNum(debt.paid_amount) - sale.total_amount));
    await db('debts')
      .where({ id: debt.id })
      .update({ paid_amount: paidAfter, status: computeDebtStatus(amount, paidAfter), updated_at: new Date() });

    log.info({ saleId: sale.id, debtId: debt.id, paidAfter }, 'Payment record reversed');
    return describeRestore(movement);
  }

  async getOutstandingDebtTotal(db: Db = this.db): Promise<number> {
    const sums: { amount: number | string | null; paid: number | string | null } | undefined = await db('debts')
      .whereIn('status', ['pending', 'partial'])
      .sum<{ amount: number | string | null; paid: number | string | null }[]>({ amount: 'amount', paid: 'paid_amount' })
      .first();
    return round2(parseNum(sums?.amount) - parseNum(sums?.paid));
  }

  async listOverdueDebts(db: Db = this.db): Promise<DebtWithRelations[]> {
    const rows: DebtRow[] = await db('debts')
      .whereIn('status', ['pending', 'partial'])
      .where('due_date', '<', todayLocal())
      .orderBy('due_date', 'asc');
    return this.withRelations(db, rows);
  }

  async getDebtsWithRelations(db: Db, rows: DebtRow[]): Promise<DebtWithRelations[]> {
    return this.withRelations(db, rows);
  }
}

export function paymentSaleNotes(debt: DebtRow, itemName: string, extra: string | null): string {
  let notes =
    `Payment for Debt #${debt.id}: ${itemName} (Qty: ${debt.quantity}) - ` +
    `Total: ${formatCurrency(parseNum(debt.amount))}`;
  if (debt.description) notes += ` - ${debt.description}`;
  if (extra) notes += ` | ${extra}`;
  return notes;
}

export const debtService = new DebtService();
