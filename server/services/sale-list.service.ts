import { Knex } from 'knex';
import { getDb, Db } from '../database/connection';
import type { CustomerRow, ExpenditureRow, SaleRow } from '../database/rows';
import type { DailySummary, PaginatedResult, Sale, SaleListRow } from '../../shared/types';
import { UNFILTERED_SUMMARY_DAYS } from '../../shared/constants';
import { mapSale } from './mappers';
import { computeProfits } from './sale-profit.service';
import { creatorNames, describeProducts, loadLines, LineInfo } from './sale-details';
import { addDays, localDayStart, toLocalDateString, todayLocal } from '../utils/formatters';
import { parseNum, round2 } from '../utils/numbers';

export type PaymentStatusFilter = 'paid' | 'unpaid' | 'all';

export interface SaleFilters {
  start_date?: string;
  end_date?: string;
  /** Defaults to paid; giving it explicitly counts as a filter */
  payment_status?: PaymentStatusFilter;
  product?: string;
}

export interface SaleListOptions extends SaleFilters {
  page?: number;
  limit?: number;
}

export interface SaleListResult extends PaginatedResult<SaleListRow> {
  total_amount: number;
  overall_profit: number;
  total_expenditure: number;
  daily_summary: DailySummary[];
  summary_totals: {
    sold: number;
    profit: number;
    product_quantity: number;
  };
}

export interface SalesChart {
  labels: string[];
  data: number[];
}

function hasAnyFilter(filters: SaleFilters): boolean {
  return Boolean(filters.start_date || filters.end_date || filters.payment_status || filters.product?.trim());
}

/** Sales matching the filters, newest first. Only sales with lines or payment records qualify. */
export function filteredSalesQuery(db: Db, filters: SaleFilters): Knex.QueryBuilder {
  const query = db('sales').where(function () {
    this.whereExists(function () {
      this.select('sale_line_items.id').from('sale_line_items').whereRaw('sale_line_items.sale_id = sales.id');
    }).orWhere('sales.kind', 'payment_record');
  });

  if (filters.start_date) query.where('sales.sale_date', '>=', localDayStart(filters.start_date));
  if (filters.end_date) query.where('sales.sale_date', '<', localDayStart(addDays(filters.end_date, 1)));

  const status = filters.payment_status ?? 'paid';
  if (status === 'paid') query.where('sales.is_paid', true);
  if (status === 'unpaid') query.where('sales.is_paid', false);

  const product = filters.product?.trim();
  if (product) {
    const pattern = `%${product}%`;
    query.whereExists(function () {
      this.select('sli.id')
        .from('sale_line_items as sli')
        .leftJoin('items as li', 'li.id', 'sli.item_id')
        .leftJoin('products as lp', 'lp.id', 'sli.product_id')
        .whereRaw('sli.sale_id = sales.id')
        .where(function () {
          this.whereILike('li.name', pattern).orWhereILike('lp.name', pattern);
        });
    });
  }

  return query.select('sales.*').orderBy('sales.sale_date', 'desc').orderBy('sales.id', 'desc');
}

export async function loadFilteredSales(db: Db, filters: SaleFilters): Promise<Sale[]> {
  const rows: SaleRow[] = await filteredSalesQuery(db, filters);
  return rows.map(mapSale);
}

/** Expenditure totals per local date between two local dates, inclusive */
async function expenditureByDate(db: Db, from: string, to: string): Promise<Map<string, number>> {
  const rows: Pick<ExpenditureRow, 'amount' | 'expense_date'>[] = await db('expenditures')
    .where('expense_date', '>=', localDayStart(from))
    .where('expense_date', '<', localDayStart(addDays(to, 1)))
    .select('amount', 'expense_date');

  const totals = new Map<string, number>();
  for (const row of rows) {
    const date = toLocalDateString(row.expense_date);
    totals.set(date, (totals.get(date) ?? 0) + parseNum(row.amount));
  }
  return totals;
}

async function totalExpenditure(db: Db, filters: SaleFilters): Promise<number> {
  const query = db('expenditures');
  if (filters.start_date) query.where('expense_date', '>=', localDayStart(filters.start_date));
  if (filters.end_date) query.where('expense_date', '<', localDayStart(addDays(filters.end_date, 1)));
  const sum: { total: number | string | null } | undefined = await query.sum<{ total: number | string | null }[]>({ total: 'amount' }).first();
  return round2(parseNum(sum?.total));
}

interface DayBucket {
  revenue: number;
  cost: number;
  count: number;
  productQuantity: number;
  productRevenue: number;
  productCost: number;
  productNames: Set<string>;
}

/**
 * One row per local date, newest first. Revenue is net of that day's
 * expenditures; with a product filter revenue and cost come from the
 * matching lines only.
 */
async function buildDailySummary(
  db: Db,
  sales: Sale[],
  profits: Map<number, number>,
  lines: Map<number, LineInfo[]>,
  filters: SaleFilters
): Promise<DailySummary[]> {
  const product = filters.product?.trim().toLowerCase() ?? '';
  const buckets = new Map<string, DayBucket>();

  for (const sale of sales) {
    const date = toLocalDateString(sale.sale_date);
    let bucket = buckets.get(date);
    if (!bucket) {
      bucket = {
        revenue: 0,
        cost: 0,
        count: 0,
        productQuantity: 0,
        productRevenue: 0,
        productCost: 0,
        productNames: new Set(),
      };
      buckets.set(date, bucket);
    }

    bucket.revenue += sale.total_amount;
    bucket.cost += sale.total_amount - (profits.get(sale.id) ?? 0);
    bucket.count += 1;

    if (product) {
      for (const line of lines.get(sale.id) ?? []) {
        if (!line.name.toLowerCase().includes(product)) continue;
        bucket.productQuantity += line.quantity;
        bucket.productRevenue += line.total_price;
        bucket.productCost += line.cost;
        bucket.productNames.add(line.name);
      }
    }
  }

  const dates = [...buckets.keys()].sort().reverse();
  if (dates.length === 0) return [];
  const expenditures = await expenditureByDate(db, dates[dates.length - 1], dates[0]);

  return dates.map((date) => {
    const bucket = buckets.get(date);
    if (!bucket) throw new Error(`Missing summary bucket for ${date}`);
    const expenditure = round2(expenditures.get(date) ?? 0);

    const revenue = product ? bucket.productRevenue : bucket.revenue - expenditure;
    const cost = product ? bucket.productCost : bucket.cost;
    return {
      date,
      revenue: round2(revenue),
      cost: round2(cost),
      expenditure,
      profit: round2(revenue - cost),
      count: bucket.count,
      products_sold: [...bucket.productNames].sort(),
      product_quantity: bucket.productQuantity,
    };
  });
}

export async function listSales(options: SaleListOptions): Promise<SaleListResult> {
  const db = getDb();
  const { page = 1, limit = 20 } = options;

  const sales = await loadFilteredSales(db, options);
  const profits = await computeProfits(db, sales);
  const lines = await loadLines(db, sales.map((s) => s.id));

  const totalAmount = round2(sales.reduce((sum, s) => sum + s.total_amount, 0));
  const overallProfit = round2(sales.reduce((sum, s) => sum + (profits.get(s.id) ?? 0), 0));

  let daily = await buildDailySummary(db, sales, profits, lines, options);
  if (!hasAnyFilter(options)) daily = daily.slice(0, UNFILTERED_SUMMARY_DAYS);

  const pageSales = sales.slice((page - 1) * limit, page * limit);
  const products = await describeProducts(db, pageSales, lines);
  const creators = await creatorNames(db, pageSales);

  const customerIds = [...new Set(pageSales.flatMap((s) => (s.customer_id === null ? [] : [s.customer_id])))];
  const customers: Pick<CustomerRow, 'id' | 'name'>[] = customerIds.length
    ? await db('customers').whereIn('id', customerIds).select('id', 'name')
    : [];
  const customerNames = new Map(customers.map((c) => [c.id, c.name]));

  const data: SaleListRow[] = pageSales.map((sale) => ({
    ...sale,
    customer_name: sale.customer_id === null ? null : customerNames.get(sale.customer_id) ?? null,
    created_by_display: creators.get(sale.id) ?? null,
    profit: profits.get(sale.id) ?? 0,
    products: products.get(sale.id) ?? null,
    item_count: lines.get(sale.id)?.length ?? 0,
  }));

  return {
    data,
    total: sales.length,
    page,
    limit,
    totalPages: Math.ceil(sales.length / limit),
    total_amount: totalAmount,
    overall_profit: overallProfit,
    total_expenditure: await totalExpenditure(db, options),
    daily_summary: daily,
    summary_totals: {
      sold: round2(daily.reduce((sum, d) => sum + d.revenue, 0)),
      profit: round2(daily.reduce((sum, d) => sum + d.profit, 0)),
      product_quantity: daily.reduce((sum, d) => sum + d.product_quantity, 0),
    },
  };
}

/** Paid sales per local date, oldest first. Defaults to the last 30 days. */
export async function getSalesChart(range: { start_date?: string; end_date?: string }): Promise<SalesChart> {
  const db = getDb();
  const end = range.end_date ?? todayLocal();
  const start = range.start_date ?? addDays(end, -29);

  const rows: Pick<SaleRow, 'sale_date' | 'total_amount'>[] = await db('sales')
    .where('is_paid', true)
    .where('sale_date', '>=', localDayStart(start))
    .where('sale_date', '<', localDayStart(addDays(end, 1)))
    .select('sale_date', 'total_amount');

  const totals = new Map<string, number>();
  for (const row of rows) {
    const date = toLocalDateString(row.sale_date);
    totals.set(date, (totals.get(date) ?? 0) + parseNum(row.total_amount));
  }

  const labels = [...totals.keys()].sort();
  return { labels, data: labels.map((label) => round2(totals.get(label) ?? 0)) };
}
