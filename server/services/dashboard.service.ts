// =============================================================
// File: server/services/dashboard.service.ts
// Description: Front page figures. Day and month windows are
//              local-time ranges in the business time zone.
// =============================================================

import { BaseService } from './base.service';
import type { Db } from '../database/connection';
import type { CustomerRow, SaleRow } from '../database/rows';
import type { DebtWithRelations, Item, Product, Sale } from '../../shared/types';
import { mapSale } from './mappers';
import { itemService } from './item.service';
import { productService } from './product.service';
import { debtService } from './debt.service';
import { describeProducts } from './sale-details';
import { addDays, localDayStart, monthStart, todayLocal } from '../utils/formatters';
import { parseIntSafe, parseNum, round2 } from '../utils/numbers';

export interface PeriodTotals {
  sales_total: number;
  sales_count: number;
  expenditure_total: number;
  expenditure_count: number;
  /** sales − expenditures */
  net: number;
}

export interface RecentSale extends Sale {
  customer_name: string | null;
  products: string | null;
}

export interface DashboardSummary {
  recent_sales: RecentSale[];
  low_stock_items: Item[];
  low_stock_products: Product[];
  overdue_debts: DebtWithRelations[];
  today: PeriodTotals;
  month: PeriodTotals;
  total_outstanding_debt: number;
}

interface SumCount {
  total: number | string | null;
  count: number | string | null;
}

class DashboardService extends BaseService {
  constructor() {
    super('sales');
  }

  private async periodTotals(db: Db, start: Date, end: Date): Promise<PeriodTotals> {
    const sales: SumCount | undefined = await db('sales')
      .where('is_paid', true)
      .where('sale_date', '>=', start)
      .where('sale_date', '<', end)
      .sum({ total: 'total_amount' })
      .count<SumCount[]>({ count: 'id' })
      .first();
    const expenditures: SumCount | undefined = await db('expenditures')
      .where('expense_date', '>=', start)
      .where('expense_date', '<', end)
      .sum({ total: 'amount' })
      .count<SumCount[]>({ count: 'id' })
      .first();

    const salesTotal = round2(parseNum(sales?.total));
    const expenditureTotal = round2(parseNum(expenditures?.total));
    return {
      sales_total: salesTotal,
      sales_count: parseIntSafe(sales?.count),
      expenditure_total: expenditureTotal,
      expenditure_count: parseIntSafe(expenditures?.count),
      net: round2(salesTotal - expenditureTotal),
    };
  }

  private async recentSales(db: Db): Promise<RecentSale[]> {
    const rows: SaleRow[] = await db('sales')
      .where('is_paid', true)
      .whereExists(function () {
        this.select('sale_line_items.id').from('sale_line_items').whereRaw('sale_line_items.sale_id = sales.id');
      })
      .orderBy('sale_date', 'desc')
      .orderBy('id', 'desc')
      .limit(10);
    const sales = rows.map(mapSale);

    const products = await describeProducts(db, sales);
    const customerIds = [...new Set(sales.flatMap((s) => (s.customer_id === null ? [] : [s.customer_id])))];
    const customers: Pick<CustomerRow, 'id' | 'name'>[] = customerIds.length
      ? await db('customers').whereIn('id', customerIds).select('id', 'name')
      : [];
    const names = new Map(customers.map((c) => [c.id, c.name]));

    return sales.map((sale) => ({
      ...sale,
      customer_name: sale.customer_id === null ? null : names.get(sale.customer_id) ?? null,
      products: products.get(sale.id) ?? null,
    }));
  }

  async getSummary(): Promise<DashboardSummary> {
    const db = this.db;
    const today = todayLocal();
    const tomorrow = localDayStart(addDays(today, 1));
    const firstOfMonth = monthStart(today);
    const nextMonth = localDayStart(monthStart(addDays(firstOfMonth, 32)));

    const [recent, lowItems, lowProducts, overdue, todayTotals, monthTotals, outstanding] = await Promise.all([
      this.recentSales(db),
      itemService.listLowStockItems(db),
      productService.listLowStockProducts(db),
      debtService.listOverdueDebts(db),
      this.periodTotals(db, localDayStart(today), tomorrow),
      this.periodTotals(db, localDayStart(firstOfMonth), nextMonth),
      debtService.getOutstandingDebtTotal(db),
    ]);

    return {
      recent_sales: recent,
      low_stock_items: lowItems,
      low_stock_products: lowProducts,
      overdue_debts: overdue,
      today: todayTotals,
      month: monthTotals,
      total_outstanding_debt: outstanding,
    };
  }
}

export const dashboardService = new DashboardService();
