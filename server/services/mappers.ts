import type {
  Category,
  Customer,
  Debt,
  DebtStatus,
  Expenditure,
  Item,
  Payment,
  Product,
  Sale,
  SaleLine,
  SaleLineTarget,
  Supplier,
  User,
} from '../../shared/types';
import type {
  CategoryRow,
  CustomerRow,
  DebtRow,
  ExpenditureRow,
  ItemRow,
  LineType,
  PaymentRow,
  ProductRow,
  SaleLineRow,
  SaleRow,
  SupplierRow,
  UserRow,
} from '../database/rows';
import { parseNum, round2, toBool } from '../utils/numbers';
import { toDate, todayLocal } from '../utils/formatters';

// ─── Debt status rule ───────────────────────────────────────────

export function computeDebtStatus(amount: number, paidAmount: number): DebtStatus {
  if (paidAmount >= amount) return 'paid';
  if (paidAmount > 0) return 'partial';
  return 'pending';
}

export function isDebtOverdue(dueDate: string, status: DebtStatus, today: string = todayLocal()): boolean {
  return status !== 'paid' && dueDate < today;
}

// ─── Row mappers ────────────────────────────────────────────────

export function mapUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    full_name: row.full_name,
    email: row.email,
    is_active: toBool(row.is_active),
    last_login_at: row.last_login_at === null ? null : toDate(row.last_login_at),
    created_at: toDate(row.created_at),
  };
}

export function mapCategory(row: CategoryRow): Category {
  return { ...row, created_at: toDate(row.created_at) };
}

export function mapSupplier(row: SupplierRow): Supplier {
  return { ...row, is_active: toBool(row.is_active), created_at: toDate(row.created_at) };
}

export function mapCustomer(row: CustomerRow): Customer {
  return { ...row, is_active: toBool(row.is_active), created_at: toDate(row.created_at) };
}

export function mapItem(row: ItemRow): Item {
  const unitPrice = parseNum(row.unit_price);
  const costPrice = parseNum(row.cost_price);
  return {
    ...row,
    unit_price: unitPrice,
    cost_price: costPrice,
    is_active: toBool(row.is_active),
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
    is_low_stock: row.stock_quantity <= row.minimum_stock,
    profit_margin: costPrice > 0 ? round2(((unitPrice - costPrice) / costPrice) * 100) : 0,
  };
}

export function mapProduct(row: ProductRow): Product {
  const supplierPrice = parseNum(row.supplier_price);
  const sellingPrice = parseNum(row.selling_price);
  const profitPerCarton = round2(sellingPrice - supplierPrice);
  return {
    ...row,
    supplier_price: supplierPrice,
    selling_price: sellingPrice,
    carton_weight: row.carton_weight === null ? null : parseNum(row.carton_weight),
    is_active: toBool(row.is_active),
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
    total_units_in_stock: row.cartons_in_stock * row.units_per_carton,
    is_low_stock: row.cartons_in_stock <= row.minimum_cartons,
    profit_per_carton: profitPerCarton,
    profit_margin: supplierPrice > 0 ? round2((profitPerCarton / supplierPrice) * 100) : 0,
    stock_value: round2(row.cartons_in_stock * sellingPrice),
  };
}

export function mapSale(row: SaleRow): Sale {
  return {
    id: row.id,
    origin:
      row.kind === 'payment_record' && row.payment_debt_id !== null
        ? { kind: 'payment_record', debtId: row.payment_debt_id }
        : { kind: 'normal' },
    customer_id: row.customer_id,
    sale_date: toDate(row.sale_date),
    total_amount: parseNum(row.total_amount),
    payment_method: row.payment_method,
    is_paid: toBool(row.is_paid),
    notes: row.notes,
    created_by: row.created_by,
  };
}

export function lineTargetOf(row: SaleLineRow): SaleLineTarget {
  if (row.line_type === 'retail' && row.item_id !== null) {
    return { kind: 'retail', itemId: row.item_id };
  }
  if (row.line_type === 'wholesale' && row.product_id !== null) {
    return { kind: 'wholesale', productId: row.product_id };
  }
  throw new Error(`Line item ${row.id} has no ${row.line_type} reference`);
}

/** Columns that store a line target */
export function lineTargetColumns(target: SaleLineTarget): {
  line_type: LineType;
  item_id: number | null;
  product_id: number | null;
} {
  return target.kind === 'retail'
    ? { line_type: 'retail', item_id: target.itemId, product_id: null }
    : { line_type: 'wholesale', item_id: null, product_id: target.productId };
}

export function mapSaleLine(row: SaleLineRow): SaleLine {
  return {
    id: row.id,
    sale_id: row.sale_id,
    target: lineTargetOf(row),
    quantity: row.quantity,
    unit_price: parseNum(row.unit_price),
    total_price: parseNum(row.total_price),
  };
}

export function mapDebt(row: DebtRow, today: string = todayLocal()): Debt {
  const amount = parseNum(row.amount);
  const paidAmount = parseNum(row.paid_amount);
  const overdue = isDebtOverdue(row.due_date, row.status, today);
  return {
    ...row,
    amount,
    paid_amount: paidAmount,
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
    remaining_amount: round2(amount - paidAmount),
    is_overdue: overdue,
    display_status: overdue ? 'overdue' : row.status,
  };
}

export function mapPayment(row: PaymentRow): Payment {
  return { ...row, amount: parseNum(row.amount), payment_date: toDate(row.payment_date) };
}

export function mapExpenditure(row: ExpenditureRow): Expenditure {
  return {
    ...row,
    amount: parseNum(row.amount),
    expense_date: toDate(row.expense_date),
    created_at: toDate(row.created_at),
  };
}
