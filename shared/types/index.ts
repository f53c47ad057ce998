// ============================================================
// Enumerations
// ============================================================

export type PaymentMethod = 'cash' | 'card' | 'bank_transfer' | 'credit';
export type DebtStatus = 'pending' | 'partial' | 'paid';
/** Stored status plus the computed `overdue` */
export type DebtDisplayStatus = DebtStatus | 'overdue';
export type DebtOrigin = 'auto' | 'manual';
export type ExpenditureCategory = 'supplies' | 'rent' | 'utilities' | 'salary' | 'marketing' | 'other';
export type UnitType = 'carton' | 'piece' | 'box' | 'pack';
export type MessageChannel = 'sms' | 'whatsapp';

// ============================================================
// Actor: who performs a mutation (passed explicitly, never ambient)
// ============================================================

export interface ActorContext {
  userId: number;
  username: string;
}

// ============================================================
// Users & master data
// ============================================================

export interface User {
  id: number;
  username: string;
  full_name: string | null;
  email: string | null;
  is_active: boolean;
  last_login_at: Date | null;
  created_at: Date;
}

export interface Category {
  id: number;
  name: string;
  description: string | null;
  created_at: Date;
}

export interface Supplier {
  id: number;
  name: string;
  contact_person: string | null;
  phone: string | null;
  email: string | null;
  address: string | null;
  is_active: boolean;
  created_at: Date;
}

export interface Customer {
  id: number;
  name: string;
  email: string | null;
  phone: string | null;
  address: string | null;
  is_active: boolean;
  created_at: Date;
}

// ============================================================
// Inventory
// ============================================================

export interface Item {
  id: number;
  name: string;
  description: string | null;
  category_id: number | null;
  sku: string;
  unit_price: number;
  cost_price: number;
  stock_quantity: number;
  minimum_stock: number;
  supplier: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
  // derived
  is_low_stock: boolean;
  profit_margin: number;
}

export interface Product {
  id: number;
  name: string;
  description: string | null;
  category_id: number | null;
  supplier_id: number | null;
  item_id: number | null;
  sku: string;
  supplier_price: number;
  selling_price: number;
  units_per_carton: number;
  carton_weight: number | null;
  unit_type: UnitType;
  cartons_in_stock: number;
  minimum_cartons: number;
  notes: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
  // derived
  total_units_in_stock: number;
  is_low_stock: boolean;
  profit_per_carton: number;
  profit_margin: number;
  stock_value: number;
}

// ============================================================
// Sales
// ============================================================

/** What a line sells: a retail item by the unit or a wholesale product by the carton */
export type SaleLineTarget =
  | { kind: 'retail'; itemId: number }
  | { kind: 'wholesale'; productId: number };

/** A normal sale, or the synthetic sale recording a payment against a debt */
export type SaleOrigin =
  | { kind: 'normal' }
  | { kind: 'payment_record'; debtId: number };

export interface Sale {
  id: number;
  origin: SaleOrigin;
  customer_id: number | null;
  sale_date: Date;
  total_amount: number;
  payment_method: PaymentMethod;
  is_paid: boolean;
  notes: string | null;
  created_by: number | null;
}

export interface SaleLine {
  id: number;
  sale_id: number;
  target: SaleLineTarget;
  quantity: number;
  unit_price: number;
  total_price: number;
}

export interface SaleLineDetail extends SaleLine {
  name: string;
  sku: string;
}

export interface SaleDetail extends Sale {
  customer: Customer | null;
  created_by_username: string | null;
  lines: SaleLineDetail[];
  profit: number;
  /** "Blue Pen (3), A4 Paper (1)"; null when nothing can be named */
  products: string | null;
}

export interface SaleListRow extends Sale {
  customer_name: string | null;
  created_by_display: string | null;
  profit: number;
  products: string | null;
  item_count: number;
}

export interface DailySummary {
  date: string;
  revenue: number;
  cost: number;
  expenditure: number;
  profit: number;
  count: number;
  products_sold: string[];
  product_quantity: number;
}

// ============================================================
// Debts & payments
// ============================================================

export interface Debt {
  id: number;
  customer_id: number;
  sale_id: number | null;
  item_id: number;
  quantity: number;
  amount: number;
  paid_amount: number;
  due_date: string;
  status: DebtStatus;
  origin: DebtOrigin;
  description: string | null;
  created_by: number | null;
  created_at: Date;
  updated_at: Date;
  // derived
  remaining_amount: number;
  is_overdue: boolean;
  display_status: DebtDisplayStatus;
}

export interface Payment {
  id: number;
  debt_id: number;
  sale_id: number | null;
  amount: number;
  payment_method: PaymentMethod;
  notes: string | null;
  payment_date: Date;
  created_by: number | null;
}

export interface DebtWithRelations extends Debt {
  customer: Customer;
  item: Item;
}

export interface DebtDetail extends DebtWithRelations {
  payments: Payment[];
}

// ============================================================
// Expenditures
// ============================================================

export interface Expenditure {
  id: number;
  category: ExpenditureCategory;
  description: string;
  amount: number;
  expense_date: Date;
  created_by: number | null;
  created_at: Date;
}

// ============================================================
// Messaging
// ============================================================

export interface SendResult {
  success: boolean;
  error?: string;
  recipient?: string;
}

export interface BulkSendResult {
  sent: number;
  failed: number;
  errors: string[];
}

// ============================================================
// API envelopes
// ============================================================

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}
