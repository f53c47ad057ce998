// =============================================================
// File: server/database/rows.ts
// Description: Column shapes as the drivers return them. pg
//              gives booleans and Dates; SQLite gives 0/1 and
//              epoch millis. Services map these to shared/types.
// =============================================================

import type {
  DebtOrigin,
  DebtStatus,
  ExpenditureCategory,
  PaymentMethod,
  UnitType,
} from '../../shared/types';
import type { DbTimestamp } from '../utils/formatters';

export type SqlBool = boolean | number;

export interface UserRow {
  id: number;
  username: string;
  full_name: string | null;
  email: string | null;
  password_hash: string;
  is_active: SqlBool;
  last_login_at: DbTimestamp | null;
  created_at: DbTimestamp;
}

export interface CategoryRow {
  id: number;
  name: string;
  description: string | null;
  created_at: DbTimestamp;
}

export interface SupplierRow {
  id: number;
  name: string;
  contact_person: string | null;
  phone: string | null;
  email: string | null;
  address: string | null;
  is_active: SqlBool;
  created_at: DbTimestamp;
}

export interface CustomerRow {
  id: number;
  name: string;
  email: string | null;
  phone: string | null;
  address: string | null;
  is_active: SqlBool;
  created_at: DbTimestamp;
}

export interface ItemRow {
  id: number;
  name: string;
  description: string | null;
  category_id: number | null;
  sku: string;
  unit_price: number | string;
  cost_price: number | string;
  stock_quantity: number;
  minimum_stock: number;
  supplier: string | null;
  is_active: SqlBool;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface ProductRow {
  id: number;
  name: string;
  description: string | null;
  category_id: number | null;
  supplier_id: number | null;
  item_id: number | null;
  sku: string;
  supplier_price: number | string;
  selling_price: number | string;
  units_per_carton: number;
  carton_weight: number | string | null;
  unit_type: UnitType;
  cartons_in_stock: number;
  minimum_cartons: number;
  notes: string | null;
  is_active: SqlBool;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export type SaleKind = 'normal' | 'payment_record';
export type LineType = 'retail' | 'wholesale';

export interface SaleRow {
  id: number;
  kind: SaleKind;
  payment_debt_id: number | null;
  customer_id: number | null;
  sale_date: DbTimestamp;
  total_amount: number | string;
  payment_method: PaymentMethod;
  is_paid: SqlBool;
  notes: string | null;
  created_by: number | null;
}

export interface SaleLineRow {
  id: number;
  sale_id: number;
  line_type: LineType;
  item_id: number | null;
  product_id: number | null;
  quantity: number;
  unit_price: number | string;
  total_price: number | string;
}

export interface DebtRow {
  id: number;
  customer_id: number;
  sale_id: number | null;
  item_id: number;
  quantity: number;
  amount: number | string;
  paid_amount: number | string;
  due_date: string;
  status: DebtStatus;
  origin: DebtOrigin;
  description: string | null;
  created_by: number | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface PaymentRow {
  id: number;
  debt_id: number;
  sale_id: number | null;
  amount: number | string;
  payment_method: PaymentMethod;
  notes: string | null;
  payment_date: DbTimestamp;
  created_by: number | null;
}

export interface ExpenditureRow {
  id: number;
  category: ExpenditureCategory;
  description: string;
  amount: number | string;
  expense_date: DbTimestamp;
  created_by: number | null;
  created_at: DbTimestamp;
}
