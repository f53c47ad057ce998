/**
 * Test data factories: creates master data and sales for test scenarios.
 * Factories go through the services wherever the service applies business
 * rules, and insert directly only for plain rows such as users.
 */

import { getTestDb } from '../setup';
import type { UserRow } from '../../server/database/rows';
import type { ActorContext, Customer, Item, Product, SaleDetail } from '../../shared/types';
import { customerService } from '../../server/services/customer.service';
import { itemService, ItemInput } from '../../server/services/item.service';
import { productService, ProductInput } from '../../server/services/product.service';
import { saleService, CreateSaleInput, SaleLineInput } from '../../server/services/sale.service';

// ── Counters for unique names ──────────────────────────────────────

let counters: Record<string, number> = {};
function nextCode(prefix: string): string {
  counters[prefix] = (counters[prefix] || 0) + 1;
  return `${prefix}-${String(counters[prefix]).padStart(4, '0')}`;
}

export function resetCounters() {
  counters = {};
}

// ── Users ──────────────────────────────────────────────────────────

export interface TestUser {
  row: UserRow;
  actor: ActorContext;
}

/** Inserted directly; the hash is a placeholder, so this user cannot log in */
export async function createUser(overrides: Partial<Pick<UserRow, 'username' | 'full_name'>> = {}): Promise<TestUser> {
  const db = getTestDb();
  const [row]: UserRow[] = await db('users')
    .insert({
      username: overrides.username ?? nextCode('clerk').toLowerCase(),
      full_name: overrides.full_name ?? null,
      email: null,
      password_hash: 'not-a-real-hash',
      is_active: true,
      created_at: new Date(),
    })
    .returning('*');
  return { row, actor: { userId: row.id, username: row.username } };
}

// ── Master data ────────────────────────────────────────────────────

export async function createCustomer(overrides: { name?: string; phone?: string | null } = {}): Promise<Customer> {
  return customerService.createCustomer({
    name: overrides.name ?? `Customer ${nextCode('CUS')}`,
    phone: overrides.phone === undefined ? '0712345678' : overrides.phone,
  });
}

export async function createItem(overrides: Partial<ItemInput> = {}): Promise<Item> {
  return itemService.createItem({
    name: overrides.name ?? `Item ${nextCode('ITM')}`,
    unit_price: 500,
    cost_price: 300,
    stock_quantity: 100,
    minimum_stock: 10,
    ...overrides,
  });
}

export async function createProduct(overrides: Partial<ProductInput> = {}): Promise<Product> {
  return productService.createProduct({
    name: overrides.name ?? `Product ${nextCode('PRD')}`,
    supplier_price: 20000,
    selling_price: 24000,
    units_per_carton: 48,
    cartons_in_stock: 10,
    minimum_cartons: 2,
    ...overrides,
  });
}

// ── Sales ──────────────────────────────────────────────────────────

export function retail(itemId: number, quantity: number, unitPrice?: number): SaleLineInput {
  return { target: { kind: 'retail', itemId }, quantity, unit_price: unitPrice };
}

export function wholesale(productId: number, quantity: number, unitPrice?: number): SaleLineInput {
  return { target: { kind: 'wholesale', productId }, quantity, unit_price: unitPrice };
}

export async function createSale(
  actor: ActorContext,
  lines: SaleLineInput[],
  overrides: Omit<Partial<CreateSaleInput>, 'lines'> = {}
): Promise<SaleDetail> {
  return saleService.createSale({ ...overrides, lines }, actor);
}
