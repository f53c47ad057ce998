// =============================================================
// File: server/database/migrations/001_stationery_core.ts
// Description: Full schema for the stationery back office:
//              users, categories, suppliers, customers, items,
//              products, sales, sale_line_items, debts, payments,
//              expenditures.
// =============================================================

import { Knex } from 'knex';
import { DEFAULT_MINIMUM_CARTONS, DEFAULT_MINIMUM_STOCK } from '../../../shared/constants';

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // users
  // ============================================================
  await knex.schema.createTable('users', (t) => {
    t.increments('id');
    t.string('username', 150).notNullable().unique();
    t.string('full_name', 200);
    t.string('email', 255);
    t.string('password_hash', 255).notNullable();
    t.boolean('is_active').notNullable().defaultTo(true);
    t.timestamp('last_login_at', { useTz: true });
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  // ============================================================
  // categories / suppliers / customers
  // ============================================================
  await knex.schema.createTable('categories', (t) => {
    t.increments('id');
    t.string('name', 100).notNullable().unique();
    t.text('description');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('suppliers', (t) => {
    t.increments('id');
    t.string('name', 200).notNullable();
    t.string('contact_person', 100);
    t.string('phone', 20);
    t.string('email', 255);
    t.text('address');
    t.boolean('is_active').notNullable().defaultTo(true);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('customers', (t) => {
    t.increments('id');
    t.string('name', 200).notNullable();
    t.string('email', 255);
    t.string('phone', 20);
    t.text('address');
    t.boolean('is_active').notNullable().defaultTo(true);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  // ============================================================
  // items (retail stock, counted in units)
  // ============================================================
  await knex.schema.createTable('items', (t) => {
    t.increments('id');
    t.string('name', 200).notNullable();
    t.text('description');
    t.integer('category_id').references('id').inTable('categories').onDelete('SET NULL');
    t.string('sku', 100).notNullable().unique();
    t.decimal('unit_price', 12, 2).notNullable();
    t.decimal('cost_price', 12, 2).notNullable();
    t.integer('stock_quantity').notNullable().defaultTo(0);
    t.integer('minimum_stock').notNullable().defaultTo(DEFAULT_MINIMUM_STOCK);
    t.string('supplier', 200);
    t.boolean('is_active').notNullable().defaultTo(true);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.check('stock_quantity >= 0', [], 'chk_items_stock_non_negative');
    t.check('minimum_stock >= 0', [], 'chk_items_minimum_non_negative');
  });

  // ============================================================
  // products (wholesale stock, counted in cartons)
  // item_id is the optional 1:1 mirror item.
  // ============================================================
  await knex.schema.createTable('products', (t) => {
    t.increments('id');
    t.string('name', 200).notNullable();
    t.text('description');
    t.integer('category_id').references('id').inTable('categories').onDelete('SET NULL');
    t.integer('supplier_id').references('id').inTable('suppliers').onDelete('SET NULL');
    t.integer('item_id').unique().references('id').inTable('items').onDelete('SET NULL');
    t.string('sku', 100).notNullable().unique();
    t.decimal('supplier_price', 12, 2).notNullable();
    t.decimal('selling_price', 12, 2).notNullable();
    t.integer('units_per_carton').notNullable();
    t.decimal('carton_weight', 8, 2);
    t.string('unit_type', 20).notNullable().defaultTo('carton');
    t.integer('cartons_in_stock').notNullable().defaultTo(0);
    t.integer('minimum_cartons').notNullable().defaultTo(DEFAULT_MINIMUM_CARTONS);
    t.text('notes');
    t.boolean('is_active').notNullable().defaultTo(true);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.check('cartons_in_stock >= 0', [], 'chk_products_cartons_non_negative');
    t.check('units_per_carton >= 1', [], 'chk_products_units_per_carton');
    t.check(`unit_type IN ('carton', 'piece', 'box', 'pack')`, [], 'chk_products_unit_type');
  });

  // ============================================================
  // sales
  // A payment_record sale stands for cash received against a debt;
  // payment_debt_id points at that debt (no FK: debts reference sales).
  // ============================================================
  await knex.schema.createTable('sales', (t) => {
    t.increments('id');
    t.string('kind', 20).notNullable().defaultTo('normal');
    t.integer('payment_debt_id').index();
    t.integer('customer_id').references('id').inTable('customers').onDelete('SET NULL');
    t.timestamp('sale_date', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.decimal('total_amount', 12, 2).notNullable().defaultTo(0);
    t.string('payment_method', 20).notNullable().defaultTo('cash');
    t.boolean('is_paid').notNullable().defaultTo(true);
    t.text('notes');
    t.integer('created_by').references('id').inTable('users').onDelete('SET NULL');

    t.index(['sale_date']);
    t.check(
      `(kind = 'normal' AND payment_debt_id IS NULL) OR (kind = 'payment_record' AND payment_debt_id IS NOT NULL)`,
      [],
      'chk_sales_kind'
    );
    t.check(
      `payment_method IN ('cash', 'card', 'bank_transfer', 'credit')`,
      [],
      'chk_sales_payment_method'
    );
  });

  // ============================================================
  // sale_line_items
  // Exactly one of item_id / product_id, matching line_type.
  // ============================================================
  await knex.schema.createTable('sale_line_items', (t) => {
    t.increments('id');
    t.integer('sale_id').notNullable().references('id').inTable('sales').onDelete('CASCADE');
    t.string('line_type', 20).notNullable();
    t.integer('item_id').references('id').inTable('items').onDelete('RESTRICT');
    t.integer('product_id').references('id').inTable('products').onDelete('RESTRICT');
    t.integer('quantity').notNullable();
    t.decimal('unit_price', 12, 2).notNullable();
    t.decimal('total_price', 12, 2).notNullable();

    t.unique(['sale_id', 'item_id'], { indexName: 'uq_sale_line_items_item' });
    t.unique(['sale_id', 'product_id'], { indexName: 'uq_sale_line_items_product' });
    t.check('quantity >= 1', [], 'chk_sale_line_items_quantity');
    t.check(
      `(line_type = 'retail' AND item_id IS NOT NULL AND product_id IS NULL) OR ` +
        `(line_type = 'wholesale' AND product_id IS NOT NULL AND item_id IS NULL)`,
      [],
      'chk_sale_line_items_target'
    );
  });

  // ============================================================
  // debts
  // ============================================================
  await knex.schema.createTable('debts', (t) => {
    t.increments('id');
    t.integer('customer_id').notNullable().references('id').inTable('customers').onDelete('CASCADE');
    t.integer('sale_id').references('id').inTable('sales').onDelete('SET NULL');
    t.integer('item_id').notNullable().references('id').inTable('items').onDelete('RESTRICT');
    t.integer('quantity').notNullable().defaultTo(1);
    t.decimal('amount', 12, 2).notNullable();
    t.decimal('paid_amount', 12, 2).notNullable().defaultTo(0);
    t.date('due_date').notNullable();
    t.string('status', 20).notNullable().defaultTo('pending');
    t.string('origin', 20).notNullable().defaultTo('manual');
    t.text('description');
    t.integer('created_by').references('id').inTable('users').onDelete('SET NULL');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.index(['sale_id']);
    t.index(['status', 'due_date']);
    t.check('quantity >= 1', [], 'chk_debts_quantity');
    t.check('amount > 0', [], 'chk_debts_amount');
    t.check('paid_amount >= 0', [], 'chk_debts_paid_amount');
    t.check(`status IN ('pending', 'partial', 'paid')`, [], 'chk_debts_status');
    t.check(`origin IN ('auto', 'manual')`, [], 'chk_debts_origin');
  });

  // ============================================================
  // payments (append-only)
  // ============================================================
  await knex.schema.createTable('payments', (t) => {
    t.increments('id');
    t.integer('debt_id').notNullable().references('id').inTable('debts').onDelete('CASCADE');
    t.integer('sale_id').references('id').inTable('sales').onDelete('SET NULL');
    t.decimal('amount', 12, 2).notNullable();
    t.string('payment_method', 20).notNullable().defaultTo('cash');
    t.text('notes');
    t.timestamp('payment_date', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.integer('created_by').references('id').inTable('users').onDelete('SET NULL');

    t.index(['debt_id']);
    t.check('amount > 0', [], 'chk_payments_amount');
  });

  // ============================================================
  // expenditures
  // ============================================================
  await knex.schema.createTable('expenditures', (t) => {
    t.increments('id');
    t.string('category', 20).notNullable();
    t.string('description', 255).notNullable();
    t.decimal('amount', 12, 2).notNullable();
    t.timestamp('expense_date', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.integer('created_by').references('id').inTable('users').onDelete('SET NULL');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.index(['expense_date']);
    t.check('amount > 0', [], 'chk_expenditures_amount');
    t.check(
      `category IN ('supplies', 'rent', 'utilities', 'salary', 'marketing', 'other')`,
      [],
      'chk_expenditures_category'
    );
  });
}

export async function down(knex: Knex): Promise<void> {
  const tables = [
    'expenditures',
    'payments',
    'debts',
    'sale_line_items',
    'sales',
    'products',
    'items',
    'customers',
    'suppliers',
    'categories',
    'users',
  ];
  for (const table of tables) {
    await knex.schema.dropTableIfExists(table);
  }
}
