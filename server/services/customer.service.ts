import { BaseService, ListOptions, definedOnly } from './base.service';
import type { CustomerRow, DebtRow, SaleRow } from '../database/rows';
import type { Customer, Debt, PaginatedResult, Sale } from '../../shared/types';
import { mapCustomer, mapDebt, mapSale } from './mappers';
import { NotFoundError } from '../utils/errors';

export interface CustomerInput {
  name: string;
  email?: string | null;
  phone?: string | null;
  address?: string | null;
  is_active?: boolean;
}

export interface CustomerWithHistory extends Customer {
  recent_sales: Sale[];
  debts: Debt[];
}

class CustomerService extends BaseService {
  constructor() {
    super('customers');
  }

  async createCustomer(input: CustomerInput): Promise<Customer> {
    const [row]: CustomerRow[] = await this.table()
      .insert({ ...definedOnly(input), is_active: input.is_active ?? true, created_at: new Date() })
      .returning('*');
    return mapCustomer(row);
  }

  async updateCustomer(id: number, patch: Partial<CustomerInput>): Promise<Customer> {
    const changes = definedOnly(patch);
    if (Object.keys(changes).length === 0) return this.getCustomer(id);

    const [row]: CustomerRow[] = await this.table().where({ id }).update(changes).returning('*');
    if (!row) throw new NotFoundError('Customer not found', 'customer', id);
    return mapCustomer(row);
  }

  async getCustomer(id: number): Promise<Customer> {
    const row: CustomerRow | undefined = await this.table().where({ id }).first();
    if (!row) throw new NotFoundError('Customer not found', 'customer', id);
    return mapCustomer(row);
  }

  async getCustomerWithHistory(id: number): Promise<CustomerWithHistory> {
    const customer = await this.getCustomer(id);

    const sales: SaleRow[] = await this.db('sales')
      .where({ customer_id: id })
      .orderBy('sale_date', 'desc')
      .limit(10);

    const debts: DebtRow[] = await this.db('debts')
      .where({ customer_id: id })
      .orderBy('created_at', 'desc');

    return { ...customer, recent_sales: sales.map(mapSale), debts: debts.map((d) => mapDebt(d)) };
  }

  async listCustomers(options: ListOptions): Promise<PaginatedResult<Customer>> {
    const query = this.table().where('customers.is_active', true);
    this.applySearch(query, options.search, ['customers.name', 'customers.email', 'customers.phone']);
    return this.paginate(query, { sortBy: 'customers.name', sortOrder: 'asc', ...options }, mapCustomer);
  }
}

export const customerService = new CustomerService();
