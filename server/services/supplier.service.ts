import { BaseService, ListOptions, definedOnly } from './base.service';
import type { SupplierRow } from '../database/rows';
import type { PaginatedResult, Supplier } from '../../shared/types';
import { mapSupplier } from './mappers';
import { NotFoundError } from '../utils/errors';

export interface SupplierInput {
  name: string;
  contact_person?: string | null;
  phone?: string | null;
  email?: string | null;
  address?: string | null;
  is_active?: boolean;
}

class SupplierService extends BaseService {
  constructor() {
    super('suppliers');
  }

  async createSupplier(input: SupplierInput): Promise<Supplier> {
    const [row]: SupplierRow[] = await this.table()
      .insert({ ...definedOnly(input), is_active: input.is_active ?? true, created_at: new Date() })
      .returning('*');
    return mapSupplier(row);
  }

  async updateSupplier(id: number, patch: Partial<SupplierInput>): Promise<Supplier> {
    const changes = definedOnly(patch);
    if (Object.keys(changes).length === 0) return this.getSupplier(id);

    const [row]: SupplierRow[] = await this.table().where({ id }).update(changes).returning('*');
    if (!row) throw new NotFoundError('Supplier not found', 'supplier', id);
    return mapSupplier(row);
  }

  async getSupplier(id: number): Promise<Supplier> {
    const row: SupplierRow | undefined = await this.table().where({ id }).first();
    if (!row) throw new NotFoundError('Supplier not found', 'supplier', id);
    return mapSupplier(row);
  }

  async listSuppliers(options: ListOptions): Promise<PaginatedResult<Supplier>> {
    const query = this.table().where('suppliers.is_active', true);
    this.applySearch(query, options.search, ['suppliers.name', 'suppliers.contact_person', 'suppliers.email']);
    return this.paginate(query, { sortBy: 'suppliers.name', sortOrder: 'asc', ...options }, mapSupplier);
  }
}

export const supplierService = new SupplierService();
