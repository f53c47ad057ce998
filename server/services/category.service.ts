import { BaseService } from './base.service';
import type { CategoryRow } from '../database/rows';
import type { Category } from '../../shared/types';
import { mapCategory } from './mappers';
import { ValidationError } from '../utils/errors';
import { moduleLogger } from '../utils/logger';
import defaultCategories from '../database/seeds/default-categories.json';

const log = moduleLogger('categories');

export interface CreateCategoryInput {
  name: string;
  description?: string | null;
}

class CategoryService extends BaseService {
  constructor() {
    super('categories');
  }

  async listCategories(): Promise<Category[]> {
    const rows: CategoryRow[] = await this.table().orderBy('name', 'asc');
    return rows.map(mapCategory);
  }

  async getCategory(id: number): Promise<Category | null> {
    const row: CategoryRow | undefined = await this.table().where({ id }).first();
    return row ? mapCategory(row) : null;
  }

  async createCategory(input: CreateCategoryInput): Promise<Category> {
    const name = input.name.trim();
    const existing: CategoryRow | undefined = await this.table().where({ name }).first();
    if (existing) throw new ValidationError(`Category "${name}" already exists`);

    const [row]: CategoryRow[] = await this.table()
      .insert({ name, description: input.description ?? null, created_at: new Date() })
      .returning('*');
    return mapCategory(row);
  }

  /**
   * Create-if-absent by name for the default catalogue. Safe to run repeatedly.
   */
  async ensureDefaultCategories(): Promise<{ created: string[]; existing: string[] }> {
    const created: string[] = [];
    const existing: string[] = [];

    await this.db.transaction(async (trx) => {
      for (const category of defaultCategories) {
        const found: CategoryRow | undefined = await trx('categories').where({ name: category.name }).first();
        if (found) {
          existing.push(category.name);
          continue;
        }
        await trx('categories').insert({
          name: category.name,
          description: category.description,
          created_at: new Date(),
        });
        created.push(category.name);
      }
    });

    log.info({ created: created.length, existing: existing.length }, 'Default categories ensured');
    return { created, existing };
  }
}

export const categoryService = new CategoryService();
