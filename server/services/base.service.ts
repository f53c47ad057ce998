import { Knex } from 'knex';
import { getDb, Db } from '../database/connection';
import type { PaginatedResult } from '../../shared/types';
import { parseIntSafe } from '../utils/numbers';

export interface ListOptions {
  page?: number;
  limit?: number;
  search?: string;
  sortBy?: string;
  sortOrder?: 'asc' | 'desc';
}

/** Drops keys whose value is undefined so partial patches only touch given columns */
export function definedOnly(data: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(data).filter(([, value]) => value !== undefined));
}

export class BaseService {
  protected tableName: string;

  constructor(tableName: string) {
    this.tableName = tableName;
  }

  protected get db(): Knex {
    return getDb();
  }

  /** Root builder for this service's table, on `db` or an open transaction */
  protected table(db: Db = this.db): Knex.QueryBuilder {
    return db(this.tableName);
  }

  protected async paginate<TRow, TOut>(
    query: Knex.QueryBuilder,
    options: ListOptions,
    map: (row: TRow) => TOut
  ): Promise<PaginatedResult<TOut>> {
    const {
      page = 1,
      limit = 50,
      sortBy = `${this.tableName}.id`,
      sortOrder = 'desc',
    } = options;

    const offset = (page - 1) * limit;

    const countResult: { total: number | string } | undefined = await query
      .clone()
      .clearSelect()
      .clearOrder()
      .count(`${this.tableName}.id as total`)
      .first();
    const total = parseIntSafe(countResult?.total);

    const rows: TRow[] = await query
      .clone()
      .select(`${this.tableName}.*`)
      .orderBy(sortBy, sortOrder)
      .limit(limit)
      .offset(offset);

    return {
      data: rows.map((row) => map(row)),
      total,
      page,
      limit,
      totalPages: Math.ceil(total / limit),
    };
  }

  /** Adds a case-insensitive OR search over the given columns */
  protected applySearch(query: Knex.QueryBuilder, search: string | undefined, fields: string[]): void {
    if (!search || fields.length === 0) return;
    query.where(function () {
      for (const field of fields) {
        this.orWhereILike(field, `%${search}%`);
      }
    });
  }
}
