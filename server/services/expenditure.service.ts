import { Knex } from 'knex';
import { BaseService } from './base.service';
import type { ExpenditureRow } from '../database/rows';
import type { ActorContext, Expenditure, ExpenditureCategory, PaginatedResult } from '../../shared/types';
import { mapExpenditure } from './mappers';
import { NotFoundError, ValidationError } from '../utils/errors';
import { addDays, localDayStart } from '../utils/formatters';
import { parseNum, round2 } from '../utils/numbers';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('expenditures');

export interface ExpenditureInput {
  category: ExpenditureCategory;
  description: string;
  amount: number;
  expense_date?: Date;
}

export interface ExpenditureFilters {
  start_date?: string;
  end_date?: string;
  category?: ExpenditureCategory;
}

export interface ExpenditureListOptions extends ExpenditureFilters {
  page?: number;
  limit?: number;
}

export interface ExpenditureListResult extends PaginatedResult<Expenditure> {
  total_spent: number;
}

class ExpenditureService extends BaseService {
  constructor() {
    super('expenditures');
  }

  async createExpenditure(input: ExpenditureInput, actor: ActorContext): Promise<Expenditure> {
    if (!(input.amount > 0)) throw new ValidationError('Expenditure amount must be greater than zero');
    if (!input.description.trim()) throw new ValidationError('Description is required');

    const now = new Date();
    const [row]: ExpenditureRow[] = await this.table()
      .insert({
        category: input.category,
        description: input.description.trim(),
        amount: input.amount,
        expense_date: input.expense_date ?? now,
        created_by: actor.userId,
        created_at: now,
      })
      .returning('*');

    log.info({ expenditureId: row.id, amount: input.amount, actor: actor.username }, 'Expenditure recorded');
    return mapExpenditure(row);
  }

  private filtered(filters: ExpenditureFilters): Knex.QueryBuilder {
    const query = this.table();
    if (filters.start_date) query.where('expense_date', '>=', localDayStart(filters.start_date));
    if (filters.end_date) query.where('expense_date', '<', localDayStart(addDays(filters.end_date, 1)));
    if (filters.category) query.where('category', filters.category);
    return query;
  }

  async listExpenditures(options: ExpenditureListOptions): Promise<ExpenditureListResult> {
    const query = this.filtered(options);
    const sum: { total: number | string | null } | undefined = await query.clone().sum({ total: 'amount' }).first();

    const page = await this.paginate(
      query,
      { page: options.page, limit: options.limit, sortBy: 'expenditures.expense_date', sortOrder: 'desc' },
      mapExpenditure
    );
    return { ...page, total_spent: round2(parseNum(sum?.total)) };
  }

  /** Every matching expenditure, newest first, for exports */
  async getAllExpenditures(filters: ExpenditureFilters): Promise<Expenditure[]> {
    const rows: ExpenditureRow[] = await this.filtered(filters).orderBy('expense_date', 'desc').orderBy('id', 'desc');
    return rows.map(mapExpenditure);
  }

  async deleteExpenditure(id: number, actor: ActorContext): Promise<void> {
    const deleted = await this.table().where({ id }).del();
    if (deleted === 0) throw new NotFoundError('Expenditure not found', 'expenditure', id);
    log.info({ expenditureId: id, actor: actor.username }, 'Expenditure deleted');
  }
}

export const expenditureService = new ExpenditureService();
