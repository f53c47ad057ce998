import { z } from 'zod';
import { EXPENDITURE_CATEGORIES } from '../../shared/constants';
import { localDateSchema, moneySchema } from './common.schema';

export const expenditureCreateSchema = z.object({
  category: z.enum(EXPENDITURE_CATEGORIES),
  description: z.string().trim().min(1).max(2000),
  amount: moneySchema.positive('Amount must be greater than zero'),
  expense_date: z.coerce.date().optional(),
});

const expenditureFilterFields = {
  start_date: localDateSchema.optional(),
  end_date: localDateSchema.optional(),
  category: z.enum(EXPENDITURE_CATEGORIES).optional(),
};

export const expenditureFilterQuerySchema = z.object(expenditureFilterFields);

export const expenditureListQuerySchema = z.object({
  ...expenditureFilterFields,
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});
