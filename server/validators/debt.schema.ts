import { z } from 'zod';
import { DEBT_STATUSES, PAYMENT_METHODS } from '../../shared/constants';
import { localDateSchema, moneySchema, paginationSchema, queryBooleanSchema } from './common.schema';

export const debtCreateSchema = z.object({
  customer_id: z.number().int().positive(),
  item_id: z.number().int().positive(),
  quantity: z.number().int().min(1).optional(),
  amount: moneySchema.positive().optional(),
  due_date: localDateSchema,
  description: z.string().max(2000).nullish(),
});

export const paymentCreateSchema = z.object({
  amount: moneySchema.positive('Payment amount must be greater than zero'),
  payment_method: z.enum(PAYMENT_METHODS).optional(),
  notes: z.string().max(2000).nullish(),
});

export const debtListQuerySchema = paginationSchema.extend({
  status: z.enum([...DEBT_STATUSES, 'overdue']).optional(),
  customer_id: z.coerce.number().int().positive().optional(),
  overdue: queryBooleanSchema.optional(),
});
