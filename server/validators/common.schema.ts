import { z } from 'zod';
import { isValidDateString } from '../utils/formatters';

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

/** A calendar date, YYYY-MM-DD */
export const localDateSchema = z
  .string()
  .refine(isValidDateString, { message: 'Expected a date in YYYY-MM-DD format' });

/** Query string flag: "true"/"1" or "false"/"0" */
export const queryBooleanSchema = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  search: z.string().trim().optional(),
});

export const moneySchema = z.number().finite().multipleOf(0.01, 'At most two decimal places');

export const priceSchema = moneySchema.min(0.01, 'Price must be at least 0.01');
