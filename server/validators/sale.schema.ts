import { z } from 'zod';
import { PAYMENT_METHODS } from '../../shared/constants';
import type { SaleLineInput } from '../services/sale.service';
import { localDateSchema, moneySchema } from './common.schema';

const quantitySchema = z.number().int().min(1);
const unitPriceSchema = moneySchema.min(0).optional();

/** A line on the wire; becomes a SaleLineInput with a typed target */
export const saleLineSchema = z
  .discriminatedUnion('type', [
    z.object({
      type: z.literal('retail'),
      item_id: z.number().int().positive(),
      quantity: quantitySchema,
      unit_price: unitPriceSchema,
    }),
    z.object({
      type: z.literal('wholesale'),
      product_id: z.number().int().positive(),
      quantity: quantitySchema,
      unit_price: unitPriceSchema,
    }),
  ])
  .transform(
    (line): SaleLineInput => ({
      target:
        line.type === 'retail'
          ? { kind: 'retail', itemId: line.item_id }
          : { kind: 'wholesale', productId: line.product_id },
      quantity: line.quantity,
      unit_price: line.unit_price,
    })
  );

export const saleCreateSchema = z.object({
  customer_id: z.number().int().positive().nullish(),
  payment_method: z.enum(PAYMENT_METHODS).optional(),
  is_paid: z.boolean().optional(),
  notes: z.string().max(2000).nullish(),
  sale_date: z.coerce.date().optional(),
  lines: z.array(saleLineSchema).min(1, 'A sale needs at least one line item'),
});

export const saleUpdateSchema = z.object({
  customer_id: z.number().int().positive().nullable().optional(),
  payment_method: z.enum(PAYMENT_METHODS).optional(),
  is_paid: z.boolean().optional(),
  notes: z.string().max(2000).nullable().optional(),
});

export const lineItemPatchSchema = z
  .object({
    quantity: quantitySchema.optional(),
    unit_price: moneySchema.min(0).optional(),
  })
  .refine((patch) => patch.quantity !== undefined || patch.unit_price !== undefined, {
    message: 'Give a quantity or a unit price',
  });

export const lineParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
  lineId: z.coerce.number().int().positive(),
});

const saleFilterFields = {
  start_date: localDateSchema.optional(),
  end_date: localDateSchema.optional(),
  payment_status: z.enum(['paid', 'unpaid', 'all']).optional(),
  product: z.string().trim().optional(),
};

export const saleFilterQuerySchema = z.object(saleFilterFields);

export const saleListQuerySchema = z.object({
  ...saleFilterFields,
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export const salesChartQuerySchema = z.object({
  start_date: localDateSchema.optional(),
  end_date: localDateSchema.optional(),
});

export const bulkDeleteSchema = z.object({
  ids: z.array(z.number().int().positive()).min(1, 'Select at least one sale'),
});
