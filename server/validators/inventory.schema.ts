import { z } from 'zod';
import { UNIT_TYPES } from '../../shared/constants';
import { paginationSchema, priceSchema, queryBooleanSchema } from './common.schema';

export const itemCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().nullish(),
  category_id: z.number().int().positive().nullish(),
  sku: z.string().trim().max(50).nullish(),
  unit_price: priceSchema,
  cost_price: priceSchema,
  stock_quantity: z.number().int().min(0).optional(),
  minimum_stock: z.number().int().min(0).optional(),
  supplier: z.string().max(200).nullish(),
  is_active: z.boolean().optional(),
});

export const itemUpdateSchema = itemCreateSchema.partial();

export const itemListQuerySchema = paginationSchema.extend({
  category_id: z.coerce.number().int().positive().optional(),
  low_stock: queryBooleanSchema.optional(),
  include_inactive: queryBooleanSchema.optional(),
});

export const restockSchema = z.object({
  quantity: z.number().int().min(1),
});

const productFields = {
  name: z.string().trim().min(1).max(200),
  description: z.string().nullish(),
  category_id: z.number().int().positive().nullish(),
  supplier_id: z.number().int().positive().nullish(),
  sku: z.string().trim().max(50).nullish(),
  supplier_price: priceSchema,
  selling_price: priceSchema,
  units_per_carton: z.number().int().min(1),
  carton_weight: z.number().positive().nullish(),
  unit_type: z.enum(UNIT_TYPES).optional(),
  cartons_in_stock: z.number().int().min(0).optional(),
  minimum_cartons: z.number().int().min(0).optional(),
  notes: z.string().nullish(),
  is_active: z.boolean().optional(),
};

export const productCreateSchema = z.object({
  ...productFields,
  create_linked_item: z.boolean().optional(),
});

export const productUpdateSchema = z.object(productFields).partial();

export const productListQuerySchema = paginationSchema.extend({
  category_id: z.coerce.number().int().positive().optional(),
  supplier_id: z.coerce.number().int().positive().optional(),
});

export const restockCartonsSchema = z.object({
  cartons: z.number().int().min(1),
});
