import { z } from 'zod';

export const categoryCreateSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().nullish(),
});

export const supplierCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  contact_person: z.string().max(100).nullish(),
  phone: z.string().max(20).nullish(),
  email: z.string().email().nullish(),
  address: z.string().nullish(),
  is_active: z.boolean().optional(),
});

export const supplierUpdateSchema = supplierCreateSchema.partial();

export const customerCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().email().nullish(),
  phone: z.string().max(20).nullish(),
  address: z.string().nullish(),
  is_active: z.boolean().optional(),
});

export const customerUpdateSchema = customerCreateSchema.partial();
