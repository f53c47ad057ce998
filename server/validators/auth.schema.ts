import { z } from 'zod';

export const registerSchema = z.object({
  username: z.string().trim().min(3).max(150),
  password: z.string().min(8, 'Password must be at least 8 characters'),
  full_name: z.string().trim().max(200).optional(),
  email: z.string().email().optional(),
});

export const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});
