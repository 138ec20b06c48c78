import { z } from 'zod';

export const LoginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const UpdateFieldsSchema = z.object({
  fields: z.record(z.string().min(1), z.union([z.string(), z.number().finite()])),
});

export const AddItemSchema = z.object({
  model: z.string().trim().min(1),
  qty: z.number().int().min(1),
});

export const SubmitSchema = z.object({
  recipient: z.string().trim().email().optional(),
});
