import { UnprocessableEntityException } from '@nestjs/common';
import type { z } from 'zod';

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new UnprocessableEntityException({
      error: 'ValidationError',
      issues: parsed.error.issues.map((i) => ({ path: i.path, message: i.message })),
    });
  }
  return parsed.data;
}
