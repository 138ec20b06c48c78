import { z } from 'zod';
import type { FieldDefinition, FieldValue, StepsDocument } from '@rfq-intake/types';

const PHONE_PATTERN = /^\+?[0-9][0-9 ()-]{5,19}$/;

export const FieldDefinitionSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z][A-Za-z0-9]*$/),
    label: z.string().min(1),
    type: z.enum(['text', 'textarea', 'email', 'phone', 'date', 'integer', 'select', 'items']),
    required: z.boolean(),
    category: z.string().min(1).optional(),
    min: z.number().int().optional(),
    defaultFrom: z.string().min(1).optional(),
  })
  .refine((f) => (f.type !== 'select' && f.type !== 'items') || f.category !== undefined, {
    message: 'select and items fields need a category',
    path: ['category'],
  });

export const StepDefinitionSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  fields: z.array(FieldDefinitionSchema).min(1),
});

export const StepsDocumentSchema: z.ZodType<StepsDocument> = z
  .object({
    title: z.string().min(1),
    steps: z.array(StepDefinitionSchema).min(1),
  })
  .superRefine((doc, ctx) => {
    const stepIds = new Set<string>();
    const seen = new Set<string>();
    doc.steps.forEach((step, stepIndex) => {
      if (stepIds.has(step.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', stepIndex, 'id'],
          message: `Duplicate step id "${step.id}"`,
        });
      }
      stepIds.add(step.id);
      // defaultFrom may only point at a field of an earlier step
      const earlier = new Set(seen);
      step.fields.forEach((field, fieldIndex) => {
        if (seen.has(field.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['steps', stepIndex, 'fields', fieldIndex, 'name'],
            message: `Duplicate field "${field.name}"`,
          });
        }
        seen.add(field.name);
        if (field.defaultFrom !== undefined && !earlier.has(field.defaultFrom)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['steps', stepIndex, 'fields', fieldIndex, 'defaultFrom'],
            message: `"${field.defaultFrom}" is not a field of an earlier step`,
          });
        }
      });
    });
  });

const OptionListSchema = z.array(z.string().trim().min(1)).min(1, 'Category has no options');

export const CatalogSchema = z.record(z.string().trim().min(1), OptionListSchema);

export const BomEntrySchema = z.object({
  head: z.string().min(1),
  description: z.string(),
  modelSpec: z.string(),
  unitCost: z.number().finite(),
});

/**
 * Value schema for a scalar field. `options` is the field's category option set
 * and only matters for `select` fields.
 */
export function fieldValueSchema(
  field: FieldDefinition,
  options: readonly string[] = [],
): z.ZodType<FieldValue, z.ZodTypeDef, FieldValue> {
  switch (field.type) {
    case 'text':
    case 'textarea':
      return z.string();
    case 'email':
      return z.string().trim().email('Invalid email address');
    case 'phone':
      return z.string().trim().regex(PHONE_PATTERN, 'Invalid phone number');
    case 'date':
      return z.string().date('Expected a date as YYYY-MM-DD');
    case 'integer': {
      const bounded = z.number().int('Expected a whole number').min(field.min ?? Number.MIN_SAFE_INTEGER);
      return z
        .union([z.number(), z.string().trim().regex(/^-?\d+$/, 'Expected a whole number').transform(Number)])
        .pipe(bounded);
    }
    case 'select':
      return z.string().refine((value) => options.includes(value), {
        message: `Not one of the "${field.category ?? field.name}" options`,
      });
    case 'items':
      throw new Error(`Field "${field.name}" holds line items, not a value`);
  }
}

/**
 * A value counts as absent when it is missing or a blank string.
 */
export function isBlank(value: FieldValue | undefined): boolean {
  return value === undefined || (typeof value === 'string' && value.trim() === '');
}
