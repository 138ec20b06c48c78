import type { StepDefinition } from '@rfq-intake/types';

export const RFQ_STEPS = Symbol('RFQ_STEPS');

/** Option-catalog categories a step reads from. */
export function stepCategories(step: StepDefinition): string[] {
  return [...new Set(step.fields.flatMap((field) => (field.category === undefined ? [] : [field.category])))];
}

export function requiredCategories(steps: readonly StepDefinition[]): string[] {
  return [...new Set(steps.flatMap(stepCategories))];
}
