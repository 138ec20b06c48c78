import type { StepsDocument } from '@rfq-intake/types';
import { StepsDocumentSchema } from '@rfq-intake/validation';
import rfqStepsDocument from '../rfq-steps.json';

export type SchemaName = 'rfq-steps';

export const SchemaCatalog: Record<SchemaName, unknown> = {
  'rfq-steps': rfqStepsDocument,
};

export function getSchema(name: SchemaName) {
  return SchemaCatalog[name];
}

export function isSchemaName(name: string): name is SchemaName {
  return Object.prototype.hasOwnProperty.call(SchemaCatalog, name);
}

/**
 * Parses a steps document; throws a ZodError when it does not match the declared shape.
 */
export function parseStepsDocument(raw: unknown): StepsDocument {
  return StepsDocumentSchema.parse(raw);
}

export function loadRfqSteps(): StepsDocument {
  return parseStepsDocument(rfqStepsDocument);
}
