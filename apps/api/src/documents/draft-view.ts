import type { BomLineItem, FieldValue, RfqDraft, StepDefinition } from '@rfq-intake/types';
import { isBlank } from '@rfq-intake/validation';

import { formatAmount } from '../common/format';
import { REFERENCE_FIELD } from '../wizard/wizard-state';

export const CUSTOMER_FIELD = 'customerName';

export interface DraftSection {
  id: string;
  label: string;
  rows: Array<[label: string, value: string]>;
}

/** A draft laid out the way every output format presents it. */
export interface DraftView {
  reference: string;
  customerName: string;
  sections: DraftSection[];
  itemsLabel: string;
  items: BomLineItem[];
  total: number;
}

function display(value: FieldValue | undefined): string {
  if (value === undefined || isBlank(value)) return '-';
  return String(value);
}

export function buildDraftView(steps: readonly StepDefinition[], draft: RfqDraft): DraftView {
  const sections = steps.map((step) => ({
    id: step.id,
    label: step.label,
    rows: step.fields
      .filter((field) => field.type !== 'items')
      .map((field): [string, string] => [field.label, display(draft.values[field.name])]),
  }));
  const itemsField = steps.flatMap((step) => step.fields).find((field) => field.type === 'items');

  return {
    reference: display(draft.values[REFERENCE_FIELD]),
    customerName: display(draft.values[CUSTOMER_FIELD]),
    sections,
    itemsLabel: itemsField?.label ?? 'Selected Items',
    items: draft.items,
    total: draft.items.reduce((sum, item) => sum + item.lineCost, 0),
  };
}

/** Plain-text digest used as the email body. */
export function renderSummary(view: DraftView): string {
  const lines = [`RFQ ${view.reference}`, `Customer: ${view.customerName}`];
  for (const section of view.sections) {
    lines.push('', section.label, '-'.repeat(section.label.length));
    lines.push(...section.rows.map(([label, value]) => `${label}: ${value}`));
  }
  if (view.items.length > 0) {
    lines.push('', view.itemsLabel, '-'.repeat(view.itemsLabel.length));
    lines.push(
      ...view.items.map(
        (item) =>
          `${item.sNo}. ${item.model}${item.head ? ` (${item.head})` : ''} x ${item.qty} @ ${formatAmount(item.unitCost)} = ${formatAmount(item.lineCost)}`,
      ),
    );
    lines.push(`Total: ${formatAmount(view.total)}`);
  }
  return lines.join('\n');
}
