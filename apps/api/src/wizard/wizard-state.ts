import type {
  BomLineItem,
  BreadcrumbEntry,
  FieldDefinition,
  FieldIssue,
  FieldValue,
  RfqDraft,
  Step,
  StepDefinition,
  WizardSnapshot,
  WizardStatus,
} from '@rfq-intake/types';
import { fieldValueSchema, isBlank } from '@rfq-intake/validation';

import type { OptionCatalog } from '../catalog/option-catalog';
import { DraftIncompleteError, DraftSubmittedError, IncompleteStepError, ValidationError } from '../common/errors';
import { isoDate, referenceStamp } from '../common/format';

export const REFERENCE_FIELD = 'rfqReference';

export interface WizardOptions {
  steps: readonly StepDefinition[];
  catalog: OptionCatalog;
  createdAt: Date;
  referencePrefix?: string;
}

/**
 * The RFQ draft of one session and the cursor over its steps.
 *
 * A linear chain of steps followed by a terminal "submitted" state:
 * `advance` moves forward once the current step validates, `goBack` moves
 * backward unconditionally, `submit` ends the chain from a ready draft.
 * Any write to a step clears the completion of that step and every step after
 * it. Failed operations leave the wizard exactly as it was.
 */
export class WizardState {
  private readonly steps: readonly StepDefinition[];
  private readonly catalog: OptionCatalog;
  private readonly createdAt: Date;
  private readonly referencePrefix: string;

  private cursor = 0;
  private completed: boolean[];
  private submitted = false;
  private draft: RfqDraft;

  constructor(options: WizardOptions) {
    if (options.steps.length === 0) {
      throw new Error('A wizard needs at least one step');
    }
    this.steps = options.steps;
    this.catalog = options.catalog;
    this.createdAt = options.createdAt;
    this.referencePrefix = options.referencePrefix ?? 'RFQ';
    this.completed = this.steps.map(() => false);
    this.draft = {
      createdAt: this.createdAt.toISOString(),
      values: this.initialValues(this.steps[0]),
      items: [],
    };
  }

  currentStep(): Step {
    return { index: this.cursor, ...this.steps[this.cursor] };
  }

  status(): WizardStatus {
    if (this.submitted) return 'submitted';
    return this.cursor === this.steps.length - 1 && this.completed.every(Boolean) ? 'ready' : 'in-progress';
  }

  breadcrumb(): BreadcrumbEntry[] {
    return this.steps.map((step, index) => ({
      index,
      id: step.id,
      label: step.label,
      completed: this.completed[index],
      current: index === this.cursor,
    }));
  }

  updateField(name: string, value: FieldValue): void {
    this.updateFields({ [name]: value });
  }

  /**
   * Writes all `fields` or none: one undeclared name rejects the whole batch.
   */
  updateFields(fields: Record<string, FieldValue>): void {
    this.assertOpen();
    const step = this.steps[this.cursor];
    const names = Object.keys(fields);
    const undeclared = names.filter((name) => this.scalarField(step, name) === undefined);
    if (undeclared.length > 0) {
      throw new ValidationError(
        `Step "${step.id}" has no field ${undeclared.map((name) => `"${name}"`).join(', ')}`,
        undeclared[0],
      );
    }
    if (names.length === 0) return;

    this.draft = { ...this.draft, values: { ...this.draft.values, ...fields } };
    this.invalidateFrom(this.cursor);
  }

  addItem(model: string, qty: number): BomLineItem {
    this.assertOpen();
    const field = this.itemsField();
    const options = this.catalog.optionsFor(field.category ?? field.name);
    if (!options.includes(model)) {
      throw new ValidationError(`"${model}" is not one of the "${field.category}" options`, field.name);
    }
    if (!Number.isInteger(qty) || qty < 1) {
      throw new ValidationError('Quantity must be a whole number of at least 1', field.name);
    }

    const entry = this.catalog.findBomEntry(model);
    const unitCost = entry?.unitCost ?? 0;
    const item: BomLineItem = {
      sNo: this.draft.items.length + 1,
      model,
      head: entry?.head ?? '',
      qty,
      unitCost,
      lineCost: unitCost * qty,
    };
    this.draft = { ...this.draft, items: [...this.draft.items, item] };
    this.invalidateFrom(this.cursor);
    return { ...item };
  }

  removeItem(sNo: number): void {
    this.assertOpen();
    const field = this.itemsField();
    if (!this.draft.items.some((item) => item.sNo === sNo)) {
      throw new ValidationError(`No line ${sNo} in the bill of quantity`, field.name);
    }
    const items = this.draft.items
      .filter((item) => item.sNo !== sNo)
      .map((item, index) => ({ ...item, sNo: index + 1 }));
    this.draft = { ...this.draft, items };
    this.invalidateFrom(this.cursor);
  }

  /** Clears the current step back to its defaults. */
  resetStep(): void {
    this.assertOpen();
    const step = this.steps[this.cursor];
    const values = { ...this.draft.values };
    for (const field of step.fields) {
      delete values[field.name];
    }
    const hasItems = step.fields.some((field) => field.type === 'items');
    this.draft = {
      ...this.draft,
      values: { ...values, ...this.initialValues(step) },
      items: hasItems ? [] : this.draft.items,
    };
    this.applyDefaults(step);
    this.invalidateFrom(this.cursor);
  }

  /**
   * Validates the current step. On success marks it complete and moves on, or
   * makes the draft ready at the last step; on failure throws
   * IncompleteStepError and changes nothing.
   */
  advance(): void {
    this.assertOpen();
    const step = this.steps[this.cursor];
    const issues = this.validateStep(step);
    if (issues.length > 0) {
      throw new IncompleteStepError(step.id, issues);
    }

    this.completed = this.completed.map((done, index) => done || index === this.cursor);
    if (this.cursor < this.steps.length - 1) {
      this.cursor += 1;
      if (!this.completed[this.cursor]) {
        this.applyDefaults(this.steps[this.cursor]);
      }
    }
  }

  /** Returns false, changing nothing, on the first step. */
  goBack(): boolean {
    this.assertOpen();
    if (this.cursor === 0) return false;
    this.cursor -= 1;
    return true;
  }

  /** Ends the chain. The draft is discarded; only the returned copy remains. */
  submit(): RfqDraft {
    this.assertOpen();
    if (this.status() !== 'ready') {
      throw new DraftIncompleteError('Complete every step before submitting');
    }
    const final = this.copyDraft();
    this.submitted = true;
    this.draft = { createdAt: this.draft.createdAt, values: {}, items: [] };
    return final;
  }

  /** Issues for one step, without changing anything. */
  validateStep(step: StepDefinition): FieldIssue[] {
    const issues: FieldIssue[] = [];
    for (const field of step.fields) {
      if (field.type === 'items') {
        if (field.required && this.draft.items.length === 0) {
          issues.push({ field: field.name, reason: 'missing', message: `${field.label} needs at least one line` });
        }
        continue;
      }

      const value = this.draft.values[field.name];
      if (isBlank(value)) {
        if (field.required) {
          issues.push({ field: field.name, reason: 'missing', message: `${field.label} is required` });
        }
        continue;
      }

      const options = field.type === 'select' && field.category ? this.catalog.optionsFor(field.category) : [];
      const result = fieldValueSchema(field, options).safeParse(value);
      if (!result.success) {
        issues.push({
          field: field.name,
          reason: 'invalid',
          message: `${field.label}: ${result.error.issues[0]?.message ?? 'invalid value'}`,
        });
      }
    }
    return issues;
  }

  total(): number {
    return this.draft.items.reduce((sum, item) => sum + item.lineCost, 0);
  }

  copyDraft(): RfqDraft {
    return {
      createdAt: this.draft.createdAt,
      values: { ...this.draft.values },
      items: this.draft.items.map((item) => ({ ...item })),
    };
  }

  snapshot(): WizardSnapshot {
    return {
      status: this.status(),
      currentStep: this.currentStep(),
      breadcrumb: this.breadcrumb(),
      draft: this.copyDraft(),
      total: this.total(),
    };
  }

  private assertOpen(): void {
    if (this.submitted) {
      throw new DraftSubmittedError();
    }
  }

  private scalarField(step: StepDefinition, name: string): FieldDefinition | undefined {
    return step.fields.find((field) => field.name === name && field.type !== 'items');
  }

  private itemsField(): FieldDefinition {
    const step = this.steps[this.cursor];
    const field = step.fields.find((f) => f.type === 'items');
    if (!field) {
      throw new ValidationError(`Step "${step.id}" has no bill of quantity`);
    }
    return field;
  }

  private invalidateFrom(index: number): void {
    this.completed = this.completed.map((done, i) => (i >= index ? false : done));
  }

  /** Values a step starts with: the reference and dates of the first step. */
  private initialValues(step: StepDefinition): Record<string, FieldValue> {
    if (step !== this.steps[0]) return {};
    const values: Record<string, FieldValue> = {};
    for (const field of step.fields) {
      if (field.name === REFERENCE_FIELD) {
        values[field.name] = `${this.referencePrefix}/${referenceStamp(this.createdAt)}`;
      } else if (field.type === 'date') {
        values[field.name] = isoDate(this.createdAt);
      }
    }
    return values;
  }

  /** Fills blank `defaultFrom` fields of `step` from the fields they name. */
  private applyDefaults(step: StepDefinition): void {
    const values = { ...this.draft.values };
    let changed = false;
    for (const field of step.fields) {
      if (field.defaultFrom === undefined || !isBlank(values[field.name])) continue;
      const source = values[field.defaultFrom];
      if (source !== undefined && !isBlank(source)) {
        values[field.name] = source;
        changed = true;
      }
    }
    if (changed) {
      this.draft = { ...this.draft, values };
    }
  }
}
