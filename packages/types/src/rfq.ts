export type FieldType =
  | 'text'
  | 'textarea'
  | 'email'
  | 'phone'
  | 'date'
  | 'integer'
  | 'select'
  | 'items';

export interface FieldDefinition {
  name: string;
  label: string;
  type: FieldType;
  required: boolean;
  category?: string; // select / items only
  min?: number; // integer only
  defaultFrom?: string; // prefilled from this field when the step is entered
}

export interface StepDefinition {
  id: string;
  label: string;
  fields: FieldDefinition[];
}

export type Step = StepDefinition & { index: number };

export interface StepsDocument {
  title: string;
  steps: StepDefinition[];
}

export type FieldValue = string | number;

export interface BomLineItem {
  sNo: number;
  model: string;
  head: string;
  qty: number;
  unitCost: number;
  lineCost: number;
}

export interface BomEntry {
  head: string;
  description: string;
  modelSpec: string;
  unitCost: number;
}

export interface RfqDraft {
  createdAt: string; // date-time
  values: Record<string, FieldValue>;
  items: BomLineItem[];
}

export type WizardStatus = 'in-progress' | 'ready' | 'submitted';

export interface BreadcrumbEntry {
  index: number;
  id: string;
  label: string;
  completed: boolean;
  current: boolean;
}

export interface FieldIssue {
  field: string;
  reason: 'missing' | 'invalid';
  message: string;
}

export interface WizardSnapshot {
  status: WizardStatus;
  currentStep: Step;
  breadcrumb: BreadcrumbEntry[];
  draft: RfqDraft;
  total: number;
}

export type DocumentKind = 'pdf' | 'pptx';

export interface GeneratedDocument {
  kind: DocumentKind;
  fileName: string;
  contentType: string;
  content: Buffer;
}

export interface DocumentBundle {
  rfqReference: string;
  customerName: string;
  summary: string; // plain-text digest of the draft, used as the email body
  documents: GeneratedDocument[];
}
