import { createHash } from 'crypto';
import type { DocumentBundle, DocumentKind, RfqDraft, StepDefinition, WizardStatus } from '@rfq-intake/types';

import { DraftIncompleteError } from '../common/errors';
import { fileStamp, sanitizeFilename } from '../common/format';
import { buildDraftView, renderSummary } from './draft-view';
import { Branding, renderPdf } from './pdf-renderer';
import { renderSlides } from './slide-renderer';

export const CONTENT_TYPES: Record<DocumentKind, string> = {
  pdf: 'application/pdf',
  pptx: 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
};

export interface ComposeInput {
  status: WizardStatus;
  draft: RfqDraft;
}

/**
 * Renders a ready draft as a PDF summary and a slide deck.
 *
 * Output depends on the draft alone: every timestamp written into a document
 * is the draft's `createdAt`, so composing the same draft twice yields the
 * same bytes.
 */
export class DocumentComposer {
  constructor(
    private readonly steps: readonly StepDefinition[],
    private readonly branding: Branding,
  ) {}

  async compose({ status, draft }: ComposeInput): Promise<DocumentBundle> {
    if (status !== 'ready') {
      throw new DraftIncompleteError('Only a completed draft can be rendered');
    }

    const view = buildDraftView(this.steps, draft);
    const createdAt = new Date(draft.createdAt);
    const baseName = `${sanitizeFilename(view.reference)}_${fileStamp(createdAt)}`;
    const fileId = createHash('md5').update(JSON.stringify(draft)).digest('hex');

    const pdf = renderPdf({ view, branding: this.branding, createdAt, fileId });
    const pptx = await renderSlides({ view, branding: this.branding, createdAt });

    return {
      rfqReference: view.reference,
      customerName: view.customerName,
      summary: renderSummary(view),
      documents: [
        { kind: 'pdf', fileName: `${baseName}.pdf`, contentType: CONTENT_TYPES.pdf, content: pdf },
        { kind: 'pptx', fileName: `${baseName}.pptx`, contentType: CONTENT_TYPES.pptx, content: pptx },
      ],
    };
  }
}
