import { Injectable, Logger } from '@nestjs/common';
import type {
  BomLineItem,
  DocumentBundle,
  DocumentKind,
  FieldValue,
  GeneratedDocument,
  WizardSnapshot,
} from '@rfq-intake/types';

import { DraftIncompleteError, SessionBusyError, ValidationError } from '../common/errors';
import { DispatchGateway } from '../dispatch/dispatch-gateway';
import { DocumentComposer } from '../documents/document-composer';
import type { RfqSession } from '../sessions/session.store';
import { WizardFactory } from './wizard.factory';

export const RECIPIENT_FIELD = 'recipientEmail';

export interface SubmitOutcome {
  rfqReference: string;
  recipient: string;
  messageId?: string;
  attempts: number;
  documents: string[];
  next: WizardSnapshot;
}

/**
 * Session-level wizard operations. Every mutation drops the session's rendered
 * bundle; a submission renders afresh, sends, and only then ends the draft.
 */
@Injectable()
export class WizardService {
  private readonly logger = new Logger(WizardService.name);

  constructor(
    private readonly composer: DocumentComposer,
    private readonly gateway: DispatchGateway,
    private readonly factory: WizardFactory,
  ) {}

  snapshot(session: RfqSession): WizardSnapshot {
    return session.wizard.snapshot();
  }

  updateFields(session: RfqSession, fields: Record<string, FieldValue>): WizardSnapshot {
    this.mutate(session, () => session.wizard.updateFields(fields));
    return session.wizard.snapshot();
  }

  addItem(session: RfqSession, model: string, qty: number): { item: BomLineItem; snapshot: WizardSnapshot } {
    const item = this.mutate(session, () => session.wizard.addItem(model, qty));
    return { item, snapshot: session.wizard.snapshot() };
  }

  removeItem(session: RfqSession, sNo: number): WizardSnapshot {
    this.mutate(session, () => session.wizard.removeItem(sNo));
    return session.wizard.snapshot();
  }

  resetStep(session: RfqSession): WizardSnapshot {
    this.mutate(session, () => session.wizard.resetStep());
    return session.wizard.snapshot();
  }

  advance(session: RfqSession): WizardSnapshot {
    this.mutate(session, () => session.wizard.advance());
    return session.wizard.snapshot();
  }

  back(session: RfqSession): { moved: boolean; snapshot: WizardSnapshot } {
    const moved = this.mutate(session, () => session.wizard.goBack());
    return { moved, snapshot: session.wizard.snapshot() };
  }

  /** Renders the draft once and keeps the result until the next mutation. */
  async documents(session: RfqSession): Promise<DocumentBundle> {
    this.assertReady(session);
    if (!session.bundle) {
      session.bundle = await this.composer.compose(session.wizard.snapshot());
      this.logger.log(`Rendered ${session.bundle.documents.map((d) => d.fileName).join(', ')}`);
    }
    return session.bundle;
  }

  async document(session: RfqSession, kind: DocumentKind): Promise<GeneratedDocument> {
    const bundle = await this.documents(session);
    const document = bundle.documents.find((d) => d.kind === kind);
    if (!document) throw new Error(`Bundle has no ${kind} document`);
    return document;
  }

  /**
   * Composes, sends, then ends the draft. A failed send throws TransportError and
   * leaves the draft ready for another attempt. The session refuses every other
   * change until the send settles.
   */
  async submit(session: RfqSession, recipient?: string): Promise<SubmitOutcome> {
    this.assertIdle(session);
    this.assertReady(session);
    const target = recipient ?? session.wizard.copyDraft().values[RECIPIENT_FIELD];
    if (typeof target !== 'string' || target.trim().length === 0) {
      throw new ValidationError('No recipient given and the draft has none', 'recipient');
    }

    session.submitting = true;
    try {
      return await this.dispatch(session, target);
    } finally {
      session.submitting = false;
    }
  }

  private async dispatch(session: RfqSession, target: string): Promise<SubmitOutcome> {
    const bundle = await this.documents(session);
    const result = await this.gateway.send(bundle, target);
    if (!result.ok) {
      throw result.error;
    }

    session.wizard.submit();
    session.wizard = this.factory.create();
    session.bundle = undefined;
    this.logger.log(`RFQ ${bundle.rfqReference} submitted by ${session.username}`);
    return {
      rfqReference: bundle.rfqReference,
      recipient: result.recipient,
      messageId: result.messageId,
      attempts: result.attempts,
      documents: bundle.documents.map((d) => d.fileName),
      next: session.wizard.snapshot(),
    };
  }

  private assertIdle(session: RfqSession): void {
    if (session.submitting) {
      throw new SessionBusyError();
    }
  }

  private assertReady(session: RfqSession): void {
    if (session.wizard.status() !== 'ready') {
      throw new DraftIncompleteError('Complete every step before rendering or submitting');
    }
  }

  private mutate<T>(session: RfqSession, change: () => T): T {
    this.assertIdle(session);
    const result = change();
    session.bundle = undefined;
    return result;
  }
}
