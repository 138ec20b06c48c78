import { Inject, Injectable, Logger } from '@nestjs/common';
import type { DocumentBundle } from '@rfq-intake/types';
import type { SendMailOptions } from 'nodemailer';
import { z } from 'zod';

import { TransportError, ValidationError } from '../common/errors';
import { delay } from '../common/format';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { MAIL_TRANSPORT, MailTransport } from './mail-transport';

export type DispatchResult =
  | { ok: true; recipient: string; messageId?: string; attempts: number }
  | { ok: false; recipient: string; error: TransportError };

const TRANSIENT_CODES = new Set(['ECONNECTION', 'ETIMEDOUT', 'ESOCKET', 'EDNS', 'ECONNRESET', 'ECONNREFUSED']);
const RecipientSchema = z.string().trim().email();

/** Network failures and 4xx SMTP replies may succeed on a second try; 5xx replies will not. */
export function isTransient(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('responseCode' in error && typeof error.responseCode === 'number') {
    return error.responseCode >= 400 && error.responseCode < 500;
  }
  return 'code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code);
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class DispatchGateway {
  private readonly logger = new Logger(DispatchGateway.name);

  constructor(
    @Inject(MAIL_TRANSPORT) private readonly transport: MailTransport,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  buildMail(bundle: DocumentBundle, recipient: string): SendMailOptions {
    return {
      from: this.config.mail.from,
      to: recipient,
      subject: `RFQ ${bundle.rfqReference} - ${bundle.customerName}`,
      text: bundle.summary,
      attachments: bundle.documents.map((document) => ({
        filename: document.fileName,
        content: document.content,
        contentType: document.contentType,
      })),
    };
  }

  /**
   * Sends the bundle to one recipient. An address that is not an email throws
   * ValidationError; transport failures come back as `{ ok: false }` after at
   * most one retry.
   */
  async send(bundle: DocumentBundle, recipient: string): Promise<DispatchResult> {
    const address = RecipientSchema.safeParse(recipient);
    if (!address.success) {
      throw new ValidationError(`"${recipient}" is not a valid email address`, 'recipient');
    }

    const mail = this.buildMail(bundle, address.data);
    const maxAttempts = this.config.dispatch.retry ? 2 : 1;
    let attempts = 0;
    for (;;) {
      attempts += 1;
      try {
        const info = await this.transport.sendMail(mail);
        this.logger.log(`RFQ ${bundle.rfqReference} sent to ${address.data} (attempt ${attempts})`);
        return { ok: true, recipient: address.data, messageId: info.messageId, attempts };
      } catch (error: unknown) {
        const transient = isTransient(error);
        this.logger.warn(`RFQ ${bundle.rfqReference} send attempt ${attempts} failed: ${reasonOf(error)}`);
        if (!transient || attempts >= maxAttempts) {
          return { ok: false, recipient: address.data, error: new TransportError(reasonOf(error), transient, attempts) };
        }
        await delay(this.config.dispatch.retryDelayMs);
      }
    }
  }
}
