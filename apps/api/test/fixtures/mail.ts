import type { SendMailOptions } from 'nodemailer';

import type { MailTransport } from '../../src/dispatch/mail-transport';

export function smtpError(message: string, fields: { code?: string; responseCode?: number }): Error {
  return Object.assign(new Error(message), fields);
}

/** Records every message; fails with the queued errors first, then succeeds. */
export class ScriptedTransport implements MailTransport {
  readonly sent: SendMailOptions[] = [];

  constructor(private readonly failures: Error[] = []) {}

  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async sendMail(mail: SendMailOptions): Promise<{ messageId?: string }> {
    this.sent.push(mail);
    const failure = this.failures.shift();
    if (failure) throw failure;
    return { messageId: `<${this.sent.length}@test.local>` };
  }
}

/** Holds every send until `open()` is called. */
export class HeldTransport extends ScriptedTransport {
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  open(): void {
    this.release();
  }

  override async sendMail(mail: SendMailOptions): Promise<{ messageId?: string }> {
    await this.gate;
    return super.sendMail(mail);
  }
}
