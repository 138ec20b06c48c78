import { Inject, Injectable, Logger } from '@nestjs/common';
import type { DocumentBundle } from '@rfq-intake/types';
import { v4 as uuidv4 } from 'uuid';

import { APP_CONFIG, AppConfig } from '../config/app-config';
import type { WizardState } from '../wizard/wizard-state';

/** One signed-in user's wizard and the documents last rendered from it. */
export class RfqSession {
  bundle?: DocumentBundle;
  submitting = false;

  constructor(
    readonly id: string,
    readonly username: string,
    public wizard: WizardState,
    public lastSeenAt: number,
  ) {}
}

/**
 * Sessions live in process memory and expire after a period without requests.
 * A restart signs everyone out.
 */
@Injectable()
export class SessionStore {
  private readonly logger = new Logger(SessionStore.name);
  private readonly sessions = new Map<string, RfqSession>();
  private readonly ttlMs: number;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.ttlMs = config.auth.sessionTtlMinutes * 60_000;
  }

  create(username: string, wizard: WizardState, now = Date.now()): RfqSession {
    this.sweep(now);
    const session = new RfqSession(uuidv4(), username, wizard, now);
    this.sessions.set(session.id, session);
    this.logger.log(`Session ${session.id} opened for ${username}`);
    return session;
  }

  /** The live session with `id`, touched; expired sessions are dropped on lookup. */
  get(id: string, now = Date.now()): RfqSession | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    if (now - session.lastSeenAt > this.ttlMs) {
      this.sessions.delete(id);
      this.logger.log(`Session ${id} expired`);
      return undefined;
    }
    session.lastSeenAt = now;
    return session;
  }

  destroy(id: string): boolean {
    return this.sessions.delete(id);
  }

  size(): number {
    return this.sessions.size;
  }

  private sweep(now: number): void {
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt > this.ttlMs) {
        this.sessions.delete(id);
      }
    }
  }
}
