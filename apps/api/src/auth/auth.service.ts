import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

import { SessionStore } from '../sessions/session.store';
import { WizardFactory } from '../wizard/wizard.factory';
import { CredentialStore } from './credential-store';
import type { TokenPayload } from './jwt.strategy';

export const TOKEN_TTL_SECONDS = 12 * 60 * 60;

export interface LoginResult {
  token: string;
  expiresAt: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly credentials: CredentialStore,
    private readonly sessions: SessionStore,
    private readonly wizards: WizardFactory,
    private readonly jwt: JwtService,
  ) {}

  /** Opens a session with an empty draft and returns a token naming it. */
  async login(username: string, password: string, now = new Date()): Promise<LoginResult> {
    if (!this.credentials.verify(username, password)) {
      this.logger.warn(`Failed sign-in for "${username}"`);
      throw new UnauthorizedException('Invalid username or password');
    }
    const session = this.sessions.create(username, this.wizards.create(now), now.getTime());
    const payload: TokenPayload = { sub: username, sid: session.id };
    const token = await this.jwt.signAsync(payload);
    return { token, expiresAt: new Date(now.getTime() + TOKEN_TTL_SECONDS * 1000).toISOString() };
  }

  logout(sessionId: string): void {
    if (this.sessions.destroy(sessionId)) {
      this.logger.log(`Session ${sessionId} closed`);
    }
  }
}
