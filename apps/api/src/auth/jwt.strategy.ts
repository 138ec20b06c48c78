import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { z } from 'zod';

import { APP_CONFIG, AppConfig } from '../config/app-config';
import { RfqSession, SessionStore } from '../sessions/session.store';

export const TokenPayloadSchema = z.object({
  sub: z.string().min(1),
  sid: z.string().uuid(),
});

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    @Inject(APP_CONFIG) config: AppConfig,
    private readonly sessions: SessionStore,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: config.auth.jwtSecret,
      issuer: config.auth.jwtIssuer,
      audience: config.auth.jwtAudience,
      algorithms: ['HS256'],
    });
  }

  /** Signature and expiry are already checked; the session must still be live. */
  validate(payload: unknown): RfqSession {
    const parsed = TokenPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UnauthorizedException('Malformed token');
    }
    const session = this.sessions.get(parsed.data.sid);
    if (!session || session.username !== parsed.data.sub) {
      this.logger.debug(`Rejected token for session ${parsed.data.sid}`);
      throw new UnauthorizedException('Session has ended. Please sign in again.');
    }
    return session;
  }
}
