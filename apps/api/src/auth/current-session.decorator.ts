import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';

import { RfqSession } from '../sessions/session.store';

/** The session JwtStrategy attached to the request. */
export const CurrentSession = createParamDecorator((_data: unknown, context: ExecutionContext): RfqSession => {
  const request = context.switchToHttp().getRequest<Request>();
  if (!(request.user instanceof RfqSession)) {
    throw new UnauthorizedException('No active session');
  }
  return request.user;
});
