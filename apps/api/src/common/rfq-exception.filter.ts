import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import type { Response } from 'express';

import { RfqError } from './errors';

/**
 * Maps domain errors to JSON responses. The user sees the message inline and
 * keeps working on the same draft.
 */
@Catch(RfqError)
export class RfqExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('RfqError');

  catch(exception: RfqError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    this.logger.warn(`${exception.name}: ${exception.message}`);
    response.status(exception.status).json(exception.toResponse());
  }
}
