import { Global, Module } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';

import { LoggingInterceptor } from './logging.interceptor';
import { RfqExceptionFilter } from './rfq-exception.filter';

@Global()
@Module({
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
    {
      provide: APP_FILTER,
      useClass: RfqExceptionFilter,
    },
  ],
})
export class CommonModule {}
