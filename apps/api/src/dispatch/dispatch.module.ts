import { Module } from '@nestjs/common';
import { createTransport } from 'nodemailer';

import { APP_CONFIG, AppConfig } from '../config/app-config';
import { DispatchGateway } from './dispatch-gateway';
import { MAIL_TRANSPORT, MailTransport } from './mail-transport';

@Module({
  providers: [
    {
      provide: MAIL_TRANSPORT,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): MailTransport =>
        createTransport({
          host: config.smtp.host,
          port: config.smtp.port,
          secure: config.smtp.secure,
          auth:
            config.smtp.user !== undefined ? { user: config.smtp.user, pass: config.smtp.password } : undefined,
        }),
    },
    DispatchGateway,
  ],
  exports: [DispatchGateway],
})
export class DispatchModule {}
