import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig } from './config/app-config';

dotenv.config();

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  // abortOnError off so that a bad catalog or config reaches the catch below
  const app = await NestFactory.create(AppModule, { abortOnError: false });
  const config = app.get<AppConfig>(APP_CONFIG);
  app.enableCors({
    origin: true,
    methods: 'GET,HEAD,PUT,POST,DELETE',
    credentials: true,
  });
  await app.listen(config.port, '0.0.0.0'); // Bind to 0.0.0.0 for Docker
  logger.log(`Application is running on: ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error.stack : undefined);
  process.exit(1);
});
