import { Module } from '@nestjs/common';

import { AppController } from './app.controller';
import { AuthModule } from './auth/auth.module';
import { CatalogModule } from './catalog/catalog.module';
import { CommonModule } from './common/common.module';
import { ConfigModule } from './config/config.module';
import { SchemasModule } from './schemas/schemas.module';
import { SessionsModule } from './sessions/sessions.module';
import { WizardModule } from './wizard/wizard.module';

@Module({
  // ConfigModule, SchemasModule and SessionsModule are global: every feature
  // module reads the config, the step definitions and the session store.
  imports: [ConfigModule, SchemasModule, SessionsModule, CommonModule, CatalogModule, AuthModule, WizardModule],
  controllers: [AppController],
})
export class AppModule {}
