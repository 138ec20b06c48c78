import { Module } from '@nestjs/common';

import { CatalogModule } from '../catalog/catalog.module';
import { DispatchModule } from '../dispatch/dispatch.module';
import { DocumentsModule } from '../documents/documents.module';
import { WizardController } from './wizard.controller';
import { WizardFactory } from './wizard.factory';
import { WizardService } from './wizard.service';

@Module({
  imports: [CatalogModule, DocumentsModule, DispatchModule],
  controllers: [WizardController],
  providers: [WizardFactory, WizardService],
  exports: [WizardFactory],
})
export class WizardModule {}
