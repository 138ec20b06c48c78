import { promises as fs } from 'fs';
import { Logger, Module } from '@nestjs/common';
import type { StepDefinition } from '@rfq-intake/types';

import { APP_CONFIG, AppConfig } from '../config/app-config';
import { RFQ_STEPS } from '../schemas/steps';
import { DocumentComposer } from './document-composer';

async function readLogo(logoPath: string, logger: Logger): Promise<Buffer | undefined> {
  try {
    return await fs.readFile(logoPath);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Logo not readable at ${logoPath}, documents render without it: ${message}`);
    return undefined;
  }
}

@Module({
  providers: [
    {
      provide: DocumentComposer,
      inject: [APP_CONFIG, RFQ_STEPS],
      useFactory: async (config: AppConfig, steps: StepDefinition[]) => {
        const logger = new Logger('DocumentComposer');
        const logo = await readLogo(config.branding.logoPath, logger);
        return new DocumentComposer(steps, { companyName: config.branding.companyName, logo });
      },
    },
  ],
  exports: [DocumentComposer],
})
export class DocumentsModule {}
