import { Global, Module } from '@nestjs/common';
import { loadRfqSteps } from '@rfq-intake/schemas';

import { SchemasController } from './schemas.controller';
import { RFQ_STEPS } from './steps';

@Global()
@Module({
  controllers: [SchemasController],
  providers: [
    {
      provide: RFQ_STEPS,
      useFactory: () => loadRfqSteps().steps,
    },
  ],
  exports: [RFQ_STEPS],
})
export class SchemasModule {}
