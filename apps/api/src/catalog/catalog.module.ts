import { Logger, Module } from '@nestjs/common';
import type { StepDefinition } from '@rfq-intake/types';

import { APP_CONFIG, AppConfig } from '../config/app-config';
import { RFQ_STEPS, requiredCategories } from '../schemas/steps';
import { CatalogController } from './catalog.controller';
import { loadCatalogWorkbook } from './catalog-loader';
import { OptionCatalog } from './option-catalog';

@Module({
  controllers: [CatalogController],
  providers: [
    {
      provide: OptionCatalog,
      inject: [APP_CONFIG, RFQ_STEPS],
      useFactory: async (config: AppConfig, steps: StepDefinition[]) => {
        const logger = new Logger('OptionCatalog');
        const data = await loadCatalogWorkbook(config.catalog.path, { bomSheet: config.catalog.bomSheet });
        const catalog = OptionCatalog.fromData(data, requiredCategories(steps));
        logger.log(
          `Loaded ${catalog.categories().length} option categories and ${data.bom.length} BOM rows from ${config.catalog.path}`,
        );
        return catalog;
      },
    },
  ],
  exports: [OptionCatalog],
})
export class CatalogModule {}
