import { Inject, Injectable } from '@nestjs/common';
import type { StepDefinition } from '@rfq-intake/types';

import { OptionCatalog } from '../catalog/option-catalog';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { RFQ_STEPS } from '../schemas/steps';
import { WizardState } from './wizard-state';

@Injectable()
export class WizardFactory {
  constructor(
    @Inject(RFQ_STEPS) private readonly steps: StepDefinition[],
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly catalog: OptionCatalog,
  ) {}

  create(createdAt = new Date()): WizardState {
    return new WizardState({
      steps: this.steps,
      catalog: this.catalog,
      createdAt,
      referencePrefix: this.config.branding.referencePrefix,
    });
  }
}
