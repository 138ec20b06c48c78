import { Controller, Get, Param, UseGuards } from '@nestjs/common';

import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { OptionCatalog } from './option-catalog';

@Controller('catalog')
@UseGuards(JwtAuthGuard)
export class CatalogController {
  constructor(private readonly catalog: OptionCatalog) {}

  @Get()
  getCategories() {
    return { categories: this.catalog.categories() };
  }

  @Get(':category')
  getOptions(@Param('category') category: string) {
    return { category, options: this.catalog.optionsFor(category) };
  }
}
