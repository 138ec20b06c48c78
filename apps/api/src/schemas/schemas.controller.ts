import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import { getSchema, isSchemaName } from '@rfq-intake/schemas';

@Controller('schemas')
export class SchemasController {
  @Get(':name')
  getSchemaByName(@Param('name') name: string) {
    if (!isSchemaName(name)) {
      throw new NotFoundException({ error: 'Unknown schema', name });
    }
    return getSchema(name);
  }
}
