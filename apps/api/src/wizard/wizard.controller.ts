import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Res,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import type { DocumentBundle } from '@rfq-intake/types';
import { AddItemSchema, SubmitSchema, UpdateFieldsSchema } from '@rfq-intake/validation';
import type { Response } from 'express';
import { z } from 'zod';

import { CurrentSession } from '../auth/current-session.decorator';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { parseBody } from '../common/parse-body';
import { RfqSession } from '../sessions/session.store';
import { WizardService } from './wizard.service';

const DocumentKindSchema = z.enum(['pdf', 'pptx']);

function describeBundle(bundle: DocumentBundle) {
  return {
    rfqReference: bundle.rfqReference,
    customerName: bundle.customerName,
    documents: bundle.documents.map(({ kind, fileName, contentType, content }) => ({
      kind,
      fileName,
      contentType,
      size: content.length,
    })),
  };
}

@Controller('wizard')
@UseGuards(JwtAuthGuard)
export class WizardController {
  constructor(private readonly wizard: WizardService) {}

  @Get()
  get(@CurrentSession() session: RfqSession) {
    return this.wizard.snapshot(session);
  }

  @Put('fields')
  updateFields(@CurrentSession() session: RfqSession, @Body() body: unknown) {
    const { fields } = parseBody(UpdateFieldsSchema, body);
    return this.wizard.updateFields(session, fields);
  }

  @Post('items')
  @HttpCode(201)
  addItem(@CurrentSession() session: RfqSession, @Body() body: unknown) {
    const { model, qty } = parseBody(AddItemSchema, body);
    return this.wizard.addItem(session, model, qty);
  }

  @Delete('items/:sNo')
  removeItem(@CurrentSession() session: RfqSession, @Param('sNo', ParseIntPipe) sNo: number) {
    return this.wizard.removeItem(session, sNo);
  }

  @Post('reset-step')
  @HttpCode(200)
  resetStep(@CurrentSession() session: RfqSession) {
    return this.wizard.resetStep(session);
  }

  @Post('advance')
  @HttpCode(200)
  advance(@CurrentSession() session: RfqSession) {
    return this.wizard.advance(session);
  }

  @Post('back')
  @HttpCode(200)
  back(@CurrentSession() session: RfqSession) {
    return this.wizard.back(session);
  }

  @Post('documents')
  @HttpCode(200)
  async documents(@CurrentSession() session: RfqSession) {
    return describeBundle(await this.wizard.documents(session));
  }

  @Get('documents/:kind')
  async download(
    @CurrentSession() session: RfqSession,
    @Param('kind') kind: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const parsed = DocumentKindSchema.safeParse(kind);
    if (!parsed.success) {
      throw new NotFoundException({ error: 'Unknown document kind', kind });
    }
    const document = await this.wizard.document(session, parsed.data);
    res.set({
      'Content-Type': document.contentType,
      'Content-Disposition': `attachment; filename="${document.fileName}"`,
    });
    return new StreamableFile(document.content);
  }

  @Post('submit')
  @HttpCode(200)
  submit(@CurrentSession() session: RfqSession, @Body() body: unknown) {
    const { recipient } = parseBody(SubmitSchema, body ?? {});
    return this.wizard.submit(session, recipient);
  }
}
