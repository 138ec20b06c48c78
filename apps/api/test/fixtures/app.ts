import * as fs from 'fs';
import * as path from 'path';
import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';

import { AppModule } from '../../src/app.module';
import { MAIL_TRANSPORT } from '../../src/dispatch/mail-transport';
import { writeCatalogWorkbook } from './catalog-workbook';
import { TEST_ENV } from './env';
import { ScriptedTransport } from './mail';
import { LOGO_PNG } from './rfq';

/** The full application on a temp catalog and logo, with mail captured in memory. */
export async function createTestApp(transport: ScriptedTransport = new ScriptedTransport()): Promise<INestApplication> {
  const catalogPath = await writeCatalogWorkbook();
  const logoPath = path.join(path.dirname(catalogPath), 'logo.png');
  fs.writeFileSync(logoPath, LOGO_PNG);
  Object.assign(process.env, TEST_ENV, { RFQ_CATALOG_PATH: catalogPath, RFQ_LOGO_PATH: logoPath });

  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(MAIL_TRANSPORT)
    .useValue(transport)
    .compile();
  const app = moduleRef.createNestApplication();
  await app.init();
  return app;
}

export async function signIn(
  app: INestApplication,
  username = 'estimator',
  password = 'test-password',
): Promise<string> {
  const res = await request(app.getHttpServer()).post('/auth/login').send({ username, password }).expect(200);
  return res.body.token;
}
