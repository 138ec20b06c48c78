import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import jwt from 'jsonwebtoken';

import { createTestApp, signIn } from './fixtures/app';

function signToken(payload: Record<string, string>, issuer = 'rfq-intake-tests') {
  return jwt.sign(payload, 'test-secret', {
    issuer,
    audience: 'rfq-intake-api',
    algorithm: 'HS256',
  });
}

describe('Auth E2E', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('rejects when no token', async () => {
    await request(app.getHttpServer()).get('/wizard').expect(401);
  });

  it('rejects wrong credentials', async () => {
    const res = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ username: 'estimator', password: 'wrong' })
      .expect(401);

    expect(res.body.message).toBe('Invalid username or password');
  });

  it('validates the login body', async () => {
    const res = await request(app.getHttpServer()).post('/auth/login').send({ username: 'estimator' }).expect(422);

    expect(res.body.error).toBe('ValidationError');
    expect(res.body.issues[0].path).toEqual(['password']);
  });

  it('issues a token that opens the wizard', async () => {
    const res = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ username: 'estimator', password: 'test-password' })
      .expect(200);

    expect(typeof res.body.token).toBe('string');
    expect(Date.parse(res.body.expiresAt)).toBeGreaterThan(Date.now());

    const wizard = await request(app.getHttpServer())
      .get('/wizard')
      .set('Authorization', `Bearer ${res.body.token}`)
      .expect(200);
    expect(wizard.body.status).toBe('in-progress');
    expect(wizard.body.currentStep.id).toBe('customer');
  });

  it('rejects a well-signed token for a session that does not exist', async () => {
    const token = signToken({ sub: 'estimator', sid: '8a3c1f4e-2b7d-4c59-9e61-0f2d3b4a5c6d' });

    await request(app.getHttpServer()).get('/wizard').set('Authorization', `Bearer ${token}`).expect(401);
  });

  it('rejects a token from another issuer', async () => {
    const token = await signIn(app);
    const decoded = jwt.decode(token);
    const sid = typeof decoded === 'object' && decoded !== null ? String(decoded.sid) : '';
    const forged = signToken({ sub: 'estimator', sid }, 'someone-else');

    await request(app.getHttpServer()).get('/wizard').set('Authorization', `Bearer ${forged}`).expect(401);
  });

  it('ends the session on logout', async () => {
    const token = await signIn(app);

    await request(app.getHttpServer()).post('/auth/logout').set('Authorization', `Bearer ${token}`).expect(204);
    await request(app.getHttpServer()).get('/wizard').set('Authorization', `Bearer ${token}`).expect(401);
  });

  it('keeps drafts of separate sign-ins apart', async () => {
    const first = await signIn(app);
    const second = await signIn(app, 'reviewer', 'test:pass');

    await request(app.getHttpServer())
      .put('/wizard/fields')
      .set('Authorization', `Bearer ${first}`)
      .send({ fields: { customerName: 'Acme Fabrication' } })
      .expect(200);

    const res = await request(app.getHttpServer()).get('/wizard').set('Authorization', `Bearer ${second}`).expect(200);
    expect(res.body.draft.values.customerName).toBeUndefined();
  });
});
