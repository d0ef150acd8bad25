import { ConfigModule } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Test } from '@nestjs/testing';
import request from 'supertest';

import { FieldSyncModule } from '../src/fieldsync/fieldsync.module';
import { configureHttpApp } from '../src/http-setup';
import { PersistenceModule } from '../src/persistence/persistence.module';

const TEST_ENV = {
  NODE_ENV: 'test',
  DB_TYPE: 'sqlite',
  SQLITE_PATH: ':memory:',
  DB_SYNCHRONIZE: true,
  JWT_SECRET: 'test-secret',
  LOG_LEVEL: 'CRITICAL',
  SYNC_MAX_OPS_PER_PUSH: 500,
  SYNC_DEFAULT_PULL_LIMIT: 200,
  SYNC_MAX_PULL_LIMIT: 500,
  SYNC_MIN_CLIENT_VERSION: '2.1.0',
  SYNC_CONFLICT_POLICY_DEFAULT: 'LWW',
  SYNC_CHANGE_LOG_RETENTION_DAYS: 30,
};

const MAX_OPS = TEST_ENV.SYNC_MAX_OPS_PER_PUSH;

const createOp = (opId: string, clientId: string) => ({
  op_id: opId,
  entity_type: 'property',
  action: 'create',
  client_id: clientId,
  base_revision: 0,
  payload: {
    property_type: 'flerbostadshus',
    designation: 'Provgården 2:4',
    address: 'Provvägen 4',
  },
});

const fullBatch = (prefix: string, count: number) =>
  Array.from({ length: count }, (_, index) => ({
    op_id: `${prefix}-op-${index}`,
    entity_type: 'property',
    action: 'create',
    client_id: `${prefix}-${String(index).padStart(4, '0')}`,
    base_revision: 0,
    payload: {
      property_type: 'flerbostadshus',
      designation: `Provgården ${index}:1`,
      owner: 'Bostadsrättsföreningen Provgården',
      address: `Provvägen ${index}`,
      postal_code: '123 45',
      city: 'Provstad',
      num_apartments: 24,
      num_premises: 2,
      notes: 'Ventilation checked in stairwell A and B.',
    },
  }));

describe('Sync API (e2e)', () => {
  let app: NestExpressApplication;
  let bearer: string;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => TEST_ENV],
        }),
        PersistenceModule,
        FieldSyncModule,
      ],
    }).compile();

    app = moduleRef.createNestApplication<NestExpressApplication>({
      logger: false,
      bodyParser: false,
    });
    configureHttpApp(app);
    await app.init();

    const token = await app.get(JwtService).signAsync({ sub: 'user-1' });
    bearer = `Bearer ${token}`;
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /health reports the database as up', async () => {
    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body).toMatchObject({
      ok: true,
      data: { status: 'ok', environment: 'test', components: { database: { state: 'up' } } },
      error: null,
    });
  });

  it('rejects sync calls without a bearer token', async () => {
    await request(app.getHttpServer()).get('/sync/handshake').expect(401);
  });

  it('rejects tokens signed with another secret', async () => {
    const forged = await new JwtService({ secret: 'other-secret' }).signAsync({ sub: 'user-1' });

    await request(app.getHttpServer())
      .get('/sync/handshake')
      .set('Authorization', `Bearer ${forged}`)
      .expect(401);
  });

  it('GET /sync/handshake returns the configured limits', async () => {
    const response = await request(app.getHttpServer())
      .get('/sync/handshake')
      .set('Authorization', bearer)
      .expect(200);

    expect(response.body).toMatchObject({
      min_client_version: '2.1.0',
      conflict_policy_default: 'LWW',
      max_ops_per_push: 500,
      max_pull_limit: 500,
      change_log_retention_days: 30,
    });
    expect(typeof response.body.server_time).toBe('string');
  });

  describe('POST /sync/push', () => {
    it('requires an idempotency key', async () => {
      const response = await request(app.getHttpServer())
        .post('/sync/push')
        .set('Authorization', bearer)
        .send({ device_id: 'device-1', ops: [] })
        .expect(400);

      expect(response.body.code).toBe('missing_header');
    });

    it('refuses batches above the op limit', async () => {
      const response = await request(app.getHttpServer())
        .post('/sync/push')
        .set('Authorization', bearer)
        .set('X-Idempotency-Key', 'too-many')
        .send({ device_id: 'device-1', ops: fullBatch('over', MAX_OPS + 1) })
        .expect(413);

      expect(response.body.code).toBe('payload_too_large');
    });

    it('validates the request body', async () => {
      await request(app.getHttpServer())
        .post('/sync/push')
        .set('Authorization', bearer)
        .set('X-Idempotency-Key', 'bad-body')
        .send({ device_id: '', ops: 'nope' })
        .expect(400);
    });

    it('applies a batch and replays it byte for byte', async () => {
      const send = () =>
        request(app.getHttpServer())
          .post('/sync/push')
          .set('Authorization', bearer)
          .set('X-Idempotency-Key', 'batch-1')
          .send({ device_id: 'device-1', ops: [createOp('op-1', 'E2E-1')] })
          .expect(200);

      const first = await send();
      const second = await send();

      expect(first.body.acked_op_ids).toEqual(['op-1']);
      expect(first.body.id_map).toEqual([
        { entity_type: 'property', client_id: 'E2E-1', server_id: 1, revision: 1 },
      ]);
      expect(second.text).toBe(first.text);
    });
  });

  describe('GET /sync/pull', () => {
    it('returns the changes pushed so far', async () => {
      const response = await request(app.getHttpServer())
        .get('/sync/pull')
        .query({ limit: 10 })
        .set('Authorization', bearer)
        .expect(200);

      expect(response.body.has_more).toBe(false);
      expect(response.body.next_cursor).toBe('chg_000000000001');
      expect(response.body.changes).toHaveLength(1);
      expect(response.body.changes[0]).toMatchObject({
        change_id: 'chg_000000000001',
        entity_type: 'property',
        server_id: 1,
        action: 'create',
        revision: 1,
      });
    });

    it('returns nothing after the latest cursor', async () => {
      const response = await request(app.getHttpServer())
        .get('/sync/pull')
        .query({ since: 'chg_000000000001' })
        .set('Authorization', bearer)
        .expect(200);

      expect(response.body).toEqual({
        changes: [],
        next_cursor: 'chg_000000000001',
        has_more: false,
      });
    });

    it('rejects a non-numeric limit', async () => {
      await request(app.getHttpServer())
        .get('/sync/pull')
        .query({ limit: 'abc' })
        .set('Authorization', bearer)
        .expect(400);
    });
  });

  describe('full batches', () => {
    it('accepts a push of exactly the maximum number of ops', async () => {
      const ops = fullBatch('full', MAX_OPS);
      expect(JSON.stringify({ device_id: 'device-1', ops }).length).toBeGreaterThan(100 * 1024);

      const response = await request(app.getHttpServer())
        .post('/sync/push')
        .set('Authorization', bearer)
        .set('X-Idempotency-Key', 'full-batch')
        .send({ device_id: 'device-1', ops })
        .expect(200);

      expect(response.body.acked_op_ids).toHaveLength(MAX_OPS);
      expect(response.body.rejected_ops).toEqual([]);
      expect(response.body.server_cursor).toBe('chg_000000000501');
    }, 30000);
  });
});
