import type { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { MockAgent } from 'undici';
import { AppModule } from '../src/app.module';
import { AuditSink } from '../src/audit';
import { CredentialResolverFactory } from '../src/auth/credential-resolver.factory';
import { GRAPH_HTTP_DISPATCHER, SLEEPER } from '../src/graph';
import { createTestAuditSink, type TestAuditSink } from './test-utils/audit.helpers';

const GRAPH_ORIGIN = 'https://graph.microsoft.com';
const JSON_HEADERS = { 'content-type': 'application/json' };

describe('Tenant control plane HTTP API', () => {
  let app: INestApplication;
  let mockAgent: MockAgent;
  let audit: TestAuditSink;

  beforeEach(async () => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    audit = createTestAuditSink();

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(GRAPH_HTTP_DISPATCHER)
      .useValue(mockAgent)
      .overrideProvider(SLEEPER)
      .useValue(async () => undefined)
      .overrideProvider(AuditSink)
      .useValue(audit.sink)
      .overrideProvider(CredentialResolverFactory)
      .useValue({ create: () => ({ acquireToken: async () => 'test-token' }) })
      .compile();

    app = moduleRef.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /probe reports the version', async () => {
    const response = await request(app.getHttpServer()).get('/probe').expect(200);

    expect(response.body).toEqual({ version: '0.1.0' });
  });

  it('GET /tenants lists tenants without secrets', async () => {
    const response = await request(app.getHttpServer()).get('/tenants').expect(200);

    expect(response.body).toEqual([
      {
        tenantId: 'contoso',
        displayName: 'Contoso Ltd',
        authType: 'client_secret',
        graphBaseUrl: 'https://graph.microsoft.com',
        defaultScopes: ['https://graph.microsoft.com/.default'],
      },
      {
        tenantId: 'fabrikam',
        authType: 'managed_identity',
        graphBaseUrl: 'https://graph.example.test',
        defaultScopes: ['https://graph.microsoft.com/.default'],
      },
    ]);
  });

  it('PUT then DELETE /tenants/:tenantId onboards and offboards a tenant', async () => {
    await request(app.getHttpServer())
      .put('/tenants/northwind')
      .send({
        tenantId: 'northwind',
        auth: { type: 'managed_identity', clientId: 'identity-1' },
      })
      .expect(200);

    const afterOnboard = await request(app.getHttpServer()).get('/tenants').expect(200);
    expect(afterOnboard.body).toHaveLength(3);

    await request(app.getHttpServer()).delete('/tenants/northwind').expect(204);

    const afterOffboard = await request(app.getHttpServer()).get('/tenants').expect(200);
    expect(afterOffboard.body).toHaveLength(2);
    expect(audit.messages()).toEqual(['tenant_onboarded', 'tenant_offboarded']);
  });

  it('PUT /tenants/:tenantId rejects an invalid config', async () => {
    await request(app.getHttpServer())
      .put('/tenants/northwind')
      .send({ tenantId: 'northwind', auth: { type: 'device_code' } })
      .expect(400);
  });

  it('PUT /tenants/:tenantId rejects a mismatched tenant id', async () => {
    await request(app.getHttpServer())
      .put('/tenants/northwind')
      .send({ tenantId: 'contoso', auth: { type: 'managed_identity' } })
      .expect(400);
  });

  it('POST /tenants/:tenantId/users/list runs the operation under the caller correlation id', async () => {
    mockAgent
      .get(GRAPH_ORIGIN)
      .intercept({ path: (path) => path.startsWith('/v1.0/users'), method: 'GET' })
      .reply(200, { value: [{ id: 'user-1', displayName: 'Adele Vance' }] }, { headers: JSON_HEADERS });

    const response = await request(app.getHttpServer())
      .post('/tenants/contoso/users/list')
      .set('x-correlation-id', 'corr-http-1')
      .send({ top: 1 })
      .expect(200);

    expect(response.headers['x-correlation-id']).toBe('corr-http-1');
    expect(response.body).toEqual({
      correlationId: 'corr-http-1',
      result: [{ id: 'user-1', displayName: 'Adele Vance' }],
    });
    expect(
      audit.events().every((event) => event.correlationId === 'corr-http-1'),
    ).toBe(true);
  });

  it('POST /tenants/:tenantId/groups returns 502 with upstream details on a Graph error', async () => {
    mockAgent
      .get(GRAPH_ORIGIN)
      .intercept({ path: '/v1.0/groups', method: 'POST' })
      .reply(
        400,
        { error: { code: 'Request_BadRequest', message: 'Invalid mailNickname' } },
        { headers: JSON_HEADERS },
      );

    const response = await request(app.getHttpServer())
      .post('/tenants/contoso/groups')
      .set('x-correlation-id', 'corr-http-2')
      .send({ displayName: 'Ops', description: 'Operations' })
      .expect(502);

    expect(response.body).toEqual({
      statusCode: 502,
      error: 'Microsoft Graph API Error',
      message: 'Invalid mailNickname',
      correlationId: 'corr-http-2',
      upstreamStatus: 400,
      code: 'Request_BadRequest',
    });
  });

  it('returns 503 when Graph stays unavailable', async () => {
    mockAgent
      .get(GRAPH_ORIGIN)
      .intercept({ path: (path) => path.startsWith('/v1.0/users'), method: 'GET' })
      .reply(503, '')
      .times(4);

    const response = await request(app.getHttpServer())
      .post('/tenants/contoso/users/list')
      .send({})
      .expect(503);

    expect(response.body.error).toBe('Microsoft Graph Unavailable');
    expect(response.body.correlationId).toBe(response.headers['x-correlation-id']);
  });

  it('returns 404 for an unknown tenant', async () => {
    const response = await request(app.getHttpServer())
      .post('/tenants/northwind/users/list')
      .set('x-correlation-id', 'corr-http-3')
      .send({})
      .expect(404);

    expect(response.body).toEqual({
      statusCode: 404,
      error: 'Tenant Not Found',
      message: 'Tenant northwind is not configured',
      correlationId: 'corr-http-3',
    });
  });

  it('POST /tenants/:tenantId/groups validates the body', async () => {
    await request(app.getHttpServer())
      .post('/tenants/contoso/groups')
      .send({ description: 'no name' })
      .expect(400);
  });

  it('GET /audit returns the most recent events first', async () => {
    await request(app.getHttpServer()).delete('/tenants/unknown-1').expect(204);
    await request(app.getHttpServer()).delete('/tenants/unknown-2').expect(204);

    const response = await request(app.getHttpServer()).get('/audit?limit=1').expect(200);

    expect(response.body.count).toBe(1);
    expect(response.body.events).toEqual([
      expect.objectContaining({ message: 'tenant_offboarded', tenantId: 'unknown-2' }),
    ]);
  });

  it('GET /audit rejects a limit out of range', async () => {
    await request(app.getHttpServer()).get('/audit?limit=0').expect(400);
    await request(app.getHttpServer()).get('/audit?limit=1001').expect(400);
  });
});
