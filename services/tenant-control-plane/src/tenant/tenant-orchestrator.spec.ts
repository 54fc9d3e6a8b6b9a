import { MockAgent } from 'undici';
import { createTestAuditSink, type TestAuditSink } from '../../test/test-utils/audit.helpers';
import { buildTenantConfig } from '../../test/test-utils/tenant.helpers';
import type { AuditSink } from '../audit';
import type { CredentialResolverFactory } from '../auth/credential-resolver.factory';
import { AppConfigSchema, type TenantConfig } from '../config';
import { GraphRequestError, NotFoundError } from '../errors';
import { GraphDispatcherFactory } from '../graph';
import { TenantOrchestrator } from './tenant-orchestrator';
import { TenantRegistry } from './tenant-registry';

const GRAPH_ORIGIN = 'https://graph.microsoft.com';
const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('TenantOrchestrator', () => {
  let audit: TestAuditSink;
  let mockAgent: MockAgent;
  let registry: TenantRegistry;
  let orchestrator: TenantOrchestrator;

  const credentialResolverFactory: Pick<CredentialResolverFactory, 'create'> = {
    create: (_tenant: TenantConfig, scopedAudit: AuditSink) => ({
      acquireToken: async () => {
        scopedAudit.info('acquired_app_token', { authType: 'client_secret' });
        return 'test-token';
      },
    }),
  };

  beforeEach(() => {
    audit = createTestAuditSink();
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();

    const config = AppConfigSchema.parse({ tenantConfigPath: 'unused.yaml' });
    registry = new TenantRegistry(config, audit.sink);
    registry.onboard(
      buildTenantConfig({
        tenantId: 'contoso',
        requiredApplicationRoles: ['User.Read.All'],
      }),
    );
    orchestrator = new TenantOrchestrator(
      registry,
      audit.sink,
      credentialResolverFactory,
      new GraphDispatcherFactory(config, mockAgent, async () => undefined),
    );
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  const eventsAfterOnboarding = () =>
    audit.events().filter((event) => event.message !== 'tenant_onboarded');

  it('wraps a successful operation in started and completed events', async () => {
    mockAgent
      .get(GRAPH_ORIGIN)
      .intercept({ path: (path) => path.startsWith('/v1.0/users'), method: 'GET' })
      .reply(200, { value: [{ id: 'user-1' }] }, { headers: { 'content-type': 'application/json' } });

    const users = await orchestrator.runOperation(
      'contoso',
      (operations) => operations.listUsers(1),
      'corr-given',
    );

    expect(users).toEqual([{ id: 'user-1' }]);
    expect(eventsAfterOnboarding().map(({ message, tenantId, correlationId }) => ({ message, tenantId, correlationId }))).toEqual([
      { message: 'tenant_validated', tenantId: 'contoso', correlationId: 'corr-given' },
      { message: 'operation_started', tenantId: 'contoso', correlationId: 'corr-given' },
      { message: 'acquired_app_token', tenantId: 'contoso', correlationId: 'corr-given' },
      { message: 'graph_request_succeeded', tenantId: 'contoso', correlationId: 'corr-given' },
      { message: 'operation_completed', tenantId: 'contoso', correlationId: 'corr-given' },
    ]);
  });

  it('records the permissions the tenant is expected to grant', () => {
    orchestrator.withContext('contoso', 'corr-1');

    expect(eventsAfterOnboarding()[0]?.fields).toEqual({
      requiredApplicationRoles: ['User.Read.All'],
      requiredDelegatedPermissions: [],
    });
  });

  it('generates a fresh UUID per operation when none is given', async () => {
    const first = await orchestrator.runOperation('contoso', async (operations) => operations.correlationId);
    const second = await orchestrator.runOperation('contoso', async (operations) => operations.correlationId);

    expect(first).toMatch(UUID_V4);
    expect(second).toMatch(UUID_V4);
    expect(first).not.toBe(second);
    const started = eventsAfterOnboarding().filter((event) => event.message === 'operation_started');
    expect(started.map((event) => event.correlationId)).toEqual([first, second]);
  });

  it('builds a new context on every call', () => {
    const first = orchestrator.withContext('contoso');
    const second = orchestrator.withContext('contoso');

    expect(first.dispatcher).not.toBe(second.dispatcher);
    expect(first.correlationId).not.toBe(second.correlationId);
  });

  it('records the failure and rethrows the original error', async () => {
    mockAgent
      .get(GRAPH_ORIGIN)
      .intercept({ path: '/v1.0/groups', method: 'POST' })
      .reply(403, { error: { code: 'Authorization_RequestDenied', message: 'Insufficient privileges' } }, {
        headers: { 'content-type': 'application/json' },
      });

    const error = await orchestrator
      .runOperation('contoso', (operations) => operations.createGroup('Ops', ''), 'corr-2')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GraphRequestError);
    const failure = eventsAfterOnboarding().at(-1);
    expect(failure).toMatchObject({
      level: 'ERROR',
      message: 'operation_failed',
      correlationId: 'corr-2',
      fields: { error: { name: 'GraphRequestError', message: 'Insufficient privileges' } },
    });
    expect(eventsAfterOnboarding().map((event) => event.message)).not.toContain(
      'operation_completed',
    );
  });

  it('fails an unknown tenant before the operation starts', async () => {
    const operation = vi.fn();

    await expect(orchestrator.runOperation('northwind', operation)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(operation).not.toHaveBeenCalled();
    expect(eventsAfterOnboarding()).toEqual([]);
  });
});
