import { createTestAuditSink } from '../../test/test-utils/audit.helpers';
import { buildTenantConfig } from '../../test/test-utils/tenant.helpers';
import type { TenantConfig } from '../config';
import { AuthError, ConfigError } from '../errors';
import { CredentialResolver, createAuthStrategy } from './credential-resolver';
import { ClientSecretAuthStrategy } from './strategies/client-secret-auth.strategy';
import { ManagedIdentityAuthStrategy } from './strategies/managed-identity-auth.strategy';

const { acquireTokenByClientCredential } = vi.hoisted(() => ({
  acquireTokenByClientCredential: vi.fn(),
}));

vi.mock('@azure/msal-node', () => ({
  ConfidentialClientApplication: class {
    public acquireTokenByClientCredential = acquireTokenByClientCredential;
  },
}));

describe('CredentialResolver', () => {
  const scopes = ['https://graph.microsoft.com/.default'];

  beforeEach(() => {
    acquireTokenByClientCredential.mockReset();
  });

  it('returns the token and records one acquisition event without the token', async () => {
    acquireTokenByClientCredential.mockResolvedValue({ accessToken: 'test-token', expiresOn: null });
    const { sink, events, lines } = createTestAuditSink();
    const resolver = new CredentialResolver(
      buildTenantConfig(),
      sink.child({ tenantId: 'contoso', correlationId: 'corr-1' }),
    );

    await expect(resolver.acquireToken(scopes)).resolves.toBe('test-token');

    expect(events()).toEqual([
      expect.objectContaining({
        level: 'INFO',
        message: 'acquired_app_token',
        tenantId: 'contoso',
        correlationId: 'corr-1',
        fields: { authType: 'client_secret' },
      }),
    ]);
    expect(lines.join('')).not.toContain('test-token');
  });

  it('records a failure event and rethrows the original error', async () => {
    acquireTokenByClientCredential.mockResolvedValue(null);
    const { sink, events } = createTestAuditSink();
    const resolver = new CredentialResolver(buildTenantConfig(), sink);

    await expect(resolver.acquireToken(scopes)).rejects.toBeInstanceOf(AuthError);

    expect(events()).toEqual([
      expect.objectContaining({
        level: 'ERROR',
        message: 'token_acquisition_failed',
        fields: {
          authType: 'client_secret',
          error: {
            name: 'AuthError',
            message: 'Client credential exchange returned no access token',
          },
        },
      }),
    ]);
  });
});

describe('createAuthStrategy', () => {
  it('selects the strategy matching the auth type', () => {
    expect(createAuthStrategy(buildTenantConfig())).toBeInstanceOf(ClientSecretAuthStrategy);
    expect(
      createAuthStrategy(buildTenantConfig({ auth: { type: 'managed_identity' } })),
    ).toBeInstanceOf(ManagedIdentityAuthStrategy);
  });

  it('rejects an auth type it does not know', () => {
    const tenant = {
      ...buildTenantConfig(),
      auth: { type: 'device_code' },
    } as unknown as TenantConfig;

    expect(() => createAuthStrategy(tenant)).toThrow(ConfigError);
  });
});
