import { type AuditSink, describeError } from '../audit';
import { AuthType, type TenantConfig } from '../config';
import { AuthError, ConfigError } from '../errors';
import type { AuthStrategy } from './strategies/auth-strategy.interface';
import { CertificateAuthStrategy } from './strategies/certificate-auth.strategy';
import { ClientSecretAuthStrategy } from './strategies/client-secret-auth.strategy';
import { ManagedIdentityAuthStrategy } from './strategies/managed-identity-auth.strategy';
import type { AccessTokenProvider } from './types';

export function createAuthStrategy(tenant: TenantConfig): AuthStrategy {
  const { auth } = tenant;
  switch (auth.type) {
    case AuthType.CLIENT_SECRET:
      return new ClientSecretAuthStrategy(tenant.tenantId, auth);
    case AuthType.CERTIFICATE:
      return new CertificateAuthStrategy(tenant.tenantId, auth);
    case AuthType.MANAGED_IDENTITY:
      return new ManagedIdentityAuthStrategy(auth);
    default: {
      const unsupported: never = auth;
      throw new ConfigError(
        `Unsupported auth configuration for tenant ${tenant.tenantId}: ${JSON.stringify(unsupported)}`,
      );
    }
  }
}

/**
 * Turns a tenant's auth descriptor into bearer tokens. Lives for one
 * operation; the strategy, and with it the MSAL token cache, is created on
 * first use and reused for every retry after that.
 */
export class CredentialResolver implements AccessTokenProvider {
  private strategy?: AuthStrategy;

  public constructor(
    private readonly tenant: TenantConfig,
    private readonly audit: AuditSink,
  ) {}

  public async acquireToken(scopes: readonly string[]): Promise<string> {
    const authType = this.tenant.auth.type;
    try {
      this.strategy ??= createAuthStrategy(this.tenant);
      const { token } = await this.strategy.acquireNewToken([...scopes]);
      if (!token) {
        throw new AuthError(`Empty token returned for auth type ${authType}`);
      }

      this.audit.info('acquired_app_token', { authType });
      return token;
    } catch (error) {
      this.audit.error('token_acquisition_failed', { authType, error: describeError(error) });
      throw error;
    }
  }
}
