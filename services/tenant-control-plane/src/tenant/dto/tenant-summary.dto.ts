import type { AuthType, TenantConfig } from '../../config';

export interface TenantSummary {
  tenantId: string;
  displayName?: string;
  authType: AuthType;
  graphBaseUrl: string;
  defaultScopes: string[];
}

export function toTenantSummary(tenant: TenantConfig): TenantSummary {
  return {
    tenantId: tenant.tenantId,
    displayName: tenant.displayName,
    authType: tenant.auth.type,
    graphBaseUrl: tenant.graphBaseUrl,
    defaultScopes: [...tenant.defaultScopes],
  };
}
