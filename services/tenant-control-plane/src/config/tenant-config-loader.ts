import { readFileSync } from 'node:fs';
import { normalizeError } from '@control-plane/utils';
import { load } from 'js-yaml';
import { isPlainObject } from 'remeda';
import { ConfigError } from '../errors';
import { ControlPlaneConfigSchema, type TenantConfig } from './tenant-config.schema';

export function loadTenantConfigs(configPath: string): TenantConfig[] {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Tenant config file not found or unreadable: ${configPath}`, {
      cause: error,
    });
  }

  try {
    const rawConfig = load(fileContent) ?? {};
    if (!isPlainObject(rawConfig)) {
      throw new Error('Expected a mapping at the top level');
    }

    const { tenants } = ControlPlaneConfigSchema.parse(rawConfig);
    assertUniqueTenantIds(tenants);
    return tenants;
  } catch (error) {
    throw new ConfigError(
      `Failed to load tenant config from ${configPath}: ${normalizeError(error).message}`,
      { cause: error },
    );
  }
}

function assertUniqueTenantIds(tenants: TenantConfig[]): void {
  const seen = new Set<string>();
  for (const { tenantId } of tenants) {
    if (seen.has(tenantId)) {
      throw new Error(`Duplicate tenant id '${tenantId}'`);
    }
    seen.add(tenantId);
  }
}
