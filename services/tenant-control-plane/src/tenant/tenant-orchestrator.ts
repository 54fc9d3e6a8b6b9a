import { randomUUID } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { AuditSink, describeError } from '../audit';
import { CredentialResolverFactory } from '../auth/credential-resolver.factory';
import type { TenantConfig } from '../config';
import { GraphDispatcherFactory } from '../graph';
import type { ExecutionContext } from './execution-context.interface';
import { type TenantOperation, TenantOperations } from './tenant-operations';
import { TenantRegistry } from './tenant-registry';

/**
 * Builds a fresh execution context per operation and wraps the operation in
 * started / completed / failed audit events that share one correlation id.
 */
@Injectable()
export class TenantOrchestrator {
  public constructor(
    private readonly registry: TenantRegistry,
    private readonly audit: AuditSink,
    private readonly credentialResolverFactory: CredentialResolverFactory,
    private readonly graphDispatcherFactory: GraphDispatcherFactory,
  ) {}

  public withContext(tenantId: string, correlationId: string = randomUUID()): ExecutionContext {
    const tenant = this.registry.getTenant(tenantId);
    const audit = this.audit.child({ tenantId: tenant.tenantId, correlationId });

    this.validatePermissions(tenant, audit);
    const resolver = this.credentialResolverFactory.create(tenant, audit);
    const dispatcher = this.graphDispatcherFactory.create(tenant, resolver, audit);

    return { tenantId: tenant.tenantId, correlationId, dispatcher };
  }

  public async runOperation<T>(
    tenantId: string,
    operation: TenantOperation<T>,
    correlationId: string = randomUUID(),
  ): Promise<T> {
    const context = this.withContext(tenantId, correlationId);
    const audit = this.audit.child({ tenantId: context.tenantId, correlationId });

    audit.info('operation_started');
    try {
      const result = await operation(new TenantOperations(context));
      audit.info('operation_completed');
      return result;
    } catch (error) {
      audit.error('operation_failed', { error: describeError(error) });
      throw error;
    }
  }

  // Records what the tenant is expected to have granted; checking the grants
  // against Entra ID needs directory read access the control plane does not hold.
  private validatePermissions(tenant: TenantConfig, audit: AuditSink): void {
    audit.info('tenant_validated', {
      requiredApplicationRoles: tenant.requiredApplicationRoles,
      requiredDelegatedPermissions: tenant.requiredDelegatedPermissions,
    });
  }
}
