import { Inject, Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { AuditSink } from '../audit';
import { type AppConfig, appConfig, loadTenantConfigs, type TenantConfig } from '../config';
import { NotFoundError } from '../errors';

@Injectable()
export class TenantRegistry implements OnModuleInit {
  private readonly logger = new Logger(this.constructor.name);
  private tenants: ReadonlyMap<string, TenantConfig> = new Map();

  public constructor(
    @Inject(appConfig.KEY) private readonly config: AppConfig,
    private readonly audit: AuditSink,
  ) {}

  public onModuleInit(): void {
    const tenants = loadTenantConfigs(this.config.tenantConfigPath);
    this.tenants = new Map(tenants.map((tenant) => [tenant.tenantId, tenant]));
    this.logger.log(
      `Loaded ${tenants.length} tenant(s) from ${this.config.tenantConfigPath}: ${[...this.tenants.keys()].join(', ')}`,
    );
  }

  public get size(): number {
    return this.tenants.size;
  }

  public getTenant(tenantId: string): TenantConfig {
    const tenant = this.tenants.get(tenantId);
    if (!tenant) {
      throw new NotFoundError(tenantId);
    }
    return tenant;
  }

  public listTenants(): TenantConfig[] {
    return [...this.tenants.values()];
  }

  /** Inserts or replaces. Readers holding the previous map are unaffected. */
  public onboard(tenant: TenantConfig): void {
    const next = new Map(this.tenants);
    next.set(tenant.tenantId, tenant);
    this.tenants = next;
    this.audit.info('tenant_onboarded', {
      tenantId: tenant.tenantId,
      displayName: tenant.displayName,
    });
  }

  public offboard(tenantId: string): boolean {
    const next = new Map(this.tenants);
    const removed = next.delete(tenantId);
    this.tenants = next;
    this.audit.info('tenant_offboarded', { tenantId, removed });
    return removed;
  }
}
