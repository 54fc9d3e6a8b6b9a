import { Injectable } from '@nestjs/common';
import type { AuditSink } from '../audit';
import type { TenantConfig } from '../config';
import { CredentialResolver } from './credential-resolver';
import type { AccessTokenProvider } from './types';

@Injectable()
export class CredentialResolverFactory {
  public create(tenant: TenantConfig, audit: AuditSink): AccessTokenProvider {
    return new CredentialResolver(tenant, audit);
  }
}
