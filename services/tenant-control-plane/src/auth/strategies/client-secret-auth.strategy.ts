import { ConfidentialClientApplication, type Configuration } from '@azure/msal-node';
import { Logger } from '@nestjs/common';
import { type ClientSecretAuthConfig, resolveSecret } from '../../config';
import type { TokenAcquisitionResult } from '../types';
import type { AuthStrategy } from './auth-strategy.interface';
import { acquireClientCredentialToken, buildAuthority } from './confidential-client';

export class ClientSecretAuthStrategy implements AuthStrategy {
  private readonly logger = new Logger(this.constructor.name);
  private msalClient?: ConfidentialClientApplication;

  public constructor(
    private readonly tenantId: string,
    private readonly authConfig: ClientSecretAuthConfig,
  ) {}

  public async acquireNewToken(scopes: string[]): Promise<TokenAcquisitionResult> {
    this.logger.debug(`Acquiring Graph token for tenant ${this.tenantId} using client secret`);
    this.msalClient ??= new ConfidentialClientApplication(this.buildMsalConfig());
    return acquireClientCredentialToken(this.msalClient, scopes);
  }

  private buildMsalConfig(): Configuration {
    return {
      auth: {
        clientId: this.authConfig.clientId,
        authority: buildAuthority(this.authConfig.authorityHost, this.tenantId),
        clientSecret: resolveSecret(this.authConfig.clientSecret),
      },
    };
  }
}
