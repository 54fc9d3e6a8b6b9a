import { ConfidentialClientApplication, type Configuration } from '@azure/msal-node';
import { Logger } from '@nestjs/common';
import { type CertificateAuthConfig, resolveSecret } from '../../config';
import { loadCertificateCredential } from '../certificate-loader';
import type { TokenAcquisitionResult } from '../types';
import type { AuthStrategy } from './auth-strategy.interface';
import { acquireClientCredentialToken, buildAuthority } from './confidential-client';

export class CertificateAuthStrategy implements AuthStrategy {
  private readonly logger = new Logger(this.constructor.name);
  private msalClient?: ConfidentialClientApplication;

  public constructor(
    private readonly tenantId: string,
    private readonly authConfig: CertificateAuthConfig,
  ) {}

  public async acquireNewToken(scopes: string[]): Promise<TokenAcquisitionResult> {
    this.logger.debug(`Acquiring Graph token for tenant ${this.tenantId} using a certificate`);
    this.msalClient ??= new ConfidentialClientApplication(await this.buildMsalConfig());
    return acquireClientCredentialToken(this.msalClient, scopes);
  }

  private async buildMsalConfig(): Promise<Configuration> {
    const { certificatePath, certificatePassword } = this.authConfig;
    const password = certificatePassword ? resolveSecret(certificatePassword) : undefined;
    const { privateKey, thumbprintSha256, x5c } = await loadCertificateCredential(
      certificatePath,
      password,
    );

    return {
      auth: {
        clientId: this.authConfig.clientId,
        authority: buildAuthority(this.authConfig.authorityHost, this.tenantId),
        clientCertificate: { privateKey, thumbprintSha256, x5c },
      },
    };
  }
}
