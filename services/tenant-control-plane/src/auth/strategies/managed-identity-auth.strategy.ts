import { ManagedIdentityCredential } from '@azure/identity';
import { normalizeError } from '@control-plane/utils';
import { Logger } from '@nestjs/common';
import { z } from 'zod';
import type { ManagedIdentityAuthConfig } from '../../config';
import { AuthError } from '../../errors';
import type { TokenAcquisitionResult } from '../types';
import type { AuthStrategy } from './auth-strategy.interface';

const AccessTokenSchema = z.object({
  token: z.string().nonempty(),
  expiresOnTimestamp: z.number().positive(),
});

export class ManagedIdentityAuthStrategy implements AuthStrategy {
  private readonly logger = new Logger(this.constructor.name);
  private readonly credential: ManagedIdentityCredential;

  public constructor(authConfig: ManagedIdentityAuthConfig) {
    this.credential = authConfig.clientId
      ? new ManagedIdentityCredential({ clientId: authConfig.clientId })
      : new ManagedIdentityCredential();
  }

  public async acquireNewToken(scopes: string[]): Promise<TokenAcquisitionResult> {
    this.logger.debug('Acquiring Graph token using managed identity');

    let tokenResponse: unknown;
    try {
      tokenResponse = await this.credential.getToken(scopes);
    } catch (error) {
      throw new AuthError(`Managed identity token request failed: ${normalizeError(error).message}`, {
        cause: error,
      });
    }

    const result = AccessTokenSchema.safeParse(tokenResponse);
    if (!result.success) {
      throw new AuthError('Managed identity returned no usable access token', {
        details: { issues: result.error.issues },
      });
    }

    return { token: result.data.token };
  }
}
