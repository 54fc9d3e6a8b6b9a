import type { AuthenticationResult, ConfidentialClientApplication } from '@azure/msal-node';
import { normalizeError } from '@control-plane/utils';
import { AuthError } from '../../errors';
import type { TokenAcquisitionResult } from '../types';

export const buildAuthority = (authorityHost: string, tenantId: string) =>
  `${authorityHost}/${tenantId}`;

/**
 * Runs the client-credentials grant. MSAL serves the token from its in-memory
 * cache while it is valid and only then contacts the authority.
 */
export async function acquireClientCredentialToken(
  msalClient: ConfidentialClientApplication,
  scopes: string[],
): Promise<TokenAcquisitionResult> {
  let response: AuthenticationResult | null;
  try {
    response = await msalClient.acquireTokenByClientCredential({ scopes });
  } catch (error) {
    throw new AuthError(`Client credential exchange failed: ${normalizeError(error).message}`, {
      cause: error,
    });
  }

  if (!response?.accessToken) {
    throw new AuthError('Client credential exchange returned no access token', {
      details: response,
    });
  }

  return { token: response.accessToken };
}
