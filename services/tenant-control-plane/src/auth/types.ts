export interface TokenAcquisitionResult {
  token: string;
}

/** Anything that can hand out a bearer token for a set of scopes. */
export interface AccessTokenProvider {
  acquireToken(scopes: readonly string[]): Promise<string>;
}
