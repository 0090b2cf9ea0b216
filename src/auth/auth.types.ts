/**
 * Credential types
 */

export interface ClientCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface AccessToken {
  token: string;
  tokenType: string;
  /** Epoch milliseconds at which the identity endpoint says the token expires */
  expiresAt: number;
}

/**
 * Anything that can hand out a bearer token for the Fabric API
 */
export interface TokenSource {
  acquire(): Promise<string>;
}

export interface CredentialProviderOptions {
  authorityHost?: string;
  scope?: string;
  /** Tokens are renewed this long before they expire */
  safetyMarginMs?: number;
  timeoutMs?: number;
}
