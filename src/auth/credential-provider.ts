/**
 * Credential provider
 *
 * Exchanges service principal credentials for a Fabric bearer token via the
 * OAuth2 client-credentials grant and caches it until shortly before expiry.
 * One instance per run owns the cached token; there is no process-wide cache.
 */

import type { Logger } from "winston";
import type { Clock, HttpClient } from "#/core";
import { AUTHORITY_HOST, FABRIC_SCOPE, TOKEN_SAFETY_MARGIN_MS, TOKEN_TIMEOUT_MS } from "#/constants";
import { AuthenticationError, errorMessage } from "#/errors";
import { TokenErrorSchema, TokenResponseSchema } from "#/schemas";
import type {
  AccessToken,
  ClientCredentials,
  CredentialProviderOptions,
  TokenSource,
} from "./auth.types";

export class CredentialProvider implements TokenSource {
  private cached?: AccessToken;
  // In-flight exchange shared by concurrent callers
  private pending?: Promise<AccessToken>;
  private readonly authorityHost: string;
  private readonly scope: string;
  private readonly safetyMarginMs: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly credentials: ClientCredentials,
    private readonly http: HttpClient,
    private readonly clock: Clock,
    private readonly logger: Logger,
    options: CredentialProviderOptions = {}
  ) {
    this.authorityHost = options.authorityHost ?? AUTHORITY_HOST;
    this.scope = options.scope ?? FABRIC_SCOPE;
    this.safetyMarginMs = options.safetyMarginMs ?? TOKEN_SAFETY_MARGIN_MS;
    this.timeoutMs = options.timeoutMs ?? TOKEN_TIMEOUT_MS;
  }

  /**
   * Return a valid bearer token, exchanging credentials only when the cached
   * one is missing or inside the safety margin.
   */
  async acquire(): Promise<string> {
    if (this.cached && this.isFresh(this.cached)) {
      this.logger.debug("Using cached token");
      return this.cached.token;
    }

    if (!this.pending) {
      this.pending = this.exchange().finally(() => {
        this.pending = undefined;
      });
    }

    const token = await this.pending;
    return token.token;
  }

  /**
   * Drop the cached token so the next acquire() exchanges again
   */
  invalidate(): void {
    this.cached = undefined;
  }

  /**
   * Expiry of the cached token in epoch milliseconds, if any
   */
  get expiresAt(): number | undefined {
    return this.cached?.expiresAt;
  }

  private isFresh(token: AccessToken): boolean {
    return this.clock.now() < token.expiresAt - this.safetyMarginMs;
  }

  private getTokenEndpoint(): string {
    return `${this.authorityHost}/${encodeURIComponent(this.credentials.tenantId)}/oauth2/v2.0/token`;
  }

  private async exchange(): Promise<AccessToken> {
    this.logger.info("Acquiring new access token", { tenantId: this.credentials.tenantId });

    const params = new URLSearchParams();
    params.set("grant_type", "client_credentials");
    params.set("client_id", this.credentials.clientId);
    params.set("client_secret", this.credentials.clientSecret);
    params.set("scope", this.scope);

    let response: Response;
    try {
      response = await this.http.fetch(this.getTokenEndpoint(), {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: params.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new AuthenticationError(`Token request failed: ${errorMessage(err)}`);
    }

    const text = await response.text();

    if (!response.ok) {
      throw new AuthenticationError(
        `Identity endpoint rejected credentials: ${response.status} ${describeTokenError(text)}`.trim(),
        { status: response.status, body: text }
      );
    }

    const parsed = TokenResponseSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      throw new AuthenticationError("Identity endpoint returned an unreadable token response", {
        status: response.status,
        body: text,
      });
    }

    const token: AccessToken = {
      token: parsed.data.access_token,
      tokenType: parsed.data.token_type,
      expiresAt: this.clock.now() + parsed.data.expires_in * 1000,
    };
    this.cached = token;

    this.logger.info("Access token acquired", { expiresAt: new Date(token.expiresAt).toISOString() });
    return token;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function describeTokenError(text: string): string {
  const parsed = TokenErrorSchema.safeParse(parseJson(text));
  if (!parsed.success) return "";
  const { error, error_description } = parsed.data;
  return error_description ? `${error}: ${error_description}` : error;
}
