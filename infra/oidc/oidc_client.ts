import { errors, jwtVerify, type JWTPayload } from "jose";

import type { OidcProvider, RequestOptions, TokenSet } from "../../app/auth/contracts.js";
import { ProviderError } from "../../app/errors.js";
import type { VerifiedClaims } from "../../domain/auth/types.js";
import { JwksCache, JwksFetchError } from "./jwks_cache.js";

const DEFAULT_SCOPE = "openid profile email";
const CLOCK_TOLERANCE_SECONDS = 5;

export type OidcClientConfig = {
  /** Provider host, e.g. `tenant.eu.auth0.com`. */
  domain: string;
  clientId: string;
  clientSecret: string;
  /** API identifier expected in bearer access tokens. */
  audience: string;
  redirectUri: string;
  scope?: string;
  jwksCacheTtlSeconds?: number;
  jwks?: JwksCache;
  fetch?: typeof fetch;
  now?: () => Date;
};

export function normalizeOidcDomain(domain: string): string {
  return domain.trim().replace(/^https?:\/\//u, "").replace(/\/+$/u, "");
}

export class HttpOidcClient implements OidcProvider {
  readonly issuer: string;
  private readonly baseUrl: string;
  private readonly jwks: JwksCache;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly config: OidcClientConfig) {
    const domain = normalizeOidcDomain(config.domain);
    this.baseUrl = `https://${domain}`;
    this.issuer = `${this.baseUrl}/`;
    this.fetchImpl = config.fetch ?? fetch;
    this.now = config.now ?? (() => new Date());
    this.jwks =
      config.jwks ??
      new JwksCache({
        jwksUrl: `${this.baseUrl}/.well-known/jwks.json`,
        ttlSeconds: config.jwksCacheTtlSeconds,
        fetch: this.fetchImpl,
        now: this.now,
      });
  }

  buildAuthorizationUrl(input: { state: string; nonce: string }): string {
    const url = new URL(`${this.baseUrl}/authorize`);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("client_id", this.config.clientId);
    url.searchParams.set("redirect_uri", this.config.redirectUri);
    url.searchParams.set("scope", this.config.scope ?? DEFAULT_SCOPE);
    url.searchParams.set("audience", this.config.audience);
    url.searchParams.set("state", input.state);
    url.searchParams.set("nonce", input.nonce);
    return url.toString();
  }

  buildLogoutUrl(returnTo: string): string {
    const url = new URL(`${this.baseUrl}/v2/logout`);
    url.searchParams.set("client_id", this.config.clientId);
    url.searchParams.set("returnTo", returnTo);
    return url.toString();
  }

  /** Single attempt: authorization codes are single-use. */
  async exchangeCodeForTokens(code: string, options: RequestOptions = {}): Promise<TokenSet> {
    const body = new URLSearchParams({
      grant_type: "authorization_code",
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      code,
      redirect_uri: this.config.redirectUri,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/oauth/token`, {
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          accept: "application/json",
        },
        body,
        signal: options.signal,
      });
    } catch (error) {
      throw new ProviderError("exchange_failed", "token endpoint unreachable", { cause: error });
    }

    const payload = await readJsonObject(response);

    if (!response.ok) {
      throw new ProviderError(
        "exchange_failed",
        asNonEmptyString(payload?.error_description) ??
          asNonEmptyString(payload?.error) ??
          `token endpoint returned ${response.status}`,
      );
    }

    const idToken = asNonEmptyString(payload?.id_token);
    if (!idToken) {
      throw new ProviderError("exchange_failed", "token endpoint did not return id_token");
    }

    const expiresIn = payload?.expires_in;
    return {
      idToken,
      accessToken: asNonEmptyString(payload?.access_token),
      expiresInSeconds: typeof expiresIn === "number" && Number.isFinite(expiresIn) ? expiresIn : null,
    };
  }

  async verifyIdToken(
    rawIdToken: string,
    input: { expectedNonce: string | null } & RequestOptions,
  ): Promise<VerifiedClaims> {
    const payload = await this.verifyJwt(rawIdToken, this.config.clientId, input.signal);

    if (input.expectedNonce !== null && payload.nonce !== input.expectedNonce) {
      throw new ProviderError("verification_failed", "ID token nonce mismatch");
    }

    const subject = asNonEmptyString(payload.sub);
    if (!subject) {
      throw new ProviderError("verification_failed", "ID token has no subject");
    }

    const email = asNonEmptyString(payload.email);
    if (!email) {
      throw new ProviderError("verification_failed", "ID token has no email claim");
    }

    return {
      externalSubjectId: subject,
      email,
      emailVerified: payload.email_verified === true,
      displayName: asNonEmptyString(payload.name) ?? asNonEmptyString(payload.nickname) ?? "",
      pictureUrl: asNonEmptyString(payload.picture) ?? "",
    };
  }

  async verifyAccessToken(rawAccessToken: string, options: RequestOptions = {}): Promise<{ subject: string }> {
    const payload = await this.verifyJwt(rawAccessToken, this.config.audience, options.signal);
    const subject = asNonEmptyString(payload.sub);
    if (!subject) {
      throw new ProviderError("verification_failed", "access token has no subject");
    }
    return { subject };
  }

  /** Retries once with refreshed keys when the signing key is unknown (rotation). */
  private async verifyJwt(token: string, audience: string, signal: AbortSignal | undefined): Promise<JWTPayload> {
    try {
      return await this.verifyWithKeys(token, audience, { signal });
    } catch (error) {
      if (!(error instanceof errors.JWKSNoMatchingKey)) {
        throw toVerificationError(error);
      }
    }

    try {
      return await this.verifyWithKeys(token, audience, { signal, forceRefresh: true });
    } catch (error) {
      throw toVerificationError(error);
    }
  }

  private async verifyWithKeys(
    token: string,
    audience: string,
    options: { signal: AbortSignal | undefined; forceRefresh?: boolean },
  ): Promise<JWTPayload> {
    const keySet = await this.jwks.getKeySet(options);
    const { payload } = await jwtVerify(token, keySet, {
      issuer: this.issuer,
      audience,
      algorithms: ["RS256"],
      currentDate: this.now(),
      clockTolerance: CLOCK_TOLERANCE_SECONDS,
    });
    return payload;
  }
}

function toVerificationError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof JwksFetchError) {
    return new ProviderError("verification_failed", error.message, { cause: error });
  }
  const detail = error instanceof Error ? error.message : "token validation failed";
  return new ProviderError("verification_failed", detail, { cause: error });
}

async function readJsonObject(response: Response): Promise<Record<string, unknown> | null> {
  let parsed: unknown;
  try {
    parsed = await response.json();
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNonEmptyString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
