import type { SessionPayload, VerifiedClaims } from "../../domain/auth/types.js";

export type TokenSet = {
  idToken: string;
  accessToken: string | null;
  expiresInSeconds: number | null;
};

export type RequestOptions = {
  signal?: AbortSignal;
};

/**
 * External OAuth2/OIDC authority. Exchange and verification failures reject
 * with a `ProviderError`; nothing is retried.
 */
export interface OidcProvider {
  buildAuthorizationUrl(input: { state: string; nonce: string }): string;
  buildLogoutUrl(returnTo: string): string;
  exchangeCodeForTokens(code: string, options?: RequestOptions): Promise<TokenSet>;
  verifyIdToken(
    rawIdToken: string,
    input: { expectedNonce: string | null } & RequestOptions,
  ): Promise<VerifiedClaims>;
  verifyAccessToken(rawAccessToken: string, options?: RequestOptions): Promise<{ subject: string }>;
}

export type SessionRejection = "decode_error" | "expired";

export type SessionValidation =
  | { ok: true; payload: SessionPayload }
  | { ok: false; reason: SessionRejection };

export interface SessionCodec {
  readonly ttlSeconds: number;
  issue(input: Omit<SessionPayload, "exp">, now?: Date): Promise<{ value: string; payload: SessionPayload }>;
  validate(value: string, now?: Date): Promise<SessionValidation>;
}

export type LoginState = {
  state: string;
  nonce: string;
  returnTo: string | null;
};

export interface LoginStateCodec {
  readonly ttlSeconds: number;
  seal(input: LoginState, now?: Date): string;
  open(value: string, now?: Date): LoginState | null;
}
