import type {
  LoginAttemptState,
  LoginFailureState,
  SessionPayload,
  VerifiedClaims,
} from "../../domain/auth/types.js";
import type { User } from "../../domain/user/user.js";
import { silentLogger, type Logger } from "../../infra/observability/logger.js";
import { ProviderError } from "../errors.js";
import type { LoginStateCodec, OidcProvider, SessionCodec, TokenSet } from "./contracts.js";
import type { IdentityReconciliationService } from "./reconciliation.js";
import { sanitizeNextPath } from "./redirects.js";

export type CallbackErrorCode =
  | "no_code"
  | "invalid_state"
  | "exchange_failed"
  | "verification_failed"
  | "auth_failed"
  | "session_failed";

export type BeginLoginResult = {
  authorizationUrl: string;
  loginStateCookie: string;
  state: string;
  nonce: string;
};

export type CallbackInput = {
  code: string | null;
  state: string | null;
  error: string | null;
  errorDescription: string | null;
  loginStateCookie: string | null;
  signal?: AbortSignal;
};

export type CallbackResult =
  | {
      kind: "session_issued";
      cookieValue: string;
      payload: SessionPayload;
      user: User;
      returnTo: string | null;
    }
  | {
      kind: "failed";
      state: LoginFailureState;
      /** A `CallbackErrorCode`, or the provider's own `error` value. */
      errorCode: string;
      errorDescription: string | null;
    };

export type AuthCallbackDeps = {
  provider: OidcProvider;
  reconciliation: IdentityReconciliationService;
  sessions: SessionCodec;
  loginStates: LoginStateCodec;
  generateOpaqueValue: () => string;
  constantTimeEqual: (left: string, right: string) => boolean;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Drives one login attempt from the authorization redirect to an issued
 * session. Every step is logged as a `login_state` transition.
 */
export class AuthCallbackService {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: AuthCallbackDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  beginLogin(input: { returnTo?: string | null } = {}): BeginLoginResult {
    const state = this.deps.generateOpaqueValue();
    const nonce = this.deps.generateOpaqueValue();
    this.transition("LoginInitiated");

    const loginStateCookie = this.deps.loginStates.seal(
      { state, nonce, returnTo: sanitizeNextPath(input.returnTo) },
      this.now(),
    );
    const authorizationUrl = this.deps.provider.buildAuthorizationUrl({ state, nonce });
    this.transition("AwaitingCallback");

    return { authorizationUrl, loginStateCookie, state, nonce };
  }

  async completeLogin(input: CallbackInput): Promise<CallbackResult> {
    if (input.error) {
      return this.fail("CallbackError", input.error, input.errorDescription);
    }

    if (!input.code) {
      return this.fail("CallbackError", "no_code");
    }

    const loginState = input.loginStateCookie
      ? this.deps.loginStates.open(input.loginStateCookie, this.now())
      : null;
    if (!loginState || !input.state || !this.deps.constantTimeEqual(input.state, loginState.state)) {
      return this.fail("CallbackError", "invalid_state");
    }

    this.transition("TokenExchangePending");
    let tokens: TokenSet;
    try {
      tokens = await this.deps.provider.exchangeCodeForTokens(input.code, { signal: input.signal });
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      return this.fail("ExchangeFailed", "exchange_failed", null, error);
    }

    let claims: VerifiedClaims;
    try {
      claims = await this.deps.provider.verifyIdToken(tokens.idToken, {
        expectedNonce: loginState.nonce,
        signal: input.signal,
      });
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      return this.fail("VerificationFailed", "verification_failed", null, error);
    }
    this.transition("ClaimsVerified", { external_subject_id: claims.externalSubjectId });

    let user: User;
    try {
      ({ user } = await this.deps.reconciliation.reconcile(claims));
    } catch (error) {
      return this.fail("CallbackError", "auth_failed", null, error);
    }
    this.transition("ReconciliationComplete", { user_id: user.id });

    let issued: { value: string; payload: SessionPayload };
    try {
      issued = await this.deps.sessions.issue(
        {
          uid: user.id,
          sub: claims.externalSubjectId,
          email: user.email.value,
          name: user.profile.displayName,
        },
        this.now(),
      );
    } catch (error) {
      return this.fail("CallbackError", "session_failed", null, error);
    }
    this.transition("SessionIssued", { user_id: user.id });

    return {
      kind: "session_issued",
      cookieValue: issued.value,
      payload: issued.payload,
      user,
      returnTo: loginState.returnTo,
    };
  }

  private fail(
    state: LoginFailureState,
    errorCode: string,
    errorDescription: string | null = null,
    error?: unknown,
  ): CallbackResult {
    this.logger.warn("login_state", {
      state,
      error_code: errorCode,
      error_description: errorDescription ?? undefined,
      error,
    });
    return { kind: "failed", state, errorCode, errorDescription };
  }

  private transition(state: LoginAttemptState, fields: Record<string, unknown> = {}): void {
    this.logger.info("login_state", { state, ...fields });
  }
}
