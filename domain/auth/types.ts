/** Claims taken from a verified ID token. */
export type VerifiedClaims = {
  externalSubjectId: string;
  email: string;
  emailVerified: boolean;
  displayName: string;
  pictureUrl: string;
};

/**
 * Contents of the encrypted session cookie. `exp` is seconds since the epoch
 * and is set when the cookie is issued.
 */
export type SessionPayload = {
  uid: string;
  sub: string;
  email: string;
  name: string;
  exp: number;
};

/** Identity attached to an authenticated request. */
export type AuthIdentity = {
  localUserId: string;
  externalSubjectId: string;
  email: string;
  displayName: string;
};

export type LoginAttemptState =
  | "LoginInitiated"
  | "AwaitingCallback"
  | "TokenExchangePending"
  | "ClaimsVerified"
  | "ReconciliationComplete"
  | "SessionIssued"
  | "CallbackError"
  | "ExchangeFailed"
  | "VerificationFailed";

export type LoginFailureState = Extract<
  LoginAttemptState,
  "CallbackError" | "ExchangeFailed" | "VerificationFailed"
>;

export function identityFromSession(payload: SessionPayload): AuthIdentity {
  return {
    localUserId: payload.uid,
    externalSubjectId: payload.sub,
    email: payload.email,
    displayName: payload.name,
  };
}
