import { EncryptJWT, errors, jwtDecrypt, type JWTPayload } from "jose";

import type {
  SessionCodec,
  SessionValidation,
} from "../../app/auth/contracts.js";
import type { SessionPayload } from "../../domain/auth/types.js";

export const SESSION_SECRET_BYTES = 32;
export const DEFAULT_SESSION_TTL_SECONDS = 86_400;

export class SessionSecretError extends Error {
  constructor(actualBytes: number) {
    super(`Session secret must be exactly ${SESSION_SECRET_BYTES} bytes, got ${actualBytes}`);
    this.name = "SessionSecretError";
  }
}

/**
 * Session cookie as a compact JWE (`dir` + `A256GCM`). Expiry lives in the
 * encrypted `exp` claim; the cookie's own Max-Age is never trusted.
 */
export class JweSessionCodec implements SessionCodec {
  readonly ttlSeconds: number;
  private readonly key: Uint8Array;

  constructor(secret: string, options: { ttlSeconds?: number } = {}) {
    const key = new TextEncoder().encode(secret);
    if (key.byteLength !== SESSION_SECRET_BYTES) {
      throw new SessionSecretError(key.byteLength);
    }
    this.key = key;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
  }

  async issue(
    input: Omit<SessionPayload, "exp">,
    now = new Date(),
  ): Promise<{ value: string; payload: SessionPayload }> {
    const issuedAt = Math.floor(now.getTime() / 1000);
    const payload: SessionPayload = { ...input, exp: issuedAt + this.ttlSeconds };

    const value = await new EncryptJWT({ uid: payload.uid, email: payload.email, name: payload.name })
      .setProtectedHeader({ alg: "dir", enc: "A256GCM" })
      .setSubject(payload.sub)
      .setIssuedAt(issuedAt)
      .setExpirationTime(payload.exp)
      .encrypt(this.key);

    return { value, payload };
  }

  async validate(value: string, now = new Date()): Promise<SessionValidation> {
    let claims: JWTPayload;
    try {
      const result = await jwtDecrypt(value, this.key, {
        currentDate: now,
        requiredClaims: ["sub", "exp"],
      });
      claims = result.payload;
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        return { ok: false, reason: "expired" };
      }
      return { ok: false, reason: "decode_error" };
    }

    const payload = toSessionPayload(claims);
    if (!payload) {
      return { ok: false, reason: "decode_error" };
    }
    return { ok: true, payload };
  }
}

function toSessionPayload(claims: JWTPayload): SessionPayload | null {
  const { uid, sub, email, name, exp } = claims;
  if (
    typeof uid !== "string" ||
    typeof sub !== "string" ||
    typeof email !== "string" ||
    typeof name !== "string" ||
    typeof exp !== "number"
  ) {
    return null;
  }
  return { uid, sub, email, name, exp };
}
