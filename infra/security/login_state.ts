import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";

import type { LoginState, LoginStateCodec } from "../../app/auth/contracts.js";

export const LOGIN_STATE_COOKIE_NAME = "zen_login_state";
export const LOGIN_STATE_TTL_SECONDS = 10 * 60;

type SealedLoginState = LoginState & { exp: number };

export function generateOpaqueValue(bytes = 32): string {
  return randomBytes(bytes).toString("base64url");
}

/** Constant-time comparison of two opaque strings. */
export function opaqueValuesEqual(left: string, right: string): boolean {
  const a = Buffer.from(left, "utf8");
  const b = Buffer.from(right, "utf8");
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

/**
 * `<base64url(json)>.<base64url(hmac-sha256)>`. The body is signed, not
 * encrypted: it carries nothing beyond the state, nonce and return path.
 */
export class HmacLoginStateCodec implements LoginStateCodec {
  readonly ttlSeconds: number;

  constructor(
    private readonly secret: string,
    options: { ttlSeconds?: number } = {},
  ) {
    if (!secret) {
      throw new Error("Login state secret must be non-empty");
    }
    this.ttlSeconds = options.ttlSeconds ?? LOGIN_STATE_TTL_SECONDS;
  }

  seal(input: LoginState, now = new Date()): string {
    const body: SealedLoginState = {
      state: input.state,
      nonce: input.nonce,
      returnTo: input.returnTo,
      exp: Math.floor(now.getTime() / 1000) + this.ttlSeconds,
    };
    const encoded = Buffer.from(JSON.stringify(body), "utf8").toString("base64url");
    return `${encoded}.${this.sign(encoded)}`;
  }

  open(value: string, now = new Date()): LoginState | null {
    const separatorIndex = value.lastIndexOf(".");
    if (separatorIndex <= 0) {
      return null;
    }

    const encoded = value.slice(0, separatorIndex);
    const signature = value.slice(separatorIndex + 1);
    if (!opaqueValuesEqual(signature, this.sign(encoded))) {
      return null;
    }

    const body = parseSealedBody(encoded);
    if (!body || body.exp <= Math.floor(now.getTime() / 1000)) {
      return null;
    }

    return { state: body.state, nonce: body.nonce, returnTo: body.returnTo };
  }

  private sign(encoded: string): string {
    return createHmac("sha256", this.secret).update(encoded, "utf8").digest("base64url");
  }
}

function parseSealedBody(encoded: string): SealedLoginState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, "base64url").toString("utf8"));
  } catch {
    return null;
  }

  if (!isRecord(parsed)) {
    return null;
  }

  const { state, nonce, returnTo, exp } = parsed;
  if (
    typeof state !== "string" ||
    typeof nonce !== "string" ||
    !(typeof returnTo === "string" || returnTo === null) ||
    typeof exp !== "number"
  ) {
    return null;
  }

  return { state, nonce, returnTo, exp };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
