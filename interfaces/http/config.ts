import "dotenv/config";

import { parseLogLevel, type LogLevel } from "../../infra/observability/logger.js";
import { SESSION_SECRET_BYTES } from "../../infra/security/session_codec.js";
import type { SameSite, SessionCookieOptions } from "./cookies.js";

export type OidcConfig = {
  domain: string;
  clientId: string;
  clientSecret: string;
  audience: string;
  jwksCacheTtlSeconds: number;
};

export type HttpServerConfig = {
  port: number;
  apiUrl: string;
  frontendUrl: string;
  databaseUrl: string;
  oidc: OidcConfig;
  sessionSecret: string;
  sessionCookie: SessionCookieOptions;
  logLevel: LogLevel;
  maskEmails: boolean;
};

export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string,
  ) {
    super(`${key}: ${message}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/** Reads and validates everything up front; throws {@link ConfigError} on the first bad key. */
export function loadHttpServerConfig(env: Env = process.env): HttpServerConfig {
  const port = readPositiveInteger(env, "PORT", 8080);
  const apiUrl = readOrigin(env, "API_URL", `http://localhost:${port}`);
  const frontendUrl = readUrl(env, "FRONTEND_URL", "http://localhost:3000");
  const databaseUrl = readDatabaseUrl(env);

  const oidc: OidcConfig = {
    domain: readRequired(env, "OIDC_DOMAIN"),
    clientId: readRequired(env, "OIDC_CLIENT_ID"),
    clientSecret: readRequired(env, "OIDC_CLIENT_SECRET"),
    audience: readRequired(env, "OIDC_AUDIENCE"),
    jwksCacheTtlSeconds: readPositiveInteger(env, "OIDC_JWKS_CACHE_TTL_SECONDS", 300),
  };

  const sessionSecret = env.SESSION_SECRET ?? "";
  const secretBytes = Buffer.byteLength(sessionSecret, "utf8");
  if (secretBytes !== SESSION_SECRET_BYTES) {
    throw new ConfigError("SESSION_SECRET", `must be exactly ${SESSION_SECRET_BYTES} bytes, got ${secretBytes}`);
  }

  const secure = readBoolean(env, "SESSION_COOKIE_SECURE", env.NODE_ENV === "production");
  const sameSite = readSameSite(env);
  if (sameSite === "none" && !secure) {
    throw new ConfigError("SESSION_COOKIE_SAME_SITE", "none requires SESSION_COOKIE_SECURE=true");
  }

  const logLevel = parseLogLevel(env.LOG_LEVEL ?? "info");
  if (!logLevel) {
    throw new ConfigError("LOG_LEVEL", "must be one of debug, info, warn, error");
  }

  return {
    port,
    apiUrl,
    frontendUrl,
    databaseUrl,
    oidc,
    sessionSecret,
    sessionCookie: {
      name: readOptional(env, "SESSION_COOKIE_NAME") ?? "zen_session",
      domain: readOptional(env, "SESSION_COOKIE_DOMAIN"),
      path: readOptional(env, "SESSION_COOKIE_PATH") ?? "/",
      secure,
      httpOnly: readBoolean(env, "SESSION_COOKIE_HTTP_ONLY", true),
      sameSite,
      maxAgeSeconds: readPositiveInteger(env, "SESSION_MAX_AGE", 86_400),
    },
    logLevel,
    maskEmails: readBoolean(env, "LOG_MASK_EMAILS", true),
  };
}

/** `DATABASE_URL` as a `postgres://` or `postgresql://` connection string. */
export function readDatabaseUrl(env: Env = process.env): string {
  const raw = readRequired(env, "DATABASE_URL");
  let protocol: string;
  try {
    protocol = new URL(raw).protocol;
  } catch {
    throw new ConfigError("DATABASE_URL", "must be a postgres:// connection URL");
  }
  if (protocol !== "postgres:" && protocol !== "postgresql:") {
    throw new ConfigError("DATABASE_URL", "must be a postgres:// connection URL");
  }
  return raw;
}

export function normalizeOrigin(origin: string): string {
  const url = new URL(origin);
  return url.origin;
}

function readOptional(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readRequired(env: Env, key: string): string {
  const value = readOptional(env, key);
  if (!value) {
    throw new ConfigError(key, "is required");
  }
  return value;
}

function readPositiveInteger(env: Env, key: string, fallback: number): number {
  const raw = readOptional(env, key);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(key, "must be a positive integer");
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readOptional(env, key)?.toLowerCase() ?? null;
  if (raw === null) {
    return fallback;
  }
  if (raw === "true" || raw === "1") {
    return true;
  }
  if (raw === "false" || raw === "0") {
    return false;
  }
  throw new ConfigError(key, "must be true, false, 1 or 0");
}

function readSameSite(env: Env): SameSite {
  const raw = readOptional(env, "SESSION_COOKIE_SAME_SITE")?.toLowerCase() ?? "lax";
  if (raw === "strict" || raw === "lax" || raw === "none") {
    return raw;
  }
  throw new ConfigError("SESSION_COOKIE_SAME_SITE", "must be strict, lax or none");
}

function readUrl(env: Env, key: string, fallback: string): string {
  const raw = readOptional(env, key) ?? fallback;
  try {
    return new URL(raw).toString().replace(/\/+$/u, "");
  } catch {
    throw new ConfigError(key, "must be an absolute URL");
  }
}

function readOrigin(env: Env, key: string, fallback: string): string {
  try {
    return normalizeOrigin(readOptional(env, key) ?? fallback);
  } catch {
    throw new ConfigError(key, "must be an absolute URL");
  }
}
