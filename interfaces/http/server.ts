import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

import { AuthCallbackService } from "../../app/auth/callback.js";
import type { OidcProvider } from "../../app/auth/contracts.js";
import { IdentityReconciliationService } from "../../app/auth/reconciliation.js";
import { buildFrontendRedirect } from "../../app/auth/redirects.js";
import { isClientFacingError, ValidationError } from "../../app/errors.js";
import { DomainEventPublisher, logDomainEvents } from "../../app/events/publisher.js";
import { ExperienceService, type ExperienceInput, type ExperiencePatch } from "../../app/experiences/service.js";
import { UserService } from "../../app/users/service.js";
import { hasEmotionalChange, isEmotionallyImproved } from "../../domain/experience/emotional_state.js";
import type { Experience } from "../../domain/experience/experience.js";
import { sessionDurationMinutes } from "../../domain/experience/meditation_session.js";
import type { User } from "../../domain/user/user.js";
import { createPgPool } from "../../infra/db/client.js";
import { PostgresExperienceRepository } from "../../infra/experiences/postgres_experience_repository.js";
import { createJsonLogger, type Logger } from "../../infra/observability/logger.js";
import { HttpOidcClient } from "../../infra/oidc/oidc_client.js";
import {
  generateOpaqueValue,
  HmacLoginStateCodec,
  LOGIN_STATE_COOKIE_NAME,
  opaqueValuesEqual,
} from "../../infra/security/login_state.js";
import { JweSessionCodec } from "../../infra/security/session_codec.js";
import { PostgresUserRepository } from "../../infra/users/postgres_user_repository.js";
import { AuthGuard } from "./auth_guard.js";
import type { HttpServerConfig } from "./config.js";
import { loadHttpServerConfig } from "./config.js";
import {
  buildClearLoginStateCookie,
  buildClearSessionCookie,
  buildLoginStateCookie,
  buildSessionCookie,
  parseCookies,
  type SessionCookieOptions,
} from "./cookies.js";
import { isAllowedOriginForStateChange } from "./csrf.js";
import { requireRequestIdentity } from "./request_context.js";

const MAX_BODY_BYTES = 16 * 1024;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/iu;

export type ZenHttpServerDeps = {
  callback: AuthCallbackService;
  guard: AuthGuard;
  provider: OidcProvider;
  users: UserService;
  experiences: ExperienceService;
  sessionCookie: SessionCookieOptions;
  loginStateTtlSeconds: number;
  apiUrl: string;
  frontendUrl: string;
  logger: Logger;
};

type RequestScope = {
  req: IncomingMessage;
  res: ServerResponse;
  url: URL;
  signal: AbortSignal;
};

export function createZenHttpServer(deps: ZenHttpServerDeps): Server {
  return createServer(async (req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      await handleRequest(req, res, deps, controller.signal);
    } catch (error) {
      deps.logger.error("unhandled_error", {
        method: req.method,
        path: safePathname(req.url),
        error,
      });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "internal_error" });
      } else {
        res.end();
      }
    }
  });
}

export function createDefaultZenHttpServer(
  config: HttpServerConfig = loadHttpServerConfig(),
  logger: Logger = createJsonLogger({ level: config.logLevel, maskEmails: config.maskEmails }),
): Server {
  const pool = createPgPool({ databaseUrl: config.databaseUrl, applicationName: "zen-connect-http" });
  const userRepository = new PostgresUserRepository(pool);
  const experienceRepository = new PostgresExperienceRepository(pool);

  const publisher = new DomainEventPublisher({ logger });
  logDomainEvents(publisher, logger);

  const sessions = new JweSessionCodec(config.sessionSecret, {
    ttlSeconds: config.sessionCookie.maxAgeSeconds,
  });
  const loginStates = new HmacLoginStateCodec(config.sessionSecret);
  const provider = new HttpOidcClient({
    domain: config.oidc.domain,
    clientId: config.oidc.clientId,
    clientSecret: config.oidc.clientSecret,
    audience: config.oidc.audience,
    redirectUri: `${config.apiUrl}/auth/callback`,
    jwksCacheTtlSeconds: config.oidc.jwksCacheTtlSeconds,
  });

  const server = createZenHttpServer({
    callback: new AuthCallbackService({
      provider,
      reconciliation: new IdentityReconciliationService({ repository: userRepository, publisher, logger }),
      sessions,
      loginStates,
      generateOpaqueValue: () => generateOpaqueValue(),
      constantTimeEqual: opaqueValuesEqual,
      logger,
    }),
    guard: new AuthGuard({
      sessions,
      provider,
      users: userRepository,
      sessionCookieName: config.sessionCookie.name,
      logger,
    }),
    provider,
    users: new UserService({ repository: userRepository, publisher }),
    experiences: new ExperienceService({ repository: experienceRepository, publisher }),
    sessionCookie: config.sessionCookie,
    loginStateTtlSeconds: loginStates.ttlSeconds,
    apiUrl: config.apiUrl,
    frontendUrl: config.frontendUrl,
    logger,
  });

  server.on("close", () => {
    pool.end().catch((error: unknown) => {
      logger.error("pg_pool_close_failed", { error });
    });
  });

  return server;
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  deps: ZenHttpServerDeps,
  signal: AbortSignal,
): Promise<void> {
  const method = req.method ?? "GET";
  const url = new URL(req.url ?? "/", "http://local.invalid");
  const pathname = url.pathname;
  const scope: RequestScope = { req, res, url, signal };

  if (isStateChangingApiRequest(method, pathname)) {
    const allowed = isAllowedOriginForStateChange({
      originHeader: req.headers.origin,
      refererHeader: req.headers.referer,
      allowedOrigins: [deps.apiUrl, deps.frontendUrl],
    });
    if (!allowed) {
      deps.logger.warn("csrf_rejected", { method, path: pathname, origin: req.headers.origin });
      sendJson(res, 403, { error: "csrf_failed" });
      return;
    }
  }

  try {
    await routeRequest(method, pathname, scope, deps);
  } catch (error) {
    if (isClientFacingError(error)) {
      sendJson(res, error.httpStatus, { error: error.code });
      return;
    }
    throw error;
  }
}

async function routeRequest(
  method: string,
  pathname: string,
  scope: RequestScope,
  deps: ZenHttpServerDeps,
): Promise<void> {
  const { req, res, url } = scope;

  if (method === "GET" && pathname === "/health") {
    sendJson(res, 200, { status: "ok" });
    return;
  }

  if (method === "GET" && pathname === "/auth/login") {
    const login = deps.callback.beginLogin({ returnTo: url.searchParams.get("returnTo") });
    res.setHeader("Set-Cookie", loginStateCookie(deps, login.loginStateCookie));
    redirect(res, 307, login.authorizationUrl);
    return;
  }

  if (method === "GET" && pathname === "/api/auth/login-url") {
    const login = deps.callback.beginLogin({ returnTo: url.searchParams.get("returnTo") });
    res.setHeader("Set-Cookie", loginStateCookie(deps, login.loginStateCookie));
    sendJson(res, 200, { login_url: login.authorizationUrl });
    return;
  }

  if (method === "GET" && pathname === "/auth/callback") {
    await handleCallback(scope, deps);
    return;
  }

  if (method === "GET" && pathname === "/auth/logout") {
    res.setHeader("Set-Cookie", buildClearSessionCookie(deps.sessionCookie));
    redirect(res, 307, deps.provider.buildLogoutUrl(deps.frontendUrl));
    return;
  }

  if (method === "GET" && pathname === "/auth/me") {
    await withIdentity(scope, deps, async () => {
      const identity = requireRequestIdentity(req);
      sendJson(res, 200, {
        user_id: identity.localUserId,
        external_subject_id: identity.externalSubjectId,
        email: identity.email,
        display_name: identity.displayName,
      });
    });
    return;
  }

  if (method === "POST" && pathname === "/api/users/register") {
    const body = await readJsonObject(req);
    const user = await deps.users.register({
      email: getStringProperty(body, "email") ?? "",
      password: getStringProperty(body, "password") ?? "",
      displayName: getStringProperty(body, "display_name"),
    });
    sendJson(res, 201, serializeUser(user));
    return;
  }

  if (pathname === "/users/me" && (method === "GET" || method === "PATCH")) {
    await withIdentity(scope, deps, async () => {
      const identity = requireRequestIdentity(req);
      if (method === "GET") {
        sendJson(res, 200, serializeUser(await deps.users.getProfile(identity.localUserId)));
        return;
      }

      const body = await readJsonObject(req);
      const user = await deps.users.updateProfile(identity.localUserId, {
        displayName: getStringProperty(body, "display_name"),
        bio: getStringProperty(body, "bio"),
        profileImageUrl: getStringProperty(body, "profile_image_url"),
      });
      sendJson(res, 200, serializeUser(user));
    });
    return;
  }

  if (pathname === "/api/experiences" && (method === "GET" || method === "POST")) {
    await withIdentity(scope, deps, async () => {
      const identity = requireRequestIdentity(req);
      if (method === "GET") {
        const items = await deps.experiences.listForUser(identity.localUserId);
        sendJson(res, 200, { items: items.map(serializeExperience) });
        return;
      }

      const input = parseExperienceInput(await readJsonObject(req));
      const experience = await deps.experiences.create(identity.localUserId, input);
      sendJson(res, 201, serializeExperience(experience));
    });
    return;
  }

  if (pathname.startsWith("/api/experiences/") && (method === "GET" || method === "PATCH")) {
    await withIdentity(scope, deps, async () => {
      const identity = requireRequestIdentity(req);
      const experienceId = parseSinglePathToken(pathname, "/api/experiences/");
      if (!experienceId || !UUID_PATTERN.test(experienceId)) {
        sendJson(res, 404, { error: "not_found" });
        return;
      }

      if (method === "GET") {
        sendJson(res, 200, serializeExperience(await deps.experiences.get(identity.localUserId, experienceId)));
        return;
      }

      const patch = parseExperiencePatch(await readJsonObject(req));
      const experience = await deps.experiences.update(identity.localUserId, experienceId, patch);
      sendJson(res, 200, serializeExperience(experience));
    });
    return;
  }

  sendJson(res, 404, { error: "not_found" });
}

async function handleCallback(scope: RequestScope, deps: ZenHttpServerDeps): Promise<void> {
  const { req, res, url, signal } = scope;
  const clearLoginState = buildClearLoginStateCookie(LOGIN_STATE_COOKIE_NAME, deps.sessionCookie.secure);

  const result = await deps.callback.completeLogin({
    code: url.searchParams.get("code"),
    state: url.searchParams.get("state"),
    error: url.searchParams.get("error"),
    errorDescription: url.searchParams.get("error_description"),
    loginStateCookie: parseCookies(req.headers.cookie).get(LOGIN_STATE_COOKIE_NAME) ?? null,
    signal,
  });

  if (result.kind === "failed") {
    res.setHeader("Set-Cookie", clearLoginState);
    redirect(
      res,
      307,
      buildFrontendRedirect(deps.frontendUrl, "/", {
        error: result.errorCode,
        error_description: result.errorDescription,
      }),
    );
    return;
  }

  res.setHeader("Set-Cookie", [clearLoginState, buildSessionCookie(result.cookieValue, deps.sessionCookie)]);
  redirect(res, 307, buildFrontendRedirect(deps.frontendUrl, result.returnTo));
}

/** Runs `handler` only for an authenticated caller; everyone else gets 401. */
async function withIdentity(
  scope: RequestScope,
  deps: ZenHttpServerDeps,
  handler: () => Promise<void>,
): Promise<void> {
  const identity = await deps.guard.authenticate(scope.req, scope.signal);
  if (!identity) {
    sendJson(scope.res, 401, { error: "unauthenticated" });
    return;
  }
  await handler();
}

function loginStateCookie(deps: ZenHttpServerDeps, value: string): string {
  return buildLoginStateCookie(LOGIN_STATE_COOKIE_NAME, value, deps.loginStateTtlSeconds, deps.sessionCookie.secure);
}

function isStateChangingApiRequest(method: string, pathname: string): boolean {
  if (method === "GET" || method === "HEAD" || method === "OPTIONS") {
    return false;
  }
  return pathname.startsWith("/api/") || pathname.startsWith("/users/");
}

function parseExperienceInput(body: Record<string, unknown>): ExperienceInput {
  const startedAt = getDateProperty(body, "started_at");
  const endedAt = getDateProperty(body, "ended_at");
  if (!startedAt) {
    throw new ValidationError("missing_started_at");
  }
  if (!endedAt) {
    throw new ValidationError("missing_ended_at");
  }

  return {
    startedAt,
    endedAt,
    meditationType: getStringProperty(body, "meditation_type") ?? "",
    note: getStringProperty(body, "note") ?? "",
    emotionBefore: getStringProperty(body, "emotion_before") ?? "",
    emotionAfter: getStringProperty(body, "emotion_after") ?? "",
    isPublic: getBooleanProperty(body, "is_public") ?? false,
  };
}

function parseExperiencePatch(body: Record<string, unknown>): ExperiencePatch {
  return {
    startedAt: getDateProperty(body, "started_at") ?? undefined,
    endedAt: getDateProperty(body, "ended_at") ?? undefined,
    meditationType: getStringProperty(body, "meditation_type") ?? undefined,
    note: getStringProperty(body, "note") ?? undefined,
    emotionBefore: getStringProperty(body, "emotion_before") ?? undefined,
    emotionAfter: getStringProperty(body, "emotion_after") ?? undefined,
    isPublic: getBooleanProperty(body, "is_public") ?? undefined,
  };
}

function serializeUser(user: User): Record<string, string | boolean | null> {
  const profile = user.profile;
  return {
    id: user.id,
    email: user.email.value,
    display_name: profile.displayName,
    bio: profile.bio,
    profile_image_url: profile.profileImageUrl,
    email_verified: user.emailVerified,
    linked: user.isLinked(),
    created_at: user.createdAt.toISOString(),
    verified_at: user.verifiedAt ? user.verifiedAt.toISOString() : null,
  };
}

function serializeExperience(experience: Experience): Record<string, string | number | boolean> {
  const { session, emotionalState } = experience.content;
  return {
    id: experience.id,
    user_id: experience.userId,
    started_at: session.startedAt.toISOString(),
    ended_at: session.endedAt.toISOString(),
    duration_minutes: sessionDurationMinutes(session),
    meditation_type: session.meditationType,
    note: session.note,
    emotion_before: emotionalState.before,
    emotion_after: emotionalState.after,
    emotional_change: hasEmotionalChange(emotionalState),
    improved: isEmotionallyImproved(emotionalState),
    is_public: experience.isPublic,
    created_at: experience.createdAt.toISOString(),
    updated_at: experience.updatedAt.toISOString(),
  };
}

async function readJsonObject(req: IncomingMessage): Promise<Record<string, unknown>> {
  const contentType = req.headers["content-type"] ?? "";
  if (!contentType.toLowerCase().startsWith("application/json")) {
    throw new ValidationError("unsupported_content_type");
  }

  const raw = await readRequestBody(req);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError("invalid_json");
  }

  if (!isRecord(parsed)) {
    throw new ValidationError("invalid_json");
  }
  return parsed;
}

async function readRequestBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const bufferChunk = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += bufferChunk.length;
    if (size > MAX_BODY_BYTES) {
      throw new ValidationError("body_too_large");
    }
    chunks.push(bufferChunk);
  }

  return Buffer.concat(chunks).toString("utf8");
}

function redirect(res: ServerResponse, statusCode: 307, location: string): void {
  res.statusCode = statusCode;
  res.setHeader("Location", location);
  res.setHeader("Cache-Control", "no-store");
  res.end();
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(body));
}

function getStringProperty(body: Record<string, unknown>, key: string): string | null {
  const value = body[key];
  return typeof value === "string" ? value : null;
}

function getBooleanProperty(body: Record<string, unknown>, key: string): boolean | null {
  const value = body[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "boolean") {
    throw new ValidationError(`invalid_${key}`);
  }
  return value;
}

function getDateProperty(body: Record<string, unknown>, key: string): Date | null {
  const value = body[key];
  if (value === undefined || value === null) {
    return null;
  }
  const date = typeof value === "string" ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(`invalid_${key}`);
  }
  return date;
}

function parseSinglePathToken(pathname: string, prefix: string): string | null {
  if (!pathname.startsWith(prefix)) {
    return null;
  }

  const rawToken = pathname.slice(prefix.length);
  if (!rawToken || rawToken.includes("/")) {
    return null;
  }

  try {
    const decoded = decodeURIComponent(rawToken).trim();
    return decoded || null;
  } catch {
    return null;
  }
}

function safePathname(rawUrl: string | undefined): string {
  try {
    return new URL(rawUrl ?? "/", "http://local.invalid").pathname;
  } catch {
    return "/";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
