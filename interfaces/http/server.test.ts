import { afterEach, test } from "node:test";
import assert from "node:assert/strict";
import type { Server } from "node:http";

import { AuthCallbackService } from "../../app/auth/callback.js";
import type { OidcProvider, RequestOptions, TokenSet } from "../../app/auth/contracts.js";
import { IdentityReconciliationService } from "../../app/auth/reconciliation.js";
import { ProviderError } from "../../app/errors.js";
import { ExperienceService } from "../../app/experiences/service.js";
import { UserService } from "../../app/users/service.js";
import type { VerifiedClaims } from "../../domain/auth/types.js";
import { Email } from "../../domain/user/email.js";
import { User } from "../../domain/user/user.js";
import { InMemoryExperienceRepository } from "../../infra/experiences/memory_experience_repository.js";
import type { LogFields, Logger, LogLevel } from "../../infra/observability/logger.js";
import { HmacLoginStateCodec, opaqueValuesEqual } from "../../infra/security/login_state.js";
import { JweSessionCodec } from "../../infra/security/session_codec.js";
import { InMemoryUserRepository } from "../../infra/users/memory_user_repository.js";
import { AuthGuard } from "./auth_guard.js";
import type { SessionCookieOptions } from "./cookies.js";
import { createZenHttpServer } from "./server.js";

const FRONTEND_URL = "http://localhost:3000";
const API_URL = "http://api.test";
const SESSION_SECRET = "test-secret-test-secret-test-sec";
const SESSION_COOKIE: SessionCookieOptions = {
  name: "zen_session",
  domain: null,
  path: "/",
  secure: false,
  httpOnly: true,
  sameSite: "lax",
  maxAgeSeconds: 86_400,
};

class FakeOidcProvider implements OidcProvider {
  readonly exchangeCalls: string[] = [];
  exchangeError: ProviderError | null = null;
  claims: VerifiedClaims = {
    externalSubjectId: "idp|abc123",
    email: "a@example.com",
    emailVerified: true,
    displayName: "Alice",
    pictureUrl: "",
  };
  accessTokens = new Map<string, string>();

  buildAuthorizationUrl(input: { state: string; nonce: string }): string {
    const url = new URL("https://idp.test.invalid/authorize");
    url.searchParams.set("state", input.state);
    url.searchParams.set("nonce", input.nonce);
    return url.toString();
  }

  buildLogoutUrl(returnTo: string): string {
    return `https://idp.test.invalid/v2/logout?returnTo=${encodeURIComponent(returnTo)}`;
  }

  async exchangeCodeForTokens(code: string): Promise<TokenSet> {
    this.exchangeCalls.push(code);
    if (this.exchangeError) {
      throw this.exchangeError;
    }
    return { idToken: `id-token-for-${code}`, accessToken: null, expiresInSeconds: null };
  }

  async verifyIdToken(
    _rawIdToken: string,
    input: { expectedNonce: string | null } & RequestOptions,
  ): Promise<VerifiedClaims> {
    assert.ok(input.expectedNonce, "callback must pass the nonce from the login state");
    return { ...this.claims };
  }

  async verifyAccessToken(rawAccessToken: string): Promise<{ subject: string }> {
    const subject = this.accessTokens.get(rawAccessToken);
    if (!subject) {
      throw new ProviderError("verification_failed", "unknown access token");
    }
    return { subject };
  }
}

class FailingUserRepository extends InMemoryUserRepository {
  override async findByEmail(): Promise<User | null> {
    throw new Error("connection terminated unexpectedly");
  }
}

const openServers = new Set<Server>();

afterEach(async () => {
  await Promise.all(
    [...openServers].map(
      (server) =>
        new Promise<void>((resolve, reject) => {
          server.close((error) => {
            openServers.delete(server);
            if (error) {
              reject(error);
              return;
            }
            resolve();
          });
        }),
    ),
  );
});

function createHarness(options: { userRepository?: InMemoryUserRepository } = {}) {
  const userRepository = options.userRepository ?? new InMemoryUserRepository();
  const experienceRepository = new InMemoryExperienceRepository();
  const provider = new FakeOidcProvider();
  const sessions = new JweSessionCodec(SESSION_SECRET, { ttlSeconds: SESSION_COOKIE.maxAgeSeconds });
  const loginStates = new HmacLoginStateCodec(SESSION_SECRET);
  const logs: Array<{ level: LogLevel; event: string; fields: LogFields }> = [];
  const capture = (level: LogLevel) => (event: string, fields: LogFields = {}) => {
    logs.push({ level, event, fields });
  };
  const logger: Logger = {
    debug: capture("debug"),
    info: capture("info"),
    warn: capture("warn"),
    error: capture("error"),
  };
  let valueCounter = 0;

  const server = createZenHttpServer({
    callback: new AuthCallbackService({
      provider,
      reconciliation: new IdentityReconciliationService({ repository: userRepository, logger }),
      sessions,
      loginStates,
      generateOpaqueValue: () => `value-${++valueCounter}`,
      constantTimeEqual: opaqueValuesEqual,
      logger,
    }),
    guard: new AuthGuard({
      sessions,
      provider,
      users: userRepository,
      sessionCookieName: SESSION_COOKIE.name,
      logger,
    }),
    provider,
    users: new UserService({ repository: userRepository, hashPassword: async () => "salt:hash" }),
    experiences: new ExperienceService({ repository: experienceRepository }),
    sessionCookie: SESSION_COOKIE,
    loginStateTtlSeconds: loginStates.ttlSeconds,
    apiUrl: API_URL,
    frontendUrl: FRONTEND_URL,
    logger,
  });
  openServers.add(server);

  return {
    userRepository,
    experienceRepository,
    provider,
    sessions,
    logs,
    async start() {
      await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
      const address = server.address();
      assert.ok(address && typeof address === "object");
      return { baseUrl: `http://127.0.0.1:${address.port}` };
    },
    async seedLinkedUser(input: { id: string; sub: string; email: string; name: string }) {
      const user = User.createLinked(
        {
          externalSubjectId: input.sub,
          email: Email.parse(input.email),
          displayName: input.name,
          profileImageUrl: "",
          emailVerified: true,
        },
        { id: input.id },
      );
      await userRepository.save(user);
      return user;
    },
    async sessionCookieFor(user: User, issuedAt = new Date()) {
      const issued = await sessions.issue(
        {
          uid: user.id,
          sub: user.externalSubjectId ?? "",
          email: user.email.value,
          name: user.profile.displayName,
        },
        issuedAt,
      );
      return `${SESSION_COOKIE.name}=${encodeURIComponent(issued.value)}`;
    },
  };
}

function cookiePair(setCookie: string | undefined): string {
  return (setCookie ?? "").split(";")[0] ?? "";
}

async function readBody(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  assert.ok(typeof body === "object" && body !== null && !Array.isArray(body));
  return { ...body };
}

function jsonHeaders(extra: Record<string, string> = {}): Record<string, string> {
  return { "Content-Type": "application/json", Origin: FRONTEND_URL, ...extra };
}

const ALICE_ID = "11111111-1111-4111-8111-111111111111";
const BOB_ID = "22222222-2222-4222-8222-222222222222";

test("health endpoint answers ok", async () => {
  const { baseUrl } = await createHarness().start();

  const response = await fetch(`${baseUrl}/health`);

  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { status: "ok" });
});

test("/auth/login redirects to the provider with fresh state and sets the login-state cookie", async () => {
  const { baseUrl } = await createHarness().start();

  const response = await fetch(`${baseUrl}/auth/login`, { redirect: "manual" });

  assert.equal(response.status, 307);
  assert.equal(response.headers.get("location"), "https://idp.test.invalid/authorize?state=value-1&nonce=value-2");
  const [loginState] = response.headers.getSetCookie();
  assert.ok(loginState);
  assert.match(loginState, /^zen_login_state=[A-Za-z0-9_.-]+; Path=\/auth; HttpOnly; SameSite=Lax; Max-Age=600$/);
});

test("/api/auth/login-url returns the authorization url as json", async () => {
  const { baseUrl } = await createHarness().start();

  const response = await fetch(`${baseUrl}/api/auth/login-url`);

  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), {
    login_url: "https://idp.test.invalid/authorize?state=value-1&nonce=value-2",
  });
  assert.equal(response.headers.getSetCookie().length, 1);
});

test("callback completes login, sets the session cookie and /auth/me returns the identity", async () => {
  const harness = createHarness();
  const { baseUrl } = await harness.start();

  const login = await fetch(`${baseUrl}/auth/login?returnTo=%2Fjournal`, { redirect: "manual" });
  const loginStateCookie = cookiePair(login.headers.getSetCookie()[0]);

  const callback = await fetch(`${baseUrl}/auth/callback?code=code-1&state=value-1`, {
    redirect: "manual",
    headers: { Cookie: loginStateCookie },
  });

  assert.equal(callback.status, 307);
  assert.equal(callback.headers.get("location"), "http://localhost:3000/journal");
  const [clearedState, session] = callback.headers.getSetCookie();
  assert.equal(
    clearedState,
    "zen_login_state=; Path=/auth; HttpOnly; SameSite=Lax; Max-Age=0; Expires=Thu, 01 Jan 1970 00:00:00 GMT",
  );
  assert.ok(session);
  assert.match(session, /^zen_session=[^;]+; Path=\/; HttpOnly; SameSite=Lax; Max-Age=86400$/);
  assert.deepEqual(harness.provider.exchangeCalls, ["code-1"]);
  assert.equal(harness.userRepository.count(), 1);

  const user = await harness.userRepository.findByExternalSubjectId("idp|abc123");
  assert.ok(user);

  const me = await fetch(`${baseUrl}/auth/me`, { headers: { Cookie: cookiePair(session) } });
  assert.equal(me.status, 200);
  assert.deepEqual(await me.json(), {
    user_id: user.id,
    external_subject_id: "idp|abc123",
    email: "a@example.com",
    display_name: "Alice",
  });
});

test("callback without code redirects with error=no_code and touches nothing", async () => {
  const harness = createHarness();
  const { baseUrl } = await harness.start();
  const login = await fetch(`${baseUrl}/auth/login`, { redirect: "manual" });

  const response = await fetch(`${baseUrl}/auth/callback?state=value-1`, {
    redirect: "manual",
    headers: { Cookie: cookiePair(login.headers.getSetCookie()[0]) },
  });

  assert.equal(response.status, 307);
  assert.equal(response.headers.get("location"), "http://localhost:3000/?error=no_code");
  assert.deepEqual(response.headers.getSetCookie(), [
    "zen_login_state=; Path=/auth; HttpOnly; SameSite=Lax; Max-Age=0; Expires=Thu, 01 Jan 1970 00:00:00 GMT",
  ]);
  assert.equal(harness.provider.exchangeCalls.length, 0);
  assert.equal(harness.userRepository.count(), 0);
});

test("callback with a state that does not match the cookie is rejected", async () => {
  const harness = createHarness();
  const { baseUrl } = await harness.start();
  const login = await fetch(`${baseUrl}/auth/login`, { redirect: "manual" });

  const response = await fetch(`${baseUrl}/auth/callback?code=code-1&state=forged`, {
    redirect: "manual",
    headers: { Cookie: cookiePair(login.headers.getSetCookie()[0]) },
  });

  assert.equal(response.headers.get("location"), "http://localhost:3000/?error=invalid_state");
  assert.equal(harness.provider.exchangeCalls.length, 0);
});

test("provider error is passed through to the frontend", async () => {
  const { baseUrl } = await createHarness().start();

  const response = await fetch(
    `${baseUrl}/auth/callback?error=access_denied&error_description=User%20cancelled`,
    { redirect: "manual" },
  );

  assert.equal(
    response.headers.get("location"),
    "http://localhost:3000/?error=access_denied&error_description=User+cancelled",
  );
});

test("failed code exchange redirects with error=exchange_failed", async () => {
  const harness = createHarness();
  harness.provider.exchangeError = new ProviderError("exchange_failed", "invalid_grant");
  const { baseUrl } = await harness.start();
  const login = await fetch(`${baseUrl}/auth/login`, { redirect: "manual" });

  const response = await fetch(`${baseUrl}/auth/callback?code=code-1&state=value-1`, {
    redirect: "manual",
    headers: { Cookie: cookiePair(login.headers.getSetCookie()[0]) },
  });

  assert.equal(response.headers.get("location"), "http://localhost:3000/?error=exchange_failed");
  assert.equal(harness.userRepository.count(), 0);
});

test("/auth/me without credentials is 401 and logs the missing session", async () => {
  const harness = createHarness();
  const { baseUrl } = await harness.start();

  const response = await fetch(`${baseUrl}/auth/me`);

  assert.equal(response.status, 401);
  assert.deepEqual(await response.json(), { error: "unauthenticated" });
  const rejection = harness.logs.find((line) => line.event === "session_rejected");
  assert.equal(rejection?.fields.reason, "missing");
});

test("tampered and expired sessions get the same 401 but different log reasons", async () => {
  const harness = createHarness();
  const user = await harness.seedLinkedUser({ id: ALICE_ID, sub: "idp|alice", email: "alice@example.com", name: "Alice" });
  const { baseUrl } = await harness.start();

  const valid = await harness.sessionCookieFor(user);
  const tampered = `${valid.slice(0, -4)}AAAA`;
  const expired = await harness.sessionCookieFor(user, new Date(Date.now() - 2 * 86_400_000));

  const tamperedResponse = await fetch(`${baseUrl}/auth/me`, { headers: { Cookie: tampered } });
  const expiredResponse = await fetch(`${baseUrl}/auth/me`, { headers: { Cookie: expired } });

  assert.equal(tamperedResponse.status, 401);
  assert.equal(expiredResponse.status, 401);
  assert.deepEqual(await tamperedResponse.json(), { error: "unauthenticated" });
  assert.deepEqual(await expiredResponse.json(), { error: "unauthenticated" });
  assert.deepEqual(
    harness.logs.filter((line) => line.event === "session_rejected").map((line) => line.fields.reason),
    ["decode_error", "expired"],
  );
});

test("bearer access token authenticates a linked user when no cookie is sent", async () => {
  const harness = createHarness();
  await harness.seedLinkedUser({ id: ALICE_ID, sub: "idp|alice", email: "alice@example.com", name: "Alice" });
  harness.provider.accessTokens.set("access-token-alice", "idp|alice");
  const { baseUrl } = await harness.start();

  const ok = await fetch(`${baseUrl}/auth/me`, { headers: { Authorization: "Bearer access-token-alice" } });
  const unknown = await fetch(`${baseUrl}/auth/me`, { headers: { Authorization: "Bearer forged" } });

  assert.equal(ok.status, 200);
  assert.deepEqual(await ok.json(), {
    user_id: ALICE_ID,
    external_subject_id: "idp|alice",
    email: "alice@example.com",
    display_name: "Alice",
  });
  assert.equal(unknown.status, 401);
});

test("logout clears the session cookie and redirects to the provider", async () => {
  const { baseUrl } = await createHarness().start();

  const response = await fetch(`${baseUrl}/auth/logout`, { redirect: "manual" });

  assert.equal(response.status, 307);
  assert.equal(
    response.headers.get("location"),
    "https://idp.test.invalid/v2/logout?returnTo=http%3A%2F%2Flocalhost%3A3000",
  );
  assert.deepEqual(response.headers.getSetCookie(), [
    "zen_session=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0; Expires=Thu, 01 Jan 1970 00:00:00 GMT",
  ]);
});

test("register creates a provisional user and maps validation and conflicts", async () => {
  const harness = createHarness();
  const { baseUrl } = await harness.start();
  const register = (body: Record<string, string>) =>
    fetch(`${baseUrl}/api/users/register`, {
      method: "POST",
      headers: jsonHeaders(),
      body: JSON.stringify(body),
    });

  const created = await register({ email: "Bob@Example.com", password: "Str0ng!pass", display_name: "Bob" });
  assert.equal(created.status, 201);
  const body = await readBody(created);
  assert.equal(body.email, "bob@example.com");
  assert.equal(body.display_name, "Bob");
  assert.equal(body.linked, false);
  assert.equal(body.email_verified, false);

  const duplicate = await register({ email: "bob@example.com", password: "Str0ng!pass" });
  assert.equal(duplicate.status, 409);
  assert.deepEqual(await duplicate.json(), { error: "email_taken" });

  const weak = await register({ email: "carol@example.com", password: "short" });
  assert.equal(weak.status, 400);
  assert.deepEqual(await weak.json(), { error: "password_too_short" });

  assert.equal(harness.userRepository.count(), 1);
});

test("state-changing api requests from another origin are refused", async () => {
  const harness = createHarness();
  const { baseUrl } = await harness.start();

  const response = await fetch(`${baseUrl}/api/users/register`, {
    method: "POST",
    headers: { "Content-Type": "application/json", Origin: "http://evil.test" },
    body: JSON.stringify({ email: "bob@example.com", password: "Str0ng!pass" }),
  });

  assert.equal(response.status, 403);
  assert.deepEqual(await response.json(), { error: "csrf_failed" });
  assert.equal(harness.userRepository.count(), 0);
});

test("malformed json body is a 400", async () => {
  const { baseUrl } = await createHarness().start();

  const response = await fetch(`${baseUrl}/api/users/register`, {
    method: "POST",
    headers: jsonHeaders(),
    body: "{not json",
  });

  assert.equal(response.status, 400);
  assert.deepEqual(await response.json(), { error: "invalid_json" });
});

test("/users/me reads and updates the session user's profile", async () => {
  const harness = createHarness();
  const user = await harness.seedLinkedUser({ id: ALICE_ID, sub: "idp|alice", email: "alice@example.com", name: "Alice" });
  const { baseUrl } = await harness.start();
  const cookie = await harness.sessionCookieFor(user);

  const patched = await fetch(`${baseUrl}/users/me`, {
    method: "PATCH",
    headers: jsonHeaders({ Cookie: cookie }),
    body: JSON.stringify({ bio: "Morning sits.", profile_image_url: "https://cdn.example.com/alice.png" }),
  });
  assert.equal(patched.status, 200);

  const me = await fetch(`${baseUrl}/users/me`, { headers: { Cookie: cookie } });
  const body = await readBody(me);
  assert.equal(body.id, ALICE_ID);
  assert.equal(body.display_name, "Alice");
  assert.equal(body.bio, "Morning sits.");
  assert.equal(body.profile_image_url, "https://cdn.example.com/alice.png");
  assert.equal(body.linked, true);
});

test("experiences are private to their owner until made public", async () => {
  const harness = createHarness();
  const alice = await harness.seedLinkedUser({ id: ALICE_ID, sub: "idp|alice", email: "alice@example.com", name: "Alice" });
  const bob = await harness.seedLinkedUser({ id: BOB_ID, sub: "idp|bob", email: "bob@example.com", name: "Bob" });
  const { baseUrl } = await harness.start();
  const aliceCookie = await harness.sessionCookieFor(alice);
  const bobCookie = await harness.sessionCookieFor(bob);

  const created = await fetch(`${baseUrl}/api/experiences`, {
    method: "POST",
    headers: jsonHeaders({ Cookie: aliceCookie }),
    body: JSON.stringify({
      started_at: "2026-03-01T06:00:00.000Z",
      ended_at: "2026-03-01T06:20:00.000Z",
      meditation_type: "breath",
      emotion_before: "anxious",
      emotion_after: "calm",
    }),
  });
  assert.equal(created.status, 201);
  const createdBody = await readBody(created);
  const experienceId = createdBody.id;
  assert.equal(typeof experienceId, "string");
  assert.equal(createdBody.duration_minutes, 20);
  assert.equal(createdBody.improved, true);
  assert.equal(createdBody.emotional_change, true);
  assert.equal(createdBody.is_public, false);

  const hidden = await fetch(`${baseUrl}/api/experiences/${String(experienceId)}`, { headers: { Cookie: bobCookie } });
  assert.equal(hidden.status, 404);
  assert.deepEqual(await hidden.json(), { error: "not_found" });

  const bobPatch = await fetch(`${baseUrl}/api/experiences/${String(experienceId)}`, {
    method: "PATCH",
    headers: jsonHeaders({ Cookie: bobCookie }),
    body: JSON.stringify({ is_public: true }),
  });
  assert.equal(bobPatch.status, 404);

  const published = await fetch(`${baseUrl}/api/experiences/${String(experienceId)}`, {
    method: "PATCH",
    headers: jsonHeaders({ Cookie: aliceCookie }),
    body: JSON.stringify({ is_public: true }),
  });
  assert.equal(published.status, 200);

  const visible = await fetch(`${baseUrl}/api/experiences/${String(experienceId)}`, { headers: { Cookie: bobCookie } });
  assert.equal(visible.status, 200);

  const aliceList = await fetch(`${baseUrl}/api/experiences`, { headers: { Cookie: aliceCookie } });
  const bobList = await fetch(`${baseUrl}/api/experiences`, { headers: { Cookie: bobCookie } });
  const aliceItems = (await readBody(aliceList)).items;
  const bobItems = (await readBody(bobList)).items;
  assert.ok(Array.isArray(aliceItems));
  assert.ok(Array.isArray(bobItems));
  assert.equal(aliceItems.length, 1);
  assert.equal(bobItems.length, 0);
});

test("experience requests validate input and ids", async () => {
  const harness = createHarness();
  const alice = await harness.seedLinkedUser({ id: ALICE_ID, sub: "idp|alice", email: "alice@example.com", name: "Alice" });
  const { baseUrl } = await harness.start();
  const cookie = await harness.sessionCookieFor(alice);

  const backwards = await fetch(`${baseUrl}/api/experiences`, {
    method: "POST",
    headers: jsonHeaders({ Cookie: cookie }),
    body: JSON.stringify({
      started_at: "2026-03-01T07:00:00.000Z",
      ended_at: "2026-03-01T06:00:00.000Z",
      meditation_type: "breath",
      emotion_before: "anxious",
      emotion_after: "calm",
    }),
  });
  assert.equal(backwards.status, 400);
  assert.deepEqual(await backwards.json(), { error: "invalid_time_range" });

  const badDate = await fetch(`${baseUrl}/api/experiences`, {
    method: "POST",
    headers: jsonHeaders({ Cookie: cookie }),
    body: JSON.stringify({ started_at: "yesterday", ended_at: "2026-03-01T06:00:00.000Z" }),
  });
  assert.equal(badDate.status, 400);
  assert.deepEqual(await badDate.json(), { error: "invalid_started_at" });

  const badId = await fetch(`${baseUrl}/api/experiences/not-a-uuid`, { headers: { Cookie: cookie } });
  assert.equal(badId.status, 404);

  const anonymous = await fetch(`${baseUrl}/api/experiences`);
  assert.equal(anonymous.status, 401);
});

test("unexpected failures become a generic 500 and are logged", async () => {
  const harness = createHarness({ userRepository: new FailingUserRepository() });
  const { baseUrl } = await harness.start();

  const response = await fetch(`${baseUrl}/api/users/register`, {
    method: "POST",
    headers: jsonHeaders(),
    body: JSON.stringify({ email: "bob@example.com", password: "Str0ng!pass" }),
  });

  assert.equal(response.status, 500);
  assert.deepEqual(await response.json(), { error: "internal_error" });
  const logged = harness.logs.find((line) => line.event === "unhandled_error");
  assert.equal(logged?.level, "error");
  assert.equal(logged?.fields.path, "/api/users/register");

  const health = await fetch(`${baseUrl}/health`);
  assert.equal(health.status, 200);
});

test("unknown routes are 404", async () => {
  const { baseUrl } = await createHarness().start();

  const response = await fetch(`${baseUrl}/nope`);

  assert.equal(response.status, 404);
  assert.deepEqual(await response.json(), { error: "not_found" });
});
