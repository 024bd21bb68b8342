import assert from "node:assert/strict";
import { test } from "node:test";

import { exportJWK, generateKeyPair, jwtVerify, SignJWT } from "jose";

import { JwksCache, JwksFetchError } from "./jwks_cache.js";

const JWKS_URL = "https://login.test.invalid/.well-known/jwks.json";

async function createSigningKey() {
  const { publicKey, privateKey } = await generateKeyPair("RS256");
  const jwk = await exportJWK(publicKey);
  return { privateKey, jwk: { ...jwk, kid: "test-key", alg: "RS256", use: "sig" } };
}

function createClock(startIso: string) {
  let current = new Date(startIso).getTime();
  return {
    now: () => new Date(current),
    advanceSeconds(seconds: number) {
      current += seconds * 1000;
    },
  };
}

function createJwksFetch(body: unknown, status = 200) {
  const calls: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    calls.push(String(input));
    return new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" },
    });
  };
  return { calls, fetchImpl };
}

test("cached key set is reused until the ttl passes", async () => {
  const { jwk } = await createSigningKey();
  const clock = createClock("2026-03-01T12:00:00.000Z");
  const { calls, fetchImpl } = createJwksFetch({ keys: [jwk] });
  const cache = new JwksCache({ jwksUrl: JWKS_URL, ttlSeconds: 300, fetch: fetchImpl, now: clock.now });

  await cache.getKeySet();
  clock.advanceSeconds(299);
  await cache.getKeySet();
  assert.equal(calls.length, 1);

  clock.advanceSeconds(1);
  await cache.getKeySet();
  assert.equal(calls.length, 2);
  assert.deepEqual(calls, [JWKS_URL, JWKS_URL]);
});

test("concurrent misses share one request", async () => {
  const { jwk } = await createSigningKey();
  const { calls, fetchImpl } = createJwksFetch({ keys: [jwk] });
  const cache = new JwksCache({ jwksUrl: JWKS_URL, fetch: fetchImpl });

  const keySets = await Promise.all([cache.getKeySet(), cache.getKeySet(), cache.getKeySet()]);

  assert.equal(calls.length, 1);
  assert.equal(keySets[0], keySets[1]);
  assert.equal(keySets[1], keySets[2]);
});

test("forced refresh waits for the cooldown", async () => {
  const { jwk } = await createSigningKey();
  const clock = createClock("2026-03-01T12:00:00.000Z");
  const { calls, fetchImpl } = createJwksFetch({ keys: [jwk] });
  const cache = new JwksCache({
    jwksUrl: JWKS_URL,
    refreshCooldownSeconds: 30,
    fetch: fetchImpl,
    now: clock.now,
  });

  await cache.getKeySet();
  clock.advanceSeconds(10);
  await cache.getKeySet({ forceRefresh: true });
  assert.equal(calls.length, 1);

  clock.advanceSeconds(20);
  await cache.getKeySet({ forceRefresh: true });
  assert.equal(calls.length, 2);
});

test("fetched keys verify tokens signed by the provider", async () => {
  const { privateKey, jwk } = await createSigningKey();
  const { fetchImpl } = createJwksFetch({ keys: [jwk] });
  const cache = new JwksCache({ jwksUrl: JWKS_URL, fetch: fetchImpl });

  const token = await new SignJWT({ email: "a@example.com" })
    .setProtectedHeader({ alg: "RS256", kid: "test-key" })
    .setSubject("idp|abc123")
    .sign(privateKey);

  const { payload } = await jwtVerify(token, await cache.getKeySet());
  assert.equal(payload.sub, "idp|abc123");
  assert.equal(payload.email, "a@example.com");
});

test("failed fetch is not cached", async () => {
  const { jwk } = await createSigningKey();
  let attempts = 0;
  const fetchImpl: typeof fetch = async () => {
    attempts += 1;
    if (attempts === 1) {
      return new Response("unavailable", { status: 503 });
    }
    return new Response(JSON.stringify({ keys: [jwk] }), { status: 200 });
  };
  const cache = new JwksCache({ jwksUrl: JWKS_URL, fetch: fetchImpl });

  await assert.rejects(cache.getKeySet(), JwksFetchError);
  await cache.getKeySet();
  assert.equal(attempts, 2);
});

test("body without keys is rejected", async () => {
  const { fetchImpl } = createJwksFetch({ issuer: "nope" });
  const cache = new JwksCache({ jwksUrl: JWKS_URL, fetch: fetchImpl });

  await assert.rejects(cache.getKeySet(), /JWKS response has no keys/);
});

test("one caller aborting does not fail others waiting on the same request", async () => {
  const { jwk } = await createSigningKey();
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const signals: Array<AbortSignal | null | undefined> = [];
  const fetchImpl: typeof fetch = async (_input, init) => {
    signals.push(init?.signal);
    await gate;
    return new Response(JSON.stringify({ keys: [jwk] }), { status: 200 });
  };
  const cache = new JwksCache({ jwksUrl: JWKS_URL, fetch: fetchImpl });
  const disconnected = new AbortController();
  const connected = new AbortController();

  const first = cache.getKeySet({ signal: disconnected.signal });
  const second = cache.getKeySet({ signal: connected.signal });
  disconnected.abort();

  await assert.rejects(first, (error: unknown) => error instanceof Error && error.name === "AbortError");
  release();
  const keySet = await second;

  assert.equal(typeof keySet, "function");
  assert.equal(signals.length, 1);
  assert.notEqual(signals[0], disconnected.signal);
  assert.equal(signals[0]?.aborted, false);
});

test("an already aborted caller is rejected without a request", async () => {
  const { jwk } = await createSigningKey();
  const { calls, fetchImpl } = createJwksFetch({ keys: [jwk] });
  const cache = new JwksCache({ jwksUrl: JWKS_URL, fetch: fetchImpl });
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(cache.getKeySet({ signal: controller.signal }), (error: unknown) => error instanceof Error && error.name === "AbortError");
  assert.equal(calls.length, 0);
});
