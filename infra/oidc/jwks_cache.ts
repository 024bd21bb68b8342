import { createLocalJWKSet, type JSONWebKeySet } from "jose";

export type JwksKeySet = ReturnType<typeof createLocalJWKSet>;

export type JwksCacheOptions = {
  jwksUrl: string;
  ttlSeconds?: number;
  /** Minimum age before a forced refresh is honoured. */
  refreshCooldownSeconds?: number;
  /** Upper bound for the shared key request. */
  fetchTimeoutSeconds?: number;
  fetch?: typeof fetch;
  now?: () => Date;
};

type CachedKeySet = {
  keySet: JwksKeySet;
  fetchedAtMs: number;
};

export class JwksFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JwksFetchError";
  }
}

/**
 * Provider signing keys with a bounded lifetime. Concurrent misses share one
 * in-flight request. That request runs under the cache's own timeout; a
 * caller's signal only abandons that caller's wait.
 */
export class JwksCache {
  private readonly ttlMs: number;
  private readonly cooldownMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private cached: CachedKeySet | null = null;
  private inFlight: Promise<CachedKeySet> | null = null;

  constructor(private readonly options: JwksCacheOptions) {
    this.ttlMs = (options.ttlSeconds ?? 300) * 1000;
    this.cooldownMs = (options.refreshCooldownSeconds ?? 30) * 1000;
    this.fetchTimeoutMs = (options.fetchTimeoutSeconds ?? 10) * 1000;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async getKeySet(options: { forceRefresh?: boolean; signal?: AbortSignal } = {}): Promise<JwksKeySet> {
    options.signal?.throwIfAborted();
    const nowMs = this.now().getTime();
    const cached = this.cached;
    if (cached) {
      const age = nowMs - cached.fetchedAtMs;
      const stale = age >= this.ttlMs;
      const refreshAllowed = options.forceRefresh === true && age >= this.cooldownMs;
      if (!stale && !refreshAllowed) {
        return cached.keySet;
      }
    }

    if (!this.inFlight) {
      this.inFlight = this.load(AbortSignal.timeout(this.fetchTimeoutMs)).finally(() => {
        this.inFlight = null;
      });
    }
    const loaded = await abortable(this.inFlight, options.signal);
    return loaded.keySet;
  }

  private async load(signal: AbortSignal): Promise<CachedKeySet> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.jwksUrl, {
        headers: { accept: "application/json" },
        signal,
      });
    } catch (error) {
      throw new JwksFetchError("JWKS request failed", { cause: error });
    }

    if (!response.ok) {
      throw new JwksFetchError(`JWKS request returned ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new JwksFetchError("JWKS response is not JSON", { cause: error });
    }

    if (!isJsonWebKeySet(body)) {
      throw new JwksFetchError("JWKS response has no keys");
    }

    const entry: CachedKeySet = {
      keySet: createLocalJWKSet(body),
      fetchedAtMs: this.now().getTime(),
    };
    this.cached = entry;
    return entry;
  }
}

/** Settles with `promise`, or rejects with the signal's reason once it aborts. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function isJsonWebKeySet(value: unknown): value is JSONWebKeySet {
  if (!isRecord(value) || !Array.isArray(value.keys)) {
    return false;
  }
  return value.keys.every((key) => isRecord(key) && typeof key.kty === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
