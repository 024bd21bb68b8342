import type { IncomingMessage } from "node:http";

import type { OidcProvider, SessionCodec } from "../../app/auth/contracts.js";
import { ProviderError } from "../../app/errors.js";
import type { UserRepository } from "../../app/users/contracts.js";
import { identityFromSession, type AuthIdentity } from "../../domain/auth/types.js";
import type { Logger } from "../../infra/observability/logger.js";
import { parseCookies } from "./cookies.js";
import { setRequestIdentity } from "./request_context.js";

export type AuthGuardDeps = {
  sessions: SessionCodec;
  provider: OidcProvider;
  users: UserRepository;
  sessionCookieName: string;
  logger: Logger;
  now?: () => Date;
};

/**
 * Resolves the caller from the session cookie, or from a bearer access token
 * when no cookie is sent. Rejections are logged with their reason; callers
 * only learn that the request is unauthenticated.
 */
export class AuthGuard {
  private readonly now: () => Date;

  constructor(private readonly deps: AuthGuardDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async authenticate(req: IncomingMessage, signal?: AbortSignal): Promise<AuthIdentity | null> {
    const identity = await this.resolve(req, signal);
    if (identity) {
      setRequestIdentity(req, identity);
    }
    return identity;
  }

  private async resolve(req: IncomingMessage, signal: AbortSignal | undefined): Promise<AuthIdentity | null> {
    const cookie = parseCookies(req.headers.cookie).get(this.deps.sessionCookieName);
    if (cookie) {
      const validation = await this.deps.sessions.validate(cookie, this.now());
      if (!validation.ok) {
        this.reject(req, validation.reason);
        return null;
      }
      return identityFromSession(validation.payload);
    }

    const bearer = readBearerToken(req.headers.authorization);
    if (!bearer) {
      this.reject(req, "missing");
      return null;
    }

    let subject: string;
    try {
      ({ subject } = await this.deps.provider.verifyAccessToken(bearer, { signal }));
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      this.reject(req, "invalid_bearer", error);
      return null;
    }

    const user = await this.deps.users.findByExternalSubjectId(subject);
    if (!user) {
      this.reject(req, "unknown_subject");
      return null;
    }

    return {
      localUserId: user.id,
      externalSubjectId: subject,
      email: user.email.value,
      displayName: user.profile.displayName,
    };
  }

  private reject(req: IncomingMessage, reason: string, error?: unknown): void {
    const log = reason === "missing" ? this.deps.logger.info : this.deps.logger.warn;
    log("session_rejected", {
      reason,
      method: req.method,
      path: req.url ? new URL(req.url, "http://local.invalid").pathname : undefined,
      error,
    });
  }
}

function readBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = /^Bearer\s+(\S+)$/iu.exec(header.trim());
  return match?.[1] ?? null;
}
