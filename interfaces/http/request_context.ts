import type { IncomingMessage } from "node:http";

import { AuthenticationError } from "../../app/errors.js";
import type { AuthIdentity } from "../../domain/auth/types.js";

const identities = new WeakMap<IncomingMessage, AuthIdentity>();

export function setRequestIdentity(req: IncomingMessage, identity: AuthIdentity): void {
  identities.set(req, identity);
}

/** For handlers behind the guard; throws when the guard did not run. */
export function requireRequestIdentity(req: IncomingMessage): AuthIdentity {
  const identity = identities.get(req);
  if (!identity) {
    throw new AuthenticationError();
  }
  return identity;
}
