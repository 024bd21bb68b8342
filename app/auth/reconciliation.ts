import type { VerifiedClaims } from "../../domain/auth/types.js";
import { Email, EmailError } from "../../domain/user/email.js";
import { User } from "../../domain/user/user.js";
import { silentLogger, type Logger } from "../../infra/observability/logger.js";
import { ConflictError, ValidationError } from "../errors.js";
import type { DomainEventPublisher } from "../events/publisher.js";
import type { UserRepository } from "../users/contracts.js";

export type ReconciliationOutcome = "updated" | "linked" | "created";

export type ReconciliationResult = {
  user: User;
  outcome: ReconciliationOutcome;
};

export type IdentityReconciliationDeps = {
  repository: UserRepository;
  publisher?: DomainEventPublisher;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Maps verified claims onto a local user:
 *
 * 1. a user already linked to the subject is refreshed from the claims;
 * 2. otherwise an unlinked user with the same email is linked;
 * 3. otherwise a new linked user is created.
 *
 * Concurrent first logins are settled by the repository's uniqueness
 * constraints. A `ConflictError` from `save` re-runs the lookup once.
 */
export class IdentityReconciliationService {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: IdentityReconciliationDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async reconcile(claims: VerifiedClaims): Promise<ReconciliationResult> {
    const email = parseClaimEmail(claims.email);

    try {
      return await this.reconcileOnce(claims, email);
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }

      this.logger.warn("reconciliation_conflict_retry", {
        external_subject_id: claims.externalSubjectId,
        conflict: error.code,
      });
      return this.reconcileOnce(claims, email);
    }
  }

  private async reconcileOnce(claims: VerifiedClaims, email: Email): Promise<ReconciliationResult> {
    const now = this.now();

    const linked = await this.deps.repository.findByExternalSubjectId(claims.externalSubjectId);
    if (linked) {
      refreshFromClaims(linked, claims, email, now);
      await this.commit(linked);
      return { user: linked, outcome: "updated" };
    }

    const byEmail = await this.deps.repository.findByEmail(email);
    if (byEmail) {
      if (byEmail.isLinked()) {
        throw new ConflictError("email_taken");
      }

      byEmail.activateFromExternalIdentity(
        {
          externalSubjectId: claims.externalSubjectId,
          displayName: claims.displayName,
          emailVerified: claims.emailVerified,
        },
        now,
      );
      const profile = byEmail.profile;
      if (claims.pictureUrl && claims.pictureUrl !== profile.profileImageUrl) {
        byEmail.updateProfile({ ...profile, profileImageUrl: claims.pictureUrl }, now);
      }
      await this.commit(byEmail);
      return { user: byEmail, outcome: "linked" };
    }

    const created = User.createLinked(
      {
        externalSubjectId: claims.externalSubjectId,
        email,
        displayName: claims.displayName,
        profileImageUrl: claims.pictureUrl,
        emailVerified: claims.emailVerified,
      },
      { now },
    );
    await this.commit(created);
    return { user: created, outcome: "created" };
  }

  /** Nothing to write when the user recorded no changes. */
  private async commit(user: User): Promise<void> {
    const events = user.events;
    if (events.length === 0) {
      return;
    }

    await this.deps.repository.save(user);
    await this.deps.publisher?.publish(events);
    user.clearEvents();
  }
}

function refreshFromClaims(user: User, claims: VerifiedClaims, email: Email, now: Date): void {
  const profile = user.profile;
  const displayName = claims.displayName || profile.displayName;
  const profileImageUrl = claims.pictureUrl || profile.profileImageUrl;
  if (displayName !== profile.displayName || profileImageUrl !== profile.profileImageUrl) {
    user.updateProfile({ displayName, bio: profile.bio, profileImageUrl }, now);
  }

  user.updateEmail(email, now);

  if (claims.emailVerified) {
    user.verifyEmail(now);
  }
}

function parseClaimEmail(raw: string): Email {
  try {
    return Email.parse(raw);
  } catch (error) {
    if (error instanceof EmailError) {
      throw new ValidationError(`claims_email_${error.code}`);
    }
    throw error;
  }
}
