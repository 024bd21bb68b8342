import { randomUUID } from "node:crypto";

import { Email } from "./email.js";
import type { UserDomainEvent } from "./events.js";
import type { Profile } from "./profile.js";

export type UserSnapshot = {
  id: string;
  externalSubjectId: string | null;
  email: string;
  passwordHash: string | null;
  profile: Profile;
  emailVerified: boolean;
  createdAt: Date;
  verifiedAt: Date | null;
  updatedAt: Date;
};

export class UserStateError extends Error {
  readonly code = "already_linked";

  constructor() {
    super("already_linked");
    this.name = "UserStateError";
  }
}

type NewUserOptions = {
  id?: string;
  now?: Date;
};

/**
 * Local account. A user is either provisional (registered locally, no
 * external subject yet) or linked to exactly one identity-provider subject.
 * Linking is one-way.
 *
 * Mutations append to an event buffer that stays populated until the caller
 * flushes it with {@link User.clearEvents} after the state has been saved.
 */
export class User {
  private pendingEvents: UserDomainEvent[] = [];

  private constructor(private state: UserSnapshot) {}

  static register(
    email: Email,
    profile: Profile,
    options: NewUserOptions & { passwordHash?: string | null } = {},
  ): User {
    const now = options.now ?? new Date();
    const user = new User({
      id: options.id ?? randomUUID(),
      externalSubjectId: null,
      email: email.value,
      passwordHash: options.passwordHash ?? null,
      profile: { ...profile },
      emailVerified: false,
      createdAt: now,
      verifiedAt: null,
      updatedAt: now,
    });
    user.record({ name: "UserRegistered", aggregateId: user.id, occurredAt: now, email: email.value });
    return user;
  }

  static createLinked(
    input: {
      externalSubjectId: string;
      email: Email;
      displayName: string;
      profileImageUrl: string;
      emailVerified: boolean;
    },
    options: NewUserOptions = {},
  ): User {
    const now = options.now ?? new Date();
    const user = new User({
      id: options.id ?? randomUUID(),
      externalSubjectId: input.externalSubjectId,
      email: input.email.value,
      passwordHash: null,
      profile: {
        displayName: input.displayName,
        bio: "",
        profileImageUrl: input.profileImageUrl,
      },
      emailVerified: input.emailVerified,
      createdAt: now,
      verifiedAt: input.emailVerified ? now : null,
      updatedAt: now,
    });
    user.record({
      name: "UserRegistered",
      aggregateId: user.id,
      occurredAt: now,
      email: input.email.value,
    });
    return user;
  }

  /** Rehydrates a stored user. Never records events. */
  static fromSnapshot(snapshot: UserSnapshot): User {
    return new User({
      ...snapshot,
      profile: { ...snapshot.profile },
      createdAt: new Date(snapshot.createdAt),
      verifiedAt: snapshot.verifiedAt ? new Date(snapshot.verifiedAt) : null,
      updatedAt: new Date(snapshot.updatedAt),
    });
  }

  get id(): string {
    return this.state.id;
  }

  get externalSubjectId(): string | null {
    return this.state.externalSubjectId;
  }

  get email(): Email {
    return Email.parse(this.state.email);
  }

  get profile(): Profile {
    return { ...this.state.profile };
  }

  get emailVerified(): boolean {
    return this.state.emailVerified;
  }

  get passwordHash(): string | null {
    return this.state.passwordHash;
  }

  get createdAt(): Date {
    return new Date(this.state.createdAt);
  }

  get verifiedAt(): Date | null {
    return this.state.verifiedAt ? new Date(this.state.verifiedAt) : null;
  }

  get updatedAt(): Date {
    return new Date(this.state.updatedAt);
  }

  get events(): readonly UserDomainEvent[] {
    return [...this.pendingEvents];
  }

  isLinked(): boolean {
    return this.state.externalSubjectId !== null;
  }

  /** Provisional to linked. Throws {@link UserStateError} on a linked user. */
  activateFromExternalIdentity(
    input: { externalSubjectId: string; displayName: string; emailVerified: boolean },
    now = new Date(),
  ): void {
    if (this.isLinked()) {
      throw new UserStateError();
    }

    this.state.externalSubjectId = input.externalSubjectId;
    if (input.displayName) {
      this.state.profile = { ...this.state.profile, displayName: input.displayName };
    }
    this.state.updatedAt = now;
    this.record({
      name: "UserLinked",
      aggregateId: this.id,
      occurredAt: now,
      externalSubjectId: input.externalSubjectId,
    });

    if (input.emailVerified) {
      this.verifyEmail(now);
    }
  }

  updateProfile(
    input: { displayName: string; bio: string; profileImageUrl: string },
    now = new Date(),
  ): void {
    this.state.profile = {
      displayName: input.displayName,
      bio: input.bio,
      profileImageUrl: input.profileImageUrl,
    };
    this.state.updatedAt = now;
    this.record({ name: "UserProfileUpdated", aggregateId: this.id, occurredAt: now });
  }

  /** A changed address is unverified until verified again. */
  updateEmail(email: Email, now = new Date()): void {
    if (email.value === this.state.email) {
      return;
    }

    const previousEmail = this.state.email;
    this.state.email = email.value;
    this.state.emailVerified = false;
    this.state.verifiedAt = null;
    this.state.updatedAt = now;
    this.record({
      name: "UserEmailChanged",
      aggregateId: this.id,
      occurredAt: now,
      previousEmail,
      email: email.value,
    });
  }

  verifyEmail(now = new Date()): void {
    if (this.state.emailVerified) {
      return;
    }

    this.state.emailVerified = true;
    this.state.verifiedAt = now;
    this.state.updatedAt = now;
    this.record({ name: "EmailVerified", aggregateId: this.id, occurredAt: now, email: this.state.email });
  }

  clearEvents(): void {
    this.pendingEvents = [];
  }

  toSnapshot(): UserSnapshot {
    return {
      ...this.state,
      profile: { ...this.state.profile },
      createdAt: new Date(this.state.createdAt),
      verifiedAt: this.state.verifiedAt ? new Date(this.state.verifiedAt) : null,
      updatedAt: new Date(this.state.updatedAt),
    };
  }

  private record(event: UserDomainEvent): void {
    this.pendingEvents.push(event);
  }
}
