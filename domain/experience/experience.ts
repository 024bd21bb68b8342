import { randomUUID } from "node:crypto";

import type { EmotionalState } from "./emotional_state.js";
import { ExperienceError } from "./errors.js";
import type { ExperienceDomainEvent } from "./events.js";
import type { MeditationSession } from "./meditation_session.js";

export type ExperienceContent = {
  session: MeditationSession;
  emotionalState: EmotionalState;
};

export type ExperienceSnapshot = {
  id: string;
  userId: string;
  content: ExperienceContent;
  isPublic: boolean;
  createdAt: Date;
  updatedAt: Date;
};

/** A journaled meditation session. Private until made public. */
export class Experience {
  private pendingEvents: ExperienceDomainEvent[] = [];

  private constructor(private state: ExperienceSnapshot) {}

  static create(
    userId: string,
    content: ExperienceContent,
    options: { id?: string; now?: Date } = {},
  ): Experience {
    if (!userId.trim()) {
      throw new ExperienceError("empty_user_id");
    }

    const now = options.now ?? new Date();
    const experience = new Experience({
      id: options.id ?? randomUUID(),
      userId,
      content,
      isPublic: false,
      createdAt: now,
      updatedAt: now,
    });
    experience.pendingEvents.push({
      name: "ExperienceCreated",
      aggregateId: experience.id,
      occurredAt: now,
      userId,
    });
    return experience;
  }

  static fromSnapshot(snapshot: ExperienceSnapshot): Experience {
    return new Experience({ ...snapshot });
  }

  get id(): string {
    return this.state.id;
  }

  get userId(): string {
    return this.state.userId;
  }

  get content(): ExperienceContent {
    return this.state.content;
  }

  get isPublic(): boolean {
    return this.state.isPublic;
  }

  get createdAt(): Date {
    return new Date(this.state.createdAt);
  }

  get updatedAt(): Date {
    return new Date(this.state.updatedAt);
  }

  get events(): readonly ExperienceDomainEvent[] {
    return [...this.pendingEvents];
  }

  belongsTo(userId: string): boolean {
    return this.state.userId === userId;
  }

  updateContent(content: ExperienceContent, now = new Date()): void {
    this.state.content = content;
    this.state.updatedAt = now;
    this.pendingEvents.push({ name: "ExperienceUpdated", aggregateId: this.id, occurredAt: now });
  }

  setVisibility(isPublic: boolean, now = new Date()): void {
    if (this.state.isPublic === isPublic) {
      return;
    }

    this.state.isPublic = isPublic;
    this.state.updatedAt = now;
    this.pendingEvents.push({
      name: "ExperienceVisibilityChanged",
      aggregateId: this.id,
      occurredAt: now,
      isPublic,
    });
  }

  clearEvents(): void {
    this.pendingEvents = [];
  }

  toSnapshot(): ExperienceSnapshot {
    return { ...this.state };
  }
}
