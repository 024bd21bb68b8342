import { createEmotionalState } from "../../domain/experience/emotional_state.js";
import { ExperienceError } from "../../domain/experience/errors.js";
import { Experience, type ExperienceContent } from "../../domain/experience/experience.js";
import { createMeditationSession, sessionsEqual } from "../../domain/experience/meditation_session.js";
import { NotFoundError, ValidationError } from "../errors.js";
import type { DomainEventPublisher } from "../events/publisher.js";
import type { ExperienceRepository } from "./contracts.js";

export type ExperienceInput = {
  startedAt: Date;
  endedAt: Date;
  meditationType: string;
  note?: string;
  emotionBefore: string;
  emotionAfter: string;
  isPublic?: boolean;
};

export type ExperiencePatch = Partial<ExperienceInput>;

export type ExperienceServiceDeps = {
  repository: ExperienceRepository;
  publisher?: DomainEventPublisher;
  now?: () => Date;
};

export class ExperienceService {
  private readonly now: () => Date;

  constructor(private readonly deps: ExperienceServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async create(userId: string, input: ExperienceInput): Promise<Experience> {
    const now = this.now();
    const experience = withDomainValidation(() => Experience.create(userId, buildContent(input), { now }));
    if (input.isPublic) {
      experience.setVisibility(true, now);
    }

    await this.commit(experience);
    return experience;
  }

  async listForUser(userId: string): Promise<Experience[]> {
    return this.deps.repository.listByUser(userId);
  }

  /** Visible to its owner, and to everyone once public. */
  async get(viewerId: string, experienceId: string): Promise<Experience> {
    const experience = await this.deps.repository.findById(experienceId);
    if (!experience || (!experience.belongsTo(viewerId) && !experience.isPublic)) {
      throw new NotFoundError();
    }
    return experience;
  }

  async update(viewerId: string, experienceId: string, patch: ExperiencePatch): Promise<Experience> {
    const experience = await this.deps.repository.findById(experienceId);
    if (!experience || !experience.belongsTo(viewerId)) {
      throw new NotFoundError();
    }

    const now = this.now();
    const current = experience.content;
    const next = withDomainValidation(() =>
      buildContent({
        startedAt: patch.startedAt ?? current.session.startedAt,
        endedAt: patch.endedAt ?? current.session.endedAt,
        meditationType: patch.meditationType ?? current.session.meditationType,
        note: patch.note ?? current.session.note,
        emotionBefore: patch.emotionBefore ?? current.emotionalState.before,
        emotionAfter: patch.emotionAfter ?? current.emotionalState.after,
      }),
    );

    if (!contentEqual(current, next)) {
      experience.updateContent(next, now);
    }
    if (patch.isPublic !== undefined) {
      experience.setVisibility(patch.isPublic, now);
    }

    if (experience.events.length > 0) {
      await this.commit(experience);
    }
    return experience;
  }

  private async commit(experience: Experience): Promise<void> {
    await this.deps.repository.save(experience);
    await this.deps.publisher?.publish(experience.events);
    experience.clearEvents();
  }
}

function buildContent(input: ExperienceInput): ExperienceContent {
  return {
    session: createMeditationSession({
      startedAt: input.startedAt,
      endedAt: input.endedAt,
      meditationType: input.meditationType,
      note: input.note,
    }),
    emotionalState: createEmotionalState(input.emotionBefore, input.emotionAfter),
  };
}

function contentEqual(a: ExperienceContent, b: ExperienceContent): boolean {
  return (
    sessionsEqual(a.session, b.session) &&
    a.emotionalState.before === b.emotionalState.before &&
    a.emotionalState.after === b.emotionalState.after
  );
}

function withDomainValidation<T>(build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof ExperienceError) {
      throw new ValidationError(error.code);
    }
    throw error;
  }
}
