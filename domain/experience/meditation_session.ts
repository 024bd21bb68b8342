import { ExperienceError } from "./errors.js";

export type MeditationSession = {
  readonly startedAt: Date;
  readonly endedAt: Date;
  readonly meditationType: string;
  readonly note: string;
};

export function createMeditationSession(input: {
  startedAt: Date;
  endedAt: Date;
  meditationType: string;
  note?: string;
}): MeditationSession {
  if (input.endedAt.getTime() <= input.startedAt.getTime()) {
    throw new ExperienceError("invalid_time_range");
  }

  const meditationType = input.meditationType.trim();
  if (!meditationType) {
    throw new ExperienceError("empty_meditation_type");
  }

  return {
    startedAt: new Date(input.startedAt),
    endedAt: new Date(input.endedAt),
    meditationType,
    note: input.note ?? "",
  };
}

export function sessionDurationMinutes(session: MeditationSession): number {
  return (session.endedAt.getTime() - session.startedAt.getTime()) / 60_000;
}

export function sessionsEqual(a: MeditationSession, b: MeditationSession): boolean {
  return (
    a.startedAt.getTime() === b.startedAt.getTime() &&
    a.endedAt.getTime() === b.endedAt.getTime() &&
    a.meditationType === b.meditationType &&
    a.note === b.note
  );
}
