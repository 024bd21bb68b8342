import type { Experience } from "../../domain/experience/experience.js";

export interface ExperienceRepository {
  save(experience: Experience): Promise<void>;
  findById(id: string): Promise<Experience | null>;
  /** Newest first by session start. */
  listByUser(userId: string): Promise<Experience[]>;
}
