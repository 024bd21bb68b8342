import type { ExperienceRepository } from "../../app/experiences/contracts.js";
import { Experience, type ExperienceSnapshot } from "../../domain/experience/experience.js";

export class InMemoryExperienceRepository implements ExperienceRepository {
  private readonly rows = new Map<string, ExperienceSnapshot>();

  async save(experience: Experience): Promise<void> {
    this.rows.set(experience.id, experience.toSnapshot());
  }

  async findById(id: string): Promise<Experience | null> {
    const row = this.rows.get(id);
    return row ? Experience.fromSnapshot(row) : null;
  }

  async listByUser(userId: string): Promise<Experience[]> {
    return [...this.rows.values()]
      .filter((row) => row.userId === userId)
      .sort((a, b) => b.content.session.startedAt.getTime() - a.content.session.startedAt.getTime())
      .map((row) => Experience.fromSnapshot(row));
  }

  count(): number {
    return this.rows.size;
  }
}
