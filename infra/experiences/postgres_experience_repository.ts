import type { Pool } from "pg";

import type { ExperienceRepository } from "../../app/experiences/contracts.js";
import { Experience } from "../../domain/experience/experience.js";

type ExperienceRow = {
  id: string;
  user_id: string;
  started_at: Date;
  ended_at: Date;
  meditation_type: string;
  note: string;
  emotion_before: string;
  emotion_after: string;
  is_public: boolean;
  created_at: Date;
  updated_at: Date;
};

const EXPERIENCE_COLUMNS = `
  id,
  user_id,
  started_at,
  ended_at,
  meditation_type,
  note,
  emotion_before,
  emotion_after,
  is_public,
  created_at,
  updated_at
`;

export class PostgresExperienceRepository implements ExperienceRepository {
  constructor(private readonly pool: Pool) {}

  async save(experience: Experience): Promise<void> {
    const { content } = experience;
    await this.pool.query(
      `
      INSERT INTO experiences (${EXPERIENCE_COLUMNS})
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      ON CONFLICT (id) DO UPDATE
      SET started_at = EXCLUDED.started_at,
          ended_at = EXCLUDED.ended_at,
          meditation_type = EXCLUDED.meditation_type,
          note = EXCLUDED.note,
          emotion_before = EXCLUDED.emotion_before,
          emotion_after = EXCLUDED.emotion_after,
          is_public = EXCLUDED.is_public,
          updated_at = EXCLUDED.updated_at
      `,
      [
        experience.id,
        experience.userId,
        content.session.startedAt,
        content.session.endedAt,
        content.session.meditationType,
        content.session.note,
        content.emotionalState.before,
        content.emotionalState.after,
        experience.isPublic,
        experience.createdAt,
        experience.updatedAt,
      ],
    );
  }

  async findById(id: string): Promise<Experience | null> {
    const result = await this.pool.query<ExperienceRow>(
      `
      SELECT ${EXPERIENCE_COLUMNS}
      FROM experiences
      WHERE id = $1
      LIMIT 1
      `,
      [id],
    );

    const row = result.rows[0];
    return row ? mapExperienceRow(row) : null;
  }

  async listByUser(userId: string): Promise<Experience[]> {
    const result = await this.pool.query<ExperienceRow>(
      `
      SELECT ${EXPERIENCE_COLUMNS}
      FROM experiences
      WHERE user_id = $1
      ORDER BY started_at DESC, created_at DESC
      `,
      [userId],
    );

    return result.rows.map(mapExperienceRow);
  }
}

function mapExperienceRow(row: ExperienceRow): Experience {
  return Experience.fromSnapshot({
    id: row.id,
    userId: row.user_id,
    content: {
      session: {
        startedAt: new Date(row.started_at),
        endedAt: new Date(row.ended_at),
        meditationType: row.meditation_type,
        note: row.note,
      },
      emotionalState: {
        before: row.emotion_before,
        after: row.emotion_after,
      },
    },
    isPublic: row.is_public,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  });
}
