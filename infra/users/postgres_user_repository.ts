import type { Pool } from "pg";

import { ConflictError } from "../../app/errors.js";
import type { UserRepository } from "../../app/users/contracts.js";
import type { Email } from "../../domain/user/email.js";
import { User } from "../../domain/user/user.js";
import { uniqueViolationConstraint } from "../db/pg_errors.js";

type UserRow = {
  id: string;
  external_subject_id: string | null;
  email: string;
  password_hash: string | null;
  display_name: string;
  bio: string;
  profile_image_url: string;
  email_verified: boolean;
  created_at: Date;
  verified_at: Date | null;
  updated_at: Date;
};

const USER_COLUMNS = `
  id,
  external_subject_id,
  email,
  password_hash,
  display_name,
  bio,
  profile_image_url,
  email_verified,
  created_at,
  verified_at,
  updated_at
`;

export class PostgresUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async save(user: User): Promise<void> {
    const snapshot = user.toSnapshot();
    try {
      await this.pool.query(
        `
        INSERT INTO users (${USER_COLUMNS})
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
        ON CONFLICT (id) DO UPDATE
        SET external_subject_id = EXCLUDED.external_subject_id,
            email = EXCLUDED.email,
            password_hash = EXCLUDED.password_hash,
            display_name = EXCLUDED.display_name,
            bio = EXCLUDED.bio,
            profile_image_url = EXCLUDED.profile_image_url,
            email_verified = EXCLUDED.email_verified,
            verified_at = EXCLUDED.verified_at,
            updated_at = EXCLUDED.updated_at
        `,
        [
          snapshot.id,
          snapshot.externalSubjectId,
          snapshot.email,
          snapshot.passwordHash,
          snapshot.profile.displayName,
          snapshot.profile.bio,
          snapshot.profile.profileImageUrl,
          snapshot.emailVerified,
          snapshot.createdAt,
          snapshot.verifiedAt,
          snapshot.updatedAt,
        ],
      );
    } catch (error) {
      const constraint = uniqueViolationConstraint(error);
      if (constraint === "users_email_key") {
        throw new ConflictError("email_taken");
      }
      if (constraint === "users_external_subject_id_key") {
        throw new ConflictError("external_subject_taken");
      }
      throw error;
    }
  }

  async findById(id: string): Promise<User | null> {
    return this.findOne(`id = $1`, id);
  }

  async findByEmail(email: Email): Promise<User | null> {
    return this.findOne(`email = $1`, email.value);
  }

  async findByExternalSubjectId(externalSubjectId: string): Promise<User | null> {
    return this.findOne(`external_subject_id = $1`, externalSubjectId);
  }

  private async findOne(condition: string, value: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `
      SELECT ${USER_COLUMNS}
      FROM users
      WHERE ${condition}
      LIMIT 1
      `,
      [value],
    );

    const row = result.rows[0];
    return row ? mapUserRow(row) : null;
  }
}

function mapUserRow(row: UserRow): User {
  return User.fromSnapshot({
    id: row.id,
    externalSubjectId: row.external_subject_id,
    email: row.email,
    passwordHash: row.password_hash,
    profile: {
      displayName: row.display_name,
      bio: row.bio,
      profileImageUrl: row.profile_image_url,
    },
    emailVerified: row.email_verified,
    createdAt: new Date(row.created_at),
    verifiedAt: row.verified_at ? new Date(row.verified_at) : null,
    updatedAt: new Date(row.updated_at),
  });
}
