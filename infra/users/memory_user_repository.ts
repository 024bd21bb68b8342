import { ConflictError } from "../../app/errors.js";
import type { UserRepository } from "../../app/users/contracts.js";
import type { Email } from "../../domain/user/email.js";
import { User, type UserSnapshot } from "../../domain/user/user.js";

/**
 * Test double for {@link UserRepository} with the same uniqueness rules as
 * the `users` table.
 */
export class InMemoryUserRepository implements UserRepository {
  protected readonly rows = new Map<string, UserSnapshot>();

  async save(user: User): Promise<void> {
    const snapshot = user.toSnapshot();
    for (const row of this.rows.values()) {
      if (row.id === snapshot.id) {
        continue;
      }
      if (row.email === snapshot.email) {
        throw new ConflictError("email_taken");
      }
      if (snapshot.externalSubjectId !== null && row.externalSubjectId === snapshot.externalSubjectId) {
        throw new ConflictError("external_subject_taken");
      }
    }

    this.rows.set(snapshot.id, snapshot);
  }

  async findById(id: string): Promise<User | null> {
    return this.restore(this.rows.get(id));
  }

  async findByEmail(email: Email): Promise<User | null> {
    return this.restore([...this.rows.values()].find((row) => row.email === email.value));
  }

  async findByExternalSubjectId(externalSubjectId: string): Promise<User | null> {
    return this.restore(
      [...this.rows.values()].find((row) => row.externalSubjectId === externalSubjectId),
    );
  }

  count(): number {
    return this.rows.size;
  }

  private restore(row: UserSnapshot | undefined): User | null {
    return row ? User.fromSnapshot(row) : null;
  }
}
