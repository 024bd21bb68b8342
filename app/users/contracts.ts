import type { Email } from "../../domain/user/email.js";
import type { User } from "../../domain/user/user.js";

/**
 * `find*` resolve to `null` when no row matches and reject on storage
 * failures. `save` rejects with a `ConflictError` when the email or the
 * external subject id already belongs to another user.
 */
export interface UserRepository {
  save(user: User): Promise<void>;
  findById(id: string): Promise<User | null>;
  findByEmail(email: Email): Promise<User | null>;
  findByExternalSubjectId(externalSubjectId: string): Promise<User | null>;
}
