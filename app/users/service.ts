import { Email, EmailError } from "../../domain/user/email.js";
import { Password, PasswordError } from "../../domain/user/password.js";
import { emptyProfile, profilesEqual, type Profile } from "../../domain/user/profile.js";
import { User } from "../../domain/user/user.js";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import type { DomainEventPublisher } from "../events/publisher.js";
import type { UserRepository } from "./contracts.js";

const DISPLAY_NAME_MAX_LENGTH = 100;
const BIO_MAX_LENGTH = 1000;

export type UserServiceDeps = {
  repository: UserRepository;
  publisher?: DomainEventPublisher;
  now?: () => Date;
  hashPassword?: (password: Password) => Promise<string>;
};

export type RegisterInput = {
  email: string;
  password: string;
  displayName?: string | null;
};

export type ProfileUpdateInput = {
  displayName?: string | null;
  bio?: string | null;
  profileImageUrl?: string | null;
};

export class UserService {
  private readonly repository: UserRepository;
  private readonly now: () => Date;
  private readonly hashPassword: (password: Password) => Promise<string>;

  constructor(private readonly deps: UserServiceDeps) {
    this.repository = deps.repository;
    this.now = deps.now ?? (() => new Date());
    this.hashPassword = deps.hashPassword ?? ((password) => password.hash());
  }

  /** Creates a provisional user; it is linked on its first external login. */
  async register(input: RegisterInput): Promise<User> {
    const email = parseEmail(input.email);
    const password = parsePassword(input.password);
    const displayName = normalizeDisplayName(input.displayName ?? "");

    const existing = await this.repository.findByEmail(email);
    if (existing) {
      throw new ConflictError("email_taken");
    }

    const user = User.register(email, emptyProfile(displayName), {
      now: this.now(),
      passwordHash: await this.hashPassword(password),
    });
    await this.commit(user);
    return user;
  }

  async getProfile(userId: string): Promise<User> {
    const user = await this.repository.findById(userId);
    if (!user) {
      throw new NotFoundError();
    }
    return user;
  }

  /** Omitted fields keep their current value. */
  async updateProfile(userId: string, input: ProfileUpdateInput): Promise<User> {
    const user = await this.getProfile(userId);
    const current = user.profile;
    const next: Profile = {
      displayName:
        input.displayName === undefined || input.displayName === null
          ? current.displayName
          : normalizeDisplayName(input.displayName),
      bio: input.bio === undefined || input.bio === null ? current.bio : normalizeBio(input.bio),
      profileImageUrl:
        input.profileImageUrl === undefined || input.profileImageUrl === null
          ? current.profileImageUrl
          : normalizeImageUrl(input.profileImageUrl),
    };

    if (profilesEqual(current, next)) {
      return user;
    }

    user.updateProfile(next, this.now());
    await this.commit(user);
    return user;
  }

  private async commit(user: User): Promise<void> {
    await this.repository.save(user);
    await this.deps.publisher?.publish(user.events);
    user.clearEvents();
  }
}

function parseEmail(raw: string): Email {
  try {
    return Email.parse(raw);
  } catch (error) {
    if (error instanceof EmailError) {
      throw new ValidationError(`email_${error.code}`);
    }
    throw error;
  }
}

function parsePassword(raw: string): Password {
  try {
    return Password.parse(raw);
  } catch (error) {
    if (error instanceof PasswordError) {
      throw new ValidationError(`password_${error.code}`);
    }
    throw error;
  }
}

function normalizeDisplayName(raw: string): string {
  const value = raw.trim();
  if (value.length > DISPLAY_NAME_MAX_LENGTH) {
    throw new ValidationError("display_name_too_long");
  }
  return value;
}

function normalizeBio(raw: string): string {
  const value = raw.trim();
  if (value.length > BIO_MAX_LENGTH) {
    throw new ValidationError("bio_too_long");
  }
  return value;
}

function normalizeImageUrl(raw: string): string {
  const value = raw.trim();
  if (!value) {
    return "";
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ValidationError("invalid_profile_image_url");
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ValidationError("invalid_profile_image_url");
  }
  return url.toString();
}
