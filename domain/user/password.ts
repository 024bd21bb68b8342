import { pbkdf2, randomBytes, timingSafeEqual } from "node:crypto";
import { promisify } from "node:util";

const pbkdf2Async = promisify(pbkdf2);

export const PASSWORD_MIN_LENGTH = 8;
const SALT_BYTES = 16;
const HASH_ITERATIONS = 10_000;
const HASH_KEY_LENGTH = 64;
const HASH_DIGEST = "sha512";

const UPPERCASE_PATTERN = /[A-Z]/;
const LOWERCASE_PATTERN = /[a-z]/;
const DIGIT_PATTERN = /\d/;
const SPECIAL_CHAR_PATTERN = /[!@#$%^&*(),.?":{}|<>]/;

export type PasswordErrorCode =
  | "too_short"
  | "missing_uppercase"
  | "missing_lowercase"
  | "missing_digit"
  | "missing_special_char";

export class PasswordError extends Error {
  readonly code: PasswordErrorCode;

  constructor(code: PasswordErrorCode) {
    super(code);
    this.name = "PasswordError";
    this.code = code;
  }
}

/**
 * Raw password that passed the policy. Rules are checked in order and the
 * first failing one is reported.
 */
export class Password {
  private constructor(private readonly value: string) {}

  static parse(raw: string): Password {
    if (raw.length < PASSWORD_MIN_LENGTH) {
      throw new PasswordError("too_short");
    }
    if (!UPPERCASE_PATTERN.test(raw)) {
      throw new PasswordError("missing_uppercase");
    }
    if (!LOWERCASE_PATTERN.test(raw)) {
      throw new PasswordError("missing_lowercase");
    }
    if (!DIGIT_PATTERN.test(raw)) {
      throw new PasswordError("missing_digit");
    }
    if (!SPECIAL_CHAR_PATTERN.test(raw)) {
      throw new PasswordError("missing_special_char");
    }

    return new Password(raw);
  }

  /** Returns `salt:hash` (both hex). A fresh salt is drawn on every call. */
  async hash(): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const derived = await derive(this.value, salt);
    return `${salt.toString("hex")}:${derived.toString("hex")}`;
  }
}

export async function verifyPasswordHash(candidate: string, storedHash: string): Promise<boolean> {
  const parts = storedHash.split(":");
  if (parts.length !== 2) {
    return false;
  }

  const [saltHex = "", hashHex = ""] = parts;
  if (!isHex(saltHex) || !isHex(hashHex) || hashHex.length !== HASH_KEY_LENGTH * 2) {
    return false;
  }

  const derived = await derive(candidate, Buffer.from(saltHex, "hex"));
  return timingSafeEqual(derived, Buffer.from(hashHex, "hex"));
}

function derive(password: string, salt: Buffer): Promise<Buffer> {
  return pbkdf2Async(password, salt, HASH_ITERATIONS, HASH_KEY_LENGTH, HASH_DIGEST);
}

function isHex(value: string): boolean {
  return value.length > 0 && value.length % 2 === 0 && /^[0-9a-f]+$/i.test(value);
}
