export type EmailErrorCode = "empty_input" | "invalid_format";

export class EmailError extends Error {
  readonly code: EmailErrorCode;

  constructor(code: EmailErrorCode) {
    super(code);
    this.name = "EmailError";
    this.code = code;
  }
}

const EMAIL_PATTERN = /^[a-z0-9._+-]+@[a-z0-9.-]+\.[a-z]{2,}$/;

/**
 * Normalized e-mail address. Two instances are equal when their normalized
 * values are equal.
 */
export class Email {
  private constructor(readonly value: string) {}

  static parse(raw: string | null | undefined): Email {
    const trimmed = (raw ?? "").trim();
    if (!trimmed) {
      throw new EmailError("empty_input");
    }

    const normalized = trimmed.toLowerCase();
    if (!isValidEmail(normalized)) {
      throw new EmailError("invalid_format");
    }

    return new Email(normalized);
  }

  equals(other: Email | null | undefined): boolean {
    return other?.value === this.value;
  }

  toString(): string {
    return this.value;
  }
}

function isValidEmail(email: string): boolean {
  if (!EMAIL_PATTERN.test(email) || email.includes("..")) {
    return false;
  }

  const parts = email.split("@");
  if (parts.length !== 2) {
    return false;
  }

  const [localPart = "", domainPart = ""] = parts;
  if (localPart.startsWith(".") || localPart.endsWith(".")) {
    return false;
  }

  return !domainPart.startsWith(".") && !domainPart.endsWith(".");
}
