export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type Logger = Record<LogLevel, (event: string, fields?: LogFields) => void>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SENSITIVE_KEY_PARTS = ["token", "secret", "password", "cookie", "authorization"];

export type JsonLoggerOptions = {
  level?: LogLevel;
  maskEmails?: boolean;
  now?: () => Date;
  write?: (level: LogLevel, line: string) => void;
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** One JSON object per line, masked. */
export function createJsonLogger(options: JsonLoggerOptions = {}): Logger {
  const minimum = LEVEL_ORDER[options.level ?? "info"];
  const maskEmails = options.maskEmails ?? true;
  const now = options.now ?? (() => new Date());
  const write = options.write ?? writeToConsole;

  const emit = (level: LogLevel) => (event: string, fields: LogFields = {}) => {
    if (LEVEL_ORDER[level] < minimum) {
      return;
    }

    write(
      level,
      JSON.stringify({
        level,
        event,
        ts: now().toISOString(),
        ...maskFields(fields, maskEmails),
      }),
    );
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export function parseLogLevel(raw: string | undefined): LogLevel | null {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return null;
}

export function maskFields(fields: LogFields, maskEmails: boolean): LogFields {
  const masked: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    masked[key] = maskValue(key, value, maskEmails);
  }
  return masked;
}

function maskValue(key: string, value: unknown, maskEmails: boolean): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }

  if (typeof value !== "string" || value === "") {
    return value;
  }

  const lowered = key.toLowerCase();
  if (lowered === "code" || SENSITIVE_KEY_PARTS.some((part) => lowered.includes(part))) {
    return maskSecret(value);
  }

  if (maskEmails && lowered.includes("email")) {
    return maskEmail(value);
  }

  return value;
}

export function maskSecret(value: string): string {
  if (value.length <= 8) {
    return "****";
  }
  return `****${value.slice(-4)}`;
}

export function maskEmail(value: string): string {
  const at = value.indexOf("@");
  if (at <= 0) {
    return maskSecret(value);
  }
  return `${value.slice(0, 1)}***${value.slice(at)}`;
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.info(line);
}
