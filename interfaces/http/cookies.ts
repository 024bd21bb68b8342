export type SameSite = "strict" | "lax" | "none";

export type SessionCookieOptions = {
  name: string;
  domain: string | null;
  path: string;
  secure: boolean;
  httpOnly: boolean;
  sameSite: SameSite;
  maxAgeSeconds: number;
};

export const LOGIN_STATE_COOKIE_PATH = "/auth";

const EXPIRED = "Thu, 01 Jan 1970 00:00:00 GMT";

export function parseCookies(cookieHeader: string | null | undefined): Map<string, string> {
  const map = new Map<string, string>();
  if (!cookieHeader) {
    return map;
  }

  for (const part of cookieHeader.split(";")) {
    const trimmed = part.trim();
    if (!trimmed) {
      continue;
    }

    const separatorIndex = trimmed.indexOf("=");
    if (separatorIndex <= 0) {
      continue;
    }

    const name = trimmed.slice(0, separatorIndex).trim();
    const value = trimmed.slice(separatorIndex + 1).trim();
    if (!map.has(name)) {
      map.set(name, decodeCookieValue(value));
    }
  }

  return map;
}

export function buildSessionCookie(value: string, options: SessionCookieOptions): string {
  return serializeCookie(options.name, encodeURIComponent(value), options, [`Max-Age=${options.maxAgeSeconds}`]);
}

export function buildClearSessionCookie(options: SessionCookieOptions): string {
  return serializeCookie(options.name, "", options, ["Max-Age=0", `Expires=${EXPIRED}`]);
}

/** Always HttpOnly and Lax so the provider's top-level redirect carries it back. */
export function buildLoginStateCookie(
  name: string,
  value: string,
  maxAgeSeconds: number,
  secure: boolean,
): string {
  return serializeCookie(name, encodeURIComponent(value), loginStateAttributes(secure), [
    `Max-Age=${maxAgeSeconds}`,
  ]);
}

export function buildClearLoginStateCookie(name: string, secure: boolean): string {
  return serializeCookie(name, "", loginStateAttributes(secure), ["Max-Age=0", `Expires=${EXPIRED}`]);
}

function loginStateAttributes(secure: boolean): Omit<SessionCookieOptions, "name" | "maxAgeSeconds"> {
  return { domain: null, path: LOGIN_STATE_COOKIE_PATH, secure, httpOnly: true, sameSite: "lax" };
}

function serializeCookie(
  name: string,
  encodedValue: string,
  attributes: Omit<SessionCookieOptions, "name" | "maxAgeSeconds">,
  lifetime: string[],
): string {
  const parts = [`${name}=${encodedValue}`, `Path=${attributes.path}`];
  if (attributes.domain) {
    parts.push(`Domain=${attributes.domain}`);
  }
  if (attributes.httpOnly) {
    parts.push("HttpOnly");
  }
  parts.push(`SameSite=${formatSameSite(attributes.sameSite)}`);
  parts.push(...lifetime);
  if (attributes.secure) {
    parts.push("Secure");
  }
  return parts.join("; ");
}

function formatSameSite(sameSite: SameSite): string {
  if (sameSite === "strict") {
    return "Strict";
  }
  if (sameSite === "none") {
    return "None";
  }
  return "Lax";
}

function decodeCookieValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
