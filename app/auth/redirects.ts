/** Accepts only same-site absolute paths; anything else becomes `null`. */
export function sanitizeNextPath(rawNext: string | null | undefined): string | null {
  if (!rawNext) {
    return null;
  }

  const next = rawNext.trim();
  if (!next.startsWith("/")) {
    return null;
  }

  if (next.startsWith("//") || next.startsWith("/\\")) {
    return null;
  }

  return next;
}

export function buildFrontendRedirect(
  frontendUrl: string,
  path: string | null,
  params: Record<string, string | null | undefined> = {},
): string {
  const url = new URL(sanitizeNextPath(path) ?? "/", frontendUrl);
  for (const [key, value] of Object.entries(params)) {
    if (value) {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}
