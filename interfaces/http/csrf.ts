import { normalizeOrigin } from "./config.js";

/** Origin, else Referer, must belong to one of the allowed origins. */
export function isAllowedOriginForStateChange(args: {
  originHeader: string | null | undefined;
  refererHeader: string | null | undefined;
  allowedOrigins: readonly string[];
}): boolean {
  const allowed = new Set(
    args.allowedOrigins.map(safelyNormalizeOrigin).filter((origin): origin is string => origin !== null),
  );

  const originHeader = args.originHeader?.trim();
  if (originHeader) {
    const origin = safelyNormalizeOrigin(originHeader);
    return origin !== null && allowed.has(origin);
  }

  const refererHeader = args.refererHeader?.trim();
  if (refererHeader) {
    const refererOrigin = safelyNormalizeOrigin(refererHeader);
    return refererOrigin !== null && allowed.has(refererOrigin);
  }

  return false;
}

function safelyNormalizeOrigin(raw: string): string | null {
  try {
    return normalizeOrigin(raw);
  } catch {
    return null;
  }
}
