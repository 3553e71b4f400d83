import type { IncomingHttpHeaders } from "http";
import { randomUUID } from "crypto";

export const REQUEST_ID_HEADER = "x-request-id";
const MAX_REQUEST_ID_LENGTH = 128;

function firstHeaderValue(raw: string | string[] | undefined): string {
  if (Array.isArray(raw)) return raw[0] ?? "";
  return raw ?? "";
}

/** Propagates a caller's X-Request-Id when it is usable; otherwise mints a UUID. */
export function getOrCreateRequestId(headers: IncomingHttpHeaders): string {
  const candidate = firstHeaderValue(headers[REQUEST_ID_HEADER]).trim();
  return candidate !== "" && candidate.length <= MAX_REQUEST_ID_LENGTH ? candidate : randomUUID();
}
