export const MAX_URL_LENGTH = 2048;

export function validateHttpUrl(s: string): { ok: true; url: URL } | { ok: false; error: string } {
  if (s.length > MAX_URL_LENGTH) {
    return { ok: false, error: `url must be at most ${MAX_URL_LENGTH} characters` };
  }

  let parsed: URL;
  try {
    parsed = new URL(s);
  } catch {
    return { ok: false, error: "url must be a valid URL" };
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { ok: false, error: "url must be http/https" };
  }

  if (parsed.hostname === "") {
    return { ok: false, error: "url must have a host" };
  }

  return { ok: true, url: parsed };
}
