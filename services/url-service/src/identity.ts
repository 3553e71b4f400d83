import { randomUUID } from "crypto";
import type { FastifyReply, FastifyRequest } from "fastify";

export const USER_COOKIE = "UserID";
const COOKIE_MAX_AGE_SECONDS = 365 * 24 * 60 * 60;

declare module "fastify" {
  interface FastifyRequest {
    userId: string;
    /** Set when the request carried no valid identity cookie and one was just issued. */
    isNewUser: boolean;
  }
}

/**
 * Reads the signed identity cookie, or mints a user id and sets the cookie.
 * Needs @fastify/cookie registered with a secret.
 */
export function resolveUser(req: FastifyRequest, reply: FastifyReply): void {
  const raw = req.cookies[USER_COOKIE];
  if (raw !== undefined) {
    const unsigned = req.unsignCookie(raw);
    if (unsigned.valid && unsigned.value) {
      req.userId = unsigned.value;
      req.isNewUser = false;
      return;
    }
    req.log.debug("identity cookie failed verification, issuing a new one");
  }

  const userId = randomUUID();
  reply.setCookie(USER_COOKIE, userId, {
    signed: true,
    path: "/",
    httpOnly: true,
    sameSite: "lax",
    maxAge: COOKIE_MAX_AGE_SECONDS
  });
  req.userId = userId;
  req.isNewUser = true;
}
