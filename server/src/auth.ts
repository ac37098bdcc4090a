import type { Request, Response, NextFunction } from "express";
import { parse as parseCookies } from "cookie";
import jwt, { type JwtPayload } from "jsonwebtoken";
import { unauthenticated } from "./errors.js";

export const COOKIE_NAME = "taskboard-auth";

/** Tokens are valid for 24 hours from issue. */
export const TOKEN_TTL_SECONDS = 24 * 60 * 60;

const COOKIE_OPTIONS = {
  httpOnly: true,   // Not accessible via JS
  sameSite: "strict" as const,
  path: "/",
  maxAge: TOKEN_TTL_SECONDS * 1000,
};

/** Paths reachable without a token. */
const PUBLIC_PATHS = new Set(["/signup", "/login", "/logout", "/health"]);

/**
 * Issues and validates HS256 bearer tokens. The signing secret is injected
 * once at start-up.
 */
export class TokenAuthority {
  private readonly secret: string;
  private readonly now: () => number;

  constructor(secret: string, now: () => number = Date.now) {
    if (!secret) throw new Error("TokenAuthority requires a non-empty signing secret");
    this.secret = secret;
    this.now = now;
  }

  issue(userId: string, email: string): string {
    const iat = Math.floor(this.now() / 1000);
    return jwt.sign(
      { sub: userId, email, iat, exp: iat + TOKEN_TTL_SECONDS },
      this.secret,
      { algorithm: "HS256" }
    );
  }

  /** Returns the user id in `sub`, or throws Unauthenticated. */
  validate(token: string): string {
    if (!token) throw unauthenticated("token is required");

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: ["HS256"],
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch {
      throw unauthenticated("invalid or expired token");
    }

    if (typeof payload === "string" || typeof payload.sub !== "string" || !payload.sub) {
      throw unauthenticated("invalid token: missing or invalid user ID");
    }
    return payload.sub;
  }
}

/**
 * Express middleware that resolves the caller from the httpOnly cookie OR the
 * Bearer header and stores the id on `req.userId`. The cookie is tried first;
 * a missing or stale cookie falls back to the Bearer token.
 *
 * Public paths pass through untouched.
 */
export function createAuthMiddleware(authority: TokenAuthority) {
  return function authMiddleware(req: Request, res: Response, next: NextFunction): void {
    if (PUBLIC_PATHS.has(req.path)) {
      next();
      return;
    }

    const cookies = parseCookies(req.headers.cookie ?? "");
    const authHeader = req.headers.authorization;
    const candidates = [
      cookies[COOKIE_NAME],
      authHeader?.startsWith("Bearer ") ? authHeader.slice(7).trim() : undefined,
    ].filter((token): token is string => Boolean(token));

    if (candidates.length === 0) {
      next(unauthenticated());
      return;
    }

    let failure: unknown;
    for (const token of candidates) {
      try {
        req.userId = authority.validate(token);
        next();
        return;
      } catch (err) {
        failure = err;
      }
    }
    next(failure);
  };
}

/** Reads the id set by the auth middleware. */
export function requireUser(req: Request): string {
  if (!req.userId) throw unauthenticated();
  return req.userId;
}

/**
 * Sets the httpOnly auth cookie on the response.
 * Called by POST /login alongside returning the token in the body.
 */
export function setAuthCookie(res: Response, token: string): void {
  res.cookie(COOKIE_NAME, token, COOKIE_OPTIONS);
}

/** Clears the auth cookie. Called by POST /logout. */
export function clearAuthCookie(res: Response): void {
  res.clearCookie(COOKIE_NAME, { ...COOKIE_OPTIONS });
}
