import { Router, Request, Response } from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { clearAuthCookie, requireUser, setAuthCookie } from "../auth.js";
import type { UserService } from "../users/service.js";
import { asyncHandler, parseBody } from "./http.js";

const CredentialsSchema = z.object({
  email: z.string().default(""),
  password: z.string().default(""),
});

/**
 * Rate limiter for the login endpoint.
 * Max 10 attempts per 15 minutes per IP; only failed attempts count.
 */
const loginRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 10,
  skipSuccessfulRequests: true,
  standardHeaders: "draft-7",
  legacyHeaders: false,
  message: { error: "Too many login attempts, try again in 15 minutes", code: "PermissionDenied" },
});

/**
 * POST /signup   { email, password } → 201 { id, email, created_at }
 * POST /login    { email, password } → { token }, also sets the auth cookie
 * POST /logout   clears the auth cookie
 * GET  /me       the caller's user record
 */
export function createUsersRouter(users: UserService): Router {
  const router = Router();

  router.post(
    "/signup",
    asyncHandler(async (req: Request, res: Response) => {
      const { email, password } = parseBody(CredentialsSchema, req.body);
      const user = await users.signup(email, password, req.signal);
      res.status(201).json(user);
    })
  );

  router.post(
    "/login",
    loginRateLimiter,
    asyncHandler(async (req: Request, res: Response) => {
      const { email, password } = parseBody(CredentialsSchema, req.body);
      const token = await users.login(email, password, req.signal);
      setAuthCookie(res, token);
      res.json({ token });
    })
  );

  router.post("/logout", (_req: Request, res: Response) => {
    clearAuthCookie(res);
    res.json({ ok: true });
  });

  router.get(
    "/me",
    asyncHandler(async (req: Request, res: Response) => {
      const user = await users.getUser(requireUser(req), req.signal);
      res.json(user);
    })
  );

  return router;
}
