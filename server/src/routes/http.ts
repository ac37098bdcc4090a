import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { z } from "zod";
import { invalidArgument } from "../errors.js";

/** Forwards a rejected handler promise to the error middleware. */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

/**
 * Attaches `req.signal`, aborted when the client disconnects before the
 * response is written or when the request outlives `timeoutMs`.
 */
export function requestContext(timeoutMs: number): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new Error(`request exceeded ${timeoutMs}ms`));
    }, timeoutMs);

    res.on("close", () => {
      clearTimeout(timer);
      if (!res.writableFinished) controller.abort(new Error("client disconnected"));
    });

    req.signal = controller.signal;
    next();
  };
}

/** Validates a JSON body, failing InvalidArgument with per-field messages. */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const details: Record<string, string[]> = {};
    for (const issue of parsed.error.issues) {
      const field = issue.path.join(".") || "body";
      (details[field] ??= []).push(issue.message);
    }
    throw invalidArgument("invalid request body", details);
  }
  return parsed.data;
}
