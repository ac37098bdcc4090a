import { Router, Request, Response } from "express";
import type { Outbox } from "../events/outbox.js";

export function createHealthRouter(outbox: Outbox): Router {
  const router = Router();

  // GET /health: liveness plus the number of board-deleted events still awaiting delivery
  router.get("/health", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      uptime: process.uptime(),
      pendingEvents: outbox.pending().length,
    });
  });

  return router;
}
