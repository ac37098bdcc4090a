import express, { type Express } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { createAuthMiddleware } from "./auth.js";
import { errorHandler, notFound } from "./errors.js";
import { createBoardsRouter } from "./routes/boards.js";
import { createHealthRouter } from "./routes/health.js";
import { requestContext } from "./routes/http.js";
import { createTasksRouter } from "./routes/tasks.js";
import { createUsersRouter } from "./routes/users.js";
import type { Services } from "./services.js";

export interface AppOptions {
  allowedOrigins: string[];
  requestTimeoutMs: number;
}

export function createApp(services: Services, options: AppOptions): Express {
  const app = express();

  app.use(
    cors({
      origin: options.allowedOrigins,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "100kb" }));

  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000,
      max: 1000,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many requests, please slow down", code: "PermissionDenied" },
    })
  );

  app.use(requestContext(options.requestTimeoutMs));
  app.use(createAuthMiddleware(services.tokens));

  app.use(createHealthRouter(services.outbox));
  app.use(createUsersRouter(services.users));
  app.use(
    createBoardsRouter({
      registry: services.boards,
      ledger: services.ledger,
      invitations: services.invitations,
    })
  );
  app.use(createTasksRouter(services.tasks));

  app.use((req, _res, next) => {
    next(notFound(`no route for ${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
