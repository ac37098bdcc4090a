import { Router, Request, Response } from "express";
import { z } from "zod";
import { requireUser } from "../auth.js";
import type { TaskRegistry } from "../tasks/registry.js";
import { asyncHandler, parseBody } from "./http.js";

const CreateTaskSchema = z.object({
  board_id: z.string().default(""),
  title: z.string().default(""),
  description: z.string().optional(),
  assignee_id: z.string().optional(),
  stage: z.string().optional(),
});

const UpdateTaskSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  assignee_id: z.string().optional(),
  stage: z.string().optional(),
});

export function createTasksRouter(tasks: TaskRegistry): Router {
  const router = Router();

  router.post(
    "/task",
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseBody(CreateTaskSchema, req.body);
      const task = await tasks.create(
        requireUser(req),
        {
          boardId: body.board_id,
          title: body.title,
          description: body.description,
          assigneeId: body.assignee_id,
          stage: body.stage,
        },
        req.signal
      );
      res.status(201).json(task);
    })
  );

  // PUT /task/:id: partial merge; empty fields keep their stored value
  router.put(
    "/task/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseBody(UpdateTaskSchema, req.body);
      const task = await tasks.update(
        requireUser(req),
        req.params.id,
        {
          title: body.title,
          description: body.description,
          assigneeId: body.assignee_id,
          stage: body.stage,
        },
        req.signal
      );
      res.json(task);
    })
  );

  router.get(
    "/board/:id/tasks",
    asyncHandler(async (req: Request, res: Response) => {
      const list = await tasks.list(requireUser(req), req.params.id, req.signal);
      res.json({ tasks: list });
    })
  );

  router.delete(
    "/task/:id",
    asyncHandler(async (req: Request, res: Response) => {
      await tasks.delete(requireUser(req), req.params.id, req.signal);
      res.json({ message: "Task deleted successfully" });
    })
  );

  return router;
}
