import { v4 as uuidv4 } from "uuid";
import {
  checkSignal,
  invalidArgument,
  notFound,
  permissionDenied,
  wrapInternal,
} from "../errors.js";
import type { BoardDeletedEvent } from "../events/board-deleted.js";
import type { Topic } from "../events/topic.js";
import { can, canModifyTask, type Role } from "../policy.js";
import type { MembershipChecker } from "./membership.js";
import { StageSchema, type Stage, type Task, type TaskStore } from "./store.js";

export const BOARD_DELETED_SUBSCRIPTION = "delete-tasks-on-board-deletion";

export interface CreateTaskInput {
  boardId: string;
  title: string;
  description?: string;
  assigneeId?: string;
  stage?: string;
}

/** Empty or absent fields keep the stored value. */
export interface UpdateTaskInput {
  title?: string;
  description?: string;
  assigneeId?: string;
  stage?: string;
}

function parseStage(stage: string): Stage {
  const parsed = StageSchema.safeParse(stage);
  if (!parsed.success) {
    throw invalidArgument("stage must be 'To Do', 'In Progress', or 'Done'");
  }
  return parsed.data;
}

/**
 * Task records. Every operation asks the MembershipChecker for the caller's
 * current role; nothing is cached between calls.
 */
export class TaskRegistry {
  private readonly store: TaskStore;
  private readonly membership: MembershipChecker;
  private readonly nowIso: () => string;

  constructor(store: TaskStore, membership: MembershipChecker, nowIso: () => string) {
    this.store = store;
    this.membership = membership;
    this.nowIso = nowIso;
  }

  async create(actorId: string, input: CreateTaskInput, signal?: AbortSignal): Promise<Task> {
    if (!input.boardId || !input.title) {
      throw invalidArgument("board_id and title are required");
    }

    const role = await this.roleOf(input.boardId, actorId, signal);
    if (!role) throw permissionDenied("access denied: must be a board member");
    if (!can(role, "task:create")) {
      throw permissionDenied("access denied: only Admins and Members can create tasks");
    }

    const stage = parseStage(input.stage || "To Do");
    checkSignal(signal);

    const now = this.nowIso();
    const task: Task = {
      id: uuidv4(),
      board_id: input.boardId,
      title: input.title,
      description: input.description ?? "",
      created_by: actorId,
      ...(input.assigneeId ? { assignee_id: input.assigneeId } : {}),
      stage,
      created_at: now,
      updated_at: now,
    };
    await wrapInternal("failed to create task", () => this.store.insert(task));
    return task;
  }

  async update(
    actorId: string,
    taskId: string,
    patch: UpdateTaskInput,
    signal?: AbortSignal
  ): Promise<Task> {
    checkSignal(signal);
    const current = await wrapInternal("failed to fetch task", () => this.store.findById(taskId));
    if (!current) throw notFound("task not found");

    const role = await this.roleOf(current.board_id, actorId, signal);
    if (!role) throw permissionDenied("access denied: must be a board member to update task");
    if (!canModifyTask(role, actorId, current.created_by)) {
      throw permissionDenied("access denied: only Admin or creator can update task");
    }

    const assignee = patch.assigneeId || current.assignee_id;
    const next: Task = {
      ...current,
      title: patch.title || current.title,
      description: patch.description || current.description,
      ...(assignee ? { assignee_id: assignee } : {}),
      stage: patch.stage ? parseStage(patch.stage) : current.stage,
      updated_at: this.nowIso(),
    };
    checkSignal(signal);

    const written = await wrapInternal("failed to update task", () => this.store.update(next));
    // The board-deleted cascade may have removed the row since it was read
    if (!written) throw notFound("task not found");
    return next;
  }

  /** Every task of the board in creation order. Open to any member, Viewers included. */
  async list(actorId: string, boardId: string, signal?: AbortSignal): Promise<Task[]> {
    const role = await this.roleOf(boardId, actorId, signal);
    if (!can(role, "task:list")) {
      throw permissionDenied("access denied: must be a board member to list tasks");
    }
    checkSignal(signal);
    return wrapInternal("failed to fetch tasks", () => this.store.listByBoard(boardId));
  }

  async delete(actorId: string, taskId: string, signal?: AbortSignal): Promise<void> {
    checkSignal(signal);
    const current = await wrapInternal("failed to fetch task", () => this.store.findById(taskId));
    if (!current) throw notFound("task not found");

    const role = await this.roleOf(current.board_id, actorId, signal);
    if (!role) throw permissionDenied("access denied: must be a board member to delete task");
    if (!canModifyTask(role, actorId, current.created_by)) {
      throw permissionDenied("access denied: only Admin or creator can delete task");
    }
    checkSignal(signal);

    const deleted = await wrapInternal("failed to delete task", () => this.store.delete(taskId));
    if (!deleted) throw notFound("task not found");
  }

  /**
   * Removes every task of a deleted board. Safe to call repeatedly; a board
   * with no tasks left is a success.
   */
  async deleteByBoard(boardId: string): Promise<number> {
    const removed = await wrapInternal("failed to delete tasks for board", () =>
      this.store.deleteByBoard(boardId)
    );
    console.log(`[tasks] Removed ${removed} task(s) of deleted board ${boardId}`);
    return removed;
  }

  subscribeToBoardDeletions(topic: Topic<BoardDeletedEvent>): void {
    topic.subscribe(BOARD_DELETED_SUBSCRIPTION, async (event) => {
      await this.deleteByBoard(event.board_id);
    });
  }

  private async roleOf(boardId: string, userId: string, signal?: AbortSignal): Promise<Role | undefined> {
    const status = await wrapInternal("failed to check membership", () =>
      this.membership.checkMembership(boardId, userId, signal)
    );
    return status.isMember ? status.role : undefined;
  }
}
