import { beforeEach, describe, expect, it } from "vitest";
import { createClock, expectServiceError, T0 } from "../../__tests__/helpers.js";
import { createBoardDeletedTopic } from "../../events/board-deleted.js";
import type { Role } from "../../policy.js";
import type { MembershipChecker, MembershipStatus } from "../membership.js";
import { TaskRegistry } from "../registry.js";
import { TaskStore } from "../store.js";

class FakeMembership implements MembershipChecker {
  private readonly roles = new Map<string, Role>();
  failure: Error | undefined;

  set(boardId: string, userId: string, role: Role | undefined): void {
    const key = `${boardId}:${userId}`;
    if (role) this.roles.set(key, role);
    else this.roles.delete(key);
  }

  async checkMembership(boardId: string, userId: string): Promise<MembershipStatus> {
    if (this.failure) throw this.failure;
    const role = this.roles.get(`${boardId}:${userId}`);
    return role ? { isMember: true, role } : { isMember: false };
  }
}

describe("TaskRegistry", () => {
  let store: TaskStore;
  let membership: FakeMembership;
  let tasks: TaskRegistry;

  beforeEach(async () => {
    store = await TaskStore.open();
    membership = new FakeMembership();
    tasks = new TaskRegistry(store, membership, createClock().nowIso);

    membership.set("b1", "admin", "Admin");
    membership.set("b1", "mia", "Member");
    membership.set("b1", "max", "Member");
    membership.set("b1", "vic", "Viewer");
  });

  describe("create", () => {
    it("defaults the stage to To Do and omits an absent assignee", async () => {
      const task = await tasks.create("mia", { boardId: "b1", title: "Write release notes" });

      expect(task).toEqual({
        id: task.id,
        board_id: "b1",
        title: "Write release notes",
        description: "",
        created_by: "mia",
        stage: "To Do",
        created_at: new Date(T0 + 1000).toISOString(),
        updated_at: new Date(T0 + 1000).toISOString(),
      });
      expect("assignee_id" in task).toBe(false);
      expect(store.findById(task.id)).toEqual(task);
    });

    it("keeps the assignee and an explicit stage", async () => {
      const task = await tasks.create("admin", {
        boardId: "b1",
        title: "Fix login",
        assigneeId: "max",
        stage: "In Progress",
      });
      expect(task.assignee_id).toBe("max");
      expect(task.stage).toBe("In Progress");
    });

    it("requires a board and a title", async () => {
      await expectServiceError(
        tasks.create("mia", { boardId: "b1", title: "" }),
        "InvalidArgument",
        "board_id and title are required"
      );
    });

    it("rejects an unknown stage", async () => {
      await expectServiceError(
        tasks.create("mia", { boardId: "b1", title: "x", stage: "Blocked" }),
        "InvalidArgument",
        "stage must be 'To Do', 'In Progress', or 'Done'"
      );
    });

    it("refuses Viewers and non-members", async () => {
      await expectServiceError(
        tasks.create("vic", { boardId: "b1", title: "x" }),
        "PermissionDenied",
        "access denied: only Admins and Members can create tasks"
      );
      await expectServiceError(
        tasks.create("zed", { boardId: "b1", title: "x" }),
        "PermissionDenied",
        "access denied: must be a board member"
      );
      expect(store.listByBoard("b1")).toEqual([]);
    });

    it("wraps a failing membership check as Internal", async () => {
      membership.failure = new Error("boards service unavailable");
      await expectServiceError(
        tasks.create("mia", { boardId: "b1", title: "x" }),
        "Internal",
        "failed to check membership"
      );
    });

    it("fails with Canceled when the signal has already fired", async () => {
      const controller = new AbortController();
      controller.abort();
      await expectServiceError(
        tasks.create("mia", { boardId: "b1", title: "x" }, controller.signal),
        "Canceled"
      );
      expect(store.listByBoard("b1")).toEqual([]);
    });
  });

  describe("update", () => {
    it("merges only the non-empty fields", async () => {
      const task = await tasks.create("mia", {
        boardId: "b1",
        title: "Draft",
        description: "first pass",
      });

      const updated = await tasks.update("mia", task.id, { title: "", stage: "Done", assigneeId: "max" });
      expect(updated).toEqual({
        ...task,
        assignee_id: "max",
        stage: "Done",
        updated_at: new Date(T0 + 2000).toISOString(),
      });
      expect(store.findById(task.id)).toEqual(updated);
    });

    it("lets an Admin update any task but a Member only their own", async () => {
      const task = await tasks.create("mia", { boardId: "b1", title: "Draft" });

      await expectServiceError(
        tasks.update("max", task.id, { title: "Hijacked" }),
        "PermissionDenied",
        "access denied: only Admin or creator can update task"
      );
      expect((await tasks.update("admin", task.id, { title: "Reviewed" })).title).toBe("Reviewed");
    });

    it("re-reads the role on every call", async () => {
      const task = await tasks.create("mia", { boardId: "b1", title: "Draft" });
      membership.set("b1", "mia", "Viewer");

      await expectServiceError(tasks.update("mia", task.id, { stage: "Done" }), "PermissionDenied");
      membership.set("b1", "mia", undefined);
      await expectServiceError(
        tasks.update("mia", task.id, { stage: "Done" }),
        "PermissionDenied",
        "access denied: must be a board member to update task"
      );
      expect(store.findById(task.id)?.stage).toBe("To Do");
    });

    it("rejects an unknown stage and a missing task", async () => {
      const task = await tasks.create("mia", { boardId: "b1", title: "Draft" });
      await expectServiceError(tasks.update("mia", task.id, { stage: "Later" }), "InvalidArgument");
      await expectServiceError(tasks.update("mia", "missing", { title: "x" }), "NotFound", "task not found");
    });
  });

  describe("list", () => {
    it("returns the board's tasks in creation order to any member", async () => {
      const first = await tasks.create("mia", { boardId: "b1", title: "First" });
      const second = await tasks.create("admin", { boardId: "b1", title: "Second" });
      membership.set("b2", "mia", "Member");
      await tasks.create("mia", { boardId: "b2", title: "Elsewhere" });

      const listed = await tasks.list("vic", "b1");
      expect(listed.map((t) => t.id)).toEqual([first.id, second.id]);
    });

    it("refuses non-members", async () => {
      await expectServiceError(
        tasks.list("zed", "b1"),
        "PermissionDenied",
        "access denied: must be a board member to list tasks"
      );
    });
  });

  describe("delete", () => {
    it("follows the same rule as update", async () => {
      const task = await tasks.create("mia", { boardId: "b1", title: "Draft" });

      await expectServiceError(
        tasks.delete("vic", task.id),
        "PermissionDenied",
        "access denied: only Admin or creator can delete task"
      );
      await expectServiceError(tasks.delete("max", task.id), "PermissionDenied");

      await tasks.delete("mia", task.id);
      expect(store.findById(task.id)).toBeUndefined();
      await expectServiceError(tasks.delete("mia", task.id), "NotFound", "task not found");
    });
  });

  describe("board deletion", () => {
    it("removes only the deleted board's tasks and tolerates repeats", async () => {
      membership.set("b2", "mia", "Member");
      await tasks.create("mia", { boardId: "b1", title: "One" });
      await tasks.create("mia", { boardId: "b1", title: "Two" });
      const kept = await tasks.create("mia", { boardId: "b2", title: "Other board" });

      expect(await tasks.deleteByBoard("b1")).toBe(2);
      expect(await tasks.deleteByBoard("b1")).toBe(0);
      expect(store.listByBoard("b1")).toEqual([]);
      expect(store.listByBoard("b2")).toEqual([kept]);
    });

    it("handles duplicate BoardDeleted events from the topic", async () => {
      const topic = createBoardDeletedTopic();
      tasks.subscribeToBoardDeletions(topic);
      await tasks.create("mia", { boardId: "b1", title: "One" });

      const first = await topic.publish({ board_id: "b1" });
      const second = await topic.publish({ board_id: "b1" });

      expect(first).toEqual({ delivered: ["delete-tasks-on-board-deletion"], failed: [] });
      expect(second).toEqual(first);
      expect(store.listByBoard("b1")).toEqual([]);
    });
  });
});
