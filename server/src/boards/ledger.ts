import { z } from "zod";
import type { SqliteDatabase } from "../db/sqlite.js";
import {
  checkSignal,
  failedPrecondition,
  notFound,
  permissionDenied,
  wrapInternal,
} from "../errors.js";
import { can, canRemoveMember, RoleSchema, type Role } from "../policy.js";
import { MemberRowSchema, type Member } from "./store.js";

const RoleRowSchema = z.object({ role: RoleSchema });
const CountRowSchema = z.object({ count: z.number() });

/**
 * Authoritative roster of who belongs to which board, and as what.
 *
 * The synchronous methods are building blocks for transactions owned by the
 * board registry and the invitation workflow. The async ones are complete
 * operations with their own authorization.
 */
export class MembershipLedger {
  private readonly db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.db = db;
  }

  /** Inserts the pair unless it already exists. Returns true when a row was added. */
  addMember(boardId: string, userId: string, role: Role): boolean {
    const inserted = this.db.execute(
      `INSERT INTO board_members (board_id, user_id, role)
       VALUES (?, ?, ?)
       ON CONFLICT (board_id, user_id) DO NOTHING`,
      [boardId, userId, role]
    );
    return inserted > 0;
  }

  roleOf(boardId: string, userId: string): Role | undefined {
    return this.db.queryOne(
      RoleRowSchema,
      `SELECT role FROM board_members WHERE board_id = ? AND user_id = ?`,
      [boardId, userId]
    )?.role;
  }

  countAdmins(boardId: string): number {
    const row = this.db.queryOne(
      CountRowSchema,
      `SELECT COUNT(*) AS count FROM board_members WHERE board_id = ? AND role = 'Admin'`,
      [boardId]
    );
    return row?.count ?? 0;
  }

  /**
   * Removes `userId` from the board on behalf of `actingUserId`. The delete is
   * conditional on another Admin remaining, so the last Admin can never be
   * removed even if two removals race.
   */
  async removeMember(
    boardId: string,
    userId: string,
    actingUserId: string,
    signal?: AbortSignal
  ): Promise<void> {
    checkSignal(signal);
    await wrapInternal("failed to remove user", () =>
      this.db.transaction(() => {
        const actorRole = this.roleOf(boardId, actingUserId);
        if (!actorRole) {
          throw permissionDenied("access denied: not a member or insufficient permissions");
        }
        if (!canRemoveMember(actorRole, actingUserId, userId)) {
          throw permissionDenied("only Admin or the user themselves can remove a user");
        }

        if (!this.roleOf(boardId, userId)) {
          throw notFound("user not a member of this board");
        }

        const removed = this.db.execute(
          `DELETE FROM board_members
           WHERE board_id = ? AND user_id = ?
             AND (role <> 'Admin'
                  OR (SELECT COUNT(*) FROM board_members WHERE board_id = ? AND role = 'Admin') > 1)`,
          [boardId, userId, boardId]
        );
        if (removed === 0) {
          throw failedPrecondition("cannot remove the last Admin");
        }
      })
    );
    console.log(`[boards] ${actingUserId} removed ${userId} from board ${boardId}`);
  }

  /** Members of the board ordered by role, then user id. Members only. */
  async listMembers(boardId: string, actingUserId: string, signal?: AbortSignal): Promise<Member[]> {
    checkSignal(signal);
    return wrapInternal("failed to fetch members", () => {
      if (!can(this.roleOf(boardId, actingUserId), "member:list")) {
        throw permissionDenied("access denied: not a member of this board");
      }
      return this.db.queryAll(
        MemberRowSchema,
        `SELECT user_id, role FROM board_members WHERE board_id = ? ORDER BY role, user_id`,
        [boardId]
      );
    });
  }
}
