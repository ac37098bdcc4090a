import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { isUniqueViolation, type SqliteDatabase } from "../db/sqlite.js";
import {
  alreadyExists,
  checkSignal,
  failedPrecondition,
  invalidArgument,
  notFound,
  permissionDenied,
  wrapInternal,
} from "../errors.js";
import { can, InvitableRoleSchema } from "../policy.js";
import type { UserDirectory } from "../users/service.js";
import type { MembershipLedger } from "./ledger.js";
import {
  InvitationRowSchema,
  InvitationStatusSchema,
  type Invitation,
} from "./store.js";

export const DecisionSchema = z.enum(["Accepted", "Rejected"]);
export type Decision = z.infer<typeof DecisionSchema>;

const InvitationSummarySchema = z.object({
  invitation_id: z.string(),
  board_id: z.string(),
  board_name: z.string(),
  inviter_id: z.string(),
  role: InvitableRoleSchema,
  created_at: z.string(),
});
export type InvitationSummary = z.infer<typeof InvitationSummarySchema>;

/**
 * Pending → Accepted | Rejected. Both outcomes are terminal; the status
 * update is conditional on the row still being Pending.
 */
export class InvitationWorkflow {
  private readonly db: SqliteDatabase;
  private readonly ledger: MembershipLedger;
  private readonly users: UserDirectory;
  private readonly nowIso: () => string;

  constructor(
    db: SqliteDatabase,
    ledger: MembershipLedger,
    users: UserDirectory,
    nowIso: () => string
  ) {
    this.db = db;
    this.ledger = ledger;
    this.users = users;
    this.nowIso = nowIso;
  }

  async create(
    boardId: string,
    inviterId: string,
    inviteeId: string,
    role: string,
    signal?: AbortSignal
  ): Promise<Invitation> {
    if (!boardId || !inviteeId || !role) {
      throw invalidArgument("board_id, invitee_id, and role are required");
    }
    checkSignal(signal);

    const inviterRole = await wrapInternal("failed to check membership", () =>
      this.ledger.roleOf(boardId, inviterId)
    );
    if (!can(inviterRole, "board:invite")) {
      throw permissionDenied("only Admin can invite users");
    }

    const parsedRole = InvitableRoleSchema.safeParse(role);
    if (!parsedRole.success) {
      throw invalidArgument("role must be 'Member' or 'Viewer'");
    }

    const inviteeExists = await wrapInternal("failed to look up invitee", () =>
      this.users.exists(inviteeId, signal)
    );
    if (!inviteeExists) throw notFound("invitee not found");
    checkSignal(signal);

    const invitation: Invitation = {
      id: uuidv4(),
      board_id: boardId,
      inviter_id: inviterId,
      invitee_id: inviteeId,
      role: parsedRole.data,
      status: "Pending",
      created_at: this.nowIso(),
    };

    await wrapInternal("failed to create invitation", () =>
      this.db.transaction(() => {
        // Re-checked here: the board or the inviter's role may have gone
        // while the invitee lookup was in flight.
        if (!can(this.ledger.roleOf(boardId, inviterId), "board:invite")) {
          throw permissionDenied("only Admin can invite users");
        }
        if (this.ledger.roleOf(boardId, inviteeId)) {
          throw failedPrecondition("user is already a member of this board");
        }
        try {
          this.db.execute(
            `INSERT INTO invitations (id, board_id, inviter_id, invitee_id, role, status, created_at)
             VALUES (?, ?, ?, ?, ?, 'Pending', ?)`,
            [
              invitation.id,
              invitation.board_id,
              invitation.inviter_id,
              invitation.invitee_id,
              invitation.role,
              invitation.created_at,
            ]
          );
        } catch (err) {
          if (isUniqueViolation(err)) {
            throw alreadyExists("a pending invitation already exists for this user");
          }
          throw err;
        }
      })
    );

    console.log(`[boards] ${inviterId} invited ${inviteeId} to board ${boardId} as ${invitation.role}`);
    return invitation;
  }

  /**
   * Accepts or rejects an invitation addressed to `actingUserId`. On
   * acceptance the membership row is written first, in the same transaction
   * as the status change. Returns the board id.
   */
  async resolve(
    invitationId: string,
    actingUserId: string,
    decision: string,
    signal?: AbortSignal
  ): Promise<string> {
    if (!invitationId || !decision) {
      throw invalidArgument("invitation_id and action are required");
    }
    const parsedDecision = DecisionSchema.safeParse(decision);
    if (!parsedDecision.success) {
      throw invalidArgument("action must be 'Accepted' or 'Rejected'");
    }
    checkSignal(signal);

    const boardId = await wrapInternal("failed to update invitation status", () =>
      this.db.transaction(() => {
        const invitation = this.db.queryOne(
          InvitationRowSchema,
          `SELECT id, board_id, inviter_id, invitee_id, role, status, created_at
           FROM invitations
           WHERE id = ? AND invitee_id = ?`,
          [invitationId, actingUserId]
        );
        if (!invitation) {
          throw notFound("invitation not found or not for this user");
        }
        if (invitation.status !== "Pending") {
          throw failedPrecondition("invitation already processed");
        }

        if (parsedDecision.data === "Accepted") {
          this.ledger.addMember(invitation.board_id, actingUserId, invitation.role);
        }

        const updated = this.db.execute(
          `UPDATE invitations SET status = ? WHERE id = ? AND status = 'Pending'`,
          [parsedDecision.data, invitationId]
        );
        if (updated === 0) {
          throw failedPrecondition("invitation already processed");
        }
        return invitation.board_id;
      })
    );

    console.log(`[boards] Invitation ${invitationId} ${parsedDecision.data.toLowerCase()} by ${actingUserId}`);
    return boardId;
  }

  /** Invitations addressed to the caller with the given status, newest first. */
  async listForUser(
    userId: string,
    status: string,
    signal?: AbortSignal
  ): Promise<InvitationSummary[]> {
    const parsedStatus = InvitationStatusSchema.safeParse(status);
    if (!parsedStatus.success) {
      throw invalidArgument("status must be 'Pending', 'Accepted', or 'Rejected'");
    }
    checkSignal(signal);

    return wrapInternal("failed to fetch invitations", () =>
      this.db.queryAll(
        InvitationSummarySchema,
        `SELECT i.id AS invitation_id, i.board_id, b.name AS board_name,
                i.inviter_id, i.role, i.created_at
         FROM invitations i
         JOIN boards b ON i.board_id = b.id
         WHERE i.invitee_id = ? AND i.status = ?
         ORDER BY i.created_at DESC, i.rowid DESC`,
        [userId, parsedStatus.data]
      )
    );
  }
}
