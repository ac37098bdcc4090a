import { z } from "zod";
import { SqliteDatabase } from "../db/sqlite.js";
import { OUTBOX_SCHEMA } from "../events/outbox.js";
import { InvitableRoleSchema, RoleSchema } from "../policy.js";

const BOARD_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS boards (
     id TEXT PRIMARY KEY,
     name TEXT NOT NULL,
     description TEXT NOT NULL DEFAULT '',
     created_by TEXT NOT NULL,
     created_at TEXT NOT NULL
   )`,
  `CREATE TABLE IF NOT EXISTS board_members (
     board_id TEXT NOT NULL REFERENCES boards(id) ON DELETE CASCADE,
     user_id TEXT NOT NULL,
     role TEXT NOT NULL CHECK (role IN ('Admin', 'Member', 'Viewer')),
     PRIMARY KEY (board_id, user_id)
   )`,
  // Admin is only granted at creation, so a board never has more than one
  `CREATE UNIQUE INDEX IF NOT EXISTS unique_admin_per_board
     ON board_members (board_id) WHERE role = 'Admin'`,
  `CREATE TABLE IF NOT EXISTS invitations (
     id TEXT PRIMARY KEY,
     board_id TEXT NOT NULL REFERENCES boards(id) ON DELETE CASCADE,
     inviter_id TEXT NOT NULL,
     invitee_id TEXT NOT NULL,
     role TEXT NOT NULL CHECK (role IN ('Member', 'Viewer')),
     status TEXT NOT NULL DEFAULT 'Pending' CHECK (status IN ('Pending', 'Accepted', 'Rejected')),
     created_at TEXT NOT NULL
   )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS unique_pending_invitation
     ON invitations (board_id, invitee_id) WHERE status = 'Pending'`,
  `CREATE INDEX IF NOT EXISTS idx_invitations_invitee ON invitations (invitee_id, status)`,
  ...OUTBOX_SCHEMA,
];

/** Opens the boards database: boards, members, invitations and the outbox. */
export function openBoardDatabase(filePath?: string): Promise<SqliteDatabase> {
  return SqliteDatabase.open({ label: "boards", filePath, schema: BOARD_SCHEMA });
}

export const InvitationStatusSchema = z.enum(["Pending", "Accepted", "Rejected"]);
export type InvitationStatus = z.infer<typeof InvitationStatusSchema>;

export const BoardRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  created_by: z.string(),
  created_at: z.string(),
});
export type Board = z.infer<typeof BoardRowSchema>;

export const MemberRowSchema = z.object({
  user_id: z.string(),
  role: RoleSchema,
});
export type Member = z.infer<typeof MemberRowSchema>;

export const InvitationRowSchema = z.object({
  id: z.string(),
  board_id: z.string(),
  inviter_id: z.string(),
  invitee_id: z.string(),
  role: InvitableRoleSchema,
  status: InvitationStatusSchema,
  created_at: z.string(),
});
export type Invitation = z.infer<typeof InvitationRowSchema>;
