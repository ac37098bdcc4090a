import { z } from "zod";

export const ROLES = ["Admin", "Member", "Viewer"] as const;
export const RoleSchema = z.enum(ROLES);
export type Role = z.infer<typeof RoleSchema>;

/** Roles an invitation may grant. Admin is only assigned at board creation. */
export const InvitableRoleSchema = z.enum(["Member", "Viewer"]);

export type BoardAction =
  | "board:view"
  | "board:delete"
  | "board:invite"
  | "member:list"
  | "member:remove-any"
  | "member:remove-self"
  | "task:list"
  | "task:create"
  | "task:modify-any"
  | "task:modify-own";

// Role × action table. Non-members have no row and can do nothing.
const POLICY: Record<Role, ReadonlySet<BoardAction>> = {
  Admin: new Set<BoardAction>([
    "board:view",
    "board:delete",
    "board:invite",
    "member:list",
    "member:remove-any",
    "member:remove-self",
    "task:list",
    "task:create",
    "task:modify-any",
    "task:modify-own",
  ]),
  Member: new Set<BoardAction>([
    "board:view",
    "member:list",
    "member:remove-self",
    "task:list",
    "task:create",
    "task:modify-own",
  ]),
  Viewer: new Set<BoardAction>([
    "board:view",
    "member:list",
    "member:remove-self",
    "task:list",
  ]),
};

export function can(role: Role | undefined, action: BoardAction): boolean {
  if (!role) return false;
  return POLICY[role].has(action);
}

/**
 * Update/delete rule for a task: Admins may touch any task, Members only
 * their own, Viewers none.
 */
export function canModifyTask(role: Role | undefined, actorId: string, creatorId: string): boolean {
  if (can(role, "task:modify-any")) return true;
  return actorId === creatorId && can(role, "task:modify-own");
}

/** Remove-member rule: Admins may remove anyone, everyone else only themself. */
export function canRemoveMember(role: Role | undefined, actorId: string, targetId: string): boolean {
  if (can(role, "member:remove-any")) return true;
  return actorId === targetId && can(role, "member:remove-self");
}
