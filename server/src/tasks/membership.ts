import type { Role } from "../policy.js";

export type MembershipStatus = { isMember: true; role: Role } | { isMember: false };

/**
 * The only view the task service has of board membership. Implemented
 * in-process by BoardRegistry; a networked implementation would call
 * GET /board/:id/membership on the caller's behalf.
 */
export interface MembershipChecker {
  checkMembership(boardId: string, userId: string, signal?: AbortSignal): Promise<MembershipStatus>;
}
