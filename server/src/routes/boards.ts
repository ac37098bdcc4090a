import { Router, Request, Response } from "express";
import { z } from "zod";
import { requireUser } from "../auth.js";
import type { InvitationWorkflow } from "../boards/invitations.js";
import type { MembershipLedger } from "../boards/ledger.js";
import type { BoardRegistry } from "../boards/registry.js";
import { asyncHandler, parseBody } from "./http.js";

const CreateBoardSchema = z.object({
  name: z.string().default(""),
  description: z.string().default(""),
});

const InviteSchema = z.object({
  board_id: z.string().default(""),
  invitee_id: z.string().default(""),
  role: z.string().default(""),
});

const ResolveInvitationSchema = z.object({
  invitation_id: z.string().default(""),
  action: z.string().default(""),
});

export interface BoardRoutesDeps {
  registry: BoardRegistry;
  ledger: MembershipLedger;
  invitations: InvitationWorkflow;
}

export function createBoardsRouter({ registry, ledger, invitations }: BoardRoutesDeps): Router {
  const router = Router();

  // POST /board: create a board; the caller becomes its Admin
  router.post(
    "/board",
    asyncHandler(async (req: Request, res: Response) => {
      const { name, description } = parseBody(CreateBoardSchema, req.body);
      const board = await registry.create(name, description, requireUser(req), req.signal);
      res.status(201).json(board);
    })
  );

  // POST /board/invite: Admin invites a user as Member or Viewer
  router.post(
    "/board/invite",
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseBody(InviteSchema, req.body);
      const invitation = await invitations.create(
        body.board_id,
        requireUser(req),
        body.invitee_id,
        body.role,
        req.signal
      );
      res.status(201).json({ invitation_id: invitation.id });
    })
  );

  // PATCH /board/invitation: invitee accepts or rejects
  router.patch(
    "/board/invitation",
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseBody(ResolveInvitationSchema, req.body);
      const boardId = await invitations.resolve(
        body.invitation_id,
        requireUser(req),
        body.action,
        req.signal
      );
      res.json({ board_id: boardId });
    })
  );

  // GET /invitations/:status: caller's invitations with the given status
  router.get(
    "/invitations/:status",
    asyncHandler(async (req: Request, res: Response) => {
      const list = await invitations.listForUser(requireUser(req), req.params.status, req.signal);
      res.json({ invitations: list });
    })
  );

  router.get(
    "/board/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const board = await registry.get(req.params.id, requireUser(req), req.signal);
      res.json(board);
    })
  );

  router.delete(
    "/board/:id",
    asyncHandler(async (req: Request, res: Response) => {
      await registry.delete(req.params.id, requireUser(req), req.signal);
      res.json({ message: "Board deleted successfully" });
    })
  );

  router.get(
    "/board/:id/users",
    asyncHandler(async (req: Request, res: Response) => {
      const members = await ledger.listMembers(req.params.id, requireUser(req), req.signal);
      res.json({ members });
    })
  );

  // GET /board/:id/membership: the caller's own role, if any
  router.get(
    "/board/:id/membership",
    asyncHandler(async (req: Request, res: Response) => {
      const status = await registry.checkMembership(req.params.id, requireUser(req), req.signal);
      res.json(status.isMember ? { is_member: true, role: status.role } : { is_member: false });
    })
  );

  router.delete(
    "/board/:id/user/:uid",
    asyncHandler(async (req: Request, res: Response) => {
      await ledger.removeMember(req.params.id, req.params.uid, requireUser(req), req.signal);
      res.json({ message: "User removed successfully" });
    })
  );

  return router;
}
