import { v4 as uuidv4 } from "uuid";
import type { SqliteDatabase } from "../db/sqlite.js";
import {
  checkSignal,
  internal,
  invalidArgument,
  notFound,
  permissionDenied,
  wrapInternal,
} from "../errors.js";
import { BOARD_DELETED_TOPIC, type BoardDeletedEvent } from "../events/board-deleted.js";
import type { EventDispatcher, Outbox } from "../events/outbox.js";
import { can } from "../policy.js";
import type { MembershipChecker, MembershipStatus } from "../tasks/membership.js";
import type { MembershipLedger } from "./ledger.js";
import { BoardRowSchema, type Board } from "./store.js";

interface BoardRegistryDeps {
  db: SqliteDatabase;
  ledger: MembershipLedger;
  outbox: Outbox;
  dispatcher: EventDispatcher;
  nowIso: () => string;
}

/**
 * Board rows and their lifecycle. Also the source of truth behind the
 * MembershipChecker capability handed to the task service.
 */
export class BoardRegistry implements MembershipChecker {
  private readonly db: SqliteDatabase;
  private readonly ledger: MembershipLedger;
  private readonly outbox: Outbox;
  private readonly dispatcher: EventDispatcher;
  private readonly nowIso: () => string;

  constructor(deps: BoardRegistryDeps) {
    this.db = deps.db;
    this.ledger = deps.ledger;
    this.outbox = deps.outbox;
    this.dispatcher = deps.dispatcher;
    this.nowIso = deps.nowIso;
  }

  /** Inserts the board and its creator's Admin membership as one transaction. */
  async create(
    name: string,
    description: string,
    creatorId: string,
    signal?: AbortSignal
  ): Promise<Board> {
    const trimmedName = name.trim();
    if (!trimmedName) throw invalidArgument("name is required");
    checkSignal(signal);

    const board: Board = {
      id: uuidv4(),
      name: trimmedName,
      description: description.trim(),
      created_by: creatorId,
      created_at: this.nowIso(),
    };

    await wrapInternal("failed to create board", () =>
      this.db.transaction(() => {
        this.db.execute(
          `INSERT INTO boards (id, name, description, created_by, created_at) VALUES (?, ?, ?, ?, ?)`,
          [board.id, board.name, board.description, board.created_by, board.created_at]
        );
        if (!this.ledger.addMember(board.id, creatorId, "Admin")) {
          throw internal("failed to assign admin role");
        }
      })
    );

    console.log(`[boards] ${creatorId} created board ${board.id}`);
    return board;
  }

  /** Board details, visible to members only. */
  async get(boardId: string, actingUserId: string, signal?: AbortSignal): Promise<Board> {
    checkSignal(signal);
    return wrapInternal("failed to fetch board", () => {
      if (!can(this.ledger.roleOf(boardId, actingUserId), "board:view")) {
        throw permissionDenied("access denied: not a member of this board");
      }
      const board = this.db.queryOne(
        BoardRowSchema,
        `SELECT id, name, description, created_by, created_at FROM boards WHERE id = ?`,
        [boardId]
      );
      if (!board) throw notFound("board not found");
      return board;
    });
  }

  /**
   * Deletes the board (members and invitations cascade with it) and records a
   * BoardDeleted outbox entry in the same transaction, then attempts delivery.
   *
   * If delivery fails the caller gets Internal although the board is already
   * gone; the entry stays in the outbox and the relay retries it.
   */
  async delete(boardId: string, actingUserId: string, signal?: AbortSignal): Promise<void> {
    checkSignal(signal);

    const entryId = await wrapInternal("failed to delete board", () =>
      this.db.transaction(() => {
        if (!can(this.ledger.roleOf(boardId, actingUserId), "board:delete")) {
          throw permissionDenied("only Admin can delete a board");
        }
        const deleted = this.db.execute(`DELETE FROM boards WHERE id = ?`, [boardId]);
        if (deleted === 0) throw notFound("board not found");

        const event: BoardDeletedEvent = { board_id: boardId };
        return this.outbox.append(BOARD_DELETED_TOPIC, event);
      })
    );
    console.log(`[boards] ${actingUserId} deleted board ${boardId}`);

    const delivered = await wrapInternal("failed to publish board deletion event", () =>
      this.dispatcher.deliver(entryId)
    );
    if (!delivered) {
      throw internal("failed to publish board deletion event");
    }
  }

  async checkMembership(
    boardId: string,
    userId: string,
    signal?: AbortSignal
  ): Promise<MembershipStatus> {
    checkSignal(signal);
    const role = await wrapInternal("failed to check membership", () =>
      this.ledger.roleOf(boardId, userId)
    );
    return role ? { isMember: true, role } : { isMember: false };
  }
}
