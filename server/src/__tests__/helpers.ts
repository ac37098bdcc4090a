import { expect } from "vitest";
import { InvitationWorkflow } from "../boards/invitations.js";
import { MembershipLedger } from "../boards/ledger.js";
import { BoardRegistry } from "../boards/registry.js";
import { openBoardDatabase } from "../boards/store.js";
import { ServiceError, type ErrorCode } from "../errors.js";
import { createBoardDeletedTopic } from "../events/board-deleted.js";
import { Outbox, OutboxRelay } from "../events/outbox.js";
import type { UserDirectory } from "../users/service.js";

export const T0 = Date.parse("2026-01-01T00:00:00.000Z");

/**
 * Deterministic clock. Every `nowIso()` call moves time forward one second so
 * rows created in sequence get distinct, ordered timestamps.
 */
export function createClock(start = T0) {
  let current = start;
  return {
    now: () => current,
    nowIso: () => {
      current += 1000;
      return new Date(current).toISOString();
    },
  };
}

/** Awaits `promise` and asserts it rejected with a ServiceError of `code`. */
export async function expectServiceError(
  promise: Promise<unknown>,
  code: ErrorCode,
  message?: string
): Promise<ServiceError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  expect(err).toBeInstanceOf(ServiceError);
  if (!(err instanceof ServiceError)) throw new Error("unreachable");
  expect(err.code).toBe(code);
  if (message !== undefined) expect(err.message).toBe(message);
  return err;
}

/** Board service pieces over an in-memory database, with a fixed user directory. */
export async function createBoardFixture(knownUsers: string[] = ["alice", "bob", "carol", "dave"]) {
  const clock = createClock();
  const db = await openBoardDatabase();
  const topic = createBoardDeletedTopic();
  const outbox = new Outbox(db, clock.nowIso);
  const relay = new OutboxRelay(outbox, [topic], 60_000);
  const ledger = new MembershipLedger(db);
  const users: UserDirectory = { exists: async (id) => knownUsers.includes(id) };
  const invitations = new InvitationWorkflow(db, ledger, users, clock.nowIso);
  const registry = new BoardRegistry({ db, ledger, outbox, dispatcher: relay, nowIso: clock.nowIso });
  return { clock, db, topic, outbox, relay, ledger, invitations, registry };
}
