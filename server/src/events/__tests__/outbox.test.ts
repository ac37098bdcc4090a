import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createClock } from "../../__tests__/helpers.js";
import { SqliteDatabase } from "../../db/sqlite.js";
import { createBoardDeletedTopic, type BoardDeletedEvent } from "../board-deleted.js";
import { Outbox, OutboxRelay, OUTBOX_SCHEMA } from "../outbox.js";
import type { Topic } from "../topic.js";

describe("Outbox and OutboxRelay", () => {
  let outbox: Outbox;
  let topic: Topic<BoardDeletedEvent>;
  let relay: OutboxRelay;
  let received: BoardDeletedEvent[];
  let failWith: Error | undefined;

  beforeEach(async () => {
    const db = await SqliteDatabase.open({ label: "outbox-test", schema: OUTBOX_SCHEMA });
    outbox = new Outbox(db, createClock().nowIso);
    topic = createBoardDeletedTopic();
    relay = new OutboxRelay(outbox, [topic], 1000);
    received = [];
    failWith = undefined;
    topic.subscribe("recorder", async (e) => {
      if (failWith) throw failWith;
      received.push(e);
    });
  });

  afterEach(() => {
    relay.stop();
    vi.useRealTimers();
  });

  it("lists pending entries oldest first", () => {
    const a = outbox.append("board-deleted", { board_id: "b1" });
    const b = outbox.append("board-deleted", { board_id: "b2" });
    expect(outbox.pending().map((e) => e.id)).toEqual([a, b]);
    expect(outbox.get(a)).toMatchObject({ attempts: 0, last_error: null, delivered_at: null });
  });

  it("marks an entry delivered once every subscription succeeded", async () => {
    const id = outbox.append("board-deleted", { board_id: "b1" });

    expect(await relay.deliver(id)).toBe(true);
    expect(received).toEqual([{ board_id: "b1" }]);
    expect(outbox.get(id)).toMatchObject({ attempts: 1, last_error: null });
    expect(outbox.get(id)?.delivered_at).not.toBeNull();
    expect(outbox.pending()).toEqual([]);
  });

  it("does not publish an entry that was already delivered", async () => {
    const id = outbox.append("board-deleted", { board_id: "b1" });
    await relay.deliver(id);

    expect(await relay.deliver(id)).toBe(true);
    expect(received).toHaveLength(1);
  });

  it("records the failure and retries on the next flush", async () => {
    const id = outbox.append("board-deleted", { board_id: "b1" });
    failWith = new Error("boom");

    expect(await relay.deliver(id)).toBe(false);
    expect(outbox.get(id)).toMatchObject({ attempts: 1, last_error: "recorder: boom", delivered_at: null });

    failWith = undefined;
    expect(await relay.flush()).toBe(1);
    expect(outbox.get(id)).toMatchObject({ attempts: 2, last_error: null });
    expect(received).toEqual([{ board_id: "b1" }]);
  });

  it("fails entries whose topic is unknown or whose payload is invalid", async () => {
    const orphan = outbox.append("board-archived", { board_id: "b1" });
    const malformed = outbox.append("board-deleted", { id: "b1" });

    expect(await relay.deliver(orphan)).toBe(false);
    expect(outbox.get(orphan)?.last_error).toBe("no topic registered for board-archived");
    expect(await relay.deliver(malformed)).toBe(false);
    expect(outbox.get(malformed)?.attempts).toBe(1);
    expect(received).toEqual([]);
  });

  it("returns false for an unknown entry", async () => {
    expect(await relay.deliver("missing")).toBe(false);
  });

  it("drains the outbox on its interval once started", async () => {
    vi.useFakeTimers();
    outbox.append("board-deleted", { board_id: "b1" });

    relay.start();
    expect(received).toEqual([]);
    await vi.advanceTimersByTimeAsync(1000);

    expect(received).toEqual([{ board_id: "b1" }]);
    expect(outbox.pending()).toEqual([]);
  });
});
