import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { SqliteDatabase } from "../db/sqlite.js";
import type { PublishTarget } from "./topic.js";

/** Outbox table, created in the same database as the rows whose changes it records. */
export const OUTBOX_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS outbox (
     id TEXT PRIMARY KEY,
     topic TEXT NOT NULL,
     payload TEXT NOT NULL,
     created_at TEXT NOT NULL,
     attempts INTEGER NOT NULL DEFAULT 0,
     last_error TEXT,
     delivered_at TEXT
   )`,
  `CREATE INDEX IF NOT EXISTS idx_outbox_pending ON outbox (delivered_at, created_at)`,
] as const;

const OutboxRowSchema = z.object({
  id: z.string(),
  topic: z.string(),
  payload: z.string(),
  created_at: z.string(),
  attempts: z.number(),
  last_error: z.string().nullable(),
  delivered_at: z.string().nullable(),
});

export type OutboxEntry = z.infer<typeof OutboxRowSchema>;

const SELECT_COLUMNS = `id, topic, payload, created_at, attempts, last_error, delivered_at`;

/**
 * Durable record of events still to be published. `append` is meant to run
 * inside the caller's transaction so the event commits or rolls back with
 * the change it describes.
 */
export class Outbox {
  private readonly db: SqliteDatabase;
  private readonly nowIso: () => string;

  constructor(db: SqliteDatabase, nowIso: () => string) {
    this.db = db;
    this.nowIso = nowIso;
  }

  append(topic: string, payload: unknown): string {
    const id = uuidv4();
    this.db.execute(
      `INSERT INTO outbox (id, topic, payload, created_at) VALUES (?, ?, ?, ?)`,
      [id, topic, JSON.stringify(payload), this.nowIso()]
    );
    return id;
  }

  get(id: string): OutboxEntry | undefined {
    return this.db.queryOne(OutboxRowSchema, `SELECT ${SELECT_COLUMNS} FROM outbox WHERE id = ?`, [id]);
  }

  /** Undelivered entries, oldest first. */
  pending(limit = 100): OutboxEntry[] {
    return this.db.queryAll(
      OutboxRowSchema,
      `SELECT ${SELECT_COLUMNS} FROM outbox
       WHERE delivered_at IS NULL
       ORDER BY created_at, rowid
       LIMIT ?`,
      [limit]
    );
  }

  markDelivered(id: string): void {
    this.db.execute(
      `UPDATE outbox SET attempts = attempts + 1, last_error = NULL, delivered_at = ?
       WHERE id = ? AND delivered_at IS NULL`,
      [this.nowIso(), id]
    );
  }

  markFailed(id: string, error: string): void {
    this.db.execute(
      `UPDATE outbox SET attempts = attempts + 1, last_error = ? WHERE id = ?`,
      [error, id]
    );
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Delivers one outbox entry on demand. Implemented by OutboxRelay. */
export interface EventDispatcher {
  deliver(entryId: string): Promise<boolean>;
}

/**
 * Publishes outbox entries to their topics.
 *
 * An entry is marked delivered only when every subscription handled it;
 * otherwise it stays pending and is retried on the next tick. Subscribers may
 * therefore see the same event more than once.
 */
export class OutboxRelay implements EventDispatcher {
  private readonly outbox: Outbox;
  private readonly topics = new Map<string, PublishTarget>();
  private readonly intervalMs: number;
  private readonly inFlight = new Set<string>();
  private intervalHandle: ReturnType<typeof setInterval> | null = null;

  constructor(outbox: Outbox, topics: PublishTarget[], intervalMs: number) {
    this.outbox = outbox;
    for (const topic of topics) this.topics.set(topic.name, topic);
    this.intervalMs = intervalMs;
  }

  start(): void {
    if (this.intervalHandle) return;
    this.intervalHandle = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    console.log(`[outbox] Relay started (interval: ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      console.log("[outbox] Relay stopped");
    }
  }

  /**
   * Publishes one entry. Returns true when the entry is (now or already)
   * delivered, false when at least one subscription failed.
   */
  async deliver(entryId: string): Promise<boolean> {
    const entry = this.outbox.get(entryId);
    if (!entry) return false;
    if (entry.delivered_at) return true;
    if (this.inFlight.has(entryId)) return false;

    this.inFlight.add(entryId);
    try {
      const topic = this.topics.get(entry.topic);
      if (!topic) {
        this.outbox.markFailed(entryId, `no topic registered for ${entry.topic}`);
        console.error(`[outbox] No topic registered for ${entry.topic} (entry ${entryId})`);
        return false;
      }

      let error: string | undefined;
      try {
        const result = await topic.publishRaw(JSON.parse(entry.payload));
        if (result.failed.length > 0) {
          error = result.failed
            .map((f) => `${f.subscription}: ${describeError(f.error)}`)
            .join("; ");
        }
      } catch (err) {
        error = describeError(err);
      }

      if (error !== undefined) {
        this.outbox.markFailed(entryId, error);
        console.warn(`[outbox] Delivery of ${entry.topic} ${entryId} failed (attempt ${entry.attempts + 1}): ${error}`);
        return false;
      }

      this.outbox.markDelivered(entryId);
      return true;
    } finally {
      this.inFlight.delete(entryId);
    }
  }

  /** Attempts every pending entry once. Returns how many were delivered. */
  async flush(): Promise<number> {
    let delivered = 0;
    for (const entry of this.outbox.pending()) {
      if (await this.deliver(entry.id)) delivered++;
    }
    return delivered;
  }

  private async tick(): Promise<void> {
    try {
      const delivered = await this.flush();
      if (delivered > 0) console.log(`[outbox] Delivered ${delivered} pending event(s)`);
    } catch (err) {
      console.error("[outbox] Relay tick failed:", err);
    }
  }
}
