import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { SqliteDatabase, isUniqueViolation } from "../db/sqlite.js";

const USER_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS users (
     id TEXT PRIMARY KEY,
     email TEXT NOT NULL UNIQUE,
     password_hash TEXT NOT NULL,
     created_at TEXT NOT NULL
   )`,
] as const;

const UserRowSchema = z.object({
  id: z.string(),
  email: z.string(),
  password_hash: z.string(),
  created_at: z.string(),
});

export type UserRow = z.infer<typeof UserRowSchema>;

export class EmailTakenError extends Error {
  constructor(email: string) {
    super(`email already registered: ${email}`);
    this.name = "EmailTakenError";
  }
}

/**
 * The users database. Owned by the user service; nothing else opens it.
 */
export class UserStore {
  private readonly db: SqliteDatabase;
  private readonly nowIso: () => string;

  private constructor(db: SqliteDatabase, nowIso: () => string) {
    this.db = db;
    this.nowIso = nowIso;
  }

  static async open(
    filePath?: string,
    nowIso: () => string = () => new Date().toISOString()
  ): Promise<UserStore> {
    const db = await SqliteDatabase.open({ label: "users", filePath, schema: USER_SCHEMA });
    return new UserStore(db, nowIso);
  }

  /** Inserts a user. Throws EmailTakenError on a UNIQUE collision. */
  insert(email: string, passwordHash: string): UserRow {
    const row: UserRow = {
      id: uuidv4(),
      email,
      password_hash: passwordHash,
      created_at: this.nowIso(),
    };
    try {
      this.db.execute(
        `INSERT INTO users (id, email, password_hash, created_at) VALUES (?, ?, ?, ?)`,
        [row.id, row.email, row.password_hash, row.created_at]
      );
    } catch (err) {
      if (isUniqueViolation(err)) throw new EmailTakenError(email);
      throw err;
    }
    return row;
  }

  findByEmail(email: string): UserRow | undefined {
    return this.db.queryOne(
      UserRowSchema,
      `SELECT id, email, password_hash, created_at FROM users WHERE email = ?`,
      [email]
    );
  }

  findById(id: string): UserRow | undefined {
    return this.db.queryOne(
      UserRowSchema,
      `SELECT id, email, password_hash, created_at FROM users WHERE id = ?`,
      [id]
    );
  }

  close(): void {
    this.db.close();
  }
}
