import fs from "fs";
import path from "path";
import { createRequire } from "module";
import sqlJsModule, { type Database as SqlJsDatabase, type SqlJsStatic } from "sql.js";
import type { z } from "zod";

export type SqlParam = string | number | null;

const require = createRequire(import.meta.url);

let sqlPromise: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlPromise) {
    const wasmPath = require.resolve("sql.js/dist/sql-wasm.wasm");
    // sql.js is CommonJS and also exposes itself as `.default`
    sqlPromise = sqlJsModule.default({ locateFile: () => wasmPath });
  }
  return sqlPromise;
}

export interface OpenOptions {
  /** Tag used in log lines, e.g. "boards" */
  label: string;
  /** SQLite file to load from and persist to. Omit for an in-memory database. */
  filePath?: string;
  /** DDL statements run on every open; must be idempotent (IF NOT EXISTS). */
  schema: readonly string[];
}

/**
 * Thin wrapper over a sql.js database.
 *
 * sql.js runs every statement synchronously on the calling thread, so a
 * `transaction()` callback is never interleaved with another request. Rows are
 * validated with zod on the way out instead of being trusted.
 */
export class SqliteDatabase {
  private db: SqlJsDatabase;
  private readonly label: string;
  private readonly filePath?: string;
  private depth = 0;
  private dirty = false;

  private constructor(db: SqlJsDatabase, label: string, filePath?: string) {
    this.db = db;
    this.label = label;
    this.filePath = filePath;
  }

  static async open(options: OpenOptions): Promise<SqliteDatabase> {
    const SQL = await loadSqlJs();
    let raw: SqlJsDatabase;
    if (options.filePath && fs.existsSync(options.filePath)) {
      raw = new SQL.Database(fs.readFileSync(options.filePath));
      console.log(`[${options.label}] Loaded database from ${options.filePath}`);
    } else {
      raw = new SQL.Database();
    }

    const database = new SqliteDatabase(raw, options.label, options.filePath);
    database.enableForeignKeys();
    database.transaction(() => {
      for (const ddl of options.schema) database.execute(ddl);
    });
    return database;
  }

  /** Runs one statement and returns the number of rows it changed. */
  execute(sql: string, params: SqlParam[] = []): number {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      while (statement.step()) {
        // drain
      }
    } finally {
      statement.free();
    }
    const changed = this.db.getRowsModified();
    if (changed > 0 || /^\s*(create|drop|alter)/i.test(sql)) this.dirty = true;
    if (this.depth === 0) this.persist();
    return changed;
  }

  queryAll<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, sql: string, params: SqlParam[] = []): T[] {
    const statement = this.db.prepare(sql);
    const rows: T[] = [];
    try {
      statement.bind(params);
      while (statement.step()) {
        rows.push(schema.parse(statement.getAsObject()));
      }
    } finally {
      statement.free();
    }
    return rows;
  }

  queryOne<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    sql: string,
    params: SqlParam[] = []
  ): T | undefined {
    return this.queryAll(schema, sql, params)[0];
  }

  /**
   * Runs `fn` inside BEGIN/COMMIT. Any throw rolls the whole unit back and is
   * rethrown. Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth++;
      try {
        return fn();
      } finally {
        this.depth--;
      }
    }

    this.db.run("BEGIN IMMEDIATE");
    this.depth = 1;
    let result: T;
    try {
      result = fn();
      this.db.run("COMMIT");
    } catch (err) {
      this.db.run("ROLLBACK");
      this.dirty = false;
      throw err;
    } finally {
      this.depth = 0;
    }
    this.persist();
    return result;
  }

  close(): void {
    this.persist();
    this.db.close();
  }

  private enableForeignKeys(): void {
    this.db.run("PRAGMA foreign_keys = ON");
  }

  private persist(): void {
    if (!this.dirty) return;
    this.dirty = false;
    if (!this.filePath) return;

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const data = this.db.export();
    // export() reopens the connection, which resets connection pragmas
    this.enableForeignKeys();

    // Atomic write: write to temp file, then rename
    const tmp = this.filePath + ".tmp";
    fs.writeFileSync(tmp, data);
    fs.renameSync(tmp, this.filePath);
  }

  toString(): string {
    return `SqliteDatabase(${this.label})`;
  }
}

export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && err.message.includes("UNIQUE constraint failed");
}
