import { z } from "zod";
import { SqliteDatabase } from "../db/sqlite.js";

// No foreign key to boards: that table lives in another service's database.
// Orphans are removed by the board-deleted subscription instead.
const TASK_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS tasks (
     id TEXT PRIMARY KEY,
     board_id TEXT NOT NULL,
     title TEXT NOT NULL,
     description TEXT NOT NULL DEFAULT '',
     created_by TEXT NOT NULL,
     assignee_id TEXT,
     stage TEXT NOT NULL DEFAULT 'To Do' CHECK (stage IN ('To Do', 'In Progress', 'Done')),
     created_at TEXT NOT NULL,
     updated_at TEXT NOT NULL
   )`,
  `CREATE INDEX IF NOT EXISTS idx_tasks_board ON tasks (board_id, created_at)`,
] as const;

export const STAGES = ["To Do", "In Progress", "Done"] as const;
export const StageSchema = z.enum(STAGES);
export type Stage = z.infer<typeof StageSchema>;

const TaskRowSchema = z
  .object({
    id: z.string(),
    board_id: z.string(),
    title: z.string(),
    description: z.string(),
    created_by: z.string(),
    assignee_id: z.string().nullable(),
    stage: StageSchema,
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform(({ assignee_id, ...rest }) => ({
    ...rest,
    ...(assignee_id ? { assignee_id } : {}),
  }));

export interface Task {
  id: string;
  board_id: string;
  title: string;
  description: string;
  created_by: string;
  assignee_id?: string;
  stage: Stage;
  created_at: string;
  updated_at: string;
}

const SELECT_COLUMNS = `id, board_id, title, description, created_by, assignee_id, stage, created_at, updated_at`;

/** The tasks database. Owned by the task service; nothing else opens it. */
export class TaskStore {
  private readonly db: SqliteDatabase;

  private constructor(db: SqliteDatabase) {
    this.db = db;
  }

  static async open(filePath?: string): Promise<TaskStore> {
    const db = await SqliteDatabase.open({ label: "tasks", filePath, schema: TASK_SCHEMA });
    return new TaskStore(db);
  }

  insert(task: Task): void {
    this.db.execute(
      `INSERT INTO tasks (${SELECT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        task.id,
        task.board_id,
        task.title,
        task.description,
        task.created_by,
        task.assignee_id ?? null,
        task.stage,
        task.created_at,
        task.updated_at,
      ]
    );
  }

  findById(id: string): Task | undefined {
    return this.db.queryOne(TaskRowSchema, `SELECT ${SELECT_COLUMNS} FROM tasks WHERE id = ?`, [id]);
  }

  listByBoard(boardId: string): Task[] {
    return this.db.queryAll(
      TaskRowSchema,
      `SELECT ${SELECT_COLUMNS} FROM tasks WHERE board_id = ? ORDER BY created_at, rowid`,
      [boardId]
    );
  }

  /** Writes the mutable fields. Returns false when the row no longer exists. */
  update(task: Task): boolean {
    const changed = this.db.execute(
      `UPDATE tasks
       SET title = ?, description = ?, assignee_id = ?, stage = ?, updated_at = ?
       WHERE id = ?`,
      [task.title, task.description, task.assignee_id ?? null, task.stage, task.updated_at, task.id]
    );
    return changed > 0;
  }

  delete(id: string): boolean {
    return this.db.execute(`DELETE FROM tasks WHERE id = ?`, [id]) > 0;
  }

  /** Deletes every task of the board. Deleting from an empty set returns 0. */
  deleteByBoard(boardId: string): number {
    return this.db.execute(`DELETE FROM tasks WHERE board_id = ?`, [boardId]);
  }

  close(): void {
    this.db.close();
  }
}
