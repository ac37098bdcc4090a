import path from "path";
import { TokenAuthority } from "./auth.js";
import { InvitationWorkflow } from "./boards/invitations.js";
import { MembershipLedger } from "./boards/ledger.js";
import { BoardRegistry } from "./boards/registry.js";
import { openBoardDatabase } from "./boards/store.js";
import type { SqliteDatabase } from "./db/sqlite.js";
import { createBoardDeletedTopic, type BoardDeletedEvent } from "./events/board-deleted.js";
import { Outbox, OutboxRelay } from "./events/outbox.js";
import type { Topic } from "./events/topic.js";
import { TaskRegistry } from "./tasks/registry.js";
import { TaskStore } from "./tasks/store.js";
import { UserService } from "./users/service.js";
import { UserStore } from "./users/store.js";

export interface ServiceOptions {
  jwtSecret: string;
  /** Directory for the three SQLite files. Omit or leave empty for in-memory stores. */
  dataDir?: string;
  outboxPollIntervalMs?: number;
  nowIso?: () => string;
  now?: () => number;
}

export interface Services {
  tokens: TokenAuthority;
  users: UserService;
  ledger: MembershipLedger;
  invitations: InvitationWorkflow;
  boards: BoardRegistry;
  tasks: TaskRegistry;
  boardDeleted: Topic<BoardDeletedEvent>;
  outbox: Outbox;
  relay: OutboxRelay;
  close(): void;
}

/**
 * Opens the users, boards and tasks databases and wires the three services
 * together. The only links between them are the UserDirectory and
 * MembershipChecker capabilities and the board-deleted topic.
 */
export async function createServices(options: ServiceOptions): Promise<Services> {
  const nowIso = options.nowIso ?? (() => new Date().toISOString());
  const fileFor = (name: string) =>
    options.dataDir ? path.join(options.dataDir, `${name}.sqlite`) : undefined;

  const tokens = new TokenAuthority(options.jwtSecret, options.now);

  const userStore = await UserStore.open(fileFor("users"), nowIso);
  const users = new UserService(userStore, tokens);

  const boardDb: SqliteDatabase = await openBoardDatabase(fileFor("boards"));
  const boardDeleted = createBoardDeletedTopic();
  const outbox = new Outbox(boardDb, nowIso);
  const relay = new OutboxRelay(outbox, [boardDeleted], options.outboxPollIntervalMs ?? 5000);
  const ledger = new MembershipLedger(boardDb);
  const invitations = new InvitationWorkflow(boardDb, ledger, users, nowIso);
  const boards = new BoardRegistry({ db: boardDb, ledger, outbox, dispatcher: relay, nowIso });

  const taskStore = await TaskStore.open(fileFor("tasks"));
  const tasks = new TaskRegistry(taskStore, boards, nowIso);
  tasks.subscribeToBoardDeletions(boardDeleted);

  return {
    tokens,
    users,
    ledger,
    invitations,
    boards,
    tasks,
    boardDeleted,
    outbox,
    relay,
    close() {
      relay.stop();
      userStore.close();
      boardDb.close();
      taskStore.close();
    },
  };
}
