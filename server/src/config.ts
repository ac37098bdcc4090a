import dotenv from "dotenv";
import crypto from "crypto";
import fs from "fs";
import path from "path";

const envPath = path.resolve(process.cwd(), process.env.ENV_FILE || ".env");

// Auto-generate .env with a random JWT_SECRET on first run
if (!fs.existsSync(envPath)) {
  const secret = crypto.randomBytes(32).toString("hex");
  const content = `# taskboard: auto-generated on first run\nHOST=0.0.0.0\nPORT=4000\nJWT_SECRET=${secret}\nDATA_DIR=./data\n`;
  fs.writeFileSync(envPath, content, "utf-8");
  console.log(`[config] Created ${envPath} with auto-generated JWT_SECRET`);
}

dotenv.config({ path: envPath });

export interface Config {
  host: string;
  port: number;
  /** HS256 signing secret for bearer tokens */
  jwtSecret: string;
  allowedOrigins: string[];
  /** Directory holding users.sqlite, boards.sqlite and tasks.sqlite. Empty = in-memory. */
  dataDir: string;
  /** Interval in ms between outbox relay ticks (default: 5000) */
  outboxPollIntervalMs: number;
  /** Per-request deadline in ms; the request's storage calls are canceled after it (default: 10000) */
  requestTimeoutMs: number;
  /** Max time in ms to wait for in-flight requests during shutdown (default: 10000) */
  gracefulTimeoutMs: number;
}

const jwtSecret = process.env.JWT_SECRET || "";
if (!jwtSecret) {
  throw new Error(`[config] JWT_SECRET is not set (checked ${envPath})`);
}

const config: Config = {
  host: process.env.HOST || "0.0.0.0",
  port: parseInt(process.env.PORT || "4000", 10),
  jwtSecret,
  allowedOrigins: (process.env.ALLOWED_ORIGINS || "http://localhost:3000,http://localhost:5173").split(","),
  dataDir: process.env.DATA_DIR === undefined ? "./data" : process.env.DATA_DIR,
  outboxPollIntervalMs: parseInt(process.env.OUTBOX_POLL_INTERVAL_MS || "5000", 10),
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || "10000", 10),
  gracefulTimeoutMs: parseInt(process.env.GRACEFUL_TIMEOUT_MS || "10000", 10),
};

export default config;
