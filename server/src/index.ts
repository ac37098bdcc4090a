import http from "http";
import config from "./config.js";
import { createApp } from "./app.js";
import { createServices } from "./services.js";

// ---- Instantiate services (one database per service) ----
const services = await createServices({
  jwtSecret: config.jwtSecret,
  dataDir: config.dataDir,
  outboxPollIntervalMs: config.outboxPollIntervalMs,
});

// Deliver anything left in the outbox by a previous run before taking traffic
const recovered = await services.relay.flush();
if (recovered > 0) {
  console.log(`[server] Delivered ${recovered} board-deleted event(s) left from a previous run`);
}
services.relay.start();

// ---- Express app ----
const app = createApp(services, {
  allowedOrigins: config.allowedOrigins,
  requestTimeoutMs: config.requestTimeoutMs,
});
const server = http.createServer(app);

// ---- Graceful shutdown ----
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`[server] ${signal} received, starting graceful shutdown`);

  // 1. Stop the relay so no delivery starts mid-shutdown
  services.relay.stop();

  // 2. Stop accepting connections and wait for in-flight requests
  const closed = new Promise<void>((resolve) => server.close(() => resolve()));
  const timeout = new Promise<"timeout">((resolve) =>
    setTimeout(() => resolve("timeout"), config.gracefulTimeoutMs).unref()
  );
  if ((await Promise.race([closed, timeout])) === "timeout") {
    console.log(`[server] Timeout (${config.gracefulTimeoutMs}ms), closing remaining connections`);
    server.closeAllConnections();
  }

  // 3. Flush databases to disk
  services.close();
  console.log("[server] Shutdown complete");
  process.exit(0);
}

process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

server.listen(config.port, config.host, () => {
  console.log(`[server] Listening on http://${config.host}:${config.port}`);
});
