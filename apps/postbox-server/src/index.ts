import type { FastifyInstance } from "fastify";
import { PROTOCOL_VERSION } from "@postbox/protocol";
import { loadConfig } from "./config.js";
import { openDatabase } from "./db/database.js";
import { Store } from "./store/store.js";
import { Multiplexer } from "./tcp/multiplexer.js";
import { startRetentionCron } from "./messages/retention.js";
import { createStatusServer } from "./http/status.js";
import { watchConsoleForQuit } from "./shutdown/console.js";

async function main() {
  const config = loadConfig();

  // Initialize database
  const store = new Store(openDatabase(config.databaseFile));
  console.log(`[store] ${config.databaseFile}: ${store.countClients()} clients, ${store.countPendingMessages()} pending messages`);

  // Start retention cron
  const retentionTimer = config.retentionDays ? startRetentionCron(store, config.retentionDays) : null;

  const controller = new AbortController();
  const multiplexer = new Multiplexer({
    store,
    limits: { version: PROTOCOL_VERSION, maxPayloadSize: config.maxPayloadSize },
    legacyErrors: config.legacyErrors,
    idleTimeoutMs: config.idleTimeoutMs,
    shutdownGraceMs: config.shutdownGraceMs,
    maxConnections: config.maxConnections,
    rateLimit: config.rateLimit,
  });

  await multiplexer.listen({ port: config.port, host: config.host, signal: controller.signal });
  console.log(`[server] Postbox v${PROTOCOL_VERSION} listening on ${config.host}:${config.port}`);
  if (config.legacyErrors) {
    console.log("[server] Legacy error codes enabled");
  }

  let statusApp: FastifyInstance | null = null;
  if (config.statusPort !== null) {
    statusApp = await createStatusServer({ store, connectionStats: () => multiplexer.stats() });
    await statusApp.listen({ port: config.statusPort, host: config.host });
    console.log(`[status] Listening on ${config.host}:${config.statusPort}`);
  }

  // Graceful shutdown
  let stopConsole: (() => void) | null = null;
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("\n[server] Shutting down...");
    stopConsole?.();
    if (retentionTimer) clearInterval(retentionTimer);
    controller.abort();
    await multiplexer.shutdown();
    await statusApp?.close();
    store.close();
    process.exit(0);
  };

  const requestShutdown = () => {
    shutdown().catch((err) => {
      console.error("[server] Shutdown failed:", err);
      process.exit(1);
    });
  };

  process.on("SIGINT", requestShutdown);
  process.on("SIGTERM", requestShutdown);
  if (process.stdin.isTTY) {
    stopConsole = watchConsoleForQuit(process.stdin, requestShutdown);
    console.log('[server] Type "q" and Enter to stop');
  }
}

main().catch((err) => {
  console.error("[server] Fatal error:", err);
  process.exit(1);
});
