import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { PROTOCOL_VERSION } from "@postbox/protocol";
import type { Store } from "../store/store.js";
import type { MultiplexerStats } from "../tcp/multiplexer.js";

export interface StatusDeps {
  store: Store;
  connectionStats: () => MultiplexerStats;
}

export function registerStatusRoutes(app: FastifyInstance, deps: StatusDeps): void {
  app.get("/health", async () => ({ status: "ok", version: PROTOCOL_VERSION }));

  app.get("/stats", async (_request, reply) => {
    try {
      const { openConnections, servedConnections } = deps.connectionStats();
      return {
        clients: deps.store.countClients(),
        pendingMessages: deps.store.countPendingMessages(),
        openConnections,
        servedConnections,
      };
    } catch (err) {
      console.error("[status] Failed to collect stats:", err);
      return reply.code(503).send({ error: "Store unavailable" });
    }
  });
}

/** Build the status app; the caller decides whether and where it listens */
export async function createStatusServer(deps: StatusDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(cors, { origin: true });
  registerStatusRoutes(app, deps);
  return app;
}
