import type { FastifyInstance } from "fastify";
import type { ServerContext } from "../lifecycle/types.js";

export type HealthRouteOptions = {
  version?: string;
};

export async function healthRoutes(
  app: FastifyInstance,
  server: ServerContext,
  opts?: HealthRouteOptions,
) {
  const version = opts?.version ?? "0.1.0";

  app.get("/health", async () => ({
    status: server.isShuttingDown() ? "draining" : "ok",
    version,
    uptime: process.uptime(),
  }));

  app.get("/ready", async (_req, reply) => {
    if (!server.isShuttingDown()) return { ready: true };
    return reply.code(503).send({ ready: false });
  });
}
