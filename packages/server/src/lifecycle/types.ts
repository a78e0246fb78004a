import type { FastifyBaseLogger } from "fastify";

/** The slice of Fastify's pino logger the lifecycle writes to. */
export type LifecycleLogger = Pick<FastifyBaseLogger, "info" | "warn" | "error">;

/** Read-only view of the running server handed to request handlers. */
export interface ServerContext {
  isShuttingDown(): boolean;
}

export interface ShutdownTarget {
  shutdown(graceMs: number): Promise<void>;
}
