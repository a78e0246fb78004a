import type http from "node:http";
import type { FastifyInstance } from "fastify";
import { ShutdownError, ShutdownTimeoutError, errorMessage } from "../lifecycle/errors.js";
import type { ServerContext, ShutdownTarget } from "../lifecycle/types.js";
import { UNIX_SOCKET_PREFIX } from "./listener.js";

/**
 * Handle on a bound Fastify server. The serve loop drives the raw server;
 * the interrupt watcher is the only caller of `shutdown`.
 */
export class RunningServer implements ServerContext, ShutdownTarget {
  private shutdownInFlight: Promise<void> | null = null;

  constructor(readonly app: FastifyInstance) {}

  get server(): http.Server {
    return this.app.server;
  }

  isShuttingDown(): boolean {
    return this.shutdownInFlight !== null;
  }

  /** `host:port` of a TCP listener or `unix:<path>`; null before binding. */
  boundAddress(): string | null {
    const info = this.server.address();
    if (info === null) return null;
    if (typeof info === "string") return `${UNIX_SOCKET_PREFIX}${info}`;
    const host = info.family === "IPv6" ? `[${info.address}]` : info.address;
    return `${host}:${info.port}`;
  }

  boundPort(): number | null {
    const info = this.server.address();
    return info !== null && typeof info === "object" ? info.port : null;
  }

  /**
   * Stops accepting, lets in-flight requests finish and closes idle
   * connections. Whatever is still open after `graceMs` is destroyed and the
   * call rejects with ShutdownTimeoutError. Repeated calls share one shutdown.
   */
  shutdown(graceMs: number): Promise<void> {
    if (!this.shutdownInFlight) {
      this.shutdownInFlight = this.closeWithin(graceMs);
    }
    return this.shutdownInFlight;
  }

  private async closeWithin(graceMs: number): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<"expired">((resolve) => {
      timer = setTimeout(() => resolve("expired"), graceMs);
    });
    const closed = this.app.close().then(
      () => "closed" as const,
      (err: unknown) => {
        throw new ShutdownError(`server close failed: ${errorMessage(err)}`, { cause: err });
      },
    );

    try {
      const result = await Promise.race([closed, expired]);
      if (result === "expired") {
        this.server.closeAllConnections();
        throw new ShutdownTimeoutError(graceMs);
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
