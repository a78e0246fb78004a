import Fastify, { type FastifyInstance } from "fastify";
import {
  DEFAULT_SHUTDOWN_GRACE_MS,
  isShutdownGrace,
  MAX_SHUTDOWN_GRACE_MS,
  type LogLevel,
} from "@berth/core";
import {
  processInterruptSource,
  watchInterrupts,
  type InterruptSource,
} from "../lifecycle/interrupts.js";
import { OutcomeSlot, waitForServerToClose } from "../lifecycle/outcome.js";
import type { LifecycleLogger, ServerContext } from "../lifecycle/types.js";
import { bindListener, resolveListenTarget } from "./listener.js";
import { RunningServer } from "./running-server.js";
import {
  createRawServer,
  resolveServeMode,
  runServeLoop,
  type ServiceEndpoint,
} from "./serve-loop.js";

/** Registers the routes the server dispatches to. */
export type RequestHandler = (
  app: FastifyInstance,
  server: ServerContext,
) => Promise<void> | void;

export type ServeOptions = {
  endpoint: ServiceEndpoint;
  handler: RequestHandler;
  shutdownGraceMs?: number;
  /** Defaults to SIGINT and SIGTERM on the current process. */
  interrupts?: InterruptSource;
  logLevel?: LogLevel;
  /** Overrides the Fastify logger for lifecycle messages. */
  logger?: LifecycleLogger;
};

export type StartedServer = {
  handle: RunningServer;
  outcome: OutcomeSlot;
  /** Drops the interrupt subscription. */
  stopWatching: () => void;
};

/**
 * Binds the listener, starts serving in the background and arms the interrupt
 * watcher. Bind and TLS errors reject here, before anything runs in the
 * background; everything after that arrives through `outcome`.
 */
export async function startServer(opts: ServeOptions): Promise<StartedServer> {
  const { endpoint } = opts;
  const target = resolveListenTarget(endpoint.address);
  const mode = resolveServeMode(endpoint);
  const graceMs = opts.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
  if (!isShutdownGrace(graceMs)) {
    throw new RangeError(
      `shutdownGraceMs must be an integer between 0 and ${MAX_SHUTDOWN_GRACE_MS}, got ${graceMs}`,
    );
  }

  const app = Fastify({
    logger: { level: opts.logLevel ?? "info" },
    serverFactory: (handler) => createRawServer(mode, (req, res) => handler(req, res)),
  });
  const handle = new RunningServer(app);

  try {
    await opts.handler(app, handle);
  } catch (err) {
    await app.close().catch((closeErr: unknown) => {
      app.log.warn({ err: closeErr }, "close after failed handler registration");
    });
    throw err;
  }

  await bindListener(app, target, endpoint.address);

  const logger = opts.logger ?? app.log;
  const outcome = new OutcomeSlot();
  runServeLoop(app.server, { outcome, logger, mode, address: endpoint.address });

  const stopWatching = watchInterrupts({
    source: opts.interrupts ?? processInterruptSource(),
    target: handle,
    graceMs,
    outcome,
    logger,
  });

  return { handle, outcome, stopWatching };
}

/**
 * Serves until interrupted or broken. Resolves when an interrupt closed the
 * listener cleanly; rejects with the bind, TLS, serve or shutdown error otherwise.
 */
export async function serve(opts: ServeOptions): Promise<void> {
  const { outcome, stopWatching } = await startServer(opts);
  try {
    await waitForServerToClose(outcome);
  } finally {
    stopWatching();
  }
}
