import type { OutcomeSlot } from "./outcome.js";
import { toError } from "./errors.js";
import type { LifecycleLogger, ShutdownTarget } from "./types.js";

export type InterruptListener = (signal: string) => void;

/** Anything that can announce "please stop"; subscribe returns the unsubscribe. */
export interface InterruptSource {
  subscribe(listener: InterruptListener): () => void;
}

export const DEFAULT_INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function processInterruptSource(
  signals: readonly NodeJS.Signals[] = DEFAULT_INTERRUPT_SIGNALS,
): InterruptSource {
  return {
    subscribe(listener) {
      const handlers = signals.map((signal) => {
        const handler = () => listener(signal);
        process.on(signal, handler);
        return { signal, handler };
      });
      return () => {
        for (const { signal, handler } of handlers) {
          process.off(signal, handler);
        }
      };
    },
  };
}

/** In-process source for embedding the coordinator without OS signals. */
export class ManualInterruptSource implements InterruptSource {
  private listeners = new Set<InterruptListener>();

  subscribe(listener: InterruptListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  interrupt(signal = "SIGINT"): void {
    for (const listener of [...this.listeners]) {
      listener(signal);
    }
  }

  listenerCount(): number {
    return this.listeners.size;
  }
}

export function createManualInterruptSource(): ManualInterruptSource {
  return new ManualInterruptSource();
}

export type InterruptWatcherOptions = {
  source: InterruptSource;
  target: ShutdownTarget;
  graceMs: number;
  outcome: OutcomeSlot;
  logger: LifecycleLogger;
};

/**
 * Turns the first interrupt into `target.shutdown(graceMs)`. A failed shutdown
 * is offered to the outcome slot; a clean one offers nothing because the
 * serve loop reports the close itself. Later interrupts are logged and ignored.
 */
export function watchInterrupts(opts: InterruptWatcherOptions): () => void {
  const { source, target, graceMs, outcome, logger } = opts;
  let shuttingDown = false;

  return source.subscribe((signal) => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;

    const deadline = new Date(Date.now() + graceMs).toISOString();
    logger.info({ signal, deadline }, "Received interrupt. Shutting down...");

    void target.shutdown(graceMs).then(
      () => {
        logger.info({ signal }, "Shutdown complete");
      },
      (err: unknown) => {
        const error = toError(err);
        logger.error({ err: error }, "Shutdown failed");
        outcome.offer({ kind: "failed", error });
      },
    );
  });
}
