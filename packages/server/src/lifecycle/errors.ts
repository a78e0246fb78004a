export type LifecycleErrorCode =
  | "BIND_ERROR"
  | "TLS_CONFIG_ERROR"
  | "SHUTDOWN_TIMEOUT"
  | "SHUTDOWN_ERROR";

export class LifecycleError extends Error {
  readonly code: LifecycleErrorCode;

  constructor(code: LifecycleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LifecycleError";
    this.code = code;
  }
}

/** The listening socket could not be created or bound. */
export class BindError extends LifecycleError {
  readonly address: string;

  constructor(address: string, message: string, options?: { cause?: unknown }) {
    super("BIND_ERROR", message, options);
    this.name = "BindError";
    this.address = address;
  }
}

export class TlsConfigError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TLS_CONFIG_ERROR", message, options);
    this.name = "TlsConfigError";
  }
}

/** Connections were still open when the grace period ran out and were destroyed. */
export class ShutdownTimeoutError extends LifecycleError {
  readonly graceMs: number;

  constructor(graceMs: number) {
    super("SHUTDOWN_TIMEOUT", `shutdown did not finish within ${graceMs}ms; open connections were destroyed`);
    this.name = "ShutdownTimeoutError";
    this.graceMs = graceMs;
  }
}

export class ShutdownError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SHUTDOWN_ERROR", message, options);
    this.name = "ShutdownError";
  }
}

export function isLifecycleError(value: unknown): value is LifecycleError {
  return value instanceof LifecycleError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
