export {
  BindError,
  LifecycleError,
  ShutdownError,
  ShutdownTimeoutError,
  TlsConfigError,
  isLifecycleError,
  type LifecycleErrorCode,
} from "./lifecycle/errors.js";
export {
  DEFAULT_INTERRUPT_SIGNALS,
  ManualInterruptSource,
  createManualInterruptSource,
  processInterruptSource,
  watchInterrupts,
  type InterruptListener,
  type InterruptSource,
  type InterruptWatcherOptions,
} from "./lifecycle/interrupts.js";
export { OutcomeSlot, waitForServerToClose, type ServeOutcome } from "./lifecycle/outcome.js";
export type { LifecycleLogger, ServerContext, ShutdownTarget } from "./lifecycle/types.js";
export {
  UNIX_SOCKET_PREFIX,
  bindListener,
  describeListenTarget,
  resolveListenTarget,
  type ListenTarget,
} from "./server/listener.js";
export { RunningServer } from "./server/running-server.js";
export {
  createRawServer,
  loadTlsMaterial,
  resolveServeMode,
  runServeLoop,
  type ServeMode,
  type ServiceEndpoint,
} from "./server/serve-loop.js";
export {
  serve,
  startServer,
  type RequestHandler,
  type ServeOptions,
  type StartedServer,
} from "./server/server.js";
export { healthRoutes, type HealthRouteOptions } from "./routes/health.js";
