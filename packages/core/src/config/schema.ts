import type { BerthConfig, LogLevel } from "./types.js";

export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export const DEFAULT_SHUTDOWN_GRACE_MS = 2000;

/** Largest delay a Node timer honours; longer ones fire after 1ms. */
export const MAX_SHUTDOWN_GRACE_MS = 2_147_483_647;

export const DEFAULT_CONFIG: BerthConfig = {
  server: {
    address: "127.0.0.1:8080",
    certFile: "",
    keyFile: "",
    shutdownGraceMs: DEFAULT_SHUTDOWN_GRACE_MS,
  },
  logging: {
    level: "info",
  },
};

export function isShutdownGrace(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_SHUTDOWN_GRACE_MS
  );
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateConfig(raw: Record<string, unknown>): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (raw.server !== undefined) {
    if (!isRecord(raw.server)) {
      errors.push("server must be an object");
    } else {
      const s = raw.server;
      if (s.address !== undefined && (typeof s.address !== "string" || s.address.trim() === "")) {
        errors.push("server.address must be a non-empty string");
      }
      if (s.certFile !== undefined && typeof s.certFile !== "string") {
        errors.push("server.certFile must be a string");
      }
      if (s.keyFile !== undefined && typeof s.keyFile !== "string") {
        errors.push("server.keyFile must be a string");
      }
      if (s.shutdownGraceMs !== undefined && !isShutdownGrace(s.shutdownGraceMs)) {
        errors.push(`server.shutdownGraceMs must be an integer between 0 and ${MAX_SHUTDOWN_GRACE_MS}`);
      }
    }
  }

  if (raw.logging !== undefined) {
    if (!isRecord(raw.logging)) {
      errors.push("logging must be an object");
    } else if (raw.logging.level !== undefined && !isLogLevel(raw.logging.level)) {
      errors.push(`logging.level must be one of ${LOG_LEVELS.join(", ")}`);
    }
  }

  return { valid: errors.length === 0, errors };
}

/** Overlays a validated override on `base`; unknown keys are ignored. */
export function mergeConfig(base: BerthConfig, override: Record<string, unknown>): BerthConfig {
  const result = structuredClone(base);

  if (isRecord(override.server)) {
    const s = override.server;
    if (typeof s.address === "string") result.server.address = s.address.trim();
    if (typeof s.certFile === "string") result.server.certFile = s.certFile;
    if (typeof s.keyFile === "string") result.server.keyFile = s.keyFile;
    if (typeof s.shutdownGraceMs === "number") result.server.shutdownGraceMs = s.shutdownGraceMs;
  }
  if (isRecord(override.logging) && isLogLevel(override.logging.level)) {
    result.logging.level = override.logging.level;
  }

  return result;
}
