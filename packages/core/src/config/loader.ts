import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { envHasAny, envString } from "./env.js";
import {
  DEFAULT_CONFIG,
  isLogLevel,
  isRecord,
  isShutdownGrace,
  MAX_SHUTDOWN_GRACE_MS,
  mergeConfig,
  validateConfig,
} from "./schema.js";
import type { BerthConfig, ConfigSource } from "./types.js";

export const DEFAULT_CONFIG_FILE = path.join(os.homedir(), ".berth", "config.json");

export const ENV_KEYS = {
  address: "BERTH_ADDRESS",
  certFile: "BERTH_TLS_CERT_FILE",
  keyFile: "BERTH_TLS_KEY_FILE",
  shutdownGraceMs: "BERTH_SHUTDOWN_GRACE_MS",
  logLevel: "BERTH_LOG_LEVEL",
} as const;

export type LoadOptions = {
  /** Explicit config file; a missing explicit file is an error, a missing default file is not. */
  file?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadResult = {
  config: BerthConfig;
  sources: ConfigSource[];
  errors: string[];
};

type FileReadResult =
  | { kind: "missing" }
  | { kind: "empty" }
  | { kind: "invalid"; reason: string }
  | { kind: "ok"; raw: Record<string, unknown> };

export function loadConfig(opts: LoadOptions = {}): LoadResult {
  const env = opts.env ?? process.env;
  const sources: ConfigSource[] = ["default"];
  const errors: string[] = [];
  let config = structuredClone(DEFAULT_CONFIG);

  const file = opts.file?.trim() || DEFAULT_CONFIG_FILE;
  const read = readConfigFile(file);
  if (read.kind === "missing" && opts.file) {
    errors.push(`[file] config file not found: ${file}`);
  } else if (read.kind === "invalid") {
    errors.push(`[file] ${file}: ${read.reason}`);
  } else if (read.kind === "ok") {
    const validation = validateConfig(read.raw);
    if (validation.valid) {
      config = mergeConfig(config, read.raw);
      sources.push("file");
    } else {
      errors.push(...validation.errors.map((e) => `[file] ${e}`));
    }
  }

  const overridden = applyEnvOverrides(config, env);
  config = overridden.config;
  errors.push(...overridden.errors);
  if (envHasAny(Object.values(ENV_KEYS), env)) {
    sources.push("env");
  }

  return { config, sources, errors };
}

function readConfigFile(filePath: string): FileReadResult {
  let content: string;
  try {
    if (!fs.existsSync(filePath)) return { kind: "missing" };
    content = fs.readFileSync(filePath, "utf-8").trim();
  } catch (err) {
    return { kind: "invalid", reason: err instanceof Error ? err.message : String(err) };
  }
  if (!content) return { kind: "empty" };

  try {
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      return { kind: "invalid", reason: "expected a JSON object" };
    }
    return { kind: "ok", raw: parsed };
  } catch (err) {
    return { kind: "invalid", reason: err instanceof Error ? err.message : String(err) };
  }
}

function applyEnvOverrides(
  config: BerthConfig,
  env: NodeJS.ProcessEnv,
): { config: BerthConfig; errors: string[] } {
  const result = structuredClone(config);
  const errors: string[] = [];

  const address = envString(ENV_KEYS.address, "", env);
  if (address) result.server.address = address;

  const certFile = envString(ENV_KEYS.certFile, "", env);
  if (certFile) result.server.certFile = certFile;

  const keyFile = envString(ENV_KEYS.keyFile, "", env);
  if (keyFile) result.server.keyFile = keyFile;

  const grace = envString(ENV_KEYS.shutdownGraceMs, "", env);
  if (grace) {
    const ms = /^\d+$/.test(grace) ? Number.parseInt(grace, 10) : Number.NaN;
    if (isShutdownGrace(ms)) {
      result.server.shutdownGraceMs = ms;
    } else {
      errors.push(
        `[env] ${ENV_KEYS.shutdownGraceMs} must be an integer between 0 and ${MAX_SHUTDOWN_GRACE_MS}`,
      );
    }
  }

  const level = envString(ENV_KEYS.logLevel, "", env).toLowerCase();
  if (level) {
    if (isLogLevel(level)) {
      result.logging.level = level;
    } else {
      errors.push(`[env] ${ENV_KEYS.logLevel} is not a log level: ${level}`);
    }
  }

  return { config: result, errors };
}
