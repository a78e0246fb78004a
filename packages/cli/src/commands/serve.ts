import { Command } from "commander";
import {
  isLogLevel,
  isShutdownGrace,
  loadConfig,
  MAX_SHUTDOWN_GRACE_MS,
  type BerthConfig,
} from "@berth/core";
import { healthRoutes, serve, type ServeOptions } from "@berth/server";
import { BERTH_VERSION } from "../version.js";

export type ServeCommandOptions = {
  config?: string;
  address?: string;
  tlsCert?: string;
  tlsKey?: string;
  shutdownGrace?: string;
  logLevel?: string;
};

export type ServeCommandDeps = {
  run?: (opts: ServeOptions) => Promise<void>;
  env?: NodeJS.ProcessEnv;
};

/** Defaults, then the config file, then env, then flags. */
export function resolveServeSettings(
  opts: ServeCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): { config: BerthConfig; errors: string[] } {
  const { config, errors } = loadConfig({ file: opts.config, env });

  if (opts.address !== undefined) config.server.address = opts.address.trim();
  if (opts.tlsCert !== undefined) config.server.certFile = opts.tlsCert;
  if (opts.tlsKey !== undefined) config.server.keyFile = opts.tlsKey;

  if (opts.shutdownGrace !== undefined) {
    const raw = opts.shutdownGrace.trim();
    const ms = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
    if (isShutdownGrace(ms)) {
      config.server.shutdownGraceMs = ms;
    } else {
      errors.push(
        `[flag] --shutdown-grace must be an integer between 0 and ${MAX_SHUTDOWN_GRACE_MS} (ms), got "${raw}"`,
      );
    }
  }

  if (opts.logLevel !== undefined) {
    const level = opts.logLevel.trim().toLowerCase();
    if (isLogLevel(level)) {
      config.logging.level = level;
    } else {
      errors.push(`[flag] --log-level is not a log level: ${level}`);
    }
  }

  if (!config.server.address) {
    errors.push("[flag] --address must not be empty");
  }

  return { config, errors };
}

export function serveCommand(deps: ServeCommandDeps = {}): Command {
  const run = deps.run ?? serve;

  return new Command("serve")
    .description("Serve HTTP on a TCP address or unix socket until SIGINT/SIGTERM")
    .option("-c, --config <file>", "JSON config file (default ~/.berth/config.json)")
    .option("-a, --address <address>", "host:port, or unix:<path> for a unix socket")
    .option("--tls-cert <file>", "TLS certificate (PEM); requires --tls-key")
    .option("--tls-key <file>", "TLS private key (PEM); requires --tls-cert")
    .option("--shutdown-grace <ms>", "Time allowed for in-flight requests on shutdown")
    .option("--log-level <level>", "trace|debug|info|warn|error|fatal|silent")
    .action(async (opts: ServeCommandOptions) => {
      const { config, errors } = resolveServeSettings(opts, deps.env ?? process.env);
      if (errors.length > 0) {
        throw new Error(`Invalid configuration:\n${errors.join("\n")}`);
      }

      await run({
        endpoint: {
          address: config.server.address,
          certFile: config.server.certFile,
          keyFile: config.server.keyFile,
        },
        handler: (app, server) => healthRoutes(app, server, { version: BERTH_VERSION }),
        shutdownGraceMs: config.server.shutdownGraceMs,
        logLevel: config.logging.level,
      });
    });
}
