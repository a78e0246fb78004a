import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Fastify from "fastify";
import type { ServeOptions } from "@berth/server";
import { resolveServeSettings, serveCommand } from "./serve.js";

let tmpDir: string;
let configFile: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "berth-cli-serve-"));
  configFile = path.join(tmpDir, "config.json");
  fs.writeFileSync(
    configFile,
    JSON.stringify({ server: { address: "0.0.0.0:9000", shutdownGraceMs: 3000 }, logging: { level: "warn" } }),
  );
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("resolveServeSettings", () => {
  it("uses the config file when no flags are given", () => {
    const { config, errors } = resolveServeSettings({ config: configFile }, {});
    expect(errors).toEqual([]);
    expect(config.server).toEqual({
      address: "0.0.0.0:9000",
      certFile: "",
      keyFile: "",
      shutdownGraceMs: 3000,
    });
    expect(config.logging.level).toBe("warn");
  });

  it("lets flags override env and file", () => {
    const { config, errors } = resolveServeSettings(
      {
        config: configFile,
        address: "unix:/tmp/flag.sock",
        tlsCert: "/tmp/cert.pem",
        tlsKey: "/tmp/key.pem",
        shutdownGrace: "100",
        logLevel: "Debug",
      },
      { BERTH_ADDRESS: "127.0.0.1:7000", BERTH_SHUTDOWN_GRACE_MS: "900" },
    );
    expect(errors).toEqual([]);
    expect(config.server).toEqual({
      address: "unix:/tmp/flag.sock",
      certFile: "/tmp/cert.pem",
      keyFile: "/tmp/key.pem",
      shutdownGraceMs: 100,
    });
    expect(config.logging.level).toBe("debug");
  });

  it("collects flag errors", () => {
    const { errors } = resolveServeSettings(
      { config: configFile, shutdownGrace: "2s", logLevel: "loud", address: " " },
      {},
    );
    expect(errors).toEqual([
      '[flag] --shutdown-grace must be an integer between 0 and 2147483647 (ms), got "2s"',
      "[flag] --log-level is not a log level: loud",
      "[flag] --address must not be empty",
    ]);
  });

  it("rejects a grace period longer than a timer can wait", () => {
    const { config, errors } = resolveServeSettings(
      { config: configFile, shutdownGrace: "2147483648" },
      {},
    );
    expect(errors).toEqual([
      '[flag] --shutdown-grace must be an integer between 0 and 2147483647 (ms), got "2147483648"',
    ]);
    expect(config.server.shutdownGraceMs).toBe(3000);
  });

  it("passes a blank tls path through instead of dropping it", () => {
    const { config } = resolveServeSettings({ config: configFile, tlsCert: " " }, {});
    expect(config.server.certFile).toBe(" ");
  });
});

describe("serveCommand", () => {
  it("serves the health routes at the configured endpoint", async () => {
    const run = vi.fn(async (_opts: ServeOptions) => undefined);
    const command = serveCommand({ run, env: {} });

    await command.parseAsync(
      ["--config", configFile, "--address", "unix:/tmp/berth.sock", "--shutdown-grace", "250"],
      { from: "user" },
    );

    expect(run).toHaveBeenCalledTimes(1);
    const opts = run.mock.calls[0]?.[0];
    expect(opts?.endpoint).toEqual({ address: "unix:/tmp/berth.sock", certFile: "", keyFile: "" });
    expect(opts?.shutdownGraceMs).toBe(250);
    expect(opts?.logLevel).toBe("warn");

    const app = Fastify();
    await opts?.handler(app, { isShuttingDown: () => false });
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.json().status).toBe("ok");
    expect(response.json().version).toBe("0.1.0");
    await app.close();
  });

  it("refuses to start on invalid configuration", async () => {
    const run = vi.fn(async (_opts: ServeOptions) => undefined);
    const command = serveCommand({ run, env: {} });

    await expect(
      command.parseAsync(["--config", path.join(tmpDir, "missing.json")], { from: "user" }),
    ).rejects.toThrow(`Invalid configuration:\n[file] config file not found: ${path.join(tmpDir, "missing.json")}`);
    expect(run).not.toHaveBeenCalled();
  });

  it("propagates the serve failure", async () => {
    const failure = new Error("could not bind 127.0.0.1:80: listen EACCES");
    const command = serveCommand({ run: async () => Promise.reject(failure), env: {} });

    await expect(command.parseAsync(["--config", configFile], { from: "user" })).rejects.toBe(failure);
  });
});
