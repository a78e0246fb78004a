import fs from "node:fs";
import http from "node:http";
import https from "node:https";
import tls from "node:tls";
import { TlsConfigError, errorMessage } from "../lifecycle/errors.js";
import type { OutcomeSlot } from "../lifecycle/outcome.js";
import type { LifecycleLogger } from "../lifecycle/types.js";

export type ServiceEndpoint = {
  readonly address: string;
  /** Empty for plain HTTP. */
  readonly certFile: string;
  readonly keyFile: string;
};

export type ServeMode =
  | { kind: "plain" }
  | { kind: "tls"; cert: Buffer; key: Buffer };

export type RawRequestListener = (req: http.IncomingMessage, res: http.ServerResponse) => void;

function readPem(file: string, label: string): Buffer {
  try {
    return fs.readFileSync(file);
  } catch (err) {
    throw new TlsConfigError(`could not read TLS ${label} ${file}: ${errorMessage(err)}`, { cause: err });
  }
}

export function loadTlsMaterial(certFile: string, keyFile: string): { cert: Buffer; key: Buffer } {
  const cert = readPem(certFile, "certificate");
  const key = readPem(keyFile, "key");
  try {
    tls.createSecureContext({ cert, key });
  } catch (err) {
    throw new TlsConfigError(
      `invalid TLS key pair (${certFile}, ${keyFile}): ${errorMessage(err)}`,
      { cause: err },
    );
  }
  return { cert, key };
}

/**
 * Plain only when both paths are the empty string; any other value, blanks
 * included, selects TLS. Setting only one of the two is rejected rather than
 * served with half a key pair.
 */
export function resolveServeMode(endpoint: ServiceEndpoint): ServeMode {
  const { certFile, keyFile } = endpoint;
  if (certFile === "" && keyFile === "") return { kind: "plain" };
  if (certFile === "" || keyFile === "") {
    throw new TlsConfigError(
      `both a TLS certificate and key are required (certificate: "${certFile}", key: "${keyFile}")`,
    );
  }
  const material = loadTlsMaterial(certFile, keyFile);
  return { kind: "tls", cert: material.cert, key: material.key };
}

export function createRawServer(mode: ServeMode, listener: RawRequestListener): http.Server {
  if (mode.kind === "tls") {
    return https.createServer({ cert: mode.cert, key: mode.key }, listener);
  }
  return http.createServer(listener);
}

export type ServeLoopOptions = {
  outcome: OutcomeSlot;
  logger: LifecycleLogger;
  mode: ServeMode;
  address: string;
};

/**
 * Watches an already-bound server until it stops. Closing the server is the
 * deliberate-close outcome; an `error` after binding is a failure that is
 * reported as-is, after which the listener is released.
 */
export function runServeLoop(server: http.Server, opts: ServeLoopOptions): void {
  const { outcome, logger, mode, address } = opts;

  server.once("close", () => {
    outcome.offer({ kind: "closed" });
  });

  server.on("error", (error: Error) => {
    if (!outcome.offer({ kind: "failed", error })) return;
    logger.error({ err: error, addr: address }, "HTTP serve failed");
    server.close((closeErr) => {
      if (closeErr) logger.warn({ err: closeErr }, "release listener after serve failure");
    });
  });

  if (mode.kind === "tls") {
    logger.info({ addr: address }, "Start HTTP with tls");
  } else {
    logger.info({ addr: address }, "Start HTTP");
  }
}
