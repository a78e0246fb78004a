import type { FastifyInstance } from "fastify";
import { BindError, errorMessage } from "../lifecycle/errors.js";

export const UNIX_SOCKET_PREFIX = "unix:";

export type ListenTarget =
  | { kind: "unix"; path: string }
  | { kind: "tcp"; host: string; port: number };

function invalidAddress(address: string, reason: string): BindError {
  return new BindError(address, `invalid listen address "${address}": ${reason}`);
}

/**
 * `unix:<path>` selects a unix domain socket at `<path>` (prefix is
 * case-sensitive); anything else is `host:port`. An empty host binds every
 * IPv4 interface and IPv6 hosts are written in brackets.
 */
export function resolveListenTarget(address: string): ListenTarget {
  if (address.startsWith(UNIX_SOCKET_PREFIX)) {
    const socketPath = address.slice(UNIX_SOCKET_PREFIX.length);
    if (!socketPath) throw invalidAddress(address, "missing socket path");
    return { kind: "unix", path: socketPath };
  }

  const sep = address.lastIndexOf(":");
  if (sep < 0) throw invalidAddress(address, "missing port");

  let host = address.slice(0, sep);
  const rawPort = address.slice(sep + 1);
  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
  } else if (host.includes(":")) {
    throw invalidAddress(address, "IPv6 hosts must be bracketed");
  }

  if (!/^\d+$/.test(rawPort)) throw invalidAddress(address, `bad port "${rawPort}"`);
  const port = Number.parseInt(rawPort, 10);
  if (port > 65535) throw invalidAddress(address, `port ${port} out of range`);

  return { kind: "tcp", host: host || "0.0.0.0", port };
}

export function describeListenTarget(target: ListenTarget): string {
  if (target.kind === "unix") return `${UNIX_SOCKET_PREFIX}${target.path}`;
  const host = target.host.includes(":") ? `[${target.host}]` : target.host;
  return `${host}:${target.port}`;
}

/** Binds `app` to `target`. On failure the app is closed and a BindError is thrown. */
export async function bindListener(
  app: FastifyInstance,
  target: ListenTarget,
  address: string,
): Promise<void> {
  try {
    if (target.kind === "unix") {
      await app.listen({ path: target.path });
    } else {
      await app.listen({ host: target.host, port: target.port });
    }
  } catch (err) {
    await app.close().catch((closeErr: unknown) => {
      app.log.warn({ err: closeErr }, "close after failed bind");
    });
    throw new BindError(
      address,
      `could not bind ${describeListenTarget(target)}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}
