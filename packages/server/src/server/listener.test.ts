import { describe, it, expect } from "vitest";
import { BindError } from "../lifecycle/errors.js";
import { describeListenTarget, resolveListenTarget } from "./listener.js";

describe("resolveListenTarget", () => {
  it("strips the unix prefix", () => {
    expect(resolveListenTarget("unix:/tmp/svc.sock")).toEqual({ kind: "unix", path: "/tmp/svc.sock" });
  });

  it("keeps relative socket paths as given", () => {
    expect(resolveListenTarget("unix:run/svc.sock")).toEqual({ kind: "unix", path: "run/svc.sock" });
  });

  it("matches the prefix case-sensitively", () => {
    expect(() => resolveListenTarget("UNIX:/tmp/svc.sock")).toThrow(BindError);
  });

  it("rejects an empty socket path", () => {
    expect(() => resolveListenTarget("unix:")).toThrow(/missing socket path/);
  });

  it("parses host and port", () => {
    expect(resolveListenTarget("127.0.0.1:8080")).toEqual({ kind: "tcp", host: "127.0.0.1", port: 8080 });
  });

  it("accepts port zero", () => {
    expect(resolveListenTarget("127.0.0.1:0")).toEqual({ kind: "tcp", host: "127.0.0.1", port: 0 });
  });

  it("binds all interfaces for an empty host", () => {
    expect(resolveListenTarget(":9000")).toEqual({ kind: "tcp", host: "0.0.0.0", port: 9000 });
  });

  it("unwraps bracketed IPv6 hosts", () => {
    expect(resolveListenTarget("[::1]:443")).toEqual({ kind: "tcp", host: "::1", port: 443 });
  });

  it("rejects bare IPv6 hosts", () => {
    expect(() => resolveListenTarget("::1:443")).toThrow(/must be bracketed/);
  });

  it.each(["localhost", "localhost:", "localhost:http", "localhost:-1", "localhost:70000"])(
    "rejects %s",
    (address) => {
      expect(() => resolveListenTarget(address)).toThrow(BindError);
    },
  );

  it("carries the address and code on the error", () => {
    try {
      resolveListenTarget("nowhere");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BindError);
      if (err instanceof BindError) {
        expect(err.code).toBe("BIND_ERROR");
        expect(err.address).toBe("nowhere");
        expect(err.message).toBe('invalid listen address "nowhere": missing port');
      }
    }
  });
});

describe("describeListenTarget", () => {
  it("formats each target kind", () => {
    expect(describeListenTarget({ kind: "unix", path: "/tmp/a.sock" })).toBe("unix:/tmp/a.sock");
    expect(describeListenTarget({ kind: "tcp", host: "0.0.0.0", port: 80 })).toBe("0.0.0.0:80");
    expect(describeListenTarget({ kind: "tcp", host: "::1", port: 80 })).toBe("[::1]:80");
  });
});
