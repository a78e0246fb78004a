export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export type BerthConfig = {
  server: {
    address: string;
    certFile: string;
    keyFile: string;
    shutdownGraceMs: number;
  };
  logging: {
    level: LogLevel;
  };
};

export type ConfigSource = "default" | "file" | "env";
