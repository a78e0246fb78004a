import { buildProgram } from "./program.js";

buildProgram()
  .parseAsync()
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`berth: ${message}`);
    process.exitCode = 1;
  });
