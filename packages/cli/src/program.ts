import { Command } from "commander";
import { serveCommand } from "./commands/serve.js";
import { BERTH_VERSION } from "./version.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("berth")
    .description("Serve HTTP until interrupted, then drain within a grace period")
    .version(BERTH_VERSION);

  program.addCommand(serveCommand());

  return program;
}
