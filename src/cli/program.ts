import { Command } from "commander";
import { registerDaysCommand } from "./commands/days";
import { registerExtractCommand } from "./commands/extract";
import { registerPrayCommand } from "./commands/pray";

export function createProgram(): Command {
  const program = new Command();
  const version = process.env.npm_package_version ?? "0.1.0";
  program
    .name("hours")
    .description("Read the fixed-hour office as plain text")
    .version(version);

  registerPrayCommand(program);
  registerExtractCommand(program);
  registerDaysCommand(program);
  return program;
}
