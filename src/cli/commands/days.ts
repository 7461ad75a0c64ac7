import { z } from "zod";
import type { Command } from "commander";
import { loadConfig } from "../../infrastructure/config/load";
import { JsonFileDayTracker } from "../../infrastructure/tracker/json-file-tracker";
import { ExitCode } from "../exit-codes";
import { defaultIO, logLevelFor, reportError, type CommandIO } from "./shared";

export const DaysArgsSchema = z.object({
  config: z.string().optional(),
  debug: z.boolean().optional(),
});

export type DaysArgs = z.infer<typeof DaysArgsSchema>;

export async function runDays(args: DaysArgs, io: CommandIO = defaultIO): Promise<ExitCode> {
  try {
    const config = await loadConfig({
      configPath: args.config,
      overrides: { logLevel: logLevelFor(args) },
    });
    const days = await new JsonFileDayTracker(config.tracker.path).completedDays();
    for (const day of days) io.stdout(`${day}\n`);
    return ExitCode.success;
  } catch (error) {
    reportError(error, args, io);
    return ExitCode.failure;
  }
}

export function registerDaysCommand(program: Command): void {
  program
    .command("days")
    .description("List the days marked as prayed")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--debug", "Debug logs (includes stack traces)")
    .action(async (opts) => {
      const parsed = DaysArgsSchema.safeParse(opts);
      if (!parsed.success) {
        console.error(parsed.error.issues.map((i) => i.message).join("\n"));
        process.exit(ExitCode.usage);
      }
      process.exit(await runDays(parsed.data));
    });
}
