import { z } from "zod";
import type { Command } from "commander";
import { loadConfig } from "../../infrastructure/config/load";
import { createLogger } from "../../infrastructure/logging/logger";
import { createHttpOfficeFetcher } from "../../infrastructure/http/office-fetcher";
import type { FetchLike } from "../../infrastructure/http/safe-fetch";
import { JsonFileDayTracker } from "../../infrastructure/tracker/json-file-tracker";
import { OfficeLoader } from "../../application/office/loader";
import { ExitCode } from "../exit-codes";
import { OUTPUT_FORMATS, formatOffice } from "../format";
import { reportError, type CommandIO, defaultIO, logLevelFor } from "./shared";

export const PrayArgsSchema = z.object({
  config: z.string().optional(),
  format: z.enum(OUTPUT_FORMATS).default("text"),
  track: z.boolean().default(true),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export type PrayArgs = z.infer<typeof PrayArgsSchema>;

export async function runPray(
  args: PrayArgs,
  io: CommandIO = defaultIO,
  fetchImpl?: FetchLike,
): Promise<ExitCode> {
  try {
    const config = await loadConfig({
      configPath: args.config,
      overrides: { logLevel: logLevelFor(args) },
    });
    const logger = createLogger(config);
    const fetcher = createHttpOfficeFetcher({ ...config.source, fetchImpl });
    const tracker =
      args.track && config.tracker.enabled
        ? new JsonFileDayTracker(config.tracker.path)
        : undefined;

    const loader = new OfficeLoader({ fetcher, tracker, logger });
    const state = await loader.load();
    if (state.status !== "loaded") {
      io.stderr(`${state.status === "failed" ? state.reason : "Load did not complete"}\n`);
      return ExitCode.failure;
    }
    io.stdout(formatOffice(state.office, args.format));
    return ExitCode.success;
  } catch (error) {
    reportError(error, args, io);
    return ExitCode.failure;
  }
}

export function registerPrayCommand(program: Command): void {
  program
    .command("pray")
    .description("Fetch today's office, print it and mark the day as prayed")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("-f, --format <format>", "Output format: text, markdown or json", "text")
    .option("--no-track", "Do not mark the day as prayed")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)")
    .action(async (opts) => {
      const parsed = PrayArgsSchema.safeParse(opts);
      if (!parsed.success) {
        console.error(parsed.error.issues.map((i) => i.message).join("\n"));
        process.exit(ExitCode.usage);
      }
      process.exit(await runPray(parsed.data));
    });
}
