import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Command } from "commander";
import { IOError } from "../../domain/common/errors";
import { loadConfig } from "../../infrastructure/config/load";
import { createLogger } from "../../infrastructure/logging/logger";
import { extractOffice } from "../../application/office/extract";
import { ExitCode } from "../exit-codes";
import { OUTPUT_FORMATS, formatOffice } from "../format";
import { defaultIO, logLevelFor, reportError, type CommandIO } from "./shared";

export const ExtractArgsSchema = z.object({
  file: z.string().min(1),
  config: z.string().optional(),
  format: z.enum(OUTPUT_FORMATS).default("text"),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export type ExtractArgs = z.infer<typeof ExtractArgsSchema>;

export async function runExtract(
  args: ExtractArgs,
  io: CommandIO = defaultIO,
): Promise<ExitCode> {
  try {
    const config = await loadConfig({
      configPath: args.config,
      overrides: { logLevel: logLevelFor(args) },
    });
    const logger = createLogger(config);

    let html: string;
    try {
      html = await readFile(args.file, "utf8");
    } catch (error) {
      throw new IOError(`Failed to read HTML file: ${args.file}`, error, args.file);
    }

    const office = extractOffice(html);
    logger.info(`Extracted ${office.sections.length} sections from ${args.file}`);
    io.stdout(formatOffice(office, args.format));
    return ExitCode.success;
  } catch (error) {
    reportError(error, args, io);
    return ExitCode.failure;
  }
}

export function registerExtractCommand(program: Command): void {
  program
    .command("extract")
    .description("Extract an office from a saved HTML page")
    .requiredOption("--file <path>", "Path to the saved HTML page")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("-f, --format <format>", "Output format: text, markdown or json", "text")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)")
    .action(async (opts) => {
      const parsed = ExtractArgsSchema.safeParse(opts);
      if (!parsed.success) {
        console.error(parsed.error.issues.map((i) => i.message).join("\n"));
        process.exit(ExitCode.usage);
      }
      process.exit(await runExtract(parsed.data));
    });
}
