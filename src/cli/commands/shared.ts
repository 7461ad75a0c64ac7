import type { AppConfig } from "../../infrastructure/config/schema";

export type CommandIO = {
  stdout(text: string): void;
  stderr(text: string): void;
};

export const defaultIO: CommandIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

type VerbosityFlags = { verbose?: boolean; debug?: boolean };

export function logLevelFor(flags: VerbosityFlags): AppConfig["logLevel"] {
  return flags.debug ? "debug" : flags.verbose ? "info" : "error";
}

export function reportError(error: unknown, flags: VerbosityFlags, io: CommandIO): void {
  if (flags.debug && error instanceof Error) {
    io.stderr(`${error.stack ?? error.message}\n`);
  } else {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
  }
}
