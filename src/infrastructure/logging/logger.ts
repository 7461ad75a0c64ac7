import type { AppConfig } from "../config/schema";

type LogLevel = AppConfig["logLevel"];
type MessageLevel = Exclude<LogLevel, "silent">;

const LEVEL_ORDER: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same level and sink; lines are tagged `[parent:scope]`. */
  child(scope: string): Logger;
};

/** Receives finished lines. Defaults to stderr so stdout stays clean for output. */
export type LogSink = (line: string) => void;

export type LoggerOptions = {
  scope?: string;
  sink?: LogSink;
};

/**
 * Lines read `hours <level> [scope] message`, e.g.
 * `hours warn [loader] Could not mark 2026-10-19 as prayed: disk full`.
 */
export function createLogger(
  config: Pick<AppConfig, "logLevel">,
  options: LoggerOptions = {},
): Logger {
  const level = config.logLevel;
  const sink = options.sink ?? ((line: string) => console.error(line));
  const enabled = (target: MessageLevel) =>
    level !== "silent" && LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(target);
  const tag = options.scope ? ` [${options.scope}]` : "";

  const write = (target: MessageLevel) => (message: string) => {
    if (enabled(target)) sink(`hours ${target}${tag} ${message}`);
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (scope) =>
      createLogger(config, {
        sink,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}
