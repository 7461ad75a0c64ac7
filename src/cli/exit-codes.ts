export const ExitCode = {
  success: 0,
  /** Transport, decode, config or I/O failure */
  failure: 1,
  /** Invalid command-line arguments */
  usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
