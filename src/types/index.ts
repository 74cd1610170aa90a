export type CliCommandName = "list" | "sync" | "help";

export interface CommandResult {
  message: string;
  /** Machine-readable output written to stdout verbatim, without a log prefix. */
  stdout?: string;
  exitCode?: number;
}
