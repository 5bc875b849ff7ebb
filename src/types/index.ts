export type CliCommandName = "setup" | "shell" | "help";

export interface CommandResult {
  message: string;
  exitCode?: number;
}
