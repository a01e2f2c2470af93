/**
 * Result of a command handler. The commander action prints `output` on
 * stdout, `errorOutput` on stderr and exits with `exitCode`.
 */
export interface CliResult {
  success: boolean;
  output: string;
  errorOutput: string;
  exitCode: number;
}

/** Options shared by every command */
export interface GlobalCommandOptions {
  config?: string;
  verbose?: boolean;
}
