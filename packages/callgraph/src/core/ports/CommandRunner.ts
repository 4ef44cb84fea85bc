import type { Result } from "@callmap/core";

export interface CommandOutput {
  stdout: string;
  stderr: string;
  /** Exit code, null when the process was killed by a signal */
  code: number | null;
}

/**
 * Port for running an external command to completion.
 */
export interface CommandRunner {
  /**
   * Run a command and collect its output.
   * Resolves to Err only when the process cannot be spawned;
   * a non-zero exit code is reported in the output.
   */
  run(command: string, args: string[]): Promise<Result<CommandOutput, Error>>;
}
