import type { Result } from "@callmap/core";

/**
 * Port for finding the file that declares a module.
 */
export interface SourceLocator {
  /**
   * Find the source file declaring a module.
   *
   * @param module - Module name without the `Elixir.` prefix
   * @param projectDir - Project root to search
   * @returns Path of the first declaring file, or null when no file declares it
   */
  locate(module: string, projectDir: string): Promise<Result<string | null, Error>>;

  /**
   * Check that the locator can run at all (e.g. its executable exists).
   * Called once per session, before any analysis.
   */
  verify(): Promise<Result<string, Error>>;
}
