import type { Result } from "@callmap/core";

import type { ParsedModule } from "../model.js";

/**
 * Port for parsing a source file into a ParsedModule.
 */
export interface ModuleParser {
  /**
   * Parse source code and index its definitions.
   *
   * @param source - File contents
   * @param filePath - Path reported in errors
   * @returns The parsed module, or an error when the source does not parse cleanly
   */
  parse(source: string, filePath: string): Result<ParsedModule, Error>;
}
