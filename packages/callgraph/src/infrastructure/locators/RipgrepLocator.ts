import { type Result, Ok, Err } from "@callmap/core";

import type { CommandRunner } from "../../core/ports/CommandRunner.js";
import type { SourceLocator } from "../../core/ports/SourceLocator.js";
import { declarationPattern } from "./modulePattern.js";

const RIPGREP = "rg";

// rg exits with 1 when nothing matched
const NO_MATCH = 1;

export const RIPGREP_MISSING = `Ripgrep (rg) is not installed. Please install it:

- macOS: brew install ripgrep
- Ubuntu/Debian: sudo apt-get install ripgrep
- Windows: choco install ripgrep`;

/**
 * Finds module declarations with ripgrep.
 */
export class RipgrepLocator implements SourceLocator {
  constructor(private readonly runner: CommandRunner) {}

  async verify(): Promise<Result<string, Error>> {
    const result = await this.runner.run(RIPGREP, ["--version"]);
    if (!result.ok || result.value.code !== 0) {
      return Err(new Error(RIPGREP_MISSING));
    }
    const [firstLine = RIPGREP] = result.value.stdout.split("\n");
    return Ok(firstLine.trim());
  }

  async locate(module: string, projectDir: string): Promise<Result<string | null, Error>> {
    const result = await this.runner.run(RIPGREP, [
      "--type",
      "elixir",
      "--files-with-matches",
      "--sort",
      "path",
      declarationPattern(module),
      projectDir,
    ]);

    if (!result.ok) {
      return result;
    }

    const { stdout, stderr, code } = result.value;
    const firstMatch = stdout.split("\n").find((line) => line.trim().length > 0);

    // rg also exits with 2 when some file could not be read; a match still counts
    if (firstMatch) {
      return Ok(firstMatch.trim());
    }
    if (code === 0 || code === NO_MATCH) {
      return Ok(null);
    }
    return Err(new Error(`rg failed while locating ${module}: ${stderr.trim() || `exit code ${code}`}`));
  }
}
