import path from "node:path";
import { type Result, Ok } from "@callmap/core";

import { ELIXIR_EXTENSIONS } from "../../core/model.js";
import type { FileSystem } from "../../core/ports/FileSystem.js";
import type { ProjectScanner } from "../../core/ports/ProjectScanner.js";
import type { SourceLocator } from "../../core/ports/SourceLocator.js";
import { declarationPattern } from "./modulePattern.js";

/**
 * Finds module declarations by reading every Elixir file of the project.
 * No external executable needed. The file list is scanned once per project.
 */
export class ScanningLocator implements SourceLocator {
  private readonly fileLists = new Map<string, Promise<Result<string[], Error>>>();

  constructor(
    private readonly scanner: ProjectScanner,
    private readonly fs: FileSystem
  ) {}

  async verify(): Promise<Result<string, Error>> {
    return Ok("project scanner");
  }

  async locate(module: string, projectDir: string): Promise<Result<string | null, Error>> {
    const files = await this.filesOf(projectDir);
    if (!files.ok) {
      return files;
    }

    const pattern = new RegExp(declarationPattern(module));

    for (const relativePath of files.value) {
      const fullPath = path.join(projectDir, relativePath);
      const content = this.fs.read(fullPath);
      // unreadable files are skipped, as ripgrep does
      if (!content.ok) continue;
      if (pattern.test(content.value)) {
        return Ok(fullPath);
      }
    }

    return Ok(null);
  }

  private filesOf(projectDir: string): Promise<Result<string[], Error>> {
    let files = this.fileLists.get(projectDir);
    if (!files) {
      files = this.scanner.scan(projectDir, ELIXIR_EXTENSIONS);
      this.fileLists.set(projectDir, files);
    }
    return files;
  }
}
