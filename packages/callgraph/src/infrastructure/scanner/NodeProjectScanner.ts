import fs from "node:fs";
import path from "node:path";
import { type Result, Ok, Err, toError } from "@callmap/core";

import type { ProjectScanner } from "../../core/ports/ProjectScanner.js";

// Build output, fetched dependencies and tool state of a Mix project
const ALWAYS_IGNORE = new Set([
  "_build",
  "deps",
  ".elixir_ls",
  ".lexical",
  "cover",
  "node_modules",
  ".git",
  ".hg",
  ".svn",
  ".idea",
  ".vscode",
]);

/**
 * Node.js implementation of ProjectScanner.
 * Recursively scans directories, respecting common ignore patterns.
 * Results are sorted by path.
 */
export class NodeProjectScanner implements ProjectScanner {
  private gitignorePatterns: RegExp[] = [];

  async scan(rootPath: string, extensions: string[]): Promise<Result<string[], Error>> {
    try {
      this.loadGitignore(rootPath);

      const files: string[] = [];
      const extSet = new Set(extensions.map((e) => e.toLowerCase()));

      await this.scanDirectory(rootPath, rootPath, extSet, files);

      return Ok(files.sort());
    } catch (error) {
      return Err(toError(error));
    }
  }

  shouldIgnore(filePath: string): boolean {
    const parts = filePath.split(path.sep);

    for (const part of parts) {
      if (ALWAYS_IGNORE.has(part)) {
        return true;
      }
    }

    return this.gitignorePatterns.some((pattern) => pattern.test(filePath));
  }

  private async scanDirectory(
    rootPath: string,
    currentPath: string,
    extensions: Set<string>,
    results: string[]
  ): Promise<void> {
    const entries = await fs.promises.readdir(currentPath, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);
      const relativePath = path.relative(rootPath, fullPath);

      if (this.shouldIgnore(relativePath)) {
        continue;
      }

      if (entry.isDirectory()) {
        await this.scanDirectory(rootPath, fullPath, extensions, results);
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase();
        if (extensions.has(ext)) {
          results.push(relativePath);
        }
      }
    }
  }

  private loadGitignore(rootPath: string): void {
    this.gitignorePatterns = [];

    const gitignorePath = path.join(rootPath, ".gitignore");
    if (!fs.existsSync(gitignorePath)) {
      return;
    }

    const content = fs.readFileSync(gitignorePath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();

      if (!trimmed || trimmed.startsWith("#")) {
        continue;
      }

      const pattern = this.gitignoreToRegex(trimmed);
      if (pattern) {
        this.gitignorePatterns.push(pattern);
      }
    }
  }

  private gitignoreToRegex(pattern: string): RegExp | null {
    // Negated patterns are not supported
    if (pattern.startsWith("!")) {
      return null;
    }

    let p = pattern.startsWith("/") ? pattern.slice(1) : pattern;

    // Escape special regex characters except * and ?
    p = p.replace(/[.+^${}()|[\]\\]/g, "\\$&");

    p = p.replace(/\*\*/g, "\u0000");
    p = p.replace(/\*/g, "[^/]*");
    p = p.replace(/\?/g, ".");
    p = p.replace(/\u0000/g, ".*");

    if (p.endsWith("/")) {
      p = p.slice(0, -1) + "(?:/.*)?";
    }

    return new RegExp(`(^|/)${p}($|/)`);
  }
}
