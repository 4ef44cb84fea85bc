import { describe, it, expect } from "vitest";
import { Ok, Err, type Result } from "@callmap/core";

import type { CommandOutput, CommandRunner } from "../src/core/ports/CommandRunner.js";
import { RIPGREP_MISSING, RipgrepLocator } from "../src/infrastructure/locators/RipgrepLocator.js";

class FakeRunner implements CommandRunner {
  readonly invocations: Array<{ command: string; args: string[] }> = [];

  constructor(private readonly output: Result<CommandOutput, Error>) {}

  async run(command: string, args: string[]): Promise<Result<CommandOutput, Error>> {
    this.invocations.push({ command, args });
    return this.output;
  }
}

function exited(code: number | null, stdout = "", stderr = ""): Result<CommandOutput, Error> {
  return Ok({ stdout, stderr, code });
}

describe("RipgrepLocator", () => {
  describe("verify", () => {
    it("reports the ripgrep version", async () => {
      const locator = new RipgrepLocator(new FakeRunner(exited(0, "ripgrep 14.1.0\n\nfeatures:+pcre2\n")));
      expect(await locator.verify()).toEqual(Ok("ripgrep 14.1.0"));
    });

    it("explains how to install a missing ripgrep", async () => {
      const locator = new RipgrepLocator(new FakeRunner(Err(new Error("Failed to spawn rg: ENOENT"))));
      expect(await locator.verify()).toEqual(Err(new Error(RIPGREP_MISSING)));
    });
  });

  describe("locate", () => {
    it("searches Elixir files for the module declaration", async () => {
      const runner = new FakeRunner(exited(0, "/project/lib/app/handler.ex\n"));
      await new RipgrepLocator(runner).locate("App.Handler", "/project");

      expect(runner.invocations).toEqual([
        {
          command: "rg",
          args: [
            "--type",
            "elixir",
            "--files-with-matches",
            "--sort",
            "path",
            "defmodule\\s+App\\.Handler\\s+",
            "/project",
          ],
        },
      ]);
    });

    it("returns the first matching file", async () => {
      const runner = new FakeRunner(exited(0, "/project/lib/a.ex\n/project/lib/b.ex\n"));
      expect(await new RipgrepLocator(runner).locate("App.Handler", "/project")).toEqual(Ok("/project/lib/a.ex"));
    });

    it("treats exit code 1 as not found", async () => {
      const runner = new FakeRunner(exited(1));
      expect(await new RipgrepLocator(runner).locate("App.Handler", "/project")).toEqual(Ok(null));
    });

    it("keeps a match reported alongside read errors", async () => {
      const runner = new FakeRunner(exited(2, "/project/lib/a.ex\n", "permission denied"));
      expect(await new RipgrepLocator(runner).locate("App.Handler", "/project")).toEqual(Ok("/project/lib/a.ex"));
    });

    it("fails on other errors", async () => {
      const runner = new FakeRunner(exited(2, "", "regex parse error\n"));
      expect(await new RipgrepLocator(runner).locate("App.Handler", "/project")).toEqual(
        Err(new Error("rg failed while locating App.Handler: regex parse error"))
      );
    });
  });
});
