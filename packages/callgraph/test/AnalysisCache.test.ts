import { describe, it, expect } from "vitest";
import { Ok, Err, type Result } from "@callmap/core";

import type { ParsedModule } from "../src/core/model.js";
import type { FileSystem } from "../src/core/ports/FileSystem.js";
import type { ModuleParser } from "../src/core/ports/ModuleParser.js";
import type { SourceLocator } from "../src/core/ports/SourceLocator.js";
import { AnalysisCache, type AnalysisCacheDependencies } from "../src/core/services/AnalysisCache.js";
import { InMemoryStore } from "../src/infrastructure/cache/InMemoryStore.js";

class CountingLocator implements SourceLocator {
  readonly calls: string[] = [];

  async verify(): Promise<Result<string, Error>> {
    return Ok("counting");
  }

  async locate(module: string, projectDir: string): Promise<Result<string | null, Error>> {
    this.calls.push(module);
    await new Promise((resolve) => setTimeout(resolve, 5));
    return Ok(module === "Missing" ? null : `${projectDir}/${module}.ex`);
  }
}

class CountingParser implements ModuleParser {
  parsed = 0;

  parse(source: string, filePath: string): Result<ParsedModule, Error> {
    this.parsed++;
    return Ok({ filePath, definitions: new Map([[source, new Set<string>()]]), extractCalls: () => [] });
  }
}

const files: FileSystem = {
  read: (filePath) => (filePath.endsWith("Unreadable.ex") ? Err(new Error("EACCES")) : Ok("App.Worker")),
  exists: () => true,
};

function setup(): { deps: AnalysisCacheDependencies; locator: CountingLocator; parser: CountingParser } {
  const locator = new CountingLocator();
  const parser = new CountingParser();
  return {
    deps: { locator, parser, fs: files, createStore: <V>() => new InMemoryStore<V>() },
    locator,
    parser,
  };
}

describe("AnalysisCache", () => {
  it("shares one search between concurrent lookups of a module", async () => {
    const { deps, locator } = setup();
    const cache = new AnalysisCache(deps, "/project");

    const results = await Promise.all([
      cache.sourceFile("App.Worker"),
      cache.sourceFile("App.Worker"),
      cache.sourceFile("Missing"),
    ]);

    expect(results).toEqual([Ok("/project/App.Worker.ex"), Ok("/project/App.Worker.ex"), Ok(null)]);
    expect(locator.calls).toEqual(["App.Worker", "Missing"]);
    expect(cache.lookups).toBe(2);
  });

  it("parses each module once", () => {
    const { deps, parser } = setup();
    const cache = new AnalysisCache(deps, "/project");

    const first = cache.definitions("App.Worker", "/project/App.Worker.ex");
    const second = cache.definitions("App.Worker", "/project/App.Worker.ex");

    expect(parser.parsed).toBe(1);
    expect(second).toBe(first);
  });

  it("reports a file it cannot read", () => {
    const { deps, parser } = setup();
    const cache = new AnalysisCache(deps, "/project");

    const result = cache.definitions("App.Unreadable", "/project/App.Unreadable.ex");

    expect(result).toEqual(Err(new Error("Cannot read /project/App.Unreadable.ex: EACCES")));
    expect(parser.parsed).toBe(0);
  });

  it("disposes the cache when the session ends", async () => {
    const { deps } = setup();
    const sessions: AnalysisCache[] = [];

    const value = await AnalysisCache.run(deps, "/project", async (cache) => {
      sessions.push(cache);
      return cache.isDisposed;
    });

    expect(value).toBe(false);
    expect(sessions.map((cache) => cache.isDisposed)).toEqual([true]);
  });

  it("disposes the cache when the session throws", async () => {
    const { deps } = setup();
    const sessions: AnalysisCache[] = [];

    await expect(
      AnalysisCache.run(deps, "/project", async (cache) => {
        sessions.push(cache);
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(sessions.map((cache) => cache.isDisposed)).toEqual([true]);
  });

  it("refuses lookups once disposed", async () => {
    const { deps, locator } = setup();
    const cache = new AnalysisCache(deps, "/project");
    cache.dispose();

    const located = await cache.sourceFile("App.Worker");
    const parsed = cache.definitions("App.Worker", "/project/App.Worker.ex");

    expect(located.ok).toBe(false);
    expect(parsed.ok).toBe(false);
    expect(locator.calls).toEqual([]);
  });
});
