import { type Result, Err } from "@callmap/core";

import type { ParsedModule } from "../model.js";
import type { MemoStore } from "../ports/Cache.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { ModuleParser } from "../ports/ModuleParser.js";
import type { SourceLocator } from "../ports/SourceLocator.js";

export type StoreFactory = <V>() => MemoStore<V>;

export interface AnalysisCacheDependencies {
  locator: SourceLocator;
  parser: ModuleParser;
  fs: FileSystem;
  createStore: StoreFactory;
}

/**
 * Session-scoped memo tables: the file declaring each module, and the
 * parsed module (syntax tree plus definition index) of each file.
 *
 * Lookups store the in-flight promise, so concurrent lookups of one module
 * share a single search.
 */
export class AnalysisCache {
  private readonly sourceFiles: MemoStore<Promise<Result<string | null, Error>>>;
  private readonly parsedModules: MemoStore<Result<ParsedModule, Error>>;
  private disposed = false;

  constructor(
    private readonly deps: AnalysisCacheDependencies,
    private readonly projectDir: string
  ) {
    this.sourceFiles = deps.createStore();
    this.parsedModules = deps.createStore();
  }

  /**
   * Create a cache for one analysis, run `fn` with it and dispose it
   * whether `fn` resolves or rejects.
   */
  static async run<T>(
    deps: AnalysisCacheDependencies,
    projectDir: string,
    fn: (cache: AnalysisCache) => Promise<T>
  ): Promise<T> {
    const cache = new AnalysisCache(deps, projectDir);
    try {
      return await fn(cache);
    } finally {
      cache.dispose();
    }
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Number of modules looked up so far */
  get lookups(): number {
    return this.sourceFiles.size;
  }

  /**
   * Path of the file declaring a module, or null when the project has none.
   */
  sourceFile(module: string): Promise<Result<string | null, Error>> {
    if (this.disposed) {
      return Promise.resolve(Err(disposedError()));
    }
    return this.sourceFiles.getOrCompute(module, () =>
      this.deps.locator.locate(module, this.projectDir)
    );
  }

  /**
   * Parsed contents of the file declaring a module.
   */
  definitions(module: string, filePath: string): Result<ParsedModule, Error> {
    if (this.disposed) {
      return Err(disposedError());
    }
    return this.parsedModules.getOrCompute(module, () => {
      const source = this.deps.fs.read(filePath);
      if (!source.ok) {
        return Err(new Error(`Cannot read ${filePath}: ${source.error.message}`));
      }
      return this.deps.parser.parse(source.value, filePath);
    });
  }

  dispose(): void {
    this.disposed = true;
    this.sourceFiles.clear();
    this.parsedModules.clear();
  }
}

function disposedError(): Error {
  return new Error("Analysis cache used after its session ended");
}
