import { type Result, Ok } from "@callmap/core";

import type { CallEdge, GenerateOptions, Signature } from "../model.js";
import { type AnalysisCacheDependencies, AnalysisCache } from "./AnalysisCache.js";
import { Analyzer } from "./Analyzer.js";

/**
 * Entry point of call graph generation.
 * Each `generate` call is one session with its own cache and visited set.
 */
export class CallGraphService {
  constructor(private readonly deps: AnalysisCacheDependencies) {}

  /**
   * Check that the source locator can run.
   */
  verify(): Promise<Result<string, Error>> {
    return this.deps.locator.verify();
  }

  /**
   * Build the call graph reachable from `root`.
   *
   * @returns Edges in discovery order, each pair once
   */
  async generate(root: Signature, options: GenerateOptions): Promise<Result<CallEdge[], Error>> {
    const ready = await this.verify();
    if (!ready.ok) {
      return ready;
    }

    return AnalysisCache.run(this.deps, options.projectDir, async (cache) => {
      const analyzer = new Analyzer(cache, {
        ignore: options.ignore ?? [],
        line: options.line,
      });

      const result = await analyzer.analyze(root);
      if (!result.ok) {
        return result;
      }
      return Ok(uniqueEdges(analyzer.recorded));
    });
  }
}

export function uniqueEdges(edges: readonly CallEdge[]): CallEdge[] {
  const seen = new Set<string>();
  const unique: CallEdge[] = [];
  for (const edge of edges) {
    const key = `${edge.from}\u0000${edge.to}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(edge);
  }
  return unique;
}
