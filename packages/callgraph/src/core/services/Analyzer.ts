import { type Result, Ok, Err } from "@callmap/core";

import { type CallEdge, type IgnorePattern, type RawCall, type Signature, isDynamic } from "../model.js";
import { formatSignature, matchesIgnore } from "../signature.js";
import type { AnalysisCache } from "./AnalysisCache.js";

export interface AnalyzerOptions {
  ignore: readonly IgnorePattern[];
  /** Clause disambiguator, applied to the root signature only */
  line?: number;
}

/**
 * Recursive driver for one analysis session.
 *
 * Explores functions depth first from a root, recording an edge for every
 * call that stays inside the project. Each signature is explored at most
 * once, which bounds the recursion on cyclic call chains.
 */
export class Analyzer {
  private readonly visited = new Set<string>();
  private readonly edges: CallEdge[] = [];

  constructor(
    private readonly cache: AnalysisCache,
    private readonly options: AnalyzerOptions
  ) {}

  /** Canonical signatures explored so far */
  get explored(): ReadonlySet<string> {
    return this.visited;
  }

  /** Edges in discovery order, duplicates included */
  get recorded(): readonly CallEdge[] {
    return this.edges;
  }

  analyze(root: Signature): Promise<Result<void, Error>> {
    return this.analyzeFunction(root, this.options.line);
  }

  private async analyzeFunction(signature: Signature, line: number | undefined): Promise<Result<void, Error>> {
    const key = formatSignature(signature);
    if (this.visited.has(key)) {
      return Ok(undefined);
    }
    this.visited.add(key);

    const located = await this.cache.sourceFile(signature.module);
    if (!located.ok) {
      return located;
    }
    // not declared in this project: a dead end, not an error
    if (located.value === null) {
      return Ok(undefined);
    }

    const parsed = this.cache.definitions(signature.module, located.value);
    if (!parsed.ok) {
      return parsed;
    }

    const raw = parsed.value.extractCalls({ ...signature, line });
    const candidates = this.filterCandidates(raw);

    const resolved = await this.resolveCandidates(candidates);
    if (!resolved.ok) {
      return resolved;
    }

    for (const callee of resolved.value) {
      this.edges.push({ from: key, to: formatSignature(callee) });
    }

    for (const callee of resolved.value) {
      if (isDynamic(callee)) continue;
      const result = await this.analyzeFunction(callee, undefined);
      if (!result.ok) {
        return result;
      }
    }

    return Ok(undefined);
  }

  /**
   * Drop repeated calls and ignored callees, keeping first-seen order.
   */
  private filterCandidates(raw: readonly RawCall[]): RawCall[] {
    const seen = new Set<string>();
    const candidates: RawCall[] = [];
    for (const call of raw) {
      const canonical = formatSignature(call);
      if (seen.has(canonical)) continue;
      seen.add(canonical);
      if (matchesIgnore(canonical, this.options.ignore)) continue;
      candidates.push(call);
    }
    return candidates;
  }

  /**
   * Keep the candidates whose module the project declares. Every lookup is
   * started before any is awaited; calls through a dynamic receiver are kept
   * without a lookup.
   */
  private async resolveCandidates(candidates: RawCall[]): Promise<Result<RawCall[], Error>> {
    const lookups = await Promise.all(
      candidates.map(async (call) => {
        if (isDynamic(call)) {
          return { call, found: Ok(true) };
        }
        const located = await this.cache.sourceFile(call.module);
        return { call, found: located.ok ? Ok(located.value !== null) : located };
      })
    );

    const survivors: RawCall[] = [];
    for (const { call, found } of lookups) {
      if (!found.ok) {
        return Err(found.error);
      }
      if (found.value) {
        survivors.push(call);
      }
    }
    return Ok(survivors);
  }
}
