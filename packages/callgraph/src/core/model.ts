/**
 * Core domain types for the callgraph package.
 */

/**
 * A function identified by module, name and arity.
 * Module names carry no `Elixir.` prefix.
 */
export interface Signature {
  readonly module: string;
  readonly name: string;
  readonly arity: number;
}

/** Module prefix of calls whose receiver is only known at runtime. */
export const DYNAMIC_PREFIX = "Dynamic.";

/**
 * A call found inside a function body.
 * Calls whose module starts with `Dynamic.` are pseudo-module calls.
 */
export type RawCall = Signature;

/**
 * Functions defined per module, as `name/arity` keys.
 */
export type DefinitionIndex = Map<string, Set<string>>;

export interface CallEdge {
  /** Canonical caller, e.g. `App.Handler.run/1` */
  from: string;
  /** Canonical callee */
  to: string;
}

/**
 * What the call extractor looks for in a parsed file.
 */
export interface CallQuery {
  /** Module that must contain the target definition */
  module: string;
  name: string;
  arity: number;
  /** 1-indexed line of the `def`; selects one clause among several */
  line?: number;
}

/**
 * A parsed module: its definition index, plus call extraction over the
 * syntax tree kept alive for as long as the session caches it.
 */
export interface ParsedModule {
  filePath: string;
  definitions: DefinitionIndex;
  extractCalls(query: CallQuery): RawCall[];
}

/**
 * Substring (string) or regular-expression pattern tested against the
 * canonical signature of a candidate callee.
 */
export type IgnorePattern = string | RegExp;

export interface GenerateOptions {
  /** Project root searched for module declarations */
  projectDir: string;
  ignore?: IgnorePattern[];
  /** Clause disambiguator for the root signature only */
  line?: number;
}

export type OutputFormat = "mermaid" | "d2" | "edges";

export type LocatorKind = "ripgrep" | "scan";

/**
 * Extensions of Elixir sources searched for module declarations.
 */
export const ELIXIR_EXTENSIONS = [".ex", ".exs"];

export function isDynamic(call: Signature): boolean {
  return call.module.startsWith(DYNAMIC_PREFIX);
}

/**
 * Key used in a DefinitionIndex.
 */
export function definitionKey(name: string, arity: number): string {
  return `${name}/${arity}`;
}
