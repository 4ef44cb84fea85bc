// Core types and utilities
export { DYNAMIC_PREFIX, ELIXIR_EXTENSIONS, definitionKey, isDynamic } from "./core/model.js";
export type {
  CallEdge,
  CallQuery,
  DefinitionIndex,
  GenerateOptions,
  IgnorePattern,
  LocatorKind,
  OutputFormat,
  ParsedModule,
  RawCall,
  Signature,
} from "./core/model.js";
export { formatSignature, matchesIgnore, parseSignature, stripNamespace, toIgnorePattern } from "./core/signature.js";

// Ports
export type { MemoStore } from "./core/ports/Cache.js";
export type { CommandOutput, CommandRunner } from "./core/ports/CommandRunner.js";
export type { FileSystem } from "./core/ports/FileSystem.js";
export type { ModuleParser } from "./core/ports/ModuleParser.js";
export type { ProjectScanner } from "./core/ports/ProjectScanner.js";
export type { SourceLocator } from "./core/ports/SourceLocator.js";

// Services
export { AnalysisCache } from "./core/services/AnalysisCache.js";
export type { AnalysisCacheDependencies, StoreFactory } from "./core/services/AnalysisCache.js";
export { Analyzer } from "./core/services/Analyzer.js";
export type { AnalyzerOptions } from "./core/services/Analyzer.js";
export { CallGraphService, uniqueEdges } from "./core/services/CallGraphService.js";

// Infrastructure implementations
export { InMemoryStore } from "./infrastructure/cache/InMemoryStore.js";
export { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
export { RIPGREP_MISSING, RipgrepLocator } from "./infrastructure/locators/RipgrepLocator.js";
export { ScanningLocator } from "./infrastructure/locators/ScanningLocator.js";
export { TreeSitterElixirParser } from "./infrastructure/parsers/TreeSitterElixirParser.js";
export { NodeCommandRunner } from "./infrastructure/process/NodeCommandRunner.js";
export { NodeProjectScanner } from "./infrastructure/scanner/NodeProjectScanner.js";

// Rendering and configuration
export { renderD2, renderEdgeList, renderGraph, renderMermaid } from "./render/index.js";
export { CONFIG_FILE, DEFAULT_CONFIG, loadConfig, parseConfig } from "./config.js";
export type { CallmapConfig } from "./config.js";

// Tool exports
export { registerAllTools } from "./tools/index.js";
export type { Services } from "./tools/index.js";
