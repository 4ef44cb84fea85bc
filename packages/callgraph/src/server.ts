#!/usr/bin/env node
/**
 * MCP server for Elixir call graphs.
 */

import { runServer } from "@callmap/core";

import { DEFAULT_CONFIG, loadConfig } from "./config.js";
import type { SourceLocator } from "./core/ports/SourceLocator.js";
import { CallGraphService } from "./core/services/CallGraphService.js";
import { InMemoryStore } from "./infrastructure/cache/InMemoryStore.js";
import { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
import { RipgrepLocator } from "./infrastructure/locators/RipgrepLocator.js";
import { ScanningLocator } from "./infrastructure/locators/ScanningLocator.js";
import { TreeSitterElixirParser } from "./infrastructure/parsers/TreeSitterElixirParser.js";
import { NodeCommandRunner } from "./infrastructure/process/NodeCommandRunner.js";
import { NodeProjectScanner } from "./infrastructure/scanner/NodeProjectScanner.js";
import { type Services, registerAllTools } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "callmap:callgraph",
    version: "0.1.0",
  },
  createServices: () => {
    const projectDir = process.cwd();
    const fs = new NodeFileSystem(projectDir);

    const config = loadConfig(projectDir, fs);
    if (!config.ok) {
      console.error(`[callmap] ${config.error.message}`);
    }
    const { locator: locatorKind } = config.ok ? config.value : DEFAULT_CONFIG;

    const locator: SourceLocator =
      locatorKind === "scan"
        ? new ScanningLocator(new NodeProjectScanner(), fs)
        : new RipgrepLocator(new NodeCommandRunner(projectDir));

    return {
      callGraph: new CallGraphService({
        locator,
        parser: new TreeSitterElixirParser(),
        fs,
        createStore: <V>() => new InMemoryStore<V>(),
      }),
      fs,
      projectDir,
      config,
    };
  },
  registerTools: registerAllTools,
  onStartup: async (services) => {
    console.error(`[callmap] Project root: ${services.projectDir}`);

    const ready = await services.callGraph.verify();
    if (ready.ok) {
      console.error(`[callmap] Locating modules with ${ready.value}`);
    } else {
      console.error(`[callmap] Warning: ${ready.error.message}`);
      console.error(`[callmap] callgraph_generate will fail until this is fixed.`);
    }
  },
});
