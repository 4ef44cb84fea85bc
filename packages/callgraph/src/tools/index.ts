import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Result } from "@callmap/core";

import type { CallmapConfig } from "../config.js";
import type { FileSystem } from "../core/ports/FileSystem.js";
import type { CallGraphService } from "../core/services/CallGraphService.js";
import { registerGenerateGraph } from "./generateGraph.js";
import { registerParseSignature } from "./parseSignature.js";

export interface Services {
  callGraph: CallGraphService;
  fs: FileSystem;
  /** Default project root */
  projectDir: string;
  /** Configuration of the default project, as loaded at startup */
  config: Result<CallmapConfig, Error>;
}

export function registerAllTools(server: McpServer, services: Services): void {
  registerGenerateGraph(server, services);
  registerParseSignature(server);
}
