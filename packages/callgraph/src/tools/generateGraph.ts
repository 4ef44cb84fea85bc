/**
 * callgraph_generate - Build the call graph reachable from an entry function.
 */

import path from "node:path";
import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type ToolResponse, type FailureContent, all, errorResponse } from "@callmap/core";

import { loadConfig } from "../config.js";
import type { CallEdge, OutputFormat } from "../core/model.js";
import { formatSignature, parseSignature, toIgnorePattern } from "../core/signature.js";
import { renderGraph } from "../render/index.js";
import type { Services } from "./index.js";

interface GenerateGraphInput {
  entry: string;
  line?: number;
  ignore?: string[];
  format?: OutputFormat;
  projectDir?: string;
}

interface GenerateGraphOutput extends Record<string, unknown> {
  success: true;
  entry: string;
  format: OutputFormat;
  edges: CallEdge[];
  count: number;
}

export function registerGenerateGraph(server: McpServer, services: Services): void {
  server.registerTool(
    "callgraph_generate",
    {
      title: "Generate call graph",
      description: `Build the call graph of an Elixir project starting from one function.

Follows every call the entry function makes to functions defined in the same
project, recursively. Calls through a runtime value (conn.assign/3, @repo.get/2)
are kept as Dynamic.<receiver> leaves.

Use cases:
- See everything a controller action or job ends up calling
- Check the impact of changing a function
- Produce a Mermaid or D2 diagram of a code path

Example: callgraph_generate({ entry: "MyApp.UserController.create/2", ignore: ["Repo"] })`,
      inputSchema: {
        entry: z.string().describe('Entry function as Module.function/arity, e.g. "MyApp.Accounts.register/1"'),
        line: z.number().int().min(1).optional().describe("Line of the def clause to start from, when the entry has several"),
        ignore: z
          .array(z.string())
          .optional()
          .describe("Extra callee patterns to skip: substrings, or /regex/flags. Added to the configured ones"),
        format: z.enum(["mermaid", "d2", "edges"]).optional().describe("Output format (default: from config, else mermaid)"),
        projectDir: z.string().optional().describe("Project root (default: the server's working directory)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        entry: z.string().optional(),
        format: z.enum(["mermaid", "d2", "edges"]).optional(),
        edges: z.array(z.object({ from: z.string(), to: z.string() })).optional(),
        count: z.number().optional(),
      },
    },
    async (input: GenerateGraphInput): Promise<ToolResponse<GenerateGraphOutput | FailureContent>> => {
      const signature = parseSignature(input.entry);
      if (!signature.ok) {
        return errorResponse(signature.error.message);
      }

      const projectDir = input.projectDir ? path.resolve(services.projectDir, input.projectDir) : services.projectDir;

      const config = projectDir === services.projectDir ? services.config : loadConfig(projectDir, services.fs);
      if (!config.ok) {
        return errorResponse(config.error.message);
      }

      const extraIgnore = all((input.ignore ?? []).map(toIgnorePattern));
      if (!extraIgnore.ok) {
        return errorResponse(extraIgnore.error.message);
      }

      const result = await services.callGraph.generate(signature.value, {
        projectDir,
        ignore: [...config.value.ignore, ...extraIgnore.value],
        line: input.line,
      });
      if (!result.ok) {
        return errorResponse(result.error.message);
      }

      const entry = formatSignature(signature.value);
      const format = input.format ?? config.value.format;
      const edges = result.value;

      const text =
        edges.length === 0
          ? `No calls to project functions found from ${entry}`
          : renderGraph(edges, format);

      return {
        content: [{ type: "text", text }],
        structuredContent: {
          success: true,
          entry,
          format,
          edges,
          count: edges.length,
        },
      };
    }
  );
}
