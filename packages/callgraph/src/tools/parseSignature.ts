/**
 * callgraph_parse_signature - Check and normalize an entry signature.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToStructuredResponse } from "@callmap/core";

import { formatSignature, parseSignature } from "../core/signature.js";

interface ParseSignatureInput {
  signature: string;
}

export function registerParseSignature(server: McpServer): void {
  server.registerTool(
    "callgraph_parse_signature",
    {
      title: "Parse signature",
      description: `Parse a Module.function/arity signature into its parts.

Accepts an optional "Elixir." prefix and surrounding quotes, and returns the
canonical form used as node identity in generated graphs.`,
      inputSchema: {
        signature: z.string().describe('Signature such as "Elixir.MyApp.Worker.perform/1"'),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        module: z.string().optional(),
        name: z.string().optional(),
        arity: z.number().optional(),
        canonical: z.string().optional(),
      },
    },
    async (input: ParseSignatureInput) =>
      resultToStructuredResponse(parseSignature(input.signature), (signature) => {
        const canonical = formatSignature(signature);
        return {
          text: `${canonical}\nmodule: ${signature.module}\nfunction: ${signature.name}\narity: ${signature.arity}`,
          data: { module: signature.module, name: signature.name, arity: signature.arity, canonical },
        };
      })
  );
}
