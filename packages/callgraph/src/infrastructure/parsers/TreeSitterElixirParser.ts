import { Err, Ok, type Result, toError } from "@callmap/core";
import Parser from "tree-sitter";
import Elixir from "tree-sitter-elixir";

import type { CallQuery, ParsedModule, RawCall } from "../../core/model.js";
import type { ModuleParser } from "../../core/ports/ModuleParser.js";
import { extractCalls } from "./CallExtractor.js";
import { indexDefinitions } from "./DefinitionExtractor.js";
import type { SyntaxNode } from "./ElixirSyntax.js";

/**
 * Tree-sitter based parser for Elixir sources.
 */
export class TreeSitterElixirParser implements ModuleParser {
  private readonly parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Elixir);
  }

  parse(source: string, filePath: string): Result<ParsedModule, Error> {
    let root: SyntaxNode;
    try {
      root = this.parser.parse(source).rootNode;
    } catch (error) {
      return Err(new Error(`Failed to parse ${filePath}: ${toError(error).message}`));
    }

    const broken = firstError(root);
    if (broken) {
      return Err(
        new Error(`Failed to parse ${filePath}: syntax error at line ${broken.startPosition.row + 1}`)
      );
    }

    const definitions = indexDefinitions(root);

    return Ok({
      filePath,
      definitions,
      extractCalls: (query: CallQuery): RawCall[] => extractCalls(root, query, definitions),
    });
  }
}

/**
 * First ERROR or missing node in document order, if any.
 */
function firstError(node: SyntaxNode): SyntaxNode | null {
  if (node.type === "ERROR" || node.isMissing) return node;

  for (const child of node.children) {
    const found = firstError(child);
    if (found) return found;
  }
  return null;
}
