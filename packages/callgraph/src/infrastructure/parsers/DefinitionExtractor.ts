/**
 * Definition indexing: which functions each module of a file defines.
 */
import { type DefinitionIndex, definitionKey } from "../../core/model.js";
import { type SyntaxNode, definedModule, functionDefinition } from "./ElixirSyntax.js";

/**
 * Index every `def`/`defp` of a file under its enclosing module.
 * Nested modules are named `Outer.Inner`; their definitions never leak into
 * the enclosing or sibling modules. A definition with default parameters is
 * recorded under each arity it can be called with.
 */
export function indexDefinitions(root: SyntaxNode): DefinitionIndex {
  const index: DefinitionIndex = new Map();
  const modules: string[] = [];

  function record(module: string, key: string): void {
    let keys = index.get(module);
    if (!keys) {
      keys = new Set();
      index.set(module, keys);
    }
    keys.add(key);
  }

  function visit(node: SyntaxNode): void {
    const declared = definedModule(node);
    if (declared) {
      const enclosing = modules[modules.length - 1];
      const module = enclosing ? `${enclosing}.${declared}` : declared;
      modules.push(module);
      if (!index.has(module)) {
        index.set(module, new Set());
      }
      for (const child of node.children) {
        visit(child);
      }
      modules.pop();
      return;
    }

    const definition = functionDefinition(node);
    if (definition) {
      const module = modules[modules.length - 1];
      if (module) {
        for (let arity = definition.minArity; arity <= definition.maxArity; arity++) {
          record(module, definitionKey(definition.name, arity));
        }
      }
      // function bodies hold no further definitions
      return;
    }

    for (const child of node.children) {
      visit(child);
    }
  }

  visit(root);
  return index;
}

export function definesFunction(
  index: DefinitionIndex,
  module: string,
  name: string,
  arity: number
): boolean {
  return index.get(module)?.has(definitionKey(name, arity)) ?? false;
}
