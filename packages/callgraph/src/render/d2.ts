/**
 * D2 rendering of a call graph: one container per module with its
 * functions and intra-module calls, then the calls between modules.
 */
import type { CallEdge } from "../core/model.js";
import { type FunctionNode, distinctNodes, groupBy, toNodeEdges } from "./nodes.js";

export function renderD2(edges: readonly CallEdge[]): string {
  const nodeEdges = toNodeEdges(edges);
  const byModule = groupBy(distinctNodes(nodeEdges), (node) => node.module);

  const lines: string[] = ["direction: right", "# Function call graph"];

  for (const [module, functions] of byModule) {
    lines.push(`${containerId(module)}: ${module} {`);
    for (const node of functions) {
      lines.push(`  ${nodeId(node)}: ${node.name}/${node.arity}`);
    }
    for (const { from, to } of nodeEdges) {
      if (from.module === module && to.module === module) {
        lines.push(`  ${nodeId(from)} -> ${nodeId(to)}`);
      }
    }
    lines.push("}");
  }

  lines.push("", "# Connections");

  for (const { from, to } of nodeEdges) {
    if (from.module === to.module) continue;
    lines.push(`${containerId(from.module)}.${nodeId(from)} -> ${containerId(to.module)}.${nodeId(to)}`);
  }

  return lines.join("\n") + "\n";
}

function containerId(module: string): string {
  return module.replace(/\./g, "_");
}

function nodeId(node: FunctionNode): string {
  return `${node.name}_${node.arity}`;
}
