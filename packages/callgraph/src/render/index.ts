import type { CallEdge, OutputFormat } from "../core/model.js";
import { renderD2 } from "./d2.js";
import { renderMermaid } from "./mermaid.js";

export { renderD2 } from "./d2.js";
export { renderMermaid } from "./mermaid.js";

/**
 * One `from -> to` line per edge.
 */
export function renderEdgeList(edges: readonly CallEdge[]): string {
  return edges.map((edge) => `${edge.from} -> ${edge.to}`).join("\n");
}

export function renderGraph(edges: readonly CallEdge[], format: OutputFormat): string {
  switch (format) {
    case "mermaid":
      return renderMermaid(edges);
    case "d2":
      return renderD2(edges);
    case "edges":
      return renderEdgeList(edges);
  }
}
