import type { CallEdge } from "../core/model.js";

/**
 * One endpoint of an edge, split back into its parts.
 */
export interface FunctionNode {
  /** Canonical `module.name/arity` */
  key: string;
  module: string;
  name: string;
  arity: number;
}

export interface NodeEdge {
  from: FunctionNode;
  to: FunctionNode;
}

/**
 * Split a canonical signature at its last `.` and last `/`.
 */
export function toFunctionNode(canonical: string): FunctionNode {
  const slash = canonical.lastIndexOf("/");
  const qualified = slash === -1 ? canonical : canonical.slice(0, slash);
  const arity = slash === -1 ? 0 : Number(canonical.slice(slash + 1));
  const dot = qualified.lastIndexOf(".");
  return {
    key: canonical,
    module: dot === -1 ? "" : qualified.slice(0, dot),
    name: qualified.slice(dot + 1),
    arity,
  };
}

export function toNodeEdges(edges: readonly CallEdge[]): NodeEdge[] {
  return edges.map((edge) => ({ from: toFunctionNode(edge.from), to: toFunctionNode(edge.to) }));
}

/**
 * Every endpoint once, in order of first appearance.
 */
export function distinctNodes(edges: readonly NodeEdge[]): FunctionNode[] {
  const nodes = new Map<string, FunctionNode>();
  for (const { from, to } of edges) {
    if (!nodes.has(from.key)) nodes.set(from.key, from);
    if (!nodes.has(to.key)) nodes.set(to.key, to);
  }
  return [...nodes.values()];
}

/**
 * Group values by key, keeping keys and values in first-seen order.
 */
export function groupBy<T>(values: readonly T[], keyOf: (value: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const value of values) {
    const key = keyOf(value);
    const group = groups.get(key);
    if (group) {
      group.push(value);
    } else {
      groups.set(key, [value]);
    }
  }
  return groups;
}
