/**
 * Mermaid flowchart rendering of a call graph.
 *
 * Each caller module becomes a dashed subgraph holding one box per caller;
 * a box lists the caller's callees in call order. Boxes are then linked to
 * the boxes of callees that are callers themselves.
 */
import type { CallEdge } from "../core/model.js";
import { type FunctionNode, type NodeEdge, distinctNodes, groupBy, toNodeEdges } from "./nodes.js";

interface MermaidIds {
  modules: Map<string, string>;
  functions: Map<string, string>;
}

export function renderMermaid(edges: readonly CallEdge[]): string {
  const nodeEdges = toNodeEdges(edges);
  const ids = assignIds(nodeEdges);
  const byCaller = groupBy(nodeEdges, (edge) => edge.from.key);
  const called = new Set(nodeEdges.map((edge) => edge.to.key));

  const lines: string[] = ["flowchart LR", "  %% Function call graph"];

  for (const [caller, callees] of byCaller) {
    if (called.has(caller)) continue;
    const node = callees[0].from;
    lines.push(`  ${functionId(ids, node)}["${node.key}"]`);
  }

  lines.push("");

  const byModule = groupBy([...byCaller.values()], (callees) => callees[0].from.module);
  for (const [module, callers] of byModule) {
    const moduleId = ids.modules.get(module) ?? module;
    lines.push(`  subgraph ${moduleId}["${module}"]`);
    lines.push(`  style ${moduleId} stroke-dasharray: 5 5`);
    for (const callees of callers) {
      lines.push(...callerBox(ids, module, callees));
    }
    lines.push("  end");
  }

  lines.push("", "  %% External connections");

  for (const [caller, callees] of byCaller) {
    lines.push(...connections(ids, callees, called.has(caller), byCaller));
  }

  return lines.join("\n") + "\n";
}

/**
 * Module ids `m1..` and function ids `f1..`, numbered by first appearance.
 */
function assignIds(edges: readonly NodeEdge[]): MermaidIds {
  const modules = new Map<string, string>();
  const functions = new Map<string, string>();
  for (const node of distinctNodes(edges)) {
    if (!modules.has(node.module)) {
      modules.set(node.module, `m${modules.size + 1}`);
    }
    functions.set(node.key, `f${functions.size + 1}`);
  }
  return { modules, functions };
}

function functionId(ids: MermaidIds, node: FunctionNode): string {
  return ids.functions.get(node.key) ?? node.key;
}

function callerBox(ids: MermaidIds, module: string, callees: readonly NodeEdge[]): string[] {
  const caller = callees[0].from;
  const boxId = `${functionId(ids, caller)}_box`;
  const entryId = (node: FunctionNode): string => `${boxId}_${functionId(ids, node)}`;

  const lines = [`    subgraph ${boxId}["${caller.name}/${caller.arity}"]`];

  for (const { to } of callees) {
    const label = to.module === module ? `${to.name}/${to.arity}` : to.key;
    lines.push(`      ${entryId(to)}["${label}"]`);
  }

  for (let i = 1; i < callees.length; i++) {
    lines.push(`      ${entryId(callees[i - 1].to)} --> ${entryId(callees[i].to)}`);
  }

  lines.push("    end");
  return lines;
}

function connections(
  ids: MermaidIds,
  callees: readonly NodeEdge[],
  isCalled: boolean,
  byCaller: ReadonlyMap<string, readonly NodeEdge[]>
): string[] {
  const caller = callees[0].from;
  const callerId = functionId(ids, caller);
  const lines: string[] = [];

  // only roots point at their module container
  if (!isCalled) {
    lines.push(`  ${callerId} --> ${ids.modules.get(caller.module) ?? caller.module}`);
  }

  for (const { to } of callees) {
    if (!byCaller.has(to.key)) continue;
    const source = `${callerId}_box_${functionId(ids, to)}`;
    if (to.key === caller.key) {
      lines.push(`  ${source} --> ${source}`);
    } else {
      lines.push(`  ${source} -.-> ${functionId(ids, to)}_box`);
    }
  }

  return lines;
}
