/**
 * Helpers for reading tree-sitter-elixir nodes.
 *
 * Everything in Elixir is a call: `defmodule`, `def` and `alias` are `call`
 * nodes whose target is an identifier, remote calls have a `dot` target, and
 * `|>` is a `binary_operator`.
 */
import type Parser from "tree-sitter";

export type SyntaxNode = Parser.SyntaxNode;

const DEFINITION_KEYWORDS = new Set(["def", "defp"]);

export interface FunctionDefinition {
  name: string;
  /** 1-indexed line of the `def` keyword */
  line: number;
  /** Arity without the parameters that have defaults */
  minArity: number;
  maxArity: number;
  /** `do` block or `do:` value; null for bodiless heads */
  body: SyntaxNode | null;
}

export interface DotTarget {
  receiver: SyntaxNode | null;
  member: SyntaxNode | null;
}

export function significantChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child) => child.type !== "comment");
}

/**
 * Operator token of a binary or unary operator node, e.g. `|>` or `when`.
 */
export function operatorOf(node: SyntaxNode): string | null {
  const operator = node.childForFieldName("operator");
  if (operator) {
    return operator.type;
  }
  const token = node.children.find((child) => !child.isNamed);
  return token ? token.type : null;
}

export function isPipe(node: SyntaxNode): boolean {
  return node.type === "binary_operator" && operatorOf(node) === "|>";
}

export function leftOperand(node: SyntaxNode): SyntaxNode | null {
  return node.childForFieldName("left") ?? significantChildren(node)[0] ?? null;
}

export function rightOperand(node: SyntaxNode): SyntaxNode | null {
  const children = significantChildren(node);
  return node.childForFieldName("right") ?? children[children.length - 1] ?? null;
}

export function callTarget(call: SyntaxNode): SyntaxNode | null {
  return call.childForFieldName("target");
}

/**
 * Name of a call whose target is a plain identifier (`foo(1)`, `def ...`).
 */
export function identifierTarget(call: SyntaxNode): string | null {
  if (call.type !== "call") return null;
  const target = callTarget(call);
  return target?.type === "identifier" ? target.text : null;
}

export function argumentsOf(call: SyntaxNode): SyntaxNode | null {
  return call.namedChildren.find((child) => child.type === "arguments") ?? null;
}

export function doBlockOf(call: SyntaxNode): SyntaxNode | null {
  return call.namedChildren.find((child) => child.type === "do_block") ?? null;
}

export function argumentList(call: SyntaxNode): SyntaxNode[] {
  const args = argumentsOf(call);
  return args ? significantChildren(args) : [];
}

/**
 * Number of arguments a call passes. Trailing keywords form one argument,
 * and so does a `do ... end` block.
 */
export function argumentCount(call: SyntaxNode): number {
  return argumentList(call).length + (doBlockOf(call) ? 1 : 0);
}

export function dotTarget(call: SyntaxNode): DotTarget | null {
  const target = callTarget(call);
  if (!target || target.type !== "dot") return null;
  return {
    receiver: target.childForFieldName("left"),
    member: target.childForFieldName("right"),
  };
}

/**
 * Text of an alias node without insignificant whitespace, e.g. `App.Handler`.
 */
export function aliasText(node: SyntaxNode): string {
  return node.text.replace(/\s+/g, "");
}

/**
 * Module name of a `defmodule Name do ... end` call, as written.
 */
export function definedModule(node: SyntaxNode): string | null {
  if (identifierTarget(node) !== "defmodule") return null;
  const [name] = argumentList(node);
  return name?.type === "alias" ? aliasText(name) : null;
}

/**
 * Key of a keyword pair (`as:` → `as`).
 */
export function keywordKey(pair: SyntaxNode): string | null {
  const key = pair.childForFieldName("key") ?? significantChildren(pair)[0];
  return key ? key.text.trim().replace(/:$/, "") : null;
}

export function keywordValue(pair: SyntaxNode): SyntaxNode | null {
  return pair.childForFieldName("value") ?? significantChildren(pair)[1] ?? null;
}

/**
 * Value of a keyword in a call's trailing keyword list (`alias X, as: Y`).
 */
export function keywordArgument(call: SyntaxNode, key: string): SyntaxNode | null {
  for (const arg of argumentList(call)) {
    if (arg.type !== "keywords") continue;
    for (const pair of significantChildren(arg)) {
      if (pair.type === "pair" && keywordKey(pair) === key) {
        return keywordValue(pair);
      }
    }
  }
  return null;
}

function isDefaultParameter(node: SyntaxNode): boolean {
  return node.type === "binary_operator" && operatorOf(node) === "\\\\";
}

/**
 * Read a `def`/`defp` call: name, arity range, line and body.
 * The head is unwrapped from a `when` guard. Returns null for anything else,
 * including heads built with `unquote`.
 */
export function functionDefinition(node: SyntaxNode): FunctionDefinition | null {
  const keyword = identifierTarget(node);
  if (!keyword || !DEFINITION_KEYWORDS.has(keyword)) return null;

  let [head] = argumentList(node);
  if (!head) return null;

  if (head.type === "binary_operator" && operatorOf(head) === "when") {
    const guarded = leftOperand(head);
    if (!guarded) return null;
    head = guarded;
  }

  let name: string;
  let params: SyntaxNode[];
  if (head.type === "identifier") {
    name = head.text;
    params = [];
  } else {
    const headName = identifierTarget(head);
    if (!headName) return null;
    name = headName;
    params = argumentList(head);
  }

  const defaults = params.filter(isDefaultParameter).length;

  return {
    name,
    line: node.startPosition.row + 1,
    minArity: params.length - defaults,
    maxArity: params.length,
    body: doBlockOf(node) ?? keywordArgument(node, "do"),
  };
}
