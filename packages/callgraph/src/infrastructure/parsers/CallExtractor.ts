/**
 * Call extraction: the calls one function makes, in source order.
 *
 * The walk is a pre-order traversal with a post-visit hook. It searches for
 * the target definition, records calls while inside it, and stops visiting
 * nodes as soon as the target has been fully read.
 */
import {
  type CallQuery,
  type DefinitionIndex,
  type RawCall,
  DYNAMIC_PREFIX,
} from "../../core/model.js";
import { stripNamespace } from "../../core/signature.js";
import { definesFunction } from "./DefinitionExtractor.js";
import {
  type SyntaxNode,
  aliasText,
  argumentCount,
  argumentList,
  argumentsOf,
  definedModule,
  dotTarget,
  functionDefinition,
  identifierTarget,
  isPipe,
  keywordArgument,
  operatorOf,
  rightOperand,
  significantChildren,
} from "./ElixirSyntax.js";

export type WalkPhase = "searching" | "inside-target" | "completed";

interface TraversalState {
  readonly query: CallQuery;
  readonly definitions: DefinitionIndex;
  phase: WalkPhase;
  /** Enclosing modules, innermost last */
  modules: string[];
  /** Short name → fully qualified module */
  aliases: Map<string, string>;
  calls: RawCall[];
  /** Id of the definition node being read */
  targetNode: number | null;
  /** Whether some clause of the target has been read */
  matched: boolean;
  /** Pipe right-hand calls already accounted for by their pipe */
  consumed: Set<number>;
  /** Pipe calls recorded once the whole pipe has been visited */
  pending: Map<number, RawCall>;
}

/**
 * Extract the calls made by `query.module.query.name/query.arity`.
 *
 * Without `query.line`, every clause of the target in its module is read and
 * the calls merged; with it, only the clause starting on that line.
 */
export function extractCalls(
  root: SyntaxNode,
  query: CallQuery,
  definitions: DefinitionIndex
): RawCall[] {
  const state: TraversalState = {
    query,
    definitions,
    phase: "searching",
    modules: [],
    aliases: new Map(),
    calls: [],
    targetNode: null,
    matched: false,
    consumed: new Set(),
    pending: new Map(),
  };

  visit(root, state);
  return state.calls;
}

function visit(node: SyntaxNode, state: TraversalState): void {
  if (isCompleted(state)) return;

  const children = enter(node, state);
  for (const child of children) {
    visit(child, state);
    if (isCompleted(state)) return;
  }

  leave(node, state);
}

function isCompleted(state: TraversalState): boolean {
  return state.phase === "completed";
}

/**
 * Pre-visit hook. Returns the children to descend into.
 */
function enter(node: SyntaxNode, state: TraversalState): SyntaxNode[] {
  const declared = definedModule(node);
  if (declared) {
    const enclosing = currentModule(state);
    state.modules.push(enclosing ? `${enclosing}.${declared}` : declared);
    return node.children;
  }

  if (identifierTarget(node) === "alias") {
    recordAlias(node, state);
    return node.children;
  }

  if (state.phase === "searching") {
    const definition = functionDefinition(node);
    if (definition && isTarget(definition.name, definition.minArity, definition.maxArity, state)) {
      // another clause of the target: left untouched
      if (state.query.line !== undefined && state.query.line !== definition.line) {
        return [];
      }
      state.phase = "inside-target";
      state.targetNode = node.id;
      // only the body: the head and guard hold parameters, not calls
      return definition.body ? [definition.body] : [];
    }
    return node.children;
  }

  if (state.phase === "inside-target") {
    if (isPipe(node)) {
      recordPipe(node, state);
    } else if (node.type === "call" && !state.consumed.has(node.id)) {
      recordCall(node, argumentCount(node), state.calls, state);
    }
  }

  return node.children;
}

/**
 * Post-visit hook.
 */
function leave(node: SyntaxNode, state: TraversalState): void {
  const pipeCall = state.pending.get(node.id);
  if (pipeCall) {
    state.pending.delete(node.id);
    state.calls.push(pipeCall);
  }

  if (node.id === state.targetNode) {
    state.targetNode = null;
    state.matched = true;
    state.phase = state.query.line === undefined ? "searching" : "completed";
    return;
  }

  if (definedModule(node)) {
    const left = state.modules.pop();
    if (state.matched && left === state.query.module) {
      state.phase = "completed";
    }
  }
}

function currentModule(state: TraversalState): string | undefined {
  return state.modules[state.modules.length - 1];
}

function isTarget(name: string, minArity: number, maxArity: number, state: TraversalState): boolean {
  const { query } = state;
  return (
    name === query.name &&
    query.arity >= minArity &&
    query.arity <= maxArity &&
    currentModule(state) === query.module
  );
}

/**
 * `alias Foo.Bar` maps `Bar`; `alias Foo.Bar, as: Baz` maps `Baz`.
 */
function recordAlias(node: SyntaxNode, state: TraversalState): void {
  const [target] = argumentList(node);
  if (target?.type !== "alias") return;

  const module = resolveModule(aliasText(target), state.aliases);
  const renamed = keywordArgument(node, "as");

  let shortName: string;
  if (renamed?.type === "alias") {
    shortName = aliasText(renamed);
  } else {
    const segments = module.split(".");
    shortName = segments[segments.length - 1];
  }

  state.aliases.set(shortName, module);
}

/**
 * Resolve the first segment of a written module name through the aliases.
 */
export function resolveModule(written: string, aliases: ReadonlyMap<string, string>): string {
  const [first, ...rest] = written.split(".");
  const resolved = aliases.get(first);
  if (!resolved) {
    return stripNamespace(written);
  }
  return stripNamespace([resolved, ...rest].join("."));
}

/**
 * `value |> call(args)`: the piped value is the first argument, so the call's
 * arity is one more than written. The right-hand call is marked consumed so
 * it is not recorded again with the written arity; it is recorded when the
 * whole pipe has been visited, which keeps pipelines in source order.
 *
 * A call on a dynamic receiver keeps its written arity.
 */
function recordPipe(node: SyntaxNode, state: TraversalState): void {
  const right = rightOperand(node);
  if (!right || right.type !== "call" || state.consumed.has(right.id)) return;

  state.consumed.add(right.id);

  const dot = dotTarget(right);
  const piped = !dot || dot.receiver?.type === "alias" ? 1 : 0;

  const found: RawCall[] = [];
  recordCall(right, argumentCount(right) + piped, found, state);
  const [call] = found;
  if (call) {
    state.pending.set(node.id, call);
  }
}

/**
 * Match one call node against the call shapes and record what it calls.
 */
function recordCall(call: SyntaxNode, arity: number, into: RawCall[], state: TraversalState): void {
  const dot = dotTarget(call);

  if (!dot) {
    const name = identifierTarget(call);
    const module = currentModule(state);
    // only calls to a sibling function; the rest are Kernel or special forms
    if (name && module && definesFunction(state.definitions, module, name, arity)) {
      into.push({ module, name, arity });
    }
    return;
  }

  const { receiver, member } = dot;
  // `fun.(args)` has no member: an anonymous function call
  if (!receiver || !member) return;

  if (receiver.type === "alias") {
    into.push({
      module: resolveModule(aliasText(receiver), state.aliases),
      name: member.text,
      arity,
    });
    return;
  }

  // `map.key` without parentheses is a field access
  if (!argumentsOf(call)) return;

  const receiverName = dynamicReceiver(receiver);
  if (receiverName) {
    into.push({ module: `${DYNAMIC_PREFIX}${receiverName}`, name: member.text, arity });
  }
}

/**
 * Name of a receiver only known at runtime: a variable, a local call result
 * or a module attribute. Erlang modules (`:ets`) and other expressions have none.
 */
function dynamicReceiver(receiver: SyntaxNode): string | null {
  switch (receiver.type) {
    case "identifier":
      return receiver.text;
    case "call":
      return identifierTarget(receiver);
    case "unary_operator": {
      if (operatorOf(receiver) !== "@") return null;
      const [operand] = significantChildren(receiver);
      const name = operand?.type === "identifier" ? operand.text : operand ? identifierTarget(operand) : null;
      return name ? `@${name}` : null;
    }
    default:
      return null;
  }
}
