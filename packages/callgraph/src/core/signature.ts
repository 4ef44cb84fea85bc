import { Err, Ok, type Result } from "@callmap/core";

import type { IgnorePattern, Signature } from "./model.js";

const NAMESPACE_PREFIX = "Elixir.";
const FUNCTION_NAME = /^[a-z_][a-zA-Z0-9_]*[?!]?$/;
const ARITY = /^\d+$/;

const FORMAT_HELP = `Expected format: Module.function/arity or "Elixir.Module.function/arity"

Examples:
- MyApp.UserController.create/2
- "Elixir.MyApp.UserController.create/2"`;

export function stripNamespace(module: string): string {
  return module.startsWith(NAMESPACE_PREFIX) ? module.slice(NAMESPACE_PREFIX.length) : module;
}

/**
 * Canonical `module.name/arity` form used as graph node identity.
 */
export function formatSignature(signature: Signature): string {
  return `${stripNamespace(signature.module)}.${signature.name}/${signature.arity}`;
}

/**
 * Parse `Module.function/arity` (optionally quoted, optionally prefixed
 * with `Elixir.`) into a Signature.
 */
export function parseSignature(text: string): Result<Signature, Error> {
  const trimmed = text.trim().replace(/^"+|"+$/g, "");
  const invalid = (reason: string): Result<never, Error> =>
    Err(new Error(`Invalid signature "${text}": ${reason}.\n${FORMAT_HELP}`));

  const slash = trimmed.lastIndexOf("/");
  if (slash === -1) {
    return invalid("missing arity");
  }

  const arityText = trimmed.slice(slash + 1);
  if (!ARITY.test(arityText)) {
    return invalid("arity must be a non-negative integer");
  }

  const qualified = trimmed.slice(0, slash);
  const dot = qualified.lastIndexOf(".");
  if (dot === -1) {
    return invalid("missing module");
  }

  const module = stripNamespace(qualified.slice(0, dot));
  const name = qualified.slice(dot + 1);

  if (module.length === 0 || module.split(".").some((segment) => segment.length === 0)) {
    return invalid("bad module name");
  }
  if (!FUNCTION_NAME.test(name)) {
    return invalid("bad function name");
  }

  return Ok({ module, name, arity: Number(arityText) });
}

/**
 * Turn a configured pattern into an IgnorePattern: `/body/flags` becomes a
 * RegExp, anything else stays a substring.
 */
export function toIgnorePattern(text: string): Result<IgnorePattern, Error> {
  const match = /^\/(.+)\/([a-z]*)$/.exec(text);
  if (!match) {
    return Ok(text);
  }
  try {
    // stateless flags only: the same RegExp is tested against many signatures
    return Ok(new RegExp(match[1], match[2].replace(/[gy]/g, "")));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err(new Error(`Invalid ignore pattern ${text}: ${reason}`));
  }
}

export function matchesIgnore(canonical: string, patterns: readonly IgnorePattern[]): boolean {
  return patterns.some((pattern) =>
    typeof pattern === "string" ? canonical.includes(pattern) : pattern.test(canonical)
  );
}
