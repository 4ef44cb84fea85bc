/**
 * Regex source matching the declaration of a module,
 * e.g. `defmodule\s+App\.Handler\s+` for `App.Handler`.
 */
export function declarationPattern(module: string): string {
  const escaped = module.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return `defmodule\\s+${escaped}\\s+`;
}
