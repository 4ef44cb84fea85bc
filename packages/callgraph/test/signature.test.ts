import { describe, it, expect } from "vitest";

import {
  formatSignature,
  matchesIgnore,
  parseSignature,
  stripNamespace,
  toIgnorePattern,
} from "../src/core/signature.js";

function errorOf(text: string): string {
  const result = parseSignature(text);
  if (result.ok) {
    throw new Error(`expected ${text} to be rejected`);
  }
  return result.error.message;
}

describe("parseSignature", () => {
  it("parses Module.function/arity", () => {
    expect(parseSignature("App.Handler.run/1")).toEqual({
      ok: true,
      value: { module: "App.Handler", name: "run", arity: 1 },
    });
  });

  it("strips quotes and the Elixir prefix", () => {
    expect(parseSignature('"Elixir.MyApp.UserController.create/2"')).toEqual({
      ok: true,
      value: { module: "MyApp.UserController", name: "create", arity: 2 },
    });
  });

  it("accepts predicate and bang names", () => {
    expect(parseSignature("App.Accounts.valid?/1")).toEqual({
      ok: true,
      value: { module: "App.Accounts", name: "valid?", arity: 1 },
    });
    expect(parseSignature("App.Accounts.create!/0")).toEqual({
      ok: true,
      value: { module: "App.Accounts", name: "create!", arity: 0 },
    });
  });

  it("names what is wrong", () => {
    expect(errorOf("App.Handler.run").startsWith('Invalid signature "App.Handler.run": missing arity.\n')).toBe(true);
    expect(errorOf("App.Handler.run/x")).toContain(": arity must be a non-negative integer.");
    expect(errorOf("App.Handler.run/-1")).toContain(": arity must be a non-negative integer.");
    expect(errorOf("run/1")).toContain(": missing module.");
    expect(errorOf("App..run/1")).toContain(": bad module name.");
    expect(errorOf("App.Run/1")).toContain(": bad function name.");
  });

  it("shows the expected format", () => {
    expect(errorOf("nonsense")).toContain("Expected format: Module.function/arity");
  });
});

describe("formatSignature", () => {
  it("drops the Elixir prefix", () => {
    expect(formatSignature({ module: "Elixir.App.Utils", name: "format", arity: 1 })).toBe("App.Utils.format/1");
    expect(stripNamespace("App.Utils")).toBe("App.Utils");
  });
});

describe("ignore patterns", () => {
  it("keeps plain text as a substring", () => {
    expect(toIgnorePattern("Repo")).toEqual({ ok: true, value: "Repo" });
  });

  it("turns /body/flags into a stateless RegExp", () => {
    const result = toIgnorePattern("/^app\\./gi");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBeInstanceOf(RegExp);
    if (!(result.value instanceof RegExp)) return;
    expect(result.value.source).toBe("^app\\.");
    expect(result.value.flags).toBe("i");
  });

  it("rejects a broken expression", () => {
    const result = toIgnorePattern("/([/");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message.startsWith("Invalid ignore pattern /([/: ")).toBe(true);
  });

  it("matches canonical signatures", () => {
    const patterns = ["Repo", /\.changeset\/\d+$/];
    expect(matchesIgnore("App.Repo.insert/1", patterns)).toBe(true);
    expect(matchesIgnore("App.User.changeset/2", patterns)).toBe(true);
    expect(matchesIgnore("App.User.create/1", patterns)).toBe(false);
    expect(matchesIgnore("App.User.create/1", [])).toBe(false);
  });
});
