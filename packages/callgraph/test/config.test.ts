import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import { CONFIG_FILE, DEFAULT_CONFIG, loadConfig, parseConfig } from "../src/config.js";
import { NodeFileSystem } from "../src/infrastructure/filesystem/NodeFileSystem.js";

describe("loadConfig", () => {
  let projectDir: string;
  const fs = new NodeFileSystem();

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), "callmap-config-"));
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const configPath = join(projectDir, CONFIG_FILE);
    writeFileSync(configPath, content);
    return configPath;
  }

  it("uses the defaults without a config file", () => {
    expect(loadConfig(projectDir, fs)).toEqual({ ok: true, value: DEFAULT_CONFIG });
  });

  it("reads ignore patterns, locator and format", () => {
    writeConfig(JSON.stringify({ ignore: ["Repo", "/\\.changeset\\//i"], locator: "scan", format: "d2" }));

    const result = loadConfig(projectDir, fs);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.locator).toBe("scan");
    expect(result.value.format).toBe("d2");
    expect(result.value.ignore[0]).toBe("Repo");
    expect(result.value.ignore[1]).toEqual(/\.changeset\//i);
  });

  it("fills in missing fields", () => {
    writeConfig(JSON.stringify({ format: "edges" }));
    expect(loadConfig(projectDir, fs)).toEqual({
      ok: true,
      value: { ignore: [], locator: "ripgrep", format: "edges" },
    });
  });

  it("names the failing field", () => {
    const configPath = writeConfig(JSON.stringify({ locator: "grep" }));

    const result = loadConfig(projectDir, fs);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message.startsWith(`Invalid configuration in ${configPath}: locator: `)).toBe(true);
  });

  it("rejects malformed JSON", () => {
    const configPath = writeConfig("{ ignore: ");

    const result = loadConfig(projectDir, fs);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message.startsWith(`Invalid JSON in ${configPath}: `)).toBe(true);
  });
});

describe("parseConfig", () => {
  it("rejects a broken ignore expression", () => {
    const result = parseConfig({ ignore: ["/([/"] }, "inline");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message.startsWith("Invalid configuration in inline: ignore: Invalid ignore pattern /([/: ")).toBe(
      true
    );
  });

  it("names nested fields by path", () => {
    const result = parseConfig({ ignore: ["Repo", 42] }, "inline");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message.startsWith("Invalid configuration in inline: ignore.1: ")).toBe(true);
  });
});
