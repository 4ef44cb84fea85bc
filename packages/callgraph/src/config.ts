/**
 * Project configuration: `callmap.config.json` at the project root.
 */
import path from "node:path";
import * as z from "zod/v4";
import { type Result, Ok, Err, all, tryCatch } from "@callmap/core";

import type { IgnorePattern, LocatorKind, OutputFormat } from "./core/model.js";
import type { FileSystem } from "./core/ports/FileSystem.js";
import { toIgnorePattern } from "./core/signature.js";

export const CONFIG_FILE = "callmap.config.json";

const ConfigSchema = z.object({
  ignore: z.array(z.string()).default([]),
  locator: z.enum(["ripgrep", "scan"]).default("ripgrep"),
  format: z.enum(["mermaid", "d2", "edges"]).default("mermaid"),
});

export interface CallmapConfig {
  ignore: IgnorePattern[];
  locator: LocatorKind;
  format: OutputFormat;
}

export const DEFAULT_CONFIG: CallmapConfig = {
  ignore: [],
  locator: "ripgrep",
  format: "mermaid",
};

/**
 * Load the configuration of a project. A project without a config file
 * gets the defaults.
 */
export function loadConfig(projectDir: string, fs: FileSystem): Result<CallmapConfig, Error> {
  const configPath = path.join(projectDir, CONFIG_FILE);
  if (!fs.exists(configPath)) {
    return Ok({ ...DEFAULT_CONFIG, ignore: [] });
  }

  const content = fs.read(configPath);
  if (!content.ok) {
    return Err(new Error(`Cannot read ${configPath}: ${content.error.message}`));
  }

  const json = tryCatch((): unknown => JSON.parse(content.value));
  if (!json.ok) {
    return Err(new Error(`Invalid JSON in ${configPath}: ${json.error.message}`));
  }

  return parseConfig(json.value, configPath);
}

/**
 * Validate raw configuration values.
 *
 * @param source - Where the values came from, used in error messages
 */
export function parseConfig(raw: unknown, source: string): Result<CallmapConfig, Error> {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue && issue.path.length > 0 ? issue.path.map(String).join(".") : "(root)";
    const message = issue ? issue.message : "invalid configuration";
    return Err(new Error(`Invalid configuration in ${source}: ${field}: ${message}`));
  }

  const ignore = all(parsed.data.ignore.map(toIgnorePattern));
  if (!ignore.ok) {
    return Err(new Error(`Invalid configuration in ${source}: ignore: ${ignore.error.message}`));
  }

  return Ok({
    ignore: ignore.value,
    locator: parsed.data.locator,
    format: parsed.data.format,
  });
}
