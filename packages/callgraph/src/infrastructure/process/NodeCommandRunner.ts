/**
 * External command runner.
 * Spawns a process, collects stdout/stderr and waits for it to exit.
 */

import { spawn } from "node:child_process";
import { type Result, Ok, Err } from "@callmap/core";

import type { CommandOutput, CommandRunner } from "../../core/ports/CommandRunner.js";

export class NodeCommandRunner implements CommandRunner {
  constructor(private readonly cwd?: string) {}

  async run(command: string, args: string[]): Promise<Result<CommandOutput, Error>> {
    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        cwd: this.cwd,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let settled = false;

      proc.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on("close", (code) => {
        if (settled) return;
        settled = true;
        resolve(Ok({ stdout, stderr, code }));
      });

      proc.on("error", (error) => {
        if (settled) return;
        settled = true;
        resolve(Err(new Error(`Failed to spawn ${command}: ${error.message}`)));
      });
    });
  }
}
