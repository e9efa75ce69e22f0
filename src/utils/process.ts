import { spawnSync } from "node:child_process";
import { ExternalToolError } from "../errors.js";
import { log } from "./log.js";

function quote(arg: string): string {
  return `"${arg}"`;
}

export interface RunOptions {
  /** Text fed to the tool's stdin. Without it the tool shares our stdin. */
  input?: string;
}

/**
 * Runs a command to completion and returns its exit status.
 * There is no timeout: a hung tool blocks the caller.
 */
export function runTool(tool: string, args: string[], options: RunOptions = {}): number {
  log.debug(`Calling: ${[tool, ...args].map(quote).join(" ")}`);
  const result = spawnSync(tool, args, {
    encoding: "utf8",
    input: options.input,
    stdio: [options.input === undefined ? "inherit" : "pipe", "pipe", "pipe"],
    maxBuffer: 64 * 1024 * 1024
  });

  if (result.error) {
    const code = "code" in result.error ? result.error.code : undefined;
    if (code === "ENOENT") {
      throw new ExternalToolError("EXTERNAL_TOOL_MISSING", `\`${tool}\` was not found on PATH`, {
        tool,
        cause: result.error
      });
    }
    throw new ExternalToolError("EXTERNAL_TOOL_FAILED", `Failed to launch ${tool}: ${result.error.message}`, {
      tool,
      cause: result.error
    });
  }

  const output = `${result.stdout ?? ""}${result.stderr ?? ""}`.trim();
  if (output) {
    log.debug(`${tool} output:\n${output}`);
  }
  const status = result.status ?? 1;
  log.debug(`${tool} exited with code ${status}`);
  return status;
}
