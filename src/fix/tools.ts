import type { ToolConfig } from "../config.js";
import { ensureDir } from "../utils/fs.js";
import { runTool, type RunOptions } from "../utils/process.js";

/**
 * The external zip utilities the recovery pipeline shells out to.
 * Both resolve to the tool's exit status; 0 means complete success.
 */
export interface RepairTools {
  repair(sourcePath: string, outPath: string): Promise<number>;
  extract(zipPath: string, outDir: string): Promise<number>;
}

export type ToolRunner = (tool: string, args: string[], options?: RunOptions) => number;

/**
 * `zip -FF` asks "Is this a single-disk archive?" on stdout when the
 * end-of-central-directory record is gone; its answer is always yes.
 */
export const REPAIR_ANSWERS = "y\n";

export function createCommandTools(config: ToolConfig, run: ToolRunner = runTool): RepairTools {
  return {
    async repair(sourcePath, outPath) {
      return run(config.zipCommand, ["-FF", sourcePath, "--out", outPath], { input: REPAIR_ANSWERS });
    },
    async extract(zipPath, outDir) {
      await ensureDir(outDir);
      return run(config.unzipCommand, ["-o", zipPath, "-d", outDir]);
    }
  };
}
