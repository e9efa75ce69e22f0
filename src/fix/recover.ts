import path from "node:path";
import { ExternalToolError, type FixPhase } from "../errors.js";
import { ensureDir, removePath } from "../utils/fs.js";
import { log } from "../utils/log.js";
import { locateSource } from "../utils/paths.js";
import type { RepairTools } from "./tools.js";

/** Intermediate files of one fix attempt, all placed beside the input. */
export interface WorkPaths {
  extractDir: string;
  forceExtractDir: string;
  recoveredZip: string;
  forceRecoveredZip: string;
  rebuiltZip: string;
}

export function workPathsFor(sourcePath: string): WorkPaths {
  const { dir, stem } = locateSource(sourcePath);
  const base = path.join(dir, `xmfix_${stem}`);
  return {
    extractDir: base,
    forceExtractDir: `${base}_force`,
    recoveredZip: `${base}_recovered.zip`,
    forceRecoveredZip: `${base}_force_recovered.zip`,
    rebuiltZip: `${base}.zip`
  };
}

export function allWorkPaths(paths: WorkPaths): string[] {
  return [paths.extractDir, paths.forceExtractDir, paths.recoveredZip, paths.forceRecoveredZip, paths.rebuiltZip];
}

async function extractInto(tools: RepairTools, zipPath: string, outDir: string): Promise<number> {
  await removePath(outDir);
  log.info(`Unzipping file: ${zipPath} -> ${outDir}`);
  return tools.extract(zipPath, outDir);
}

async function forceRecover(tools: RepairTools, paths: WorkPaths): Promise<boolean> {
  log.info(`Force recovering ZIP file: ${paths.recoveredZip}`);
  await removePath(paths.forceRecoveredZip);
  const repairCode = await tools.repair(paths.recoveredZip, paths.forceRecoveredZip);
  if (repairCode !== 0) {
    log.warn(`Second repair pass exited with code ${repairCode}`);
    return false;
  }
  const extractCode = await extractInto(tools, paths.forceRecoveredZip, paths.forceExtractDir);
  await removePath(paths.forceRecoveredZip);
  if (extractCode !== 0) {
    log.warn(`Extraction after second repair pass exited with code ${extractCode}`);
    return false;
  }
  return true;
}

/**
 * Extracts as many entries of a zip as the external tools can salvage and
 * returns the directory holding them. Fails only when the repair pass fails;
 * a failing extraction after repair still yields whatever it wrote.
 */
export async function recoverEntries(
  sourcePath: string,
  paths: WorkPaths,
  tools: RepairTools,
  onPhase: (phase: FixPhase) => void = () => undefined
): Promise<string> {
  onPhase("extracting");
  if ((await extractInto(tools, sourcePath, paths.extractDir)) === 0) {
    return paths.extractDir;
  }
  await removePath(paths.extractDir);

  onPhase("repairing");
  log.info(`Recovering ZIP file: ${sourcePath}`);
  await removePath(paths.recoveredZip);
  const repairCode = await tools.repair(sourcePath, paths.recoveredZip);
  if (repairCode !== 0) {
    throw new ExternalToolError("EXTERNAL_TOOL_FAILED", `Repair pass exited with code ${repairCode}`, {
      tool: "repair",
      exitCode: repairCode
    });
  }
  log.info(`ZIP file recovered: ${paths.recoveredZip}`);

  onPhase("extracting");
  const extractCode = await extractInto(tools, paths.recoveredZip, paths.extractDir);
  if (extractCode === 0) {
    await removePath(paths.recoveredZip);
    return paths.extractDir;
  }
  log.warn(`Extraction of repaired ZIP exited with code ${extractCode}; keeping partial output`);

  let forced = false;
  try {
    forced = await forceRecover(tools, paths);
  } catch (err) {
    log.warn(`Second repair pass failed: ${err instanceof Error ? err.message : String(err)}`);
  }
  await removePath(paths.recoveredZip);
  if (forced) {
    await removePath(paths.extractDir);
    return paths.forceExtractDir;
  }
  await removePath(paths.forceExtractDir);
  await ensureDir(paths.extractDir);
  return paths.extractDir;
}
