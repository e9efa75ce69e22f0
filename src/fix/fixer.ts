import path from "node:path";
import fs from "node:fs/promises";
import { DirSource, ZipTarget } from "../archive/index.js";
import { FixError, type FixPhase } from "../errors.js";
import { isDirectory, pathOccupied, removePath } from "../utils/fs.js";
import { log } from "../utils/log.js";
import { locateSource } from "../utils/paths.js";
import { CONTENT_ENTRY, rebuildContent } from "./content.js";
import { rebuildManifest } from "./manifest.js";
import { allWorkPaths, recoverEntries, workPathsFor } from "./recover.js";
import type { FixOptions, FixReport, FixResult } from "./types.js";

export const FIXED_SUFFIX = "_fixed";
export const FIXED_EXTENSION = ".xmind";

/** First free name among `<stem>_fixed.xmind`, `<stem>_fixed (2).xmind`, ... */
export async function nextFixedPath(dir: string, stem: string): Promise<string> {
  let candidate = path.join(dir, `${stem}${FIXED_SUFFIX}${FIXED_EXTENSION}`);
  let index = 1;
  while (await pathOccupied(candidate)) {
    index += 1;
    candidate = path.join(dir, `${stem}${FIXED_SUFFIX} (${index})${FIXED_EXTENSION}`);
  }
  return candidate;
}

async function cleanUp(workPaths: readonly string[], sourcePath: string): Promise<void> {
  log.info("Clearing temporary files/dirs");
  for (const workPath of workPaths) {
    if (workPath === sourcePath) continue;
    try {
      await removePath(workPath);
    } catch (err) {
      log.warn(`Unable to delete ${workPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

export async function fixFile(filePath: string, options: FixOptions): Promise<FixResult> {
  const sourcePath = path.resolve(filePath);
  const { dir, stem } = locateSource(sourcePath);
  const paths = workPathsFor(sourcePath);
  // Only the zip ladder creates the extraction dirs and repaired zips.
  let ownedPaths: string[] = [paths.rebuiltZip];
  let phase: FixPhase = "pending";
  const enter = (next: FixPhase): void => {
    phase = next;
    log.debug(`${sourcePath}: ${next}`);
  };

  try {
    let recoveredDir: string;
    if (await isDirectory(sourcePath)) {
      log.info(`Fixing XMind file from directory: ${sourcePath}`);
      recoveredDir = sourcePath;
    } else {
      ownedPaths = allWorkPaths(paths);
      recoveredDir = await recoverEntries(sourcePath, paths, options.tools, enter);
    }

    const replacements = new Map<string, Buffer>();
    if (options.rebuildContent ?? true) {
      enter("rebuilding-content");
      const content = await rebuildContent(recoveredDir);
      if (content) {
        replacements.set(CONTENT_ENTRY, content);
      }
    }

    enter("rebuilding-manifest");
    await removePath(paths.rebuiltZip);
    await rebuildManifest(new DirSource(recoveredDir), new ZipTarget(paths.rebuiltZip, { compress: options.compress }), {
      replacements
    });

    enter("renaming");
    const targetPath = await nextFixedPath(dir, stem);
    log.info(`Building target: ${paths.rebuiltZip} -> ${targetPath}`);
    await fs.rename(paths.rebuiltZip, targetPath);
    log.info(`Target built: ${targetPath}`);
    enter("done");
    return { ok: true, sourcePath, targetPath };
  } catch (err) {
    const error = new FixError(phase, sourcePath, err);
    log.error(`Failed to fix XMind file: ${sourcePath}`, error);
    return { ok: false, sourcePath, phase, error };
  } finally {
    await cleanUp(ownedPaths, sourcePath);
  }
}

/** Fixes each file in turn; one failure never stops the batch. */
export async function fixFiles(filePaths: readonly string[], options: FixOptions): Promise<FixReport> {
  const report: FixReport = { succeeded: [], failed: [] };
  for (const filePath of filePaths) {
    const result = await fixFile(filePath, options);
    if (result.ok) {
      report.succeeded.push(result);
    } else {
      report.failed.push(result);
    }
  }
  return report;
}
