import fs from "node:fs/promises";
import fg from "fast-glob";
import { resolveEntry, toEntryName } from "./paths.js";
import { log } from "./log.js";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(targetPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/** True when something (even a dangling symlink) occupies the path. */
export async function pathOccupied(targetPath: string): Promise<boolean> {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch {
    return false;
  }
}

export async function removePath(targetPath: string): Promise<void> {
  log.debug(`Deleting: ${targetPath}`);
  await fs.rm(targetPath, { recursive: true, force: true });
}

/**
 * Lists every file and directory below rootDir as entry names.
 * Directories carry a trailing "/" and sort before their contents.
 */
export async function listEntries(rootDir: string): Promise<string[]> {
  const found = await fg("**/*", {
    cwd: rootDir,
    dot: true,
    onlyFiles: false,
    markDirectories: true,
    followSymbolicLinks: false,
    unique: true
  });
  const entries: string[] = [];
  for (const entry of found) {
    const relPath = toEntryName(entry);
    const stat = await fs.lstat(resolveEntry(rootDir, relPath));
    if (stat.isSymbolicLink()) {
      log.warn(`Skipping symlink: ${relPath}`);
      continue;
    }
    if (stat.isDirectory()) {
      entries.push(relPath.endsWith("/") ? relPath : `${relPath}/`);
    } else if (stat.isFile()) {
      entries.push(relPath);
    }
  }
  entries.sort();
  return entries;
}
