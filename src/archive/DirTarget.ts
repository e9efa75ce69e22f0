import path from "node:path";
import fs from "node:fs/promises";
import { ArchiveError } from "../errors.js";
import { ensureDir, pathOccupied, removePath } from "../utils/fs.js";
import { isDirectoryEntry, resolveEntry } from "../utils/paths.js";
import type { ArchiveTarget } from "./types.js";

export class DirTarget implements ArchiveTarget {
  readonly path: string;
  private opened = false;
  private createdRoot = false;
  private readonly written: string[] = [];

  constructor(dirPath: string) {
    this.path = dirPath;
  }

  async open(): Promise<void> {
    const existed = await pathOccupied(this.path);
    await this.makeDir(this.path, this.path);
    this.createdRoot = !existed;
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async write(entryName: string, content: Buffer): Promise<void> {
    if (!this.opened) {
      throw new ArchiveError("ARCHIVE_NOT_OPEN", "Archive must be opened before use", { archivePath: this.path });
    }
    const absPath = resolveEntry(this.path, entryName);
    if (isDirectoryEntry(entryName)) {
      await this.makeDir(absPath, absPath);
      this.written.push(absPath);
      return;
    }
    await this.makeDir(path.dirname(absPath), absPath);
    try {
      await fs.writeFile(absPath, content);
    } catch (err) {
      throw new ArchiveError("ARCHIVE_IO", `Unable to write file: ${absPath}`, { archivePath: this.path, cause: err });
    }
    this.written.push(absPath);
  }

  async discard(): Promise<void> {
    this.opened = false;
    if (this.createdRoot) {
      await removePath(this.path);
      return;
    }
    for (const absPath of [...this.written].reverse()) {
      await removePath(absPath);
    }
    this.written.length = 0;
  }

  private async makeDir(dirPath: string, forPath: string): Promise<void> {
    try {
      await ensureDir(dirPath);
    } catch (err) {
      throw new ArchiveError("ARCHIVE_IO", `Directory can not be created to write file: ${forPath}`, {
        archivePath: this.path,
        cause: err
      });
    }
  }
}
