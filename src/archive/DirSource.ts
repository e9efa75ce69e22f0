import fs from "node:fs/promises";
import { ArchiveError } from "../errors.js";
import { listEntries } from "../utils/fs.js";
import { isDirectoryEntry, resolveEntry } from "../utils/paths.js";
import type { ArchiveSource } from "./types.js";

export class DirSource implements ArchiveSource {
  readonly path: string;
  private opened = false;

  constructor(dirPath: string) {
    this.path = dirPath;
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async entries(): Promise<string[]> {
    this.requireOpen();
    return listEntries(this.path);
  }

  async read(entryName: string): Promise<Buffer> {
    this.requireOpen();
    const absPath = resolveEntry(this.path, entryName);
    try {
      if (isDirectoryEntry(entryName)) {
        const stat = await fs.stat(absPath);
        if (!stat.isDirectory()) {
          throw this.missing(entryName);
        }
        return Buffer.alloc(0);
      }
      return await fs.readFile(absPath);
    } catch (err) {
      if (err instanceof ArchiveError) {
        throw err;
      }
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      if (code === "ENOENT" || code === "ENOTDIR") {
        throw this.missing(entryName, err);
      }
      throw new ArchiveError("ARCHIVE_IO", `Unable to read entry ${entryName}`, { archivePath: this.path, cause: err });
    }
  }

  private missing(entryName: string, cause?: unknown): ArchiveError {
    return new ArchiveError("ARCHIVE_ENTRY_MISSING", `No such entry: ${entryName}`, { archivePath: this.path, cause });
  }

  private requireOpen(): void {
    if (!this.opened) {
      throw new ArchiveError("ARCHIVE_NOT_OPEN", "Archive must be opened before use", { archivePath: this.path });
    }
  }
}
