import path from "node:path";
import { createWriteStream } from "node:fs";
import * as yazl from "yazl";
import { ArchiveError } from "../errors.js";
import { ensureDir, removePath } from "../utils/fs.js";
import { isDirectoryEntry } from "../utils/paths.js";
import { log } from "../utils/log.js";
import type { ArchiveTarget } from "./types.js";

const FIXED_ZIP_MTIME = new Date("2000-01-01T00:00:00Z");

export interface ZipTargetOptions {
  /** Deflate file entries instead of storing them. */
  compress?: boolean;
}

export class ZipTarget implements ArchiveTarget {
  readonly path: string;
  private readonly compress: boolean;
  private zipfile: yazl.ZipFile | null = null;
  private finished: Promise<void> | null = null;
  private writeError: Error | null = null;

  constructor(zipPath: string, options: ZipTargetOptions = {}) {
    this.path = zipPath;
    this.compress = options.compress ?? false;
  }

  async open(): Promise<void> {
    try {
      await ensureDir(path.dirname(this.path));
    } catch (err) {
      throw new ArchiveError("ARCHIVE_IO", `Directory can not be created to write file: ${this.path}`, {
        archivePath: this.path,
        cause: err
      });
    }
    const zipfile = new yazl.ZipFile();
    const outputStream = createWriteStream(this.path);
    this.writeError = null;
    outputStream.on("error", (err) => {
      this.writeError = err;
    });
    this.finished = new Promise<void>((resolve) => {
      outputStream.on("close", resolve);
    });
    zipfile.outputStream.pipe(outputStream);
    this.zipfile = zipfile;
  }

  async write(entryName: string, content: Buffer): Promise<void> {
    const zipfile = this.requireOpen();
    if (isDirectoryEntry(entryName)) {
      zipfile.addEmptyDirectory(entryName, { mtime: FIXED_ZIP_MTIME, mode: 0o755 });
      return;
    }
    zipfile.addBuffer(content, entryName, { mtime: FIXED_ZIP_MTIME, mode: 0o644, compress: this.compress });
  }

  async close(): Promise<void> {
    const zipfile = this.zipfile;
    const finished = this.finished;
    this.zipfile = null;
    this.finished = null;
    if (!zipfile || !finished) {
      return;
    }
    zipfile.end();
    await finished;
    if (this.writeError) {
      throw new ArchiveError("ARCHIVE_IO", `Unable to write zip: ${this.path}`, {
        archivePath: this.path,
        cause: this.writeError
      });
    }
  }

  async discard(): Promise<void> {
    try {
      await this.close();
    } catch (err) {
      log.debug(`Ignoring close failure of discarded target ${this.path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    await removePath(this.path);
  }

  private requireOpen(): yazl.ZipFile {
    if (!this.zipfile) {
      throw new ArchiveError("ARCHIVE_NOT_OPEN", "Archive must be opened before use", { archivePath: this.path });
    }
    return this.zipfile;
  }
}
