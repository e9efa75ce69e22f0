import * as yauzl from "yauzl";
import type { Readable } from "node:stream";
import { ArchiveError } from "../errors.js";
import { isDirectoryEntry, toEntryName } from "../utils/paths.js";
import type { ArchiveSource } from "./types.js";

function openZip(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: false }, (openErr, zipfile) => {
      if (openErr || !zipfile) {
        reject(openErr ?? new Error(`Unable to open zip: ${zipPath}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

/** Central-directory records in archive order, duplicates included. */
function readEntryList(zipfile: yauzl.ZipFile): Promise<yauzl.Entry[]> {
  return new Promise((resolve, reject) => {
    const list: yauzl.Entry[] = [];
    zipfile.on("entry", (entry: yauzl.Entry) => {
      list.push(entry);
      zipfile.readEntry();
    });
    zipfile.once("end", () => resolve(list));
    zipfile.once("error", reject);
    zipfile.readEntry();
  });
}

function collect(stream: Readable): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer) => chunks.push(chunk));
    stream.on("error", reject);
    stream.on("end", () => resolve(Buffer.concat(chunks)));
  });
}

export class ZipSource implements ArchiveSource {
  readonly path: string;
  private zipfile: yauzl.ZipFile | null = null;
  private names: string[] = [];
  // A repeated name reads as its last record.
  private table = new Map<string, yauzl.Entry>();

  constructor(zipPath: string) {
    this.path = zipPath;
  }

  async open(): Promise<void> {
    const zipfile = await openZip(this.path);
    let list: yauzl.Entry[];
    try {
      list = await readEntryList(zipfile);
    } catch (err) {
      zipfile.close();
      throw err;
    }
    this.names = list.map((entry) => toEntryName(entry.fileName));
    this.table = new Map(list.map((entry, index): [string, yauzl.Entry] => [this.names[index], entry]));
    this.zipfile = zipfile;
  }

  async close(): Promise<void> {
    this.zipfile?.close();
    this.zipfile = null;
    this.names = [];
    this.table = new Map();
  }

  async entries(): Promise<string[]> {
    this.requireOpen();
    return [...this.names];
  }

  async read(entryName: string): Promise<Buffer> {
    const zipfile = this.requireOpen();
    const entry = this.table.get(entryName);
    if (!entry) {
      throw new ArchiveError("ARCHIVE_ENTRY_MISSING", `No such entry: ${entryName}`, { archivePath: this.path });
    }
    if (isDirectoryEntry(entryName)) {
      return Buffer.alloc(0);
    }
    const stream = await new Promise<Readable>((resolve, reject) => {
      zipfile.openReadStream(entry, (streamErr, readStream) => {
        if (streamErr || !readStream) {
          reject(streamErr ?? new Error(`Unable to read entry ${entryName}`));
          return;
        }
        resolve(readStream);
      });
    });
    return collect(stream);
  }

  private requireOpen(): yauzl.ZipFile {
    if (!this.zipfile) {
      throw new ArchiveError("ARCHIVE_NOT_OPEN", "Archive must be opened before use", { archivePath: this.path });
    }
    return this.zipfile;
  }
}
