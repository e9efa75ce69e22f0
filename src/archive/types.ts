import { log } from "../utils/log.js";

export interface Scoped {
  open(): Promise<void>;
  close(): Promise<void>;
}

/** Read side of an archive: a ZIP file or a directory tree. */
export interface ArchiveSource extends Scoped {
  readonly path: string;
  /** Entry names in enumeration order; directory entries end with "/". */
  entries(): Promise<string[]>;
  /** Raw bytes of an entry. Directory entries are empty. */
  read(entryName: string): Promise<Buffer>;
}

export interface ArchiveTarget extends Scoped {
  readonly path: string;
  write(entryName: string, content: Buffer): Promise<void>;
  /** Removes whatever this target has written so far. */
  discard(): Promise<void>;
}

/**
 * Opens the archive, runs fn and closes the archive on every exit path.
 * An error from fn wins over an error raised while closing.
 */
export async function withArchive<A extends Scoped, T>(archive: A, fn: (archive: A) => Promise<T>): Promise<T> {
  await archive.open();
  let result: T;
  try {
    result = await fn(archive);
  } catch (err) {
    await archive.close().catch((closeErr: unknown) => {
      log.warn(`Error while closing after failure: ${closeErr instanceof Error ? closeErr.message : String(closeErr)}`);
    });
    throw err;
  }
  await archive.close();
  return result;
}
